/**
 * Orders sent to a venue, latest per product.
 */

import type { ReferenceData } from "../reference/reference-data.js";
import { cycle } from "../shared/cycle.js";
import { Decimal } from "../shared/decimal.js";
import { type ProductId, orderId } from "../shared/identifiers.js";
import { PricingSide } from "../shared/side.js";
import { KeyedService, type ServiceOptions } from "../soa/keyed-service.js";
import { createListener } from "../soa/listener.js";
import type { Listener } from "../soa/types.js";
import {
	type AlgoExecution,
	type ExecutionOrder,
	OrderType,
	VENUE_ROTATION,
	type Venue,
} from "./types.js";

export class ExecutionService extends KeyedService<ProductId, ExecutionOrder> {
	private readonly reference: ReferenceData;
	private readonly venues = new Map<ProductId, Venue>();

	constructor(reference: ReferenceData, options: ServiceOptions<ExecutionOrder> = {}) {
		super("execution", options);
		this.reference = reference;
	}

	override onMessage(order: ExecutionOrder): void {
		this.storeAndNotify(order.product.productId, order, "add");
	}

	/** Records the venue, stores the order and notifies `add`. */
	executeOrder(order: ExecutionOrder, venue: Venue): void {
		this.venues.set(order.product.productId, venue);
		this.logger.info({ orderId: order.orderId, venue }, "Executing order");
		this.onMessage(order);
	}

	/** Venue of the latest order executed for the product. */
	venueOf(productId: ProductId): Venue | undefined {
		return this.venues.get(productId);
	}

	protected override zeroValue(productId: ProductId): ExecutionOrder {
		return {
			product: this.reference.bondOrPlaceholder(productId),
			side: PricingSide.Bid,
			orderId: orderId(`${productId}-A0`),
			orderType: OrderType.Market,
			price: Decimal.zero(),
			visibleQuantity: 0,
			hiddenQuantity: 0,
			parentOrderId: "",
			isChildOrder: false,
		};
	}
}

/** Algo-execution listener: sends each order to the next venue in rotation. */
export function executionListener(service: ExecutionService): Listener<AlgoExecution> {
	const nextVenue = cycle(VENUE_ROTATION);
	return createListener({
		onUpdate: (algo) => service.executeOrder(algo.order, nextVenue()),
	});
}
