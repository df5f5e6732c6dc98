import type { Trade } from "../booking/types.js";
import type { ReferenceData } from "../reference/reference-data.js";
import type { ProductId } from "../shared/identifiers.js";
import { TradeSide } from "../shared/side.js";
import { KeyedService, type ServiceOptions } from "../soa/keyed-service.js";
import { createListener } from "../soa/listener.js";
import type { Listener } from "../soa/types.js";
import { Position } from "./position.js";

export class PositionService extends KeyedService<ProductId, Position> {
	private readonly reference: ReferenceData;

	/** Seeds a flat position for every reference product. */
	constructor(reference: ReferenceData, options: ServiceOptions<Position> = {}) {
		super("position", options);
		this.reference = reference;
		for (const id of reference.productIds()) {
			this.store.set(id, new Position(reference.bondOrPlaceholder(id)));
		}
	}

	/** Replaces the stored position and notifies `update` then `add`. */
	override onMessage(position: Position): void {
		this.storeAndNotify(position.product.productId, position, "update", "add");
	}

	/**
	 * Applies a trade to the product's position in place; a sell subtracts.
	 * Notifies `update` then `add` with the stored position.
	 */
	addTrade(trade: Trade): void {
		const id = trade.product.productId;
		const position = this.store.get(id) ?? new Position(trade.product);
		const signed = trade.side === TradeSide.Sell ? -trade.quantity : trade.quantity;
		position.addPosition(trade.book, signed);
		this.logger.info(
			{ productId: id, book: trade.book, quantity: signed, aggregate: position.getAggregatePosition() },
			"Position updated",
		);
		this.storeAndNotify(id, position, "update", "add");
	}

	protected override zeroValue(productId: ProductId): Position {
		return new Position(this.reference.bondOrPlaceholder(productId));
	}
}

/** Trade-booking listener: applies every booked trade. */
export function positionListener(service: PositionService): Listener<Trade> {
	return createListener({ onUpdate: (trade) => service.addTrade(trade) });
}
