/**
 * GuiService: throttled price feed for a trader screen.
 *
 * Holds the latest forwarded price per product and writes each one out
 * through its connector. The throttle lives in the pricing listener.
 */

import { zeroPrice } from "../pricing/price.js";
import type { Price } from "../pricing/types.js";
import type { ReferenceData } from "../reference/reference-data.js";
import { SystemError } from "../shared/errors.js";
import type { ProductId } from "../shared/identifiers.js";
import { type Clock, SystemClock } from "../shared/time.js";
import { KeyedService, type ServiceOptions } from "../soa/keyed-service.js";
import { createListener } from "../soa/listener.js";
import type { Connector, Listener } from "../soa/types.js";

export class GuiService extends KeyedService<ProductId, Price> {
	private readonly reference: ReferenceData;
	private connector: Connector<Price> | null = null;

	constructor(reference: ReferenceData, options: ServiceOptions<Price> = {}) {
		super("gui", options);
		this.reference = reference;
	}

	setConnector(connector: Connector<Price>): void {
		this.connector = connector;
	}

	override onMessage(price: Price): void {
		this.addPrice(price);
	}

	/**
	 * Stores the price and publishes it through the connector.
	 * @throws SystemError if no connector has been set
	 */
	addPrice(price: Price): void {
		if (this.connector === null) {
			throw new SystemError("GUI connector not set", { service: "gui" });
		}
		this.storeAndNotify(price.product.productId, price);
		this.connector.publish(price);
	}

	protected override zeroValue(productId: ProductId): Price {
		return zeroPrice(this.reference.bondOrPlaceholder(productId));
	}
}

export interface GuiThrottleOptions {
	/** Minimum interval between two forwarded prices */
	readonly throttleMs: number;
	/** Forwarding stops after this many prices */
	readonly maxUpdates: number;
	readonly clock?: Clock;
}

/**
 * Pricing listener: forwards an added price to the GUI when `throttleMs` has
 * passed since the previous forward. The first price goes through at once.
 */
export function guiListener(service: GuiService, options: GuiThrottleOptions): Listener<Price> {
	const clock = options.clock ?? SystemClock;
	let lastForwardedAt: number | null = null;
	let forwarded = 0;
	return createListener({
		onAdd: (price) => {
			if (forwarded >= options.maxUpdates) return;
			const now = clock.now();
			if (lastForwardedAt !== null && now - lastForwardedAt < options.throttleMs) return;
			lastForwardedAt = now;
			forwarded++;
			service.addPrice(price);
		},
	});
}
