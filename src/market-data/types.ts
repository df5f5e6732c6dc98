import type { Decimal } from "../shared/decimal.js";
import type { PricingSide } from "../shared/side.js";
import type { Bond } from "../reference/types.js";

/** A resting order at one price level. */
export interface Order {
	readonly price: Decimal;
	readonly quantity: number;
	readonly side: PricingSide;
}

/** Bid and offer stacks for one product, in arrival order unless aggregated. */
export interface OrderBook {
	readonly product: Bond;
	readonly bidStack: readonly Order[];
	readonly offerStack: readonly Order[];
}

/** Top of book. */
export interface BestBidOffer {
	readonly bidOrder: Order;
	readonly offerOrder: Order;
}
