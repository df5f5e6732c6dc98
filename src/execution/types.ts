import type { Decimal } from "../shared/decimal.js";
import type { OrderId } from "../shared/identifiers.js";
import type { PricingSide } from "../shared/side.js";
import type { Bond } from "../reference/types.js";

export const OrderType = {
	Fok: "FOK",
	Ioc: "IOC",
	Market: "MARKET",
	Limit: "LIMIT",
	Stop: "STOP",
} as const;

export type OrderType = (typeof OrderType)[keyof typeof OrderType];

/** Execution venues, in the order the execution listener rotates through them. */
export const Venue = {
	Brokertec: "BROKERTEC",
	Espeed: "ESPEED",
	Cme: "CME",
} as const;

export type Venue = (typeof Venue)[keyof typeof Venue];

export const VENUE_ROTATION: readonly [Venue, ...Venue[]] = [Venue.Brokertec, Venue.Espeed, Venue.Cme];

/** An order sent to a venue. `side` is the side of the book it aggresses. */
export interface ExecutionOrder {
	readonly product: Bond;
	readonly side: PricingSide;
	readonly orderId: OrderId;
	readonly orderType: OrderType;
	readonly price: Decimal;
	readonly visibleQuantity: number;
	readonly hiddenQuantity: number;
	/** Empty when the order has no parent */
	readonly parentOrderId: string;
	readonly isChildOrder: boolean;
}

/** An execution order produced by the execution algo. */
export interface AlgoExecution {
	readonly order: ExecutionOrder;
}
