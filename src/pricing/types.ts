import type { Decimal } from "../shared/decimal.js";
import type { Bond } from "../reference/types.js";

/** A two-way price expressed as mid and bid/offer spread. */
export interface Price {
	readonly product: Bond;
	readonly mid: Decimal;
	readonly bidOfferSpread: Decimal;
}
