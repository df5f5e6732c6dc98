import type { Decimal } from "../shared/decimal.js";

/**
 * Interest-rate exposure of a product or a sector.
 * `quantity` is the only field that changes after construction.
 */
export interface PV01<P> {
	readonly product: P;
	readonly pv01: Decimal;
	quantity: number;
}
