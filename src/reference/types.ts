import type { Decimal } from "../shared/decimal.js";
import type { ProductId } from "../shared/identifiers.js";

/** A US Treasury, identified by CUSIP. */
export interface Bond {
	readonly productId: ProductId;
	readonly ticker: string;
	readonly coupon: Decimal;
	/** YYYY-MM-DD; empty for a placeholder */
	readonly maturity: string;
}

/** A named group of bonds whose risk is aggregated together. */
export interface BucketedSector {
	readonly name: string;
	readonly members: readonly Bond[];
}

/** One validated row of the reference-data file. */
export interface BondRecord {
	readonly cusip: string;
	readonly ticker: string;
	readonly coupon: Decimal;
	readonly maturity: string;
	readonly pv01: Decimal;
	readonly sector: string;
}
