import type { Bond, BucketedSector } from "../reference/types.js";
import { Decimal } from "../shared/decimal.js";
import type { ProductId } from "../shared/identifiers.js";
import type { PV01 } from "./types.js";

/**
 * Quantity-weighted PV01 of a sector.
 *
 * totalQuantity = Σ quantity; weighted pv01 = Σ(pv01 × quantity) / totalQuantity,
 * or 0 when totalQuantity is 0.
 *
 * @example
 * // 1,000,000 at 0.01 and 3,000,000 at 0.02
 * aggregateBucketedRisk(frontEnd, lookup); // { pv01: 0.0175, quantity: 4_000_000 }
 */
export function aggregateBucketedRisk(
	sector: BucketedSector,
	lookup: (productId: ProductId) => PV01<Bond>,
): PV01<BucketedSector> {
	let totalQuantity = 0;
	let weighted = Decimal.zero();
	for (const bond of sector.members) {
		const exposure = lookup(bond.productId);
		totalQuantity += exposure.quantity;
		weighted = weighted.add(exposure.pv01.mul(exposure.quantity));
	}
	const pv01 = totalQuantity === 0 ? Decimal.zero() : weighted.div(totalQuantity);
	return { product: sector, pv01, quantity: totalQuantity };
}
