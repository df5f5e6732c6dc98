import type { Decimal } from "../shared/decimal.js";
import type { PricingSide } from "../shared/side.js";
import type { Bond } from "../reference/types.js";

/** One side of a streamed two-way price. */
export interface PriceStreamOrder {
	readonly price: Decimal;
	readonly visibleQuantity: number;
	readonly hiddenQuantity: number;
	readonly side: PricingSide;
}

/** A two-way price published to the market. */
export interface PriceStream {
	readonly product: Bond;
	readonly bidOrder: PriceStreamOrder;
	readonly offerOrder: PriceStreamOrder;
}

/** A price stream produced by the streaming algo. */
export interface AlgoStream {
	readonly priceStream: PriceStream;
}
