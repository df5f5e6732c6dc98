import type { Bond } from "../reference/types.js";
import type { Decimal } from "../shared/decimal.js";
import type { TradeId } from "../shared/identifiers.js";
import type { TradeSide } from "../shared/side.js";

/** Books that algo trades are allocated to, in rotation order. */
export const TRADING_BOOKS: readonly [string, ...string[]] = ["TRSY1", "TRSY2", "TRSY3"];

export interface Trade {
	readonly product: Bond;
	readonly tradeId: TradeId;
	readonly price: Decimal;
	readonly book: string;
	readonly quantity: number;
	readonly side: TradeSide;
}
