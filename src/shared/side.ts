/**
 * Side vocabularies.
 *
 * A resting order or a streamed quote sits on the bid or the offer; a booked
 * trade or a customer inquiry is a buy or a sell.
 */

export const PricingSide = {
	Bid: "bid",
	Offer: "offer",
} as const;

export type PricingSide = (typeof PricingSide)[keyof typeof PricingSide];

export const TradeSide = {
	Buy: "buy",
	Sell: "sell",
} as const;

export type TradeSide = (typeof TradeSide)[keyof typeof TradeSide];

/** Lifting the offer is a buy; hitting the bid is a sell. */
export function tradeSideForAggressed(side: PricingSide): TradeSide {
	return side === PricingSide.Offer ? TradeSide.Buy : TradeSide.Sell;
}
