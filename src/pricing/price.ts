import { Decimal } from "../shared/decimal.js";
import type { Bond } from "../reference/types.js";
import type { Price } from "./types.js";

/** Builds a Price from a bid and an offer: mid is their average, spread their difference. */
export function priceFromQuotes(product: Bond, bid: Decimal, offer: Decimal): Price {
	return { product, mid: bid.add(offer).div(2), bidOfferSpread: offer.sub(bid) };
}

export function bidOf(price: Price): Decimal {
	return price.mid.sub(price.bidOfferSpread.div(2));
}

export function offerOf(price: Price): Decimal {
	return price.mid.add(price.bidOfferSpread.div(2));
}

export function zeroPrice(product: Bond): Price {
	return { product, mid: Decimal.zero(), bidOfferSpread: Decimal.zero() };
}
