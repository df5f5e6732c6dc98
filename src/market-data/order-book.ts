import { Decimal } from "../shared/decimal.js";
import { PricingSide } from "../shared/side.js";
import type { Bond } from "../reference/types.js";
import type { BestBidOffer, Order, OrderBook } from "./types.js";

/** Creates an order. */
export function order(price: Decimal | string, quantity: number, side: PricingSide): Order {
	return { price: typeof price === "string" ? Decimal.from(price) : price, quantity, side };
}

/** A book with no orders on either side. */
export function emptyBook(product: Bond): OrderBook {
	return { product, bidStack: [], offerStack: [] };
}

/**
 * Best order of a stack: highest price for bids, lowest for offers.
 * Ties keep the first order encountered.
 * @returns the best order, or null for an empty stack
 */
export function bestOrder(stack: readonly Order[], side: PricingSide): Order | null {
	let best: Order | null = null;
	for (const candidate of stack) {
		if (best === null || isBetter(candidate.price, best.price, side)) {
			best = candidate;
		}
	}
	return best;
}

function isBetter(price: Decimal, than: Decimal, side: PricingSide): boolean {
	return side === PricingSide.Bid ? price.gt(than) : price.lt(than);
}

/**
 * Best bid and best offer of a book.
 * @returns null when either side has no orders
 * @example
 * const bbo = bestBidOffer(book);
 * if (bbo !== null) spread(bbo);
 */
export function bestBidOffer(book: OrderBook): BestBidOffer | null {
	const bidOrder = bestOrder(book.bidStack, PricingSide.Bid);
	const offerOrder = bestOrder(book.offerStack, PricingSide.Offer);
	if (bidOrder === null || offerOrder === null) return null;
	return { bidOrder, offerOrder };
}

/** Offer price minus bid price. */
export function spread(bbo: BestBidOffer): Decimal {
	return bbo.offerOrder.price.sub(bbo.bidOrder.price);
}

/**
 * Merges orders at the same price into one level per side, summing quantity.
 * Levels come out best-first: bids descending, offers ascending.
 * Aggregating an aggregated book returns an equal book.
 */
export function aggregateDepth(book: OrderBook): OrderBook {
	return {
		product: book.product,
		bidStack: mergeLevels(book.bidStack, PricingSide.Bid),
		offerStack: mergeLevels(book.offerStack, PricingSide.Offer),
	};
}

function mergeLevels(stack: readonly Order[], side: PricingSide): Order[] {
	const levels = new Map<string, Order>();
	for (const o of stack) {
		const key = o.price.toString();
		const existing = levels.get(key);
		levels.set(key, order(o.price, (existing?.quantity ?? 0) + o.quantity, side));
	}
	const merged = [...levels.values()];
	merged.sort((a, b) => (side === PricingSide.Bid ? b.price.cmp(a.price) : a.price.cmp(b.price)));
	return merged;
}

/** Total quantity resting on a stack. */
export function stackQuantity(stack: readonly Order[]): number {
	let total = 0;
	for (const o of stack) total += o.quantity;
	return total;
}
