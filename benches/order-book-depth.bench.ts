import { bench, describe } from "vitest";
import { aggregateDepth, bestBidOffer, order } from "../src/market-data/order-book.js";
import type { Order, OrderBook } from "../src/market-data/types.js";
import { Decimal } from "../src/shared/decimal.js";
import { productId } from "../src/shared/identifiers.js";
import { PricingSide } from "../src/shared/side.js";

const TICK = Decimal.from(1).div(256);

function buildBook(levels: number, ordersPerLevel: number): OrderBook {
	const bids: Order[] = [];
	const offers: Order[] = [];
	const mid = Decimal.from(100);
	for (let i = 0; i < levels; i++) {
		for (let j = 0; j < ordersPerLevel; j++) {
			bids.push(order(mid.sub(TICK.mul(i + 1)), (j + 1) * 1_000_000, PricingSide.Bid));
			offers.push(order(mid.add(TICK.mul(i + 1)), (j + 1) * 1_000_000, PricingSide.Offer));
		}
	}
	const id = productId("91282CJJ1");
	return {
		product: {
			productId: id,
			ticker: "US10Y",
			coupon: Decimal.from("0.045"),
			maturity: "2033-11-15",
		},
		bidStack: bids,
		offerStack: offers,
	};
}

const book5x2 = buildBook(5, 2);
const book50x10 = buildBook(50, 10);

describe("order book depth", () => {
	bench("aggregateDepth 5 levels x 2 orders", () => {
		aggregateDepth(book5x2);
	});

	bench("aggregateDepth 50 levels x 10 orders", () => {
		aggregateDepth(book50x10);
	});
});

describe("order book top", () => {
	bench("bestBidOffer 50 levels x 10 orders", () => {
		bestBidOffer(book50x10);
	});
});
