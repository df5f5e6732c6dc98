import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { US5Y, treasuries } from "../__tests__/helpers.js";
import { Decimal } from "../shared/decimal.js";
import { PricingSide } from "../shared/side.js";
import { aggregateDepth, bestBidOffer, order, stackQuantity } from "./order-book.js";
import type { Order, OrderBook } from "./types.js";

const bond = treasuries.bondOrPlaceholder(US5Y);

// few distinct 1/256 ticks so that prices collide often
const arbStack = (side: PricingSide): fc.Arbitrary<Order[]> =>
	fc.array(
		fc
			.tuple(fc.integer({ min: 99 * 256, max: 99 * 256 + 8 }), fc.integer({ min: 1, max: 5_000_000 }))
			.map(([ticks, quantity]) => order(Decimal.from(ticks).div(256), quantity, side)),
		{ maxLength: 30 },
	);

const arbBook: fc.Arbitrary<OrderBook> = fc
	.tuple(arbStack(PricingSide.Bid), arbStack(PricingSide.Offer))
	.map(([bidStack, offerStack]) => ({ product: bond, bidStack, offerStack }));

function distinctPrices(stack: readonly Order[]): number {
	return new Set(stack.map((o) => o.price.toString())).size;
}

describe("aggregateDepth (property-based)", () => {
	it("preserves total quantity per side", () => {
		fc.assert(
			fc.property(arbBook, (book) => {
				const aggregated = aggregateDepth(book);
				expect(stackQuantity(aggregated.bidStack)).toBe(stackQuantity(book.bidStack));
				expect(stackQuantity(aggregated.offerStack)).toBe(stackQuantity(book.offerStack));
			}),
		);
	});

	it("emits one level per distinct price", () => {
		fc.assert(
			fc.property(arbBook, (book) => {
				const aggregated = aggregateDepth(book);
				expect(aggregated.bidStack).toHaveLength(distinctPrices(book.bidStack));
				expect(distinctPrices(aggregated.bidStack)).toBe(aggregated.bidStack.length);
				expect(aggregated.offerStack).toHaveLength(distinctPrices(book.offerStack));
			}),
		);
	});

	it("is sorted best-first", () => {
		fc.assert(
			fc.property(arbBook, (book) => {
				const { bidStack, offerStack } = aggregateDepth(book);
				for (let i = 1; i < bidStack.length; i++) {
					const prev = bidStack[i - 1];
					const curr = bidStack[i];
					if (prev && curr) expect(prev.price.gt(curr.price)).toBe(true);
				}
				for (let i = 1; i < offerStack.length; i++) {
					const prev = offerStack[i - 1];
					const curr = offerStack[i];
					if (prev && curr) expect(prev.price.lt(curr.price)).toBe(true);
				}
			}),
		);
	});

	it("is idempotent", () => {
		fc.assert(
			fc.property(arbBook, (book) => {
				const once = aggregateDepth(book);
				expect(aggregateDepth(once)).toEqual(once);
			}),
		);
	});

	it("does not move the best prices", () => {
		fc.assert(
			fc.property(arbBook, (book) => {
				const before = bestBidOffer(book);
				const after = bestBidOffer(aggregateDepth(book));
				expect(after?.bidOrder.price.toString()).toBe(before?.bidOrder.price.toString());
				expect(after?.offerOrder.price.toString()).toBe(before?.offerOrder.price.toString());
			}),
		);
	});
});
