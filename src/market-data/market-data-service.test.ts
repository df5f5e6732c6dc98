import { describe, expect, it, vi } from "vitest";
import { US2Y, US3Y, treasuries } from "../__tests__/helpers.js";
import { PricingSide } from "../shared/side.js";
import { createListener } from "../soa/listener.js";
import { MarketDataService } from "./market-data-service.js";
import { order } from "./order-book.js";
import type { OrderBook } from "./types.js";

function makeBook(): OrderBook {
	return {
		product: treasuries.bondOrPlaceholder(US2Y),
		bidStack: [
			order("99.5", 500, PricingSide.Bid),
			order("99.75", 1_000, PricingSide.Bid),
			order("99.5", 700, PricingSide.Bid),
		],
		offerStack: [order("100", 300, PricingSide.Offer), order("99.875", 200, PricingSide.Offer)],
	};
}

describe("MarketDataService", () => {
	it("stores the book and notifies add with the same reference", () => {
		const service = new MarketDataService(treasuries);
		const onAdd = vi.fn();
		service.addListener(createListener({ onAdd }));
		const book = makeBook();

		service.onMessage(book);

		expect(service.getData(US2Y)).toBe(book);
		expect(onAdd).toHaveBeenCalledWith(book);
	});

	it("last write wins per product", () => {
		const service = new MarketDataService(treasuries);
		const first = makeBook();
		const second = makeBook();
		service.onMessage(first);
		service.onMessage(second);
		expect(service.getData(US2Y)).toBe(second);
		expect(service.size).toBe(1);
	});

	it("returns an empty book for an unknown key without inserting it", () => {
		const service = new MarketDataService(treasuries);
		const zero = service.getData(US3Y);
		expect(zero.product.ticker).toBe("US3Y");
		expect(zero.bidStack).toEqual([]);
		expect(zero.offerStack).toEqual([]);
		expect(service.size).toBe(0);
	});

	it("getBestBidOffer reads the stored book", () => {
		const service = new MarketDataService(treasuries);
		service.onMessage(makeBook());

		const bbo = service.getBestBidOffer(US2Y);
		expect(bbo?.bidOrder.price.toString()).toBe("99.75");
		expect(bbo?.offerOrder.price.toString()).toBe("99.875");
		expect(service.getBestBidOffer(US3Y)).toBeNull();
	});

	it("aggregateDepth replaces the stored book without fan-out", () => {
		const service = new MarketDataService(treasuries);
		const onAdd = vi.fn();
		service.onMessage(makeBook());
		service.addListener(createListener({ onAdd, onUpdate: onAdd }));

		const aggregated = service.aggregateDepth(US2Y);

		expect(aggregated.bidStack.map((o) => [o.price.toString(), o.quantity])).toEqual([
			["99.75", 1_000],
			["99.5", 1_200],
		]);
		expect(service.getData(US2Y)).toBe(aggregated);
		expect(onAdd).not.toHaveBeenCalled();
	});

	it("aggregateDepth on an unknown product does not insert", () => {
		const service = new MarketDataService(treasuries);
		expect(service.aggregateDepth(US3Y).bidStack).toEqual([]);
		expect(service.size).toBe(0);
	});
});
