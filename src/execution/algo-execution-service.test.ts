import { describe, expect, it, vi } from "vitest";
import { US2Y, US10Y, treasuries } from "../__tests__/helpers.js";
import { order } from "../market-data/order-book.js";
import type { OrderBook } from "../market-data/types.js";
import type { ProductId } from "../shared/identifiers.js";
import { PricingSide } from "../shared/side.js";
import { createListener } from "../soa/listener.js";
import {
	AlgoExecutionService,
	MAX_AGGRESS_SPREAD,
	algoExecutionListener,
} from "./algo-execution-service.js";
import { OrderType } from "./types.js";

function book(id: ProductId, bid: string, offer: string): OrderBook {
	return {
		product: treasuries.bondOrPlaceholder(id),
		bidStack: [order(bid, 1_000_000, PricingSide.Bid), order("99", 5_000_000, PricingSide.Bid)],
		offerStack: [order(offer, 2_000_000, PricingSide.Offer)],
	};
}

describe("AlgoExecutionService", () => {
	it("aggresses at a spread of exactly 1/128, lifting the offer first", () => {
		const service = new AlgoExecutionService(treasuries);
		const onUpdate = vi.fn();
		service.addListener(createListener({ onUpdate }));

		const execution = service.sendOrder(book(US2Y, "99.5", "99.5078125"));

		expect(MAX_AGGRESS_SPREAD.toString()).toBe("0.0078125");
		expect(execution?.order).toMatchObject({
			side: PricingSide.Offer,
			orderId: "US2Y-A1",
			orderType: OrderType.Market,
			visibleQuantity: 500_000,
			hiddenQuantity: 1_500_000,
			parentOrderId: "",
			isChildOrder: false,
		});
		expect(execution?.order.price.toString()).toBe("99.5078125");
		expect(service.getData(US2Y)).toBe(execution);
		expect(onUpdate).toHaveBeenCalledWith(execution);
	});

	it("hits the bid on the next aggression, sized from the best bid", () => {
		const service = new AlgoExecutionService(treasuries);
		service.sendOrder(book(US2Y, "99.5", "99.5078125"));

		const second = service.sendOrder(book(US10Y, "101", "101.00390625"));

		expect(second?.order.side).toBe(PricingSide.Bid);
		expect(second?.order.orderId).toBe("US10Y-A2");
		expect(second?.order.price.toString()).toBe("101");
		expect(second?.order.visibleQuantity).toBe(250_000);
		expect(second?.order.hiddenQuantity).toBe(750_000);
	});

	it("leaves a wide book alone without advancing the sequence", () => {
		const service = new AlgoExecutionService(treasuries);
		const onUpdate = vi.fn();
		service.addListener(createListener({ onUpdate }));

		expect(service.sendOrder(book(US2Y, "99.5", "99.515625"))).toBeNull();
		const next = service.sendOrder(book(US2Y, "99.5", "99.5"));

		expect(next?.order.orderId).toBe("US2Y-A1");
		expect(next?.order.side).toBe(PricingSide.Offer);
		expect(onUpdate).toHaveBeenCalledOnce();
	});

	it("does nothing when a side is empty", () => {
		const service = new AlgoExecutionService(treasuries);
		const oneSided: OrderBook = { ...book(US2Y, "99.5", "99.5"), offerStack: [] };
		expect(service.sendOrder(oneSided)).toBeNull();
		expect(service.size).toBe(0);
	});

	it("the market-data listener reacts to add only", () => {
		const service = new AlgoExecutionService(treasuries);
		const listener = algoExecutionListener(service);
		listener.onUpdate(book(US2Y, "99.5", "99.5"));
		expect(service.size).toBe(0);
		listener.onAdd(book(US2Y, "99.5", "99.5"));
		expect(service.size).toBe(1);
	});
});
