import { describe, expect, it, vi } from "vitest";
import { US2Y, US7Y, treasuries } from "../__tests__/helpers.js";
import { priceFromQuotes } from "../pricing/price.js";
import { Decimal } from "../shared/decimal.js";
import { createListener } from "../soa/listener.js";
import { AlgoStreamingService } from "./algo-streaming-service.js";
import { StreamingService, streamingListener } from "./streaming-service.js";

describe("StreamingService", () => {
	it("publishes the price stream of each updated algo stream", () => {
		const algo = new AlgoStreamingService(treasuries);
		const streaming = new StreamingService(treasuries);
		const onAdd = vi.fn();
		streaming.addListener(createListener({ onAdd }));
		algo.addListener(streamingListener(streaming));

		algo.publishPrice(
			priceFromQuotes(treasuries.bondOrPlaceholder(US2Y), Decimal.from(99), Decimal.from("99.5")),
		);

		const published = streaming.getData(US2Y);
		expect(published).toBe(algo.getData(US2Y).priceStream);
		expect(onAdd).toHaveBeenCalledWith(published);
	});

	it("onMessage stores and notifies add like publishPrice", () => {
		const algo = new AlgoStreamingService(treasuries);
		const streaming = new StreamingService(treasuries);
		const onAdd = vi.fn();
		streaming.addListener(createListener({ onAdd }));
		const stream = algo.getData(US7Y).priceStream;

		streaming.onMessage(stream);

		expect(streaming.getData(US7Y)).toBe(stream);
		expect(onAdd).toHaveBeenCalledOnce();
	});
});
