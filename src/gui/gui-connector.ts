/**
 * GuiConnector: writes `timestamp,productId,bid,offer` lines, prices in fractional notation.
 */

import type { LineSink } from "../persistence/line-sink.js";
import { bidOf, offerOf } from "../pricing/price.js";
import type { Price } from "../pricing/types.js";
import { formatFractionalPrice } from "../shared/fractional-price.js";
import { type Clock, SystemClock, formatTimestamp } from "../shared/time.js";
import { type Connector, EMPTY_REPORT, type SubscribeReport } from "../soa/types.js";

export class GuiConnector implements Connector<Price> {
	private readonly sink: LineSink;
	private readonly clock: Clock;

	constructor(sink: LineSink, clock: Clock = SystemClock) {
		this.sink = sink;
		this.clock = clock;
	}

	/** Publish-only. */
	async subscribe(_source: string): Promise<SubscribeReport> {
		return EMPTY_REPORT;
	}

	publish(price: Price): void {
		this.sink.write(
			[
				formatTimestamp(this.clock.now()),
				price.product.productId,
				formatFractionalPrice(bidOf(price)),
				formatFractionalPrice(offerOf(price)),
			].join(","),
		);
	}
}
