import type { LineSink } from "../persistence/line-sink.js";
import { type Clock, SystemClock, formatTimestamp } from "../shared/time.js";
import { type Connector, EMPTY_REPORT, type SubscribeReport } from "../soa/types.js";
import type { LineFormatter } from "./formatters.js";

/** Publish-only connector appending the formatted lines of each record to a sink. */
export class SinkConnector<V> implements Connector<V> {
	private readonly sink: LineSink;
	private readonly format: LineFormatter<V>;
	private readonly clock: Clock;

	constructor(sink: LineSink, format: LineFormatter<V>, clock: Clock = SystemClock) {
		this.sink = sink;
		this.format = format;
		this.clock = clock;
	}

	async subscribe(_source: string): Promise<SubscribeReport> {
		return EMPTY_REPORT;
	}

	publish(data: V): void {
		const ts = formatTimestamp(this.clock.now());
		for (const line of this.format(data, ts)) {
			this.sink.write(line);
		}
	}
}
