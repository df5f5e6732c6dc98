/**
 * HistoricalDataService: persists records from an upstream service.
 *
 * One instance per persisted record type. Each record is stored under its
 * persist key and handed to the connector, which appends it to a sink.
 */

import { KeyedService, type ServiceOptions } from "../soa/keyed-service.js";
import { createListener } from "../soa/listener.js";
import type { Connector, Listener } from "../soa/types.js";

export interface HistoricalDataConfig<V> {
	/** Logger binding, e.g. "historical-positions" */
	readonly name: string;
	readonly connector: Connector<V>;
	/** Persist key of a record */
	readonly keyOf: (data: V) => string;
	/** Value returned by `getData` for a key never persisted */
	readonly zeroValue: (key: string) => V;
}

export class HistoricalDataService<V> extends KeyedService<string, V> {
	private readonly connector: Connector<V>;
	private readonly keyFn: (data: V) => string;
	private readonly zeroFn: (key: string) => V;
	private persisted = 0;

	constructor(config: HistoricalDataConfig<V>, options: ServiceOptions<V> = {}) {
		super(config.name, options);
		this.connector = config.connector;
		this.keyFn = config.keyOf;
		this.zeroFn = config.zeroValue;
	}

	override onMessage(data: V): void {
		this.persistData(this.keyFn(data), data);
	}

	/** Stores the record under `key` and publishes it through the connector. */
	persistData(key: string, data: V): void {
		this.store.set(key, data);
		this.connector.publish(data);
		this.persisted++;
		this.logger.debug({ key, persisted: this.persisted }, "Record persisted");
	}

	keyOf(data: V): string {
		return this.keyFn(data);
	}

	/** Records persisted since construction, repeats included. */
	get persistedCount(): number {
		return this.persisted;
	}

	protected override zeroValue(key: string): V {
		return this.zeroFn(key);
	}
}

/** Persists every record its upstream service adds. */
export function historicalDataListener<V>(service: HistoricalDataService<V>): Listener<V> {
	return createListener({ onAdd: (data) => service.persistData(service.keyOf(data), data) });
}
