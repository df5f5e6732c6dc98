/**
 * KeyedService: the store-then-fan-out core shared by every concrete service.
 *
 * Subclasses decide the key of an inbound value, its zero value on a miss,
 * and which events a change fans out.
 */

import { type Logger, silentLogger } from "../lib/logger/index.js";
import { KeyedStore } from "./keyed-store.js";
import {
	type ListenerErrorCallback,
	type ListenerErrorPolicy,
	ListenerRegistry,
} from "./listener-registry.js";
import type { Listener, ListenerEvent, Service } from "./types.js";

/** Options every service accepts. */
export interface ServiceOptions<V> {
	readonly logger?: Logger;
	readonly errorPolicy?: ListenerErrorPolicy;
	readonly onListenerError?: ListenerErrorCallback<V>;
}

export abstract class KeyedService<K, V> implements Service<K, V> {
	protected readonly store = new KeyedStore<K, V>();
	protected readonly listeners: ListenerRegistry<V>;
	protected readonly logger: Logger;

	constructor(name: string, options: ServiceOptions<V> = {}) {
		this.logger = (options.logger ?? silentLogger).child({ service: name });
		this.listeners = new ListenerRegistry<V>({
			logger: this.logger,
			errorPolicy: options.errorPolicy,
			onListenerError: options.onListenerError,
		});
	}

	/** Stored value, or the zero value for `key`. Never inserts. */
	getData(key: K): V {
		return this.store.get(key) ?? this.zeroValue(key);
	}

	abstract onMessage(data: V): void;

	addListener(listener: Listener<V>): void {
		this.listeners.add(listener);
	}

	getListeners(): readonly Listener<V>[] {
		return this.listeners.list();
	}

	/** Number of keys currently stored. */
	get size(): number {
		return this.store.size;
	}

	protected abstract zeroValue(key: K): V;

	/** Replaces the stored value, then notifies listeners with it. */
	protected storeAndNotify(key: K, data: V, ...events: ListenerEvent[]): void {
		this.store.set(key, data);
		this.logger.debug({ key: String(key), events, listeners: this.listeners.size }, "Fan-out");
		this.listeners.notify(data, ...events);
	}
}
