/**
 * ListenerRegistry: ordered, synchronous fan-out for one service.
 *
 * Every listener sees the same object reference the service stored, so a
 * listener that mutates it mutates the service's state.
 */

import { type Logger, silentLogger } from "../lib/logger/index.js";
import type { Listener, ListenerEvent } from "./types.js";

/**
 * `propagate`: the first failing callback aborts the fan-out and the error
 * reaches the caller of `onMessage`.
 * `isolate`: failures are logged and reported, and the remaining callbacks still run.
 */
export type ListenerErrorPolicy = "propagate" | "isolate";

/** Invoked for each isolated failure. */
export type ListenerErrorCallback<V> = (
	error: unknown,
	listener: Listener<V>,
	event: ListenerEvent,
) => void;

export interface ListenerRegistryOptions<V> {
	readonly errorPolicy?: ListenerErrorPolicy;
	readonly onListenerError?: ListenerErrorCallback<V>;
	readonly logger?: Logger;
}

export class ListenerRegistry<V> {
	private readonly listeners: Listener<V>[] = [];
	private readonly errorPolicy: ListenerErrorPolicy;
	private readonly onListenerError: ListenerErrorCallback<V> | null;
	private readonly logger: Logger;

	constructor(options: ListenerRegistryOptions<V> = {}) {
		this.errorPolicy = options.errorPolicy ?? "propagate";
		this.onListenerError = options.onListenerError ?? null;
		this.logger = options.logger ?? silentLogger;
	}

	/** Appends a listener. Registering the same listener twice makes it fire twice. */
	add(listener: Listener<V>): void {
		this.listeners.push(listener);
	}

	/** Listeners in registration order. */
	list(): readonly Listener<V>[] {
		return this.listeners;
	}

	get size(): number {
		return this.listeners.length;
	}

	/**
	 * Calls `events`, in the given order, on each listener in registration order.
	 * Listeners added during the fan-out are not called for this value.
	 */
	notify(data: V, ...events: ListenerEvent[]): void {
		for (const listener of [...this.listeners]) {
			for (const event of events) {
				if (this.errorPolicy === "propagate") {
					invoke(listener, event, data);
				} else {
					this.invokeIsolated(listener, event, data);
				}
			}
		}
	}

	private invokeIsolated(listener: Listener<V>, event: ListenerEvent, data: V): void {
		try {
			invoke(listener, event, data);
		} catch (error: unknown) {
			this.logger.error({ err: error, event }, "Listener failed; continuing fan-out");
			this.onListenerError?.(error, listener, event);
		}
	}
}

function invoke<V>(listener: Listener<V>, event: ListenerEvent, data: V): void {
	switch (event) {
		case "add":
			listener.onAdd(data);
			return;
		case "update":
			listener.onUpdate(data);
			return;
		case "remove":
			listener.onRemove(data);
			return;
	}
}
