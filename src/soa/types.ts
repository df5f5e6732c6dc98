/**
 * Service-oriented building blocks.
 *
 * A service owns the latest value per key and fans every change out to its
 * listeners. Connectors sit at the edge, pulling records in through
 * `onMessage` or pushing values out through `publish`.
 */

/** Observer registered on a publisher. All three callbacks exist, most are no-ops. */
export interface Listener<V> {
	onAdd(data: V): void;
	onRemove(data: V): void;
	onUpdate(data: V): void;
}

/** The callback a fan-out invokes. */
export type ListenerEvent = "add" | "remove" | "update";

/** Read side of a service. Never throws: a miss yields the service's zero value. */
export interface KeyedLookup<K, V> {
	getData(key: K): V;
}

/** Registration side of a service; listeners are called in registration order. */
export interface Publisher<V> {
	addListener(listener: Listener<V>): void;
	getListeners(): readonly Listener<V>[];
}

/** Inbound side of a service. */
export interface Subscriber<V> {
	onMessage(data: V): void;
}

/** A keyed store with ordered listener fan-out. */
export type Service<K, V> = KeyedLookup<K, V> & Publisher<V> & Subscriber<V>;

/** A source record that a connector could not turn into a value. */
export interface SkippedRecord {
	readonly lineNumber: number;
	readonly raw: string;
	readonly reason: string;
}

/** Outcome of one `subscribe` call. */
export interface SubscribeReport {
	readonly processed: number;
	readonly skipped: readonly SkippedRecord[];
}

export const EMPTY_REPORT: SubscribeReport = { processed: 0, skipped: [] };

/**
 * Boundary adapter between a service and the outside world.
 *
 * `subscribe` reads `source` and calls the owning service's `onMessage` once per
 * record. `publish` emits a value to an external sink. Subscribe-only connectors
 * ignore `publish`; publish-only connectors resolve `subscribe` with an empty report.
 */
export interface Connector<V, S = string> {
	subscribe(source: S): Promise<SubscribeReport>;
	publish(data: V): void;
}
