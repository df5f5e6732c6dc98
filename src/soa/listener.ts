import type { Listener } from "./types.js";

function ignore(): void {
	// callback not handled by this listener
}

/**
 * Builds a full Listener from the callbacks it actually handles.
 *
 * @example
 * ```ts
 * pricing.addListener(createListener({ onAdd: (price) => algo.publishPrice(price) }));
 * ```
 */
export function createListener<V>(handlers: Partial<Listener<V>>): Listener<V> {
	return {
		onAdd: handlers.onAdd ?? ignore,
		onRemove: handlers.onRemove ?? ignore,
		onUpdate: handlers.onUpdate ?? ignore,
	};
}
