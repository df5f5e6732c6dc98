/**
 * Returns a function yielding `items` round-robin, starting with the first.
 * @example
 * const nextBook = cycle(["TRSY1", "TRSY2", "TRSY3"]);
 * nextBook(); // "TRSY1"
 */
export function cycle<T>(items: readonly [T, ...T[]]): () => T {
	let index = 0;
	return () => {
		const item = items[index % items.length] ?? items[0];
		index++;
		return item;
	};
}
