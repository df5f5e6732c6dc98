/**
 * KeyedStore: latest value per key, last write wins.
 */
export class KeyedStore<K, V> {
	private readonly entries = new Map<K, V>();

	get(key: K): V | undefined {
		return this.entries.get(key);
	}

	set(key: K, value: V): void {
		this.entries.set(key, value);
	}

	has(key: K): boolean {
		return this.entries.has(key);
	}

	keys(): K[] {
		return [...this.entries.keys()];
	}

	values(): V[] {
		return [...this.entries.values()];
	}

	get size(): number {
		return this.entries.size;
	}
}
