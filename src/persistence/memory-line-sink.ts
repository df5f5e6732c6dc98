/**
 * In-memory sink for tests and embedding.
 */

import type { LineSink } from "./line-sink.js";

export class MemoryLineSink implements LineSink {
	private readonly store: string[] = [];

	write(line: string): void {
		this.store.push(line);
	}

	async flush(): Promise<void> {}

	/** Returns a copy of the lines written so far. */
	lines(): string[] {
		return [...this.store];
	}

	clear(): void {
		this.store.length = 0;
	}
}
