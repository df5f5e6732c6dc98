/**
 * Time utilities: injectable clock.
 *
 * Historical records and the GUI throttle read Clock.now() rather than
 * Date.now(), so tests can pin and advance time.
 */

/** Injectable time source. */
export interface Clock {
	now(): number;
}

/** Production clock backed by `Date.now()`. */
export const SystemClock: Clock = {
	now: () => Date.now(),
};

/** Controllable clock for deterministic testing -- advance time manually with `advance()`. */
export class FakeClock implements Clock {
	private time: number;

	constructor(startMs = 0) {
		this.time = startMs;
	}

	now(): number {
		return this.time;
	}

	advance(ms: number): void {
		this.time += ms;
	}

	set(ms: number): void {
		this.time = ms;
	}
}

/** Millisecond-precision ISO-8601 timestamp used as the first column of every output line. */
export function formatTimestamp(ms: number): string {
	return new Date(ms).toISOString();
}
