/**
 * Line sinks: append-only text outputs for the GUI and historical connectors.
 */

/** Destination for formatted output lines. `write` never blocks; `flush` drains. */
export interface LineSink {
	write(line: string): void;
	flush(): Promise<void>;
}
