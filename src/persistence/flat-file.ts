/**
 * Flat-file input: comma-separated records with a header line.
 */

import { readFile } from "node:fs/promises";
import type { Logger } from "../lib/logger/index.js";
import { ValidationError, validate, z } from "../lib/validation/index.js";
import type { TradingError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import type { SkippedRecord, SubscribeReport } from "../soa/types.js";

/** One non-blank data line with its 1-based position in the file. */
export interface SourceLine {
	readonly lineNumber: number;
	readonly raw: string;
}

export interface ReadLinesOptions {
	/** Skip the first line of the file; defaults to true */
	readonly header?: boolean;
}

/** Non-negative integer quantity field, e.g. "1000000". */
export const quantityField = z
	.string()
	.trim()
	.regex(/^\d+$/, "expected a non-negative integer")
	.transform(Number);

/** Non-empty identifier field. */
export const idField = z.string().trim().min(1, "expected a non-empty identifier");

/**
 * Reads the data lines of a file.
 * @throws the underlying fs error if the file cannot be read
 */
export async function readDataLines(
	path: string,
	options: ReadLinesOptions = {},
): Promise<SourceLine[]> {
	const content = await readFile(path, "utf-8");
	const lines = content.split(/\r?\n/);
	const skipHeader = options.header ?? true;
	const out: SourceLine[] = [];
	for (let i = skipHeader ? 1 : 0; i < lines.length; i++) {
		const raw = lines[i]?.trim() ?? "";
		if (raw.length === 0) continue;
		out.push({ lineNumber: i + 1, raw });
	}
	return out;
}

/** Splits a record on commas and trims each field. */
export function splitFields(raw: string): string[] {
	return raw.split(",").map((field) => field.trim());
}

/** Validates the fields of a record against a tuple schema. */
export function parseFields<T>(schema: z.ZodType<T>, raw: string): Result<T, ValidationError> {
	return validate(schema, splitFields(raw));
}

/** Human-readable reason for a skipped record. */
export function describeFailure(error: TradingError): string {
	return error instanceof ValidationError ? error.describe() : error.message;
}

/**
 * Parses each line and hands the successes to `deliver`, in file order.
 * Failures are reported as skipped and logged; errors thrown by `deliver`
 * propagate to the caller.
 */
export function replayLines<V>(
	lines: readonly SourceLine[],
	parse: (raw: string) => Result<V, TradingError>,
	deliver: (value: V) => void,
	logger: Logger,
): SubscribeReport {
	let processed = 0;
	const skipped: SkippedRecord[] = [];
	for (const line of lines) {
		const parsed = parse(line.raw);
		if (!parsed.ok) {
			const reason = describeFailure(parsed.error);
			skipped.push({ lineNumber: line.lineNumber, raw: line.raw, reason });
			logger.warn({ lineNumber: line.lineNumber, reason }, "Skipping malformed record");
			continue;
		}
		deliver(parsed.value);
		processed++;
	}
	return { processed, skipped };
}
