/**
 * Process-level entry: reference data, file sinks, replay, flush.
 */

import { join } from "node:path";
import { type Logger, createLogger } from "../lib/logger/index.js";
import { FileLineSink } from "../persistence/file-line-sink.js";
import { loadReferenceData } from "../reference/reference-data.js";
import type { TsyflowConfig } from "../shared/config.js";
import type { SinkWriteError } from "../shared/errors.js";
import { type Clock, SystemClock } from "../shared/time.js";
import type { SubscribeReport } from "../soa/types.js";
import {
	type InputName,
	OUTPUT_FILES,
	type TradingSinks,
	createTradingSystem,
} from "./trading-system.js";

export interface RunOptions {
	readonly logger?: Logger;
	readonly clock?: Clock;
}

export interface RunResult {
	readonly reports: Record<InputName, SubscribeReport>;
	/** Output file path per sink */
	readonly outputs: Record<keyof TradingSinks, string>;
	/** Appends that failed, across all sinks */
	readonly writeErrors: readonly SinkWriteError[];
}

/**
 * Replays the input directory through a freshly wired system and writes
 * every output file, truncating previous runs.
 * @throws ConfigError if the reference data cannot be loaded
 * @throws SinkWriteError if an output file cannot be opened
 */
export async function runTradingSystem(
	config: TsyflowConfig,
	options: RunOptions = {},
): Promise<RunResult> {
	const logger = options.logger ?? createLogger({ level: config.logLevel, name: "tsyflow" });
	const loaded = await loadReferenceData(config.referenceDataPath);
	if (!loaded.ok) throw loaded.error;
	const reference = loaded.value;

	const open = (file: string) =>
		FileLineSink.open({ filePath: join(config.outputDir, file), truncate: true, logger });
	const fileSinks = {
		gui: await open(OUTPUT_FILES.gui),
		positions: await open(OUTPUT_FILES.positions),
		risk: await open(OUTPUT_FILES.risk),
		executions: await open(OUTPUT_FILES.executions),
		streaming: await open(OUTPUT_FILES.streaming),
		inquiries: await open(OUTPUT_FILES.inquiries),
	} satisfies TradingSinks;

	const system = createTradingSystem({
		reference,
		sinks: fileSinks,
		clock: options.clock ?? SystemClock,
		logger,
		config,
	});

	logger.info({ inputDir: config.inputDir, outputDir: config.outputDir }, "Replay starting");
	let reports: Record<InputName, SubscribeReport>;
	try {
		reports = await system.subscribeAll(config.inputDir);
	} finally {
		await Promise.all(Object.values(fileSinks).map((sink) => sink.flush()));
	}

	const writeErrors = Object.values(fileSinks).flatMap((sink) => [...sink.writeErrors()]);
	logger.info(
		{
			prices: reports.prices.processed,
			trades: reports.trades.processed,
			marketData: reports.marketData.processed,
			inquiries: reports.inquiries.processed,
			writeErrors: writeErrors.length,
		},
		"Replay finished",
	);
	return {
		reports,
		outputs: {
			gui: fileSinks.gui.path,
			positions: fileSinks.positions.path,
			risk: fileSinks.risk.path,
			executions: fileSinks.executions.path,
			streaming: fileSinks.streaming.path,
			inquiries: fileSinks.inquiries.path,
		},
		writeErrors,
	};
}
