/**
 * Pipeline configuration.
 *
 * Defaults cover a local replay of the sample data. Every field can be
 * overridden through TSYFLOW_* environment variables or explicit overrides.
 */

import type { LogLevel } from "../lib/logger/index.js";
import { ConfigError } from "./errors.js";

export interface TsyflowConfig {
	/** Directory holding prices.txt, trades.txt, marketdata.txt and inquiries.txt */
	readonly inputDir: string;
	/** Directory receiving gui.txt and the historical output files */
	readonly outputDir: string;
	/** Reference-data JSON file; the bundled treasury set when undefined */
	readonly referenceDataPath?: string | undefined;
	/** Minimum interval between two prices forwarded to the GUI */
	readonly guiThrottleMs: number;
	/** Number of prices the GUI accepts before it stops forwarding */
	readonly guiMaxUpdates: number;
	/** Orders read from the market data file before a book is emitted */
	readonly ordersPerBook: number;
	readonly logLevel: LogLevel;
	/** Catch and log listener failures instead of aborting the fan-out */
	readonly isolateListenerErrors: boolean;
}

export const DEFAULT_CONFIG: TsyflowConfig = {
	inputDir: "data/input",
	outputDir: "data/output",
	guiThrottleMs: 300,
	guiMaxUpdates: 100,
	ordersPerBook: 10,
	logLevel: "info",
	isolateListenerErrors: false,
};

const LOG_LEVELS: readonly LogLevel[] = [
	"trace",
	"debug",
	"info",
	"warn",
	"error",
	"fatal",
	"silent",
];

/** Mutable builder shape for constructing Partial<TsyflowConfig>. */
interface MutableConfig {
	inputDir?: string;
	outputDir?: string;
	referenceDataPath?: string;
	guiThrottleMs?: number;
	guiMaxUpdates?: number;
	ordersPerBook?: number;
	logLevel?: LogLevel;
	isolateListenerErrors?: boolean;
}

/**
 * Reads config values from the environment.
 * Supported: TSYFLOW_INPUT_DIR, TSYFLOW_OUTPUT_DIR, TSYFLOW_REFERENCE_DATA,
 * TSYFLOW_GUI_THROTTLE_MS, TSYFLOW_GUI_MAX_UPDATES, TSYFLOW_ORDERS_PER_BOOK,
 * TSYFLOW_LOG_LEVEL, TSYFLOW_ISOLATE_LISTENER_ERRORS.
 * @throws ConfigError if a variable holds a malformed value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<TsyflowConfig> {
	const result: MutableConfig = {};

	const inputDir = env["TSYFLOW_INPUT_DIR"];
	if (inputDir) result.inputDir = inputDir;
	const outputDir = env["TSYFLOW_OUTPUT_DIR"];
	if (outputDir) result.outputDir = outputDir;
	const referenceDataPath = env["TSYFLOW_REFERENCE_DATA"];
	if (referenceDataPath) result.referenceDataPath = referenceDataPath;

	const throttle = parseIntEnv(env, "TSYFLOW_GUI_THROTTLE_MS", 0);
	if (throttle !== undefined) result.guiThrottleMs = throttle;
	const maxUpdates = parseIntEnv(env, "TSYFLOW_GUI_MAX_UPDATES", 0);
	if (maxUpdates !== undefined) result.guiMaxUpdates = maxUpdates;
	const ordersPerBook = parseIntEnv(env, "TSYFLOW_ORDERS_PER_BOOK", 1);
	if (ordersPerBook !== undefined) result.ordersPerBook = ordersPerBook;

	const level = env["TSYFLOW_LOG_LEVEL"];
	if (level) {
		const match = LOG_LEVELS.find((l) => l === level.trim().toLowerCase());
		if (match === undefined) {
			throw new ConfigError(`Invalid TSYFLOW_LOG_LEVEL: "${level}"`, { allowed: LOG_LEVELS });
		}
		result.logLevel = match;
	}

	const isolate = env["TSYFLOW_ISOLATE_LISTENER_ERRORS"];
	if (isolate !== undefined && isolate !== "") {
		if (isolate !== "true" && isolate !== "false") {
			throw new ConfigError(
				`Invalid TSYFLOW_ISOLATE_LISTENER_ERRORS: "${isolate}" must be "true" or "false"`,
			);
		}
		result.isolateListenerErrors = isolate === "true";
	}

	return result;
}

/** Defaults, overlaid with the environment, overlaid with explicit overrides. */
export function resolveConfig(
	overrides: Partial<TsyflowConfig> = {},
	env: NodeJS.ProcessEnv = process.env,
): TsyflowConfig {
	return { ...DEFAULT_CONFIG, ...configFromEnv(env), ...overrides };
}

function parseIntEnv(env: NodeJS.ProcessEnv, key: string, min: number): number | undefined {
	const raw = env[key];
	if (!raw) return undefined;
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim() || parsed < min) {
		throw new ConfigError(`Invalid ${key}: "${raw}" must be an integer >= ${min}`);
	}
	return parsed;
}
