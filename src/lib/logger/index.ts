/**
 * Logger wrapper: structured logging backed by pino.
 *
 * Services and connectors depend on the Logger interface only; the pino
 * instance stays behind createLogger().
 */

import pino from "pino";

/** Log severity levels from least to most severe; "silent" disables output. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	/** Bound as the `name` field on every line */
	readonly name?: string;
	/** Alternative sink for the serialized lines; stdout when omitted */
	readonly destination?: { write(msg: string): void };
}

/** Structured logger interface. */
export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

type Level = "info" | "warn" | "error" | "debug";

function forward(pinoLogger: pino.Logger, level: Level) {
	return (msgOrObj: string | Record<string, unknown>, msg?: string): void => {
		if (typeof msgOrObj === "string") {
			pinoLogger[level](msgOrObj);
		} else {
			pinoLogger[level](serializeErrors(msgOrObj), msg ?? "");
		}
	};
}

// pino only applies its error serializer to the `err` key
function serializeErrors(obj: Record<string, unknown>): Record<string, unknown> {
	const out: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		out[key] = value instanceof Error ? pino.stdSerializers.err(value) : value;
	}
	return out;
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		info: forward(pinoLogger, "info"),
		warn: forward(pinoLogger, "warn"),
		error: forward(pinoLogger, "error"),
		debug: forward(pinoLogger, "debug"),
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(bindings));
		},
	};
}

/**
 * Creates a Logger backed by pino.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info", name: "tsyflow" });
 * logger.child({ service: "risk" }).info({ productId: "91282CJL6" }, "Exposure updated");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const options: pino.LoggerOptions = { level: config.level };
	if (config.name !== undefined) {
		options.name = config.name;
	}

	const destination = config.destination;
	if (destination === undefined) {
		return wrapPino(pino(options));
	}
	const stream: pino.DestinationStream = {
		write(chunk: string): void {
			destination.write(chunk);
		},
	};
	return wrapPino(pino(options, stream));
}

/** Logger that drops everything; the default for components built without one. */
export const silentLogger: Logger = createLogger({ level: "silent" });
