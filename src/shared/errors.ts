/**
 * TradingError hierarchy: structured error classification.
 *
 * The category tells the caller whether retrying can help: a sink write may
 * succeed later, a malformed record never will, and a broken configuration
 * stops the process.
 */

/** Error severity categories. */
export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

type ErrorContext = Record<string, unknown> & { readonly cause?: unknown };

/** Base error class for the pipeline, with a stable code and a category. */
export class TradingError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: ErrorContext = {},
	) {
		super(message);
		const { cause, ...rest } = context;
		this.name = "TradingError";
		this.category = category;
		this.code = code;
		this.context = rest;
		if (cause !== undefined) this.cause = cause;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			retryable: this.isRetryable,
			context: this.context,
		};
	}
}

/** Fatal error for invalid environment settings or an unreadable reference-data file. */
export class ConfigError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, context);
		this.name = "ConfigError";
	}
}

/** A record names a product that the reference data does not know. */
export class ReferenceDataError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "UNKNOWN_PRODUCT", ErrorCategory.NonRetryable, context);
		this.name = "ReferenceDataError";
	}
}

/** An output sink failed to append a line. */
export class SinkWriteError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "SINK_WRITE_ERROR", ErrorCategory.Retryable, context);
		this.name = "SinkWriteError";
	}
}

/** Fatal error for unexpected internal failures. */
export class SystemError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "SYSTEM_ERROR", ErrorCategory.Fatal, context);
		this.name = "SystemError";
	}
}

/** Map any thrown value onto the hierarchy. TradingErrors pass through unchanged. */
export function classifyError(error: unknown): TradingError {
	if (error instanceof TradingError) return error;
	if (error instanceof Error) {
		const code = isErrnoException(error) ? error.code : undefined;
		if (code === "EACCES" || code === "ENOSPC" || code === "EMFILE" || code === "EBUSY") {
			return new SinkWriteError(error.message, { cause: error, errno: code });
		}
		return new SystemError(error.message, { cause: error });
	}
	return new SystemError(String(error), { cause: error });
}

function isErrnoException(error: Error): error is NodeJS.ErrnoException {
	return "code" in error;
}
