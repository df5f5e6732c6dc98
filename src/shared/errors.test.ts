import { describe, expect, it } from "vitest";
import {
	ConfigError,
	ErrorCategory,
	ReferenceDataError,
	SinkWriteError,
	SystemError,
	TradingError,
	classifyError,
} from "./errors.js";

describe("TradingError hierarchy", () => {
	it("carries code, category and context", () => {
		const e = new TradingError("bad", "SOME_CODE", ErrorCategory.NonRetryable, { row: 3 });
		expect(e.message).toBe("bad");
		expect(e.code).toBe("SOME_CODE");
		expect(e.category).toBe("non_retryable");
		expect(e.context).toEqual({ row: 3 });
		expect(e.isRetryable).toBe(false);
	});

	it("moves cause out of context onto Error.cause", () => {
		const root = new Error("disk full");
		const e = new SinkWriteError("append failed", { cause: root, path: "/tmp/x" });
		expect(e.cause).toBe(root);
		expect(e.context).toEqual({ path: "/tmp/x" });
	});

	it("subclasses set name, code and category", () => {
		expect(new ConfigError("c")).toMatchObject({
			name: "ConfigError",
			code: "CONFIG_ERROR",
			category: "fatal",
		});
		expect(new ReferenceDataError("r")).toMatchObject({
			name: "ReferenceDataError",
			code: "UNKNOWN_PRODUCT",
			category: "non_retryable",
		});
		expect(new SinkWriteError("s")).toMatchObject({
			name: "SinkWriteError",
			code: "SINK_WRITE_ERROR",
			category: "retryable",
		});
		expect(new SystemError("x")).toMatchObject({
			name: "SystemError",
			code: "SYSTEM_ERROR",
			category: "fatal",
		});
	});

	it("only SinkWriteError is retryable", () => {
		expect(new SinkWriteError("s").isRetryable).toBe(true);
		expect(new ConfigError("c").isRetryable).toBe(false);
	});

	it("serializes to JSON without the cause", () => {
		const e = new ReferenceDataError("unknown product", { cause: new Error("x"), productId: "X" });
		expect(e.toJSON()).toEqual({
			name: "ReferenceDataError",
			message: "unknown product",
			code: "UNKNOWN_PRODUCT",
			category: "non_retryable",
			retryable: false,
			context: { productId: "X" },
		});
	});

	it("subclasses are instances of TradingError and Error", () => {
		const e = new ConfigError("c");
		expect(e).toBeInstanceOf(TradingError);
		expect(e).toBeInstanceOf(Error);
	});
});

describe("classifyError", () => {
	it("passes TradingErrors through", () => {
		const e = new ConfigError("c");
		expect(classifyError(e)).toBe(e);
	});

	it("maps filesystem errno codes to SinkWriteError", () => {
		const raw = Object.assign(new Error("no space left"), { code: "ENOSPC" });
		const classified = classifyError(raw);
		expect(classified).toBeInstanceOf(SinkWriteError);
		expect(classified.context).toEqual({ errno: "ENOSPC" });
		expect(classified.cause).toBe(raw);
	});

	it("maps other errors to SystemError", () => {
		const classified = classifyError(new TypeError("oops"));
		expect(classified).toBeInstanceOf(SystemError);
		expect(classified.message).toBe("oops");
	});

	it("maps non-Error throwables to SystemError", () => {
		const classified = classifyError("string thrown");
		expect(classified).toBeInstanceOf(SystemError);
		expect(classified.message).toBe("string thrown");
	});
});
