import { describe, expect, it } from "vitest";
import { type LogLevel, createLogger, silentLogger } from "./index.js";

function capture(level: LogLevel, name?: string) {
	const lines: string[] = [];
	const logger = createLogger({
		level,
		...(name !== undefined ? { name } : {}),
		destination: {
			write(msg: string) {
				lines.push(msg);
			},
		},
	});
	const records = (): Record<string, unknown>[] =>
		lines.map((line) => {
			const parsed: Record<string, unknown> = JSON.parse(line);
			return parsed;
		});
	return { logger, lines, records };
}

describe("Logger", () => {
	describe("createLogger", () => {
		it("returns a Logger with all standard methods", () => {
			const logger = createLogger({ level: "info" });

			expect(typeof logger.info).toBe("function");
			expect(typeof logger.warn).toBe("function");
			expect(typeof logger.error).toBe("function");
			expect(typeof logger.debug).toBe("function");
			expect(typeof logger.child).toBe("function");
		});

		it("writes a JSON line with the message and fields", () => {
			const { logger, records } = capture("info");
			logger.info({ productId: "91282CJL6" }, "Exposure updated");

			const [record] = records();
			expect(record?.["msg"]).toBe("Exposure updated");
			expect(record?.["productId"]).toBe("91282CJL6");
			expect(record?.["level"]).toBe(30);
		});

		it("binds the configured name", () => {
			const { logger, records } = capture("info", "tsyflow");
			logger.info("started");
			expect(records()[0]?.["name"]).toBe("tsyflow");
		});

		it("child loggers carry their bindings", () => {
			const { logger, records } = capture("info");
			logger.child({ service: "risk" }).child({ sector: "Belly" }).warn("recomputed");

			const [record] = records();
			expect(record?.["service"]).toBe("risk");
			expect(record?.["sector"]).toBe("Belly");
			expect(record?.["level"]).toBe(40);
		});

		it("serializes Error values under any key", () => {
			const { logger, records } = capture("info");
			logger.error({ cause: new Error("disk full") }, "write failed");

			const cause = records()[0]?.["cause"];
			expect(cause).toMatchObject({ type: "Error", message: "disk full" });
		});
	});

	describe("log levels", () => {
		it("respects configured log level", () => {
			const { logger, lines } = capture("warn");

			logger.debug("should not appear");
			logger.info("should not appear either");
			logger.warn("should appear");

			expect(lines).toHaveLength(1);
			expect(lines[0]).toContain("should appear");
		});

		it("silent drops everything", () => {
			const { logger, lines } = capture("silent");
			logger.error("nothing");
			expect(lines).toHaveLength(0);
		});

		it("silentLogger never throws", () => {
			expect(() => silentLogger.child({ a: 1 }).error({ err: new Error("x") }, "x")).not.toThrow();
		});
	});
});
