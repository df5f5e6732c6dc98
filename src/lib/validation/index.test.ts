import { describe, expect, it } from "vitest";
import { TradingError } from "../../shared/errors.js";
import { ValidationError, validate, z } from "./index.js";

describe("validation wrapper", () => {
	describe("validate()", () => {
		it("returns ok(data) for valid input", () => {
			const result = validate(z.string(), "hello");

			expect(result.ok).toBe(true);
			if (result.ok) expect(result.value).toBe("hello");
		});

		it("returns the transformed output", () => {
			const schema = z.string().transform((s) => s.length);
			const result = validate(schema, "abcd");
			expect(result).toEqual({ ok: true, value: 4 });
		});

		it("returns err(ValidationError) for invalid input", () => {
			const result = validate(z.number(), "not a number");

			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error).toBeInstanceOf(ValidationError);
				expect(result.error).toBeInstanceOf(TradingError);
				expect(result.error.code).toBe("VALIDATION_FAILED");
				expect(result.error.category).toBe("non_retryable");
			}
		});

		it("reports the path of each failing tuple element", () => {
			const row = z.tuple([z.string().min(1), z.coerce.number().int()]);
			const result = validate(row, ["", "1.5"]);

			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error.issues.map((i) => i.path)).toEqual([[0], [1]]);
			}
		});
	});

	describe("ValidationError.describe", () => {
		it("joins path-prefixed messages", () => {
			const error = new ValidationError("Validation failed", [
				{ path: [1], message: "bad price" },
				{ path: [], message: "too short" },
			]);
			expect(error.describe()).toBe("[1]: bad price; too short");
		});

		it("keeps the issues in context", () => {
			const issues = [{ path: ["a", 0], message: "m" }];
			expect(new ValidationError("v", issues).context).toEqual({ issues });
		});
	});
});
