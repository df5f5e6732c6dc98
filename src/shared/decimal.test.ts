import { describe, expect, it } from "vitest";
import { Decimal } from "./decimal.js";

describe("Decimal", () => {
	describe("from", () => {
		it("parses strings and numbers", () => {
			expect(Decimal.from("99.515625").toString()).toBe("99.515625");
			expect(Decimal.from(101.25).toString()).toBe("101.25");
		});

		it("rejects non-finite numbers", () => {
			expect(() => Decimal.from(Number.NaN)).toThrow("invalid number");
			expect(() => Decimal.from(Number.POSITIVE_INFINITY)).toThrow("invalid number");
		});

		it("rejects empty strings", () => {
			expect(() => Decimal.from("  ")).toThrow("empty string");
		});
	});

	describe("arithmetic", () => {
		it("avoids binary float error", () => {
			expect(Decimal.from("0.1").add(Decimal.from("0.2")).toString()).toBe("0.3");
		});

		it("subtracts", () => {
			expect(Decimal.from("101.1").sub(Decimal.from("101")).toString()).toBe("0.1");
		});

		it("multiplies by a number or a Decimal", () => {
			expect(Decimal.from("0.01").mul(1_000_000).toString()).toBe("10000");
			expect(Decimal.from("1.5").mul(Decimal.from("2")).toString()).toBe("3");
		});

		it("divides", () => {
			expect(Decimal.from("70000").div(4_000_000).toString()).toBe("0.0175");
		});

		it("throws on division by zero", () => {
			expect(() => Decimal.from(1).div(0)).toThrow("division by zero");
			expect(() => Decimal.from(1).div(Decimal.zero())).toThrow("division by zero");
		});

		it("floors toward negative infinity", () => {
			expect(Decimal.from("99.99").floor().toString()).toBe("99");
			expect(Decimal.from("-0.5").floor().toString()).toBe("-1");
		});

		it("sums an iterable", () => {
			const total = Decimal.sum([Decimal.from("1.25"), Decimal.from("2.5"), Decimal.from("0.25")]);
			expect(total.toString()).toBe("4");
			expect(Decimal.sum([]).isZero()).toBe(true);
		});

		it("is immutable", () => {
			const a = Decimal.from("1");
			a.add(Decimal.from("2"));
			expect(a.toString()).toBe("1");
		});
	});

	describe("comparison", () => {
		const lo = Decimal.from("100.5");
		const hi = Decimal.from("101");

		it("cmp orders values", () => {
			expect(lo.cmp(hi)).toBe(-1);
			expect(hi.cmp(lo)).toBe(1);
			expect(lo.cmp(Decimal.from("100.50"))).toBe(0);
		});

		it("relational helpers agree with cmp", () => {
			expect(lo.lt(hi)).toBe(true);
			expect(lo.lte(lo)).toBe(true);
			expect(hi.gt(lo)).toBe(true);
			expect(hi.gte(hi)).toBe(true);
			expect(lo.eq(Decimal.from("100.500"))).toBe(true);
		});
	});

	describe("toString", () => {
		it("strips trailing zeros", () => {
			expect(Decimal.from("100.500").toString()).toBe("100.5");
			expect(Decimal.from("100.000").toString()).toBe("100");
		});

		it("never uses exponent notation", () => {
			expect(Decimal.from("1e-7").toString()).toBe("0.0000001");
			expect(Decimal.from("2e21").toString()).toBe("2000000000000000000000");
		});

		it("renders equal values identically", () => {
			expect(Decimal.from("101.10").toString()).toBe(Decimal.from(101.1).toString());
		});

		it("serializes to JSON as its string form", () => {
			expect(JSON.stringify({ p: Decimal.from("99.50") })).toBe('{"p":"99.5"}');
		});
	});

	it("divides to forty significant digits", () => {
		expect(Decimal.from(1).div(3).toString()).toBe(`0.${"3".repeat(40)}`);
		expect(Decimal.from("-2.5").floor().toString()).toBe("-3");
	});

	it("toFixed pads to the requested places", () => {
		expect(Decimal.from("0.0175").toFixed(6)).toBe("0.017500");
	});

	it("toNumber converts for display", () => {
		expect(Decimal.from("99.515625").toNumber()).toBe(99.515625);
	});
});
