/**
 * US Treasury fractional price notation.
 *
 * "99-16+" reads as 99 + 16/32 + 4/256: two digits of 32nds followed by one
 * digit of 256ths, where "+" stands for 4 (a half 32nd).
 */

import { z } from "../lib/validation/index.js";
import { Decimal } from "./decimal.js";

const FRACTIONAL_PATTERN = /^(\d+)-([0-2]\d|3[01])([0-7+])$/;

/** Zod schema turning fractional text into a Decimal. */
export const fractionalPriceSchema = z
	.string()
	.trim()
	.regex(FRACTIONAL_PATTERN, "expected a fractional price such as 99-16+")
	.transform((text) => toDecimal(text));

function toDecimal(text: string): Decimal {
	const match = FRACTIONAL_PATTERN.exec(text);
	if (match === null) {
		throw new Error(`not a fractional price: ${text}`);
	}
	const [, whole = "0", thirtySeconds = "0", eighth = "0"] = match;
	const ticks = Number(thirtySeconds) * 8 + (eighth === "+" ? 4 : Number(eighth));
	return Decimal.from(whole).add(Decimal.from(ticks).div(256));
}

/**
 * Parses fractional notation.
 * @returns the price, or null when the text is not fractional notation
 * @example parseFractionalPrice("100-25+") // 100.796875
 */
export function parseFractionalPrice(text: string): Decimal | null {
	const parsed = fractionalPriceSchema.safeParse(text);
	return parsed.success ? parsed.data : null;
}

/**
 * Formats a price in fractional notation, truncating to the 1/256 tick below.
 * @example formatFractionalPrice(Decimal.from("99.515625")) // "99-16+"
 */
export function formatFractionalPrice(price: Decimal): string {
	const whole = price.floor();
	const ticks = price.sub(whole).mul(256).floor().toNumber();
	const thirtySeconds = Math.floor(ticks / 8);
	const eighth = ticks % 8;
	return `${whole.toString()}-${String(thirtySeconds).padStart(2, "0")}${eighth === 4 ? "+" : String(eighth)}`;
}
