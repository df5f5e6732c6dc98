/**
 * Decimal: immutable decimal arithmetic for prices and risk figures.
 *
 * Wraps decimal.js-light so that domain code never does float math on
 * prices. Quantities stay plain integers; everything priced is a Decimal.
 */
import DecimalLight from "decimal.js-light";

DecimalLight.set({ precision: 40 });

export class Decimal {
	private readonly raw: DecimalLight;

	private constructor(raw: DecimalLight) {
		this.raw = raw;
	}

	// ── Factories ──────────────────────────────────────────────────

	/**
	 * Creates a Decimal from a string or number.
	 * @throws Error if value is not finite (for numbers) or empty (for strings)
	 * @example Decimal.from("99.515625")
	 */
	static from(value: string | number): Decimal {
		if (typeof value === "number") {
			if (!Number.isFinite(value)) {
				throw new Error(`Decimal.from: invalid number ${value}`);
			}
			return new Decimal(new DecimalLight(value));
		}
		const trimmed = value.trim();
		if (trimmed.length === 0) {
			throw new Error("Decimal.from: empty string");
		}
		return new Decimal(new DecimalLight(trimmed));
	}

	static zero(): Decimal {
		return new Decimal(new DecimalLight(0));
	}

	/** Sum of the given values; zero for an empty list. */
	static sum(values: Iterable<Decimal>): Decimal {
		let total = Decimal.zero();
		for (const v of values) total = total.add(v);
		return total;
	}

	// ── Arithmetic (immutable) ─────────────────────────────────────

	add(other: Decimal): Decimal {
		return new Decimal(this.raw.plus(other.raw));
	}

	sub(other: Decimal): Decimal {
		return new Decimal(this.raw.minus(other.raw));
	}

	mul(other: Decimal | number): Decimal {
		return new Decimal(this.raw.times(other instanceof Decimal ? other.raw : other));
	}

	/** @throws Error if dividing by zero */
	div(other: Decimal | number): Decimal {
		const divisor = other instanceof Decimal ? other.raw : new DecimalLight(other);
		if (divisor.isZero()) {
			throw new Error("Decimal.div: division by zero");
		}
		return new Decimal(this.raw.dividedBy(divisor));
	}

	/** Largest integer not greater than this value. */
	floor(): Decimal {
		return new Decimal(this.raw.toDecimalPlaces(0, DecimalLight.ROUND_FLOOR));
	}

	// ── Comparison ─────────────────────────────────────────────────

	cmp(other: Decimal): -1 | 0 | 1 {
		const c = this.raw.comparedTo(other.raw);
		return c < 0 ? -1 : c > 0 ? 1 : 0;
	}

	eq(other: Decimal): boolean {
		return this.raw.equals(other.raw);
	}

	gt(other: Decimal): boolean {
		return this.raw.greaterThan(other.raw);
	}

	gte(other: Decimal): boolean {
		return this.raw.greaterThanOrEqualTo(other.raw);
	}

	lt(other: Decimal): boolean {
		return this.raw.lessThan(other.raw);
	}

	lte(other: Decimal): boolean {
		return this.raw.lessThanOrEqualTo(other.raw);
	}

	isZero(): boolean {
		return this.raw.isZero();
	}

	// ── Conversion ─────────────────────────────────────────────────

	/**
	 * Normalised text: no exponent, no trailing zeros.
	 * Equal values always render identically, so this doubles as a map key.
	 * @example Decimal.from("100.50").toString() // "100.5"
	 */
	toString(): string {
		const fixed = this.raw.toFixed();
		if (fixed.indexOf(".") === -1) {
			return fixed === "-0" ? "0" : fixed;
		}
		return fixed.replace(/0+$/, "").replace(/\.$/, "");
	}

	toFixed(places: number): string {
		return this.raw.toFixed(places);
	}

	/** Lossy conversion for display and logging. */
	toNumber(): number {
		return this.raw.toNumber();
	}

	toJSON(): string {
		return this.toString();
	}
}
