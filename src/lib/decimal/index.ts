/**
 * LibDecimal: domain-agnostic wrapper around decimal.js-light.
 *
 * Provides precise decimal arithmetic without IEEE 754 float errors.
 * Domain code reaches it through the shared/decimal facade and never
 * imports decimal.js-light directly.
 */
import * as decimalLight from "decimal.js-light";
import type { Decimal as RawDecimal } from "decimal.js-light";

// The default export is the constructor in both the CommonJS and ESM builds.
const DecimalLight = decimalLight.default;

DecimalLight.set({ precision: 40 });

/** Accepted by LibDecimal.from. */
export type DecimalInput = string | number | LibDecimal;

export class LibDecimal {
	private readonly raw: RawDecimal;

	private constructor(raw: RawDecimal) {
		this.raw = raw;
	}

	// ── Factories ──────────────────────────────────────────────────

	/**
	 * Creates a LibDecimal from a string, number or another LibDecimal.
	 * @throws Error if value is not finite (for numbers) or empty (for strings)
	 * @example LibDecimal.from("123.45")
	 */
	static from(value: DecimalInput): LibDecimal {
		if (value instanceof LibDecimal) return value;
		if (typeof value === "number") {
			if (!Number.isFinite(value)) {
				throw new Error(`LibDecimal.from: invalid number ${value}`);
			}
			return new LibDecimal(new DecimalLight(value));
		}
		const trimmed = value.trim();
		if (trimmed.length === 0) {
			throw new Error("LibDecimal.from: empty string");
		}
		return new LibDecimal(new DecimalLight(trimmed));
	}

	static zero(): LibDecimal {
		return new LibDecimal(new DecimalLight(0));
	}

	static one(): LibDecimal {
		return new LibDecimal(new DecimalLight(1));
	}

	static min(a: LibDecimal, b: LibDecimal): LibDecimal {
		return a.lte(b) ? a : b;
	}

	static max(a: LibDecimal, b: LibDecimal): LibDecimal {
		return a.gte(b) ? a : b;
	}

	/** Sum of all values; zero for an empty list. */
	static sum(values: readonly LibDecimal[]): LibDecimal {
		return values.reduce((acc, v) => acc.add(v), LibDecimal.zero());
	}

	// ── Arithmetic (immutable) ─────────────────────────────────────

	add(other: DecimalInput): LibDecimal {
		return new LibDecimal(this.raw.plus(LibDecimal.from(other).raw));
	}

	sub(other: DecimalInput): LibDecimal {
		return new LibDecimal(this.raw.minus(LibDecimal.from(other).raw));
	}

	mul(other: DecimalInput): LibDecimal {
		return new LibDecimal(this.raw.times(LibDecimal.from(other).raw));
	}

	/**
	 * @throws Error if dividing by zero
	 */
	div(other: DecimalInput): LibDecimal {
		const divisor = LibDecimal.from(other);
		if (divisor.raw.isZero()) {
			throw new Error("LibDecimal.div: division by zero");
		}
		return new LibDecimal(this.raw.dividedBy(divisor.raw));
	}

	abs(): LibDecimal {
		return new LibDecimal(this.raw.absoluteValue());
	}

	// ── Step rounding (non-negative values) ────────────────────────

	/**
	 * Rounds down to a multiple of `step`. A zero step returns the value unchanged.
	 * @example LibDecimal.from("0.2006").floorToStep("0.001").toString() // "0.2"
	 */
	floorToStep(step: DecimalInput): LibDecimal {
		const s = LibDecimal.from(step);
		if (!s.isPositive()) return this;
		return new LibDecimal(this.raw.dividedToIntegerBy(s.raw).times(s.raw));
	}

	/** Rounds up to a multiple of `step`. */
	ceilToStep(step: DecimalInput): LibDecimal {
		const s = LibDecimal.from(step);
		if (!s.isPositive()) return this;
		const floored = this.floorToStep(s);
		return floored.lt(this) ? floored.add(s) : floored;
	}

	/** Rounds half-up to the nearest multiple of `step`. */
	roundToStep(step: DecimalInput): LibDecimal {
		const s = LibDecimal.from(step);
		if (!s.isPositive()) return this;
		const units = this.raw.dividedBy(s.raw).plus(0.5).dividedToIntegerBy(1);
		return new LibDecimal(units.times(s.raw));
	}

	// ── Comparison ─────────────────────────────────────────────────

	/** @returns -1 if this < other, 0 if equal, 1 if this > other */
	cmp(other: DecimalInput): -1 | 0 | 1 {
		const c = this.raw.comparedTo(LibDecimal.from(other).raw);
		return c < 0 ? -1 : c > 0 ? 1 : 0;
	}

	eq(other: DecimalInput): boolean {
		return this.cmp(other) === 0;
	}

	gt(other: DecimalInput): boolean {
		return this.cmp(other) > 0;
	}

	gte(other: DecimalInput): boolean {
		return this.cmp(other) >= 0;
	}

	lt(other: DecimalInput): boolean {
		return this.cmp(other) < 0;
	}

	lte(other: DecimalInput): boolean {
		return this.cmp(other) <= 0;
	}

	isZero(): boolean {
		return this.raw.isZero();
	}

	isPositive(): boolean {
		return this.raw.greaterThan(0);
	}

	isNegative(): boolean {
		return this.raw.lessThan(0);
	}

	// ── Conversion ─────────────────────────────────────────────────

	/**
	 * Plain notation without trailing zeros.
	 * @example LibDecimal.from("1.500").toString() // "1.5"
	 */
	toString(): string {
		const fixed = this.raw.toFixed();
		if (fixed.indexOf(".") === -1) {
			return fixed;
		}
		return fixed.replace(/0+$/, "").replace(/\.$/, "");
	}

	/** @example LibDecimal.from("1.23456").toFixed(2) // "1.23" */
	toFixed(places: number): string {
		return this.raw.toFixed(places);
	}

	/** Converts to a JavaScript number. May lose precision. */
	toNumber(): number {
		return this.raw.toNumber();
	}

	toJSON(): string {
		return this.toString();
	}
}
