import { Decimal } from "../shared/decimal.js";

const SENTINELS: ReadonlySet<string> = new Set(["null", "undefined", "nan", "none", "infinity", "-infinity", "+infinity"]);

/**
 * Parses a venue-reported number. Returns null for empty or whitespace-only
 * strings, sentinel tokens ("null", "undefined", "NaN"), non-finite numbers
 * and anything decimal.js-light rejects.
 */
export function parseVenueNumber(raw: unknown): Decimal | null {
	if (typeof raw === "number") {
		return Number.isFinite(raw) ? Decimal.from(raw) : null;
	}
	if (typeof raw !== "string") return null;
	const trimmed = raw.trim();
	if (trimmed.length === 0 || SENTINELS.has(trimmed.toLowerCase())) return null;
	try {
		return Decimal.from(trimmed);
	} catch {
		return null;
	}
}

/** Like parseVenueNumber, but substitutes `fallback` for an unparseable value. */
export function parseVenueNumberOr(raw: unknown, fallback: Decimal): Decimal {
	return parseVenueNumber(raw) ?? fallback;
}
