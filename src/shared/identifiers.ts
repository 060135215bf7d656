/**
 * Domain primitive identifiers: branded types for compile-time safety.
 *
 * Prevents passing a symbol where an order id is expected and vice versa.
 */

// ── Brand infrastructure ─────────────────────────────────────────────

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ── Identifier types ─────────────────────────────────────────────────

/** Venue-assigned order identifier returned after submission. */
export type VenueOrderId = Brand<string, "VenueOrderId">;
/** Instrument symbol as the venue spells it, e.g. "BTCUSDT". */
export type TradingSymbol = Brand<string, "TradingSymbol">;

// ── Factory functions with validation ────────────────────────────────

function createBrandedId<B extends string>(value: string, label: B): Brand<string, B> {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new Error(`${label} cannot be empty`);
	}
	return trimmed as Brand<string, B>;
}

/** Create a validated VenueOrderId. Throws if empty. */
export function venueOrderId(value: string): VenueOrderId {
	return createBrandedId(value, "VenueOrderId");
}

/** Create a validated TradingSymbol, upper-cased. Throws if empty. */
export function tradingSymbol(value: string): TradingSymbol {
	return createBrandedId(value.toUpperCase(), "TradingSymbol");
}
