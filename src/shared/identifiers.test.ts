import { describe, expect, it } from "vitest";
import { tradingSymbol, venueOrderId } from "./identifiers.js";

describe("identifiers", () => {
	it("trims order ids", () => {
		expect(venueOrderId("  abc-123 ")).toBe("abc-123");
	});

	it("upper-cases symbols", () => {
		expect(tradingSymbol("btcusdt")).toBe("BTCUSDT");
	});

	it("rejects empty values", () => {
		expect(() => venueOrderId("   ")).toThrow("VenueOrderId cannot be empty");
		expect(() => tradingSymbol("")).toThrow("TradingSymbol cannot be empty");
	});
});
