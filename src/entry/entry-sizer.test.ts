import { describe, expect, it } from "vitest";
import { Decimal } from "../shared/decimal.js";
import type { TradingConstraints } from "../venue/types.js";
import { entryMultiplier, sizeEntry } from "./entry-sizer.js";
import type { EntrySizingInput } from "./entry-sizer.js";

const d = Decimal.from;

const CONSTRAINTS: TradingConstraints = {
	minOrderQty: d("0.001"),
	qtyStep: d("0.001"),
	minOrderValue: d("5"),
	tickSize: d("0.01"),
	maxLeverage: d("100"),
};

function input(overrides: Partial<EntrySizingInput> = {}): EntrySizingInput {
	return {
		baseAmount: 100,
		dcaLevel: 0,
		maxMultiplier: 5,
		price: d("30000"),
		balance: d("1000"),
		constraints: CONSTRAINTS,
		...overrides,
	};
}

describe("entryMultiplier", () => {
	it("grows by half the base per level", () => {
		expect(entryMultiplier(0, 5).toString()).toBe("1");
		expect(entryMultiplier(1, 5).toString()).toBe("1.5");
		expect(entryMultiplier(2, 5).toString()).toBe("2");
	});

	it("caps at the configured maximum", () => {
		expect(entryMultiplier(10, 5).toString()).toBe("5");
	});
});

describe("sizeEntry", () => {
	it("converts the scaled amount to a stepped quantity", () => {
		const result = sizeEntry(input({ dcaLevel: 2 }));
		expect(result.ok).toBe(true);
		if (!result.ok) return;
		expect(result.value.multiplier.toString()).toBe("2");
		expect(result.value.quantity.toString()).toBe("0.006");
		expect(result.value.notional.toString()).toBe("180");
	});

	it("rejects quantities that floor below the venue minimum", () => {
		const result = sizeEntry(input({ baseAmount: 10 }));
		expect(!result.ok && result.error.code).toBe("BELOW_MIN_QTY");
	});

	it("rejects entries below the minimum notional", () => {
		const result = sizeEntry(input({ baseAmount: 4, price: d("1") }));
		expect(!result.ok && result.error.code).toBe("BELOW_MIN_NOTIONAL");
	});

	it("rejects entries the balance cannot cover", () => {
		const result = sizeEntry(input({ baseAmount: 200, price: d("100"), balance: d("100") }));
		expect(!result.ok && result.error.code).toBe("INSUFFICIENT_BALANCE");
		expect(!result.ok && result.error.retryable).toBe(false);
	});

	it("rejects a missing price", () => {
		const result = sizeEntry(input({ price: d("0") }));
		expect(!result.ok && result.error.code).toBe("INVALID_PARAMETERS");
	});
});
