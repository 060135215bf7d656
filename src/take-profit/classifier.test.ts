import { describe, expect, it } from "vitest";
import { Decimal } from "../shared/decimal.js";
import { tradingSymbol, venueOrderId } from "../shared/identifiers.js";
import type { VenueOrderId } from "../shared/identifiers.js";
import { OrderSide, OrderType } from "../venue/types.js";
import type { OpenOrder } from "../venue/types.js";
import { isTakeProfitOrder } from "./classifier.js";
import type { ClassifierContext } from "./classifier.js";

const d = Decimal.from;
const BTC = tradingSymbol("BTCUSDT");

function order(overrides: Partial<OpenOrder> = {}): OpenOrder {
	return {
		orderId: venueOrderId("o-1"),
		symbol: BTC,
		side: OrderSide.Sell,
		type: OrderType.Limit,
		price: d("105"),
		quantity: d("0.3"),
		...overrides,
	};
}

function context(overrides: Partial<ClassifierContext> = {}): ClassifierContext {
	return {
		symbol: BTC,
		avgPrice: d("100"),
		estimatedFullPosition: d("1"),
		trackedIds: new Set<VenueOrderId>(),
		...overrides,
	};
}

describe("isTakeProfitOrder", () => {
	it("accepts a sell limit 5% above average sized at 30% of the position", () => {
		expect(isTakeProfitOrder(order(), context())).toBe(true);
	});

	it("rejects prices beyond the 15% band", () => {
		expect(isTakeProfitOrder(order({ price: d("120") }), context())).toBe(false);
		expect(isTakeProfitOrder(order({ price: d("115") }), context())).toBe(true);
	});

	it("rejects prices at or barely above the average", () => {
		expect(isTakeProfitOrder(order({ price: d("100") }), context())).toBe(false);
		expect(isTakeProfitOrder(order({ price: d("100.05") }), context())).toBe(false);
		expect(isTakeProfitOrder(order({ price: d("100.1") }), context())).toBe(true);
	});

	it("rejects buys and market orders", () => {
		expect(isTakeProfitOrder(order({ side: OrderSide.Buy }), context())).toBe(false);
		expect(isTakeProfitOrder(order({ type: OrderType.Market }), context())).toBe(false);
		expect(isTakeProfitOrder(order({ side: null }), context())).toBe(false);
	});

	it("rejects orders that look like a full exit", () => {
		expect(isTakeProfitOrder(order({ quantity: d("0.71") }), context())).toBe(false);
		expect(isTakeProfitOrder(order({ quantity: d("0.7") }), context())).toBe(true);
	});

	it("rejects other symbols", () => {
		expect(isTakeProfitOrder(order({ symbol: tradingSymbol("ETHUSDT") }), context())).toBe(false);
	});

	it("trusts only tracked ids when the average price is unknown", () => {
		const tracked = context({ avgPrice: null, trackedIds: new Set([venueOrderId("o-1")]) });
		expect(isTakeProfitOrder(order(), tracked)).toBe(true);
		expect(isTakeProfitOrder(order({ orderId: venueOrderId("o-2") }), tracked)).toBe(false);
		expect(isTakeProfitOrder(order({ orderId: venueOrderId("o-2") }), context({ avgPrice: d("0") }))).toBe(false);
	});
});
