/**
 * Venue bounded context: adapter contract and domain shapes.
 *
 * A VenueAdapter speaks the venue's vocabulary: numbers arrive as strings
 * and every failure is thrown. The gateway turns those into Decimal values,
 * branded ids and Results; nothing above the gateway touches raw records.
 */

import type { Decimal } from "../shared/decimal.js";
import type { TradingSymbol, VenueOrderId } from "../shared/identifiers.js";

export const VenueCategory = {
	Spot: "spot",
	Linear: "linear",
	Inverse: "inverse",
} as const;

export type VenueCategory = (typeof VenueCategory)[keyof typeof VenueCategory];

export const OrderSide = {
	Buy: "Buy",
	Sell: "Sell",
} as const;

export type OrderSide = (typeof OrderSide)[keyof typeof OrderSide];

export const OrderType = {
	Market: "Market",
	Limit: "Limit",
} as const;

export type OrderType = (typeof OrderType)[keyof typeof OrderType];

// ── Raw adapter records ──────────────────────────────────────────────

export interface RawPosition {
	readonly symbol: string;
	readonly side: string;
	readonly size: string;
	/** Notional value of the position in the quote asset. */
	readonly positionValue: string;
	readonly avgPrice: string;
	readonly markPrice: string;
	readonly unrealisedPnl: string;
}

export interface RawOpenOrder {
	readonly orderId: string;
	readonly symbol: string;
	readonly side: string;
	readonly orderType: string;
	readonly price: string;
	readonly qty: string;
}

export interface RawPlaceOrderRequest {
	readonly category: VenueCategory;
	readonly symbol: string;
	readonly side: OrderSide;
	readonly orderType: OrderType;
	readonly qty: string;
	readonly price?: string | undefined;
	readonly reduceOnly?: boolean | undefined;
}

export interface RawPlacedOrder {
	readonly orderId: string;
	readonly orderStatus: string;
	readonly cumExecQty: string;
	readonly cumExecValue: string;
	readonly avgPrice: string;
}

export interface RawTradingConstraints {
	readonly minOrderQty: string;
	readonly qtyStep: string;
	readonly minOrderValue: string;
	readonly tickSize: string;
	readonly maxLeverage: string;
}

export interface RawKline {
	readonly startTimeMs: number;
	readonly open: string;
	readonly high: string;
	readonly low: string;
	readonly close: string;
	readonly volume: string;
}

/** What a venue integration must provide. Methods throw on failure. */
export interface VenueAdapter {
	readonly name: string;
	connect(): Promise<void>;
	disconnect(): Promise<void>;
	getPositions(category: VenueCategory, symbol: string): Promise<readonly RawPosition[]>;
	getOpenOrders(category: VenueCategory, symbol: string): Promise<readonly RawOpenOrder[]>;
	placeOrder(request: RawPlaceOrderRequest): Promise<RawPlacedOrder>;
	cancelOrder(category: VenueCategory, symbol: string, orderId: string): Promise<void>;
	getLatestPrice(symbol: string): Promise<string>;
	getTradingConstraints(category: VenueCategory, symbol: string): Promise<RawTradingConstraints>;
	getKlines(category: VenueCategory, symbol: string, interval: string, limit: number): Promise<readonly RawKline[]>;
	getTradableBalance(asset: string): Promise<string>;
}

// ── Domain values ────────────────────────────────────────────────────

export interface VenuePosition {
	readonly symbol: TradingSymbol;
	readonly side: string;
	readonly size: Decimal;
	readonly notional: Decimal;
	readonly avgPrice: Decimal;
	readonly markPrice: Decimal | null;
	readonly unrealisedPnl: Decimal | null;
}

/** An open order as the venue reports it; unparseable fields are null. */
export interface OpenOrder {
	readonly orderId: VenueOrderId;
	readonly symbol: TradingSymbol;
	readonly side: OrderSide | null;
	readonly type: OrderType | null;
	readonly price: Decimal | null;
	readonly quantity: Decimal | null;
}

export interface OrderRequest {
	readonly symbol: TradingSymbol;
	readonly side: OrderSide;
	readonly type: OrderType;
	readonly quantity: Decimal;
	/** Required for limit orders. */
	readonly price?: Decimal | undefined;
	readonly reduceOnly?: boolean | undefined;
}

export interface PlacedOrder {
	readonly orderId: VenueOrderId;
	readonly status: string;
	readonly filledQuantity: Decimal;
	readonly filledValue: Decimal;
	readonly avgFillPrice: Decimal | null;
}

export interface TradingConstraints {
	readonly minOrderQty: Decimal;
	readonly qtyStep: Decimal;
	readonly minOrderValue: Decimal;
	readonly tickSize: Decimal;
	readonly maxLeverage: Decimal;
}

export interface Kline {
	readonly startTimeMs: number;
	readonly open: Decimal;
	readonly high: Decimal;
	readonly low: Decimal;
	readonly close: Decimal;
	readonly volume: Decimal;
}
