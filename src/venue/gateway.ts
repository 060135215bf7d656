/**
 * VenueGateway: the only path from domain code to a VenueAdapter.
 *
 * Every call runs through the ResilienceLayer under its operation class and
 * comes back as a Result holding parsed domain values. Records the venue
 * reports with unusable numbers are dropped with a warning rather than
 * failing the whole query.
 */

import { TtlCache } from "../lib/cache/index.js";
import { silentLogger } from "../lib/logger/index.js";
import type { Logger } from "../lib/logger/index.js";
import { OperationClass } from "../resilience/types.js";
import type { ResilienceLayer, RunOptions } from "../resilience/resilience-layer.js";
import { Decimal } from "../shared/decimal.js";
import { OrderError, TemporaryError } from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import { tradingSymbol, venueOrderId } from "../shared/identifiers.js";
import type { TradingSymbol, VenueOrderId } from "../shared/identifiers.js";
import { err } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { parseVenueNumber } from "./numeric.js";
import { OrderSide, OrderType, VenueCategory } from "./types.js";
import type {
	Kline,
	OpenOrder,
	OrderRequest,
	PlacedOrder,
	RawKline,
	RawOpenOrder,
	RawPlacedOrder,
	RawPosition,
	RawTradingConstraints,
	TradingConstraints,
	VenueAdapter,
	VenuePosition,
} from "./types.js";

export const CONSTRAINTS_TTL_MS = 5 * 60_000;

export interface VenueGatewayConfig {
	readonly adapter: VenueAdapter;
	readonly resilience: ResilienceLayer;
	readonly category: VenueCategory;
	readonly logger?: Logger | undefined;
	readonly clock?: Clock | undefined;
	/** Default per-call deadline. */
	readonly callTimeoutMs?: number | undefined;
	readonly constraintsTtlMs?: number | undefined;
}

/** Per-call overrides passed through to the resilience layer. */
export type CallOptions = RunOptions;

const COMPONENT = "gateway";

export class VenueGateway {
	readonly category: VenueCategory;
	private readonly adapter: VenueAdapter;
	private readonly resilience: ResilienceLayer;
	private readonly logger: Logger;
	private readonly callTimeoutMs: number | undefined;
	private readonly constraints: TtlCache<TradingConstraints>;

	constructor(config: VenueGatewayConfig) {
		this.adapter = config.adapter;
		this.resilience = config.resilience;
		this.category = config.category;
		this.logger = (config.logger ?? silentLogger()).child({ component: COMPONENT, venue: config.adapter.name });
		this.callTimeoutMs = config.callTimeoutMs;
		this.constraints = new TtlCache({ ttlMs: config.constraintsTtlMs ?? CONSTRAINTS_TTL_MS, clock: config.clock });
	}

	get venueName(): string {
		return this.adapter.name;
	}

	connect(options: CallOptions = {}): Promise<Result<void, TradingError>> {
		return this.run(OperationClass.AccountData, "connect", () => this.adapter.connect(), options);
	}

	disconnect(options: CallOptions = {}): Promise<Result<void, TradingError>> {
		return this.run(OperationClass.AccountData, "disconnect", () => this.adapter.disconnect(), {
			retry: false,
			...options,
		});
	}

	getPositions(symbol: TradingSymbol, options: CallOptions = {}): Promise<Result<VenuePosition[], TradingError>> {
		return this.run(
			OperationClass.AccountData,
			"getPositions",
			async () => {
				const raw = await this.adapter.getPositions(this.category, symbol);
				return this.parseAll(raw, parsePosition, "position");
			},
			options,
		);
	}

	getOpenOrders(symbol: TradingSymbol, options: CallOptions = {}): Promise<Result<OpenOrder[], TradingError>> {
		return this.run(
			OperationClass.Trading,
			"getOpenOrders",
			async () => {
				const raw = await this.adapter.getOpenOrders(this.category, symbol);
				return this.parseAll(raw, parseOpenOrder, "open order");
			},
			options,
		);
	}

	async placeOrder(request: OrderRequest, options: CallOptions = {}): Promise<Result<PlacedOrder, TradingError>> {
		if (request.type === OrderType.Limit && request.price === undefined) {
			return err(
				new OrderError("limit order requires a price", { symbol: request.symbol }, { retryable: false, code: "INVALID_PARAMETERS" }),
			);
		}
		if (!request.quantity.isPositive()) {
			return err(
				new OrderError(
					`order quantity must be positive, got ${request.quantity.toString()}`,
					{ symbol: request.symbol },
					{ retryable: false, code: "INVALID_PARAMETERS" },
				),
			);
		}
		return this.run(
			OperationClass.Trading,
			"placeOrder",
			async () => {
				const placed = await this.adapter.placeOrder({
					category: this.category,
					symbol: request.symbol,
					side: request.side,
					orderType: request.type,
					qty: request.quantity.toString(),
					price: request.price?.toString(),
					reduceOnly: this.category === VenueCategory.Spot ? undefined : request.reduceOnly,
				});
				return parsePlacedOrder(placed);
			},
			options,
		);
	}

	cancelOrder(symbol: TradingSymbol, orderId: VenueOrderId, options: CallOptions = {}): Promise<Result<void, TradingError>> {
		return this.run(
			OperationClass.Trading,
			"cancelOrder",
			() => this.adapter.cancelOrder(this.category, symbol, orderId),
			options,
		);
	}

	getLatestPrice(symbol: TradingSymbol, options: CallOptions = {}): Promise<Result<Decimal, TradingError>> {
		return this.run(
			OperationClass.MarketData,
			"getLatestPrice",
			async () => {
				const raw = await this.adapter.getLatestPrice(symbol);
				const price = parseVenueNumber(raw);
				if (price === null || !price.isPositive()) {
					throw new TemporaryError(`venue returned an unusable price "${raw}"`, { symbol });
				}
				return price;
			},
			options,
		);
	}

	/** Cached per symbol for the configured TTL; failures are not cached. */
	getTradingConstraints(
		symbol: TradingSymbol,
		options: CallOptions = {},
	): Promise<Result<TradingConstraints, TradingError>> {
		return this.constraints.getOrLoad(`${this.category}:${symbol}`, () =>
			this.run(
				OperationClass.MarketData,
				"getTradingConstraints",
				async () => parseConstraints(await this.adapter.getTradingConstraints(this.category, symbol)),
				options,
			),
		);
	}

	getKlines(
		symbol: TradingSymbol,
		interval: string,
		limit: number,
		options: CallOptions = {},
	): Promise<Result<Kline[], TradingError>> {
		return this.run(
			OperationClass.MarketData,
			"getKlines",
			async () => {
				const raw = await this.adapter.getKlines(this.category, symbol, interval, limit);
				return this.parseAll(raw, parseKline, "kline");
			},
			options,
		);
	}

	getTradableBalance(asset: string, options: CallOptions = {}): Promise<Result<Decimal, TradingError>> {
		return this.run(
			OperationClass.AccountData,
			"getTradableBalance",
			async () => {
				const raw = await this.adapter.getTradableBalance(asset);
				const balance = parseVenueNumber(raw);
				if (balance === null) {
					throw new TemporaryError(`venue returned an unusable balance "${raw}"`, { asset });
				}
				return balance;
			},
			options,
		);
	}

	// ── Internals ────────────────────────────────────────────────────

	private run<T>(
		cls: OperationClass,
		operation: string,
		fn: () => Promise<T>,
		options: CallOptions,
	): Promise<Result<T, TradingError>> {
		return this.resilience.run(cls, COMPONENT, operation, fn, {
			timeoutMs: this.callTimeoutMs,
			...options,
		});
	}

	private parseAll<R, T>(raw: readonly R[], parse: (record: R) => T | null, label: string): T[] {
		const parsed: T[] = [];
		for (const record of raw) {
			const value = parse(record);
			if (value === null) {
				this.logger.warn({ record }, `dropping unparseable ${label}`);
				continue;
			}
			parsed.push(value);
		}
		return parsed;
	}
}

// ── Parsers ──────────────────────────────────────────────────────────

export function parseOrderSide(raw: string): OrderSide | null {
	const normalized = raw.trim().toLowerCase();
	if (normalized === "buy") return OrderSide.Buy;
	if (normalized === "sell") return OrderSide.Sell;
	return null;
}

export function parseOrderType(raw: string): OrderType | null {
	const normalized = raw.trim().toLowerCase();
	if (normalized === "limit") return OrderType.Limit;
	if (normalized === "market") return OrderType.Market;
	return null;
}

function parsePosition(raw: RawPosition): VenuePosition | null {
	const notional = parseVenueNumber(raw.positionValue);
	const avgPrice = parseVenueNumber(raw.avgPrice);
	if (avgPrice === null || raw.symbol.trim().length === 0) return null;
	// A blank size is recovered from notional ÷ average price.
	const size =
		parseVenueNumber(raw.size) ?? (notional !== null && avgPrice.isPositive() ? notional.div(avgPrice) : null);
	if (size === null) return null;
	return {
		symbol: tradingSymbol(raw.symbol),
		side: raw.side,
		size,
		notional: notional ?? size.mul(avgPrice),
		avgPrice,
		markPrice: parseVenueNumber(raw.markPrice),
		unrealisedPnl: parseVenueNumber(raw.unrealisedPnl),
	};
}

function parseOpenOrder(raw: RawOpenOrder): OpenOrder | null {
	if (raw.orderId.trim().length === 0 || raw.symbol.trim().length === 0) return null;
	return {
		orderId: venueOrderId(raw.orderId),
		symbol: tradingSymbol(raw.symbol),
		side: parseOrderSide(raw.side),
		type: parseOrderType(raw.orderType),
		price: parseVenueNumber(raw.price),
		quantity: parseVenueNumber(raw.qty),
	};
}

function parsePlacedOrder(raw: RawPlacedOrder): PlacedOrder {
	if (raw.orderId.trim().length === 0) {
		throw new OrderError("venue accepted an order without an id", { status: raw.orderStatus }, { retryable: false });
	}
	const avg = parseVenueNumber(raw.avgPrice);
	return {
		orderId: venueOrderId(raw.orderId),
		status: raw.orderStatus,
		filledQuantity: parseVenueNumber(raw.cumExecQty) ?? Decimal.zero(),
		filledValue: parseVenueNumber(raw.cumExecValue) ?? Decimal.zero(),
		avgFillPrice: avg !== null && avg.isPositive() ? avg : null,
	};
}

function parseConstraints(raw: RawTradingConstraints): TradingConstraints {
	const minOrderQty = parseVenueNumber(raw.minOrderQty);
	const qtyStep = parseVenueNumber(raw.qtyStep);
	const tickSize = parseVenueNumber(raw.tickSize);
	if (minOrderQty === null || qtyStep === null || tickSize === null) {
		throw new TemporaryError("venue returned incomplete trading constraints", { raw: { ...raw } });
	}
	return {
		minOrderQty,
		qtyStep,
		minOrderValue: parseVenueNumber(raw.minOrderValue) ?? Decimal.zero(),
		tickSize,
		maxLeverage: parseVenueNumber(raw.maxLeverage) ?? Decimal.one(),
	};
}

function parseKline(raw: RawKline): Kline | null {
	const open = parseVenueNumber(raw.open);
	const high = parseVenueNumber(raw.high);
	const low = parseVenueNumber(raw.low);
	const close = parseVenueNumber(raw.close);
	const volume = parseVenueNumber(raw.volume);
	if (open === null || high === null || low === null || close === null || volume === null) return null;
	return { startTimeMs: raw.startTimeMs, open, high, low, close, volume };
}
