/**
 * PaperVenue: in-process VenueAdapter for tests, demos and dry runs.
 *
 * Market orders fill at the current price and move the position's size and
 * average price; resting limit orders fill when `setPrice` crosses them.
 * Failures can be injected per method. No network calls; deterministic when
 * given a FakeClock.
 */

import { Decimal } from "../shared/decimal.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";
import { OrderSide, OrderType } from "./types.js";
import type {
	RawKline,
	RawOpenOrder,
	RawPlaceOrderRequest,
	RawPlacedOrder,
	RawPosition,
	RawTradingConstraints,
	VenueAdapter,
	VenueCategory,
} from "./types.js";

export type PaperVenueMethod = Exclude<keyof VenueAdapter, "name">;

/**
 * Configuration for the paper venue.
 *
 * @example
 * ```ts
 * const venue = new PaperVenue({ symbol: "BTCUSDT", price: "30000", balance: "10000" });
 * ```
 */
export interface PaperVenueConfig {
	readonly symbol: string;
	readonly price: string;
	/** Quote-asset balance. */
	readonly balance: string;
	readonly quoteAsset: string;
	readonly constraints: RawTradingConstraints;
	readonly clock: Clock;
	/** Bar length used to timestamp synthetic klines. */
	readonly klineIntervalMs: number;
}

export const DEFAULT_PAPER_CONSTRAINTS: RawTradingConstraints = {
	minOrderQty: "0.001",
	qtyStep: "0.001",
	minOrderValue: "5",
	tickSize: "0.01",
	maxLeverage: "100",
};

interface RestingOrder {
	readonly orderId: string;
	readonly side: OrderSide;
	readonly price: Decimal;
	readonly qty: Decimal;
}

interface Holding {
	size: Decimal;
	avgPrice: Decimal;
}

export class PaperVenue implements VenueAdapter {
	readonly name = "paper";
	private readonly config: PaperVenueConfig;
	private connected = false;
	private price: Decimal;
	private balance: Decimal;
	private readonly holding: Holding = { size: Decimal.zero(), avgPrice: Decimal.zero() };
	private readonly resting = new Map<string, RestingOrder>();
	private readonly closes: { readonly atMs: number; readonly price: Decimal }[] = [];
	private readonly failures = new Map<PaperVenueMethod, unknown[]>();
	private readonly calls = new Map<PaperVenueMethod, number>();
	private orderCounter = 0;

	constructor(config: Partial<PaperVenueConfig> & Pick<PaperVenueConfig, "symbol" | "price">) {
		this.config = {
			balance: "10000",
			quoteAsset: "USDT",
			constraints: DEFAULT_PAPER_CONSTRAINTS,
			clock: SystemClock,
			klineIntervalMs: 60_000,
			...config,
			symbol: config.symbol.toUpperCase(),
		};
		this.price = Decimal.from(this.config.price);
		this.balance = Decimal.from(this.config.balance);
		this.closes.push({ atMs: this.config.clock.now(), price: this.price });
	}

	// ── Test controls ────────────────────────────────────────────────

	/** Makes the next `times` calls of `method` throw `error`. */
	failNext(method: PaperVenueMethod, error: unknown, times = 1): void {
		const queue = this.failures.get(method) ?? [];
		for (let i = 0; i < times; i++) queue.push(error);
		this.failures.set(method, queue);
	}

	callCount(method: PaperVenueMethod): number {
		return this.calls.get(method) ?? 0;
	}

	/** Moves the market; resting orders crossed by the new price fill at their limit. */
	setPrice(price: string): void {
		this.price = Decimal.from(price);
		this.closes.push({ atMs: this.config.clock.now(), price: this.price });
		for (const order of [...this.resting.values()]) {
			const crossed = order.side === OrderSide.Sell ? this.price.gte(order.price) : this.price.lte(order.price);
			if (crossed) this.fillResting(order);
		}
	}

	/** Overwrites the position, e.g. to simulate a restart with an open position. */
	setPosition(size: string, avgPrice: string): void {
		this.holding.size = Decimal.from(size);
		this.holding.avgPrice = Decimal.from(avgPrice);
	}

	/** Flattens the position outside the bot, as a manual close or liquidation would. */
	closePositionExternally(): void {
		this.holding.size = Decimal.zero();
		this.holding.avgPrice = Decimal.zero();
	}

	/** Adds a resting order the bot did not place. */
	addForeignOrder(side: OrderSide, price: string, qty: string): string {
		const orderId = this.nextOrderId();
		this.resting.set(orderId, { orderId, side, price: Decimal.from(price), qty: Decimal.from(qty) });
		return orderId;
	}

	/** Fills one resting order at its limit price regardless of the market. */
	fillOrder(orderId: string): void {
		const order = this.resting.get(orderId);
		if (!order) throw new Error(`order ${orderId} not found`);
		this.fillResting(order);
	}

	get position(): { readonly size: string; readonly avgPrice: string } {
		return { size: this.holding.size.toString(), avgPrice: this.holding.avgPrice.toString() };
	}

	get openOrderCount(): number {
		return this.resting.size;
	}

	// ── VenueAdapter ─────────────────────────────────────────────────

	async connect(): Promise<void> {
		this.enter("connect", false);
		this.connected = true;
	}

	async disconnect(): Promise<void> {
		this.enter("disconnect", false);
		this.connected = false;
	}

	async getPositions(_category: VenueCategory, symbol: string): Promise<readonly RawPosition[]> {
		this.enter("getPositions");
		if (!this.isTracked(symbol) || this.holding.size.isZero()) return [];
		const { size, avgPrice } = this.holding;
		return [
			{
				symbol: this.config.symbol,
				side: "Buy",
				size: size.toString(),
				positionValue: size.mul(avgPrice).toString(),
				avgPrice: avgPrice.toString(),
				markPrice: this.price.toString(),
				unrealisedPnl: this.price.sub(avgPrice).mul(size).toString(),
			},
		];
	}

	async getOpenOrders(_category: VenueCategory, symbol: string): Promise<readonly RawOpenOrder[]> {
		this.enter("getOpenOrders");
		if (!this.isTracked(symbol)) return [];
		return [...this.resting.values()].map((o) => ({
			orderId: o.orderId,
			symbol: this.config.symbol,
			side: o.side,
			orderType: OrderType.Limit,
			price: o.price.toString(),
			qty: o.qty.toString(),
		}));
	}

	async placeOrder(request: RawPlaceOrderRequest): Promise<RawPlacedOrder> {
		this.enter("placeOrder");
		if (!this.isTracked(request.symbol)) throw new Error(`invalid symbol ${request.symbol}`);
		const qty = Decimal.from(request.qty);
		const min = Decimal.from(this.config.constraints.minOrderQty);
		if (qty.lt(min)) throw new Error(`order quantity ${request.qty} below minimum ${min.toString()}`);

		const orderId = this.nextOrderId();
		if (request.orderType === OrderType.Limit) {
			if (request.price === undefined) throw new Error("invalid parameters: limit order without price");
			this.resting.set(orderId, { orderId, side: request.side, price: Decimal.from(request.price), qty });
			return { orderId, orderStatus: "New", cumExecQty: "0", cumExecValue: "0", avgPrice: "" };
		}

		const filled = request.side === OrderSide.Buy ? this.buy(qty, this.price) : this.sell(qty, this.price, request.reduceOnly ?? false);
		return {
			orderId,
			orderStatus: "Filled",
			cumExecQty: filled.toString(),
			cumExecValue: filled.mul(this.price).toString(),
			avgPrice: this.price.toString(),
		};
	}

	async cancelOrder(_category: VenueCategory, _symbol: string, orderId: string): Promise<void> {
		this.enter("cancelOrder");
		if (!this.resting.delete(orderId)) {
			throw new Error(`order ${orderId} does not exist or was already cancelled`);
		}
	}

	async getLatestPrice(_symbol: string): Promise<string> {
		this.enter("getLatestPrice");
		return this.price.toString();
	}

	async getTradingConstraints(_category: VenueCategory, _symbol: string): Promise<RawTradingConstraints> {
		this.enter("getTradingConstraints");
		return this.config.constraints;
	}

	/** Synthetic flat bars, one per recorded price, newest last. */
	async getKlines(_category: VenueCategory, _symbol: string, _interval: string, limit: number): Promise<readonly RawKline[]> {
		this.enter("getKlines");
		return this.closes.slice(-limit).map(({ atMs, price }) => {
			const p = price.toString();
			const startTimeMs = atMs - (atMs % this.config.klineIntervalMs);
			return { startTimeMs, open: p, high: p, low: p, close: p, volume: "0" };
		});
	}

	async getTradableBalance(asset: string): Promise<string> {
		this.enter("getTradableBalance");
		return asset.toUpperCase() === this.config.quoteAsset ? this.balance.toString() : "0";
	}

	// ── Internals ────────────────────────────────────────────────────

	private enter(method: PaperVenueMethod, requireConnection = true): void {
		this.calls.set(method, this.callCount(method) + 1);
		const injected = this.failures.get(method);
		if (injected !== undefined && injected.length > 0) {
			throw injected.shift();
		}
		if (requireConnection && !this.connected) {
			throw new Error("connection not established");
		}
	}

	private isTracked(symbol: string): boolean {
		return symbol.toUpperCase() === this.config.symbol;
	}

	private nextOrderId(): string {
		this.orderCounter++;
		return `paper-${this.orderCounter}`;
	}

	private buy(qty: Decimal, price: Decimal): Decimal {
		const cost = qty.mul(price);
		if (cost.gt(this.balance)) {
			throw new Error(`insufficient balance: need ${cost.toString()}, have ${this.balance.toString()}`);
		}
		const size = this.holding.size.add(qty);
		this.holding.avgPrice = this.holding.size.mul(this.holding.avgPrice).add(cost).div(size);
		this.holding.size = size;
		this.balance = this.balance.sub(cost);
		return qty;
	}

	private sell(qty: Decimal, price: Decimal, reduceOnly: boolean): Decimal {
		const filled = reduceOnly ? Decimal.min(qty, this.holding.size) : qty;
		if (filled.gt(this.holding.size)) {
			throw new Error("invalid parameters: short positions are not supported");
		}
		this.holding.size = this.holding.size.sub(filled);
		if (this.holding.size.isZero()) this.holding.avgPrice = Decimal.zero();
		this.balance = this.balance.add(filled.mul(price));
		return filled;
	}

	private fillResting(order: RestingOrder): void {
		this.resting.delete(order.orderId);
		if (order.side === OrderSide.Sell) {
			this.sell(order.qty, order.price, true);
		} else {
			this.buy(order.qty, order.price);
		}
	}
}
