/**
 * TakeProfitManager: keeps one consistent set of take-profit legs over the
 * open position.
 *
 * The set is never patched: every change of size or average price cancels
 * the tracked legs and places a fresh set. Venue open orders are the ground
 * truth for fills and for cleanup, filtered through `isTakeProfitOrder`
 * because the venue may also show orders this process did not place.
 *
 * All operations on the tracked set are serialized by one lock.
 */

import { TypedEmitter } from "../lib/events/index.js";
import { AsyncLock } from "../lib/lock/index.js";
import { silentLogger } from "../lib/logger/index.js";
import type { Logger } from "../lib/logger/index.js";
import { isOpen } from "../position/types.js";
import type { StateSynchronizer } from "../position/state-synchronizer.js";
import type { TakeProfitSettings } from "../shared/config.js";
import { Decimal } from "../shared/decimal.js";
import { CancelledError, OrderError, PositionError, StrategyError, classifyError } from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import type { TradingSymbol, VenueOrderId } from "../shared/identifiers.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";
import type { VenueGateway } from "../venue/gateway.js";
import { OrderSide, OrderType } from "../venue/types.js";
import { isTakeProfitOrder } from "./classifier.js";
import type { ClassifierContext } from "./classifier.js";
import { distributeLegQuantities } from "./distribution.js";
import { LegStatus } from "./types.js";
import type {
	CancelSummary,
	DynamicTakeProfitSource,
	PlacementSummary,
	TakeProfitContext,
	TakeProfitEvents,
	TakeProfitLeg,
} from "./types.js";

/** Relative difference above which the venue's average price replaces the caller's. */
export const AVG_PRICE_EPSILON = Decimal.from("0.0001");

const ORDER_NOT_FOUND = "ORDER_NOT_FOUND";

export interface TakeProfitManagerConfig {
	readonly gateway: VenueGateway;
	readonly synchronizer: StateSynchronizer;
	readonly symbol: TradingSymbol;
	readonly settings: TakeProfitSettings;
	/** Consulted when `settings.dynamic` is on. */
	readonly dynamicPercent?: DynamicTakeProfitSource | undefined;
	readonly logger?: Logger | undefined;
	readonly clock?: Clock | undefined;
	/** Upper bound for a single placement call inside the batch. Default: 30s */
	readonly callTimeoutMs?: number | undefined;
}

const EMPTY_PLACEMENT: PlacementSummary = { placed: 0, skipped: 0, failed: 0, timedOut: false, legs: [] };

export class TakeProfitManager {
	readonly events: TypedEmitter<TakeProfitEvents>;
	private readonly gateway: VenueGateway;
	private readonly synchronizer: StateSynchronizer;
	private readonly symbol: TradingSymbol;
	private readonly settings: TakeProfitSettings;
	private readonly dynamicPercent: DynamicTakeProfitSource | undefined;
	private readonly logger: Logger;
	private readonly clock: Clock;
	private readonly callTimeoutMs: number;
	private readonly lock = new AsyncLock();
	private readonly pending = new Map<VenueOrderId, TakeProfitLeg>();
	private filled: TakeProfitLeg[] = [];

	constructor(config: TakeProfitManagerConfig) {
		this.gateway = config.gateway;
		this.synchronizer = config.synchronizer;
		this.symbol = config.symbol;
		this.settings = config.settings;
		this.dynamicPercent = config.dynamicPercent;
		this.logger = (config.logger ?? silentLogger()).child({ component: "take-profit", symbol: config.symbol });
		this.clock = config.clock ?? SystemClock;
		this.callTimeoutMs = config.callTimeoutMs ?? 30_000;
		this.events = new TypedEmitter<TakeProfitEvents>((event, error) => {
			this.logger.warn({ event, err: error }, "take-profit listener failed");
		});
	}

	/** Pending legs, lowest level first. */
	legs(): readonly TakeProfitLeg[] {
		return [...this.pending.values()].sort((a, b) => a.level - b.level);
	}

	/** Legs of the current set that have filled. */
	filledLegs(): readonly TakeProfitLeg[] {
		return [...this.filled];
	}

	get hasPendingLegs(): boolean {
		return this.pending.size > 0;
	}

	/**
	 * Replaces the tracked set with fresh legs over `totalQuantity`.
	 * Partial placement is success; placing nothing is an error.
	 */
	placeAll(
		totalQuantity: Decimal,
		averagePrice: Decimal,
		signal?: AbortSignal,
	): Promise<Result<PlacementSummary, TradingError>> {
		return this.lock.run(() => this.placeAllLocked(totalQuantity, averagePrice, signal));
	}

	/**
	 * Re-derives the set after an entry moved the average price. Size and,
	 * when it differs materially, the average price come from the venue.
	 */
	updateAll(newAveragePrice: Decimal, signal?: AbortSignal): Promise<Result<PlacementSummary, TradingError>> {
		return this.lock.run(() => this.updateAllLocked(newAveragePrice, signal));
	}

	/** Moves tracked legs the venue no longer lists as open to the filled set. */
	detectFills(signal?: AbortSignal): Promise<Result<TakeProfitLeg[], TradingError>> {
		return this.lock.run(() => this.detectFillsLocked(signal));
	}

	/**
	 * Cancels every take-profit order the venue shows, falling back to the
	 * tracked ids if the venue cannot be queried. Never fails; safe to repeat.
	 */
	cancelAll(signal?: AbortSignal): Promise<CancelSummary> {
		return this.lock.run(() => this.cancelAllLocked(signal));
	}

	/** Cancels take-profit orders on the venue that this manager is not tracking. */
	cancelOrphans(signal?: AbortSignal): Promise<Result<number, TradingError>> {
		return this.lock.run(() => this.cancelOrphansLocked(signal));
	}

	/** Forgets the tracked set without touching the venue. */
	clear(): Promise<void> {
		return this.lock.run(() => {
			this.pending.clear();
			this.filled = [];
		});
	}

	// ── Locked sections ──────────────────────────────────────────────

	private async placeAllLocked(
		total: Decimal,
		avgPrice: Decimal,
		signal: AbortSignal | undefined,
	): Promise<Result<PlacementSummary, TradingError>> {
		const deadline = this.clock.now() + this.settings.batchTimeoutMs;
		await this.cancelTracked(signal);
		this.pending.clear();
		this.filled = [];

		if (!total.isPositive() || !avgPrice.isPositive()) {
			return err(
				new PositionError("cannot place take-profit legs without an open position", {
					total: total.toString(),
					avgPrice: avgPrice.toString(),
				}),
			);
		}

		const constraints = await this.gateway.getTradingConstraints(this.symbol, { signal });
		if (!constraints.ok) return err(constraints.error);
		const { minOrderQty, minOrderValue, qtyStep, tickSize } = constraints.value;

		const { levels, levelFraction } = this.settings;
		const percent = Decimal.from(await this.resolvePercent({ symbol: this.symbol, avgPrice, totalQuantity: total }));
		const quantities = distributeLegQuantities(total, levels, levelFraction, constraints.value);

		let skipped = 0;
		let failed = 0;
		let timedOut = false;
		let lastError: TradingError | undefined;
		for (let level = 1; level <= levels; level++) {
			const remainingMs = deadline - this.clock.now();
			if (remainingMs < this.settings.safetyMarginMs) {
				timedOut = true;
				this.logger.warn({ level, remainingMs }, "take-profit batch budget exhausted; stopping placement");
				break;
			}

			const quantity = (quantities[level - 1] ?? Decimal.zero()).floorToStep(qtyStep);
			const price = avgPrice.mul(Decimal.one().add(percent.mul(level).div(levels))).roundToStep(tickSize);
			if (quantity.isZero() || quantity.lt(minOrderQty) || quantity.mul(price).lt(minOrderValue)) {
				skipped++;
				this.logger.debug(
					{ level, quantity: quantity.toString(), price: price.toString() },
					"skipping leg below venue minimums",
				);
				continue;
			}

			const placed = await this.gateway.placeOrder(
				{ symbol: this.symbol, side: OrderSide.Sell, type: OrderType.Limit, quantity, price, reduceOnly: true },
				{ signal, timeoutMs: Math.min(this.callTimeoutMs, remainingMs) },
			);
			if (!placed.ok) {
				failed++;
				lastError = placed.error;
				this.logger.warn({ level, err: placed.error.message }, "take-profit leg placement failed");
				if (placed.error instanceof CancelledError) break;
				continue;
			}
			this.pending.set(placed.value.orderId, {
				level,
				orderId: placed.value.orderId,
				targetPrice: price,
				quantity,
				status: LegStatus.Pending,
				placedAtMs: this.clock.now(),
			});
		}

		const legs = this.legs();
		const summary: PlacementSummary = { placed: legs.length, skipped, failed, timedOut, legs };
		if (legs.length === 0) {
			return err(
				lastError ??
					new OrderError(
						"no take-profit leg could be placed",
						{ skipped, timedOut, total: total.toString() },
						{ retryable: false, code: "NO_LEGS_PLACED" },
					),
			);
		}
		this.logger.info(
			{ placed: legs.length, skipped, failed, timedOut, avgPrice: avgPrice.toString(), percent: percent.toString() },
			"take-profit legs placed",
		);
		this.events.emit("legsPlaced", summary);
		return ok(summary);
	}

	private async updateAllLocked(
		newAvg: Decimal,
		signal: AbortSignal | undefined,
	): Promise<Result<PlacementSummary, TradingError>> {
		const synced = await this.synchronizer.syncPosition(signal);
		if (!synced.ok) return err(synced.error);

		const fills = await this.detectFillsLocked(signal);
		if (!fills.ok) {
			this.logger.warn({ err: fills.error.message }, "fill detection failed during update");
		}

		const { snapshot } = synced.value;
		if (!isOpen(snapshot)) {
			await this.cancelAllLocked(signal);
			return ok(EMPTY_PLACEMENT);
		}

		const orphans = await this.cancelOrphansLocked(signal);
		if (!orphans.ok) {
			this.logger.warn({ err: orphans.error.message }, "orphan cleanup failed during update");
		}

		let avgPrice = newAvg;
		if (snapshot.avgPrice.isPositive() && relativeDifference(newAvg, snapshot.avgPrice).gt(AVG_PRICE_EPSILON)) {
			this.logger.warn(
				{ supplied: newAvg.toString(), venue: snapshot.avgPrice.toString() },
				"average price differs from venue; using venue value",
			);
			avgPrice = snapshot.avgPrice;
		}
		return this.placeAllLocked(snapshot.size, avgPrice, signal);
	}

	private async detectFillsLocked(signal: AbortSignal | undefined): Promise<Result<TakeProfitLeg[], TradingError>> {
		if (this.pending.size === 0) return ok([]);
		const open = await this.gateway.getOpenOrders(this.symbol, { signal });
		if (!open.ok) return err(open.error);

		const openIds = new Set(open.value.map((o) => o.orderId));
		const newlyFilled: TakeProfitLeg[] = [];
		for (const [id, leg] of this.pending) {
			if (openIds.has(id)) continue;
			this.pending.delete(id);
			const filled: TakeProfitLeg = { ...leg, status: LegStatus.Filled };
			this.filled.push(filled);
			newlyFilled.push(filled);
		}
		for (const leg of newlyFilled) {
			this.logger.info(
				{ level: leg.level, orderId: leg.orderId, price: leg.targetPrice.toString() },
				"take-profit leg filled",
			);
			this.events.emit("legFilled", leg);
		}
		return ok(newlyFilled);
	}

	private async cancelAllLocked(signal: AbortSignal | undefined): Promise<CancelSummary> {
		const ctx = this.classifierContext();
		const open = await this.gateway.getOpenOrders(this.symbol, { signal });
		let targets: VenueOrderId[];
		let fromMemory = false;
		if (open.ok) {
			// Tracked legs go regardless of what the classifier makes of them.
			targets = open.value
				.filter((o) => this.pending.has(o.orderId) || isTakeProfitOrder(o, ctx))
				.map((o) => o.orderId);
		} else {
			this.logger.warn({ err: open.error.message }, "open order query failed; cancelling tracked legs");
			targets = [...this.pending.keys()];
			fromMemory = true;
		}

		let cancelled = 0;
		let failed = 0;
		for (const id of targets) {
			const result = await this.gateway.cancelOrder(this.symbol, id, { signal });
			if (result.ok) {
				cancelled++;
			} else if (result.error.code !== ORDER_NOT_FOUND) {
				failed++;
				this.logger.warn({ orderId: id, err: result.error.message }, "take-profit cancel failed");
			}
		}
		this.pending.clear();
		if (targets.length > 0) {
			this.logger.info({ cancelled, failed, fromMemory }, "take-profit orders cancelled");
		}
		return { cancelled, failed, fromMemory };
	}

	private async cancelOrphansLocked(signal: AbortSignal | undefined): Promise<Result<number, TradingError>> {
		const ctx = this.classifierContext();
		const open = await this.gateway.getOpenOrders(this.symbol, { signal });
		if (!open.ok) return err(open.error);

		let cancelled = 0;
		for (const order of open.value) {
			if (this.pending.has(order.orderId) || !isTakeProfitOrder(order, ctx)) continue;
			const result = await this.gateway.cancelOrder(this.symbol, order.orderId, { signal });
			if (result.ok) {
				cancelled++;
			} else if (result.error.code !== ORDER_NOT_FOUND) {
				this.logger.warn({ orderId: order.orderId, err: result.error.message }, "orphan cancel failed");
			}
		}
		if (cancelled > 0) this.logger.info({ cancelled }, "orphaned take-profit orders cancelled");
		return ok(cancelled);
	}

	// ── Helpers ──────────────────────────────────────────────────────

	private async cancelTracked(signal: AbortSignal | undefined): Promise<void> {
		for (const leg of this.pending.values()) {
			const result = await this.gateway.cancelOrder(this.symbol, leg.orderId, { signal });
			if (!result.ok && result.error.code !== ORDER_NOT_FOUND) {
				this.logger.warn({ level: leg.level, orderId: leg.orderId, err: result.error.message }, "leg cancel failed");
			}
		}
	}

	private classifierContext(): ClassifierContext {
		const position = this.synchronizer.position;
		const filledQuantity = Decimal.sum(this.filled.map((l) => l.quantity));
		return {
			symbol: this.symbol,
			avgPrice: isOpen(position) ? position.avgPrice : null,
			estimatedFullPosition: position.size.add(filledQuantity),
			trackedIds: new Set(this.pending.keys()),
		};
	}

	private async resolvePercent(ctx: TakeProfitContext): Promise<number> {
		const base = this.settings.basePercent;
		if (!this.settings.dynamic || this.dynamicPercent === undefined) return base;
		try {
			const dynamic = await this.dynamicPercent(ctx);
			if (Number.isFinite(dynamic) && dynamic > 0) return dynamic;
			this.logger.warn({ dynamic, fallback: base }, "dynamic take-profit out of range; using base percent");
		} catch (e) {
			const error = new StrategyError("dynamic take-profit source failed", { cause: classifyError(e) });
			this.logger.warn({ err: error.message, cause: error.cause, fallback: base }, "using base take-profit percent");
		}
		return base;
	}
}

function relativeDifference(a: Decimal, b: Decimal): Decimal {
	return a.sub(b).abs().div(b);
}
