/**
 * LoopCoordinator: sequences sync, entry, take-profit and fill detection on
 * interval boundaries, and owns the bounded shutdown.
 *
 * One cycle per tick:
 * 1. refresh balance and position (failures are reported, not fatal)
 * 2. fetch price and klines (the cycle is skipped without them)
 * 3. re-protect an open position that has no legs
 * 4. ask the signal source, then the entry gate; on an allowed buy, size and
 *    place a market entry, record it, resync and place or update the legs
 * 5. detect fills; a position flattened by fills completes the DCA cycle
 *
 * Every error a cycle surfaces goes to the bounded error queue. Credential
 * errors in `maxCredentialFailures` consecutive cycles halt the loop.
 */

import type { EntryVerdict } from "../entry/entry-gate.js";
import { evaluateEntryGate } from "../entry/entry-gate.js";
import { sizeEntry } from "../entry/entry-sizer.js";
import type { SpacingStrategy } from "../entry/spacing.js";
import { TypedEmitter } from "../lib/events/index.js";
import { silentLogger } from "../lib/logger/index.js";
import type { Logger } from "../lib/logger/index.js";
import type { StateSynchronizer } from "../position/state-synchronizer.js";
import { SyncOutcome, isOpen } from "../position/types.js";
import type { PositionSnapshot } from "../position/types.js";
import { withTimeout } from "../resilience/resilience-layer.js";
import type { BotConfig } from "../shared/config.js";
import type { Decimal } from "../shared/decimal.js";
import {
	CancelledError,
	FatalError,
	StrategyError,
	TimeoutError,
	classifyError,
	isCredentialsError,
} from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import { tradingSymbol } from "../shared/identifiers.js";
import type { TradingSymbol } from "../shared/identifiers.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import type { Clock, Sleep } from "../shared/time.js";
import { SystemClock, sleep as timerSleep } from "../shared/time.js";
import type { TakeProfitManager } from "../take-profit/take-profit-manager.js";
import type { VenueGateway } from "../venue/gateway.js";
import { OrderSide, OrderType } from "../venue/types.js";
import type { Kline } from "../venue/types.js";
import { BoundedErrorQueue } from "./error-queue.js";
import { INTERVAL_MS, VENUE_INTERVAL, msUntilNextBoundary } from "./interval.js";
import { LoopStateMachine } from "./state-machine.js";
import { StopSignal } from "./stop-signal.js";
import { CycleOutcome, HaltReason, ShutdownOutcome, TradeAction } from "./types.js";
import type {
	CoordinatorEvents,
	CycleErrorReport,
	CycleStatus,
	LoopState,
	ShutdownReport,
	SignalContext,
	SignalSource,
} from "./types.js";

export const ERROR_QUEUE_CAPACITY = 100;

export interface LoopCoordinatorDeps {
	readonly config: BotConfig;
	readonly gateway: VenueGateway;
	readonly synchronizer: StateSynchronizer;
	readonly takeProfit: TakeProfitManager;
	readonly spacing: SpacingStrategy;
	readonly signal: SignalSource;
	readonly logger?: Logger | undefined;
	readonly clock?: Clock | undefined;
	readonly sleep?: Sleep | undefined;
}

/** Mutable accumulator for one cycle's status. */
interface CycleDraft {
	price: Decimal | null;
	action: TradeAction | null;
	verdict: EntryVerdict | null;
	entryQuantity: Decimal | null;
	legsFilled: number;
	cycleCompleted: boolean;
	readonly errors: TradingError[];
}

function emptyDraft(): CycleDraft {
	return {
		price: null,
		action: null,
		verdict: null,
		entryQuantity: null,
		legsFilled: 0,
		cycleCompleted: false,
		errors: [],
	};
}

export class LoopCoordinator {
	readonly events: TypedEmitter<CoordinatorEvents>;
	readonly errors = new BoundedErrorQueue<CycleErrorReport>(ERROR_QUEUE_CAPACITY);
	private readonly config: BotConfig;
	private readonly symbol: TradingSymbol;
	private readonly gateway: VenueGateway;
	private readonly synchronizer: StateSynchronizer;
	private readonly takeProfit: TakeProfitManager;
	private readonly spacing: SpacingStrategy;
	private readonly signalSource: SignalSource;
	private readonly logger: Logger;
	private readonly clock: Clock;
	private readonly sleep: Sleep;
	private readonly lifecycle: LoopStateMachine;
	private readonly stopSignal = new StopSignal();
	private loop: Promise<void> | null = null;
	private shutdown: Promise<ShutdownReport> | null = null;
	private cycleInFlight = false;
	private cycleCount = 0;
	private credentialStreak = 0;

	constructor(deps: LoopCoordinatorDeps) {
		this.config = deps.config;
		this.symbol = tradingSymbol(deps.config.symbol);
		this.gateway = deps.gateway;
		this.synchronizer = deps.synchronizer;
		this.takeProfit = deps.takeProfit;
		this.spacing = deps.spacing;
		this.signalSource = deps.signal;
		this.logger = (deps.logger ?? silentLogger()).child({ component: "coordinator", symbol: deps.config.symbol });
		this.clock = deps.clock ?? SystemClock;
		this.sleep = deps.sleep ?? timerSleep;
		this.lifecycle = new LoopStateMachine(this.clock);
		this.events = new TypedEmitter<CoordinatorEvents>((event, error) => {
			this.logger.warn({ event, err: error }, "coordinator listener failed");
		});
	}

	get state(): LoopState {
		return this.lifecycle.state();
	}

	get cycles(): number {
		return this.cycleCount;
	}

	/**
	 * Connects, syncs, optionally clears orphaned legs and protects an
	 * existing position, then starts the loop in the background.
	 * A failed startup halts; call `stop` to clean up.
	 */
	async start(): Promise<Result<void, TradingError>> {
		const moved = this.lifecycle.transition({ type: "start" });
		if (!moved.ok) {
			return err(new FatalError(moved.error.message, { state: moved.error.from }, "INVALID_STATE"));
		}

		const ready = await this.prepare();
		if (!ready.ok) {
			this.logger.error({ err: ready.error.message, code: ready.error.code }, "startup failed");
			this.halt(HaltReason.StartupFailed);
			return ready;
		}
		if (this.stopSignal.requested) return ok(undefined);

		this.lifecycle.transition({ type: "started" });
		this.loop = this.runLoop();
		return ok(undefined);
	}

	/** Resolves once the loop has exited, by stop or by halt. */
	whenDone(): Promise<void> {
		return this.loop ?? Promise.resolve();
	}

	/**
	 * Runs one cycle now. Returns an `overlapped` status without doing
	 * anything if another cycle is still in flight.
	 */
	async cycle(): Promise<CycleStatus> {
		if (this.cycleInFlight) {
			this.logger.warn({ cycle: this.cycleCount }, "previous cycle still running; skipping tick");
			return this.buildStatus(this.cycleCount, CycleOutcome.Overlapped, emptyDraft());
		}

		this.cycleInFlight = true;
		const number = ++this.cycleCount;
		const draft = emptyDraft();
		let outcome: CycleOutcome = CycleOutcome.Failed;
		try {
			outcome = await this.runCycle(draft);
		} catch (e) {
			const error = classifyError(e);
			draft.errors.push(error);
			this.logger.error({ cycle: number, err: error.message, code: error.code }, "cycle failed");
		} finally {
			this.cycleInFlight = false;
		}

		this.record(number, draft.errors);
		const status = this.buildStatus(number, outcome, draft);
		this.events.emit("cycle", status);
		return status;
	}

	/**
	 * Stops the loop, cancels the legs, flattens the position when configured
	 * and disconnects, within `shutdownTimeoutMs`. Repeated calls share the
	 * first call's report.
	 */
	stop(reason = "requested"): Promise<ShutdownReport> {
		this.shutdown ??= this.shutdownOnce(reason);
		return this.shutdown;
	}

	// ── Startup ──────────────────────────────────────────────────────

	private async prepare(): Promise<Result<void, TradingError>> {
		const { signal } = this.stopSignal;
		const connected = await this.gateway.connect({ signal });
		if (!connected.ok) return connected;

		const balance = await this.synchronizer.syncBalance(signal);
		if (!balance.ok) return err(balance.error);
		const synced = await this.synchronizer.syncPosition(signal);
		if (!synced.ok) return err(synced.error);

		if (this.config.cancelOrphanedOrdersOnStartup) {
			const orphans = await this.takeProfit.cancelOrphans(signal);
			if (!orphans.ok) this.logger.warn({ err: orphans.error.message }, "orphan cleanup failed");
		}

		const { snapshot } = synced.value;
		if (isOpen(snapshot)) {
			this.logger.info(
				{ size: snapshot.size.toString(), avgPrice: snapshot.avgPrice.toString(), dcaLevel: snapshot.dcaLevel },
				"existing position found",
			);
			await this.protect(snapshot, emptyDraft());
		}
		this.logger.info(
			{ interval: this.config.interval, balance: balance.value.toString(), venue: this.gateway.venueName },
			"coordinator started",
		);
		return ok(undefined);
	}

	// ── Loop ─────────────────────────────────────────────────────────

	private async runLoop(): Promise<void> {
		const intervalMs = INTERVAL_MS[this.config.interval];
		while (!this.stopSignal.requested) {
			try {
				await this.sleep(msUntilNextBoundary(this.clock.now(), intervalMs), this.stopSignal.signal);
			} catch (e) {
				if (!(e instanceof CancelledError)) {
					this.logger.error({ err: classifyError(e).message }, "interval wait failed; leaving loop");
				}
				break;
			}
			if (this.stopSignal.requested) break;

			await this.cycle();
			if (this.credentialStreak >= this.config.maxCredentialFailures) {
				this.halt(HaltReason.CredentialFailures);
				break;
			}
		}
		this.logger.info({ cycles: this.cycleCount }, "loop exited");
	}

	private async runCycle(draft: CycleDraft): Promise<CycleOutcome> {
		const { signal } = this.stopSignal;

		const balance = await this.synchronizer.syncBalance(signal);
		if (!balance.ok) this.surface(draft, balance.error, "balance sync failed; using previous balance");
		const synced = await this.synchronizer.syncPosition(signal);
		if (!synced.ok) {
			this.surface(draft, synced.error, "position sync failed; using previous position");
		} else if (synced.value.outcome === SyncOutcome.Reset) {
			await this.closeOut(draft);
		}

		const price = await this.gateway.getLatestPrice(this.symbol, { signal });
		if (!price.ok) {
			this.surface(draft, price.error, "price unavailable; skipping cycle");
			return CycleOutcome.Skipped;
		}
		draft.price = price.value;
		const klines = await this.gateway.getKlines(
			this.symbol,
			VENUE_INTERVAL[this.config.interval],
			this.config.windowSize,
			{ signal },
		);
		if (!klines.ok) {
			this.surface(draft, klines.error, "klines unavailable; skipping cycle");
			return CycleOutcome.Skipped;
		}

		const position = this.synchronizer.position;
		if (isOpen(position) && this.config.takeProfit.autoPlace && !this.takeProfit.hasPendingLegs) {
			await this.protect(position, draft);
		}

		draft.action = await this.consultSignal(
			{ symbol: this.symbol, currentPrice: price.value, klines: klines.value, position },
			draft,
		);
		if (draft.action === TradeAction.Buy) {
			const verdict = evaluateEntryGate(
				{
					dcaLevel: position.dcaLevel,
					averagePrice: position.avgPrice,
					currentPrice: price.value,
					priceHistory: closes(klines.value),
				},
				this.spacing,
			);
			draft.verdict = verdict;
			if (verdict.error) this.surface(draft, verdict.error, "spacing strategy failed; entry blocked");
			if (verdict.allowed) {
				await this.enter(price.value, draft);
			} else {
				this.logger.info(
					{ reason: verdict.reason, priceChange: verdict.priceChange.toString(), threshold: verdict.threshold.toString() },
					"entry blocked by spacing gate",
				);
			}
		}

		await this.reconcileFills(draft);
		return CycleOutcome.Completed;
	}

	private async consultSignal(context: SignalContext, draft: CycleDraft): Promise<TradeAction> {
		try {
			return await this.signalSource(context);
		} catch (e) {
			this.surface(draft, new StrategyError("signal source failed", { cause: classifyError(e) }), "holding this cycle");
			return TradeAction.Hold;
		}
	}

	private async enter(price: Decimal, draft: CycleDraft): Promise<void> {
		const { signal } = this.stopSignal;
		const constraints = await this.gateway.getTradingConstraints(this.symbol, { signal });
		if (!constraints.ok) {
			this.surface(draft, constraints.error, "trading constraints unavailable; entry skipped");
			return;
		}

		const before = this.synchronizer.position;
		const size = sizeEntry({
			baseAmount: this.config.baseAmount,
			dcaLevel: before.dcaLevel,
			maxMultiplier: this.config.maxMultiplier,
			price,
			balance: before.tradableBalance,
			constraints: constraints.value,
		});
		if (!size.ok) {
			this.surface(draft, size.error, "entry skipped");
			return;
		}

		const order = await this.gateway.placeOrder(
			{ symbol: this.symbol, side: OrderSide.Buy, type: OrderType.Market, quantity: size.value.quantity },
			{ signal },
		);
		if (!order.ok) {
			this.surface(draft, order.error, "entry order failed");
			return;
		}
		draft.entryQuantity = size.value.quantity;
		const entered = await this.synchronizer.recordEntry();
		this.logger.info(
			{
				dcaLevel: entered.dcaLevel,
				quantity: size.value.quantity.toString(),
				multiplier: size.value.multiplier.toString(),
				orderId: order.value.orderId,
			},
			"entry placed",
		);

		const synced = await this.synchronizer.syncPosition(signal);
		if (!synced.ok) {
			this.surface(draft, synced.error, "position sync after entry failed; take-profit update deferred");
			return;
		}
		const { snapshot } = synced.value;
		if (!this.config.takeProfit.autoPlace || !isOpen(snapshot)) return;

		const legs =
			snapshot.dcaLevel <= 1
				? await this.takeProfit.placeAll(snapshot.size, snapshot.avgPrice, signal)
				: await this.takeProfit.updateAll(snapshot.avgPrice, signal);
		if (!legs.ok) this.surface(draft, legs.error, "take-profit placement failed");
	}

	private async reconcileFills(draft: CycleDraft): Promise<void> {
		const { signal } = this.stopSignal;
		const fills = await this.takeProfit.detectFills(signal);
		if (!fills.ok) {
			this.surface(draft, fills.error, "fill detection failed");
			return;
		}
		draft.legsFilled += fills.value.length;
		if (fills.value.length === 0) return;

		const synced = await this.synchronizer.syncPosition(signal);
		if (!synced.ok) {
			this.surface(draft, synced.error, "position sync after fills failed");
			return;
		}
		if (!isOpen(synced.value.snapshot)) await this.closeOut(draft);
	}

	/**
	 * The venue no longer shows a position. Legs that vanished with it are
	 * take-profit fills; without any, the position was closed elsewhere.
	 * Either way the remaining legs are cancelled and tracking starts over.
	 */
	private async closeOut(draft: CycleDraft): Promise<void> {
		const { signal } = this.stopSignal;
		const fills = await this.takeProfit.detectFills(signal);
		if (fills.ok) draft.legsFilled += fills.value.length;
		const leftovers = await this.takeProfit.cancelAll(signal);
		await this.takeProfit.clear();

		if (draft.legsFilled > 0) {
			draft.cycleCompleted = true;
			this.logger.info(
				{ filledLegs: draft.legsFilled, cancelledLeftovers: leftovers.cancelled },
				"position closed by take-profit; DCA cycle complete",
			);
		} else {
			this.logger.warn({ cancelledLeftovers: leftovers.cancelled }, "position closed outside the bot; tracking reset");
		}
	}

	private async protect(position: PositionSnapshot, draft: CycleDraft): Promise<void> {
		if (!this.config.takeProfit.autoPlace) return;
		const placed = await this.takeProfit.placeAll(position.size, position.avgPrice, this.stopSignal.signal);
		if (!placed.ok) this.surface(draft, placed.error, "could not protect position with take-profit legs");
	}

	// ── Shutdown ─────────────────────────────────────────────────────

	private async shutdownOnce(reason: string): Promise<ShutdownReport> {
		const startedAt = this.clock.now();
		this.stopSignal.stop(reason);
		this.lifecycle.transition({ type: "stop", reason });
		this.logger.info({ reason, state: this.lifecycle.state() }, "shutdown requested");

		const progress = { cancelledLegs: 0, flattened: false };
		const cleanup = async (): Promise<void> => {
			await this.whenDone();
			const cancelled = await this.takeProfit.cancelAll();
			progress.cancelledLegs = cancelled.cancelled;
			progress.flattened = await this.flatten();
			const disconnected = await this.gateway.disconnect();
			if (!disconnected.ok) this.logger.warn({ err: disconnected.error.message }, "disconnect failed");
		};

		let outcome: ShutdownOutcome = ShutdownOutcome.Graceful;
		try {
			await withTimeout(cleanup(), this.config.shutdownTimeoutMs, "shutdown");
		} catch (e) {
			const error = classifyError(e);
			outcome = ShutdownOutcome.Forced;
			if (error instanceof TimeoutError) {
				this.logger.error({ timeoutMs: this.config.shutdownTimeoutMs }, "shutdown timed out; forcing stop");
			} else {
				this.logger.error({ err: error.message, code: error.code }, "shutdown cleanup failed; forcing stop");
			}
		}

		this.lifecycle.transition({ type: "stopped" });
		const report: ShutdownReport = {
			reason,
			outcome,
			durationMs: this.clock.now() - startedAt,
			cancelledLegs: progress.cancelledLegs,
			flattened: progress.flattened,
		};
		this.logger.info({ ...report }, "coordinator stopped");
		this.events.emit("shutdown", report);
		return report;
	}

	/** Reduce-only market sell of the whole position. */
	private async flatten(): Promise<boolean> {
		if (!this.config.closePositionOnShutdown) return false;
		const synced = await this.synchronizer.syncPosition();
		const position = synced.ok ? synced.value.snapshot : this.synchronizer.position;
		if (!isOpen(position)) return false;

		let quantity = position.size;
		const constraints = await this.gateway.getTradingConstraints(this.symbol);
		if (constraints.ok) {
			quantity = position.size.floorToStep(constraints.value.qtyStep);
		} else {
			this.logger.warn({ err: constraints.error.message }, "constraints unavailable; flattening the unrounded size");
		}
		if (!quantity.isPositive()) {
			this.logger.warn({ size: position.size.toString() }, "position is below the quantity step; nothing to flatten");
			return false;
		}

		const order = await this.gateway.placeOrder({
			symbol: this.symbol,
			side: OrderSide.Sell,
			type: OrderType.Market,
			quantity,
			reduceOnly: true,
		});
		if (!order.ok) {
			this.logger.error(
				{ err: order.error.message, size: quantity.toString() },
				"could not flatten position on shutdown",
			);
			return false;
		}
		await this.synchronizer.reset();
		this.logger.info({ size: quantity.toString(), orderId: order.value.orderId }, "position flattened");
		return true;
	}

	// ── Helpers ──────────────────────────────────────────────────────

	private halt(reason: HaltReason): void {
		const moved = this.lifecycle.transition({ type: "halt", reason });
		if (!moved.ok) return;
		this.logger.error({ reason, credentialStreak: this.credentialStreak }, "loop halted");
		this.events.emit("halted", reason);
	}

	private surface(draft: CycleDraft, error: TradingError, message: string): void {
		draft.errors.push(error);
		this.logger.warn({ err: error.message, code: error.code, category: error.category }, message);
	}

	/** Queues the cycle's errors and tracks the credential streak. */
	private record(cycle: number, errors: readonly TradingError[]): void {
		const atMs = this.clock.now();
		for (const error of errors) {
			if (!this.errors.push({ cycle, atMs, error })) {
				this.logger.debug({ dropped: this.errors.dropped }, "error queue full; report dropped");
			}
		}
		if (errors.some(isCredentialsError)) {
			this.credentialStreak++;
			this.logger.warn(
				{ streak: this.credentialStreak, limit: this.config.maxCredentialFailures },
				"credential errors this cycle",
			);
		} else {
			this.credentialStreak = 0;
		}
	}

	private buildStatus(cycle: number, outcome: CycleOutcome, draft: CycleDraft): CycleStatus {
		return {
			cycle,
			atMs: this.clock.now(),
			outcome,
			price: draft.price,
			action: draft.action,
			verdict: draft.verdict,
			entryQuantity: draft.entryQuantity,
			position: this.synchronizer.position,
			pendingLegs: this.takeProfit.legs().length,
			legsFilled: draft.legsFilled,
			cycleCompleted: draft.cycleCompleted,
			errors: [...draft.errors],
		};
	}
}

function closes(klines: readonly Kline[]): number[] {
	return klines.map((k) => k.close.toNumber());
}
