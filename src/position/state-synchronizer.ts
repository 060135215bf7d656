/**
 * StateSynchronizer: the single writer of the position replica.
 *
 * The venue is authoritative: a sync overwrites size, notional and average
 * price from the venue's report. The DCA level is a count of decisions, so it
 * is only estimated from size at cold start and otherwise left alone. When
 * the venue turns out to be flat while the replica is open, the replica is
 * reset and `resyncRequired` fires so dependent take-profit state is dropped
 * in the same cycle.
 */

import { TypedEmitter } from "../lib/events/index.js";
import { silentLogger } from "../lib/logger/index.js";
import type { Logger } from "../lib/logger/index.js";
import { Decimal } from "../shared/decimal.js";
import type { DecimalInput } from "../shared/decimal.js";
import { CancelledError, PositionError, classifyError } from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import type { TradingSymbol } from "../shared/identifiers.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import type { Clock, Sleep } from "../shared/time.js";
import { SystemClock, sleep as timerSleep } from "../shared/time.js";
import type { VenueGateway } from "../venue/gateway.js";
import type { VenuePosition } from "../venue/types.js";
import { PositionReplica } from "./position-replica.js";
import { SyncOutcome, isOpen } from "./types.js";
import type { PositionSnapshot, PositionSyncResult, SynchronizerEvents } from "./types.js";

interface ReplicaChange {
	readonly outcome: SyncOutcome;
	readonly previous: PositionSnapshot;
}

/** Below both of these a reported position is dust and counts as flat. */
const MIN_POSITION_SIZE = Decimal.from("0.001");
const MIN_POSITION_NOTIONAL = Decimal.from("0.01");

export interface StateSynchronizerConfig {
	readonly gateway: VenueGateway;
	readonly symbol: TradingSymbol;
	readonly quoteAsset: string;
	/** Quote amount of the first entry; drives the cold-start level estimate. */
	readonly baseAmount: DecimalInput;
	readonly logger?: Logger | undefined;
	readonly clock?: Clock | undefined;
	readonly sleep?: Sleep | undefined;
	/** Position query attempts per sync. Default: 3 */
	readonly attempts?: number | undefined;
	/** Delay before retry n is `retryDelayMs × n`. Default: 500 */
	readonly retryDelayMs?: number | undefined;
}

/** True if a venue record describes a live position on `symbol`. */
export function isAcceptedPosition(record: VenuePosition, symbol: TradingSymbol): boolean {
	if (record.symbol !== symbol) return false;
	const nonTrivial = record.size.gt(MIN_POSITION_SIZE) || record.notional.gt(MIN_POSITION_NOTIONAL);
	return nonTrivial && record.avgPrice.isPositive();
}

/** Cold-start level: how many base entries the notional amounts to, at least one. */
export function estimateDcaLevel(notional: Decimal, baseAmount: Decimal): number {
	if (!baseAmount.isPositive()) return 1;
	return Math.max(1, Math.floor(notional.div(baseAmount).toNumber()));
}

export class StateSynchronizer {
	readonly events: TypedEmitter<SynchronizerEvents>;
	private readonly replica: PositionReplica;
	private readonly gateway: VenueGateway;
	private readonly symbol: TradingSymbol;
	private readonly quoteAsset: string;
	private readonly baseAmount: Decimal;
	private readonly logger: Logger;
	private readonly clock: Clock;
	private readonly sleep: Sleep;
	private readonly attempts: number;
	private readonly retryDelayMs: number;

	constructor(config: StateSynchronizerConfig) {
		this.gateway = config.gateway;
		this.symbol = config.symbol;
		this.quoteAsset = config.quoteAsset;
		this.baseAmount = Decimal.from(config.baseAmount);
		this.logger = (config.logger ?? silentLogger()).child({ component: "sync", symbol: config.symbol });
		this.clock = config.clock ?? SystemClock;
		this.sleep = config.sleep ?? timerSleep;
		this.attempts = config.attempts ?? 3;
		this.retryDelayMs = config.retryDelayMs ?? 500;
		this.replica = new PositionReplica(config.symbol, this.clock);
		this.events = new TypedEmitter<SynchronizerEvents>((event, error) => {
			this.logger.warn({ event, err: error }, "position listener failed");
		});
	}

	/** Immutable copy of the replica. */
	get position(): PositionSnapshot {
		return this.replica.snapshot();
	}

	/**
	 * Refreshes the replica from the venue. A failed query leaves the replica
	 * as it was; callers carry on with the previous cycle's data.
	 */
	async syncPosition(signal?: AbortSignal): Promise<Result<PositionSyncResult, TradingError>> {
		const fetched = await this.fetchPositions(signal);
		if (!fetched.ok) return fetched;

		const record = fetched.value.find((p) => isAcceptedPosition(p, this.symbol));
		const result = await this.replica.update<ReplicaChange>((current) => {
			if (record !== undefined) {
				const coldStart = current.dcaLevel === 0 && this.baseAmount.isPositive();
				return {
					patch: {
						size: record.size,
						notional: record.notional,
						avgPrice: record.avgPrice,
						dcaLevel: coldStart ? estimateDcaLevel(record.notional, this.baseAmount) : current.dcaLevel,
					},
					result: { outcome: SyncOutcome.Updated, previous: current },
				};
			}
			if (isOpen(current)) {
				return {
					patch: { size: Decimal.zero(), notional: Decimal.zero(), avgPrice: Decimal.zero(), dcaLevel: 0 },
					result: { outcome: SyncOutcome.Reset, previous: current },
				};
			}
			return { patch: null, result: { outcome: SyncOutcome.Flat, previous: current } };
		});

		const snapshot = this.replica.snapshot();
		if (result.outcome === SyncOutcome.Reset) {
			this.logger.warn(
				{ previousSize: result.previous.size.toString(), previousAvg: result.previous.avgPrice.toString() },
				"venue reports no position; replica reset",
			);
			this.events.emit("resyncRequired", { previous: result.previous, atMs: this.clock.now() });
			this.events.emit("positionChanged", snapshot);
		} else if (result.outcome === SyncOutcome.Updated && changed(result.previous, snapshot)) {
			this.logger.info(
				{ size: snapshot.size.toString(), avgPrice: snapshot.avgPrice.toString(), dcaLevel: snapshot.dcaLevel },
				"position updated",
			);
			this.events.emit("positionChanged", snapshot);
		}
		return ok({ outcome: result.outcome, snapshot });
	}

	/** Refreshes the tradable balance of the quote asset. */
	async syncBalance(signal?: AbortSignal): Promise<Result<Decimal, TradingError>> {
		const balance = await this.gateway.getTradableBalance(this.quoteAsset, { signal });
		if (!balance.ok) {
			this.logger.warn({ err: balance.error.message, asset: this.quoteAsset }, "balance refresh failed");
			return balance;
		}
		await this.replica.update(() => ({ patch: { tradableBalance: balance.value }, result: undefined }));
		return balance;
	}

	/** Counts a filled entry. */
	async recordEntry(): Promise<PositionSnapshot> {
		const level = await this.replica.update((current) => ({
			patch: { dcaLevel: current.dcaLevel + 1 },
			result: current.dcaLevel + 1,
		}));
		this.logger.info({ dcaLevel: level }, "entry recorded");
		const snapshot = this.replica.snapshot();
		this.events.emit("positionChanged", snapshot);
		return snapshot;
	}

	/** Drops the replica back to flat without consulting the venue. */
	async reset(): Promise<PositionSnapshot> {
		return this.replica.reset();
	}

	private async fetchPositions(signal: AbortSignal | undefined): Promise<Result<VenuePosition[], TradingError>> {
		let lastError: TradingError = new PositionError("position query made no attempt", { symbol: this.symbol });
		for (let attempt = 1; attempt <= this.attempts; attempt++) {
			const result = await this.gateway.getPositions(this.symbol, { retry: false, signal });
			if (result.ok) return result;
			lastError = result.error;
			if (lastError instanceof CancelledError || !lastError.retryable) break;
			if (attempt < this.attempts) {
				const delayMs = this.retryDelayMs * attempt;
				this.logger.warn({ attempt, delayMs, err: lastError.message }, "position query failed; retrying");
				try {
					await this.sleep(delayMs, signal);
				} catch (e) {
					return err(classifyError(e));
				}
			}
		}
		this.logger.warn({ attempts: this.attempts, err: lastError.message }, "position query gave up; keeping stale data");
		return err(lastError);
	}
}

function changed(a: PositionSnapshot, b: PositionSnapshot): boolean {
	return (
		!a.size.eq(b.size) || !a.avgPrice.eq(b.avgPrice) || !a.notional.eq(b.notional) || a.dcaLevel !== b.dcaLevel
	);
}
