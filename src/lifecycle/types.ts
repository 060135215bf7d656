/**
 * Loop lifecycle types: coordinator states, cycle status, shutdown report.
 *
 * The loop moves Idle → Starting → Running, may halt on repeated credential
 * failures, and always ends Stopping → Stopped. Transitions are validated by
 * `LoopStateMachine`; nothing changes state implicitly.
 */

import type { EntryVerdict } from "../entry/entry-gate.js";
import type { PositionSnapshot } from "../position/types.js";
import type { Decimal } from "../shared/decimal.js";
import type { TradingError } from "../shared/errors.js";
import type { Kline } from "../venue/types.js";

// ── Loop states ──────────────────────────────────────────────────────

export const LoopState = {
	/** Constructed; nothing touched the venue yet */
	Idle: "idle",
	/** Connecting, syncing and protecting an existing position */
	Starting: "starting",
	/** Cycling on interval boundaries */
	Running: "running",
	/** Loop ended on its own; only stop is allowed */
	Halted: "halted",
	/** Cleanup in progress */
	Stopping: "stopping",
	/** Terminal */
	Stopped: "stopped",
} as const;

export type LoopState = (typeof LoopState)[keyof typeof LoopState];

export const HaltReason = {
	StartupFailed: "startup_failed",
	CredentialFailures: "credential_failures",
} as const;

export type HaltReason = (typeof HaltReason)[keyof typeof HaltReason];

export type LoopTransition =
	| { readonly type: "start" }
	| { readonly type: "started" }
	| { readonly type: "halt"; readonly reason: HaltReason }
	| { readonly type: "stop"; readonly reason: string }
	| { readonly type: "stopped" };

export const StateErrorKind = {
	InvalidTransition: "invalid_transition",
	AlreadyTerminal: "already_terminal",
} as const;

export type StateErrorKind = (typeof StateErrorKind)[keyof typeof StateErrorKind];

export interface StateError {
	readonly kind: StateErrorKind;
	readonly message: string;
	readonly from: LoopState;
	readonly transition: LoopTransition["type"];
}

export interface TransitionRecord {
	readonly from: LoopState;
	readonly to: LoopState;
	readonly transition: LoopTransition["type"];
	readonly timestamp: number;
}

// ── Signal ───────────────────────────────────────────────────────────

export const TradeAction = {
	Buy: "buy",
	Hold: "hold",
} as const;

export type TradeAction = (typeof TradeAction)[keyof typeof TradeAction];

export interface SignalContext {
	readonly symbol: string;
	readonly currentPrice: Decimal;
	/** Oldest first. */
	readonly klines: readonly Kline[];
	readonly position: PositionSnapshot;
}

/** External entry signal; indicator logic lives outside the loop. */
export type SignalSource = (context: SignalContext) => TradeAction | Promise<TradeAction>;

// ── Cycle & shutdown ─────────────────────────────────────────────────

export const CycleOutcome = {
	Completed: "completed",
	/** Market data unavailable; nothing was decided */
	Skipped: "skipped",
	/** Another cycle was still running */
	Overlapped: "overlapped",
	/** Unexpected fault caught by the cycle wrapper */
	Failed: "failed",
} as const;

export type CycleOutcome = (typeof CycleOutcome)[keyof typeof CycleOutcome];

export interface CycleStatus {
	readonly cycle: number;
	readonly atMs: number;
	readonly outcome: CycleOutcome;
	readonly price: Decimal | null;
	readonly action: TradeAction | null;
	readonly verdict: EntryVerdict | null;
	/** Quantity bought this cycle, if any. */
	readonly entryQuantity: Decimal | null;
	readonly position: PositionSnapshot;
	readonly pendingLegs: number;
	readonly legsFilled: number;
	/** The position was closed by take-profit fills during this cycle. */
	readonly cycleCompleted: boolean;
	readonly errors: readonly TradingError[];
}

export const ShutdownOutcome = {
	Graceful: "graceful",
	/** Cleanup outlived the shutdown timeout */
	Forced: "forced",
} as const;

export type ShutdownOutcome = (typeof ShutdownOutcome)[keyof typeof ShutdownOutcome];

export interface ShutdownReport {
	readonly reason: string;
	readonly outcome: ShutdownOutcome;
	readonly durationMs: number;
	readonly cancelledLegs: number;
	readonly flattened: boolean;
}

export interface CycleErrorReport {
	readonly cycle: number;
	readonly atMs: number;
	readonly error: TradingError;
}

export type CoordinatorEvents = {
	cycle: (status: CycleStatus) => void;
	halted: (reason: HaltReason) => void;
	shutdown: (report: ShutdownReport) => void;
};
