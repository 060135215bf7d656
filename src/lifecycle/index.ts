export {
	LoopState,
	HaltReason,
	StateErrorKind,
	TradeAction,
	CycleOutcome,
	ShutdownOutcome,
	type LoopTransition,
	type StateError,
	type TransitionRecord,
	type SignalContext,
	type SignalSource,
	type CycleStatus,
	type CycleErrorReport,
	type ShutdownReport,
	type CoordinatorEvents,
} from "./types.js";

export { LoopStateMachine } from "./state-machine.js";
export { INTERVAL_MS, VENUE_INTERVAL, msUntilNextBoundary } from "./interval.js";
export { StopSignal } from "./stop-signal.js";
export { BoundedErrorQueue } from "./error-queue.js";
export { ERROR_QUEUE_CAPACITY, LoopCoordinator, type LoopCoordinatorDeps } from "./coordinator.js";
