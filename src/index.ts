// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type VenueOrderId,
	type TradingSymbol,
	venueOrderId,
	tradingSymbol,
	type Result,
	ok,
	err,
	map,
	unwrap,
	unwrapOr,
	isOk,
	isErr,
	attempt,
	ErrorCategory,
	TradingError,
	NetworkError,
	TimeoutError,
	TemporaryError,
	RateLimitError,
	OrderError,
	PositionError,
	StrategyError,
	CredentialsError,
	FatalError,
	ConfigError,
	CircuitOpenError,
	CancelledError,
	classifyError,
	isCredentialsError,
	Decimal,
	type DecimalInput,
	type Clock,
	type Sleep,
	SystemClock,
	FakeClock,
	Duration,
	sleep,
	fakeSleep,
	type BotConfig,
	type BotConfigInput,
	type IntervalLabel,
	type TakeProfitSettings,
	BotConfigSchema,
	SUPPORTED_INTERVALS,
	configFromEnv,
	loadConfig,
} from "./shared/index.js";

// ── Infrastructure ───────────────────────────────────────────────────
export { type Logger, type LoggerConfig, type LogLevel, createLogger, silentLogger } from "./lib/logger/index.js";
export { TypedEmitter, type EventMap } from "./lib/events/index.js";
export { ValidationError, type ValidationIssue } from "./lib/validation/index.js";

// ── Resilience ───────────────────────────────────────────────────────
export {
	CircuitBreaker,
	TokenBucketRateLimiter,
	RecoveryExecutor,
	ErrorWindow,
	ResilienceLayer,
	DEFAULT_POLICIES,
	withTimeout,
	BackoffStrategy,
	BreakerState,
	OperationClass,
	StopReason,
	type BreakerStats,
	type CircuitBreakerConfig,
	type RateLimiterConfig,
	type RecoveryConfig,
	type ResilienceDeps,
	type ResilienceHealth,
	type RunOptions,
} from "./resilience/index.js";

// ── Venue ────────────────────────────────────────────────────────────
export {
	VenueGateway,
	PaperVenue,
	DEFAULT_PAPER_CONSTRAINTS,
	OrderSide,
	OrderType,
	VenueCategory,
	type CallOptions,
	type Kline,
	type OpenOrder,
	type OrderRequest,
	type PlacedOrder,
	type TradingConstraints,
	type VenueAdapter,
	type VenuePosition,
	type PaperVenueConfig,
} from "./venue/index.js";

// ── Position ─────────────────────────────────────────────────────────
export {
	StateSynchronizer,
	SyncOutcome,
	isOpen,
	type PositionSnapshot,
	type PositionSyncResult,
	type StateSynchronizerConfig,
} from "./position/index.js";

// ── Take-profit ──────────────────────────────────────────────────────
export {
	TakeProfitManager,
	LegStatus,
	distributeLegQuantities,
	isTakeProfitOrder,
	type CancelSummary,
	type DynamicTakeProfitSource,
	type PlacementSummary,
	type TakeProfitLeg,
	type TakeProfitManagerConfig,
} from "./take-profit/index.js";

// ── Entry ────────────────────────────────────────────────────────────
export {
	FixedProgressiveSpacing,
	createSpacingStrategy,
	evaluateEntryGate,
	sizeEntry,
	GateReason,
	type EntryVerdict,
	type FixedProgressiveParams,
	type SpacingContext,
	type SpacingStrategy,
} from "./entry/index.js";

// ── Lifecycle ────────────────────────────────────────────────────────
export {
	LoopCoordinator,
	LoopStateMachine,
	LoopState,
	HaltReason,
	TradeAction,
	CycleOutcome,
	ShutdownOutcome,
	type CycleStatus,
	type ShutdownReport,
	type SignalContext,
	type SignalSource,
	type LoopCoordinatorDeps,
} from "./lifecycle/index.js";

// ── Assembly ─────────────────────────────────────────────────────────
export { DcaBotBuilder, type DcaBot, type DcaBotComponents } from "./bot/index.js";
