export {
	type VenueOrderId,
	type TradingSymbol,
	venueOrderId,
	tradingSymbol,
} from "./identifiers.js";

export { type Result, ok, err, map, unwrap, unwrapOr, isOk, isErr, attempt } from "./result.js";

export {
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
} from "./errors.js";

export { Decimal, type DecimalInput } from "./decimal.js";
export { type Clock, type Sleep, SystemClock, FakeClock, Duration, sleep, fakeSleep } from "./time.js";
export {
	type BotConfig,
	type BotConfigInput,
	type IntervalLabel,
	type TakeProfitSettings,
	BotConfigSchema,
	SUPPORTED_INTERVALS,
	configFromEnv,
	loadConfig,
} from "./config.js";
