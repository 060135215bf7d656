/**
 * TradingError hierarchy: structured error classification.
 *
 * Every error carries a category and a retryable flag. The category selects the
 * retry budget and backoff in the recovery executor; the flag decides whether a
 * retry is attempted at all.
 */

/** Error categories that drive retry budgets and stop decisions. */
export const ErrorCategory = {
	Network: "network",
	Timeout: "timeout",
	Temporary: "temporary",
	RateLimit: "rate_limit",
	Order: "order",
	Position: "position",
	Strategy: "strategy",
	Credentials: "credentials",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Categories retried by default when a subclass does not say otherwise. */
const RETRYABLE_BY_DEFAULT: ReadonlySet<ErrorCategory> = new Set<ErrorCategory>([
	ErrorCategory.Network,
	ErrorCategory.Timeout,
	ErrorCategory.Temporary,
	ErrorCategory.RateLimit,
	ErrorCategory.Order,
	ErrorCategory.Position,
	ErrorCategory.Strategy,
]);

/** Options for constructing TradingError subclasses with optional cause chain. */
interface TradingErrorOptions {
	readonly cause?: unknown;
}

type ErrorContext = Record<string, unknown> & TradingErrorOptions;

/** Base error class for all trading operations. */
export class TradingError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;
	readonly retryable: boolean;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
		options: { readonly retryable?: boolean | undefined; readonly hint?: string | undefined } = {},
	) {
		super(message);
		this.name = "TradingError";
		this.category = category;
		this.code = code;
		this.context = context;
		this.hint = options.hint;
		this.retryable = options.retryable ?? RETRYABLE_BY_DEFAULT.has(category);
	}

	get isRetryable(): boolean {
		return this.retryable;
	}

	/** Fatal errors stop every retry sequence immediately. Credentials count as fatal. */
	get isFatal(): boolean {
		return this.category === ErrorCategory.Fatal || this.category === ErrorCategory.Credentials;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			...(this.hint !== undefined && { hint: this.hint }),
			retryable: this.retryable,
			context: this.context,
		};
	}
}

function split(context: ErrorContext): { cause: unknown; rest: Record<string, unknown> } {
	const { cause, ...rest } = context;
	return { cause, rest };
}

// ── Specific error types ─────────────────────────────────────────────

/** Connectivity failure: refused, reset, DNS. */
export class NetworkError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = split(context);
		super(message, "NETWORK_ERROR", ErrorCategory.Network, rest);
		this.name = "NetworkError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** A call exceeded its deadline. */
export class TimeoutError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = split(context);
		super(message, "TIMEOUT_ERROR", ErrorCategory.Timeout, rest);
		this.name = "TimeoutError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Transient venue-side failure (5xx, maintenance, unknown but recoverable). */
export class TemporaryError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = split(context);
		super(message, "TEMPORARY_ERROR", ErrorCategory.Temporary, rest);
		this.name = "TemporaryError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Venue throttled the request; includes retry-after hint. */
export class RateLimitError extends TradingError {
	readonly retryAfterMs: number;
	constructor(message: string, retryAfterMs: number, context: ErrorContext = {}) {
		const { cause, rest } = split(context);
		super(message, "RATE_LIMIT_ERROR", ErrorCategory.RateLimit, rest);
		this.name = "RateLimitError";
		this.retryAfterMs = retryAfterMs;
		if (cause !== undefined) this.cause = cause;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			retryAfterMs: this.retryAfterMs,
		};
	}
}

/** Order placement or cancellation failed. */
export class OrderError extends TradingError {
	constructor(
		message: string,
		context: ErrorContext = {},
		options: { readonly retryable?: boolean; readonly code?: string } = {},
	) {
		const { cause, rest } = split(context);
		super(message, options.code ?? "ORDER_ERROR", ErrorCategory.Order, rest, {
			retryable: options.retryable ?? true,
		});
		this.name = "OrderError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Position data missing or inconsistent. */
export class PositionError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = split(context);
		super(message, "POSITION_ERROR", ErrorCategory.Position, rest);
		this.name = "PositionError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** An external strategy function failed. */
export class StrategyError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = split(context);
		super(message, "STRATEGY_ERROR", ErrorCategory.Strategy, rest);
		this.name = "StrategyError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Authentication or authorization failure. Never retried. */
export class CredentialsError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = split(context);
		super(message, "CREDENTIALS_ERROR", ErrorCategory.Credentials, rest, {
			hint: "Check the venue API key and secret",
		});
		this.name = "CredentialsError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Unrecoverable internal failure. */
export class FatalError extends TradingError {
	constructor(message: string, context: ErrorContext = {}, code = "FATAL_ERROR") {
		const { cause, rest } = split(context);
		super(message, code, ErrorCategory.Fatal, rest);
		this.name = "FatalError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Invalid or missing configuration. */
export class ConfigError extends FatalError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, context, "CONFIG_ERROR");
		this.name = "ConfigError";
	}
}

/** The circuit breaker rejected the call without invoking it. */
export class CircuitOpenError extends TradingError {
	readonly breaker: string;
	readonly retryAtMs: number;
	constructor(breaker: string, retryAtMs: number) {
		super(
			`circuit breaker ${breaker} is open`,
			"CIRCUIT_OPEN",
			ErrorCategory.Temporary,
			{ breaker, retryAtMs },
			{ retryable: false },
		);
		this.name = "CircuitOpenError";
		this.breaker = breaker;
		this.retryAtMs = retryAtMs;
	}
}

/** The caller's stop signal fired before the operation finished. */
export class CancelledError extends TradingError {
	constructor(message = "operation cancelled", context: ErrorContext = {}) {
		const { cause, rest } = split(context);
		super(message, "CANCELLED", ErrorCategory.Temporary, rest, { retryable: false });
		this.name = "CancelledError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Classification helper ────────────────────────────────────────────

function readStatus(value: unknown): number | undefined {
	if (typeof value !== "object" || value === null) return undefined;
	const status = "status" in value ? value.status : undefined;
	if (typeof status === "number" && status >= 400) return status;
	const ctx = "context" in value ? value.context : undefined;
	if (typeof ctx === "object" && ctx !== null && "status" in ctx) {
		const nested = ctx.status;
		if (typeof nested === "number" && nested >= 400) return nested;
	}
	return undefined;
}

/** Extract HTTP status from the error, its context, or its cause. */
function getHttpStatus(error: Error): number | undefined {
	return readStatus(error) ?? readStatus(error.cause);
}

function getErrnoCode(error: Error): string | undefined {
	const code = "code" in error ? error.code : undefined;
	return typeof code === "string" ? code : undefined;
}

function includesAny(haystack: string, needles: readonly string[]): boolean {
	return needles.some((n) => haystack.includes(n));
}

/** Classify an unknown thrown value into the appropriate TradingError subtype. */
export function classifyError(error: unknown): TradingError {
	if (error instanceof TradingError) return error;
	if (!(error instanceof Error)) {
		return new FatalError(String(error), { cause: error }, "UNKNOWN_ERROR");
	}

	const msg = error.message.toLowerCase();
	const code = getErrnoCode(error);
	const status = getHttpStatus(error);

	if (status === 429) return new RateLimitError(error.message, 1000, { cause: error, status });
	if (status === 401 || status === 403) return new CredentialsError(error.message, { cause: error, status });
	if (status !== undefined && status >= 500) return new TemporaryError(error.message, { cause: error, status });

	if (code === "ETIMEDOUT") return new TimeoutError(error.message, { cause: error });
	if (code === "ECONNREFUSED" || code === "ENOTFOUND" || code === "ECONNRESET") {
		return new NetworkError(error.message, { cause: error });
	}

	if (includesAny(msg, ["timeout", "timed out", "deadline exceeded"])) {
		return new TimeoutError(error.message, { cause: error });
	}
	if (includesAny(msg, ["connection", "network", "dns", "dial", "econnrefused", "enotfound", "fetch failed", "socket hang up"])) {
		return new NetworkError(error.message, { cause: error });
	}
	if (includesAny(msg, ["api key", "api secret", "authentication", "unauthorized", "invalid signature"])) {
		return new CredentialsError(error.message, { cause: error });
	}
	if (includesAny(msg, ["rate limit", "too many requests", "429"])) {
		return new RateLimitError(error.message, 1000, { cause: error });
	}
	if (includesAny(msg, ["order not exists", "does not exist", "not found"])) {
		return new OrderError(error.message, { cause: error }, { retryable: false, code: "ORDER_NOT_FOUND" });
	}
	if (includesAny(msg, ["insufficient", "balance"])) {
		return new OrderError(error.message, { cause: error }, { retryable: false, code: "INSUFFICIENT_BALANCE" });
	}
	if (includesAny(msg, ["invalid", "constraint", "minimum", "maximum"])) {
		return new OrderError(error.message, { cause: error }, { retryable: false, code: "INVALID_PARAMETERS" });
	}
	return new TemporaryError(error.message, { cause: error });
}

// ── Type guards ──────────────────────────────────────────────────────

export function isCredentialsError(e: unknown): e is CredentialsError {
	return e instanceof CredentialsError;
}
