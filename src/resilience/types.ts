/**
 * Resilience layer types: breaker states, operation classes, configs.
 */

import type { ErrorCategory } from "../shared/errors.js";

/** Call-gating states of a circuit breaker. */
export const BreakerState = {
	Closed: "closed",
	Open: "open",
	HalfOpen: "half_open",
} as const;

export type BreakerState = (typeof BreakerState)[keyof typeof BreakerState];

/** Venue call families; each gets its own breaker and limiter. */
export const OperationClass = {
	Trading: "trading",
	MarketData: "market_data",
	AccountData: "account_data",
} as const;

export type OperationClass = (typeof OperationClass)[keyof typeof OperationClass];

// ── Circuit breaker ──────────────────────────────────────────────────

export interface CircuitBreakerConfig {
	/** Consecutive failures that open a closed breaker. */
	readonly failureThreshold: number;
	/** Consecutive half-open successes that close the breaker. */
	readonly successThreshold: number;
	/** How long the breaker stays open before probing. */
	readonly timeoutMs: number;
	/** Failures within `resetTimeoutMs` that open the breaker with a doubled timeout. */
	readonly maxFailures: number;
	/** Length of the window counted against `maxFailures`. */
	readonly resetTimeoutMs: number;
}

export const DEFAULT_BREAKER_CONFIG: CircuitBreakerConfig = {
	failureThreshold: 5,
	successThreshold: 3,
	timeoutMs: 30_000,
	maxFailures: 10,
	resetTimeoutMs: 300_000,
};

export interface BreakerStats {
	readonly name: string;
	readonly state: BreakerState;
	readonly consecutiveFailures: number;
	readonly consecutiveSuccesses: number;
	readonly windowFailures: number;
	readonly totalRequests: number;
	readonly totalFailures: number;
	readonly totalSuccesses: number;
	readonly nextAttemptAtMs: number | null;
	readonly lastFailureAtMs: number | null;
	readonly lastStateChangeAtMs: number;
}

export interface BreakerTransition {
	readonly name: string;
	readonly from: BreakerState;
	readonly to: BreakerState;
	readonly atMs: number;
}

// ── Rate limiter ─────────────────────────────────────────────────────

export interface RateLimiterConfig {
	/** Bucket size; also the largest request `waitN` accepts. */
	readonly capacity: number;
	/** Tokens added per whole elapsed second. */
	readonly refillRate: number;
}

export interface RateLimiterStats {
	readonly tokens: number;
	readonly hits: number;
	readonly misses: number;
	readonly waits: number;
}

// ── Recovery ─────────────────────────────────────────────────────────

export const BackoffStrategy = {
	Exponential: "exponential",
	Linear: "linear",
	Fixed: "fixed",
} as const;

export type BackoffStrategy = (typeof BackoffStrategy)[keyof typeof BackoffStrategy];

export interface RecoveryConfig {
	/** Hard cap on attempts per operation, whatever the category budget. */
	readonly maxAttempts: number;
	/** Retries allowed per category after the first failure. */
	readonly maxRetries: Readonly<Record<ErrorCategory, number>>;
	readonly baseDelayMs: number;
	/** Base delay for rate-limit errors. */
	readonly rateLimitBaseDelayMs: number;
	readonly maxDelayMs: number;
	readonly strategy: BackoffStrategy;
	/** Exponential growth factor. */
	readonly multiplier: number;
	readonly maxBackoffMs: number;
	/** Adds up to `jitterFactor` of the delay on top; 0 disables. */
	readonly jitterFactor: number;
	/** Errors of one category in the rolling window that stop retries. */
	readonly hotCategoryLimit: number;
	/** Credential share of the window above which retries stop. */
	readonly credentialRateLimit: number;
	/** Order-error share of the window above which retries stop... */
	readonly orderRateLimit: number;
	/** ...once the window holds more than this many errors. */
	readonly orderRateMinSample: number;
}

export const DEFAULT_RECOVERY_CONFIG: RecoveryConfig = {
	maxAttempts: 10,
	maxRetries: {
		network: 5,
		timeout: 3,
		temporary: 3,
		rate_limit: 10,
		order: 2,
		position: 3,
		strategy: 1,
		credentials: 0,
		fatal: 0,
	},
	baseDelayMs: 1_000,
	rateLimitBaseDelayMs: 30_000,
	maxDelayMs: 30_000,
	strategy: BackoffStrategy.Exponential,
	multiplier: 1.5,
	maxBackoffMs: 300_000,
	jitterFactor: 0.1,
	hotCategoryLimit: 10,
	credentialRateLimit: 0.5,
	orderRateLimit: 0.8,
	orderRateMinSample: 10,
};

/** Outcome of one failure evaluation. */
export type RecoveryDecision =
	| { readonly action: "retry"; readonly delayMs: number }
	| { readonly action: "stop"; readonly reason: StopReason };

export const StopReason = {
	Fatal: "fatal",
	NotRetryable: "not_retryable",
	BudgetExhausted: "budget_exhausted",
	HotCategory: "hot_category",
	CredentialRate: "credential_rate",
	OrderRate: "order_rate",
	MaxAttempts: "max_attempts",
	Cancelled: "cancelled",
} as const;

export type StopReason = (typeof StopReason)[keyof typeof StopReason];
