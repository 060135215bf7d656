export { CircuitBreaker } from "./circuit-breaker.js";
export type { CircuitBreakerDeps } from "./circuit-breaker.js";
export { ErrorWindow, DEFAULT_ERROR_WINDOW_SIZE } from "./error-window.js";
export type { ErrorRecord, ErrorWindowSnapshot } from "./error-window.js";
export { TokenBucketRateLimiter, WAIT_BUFFER_MS } from "./rate-limiter.js";
export type { RateLimiterDeps } from "./rate-limiter.js";
export { RecoveryExecutor, computeDelay, resolveRecoveryConfig } from "./recovery.js";
export type { RecoveryDeps, RecoveryOverrides } from "./recovery.js";
export { CircuitBreakerRegistry, RateLimiterRegistry } from "./registry.js";
export type { RegistryDeps } from "./registry.js";
export { DEFAULT_POLICIES, ResilienceLayer, withTimeout } from "./resilience-layer.js";
export type { OperationPolicy, ResilienceDeps, ResilienceHealth, RunOptions } from "./resilience-layer.js";
export {
	BackoffStrategy,
	BreakerState,
	DEFAULT_BREAKER_CONFIG,
	DEFAULT_RECOVERY_CONFIG,
	OperationClass,
	StopReason,
} from "./types.js";
export type {
	BreakerStats,
	BreakerTransition,
	CircuitBreakerConfig,
	RateLimiterConfig,
	RateLimiterStats,
	RecoveryConfig,
	RecoveryDecision,
} from "./types.js";
