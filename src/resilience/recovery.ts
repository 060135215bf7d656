/**
 * Recovery executor: categorized retry with backoff and statistical stops.
 *
 * Each failure is classified, recorded in the shared ErrorWindow, and then
 * either retried after a computed delay or surfaced to the caller. Stops are
 * independent of the circuit breaker: the breaker gates one operation class,
 * the window watches error patterns across all of them.
 */

import { silentLogger } from "../lib/logger/index.js";
import type { Logger } from "../lib/logger/index.js";
import { CancelledError, ErrorCategory, RateLimitError, classifyError } from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import type { Clock, Sleep } from "../shared/time.js";
import { SystemClock, sleep as timerSleep } from "../shared/time.js";
import { ErrorWindow } from "./error-window.js";
import { BackoffStrategy, DEFAULT_RECOVERY_CONFIG, StopReason } from "./types.js";
import type { RecoveryConfig, RecoveryDecision } from "./types.js";

export interface RecoveryDeps {
	readonly clock?: Clock | undefined;
	readonly sleep?: Sleep | undefined;
	readonly logger?: Logger | undefined;
	/** Shared across executors so danger patterns are seen process-wide. */
	readonly window?: ErrorWindow | undefined;
	/** Source of jitter in [0, 1). */
	readonly random?: (() => number) | undefined;
}

/** Partial config; per-category budgets may be overridden one at a time. */
export type RecoveryOverrides = Partial<Omit<RecoveryConfig, "maxRetries">> & {
	readonly maxRetries?: Partial<Record<ErrorCategory, number>> | undefined;
};

/** Merges overrides onto the defaults, including per-category budgets. */
export function resolveRecoveryConfig(overrides: RecoveryOverrides = {}): RecoveryConfig {
	return {
		...DEFAULT_RECOVERY_CONFIG,
		...overrides,
		maxRetries: { ...DEFAULT_RECOVERY_CONFIG.maxRetries, ...overrides.maxRetries },
	};
}

/**
 * Delay before retry number `retryIndex` (0 for the first retry).
 * @internal Exported for testing.
 */
export function computeDelay(
	error: TradingError,
	retryIndex: number,
	config: RecoveryConfig,
	random: () => number = Math.random,
): number {
	const base = error.category === ErrorCategory.RateLimit ? config.rateLimitBaseDelayMs : config.baseDelayMs;
	let delay =
		config.strategy === BackoffStrategy.Exponential
			? base * config.multiplier ** retryIndex
			: config.strategy === BackoffStrategy.Linear
				? base * (retryIndex + 1)
				: base;
	delay = Math.min(delay, config.maxDelayMs, config.maxBackoffMs);
	if (error instanceof RateLimitError) {
		delay = Math.max(delay, error.retryAfterMs);
	}
	if (config.jitterFactor > 0) {
		delay += delay * config.jitterFactor * random();
	}
	return Math.round(delay);
}

export class RecoveryExecutor {
	readonly config: RecoveryConfig;
	readonly window: ErrorWindow;
	private readonly clock: Clock;
	private readonly sleep: Sleep;
	private readonly logger: Logger;
	private readonly random: () => number;

	constructor(config: RecoveryOverrides = {}, deps: RecoveryDeps = {}) {
		this.config = resolveRecoveryConfig(config);
		this.window = deps.window ?? new ErrorWindow();
		this.clock = deps.clock ?? SystemClock;
		this.sleep = deps.sleep ?? timerSleep;
		this.logger = (deps.logger ?? silentLogger()).child({ component: "recovery" });
		this.random = deps.random ?? Math.random;
	}

	/**
	 * Decides what to do after the `failures`-th consecutive failure of one
	 * operation. The error must already be recorded in the window.
	 */
	evaluate(error: TradingError, failures: number): RecoveryDecision {
		const { config, window } = this;
		if (error.isFatal) return { action: "stop", reason: StopReason.Fatal };
		if (!error.retryable) return { action: "stop", reason: StopReason.NotRetryable };
		if (failures > config.maxRetries[error.category]) {
			return { action: "stop", reason: StopReason.BudgetExhausted };
		}
		if (window.count(error.category) >= config.hotCategoryLimit) {
			return { action: "stop", reason: StopReason.HotCategory };
		}
		if (window.credentialRate() > config.credentialRateLimit) {
			return { action: "stop", reason: StopReason.CredentialRate };
		}
		if (window.orderRate() > config.orderRateLimit && window.length > config.orderRateMinSample) {
			return { action: "stop", reason: StopReason.OrderRate };
		}
		return { action: "retry", delayMs: computeDelay(error, failures - 1, config, this.random) };
	}

	/**
	 * Runs `fn` until it succeeds or a stop condition holds.
	 *
	 * @example
	 * ```ts
	 * const result = await recovery.execute("gateway", "getPositions", () => adapter.getPositions("linear", "BTCUSDT"));
	 * if (!result.ok) logger.warn({ err: result.error }, "positions unavailable");
	 * ```
	 */
	async execute<T>(
		component: string,
		operation: string,
		fn: () => Promise<T>,
		signal?: AbortSignal,
	): Promise<Result<T, TradingError>> {
		let lastError: TradingError | undefined;
		for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
			if (signal?.aborted) {
				return err(new CancelledError(`${component}.${operation} cancelled`, { cause: lastError }));
			}
			try {
				return ok(await fn());
			} catch (e) {
				const error = classifyError(e);
				if (error instanceof CancelledError) return err(error);

				this.window.record(error, component, operation, this.clock.now());
				lastError = error;
				const log = { caller: component, operation, attempt, category: error.category, err: error.message };

				const decision = this.evaluate(error, attempt);
				if (decision.action === "stop") {
					this.logger.warn({ ...log, reason: decision.reason }, "giving up on operation");
					return err(error);
				}
				if (attempt === this.config.maxAttempts) break;

				this.logger.warn({ ...log, delayMs: decision.delayMs }, "retrying after failure");
				try {
					await this.sleep(decision.delayMs, signal);
				} catch (sleepError) {
					return err(classifyError(sleepError));
				}
			}
		}
		this.logger.warn(
			{ caller: component, operation, attempts: this.config.maxAttempts, reason: StopReason.MaxAttempts },
			"giving up on operation",
		);
		return err(lastError ?? new CancelledError(`${component}.${operation} made no attempt`));
	}
}
