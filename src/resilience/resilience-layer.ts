/**
 * ResilienceLayer: one breaker, one limiter and a shared recovery executor
 * per venue operation class.
 *
 * A guarded call waits for a token, passes the breaker, and is bounded by a
 * timeout; unless retries are disabled, the whole sequence is wrapped in the
 * recovery executor. Nothing here throws: every call resolves to a Result.
 */

import { silentLogger } from "../lib/logger/index.js";
import type { Logger } from "../lib/logger/index.js";
import { TimeoutError } from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import { attempt } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import type { Clock, Sleep } from "../shared/time.js";
import type { CircuitBreaker } from "./circuit-breaker.js";
import type { ErrorWindowSnapshot } from "./error-window.js";
import { RecoveryExecutor } from "./recovery.js";
import type { RecoveryOverrides } from "./recovery.js";
import { CircuitBreakerRegistry, RateLimiterRegistry } from "./registry.js";
import type { TokenBucketRateLimiter } from "./rate-limiter.js";
import { OperationClass } from "./types.js";
import type { BreakerStats, CircuitBreakerConfig, RateLimiterConfig, RateLimiterStats } from "./types.js";

export interface OperationPolicy {
	readonly limiter: RateLimiterConfig;
	readonly breaker: Partial<CircuitBreakerConfig>;
	readonly timeoutMs: number;
}

export const DEFAULT_POLICIES: Readonly<Record<OperationClass, OperationPolicy>> = {
	[OperationClass.Trading]: {
		limiter: { capacity: 10, refillRate: 10 },
		breaker: { failureThreshold: 5, successThreshold: 3, timeoutMs: 30_000 },
		timeoutMs: 30_000,
	},
	[OperationClass.MarketData]: {
		limiter: { capacity: 20, refillRate: 20 },
		breaker: { failureThreshold: 5, successThreshold: 2, timeoutMs: 15_000 },
		timeoutMs: 30_000,
	},
	[OperationClass.AccountData]: {
		limiter: { capacity: 10, refillRate: 10 },
		breaker: { failureThreshold: 5, successThreshold: 2, timeoutMs: 30_000 },
		timeoutMs: 30_000,
	},
};

export interface ResilienceDeps {
	readonly clock?: Clock | undefined;
	readonly sleep?: Sleep | undefined;
	readonly logger?: Logger | undefined;
	readonly random?: (() => number) | undefined;
	readonly policies?: Partial<Record<OperationClass, Partial<OperationPolicy>>> | undefined;
	readonly recovery?: RecoveryOverrides | undefined;
}

export interface RunOptions {
	/** Per-call deadline; defaults to the class policy. */
	readonly timeoutMs?: number | undefined;
	/** `false` runs a single guarded attempt without the recovery executor. */
	readonly retry?: boolean | undefined;
	readonly signal?: AbortSignal | undefined;
}

export interface ResilienceHealth {
	readonly breakers: ReadonlyMap<string, BreakerStats>;
	readonly limiters: ReadonlyMap<string, RateLimiterStats>;
	readonly openCircuits: readonly string[];
	readonly errors: ErrorWindowSnapshot;
}

/**
 * Rejects with TimeoutError if `promise` has not settled within `ms`.
 * The underlying work is not aborted; a late settlement is ignored.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
	let timer: ReturnType<typeof setTimeout> | undefined;
	const deadline = new Promise<never>((_, reject) => {
		timer = setTimeout(() => reject(new TimeoutError(`${label} timed out after ${ms}ms`, { timeoutMs: ms })), ms);
	});
	return Promise.race([promise, deadline]).finally(() => clearTimeout(timer));
}

export class ResilienceLayer {
	readonly breakers: CircuitBreakerRegistry;
	readonly limiters: RateLimiterRegistry;
	readonly recovery: RecoveryExecutor;
	private readonly policies: Record<OperationClass, OperationPolicy>;

	constructor(deps: ResilienceDeps = {}) {
		const logger = deps.logger ?? silentLogger();
		this.policies = {
			trading: mergePolicy(OperationClass.Trading, deps.policies),
			market_data: mergePolicy(OperationClass.MarketData, deps.policies),
			account_data: mergePolicy(OperationClass.AccountData, deps.policies),
		};
		this.breakers = new CircuitBreakerRegistry({ clock: deps.clock, logger });
		this.limiters = new RateLimiterRegistry({ clock: deps.clock, sleep: deps.sleep });
		this.recovery = new RecoveryExecutor(deps.recovery, {
			clock: deps.clock,
			sleep: deps.sleep,
			logger,
			random: deps.random,
		});
		for (const cls of Object.values(OperationClass)) {
			this.breaker(cls);
			this.limiter(cls);
		}
	}

	breaker(cls: OperationClass): CircuitBreaker {
		return this.breakers.getOrCreate(cls, this.policies[cls].breaker);
	}

	limiter(cls: OperationClass): TokenBucketRateLimiter {
		return this.limiters.getOrCreate(cls, this.policies[cls].limiter);
	}

	/**
	 * Runs a venue call under the class's limiter, breaker and timeout.
	 *
	 * @example
	 * ```ts
	 * const price = await layer.run("market_data", "gateway", "getLatestPrice", () => adapter.getLatestPrice("BTCUSDT"));
	 * ```
	 */
	run<T>(
		cls: OperationClass,
		component: string,
		operation: string,
		fn: () => Promise<T>,
		options: RunOptions = {},
	): Promise<Result<T, TradingError>> {
		const timeoutMs = options.timeoutMs ?? this.policies[cls].timeoutMs;
		const limiter = this.limiter(cls);
		const breaker = this.breaker(cls);
		const guarded = async (): Promise<T> => {
			await limiter.waitN(1, options.signal);
			return breaker.call(() => withTimeout(fn(), timeoutMs, `${component}.${operation}`));
		};
		if (options.retry === false) {
			return attempt(guarded);
		}
		return this.recovery.execute(component, operation, guarded, options.signal);
	}

	health(): ResilienceHealth {
		return {
			breakers: this.breakers.allStats(),
			limiters: this.limiters.allStats(),
			openCircuits: this.breakers.openCircuits(),
			errors: this.recovery.window.snapshot(),
		};
	}
}

function mergePolicy(
	cls: OperationClass,
	overrides: ResilienceDeps["policies"],
): OperationPolicy {
	const base = DEFAULT_POLICIES[cls];
	const override = overrides?.[cls];
	return {
		limiter: override?.limiter ?? base.limiter,
		breaker: { ...base.breaker, ...override?.breaker },
		timeoutMs: override?.timeoutMs ?? base.timeoutMs,
	};
}
