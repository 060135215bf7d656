import type { Logger } from "../lib/logger/index.js";
import type { Clock, Sleep } from "../shared/time.js";
import { CircuitBreaker } from "./circuit-breaker.js";
import { TokenBucketRateLimiter } from "./rate-limiter.js";
import { BreakerState } from "./types.js";
import type { BreakerStats, CircuitBreakerConfig, RateLimiterConfig, RateLimiterStats } from "./types.js";

export interface RegistryDeps {
	readonly clock?: Clock | undefined;
	readonly sleep?: Sleep | undefined;
	readonly logger?: Logger | undefined;
}

/**
 * Named circuit breakers shared by every caller of an operation class.
 *
 * Note: first registration wins; later `getOrCreate` calls for the same name
 * return the existing breaker and ignore their config. Creation is synchronous,
 * so two callers can never build duplicates.
 */
export class CircuitBreakerRegistry {
	private readonly breakers = new Map<string, CircuitBreaker>();
	private readonly deps: RegistryDeps;

	constructor(deps: RegistryDeps = {}) {
		this.deps = deps;
	}

	getOrCreate(name: string, config: Partial<CircuitBreakerConfig> = {}): CircuitBreaker {
		const existing = this.breakers.get(name);
		if (existing) return existing;
		const breaker = new CircuitBreaker(name, config, { clock: this.deps.clock, logger: this.deps.logger });
		this.breakers.set(name, breaker);
		return breaker;
	}

	get(name: string): CircuitBreaker | undefined {
		return this.breakers.get(name);
	}

	/** Names of breakers currently rejecting calls. */
	openCircuits(): string[] {
		return [...this.breakers.values()].filter((b) => b.state === BreakerState.Open).map((b) => b.name);
	}

	hasOpenCircuits(): boolean {
		return this.openCircuits().length > 0;
	}

	allStats(): ReadonlyMap<string, BreakerStats> {
		const stats = new Map<string, BreakerStats>();
		for (const [name, breaker] of this.breakers) {
			stats.set(name, breaker.stats());
		}
		return stats;
	}

	resetAll(): void {
		for (const breaker of this.breakers.values()) {
			breaker.reset();
		}
	}
}

/** Named token buckets; same first-registration-wins rule as the breaker registry. */
export class RateLimiterRegistry {
	private readonly limiters = new Map<string, TokenBucketRateLimiter>();
	private readonly deps: RegistryDeps;

	constructor(deps: RegistryDeps = {}) {
		this.deps = deps;
	}

	getOrCreate(name: string, config: RateLimiterConfig): TokenBucketRateLimiter {
		const existing = this.limiters.get(name);
		if (existing) return existing;
		const limiter = new TokenBucketRateLimiter(config, { clock: this.deps.clock, sleep: this.deps.sleep });
		this.limiters.set(name, limiter);
		return limiter;
	}

	get(name: string): TokenBucketRateLimiter | undefined {
		return this.limiters.get(name);
	}

	allStats(): ReadonlyMap<string, RateLimiterStats> {
		const stats = new Map<string, RateLimiterStats>();
		for (const [name, limiter] of this.limiters) {
			stats.set(name, limiter.stats());
		}
		return stats;
	}
}
