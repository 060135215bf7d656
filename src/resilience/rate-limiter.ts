import { CancelledError, ConfigError, RateLimitError } from "../shared/errors.js";
import type { Clock, Sleep } from "../shared/time.js";
import { SystemClock, sleep as timerSleep } from "../shared/time.js";
import type { RateLimiterConfig, RateLimiterStats } from "./types.js";

/** Added to every computed wait to absorb timer jitter. */
export const WAIT_BUFFER_MS = 100;

export interface RateLimiterDeps {
	readonly clock?: Clock | undefined;
	readonly sleep?: Sleep | undefined;
}

/**
 * Token-bucket rate limiter with whole-second refill.
 *
 * Tokens are integers. A refill adds `floor(elapsedSeconds) × refillRate`,
 * capped at capacity, and moves the refill mark to now: the sub-second
 * remainder is discarded, so a caller polling faster than once per second
 * never earns tokens from the fraction. This under-refills at sub-1 Hz rates
 * and is kept conservative on purpose.
 *
 * @example
 * ```ts
 * const limiter = new TokenBucketRateLimiter({ capacity: 10, refillRate: 10 });
 * if (limiter.allow()) await fetchPrice();
 * await limiter.waitN(1, stop.signal);
 * ```
 */
export class TokenBucketRateLimiter {
	private readonly capacity: number;
	private readonly refillRate: number;
	private readonly clock: Clock;
	private readonly sleep: Sleep;
	private tokens: number;
	private lastRefillMs: number;

	private hits = 0;
	private misses = 0;
	private waits = 0;

	constructor(config: RateLimiterConfig, deps: RateLimiterDeps = {}) {
		if (!Number.isInteger(config.capacity) || config.capacity < 1) {
			throw new ConfigError("capacity must be an integer >= 1", { capacity: config.capacity });
		}
		if (!Number.isInteger(config.refillRate) || config.refillRate < 0) {
			throw new ConfigError("refillRate must be an integer >= 0", { refillRate: config.refillRate });
		}
		this.capacity = config.capacity;
		this.refillRate = config.refillRate;
		this.clock = deps.clock ?? SystemClock;
		this.sleep = deps.sleep ?? timerSleep;
		this.tokens = config.capacity;
		this.lastRefillMs = this.clock.now();
	}

	allow(): boolean {
		return this.allowN(1);
	}

	/** Consumes `n` tokens if all of them are available; never partially. */
	allowN(n: number): boolean {
		this.refill();
		if (this.tokens >= n) {
			this.tokens -= n;
			this.hits++;
			return true;
		}
		this.misses++;
		return false;
	}

	/**
	 * Suspends until `n` tokens are consumed.
	 * @throws RateLimitError when `n` can never be satisfied
	 * @throws CancelledError when `signal` aborts first
	 */
	async waitN(n: number, signal?: AbortSignal): Promise<void> {
		if (n > this.capacity) {
			throw new RateLimitError(`requested ${n} tokens exceeds capacity ${this.capacity}`, 0, {
				requested: n,
				capacity: this.capacity,
			});
		}
		let counted = false;
		for (;;) {
			if (signal?.aborted) throw new CancelledError("rate limiter wait cancelled");
			if (this.allowN(n)) return;
			const waitMs = this.waitTimeMs(n);
			if (!Number.isFinite(waitMs)) {
				throw new RateLimitError("rate limiter has no refill and too few tokens", 0, {
					requested: n,
					tokens: this.tokens,
				});
			}
			if (!counted) {
				this.waits++;
				counted = true;
			}
			await this.sleep(waitMs, signal);
		}
	}

	wait(signal?: AbortSignal): Promise<void> {
		return this.waitN(1, signal);
	}

	/** Milliseconds until `n` tokens could be available; 0 if they are now. */
	waitTimeMs(n: number): number {
		this.refill();
		const shortfall = n - this.tokens;
		if (shortfall <= 0) return 0;
		if (this.refillRate === 0) return Number.POSITIVE_INFINITY;
		return Math.ceil((shortfall / this.refillRate) * 1000) + WAIT_BUFFER_MS;
	}

	availableTokens(): number {
		this.refill();
		return this.tokens;
	}

	stats(): RateLimiterStats {
		return { tokens: this.tokens, hits: this.hits, misses: this.misses, waits: this.waits };
	}

	private refill(): void {
		const now = this.clock.now();
		const elapsedSeconds = Math.floor((now - this.lastRefillMs) / 1000);
		if (elapsedSeconds < 1) return;
		this.tokens = Math.min(this.capacity, this.tokens + elapsedSeconds * this.refillRate);
		this.lastRefillMs = now;
	}
}
