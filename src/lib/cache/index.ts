import type { Result } from "../../shared/result.js";
import type { Clock } from "../../shared/time.js";
import { SystemClock } from "../../shared/time.js";

export interface CacheConfig {
	/** Time-to-live in milliseconds. */
	readonly ttlMs: number;
	/** Injectable clock for deterministic testing. Defaults to SystemClock. */
	readonly clock?: Clock | undefined;
}

interface CacheEntry<T> {
	readonly value: T;
	readonly expiresAt: number;
}

/**
 * TTL cache for slow-changing venue metadata such as trading constraints.
 *
 * `getOrLoad` stores only successful results; a failed load is returned to
 * the caller and the next call tries again.
 *
 * @example
 * ```ts
 * const cache = new TtlCache<TradingConstraints>({ ttlMs: 300_000 });
 * const constraints = await cache.getOrLoad("linear:BTCUSDT", () => gateway.fetchConstraints());
 * ```
 */
export class TtlCache<T> {
	private readonly entries = new Map<string, CacheEntry<T>>();
	private readonly ttlMs: number;
	private readonly clock: Clock;

	constructor(config: CacheConfig) {
		this.ttlMs = config.ttlMs;
		this.clock = config.clock ?? SystemClock;
	}

	/** Returns the live value for `key`, dropping it if expired. */
	get(key: string): T | undefined {
		const entry = this.entries.get(key);
		if (!entry) return undefined;
		if (this.clock.now() >= entry.expiresAt) {
			this.entries.delete(key);
			return undefined;
		}
		return entry.value;
	}

	set(key: string, value: T): void {
		this.entries.set(key, { value, expiresAt: this.clock.now() + this.ttlMs });
	}

	async getOrLoad<E>(key: string, loader: () => Promise<Result<T, E>>): Promise<Result<T, E>> {
		const cached = this.get(key);
		if (cached !== undefined) return { ok: true, value: cached };
		const loaded = await loader();
		if (loaded.ok) this.set(key, loaded.value);
		return loaded;
	}

	invalidate(key: string): void {
		this.entries.delete(key);
	}

	get size(): number {
		return this.entries.size;
	}
}
