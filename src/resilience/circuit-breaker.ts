import { TypedEmitter } from "../lib/events/index.js";
import { silentLogger } from "../lib/logger/index.js";
import type { Logger } from "../lib/logger/index.js";
import { CancelledError, CircuitOpenError } from "../shared/errors.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";
import { BreakerState, DEFAULT_BREAKER_CONFIG } from "./types.js";
import type { BreakerStats, BreakerTransition, CircuitBreakerConfig } from "./types.js";

type BreakerEvents = {
	stateChange: (transition: BreakerTransition) => void;
};

export interface CircuitBreakerDeps {
	readonly clock?: Clock | undefined;
	readonly logger?: Logger | undefined;
	/** Decides whether a thrown value counts against the breaker. Cancellations never do. */
	readonly isFailure?: ((error: unknown) => boolean) | undefined;
}

const countsAsFailure = (error: unknown): boolean => !(error instanceof CancelledError);

/**
 * Call-gating state machine shared by every call of one operation class.
 *
 * closed → open after `failureThreshold` consecutive failures, or at once with
 * a doubled timeout when `maxFailures` land inside one `resetTimeoutMs` window.
 * open → half_open once the timeout passes. half_open → closed after
 * `successThreshold` consecutive successes; any half-open failure reopens.
 *
 * Observers are notified on a microtask and cannot block a transition.
 *
 * @example
 * ```ts
 * const breaker = new CircuitBreaker("trading", { failureThreshold: 3 });
 * const order = await breaker.call(() => adapter.placeOrder(request));
 * ```
 */
export class CircuitBreaker {
	readonly name: string;
	private readonly config: CircuitBreakerConfig;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly isFailure: (error: unknown) => boolean;
	private readonly events: TypedEmitter<BreakerEvents>;

	private current: BreakerState = BreakerState.Closed;
	private failures = 0;
	private successes = 0;
	private windowFailures = 0;
	private windowStartMs: number;
	private nextAttemptAtMs: number | null = null;
	private lastFailureAtMs: number | null = null;
	private lastStateChangeAtMs: number;
	private totalRequests = 0;
	private totalFailures = 0;
	private totalSuccesses = 0;

	constructor(name: string, config: Partial<CircuitBreakerConfig> = {}, deps: CircuitBreakerDeps = {}) {
		this.name = name;
		this.config = { ...DEFAULT_BREAKER_CONFIG, ...config };
		this.clock = deps.clock ?? SystemClock;
		this.logger = (deps.logger ?? silentLogger()).child({ breaker: name });
		this.isFailure = deps.isFailure ?? countsAsFailure;
		this.events = new TypedEmitter<BreakerEvents>((event, error) => {
			this.logger.warn({ event, err: error }, "breaker observer failed");
		});
		this.windowStartMs = this.clock.now();
		this.lastStateChangeAtMs = this.windowStartMs;
	}

	get state(): BreakerState {
		return this.current;
	}

	/** True if a call would be admitted now; moves open → half_open once the timeout passed. */
	canExecute(): boolean {
		if (this.current === BreakerState.Open) {
			if (this.nextAttemptAtMs !== null && this.clock.now() >= this.nextAttemptAtMs) {
				this.toHalfOpen();
				return true;
			}
			return false;
		}
		return true;
	}

	/**
	 * Runs `fn` if admitted and records the outcome.
	 * @throws CircuitOpenError without invoking `fn` while open
	 */
	async call<T>(fn: () => Promise<T>): Promise<T> {
		if (!this.canExecute()) {
			throw new CircuitOpenError(this.name, this.nextAttemptAtMs ?? this.clock.now());
		}
		this.totalRequests++;
		try {
			const value = await fn();
			this.recordSuccess();
			return value;
		} catch (e) {
			if (this.isFailure(e)) this.recordFailure();
			throw e;
		}
	}

	recordSuccess(): void {
		this.totalSuccesses++;
		this.failures = 0;
		if (this.current === BreakerState.HalfOpen) {
			this.successes++;
			if (this.successes >= this.config.successThreshold) {
				this.toClosed();
			}
		}
	}

	recordFailure(): void {
		const now = this.clock.now();
		this.totalFailures++;
		this.lastFailureAtMs = now;
		this.failures++;
		this.successes = 0;

		if (now - this.windowStartMs >= this.config.resetTimeoutMs) {
			this.windowStartMs = now;
			this.windowFailures = 0;
		}
		this.windowFailures++;

		if (this.windowFailures >= this.config.maxFailures) {
			this.toOpen(this.config.timeoutMs * 2);
			return;
		}

		switch (this.current) {
			case BreakerState.Closed:
				if (this.failures >= this.config.failureThreshold) this.toOpen(this.config.timeoutMs);
				break;
			case BreakerState.HalfOpen:
				this.toOpen(this.config.timeoutMs);
				break;
			case BreakerState.Open:
				// late failure from a call admitted before reopening
				this.nextAttemptAtMs = now + this.config.timeoutMs;
				break;
		}
	}

	/** Registers a transition observer; returns an unsubscribe function. */
	onStateChange(listener: (transition: BreakerTransition) => void): () => void {
		this.events.on("stateChange", listener);
		return () => {
			this.events.off("stateChange", listener);
		};
	}

	/** Back to closed with every counter cleared. Lifetime totals are kept. */
	reset(): void {
		this.toClosed();
	}

	/** Opens immediately for one regular timeout. */
	forceOpen(): void {
		this.toOpen(this.config.timeoutMs);
	}

	stats(): BreakerStats {
		return {
			name: this.name,
			state: this.current,
			consecutiveFailures: this.failures,
			consecutiveSuccesses: this.successes,
			windowFailures: this.windowFailures,
			totalRequests: this.totalRequests,
			totalFailures: this.totalFailures,
			totalSuccesses: this.totalSuccesses,
			nextAttemptAtMs: this.nextAttemptAtMs,
			lastFailureAtMs: this.lastFailureAtMs,
			lastStateChangeAtMs: this.lastStateChangeAtMs,
		};
	}

	// ── Transitions ─────────────────────────────────────────────────

	private toOpen(timeoutMs: number): void {
		this.nextAttemptAtMs = this.clock.now() + timeoutMs;
		this.successes = 0;
		this.transition(BreakerState.Open);
	}

	private toHalfOpen(): void {
		this.successes = 0;
		this.transition(BreakerState.HalfOpen);
	}

	private toClosed(): void {
		this.failures = 0;
		this.successes = 0;
		this.windowFailures = 0;
		this.windowStartMs = this.clock.now();
		this.nextAttemptAtMs = null;
		this.transition(BreakerState.Closed);
	}

	private transition(to: BreakerState): void {
		const from = this.current;
		if (from === to) return;
		const atMs = this.clock.now();
		this.current = to;
		this.lastStateChangeAtMs = atMs;
		this.logger.info({ from, to, nextAttemptAtMs: this.nextAttemptAtMs }, "breaker state changed");
		this.events.emitDeferred("stateChange", { name: this.name, from, to, atMs });
	}
}
