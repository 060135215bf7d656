/**
 * Time utilities: injectable clock and cancellable sleep.
 *
 * All code reads time through Clock.now() and suspends through a Sleep
 * function, so tests can drive both without real timers.
 */

import { CancelledError } from "./errors.js";

/** Injectable time source -- code depends on this instead of `Date.now()`. */
export interface Clock {
	now(): number;
}

/** Production clock backed by `Date.now()`. */
export const SystemClock: Clock = {
	now: () => Date.now(),
};

/** Controllable clock for deterministic testing -- advance time manually with `advance()`. */
export class FakeClock implements Clock {
	private time: number;

	constructor(startMs = 0) {
		this.time = startMs;
	}

	now(): number {
		return this.time;
	}

	advance(ms: number): void {
		this.time += ms;
	}

	set(ms: number): void {
		this.time = ms;
	}
}

// ── Sleep ────────────────────────────────────────────────────────────

/** Suspends for `ms` or until `signal` aborts; rejects with CancelledError on abort. */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Timer-backed sleep used outside tests. */
export const sleep: Sleep = (ms, signal) =>
	new Promise<void>((resolve, reject) => {
		if (signal?.aborted) {
			reject(new CancelledError("sleep cancelled"));
			return;
		}
		const onAbort = (): void => {
			clearTimeout(timer);
			reject(new CancelledError("sleep cancelled"));
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, Math.max(0, ms));
		signal?.addEventListener("abort", onAbort, { once: true });
	});

/**
 * Sleep that advances a FakeClock instead of waiting, recording each request.
 *
 * @example
 * const clock = new FakeClock();
 * const fake = fakeSleep(clock);
 * await fake.sleep(500);
 * fake.calls; // [500]
 */
export function fakeSleep(clock: FakeClock): { readonly sleep: Sleep; readonly calls: number[] } {
	const calls: number[] = [];
	return {
		calls,
		sleep: async (ms, signal) => {
			if (signal?.aborted) throw new CancelledError("sleep cancelled");
			calls.push(ms);
			clock.advance(ms);
		},
	};
}

// ── Duration helpers ─────────────────────────────────────────────────

/** Helpers to convert human-readable durations to milliseconds. */
export const Duration = {
	ms: (n: number) => n,
	seconds: (n: number) => n * 1_000,
	minutes: (n: number) => n * 60_000,
	hours: (n: number) => n * 3_600_000,
	days: (n: number) => n * 86_400_000,
} as const;
