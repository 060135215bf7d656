/**
 * Result<T, E>: explicit error values for domain operations.
 *
 * Venue adapters may throw; everything above the gateway returns Result.
 * `attempt` is the bridge: it runs a throwing function and classifies
 * whatever it throws into a TradingError.
 */

import { classifyError } from "./errors.js";
import type { TradingError } from "./errors.js";

/** Discriminated union for fallible operations -- `ok: true` carries a value, `ok: false` carries an error. */
export type Result<T, E = TradingError> =
	| { readonly ok: true; readonly value: T }
	| { readonly ok: false; readonly error: E };

// ── Factories ────────────────────────────────────────────────────────

export function ok<T>(value: T): Result<T, never> {
	return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
	return { ok: false, error };
}

// ── Combinators ──────────────────────────────────────────────────────

/** Transform the success value of a Result, leaving errors untouched. */
export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
	return result.ok ? ok(fn(result.value)) : result;
}

/** Extract the success value or throw the error. Use at system boundaries only. */
export function unwrap<T, E>(result: Result<T, E>): T {
	if (result.ok) return result.value;
	throw result.error instanceof Error ? result.error : new Error(String(result.error));
}

/** Extract the success value or return the provided fallback on error. */
export function unwrapOr<T, E>(result: Result<T, E>, fallback: T): T {
	return result.ok ? result.value : fallback;
}

export function isOk<T, E>(
	result: Result<T, E>,
): result is { readonly ok: true; readonly value: T } {
	return result.ok;
}

export function isErr<T, E>(
	result: Result<T, E>,
): result is { readonly ok: false; readonly error: E } {
	return !result.ok;
}

// ── Boundary wrapper ─────────────────────────────────────────────────

/** Run an async function, classifying anything it throws. */
export async function attempt<T>(fn: () => Promise<T>): Promise<Result<T, TradingError>> {
	try {
		return ok(await fn());
	} catch (e) {
		return err(classifyError(e));
	}
}
