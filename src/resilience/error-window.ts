import { ErrorCategory } from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";

/** One categorized failure as remembered by the window. */
export interface ErrorRecord {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly component: string;
	readonly operation: string;
	readonly atMs: number;
}

export interface ErrorWindowSnapshot {
	readonly recent: readonly ErrorRecord[];
	readonly lifetimeTotal: number;
	readonly lifetimeByCategory: Readonly<Record<ErrorCategory, number>>;
}

export const DEFAULT_ERROR_WINDOW_SIZE = 50;

function zeroCounts(): Record<ErrorCategory, number> {
	return {
		network: 0,
		timeout: 0,
		temporary: 0,
		rate_limit: 0,
		order: 0,
		position: 0,
		strategy: 0,
		credentials: 0,
		fatal: 0,
	};
}

/**
 * Process-wide rolling record of the last N categorized errors.
 *
 * Rates are computed over the window, not the lifetime, so a burst of
 * credential failures an hour ago does not stop retries today.
 */
export class ErrorWindow {
	private readonly size: number;
	private readonly recent: ErrorRecord[] = [];
	private readonly lifetime = zeroCounts();
	private lifetimeTotal = 0;

	constructor(size = DEFAULT_ERROR_WINDOW_SIZE) {
		this.size = size;
	}

	record(error: TradingError, component: string, operation: string, atMs: number): void {
		this.recent.push({ category: error.category, code: error.code, component, operation, atMs });
		if (this.recent.length > this.size) {
			this.recent.shift();
		}
		this.lifetime[error.category]++;
		this.lifetimeTotal++;
	}

	/** Errors of `category` currently in the window. */
	count(category: ErrorCategory): number {
		return this.recent.filter((r) => r.category === category).length;
	}

	get length(): number {
		return this.recent.length;
	}

	/** Share of the window held by `category`; 0 for an empty window. */
	rate(category: ErrorCategory): number {
		return this.recent.length === 0 ? 0 : this.count(category) / this.recent.length;
	}

	credentialRate(): number {
		return this.rate(ErrorCategory.Credentials);
	}

	orderRate(): number {
		return this.rate(ErrorCategory.Order);
	}

	snapshot(): ErrorWindowSnapshot {
		return {
			recent: [...this.recent],
			lifetimeTotal: this.lifetimeTotal,
			lifetimeByCategory: { ...this.lifetime },
		};
	}

	clear(): void {
		this.recent.length = 0;
	}
}
