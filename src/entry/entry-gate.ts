import { Decimal } from "../shared/decimal.js";
import { classifyError } from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import type { SpacingStrategy } from "./spacing.js";

export interface EntryGateInput {
	readonly dcaLevel: number;
	readonly averagePrice: Decimal;
	readonly currentPrice: Decimal;
	readonly priceHistory: readonly number[];
}

export const GateReason = {
	FirstEntry: "first_entry",
	ThresholdMet: "threshold_met",
	BelowThreshold: "below_threshold",
	InvalidPrice: "invalid_price",
	StrategyFailed: "strategy_failed",
} as const;

export type GateReason = (typeof GateReason)[keyof typeof GateReason];

export interface EntryVerdict {
	readonly allowed: boolean;
	readonly reason: GateReason;
	/** (average − current) / average; positive when the price has dropped. */
	readonly priceChange: Decimal;
	readonly threshold: Decimal;
	readonly error?: TradingError | undefined;
}

/**
 * Last check before an entry: blocks unless the price sits at least the
 * strategy's threshold below the average entry. Overrides any buy signal.
 * With no position the first entry is always allowed.
 */
export function evaluateEntryGate(input: EntryGateInput, strategy: SpacingStrategy): EntryVerdict {
	const { dcaLevel, averagePrice, currentPrice } = input;
	if (!averagePrice.isPositive() || dcaLevel === 0) {
		return { allowed: true, reason: GateReason.FirstEntry, priceChange: Decimal.zero(), threshold: Decimal.zero() };
	}
	if (!currentPrice.isPositive()) {
		return { allowed: false, reason: GateReason.InvalidPrice, priceChange: Decimal.zero(), threshold: Decimal.zero() };
	}

	const priceChange = averagePrice.sub(currentPrice).div(averagePrice);
	let raw: number;
	try {
		raw = strategy.calculateThreshold(dcaLevel, {
			currentPrice: currentPrice.toNumber(),
			averagePrice: averagePrice.toNumber(),
			priceHistory: input.priceHistory,
		});
	} catch (e) {
		return {
			allowed: false,
			reason: GateReason.StrategyFailed,
			priceChange,
			threshold: Decimal.zero(),
			error: classifyError(e),
		};
	}
	if (!Number.isFinite(raw) || raw < 0) {
		return { allowed: false, reason: GateReason.StrategyFailed, priceChange, threshold: Decimal.zero() };
	}

	const threshold = Decimal.from(raw);
	const allowed = priceChange.gte(threshold);
	return { allowed, reason: allowed ? GateReason.ThresholdMet : GateReason.BelowThreshold, priceChange, threshold };
}
