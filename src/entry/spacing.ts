/**
 * Entry spacing strategies.
 *
 * A spacing strategy answers one question: how far below the average entry
 * must the price fall before the next DCA entry is allowed. The loop treats
 * it as an opaque function; `FixedProgressiveSpacing` is the built-in default.
 */

import { ConfigError } from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";

export interface SpacingContext {
	readonly currentPrice: number;
	/** Average entry price; 0 when flat. */
	readonly averagePrice: number;
	/** Recent closes, oldest first. */
	readonly priceHistory: readonly number[];
}

export interface SpacingStrategy {
	readonly name: string;
	/**
	 * Required relative price drop for the next entry, as a fraction
	 * (0.01 = 1%). `level` is the number of entries already made.
	 */
	calculateThreshold(level: number, context: SpacingContext): number;
}

export interface FixedProgressiveParams {
	readonly baseThreshold: number;
	/** Growth per level. */
	readonly thresholdMultiplier: number;
	readonly minThreshold: number;
	readonly maxThreshold: number;
}

export const DEFAULT_FIXED_PROGRESSIVE: FixedProgressiveParams = {
	baseThreshold: 0.01,
	thresholdMultiplier: 1.15,
	minThreshold: 0.001,
	maxThreshold: 0.2,
};

/** `base × multiplier^level`, clamped to [min, max]. */
export class FixedProgressiveSpacing implements SpacingStrategy {
	readonly name = "fixed_progressive";
	readonly params: FixedProgressiveParams;

	private constructor(params: FixedProgressiveParams) {
		this.params = params;
	}

	static create(overrides: Partial<FixedProgressiveParams> = {}): Result<FixedProgressiveSpacing, ConfigError> {
		const params = { ...DEFAULT_FIXED_PROGRESSIVE, ...overrides };
		const { baseThreshold, thresholdMultiplier, minThreshold, maxThreshold } = params;
		if (!(baseThreshold > 0 && baseThreshold < 1)) {
			return err(new ConfigError(`baseThreshold must be in (0, 1), got ${baseThreshold}`, { baseThreshold }));
		}
		if (!(thresholdMultiplier >= 1 && thresholdMultiplier <= 5)) {
			return err(
				new ConfigError(`thresholdMultiplier must be in [1, 5], got ${thresholdMultiplier}`, { thresholdMultiplier }),
			);
		}
		if (!(minThreshold > 0 && maxThreshold < 1 && minThreshold < maxThreshold)) {
			return err(
				new ConfigError(`thresholds must satisfy 0 < min < max < 1, got ${minThreshold}..${maxThreshold}`, {
					minThreshold,
					maxThreshold,
				}),
			);
		}
		return ok(new FixedProgressiveSpacing(params));
	}

	calculateThreshold(level: number, _context?: SpacingContext): number {
		const { baseThreshold, thresholdMultiplier, minThreshold, maxThreshold } = this.params;
		const raw = level > 0 ? baseThreshold * thresholdMultiplier ** level : baseThreshold;
		return Math.min(Math.max(raw, minThreshold), maxThreshold);
	}
}

export interface SpacingSettings {
	readonly strategy: string;
	readonly parameters: Readonly<Record<string, number>>;
}

const FIXED_PARAM_KEYS = ["baseThreshold", "thresholdMultiplier", "minThreshold", "maxThreshold"] as const;

/**
 * Builds the configured built-in strategy. Callers with their own formula
 * pass a `SpacingStrategy` to the coordinator directly.
 */
export function createSpacingStrategy(settings: SpacingSettings): Result<SpacingStrategy, ConfigError> {
	const name = settings.strategy.trim().toLowerCase();
	if (name !== "fixed_progressive" && name !== "fixed") {
		return err(new ConfigError(`unknown spacing strategy: ${settings.strategy}`, { supported: ["fixed_progressive"] }));
	}
	const overrides: Partial<Record<(typeof FIXED_PARAM_KEYS)[number], number>> = {};
	for (const key of FIXED_PARAM_KEYS) {
		const value = settings.parameters[key];
		if (value !== undefined) overrides[key] = value;
	}
	for (const key of Object.keys(settings.parameters)) {
		if (!FIXED_PARAM_KEYS.some((k) => k === key)) {
			return err(new ConfigError(`unknown spacing parameter: ${key}`, { strategy: name }));
		}
	}
	return FixedProgressiveSpacing.create(overrides);
}
