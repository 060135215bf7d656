/**
 * Bot configuration: schema, defaults and environment overrides.
 *
 * Every consumer receives a fully defaulted, validated BotConfig; parsing
 * happens once at startup.
 */

import { validate, z } from "../lib/validation/index.js";
import type { ValidationError } from "../lib/validation/index.js";
import { ConfigError } from "./errors.js";
import type { Result } from "./result.js";

/** Interval labels the loop can align to. */
export const SUPPORTED_INTERVALS = ["1m", "3m", "5m", "15m", "30m", "1h", "4h", "1d"] as const;

const TakeProfitSchema = z
	.object({
		/** Number of take-profit legs. */
		levels: z.number().int().min(1).max(20).default(5),
		/** Share of the position per leg; defaults to 1 / levels. */
		levelFraction: z.number().positive().max(1).optional(),
		/** Fixed take-profit distance of the last leg, as a fraction (0.02 = 2%). */
		basePercent: z.number().positive().max(1).default(0.02),
		autoPlace: z.boolean().default(true),
		/** Use the caller-supplied dynamic percentage source instead of basePercent. */
		dynamic: z.boolean().default(false),
		batchTimeoutMs: z.number().int().positive().default(90_000),
		safetyMarginMs: z.number().int().nonnegative().default(5_000),
	})
	.refine((tp) => tp.levelFraction === undefined || tp.levelFraction * tp.levels <= 1 + 1e-9, {
		message: "levelFraction × levels must not exceed 1",
		path: ["levelFraction"],
	});

const SpacingSchema = z.object({
	strategy: z.string().min(1).default("fixed_progressive"),
	parameters: z.record(z.number()).default({}),
});

export const BotConfigSchema = z.object({
	symbol: z
		.string()
		.trim()
		.min(1)
		.transform((s) => s.toUpperCase()),
	category: z.enum(["spot", "linear", "inverse"]).default("linear"),
	quoteAsset: z.string().min(1).default("USDT"),
	interval: z.enum(SUPPORTED_INTERVALS).default("5m"),
	/** Quote amount of the first entry. */
	baseAmount: z.number().positive(),
	/** Cap on the per-level size multiplier. */
	maxMultiplier: z.number().min(1).default(5),
	/** Klines handed to the signal and spacing strategies. */
	windowSize: z.number().int().min(10).default(100),
	takeProfit: TakeProfitSchema.default({}),
	spacing: SpacingSchema.default({}),
	cancelOrphanedOrdersOnStartup: z.boolean().default(false),
	closePositionOnShutdown: z.boolean().default(true),
	shutdownTimeoutMs: z.number().int().positive().default(30_000),
	callTimeoutMs: z.number().int().positive().default(30_000),
	/** Consecutive cycles surfacing credential errors before the loop halts. */
	maxCredentialFailures: z.number().int().positive().default(3),
});

export type BotConfig = z.output<typeof BotConfigSchema>;
export type BotConfigInput = z.input<typeof BotConfigSchema>;
export type TakeProfitSettings = BotConfig["takeProfit"];
export type IntervalLabel = (typeof SUPPORTED_INTERVALS)[number];

/** Validates raw input and fills defaults. */
export function loadConfig(raw: unknown): Result<BotConfig, ValidationError> {
	return validate(BotConfigSchema, raw, "config");
}

// ── Environment overrides ────────────────────────────────────────────

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Reads overrides from `DCA_*` variables into a raw config object.
 * Supported: DCA_SYMBOL, DCA_CATEGORY, DCA_INTERVAL, DCA_BASE_AMOUNT,
 * DCA_MAX_MULTIPLIER, DCA_TP_LEVELS, DCA_TP_PERCENT, DCA_AUTO_TP,
 * DCA_CANCEL_ORPHANS, DCA_CLOSE_ON_SHUTDOWN.
 * @throws ConfigError if a numeric or boolean variable is malformed
 */
export function configFromEnv(env: Env = process.env): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	const takeProfit: Record<string, unknown> = {};

	const symbol = env["DCA_SYMBOL"];
	if (symbol) result["symbol"] = symbol;
	const category = env["DCA_CATEGORY"];
	if (category) result["category"] = category;
	const interval = env["DCA_INTERVAL"];
	if (interval) result["interval"] = interval;

	setNumber(env, "DCA_BASE_AMOUNT", result, "baseAmount");
	setNumber(env, "DCA_MAX_MULTIPLIER", result, "maxMultiplier");
	setNumber(env, "DCA_TP_LEVELS", takeProfit, "levels");
	setNumber(env, "DCA_TP_PERCENT", takeProfit, "basePercent");
	setBoolean(env, "DCA_AUTO_TP", takeProfit, "autoPlace");
	setBoolean(env, "DCA_CANCEL_ORPHANS", result, "cancelOrphanedOrdersOnStartup");
	setBoolean(env, "DCA_CLOSE_ON_SHUTDOWN", result, "closePositionOnShutdown");

	if (Object.keys(takeProfit).length > 0) result["takeProfit"] = takeProfit;
	return result;
}

function setNumber(env: Env, key: string, target: Record<string, unknown>, field: string): void {
	const raw = env[key];
	if (raw === undefined || raw === "") return;
	const parsed = Number(raw.trim());
	if (raw.trim() === "" || !Number.isFinite(parsed)) {
		throw new ConfigError(`Invalid ${key}: "${raw}" must be a number`, { key });
	}
	target[field] = parsed;
}

function setBoolean(env: Env, key: string, target: Record<string, unknown>, field: string): void {
	const raw = env[key];
	if (raw === undefined || raw === "") return;
	const normalized = raw.trim().toLowerCase();
	if (normalized !== "true" && normalized !== "false") {
		throw new ConfigError(`Invalid ${key}: "${raw}" must be true or false`, { key });
	}
	target[field] = normalized === "true";
}
