/**
 * Logger wrapper: structured logging backed by pino.
 *
 * Venue credentials never reach the output: `apiKey`/`apiSecret` paths are
 * censored by default and callers may add their own redact paths.
 */

import { pino } from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe; `silent` disables output. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerConfig {
	readonly level: LogLevel;
	readonly name?: string | undefined;
	readonly redactPaths?: readonly string[] | undefined;
	/** Alternate sink, e.g. an array collector in tests. Defaults to stdout. */
	readonly destination?: { write(msg: string): void } | undefined;
}

/** Structured logger used by every component. */
export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

export const DEFAULT_REDACT_PATHS: readonly string[] = [
	"apiKey",
	"apiSecret",
	"*.apiKey",
	"*.apiSecret",
	"credentials",
];

// ── Factory ─────────────────────────────────────────────────────────

type LogMethod = (objOrMsg: Record<string, unknown> | string, msg?: string) => void;

function method(write: pino.LogFn): LogMethod {
	return (objOrMsg, msg) => {
		if (typeof objOrMsg === "string") {
			write(objOrMsg);
		} else {
			write(objOrMsg, msg ?? "");
		}
	};
}

function wrapPino(base: pino.Logger): Logger {
	return {
		info: method(base.info.bind(base)),
		warn: method(base.warn.bind(base)),
		error: method(base.error.bind(base)),
		debug: method(base.debug.bind(base)),
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(base.child(bindings));
		},
	};
}

/**
 * Creates a Logger backed by pino with credential redaction.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info", name: "dca" });
 * logger.child({ component: "take-profit" }).info({ legs: 5 }, "legs placed");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const options: pino.LoggerOptions = {
		level: config.level,
		redact: {
			paths: [...DEFAULT_REDACT_PATHS, ...(config.redactPaths ?? [])],
			censor: "[REDACTED]",
		},
	};
	if (config.name !== undefined) {
		options.name = config.name;
	}
	const base = config.destination ? pino(options, config.destination) : pino(options);
	return wrapPino(base);
}

/** A logger that drops everything. */
export function silentLogger(): Logger {
	return createLogger({ level: "silent" });
}
