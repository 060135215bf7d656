import type { IntervalLabel } from "../shared/config.js";
import { Duration } from "../shared/time.js";

/** Interval length per supported label. */
export const INTERVAL_MS: Readonly<Record<IntervalLabel, number>> = {
	"1m": Duration.minutes(1),
	"3m": Duration.minutes(3),
	"5m": Duration.minutes(5),
	"15m": Duration.minutes(15),
	"30m": Duration.minutes(30),
	"1h": Duration.hours(1),
	"4h": Duration.hours(4),
	"1d": Duration.days(1),
};

/** Kline interval codes as venues spell them. */
export const VENUE_INTERVAL: Readonly<Record<IntervalLabel, string>> = {
	"1m": "1",
	"3m": "3",
	"5m": "5",
	"15m": "15",
	"30m": "30",
	"1h": "60",
	"4h": "240",
	"1d": "D",
};

/**
 * Time until the next wall-clock multiple of `intervalMs`. A call exactly on
 * a boundary waits a full interval.
 *
 * @example msUntilNextBoundary(Date.UTC(2024, 0, 1, 12, 3), 5 * 60_000) // 120_000
 */
export function msUntilNextBoundary(nowMs: number, intervalMs: number): number {
	return intervalMs - (nowMs % intervalMs);
}
