import { describe, expect, it } from "vitest";
import { SUPPORTED_INTERVALS } from "../shared/config.js";
import { INTERVAL_MS, VENUE_INTERVAL, msUntilNextBoundary } from "./interval.js";

describe("msUntilNextBoundary", () => {
	const fiveMinutes = INTERVAL_MS["5m"];

	it("waits for the next aligned mark", () => {
		expect(msUntilNextBoundary(Date.UTC(2024, 0, 1, 12, 3), fiveMinutes)).toBe(120_000);
	});

	it("waits a full interval when already on a boundary", () => {
		expect(msUntilNextBoundary(Date.UTC(2024, 0, 1, 12, 5), fiveMinutes)).toBe(fiveMinutes);
	});

	it("aligns daily intervals to UTC midnight", () => {
		expect(msUntilNextBoundary(Date.UTC(2024, 0, 1, 23, 0), INTERVAL_MS["1d"])).toBe(3_600_000);
	});
});

describe("interval tables", () => {
	it("cover every supported label", () => {
		for (const label of SUPPORTED_INTERVALS) {
			expect(INTERVAL_MS[label]).toBeGreaterThan(0);
			expect(VENUE_INTERVAL[label]).toBeTruthy();
		}
	});

	it("use venue codes for hours and days", () => {
		expect(VENUE_INTERVAL["4h"]).toBe("240");
		expect(VENUE_INTERVAL["1d"]).toBe("D");
	});
});
