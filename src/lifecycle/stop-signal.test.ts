import { describe, expect, it } from "vitest";
import { FakeClock, fakeSleep } from "../shared/time.js";
import { StopSignal } from "./stop-signal.js";

describe("StopSignal", () => {
	it("keeps the first reason", () => {
		const stop = new StopSignal();
		expect(stop.stop("SIGINT")).toBe(true);
		expect(stop.stop("SIGTERM")).toBe(false);
		expect(stop.reason).toBe("SIGINT");
		expect(stop.requested).toBe(true);
	});

	it("aborts its signal once", () => {
		const stop = new StopSignal();
		let aborts = 0;
		stop.signal.addEventListener("abort", () => aborts++);
		stop.stop("one");
		stop.stop("two");
		expect(stop.signal.aborted).toBe(true);
		expect(aborts).toBe(1);
	});

	it("cancels sleeps waiting on it", async () => {
		const stop = new StopSignal();
		const fake = fakeSleep(new FakeClock());
		stop.stop("shutdown");
		await expect(fake.sleep(1_000, stop.signal)).rejects.toThrow("sleep cancelled");
	});
});
