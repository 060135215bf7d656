import { describe, expect, it } from "vitest";
import { createLogger } from "./index.js";

function capture(level: "debug" | "info" | "warn" = "info", redactPaths?: readonly string[]) {
	const lines: string[] = [];
	const logger = createLogger({
		level,
		name: "test",
		redactPaths,
		destination: {
			write(msg: string) {
				lines.push(msg);
			},
		},
	});
	const records = (): Record<string, unknown>[] => lines.map((l) => JSON.parse(l));
	return { logger, records };
}

describe("createLogger", () => {
	it("writes structured JSON with message and fields", () => {
		const { logger, records } = capture();
		logger.info({ symbol: "BTCUSDT", legs: 5 }, "legs placed");

		const [record] = records();
		expect(record?.["msg"]).toBe("legs placed");
		expect(record?.["symbol"]).toBe("BTCUSDT");
		expect(record?.["legs"]).toBe(5);
		expect(record?.["name"]).toBe("test");
	});

	it("binds child fields onto every record", () => {
		const { logger, records } = capture();
		logger.child({ component: "synchronizer" }).warn("position query failed");

		expect(records()[0]?.["component"]).toBe("synchronizer");
	});

	it("redacts credential fields by default", () => {
		const { logger, records } = capture();
		logger.info({ apiKey: "test-key", venue: { apiSecret: "test-secret" } }, "connect");

		const [record] = records();
		expect(record?.["apiKey"]).toBe("[REDACTED]");
		expect(record?.["venue"]).toEqual({ apiSecret: "[REDACTED]" });
	});

	it("redacts extra configured paths", () => {
		const { logger, records } = capture("info", ["token"]);
		logger.info({ token: "test-token", safe: "visible" }, "x");

		expect(records()[0]?.["token"]).toBe("[REDACTED]");
		expect(records()[0]?.["safe"]).toBe("visible");
	});

	it("respects the configured level", () => {
		const { logger, records } = capture("warn");
		logger.debug("hidden");
		logger.info("hidden");
		logger.warn("shown");

		expect(records()).toHaveLength(1);
		expect(records()[0]?.["msg"]).toBe("shown");
	});
});
