import { afterEach, describe, expect, it, vi } from "vitest";
import { CircuitOpenError, CredentialsError, NetworkError, TimeoutError } from "../shared/errors.js";
import { FakeClock, fakeSleep } from "../shared/time.js";
import { ResilienceLayer, withTimeout } from "./resilience-layer.js";
import { BreakerState } from "./types.js";

function setup() {
	const clock = new FakeClock(0);
	const fake = fakeSleep(clock);
	const layer = new ResilienceLayer({
		clock,
		sleep: fake.sleep,
		recovery: { jitterFactor: 0 },
		policies: { trading: { breaker: { failureThreshold: 2 } } },
	});
	return { clock, layer, sleeps: fake.calls };
}

describe("ResilienceLayer", () => {
	it("registers a breaker and a limiter per operation class", () => {
		const { layer } = setup();
		const health = layer.health();
		expect([...health.breakers.keys()]).toEqual(["trading", "market_data", "account_data"]);
		expect([...health.limiters.keys()]).toEqual(["trading", "market_data", "account_data"]);
		expect(health.openCircuits).toEqual([]);
	});

	it("consumes one token per guarded call", async () => {
		const { layer } = setup();
		const result = await layer.run("market_data", "gateway", "getLatestPrice", async () => 42);
		expect(result).toEqual({ ok: true, value: 42 });
		expect(layer.limiter("market_data").availableTokens()).toBe(19);
		expect(layer.limiter("trading").availableTokens()).toBe(10);
	});

	it("retries retryable failures through the recovery executor", async () => {
		const { layer, sleeps } = setup();
		const fn = vi
			.fn<() => Promise<string>>()
			.mockRejectedValueOnce(new NetworkError("connection reset"))
			.mockResolvedValueOnce("filled");
		const result = await layer.run("account_data", "sync", "getPositions", fn);
		expect(result).toEqual({ ok: true, value: "filled" });
		expect(fn).toHaveBeenCalledTimes(2);
		expect(sleeps).toEqual([1000]);
	});

	it("makes a single attempt when retries are disabled", async () => {
		const { layer, sleeps } = setup();
		const fn = vi.fn(async () => {
			throw new NetworkError("connection reset");
		});
		const result = await layer.run("account_data", "sync", "getPositions", fn, { retry: false });
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error).toBeInstanceOf(NetworkError);
		expect(fn).toHaveBeenCalledTimes(1);
		expect(sleeps).toEqual([]);
		expect(layer.breaker("account_data").stats().totalFailures).toBe(1);
	});

	it("rejects calls without invoking them once the class breaker is open", async () => {
		const { layer } = setup();
		const failing = async (): Promise<string> => {
			throw new NetworkError("connection refused");
		};
		await layer.run("trading", "tp", "placeOrder", failing, { retry: false });
		await layer.run("trading", "tp", "placeOrder", failing, { retry: false });
		expect(layer.breaker("trading").state).toBe(BreakerState.Open);

		const fn = vi.fn(async () => "never");
		const result = await layer.run("trading", "tp", "placeOrder", fn);
		expect(fn).not.toHaveBeenCalled();
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error).toBeInstanceOf(CircuitOpenError);
		expect(layer.health().openCircuits).toEqual(["trading"]);
	});

	it("does not retry credential failures", async () => {
		const { layer } = setup();
		const fn = vi.fn(async () => {
			throw new CredentialsError("invalid api key");
		});
		const result = await layer.run("account_data", "sync", "getBalance", fn);
		expect(fn).toHaveBeenCalledTimes(1);
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error).toBeInstanceOf(CredentialsError);
		expect(layer.health().errors.lifetimeByCategory.credentials).toBe(1);
	});
});

describe("withTimeout", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it("resolves with the value when the promise settles in time", async () => {
		await expect(withTimeout(Promise.resolve("ok"), 1000, "op")).resolves.toBe("ok");
	});

	it("rejects with TimeoutError after the deadline", async () => {
		vi.useFakeTimers();
		const pending = withTimeout(new Promise<string>(() => undefined), 500, "venue.getKlines");
		const assertion = expect(pending).rejects.toThrow(TimeoutError);
		await vi.advanceTimersByTimeAsync(500);
		await assertion;
		await expect(pending).rejects.toThrow("venue.getKlines timed out after 500ms");
	});
});
