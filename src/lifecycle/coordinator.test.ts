import { describe, expect, it, vi } from "vitest";
import { FixedProgressiveSpacing } from "../entry/spacing.js";
import { StateSynchronizer } from "../position/state-synchronizer.js";
import { ResilienceLayer } from "../resilience/resilience-layer.js";
import { loadConfig } from "../shared/config.js";
import { CancelledError } from "../shared/errors.js";
import { tradingSymbol } from "../shared/identifiers.js";
import { unwrap } from "../shared/result.js";
import { FakeClock, fakeSleep } from "../shared/time.js";
import type { Sleep } from "../shared/time.js";
import { TakeProfitManager } from "../take-profit/take-profit-manager.js";
import { VenueGateway } from "../venue/gateway.js";
import { PaperVenue } from "../venue/paper-venue.js";
import { OrderSide } from "../venue/types.js";
import { LoopCoordinator } from "./coordinator.js";
import { CycleOutcome, HaltReason, LoopState, ShutdownOutcome, TradeAction } from "./types.js";
import type { CycleStatus, SignalSource } from "./types.js";

const START = Date.UTC(2024, 0, 1, 12, 3);

/** Interval sleep that only returns when the test ticks it. */
function manualTicker() {
	const waits: number[] = [];
	let credits = 0;
	let wake: (() => void) | null = null;
	const sleep: Sleep = (ms, signal) =>
		new Promise<void>((resolve, reject) => {
			waits.push(ms);
			if (signal?.aborted) {
				reject(new CancelledError("sleep cancelled"));
				return;
			}
			if (credits > 0) {
				credits--;
				resolve();
				return;
			}
			wake = () => {
				wake = null;
				resolve();
			};
			signal?.addEventListener("abort", () => reject(new CancelledError("sleep cancelled")), { once: true });
		});
	return {
		sleep,
		waits,
		tick: () => {
			if (wake) wake();
			else credits++;
		},
	};
}

interface SetupOptions {
	readonly config?: Record<string, unknown>;
	readonly callTimeoutMs?: number;
}

function setup(options: SetupOptions = {}) {
	const clock = new FakeClock(START);
	const fake = fakeSleep(clock);
	const ticker = manualTicker();
	const venue = new PaperVenue({ symbol: "BTCUSDT", price: "100", balance: "10000", clock });
	const config = unwrap(loadConfig({ symbol: "BTCUSDT", baseAmount: 100, ...options.config }));
	const symbol = tradingSymbol(config.symbol);
	const resilience = new ResilienceLayer({ clock, sleep: fake.sleep, recovery: { jitterFactor: 0 } });
	const gateway = new VenueGateway({
		adapter: venue,
		resilience,
		category: config.category,
		clock,
		callTimeoutMs: options.callTimeoutMs,
	});
	const synchronizer = new StateSynchronizer({
		gateway,
		symbol,
		quoteAsset: config.quoteAsset,
		baseAmount: config.baseAmount,
		clock,
		sleep: fake.sleep,
	});
	const takeProfit = new TakeProfitManager({ gateway, synchronizer, symbol, settings: config.takeProfit, clock });
	const signal = vi.fn<SignalSource>(() => TradeAction.Hold);
	const coordinator = new LoopCoordinator({
		config,
		gateway,
		synchronizer,
		takeProfit,
		spacing: unwrap(FixedProgressiveSpacing.create()),
		signal,
		clock,
		sleep: ticker.sleep,
	});
	return { clock, venue, ticker, signal, takeProfit, synchronizer, coordinator };
}

function nextCycle(coordinator: LoopCoordinator): Promise<CycleStatus> {
	return new Promise((resolve) => {
		coordinator.events.once("cycle", resolve);
	});
}

describe("LoopCoordinator", () => {
	describe("start", () => {
		it("connects, syncs and waits for the next interval boundary", async () => {
			const { coordinator, venue, ticker } = setup();
			const result = await coordinator.start();
			expect(result.ok).toBe(true);
			expect(coordinator.state).toBe(LoopState.Running);
			expect(venue.callCount("connect")).toBe(1);
			expect(ticker.waits).toEqual([120_000]);
		});

		it("protects an existing position with take-profit legs", async () => {
			const { coordinator, venue, takeProfit } = setup();
			venue.setPosition("1", "100");
			await coordinator.start();
			expect(venue.openOrderCount).toBe(5);
			expect(takeProfit.legs().map((l) => l.targetPrice.toString())).toEqual([
				"100.4",
				"100.8",
				"101.2",
				"101.6",
				"102",
			]);
		});

		it("cancels orphaned take-profit orders when configured", async () => {
			const { coordinator, venue } = setup({ config: { cancelOrphanedOrdersOnStartup: true } });
			venue.setPosition("1", "100");
			const orphan = venue.addForeignOrder(OrderSide.Sell, "101", "0.2");
			await coordinator.start();
			expect(venue.openOrderCount).toBe(5);
			await expect(venue.cancelOrder("linear", "BTCUSDT", orphan)).rejects.toThrow("does not exist");
		});

		it("halts when startup fails", async () => {
			const { coordinator, venue } = setup();
			const halted = vi.fn();
			coordinator.events.on("halted", halted);
			venue.failNext("connect", new Error("invalid api key"));

			const result = await coordinator.start();
			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error.code).toBe("CREDENTIALS_ERROR");
			expect(coordinator.state).toBe(LoopState.Halted);
			expect(halted).toHaveBeenCalledWith(HaltReason.StartupFailed);
		});

		it("refuses a second start", async () => {
			const { coordinator } = setup();
			await coordinator.start();
			const again = await coordinator.start();
			expect(!again.ok && again.error.code).toBe("INVALID_STATE");
		});
	});

	describe("cycle", () => {
		it("places the first entry and its take-profit legs", async () => {
			const { coordinator, venue, signal } = setup();
			await coordinator.start();
			signal.mockReturnValue(TradeAction.Buy);

			const status = await coordinator.cycle();
			expect(status.outcome).toBe(CycleOutcome.Completed);
			expect(status.verdict?.reason).toBe("first_entry");
			expect(status.entryQuantity?.toString()).toBe("1");
			expect(status.position.dcaLevel).toBe(1);
			expect(status.pendingLegs).toBe(5);
			expect(status.errors).toEqual([]);
			expect(venue.position).toEqual({ size: "1", avgPrice: "100" });
		});

		it("hands price, klines and position to the signal source", async () => {
			const { coordinator, signal } = setup({ config: { windowSize: 10 } });
			await coordinator.start();
			await coordinator.cycle();
			const context = signal.mock.calls[0]?.[0];
			expect(context?.symbol).toBe("BTCUSDT");
			expect(context?.currentPrice.toString()).toBe("100");
			expect(context?.klines.map((k) => k.close.toString())).toEqual(["100"]);
			expect(context?.position.dcaLevel).toBe(0);
		});

		it("blocks a second entry the spacing gate rejects", async () => {
			const { coordinator, venue, signal } = setup();
			await coordinator.start();
			signal.mockReturnValue(TradeAction.Buy);
			await coordinator.cycle();

			venue.setPrice("99");
			const status = await coordinator.cycle();
			expect(status.verdict?.reason).toBe("below_threshold");
			expect(status.verdict?.threshold.toNumber()).toBeCloseTo(0.0115, 10);
			expect(status.entryQuantity).toBeNull();
			expect(venue.position.size).toBe("1");
		});

		it("scales a second entry and re-derives the legs", async () => {
			const { coordinator, venue, signal } = setup();
			await coordinator.start();
			signal.mockReturnValue(TradeAction.Buy);
			await coordinator.cycle();

			venue.setPrice("98");
			const status = await coordinator.cycle();
			expect(status.entryQuantity?.toString()).toBe("1.53");
			expect(status.position.dcaLevel).toBe(2);
			expect(status.pendingLegs).toBe(5);
			expect(venue.position.size).toBe("2.53");
			expect(venue.openOrderCount).toBe(5);
		});

		it("completes the DCA cycle when take-profit fills flatten the position", async () => {
			const { coordinator, venue, signal } = setup();
			await coordinator.start();
			signal.mockReturnValue(TradeAction.Buy);
			await coordinator.cycle();

			signal.mockReturnValue(TradeAction.Hold);
			venue.setPrice("103");
			const status = await coordinator.cycle();
			expect(status.legsFilled).toBe(5);
			expect(status.cycleCompleted).toBe(true);
			expect(status.position.dcaLevel).toBe(0);
			expect(status.pendingLegs).toBe(0);
		});

		it("detects fills that land during the cycle", async () => {
			const { coordinator, venue, signal } = setup();
			await coordinator.start();
			signal.mockReturnValue(TradeAction.Buy);
			await coordinator.cycle();

			signal.mockImplementation(() => {
				venue.setPrice("101");
				return TradeAction.Hold;
			});
			const status = await coordinator.cycle();
			expect(status.legsFilled).toBe(2);
			expect(status.cycleCompleted).toBe(false);
			expect(status.pendingLegs).toBe(3);
			expect(venue.position.size).toBe("0.6");
		});

		it("resets tracking when the position is closed elsewhere", async () => {
			const { coordinator, venue, signal } = setup();
			await coordinator.start();
			signal.mockReturnValue(TradeAction.Buy);
			await coordinator.cycle();

			signal.mockReturnValue(TradeAction.Hold);
			venue.closePositionExternally();
			const status = await coordinator.cycle();
			expect(status.cycleCompleted).toBe(false);
			expect(status.pendingLegs).toBe(0);
			expect(status.position.dcaLevel).toBe(0);
			expect(venue.openOrderCount).toBe(0);
		});

		it("skips the cycle without a price", async () => {
			const { coordinator, venue, signal } = setup();
			await coordinator.start();
			venue.failNext("getLatestPrice", new Error("invalid symbol"));

			const status = await coordinator.cycle();
			expect(status.outcome).toBe(CycleOutcome.Skipped);
			expect(status.price).toBeNull();
			expect(signal).not.toHaveBeenCalled();
			expect(coordinator.errors.drain().map((r) => r.error.message)).toEqual(["invalid symbol"]);
		});

		it("continues after a failed balance sync", async () => {
			const { coordinator, venue } = setup();
			await coordinator.start();
			venue.failNext("getTradableBalance", new Error("invalid request"));

			const status = await coordinator.cycle();
			expect(status.outcome).toBe(CycleOutcome.Completed);
			expect(status.errors.map((e) => e.code)).toEqual(["INVALID_PARAMETERS"]);
		});

		it("holds when the signal source throws", async () => {
			const { coordinator, venue, signal } = setup();
			await coordinator.start();
			signal.mockImplementation(() => {
				throw new Error("indicator not ready");
			});

			const status = await coordinator.cycle();
			expect(status.action).toBe(TradeAction.Hold);
			expect(status.errors.map((e) => e.code)).toEqual(["STRATEGY_ERROR"]);
			expect(venue.position.size).toBe("0");
		});

		it("reports the balance shortfall instead of entering", async () => {
			const { coordinator, venue, signal } = setup({ config: { baseAmount: 20_000 } });
			await coordinator.start();
			signal.mockReturnValue(TradeAction.Buy);

			const status = await coordinator.cycle();
			expect(status.entryQuantity).toBeNull();
			expect(status.errors.map((e) => e.code)).toEqual(["INSUFFICIENT_BALANCE"]);
			expect(venue.callCount("placeOrder")).toBe(0);
		});

		it("turns an unexpected fault into a failed status", async () => {
			const { coordinator, synchronizer } = setup();
			await coordinator.start();
			vi.spyOn(synchronizer, "syncBalance").mockRejectedValueOnce(new Error("boom"));

			const failed = await coordinator.cycle();
			expect(failed.outcome).toBe(CycleOutcome.Failed);
			expect(failed.errors.map((e) => e.message)).toEqual(["boom"]);

			const next = await coordinator.cycle();
			expect(next.outcome).toBe(CycleOutcome.Completed);
		});

		it("skips a tick while the previous cycle is still running", async () => {
			const { coordinator } = setup();
			await coordinator.start();
			const first = coordinator.cycle();
			const second = await coordinator.cycle();
			expect(second.outcome).toBe(CycleOutcome.Overlapped);
			expect((await first).outcome).toBe(CycleOutcome.Completed);
			expect(coordinator.cycles).toBe(1);
		});
	});

	describe("loop", () => {
		it("runs a cycle per boundary", async () => {
			const { coordinator, ticker } = setup();
			await coordinator.start();

			const first = nextCycle(coordinator);
			ticker.tick();
			expect((await first).cycle).toBe(1);

			const second = nextCycle(coordinator);
			ticker.tick();
			expect((await second).cycle).toBe(2);
		});

		it("halts after consecutive cycles with credential errors", async () => {
			const { coordinator, venue, ticker } = setup();
			const halted = vi.fn();
			coordinator.events.on("halted", halted);
			await coordinator.start();
			venue.failNext("getTradableBalance", new Error("invalid api key"), 3);

			for (let i = 0; i < 3; i++) {
				const next = nextCycle(coordinator);
				ticker.tick();
				await next;
			}
			await coordinator.whenDone();

			expect(coordinator.state).toBe(LoopState.Halted);
			expect(halted).toHaveBeenCalledWith(HaltReason.CredentialFailures);
		});

		it("resets the credential streak after a clean cycle", async () => {
			const { coordinator, venue, ticker } = setup();
			await coordinator.start();

			venue.failNext("getTradableBalance", new Error("invalid api key"), 2);
			for (let i = 0; i < 3; i++) {
				const next = nextCycle(coordinator);
				ticker.tick();
				await next;
			}
			venue.failNext("getTradableBalance", new Error("invalid api key"), 2);
			for (let i = 0; i < 2; i++) {
				const next = nextCycle(coordinator);
				ticker.tick();
				await next;
			}
			expect(coordinator.state).toBe(LoopState.Running);
		});
	});

	describe("stop", () => {
		it("cancels legs, flattens and disconnects", async () => {
			const { coordinator, venue } = setup();
			venue.setPosition("1", "100");
			await coordinator.start();
			const onShutdown = vi.fn();
			coordinator.events.on("shutdown", onShutdown);

			const report = await coordinator.stop("SIGINT");
			expect(report).toMatchObject({
				reason: "SIGINT",
				outcome: ShutdownOutcome.Graceful,
				cancelledLegs: 5,
				flattened: true,
			});
			expect(venue.position.size).toBe("0");
			expect(venue.openOrderCount).toBe(0);
			expect(venue.callCount("disconnect")).toBe(1);
			expect(coordinator.state).toBe(LoopState.Stopped);
			expect(onShutdown).toHaveBeenCalledWith(report);
			await expect(coordinator.whenDone()).resolves.toBeUndefined();
		});

		it("floors the flattening order to the quantity step", async () => {
			const { coordinator, venue } = setup();
			venue.setPosition("1.0004", "100");
			await coordinator.start();
			const place = vi.spyOn(venue, "placeOrder");

			const report = await coordinator.stop();
			expect(report.flattened).toBe(true);
			expect(place.mock.lastCall?.[0]).toMatchObject({ side: OrderSide.Sell, orderType: "Market", qty: "1", reduceOnly: true });
			expect(venue.position.size).toBe("0.0004");
		});

		it("leaves the position open when flattening is disabled", async () => {
			const { coordinator, venue } = setup({ config: { closePositionOnShutdown: false } });
			venue.setPosition("1", "100");
			await coordinator.start();
			const report = await coordinator.stop();
			expect(report.flattened).toBe(false);
			expect(venue.position.size).toBe("1");
		});

		it("shares the first report across repeated calls", async () => {
			const { coordinator, venue } = setup();
			await coordinator.start();
			const first = coordinator.stop("first");
			const second = coordinator.stop("second");
			expect(second).toBe(first);
			expect((await first).reason).toBe("first");
			expect(venue.callCount("disconnect")).toBe(1);
		});

		it("forces completion when cleanup outlives the shutdown timeout", async () => {
			const { coordinator, venue } = setup({ config: { shutdownTimeoutMs: 20 }, callTimeoutMs: 50 });
			await coordinator.start();
			vi.spyOn(venue, "disconnect").mockImplementation(() => new Promise<void>(() => {}));

			const report = await coordinator.stop();
			expect(report.outcome).toBe(ShutdownOutcome.Forced);
			expect(coordinator.state).toBe(LoopState.Stopped);
		});
	});
});
