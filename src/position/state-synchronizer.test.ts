import { beforeEach, describe, expect, it, vi } from "vitest";
import { ResilienceLayer } from "../resilience/resilience-layer.js";
import { Decimal } from "../shared/decimal.js";
import { CredentialsError } from "../shared/errors.js";
import { tradingSymbol } from "../shared/identifiers.js";
import { FakeClock, fakeSleep } from "../shared/time.js";
import { VenueGateway } from "../venue/gateway.js";
import { PaperVenue } from "../venue/paper-venue.js";
import type { VenuePosition } from "../venue/types.js";
import { StateSynchronizer, estimateDcaLevel, isAcceptedPosition } from "./state-synchronizer.js";
import { SyncOutcome } from "./types.js";
import type { ResyncNotice } from "./types.js";

const BTC = tradingSymbol("BTCUSDT");

async function setup() {
	const clock = new FakeClock(0);
	const fake = fakeSleep(clock);
	const venue = new PaperVenue({ symbol: "BTCUSDT", price: "30000", balance: "5000", clock });
	const resilience = new ResilienceLayer({ clock, sleep: fake.sleep, recovery: { jitterFactor: 0 } });
	const gateway = new VenueGateway({ adapter: venue, resilience, category: "linear", clock });
	const sync = new StateSynchronizer({
		gateway,
		symbol: BTC,
		quoteAsset: "USDT",
		baseAmount: 300,
		clock,
		sleep: fake.sleep,
	});
	await venue.connect();
	return { venue, sync, sleeps: fake.calls };
}

function record(size: string, notional: string, avgPrice: string, symbol = BTC): VenuePosition {
	return {
		symbol,
		side: "Buy",
		size: Decimal.from(size),
		notional: Decimal.from(notional),
		avgPrice: Decimal.from(avgPrice),
		markPrice: null,
		unrealisedPnl: null,
	};
}

describe("isAcceptedPosition", () => {
	it("requires a non-trivial size or notional and a positive average price", () => {
		expect(isAcceptedPosition(record("0.002", "0", "100"), BTC)).toBe(true);
		expect(isAcceptedPosition(record("0", "0.02", "100"), BTC)).toBe(true);
		expect(isAcceptedPosition(record("0.001", "0.01", "100"), BTC)).toBe(false);
		expect(isAcceptedPosition(record("1", "100", "0"), BTC)).toBe(false);
		expect(isAcceptedPosition(record("1", "100", "100", tradingSymbol("ETHUSDT")), BTC)).toBe(false);
	});
});

describe("estimateDcaLevel", () => {
	it("floors notional over base amount with a minimum of one", () => {
		expect(estimateDcaLevel(Decimal.from(900), Decimal.from(300))).toBe(3);
		expect(estimateDcaLevel(Decimal.from(1000), Decimal.from(300))).toBe(3);
		expect(estimateDcaLevel(Decimal.from(100), Decimal.from(300))).toBe(1);
	});
});

describe("StateSynchronizer", () => {
	let ctx: Awaited<ReturnType<typeof setup>>;

	beforeEach(async () => {
		ctx = await setup();
	});

	it("estimates the DCA level at cold start", async () => {
		ctx.venue.setPosition("0.03", "30000");
		const changed = vi.fn();
		ctx.sync.events.on("positionChanged", changed);

		const result = await ctx.sync.syncPosition();
		expect(result.ok && result.value.outcome).toBe(SyncOutcome.Updated);
		const position = ctx.sync.position;
		expect(position.size.toString()).toBe("0.03");
		expect(position.notional.toString()).toBe("900");
		expect(position.avgPrice.toString()).toBe("30000");
		expect(position.dcaLevel).toBe(3);
		expect(changed).toHaveBeenCalledTimes(1);
	});

	it("preserves the DCA level once it is nonzero", async () => {
		ctx.venue.setPosition("0.03", "30000");
		await ctx.sync.syncPosition();
		ctx.venue.setPosition("0.05", "29000");
		await ctx.sync.syncPosition();
		expect(ctx.sync.position.size.toString()).toBe("0.05");
		expect(ctx.sync.position.dcaLevel).toBe(3);
	});

	it("resets the replica and requests a resync exactly once when the venue is flat", async () => {
		ctx.venue.setPosition("0.03", "30000");
		await ctx.sync.syncPosition();
		const resync = vi.fn<(notice: ResyncNotice) => void>();
		ctx.sync.events.on("resyncRequired", resync);

		ctx.venue.closePositionExternally();
		const first = await ctx.sync.syncPosition();
		const second = await ctx.sync.syncPosition();

		expect(first.ok && first.value.outcome).toBe(SyncOutcome.Reset);
		expect(second.ok && second.value.outcome).toBe(SyncOutcome.Flat);
		const position = ctx.sync.position;
		expect([position.size.toString(), position.notional.toString(), position.avgPrice.toString()]).toEqual([
			"0",
			"0",
			"0",
		]);
		expect(position.dcaLevel).toBe(0);
		expect(resync).toHaveBeenCalledTimes(1);
		expect(resync.mock.calls[0]?.[0].previous.size.toString()).toBe("0.03");
	});

	it("keeps an open position whose venue record has a blank size", async () => {
		ctx.venue.setPosition("0.03", "30000");
		await ctx.sync.syncPosition();
		const resync = vi.fn<(notice: ResyncNotice) => void>();
		ctx.sync.events.on("resyncRequired", resync);
		vi.spyOn(ctx.venue, "getPositions").mockResolvedValue([
			{ symbol: "BTCUSDT", side: "Buy", size: "", positionValue: "900", avgPrice: "30000", markPrice: "", unrealisedPnl: "" },
		]);

		const result = await ctx.sync.syncPosition();
		expect(result.ok && result.value.outcome).toBe(SyncOutcome.Updated);
		expect(ctx.sync.position.size.toString()).toBe("0.03");
		expect(ctx.sync.position.dcaLevel).toBe(3);
		expect(resync).not.toHaveBeenCalled();
	});

	it("treats dust as flat", async () => {
		ctx.venue.setPosition("0.0001", "50");
		const result = await ctx.sync.syncPosition();
		expect(result.ok && result.value.outcome).toBe(SyncOutcome.Flat);
		expect(ctx.sync.position.size.isZero()).toBe(true);
	});

	it("retries the position query with escalating delays", async () => {
		ctx.venue.setPosition("0.01", "30000");
		ctx.venue.failNext("getPositions", new Error("connection reset"), 2);
		const result = await ctx.sync.syncPosition();
		expect(result.ok).toBe(true);
		expect(ctx.venue.callCount("getPositions")).toBe(3);
		expect(ctx.sleeps).toEqual([500, 1000]);
	});

	it("keeps stale data when every attempt fails", async () => {
		ctx.venue.setPosition("0.03", "30000");
		await ctx.sync.syncPosition();
		ctx.venue.failNext("getPositions", new Error("connection reset"), 3);

		const result = await ctx.sync.syncPosition();
		expect(result.ok).toBe(false);
		expect(ctx.sync.position.size.toString()).toBe("0.03");
		expect(ctx.sleeps).toEqual([500, 1000]);
	});

	it("does not retry credential failures", async () => {
		ctx.venue.failNext("getPositions", new CredentialsError("invalid api key"));
		const result = await ctx.sync.syncPosition();
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error).toBeInstanceOf(CredentialsError);
		expect(ctx.venue.callCount("getPositions")).toBe(1);
	});

	it("refreshes the tradable balance", async () => {
		const result = await ctx.sync.syncBalance();
		expect(result.ok && result.value.toString()).toBe("5000");
		expect(ctx.sync.position.tradableBalance.toString()).toBe("5000");
	});

	it("counts entries", async () => {
		await ctx.sync.recordEntry();
		const snapshot = await ctx.sync.recordEntry();
		expect(snapshot.dcaLevel).toBe(2);
	});
});
