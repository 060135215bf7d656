/**
 * Paper DCA Example
 *
 * Runs the full bot against an in-process PaperVenue:
 * - Buys whenever the last close sits below the window average
 * - Walks the price down through two spaced entries, then up through the
 *   take-profit legs until the position is closed
 * - Prints one line per cycle, then shuts down
 */

import {
	DcaBotBuilder,
	PaperVenue,
	TradeAction,
	createLogger,
	type CycleStatus,
	type SignalSource,
} from "../src/index.js";

const buyBelowAverage: SignalSource = ({ currentPrice, klines }) => {
	if (klines.length === 0) return TradeAction.Buy;
	const average = klines.reduce((sum, k) => sum + k.close.toNumber(), 0) / klines.length;
	return currentPrice.toNumber() <= average ? TradeAction.Buy : TradeAction.Hold;
};

const venue = new PaperVenue({ symbol: "BTCUSDT", price: "30000", balance: "5000" });

const built = DcaBotBuilder.create()
	.withConfig({
		symbol: "BTCUSDT",
		baseAmount: 100,
		interval: "1m",
		takeProfit: { levels: 3, basePercent: 0.015 },
	})
	.withAdapter(venue)
	.withSignal(buyBelowAverage)
	.withLogger(createLogger({ level: "warn", name: "paper-dca" }))
	.build();

if (!built.ok) {
	console.error(`Bot setup failed: ${built.error.message}`);
	process.exit(1);
}

const { coordinator, takeProfit } = built.value;

function describeCycle(status: CycleStatus): string {
	const { position } = status;
	return [
		`#${status.cycle}`,
		`price=${status.price?.toString() ?? "-"}`,
		`action=${status.action ?? "-"}`,
		`gate=${status.verdict?.reason ?? "-"}`,
		`size=${position.size.toString()}`,
		`avg=${position.avgPrice.toString()}`,
		`level=${position.dcaLevel}`,
		`legs=${status.pendingLegs}`,
		status.cycleCompleted ? "CYCLE COMPLETE" : "",
	]
		.filter((part) => part !== "")
		.join(" ");
}

const path = ["30000", "29800", "29500", "29400", "29700", "30050", "30200", "30500"];

async function main(): Promise<void> {
	takeProfit.events.on("legFilled", (leg) => {
		console.log(`  leg ${leg.level} filled at ${leg.targetPrice.toString()}`);
	});

	const started = await coordinator.start();
	if (!started.ok) {
		console.error(`Start failed: ${started.error.message}`);
		return;
	}

	for (const price of path) {
		venue.setPrice(price);
		console.log(describeCycle(await coordinator.cycle()));
	}

	const report = await coordinator.stop("example finished");
	console.log(`Shutdown ${report.outcome}: cancelled ${report.cancelledLegs} legs, flattened=${report.flattened}`);
}

main().catch((e: unknown) => {
	console.error(e);
	process.exit(1);
});
