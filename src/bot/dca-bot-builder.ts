import { createSpacingStrategy } from "../entry/spacing.js";
import type { SpacingStrategy } from "../entry/spacing.js";
import { silentLogger } from "../lib/logger/index.js";
import type { Logger } from "../lib/logger/index.js";
import { LoopCoordinator } from "../lifecycle/coordinator.js";
import type { SignalSource } from "../lifecycle/types.js";
import { StateSynchronizer } from "../position/state-synchronizer.js";
import { ResilienceLayer } from "../resilience/resilience-layer.js";
import type { ResilienceDeps } from "../resilience/resilience-layer.js";
import { loadConfig } from "../shared/config.js";
import type { BotConfig, BotConfigInput } from "../shared/config.js";
import { ConfigError } from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import { tradingSymbol } from "../shared/identifiers.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import type { Clock, Sleep } from "../shared/time.js";
import { SystemClock, sleep as timerSleep } from "../shared/time.js";
import { TakeProfitManager } from "../take-profit/take-profit-manager.js";
import type { DynamicTakeProfitSource } from "../take-profit/types.js";
import { VenueGateway } from "../venue/gateway.js";
import type { VenueAdapter } from "../venue/types.js";

/** Resilience tuning; clock, sleep and logger come from the builder. */
export type ResilienceTuning = Omit<ResilienceDeps, "clock" | "sleep" | "logger">;

/** Optional dependency overrides for the DcaBotBuilder. */
export interface DcaBotComponents {
	config?: BotConfigInput | undefined;
	adapter?: VenueAdapter | undefined;
	signal?: SignalSource | undefined;
	spacing?: SpacingStrategy | undefined;
	dynamicPercent?: DynamicTakeProfitSource | undefined;
	resilience?: ResilienceTuning | undefined;
	logger?: Logger | undefined;
	clock?: Clock | undefined;
	sleep?: Sleep | undefined;
}

/** A fully wired bot. Start it through `coordinator`. */
export interface DcaBot {
	readonly config: BotConfig;
	readonly resilience: ResilienceLayer;
	readonly gateway: VenueGateway;
	readonly synchronizer: StateSynchronizer;
	readonly takeProfit: TakeProfitManager;
	readonly coordinator: LoopCoordinator;
}

/**
 * Fluent, immutable builder that validates the config and assembles the
 * resilience layer, gateway, synchronizer, take-profit manager and
 * coordinator around one venue adapter.
 *
 * @example
 * ```ts
 * const bot = DcaBotBuilder.create()
 * 	.withConfig({ symbol: "BTCUSDT", baseAmount: 100 })
 * 	.withAdapter(new PaperVenue({ symbol: "BTCUSDT", price: "30000" }))
 * 	.withSignal(() => TradeAction.Buy)
 * 	.build();
 * ```
 */
export class DcaBotBuilder {
	private readonly components: DcaBotComponents;

	constructor(components: DcaBotComponents = {}) {
		this.components = components;
	}

	static create(components?: DcaBotComponents): DcaBotBuilder {
		return new DcaBotBuilder(components);
	}

	withConfig(config: BotConfigInput): DcaBotBuilder {
		return new DcaBotBuilder({ ...this.components, config });
	}

	withAdapter(adapter: VenueAdapter): DcaBotBuilder {
		return new DcaBotBuilder({ ...this.components, adapter });
	}

	withSignal(signal: SignalSource): DcaBotBuilder {
		return new DcaBotBuilder({ ...this.components, signal });
	}

	/** Replaces the spacing strategy named in the config. */
	withSpacing(spacing: SpacingStrategy): DcaBotBuilder {
		return new DcaBotBuilder({ ...this.components, spacing });
	}

	/** Consulted only when `takeProfit.dynamic` is on. */
	withDynamicTakeProfit(dynamicPercent: DynamicTakeProfitSource): DcaBotBuilder {
		return new DcaBotBuilder({ ...this.components, dynamicPercent });
	}

	withResilience(resilience: ResilienceTuning): DcaBotBuilder {
		return new DcaBotBuilder({ ...this.components, resilience });
	}

	withLogger(logger: Logger): DcaBotBuilder {
		return new DcaBotBuilder({ ...this.components, logger });
	}

	withClock(clock: Clock): DcaBotBuilder {
		return new DcaBotBuilder({ ...this.components, clock });
	}

	withSleep(sleep: Sleep): DcaBotBuilder {
		return new DcaBotBuilder({ ...this.components, sleep });
	}

	build(): Result<DcaBot, TradingError> {
		const { adapter, signal } = this.components;
		if (this.components.config === undefined) {
			return err(new ConfigError("bot requires a config"));
		}
		if (!adapter) {
			return err(new ConfigError("bot requires a venue adapter"));
		}
		if (!signal) {
			return err(new ConfigError("bot requires a signal source"));
		}

		const loaded = loadConfig(this.components.config);
		if (!loaded.ok) return loaded;
		const config = loaded.value;

		const spacing = this.components.spacing ? ok(this.components.spacing) : createSpacingStrategy(config.spacing);
		if (!spacing.ok) return spacing;

		const logger = (this.components.logger ?? silentLogger()).child({ bot: config.symbol });
		const clock = this.components.clock ?? SystemClock;
		const sleep = this.components.sleep ?? timerSleep;
		const symbol = tradingSymbol(config.symbol);

		const resilience = new ResilienceLayer({ ...this.components.resilience, clock, sleep, logger });
		const gateway = new VenueGateway({
			adapter,
			resilience,
			category: config.category,
			logger,
			clock,
			callTimeoutMs: config.callTimeoutMs,
		});
		const synchronizer = new StateSynchronizer({
			gateway,
			symbol,
			quoteAsset: config.quoteAsset,
			baseAmount: config.baseAmount,
			logger,
			clock,
			sleep,
		});
		const takeProfit = new TakeProfitManager({
			gateway,
			synchronizer,
			symbol,
			settings: config.takeProfit,
			dynamicPercent: this.components.dynamicPercent,
			logger,
			clock,
			callTimeoutMs: config.callTimeoutMs,
		});
		const coordinator = new LoopCoordinator({
			config,
			gateway,
			synchronizer,
			takeProfit,
			spacing: spacing.value,
			signal,
			logger,
			clock,
			sleep,
		});

		logger.info(
			{ venue: adapter.name, category: config.category, interval: config.interval, spacing: spacing.value.name },
			"bot assembled",
		);
		return ok({ config, resilience, gateway, synchronizer, takeProfit, coordinator });
	}
}
