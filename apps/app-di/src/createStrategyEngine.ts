import type { SlicebotConfig } from "@slicebot/core";
import {
	RsiIndicatorService,
	StrategyEngine,
	type SentimentProvider,
} from "@slicebot/strategy-engine";
import type { ExchangeClients } from "./createExchangeClients";

export const createStrategyEngine = (
	config: Pick<SlicebotConfig, "engine">,
	clients: ExchangeClients,
	sentiment?: SentimentProvider
): StrategyEngine =>
	new StrategyEngine({
		marketData: clients.marketData,
		execution: clients.execution,
		settings: config.engine,
		indicators: new RsiIndicatorService(clients.marketData, {
			interval: config.engine.rsiInterval,
			lookback: config.engine.rsiLookback,
		}),
		sentiment,
	});
