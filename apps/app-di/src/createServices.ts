import { createLogger, type SlicebotConfig } from "@slicebot/core";
import type { CommandParser } from "@slicebot/command-parser";
import type { SentimentWorker } from "@slicebot/sentiment";
import type { StrategyEngine } from "@slicebot/strategy-engine";
import { createCommandParser } from "./createCommandParser";
import {
	createExchangeClients,
	type ExchangeClients,
} from "./createExchangeClients";
import { createSentimentWorker } from "./createSentimentWorker";
import { createStrategyEngine } from "./createStrategyEngine";

const logger = createLogger("app-di");

export interface SlicebotServices {
	config: SlicebotConfig;
	clients: ExchangeClients;
	sentimentWorker: SentimentWorker;
	engine: StrategyEngine;
	commandParser: CommandParser;
	/** Cancel active runs and stop background polling. */
	shutdown(): Promise<void>;
}

export const createServices = (config: SlicebotConfig): SlicebotServices => {
	const clients = createExchangeClients(config);
	const sentimentWorker = createSentimentWorker(config);
	const engine = createStrategyEngine(config, clients, sentimentWorker);
	const commandParser = createCommandParser(config);

	logger.info("services_ready", {
		mode: clients.mode,
		exchange: config.exchange.id,
		testnet: config.exchange.testnet,
		defaultSymbol: config.exchange.defaultSymbol,
	});

	return {
		config,
		clients,
		sentimentWorker,
		engine,
		commandParser,
		shutdown: async () => {
			await engine.stop();
			if (sentimentWorker.isRunning()) {
				await sentimentWorker.stop();
			}
		},
	};
};
