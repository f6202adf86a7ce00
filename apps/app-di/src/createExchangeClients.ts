import {
	createLogger,
	type AccountClient,
	type ExecutionClient,
	type ExecutionMode,
	type MarketDataClient,
	type SlicebotConfig,
} from "@slicebot/core";
import { BinanceFuturesClient } from "@slicebot/exchange-binance";
import { PaperExecutionClient } from "@slicebot/execution-engine";

const logger = createLogger("app-di");

export interface ExchangeClients {
	mode: ExecutionMode;
	marketData: MarketDataClient;
	execution: ExecutionClient;
	/** Live balances in live mode, the paper wallet otherwise. */
	account: AccountClient;
}

/**
 * Prices always come from the exchange. Orders go to it only in live mode;
 * paper mode fills them locally against those prices.
 */
export const createExchangeClients = (
	config: Pick<SlicebotConfig, "env" | "exchange">
): ExchangeClients => {
	const binance = BinanceFuturesClient.fromConfig(config.exchange);
	const mode = config.env.executionMode;

	if (mode === "live") {
		const { apiKey, apiSecret } = config.exchange.credentials;
		if (!apiKey || !apiSecret) {
			logger.warn("live_mode_without_credentials", {
				exchange: config.exchange.id,
			});
		}
		return { mode, marketData: binance, execution: binance, account: binance };
	}

	const paper = new PaperExecutionClient({ marketData: binance });
	return { mode, marketData: binance, execution: paper, account: paper };
};
