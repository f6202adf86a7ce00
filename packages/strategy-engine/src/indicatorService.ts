import { createLogger, type MarketDataClient } from "@slicebot/core";
import { latestRsi } from "@slicebot/indicators";
import type { IndicatorProvider } from "./types";

const indicatorLogger = createLogger("strategy-engine:indicators");

export interface RsiIndicatorOptions {
	/** Candle timeframe the RSI is computed on. */
	interval: string;
	/** Candles fetched per reading. */
	lookback: number;
}

/**
 * RSI over recent candle closes. Any failure reads as "unavailable" so the
 * condition gate fails safe instead of crashing the run.
 */
export class RsiIndicatorService implements IndicatorProvider {
	constructor(
		private readonly marketData: MarketDataClient,
		private readonly options: RsiIndicatorOptions
	) {}

	async getRsi(symbol: string, period: number): Promise<number | null> {
		const limit = Math.max(this.options.lookback, period + 1);
		let closes: number[];
		try {
			closes = await this.marketData.fetchCloses(
				symbol,
				this.options.interval,
				limit
			);
		} catch (error) {
			indicatorLogger.warn("rsi_fetch_failed", {
				symbol,
				interval: this.options.interval,
				error: error instanceof Error ? error.message : String(error),
			});
			return null;
		}
		const value = latestRsi(closes, period);
		if (value === null) {
			indicatorLogger.debug("rsi_insufficient_data", {
				symbol,
				period,
				closes: closes.length,
			});
		}
		return value;
	}
}
