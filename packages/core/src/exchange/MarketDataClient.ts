/**
 * Market data client interface for the prices the strategies trigger on and
 * the candles indicators are computed from.
 */
export interface MarketDataClient {
	/**
	 * Latest traded price for a symbol (e.g. "BTCUSDT").
	 */
	getCurrentPrice(symbol: string): Promise<number>;

	/**
	 * Closing prices of the most recent candles, oldest first.
	 * @param interval - Candle timeframe (e.g. "1m", "1h")
	 * @param limit - Maximum number of candles to fetch
	 */
	fetchCloses(symbol: string, interval: string, limit: number): Promise<number[]>;
}
