import type { ExecutionClient } from "./ExecutionClient";
import type { MarketDataClient } from "./MarketDataClient";

export type { AccountClient } from "./AccountClient";
export type { MarketDataClient } from "./MarketDataClient";
export type { ExecutionClient } from "./ExecutionClient";

/**
 * Full exchange surface: what the strategy engine needs from one venue.
 */
export type ExchangeClient = MarketDataClient & ExecutionClient;
