export type OrderSide = "BUY" | "SELL";
export type OrderType = "MARKET" | "LIMIT";

export type OrderStatus = "NEW" | "FILLED" | "PARTIALLY_FILLED" | "REJECTED";

export type ExecutionMode = "paper" | "live";

export interface OrderRequest {
	symbol: string;
	side: OrderSide;
	type: OrderType;
	quantity: number;
	price?: number;
	/**
	 * Caller-chosen id that lets a retry find an order submitted by an
	 * attempt whose response was lost.
	 */
	clientOrderId?: string;
}

/**
 * Normalized order state returned by every execution client, whatever the
 * venue reported.
 */
export interface OrderResult {
	orderId: string;
	clientOrderId?: string;
	symbol: string;
	side: OrderSide;
	type: OrderType;
	status: OrderStatus;
	quantity: number;
	price: number | null;
	executedQty: number;
	avgPrice: number | null;
}

export const ORDER_SIDES: readonly OrderSide[] = ["BUY", "SELL"];
export const ORDER_TYPES: readonly OrderType[] = ["MARKET", "LIMIT"];

export const isOrderSide = (value: unknown): value is OrderSide =>
	value === "BUY" || value === "SELL";

export const isOrderType = (value: unknown): value is OrderType =>
	value === "MARKET" || value === "LIMIT";

export type SentimentLabel = "Bearish" | "Neutral" | "Bullish";

/** Scores below this read as Bearish. */
export const BEARISH_SCORE = 30;
/** Scores above this read as Bullish. */
export const BULLISH_SCORE = 70;

export const scoreToSentimentLabel = (score: number): SentimentLabel => {
	if (score < BEARISH_SCORE) return "Bearish";
	if (score > BULLISH_SCORE) return "Bullish";
	return "Neutral";
};

export interface AssetBalance {
	asset: string;
	free: number;
	used: number;
	total: number;
}

export type PositionSide = "LONG" | "SHORT";

/** An open futures position; `quantity` is always positive. */
export interface PositionInfo {
	symbol: string;
	side: PositionSide;
	quantity: number;
	entryPrice: number | null;
	markPrice: number | null;
	unrealizedPnl: number | null;
	leverage: number | null;
}

export interface AccountSnapshot {
	balances: AssetBalance[];
	positions: PositionInfo[];
}
