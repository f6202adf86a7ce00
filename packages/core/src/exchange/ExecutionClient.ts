import type { OrderRequest, OrderResult } from "../types";

/**
 * Execution client interface for placing and reconciling orders.
 *
 * Kept separate from MarketDataClient so paper execution can sit on top of
 * a read-only price feed.
 */
export interface ExecutionClient {
	/**
	 * Submit an order.
	 * @throws ExchangeError with `retryable` set for transient failures
	 */
	placeOrder(request: OrderRequest): Promise<OrderResult>;

	/**
	 * Look an order up by the client order id it was submitted with.
	 * @returns null when the venue has no such order
	 */
	findOrder(symbol: string, clientOrderId: string): Promise<OrderResult | null>;
}
