import ccxt, { OrderNotFound } from "ccxt";
import {
	ExchangeError,
	createLogger,
	type AccountClient,
	type AccountSnapshot,
	type ExchangeClient,
	type ExchangeConfig,
	type OrderRequest,
	type OrderResult,
	type PositionInfo,
} from "@slicebot/core";
import {
	mapCcxtBalances,
	mapCcxtOrder,
	mapCcxtPosition,
	toExchangeError,
	type CcxtOrderView,
	type CcxtPositionView,
} from "./orderMapping";

const binanceLogger = createLogger("exchange:binance");

/**
 * The ccxt exchange surface this client calls. `ccxt.binanceusdm` satisfies
 * it; tests pass an in-process fake.
 */
export interface CcxtFuturesExchange {
	loadMarkets(): Promise<unknown>;
	market(symbol: string): { symbol: string };
	amountToPrecision(symbol: string, amount: number): string;
	priceToPrecision(symbol: string, price: number): string;
	fetchTicker(
		symbol: string
	): Promise<{ last?: number | null; close?: number | null }>;
	fetchOHLCV(
		symbol: string,
		timeframe?: string,
		since?: number,
		limit?: number
	): Promise<ReadonlyArray<ReadonlyArray<number | null | undefined>>>;
	createOrder(
		symbol: string,
		type: string,
		side: string,
		amount: number,
		price?: number,
		params?: Record<string, unknown>
	): Promise<CcxtOrderView>;
	fetchOrder(
		id: string,
		symbol?: string,
		params?: Record<string, unknown>
	): Promise<CcxtOrderView>;
	fetchBalance(): Promise<object>;
	fetchPositions(): Promise<CcxtPositionView[]>;
}

export type BinanceClientOptions = Pick<
	ExchangeConfig,
	"testnet" | "requestTimeoutMs" | "recvWindow" | "credentials"
>;

export const createBinanceUsdm = (
	options: BinanceClientOptions
): CcxtFuturesExchange => {
	const exchange = new ccxt.binanceusdm({
		apiKey: options.credentials.apiKey || undefined,
		secret: options.credentials.apiSecret || undefined,
		enableRateLimit: true,
		timeout: options.requestTimeoutMs,
		options: {
			defaultType: "future",
			recvWindow: options.recvWindow,
		},
	});
	if (options.testnet) {
		exchange.setSandboxMode(true);
	}
	return exchange;
};

/**
 * Binance USD-M futures client. Symbols are accepted in exchange form
 * ("BTCUSDT") or unified form ("BTC/USDT:USDT").
 */
export class BinanceFuturesClient implements ExchangeClient, AccountClient {
	private marketsLoaded = false;

	constructor(private readonly exchange: CcxtFuturesExchange) {}

	static fromConfig(options: BinanceClientOptions): BinanceFuturesClient {
		return new BinanceFuturesClient(createBinanceUsdm(options));
	}

	async getCurrentPrice(symbol: string): Promise<number> {
		const marketSymbol = await this.resolveMarketSymbol(symbol);
		const ticker = await this.request(() => this.exchange.fetchTicker(marketSymbol));
		const price = ticker.last ?? ticker.close;
		if (typeof price !== "number" || !Number.isFinite(price) || price <= 0) {
			throw new ExchangeError({
				code: "BAD_RESPONSE",
				message: `No usable price in ticker for ${symbol}`,
				retryable: true,
			});
		}
		return price;
	}

	async fetchCloses(
		symbol: string,
		interval: string,
		limit: number
	): Promise<number[]> {
		const marketSymbol = await this.resolveMarketSymbol(symbol);
		const rows = await this.request(() =>
			this.exchange.fetchOHLCV(marketSymbol, interval, undefined, limit)
		);
		const closes: number[] = [];
		for (const row of rows) {
			const close = row[4];
			if (typeof close === "number" && Number.isFinite(close)) {
				closes.push(close);
			}
		}
		return closes;
	}

	async placeOrder(request: OrderRequest): Promise<OrderResult> {
		const marketSymbol = await this.resolveMarketSymbol(request.symbol);
		const amount = this.precision(() =>
			this.exchange.amountToPrecision(marketSymbol, request.quantity)
		);
		if (!(amount > 0)) {
			throw new ExchangeError({
				code: "INVALID_ORDER",
				message: `Quantity ${request.quantity} rounds to zero for ${request.symbol}`,
				retryable: false,
			});
		}
		const limitPrice = request.type === "LIMIT" ? request.price : undefined;
		const price =
			limitPrice === undefined
				? undefined
				: this.precision(() =>
						this.exchange.priceToPrecision(marketSymbol, limitPrice)
					);
		const params: Record<string, unknown> = {};
		if (request.clientOrderId) {
			params.clientOrderId = request.clientOrderId;
		}

		const order = await this.request(() =>
			this.exchange.createOrder(
				marketSymbol,
				request.type === "LIMIT" ? "limit" : "market",
				request.side === "BUY" ? "buy" : "sell",
				amount,
				price,
				params
			)
		);
		const result = mapCcxtOrder(order, { ...request, quantity: amount });
		binanceLogger.info("order_submitted", {
			symbol: request.symbol,
			side: request.side,
			type: request.type,
			quantity: amount,
			price: price ?? null,
			orderId: result.orderId,
			clientOrderId: result.clientOrderId,
			status: result.status,
		});
		return result;
	}

	async findOrder(
		symbol: string,
		clientOrderId: string
	): Promise<OrderResult | null> {
		const marketSymbol = await this.resolveMarketSymbol(symbol);
		try {
			const order = await this.exchange.fetchOrder("", marketSymbol, {
				origClientOrderId: clientOrderId,
			});
			return mapCcxtOrder(order, {
				symbol,
				side: "BUY",
				type: "MARKET",
				quantity: 0,
				clientOrderId,
			});
		} catch (error) {
			if (error instanceof OrderNotFound) {
				return null;
			}
			binanceLogger.warn("order_lookup_failed", {
				symbol,
				clientOrderId,
				error: error instanceof Error ? error.message : String(error),
			});
			throw toExchangeError(error);
		}
	}

	async getAccount(): Promise<AccountSnapshot> {
		await this.ensureMarketsLoaded();
		const [balance, positions] = await Promise.all([
			this.request(() => this.exchange.fetchBalance()),
			this.request(() => this.exchange.fetchPositions()),
		]);
		return {
			balances: mapCcxtBalances(balance),
			positions: positions
				.map(mapCcxtPosition)
				.filter((position): position is PositionInfo => position !== null),
		};
	}

	private async resolveMarketSymbol(symbol: string): Promise<string> {
		await this.ensureMarketsLoaded();
		const direct = this.lookupMarket(symbol);
		if (direct) {
			return direct;
		}
		if (symbol.endsWith("USDT")) {
			const linear = this.lookupMarket(`${symbol.slice(0, -4)}/USDT:USDT`);
			if (linear) {
				return linear;
			}
		}
		throw new ExchangeError({
			code: "UNKNOWN_SYMBOL",
			message: `Unknown Binance futures symbol ${symbol}`,
			retryable: false,
		});
	}

	private lookupMarket(symbol: string): string | null {
		try {
			return this.exchange.market(symbol).symbol;
		} catch (error) {
			binanceLogger.debug("market_lookup_miss", {
				symbol,
				error: error instanceof Error ? error.message : String(error),
			});
			return null;
		}
	}

	private async ensureMarketsLoaded(): Promise<void> {
		if (this.marketsLoaded) {
			return;
		}
		await this.request(() => this.exchange.loadMarkets());
		this.marketsLoaded = true;
	}

	private async request<T>(operation: () => Promise<T>): Promise<T> {
		try {
			return await operation();
		} catch (error) {
			throw toExchangeError(error);
		}
	}

	private precision(operation: () => string): number {
		try {
			return Number(operation());
		} catch (error) {
			throw toExchangeError(error);
		}
	}
}
