import {
	ExchangeError,
	createLogger,
	type AccountClient,
	type AccountSnapshot,
	type ExecutionClient,
	type MarketDataClient,
	type OrderRequest,
	type OrderResult,
	type PositionInfo,
} from "@slicebot/core";

const paperLogger = createLogger("execution-engine:paper");

export interface PaperFill {
	orderId: string;
	symbol: string;
	side: OrderRequest["side"];
	quantity: number;
	price: number;
	timestamp: string;
}

export interface PaperExecutionOptions {
	marketData: MarketDataClient;
	/** Opening wallet balance in the quote asset. */
	startingBalance?: number;
	quoteAsset?: string;
	now?: () => number;
}

interface PaperPosition {
	/** Signed: long positive. */
	quantity: number;
	entryPrice: number;
}

const DEFAULT_STARTING_BALANCE = 10_000;

const roundAmount = (value: number): number => Math.round(value * 1e8) / 1e8;

/**
 * Simulated execution against live prices. Market orders fill at the last
 * price; limit orders fill at their limit when marketable and otherwise rest
 * as NEW. Resting orders are never matched later.
 *
 * The account is a single quote-asset wallet credited with realized PnL;
 * margin is not modelled.
 */
export class PaperExecutionClient implements ExecutionClient, AccountClient {
	private readonly orders = new Map<string, OrderResult>();
	private readonly byClientOrderId = new Map<string, string>();
	private readonly fills: PaperFill[] = [];
	private readonly now: () => number;
	private sequence = 0;

	constructor(private readonly options: PaperExecutionOptions) {
		this.now = options.now ?? Date.now;
	}

	async placeOrder(request: OrderRequest): Promise<OrderResult> {
		if (request.clientOrderId && this.byClientOrderId.has(request.clientOrderId)) {
			throw new ExchangeError({
				code: "DUPLICATE_CLIENT_ORDER_ID",
				message: `Client order id ${request.clientOrderId} already used`,
				retryable: false,
			});
		}

		const marketPrice = await this.options.marketData.getCurrentPrice(
			request.symbol
		);
		const fillPrice = this.resolveFillPrice(request, marketPrice);
		this.sequence += 1;
		const orderId = `paper-${this.sequence}`;
		const result: OrderResult = {
			orderId,
			clientOrderId: request.clientOrderId,
			symbol: request.symbol,
			side: request.side,
			type: request.type,
			status: fillPrice === null ? "NEW" : "FILLED",
			quantity: request.quantity,
			price: request.type === "LIMIT" ? request.price ?? null : null,
			executedQty: fillPrice === null ? 0 : request.quantity,
			avgPrice: fillPrice,
		};

		this.orders.set(orderId, result);
		if (request.clientOrderId) {
			this.byClientOrderId.set(request.clientOrderId, orderId);
		}
		if (fillPrice !== null) {
			this.fills.push({
				orderId,
				symbol: request.symbol,
				side: request.side,
				quantity: request.quantity,
				price: fillPrice,
				timestamp: new Date(this.now()).toISOString(),
			});
		}

		paperLogger.info(fillPrice === null ? "paper_order_resting" : "paper_order_filled", {
			orderId,
			clientOrderId: request.clientOrderId,
			symbol: request.symbol,
			side: request.side,
			type: request.type,
			quantity: request.quantity,
			price: fillPrice ?? request.price ?? null,
			marketPrice,
		});
		return { ...result };
	}

	async findOrder(
		_symbol: string,
		clientOrderId: string
	): Promise<OrderResult | null> {
		const orderId = this.byClientOrderId.get(clientOrderId);
		const order = orderId ? this.orders.get(orderId) : undefined;
		return order ? { ...order } : null;
	}

	getFills(): PaperFill[] {
		return this.fills.map((fill) => ({ ...fill }));
	}

	/**
	 * Net filled quantity per symbol, buys positive.
	 */
	getNetPosition(symbol: string): number {
		return this.fills
			.filter((fill) => fill.symbol === symbol)
			.reduce(
				(total, fill) =>
					total + (fill.side === "BUY" ? fill.quantity : -fill.quantity),
				0
			);
	}

	async getAccount(): Promise<AccountSnapshot> {
		const { positions, realizedPnl } = this.replayFills();
		const open: PositionInfo[] = [];
		let unrealizedTotal = 0;
		for (const [symbol, position] of positions) {
			const markPrice = await this.options.marketData.getCurrentPrice(symbol);
			const unrealizedPnl = roundAmount(
				(markPrice - position.entryPrice) * position.quantity
			);
			unrealizedTotal += unrealizedPnl;
			open.push({
				symbol,
				side: position.quantity > 0 ? "LONG" : "SHORT",
				quantity: Math.abs(position.quantity),
				entryPrice: roundAmount(position.entryPrice),
				markPrice,
				unrealizedPnl,
				leverage: null,
			});
		}
		const wallet = roundAmount(
			(this.options.startingBalance ?? DEFAULT_STARTING_BALANCE) + realizedPnl
		);
		paperLogger.debug("paper_account_read", {
			wallet,
			positions: open.length,
			unrealizedPnl: roundAmount(unrealizedTotal),
		});
		return {
			balances: [
				{
					asset: this.options.quoteAsset ?? "USDT",
					free: wallet,
					used: 0,
					total: wallet,
				},
			],
			positions: open,
		};
	}

	/**
	 * Net positions with average entry prices, and the PnL realized by
	 * reducing or flipping them, in fill order.
	 */
	private replayFills(): {
		positions: Map<string, PaperPosition>;
		realizedPnl: number;
	} {
		const positions = new Map<string, PaperPosition>();
		let realizedPnl = 0;
		for (const fill of this.fills) {
			const signed = fill.side === "BUY" ? fill.quantity : -fill.quantity;
			const current = positions.get(fill.symbol) ?? { quantity: 0, entryPrice: 0 };
			const next = roundAmount(current.quantity + signed);

			if (current.quantity === 0 || Math.sign(current.quantity) === Math.sign(signed)) {
				const size = Math.abs(current.quantity) + fill.quantity;
				current.entryPrice =
					(Math.abs(current.quantity) * current.entryPrice +
						fill.quantity * fill.price) /
					size;
			} else {
				const closed = Math.min(fill.quantity, Math.abs(current.quantity));
				realizedPnl +=
					closed * (fill.price - current.entryPrice) * Math.sign(current.quantity);
				if (Math.sign(next) === Math.sign(signed)) {
					current.entryPrice = fill.price;
				}
			}

			current.quantity = next;
			if (next === 0) {
				positions.delete(fill.symbol);
			} else {
				positions.set(fill.symbol, current);
			}
		}
		return { positions, realizedPnl: roundAmount(realizedPnl) };
	}

	private resolveFillPrice(
		request: OrderRequest,
		marketPrice: number
	): number | null {
		if (request.type === "MARKET") {
			return marketPrice;
		}
		const limit = request.price;
		if (limit === undefined) {
			throw new ExchangeError({
				code: "INVALID_ORDER",
				message: "LIMIT order requires a price",
				retryable: false,
			});
		}
		const marketable =
			request.side === "BUY" ? limit >= marketPrice : limit <= marketPrice;
		return marketable ? limit : null;
	}
}
