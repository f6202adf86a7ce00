import {
	AuthenticationError,
	BaseError,
	DDoSProtection,
	InsufficientFunds,
	InvalidOrder,
	NetworkError,
	RateLimitExceeded,
	RequestTimeout,
} from "ccxt";
import {
	ExchangeError,
	type AssetBalance,
	type OrderRequest,
	type OrderResult,
	type OrderSide,
	type OrderStatus,
	type OrderType,
	type PositionInfo,
} from "@slicebot/core";

/**
 * The slice of a ccxt order this client reads.
 */
export interface CcxtOrderView {
	id: string;
	clientOrderId?: string;
	symbol?: string;
	side?: string;
	type?: string;
	status?: string;
	amount?: number | null;
	price?: number | null;
	filled?: number | null;
	average?: number | null;
}

export const mapOrderStatus = (
	status: string | undefined,
	filled: number
): OrderStatus => {
	switch (status) {
		case "closed":
			return "FILLED";
		case "canceled":
		case "expired":
		case "rejected":
			return "REJECTED";
		default:
			return filled > 0 ? "PARTIALLY_FILLED" : "NEW";
	}
};

const toFiniteOrNull = (value: number | null | undefined): number | null =>
	typeof value === "number" && Number.isFinite(value) ? value : null;

const mapSide = (side: string | undefined, fallback: OrderSide): OrderSide => {
	if (side === "buy") return "BUY";
	if (side === "sell") return "SELL";
	return fallback;
};

const mapType = (type: string | undefined, fallback: OrderType): OrderType => {
	if (type === "limit") return "LIMIT";
	if (type === "market") return "MARKET";
	return fallback;
};

export const mapCcxtOrder = (
	order: CcxtOrderView,
	request: Pick<OrderRequest, "symbol" | "side" | "type" | "quantity"> & {
		clientOrderId?: string;
	}
): OrderResult => {
	const executedQty = toFiniteOrNull(order.filled) ?? 0;
	return {
		orderId: String(order.id),
		clientOrderId: order.clientOrderId ?? request.clientOrderId,
		symbol: request.symbol,
		side: mapSide(order.side, request.side),
		type: mapType(order.type, request.type),
		status: mapOrderStatus(order.status, executedQty),
		quantity: toFiniteOrNull(order.amount) ?? request.quantity,
		price: toFiniteOrNull(order.price),
		executedQty,
		avgPrice: toFiniteOrNull(order.average),
	};
};

/**
 * The slice of a ccxt position this client reads.
 */
export interface CcxtPositionView {
	symbol: string;
	side?: string | null;
	contracts?: number | null;
	entryPrice?: number | null;
	markPrice?: number | null;
	unrealizedPnl?: number | null;
	leverage?: number | null;
}

/** "BTC/USDT:USDT" becomes "BTCUSDT"; exchange ids pass through. */
export const toExchangeSymbol = (symbol: string): string =>
	symbol.split(":")[0].replace("/", "");

// Top-level keys of a ccxt balance that are not currencies.
const BALANCE_META_KEYS = new Set([
	"info",
	"free",
	"used",
	"total",
	"debt",
	"timestamp",
	"datetime",
]);

const numberOrNull = (value: unknown): number | null =>
	typeof value === "number" ? value : null;

const readAmount = (entry: object, key: string): number =>
	toFiniteOrNull(numberOrNull(Reflect.get(entry, key))) ?? 0;

/**
 * Per-currency balances from a ccxt `fetchBalance` result, dropping empty
 * currencies. Sorted by asset.
 */
export const mapCcxtBalances = (balance: object): AssetBalance[] => {
	const entries: Array<[string, unknown]> = Object.entries(balance);
	const balances: AssetBalance[] = [];
	for (const [asset, entry] of entries) {
		if (BALANCE_META_KEYS.has(asset) || typeof entry !== "object" || entry === null) {
			continue;
		}
		const total = readAmount(entry, "total");
		if (total === 0) {
			continue;
		}
		balances.push({
			asset,
			free: readAmount(entry, "free"),
			used: readAmount(entry, "used"),
			total,
		});
	}
	return balances.sort((a, b) => a.asset.localeCompare(b.asset));
};

/** @returns null for a flat position */
export const mapCcxtPosition = (position: CcxtPositionView): PositionInfo | null => {
	const contracts = Math.abs(toFiniteOrNull(position.contracts) ?? 0);
	if (contracts === 0) {
		return null;
	}
	return {
		symbol: toExchangeSymbol(position.symbol),
		side: position.side === "short" ? "SHORT" : "LONG",
		quantity: contracts,
		entryPrice: toFiniteOrNull(position.entryPrice),
		markPrice: toFiniteOrNull(position.markPrice),
		unrealizedPnl: toFiniteOrNull(position.unrealizedPnl),
		leverage: toFiniteOrNull(position.leverage),
	};
};

const errorCode = (error: BaseError): string => {
	if (error instanceof RequestTimeout) return "TIMEOUT";
	if (error instanceof RateLimitExceeded || error instanceof DDoSProtection) {
		return "RATE_LIMITED";
	}
	if (error instanceof NetworkError) return "NETWORK";
	if (error instanceof InsufficientFunds) return "INSUFFICIENT_FUNDS";
	if (error instanceof InvalidOrder) return "INVALID_ORDER";
	if (error instanceof AuthenticationError) return "AUTH";
	return "EXCHANGE";
};

/**
 * Normalize whatever ccxt threw into an ExchangeError. The NetworkError
 * family (timeouts, rate limits, unavailable venue) is retryable; anything
 * the exchange answered is not.
 */
export const toExchangeError = (error: unknown): ExchangeError => {
	if (error instanceof ExchangeError) {
		return error;
	}
	if (error instanceof BaseError) {
		return new ExchangeError({
			code: errorCode(error),
			message: error.message,
			retryable: error instanceof NetworkError,
			cause: error,
		});
	}
	return new ExchangeError({
		code: "UNKNOWN",
		message: error instanceof Error ? error.message : String(error),
		retryable: false,
		cause: error,
	});
};
