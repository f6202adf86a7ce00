export {
	BinanceFuturesClient,
	createBinanceUsdm,
	type BinanceClientOptions,
	type CcxtFuturesExchange,
} from "./binanceClient";
export {
	mapCcxtBalances,
	mapCcxtOrder,
	mapCcxtPosition,
	mapOrderStatus,
	toExchangeError,
	toExchangeSymbol,
	type CcxtOrderView,
	type CcxtPositionView,
} from "./orderMapping";
