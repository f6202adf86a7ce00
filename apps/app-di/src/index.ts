export { createCommandParser } from "./createCommandParser";
export { createExchangeClients } from "./createExchangeClients";
export type { ExchangeClients } from "./createExchangeClients";
export { createSentimentWorker } from "./createSentimentWorker";
export { createServices } from "./createServices";
export type { SlicebotServices } from "./createServices";
export { createStrategyEngine } from "./createStrategyEngine";
