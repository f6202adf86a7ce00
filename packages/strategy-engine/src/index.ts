export * from "./types";
export {
	RSI_UNAVAILABLE,
	SENTIMENT_UNAVAILABLE,
	evaluateConditions,
	requiredInputs,
} from "./conditions";
export type { ConditionEvaluation, ConditionInputs } from "./conditions";
export {
	armGridSteps,
	clientOrderIdFor,
	gridLevelPrices,
	isGridTriggered,
	planGridSteps,
	planTwapSteps,
	splitQuantity,
} from "./planner";
export { backoffDelay, runWithRetry } from "./retry";
export type { RetryOptions, RetryOutcome, RetryPolicy } from "./retry";
export { RunRegistry } from "./runRegistry";
export type { RunPatch } from "./runRegistry";
export { validateOrderRequest, validateStrategySpec } from "./validateSpec";
export type { SpecDefaults } from "./validateSpec";
export { RsiIndicatorService } from "./indicatorService";
export type { RsiIndicatorOptions } from "./indicatorService";
export { StrategyEngine } from "./strategyEngine";
export type { EngineSettings, StrategyEngineOptions } from "./strategyEngine";
