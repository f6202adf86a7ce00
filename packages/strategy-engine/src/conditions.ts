import { BEARISH_SCORE } from "@slicebot/core";
import type { StrategyConditions } from "./types";

export interface ConditionInputs {
	rsi?: number | null;
	sentiment?: number | null;
}

export interface ConditionEvaluation {
	allowed: boolean;
	reasons: string[];
}

export const RSI_UNAVAILABLE = "rsi unavailable";
export const SENTIMENT_UNAVAILABLE = "sentiment unavailable";

const format = (value: number): string => String(Number(value.toFixed(2)));

export const requiredInputs = (
	conditions: StrategyConditions | undefined
): { rsi: boolean; sentiment: boolean } => ({
	rsi: conditions?.rsiBelow !== undefined || conditions?.rsiAbove !== undefined,
	sentiment:
		conditions?.sentimentAbove !== undefined ||
		conditions?.sentimentBelow !== undefined ||
		conditions?.pauseOnBearish === true,
});

/**
 * Pure gate over one snapshot of indicator and sentiment values. Every
 * declared condition adds a reason; a missing input fails its conditions.
 */
export const evaluateConditions = (
	conditions: StrategyConditions | undefined,
	inputs: ConditionInputs
): ConditionEvaluation => {
	if (!conditions) {
		return { allowed: true, reasons: [] };
	}

	let allowed = true;
	const reasons: string[] = [];
	const fail = (reason: string): void => {
		allowed = false;
		if (!reasons.includes(reason)) {
			reasons.push(reason);
		}
	};

	const check = (
		threshold: number | undefined,
		value: number | null | undefined,
		unavailable: string,
		label: string,
		holds: (actual: number, limit: number) => boolean,
		relation: string
	): void => {
		if (threshold === undefined) {
			return;
		}
		if (value === null || value === undefined || !Number.isFinite(value)) {
			fail(unavailable);
			return;
		}
		if (holds(value, threshold)) {
			reasons.push(`${label} ${format(value)} ${relation} ${threshold}`);
		} else {
			fail(`${label} ${format(value)} not ${relation === "<" ? "below" : "above"} ${threshold}`);
		}
	};

	const { rsi, sentiment } = inputs;
	check(conditions.rsiBelow, rsi, RSI_UNAVAILABLE, "rsi", (a, b) => a < b, "<");
	check(conditions.rsiAbove, rsi, RSI_UNAVAILABLE, "rsi", (a, b) => a > b, ">");
	check(
		conditions.sentimentAbove,
		sentiment,
		SENTIMENT_UNAVAILABLE,
		"sentiment",
		(a, b) => a > b,
		">"
	);
	check(
		conditions.sentimentBelow,
		sentiment,
		SENTIMENT_UNAVAILABLE,
		"sentiment",
		(a, b) => a < b,
		"<"
	);

	if (conditions.pauseOnBearish) {
		if (sentiment === null || sentiment === undefined || !Number.isFinite(sentiment)) {
			fail(SENTIMENT_UNAVAILABLE);
		} else if (sentiment < BEARISH_SCORE) {
			fail(`sentiment ${format(sentiment)} is bearish`);
		} else {
			reasons.push(`sentiment ${format(sentiment)} not bearish`);
		}
	}

	return { allowed, reasons };
};
