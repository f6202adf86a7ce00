import { requiredInputs, validateStrategySpec } from "@slicebot/strategy-engine";
import {
	getBooleanArg,
	getNumberArg,
	getStringArg,
	type CliArgs,
} from "./cliArgs";

export const USAGE = `Usage: slicebot <command> [options]

Commands:
  order      --side BUY|SELL --quantity <q> [--type MARKET|LIMIT] [--price <p>]
  twap       --side BUY|SELL --quantity <q> --duration <seconds> --slices <n>
  grid       --lower <p> --upper <p> --levels <n> --quantity <q per level>
  ask        "<command in plain English>" [--yes]
  sentiment  [symbol]
  account
  config

Common options:
  --symbol <SYMBOL>   defaults to the exchange profile's symbol
  --rsi-below <v> --rsi-above <v> --sentiment-above <v> --sentiment-below <v>
  --pause-on-bearish  (twap and grid only)`;

const conditionFlags = {
	rsiBelow: "rsi-below",
	rsiAbove: "rsi-above",
	sentimentAbove: "sentiment-above",
	sentimentBelow: "sentiment-below",
} as const;

export const buildConditions = (
	args: CliArgs
): Record<string, number | boolean> | undefined => {
	const conditions: Record<string, number | boolean> = {};
	for (const [key, flag] of Object.entries(conditionFlags)) {
		const value = getNumberArg(args, flag);
		if (value !== undefined) {
			conditions[key] = value;
		}
	}
	if (getBooleanArg(args, "pause-on-bearish")) {
		conditions.pauseOnBearish = true;
	}
	return Object.keys(conditions).length ? conditions : undefined;
};

const symbolOf = (args: CliArgs, defaultSymbol: string): string =>
	getStringArg(args, "symbol") ?? defaultSymbol;

export const buildTwapInput = (
	args: CliArgs,
	defaultSymbol: string
): Record<string, unknown> => ({
	kind: "TWAP",
	symbol: symbolOf(args, defaultSymbol),
	side: getStringArg(args, "side") ?? "BUY",
	totalQuantity: getNumberArg(args, "quantity"),
	durationSeconds: getNumberArg(args, "duration"),
	slices: getNumberArg(args, "slices"),
	conditions: buildConditions(args),
});

export const buildGridInput = (
	args: CliArgs,
	defaultSymbol: string
): Record<string, unknown> => ({
	kind: "GRID",
	symbol: symbolOf(args, defaultSymbol),
	lowerPrice: getNumberArg(args, "lower"),
	upperPrice: getNumberArg(args, "upper"),
	levels: getNumberArg(args, "levels"),
	quantityPerLevel: getNumberArg(args, "quantity"),
	conditions: buildConditions(args),
});

export const buildOrderInput = (
	args: CliArgs,
	defaultSymbol: string
): Record<string, unknown> => {
	const price = getNumberArg(args, "price");
	return {
		symbol: symbolOf(args, defaultSymbol),
		side: getStringArg(args, "side"),
		type: getStringArg(args, "type") ?? (price === undefined ? "MARKET" : "LIMIT"),
		quantity: getNumberArg(args, "quantity"),
		price,
	};
};

/**
 * Whether a strategy input gates on sentiment, in which case the CLI keeps
 * the sentiment worker polling for the length of the run. Throws the same
 * InvalidSpecError the engine would.
 */
export const needsSentimentFeed = (
	input: unknown,
	quantityPrecision: number
): boolean =>
	requiredInputs(validateStrategySpec(input, { quantityPrecision }).conditions)
		.sentiment;
