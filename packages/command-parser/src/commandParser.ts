import { z } from "zod";
import { createLogger, type OrderRequest } from "@slicebot/core";
import {
	validateOrderRequest,
	validateStrategySpec,
	type SpecDefaults,
	type StrategySpec,
} from "@slicebot/strategy-engine";
import { CommandParseError } from "./errors";
import type { CompletionClient } from "./ollamaClient";
import { buildParsePrompt } from "./prompts";

const parserLogger = createLogger("command-parser");

const DEFAULT_CONFIDENCE = 0.5;

const optionalNumber = z.number().nullish();

const replySchema = z.object({
	intent: z.string().nullish(),
	parameters: z
		.object({
			symbol: z.string().nullish(),
			side: z.string().nullish(),
			quantity: optionalNumber,
			duration_seconds: optionalNumber,
			num_orders: optionalNumber,
			lower_price: optionalNumber,
			upper_price: optionalNumber,
			grids: optionalNumber,
			quantity_per_grid: optionalNumber,
			conditions: z
				.object({
					rsi_below: optionalNumber,
					rsi_above: optionalNumber,
					sentiment_above: optionalNumber,
					sentiment_below: optionalNumber,
					pause_on_bearish: z.boolean().nullish(),
				})
				.nullish(),
		})
		.nullish(),
	confidence: z.number().min(0).max(1).nullish(),
	error: z.string().nullish(),
});

type Reply = z.infer<typeof replySchema>;
type ReplyParameters = NonNullable<Reply["parameters"]>;

export type CommandIntent = "twap" | "grid" | "market";

export type ParsedCommand =
	| { intent: "twap" | "grid"; spec: StrategySpec; confidence: number }
	| { intent: "market"; order: OrderRequest; confidence: number };

const isIntent = (value: string): value is CommandIntent =>
	value === "twap" || value === "grid" || value === "market";

/** Drop markdown code fences some models wrap their JSON in. */
export const stripCodeFences = (text: string): string => {
	const trimmed = text.trim();
	if (!trimmed.startsWith("```")) {
		return trimmed;
	}
	return trimmed
		.split("\n")
		.filter((line) => !line.trim().startsWith("```"))
		.join("\n")
		.trim();
};

const toConditions = (parameters: ReplyParameters) => {
	const conditions = parameters.conditions;
	if (!conditions) {
		return undefined;
	}
	return {
		rsiBelow: conditions.rsi_below,
		rsiAbove: conditions.rsi_above,
		sentimentAbove: conditions.sentiment_above,
		sentimentBelow: conditions.sentiment_below,
		pauseOnBearish: conditions.pause_on_bearish,
	};
};

export interface CommandParserOptions {
	client: CompletionClient;
	defaults: SpecDefaults;
}

/**
 * Natural language to StrategySpec (or a market order) through an LLM.
 * Whatever the model returns is validated like any other submitted spec.
 */
export class CommandParser {
	constructor(private readonly options: CommandParserOptions) {}

	/**
	 * @throws CommandParseError when the reply cannot be used
	 * @throws InvalidSpecError / OrderValidationError when the extracted values are invalid
	 */
	async parse(text: string): Promise<ParsedCommand> {
		const command = text.trim();
		if (!command) {
			throw new CommandParseError("Empty command");
		}

		let raw: string;
		try {
			raw = await this.options.client.complete(buildParsePrompt(command));
		} catch (error) {
			if (error instanceof CommandParseError) {
				throw error;
			}
			throw new CommandParseError(
				`LLM request failed: ${error instanceof Error ? error.message : String(error)}`
			);
		}

		const reply = this.readReply(raw);
		const intent = reply.intent?.trim().toLowerCase();
		if (!intent) {
			throw new CommandParseError(reply.error ?? "Missing intent in response");
		}
		if (!isIntent(intent)) {
			throw new CommandParseError(`Unknown intent: ${intent}`);
		}

		const parameters: ReplyParameters = reply.parameters ?? {};
		const confidence = reply.confidence ?? DEFAULT_CONFIDENCE;
		const parsed = this.build(intent, parameters, confidence);
		parserLogger.info("command_parsed", {
			intent,
			confidence,
			command: command.slice(0, 50),
		});
		return parsed;
	}

	private readReply(raw: string): Reply {
		let json: unknown;
		try {
			json = JSON.parse(stripCodeFences(raw));
		} catch (error) {
			parserLogger.debug("unparseable_reply", { raw: raw.slice(0, 200) });
			throw new CommandParseError(
				`Invalid JSON response: ${error instanceof Error ? error.message : String(error)}`
			);
		}
		const result = replySchema.safeParse(json);
		if (!result.success) {
			throw new CommandParseError(
				`Unexpected response shape: ${result.error.issues
					.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
					.join("; ")}`
			);
		}
		return result.data;
	}

	private build(
		intent: CommandIntent,
		parameters: ReplyParameters,
		confidence: number
	): ParsedCommand {
		const side = parameters.side ?? "BUY";
		const conditions = toConditions(parameters);

		switch (intent) {
			case "market":
				return {
					intent,
					order: validateOrderRequest({
						symbol: parameters.symbol,
						side,
						type: "MARKET",
						quantity: parameters.quantity,
					}),
					confidence,
				};
			case "twap":
				return {
					intent,
					spec: validateStrategySpec(
						{
							kind: "TWAP",
							symbol: parameters.symbol,
							side,
							totalQuantity: parameters.quantity,
							durationSeconds: parameters.duration_seconds,
							slices: parameters.num_orders,
							conditions,
						},
						this.options.defaults
					),
					confidence,
				};
			case "grid":
				return {
					intent,
					spec: validateStrategySpec(
						{
							kind: "GRID",
							symbol: parameters.symbol,
							lowerPrice: parameters.lower_price,
							upperPrice: parameters.upper_price,
							levels: parameters.grids,
							quantityPerLevel: parameters.quantity_per_grid ?? parameters.quantity,
							conditions,
						},
						this.options.defaults
					),
					confidence,
				};
		}
	}
}
