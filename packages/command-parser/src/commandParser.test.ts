import { describe, expect, it, vi } from "vitest";
import { InvalidSpecError } from "@slicebot/core";
import { CommandParser, stripCodeFences } from "./commandParser";
import { CommandParseError } from "./errors";
import type { CompletionClient } from "./ollamaClient";

const createParser = (reply: string) => {
	const complete = vi.fn(async (_prompt: string) => reply);
	const client: CompletionClient = { complete };
	const parser = new CommandParser({ client, defaults: { quantityPrecision: 3 } });
	return { parser, complete };
};

describe("stripCodeFences", () => {
	it("removes a fenced block around JSON", () => {
		expect(stripCodeFences('```json\n{"intent": "twap"}\n```')).toBe('{"intent": "twap"}');
	});

	it("leaves bare JSON alone", () => {
		expect(stripCodeFences('  {"intent": "grid"} ')).toBe('{"intent": "grid"}');
	});
});

describe("CommandParser", () => {
	it("turns a TWAP reply into a validated spec", async () => {
		const { parser, complete } = createParser(
			[
				"```json",
				JSON.stringify({
					intent: "twap",
					parameters: {
						symbol: "BTCUSDT",
						side: "BUY",
						quantity: 0.5,
						duration_seconds: 7200,
						num_orders: 12,
						conditions: { pause_on_bearish: true },
					},
					confidence: 0.92,
					error: null,
				}),
				"```",
			].join("\n")
		);

		const parsed = await parser.parse("  Buy 0.5 BTC over 2 hours in 12 slices, pause if bearish ");

		expect(parsed).toEqual({
			intent: "twap",
			spec: {
				kind: "TWAP",
				symbol: "BTCUSDT",
				side: "BUY",
				totalQuantity: 0.5,
				durationSeconds: 7200,
				slices: 12,
				conditions: { pauseOnBearish: true },
			},
			confidence: 0.92,
		});
		expect(complete.mock.calls[0][0]).toContain(
			"COMMAND:\nBuy 0.5 BTC over 2 hours in 12 slices, pause if bearish"
		);
	});

	it("maps grid parameters and defaults the confidence", async () => {
		const { parser } = createParser(
			JSON.stringify({
				intent: "grid",
				parameters: {
					symbol: "SOLUSDT",
					lower_price: 130,
					upper_price: 150,
					grids: 10,
					quantity_per_grid: 0.5,
					conditions: { rsi_below: 40, rsi_above: null },
				},
			})
		);

		await expect(parser.parse("grid SOL 130-150")).resolves.toEqual({
			intent: "grid",
			spec: {
				kind: "GRID",
				symbol: "SOLUSDT",
				lowerPrice: 130,
				upperPrice: 150,
				levels: 10,
				quantityPerLevel: 0.5,
				conditions: { rsiBelow: 40 },
			},
			confidence: 0.5,
		});
	});

	it("returns market orders as order requests", async () => {
		const { parser } = createParser(
			JSON.stringify({
				intent: "market",
				parameters: { symbol: "ETHUSDT", side: "SELL", quantity: 1 },
				confidence: 0.9,
			})
		);

		await expect(parser.parse("sell 1 eth now")).resolves.toEqual({
			intent: "market",
			order: { symbol: "ETHUSDT", side: "SELL", type: "MARKET", quantity: 1 },
			confidence: 0.9,
		});
	});

	it("rejects an empty command without calling the model", async () => {
		const { parser, complete } = createParser("{}");
		await expect(parser.parse("   ")).rejects.toThrow("Empty command");
		expect(complete).not.toHaveBeenCalled();
	});

	it("rejects replies that are not JSON", async () => {
		const { parser } = createParser("Sure! You want to buy some bitcoin.");
		const attempt = parser.parse("buy btc");
		await expect(attempt).rejects.toBeInstanceOf(CommandParseError);
		await expect(attempt).rejects.toThrow(/^Invalid JSON response/);
	});

	it("rejects unknown intents", async () => {
		const { parser } = createParser(JSON.stringify({ intent: "dca", parameters: {} }));
		await expect(parser.parse("dca into btc")).rejects.toThrow("Unknown intent: dca");
	});

	it("passes the model's own error through", async () => {
		const { parser } = createParser(
			JSON.stringify({ intent: null, parameters: {}, confidence: 0, error: "quantity is missing" })
		);
		await expect(parser.parse("buy btc")).rejects.toThrow("quantity is missing");
	});

	it("validates the extracted spec like any other", async () => {
		const { parser } = createParser(
			JSON.stringify({
				intent: "twap",
				parameters: { symbol: "BTCUSDT", quantity: 0.5, duration_seconds: 600 },
			})
		);
		const attempt = parser.parse("buy half a bitcoin over ten minutes");
		await expect(attempt).rejects.toBeInstanceOf(InvalidSpecError);
		await expect(attempt).rejects.toThrow("slices must be an integer >= 1");
	});

	it("wraps completion failures", async () => {
		const client: CompletionClient = {
			complete: async () => {
				throw new Error("model not loaded");
			},
		};
		const parser = new CommandParser({ client, defaults: { quantityPrecision: 3 } });
		await expect(parser.parse("buy btc")).rejects.toThrow(
			"LLM request failed: model not loaded"
		);
	});
});
