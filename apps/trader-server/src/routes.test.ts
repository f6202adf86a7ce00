import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import {
	ExchangeError,
	type AccountSnapshot,
	type ExchangeClient,
	type OrderRequest,
	type OrderResult,
} from "@slicebot/core";
import { CommandParseError, type ParsedCommand } from "@slicebot/command-parser";
import type { SentimentReading } from "@slicebot/sentiment";
import { StrategyEngine } from "@slicebot/strategy-engine";
import { createRouter, type Router } from "./routes";

const filledOrder = (request: OrderRequest): OrderResult => ({
	orderId: "o-1",
	clientOrderId: request.clientOrderId,
	symbol: request.symbol,
	side: request.side,
	type: request.type,
	status: "FILLED",
	quantity: request.quantity,
	price: request.price ?? null,
	executedQty: request.quantity,
	avgPrice: 100,
});

const neutral: SentimentReading = {
	score: 50,
	label: "Neutral",
	confidence: 0,
	dataPoints: 0,
	lastUpdate: null,
};

const account: AccountSnapshot = {
	balances: [{ asset: "USDT", free: 900, used: 100, total: 1000 }],
	positions: [
		{
			symbol: "BTCUSDT",
			side: "LONG",
			quantity: 0.01,
			entryPrice: 60000,
			markPrice: 61000,
			unrealizedPnl: 10,
			leverage: 5,
		},
	],
};

const twapSpec = {
	kind: "TWAP",
	symbol: "BTCUSDT",
	side: "BUY",
	totalQuantity: 0.006,
	durationSeconds: 30,
	slices: 3,
};

describe("trader-server routes", () => {
	let engine: StrategyEngine;
	let placeOrder: Mock<(request: OrderRequest) => Promise<OrderResult>>;
	let parse: Mock<(text: string) => Promise<ParsedCommand>>;
	let getAccount: Mock<() => Promise<AccountSnapshot>>;
	let track: Mock<(symbol: string) => Promise<void>>;
	let router: Router;

	const call = (method: string, url: string, body: unknown = "") =>
		router({
			method,
			url,
			body: typeof body === "string" ? body : JSON.stringify(body),
		});

	beforeEach(() => {
		placeOrder = vi.fn(async (request: OrderRequest) => filledOrder(request));
		parse = vi.fn<(text: string) => Promise<ParsedCommand>>();
		getAccount = vi.fn(async () => account);
		track = vi.fn(async (_symbol: string) => {});
		const exchange: ExchangeClient = {
			getCurrentPrice: async () => 100,
			fetchCloses: async () => [],
			placeOrder,
			findOrder: async () => null,
		};
		let nextId = 0;
		engine = new StrategyEngine({
			marketData: exchange,
			execution: exchange,
			settings: {
				quantityPrecision: 3,
				maxConditionSkips: 3,
				maxRetries: 1,
				retryBaseDelayMs: 10,
				retryMaxDelayMs: 10,
				requestTimeoutMs: 1_000,
				gridPollIntervalMs: 1_000,
				rsiPeriod: 14,
			},
			generateId: () => `run-${++nextId}`,
		});
		router = createRouter({
			mode: "paper",
			engine,
			execution: exchange,
			account: { getAccount },
			commandParser: { parse },
			sentiment: {
				track,
				getReading: () => neutral,
				getBreakdown: () => ({ reddit: neutral }),
			},
		});
	});

	afterEach(async () => {
		await engine.stop();
	});

	it("reports health", async () => {
		await expect(call("GET", "/health")).resolves.toEqual({
			status: 200,
			body: { status: "ok", mode: "paper", activeRuns: 0 },
		});
	});

	it("submits and reads back a strategy run", async () => {
		await expect(call("POST", "/strategies", twapSpec)).resolves.toEqual({
			status: 202,
			body: { runId: "run-1" },
		});

		const status = await call("GET", "/strategies/run-1");
		expect(status.status).toBe(200);
		expect(status.body).toMatchObject({ runId: "run-1", spec: { kind: "TWAP" } });

		const list = await call("GET", "/strategies");
		expect(list.body).toMatchObject({ runs: [{ runId: "run-1", stepsPlanned: 3 }] });
	});

	it("maps an invalid spec to 400 with every issue", async () => {
		const response = await call("POST", "/strategies", { kind: "TWAP" });
		expect(response.status).toBe(400);
		expect(response.body).toMatchObject({
			error: "INVALID_SPEC",
			issues: [
				"symbol is required",
				"side must be BUY or SELL",
				"totalQuantity must be a positive number",
				"durationSeconds must be a positive number",
				"slices must be an integer >= 1",
			],
		});
	});

	it("maps unknown runs to 404", async () => {
		await expect(call("GET", "/strategies/missing")).resolves.toEqual({
			status: 404,
			body: { error: "NOT_FOUND", message: "Unknown run id: missing" },
		});
	});

	it("refuses to delete an active run and accepts a cancel", async () => {
		await call("POST", "/strategies", twapSpec);

		const purge = await call("DELETE", "/strategies/run-1");
		expect(purge.status).toBe(409);
		expect(purge.body).toEqual({ error: "RUN_ACTIVE", message: "Run run-1 is still active" });

		await expect(call("POST", "/strategies/run-1/cancel")).resolves.toEqual({
			status: 202,
			body: { runId: "run-1", cancelRequested: true },
		});
		const state = await engine.whenSettled("run-1");
		expect(state.status).toBe("CANCELLED");

		await expect(call("DELETE", "/strategies/run-1")).resolves.toEqual({
			status: 204,
			body: null,
		});
	});

	it("places a manual order", async () => {
		const response = await call("POST", "/orders", {
			symbol: "btcusdt",
			side: "buy",
			type: "market",
			quantity: 0.01,
		});
		expect(response.status).toBe(201);
		expect(placeOrder).toHaveBeenCalledWith({
			symbol: "BTCUSDT",
			side: "BUY",
			type: "MARKET",
			quantity: 0.01,
		});
	});

	it("rejects a body that is not JSON", async () => {
		await expect(call("POST", "/orders", "{")).resolves.toEqual({
			status: 400,
			body: { error: "BAD_REQUEST", message: "Request body is not valid JSON" },
		});
	});

	it("maps exchange failures to 502", async () => {
		placeOrder.mockRejectedValueOnce(
			new ExchangeError({
				code: "INSUFFICIENT_FUNDS",
				message: "margin is insufficient",
				retryable: false,
			})
		);
		await expect(
			call("POST", "/orders", { symbol: "BTCUSDT", side: "BUY", type: "MARKET", quantity: 1 })
		).resolves.toEqual({
			status: 502,
			body: { error: "INSUFFICIENT_FUNDS", message: "margin is insufficient", retryable: false },
		});
	});

	it("parses a command without executing it", async () => {
		const parsed: ParsedCommand = {
			intent: "market",
			order: { symbol: "BTCUSDT", side: "BUY", type: "MARKET", quantity: 0.01 },
			confidence: 0.9,
		};
		parse.mockResolvedValue(parsed);

		await expect(call("POST", "/commands", { text: "buy 0.01 btc" })).resolves.toEqual({
			status: 200,
			body: { parsed },
		});
		expect(placeOrder).not.toHaveBeenCalled();

		const executed = await call("POST", "/commands", { text: "buy 0.01 btc", execute: true });
		expect(executed.status).toBe(201);
		expect(placeOrder).toHaveBeenCalledTimes(1);
	});

	it("maps parse failures to 422", async () => {
		parse.mockRejectedValue(new CommandParseError("Unknown intent: dca"));
		await expect(call("POST", "/commands", { text: "dca" })).resolves.toEqual({
			status: 422,
			body: { error: "COMMAND_PARSE", message: "Unknown intent: dca" },
		});
		await expect(call("POST", "/commands", {})).resolves.toEqual({
			status: 400,
			body: { error: "BAD_REQUEST", message: "text is required" },
		});
	});

	it("returns the sentiment reading and per-source breakdown for a symbol", async () => {
		await expect(call("GET", "/sentiment/ethusdt")).resolves.toEqual({
			status: 200,
			body: { symbol: "ETHUSDT", ...neutral, sources: { reddit: neutral } },
		});
		expect(track).toHaveBeenCalledWith("ETHUSDT");
	});

	it("returns balances and open positions", async () => {
		await expect(call("GET", "/account")).resolves.toEqual({
			status: 200,
			body: { mode: "paper", ...account },
		});
	});

	it("maps account read failures to 502", async () => {
		getAccount.mockRejectedValueOnce(
			new ExchangeError({ code: "AUTH", message: "invalid api key", retryable: false })
		);
		await expect(call("GET", "/account")).resolves.toEqual({
			status: 502,
			body: { error: "AUTH", message: "invalid api key", retryable: false },
		});
	});

	it("answers unknown routes with 404", async () => {
		await expect(call("GET", "/nope")).resolves.toEqual({
			status: 404,
			body: { error: "ROUTE_NOT_FOUND", message: "No route for GET /nope" },
		});
	});
});
