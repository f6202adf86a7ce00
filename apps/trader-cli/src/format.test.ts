import { describe, expect, it } from "vitest";
import type { RunState } from "@slicebot/strategy-engine";
import {
	formatAccount,
	formatOrder,
	formatRun,
	formatSentiment,
	formatTable,
} from "./format";

const runState = (overrides: Partial<RunState> = {}): RunState => ({
	runId: "r1",
	spec: {
		kind: "TWAP",
		symbol: "BTCUSDT",
		side: "BUY",
		totalQuantity: 0.002,
		durationSeconds: 10,
		slices: 1,
	},
	status: "COMPLETED",
	steps: [],
	results: [
		{
			stepIndex: 0,
			action: { side: "BUY", type: "MARKET", quantity: 0.002, price: "MARKET" },
			outcome: "FILLED",
			orderId: "o-1",
			attempts: 1,
			timestamp: "2024-05-01T00:00:00.000Z",
		},
	],
	progress: { kind: "sequential", nextIndex: 1 },
	createdAt: "2024-05-01T00:00:00.000Z",
	lastActionAt: "2024-05-01T00:00:00.000Z",
	skipCount: 0,
	terminalReason: null,
	referencePrice: null,
	...overrides,
});

describe("CLI formatting", () => {
	it("pads every column but the last", () => {
		expect(formatTable(["a", "bb"], [["ccc", "d"]])).toBe("a    bb\nccc  d");
	});

	it("renders a run as a step table", () => {
		expect(formatRun(runState()).split("\n")).toEqual([
			"run r1 TWAP BTCUSDT COMPLETED",
			"step  outcome  side  qty    price   order  attempts  note",
			"0     FILLED   BUY   0.002  MARKET  o-1    1",
		]);
	});

	it("shows the terminal reason of a run without steps", () => {
		expect(
			formatRun(runState({ status: "CANCELLED", terminalReason: "cancelled by request", results: [] }))
		).toBe("run r1 TWAP BTCUSDT CANCELLED (cancelled by request)\nno steps recorded");
	});

	it("summarizes an order", () => {
		expect(
			formatOrder({
				orderId: "42",
				symbol: "BTCUSDT",
				side: "SELL",
				type: "LIMIT",
				status: "NEW",
				quantity: 0.01,
				price: 65000,
				executedQty: 0,
				avgPrice: null,
			})
		).toBe("order 42 NEW\nSELL 0.01 BTCUSDT LIMIT @ 65000\nexecuted 0");
	});

	it("summarizes a sentiment reading", () => {
		expect(
			formatSentiment("BTCUSDT", {
				score: 72.345,
				label: "Bullish",
				confidence: 0.5,
				dataPoints: 5,
				lastUpdate: null,
			})
		).toBe("BTCUSDT sentiment 72.3 Bullish (confidence 0.50, 5 points, updated never)");
	});
});

describe("formatAccount", () => {
	it("lists balances and positions", () => {
		const text = formatAccount("paper", {
			balances: [{ asset: "USDT", free: 10027.5, used: 0, total: 10027.5 }],
			positions: [
				{
					symbol: "BTCUSDT",
					side: "SHORT",
					quantity: 1.5,
					entryPrice: 115,
					markPrice: 120,
					unrealizedPnl: -7.5,
					leverage: null,
				},
			],
		});
		expect(text.split("\n")).toEqual([
			"account (paper)",
			"asset  free     used  total",
			"USDT   10027.5  0     10027.5",
			"",
			"symbol   side   qty  entry  mark  pnl   leverage",
			"BTCUSDT  SHORT  1.5  115    120   -7.5  -",
		]);
	});

	it("says when the account is empty", () => {
		expect(formatAccount("live", { balances: [], positions: [] })).toBe(
			"account (live)\nno balances\n\nno open positions"
		);
	});
});
