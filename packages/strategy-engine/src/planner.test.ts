import { describe, expect, it } from "vitest";
import {
	armGridSteps,
	clientOrderIdFor,
	gridLevelPrices,
	isGridTriggered,
	planGridSteps,
	planTwapSteps,
	splitQuantity,
} from "./planner";
import type { GridSpec, TwapSpec } from "./types";

describe("splitQuantity", () => {
	it("splits evenly when the total divides", () => {
		expect(splitQuantity(0.006, 3, 3)).toEqual([0.002, 0.002, 0.002]);
	});

	it("puts the remainder units on the first slices", () => {
		expect(splitQuantity(1, 3, 3)).toEqual([0.334, 0.333, 0.333]);
		expect(splitQuantity(7, 3, 0)).toEqual([3, 2, 2]);
	});
});

describe("gridLevelPrices", () => {
	it("spaces levels evenly and ends on the upper bound", () => {
		expect(gridLevelPrices(100, 110, 3)).toEqual([100, 105, 110]);
		const prices = gridLevelPrices(100, 110, 4);
		expect(prices[1]).toBeCloseTo(103.333, 3);
		expect(prices[2]).toBeCloseTo(106.667, 3);
		expect(prices[3]).toBe(110);
	});
});

describe("clientOrderIdFor", () => {
	it("derives a short stable id from the run id", () => {
		expect(clientOrderIdFor("123e4567-e89b-12d3-a456-426614174000", 2)).toBe(
			"sb-123e4567e89b-2"
		);
	});
});

describe("step planning", () => {
	it("plans TWAP slices with their offsets", () => {
		const spec: TwapSpec = {
			kind: "TWAP",
			symbol: "BTCUSDT",
			side: "SELL",
			totalQuantity: 0.006,
			durationSeconds: 30,
			slices: 3,
		};
		expect(planTwapSteps("r1", spec, 3)).toEqual([
			{ kind: "TWAP", index: 0, side: "SELL", quantity: 0.002, offsetMs: 0, clientOrderId: "sb-r1-0" },
			{ kind: "TWAP", index: 1, side: "SELL", quantity: 0.002, offsetMs: 10_000, clientOrderId: "sb-r1-1" },
			{ kind: "TWAP", index: 2, side: "SELL", quantity: 0.002, offsetMs: 20_000, clientOrderId: "sb-r1-2" },
		]);
	});

	it("leaves grid sides open until armed", () => {
		const spec: GridSpec = {
			kind: "GRID",
			symbol: "BTCUSDT",
			lowerPrice: 100,
			upperPrice: 110,
			levels: 3,
			quantityPerLevel: 0.01,
		};
		const steps = planGridSteps("r1", spec);
		expect(steps.map((step) => step.side)).toEqual([null, null, null]);

		const armed = armGridSteps(steps, 105);
		expect(armed.map((step) => step.side)).toEqual(["BUY", "SELL", "SELL"]);
		expect(armed[0]).toEqual({
			kind: "GRID",
			index: 0,
			price: 100,
			quantity: 0.01,
			side: "BUY",
			clientOrderId: "sb-r1-0",
		});
	});
});

describe("isGridTriggered", () => {
	const level = { kind: "GRID", index: 0, price: 100, quantity: 1, clientOrderId: "x" } as const;

	it("fires a buy level at or below its price", () => {
		expect(isGridTriggered({ ...level, side: "BUY" }, 100)).toBe(true);
		expect(isGridTriggered({ ...level, side: "BUY" }, 99.5)).toBe(true);
		expect(isGridTriggered({ ...level, side: "BUY" }, 100.5)).toBe(false);
	});

	it("fires a sell level at or above its price", () => {
		expect(isGridTriggered({ ...level, side: "SELL" }, 100)).toBe(true);
		expect(isGridTriggered({ ...level, side: "SELL" }, 99.9)).toBe(false);
	});
});
