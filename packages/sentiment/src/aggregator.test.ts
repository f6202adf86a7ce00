import { describe, expect, it } from "vitest";
import { HOUR_MS } from "@slicebot/core";
import { SentimentAggregator } from "./aggregator";

const NOW = 1_700_000_000_000;

const createAggregator = () =>
	new SentimentAggregator({
		timeDecayHours: 24,
		sourceWeights: { news: 0.5, reddit: 0.3, twitter: 0.2 },
		now: () => NOW,
	});

describe("SentimentAggregator", () => {
	it("returns a neutral reading without data", () => {
		expect(createAggregator().getSentiment("BTCUSDT")).toEqual({
			score: 50,
			label: "Neutral",
			confidence: 0,
			dataPoints: 0,
			lastUpdate: null,
		});
	});

	it("weights points by recency, source and confidence", () => {
		const aggregator = createAggregator();
		aggregator.add({
			symbol: "BTCUSDT",
			score: 80,
			source: "reddit",
			confidence: 1,
			timestamp: NOW,
		});
		aggregator.add({
			symbol: "BTCUSDT",
			score: 20,
			source: "news",
			confidence: 0.5,
			timestamp: NOW - 12 * HOUR_MS,
		});

		// (80 * 0.3 + 20 * 0.125) / 0.425
		expect(aggregator.getSentiment("BTCUSDT")).toEqual({
			score: 62.4,
			label: "Neutral",
			confidence: 0.15,
			dataPoints: 2,
			lastUpdate: new Date(NOW).toISOString(),
		});
		expect(aggregator.getBreakdown("BTCUSDT")).toMatchObject({
			reddit: { score: 80, dataPoints: 1 },
			news: { score: 20, dataPoints: 1 },
		});
	});

	it("labels low and high scores", () => {
		const aggregator = createAggregator();
		aggregator.add({
			symbol: "ETHUSDT",
			score: 20,
			source: "news",
			confidence: 1,
			timestamp: NOW,
		});
		aggregator.add({
			symbol: "SOLUSDT",
			score: 85,
			source: "twitter",
			confidence: 1,
			timestamp: NOW,
		});
		expect(aggregator.getSentiment("ETHUSDT").label).toBe("Bearish");
		expect(aggregator.getSentiment("SOLUSDT").label).toBe("Bullish");
	});

	it("falls back to 50 when every weight is zero", () => {
		const aggregator = createAggregator();
		aggregator.add({
			symbol: "BTCUSDT",
			score: 90,
			source: "reddit",
			confidence: 0,
			timestamp: NOW,
		});
		expect(aggregator.getSentiment("BTCUSDT").score).toBe(50);
	});

	it("drops points older than the decay window", () => {
		const aggregator = createAggregator();
		aggregator.add({
			symbol: "BTCUSDT",
			score: 90,
			source: "news",
			confidence: 1,
			timestamp: NOW - 25 * HOUR_MS,
		});
		expect(aggregator.hasData("BTCUSDT")).toBe(false);
		expect(aggregator.getBreakdown("BTCUSDT")).toEqual({});
	});
});
