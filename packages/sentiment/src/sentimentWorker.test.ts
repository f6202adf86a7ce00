import { afterEach, describe, expect, it, vi } from "vitest";
import { SentimentAggregator } from "./aggregator";
import { SentimentWorker } from "./sentimentWorker";
import type { SentimentFeed, SentimentItem, TextSentimentAnalyzer } from "./types";

const NOW = 1_700_000_000_000;

const redditItem: SentimentItem = {
	title: "BTC and ETH rally",
	content: "",
	source: "reddit",
	engagement: 50,
	timestamp: NOW,
	symbols: ["BTCUSDT", "ETHUSDT"],
};

const createWorker = (
	feeds: SentimentFeed[],
	symbols: string[] = ["BTCUSDT", "ETHUSDT"]
) => {
	const aggregator = new SentimentAggregator({
		timeDecayHours: 24,
		sourceWeights: { news: 0.5, reddit: 0.3, twitter: 0.2 },
		now: () => NOW,
	});
	const analyzer: TextSentimentAnalyzer = {
		analyze: vi.fn(() => ({ score: 80, confidence: 1 })),
	};
	const worker = new SentimentWorker({
		feeds,
		analyzer,
		aggregator,
		symbols,
		pollIntervalMs: 60_000,
	});
	return { worker, aggregator };
};

describe("SentimentWorker", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it("scores items into every mentioned symbol", async () => {
		const feed: SentimentFeed = {
			name: "reddit",
			fetchItems: vi.fn(async () => [redditItem]),
		};
		const { worker, aggregator } = createWorker([feed]);
		const add = vi.spyOn(aggregator, "add");

		await expect(worker.pollOnce()).resolves.toBe(2);
		expect(await worker.getSentiment("BTCUSDT")).toBe(80);
		expect(await worker.getSentiment("SOLUSDT")).toBeNull();
		expect(add).toHaveBeenNthCalledWith(
			2,
			expect.objectContaining({ symbol: "ETHUSDT", confidence: 0.75 })
		);
	});

	it("keeps polling the other feeds when one fails", async () => {
		const failing: SentimentFeed = {
			name: "news",
			fetchItems: vi.fn(async () => {
				throw new Error("feed down");
			}),
		};
		const working: SentimentFeed = {
			name: "reddit",
			fetchItems: vi.fn(async () => [redditItem]),
		};
		const { worker } = createWorker([failing, working]);
		await expect(worker.pollOnce()).resolves.toBe(2);
	});

	it("polls on its interval until stopped", async () => {
		vi.useFakeTimers();
		const fetchItems = vi.fn(async (): Promise<SentimentItem[]> => []);
		const { worker } = createWorker([{ name: "reddit", fetchItems }]);

		worker.start();
		await vi.advanceTimersByTimeAsync(0);
		expect(fetchItems).toHaveBeenCalledTimes(1);

		await vi.advanceTimersByTimeAsync(60_000);
		expect(fetchItems).toHaveBeenCalledTimes(2);

		await worker.stop();
		expect(worker.isRunning()).toBe(false);
		await vi.advanceTimersByTimeAsync(120_000);
		expect(fetchItems).toHaveBeenCalledTimes(2);
	});

	describe("symbol tracking", () => {
		// Returns one post per requested symbol, like a search-backed feed.
		const perSymbolFeed = () => {
			const fetchItems = vi.fn(
				async (symbols: string[]): Promise<SentimentItem[]> =>
					symbols.map((symbol) => ({ ...redditItem, symbols: [symbol] }))
			);
			const feed: SentimentFeed = { name: "reddit", fetchItems };
			return { feed, fetchItems };
		};

		it("polls a new symbol the first time it is read", async () => {
			const { feed, fetchItems } = perSymbolFeed();
			const { worker } = createWorker([feed], ["BTCUSDT"]);

			expect(await worker.getSentiment("ethusdt")).toBe(80);
			expect(fetchItems).toHaveBeenCalledTimes(1);
			expect(fetchItems).toHaveBeenCalledWith(["ETHUSDT"]);
			expect(worker.trackedSymbols()).toEqual(["BTCUSDT", "ETHUSDT"]);

			await worker.pollOnce();
			expect(fetchItems).toHaveBeenLastCalledWith(["BTCUSDT", "ETHUSDT"]);
		});

		it("shares one warm-up poll between concurrent readers", async () => {
			const { feed, fetchItems } = perSymbolFeed();
			const { worker } = createWorker([feed], ["BTCUSDT"]);

			const readings = await Promise.all([
				worker.getSentiment("SOLUSDT"),
				worker.getSentiment("SOLUSDT"),
			]);
			expect(readings).toEqual([80, 80]);
			expect(fetchItems).toHaveBeenCalledTimes(1);
		});

		it("includes tracked symbols in the background loop", async () => {
			vi.useFakeTimers();
			const { feed, fetchItems } = perSymbolFeed();
			const { worker } = createWorker([feed], ["BTCUSDT"]);

			await worker.track("XRPUSDT");
			worker.start();
			await vi.advanceTimersByTimeAsync(0);
			expect(fetchItems).toHaveBeenLastCalledWith(["BTCUSDT", "XRPUSDT"]);
			await worker.stop();
		});
	});
});
