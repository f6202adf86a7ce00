import { createLogger, sleep } from "@slicebot/core";
import type { SentimentAggregator } from "./aggregator";
import type {
	SentimentFeed,
	SentimentItem,
	SentimentReading,
	SentimentSource,
	TextSentimentAnalyzer,
} from "./types";

const workerLogger = createLogger("sentiment:worker");

export interface SentimentWorkerOptions {
	feeds: SentimentFeed[];
	analyzer: TextSentimentAnalyzer;
	aggregator: SentimentAggregator;
	symbols: string[];
	pollIntervalMs: number;
}

/**
 * Polls every feed on a fixed cadence, scores each item and feeds the
 * aggregator. Symbols start with `options.symbols` and grow as readers ask
 * for new ones; the first read of a new symbol waits for its warm-up poll.
 */
export class SentimentWorker {
	private controller: AbortController | null = null;
	private loop: Promise<void> | null = null;
	private cycle: Promise<number> | null = null;
	private readonly symbols: Set<string>;
	private readonly warmups = new Map<string, Promise<number>>();

	constructor(private readonly options: SentimentWorkerOptions) {
		this.symbols = new Set(options.symbols.map((symbol) => symbol.toUpperCase()));
	}

	trackedSymbols(): string[] {
		return Array.from(this.symbols);
	}

	/**
	 * Add `symbol` to every later poll. A new symbol is polled at once and
	 * the call resolves when that poll, or a full poll already running, ends.
	 */
	async track(symbol: string): Promise<void> {
		const key = symbol.toUpperCase();
		if (!this.symbols.has(key)) {
			this.symbols.add(key);
			workerLogger.info("sentiment_symbol_tracked", { symbol: key });
			const warmup = this.pollOnce([key]).finally(() => {
				this.warmups.delete(key);
			});
			this.warmups.set(key, warmup);
		}
		await this.warmups.get(key);
		await this.cycle;
	}

	isRunning(): boolean {
		return this.controller !== null;
	}

	start(): void {
		if (this.controller) {
			workerLogger.warn("sentiment_worker_already_running");
			return;
		}
		const controller = new AbortController();
		this.controller = controller;
		this.loop = this.run(controller.signal).catch((error: unknown) => {
			workerLogger.error("sentiment_worker_crashed", {
				error: error instanceof Error ? error.message : String(error),
			});
		});
		workerLogger.info("sentiment_worker_started", {
			symbols: this.trackedSymbols(),
			pollIntervalMs: this.options.pollIntervalMs,
		});
	}

	async stop(): Promise<void> {
		this.controller?.abort();
		await this.loop;
		this.controller = null;
		this.loop = null;
		workerLogger.info("sentiment_worker_stopped");
	}

	/**
	 * Run one fetch-and-score cycle over every feed.
	 * @returns the number of data points added
	 */
	async pollOnce(symbols: string[] = this.trackedSymbols()): Promise<number> {
		let added = 0;
		for (const feed of this.options.feeds) {
			let items: SentimentItem[];
			try {
				items = await feed.fetchItems(symbols);
			} catch (error) {
				workerLogger.warn("sentiment_feed_failed", {
					feed: feed.name,
					error: error instanceof Error ? error.message : String(error),
				});
				continue;
			}
			for (const item of items) {
				const { score, confidence } = this.options.analyzer.analyze(
					`${item.title} ${item.content}`
				);
				// Upvoted posts count for more.
				const adjusted =
					item.source === "reddit"
						? confidence * (0.5 + 0.5 * Math.min(1, item.engagement / 100))
						: confidence;
				for (const symbol of item.symbols) {
					this.options.aggregator.add({
						symbol,
						score,
						source: item.source,
						confidence: adjusted,
						timestamp: item.timestamp,
						title: item.title,
						url: item.url,
					});
					added += 1;
				}
			}
			workerLogger.info("sentiment_feed_polled", {
				feed: feed.name,
				items: items.length,
			});
		}
		return added;
	}

	getReading(symbol: string): SentimentReading {
		return this.options.aggregator.getSentiment(symbol);
	}

	/** Reading per source that has data for `symbol`. */
	getBreakdown(symbol: string): Partial<Record<SentimentSource, SentimentReading>> {
		return this.options.aggregator.getBreakdown(symbol);
	}

	/**
	 * Current score for `symbol`, or null when nothing has been collected.
	 * Starts tracking a symbol seen for the first time.
	 */
	async getSentiment(symbol: string): Promise<number | null> {
		const key = symbol.toUpperCase();
		await this.track(key);
		if (!this.options.aggregator.hasData(key)) {
			return null;
		}
		return this.options.aggregator.getSentiment(key).score;
	}

	private async run(signal: AbortSignal): Promise<void> {
		while (!signal.aborted) {
			this.cycle = this.pollOnce();
			try {
				await this.cycle;
			} finally {
				this.cycle = null;
			}
			await sleep(this.options.pollIntervalMs, signal);
		}
	}
}
