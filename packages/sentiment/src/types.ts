import type { SentimentLabel } from "@slicebot/core";

export type SentimentSource = "news" | "reddit" | "twitter";

export interface SentimentDataPoint {
	symbol: string;
	/** 0 (bearish) to 100 (bullish). */
	score: number;
	source: SentimentSource;
	/** 0 to 1. */
	confidence: number;
	/** Epoch ms the underlying item was published. */
	timestamp: number;
	title?: string;
	url?: string;
}

export interface SentimentReading {
	score: number;
	label: SentimentLabel;
	confidence: number;
	dataPoints: number;
	lastUpdate: string | null;
}

/**
 * A scraped piece of text tagged with the trading symbols it mentions.
 */
export interface SentimentItem {
	title: string;
	content: string;
	source: SentimentSource;
	url?: string;
	/** Upvotes, likes or similar; 0 when the source has none. */
	engagement: number;
	timestamp: number;
	symbols: string[];
}

export interface SentimentFeed {
	readonly name: string;
	fetchItems(symbols: string[]): Promise<SentimentItem[]>;
}

export interface TextScore {
	score: number;
	confidence: number;
}

export interface TextSentimentAnalyzer {
	analyze(text: string): TextScore;
}
