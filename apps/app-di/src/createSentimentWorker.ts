import type { SlicebotConfig } from "@slicebot/core";
import {
	KeywordSentimentAnalyzer,
	RedditSentimentSource,
	SentimentAggregator,
	SentimentWorker,
} from "@slicebot/sentiment";

export const createSentimentWorker = (
	config: Pick<SlicebotConfig, "sentiment" | "exchange">,
	symbols: string[] = [config.exchange.defaultSymbol]
): SentimentWorker => {
	const { sentiment } = config;
	return new SentimentWorker({
		feeds: [
			new RedditSentimentSource({
				subreddits: sentiment.subreddits,
				postLimit: sentiment.postLimit,
				userAgent: sentiment.userAgent,
			}),
		],
		analyzer: new KeywordSentimentAnalyzer(),
		aggregator: new SentimentAggregator({
			timeDecayHours: sentiment.timeDecayHours,
			sourceWeights: sentiment.sourceWeights,
		}),
		symbols,
		pollIntervalMs: sentiment.pollIntervalMs,
	});
};
