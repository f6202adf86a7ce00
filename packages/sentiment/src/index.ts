export * from "./types";
export { SentimentAggregator } from "./aggregator";
export type { SentimentAggregatorOptions } from "./aggregator";
export { KeywordSentimentAnalyzer } from "./keywordAnalyzer";
export type { KeywordLists } from "./keywordAnalyzer";
export {
	RedditSentimentSource,
	baseAsset,
	mentionedSymbols,
} from "./redditSource";
export type { RedditSourceOptions } from "./redditSource";
export { SentimentWorker } from "./sentimentWorker";
export type { SentimentWorkerOptions } from "./sentimentWorker";
