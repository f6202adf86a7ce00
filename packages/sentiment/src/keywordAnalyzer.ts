import keywords from "./keywords.json";
import type { TextScore, TextSentimentAnalyzer } from "./types";

/** Words before a keyword that are checked for a negation. */
const NEGATION_WINDOW = 3;

export interface KeywordLists {
	bullish: string[];
	bearish: string[];
	negations: string[];
}

/**
 * Scores text 0..100 from bullish and bearish keyword hits. A negation in
 * the few words before a keyword flips its direction. Text without hits
 * scores 50 with zero confidence.
 */
export class KeywordSentimentAnalyzer implements TextSentimentAnalyzer {
	private readonly bullish: Set<string>;
	private readonly bearish: Set<string>;
	private readonly negations: Set<string>;

	constructor(lists: KeywordLists = keywords) {
		this.bullish = new Set(lists.bullish);
		this.bearish = new Set(lists.bearish);
		this.negations = new Set(lists.negations);
	}

	analyze(text: string): TextScore {
		const tokens = text.toLowerCase().match(/[a-z0-9']+/g) ?? [];
		let bullishHits = 0;
		let bearishHits = 0;

		tokens.forEach((token, index) => {
			const direction = this.bullish.has(token)
				? 1
				: this.bearish.has(token)
					? -1
					: 0;
			if (direction === 0) {
				return;
			}
			const signed = this.isNegated(tokens, index) ? -direction : direction;
			if (signed > 0) {
				bullishHits += 1;
			} else {
				bearishHits += 1;
			}
		});

		const hits = bullishHits + bearishHits;
		if (hits === 0) {
			return { score: 50, confidence: 0 };
		}
		return {
			score: Math.round(50 + (50 * (bullishHits - bearishHits)) / hits),
			confidence: Math.min(1, hits / 5),
		};
	}

	private isNegated(tokens: string[], index: number): boolean {
		return tokens
			.slice(Math.max(0, index - NEGATION_WINDOW), index)
			.some((token) => this.negations.has(token) || token.endsWith("n't"));
	}
}
