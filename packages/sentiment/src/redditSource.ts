import { z } from "zod";
import { createLogger } from "@slicebot/core";
import type { SentimentFeed, SentimentItem } from "./types";

const REDDIT_BASE_URL = "https://www.reddit.com";

const redditLogger = createLogger("sentiment:reddit");

const listingSchema = z.object({
	data: z.object({
		children: z.array(
			z.object({
				data: z.object({
					title: z.string(),
					selftext: z.string().optional().default(""),
					score: z.number().optional().default(0),
					created_utc: z.number(),
					permalink: z.string().optional(),
				}),
			})
		),
	}),
});

/** Common names posts use for a base asset besides its ticker. */
const ASSET_ALIASES: Record<string, string[]> = {
	BTC: ["bitcoin"],
	ETH: ["ethereum", "ether"],
	SOL: ["solana"],
	BNB: ["binance coin"],
	XRP: ["ripple"],
	DOGE: ["dogecoin"],
	ADA: ["cardano"],
};

export const baseAsset = (symbol: string): string =>
	symbol.toUpperCase().replace(/(USDT|BUSD|USDC|USD)$/, "");

/**
 * Symbols among `symbols` whose base asset the text mentions, by ticker
 * or by common name.
 */
export const mentionedSymbols = (text: string, symbols: string[]): string[] => {
	const lower = text.toLowerCase();
	return symbols.filter((symbol) => {
		const base = baseAsset(symbol);
		const terms = [base.toLowerCase(), ...(ASSET_ALIASES[base] ?? [])];
		return terms.some((term) => new RegExp(`\\b${term}\\b`).test(lower));
	});
};

export interface RedditSourceOptions {
	subreddits: string[];
	postLimit: number;
	userAgent: string;
	fetchFn?: typeof fetch;
}

/**
 * Hot posts from crypto subreddits via the public JSON listing.
 * A failing subreddit is logged and skipped.
 */
export class RedditSentimentSource implements SentimentFeed {
	readonly name = "reddit";
	private readonly fetchFn: typeof fetch;

	constructor(private readonly options: RedditSourceOptions) {
		this.fetchFn = options.fetchFn ?? fetch;
	}

	async fetchItems(symbols: string[]): Promise<SentimentItem[]> {
		const items: SentimentItem[] = [];
		for (const subreddit of this.options.subreddits) {
			try {
				items.push(...(await this.fetchSubreddit(subreddit, symbols)));
			} catch (error) {
				redditLogger.warn("subreddit_fetch_failed", {
					subreddit,
					error: error instanceof Error ? error.message : String(error),
				});
			}
		}
		return items;
	}

	private async fetchSubreddit(
		subreddit: string,
		symbols: string[]
	): Promise<SentimentItem[]> {
		const url = new URL(`${REDDIT_BASE_URL}/r/${subreddit}/hot.json`);
		url.searchParams.set("limit", String(this.options.postLimit));
		url.searchParams.set("raw_json", "1");

		const response = await this.fetchFn(url.toString(), {
			headers: {
				"User-Agent": this.options.userAgent,
				Accept: "application/json",
			},
		});
		if (!response.ok) {
			throw new Error(`Reddit request failed: ${response.status}`);
		}

		const listing = listingSchema.parse(await response.json());
		const items: SentimentItem[] = [];
		for (const child of listing.data.children) {
			const post = child.data;
			const matched = mentionedSymbols(`${post.title} ${post.selftext}`, symbols);
			if (!matched.length) {
				continue;
			}
			items.push({
				title: post.title,
				content: post.selftext,
				source: "reddit",
				url: post.permalink ? `${REDDIT_BASE_URL}${post.permalink}` : undefined,
				engagement: post.score,
				timestamp: post.created_utc * 1000,
				symbols: matched,
			});
		}
		redditLogger.debug("subreddit_fetched", {
			subreddit,
			posts: listing.data.children.length,
			matched: items.length,
		});
		return items;
	}
}
