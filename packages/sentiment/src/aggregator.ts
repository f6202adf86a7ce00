import { HOUR_MS, scoreToSentimentLabel } from "@slicebot/core";
import type { SentimentSourceWeights } from "@slicebot/core";
import type {
	SentimentDataPoint,
	SentimentReading,
	SentimentSource,
} from "./types";

export interface SentimentAggregatorOptions {
	timeDecayHours: number;
	sourceWeights: SentimentSourceWeights;
	now?: () => number;
}

const round = (value: number, digits: number): number => {
	const factor = 10 ** digits;
	return Math.round(value * factor) / factor;
};

/**
 * Per-symbol store of scored data points. A reading is the mean score
 * weighted by linear time decay, source weight and item confidence.
 * Points older than the decay window are dropped on every insert.
 */
export class SentimentAggregator {
	private readonly history = new Map<string, SentimentDataPoint[]>();
	private readonly now: () => number;

	constructor(private readonly options: SentimentAggregatorOptions) {
		this.now = options.now ?? Date.now;
	}

	add(point: SentimentDataPoint): void {
		const points = this.history.get(point.symbol) ?? [];
		points.push({ ...point });
		this.history.set(point.symbol, points);
		this.prune();
	}

	hasData(symbol: string): boolean {
		return (this.history.get(symbol)?.length ?? 0) > 0;
	}

	getSentiment(symbol: string): SentimentReading {
		return this.aggregate(this.history.get(symbol) ?? []);
	}

	getBreakdown(symbol: string): Partial<Record<SentimentSource, SentimentReading>> {
		const points = this.history.get(symbol) ?? [];
		const bySource = new Map<SentimentSource, SentimentDataPoint[]>();
		for (const point of points) {
			const group = bySource.get(point.source) ?? [];
			group.push(point);
			bySource.set(point.source, group);
		}
		const breakdown: Partial<Record<SentimentSource, SentimentReading>> = {};
		for (const [source, group] of bySource) {
			breakdown[source] = this.aggregate(group);
		}
		return breakdown;
	}

	private aggregate(points: SentimentDataPoint[]): SentimentReading {
		if (!points.length) {
			return {
				score: 50,
				label: "Neutral",
				confidence: 0,
				dataPoints: 0,
				lastUpdate: null,
			};
		}

		const now = this.now();
		let weightedSum = 0;
		let totalWeight = 0;
		let confidenceSum = 0;
		let latest = points[0].timestamp;

		for (const point of points) {
			const ageHours = (now - point.timestamp) / HOUR_MS;
			const timeWeight = Math.max(0, 1 - ageHours / this.options.timeDecayHours);
			const weight =
				timeWeight * this.options.sourceWeights[point.source] * point.confidence;
			weightedSum += point.score * weight;
			totalWeight += weight;
			confidenceSum += point.confidence;
			latest = Math.max(latest, point.timestamp);
		}

		const score = totalWeight > 0 ? weightedSum / totalWeight : 50;
		const sampleFactor = Math.min(1, points.length / 10);
		return {
			score: round(score, 1),
			label: scoreToSentimentLabel(score),
			confidence: round((confidenceSum / points.length) * sampleFactor, 2),
			dataPoints: points.length,
			lastUpdate: new Date(latest).toISOString(),
		};
	}

	private prune(): void {
		const cutoff = this.now() - this.options.timeDecayHours * HOUR_MS;
		for (const [symbol, points] of this.history) {
			const kept = points.filter((point) => point.timestamp > cutoff);
			if (kept.length) {
				this.history.set(symbol, kept);
			} else {
				this.history.delete(symbol);
			}
		}
	}
}
