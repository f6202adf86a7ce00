import type { OrderSide } from "@slicebot/core";
import type {
	ArmedGridStep,
	GridSpec,
	GridStep,
	TwapSpec,
	TwapStep,
} from "./types";

/**
 * Split `total` into `slices` parts on the `precision`-decimal grid. Parts
 * differ by at most one unit and add up to the rounded total.
 */
export const splitQuantity = (
	total: number,
	slices: number,
	precision: number
): number[] => {
	const scale = 10 ** precision;
	const units = Math.round(total * scale);
	const base = Math.floor(units / slices);
	const remainder = units - base * slices;
	return Array.from(
		{ length: slices },
		(_, index) => (base + (index < remainder ? 1 : 0)) / scale
	);
};

/**
 * Evenly spaced prices from `lower` to `upper` inclusive. The last level is
 * `upper` exactly.
 */
export const gridLevelPrices = (
	lower: number,
	upper: number,
	levels: number
): number[] => {
	const step = (upper - lower) / (levels - 1);
	return Array.from({ length: levels }, (_, index) =>
		index === levels - 1 ? upper : lower + index * step
	);
};

/**
 * Stable per-step id, so a retry can find an order whose response was lost.
 * Fits Binance's 36 character limit.
 */
export const clientOrderIdFor = (runId: string, index: number): string =>
	`sb-${runId.replace(/-/g, "").slice(0, 12)}-${index}`;

export const planTwapSteps = (
	runId: string,
	spec: TwapSpec,
	precision: number
): TwapStep[] => {
	const intervalMs = (spec.durationSeconds * 1000) / spec.slices;
	return splitQuantity(spec.totalQuantity, spec.slices, precision).map(
		(quantity, index) => ({
			kind: "TWAP",
			index,
			side: spec.side,
			quantity,
			offsetMs: index * intervalMs,
			clientOrderId: clientOrderIdFor(runId, index),
		})
	);
};

export const planGridSteps = (runId: string, spec: GridSpec): GridStep[] =>
	gridLevelPrices(spec.lowerPrice, spec.upperPrice, spec.levels).map(
		(price, index) => ({
			kind: "GRID",
			index,
			price,
			quantity: spec.quantityPerLevel,
			side: null,
			clientOrderId: clientOrderIdFor(runId, index),
		})
	);

/**
 * Decide each level's side from one price snapshot: below it buys, at or
 * above it sells.
 */
export const armGridSteps = (
	steps: GridStep[],
	referencePrice: number
): ArmedGridStep[] =>
	steps.map((step) => {
		const side: OrderSide = step.price < referencePrice ? "BUY" : "SELL";
		return { ...step, side };
	});

/**
 * A BUY level fires once price falls to it, a SELL level once price rises
 * to it.
 */
export const isGridTriggered = (step: ArmedGridStep, price: number): boolean =>
	step.side === "BUY" ? price <= step.price : price >= step.price;
