import {
	InvalidSpecError,
	OrderValidationError,
	isOrderSide,
	isOrderType,
	type OrderRequest,
} from "@slicebot/core";
import type {
	ExecutionOverrides,
	GridSpec,
	StrategyConditions,
	StrategySpec,
	TwapSpec,
} from "./types";

type Fields = Record<string, unknown>;

const isRecord = (value: unknown): value is Fields =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const isFiniteNumber = (value: unknown): value is number =>
	typeof value === "number" && Number.isFinite(value);

export interface SpecDefaults {
	quantityPrecision: number;
}

/**
 * Collects issues instead of stopping at the first one, so callers see
 * everything wrong with a spec at once.
 */
class FieldReader {
	readonly issues: string[] = [];

	constructor(private readonly fields: Fields) {}

	positive(key: string): number {
		const value = this.fields[key];
		if (!isFiniteNumber(value) || value <= 0) {
			this.issues.push(`${key} must be a positive number`);
			return Number.NaN;
		}
		return value;
	}

	integer(key: string, min: number): number {
		const value = this.fields[key];
		if (!isFiniteNumber(value) || !Number.isInteger(value) || value < min) {
			this.issues.push(`${key} must be an integer >= ${min}`);
			return Number.NaN;
		}
		return value;
	}

	optionalInteger(key: string, min: number, max: number): number | undefined {
		const value = this.fields[key];
		if (value === undefined || value === null) {
			return undefined;
		}
		if (!isFiniteNumber(value) || !Number.isInteger(value) || value < min || value > max) {
			this.issues.push(`${key} must be an integer between ${min} and ${max}`);
			return undefined;
		}
		return value;
	}

	symbol(): string {
		const value = this.fields.symbol;
		if (typeof value !== "string" || value.trim().length === 0) {
			this.issues.push("symbol is required");
			return "";
		}
		return value.trim().toUpperCase();
	}
}

const readConditions = (
	value: unknown,
	issues: string[]
): StrategyConditions | undefined => {
	if (value === undefined || value === null) {
		return undefined;
	}
	if (!isRecord(value)) {
		issues.push("conditions must be an object");
		return undefined;
	}

	const conditions: StrategyConditions = {};
	const thresholds = [
		"rsiBelow",
		"rsiAbove",
		"sentimentAbove",
		"sentimentBelow",
	] as const;
	for (const key of thresholds) {
		const threshold = value[key];
		if (threshold === undefined || threshold === null) {
			continue;
		}
		if (!isFiniteNumber(threshold) || threshold < 0 || threshold > 100) {
			issues.push(`conditions.${key} must be between 0 and 100`);
			continue;
		}
		conditions[key] = threshold;
	}

	const pause = value.pauseOnBearish;
	if (pause !== undefined && pause !== null) {
		if (typeof pause !== "boolean") {
			issues.push("conditions.pauseOnBearish must be a boolean");
		} else if (pause) {
			conditions.pauseOnBearish = true;
		}
	}

	if (
		conditions.rsiBelow !== undefined &&
		conditions.rsiAbove !== undefined &&
		conditions.rsiBelow <= conditions.rsiAbove
	) {
		issues.push("conditions.rsiBelow must be greater than conditions.rsiAbove");
	}
	if (
		conditions.sentimentBelow !== undefined &&
		conditions.sentimentAbove !== undefined &&
		conditions.sentimentBelow <= conditions.sentimentAbove
	) {
		issues.push(
			"conditions.sentimentBelow must be greater than conditions.sentimentAbove"
		);
	}

	return Object.keys(conditions).length ? conditions : undefined;
};

const readOverrides = (reader: FieldReader): ExecutionOverrides => {
	const overrides: ExecutionOverrides = {};
	const quantityPrecision = reader.optionalInteger("quantityPrecision", 0, 12);
	const maxConditionSkips = reader.optionalInteger("maxConditionSkips", 1, 10_000);
	const rsiPeriod = reader.optionalInteger("rsiPeriod", 2, 500);
	if (quantityPrecision !== undefined) overrides.quantityPrecision = quantityPrecision;
	if (maxConditionSkips !== undefined) overrides.maxConditionSkips = maxConditionSkips;
	if (rsiPeriod !== undefined) overrides.rsiPeriod = rsiPeriod;
	return overrides;
};

/**
 * Validate untrusted input into a normalized StrategySpec.
 * @throws InvalidSpecError listing every problem found
 */
export const validateStrategySpec = (
	input: unknown,
	defaults: SpecDefaults
): StrategySpec => {
	if (!isRecord(input)) {
		throw new InvalidSpecError(["spec must be an object"]);
	}

	const kind = typeof input.kind === "string" ? input.kind.toUpperCase() : "";
	if (kind !== "TWAP" && kind !== "GRID") {
		throw new InvalidSpecError(["kind must be TWAP or GRID"]);
	}

	const reader = new FieldReader(input);
	const symbol = reader.symbol();
	const overrides = readOverrides(reader);
	const conditions = readConditions(input.conditions, reader.issues);
	const base = {
		symbol,
		...overrides,
		...(conditions ? { conditions } : {}),
	};

	let spec: StrategySpec;
	if (kind === "TWAP") {
		const side =
			typeof input.side === "string" ? input.side.toUpperCase() : input.side;
		if (!isOrderSide(side)) {
			reader.issues.push("side must be BUY or SELL");
		}
		const twap: TwapSpec = {
			kind: "TWAP",
			...base,
			side: isOrderSide(side) ? side : "BUY",
			totalQuantity: reader.positive("totalQuantity"),
			durationSeconds: reader.positive("durationSeconds"),
			slices: reader.integer("slices", 1),
		};
		const precision = twap.quantityPrecision ?? defaults.quantityPrecision;
		const units = Math.round(twap.totalQuantity * 10 ** precision);
		if (Number.isFinite(units) && Number.isFinite(twap.slices) && units < twap.slices) {
			reader.issues.push(
				`totalQuantity ${twap.totalQuantity} is too small to split into ${twap.slices} slices at ${precision} decimals`
			);
		}
		spec = twap;
	} else {
		const grid: GridSpec = {
			kind: "GRID",
			...base,
			lowerPrice: reader.positive("lowerPrice"),
			upperPrice: reader.positive("upperPrice"),
			levels: reader.integer("levels", 2),
			quantityPerLevel: reader.positive("quantityPerLevel"),
		};
		if (grid.lowerPrice >= grid.upperPrice) {
			reader.issues.push("lowerPrice must be below upperPrice");
		}
		spec = grid;
	}

	if (reader.issues.length) {
		throw new InvalidSpecError(reader.issues);
	}
	return spec;
};

/**
 * Validate a manual order before it reaches an execution client.
 * @throws OrderValidationError listing every problem found
 */
export const validateOrderRequest = (input: unknown): OrderRequest => {
	if (!isRecord(input)) {
		throw new OrderValidationError(["order must be an object"]);
	}
	const issues: string[] = [];
	const upper = (value: unknown): unknown =>
		typeof value === "string" ? value.toUpperCase() : value;

	const symbol =
		typeof input.symbol === "string" ? input.symbol.trim().toUpperCase() : "";
	if (!symbol) {
		issues.push("symbol is required");
	}
	const side = upper(input.side);
	if (!isOrderSide(side)) {
		issues.push("side must be BUY or SELL");
	}
	const type = upper(input.type);
	if (!isOrderType(type)) {
		issues.push("type must be MARKET or LIMIT");
	}
	const quantity = input.quantity;
	if (!isFiniteNumber(quantity) || quantity <= 0) {
		issues.push("quantity must be a positive number");
	}
	const price = input.price ?? undefined;
	if (type === "LIMIT" && (!isFiniteNumber(price) || price <= 0)) {
		issues.push("LIMIT orders require a positive price");
	}
	if (type === "MARKET" && price !== undefined) {
		issues.push("MARKET orders must not carry a price");
	}
	const clientOrderId = input.clientOrderId;
	if (clientOrderId !== undefined && typeof clientOrderId !== "string") {
		issues.push("clientOrderId must be a string");
	}

	if (
		issues.length ||
		!isOrderSide(side) ||
		!isOrderType(type) ||
		!isFiniteNumber(quantity)
	) {
		throw new OrderValidationError(issues);
	}

	const request: OrderRequest = { symbol, side, type, quantity };
	if (type === "LIMIT" && isFiniteNumber(price)) {
		request.price = price;
	}
	if (typeof clientOrderId === "string") {
		request.clientOrderId = clientOrderId;
	}
	return request;
};
