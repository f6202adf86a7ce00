import type { OrderSide, OrderType } from "@slicebot/core";

export type StrategyKind = "TWAP" | "GRID";

/**
 * Gates checked before every step. All present conditions must hold.
 */
export interface StrategyConditions {
	rsiBelow?: number;
	rsiAbove?: number;
	sentimentAbove?: number;
	sentimentBelow?: number;
	pauseOnBearish?: boolean;
}

/** Per-run overrides of engine defaults. */
export interface ExecutionOverrides {
	quantityPrecision?: number;
	maxConditionSkips?: number;
	rsiPeriod?: number;
}

interface StrategySpecBase extends ExecutionOverrides {
	symbol: string;
	conditions?: StrategyConditions;
}

export interface TwapSpec extends StrategySpecBase {
	kind: "TWAP";
	side: OrderSide;
	totalQuantity: number;
	durationSeconds: number;
	slices: number;
}

export interface GridSpec extends StrategySpecBase {
	kind: "GRID";
	lowerPrice: number;
	upperPrice: number;
	levels: number;
	quantityPerLevel: number;
}

export type StrategySpec = TwapSpec | GridSpec;

export type RunStatus =
	| "PENDING"
	| "RUNNING"
	| "PAUSED"
	| "COMPLETED"
	| "CANCELLED"
	| "FAILED";

export const TERMINAL_STATUSES: readonly RunStatus[] = [
	"COMPLETED",
	"CANCELLED",
	"FAILED",
];

export const isTerminalStatus = (status: RunStatus): boolean =>
	TERMINAL_STATUSES.includes(status);

export interface TwapStep {
	kind: "TWAP";
	index: number;
	side: OrderSide;
	quantity: number;
	/** Earliest start, relative to the run start. */
	offsetMs: number;
	clientOrderId: string;
}

export interface GridStep {
	kind: "GRID";
	index: number;
	price: number;
	quantity: number;
	/** Null until the run takes its reference price. */
	side: OrderSide | null;
	clientOrderId: string;
}

export type ArmedGridStep = GridStep & { side: OrderSide };

export type PlannedStep = TwapStep | GridStep;

export type StepOutcome =
	| "FILLED"
	| "OPEN"
	| "REJECTED"
	| "SKIPPED_CONDITION"
	| "ERROR";

export interface StepAction {
	side: OrderSide;
	type: OrderType;
	quantity: number;
	price: number | "MARKET";
}

export interface StepResult {
	stepIndex: number;
	action: StepAction;
	outcome: StepOutcome;
	orderId?: string;
	clientOrderId?: string;
	error?: string;
	/** Condition explanations, for skipped steps. */
	reasons?: string[];
	/** Attempts made for this step, the first one included. */
	attempts: number;
	timestamp: string;
}

export type RunProgress =
	| { kind: "sequential"; nextIndex: number }
	| { kind: "levels"; pending: number[]; fired: number[] };

export interface RunState {
	runId: string;
	spec: StrategySpec;
	status: RunStatus;
	steps: PlannedStep[];
	results: StepResult[];
	progress: RunProgress;
	createdAt: string;
	lastActionAt: string | null;
	skipCount: number;
	terminalReason: string | null;
	/** Price the GRID sides were decided from. */
	referencePrice: number | null;
}

export interface RunSummary {
	runId: string;
	kind: StrategyKind;
	symbol: string;
	status: RunStatus;
	createdAt: string;
	lastActionAt: string | null;
	stepsPlanned: number;
	stepsDone: number;
	results: number;
	terminalReason: string | null;
}

export interface IndicatorProvider {
	/** Latest RSI, or null when it cannot be computed. */
	getRsi(symbol: string, period: number): Promise<number | null>;
}

export interface SentimentProvider {
	/** Score 0..100, or null when there is no reading. */
	getSentiment(symbol: string): Promise<number | null>;
}
