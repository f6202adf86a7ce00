import type {
	AccountSnapshot,
	ExecutionMode,
	OrderResult,
	SlicebotConfig,
} from "@slicebot/core";
import type { SentimentReading } from "@slicebot/sentiment";
import type { RunState, StepResult } from "@slicebot/strategy-engine";

/** Left-aligned columns, two spaces apart. */
export const formatTable = (header: string[], rows: string[][]): string => {
	const widths = header.map((cell, index) =>
		Math.max(cell.length, ...rows.map((row) => (row[index] ?? "").length))
	);
	const line = (cells: string[]): string =>
		cells
			.map((cell, index) =>
				index === cells.length - 1 ? cell : cell.padEnd(widths[index])
			)
			.join("  ")
			.trimEnd();
	return [line(header), ...rows.map(line)].join("\n");
};

const stepRow = (result: StepResult): string[] => [
	String(result.stepIndex),
	result.outcome,
	result.action.side,
	String(result.action.quantity),
	String(result.action.price),
	result.orderId ?? "-",
	String(result.attempts),
	result.error ?? result.reasons?.join("; ") ?? "",
];

export const formatRun = (state: RunState): string => {
	const title = `run ${state.runId} ${state.spec.kind} ${state.spec.symbol} ${state.status}${
		state.terminalReason ? ` (${state.terminalReason})` : ""
	}`;
	if (!state.results.length) {
		return `${title}\nno steps recorded`;
	}
	const table = formatTable(
		["step", "outcome", "side", "qty", "price", "order", "attempts", "note"],
		state.results.map(stepRow)
	);
	return `${title}\n${table}`;
};

export const formatOrder = (order: OrderResult): string =>
	[
		`order ${order.orderId} ${order.status}`,
		`${order.side} ${order.quantity} ${order.symbol} ${order.type}${
			order.price === null ? "" : ` @ ${order.price}`
		}`,
		`executed ${order.executedQty}${order.avgPrice === null ? "" : ` avg ${order.avgPrice}`}`,
	].join("\n");

export const formatSentiment = (
	symbol: string,
	reading: SentimentReading
): string =>
	`${symbol} sentiment ${reading.score.toFixed(1)} ${reading.label} (confidence ${reading.confidence.toFixed(
		2
	)}, ${reading.dataPoints} points, updated ${reading.lastUpdate ?? "never"})`;

export const formatConfig = (config: SlicebotConfig): string =>
	formatTable(
		["setting", "value"],
		[
			["mode", config.env.executionMode],
			["exchange", `${config.exchange.exchange}${config.exchange.testnet ? " (testnet)" : ""}`],
			["symbol", config.exchange.defaultSymbol],
			["api key", config.exchange.credentials.apiKey ? "set" : "missing"],
			["quantity precision", String(config.engine.quantityPrecision)],
			["max retries", String(config.engine.maxRetries)],
			["max condition skips", String(config.engine.maxConditionSkips)],
			["grid poll", `${config.engine.gridPollIntervalMs}ms`],
			["llm", `${config.env.ollamaModel} @ ${config.env.ollamaHost}`],
		]
	);

const orDash = (value: number | null): string => (value === null ? "-" : String(value));

export const formatAccount = (mode: ExecutionMode, account: AccountSnapshot): string => {
	const balances = account.balances.length
		? formatTable(
				["asset", "free", "used", "total"],
				account.balances.map((balance) => [
					balance.asset,
					String(balance.free),
					String(balance.used),
					String(balance.total),
				])
			)
		: "no balances";
	const positions = account.positions.length
		? formatTable(
				["symbol", "side", "qty", "entry", "mark", "pnl", "leverage"],
				account.positions.map((position) => [
					position.symbol,
					position.side,
					String(position.quantity),
					orDash(position.entryPrice),
					orDash(position.markPrice),
					orDash(position.unrealizedPnl),
					orDash(position.leverage),
				])
			)
		: "no open positions";
	return [`account (${mode})`, balances, "", positions].join("\n");
};
