import { randomUUID } from "node:crypto";
import {
	ConditionNeverSatisfiedError,
	ExchangeError,
	RunActiveError,
	createLogger,
	describeError,
	isRetryableError,
	sleep,
	sleepUntil,
	withDeadline,
	type EngineConfig,
	type ExecutionClient,
	type MarketDataClient,
	type OrderRequest,
	type OrderSide,
	type OrderStatus,
	type OrderType,
} from "@slicebot/core";
import {
	evaluateConditions,
	requiredInputs,
	type ConditionEvaluation,
} from "./conditions";
import {
	armGridSteps,
	isGridTriggered,
	planGridSteps,
	planTwapSteps,
} from "./planner";
import { runWithRetry, type RetryPolicy } from "./retry";
import { RunRegistry } from "./runRegistry";
import {
	isTerminalStatus,
	type ArmedGridStep,
	type GridSpec,
	type GridStep,
	type IndicatorProvider,
	type PlannedStep,
	type RunProgress,
	type RunState,
	type RunStatus,
	type RunSummary,
	type SentimentProvider,
	type StepOutcome,
	type StepResult,
	type StrategySpec,
	type TwapSpec,
	type TwapStep,
} from "./types";
import { validateStrategySpec } from "./validateSpec";

const engineLogger = createLogger("strategy-engine");

export type EngineSettings = Pick<
	EngineConfig,
	| "quantityPrecision"
	| "maxConditionSkips"
	| "maxRetries"
	| "retryBaseDelayMs"
	| "retryMaxDelayMs"
	| "requestTimeoutMs"
	| "gridPollIntervalMs"
	| "rsiPeriod"
>;

export interface StrategyEngineOptions {
	marketData: MarketDataClient;
	execution: ExecutionClient;
	settings: EngineSettings;
	registry?: RunRegistry;
	indicators?: IndicatorProvider;
	sentiment?: SentimentProvider;
	now?: () => number;
	generateId?: () => string;
}

interface ActiveRun {
	controller: AbortController;
	task: Promise<void>;
}

interface StepOrder {
	index: number;
	side: OrderSide;
	type: OrderType;
	quantity: number;
	price: number | null;
	clientOrderId: string;
}

type PricePoll = { ok: true; price: number } | { ok: false; error: unknown };

const CANCELLED_REASON = "cancelled by request";

const twapOrder = (step: TwapStep): StepOrder => ({
	index: step.index,
	side: step.side,
	type: "MARKET",
	quantity: step.quantity,
	price: null,
	clientOrderId: step.clientOrderId,
});

const gridOrder = (step: ArmedGridStep): StepOrder => ({
	index: step.index,
	side: step.side,
	type: "LIMIT",
	quantity: step.quantity,
	price: step.price,
	clientOrderId: step.clientOrderId,
});

const toOutcome = (status: OrderStatus): StepOutcome => {
	switch (status) {
		case "FILLED":
			return "FILLED";
		case "REJECTED":
			return "REJECTED";
		default:
			return "OPEN";
	}
};

const isFailure = (result: StepResult): boolean =>
	result.outcome === "ERROR" || result.outcome === "REJECTED";

/**
 * Runs TWAP and GRID strategies, one async task per run.
 *
 * Each run only suspends while waiting for its next slot or poll and while
 * an exchange request is in flight. Cancellation is checked between those
 * points and never interrupts an order already sent.
 */
export class StrategyEngine {
	private readonly registry: RunRegistry;
	private readonly active = new Map<string, ActiveRun>();
	private readonly now: () => number;
	private readonly generateId: () => string;

	constructor(private readonly options: StrategyEngineOptions) {
		this.registry = options.registry ?? new RunRegistry();
		this.now = options.now ?? Date.now;
		this.generateId = options.generateId ?? randomUUID;
	}

	/**
	 * Validate, plan and start a run. Returns before any exchange call.
	 * @throws InvalidSpecError
	 */
	submit(input: unknown): string {
		const { settings } = this.options;
		const spec = validateStrategySpec(input, {
			quantityPrecision: settings.quantityPrecision,
		});
		const runId = this.generateId();

		if (spec.kind === "TWAP") {
			const steps = planTwapSteps(
				runId,
				spec,
				spec.quantityPrecision ?? settings.quantityPrecision
			);
			this.register(runId, spec, steps, { kind: "sequential", nextIndex: 0 });
			this.launch(runId, (signal) => this.runTwap(runId, spec, steps, signal));
		} else {
			const steps = planGridSteps(runId, spec);
			this.register(runId, spec, steps, {
				kind: "levels",
				pending: steps.map((step) => step.index),
				fired: [],
			});
			this.launch(runId, (signal) => this.runGrid(runId, spec, steps, signal));
		}

		engineLogger.info("run_submitted", {
			runId,
			kind: spec.kind,
			symbol: spec.symbol,
		});
		return runId;
	}

	/**
	 * Ask a run to stop at its next checkpoint. No-op for finished runs.
	 * @throws NotFoundError
	 */
	cancel(runId: string): void {
		const state = this.registry.require(runId);
		if (isTerminalStatus(state.status)) {
			return;
		}
		this.active.get(runId)?.controller.abort();
		engineLogger.info("run_cancel_requested", { runId, status: state.status });
	}

	/** @throws NotFoundError */
	getStatus(runId: string): RunState {
		return this.registry.require(runId);
	}

	listRuns(): RunSummary[] {
		return this.registry.list();
	}

	/**
	 * Forget a finished run.
	 * @throws NotFoundError
	 * @throws RunActiveError while the run is still going
	 */
	purge(runId: string): void {
		const state = this.registry.require(runId);
		if (!isTerminalStatus(state.status)) {
			throw new RunActiveError(runId);
		}
		this.registry.delete(runId);
		engineLogger.debug("run_purged", { runId });
	}

	/** Resolves with the final state once the run has stopped. */
	async whenSettled(runId: string): Promise<RunState> {
		this.registry.require(runId);
		await this.active.get(runId)?.task;
		return this.registry.require(runId);
	}

	/** Cancel every active run and wait for all of them to stop. */
	async stop(): Promise<void> {
		const tasks = Array.from(this.active.values()).map((run) => {
			run.controller.abort();
			return run.task;
		});
		await Promise.all(tasks);
	}

	private register(
		runId: string,
		spec: StrategySpec,
		steps: PlannedStep[],
		progress: RunProgress
	): void {
		this.registry.create({
			runId,
			spec,
			status: "PENDING",
			steps,
			results: [],
			progress,
			createdAt: this.timestamp(),
			lastActionAt: null,
			skipCount: 0,
			terminalReason: null,
			referencePrice: null,
		});
	}

	private launch(
		runId: string,
		body: (signal: AbortSignal) => Promise<void>
	): void {
		const controller = new AbortController();
		const task = body(controller.signal)
			.catch((error: unknown) => this.abandon(runId, error))
			.finally(() => {
				this.active.delete(runId);
			});
		this.active.set(runId, { controller, task });
	}

	private async runTwap(
		runId: string,
		spec: TwapSpec,
		steps: TwapStep[],
		signal: AbortSignal
	): Promise<void> {
		const start = this.now();
		const intervalMs = (spec.durationSeconds * 1000) / spec.slices;
		let slot = 0;
		let index = 0;

		// Skipped attempts use up slots, so slice i never starts before
		// start + i * interval.
		while (index < steps.length) {
			await sleepUntil(start + slot * intervalMs, this.now, signal);
			slot += 1;
			if (signal.aborted) {
				return this.finish(runId, "CANCELLED", CANCELLED_REASON);
			}
			this.markStarted(runId);

			const order = twapOrder(steps[index]);
			const gate = await this.checkConditions(runId, spec);
			if (signal.aborted) {
				return this.finish(runId, "CANCELLED", CANCELLED_REASON);
			}
			if (!gate.allowed) {
				if (this.recordSkip(runId, spec, order, gate.reasons)) {
					return;
				}
				continue;
			}

			const result = await this.executeStep(runId, spec.symbol, order);
			this.recordResult(runId, result, {
				kind: "sequential",
				nextIndex: index + 1,
			});
			if (isFailure(result)) {
				return this.finish(runId, "FAILED", result.error ?? result.outcome);
			}
			index += 1;
		}

		this.finish(runId, "COMPLETED", null);
	}

	private async runGrid(
		runId: string,
		spec: GridSpec,
		steps: GridStep[],
		signal: AbortSignal
	): Promise<void> {
		const reference = await this.takeReferencePrice(runId, spec.symbol, signal);
		if (reference === null) {
			return;
		}
		const armed = armGridSteps(steps, reference);
		this.registry.update(runId, {
			steps: armed,
			referencePrice: reference,
			status: "RUNNING",
			lastActionAt: this.timestamp(),
		});
		engineLogger.info("grid_armed", {
			runId,
			symbol: spec.symbol,
			referencePrice: reference,
			buys: armed.filter((step) => step.side === "BUY").length,
			sells: armed.filter((step) => step.side === "SELL").length,
		});

		const pending = new Set(armed.map((step) => step.index));
		const fired: number[] = [];
		let pollFailures = 0;

		while (pending.size > 0) {
			if (signal.aborted) {
				return this.finish(runId, "CANCELLED", CANCELLED_REASON);
			}

			const poll = await this.pollPrice(spec.symbol);
			if (!poll.ok) {
				pollFailures += 1;
				engineLogger.warn("grid_price_poll_failed", {
					runId,
					symbol: spec.symbol,
					failures: pollFailures,
					error: describeError(poll.error),
				});
				if (
					!isRetryableError(poll.error) ||
					pollFailures > this.options.settings.maxRetries
				) {
					return this.finish(
						runId,
						"FAILED",
						`price feed failed: ${describeError(poll.error)}`
					);
				}
			} else {
				pollFailures = 0;
				const price = poll.price;
				const triggered = armed.filter(
					(step) => pending.has(step.index) && isGridTriggered(step, price)
				);
				// One condition snapshot per poll, shared by every level it fires.
				const gate = triggered.length
					? await this.checkConditions(runId, spec)
					: null;

				if (signal.aborted) {
					return this.finish(runId, "CANCELLED", CANCELLED_REASON);
				}
				const blocked = gate !== null && !gate.allowed;
				// One skip per gated poll, recorded against the lowest triggered
				// level. Every triggered level stays pending.
				if (
					gate &&
					blocked &&
					this.recordSkip(runId, spec, gridOrder(triggered[0]), gate.reasons)
				) {
					return;
				}

				for (const step of blocked ? [] : triggered) {
					if (signal.aborted) {
						return this.finish(runId, "CANCELLED", CANCELLED_REASON);
					}
					const result = await this.executeStep(runId, spec.symbol, gridOrder(step));
					pending.delete(step.index);
					fired.push(step.index);
					this.recordResult(runId, result, {
						kind: "levels",
						pending: Array.from(pending),
						fired: [...fired],
					});
					if (isFailure(result)) {
						return this.finish(runId, "FAILED", result.error ?? result.outcome);
					}
				}
			}

			if (pending.size === 0) {
				break;
			}
			await sleep(this.options.settings.gridPollIntervalMs, signal);
		}

		this.finish(runId, "COMPLETED", null);
	}

	private async takeReferencePrice(
		runId: string,
		symbol: string,
		signal: AbortSignal
	): Promise<number | null> {
		const outcome = await runWithRetry(() => this.fetchPrice(symbol), {
			policy: this.retryPolicy(),
			isRetryable: isRetryableError,
			wait: (ms) => sleep(ms, signal),
			signal,
			onRetry: ({ attempt, delayMs, error }) =>
				engineLogger.warn("reference_price_retry", {
					runId,
					symbol,
					attempt,
					delayMs,
					error: describeError(error),
				}),
		});
		if (signal.aborted) {
			this.finish(runId, "CANCELLED", CANCELLED_REASON);
			return null;
		}
		if (!outcome.ok) {
			this.finish(
				runId,
				"FAILED",
				`reference price unavailable: ${describeError(outcome.error)}`
			);
			return null;
		}
		return outcome.value;
	}

	private async pollPrice(symbol: string): Promise<PricePoll> {
		try {
			return { ok: true, price: await this.fetchPrice(symbol) };
		} catch (error) {
			return { ok: false, error };
		}
	}

	private fetchPrice(symbol: string): Promise<number> {
		return this.withTimeout(
			this.options.marketData.getCurrentPrice(symbol),
			`price request for ${symbol}`
		);
	}

	private async executeStep(
		runId: string,
		symbol: string,
		order: StepOrder
	): Promise<StepResult> {
		const { execution } = this.options;
		const request: OrderRequest = {
			symbol,
			side: order.side,
			type: order.type,
			quantity: order.quantity,
			clientOrderId: order.clientOrderId,
		};
		if (order.price !== null) {
			request.price = order.price;
		}

		const outcome = await runWithRetry(
			() =>
				this.withTimeout(
					execution.placeOrder(request),
					`order ${order.clientOrderId}`
				),
			{
				policy: this.retryPolicy(),
				isRetryable: isRetryableError,
				wait: (ms) => sleep(ms),
				reconcile: () =>
					this.withTimeout(
						execution.findOrder(symbol, order.clientOrderId),
						`order lookup ${order.clientOrderId}`
					),
				onRetry: ({ attempt, delayMs, error }) =>
					engineLogger.warn("step_retry", {
						runId,
						stepIndex: order.index,
						attempt,
						delayMs,
						error: describeError(error),
					}),
			}
		);

		const base: Omit<StepResult, "outcome"> = {
			stepIndex: order.index,
			action: {
				side: order.side,
				type: order.type,
				quantity: order.quantity,
				price: order.price ?? "MARKET",
			},
			clientOrderId: order.clientOrderId,
			attempts: outcome.attempts,
			timestamp: this.timestamp(),
		};

		if (!outcome.ok) {
			return { ...base, outcome: "ERROR", error: describeError(outcome.error) };
		}
		if (outcome.reconciled) {
			engineLogger.info("step_reconciled", {
				runId,
				stepIndex: order.index,
				orderId: outcome.value.orderId,
			});
		}
		const stepOutcome = toOutcome(outcome.value.status);
		return {
			...base,
			outcome: stepOutcome,
			orderId: outcome.value.orderId,
			...(stepOutcome === "REJECTED"
				? { error: "order rejected by exchange" }
				: {}),
		};
	}

	private async checkConditions(
		runId: string,
		spec: StrategySpec
	): Promise<ConditionEvaluation> {
		const needs = requiredInputs(spec.conditions);
		if (!needs.rsi && !needs.sentiment) {
			return { allowed: true, reasons: [] };
		}
		const [rsi, sentiment] = await Promise.all([
			needs.rsi ? this.readRsi(runId, spec) : Promise.resolve(undefined),
			needs.sentiment
				? this.readSentiment(runId, spec.symbol)
				: Promise.resolve(undefined),
		]);
		return evaluateConditions(spec.conditions, { rsi, sentiment });
	}

	private async readRsi(runId: string, spec: StrategySpec): Promise<number | null> {
		const { indicators } = this.options;
		if (!indicators) {
			return null;
		}
		const period = spec.rsiPeriod ?? this.options.settings.rsiPeriod;
		try {
			return await this.withTimeout(
				indicators.getRsi(spec.symbol, period),
				`rsi for ${spec.symbol}`
			);
		} catch (error) {
			engineLogger.warn("rsi_unavailable", {
				runId,
				symbol: spec.symbol,
				error: describeError(error),
			});
			return null;
		}
	}

	private async readSentiment(
		runId: string,
		symbol: string
	): Promise<number | null> {
		const { sentiment } = this.options;
		if (!sentiment) {
			return null;
		}
		try {
			return await sentiment.getSentiment(symbol);
		} catch (error) {
			engineLogger.warn("sentiment_unavailable", {
				runId,
				symbol,
				error: describeError(error),
			});
			return null;
		}
	}

	/**
	 * Append a SKIPPED_CONDITION result and pause the run.
	 * @returns true when the skip budget is spent and the run has failed
	 */
	private recordSkip(
		runId: string,
		spec: StrategySpec,
		order: StepOrder,
		reasons: string[]
	): boolean {
		const state = this.registry.require(runId);
		const skipCount = state.skipCount + 1;
		const limit = spec.maxConditionSkips ?? this.options.settings.maxConditionSkips;
		const failure =
			skipCount >= limit ? new ConditionNeverSatisfiedError(reasons) : null;
		const result: StepResult = {
			stepIndex: order.index,
			action: {
				side: order.side,
				type: order.type,
				quantity: order.quantity,
				price: order.price ?? "MARKET",
			},
			outcome: "SKIPPED_CONDITION",
			reasons,
			attempts: 0,
			timestamp: this.timestamp(),
			...(failure ? { error: failure.message } : {}),
		};
		this.registry.appendResult(runId, result);
		this.registry.update(runId, {
			skipCount,
			status: "PAUSED",
			lastActionAt: result.timestamp,
		});
		this.logStep(runId, result);

		if (failure) {
			engineLogger.warn("skip_budget_exhausted", {
				runId,
				skipCount,
				code: failure.code,
				reasons: failure.reasons,
			});
			this.finish(runId, "FAILED", failure.message);
		}
		return failure !== null;
	}

	private recordResult(
		runId: string,
		result: StepResult,
		progress: RunProgress
	): void {
		this.registry.appendResult(runId, result);
		this.registry.update(runId, {
			progress,
			status: "RUNNING",
			lastActionAt: result.timestamp,
		});
		this.logStep(runId, result);
	}

	private markStarted(runId: string): void {
		if (this.registry.require(runId).status === "PENDING") {
			this.registry.update(runId, { status: "RUNNING" });
		}
	}

	private finish(
		runId: string,
		status: Extract<RunStatus, "COMPLETED" | "CANCELLED" | "FAILED">,
		reason: string | null
	): void {
		const state = this.registry.update(runId, {
			status,
			terminalReason: reason,
			lastActionAt: this.timestamp(),
		});
		engineLogger.log(status === "FAILED" ? "warn" : "info", "run_terminal", {
			runId,
			kind: state.spec.kind,
			symbol: state.spec.symbol,
			status,
			results: state.results.length,
			reason,
		});
	}

	private abandon(runId: string, error: unknown): void {
		engineLogger.error("run_crashed", { runId, error: describeError(error) });
		const state = this.registry.get(runId);
		if (state && !isTerminalStatus(state.status)) {
			this.finish(runId, "FAILED", describeError(error));
		}
	}

	private logStep(runId: string, result: StepResult): void {
		const level =
			result.outcome === "ERROR" || result.outcome === "REJECTED"
				? "warn"
				: "info";
		engineLogger.log(level, "step_result", {
			runId,
			stepIndex: result.stepIndex,
			outcome: result.outcome,
			side: result.action.side,
			quantity: result.action.quantity,
			price: result.action.price === "MARKET" ? null : result.action.price,
			orderId: result.orderId,
			attempts: result.attempts,
			error: result.error ?? result.reasons?.join(", "),
		});
	}

	private retryPolicy(): RetryPolicy {
		const { settings } = this.options;
		return {
			maxRetries: settings.maxRetries,
			baseDelayMs: settings.retryBaseDelayMs,
			maxDelayMs: settings.retryMaxDelayMs,
		};
	}

	private withTimeout<T>(task: Promise<T>, what: string): Promise<T> {
		const timeoutMs = this.options.settings.requestTimeoutMs;
		return withDeadline(
			task,
			timeoutMs,
			() =>
				new ExchangeError({
					code: "TIMEOUT",
					message: `${what} timed out after ${timeoutMs}ms`,
					retryable: true,
				}),
			(late) =>
				engineLogger.warn("late_exchange_response", {
					what,
					settled: "error" in late ? "error" : "value",
					error: "error" in late ? describeError(late.error) : undefined,
				})
		);
	}

	private timestamp(): string {
		return new Date(this.now()).toISOString();
	}
}
