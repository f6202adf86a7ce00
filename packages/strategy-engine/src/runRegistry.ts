import { NotFoundError } from "@slicebot/core";
import {
	isTerminalStatus,
	type PlannedStep,
	type RunProgress,
	type RunState,
	type RunSummary,
	type StepResult,
} from "./types";

export type RunPatch = Partial<
	Pick<
		RunState,
		| "status"
		| "progress"
		| "steps"
		| "lastActionAt"
		| "skipCount"
		| "terminalReason"
		| "referencePrice"
	>
>;

const completedSteps = (progress: RunProgress): number =>
	progress.kind === "sequential" ? progress.nextIndex : progress.fired.length;

const assertProgress = (
	runId: string,
	previous: RunProgress,
	next: RunProgress,
	steps: PlannedStep[]
): void => {
	if (previous.kind !== next.kind) {
		throw new Error(`Run ${runId} cannot change progress kind`);
	}
	const before = completedSteps(previous);
	const after = completedSteps(next);
	if (after < before || after > steps.length) {
		throw new Error(
			`Run ${runId} progress must stay within ${before}..${steps.length}, got ${after}`
		);
	}
};

/**
 * In-memory store of every run the engine has accepted. Callers only ever
 * see copies; results are frozen once appended.
 */
export class RunRegistry {
	private readonly runs = new Map<string, RunState>();

	create(state: RunState): void {
		if (this.runs.has(state.runId)) {
			throw new Error(`Run ${state.runId} already exists`);
		}
		this.runs.set(state.runId, structuredClone(state));
	}

	has(runId: string): boolean {
		return this.runs.has(runId);
	}

	get(runId: string): RunState | undefined {
		const state = this.runs.get(runId);
		return state ? structuredClone(state) : undefined;
	}

	/** @throws NotFoundError */
	require(runId: string): RunState {
		const state = this.get(runId);
		if (!state) {
			throw new NotFoundError(runId);
		}
		return state;
	}

	list(): RunSummary[] {
		return Array.from(this.runs.values()).map((state) => ({
			runId: state.runId,
			kind: state.spec.kind,
			symbol: state.spec.symbol,
			status: state.status,
			createdAt: state.createdAt,
			lastActionAt: state.lastActionAt,
			stepsPlanned: state.steps.length,
			stepsDone: completedSteps(state.progress),
			results: state.results.length,
			terminalReason: state.terminalReason,
		}));
	}

	update(runId: string, patch: RunPatch): RunState {
		const state = this.mutable(runId);
		if (isTerminalStatus(state.status)) {
			throw new Error(`Run ${runId} is already ${state.status}`);
		}
		if (patch.progress) {
			assertProgress(runId, state.progress, patch.progress, patch.steps ?? state.steps);
		}
		Object.assign(state, structuredClone(patch));
		return structuredClone(state);
	}

	appendResult(runId: string, result: StepResult): void {
		const state = this.mutable(runId);
		if (isTerminalStatus(state.status)) {
			throw new Error(`Run ${runId} is already ${state.status}`);
		}
		const stored = structuredClone(result);
		if (stored.reasons) {
			Object.freeze(stored.reasons);
		}
		Object.freeze(stored.action);
		state.results.push(Object.freeze(stored));
	}

	delete(runId: string): boolean {
		return this.runs.delete(runId);
	}

	private mutable(runId: string): RunState {
		const state = this.runs.get(runId);
		if (!state) {
			throw new NotFoundError(runId);
		}
		return state;
	}
}
