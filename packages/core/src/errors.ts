/**
 * Error taxonomy shared by every package. Callers branch on `instanceof`
 * (or `code` once serialized), never on message text.
 */
export class SlicebotError extends Error {
	readonly code: string;

	constructor(code: string, message: string) {
		super(message);
		this.name = new.target.name;
		this.code = code;
	}
}

export class InvalidSpecError extends SlicebotError {
	readonly issues: string[];

	constructor(issues: string[]) {
		super("INVALID_SPEC", `Invalid strategy spec: ${issues.join("; ")}`);
		this.issues = issues;
	}
}

export class OrderValidationError extends SlicebotError {
	readonly issues: string[];

	constructor(issues: string[]) {
		super("INVALID_ORDER", `Invalid order: ${issues.join("; ")}`);
		this.issues = issues;
	}
}

export class NotFoundError extends SlicebotError {
	readonly runId: string;

	constructor(runId: string) {
		super("NOT_FOUND", `Unknown run id: ${runId}`);
		this.runId = runId;
	}
}

export class RunActiveError extends SlicebotError {
	readonly runId: string;

	constructor(runId: string) {
		super("RUN_ACTIVE", `Run ${runId} is still active`);
		this.runId = runId;
	}
}

export const CONDITION_NEVER_SATISFIED = "condition never satisfied";

/**
 * A run spent its condition-skip budget. The message is the run's terminal
 * reason; `reasons` holds the blocking conditions of the last skip.
 */
export class ConditionNeverSatisfiedError extends SlicebotError {
	readonly reasons: string[];

	constructor(reasons: string[]) {
		super("CONDITION_NEVER_SATISFIED", CONDITION_NEVER_SATISFIED);
		this.reasons = reasons;
	}
}

export interface ExchangeErrorOptions {
	code: string;
	message: string;
	retryable: boolean;
	cause?: unknown;
}

/**
 * Failure reported by (or on the way to) the exchange. Only `retryable`
 * errors go through the step retry path.
 */
export class ExchangeError extends SlicebotError {
	readonly retryable: boolean;

	constructor(options: ExchangeErrorOptions) {
		super(options.code, options.message);
		this.retryable = options.retryable;
		if (options.cause !== undefined) {
			this.cause = options.cause;
		}
	}
}

export class ConfigError extends SlicebotError {
	constructor(message: string) {
		super("CONFIG_ERROR", message);
	}
}

export const isRetryableError = (error: unknown): boolean =>
	error instanceof ExchangeError && error.retryable;

export const describeError = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);
