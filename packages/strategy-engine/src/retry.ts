export interface RetryPolicy {
	maxRetries: number;
	baseDelayMs: number;
	maxDelayMs: number;
}

/** Delay before retry number `attempt` (1-based). */
export const backoffDelay = (policy: RetryPolicy, attempt: number): number =>
	Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));

export interface RetryNotice {
	attempt: number;
	delayMs: number;
	error: unknown;
}

export interface RetryOptions<T> {
	policy: RetryPolicy;
	isRetryable: (error: unknown) => boolean;
	wait: (ms: number) => Promise<void>;
	/**
	 * Runs before every retry. A non-null result means an earlier attempt
	 * did go through and ends the loop as a success.
	 */
	reconcile?: () => Promise<T | null>;
	onRetry?: (notice: RetryNotice) => void;
	/** Once aborted, the loop ends with the last error instead of retrying. */
	signal?: AbortSignal;
}

export type RetryOutcome<T> =
	| { ok: true; value: T; attempts: number; reconciled: boolean }
	| { ok: false; error: unknown; attempts: number };

/**
 * Run `operation` with bounded exponential backoff. Errors the predicate
 * rejects end the loop at once.
 */
export const runWithRetry = async <T>(
	operation: () => Promise<T>,
	options: RetryOptions<T>
): Promise<RetryOutcome<T>> => {
	for (let attempt = 1; ; attempt += 1) {
		try {
			if (attempt > 1 && options.reconcile) {
				const existing = await options.reconcile();
				if (existing !== null) {
					return { ok: true, value: existing, attempts: attempt, reconciled: true };
				}
			}
			return {
				ok: true,
				value: await operation(),
				attempts: attempt,
				reconciled: false,
			};
		} catch (error) {
			if (
				options.signal?.aborted ||
				!options.isRetryable(error) ||
				attempt > options.policy.maxRetries
			) {
				return { ok: false, error, attempts: attempt };
			}
			const delayMs = backoffDelay(options.policy, attempt);
			options.onRetry?.({ attempt, delayMs, error });
			await options.wait(delayMs);
			if (options.signal?.aborted) {
				return { ok: false, error, attempts: attempt };
			}
		}
	}
};
