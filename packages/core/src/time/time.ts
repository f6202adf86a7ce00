/**
 * Time helpers shared by the scheduler and the exchange clients.
 * Timestamps are UTC epoch milliseconds.
 */

import { MINUTE_MS, HOUR_MS, DAY_MS } from "./constants";

/**
 * Parse timeframe string to milliseconds
 * @param timeframe - Format: "1m", "5m", "15m", "1h", "4h", "1d"
 * @throws Error if timeframe format is invalid
 */
export const timeframeToMs = (timeframe: string): number => {
	if (!timeframe || typeof timeframe !== "string") {
		throw new Error(
			`Invalid timeframe: expected string, got ${typeof timeframe}`
		);
	}

	const trimmed = timeframe.trim().toLowerCase();
	const match = trimmed.match(/^(\d+)([mhd])$/);

	if (!match) {
		throw new Error(
			`Invalid timeframe format: "${timeframe}". Expected format like "1m", "5m", "1h", "1d"`
		);
	}

	const n = parseInt(match[1], 10);
	const unit = match[2];

	if (n <= 0) {
		throw new Error(
			`Invalid timeframe: period must be positive, got ${n} in "${timeframe}"`
		);
	}

	switch (unit) {
		case "m":
			return n * MINUTE_MS;
		case "h":
			return n * HOUR_MS;
		default:
			return n * DAY_MS;
	}
};

/** Longest delay a single Node timer honours; larger values fire after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

const sleepOnce = (ms: number, signal?: AbortSignal): Promise<void> =>
	new Promise((resolve) => {
		if (signal?.aborted) {
			resolve();
			return;
		}
		const onAbort = (): void => {
			clearTimeout(timer);
			resolve();
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, Math.min(Math.max(0, ms), MAX_TIMER_DELAY_MS));
		signal?.addEventListener("abort", onAbort, { once: true });
	});

/**
 * Resolve after `ms`, or early when `signal` aborts. Never rejects: callers
 * re-check their own cancellation state after waking. Delays beyond one
 * timer's range are chained.
 */
export const sleep = async (ms: number, signal?: AbortSignal): Promise<void> => {
	let remaining = ms;
	do {
		const chunk = Math.min(remaining, MAX_TIMER_DELAY_MS);
		await sleepOnce(chunk, signal);
		remaining -= chunk;
	} while (remaining > 0 && !signal?.aborted);
};

/**
 * Sleep until an absolute timestamp, as read from `now`. Returns immediately
 * when it is already in the past.
 */
export const sleepUntil = async (
	targetMs: number,
	now: () => number = Date.now,
	signal?: AbortSignal
): Promise<void> => {
	let remaining = targetMs - now();
	while (remaining > 0 && !signal?.aborted) {
		await sleepOnce(remaining, signal);
		remaining = targetMs - now();
	}
};

/**
 * Race `task` against a deadline. On expiry the returned promise rejects
 * with `onTimeout()`; the task keeps running and its late settlement is
 * passed to `onLateSettle`.
 */
export const withDeadline = <T>(
	task: Promise<T>,
	timeoutMs: number,
	onTimeout: () => Error,
	onLateSettle?: (outcome: { value?: T; error?: unknown }) => void
): Promise<T> =>
	new Promise<T>((resolve, reject) => {
		let expired = false;
		const timer = setTimeout(() => {
			expired = true;
			reject(onTimeout());
		}, timeoutMs);
		task.then(
			(value) => {
				if (expired) {
					onLateSettle?.({ value });
					return;
				}
				clearTimeout(timer);
				resolve(value);
			},
			(error: unknown) => {
				if (expired) {
					onLateSettle?.({ error });
					return;
				}
				clearTimeout(timer);
				reject(error);
			}
		);
	});
