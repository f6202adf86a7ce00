import { describe, expect, it, vi } from "vitest";
import { backoffDelay, runWithRetry, type RetryPolicy } from "./retry";

const policy: RetryPolicy = { maxRetries: 2, baseDelayMs: 1_000, maxDelayMs: 3_000 };

class Transient extends Error {}

const isRetryable = (error: unknown): boolean => error instanceof Transient;

describe("backoffDelay", () => {
	it("doubles per attempt up to the cap", () => {
		expect(backoffDelay(policy, 1)).toBe(1_000);
		expect(backoffDelay(policy, 2)).toBe(2_000);
		expect(backoffDelay(policy, 3)).toBe(3_000);
	});
});

describe("runWithRetry", () => {
	it("retries transient failures with backoff", async () => {
		const operation = vi
			.fn<() => Promise<string>>()
			.mockRejectedValueOnce(new Transient("blip"))
			.mockRejectedValueOnce(new Transient("blip"))
			.mockResolvedValue("done");
		const wait = vi.fn(async (_ms: number) => undefined);

		const outcome = await runWithRetry(operation, { policy, isRetryable, wait });

		expect(outcome).toEqual({ ok: true, value: "done", attempts: 3, reconciled: false });
		expect(wait.mock.calls).toEqual([[1_000], [2_000]]);
	});

	it("stops at once on a permanent failure", async () => {
		const failure = new Error("bad request");
		const wait = vi.fn(async (_ms: number) => undefined);

		const outcome = await runWithRetry(() => Promise.reject(failure), {
			policy,
			isRetryable,
			wait,
		});

		expect(outcome).toEqual({ ok: false, error: failure, attempts: 1 });
		expect(wait).not.toHaveBeenCalled();
	});

	it("gives up after the last retry", async () => {
		const onRetry = vi.fn();
		const outcome = await runWithRetry(() => Promise.reject(new Transient("down")), {
			policy,
			isRetryable,
			wait: async () => undefined,
			onRetry,
		});

		expect(outcome.ok).toBe(false);
		expect(outcome.attempts).toBe(3);
		expect(onRetry).toHaveBeenCalledTimes(2);
	});

	it("ends with the reconciled value instead of repeating the operation", async () => {
		const operation = vi
			.fn<() => Promise<string>>()
			.mockRejectedValueOnce(new Transient("lost"))
			.mockResolvedValue("duplicate");
		const reconcile = vi.fn(async () => "found");

		const outcome = await runWithRetry(operation, {
			policy,
			isRetryable,
			wait: async () => undefined,
			reconcile,
		});

		expect(outcome).toEqual({ ok: true, value: "found", attempts: 2, reconciled: true });
		expect(operation).toHaveBeenCalledTimes(1);
	});

	it("stops retrying once the signal aborts during a wait", async () => {
		const controller = new AbortController();
		const failure = new Transient("down");
		const operation = vi.fn(() => Promise.reject(failure));

		const outcome = await runWithRetry(operation, {
			policy,
			isRetryable,
			wait: async () => controller.abort(),
			signal: controller.signal,
		});

		expect(outcome).toEqual({ ok: false, error: failure, attempts: 1 });
		expect(operation).toHaveBeenCalledTimes(1);
	});
});
