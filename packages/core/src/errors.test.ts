import { describe, expect, it } from "vitest";
import {
	CONDITION_NEVER_SATISFIED,
	ConditionNeverSatisfiedError,
	ExchangeError,
	SlicebotError,
	describeError,
	isRetryableError,
} from "./errors";

describe("errors", () => {
	it("carries the blocking reasons of an exhausted skip budget", () => {
		const error = new ConditionNeverSatisfiedError(["rsi 55.2 not below 30"]);

		expect(error).toBeInstanceOf(SlicebotError);
		expect(error.name).toBe("ConditionNeverSatisfiedError");
		expect(error.code).toBe("CONDITION_NEVER_SATISFIED");
		expect(error.message).toBe(CONDITION_NEVER_SATISFIED);
		expect(error.reasons).toEqual(["rsi 55.2 not below 30"]);
	});

	it("retries only retryable exchange errors", () => {
		expect(
			isRetryableError(
				new ExchangeError({ code: "TIMEOUT", message: "timed out", retryable: true })
			)
		).toBe(true);
		expect(
			isRetryableError(
				new ExchangeError({ code: "AUTH", message: "bad key", retryable: false })
			)
		).toBe(false);
		expect(isRetryableError(new Error("timed out"))).toBe(false);
	});

	it("describes any thrown value", () => {
		expect(describeError(new Error("boom"))).toBe("boom");
		expect(describeError("plain")).toBe("plain");
	});
});
