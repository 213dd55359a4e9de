import { describe, expect, it } from "vitest";

import {
  RetryState,
  computeBackoffDelay,
  sleep,
} from "@/pipeline/retry";

describe("computeBackoffDelay", () => {
  it("exponential は base * 2^(attempt-1) を返す", () => {
    expect(computeBackoffDelay("exponential", 1000, 1)).toBe(1000);
    expect(computeBackoffDelay("exponential", 1000, 2)).toBe(2000);
    expect(computeBackoffDelay("exponential", 1000, 3)).toBe(4000);
  });

  it("linear は base * attempt を返す", () => {
    expect(computeBackoffDelay("linear", 1000, 1)).toBe(1000);
    expect(computeBackoffDelay("linear", 1000, 2)).toBe(2000);
    expect(computeBackoffDelay("linear", 1000, 3)).toBe(3000);
  });
});

describe("RetryState", () => {
  it("maxAttempts に達するまでリトライを返し、その後打ち切る", () => {
    const state = new RetryState({ maxAttempts: 3, baseDelayMs: 1000 });

    state.beginAttempt();
    expect(state.onFailure("exponential")).toEqual({
      kind: "retry",
      attempt: 1,
      delayMs: 1000,
    });
    state.beginAttempt();
    expect(state.onFailure("exponential")).toEqual({
      kind: "retry",
      attempt: 2,
      delayMs: 2000,
    });
    state.beginAttempt();
    expect(state.onFailure("exponential")).toEqual({ kind: "giveUp", attempts: 3 });
    expect(state.attemptCount).toBe(3);
  });
});

describe("sleep", () => {
  it("中断済みの signal では即座に resolve する", async () => {
    const controller = new AbortController();
    controller.abort();

    const startedAt = Date.now();
    await sleep(60_000, controller.signal);

    expect(Date.now() - startedAt).toBeLessThan(1_000);
  });

  it("待機中に中断されると待機を打ち切る", async () => {
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);

    controller.abort();

    await expect(pending).resolves.toBeUndefined();
  });
});
