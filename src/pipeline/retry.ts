export type BackoffStrategy = "exponential" | "linear";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = {
  maxAttempts: 3,
  baseDelayMs: 1_000,
};

/**
 * attempt は 1 始まり。exponential は base * 2^(attempt-1)、linear は base * attempt。
 */
export function computeBackoffDelay(
  strategy: BackoffStrategy,
  baseDelayMs: number,
  attempt: number
): number {
  const safeAttempt = Math.max(1, Math.floor(attempt));
  if (strategy === "exponential") {
    return baseDelayMs * 2 ** (safeAttempt - 1);
  }
  return baseDelayMs * safeAttempt;
}

export type RetryDecision =
  | { kind: "retry"; attempt: number; delayMs: number }
  | { kind: "giveUp"; attempts: number };

/**
 * 1 tick 分のリトライ状態。失敗を報告するたびに次の待機時間か打ち切りを返します。
 */
export class RetryState {
  private attempts = 0;

  constructor(private readonly policy: RetryPolicy) {}

  get attemptCount(): number {
    return this.attempts;
  }

  beginAttempt(): number {
    this.attempts += 1;
    return this.attempts;
  }

  onFailure(strategy: BackoffStrategy): RetryDecision {
    if (this.attempts >= this.policy.maxAttempts) {
      return { kind: "giveUp", attempts: this.attempts };
    }
    return {
      kind: "retry",
      attempt: this.attempts,
      delayMs: computeBackoffDelay(strategy, this.policy.baseDelayMs, this.attempts),
    };
  }
}

/**
 * signal が中断されると待機を打ち切って即座に resolve します。
 */
export const sleep: SleepFn = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(handle);
      resolve();
    };
    const handle = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener("abort", onAbort, { once: true });
  });
