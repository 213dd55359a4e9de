import axios, { type AxiosInstance } from "axios";

import {
  decodePollSnapshot,
  toFlightEvent,
  type RawRecord,
} from "@/adapters/payload";
import type { AdapterFactory, IngestionAdapter } from "@/adapters/types";
import {
  DEFAULT_RETRY_POLICY,
  RetryState,
  sleep as defaultSleep,
  type BackoffStrategy,
  type RetryPolicy,
  type SleepFn,
} from "@/pipeline/retry";
import {
  extractEntityId,
  type SnapshotDiffer,
} from "@/pipeline/snapshotDiffer";
import type { FlightEvent } from "@/types";
import { errorToMessage } from "@/utils/errors";

export interface FeedEndpoint {
  identity: string;
  url: string;
}

export interface FeedHttpResponse {
  status: number;
  data: unknown;
}

export interface FeedHttpClient {
  get: (
    url: string,
    options: { timeoutMs: number; signal?: AbortSignal }
  ) => Promise<FeedHttpResponse>;
}

export interface PollAdapterDeps {
  feeds: FeedEndpoint[];
  snapshotDiffer: SnapshotDiffer;
  http?: FeedHttpClient;
  intervalMs?: number;
  requestTimeoutMs?: number;
  retryPolicy?: RetryPolicy;
  sleep?: SleepFn;
  logger?: Pick<typeof console, "info" | "warn" | "error">;
}

export type FeedFetchOutcome =
  | { kind: "ok"; data: unknown; attempts: number }
  | {
      kind: "skipped";
      reason: "rateLimited" | "transient" | "unexpectedStatus" | "aborted";
      attempts: number;
    };

export const POLL_INTERVAL_DEFAULT_MS = 3_000;
const REQUEST_TIMEOUT_DEFAULT_MS = 10_000;

export function createAxiosFeedClient(
  instance: AxiosInstance = axios.create()
): FeedHttpClient {
  return {
    async get(url, { timeoutMs, signal }) {
      const response = await instance.get<unknown>(url, {
        timeout: timeoutMs,
        signal,
        responseType: "json",
        // ステータス判定は呼び出し側で行う
        validateStatus: () => true,
      });
      return { status: response.status, data: response.data };
    },
  };
}

export function createPollAdapter(deps: PollAdapterDeps): IngestionAdapter {
  const logger = deps.logger ?? console;
  const http = deps.http ?? createAxiosFeedClient();
  const intervalMs = deps.intervalMs ?? POLL_INTERVAL_DEFAULT_MS;
  const requestTimeoutMs = deps.requestTimeoutMs ?? REQUEST_TIMEOUT_DEFAULT_MS;
  const retryPolicy = deps.retryPolicy ?? DEFAULT_RETRY_POLICY;
  const sleep = deps.sleep ?? defaultSleep;
  const feedNames = deps.feeds.map((feed) => feed.identity).join(",");

  async function runTick(signal: AbortSignal): Promise<FlightEvent[]> {
    const outcomes = await Promise.all(
      deps.feeds.map(async (feed) => ({
        feed,
        outcome: await fetchFeedWithRetry({
          http,
          feed,
          policy: retryPolicy,
          timeoutMs: requestTimeoutMs,
          sleep,
          signal,
          logger,
        }),
      }))
    );

    const events: FlightEvent[] = [];
    for (const { feed, outcome } of outcomes) {
      if (outcome.kind !== "ok" || signal.aborted) {
        continue;
      }
      events.push(...collectNewEntities(feed, outcome.data));
    }
    return events;
  }

  function collectNewEntities(feed: FeedEndpoint, data: unknown): FlightEvent[] {
    const entities = decodePollSnapshot(data);
    if (!entities) {
      logger.warn(
        `PollAdapter: 想定外のレスポンス形式のため tick をスキップします (feed=${feed.identity})`
      );
      return [];
    }

    const byId = new Map<string, RawRecord>();
    for (const entity of entities) {
      const id = extractEntityId(entity);
      if (id) {
        byId.set(id, entity);
      }
    }

    const added = deps.snapshotDiffer.diff(feed.identity, new Set(byId.keys()));
    const events: FlightEvent[] = [];
    for (const id of added) {
      const record = byId.get(id);
      const event = record ? toFlightEvent(record, "aircraftSpawn") : null;
      if (event) {
        events.push(event);
      }
    }

    if (events.length > 0) {
      logger.info(
        `PollAdapter: 新規機体を検出しました (feed=${feed.identity}, count=${events.length})`
      );
    }
    return events;
  }

  return {
    name: `poll:${feedNames}`,
    transport: "poll",
    requiresDeduplication: false,
    async *stream(signal) {
      while (!signal.aborted) {
        const events = await runTick(signal);
        for (const event of events) {
          if (signal.aborted) {
            return;
          }
          yield event;
        }
        await sleep(intervalMs, signal);
      }
    },
  };
}

export function createPollAdapterFactory(
  options: Omit<PollAdapterDeps, "snapshotDiffer">
): AdapterFactory {
  return (state) =>
    createPollAdapter({ ...options, snapshotDiffer: state.snapshotDiffer });
}

type AttemptResult =
  | { kind: "ok"; data: unknown }
  | {
      kind: "retryable";
      strategy: BackoffStrategy;
      reason: "rateLimited" | "transient";
      detail: string;
    }
  | { kind: "fatal"; detail: string };

export interface FetchFeedOptions {
  http: FeedHttpClient;
  feed: FeedEndpoint;
  policy: RetryPolicy;
  timeoutMs: number;
  sleep: SleepFn;
  signal: AbortSignal;
  logger: Pick<typeof console, "warn" | "error">;
}

/**
 * 1 tick 分のフィード取得。429 は指数バックオフ、タイムアウト・通信エラー・5xx は線形バックオフで
 * policy.maxAttempts 回まで試行し、それでも失敗した場合はこの tick をスキップします。
 */
export async function fetchFeedWithRetry(
  options: FetchFeedOptions
): Promise<FeedFetchOutcome> {
  const { feed, signal, logger } = options;
  const retry = new RetryState(options.policy);

  while (!signal.aborted) {
    const attempt = retry.beginAttempt();
    const result = await attemptFetch(options);

    if (result.kind === "ok") {
      return { kind: "ok", data: result.data, attempts: attempt };
    }
    if (signal.aborted) {
      break;
    }
    if (result.kind === "fatal") {
      logger.warn(
        `PollAdapter: フィード取得に失敗したため tick をスキップします (feed=${feed.identity}, attempt=${attempt}): ${result.detail}`
      );
      return { kind: "skipped", reason: "unexpectedStatus", attempts: attempt };
    }

    const decision = retry.onFailure(result.strategy);
    if (decision.kind === "giveUp") {
      logger.error(
        `PollAdapter: リトライ上限に達したため tick をスキップします (feed=${feed.identity}, attempts=${decision.attempts}): ${result.detail}`
      );
      return { kind: "skipped", reason: result.reason, attempts: decision.attempts };
    }

    logger.warn(
      `PollAdapter: フィード取得をリトライします (feed=${feed.identity}, attempt=${attempt}, delay=${decision.delayMs}ms): ${result.detail}`
    );
    await options.sleep(decision.delayMs, signal);
  }

  return { kind: "skipped", reason: "aborted", attempts: retry.attemptCount };
}

async function attemptFetch(options: FetchFeedOptions): Promise<AttemptResult> {
  try {
    const response = await options.http.get(options.feed.url, {
      timeoutMs: options.timeoutMs,
      signal: options.signal,
    });

    if (response.status === 200) {
      return { kind: "ok", data: response.data };
    }
    if (response.status === 429) {
      return {
        kind: "retryable",
        strategy: "exponential",
        reason: "rateLimited",
        detail: "HTTP 429",
      };
    }
    if (response.status >= 500) {
      return {
        kind: "retryable",
        strategy: "linear",
        reason: "transient",
        detail: `HTTP ${response.status}`,
      };
    }
    return { kind: "fatal", detail: `HTTP ${response.status}` };
  } catch (error) {
    return {
      kind: "retryable",
      strategy: "linear",
      reason: "transient",
      detail: errorToMessage(error),
    };
  }
}
