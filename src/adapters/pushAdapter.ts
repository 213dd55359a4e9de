import type { EventEmitter } from "node:events";

import WebSocket from "ws";

import {
  isFlightPlanEventType,
  parseEnvelope,
  toFlightEvent,
  unwrapPushPayload,
} from "@/adapters/payload";
import type { AdapterFactory, IngestionAdapter } from "@/adapters/types";
import { sleep as defaultSleep, type SleepFn } from "@/pipeline/retry";
import type { FlightEvent } from "@/types";
import { errorToMessage } from "@/utils/errors";

export interface PushSocket extends EventEmitter {
  ping: () => void;
  terminate: () => void;
  close: () => void;
}

export interface PushAdapterDeps {
  url: string;
  createSocket?: (url: string) => PushSocket;
  reconnectDelayMs?: number;
  pingIntervalMs?: number;
  pingTimeoutMs?: number;
  sleep?: SleepFn;
  logger?: Pick<typeof console, "debug" | "info" | "warn" | "error">;
}

export const PUSH_FEED_DEFAULT_URL = "wss://24data.ptfs.app/wss";
const RECONNECT_DELAY_DEFAULT_MS = 5_000;
const PING_INTERVAL_DEFAULT_MS = 30_000;
const PING_TIMEOUT_DEFAULT_MS = 10_000;

export function createPushAdapter(deps: PushAdapterDeps): IngestionAdapter {
  const logger = deps.logger ?? console;
  const createSocket =
    deps.createSocket ?? ((url: string): PushSocket => new WebSocket(url));
  const reconnectDelayMs = deps.reconnectDelayMs ?? RECONNECT_DELAY_DEFAULT_MS;
  const pingIntervalMs = deps.pingIntervalMs ?? PING_INTERVAL_DEFAULT_MS;
  const pingTimeoutMs = deps.pingTimeoutMs ?? PING_TIMEOUT_DEFAULT_MS;
  const sleep = deps.sleep ?? defaultSleep;

  function decodeMessage(raw: unknown): FlightEvent[] {
    const text = rawDataToString(raw);
    const envelope = parseEnvelope(text);
    if (envelope.kind === "malformed") {
      logger.warn(
        `PushAdapter: 不正なメッセージを破棄しました (reason=${envelope.reason}): ${text.slice(0, 100)}`
      );
      return [];
    }

    if (!isFlightPlanEventType(envelope.value.type)) {
      return [];
    }

    const records = unwrapPushPayload(envelope.value.data);
    if (records.length === 0) {
      logger.debug(
        `PushAdapter: フライトプランを含まないペイロードを破棄しました (type=${envelope.value.type})`
      );
      return [];
    }

    const events: FlightEvent[] = [];
    for (const record of records) {
      const event = toFlightEvent(record, "flightPlan");
      if (event) {
        events.push(event);
      } else {
        logger.warn(
          `PushAdapter: callsign を持たないレコードを破棄しました (type=${envelope.value.type})`
        );
      }
    }
    return events;
  }

  /**
   * 接続 1 回分のメッセージを順に返します。接続が閉じるか signal が中断されると終了します。
   */
  async function* consumeConnection(
    signal: AbortSignal
  ): AsyncGenerator<FlightEvent, void, undefined> {
    logger.info(`PushAdapter: WebSocket に接続します (url=${deps.url})`);

    let socket: PushSocket;
    try {
      socket = createSocket(deps.url);
    } catch (error) {
      logger.error(
        `PushAdapter: WebSocket の生成に失敗しました (url=${deps.url}): ${errorToMessage(error)}`
      );
      return;
    }

    const pending: FlightEvent[] = [];
    let closed = false;
    let wake: (() => void) | undefined;
    let heartbeat: ReturnType<typeof setInterval> | undefined;
    let pongTimer: ReturnType<typeof setTimeout> | undefined;

    const notify = () => {
      const resolve = wake;
      wake = undefined;
      resolve?.();
    };

    const stopHeartbeat = () => {
      if (heartbeat) {
        clearInterval(heartbeat);
        heartbeat = undefined;
      }
      if (pongTimer) {
        clearTimeout(pongTimer);
        pongTimer = undefined;
      }
    };

    const onAbort = () => {
      closed = true;
      socket.close();
      notify();
    };

    socket.on("open", () => {
      logger.info(`PushAdapter: WebSocket に接続しました (url=${deps.url})`);
      heartbeat = setInterval(() => {
        if (pongTimer) {
          return;
        }
        pongTimer = setTimeout(() => {
          logger.warn(
            `PushAdapter: keep-alive 応答がないため接続を切断します (url=${deps.url})`
          );
          socket.terminate();
        }, pingTimeoutMs);
        socket.ping();
      }, pingIntervalMs);
    });

    socket.on("pong", () => {
      if (pongTimer) {
        clearTimeout(pongTimer);
        pongTimer = undefined;
      }
    });

    socket.on("message", (raw: unknown) => {
      pending.push(...decodeMessage(raw));
      notify();
    });

    socket.on("error", (error: unknown) => {
      logger.error(
        `PushAdapter: WebSocket エラーが発生しました (url=${deps.url}): ${errorToMessage(error)}`
      );
    });

    socket.on("close", () => {
      closed = true;
      stopHeartbeat();
      notify();
    });

    signal.addEventListener("abort", onAbort, { once: true });

    try {
      while (true) {
        // 停止後は未処理のイベントを流さない
        if (signal.aborted) {
          return;
        }
        const next = pending.shift();
        if (next) {
          yield next;
          continue;
        }
        if (closed) {
          return;
        }
        await new Promise<void>((resolve) => {
          wake = resolve;
        });
      }
    } finally {
      signal.removeEventListener("abort", onAbort);
      stopHeartbeat();
      if (!closed) {
        socket.close();
      }
      socket.removeAllListeners();
      // close 後に遅れて届く error でプロセスが落ちないようにする
      socket.on("error", () => undefined);
    }
  }

  return {
    name: `push:${deps.url}`,
    transport: "push",
    requiresDeduplication: true,
    async *stream(signal) {
      while (!signal.aborted) {
        yield* consumeConnection(signal);
        if (signal.aborted) {
          return;
        }
        logger.warn(
          `PushAdapter: WebSocket 接続が切断されました。${reconnectDelayMs}ms 後に再接続します (url=${deps.url})`
        );
        await sleep(reconnectDelayMs, signal);
      }
    },
  };
}

export function createPushAdapterFactory(
  options: PushAdapterDeps
): AdapterFactory {
  return () => createPushAdapter(options);
}

function rawDataToString(raw: unknown): string {
  if (typeof raw === "string") {
    return raw;
  }
  if (Buffer.isBuffer(raw)) {
    return raw.toString("utf8");
  }
  if (Array.isArray(raw)) {
    const chunks = raw.filter((chunk): chunk is Buffer => Buffer.isBuffer(chunk));
    return Buffer.concat(chunks).toString("utf8");
  }
  if (raw instanceof ArrayBuffer) {
    return Buffer.from(raw).toString("utf8");
  }
  return String(raw);
}
