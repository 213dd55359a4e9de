export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = Pick<typeof console, "debug" | "info" | "warn" | "error">;

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * 指定レベル未満のメッセージを捨てる console 互換ロガーを生成します。
 */
export function createLogger(
  level: LogLevel,
  sink: Logger = console
): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const enabled = (candidate: LogLevel) =>
    LOG_LEVELS.indexOf(candidate) >= threshold;

  return {
    debug: (...args: unknown[]) => {
      if (enabled("debug")) {
        sink.debug(...args);
      }
    },
    info: (...args: unknown[]) => {
      if (enabled("info")) {
        sink.info(...args);
      }
    },
    warn: (...args: unknown[]) => {
      if (enabled("warn")) {
        sink.warn(...args);
      }
    },
    error: (...args: unknown[]) => {
      if (enabled("error")) {
        sink.error(...args);
      }
    },
  };
}
