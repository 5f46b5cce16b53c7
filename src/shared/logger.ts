import { config } from "./config";

export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

type LogData = Record<string, unknown> | string;
type LogFn = (data: LogData, message?: string) => void;

export interface Logger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  fatal: LogFn;
  child: (bindings: Record<string, unknown>) => Logger;
}

/** Where serialized lines go. stdout is reserved for the report, so everything lands on stderr. */
export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

function serializeBigInt(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

export function createLogger(
  level: LogLevel = config.LOG_LEVEL,
  bindings: Record<string, unknown> = {},
  sink: LogSink = stderrSink,
): Logger {
  const minLevel = LOG_LEVELS[level] ?? 1;

  function log(entryLevel: LogLevel, data: LogData, message?: string): void {
    if (LOG_LEVELS[entryLevel] < minLevel) return;

    const entry: Record<string, unknown> = {
      timestamp: new Date().toISOString(),
      level: entryLevel,
      ...bindings,
    };

    if (typeof data === "string") {
      entry.message = data;
    } else {
      Object.assign(entry, data);
      if (message) entry.message = message;
    }

    sink(JSON.stringify(entry, serializeBigInt));
  }

  return {
    debug: (data, message) => log("debug", data, message),
    info: (data, message) => log("info", data, message),
    warn: (data, message) => log("warn", data, message),
    error: (data, message) => log("error", data, message),
    fatal: (data, message) => log("fatal", data, message),
    child: (extra) => createLogger(level, { ...bindings, ...extra }, sink),
  };
}

export const logger: Logger = createLogger(config.LOG_LEVEL, { environment: config.APP_ENV });
