export type LogLevel = "info" | "warn" | "error" | "debug";
export type LogFormat = "text" | "json";
export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  sink?: LogSink;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const normalized = value?.trim().toLowerCase() ?? "";
  return isLogLevel(normalized) ? normalized : fallback;
}

export function parseLogFormat(value: string | undefined): LogFormat {
  return value?.trim().toLowerCase() === "json" ? "json" : "text";
}

const consoleSink: LogSink = (level, line) => {
  console[level === "error" ? "error" : level === "warn" ? "warn" : "log"](line);
};

export function formatLine(level: LogLevel, message: string, meta: LogMeta, format: LogFormat): string {
  if (format === "json") {
    return JSON.stringify({ level, message, ...meta });
  }
  const payload = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `[${level.toUpperCase()}] ${message}${payload}`;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const format = options.format ?? "text";
  const sink = options.sink ?? consoleSink;

  const log = (level: LogLevel, message: string, meta: LogMeta = {}): void => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    sink(level, formatLine(level, message, meta, format));
  };

  return {
    debug: (message, meta) => log("debug", message, meta),
    info: (message, meta) => log("info", message, meta),
    warn: (message, meta) => log("warn", message, meta),
    error: (message, meta) => log("error", message, meta)
  };
}

export const logger = createLogger({
  level: parseLogLevel(process.env.LOG_LEVEL),
  format: parseLogFormat(process.env.LOG_FORMAT)
});
