import type { LogLevel, LogMeta, Logger } from "../ports/logger";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type ConsoleLoggerOptions = {
  level?: LogLevel;
  now?: () => Date;
  /** Defaults to console.log for debug/info and console.error for warn/error */
  write?: (level: LogLevel, line: string) => void;
};

function defaultWrite(level: LogLevel, line: string) {
  if (level === "warn" || level === "error") console.error(line);
  else console.log(line);
}

export function formatLogLine(at: Date, level: LogLevel, message: string, meta?: LogMeta): string {
  const base = `[${at.toISOString()}] ${level.toUpperCase()} ${message}`;
  if (!meta || Object.keys(meta).length === 0) return base;
  return `${base} ${JSON.stringify(meta)}`;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const now = options.now ?? (() => new Date());
  const write = options.write ?? defaultWrite;

  const log = (level: LogLevel) => (message: string, meta?: LogMeta) => {
    if (LEVEL_ORDER[level] < threshold) return;
    write(level, formatLogLine(now(), level, message, meta));
  };

  return {
    debug: log("debug"),
    info: log("info"),
    warn: log("warn"),
    error: log("error"),
  };
}

/** Discards everything; the default when a caller passes no logger. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
