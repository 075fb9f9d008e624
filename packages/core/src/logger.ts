import bunyan from "bunyan";

export type Logger = bunyan;
export type LogLevel = bunyan.LogLevelString;

const LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LEVELS.some((level) => level === value);
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Append JSON lines to this file instead of stdout */
  path?: string;
  /** Drop every record (tests) */
  silent?: boolean;
}

export function createLogger(name: string, opts: LoggerOptions = {}): Logger {
  const envLevel = process.env.LOG_LEVEL;
  const level = opts.level ?? (isLogLevel(envLevel) ? envLevel : "info");

  if (opts.silent) {
    const log = bunyan.createLogger({ name, streams: [] });
    log.level(level);
    return log;
  }
  if (opts.path) {
    return bunyan.createLogger({ name, streams: [{ level, path: opts.path }] });
  }
  return bunyan.createLogger({ name, level });
}
