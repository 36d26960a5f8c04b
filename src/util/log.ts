export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogFields = Record<string, string | number | boolean | null | undefined>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((l) => l === value);
}

/** Falls back to "info" when LOG_LEVEL is unset or unrecognised. */
export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

function format(scope: string, message: string, fields?: LogFields): string {
  const line = `[${scope}] ${message}`;
  if (!fields) return line;
  const defined = Object.entries(fields).filter(([, v]) => v !== undefined);
  return defined.length ? `${line} ${JSON.stringify(Object.fromEntries(defined))}` : line;
}

/**
 * Console logger with a `[scope]` prefix. warn/error go to stderr.
 * Never pass raw caption text in `fields`; use `textFingerprint`.
 */
export function createLogger(scope: string, level: LogLevel = levelFromEnv()): Logger {
  const enabled = (l: LogLevel) => RANK[l] >= RANK[level];

  return {
    debug(message, fields) {
      if (enabled("debug")) console.debug(format(scope, message, fields));
    },
    info(message, fields) {
      if (enabled("info")) console.log(format(scope, message, fields));
    },
    warn(message, fields) {
      if (enabled("warn")) console.warn(format(scope, message, fields));
    },
    error(message, fields) {
      if (enabled("error")) console.error(format(scope, message, fields));
    },
  };
}
