export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(event: string, fields?: LogFields): void;
  info(event: string, fields?: LogFields): void;
  warn(event: string, fields?: LogFields): void;
  error(event: string, fields?: LogFields): void;
}

export const logLevels: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export const isLogLevel = (value: string): value is LogLevel => logLevels.some((level) => level === value);

const severity: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/**
 * One JSON object per line: `{ level, event, ...base, ...fields }`.
 * debug/info go to stdout, warn/error to stderr.
 */
export const createJsonLogger = (options: { level?: LogLevel; base?: LogFields } = {}): Logger => {
  const threshold = severity[options.level ?? "info"];
  const base = options.base ?? {};

  const emit = (level: LogLevel, event: string, fields?: LogFields) => {
    if (severity[level] < threshold) return;
    const line = JSON.stringify({ level, event, ...base, ...(fields ?? {}) });
    /* eslint-disable no-console */
    if (level === "error") console.error(line);
    else if (level === "warn") console.warn(line);
    else console.log(line);
    /* eslint-enable no-console */
  };

  return {
    debug: (event, fields) => emit("debug", event, fields),
    info: (event, fields) => emit("info", event, fields),
    warn: (event, fields) => emit("warn", event, fields),
    error: (event, fields) => emit("error", event, fields)
  };
};

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
