export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export type LogSink = (level: LogLevel, line: string) => void;

export type Logger = {
  readonly debug: (message: string, fields?: LogFields) => void;
  readonly info: (message: string, fields?: LogFields) => void;
  readonly warn: (message: string, fields?: LogFields) => void;
  readonly error: (message: string, fields?: LogFields) => void;
  readonly child: (fields: LogFields) => Logger;
};

export type LoggerOptions = {
  readonly level?: LogLevel;
  readonly sink?: LogSink;
  readonly fields?: LogFields;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const consoleSink: LogSink = (level, line) => {
  if (level === "error") {
    console.error(line);
    return;
  }
  if (level === "warn") {
    console.warn(line);
    return;
  }
  if (level === "debug") {
    console.debug(line);
    return;
  }
  console.info(line);
};

type ErrorLike = {
  readonly status?: unknown;
  readonly cause?: unknown;
};

/**
 * Flattens a thrown value into log fields. Subclasses that carry an HTTP
 * status keep it under `status`; a `cause` chain is rendered as one string.
 */
export const describeError = (error: unknown): LogFields => {
  if (!(error instanceof Error)) {
    return { error: String(error) };
  }
  const fields: LogFields = { error: error.message, errorName: error.name };
  const extra: ErrorLike = error;
  if (typeof extra.status === "number") {
    fields.status = extra.status;
  }
  if (extra.cause instanceof Error) {
    fields.cause = extra.cause.message;
  }
  return fields;
};

export const createLogger = (options: LoggerOptions = {}): Logger => {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const sink = options.sink ?? consoleSink;
  const bound = options.fields ?? {};

  const log = (level: LogLevel, message: string, fields?: LogFields): void => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    const payload = {
      level,
      message,
      timestamp: new Date().toISOString(),
      ...bound,
      ...fields
    };
    sink(level, JSON.stringify(payload));
  };

  return {
    debug: (message, fields) => log("debug", message, fields),
    info: (message, fields) => log("info", message, fields),
    warn: (message, fields) => log("warn", message, fields),
    error: (message, fields) => log("error", message, fields),
    child: (fields) =>
      createLogger({
        level: options.level,
        sink,
        fields: { ...bound, ...fields }
      })
  };
};
