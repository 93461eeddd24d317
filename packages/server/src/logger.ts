export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return (
    typeof value === "string" &&
    Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value)
  );
}

/**
 * Shape shared by `console` and the LSP connection's remote console.
 */
export interface ConsoleLike {
  log(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Wrap a console (Node's, or `connection.console`) in a level filter.
 */
export function createLogger(
  sink: ConsoleLike,
  level: LogLevel = "info",
  prefix = "",
): Logger {
  const enabled = (l: LogLevel) => LEVEL_ORDER[l] >= LEVEL_ORDER[level];
  const fmt = (message: string) => (prefix ? `[${prefix}] ${message}` : message);
  return {
    debug: (message) => {
      if (enabled("debug")) sink.log(fmt(message));
    },
    info: (message) => {
      if (enabled("info")) sink.info(fmt(message));
    },
    warn: (message) => {
      if (enabled("warn")) sink.warn(fmt(message));
    },
    error: (message) => {
      if (enabled("error")) sink.error(fmt(message));
    },
  };
}

/** Logger used when the owner does not pass one. */
export const defaultLogger: Logger = createLogger(
  console,
  isLogLevel(process.env.ENVLENS_LOG_LEVEL)
    ? process.env.ENVLENS_LOG_LEVEL
    : "warn",
);

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
