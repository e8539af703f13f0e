export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = {
  debug: (message: unknown, ...args: unknown[]) => void;
  info: (message: unknown, ...args: unknown[]) => void;
  warn: (message: unknown, ...args: unknown[]) => void;
  error: (message: unknown, ...args: unknown[]) => void;
};

export type LogSink = Pick<Console, LogLevel>;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LoggerOptions {
  prefix?: string;
  level?: LogLevel;
  sink?: LogSink;
}

/** Console-backed logger; messages below `level` are dropped. */
export function createLogger(options: LoggerOptions = {}): Logger {
  const prefix = `[${options.prefix ?? "grid-snake"}]`;
  const minRank = LEVEL_RANK[options.level ?? "info"];
  const sink = options.sink ?? console;

  const at =
    (level: LogLevel) =>
    (message: unknown, ...args: unknown[]): void => {
      if (LEVEL_RANK[level] < minRank) return;
      sink[level](prefix, message, ...args);
    };

  return {
    debug: at("debug"),
    info: at("info"),
    warn: at("warn"),
    error: at("error"),
  };
}

export const logger = createLogger();
