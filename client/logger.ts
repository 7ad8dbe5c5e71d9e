export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface Logger {
  readonly debug: (message: string, ...details: unknown[]) => void;
  readonly info: (message: string, ...details: unknown[]) => void;
  readonly warn: (message: string, ...details: unknown[]) => void;
  readonly error: (message: string, ...details: unknown[]) => void;
  readonly child: (scope: string) => Logger;
}

export interface LogSink {
  readonly debug: (...args: unknown[]) => void;
  readonly info: (...args: unknown[]) => void;
  readonly warn: (...args: unknown[]) => void;
  readonly error: (...args: unknown[]) => void;
}

export interface ConsoleLoggerOptions {
  readonly scope: string;
  readonly level: LogLevel;
  readonly sink?: LogSink;
}

const levelRank: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export const isLogLevel = (value: unknown): value is LogLevel =>
  typeof value === "string" && LOG_LEVELS.some((level) => level === value);

export const createConsoleLogger = ({ scope, level, sink = console }: ConsoleLoggerOptions): Logger => {
  const threshold = levelRank[level];
  const prefix = `[${scope}]`;
  const write = (entryLevel: Exclude<LogLevel, "silent">) =>
    (message: string, ...details: unknown[]): void => {
      if (levelRank[entryLevel] < threshold) {
        return;
      }
      sink[entryLevel](`${prefix} ${message}`, ...details);
    };

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
    child: (childScope) => createConsoleLogger({ scope: `${scope}:${childScope}`, level, sink }),
  };
};

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  child: () => silentLogger,
};
