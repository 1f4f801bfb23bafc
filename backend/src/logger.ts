export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface Logger {
  debug: (message: string, data?: unknown) => void;
  info: (message: string, data?: unknown) => void;
  warn: (message: string, data?: unknown) => void;
  error: (message: string, data?: unknown) => void;
}

const rank: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

let currentLevel: LogLevel = "info";

export const setLogLevel = (level: LogLevel) => {
  currentLevel = level;
};

export const isLogLevel = (value: string): value is LogLevel => LOG_LEVELS.some((level) => level === value);

type Level = Exclude<LogLevel, "silent">;

const sinks = { debug: "debug", info: "log", warn: "warn", error: "error" } as const satisfies Record<Level, keyof Console>;

export const createComponentLogger = (component: string): Logger => {
  const timestamp = () => new Date().toISOString();
  const emit = (level: Level) => (message: string, data?: unknown) => {
    if (rank[level] < rank[currentLevel]) return;
    const line = `[${timestamp()}] [${level.toUpperCase()}] [${component}] ${message}`;
    if (data === undefined) {
      console[sinks[level]](line);
    } else {
      console[sinks[level]](line, data);
    }
  };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error")
  };
};

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};
