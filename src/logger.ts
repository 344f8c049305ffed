// Console logger with a level switch, set once from the CLI flags

export type LogLevel = "debug" | "info" | "warn" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  silent: 100,
};

let currentLevel: LogLevel = "info";

export const setLogLevel = (level: LogLevel) => {
  currentLevel = level;
};

const enabled = (level: Exclude<LogLevel, "silent">) =>
  LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];

export const logger = {
  log: (message: string) => {
    if (!enabled("info")) return;
    console.log(message);
  },
  error: (message: string) => {
    // Errors are reported even in quiet mode; only "silent" hides them.
    if (currentLevel === "silent") return;
    console.error(message);
  },
  warn: (message: string) => {
    if (!enabled("warn")) return;
    console.warn(message);
  },
  debug: (message: string) => {
    if (!enabled("debug")) return;
    console.debug(message);
  },
};
