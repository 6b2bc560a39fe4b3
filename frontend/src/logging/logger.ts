import { env, type LogLevel } from "../config/env";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const CONSOLE_METHOD: Record<LogLevel, "debug" | "info" | "warn" | "error"> = {
  debug: "debug",
  info: "info",
  warn: "warn",
  error: "error",
};

export type Logger = Record<LogLevel, (message: string, context?: unknown) => void>;

function shouldLog(level: LogLevel, activeLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[activeLevel];
}

export function createLogger(scope: string, activeLevel: LogLevel = env.logLevel): Logger {
  const write = (level: LogLevel) => (message: string, context?: unknown) => {
    if (!shouldLog(level, activeLevel)) {
      return;
    }
    console[CONSOLE_METHOD[level]](`[MesaQR:${scope}][${new Date().toISOString()}] ${message}`, context ?? "");
  };
  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
  };
}

export const logger = createLogger("app");
