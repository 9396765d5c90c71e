// esg-backend/src/utils/logger.ts
// Console logger with ISO timestamp prefix; level read from LOG_LEVEL

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

let currentLevel: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

function format(message: string, data?: Record<string, unknown>): string {
  const line = `[${new Date().toISOString()}] ${message}`;
  return data ? `${line} ${JSON.stringify(data)}` : line;
}

export const logger = {
  debug(message: string, data?: Record<string, unknown>): void {
    if (shouldLog("debug")) console.log(format(message, data));
  },

  info(message: string, data?: Record<string, unknown>): void {
    if (shouldLog("info")) console.log(format(message, data));
  },

  warn(message: string, data?: Record<string, unknown>): void {
    if (shouldLog("warn")) console.warn(format(message, data));
  },

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    if (!shouldLog("error")) return;
    const errorData =
      error instanceof Error
        ? { ...data, error: error.message }
        : error === undefined
          ? data
          : { ...data, error: String(error) };
    console.error(format(message, errorData));
  },
};
