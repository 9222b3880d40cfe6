/**
 * Leveled diagnostic logger
 *
 * Writes to stderr so stdout stays reserved for progress and summary lines.
 */

import color from "picocolors";

export type LogLevel = "debug" | "info" | "warn" | "error";

let currentLevel: LogLevel = "warn";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: color.gray,
  info: color.cyan,
  warn: color.yellow,
  error: color.red,
};

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function formatTimestamp(): string {
  return new Date().toISOString();
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

export function formatMessage(level: LogLevel, message: string, data?: unknown): string {
  const paint = LEVEL_COLORS[level];
  const levelStr = level.toUpperCase().padEnd(5);

  let formatted = `${paint(`[${formatTimestamp()}] ${levelStr}`)} ${message}`;

  if (data !== undefined) {
    if (data instanceof Error) {
      formatted += ` ${data.message}`;
    } else if (typeof data === "object") {
      formatted += ` ${JSON.stringify(data, null, 2)}`;
    } else {
      formatted += ` ${String(data)}`;
    }
  }

  return formatted;
}

function write(level: LogLevel, message: string, data?: unknown): void {
  if (shouldLog(level)) {
    console.error(formatMessage(level, message, data));
  }
}

export function debug(message: string, data?: unknown): void {
  write("debug", message, data);
}

export function info(message: string, data?: unknown): void {
  write("info", message, data);
}

export function warn(message: string, data?: unknown): void {
  write("warn", message, data);
}

export function error(message: string, data?: unknown): void {
  write("error", message, data);
}

export const logger = {
  debug,
  info,
  warn,
  error,
  setLevel: setLogLevel,
  getLevel: getLogLevel,
};
