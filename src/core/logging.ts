/**
 * Stderr logger. stdout carries the MCP JSON-RPC stream, so nothing here may
 * ever write to it.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

function currentLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? "").trim().toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

function write(level: LogLevel, message: string, details: unknown[]): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel()]) return;
  const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}`;
  if (details.length > 0) {
    console.error(line, ...details);
  } else {
    console.error(line);
  }
}

export function logDebug(message: string, ...details: unknown[]): void {
  write("debug", message, details);
}

export function logInfo(message: string, ...details: unknown[]): void {
  write("info", message, details);
}

export function logWarn(message: string, ...details: unknown[]): void {
  write("warn", message, details);
}

export function logError(message: string, ...details: unknown[]): void {
  write("error", message, details);
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
