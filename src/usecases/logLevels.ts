import type { LogLevel } from "../interfaces/index.js";

const LOG_LEVELS: ReadonlySet<string> = new Set(["TRACE", "DEBUG", "INFO", "WARN", "ERROR", "FATAL"]);

const LEVEL_ALIASES: Readonly<Record<string, LogLevel>> = {
  WARNING: "WARN",
  SEVERE: "ERROR",
  CRITICAL: "FATAL",
};

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.has(value);
}

export function parseLogLevel(value: unknown): LogLevel {
  if (typeof value !== "string") return "INFO";
  const normalized = value.trim().toUpperCase();
  if (normalized.length === 0) return "INFO";
  if (isLogLevel(normalized)) return normalized;
  return LEVEL_ALIASES[normalized] ?? "INFO";
}

export function isErrorLevel(level: LogLevel): boolean {
  return level === "ERROR" || level === "FATAL";
}
