import { config } from "../../config/env";
import { getRequestId } from "./request-context";

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

const LEVEL_RANK: Record<LogLevel | "SILENT", number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
  SILENT: 100,
};

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[config.logLevel];
}

export function log(
  level: LogLevel,
  message: string,
  meta?: Record<string, unknown>,
) {
  if (!isLevelEnabled(level)) return;

  const entry = {
    level,
    message,
    ts: Date.now(),
    requestId: getRequestId() ?? null,
    ...meta,
  };

  // JSON-only output (log aggregation safe)
  console.log(JSON.stringify(entry));
}
