/*
Purpose: mirror orchestrator log events on the console, filtered by log level.
Assumptions: the JSONL log keeps every event; the console only shows a subset.
Usage: runPipeline({ ..., onEvent: createConsoleReporter("info") })
*/

import type { LogLevel } from "../core/config.js";
import type { LogEvent, LogEventListener } from "../core/logger.js";

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const EVENT_LEVEL: Record<string, LogLevel> = {
  "run.start": "info",
  "run.resume": "info",
  "run.complete": "info",
  "run.abort": "error",
  "plan.built": "info",
  "plan.excluded": "info",
  "stage.ready": "debug",
  "stage.dispatch": "info",
  "stage.cache_hit": "info",
  "stage.cache_stale": "warn",
  "stage.complete": "info",
  "stage.failed": "error",
  "stage.skipped": "warn",
};

// =============================================================================
// FILTERING
// =============================================================================

export function eventLevel(type: string): LogLevel {
  return EVENT_LEVEL[type] ?? "debug";
}

export function shouldPrintEvent(threshold: LogLevel, type: string): boolean {
  return LEVEL_RANK[eventLevel(type)] >= LEVEL_RANK[threshold];
}

// =============================================================================
// FORMATTING
// =============================================================================

export function formatEventLine(event: LogEvent): string {
  const subject = [event.unit, event.stage].filter(Boolean).join(":");
  const parts = [`[${event.type}]`];
  if (subject) parts.push(subject);

  const detail = event.payload?.detail ?? event.payload?.reason ?? event.payload?.status;
  if (typeof detail === "string") parts.push(detail);

  return parts.join(" ");
}

export function createConsoleReporter(
  threshold: LogLevel,
  write: (line: string) => void = (line) => console.log(line),
): LogEventListener {
  return (event) => {
    if (!shouldPrintEvent(threshold, event.type)) return;
    write(formatEventLine(event));
  };
}
