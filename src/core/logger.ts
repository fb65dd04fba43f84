import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export type LogEvent = JsonObject & {
  ts: string;
  type: string;
  run_id: string;
  unit?: string;
  stage?: string;
  payload?: JsonObject;
};

export type LogEventInput = {
  type: string;
  runId?: string;
  unitId?: string;
  stageId?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

type EventDefaults = {
  runId?: string;
  unitId?: string;
  stageId?: string;
};

export type LogEventListener = (event: LogEvent) => void;

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger {
  private readonly fileDescriptor: number;
  private readonly listeners: LogEventListener[] = [];
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly defaults: EventDefaults = {},
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
  }

  log(event: LogEventInput): void {
    const normalized = eventWithTs(event, this.defaults);
    this.append(normalized);
    for (const listener of this.listeners) {
      listener(normalized);
    }
  }

  subscribe(listener: LogEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index >= 0) this.listeners.splice(index, 1);
    };
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(`Warning: failed to close log file ${this.filePath}: ${formatErrorMessage(err)}`);
    } finally {
      this.closed = true;
    }
  }

  private append(event: LogEvent): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(event)}\n`);
      fs.fsyncSync(this.fileDescriptor);
    } catch (err) {
      console.warn(
        `Warning: failed to write log event to ${this.filePath}: ${formatErrorMessage(err)}`,
      );
    }
  }
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults = {}): LogEvent {
  const { runId: providedRunId, unitId, stageId, payload, ts, type } = event;

  const runId = providedRunId ?? defaults.runId;
  if (!runId) {
    throw new Error("run_id is required for log events");
  }

  const normalizedTs =
    typeof ts === "string" ? ts : ts instanceof Date ? ts.toISOString() : isoNow();

  const result: LogEvent = {
    ts: normalizedTs,
    type,
    run_id: runId,
  };

  const resolvedUnit = unitId ?? defaults.unitId;
  const resolvedStage = stageId ?? defaults.stageId;
  if (resolvedUnit) result.unit = resolvedUnit;
  if (resolvedStage) result.stage = resolvedStage;
  if (payload && Object.keys(payload).length > 0) {
    result.payload = payload;
  }

  return result;
}

export function logOrchestratorEvent(
  logger: JsonlLogger,
  type: string,
  fields: JsonObject & { unitId?: string; stageId?: string } = {},
): void {
  const { unitId, stageId, ...rest } = fields;
  const event: LogEventInput = { type };

  if (typeof unitId === "string") event.unitId = unitId;
  if (typeof stageId === "string") event.stageId = stageId;
  if (Object.keys(rest).length > 0) event.payload = rest;

  logger.log(event);
}

export function logRunResume(
  logger: JsonlLogger,
  details: { previousStatus: string; resetInstances: number; invocation: number },
): void {
  logOrchestratorEvent(logger, "run.resume", {
    previous_status: details.previousStatus,
    reset_instances: details.resetInstances,
    invocation: details.invocation,
  });
}
