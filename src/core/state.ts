import { z } from "zod";

import { ArtifactLocationsSchema, type ArtifactLocations } from "./artifacts.js";
import type { FailurePolicy } from "./config.js";
import type { PipelineDag } from "./graph.js";
import { isoNow } from "./utils.js";

// =============================================================================
// SCHEMA
// =============================================================================

export const InstanceStatusSchema = z.enum([
  "pending",
  "ready",
  "running",
  "completed",
  "failed",
  "skipped",
]);
export type InstanceStatus = z.infer<typeof InstanceStatusSchema>;

export const UnitStatusSchema = z.enum([
  "pending",
  "running",
  "completed",
  "partial_failure",
  "failed",
]);
export type UnitStatus = z.infer<typeof UnitStatusSchema>;

export const RunStatusSchema = z.enum(["running", "completed", "partial_success", "failed"]);
export type RunStatus = z.infer<typeof RunStatusSchema>;

export const InstanceStateSchema = z.object({
  unit: z.string(),
  stage: z.string(),
  status: InstanceStatusSchema,
  fingerprint: z.string(),
  attempts: z.number().int().default(0),
  cached: z.boolean().default(false),
  outputs: ArtifactLocationsSchema.optional(),
  skip_reason: z.string().optional(),
  last_error: z.string().optional(),
  started_at: z.string().optional(),
  completed_at: z.string().optional(),
});
export type InstanceState = z.infer<typeof InstanceStateSchema>;

export const UnitStateSchema = z.object({
  participant: z.string(),
  session: z.string().optional(),
  status: UnitStatusSchema,
});
export type UnitState = z.infer<typeof UnitStateSchema>;

export const RunRecordSchema = z.object({
  run_id: z.string(),
  started_at: z.string(),
  updated_at: z.string(),
  completed_at: z.string().optional(),
  status: RunStatusSchema,
  policy: z.enum(["abort", "isolate"]),
  invocations: z.number().int().positive(),
  participants: z.record(UnitStateSchema),
  instances: z.record(InstanceStateSchema),
});
export type RunRecord = z.infer<typeof RunRecordSchema>;

// =============================================================================
// CREATION
// =============================================================================

/**
 * Builds the record for one invocation. When a previous record of the same
 * run is given, its invocation count and per-instance attempts carry over;
 * statuses always start from pending since the plan is rebuilt.
 */
export function createRunRecord(args: {
  runId: string;
  policy: FailurePolicy;
  dags: PipelineDag[];
  previous?: RunRecord;
  now?: string;
}): RunRecord {
  const now = args.now ?? isoNow();
  const participants: Record<string, UnitState> = {};
  const instances: Record<string, InstanceState> = {};

  for (const dag of args.dags) {
    participants[dag.unit.id] = {
      participant: dag.unit.participant,
      ...(dag.unit.session !== undefined ? { session: dag.unit.session } : {}),
      status: "pending",
    };
    for (const instance of dag.instances) {
      instances[instance.id] = {
        unit: instance.unitId,
        stage: instance.stageId,
        status: "pending",
        fingerprint: instance.fingerprint,
        attempts: args.previous?.instances[instance.id]?.attempts ?? 0,
        cached: false,
      };
    }
  }

  return {
    run_id: args.runId,
    started_at: args.previous?.started_at ?? now,
    updated_at: now,
    status: "running",
    policy: args.policy,
    invocations: (args.previous?.invocations ?? 0) + 1,
    participants,
    instances,
  };
}

// =============================================================================
// INSTANCE TRANSITIONS
// =============================================================================

export function markInstanceReady(record: RunRecord, instanceId: string, now = isoNow()): void {
  const instance = requireInstance(record, instanceId);
  assertStatus(instanceId, instance.status, ["pending"], "ready");
  instance.status = "ready";
  touch(record, now);
}

export function markInstanceRunning(record: RunRecord, instanceId: string, now = isoNow()): void {
  const instance = requireInstance(record, instanceId);
  assertStatus(instanceId, instance.status, ["ready"], "running");

  instance.status = "running";
  instance.attempts += 1;
  instance.started_at = now;
  instance.completed_at = undefined;
  instance.last_error = undefined;

  const unit = record.participants[instance.unit];
  if (unit && unit.status === "pending") unit.status = "running";
  touch(record, now);
}

export function markInstanceCompleted(
  record: RunRecord,
  instanceId: string,
  result: { outputs: ArtifactLocations; cached: boolean },
  now = isoNow(),
): void {
  const instance = requireInstance(record, instanceId);
  assertStatus(
    instanceId,
    instance.status,
    result.cached ? ["ready"] : ["running"],
    "completed",
  );

  instance.status = "completed";
  instance.cached = result.cached;
  instance.outputs = result.outputs;
  instance.completed_at = now;

  const unit = record.participants[instance.unit];
  if (unit && unit.status === "pending") unit.status = "running";
  touch(record, now);
}

export function markInstanceFailed(
  record: RunRecord,
  instanceId: string,
  errorMessage: string,
  now = isoNow(),
): void {
  const instance = requireInstance(record, instanceId);
  // From ready when the instance could not be handed to an executor at all.
  assertStatus(instanceId, instance.status, ["ready", "running"], "failed");

  instance.status = "failed";
  instance.last_error = errorMessage;
  instance.completed_at = now;
  touch(record, now);
}

export function markInstanceSkipped(
  record: RunRecord,
  instanceId: string,
  reason: string,
  now = isoNow(),
): void {
  const instance = requireInstance(record, instanceId);
  assertStatus(instanceId, instance.status, ["pending", "ready"], "skipped");

  instance.status = "skipped";
  instance.skip_reason = reason;
  instance.completed_at = now;
  touch(record, now);
}

// Instances left running by a killed process go back to pending.
export function resetRunningInstances(
  record: RunRecord,
  reason = "Recovered from crash: previous status was running",
): number {
  let reset = 0;
  for (const instance of Object.values(record.instances)) {
    if (instance.status !== "running") continue;

    instance.status = "pending";
    instance.started_at = undefined;
    instance.completed_at = undefined;
    instance.last_error = reason;
    reset += 1;
  }
  if (reset > 0) touch(record, isoNow());
  return reset;
}

// =============================================================================
// TERMINAL STATUS
// =============================================================================

export function deriveUnitStatus(record: RunRecord, unitId: string): UnitStatus {
  const statuses = Object.values(record.instances)
    .filter((instance) => instance.unit === unitId)
    .map((instance) => instance.status);

  if (statuses.every((status) => status === "completed")) return "completed";

  const unfinished = statuses.some(
    (status) => status === "pending" || status === "ready" || status === "running",
  );
  const started = statuses.some((status) => status !== "pending" && status !== "ready");
  if (unfinished) return started ? "running" : "pending";

  return statuses.some((status) => status === "completed") ? "partial_failure" : "failed";
}

export function finalizeRunRecord(record: RunRecord, now = isoNow()): RunStatus {
  const unitStatuses: UnitStatus[] = [];
  for (const [unitId, unit] of Object.entries(record.participants)) {
    unit.status = deriveUnitStatus(record, unitId);
    unitStatuses.push(unit.status);
  }

  const allCompleted = unitStatuses.every((status) => status === "completed");
  if (allCompleted) {
    record.status = "completed";
  } else if (record.policy === "abort") {
    record.status = "failed";
  } else {
    record.status = unitStatuses.some((status) => status === "completed")
      ? "partial_success"
      : "failed";
  }

  record.completed_at = now;
  touch(record, now);
  return record.status;
}

// =============================================================================
// INTERNALS
// =============================================================================

function requireInstance(record: RunRecord, instanceId: string): InstanceState {
  const instance = record.instances[instanceId];
  if (!instance) {
    throw new Error(`Unknown stage instance in run record: ${instanceId}`);
  }
  return instance;
}

function assertStatus(
  instanceId: string,
  current: InstanceStatus,
  allowed: InstanceStatus[],
  target: InstanceStatus,
): void {
  if (!allowed.includes(current)) {
    throw new Error(`Cannot mark ${instanceId} ${target} from status ${current}`);
  }
}

function touch(record: RunRecord, now: string): void {
  record.updated_at = now;
}
