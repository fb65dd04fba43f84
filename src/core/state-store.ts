import path from "node:path";

import fse from "fs-extra";

import { OrchestratorError } from "./errors.js";
import type { PathsContext } from "./paths.js";
import { runStateDir, runStatePath } from "./paths.js";
import {
  RunRecordSchema,
  resetRunningInstances,
  type InstanceState,
  type InstanceStatus,
  type RunRecord,
  type RunStatus,
  type UnitStatus,
} from "./state.js";
import { compareLabels, isoNow, writeJsonFileAtomic } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type InstanceStatusCounts = Record<InstanceStatus, number> & { total: number };

export type UnitStatusRow = {
  id: string;
  status: UnitStatus;
  counts: InstanceStatusCounts;
};

export type FailedInstanceRow = {
  id: string;
  status: InstanceStatus;
  attempts: number;
  detail: string | null;
};

export type RunStatusSummary = {
  runId: string;
  status: RunStatus;
  policy: RunRecord["policy"];
  invocations: number;
  startedAt: string;
  updatedAt: string;
  instanceCounts: InstanceStatusCounts;
  cachedCount: number;
  units: UnitStatusRow[];
  problems: FailedInstanceRow[];
};

// =============================================================================
// STORE
// =============================================================================

export class RunRecordStore {
  readonly recordPath: string;

  constructor(
    public readonly runId: string,
    paths: PathsContext,
  ) {
    this.recordPath = runStatePath(paths, runId);
  }

  async exists(): Promise<boolean> {
    return fse.pathExists(this.recordPath);
  }

  async load(): Promise<RunRecord> {
    return loadRunRecord(this.recordPath);
  }

  async save(record: RunRecord): Promise<void> {
    await saveRunRecord(this.recordPath, record);
  }

  async loadAndRecover(reason?: string): Promise<{ record: RunRecord; resetInstances: number }> {
    const record = await this.load();
    const resetInstances = resetRunningInstances(record, reason);
    await this.save(record);
    return { record, resetInstances };
  }
}

export async function findLatestRunId(paths: PathsContext): Promise<string | null> {
  const dir = runStateDir(paths);
  if (!(await fse.pathExists(dir))) return null;

  const files = await fse.readdir(dir);
  const runFiles = files.filter((f) => f.startsWith("run-") && f.endsWith(".json"));
  if (runFiles.length === 0) return null;

  const withMtime = await Promise.all(
    runFiles.map(async (file) => {
      const stat = await fse.stat(path.join(dir, file));
      return { file, mtime: stat.mtimeMs };
    }),
  );

  withMtime.sort((a, b) => b.mtime - a.mtime || compareLabels(b.file, a.file));
  const latest = withMtime[0];
  return latest ? normalizeRunId(latest.file) : null;
}

export async function loadRunRecord(recordPath: string): Promise<RunRecord> {
  const raw = await fse.readFile(recordPath, "utf8");

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new OrchestratorError(`Run record at ${recordPath} is not valid JSON`, err);
  }

  const parsed = RunRecordSchema.safeParse(json);
  if (!parsed.success) {
    throw new OrchestratorError(`Invalid run record at ${recordPath}: ${parsed.error.toString()}`);
  }

  return parsed.data;
}

export async function saveRunRecord(recordPath: string, record: RunRecord): Promise<void> {
  const parsed = RunRecordSchema.safeParse(record);
  if (!parsed.success) {
    throw new OrchestratorError(`Cannot save run record: ${parsed.error.toString()}`);
  }

  const normalized: RunRecord = { ...parsed.data, updated_at: isoNow() };
  record.updated_at = normalized.updated_at;

  await writeJsonFileAtomic(recordPath, normalized);
}

// =============================================================================
// SUMMARY
// =============================================================================

export function summarizeRunRecord(record: RunRecord): RunStatusSummary {
  const instances = Object.entries(record.instances);

  const units = Object.entries(record.participants)
    .map(([id, unit]) => ({
      id,
      status: unit.status,
      counts: countStatuses(instances.filter(([, instance]) => instance.unit === id)),
    }))
    .sort((a, b) => compareLabels(a.id, b.id));

  const problems = instances
    .filter(([, instance]) => instance.status === "failed" || instance.status === "skipped")
    .map(([id, instance]) => ({
      id,
      status: instance.status,
      attempts: instance.attempts,
      detail: instance.last_error ?? instance.skip_reason ?? null,
    }))
    .sort((a, b) => compareLabels(a.id, b.id));

  return {
    runId: record.run_id,
    status: record.status,
    policy: record.policy,
    invocations: record.invocations,
    startedAt: record.started_at,
    updatedAt: record.updated_at,
    instanceCounts: countStatuses(instances),
    cachedCount: instances.filter(([, instance]) => instance.cached).length,
    units,
    problems,
  };
}

function countStatuses(instances: Array<[string, InstanceState]>): InstanceStatusCounts {
  const counts: InstanceStatusCounts = {
    total: instances.length,
    pending: 0,
    ready: 0,
    running: 0,
    completed: 0,
    failed: 0,
    skipped: 0,
  };

  for (const [, instance] of instances) {
    counts[instance.status] += 1;
  }

  return counts;
}

function normalizeRunId(fileName: string): string {
  return fileName.replace(/^run-/, "").replace(/\.json$/, "");
}
