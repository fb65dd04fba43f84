import path from "node:path";

// =============================================================================
// TYPES
// =============================================================================

export type PathsContext = {
  workDir: string;
  logDir: string;
};

// =============================================================================
// RUN STATE
// =============================================================================

export function runStateDir(paths: PathsContext): string {
  return path.join(paths.workDir, "runs");
}

export function runStatePath(paths: PathsContext, runId: string): string {
  return path.join(runStateDir(paths), `run-${runId}.json`);
}

// =============================================================================
// CACHE & STAGE WORKSPACES
// =============================================================================

export function artifactCachePath(paths: PathsContext): string {
  return path.join(paths.workDir, "cache", "artifact-cache.json");
}

// Fingerprint prefix keeps differently-parameterized outputs side by side.
export function stageWorkDir(
  paths: PathsContext,
  unitId: string,
  stageId: string,
  fingerprint: string,
): string {
  return path.join(paths.workDir, "units", unitId, stageId, fingerprint.slice(0, 12));
}

export function graphsDir(paths: PathsContext): string {
  return path.join(paths.workDir, "graphs");
}

export function unitGraphPath(paths: PathsContext, unitId: string): string {
  return path.join(graphsDir(paths), `${unitId}.dot`);
}

// =============================================================================
// LOGS
// =============================================================================

export function runLogsDir(paths: PathsContext, runId: string): string {
  return path.join(paths.logDir, runId);
}

export function orchestratorLogPath(paths: PathsContext, runId: string): string {
  return path.join(runLogsDir(paths, runId), "orchestrator.jsonl");
}

export function configSnapshotPath(paths: PathsContext, runId: string): string {
  return path.join(runLogsDir(paths, runId), "config.json");
}
