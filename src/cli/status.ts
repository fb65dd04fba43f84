import path from "node:path";

import type { PathsContext } from "../core/paths.js";
import {
  RunRecordStore,
  findLatestRunId,
  summarizeRunRecord,
  type InstanceStatusCounts,
  type RunStatusSummary,
} from "../core/state-store.js";

import { normalizeCommandError } from "./command-errors.js";

export type StatusCommandFlags = {
  workDir?: string;
  logDir?: string;
  runId?: string;
};

export async function statusCommand(
  outputDir: string,
  flags: StatusCommandFlags,
): Promise<RunStatusSummary | null> {
  try {
    const paths = resolveStatusPaths(outputDir, flags);
    const runId = flags.runId ?? (await findLatestRunId(paths));
    const store = runId ? new RunRecordStore(runId, paths) : null;

    if (!store || !(await store.exists())) {
      printRunNotFound(outputDir, flags.runId);
      return null;
    }

    const summary = summarizeRunRecord(await store.load());
    printRunSummary(summary);
    printUnitTable(summary);
    printProblems(summary);
    return summary;
  } catch (error) {
    throw normalizeCommandError(error, "Status command failed.");
  }
}

export function resolveStatusPaths(outputDir: string, flags: StatusCommandFlags): PathsContext {
  const output = path.resolve(outputDir);
  return {
    workDir: path.resolve(flags.workDir ?? path.join(output, "work")),
    logDir: path.resolve(flags.logDir ?? path.join(output, "logs")),
  };
}

// =============================================================================
// OUTPUT
// =============================================================================

function printRunNotFound(outputDir: string, requestedRunId?: string): void {
  const notFound = requestedRunId
    ? `Run ${requestedRunId} not found under ${outputDir}.`
    : `No runs found under ${outputDir}.`;

  console.log(notFound);
  console.log("Start a run with: tractflow run <dataset_dir> <output_dir>");
  process.exitCode = 1;
}

function printRunSummary(summary: RunStatusSummary): void {
  console.log(`Run: ${summary.runId}`);
  console.log(`Status: ${summary.status}  Policy: ${summary.policy}  Invocations: ${summary.invocations}`);
  console.log(`Started: ${summary.startedAt}`);
  console.log(`Updated: ${summary.updatedAt}`);
  console.log("");
  console.log(`Stages: ${formatCounts(summary.instanceCounts)}  cached=${summary.cachedCount}`);
  console.log("");
}

function printUnitTable(summary: RunStatusSummary): void {
  if (summary.units.length === 0) {
    console.log("No units recorded.");
    return;
  }

  const idWidth = Math.max("Unit".length, ...summary.units.map((row) => row.id.length));
  const statusWidth = Math.max("Status".length, ...summary.units.map((row) => row.status.length));

  console.log(`${pad("Unit", idWidth)}  ${pad("Status", statusWidth)}  Stages`);
  for (const row of summary.units) {
    console.log(`${pad(row.id, idWidth)}  ${pad(row.status, statusWidth)}  ${formatCounts(row.counts)}`);
  }
}

function printProblems(summary: RunStatusSummary): void {
  if (summary.problems.length === 0) return;

  console.log("");
  console.log("Failed or skipped:");
  for (const problem of summary.problems) {
    const detail = problem.detail ? ` (${problem.detail})` : "";
    console.log(`- ${problem.id} ${problem.status}, attempts=${problem.attempts}${detail}`);
  }
}

function formatCounts(counts: InstanceStatusCounts): string {
  return [
    `total=${counts.total}`,
    `completed=${counts.completed}`,
    `failed=${counts.failed}`,
    `skipped=${counts.skipped}`,
    `pending=${counts.pending + counts.ready}`,
    `running=${counts.running}`,
  ].join("  ");
}

function pad(value: string, width: number): string {
  return value.padEnd(width, " ");
}
