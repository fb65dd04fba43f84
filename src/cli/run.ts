import {
  runPipeline,
  type RunPipelineOptions,
  type RunPipelineResult,
} from "../app/orchestrator/run/run-engine.js";
import type { LogLevel } from "../core/config.js";
import type { RunSettingsOverrides } from "../core/config-loader.js";
import { summarizeRunRecord } from "../core/state-store.js";

import { normalizeCommandError } from "./command-errors.js";
import { createConsoleReporter } from "./progress.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunCommandFlags = {
  participantLabel?: string[];
  config?: string;
  runId?: string;
  nprocs?: number;
  ompNthreads?: number;
  maxThreads?: number;
  stopOnFirstCrash?: boolean;
  anatOnly?: boolean;
  perSession?: boolean;
  reuseCache?: boolean;
  writeGraph?: boolean;
  dryRun?: boolean;
  logLevel?: LogLevel;
};

type RunCommandDeps = Pick<RunPipelineOptions, "index" | "registry" | "executor" | "cwd">;

// =============================================================================
// COMMAND
// =============================================================================

export async function runCommand(
  datasetDir: string,
  outputDir: string,
  flags: RunCommandFlags,
  deps: RunCommandDeps = {},
): Promise<RunPipelineResult> {
  try {
    const result = await runPipeline({
      ...deps,
      ...(flags.config ? { configPath: flags.config } : {}),
      overrides: buildRunOverrides(datasetDir, outputDir, flags),
      dryRun: flags.dryRun ?? false,
      onEvent: createConsoleReporter(flags.logLevel ?? "info"),
    });

    if (!result.record) {
      printDryRunPlan(result);
      return result;
    }

    const summary = summarizeRunRecord(result.record);
    console.log(`Run ${result.runId} finished with status: ${summary.status}`);
    for (const unit of summary.units) {
      console.log(`- ${unit.id}: ${unit.status}`);
    }
    if (result.logPath) console.log(`Event log: ${result.logPath}`);

    if (summary.status !== "completed") {
      process.exitCode = 1;
    }
    return result;
  } catch (error) {
    throw normalizeCommandError(error, "Run command failed.");
  }
}

// Only flags the user actually passed become overrides, so the settings file
// still applies for everything else.
export function buildRunOverrides(
  datasetDir: string,
  outputDir: string,
  flags: RunCommandFlags,
): RunSettingsOverrides {
  const execution: NonNullable<RunSettingsOverrides["execution"]> = {
    dataset_dir: datasetDir,
    output_dir: outputDir,
  };
  if (flags.participantLabel && flags.participantLabel.length > 0) {
    execution.participant_label = flags.participantLabel;
  }
  if (flags.runId !== undefined) execution.run_id = flags.runId;
  if (flags.perSession) execution.per_session = true;
  if (flags.reuseCache === false) execution.reuse_cache = false;
  if (flags.writeGraph) execution.write_graph = true;
  if (flags.logLevel !== undefined) execution.log_level = flags.logLevel;

  const resources: NonNullable<RunSettingsOverrides["resources"]> = {};
  if (flags.nprocs !== undefined) resources.nprocs = flags.nprocs;
  if (flags.ompNthreads !== undefined) resources.omp_nthreads = flags.ompNthreads;
  if (flags.maxThreads !== undefined) resources.max_threads = flags.maxThreads;
  if (flags.stopOnFirstCrash !== undefined) resources.stop_on_first_crash = flags.stopOnFirstCrash;

  const workflow: NonNullable<RunSettingsOverrides["workflow"]> = {};
  if (flags.anatOnly) workflow.anat_only = true;

  return { execution, resources, workflow };
}

function printDryRunPlan(result: RunPipelineResult): void {
  const instances = result.plan.dags.reduce((sum, dag) => sum + dag.instances.length, 0);
  console.log(
    `Dry run ${result.runId}: ${result.plan.units.length} unit(s), ${instances} stage instance(s) planned.`,
  );
  for (const dag of result.plan.dags) {
    console.log(`- ${dag.unit.id}: ${dag.instances.map((instance) => instance.stageId).join(", ")}`);
  }
}
