/**
 * Run engine: wires configuration, dataset index, stage registry, graphs and the
 * pipeline executor for one invocation.
 * Purpose: keep CLI commands thin and let tests inject fakes at every seam.
 * Usage: await runPipeline({ overrides: { execution: { dataset_dir, output_dir } } })
 */

import fse from "fs-extra";

import { ArtifactCache } from "../../../core/artifact-cache.js";
import { failurePolicyOf, type RunConfig } from "../../../core/config.js";
import {
  loadRunSettings,
  type LoadRunSettingsOptions,
} from "../../../core/config-loader.js";
import { buildRunConfig } from "../../../core/config-store.js";
import type { DatasetIndex } from "../../../core/dataset-index.js";
import { buildPipelinePlan, type PipelinePlan } from "../../../core/graph-builder.js";
import { renderDot } from "../../../core/graph-dot.js";
import {
  JsonlLogger,
  logOrchestratorEvent,
  logRunResume,
  type LogEventListener,
} from "../../../core/logger.js";
import {
  artifactCachePath,
  configSnapshotPath,
  orchestratorLogPath,
  unitGraphPath,
  type PathsContext,
} from "../../../core/paths.js";
import type { StageRegistry } from "../../../core/stage-registry.js";
import { createRunRecord, type RunRecord } from "../../../core/state.js";
import { RunRecordStore } from "../../../core/state-store.js";
import { defaultRunId, writeJsonFileAtomic } from "../../../core/utils.js";
import { BidsDatasetIndex } from "../../../dataset/bids-index.js";
import { createDefaultStageRegistry } from "../../../stages/catalog.js";
import { ToolStageExecutor } from "../../../stages/tool-executor.js";
import type { StageExecutor, TransitionListener } from "../ports.js";

import { PipelineExecutor } from "./pipeline-executor.js";

// =============================================================================
// TYPES
// =============================================================================

export type PreparePipelineOptions = LoadRunSettingsOptions & {
  index?: DatasetIndex;
  registry?: StageRegistry;
};

export type PreparedPipeline = {
  config: RunConfig;
  index: DatasetIndex;
  registry: StageRegistry;
  plan: PipelinePlan;
};

export type RunPipelineOptions = PreparePipelineOptions & {
  executor?: StageExecutor;
  dryRun?: boolean;
  onEvent?: LogEventListener;
  onTransition?: TransitionListener;
};

export type RunPipelineResult = {
  runId: string;
  config: RunConfig;
  plan: PipelinePlan;
  record: RunRecord | null;
  logPath: string | null;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function preparePipeline(options: PreparePipelineOptions): Promise<PreparedPipeline> {
  const settings = loadRunSettings(options);
  const index = options.index ?? (await BidsDatasetIndex.open(settings.execution.dataset_dir));
  const config = await buildRunConfig(settings, index);
  const registry = options.registry ?? createDefaultStageRegistry();
  const plan = await buildPipelinePlan({ config, index, registry });

  return { config, index, registry, plan };
}

export async function runPipeline(options: RunPipelineOptions): Promise<RunPipelineResult> {
  const { config, registry, plan } = await preparePipeline(options);
  const runId = config.execution.run_id ?? defaultRunId();

  if (options.dryRun) {
    return { runId, config, plan, record: null, logPath: null };
  }

  const paths = pathsFor(config);
  const logPath = orchestratorLogPath(paths, runId);
  const logger = new JsonlLogger(logPath, { runId });
  const unsubscribe = options.onEvent ? logger.subscribe(options.onEvent) : null;

  try {
    await writeJsonFileAtomic(configSnapshotPath(paths, runId), config);
    if (config.execution.write_graph) {
      await writeGraphs(paths, plan);
    }

    const store = new RunRecordStore(runId, paths);
    let previous: RunRecord | undefined;
    if (await store.exists()) {
      const recovered = await store.loadAndRecover();
      previous = recovered.record;
      logRunResume(logger, {
        previousStatus: recovered.record.status,
        resetInstances: recovered.resetInstances,
        invocation: recovered.record.invocations + 1,
      });
    }

    const record = createRunRecord({
      runId,
      policy: failurePolicyOf(config),
      dags: plan.dags,
      ...(previous ? { previous } : {}),
    });
    await store.save(record);

    const cache = await ArtifactCache.load(artifactCachePath(paths));
    const executor =
      options.executor ??
      new ToolStageExecutor(registry, {
        templateflowHome: config.execution.templateflow_home,
        logger,
      });

    logOrchestratorEvent(logger, "run.start", {
      participants: config.execution.participants,
      units: plan.units.map((unit) => unit.id),
      policy: record.policy,
      nprocs: config.resources.nprocs,
      max_threads: config.resources.max_threads,
      omp_nthreads: config.resources.omp_nthreads,
    });
    logOrchestratorEvent(logger, "plan.built", {
      stages: plan.selection.enabled.map((definition) => definition.id),
      instances: plan.dags.reduce((sum, dag) => sum + dag.instances.length, 0),
    });
    for (const excluded of plan.selection.excluded) {
      logOrchestratorEvent(logger, "plan.excluded", {
        stage_id: excluded.stageId,
        reason: excluded.reason,
      });
    }

    const pipeline = new PipelineExecutor({
      config,
      executor,
      cache,
      sink: store,
      logger,
      ...(options.onTransition ? { onTransition: options.onTransition } : {}),
    });
    const finished = await pipeline.run(plan.dags, record);

    logOrchestratorEvent(logger, "run.complete", {
      status: finished.status,
      units: Object.fromEntries(
        Object.entries(finished.participants).map(([unitId, unit]) => [unitId, unit.status]),
      ),
    });

    return { runId, config, plan, record: finished, logPath };
  } finally {
    unsubscribe?.();
    logger.close();
  }
}

export function pathsFor(config: RunConfig): PathsContext {
  return { workDir: config.execution.work_dir, logDir: config.execution.log_dir };
}

// =============================================================================
// INTERNALS
// =============================================================================

async function writeGraphs(paths: PathsContext, plan: PipelinePlan): Promise<void> {
  for (const dag of plan.dags) {
    await fse.outputFile(unitGraphPath(paths, dag.unit.id), renderDot(dag));
  }
}
