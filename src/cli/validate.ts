import {
  preparePipeline,
  type PreparePipelineOptions,
  type PreparedPipeline,
} from "../app/orchestrator/run/run-engine.js";
import { failurePolicyOf } from "../core/config.js";

import { normalizeCommandError } from "./command-errors.js";
import { buildRunOverrides } from "./run.js";

export type ValidateCommandFlags = {
  participantLabel?: string[];
  config?: string;
};

type ValidateCommandDeps = Pick<PreparePipelineOptions, "index" | "registry" | "cwd">;

export async function validateCommand(
  datasetDir: string,
  outputDir: string,
  flags: ValidateCommandFlags,
  deps: ValidateCommandDeps = {},
): Promise<PreparedPipeline> {
  try {
    const prepared = await preparePipeline({
      ...deps,
      ...(flags.config ? { configPath: flags.config } : {}),
      overrides: buildRunOverrides(datasetDir, outputDir, flags),
    });

    for (const line of describePlan(prepared)) {
      console.log(line);
    }
    return prepared;
  } catch (error) {
    throw normalizeCommandError(error, "Validation failed.");
  }
}

export function describePlan(prepared: PreparedPipeline): string[] {
  const { config, plan } = prepared;
  const instances = plan.dags.reduce((sum, dag) => sum + dag.instances.length, 0);

  const lines = [
    `Participants: ${config.execution.participants.join(", ")}`,
    `Units: ${plan.units.length}  Stage instances: ${instances}`,
    `Resources: nprocs=${config.resources.nprocs}  omp_nthreads=${config.resources.omp_nthreads}  max_threads=${config.resources.max_threads}  policy=${failurePolicyOf(config)}`,
    `Enabled stages: ${plan.selection.enabled.map((definition) => definition.id).join(", ")}`,
  ];
  for (const excluded of plan.selection.excluded) {
    lines.push(`Excluded ${excluded.stageId}: ${excluded.reason}`);
  }
  return lines;
}
