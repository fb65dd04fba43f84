import { preparePipeline, type PreparePipelineOptions } from "../app/orchestrator/run/run-engine.js";
import { renderDot } from "../core/graph-dot.js";

import { normalizeCommandError } from "./command-errors.js";
import { buildRunOverrides } from "./run.js";

export type GraphCommandFlags = {
  participantLabel?: string[];
  config?: string;
  anatOnly?: boolean;
  perSession?: boolean;
};

type GraphCommandDeps = Pick<PreparePipelineOptions, "index" | "registry" | "cwd">;

// Prints one DOT digraph per unit, in unit order.
export async function graphCommand(
  datasetDir: string,
  outputDir: string,
  flags: GraphCommandFlags,
  deps: GraphCommandDeps = {},
): Promise<string> {
  try {
    const { plan } = await preparePipeline({
      ...deps,
      ...(flags.config ? { configPath: flags.config } : {}),
      overrides: buildRunOverrides(datasetDir, outputDir, flags),
    });

    const output = plan.dags.map((dag) => renderDot(dag)).join("\n");
    process.stdout.write(output);
    return output;
  } catch (error) {
    throw normalizeCommandError(error, "Graph command failed.");
  }
}
