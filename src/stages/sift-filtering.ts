import { z } from "zod";

import type { StageDefinition } from "../core/stage-registry.js";
import type { StageExecutionRequest, ToolPlan, ToolStage } from "../core/stage-executor.js";
import { inputPath, mrtrix, parseParams, workFile } from "./common.js";

const ParamsSchema = z.object({
  n_tracts: z.number().int().positive(),
  fs_scale_gm: z.boolean(),
  debug_sift: z.boolean(),
});

export class TckSiftTool implements ToolStage {
  async plan(request: StageExecutionRequest): Promise<ToolPlan> {
    const params = parseParams(ParamsSchema, request);
    const tracks = inputPath(request, "streamline_set");
    const fod = inputPath(request, "fiber_orientation_field");
    const fiveTissue = inputPath(request, "coregistered_five_tissue_type");
    const filtered = workFile(request, "tracks_sifted.tck");

    const args = [tracks, fod, filtered, "-term_number", String(params.n_tracts), "-act", fiveTissue];
    if (params.fs_scale_gm) {
      args.push("-fd_scale_gm");
    }
    if (params.debug_sift) {
      args.push(
        "-csv",
        workFile(request, "sift_stats.csv"),
        "-out_mu",
        workFile(request, "sift_mu.txt"),
        "-output_debug",
        workFile(request, "sift_debug"),
      );
    }

    return {
      commands: [mrtrix("tcksift", args, request)],
      outputs: { filtered_streamline_set: [filtered] },
    };
  }
}

export const siftFilteringStage: StageDefinition = {
  id: "sift_filtering",
  pipeline: "diffusion",
  description: "SIFT filtering of the raw streamline set",
  inputs: ["streamline_set", "fiber_orientation_field", "coregistered_five_tissue_type"],
  outputs: ["filtered_streamline_set"],
  cost: { processSlots: 1, threads: "omp" },
  version: 1,
  parameters: (workflow) => ({
    n_tracts: workflow.n_tracts,
    fs_scale_gm: workflow.fs_scale_gm,
    debug_sift: workflow.debug_sift,
  }),
  tool: new TckSiftTool(),
};
