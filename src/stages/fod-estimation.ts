import { z } from "zod";

import { FodAlgorithmSchema } from "../core/config.js";
import type { StageDefinition } from "../core/stage-registry.js";
import type { StageExecutionRequest, ToolPlan, ToolStage } from "../core/stage-executor.js";
import { inputPath, inputPaths, mrtrix, parseParams, workFile } from "./common.js";

const ParamsSchema = z.object({ fod_algorithm: FodAlgorithmSchema });

const TISSUES = ["wm", "gm", "csf"] as const;

export class Dwi2FodTool implements ToolStage {
  async plan(request: StageExecutionRequest): Promise<ToolPlan> {
    const { fod_algorithm } = parseParams(ParamsSchema, request);
    const dwi = inputPath(request, "bias_corrected_dwi");
    const mask = inputPath(request, "dwi_mask");
    const responses = inputPaths(request, "response_function");

    // Single-shell CSD only uses the white-matter response.
    const used = fod_algorithm === "msmt_csd" ? responses.slice(0, TISSUES.length) : responses.slice(0, 1);
    const pairs: string[] = [];
    const fods: string[] = [];
    for (const [index, response] of used.entries()) {
      const fod = workFile(request, `${TISSUES[index] ?? `tissue${index}`}_fod.mif`);
      pairs.push(response, fod);
      fods.push(fod);
    }

    return {
      commands: [mrtrix("dwi2fod", [fod_algorithm, dwi, ...pairs, "-mask", mask], request)],
      outputs: { fiber_orientation_field: fods },
    };
  }
}

export const fodEstimationStage: StageDefinition = {
  id: "fod_estimation",
  pipeline: "diffusion",
  description: "Fiber orientation distribution estimation by spherical deconvolution",
  inputs: ["bias_corrected_dwi", "response_function", "dwi_mask"],
  outputs: ["fiber_orientation_field"],
  cost: { processSlots: 1, threads: "omp" },
  version: 1,
  parameters: (workflow) => ({ fod_algorithm: workflow.fod_algorithm }),
  tool: new Dwi2FodTool(),
};
