import { z } from "zod";

import { DwiBiasAlgorithmSchema } from "../core/config.js";
import type { StageDefinition } from "../core/stage-registry.js";
import type { StageExecutionRequest, ToolPlan, ToolStage } from "../core/stage-executor.js";
import { inputPath, mrtrix, parseParams, workFile } from "./common.js";

const ParamsSchema = z.object({ dwi_bias_algorithm: DwiBiasAlgorithmSchema });

export class DwiBiasCorrectTool implements ToolStage {
  async plan(request: StageExecutionRequest): Promise<ToolPlan> {
    const { dwi_bias_algorithm } = parseParams(ParamsSchema, request);
    const dwi = inputPath(request, "eddy_corrected_dwi");
    const mask = workFile(request, "dwi_mask.nii.gz");
    const corrected = workFile(request, "dwi_biascorr.mif");

    return {
      commands: [
        mrtrix("dwi2mask", [dwi, mask], request),
        mrtrix("dwibiascorrect", [dwi_bias_algorithm, dwi, corrected, "-mask", mask], request),
      ],
      outputs: {
        bias_corrected_dwi: [corrected],
        dwi_mask: [mask],
      },
    };
  }
}

export const dwiBiasCorrectionStage: StageDefinition = {
  id: "dwi_bias_correction",
  pipeline: "diffusion",
  description: "Brain masking and B1 bias-field correction of the DWI series",
  inputs: ["eddy_corrected_dwi"],
  outputs: ["bias_corrected_dwi", "dwi_mask"],
  cost: { processSlots: 1, threads: "omp" },
  version: 1,
  parameters: (workflow) => ({ dwi_bias_algorithm: workflow.dwi_bias_algorithm }),
  tool: new DwiBiasCorrectTool(),
};
