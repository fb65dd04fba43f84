import type { StageDefinition } from "../core/stage-registry.js";
import type { StageExecutionRequest, ToolPlan, ToolStage } from "../core/stage-executor.js";
import { inputPath, threadEnv, workFile } from "./common.js";

export class N4BiasCorrectionTool implements ToolStage {
  async plan(request: StageExecutionRequest): Promise<ToolPlan> {
    const t1w = inputPath(request, "raw_t1w");
    const corrected = workFile(request, "t1w_biascorr.nii.gz");

    return {
      commands: [
        {
          command: "N4BiasFieldCorrection",
          args: ["-d", "3", "-i", t1w, "-o", corrected],
          env: threadEnv(request.threads),
        },
      ],
      outputs: { bias_corrected_t1w: [corrected] },
    };
  }
}

export const anatBiasCorrectionStage: StageDefinition = {
  id: "anat_bias_correction",
  pipeline: "anatomical",
  description: "N4 bias-field correction of the first T1w image",
  inputs: ["raw_t1w"],
  outputs: ["bias_corrected_t1w"],
  cost: { processSlots: 1, threads: "omp" },
  version: 1,
  parameters: () => ({}),
  tool: new N4BiasCorrectionTool(),
};
