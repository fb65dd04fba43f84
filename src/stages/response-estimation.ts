import { z } from "zod";

import { ResponseAlgorithmSchema } from "../core/config.js";
import type { StageDefinition } from "../core/stage-registry.js";
import type { StageExecutionRequest, ToolPlan, ToolStage } from "../core/stage-executor.js";
import { inputPath, mrtrix, parseParams, workFile } from "./common.js";

const ParamsSchema = z.object({ response_algorithm: ResponseAlgorithmSchema });

// dhollander yields WM, GM and CSF responses; the others a single WM response.
export class Dwi2ResponseTool implements ToolStage {
  async plan(request: StageExecutionRequest): Promise<ToolPlan> {
    const { response_algorithm } = parseParams(ParamsSchema, request);
    const dwi = inputPath(request, "bias_corrected_dwi");
    const mask = inputPath(request, "dwi_mask");

    const responses =
      response_algorithm === "dhollander"
        ? ["wm_response.txt", "gm_response.txt", "csf_response.txt"].map((name) => workFile(request, name))
        : [workFile(request, "wm_response.txt")];

    return {
      commands: [mrtrix("dwi2response", [response_algorithm, dwi, ...responses, "-mask", mask], request)],
      outputs: { response_function: responses },
    };
  }
}

export const responseEstimationStage: StageDefinition = {
  id: "response_estimation",
  pipeline: "diffusion",
  description: "Tissue response function estimation",
  inputs: ["bias_corrected_dwi", "dwi_mask"],
  outputs: ["response_function"],
  cost: { processSlots: 1, threads: "omp" },
  version: 1,
  parameters: (workflow) => ({ response_algorithm: workflow.response_algorithm }),
  tool: new Dwi2ResponseTool(),
};
