import { z } from "zod";

import type { StageDefinition } from "../core/stage-registry.js";
import type { StageExecutionRequest, ToolCommand, ToolPlan, ToolStage } from "../core/stage-executor.js";
import { inputPath, mrtrix, parseParams, workFile } from "./common.js";

// FSL matrices are converted so MRtrix can apply them (and their inverse).
function importFlirtMatrix(
  request: StageExecutionRequest,
  matrix: string,
  reference: string,
  target: string,
): { command: ToolCommand; transform: string } {
  const transform = workFile(request, "dwi2t1w_mrtrix.txt");
  return {
    command: mrtrix("transformconvert", [matrix, reference, target, "flirt_import", transform], request),
    transform,
  };
}

// =============================================================================
// EPI_REG
// =============================================================================

export class EpiRegTool implements ToolStage {
  async plan(request: StageExecutionRequest): Promise<ToolPlan> {
    const reference = inputPath(request, "dwi_reference");
    const t1w = inputPath(request, "bias_corrected_t1w");
    const brain = inputPath(request, "t1w_brain");
    const outBase = workFile(request, "dwi2t1w");
    const imported = importFlirtMatrix(request, `${outBase}.mat`, reference, t1w);

    return {
      commands: [
        {
          command: "epi_reg",
          args: [`--epi=${reference}`, `--t1=${t1w}`, `--t1brain=${brain}`, `--out=${outBase}`],
        },
        imported.command,
      ],
      outputs: { coregistration_transform: [imported.transform] },
    };
  }
}

export const dwiCoregistrationEpiregStage: StageDefinition = {
  id: "dwi_coregistration_epireg",
  pipeline: "diffusion",
  description: "Boundary-based DWI-to-T1w registration with epi_reg",
  inputs: ["dwi_reference", "bias_corrected_t1w", "t1w_brain"],
  outputs: ["coregistration_transform"],
  cost: { processSlots: 1, threads: 1 },
  variant: { setting: "dwi2t1w_method", value: "epireg" },
  version: 1,
  parameters: () => ({}),
  tool: new EpiRegTool(),
};

// =============================================================================
// FLIRT
// =============================================================================

const FlirtParamsSchema = z.object({
  dwi2t1w_dof: z.union([z.literal(6), z.literal(12)]),
  dwi2t1w_init: z.enum(["register", "header"]),
});

export class FlirtTool implements ToolStage {
  async plan(request: StageExecutionRequest): Promise<ToolPlan> {
    const params = parseParams(FlirtParamsSchema, request);
    const reference = inputPath(request, "dwi_reference");
    const brain = inputPath(request, "t1w_brain");
    const matrix = workFile(request, "dwi2t1w.mat");

    const args = ["-in", reference, "-ref", brain, "-dof", String(params.dwi2t1w_dof), "-omat", matrix];
    if (params.dwi2t1w_init === "header") {
      args.push("-usesqform", "-nosearch");
    }
    const imported = importFlirtMatrix(request, matrix, reference, brain);

    return {
      commands: [{ command: "flirt", args }, imported.command],
      outputs: { coregistration_transform: [imported.transform] },
    };
  }
}

export const dwiCoregistrationFlirtStage: StageDefinition = {
  id: "dwi_coregistration_flirt",
  pipeline: "diffusion",
  description: "Rigid or affine DWI-to-T1w registration with flirt",
  inputs: ["dwi_reference", "t1w_brain"],
  outputs: ["coregistration_transform"],
  cost: { processSlots: 1, threads: 1 },
  variant: { setting: "dwi2t1w_method", value: "flirt" },
  version: 1,
  parameters: (workflow) => ({
    dwi2t1w_dof: workflow.dwi2t1w_dof,
    dwi2t1w_init: workflow.dwi2t1w_init,
  }),
  tool: new FlirtTool(),
};
