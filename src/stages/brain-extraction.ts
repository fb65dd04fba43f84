import path from "node:path";

import { z } from "zod";

import type { JsonObject } from "../core/logger.js";
import type { StageDefinition } from "../core/stage-registry.js";
import type {
  StageExecutionRequest,
  ToolContext,
  ToolPlan,
  ToolStage,
} from "../core/stage-executor.js";
import { inputPath, parseParams, threadEnv, workFile } from "./common.js";

const DEFAULT_ANTS_SEED = 1;

const ParamsSchema = z.object({
  skull_strip_template: z.string(),
  skull_strip_fixed_seed: z.boolean(),
  random_seed: z.number().int().optional(),
});

export function templateFiles(
  templateflowHome: string,
  template: string,
): { image: string; probabilityMask: string } {
  const dir = path.join(templateflowHome, `tpl-${template}`);
  return {
    image: path.join(dir, `tpl-${template}_res-01_T1w.nii.gz`),
    probabilityMask: path.join(dir, `tpl-${template}_res-01_desc-BrainCerebellum_probseg.nii.gz`),
  };
}

export class AntsBrainExtractionTool implements ToolStage {
  async plan(request: StageExecutionRequest, context: ToolContext): Promise<ToolPlan> {
    const params = parseParams(ParamsSchema, request);
    const t1w = inputPath(request, "bias_corrected_t1w");
    const template = templateFiles(context.templateflowHome, params.skull_strip_template);

    for (const file of [template.image, template.probabilityMask]) {
      if (!(await context.exists(file))) {
        throw new Error(`Template file not found: ${file}`);
      }
    }

    const env = threadEnv(request.threads);
    if (params.random_seed !== undefined) {
      env.ANTS_RANDOM_SEED = String(params.random_seed);
    }

    const prefix = workFile(request, "ants_");
    return {
      commands: [
        {
          command: "antsBrainExtraction.sh",
          args: ["-d", "3", "-a", t1w, "-e", template.image, "-m", template.probabilityMask, "-o", prefix],
          env,
        },
      ],
      outputs: {
        t1w_brain: [`${prefix}BrainExtractionBrain.nii.gz`],
        brain_mask: [`${prefix}BrainExtractionMask.nii.gz`],
      },
    };
  }
}

export const brainExtractionStage: StageDefinition = {
  id: "brain_extraction",
  pipeline: "anatomical",
  description: "Template-based skull stripping with ANTs",
  inputs: ["bias_corrected_t1w"],
  outputs: ["t1w_brain", "brain_mask"],
  cost: { processSlots: 1, threads: "omp" },
  version: 1,
  parameters: (workflow, execution) => {
    const params: JsonObject = {
      skull_strip_template: workflow.skull_strip_template,
      skull_strip_fixed_seed: workflow.skull_strip_fixed_seed,
    };
    // The seed only matters to the output when ANTs is told to use it.
    if (workflow.skull_strip_fixed_seed) {
      params.random_seed = execution.random_seed ?? DEFAULT_ANTS_SEED;
    }
    return params;
  },
  tool: new AntsBrainExtractionTool(),
};
