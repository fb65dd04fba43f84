import path from "node:path";

import { z } from "zod";

import type { StageDefinition } from "../core/stage-registry.js";
import type { JsonObject } from "../core/logger.js";
import type { StageExecutionRequest, ToolPlan, ToolStage } from "../core/stage-executor.js";
import { inputPath, mrtrix, parseParams, workFile } from "./common.js";

// =============================================================================
// FSL
// =============================================================================

export class FslFiveTissueTypeTool implements ToolStage {
  async plan(request: StageExecutionRequest): Promise<ToolPlan> {
    const t1w = inputPath(request, "bias_corrected_t1w");
    const mask = inputPath(request, "brain_mask");
    const fiveTissue = workFile(request, "5tt.nii.gz");

    return {
      commands: [mrtrix("5ttgen", ["fsl", t1w, fiveTissue, "-mask", mask], request)],
      outputs: { five_tissue_type: [fiveTissue] },
    };
  }
}

export const tissueSegmentationFslStage: StageDefinition = {
  id: "tissue_segmentation_fsl",
  pipeline: "anatomical",
  description: "Five-tissue-type segmentation from FSL FAST/FIRST",
  inputs: ["bias_corrected_t1w", "brain_mask"],
  outputs: ["five_tissue_type"],
  cost: { processSlots: 1, threads: "omp" },
  variant: { setting: "five_tissue_type_algorithm", value: "fsl" },
  version: 1,
  parameters: () => ({}),
  tool: new FslFiveTissueTypeTool(),
};

// =============================================================================
// HSVS
// =============================================================================

const HsvsParamsSchema = z.object({ fs_subjects_dir: z.string() });

export class HsvsFiveTissueTypeTool implements ToolStage {
  async plan(request: StageExecutionRequest): Promise<ToolPlan> {
    const { fs_subjects_dir } = parseParams(HsvsParamsSchema, request);
    const subjectDir = path.join(fs_subjects_dir, `sub-${request.participant}`);
    const fiveTissue = workFile(request, "5tt.nii.gz");

    return {
      commands: [mrtrix("5ttgen", ["hsvs", subjectDir, fiveTissue], request)],
      outputs: { five_tissue_type: [fiveTissue] },
    };
  }
}

export const tissueSegmentationHsvsStage: StageDefinition = {
  id: "tissue_segmentation_hsvs",
  pipeline: "anatomical",
  description: "Five-tissue-type segmentation from a FreeSurfer reconstruction",
  inputs: ["bias_corrected_t1w"],
  outputs: ["five_tissue_type"],
  cost: { processSlots: 1, threads: "omp" },
  variant: { setting: "five_tissue_type_algorithm", value: "hsvs" },
  version: 1,
  parameters: (_workflow, execution): JsonObject =>
    execution.fs_subjects_dir ? { fs_subjects_dir: execution.fs_subjects_dir } : {},
  tool: new HsvsFiveTissueTypeTool(),
};
