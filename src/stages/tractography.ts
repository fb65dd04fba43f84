import { z } from "zod";

import { TrackingAlgorithmSchema } from "../core/config.js";
import type { StageDefinition } from "../core/stage-registry.js";
import type {
  StageExecutionRequest,
  ToolContext,
  ToolPlan,
  ToolStage,
} from "../core/stage-executor.js";
import { formatNumber, inputPath, mrtrix, parseParams, workFile } from "./common.js";

const ParamsSchema = z.object({
  tracking_algorithm: TrackingAlgorithmSchema,
  tracking_max_angle: z.number().positive(),
  n_raw_tracts: z.number().int().positive(),
  tracking_stepscale: z.number().positive(),
  tracking_lenscale_min: z.number().positive(),
  tracking_lenscale_max: z.number().positive(),
});

export type TrackingLimits = {
  step: number;
  minLength: number;
  maxLength: number;
};

// Step and length limits are expressed in voxels and scaled to millimetres.
export function scaleTrackingLimits(
  voxelSize: number,
  params: Pick<
    z.infer<typeof ParamsSchema>,
    "tracking_stepscale" | "tracking_lenscale_min" | "tracking_lenscale_max"
  >,
): TrackingLimits {
  return {
    step: params.tracking_stepscale * voxelSize,
    minLength: params.tracking_lenscale_min * voxelSize,
    maxLength: params.tracking_lenscale_max * voxelSize,
  };
}

export function parseVoxelSize(spacing: string): number {
  const [first] = spacing.trim().split(/\s+/);
  const value = Number(first);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Unexpected voxel spacing from mrinfo: "${spacing.trim()}"`);
  }
  return value;
}

export class TckGenTool implements ToolStage {
  async plan(request: StageExecutionRequest, context: ToolContext): Promise<ToolPlan> {
    const params = parseParams(ParamsSchema, request);
    const fod = inputPath(request, "fiber_orientation_field");
    const fiveTissue = inputPath(request, "five_tissue_type");
    const transform = inputPath(request, "coregistration_transform");

    const voxelSize = parseVoxelSize(await context.probe("mrinfo", ["-spacing", fod]));
    const limits = scaleTrackingLimits(voxelSize, params);

    const coregistered = workFile(request, "5tt_coreg.mif");
    const gmwmi = workFile(request, "gmwmi.mif");
    const tracks = workFile(request, "tracks_unsifted.tck");

    const trackingArgs = [
      fod,
      tracks,
      "-algorithm",
      params.tracking_algorithm,
      "-act",
      coregistered,
      "-crop_at_gmwmi",
      "-seed_gmwmi",
      gmwmi,
      "-select",
      String(params.n_raw_tracts),
      "-angle",
      formatNumber(params.tracking_max_angle),
      "-step",
      formatNumber(limits.step),
      "-minlength",
      formatNumber(limits.minLength),
      "-maxlength",
      formatNumber(limits.maxLength),
    ];
    if (params.tracking_algorithm === "iFOD1" || params.tracking_algorithm === "iFOD2") {
      trackingArgs.push("-backtrack");
    }

    return {
      commands: [
        mrtrix("mrtransform", [fiveTissue, "-linear", transform, "-inverse", coregistered], request),
        mrtrix("5tt2gmwmi", [coregistered, gmwmi], request),
        mrtrix("tckgen", trackingArgs, request),
      ],
      outputs: {
        streamline_set: [tracks],
        coregistered_five_tissue_type: [coregistered],
      },
    };
  }
}

export const tractographyStage: StageDefinition = {
  id: "tractography",
  pipeline: "diffusion",
  description: "Anatomically constrained streamline tractography",
  inputs: ["fiber_orientation_field", "five_tissue_type", "coregistration_transform"],
  outputs: ["streamline_set", "coregistered_five_tissue_type"],
  cost: { processSlots: 1, threads: "omp" },
  version: 1,
  parameters: (workflow) => ({
    tracking_algorithm: workflow.tracking_algorithm,
    tracking_max_angle: workflow.tracking_max_angle,
    n_raw_tracts: workflow.n_raw_tracts,
    tracking_stepscale: workflow.tracking_stepscale,
    tracking_lenscale_min: workflow.tracking_lenscale_min,
    tracking_lenscale_max: workflow.tracking_lenscale_max,
  }),
  tool: new TckGenTool(),
};
