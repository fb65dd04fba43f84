import { z } from "zod";

import type { StageDefinition } from "../core/stage-registry.js";
import type {
  StageExecutionRequest,
  ToolContext,
  ToolPlan,
  ToolStage,
} from "../core/stage-executor.js";
import { inputPath, mrtrix, parseParams, sidecarPath, workFile } from "./common.js";

const ParamsSchema = z.object({
  eddy_config: z.string(),
  b0_threshold: z.number().int().positive(),
});

const PHASE_ENCODING = /^[ijk]-?$/;

// Every DWI run shares one acquisition direction; the first run's sidecar is authoritative.
export async function readDwiDirection(dwi: string, context: ToolContext): Promise<string> {
  const sidecar = await context.readSidecar(dwi);
  const direction = sidecar.PhaseEncodingDirection;
  if (typeof direction !== "string") {
    throw new Error(`PhaseEncodingDirection missing from ${sidecarPath(dwi, ".json")}`);
  }
  if (!PHASE_ENCODING.test(direction)) {
    throw new Error(`Unsupported PhaseEncodingDirection: ${direction}`);
  }
  return direction;
}

export class DwiFslPreprocTool implements ToolStage {
  async plan(request: StageExecutionRequest, context: ToolContext): Promise<ToolPlan> {
    const params = parseParams(ParamsSchema, request);
    const dwi = inputPath(request, "denoised_dwi");
    const fieldmap = inputPath(request, "raw_fmap");
    const dwiDirection = await readDwiDirection(inputPath(request, "raw_dwi"), context);
    const b0Config = ["-config", "BZeroThreshold", String(params.b0_threshold)];

    const dwiB0s = workFile(request, "dwi_b0s.mif");
    const dwiB0 = workFile(request, "dwi_b0.mif");
    const fmapImage = workFile(request, "fmap.mif");
    const fmapB0s = workFile(request, "fmap_b0s.mif");
    const fmapB0 = workFile(request, "fmap_b0.mif");
    const b0Pair = workFile(request, "b0_pair.mif");
    const corrected = workFile(request, "dwi_eddy.mif");
    const correctedB0s = workFile(request, "dwi_eddy_b0s.mif");
    const reference = workFile(request, "dwi_reference.nii.gz");

    return {
      commands: [
        mrtrix("dwiextract", [dwi, dwiB0s, "-bzero", ...b0Config], request),
        mrtrix("mrmath", [dwiB0s, "mean", dwiB0, "-axis", "3"], request),
        mrtrix(
          "mrconvert",
          [fieldmap, fmapImage, "-fslgrad", sidecarPath(fieldmap, ".bvec"), sidecarPath(fieldmap, ".bval")],
          request,
        ),
        mrtrix("dwiextract", [fmapImage, fmapB0s, "-bzero", ...b0Config], request),
        mrtrix("mrmath", [fmapB0s, "mean", fmapB0, "-axis", "3"], request),
        mrtrix("mrcat", [dwiB0, fmapB0, b0Pair, "-axis", "3"], request),
        mrtrix(
          "dwifslpreproc",
          [
            dwi,
            corrected,
            "-rpe_pair",
            "-se_epi",
            b0Pair,
            "-pe_dir",
            dwiDirection,
            "-align_seepi",
            "-eddy_options",
            ` ${params.eddy_config}`,
            "-scratch",
            workFile(request, "scratch"),
            ...b0Config,
          ],
          request,
        ),
        mrtrix("dwiextract", [corrected, correctedB0s, "-bzero", ...b0Config], request),
        mrtrix("mrmath", [correctedB0s, "mean", reference, "-axis", "3"], request),
      ],
      outputs: {
        eddy_corrected_dwi: [corrected],
        dwi_reference: [reference],
      },
    };
  }
}

export const eddyCorrectionStage: StageDefinition = {
  id: "eddy_correction",
  pipeline: "diffusion",
  description: "Susceptibility, eddy-current and motion correction with dwifslpreproc",
  inputs: ["denoised_dwi", "raw_fmap", "raw_dwi"],
  outputs: ["eddy_corrected_dwi", "dwi_reference"],
  cost: { processSlots: 1, threads: "omp" },
  version: 1,
  parameters: (workflow) => ({
    eddy_config: workflow.eddy_config,
    b0_threshold: workflow.b0_threshold,
  }),
  tool: new DwiFslPreprocTool(),
};
