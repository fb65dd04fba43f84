import path from "node:path";

import { z } from "zod";

import type { StageDefinition } from "../core/stage-registry.js";
import type {
  StageExecutionRequest,
  ToolCommand,
  ToolContext,
  ToolPlan,
  ToolStage,
} from "../core/stage-executor.js";
import { formatNumber, inputPaths, mrtrix, parseParams, sidecarPath, workFile } from "./common.js";

// =============================================================================
// RUN IMPORT
// =============================================================================

// Converts every DWI run to MRtrix format with its gradient table and, when
// present, its JSON metadata.
async function importRuns(
  request: StageExecutionRequest,
  context: ToolContext,
  images: string[],
  prefix: string,
): Promise<{ commands: ToolCommand[]; runs: string[] }> {
  const commands: ToolCommand[] = [];
  const runs: string[] = [];

  for (const [index, image] of images.entries()) {
    const run = workFile(request, `${prefix}_run-${index + 1}.mif`);
    const args = [image, run, "-fslgrad", sidecarPath(image, ".bvec"), sidecarPath(image, ".bval")];
    const json = sidecarPath(image, ".json");
    if (await context.exists(json)) {
      args.push("-json_import", json);
    }
    commands.push(mrtrix("mrconvert", args, request));
    runs.push(run);
  }

  return { commands, runs };
}

function concatenateRuns(
  request: StageExecutionRequest,
  runs: string[],
  name: string,
): { commands: ToolCommand[]; image: string } {
  const [single] = runs;
  if (runs.length === 1 && single !== undefined) {
    return { commands: [], image: single };
  }
  const image = workFile(request, name);
  return { commands: [mrtrix("mrcat", [...runs, image, "-axis", "3"], request)], image };
}

// =============================================================================
// MP-PCA
// =============================================================================

const MppcaParamsSchema = z.object({
  dwi_denoise_window: z.union([z.literal("auto"), z.number().int()]),
});

export class DwiDenoiseMppcaTool implements ToolStage {
  async plan(request: StageExecutionRequest, context: ToolContext): Promise<ToolPlan> {
    const params = parseParams(MppcaParamsSchema, request);
    const imported = await importRuns(request, context, inputPaths(request, "raw_dwi"), "dwi");
    const merged = concatenateRuns(request, imported.runs, "dwi_concat.mif");
    const denoised = workFile(request, "dwi_denoised.mif");

    const args = [merged.image, denoised, "-noise", workFile(request, "noise.mif")];
    if (params.dwi_denoise_window !== "auto") {
      const size = formatNumber(params.dwi_denoise_window);
      args.push("-extent", `${size},${size},${size}`);
    }

    return {
      commands: [...imported.commands, ...merged.commands, mrtrix("dwidenoise", args, request)],
      outputs: { denoised_dwi: [denoised] },
    };
  }
}

export const dwiDenoiseMppcaStage: StageDefinition = {
  id: "dwi_denoise_mppca",
  pipeline: "diffusion",
  description: "MP-PCA denoising with dwidenoise",
  inputs: ["raw_dwi"],
  outputs: ["denoised_dwi"],
  cost: { processSlots: 1, threads: "omp" },
  variant: { setting: "denoise_method", value: "dwidenoise" },
  version: 1,
  parameters: (workflow) => ({ dwi_denoise_window: workflow.dwi_denoise_window }),
  tool: new DwiDenoiseMppcaTool(),
};

// =============================================================================
// PATCH2SELF
// =============================================================================

const Patch2SelfParamsSchema = z.object({ b0_threshold: z.number().int().positive() });

export class DwiDenoisePatch2SelfTool implements ToolStage {
  async plan(request: StageExecutionRequest, context: ToolContext): Promise<ToolPlan> {
    const { b0_threshold } = parseParams(Patch2SelfParamsSchema, request);
    const images = inputPaths(request, "raw_dwi");

    const commands: ToolCommand[] = [];
    const denoisedImages: string[] = [];
    for (const [index, image] of images.entries()) {
      const outDir = workFile(request, `patch2self_run-${index + 1}`);
      const output = path.join(outDir, "dwi_denoised.nii.gz");
      commands.push({
        command: "dipy_denoise_patch2self",
        args: [
          image,
          sidecarPath(image, ".bval"),
          "--b0_threshold",
          String(b0_threshold),
          "--out_dir",
          outDir,
          "--out_denoised",
          "dwi_denoised.nii.gz",
          "--force",
        ],
      });
      denoisedImages.push(output);
    }

    // Gradient tables come from the raw runs; patch2self keeps volume order.
    const imported: string[] = [];
    for (const [index, image] of images.entries()) {
      const denoisedImage = denoisedImages[index];
      if (denoisedImage === undefined) continue;
      const run = workFile(request, `dwi_denoised_run-${index + 1}.mif`);
      const args = [
        denoisedImage,
        run,
        "-fslgrad",
        sidecarPath(image, ".bvec"),
        sidecarPath(image, ".bval"),
      ];
      const json = sidecarPath(image, ".json");
      if (await context.exists(json)) {
        args.push("-json_import", json);
      }
      commands.push(mrtrix("mrconvert", args, request));
      imported.push(run);
    }

    const merged = concatenateRuns(request, imported, "dwi_denoised.mif");
    return {
      commands: [...commands, ...merged.commands],
      outputs: { denoised_dwi: [merged.image] },
    };
  }
}

export const dwiDenoisePatch2SelfStage: StageDefinition = {
  id: "dwi_denoise_patch2self",
  pipeline: "diffusion",
  description: "Self-supervised denoising with DIPY patch2self",
  inputs: ["raw_dwi"],
  outputs: ["denoised_dwi"],
  cost: { processSlots: 1, threads: 1 },
  variant: { setting: "denoise_method", value: "patch2self" },
  version: 1,
  parameters: (workflow) => ({ b0_threshold: workflow.b0_threshold }),
  tool: new DwiDenoisePatch2SelfTool(),
};
