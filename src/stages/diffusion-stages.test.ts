import { describe, expect, it } from "vitest";

import { makeRunConfig } from "../core/__tests__/config-fixtures.js";
import { FakeToolContext, WORK_DIR, makeRequest } from "./__tests__/stage-fixtures.js";
import { dwiCoregistrationFlirtStage } from "./dwi-coregistration.js";
import { dwiDenoiseMppcaStage, dwiDenoisePatch2SelfStage } from "./dwi-denoise.js";
import { eddyCorrectionStage, readDwiDirection } from "./eddy-correction.js";
import { fodEstimationStage } from "./fod-estimation.js";
import { responseEstimationStage } from "./response-estimation.js";
import { siftFilteringStage } from "./sift-filtering.js";
import { parseVoxelSize, scaleTrackingLimits, tractographyStage } from "./tractography.js";

const TEMPLATEFLOW = "/templateflow";
const RUN_1 = "/bids/sub-01/dwi/sub-01_run-1_dwi.nii.gz";
const RUN_2 = "/bids/sub-01/dwi/sub-01_run-2_dwi.nii.gz";
const FMAP = "/bids/sub-01/fmap/sub-01_dir-PA_epi.nii.gz";
const THREAD_ARGS = ["-nthreads", "2", "-force"];

function work(name: string): string {
  return `${WORK_DIR}/${name}`;
}

describe("dwi_denoise_mppca", () => {
  it("imports and concatenates runs before denoising with a fixed window", async () => {
    const config = makeRunConfig({ workflow: { dwi_denoise_window: 5 } });
    const request = makeRequest(dwiDenoiseMppcaStage, config, { raw_dwi: [RUN_1, RUN_2] });
    const context = new FakeToolContext(TEMPLATEFLOW, {
      existing: ["/bids/sub-01/dwi/sub-01_run-1_dwi.json"],
    });

    const plan = await dwiDenoiseMppcaStage.tool.plan(request, context);

    expect(plan.commands).toEqual([
      {
        command: "mrconvert",
        args: [
          RUN_1,
          work("dwi_run-1.mif"),
          "-fslgrad",
          "/bids/sub-01/dwi/sub-01_run-1_dwi.bvec",
          "/bids/sub-01/dwi/sub-01_run-1_dwi.bval",
          "-json_import",
          "/bids/sub-01/dwi/sub-01_run-1_dwi.json",
          ...THREAD_ARGS,
        ],
      },
      {
        command: "mrconvert",
        args: [
          RUN_2,
          work("dwi_run-2.mif"),
          "-fslgrad",
          "/bids/sub-01/dwi/sub-01_run-2_dwi.bvec",
          "/bids/sub-01/dwi/sub-01_run-2_dwi.bval",
          ...THREAD_ARGS,
        ],
      },
      {
        command: "mrcat",
        args: [work("dwi_run-1.mif"), work("dwi_run-2.mif"), work("dwi_concat.mif"), "-axis", "3", ...THREAD_ARGS],
      },
      {
        command: "dwidenoise",
        args: [
          work("dwi_concat.mif"),
          work("dwi_denoised.mif"),
          "-noise",
          work("noise.mif"),
          "-extent",
          "5,5,5",
          ...THREAD_ARGS,
        ],
      },
    ]);
    expect(plan.outputs).toEqual({ denoised_dwi: [work("dwi_denoised.mif")] });
  });

  it("lets dwidenoise choose the window in auto mode", async () => {
    const request = makeRequest(dwiDenoiseMppcaStage, makeRunConfig(), { raw_dwi: [RUN_1] });

    const plan = await dwiDenoiseMppcaStage.tool.plan(request, new FakeToolContext(TEMPLATEFLOW));

    expect(plan.commands.map((command) => command.command)).toEqual(["mrconvert", "dwidenoise"]);
    expect(plan.commands[1]?.args).toEqual([
      work("dwi_run-1.mif"),
      work("dwi_denoised.mif"),
      "-noise",
      work("noise.mif"),
      ...THREAD_ARGS,
    ]);
  });
});

describe("dwi_denoise_patch2self", () => {
  it("denoises each run and re-attaches its gradient table", async () => {
    const config = makeRunConfig({ workflow: { denoise_method: "patch2self" } });
    const request = makeRequest(dwiDenoisePatch2SelfStage, config, { raw_dwi: [RUN_1] }, 1);

    const plan = await dwiDenoisePatch2SelfStage.tool.plan(request, new FakeToolContext(TEMPLATEFLOW));

    expect(plan.commands).toEqual([
      {
        command: "dipy_denoise_patch2self",
        args: [
          RUN_1,
          "/bids/sub-01/dwi/sub-01_run-1_dwi.bval",
          "--b0_threshold",
          "100",
          "--out_dir",
          work("patch2self_run-1"),
          "--out_denoised",
          "dwi_denoised.nii.gz",
          "--force",
        ],
      },
      {
        command: "mrconvert",
        args: [
          work("patch2self_run-1/dwi_denoised.nii.gz"),
          work("dwi_denoised_run-1.mif"),
          "-fslgrad",
          "/bids/sub-01/dwi/sub-01_run-1_dwi.bvec",
          "/bids/sub-01/dwi/sub-01_run-1_dwi.bval",
          "-nthreads",
          "1",
          "-force",
        ],
      },
    ]);
    expect(plan.outputs).toEqual({ denoised_dwi: [work("dwi_denoised_run-1.mif")] });
  });
});

describe("eddy_correction", () => {
  it("pairs mean b0s and takes the direction from the DWI sidecar", async () => {
    const request = makeRequest(eddyCorrectionStage, makeRunConfig(), {
      denoised_dwi: [work("dwi_denoised.mif")],
      raw_fmap: [FMAP],
      raw_dwi: [RUN_1, RUN_2],
    });
    const context = new FakeToolContext(TEMPLATEFLOW, {
      sidecars: { [RUN_1]: { PhaseEncodingDirection: "j-" } },
    });

    const plan = await eddyCorrectionStage.tool.plan(request, context);

    expect(plan.commands.map((command) => command.command)).toEqual([
      "dwiextract",
      "mrmath",
      "mrconvert",
      "dwiextract",
      "mrmath",
      "mrcat",
      "dwifslpreproc",
      "dwiextract",
      "mrmath",
    ]);
    expect(plan.commands[2]?.args).toEqual([
      FMAP,
      work("fmap.mif"),
      "-fslgrad",
      "/bids/sub-01/fmap/sub-01_dir-PA_epi.bvec",
      "/bids/sub-01/fmap/sub-01_dir-PA_epi.bval",
      ...THREAD_ARGS,
    ]);
    expect(plan.commands[4]?.args).toEqual([
      work("fmap_b0s.mif"),
      "mean",
      work("fmap_b0.mif"),
      "-axis",
      "3",
      ...THREAD_ARGS,
    ]);
    expect(plan.commands[5]?.args).toEqual([
      work("dwi_b0.mif"),
      work("fmap_b0.mif"),
      work("b0_pair.mif"),
      "-axis",
      "3",
      ...THREAD_ARGS,
    ]);
    expect(plan.commands[6]?.args).toEqual([
      work("dwi_denoised.mif"),
      work("dwi_eddy.mif"),
      "-rpe_pair",
      "-se_epi",
      work("b0_pair.mif"),
      "-pe_dir",
      "j-",
      "-align_seepi",
      "-eddy_options",
      " --fwhm=0 --flm='quadratic' --repol",
      "-scratch",
      work("scratch"),
      "-config",
      "BZeroThreshold",
      "100",
      ...THREAD_ARGS,
    ]);
    expect(plan.outputs).toEqual({
      eddy_corrected_dwi: [work("dwi_eddy.mif")],
      dwi_reference: [work("dwi_reference.nii.gz")],
    });
  });

  it("fails when the DWI sidecar has no direction", async () => {
    const request = makeRequest(eddyCorrectionStage, makeRunConfig(), {
      denoised_dwi: [work("dwi_denoised.mif")],
      raw_fmap: [FMAP],
      raw_dwi: [RUN_1],
    });
    const context = new FakeToolContext(TEMPLATEFLOW, { sidecars: { [RUN_1]: {} } });

    await expect(eddyCorrectionStage.tool.plan(request, context)).rejects.toThrow(
      "PhaseEncodingDirection missing from /bids/sub-01/dwi/sub-01_run-1_dwi.json",
    );
  });

  it("rejects directions outside the voxel axes", async () => {
    const withDirection = (direction: string) =>
      new FakeToolContext(TEMPLATEFLOW, { sidecars: { [RUN_1]: { PhaseEncodingDirection: direction } } });

    expect(await readDwiDirection(RUN_1, withDirection("i"))).toBe("i");
    await expect(readDwiDirection(RUN_1, withDirection("y"))).rejects.toThrow(
      "Unsupported PhaseEncodingDirection: y",
    );
  });
});

describe("dwi_coregistration_flirt", () => {
  it("initialises from the header when asked and converts the matrix", async () => {
    const config = makeRunConfig({ workflow: { dwi2t1w_method: "flirt", dwi2t1w_init: "header" } });
    const request = makeRequest(dwiCoregistrationFlirtStage, config, {
      dwi_reference: [work("dwi_reference.nii.gz")],
      t1w_brain: ["/work/01/brain/t1w_brain.nii.gz"],
    });

    const plan = await dwiCoregistrationFlirtStage.tool.plan(request, new FakeToolContext(TEMPLATEFLOW));

    expect(plan.commands).toEqual([
      {
        command: "flirt",
        args: [
          "-in",
          work("dwi_reference.nii.gz"),
          "-ref",
          "/work/01/brain/t1w_brain.nii.gz",
          "-dof",
          "6",
          "-omat",
          work("dwi2t1w.mat"),
          "-usesqform",
          "-nosearch",
        ],
      },
      {
        command: "transformconvert",
        args: [
          work("dwi2t1w.mat"),
          work("dwi_reference.nii.gz"),
          "/work/01/brain/t1w_brain.nii.gz",
          "flirt_import",
          work("dwi2t1w_mrtrix.txt"),
          ...THREAD_ARGS,
        ],
      },
    ]);
    expect(plan.outputs).toEqual({ coregistration_transform: [work("dwi2t1w_mrtrix.txt")] });
  });
});

describe("response and FOD estimation", () => {
  const dwiInputs = {
    bias_corrected_dwi: [work("dwi_biascorr.mif")],
    dwi_mask: [work("dwi_mask.nii.gz")],
  };

  it("writes three tissue responses with dhollander", async () => {
    const request = makeRequest(responseEstimationStage, makeRunConfig(), dwiInputs);

    const plan = await responseEstimationStage.tool.plan(request, new FakeToolContext(TEMPLATEFLOW));

    expect(plan.outputs).toEqual({
      response_function: [work("wm_response.txt"), work("gm_response.txt"), work("csf_response.txt")],
    });
  });

  it("uses only the white-matter response for single-shell CSD", async () => {
    const config = makeRunConfig({ workflow: { fod_algorithm: "csd", response_algorithm: "tournier" } });
    const request = makeRequest(fodEstimationStage, config, {
      ...dwiInputs,
      response_function: [work("wm_response.txt")],
    });

    const plan = await fodEstimationStage.tool.plan(request, new FakeToolContext(TEMPLATEFLOW));

    expect(plan.commands[0]?.args).toEqual([
      "csd",
      work("dwi_biascorr.mif"),
      work("wm_response.txt"),
      work("wm_fod.mif"),
      "-mask",
      work("dwi_mask.nii.gz"),
      ...THREAD_ARGS,
    ]);
    expect(plan.outputs).toEqual({ fiber_orientation_field: [work("wm_fod.mif")] });
  });
});

describe("tractography", () => {
  it("scales step and length limits by the voxel size", () => {
    expect(parseVoxelSize("1.25 1.25 1.25\n")).toBe(1.25);
    expect(() => parseVoxelSize("n/a")).toThrow('Unexpected voxel spacing from mrinfo: "n/a"');
    expect(
      scaleTrackingLimits(2, { tracking_stepscale: 0.5, tracking_lenscale_min: 30, tracking_lenscale_max: 500 }),
    ).toEqual({ step: 1, minLength: 60, maxLength: 1000 });
  });

  it("seeds at the grey-white interface with backtracking for iFOD2", async () => {
    const fod = work("wm_fod.mif");
    const request = makeRequest(tractographyStage, makeRunConfig(), {
      fiber_orientation_field: [fod],
      five_tissue_type: ["/work/01/5tt/5tt.nii.gz"],
      coregistration_transform: [work("dwi2t1w_mrtrix.txt")],
    });
    const context = new FakeToolContext(TEMPLATEFLOW, {
      probes: { [`mrinfo -spacing ${fod}`]: "1.25 1.25 1.25\n" },
    });

    const plan = await tractographyStage.tool.plan(request, context);

    expect(plan.commands.map((command) => command.command)).toEqual(["mrtransform", "5tt2gmwmi", "tckgen"]);
    expect(plan.commands[2]?.args).toEqual([
      fod,
      work("tracks_unsifted.tck"),
      "-algorithm",
      "iFOD2",
      "-act",
      work("5tt_coreg.mif"),
      "-crop_at_gmwmi",
      "-seed_gmwmi",
      work("gmwmi.mif"),
      "-select",
      "10000000",
      "-angle",
      "45",
      "-step",
      "0.625",
      "-minlength",
      "37.5",
      "-maxlength",
      "625",
      "-backtrack",
      ...THREAD_ARGS,
    ]);
    expect(plan.outputs).toEqual({
      streamline_set: [work("tracks_unsifted.tck")],
      coregistered_five_tissue_type: [work("5tt_coreg.mif")],
    });
  });
});

describe("sift_filtering", () => {
  it("adds grey-matter scaling and debug outputs when enabled", async () => {
    const config = makeRunConfig({ workflow: { fs_scale_gm: true, debug_sift: true } });
    const request = makeRequest(siftFilteringStage, config, {
      streamline_set: [work("tracks_unsifted.tck")],
      fiber_orientation_field: [work("wm_fod.mif")],
      coregistered_five_tissue_type: [work("5tt_coreg.mif")],
    });

    const plan = await siftFilteringStage.tool.plan(request, new FakeToolContext(TEMPLATEFLOW));

    expect(plan.commands).toEqual([
      {
        command: "tcksift",
        args: [
          work("tracks_unsifted.tck"),
          work("wm_fod.mif"),
          work("tracks_sifted.tck"),
          "-term_number",
          "1000000",
          "-act",
          work("5tt_coreg.mif"),
          "-fd_scale_gm",
          "-csv",
          work("sift_stats.csv"),
          "-out_mu",
          work("sift_mu.txt"),
          "-output_debug",
          work("sift_debug"),
          ...THREAD_ARGS,
        ],
      },
    ]);
  });
});
