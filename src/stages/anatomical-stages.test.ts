import { describe, expect, it } from "vitest";

import { makeRunConfig } from "../core/__tests__/config-fixtures.js";
import { FakeToolContext, WORK_DIR, makeRequest } from "./__tests__/stage-fixtures.js";
import { anatBiasCorrectionStage } from "./anat-bias-correction.js";
import { brainExtractionStage, templateFiles } from "./brain-extraction.js";
import { tissueSegmentationFslStage, tissueSegmentationHsvsStage } from "./tissue-segmentation.js";

const T1W = "/bids/sub-01/anat/sub-01_T1w.nii.gz";
const CORRECTED = `${WORK_DIR}/t1w_biascorr.nii.gz`;
const TEMPLATEFLOW = "/templateflow";

describe("anat_bias_correction", () => {
  it("runs N4 on the first T1w with the instance thread count", async () => {
    const request = makeRequest(anatBiasCorrectionStage, makeRunConfig(), { raw_t1w: [T1W] }, 3);

    const plan = await anatBiasCorrectionStage.tool.plan(request, new FakeToolContext(TEMPLATEFLOW));

    expect(plan).toEqual({
      commands: [
        {
          command: "N4BiasFieldCorrection",
          args: ["-d", "3", "-i", T1W, "-o", CORRECTED],
          env: { OMP_NUM_THREADS: "3", ITK_GLOBAL_DEFAULT_NUMBER_OF_THREADS: "3" },
        },
      ],
      outputs: { bias_corrected_t1w: [CORRECTED] },
    });
  });

  it("fails when no T1w is bound", async () => {
    const request = makeRequest(anatBiasCorrectionStage, makeRunConfig(), {});

    await expect(anatBiasCorrectionStage.tool.plan(request, new FakeToolContext(TEMPLATEFLOW))).rejects.toThrow(
      "anat_bias_correction requires raw_t1w but none was bound",
    );
  });
});

describe("brain_extraction", () => {
  const template = templateFiles(TEMPLATEFLOW, "OASIS30ANTs");

  it("locates template files under the templateflow home", () => {
    expect(template).toEqual({
      image: "/templateflow/tpl-OASIS30ANTs/tpl-OASIS30ANTs_res-01_T1w.nii.gz",
      probabilityMask: "/templateflow/tpl-OASIS30ANTs/tpl-OASIS30ANTs_res-01_desc-BrainCerebellum_probseg.nii.gz",
    });
  });

  it("only fingerprints a seed when the fixed seed is requested", () => {
    const config = makeRunConfig();
    expect(brainExtractionStage.parameters(config.workflow, config.execution)).toEqual({
      skull_strip_template: "OASIS30ANTs",
      skull_strip_fixed_seed: false,
    });

    const seeded = makeRunConfig({ workflow: { skull_strip_fixed_seed: true } });
    expect(brainExtractionStage.parameters(seeded.workflow, seeded.execution)).toEqual({
      skull_strip_template: "OASIS30ANTs",
      skull_strip_fixed_seed: true,
      random_seed: 1,
    });
  });

  it("plans antsBrainExtraction with a fixed seed", async () => {
    const request = makeRequest(
      brainExtractionStage,
      makeRunConfig({ workflow: { skull_strip_fixed_seed: true } }),
      { bias_corrected_t1w: [CORRECTED] },
    );
    const context = new FakeToolContext(TEMPLATEFLOW, {
      existing: [template.image, template.probabilityMask],
    });

    const plan = await brainExtractionStage.tool.plan(request, context);

    expect(plan.commands).toEqual([
      {
        command: "antsBrainExtraction.sh",
        args: [
          "-d",
          "3",
          "-a",
          CORRECTED,
          "-e",
          template.image,
          "-m",
          template.probabilityMask,
          "-o",
          `${WORK_DIR}/ants_`,
        ],
        env: { OMP_NUM_THREADS: "2", ITK_GLOBAL_DEFAULT_NUMBER_OF_THREADS: "2", ANTS_RANDOM_SEED: "1" },
      },
    ]);
    expect(plan.outputs).toEqual({
      t1w_brain: [`${WORK_DIR}/ants_BrainExtractionBrain.nii.gz`],
      brain_mask: [`${WORK_DIR}/ants_BrainExtractionMask.nii.gz`],
    });
  });

  it("fails before running when the template is not installed", async () => {
    const request = makeRequest(brainExtractionStage, makeRunConfig(), { bias_corrected_t1w: [CORRECTED] });

    await expect(brainExtractionStage.tool.plan(request, new FakeToolContext(TEMPLATEFLOW))).rejects.toThrow(
      `Template file not found: ${template.image}`,
    );
  });
});

describe("tissue segmentation", () => {
  it("runs 5ttgen fsl inside the brain mask", async () => {
    const request = makeRequest(tissueSegmentationFslStage, makeRunConfig(), {
      bias_corrected_t1w: [CORRECTED],
      brain_mask: [`${WORK_DIR}/mask.nii.gz`],
    });

    const plan = await tissueSegmentationFslStage.tool.plan(request, new FakeToolContext(TEMPLATEFLOW));

    expect(plan.commands).toEqual([
      {
        command: "5ttgen",
        args: ["fsl", CORRECTED, `${WORK_DIR}/5tt.nii.gz`, "-mask", `${WORK_DIR}/mask.nii.gz`, "-nthreads", "2", "-force"],
      },
    ]);
    expect(plan.outputs).toEqual({ five_tissue_type: [`${WORK_DIR}/5tt.nii.gz`] });
  });

  it("runs 5ttgen hsvs on the participant's FreeSurfer subject", async () => {
    const config = makeRunConfig({
      workflow: { five_tissue_type_algorithm: "hsvs" },
      fsSubjectsDir: "/freesurfer",
    });
    const request = makeRequest(tissueSegmentationHsvsStage, config, { bias_corrected_t1w: [CORRECTED] });

    const plan = await tissueSegmentationHsvsStage.tool.plan(request, new FakeToolContext(TEMPLATEFLOW));

    expect(plan.commands[0]?.args).toEqual([
      "hsvs",
      "/freesurfer/sub-01",
      `${WORK_DIR}/5tt.nii.gz`,
      "-nthreads",
      "2",
      "-force",
    ]);
  });
});
