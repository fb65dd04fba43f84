import { describe, expect, it } from "vitest";

import {
  InMemoryDatasetIndex,
  buildDatasetIndex,
  participantFiles,
} from "../app/orchestrator/__tests__/fakes.js";
import { anatBiasCorrectionStage } from "../stages/anat-bias-correction.js";
import { brainExtractionStage } from "../stages/brain-extraction.js";
import { createDefaultStageRegistry } from "../stages/catalog.js";
import { tissueSegmentationFslStage } from "../stages/tissue-segmentation.js";
import { makeRunConfig } from "./__tests__/config-fixtures.js";
import { SOURCE_KINDS } from "./artifacts.js";
import { ConfigError } from "./errors.js";
import { buildPipelinePlan, resolveStageSelection, resolveUnits } from "./graph-builder.js";
import type { PipelineDag } from "./graph.js";
import { StageRegistry } from "./stage-registry.js";

const ROOT = "/study/bids";

const DEFAULT_ENABLED = [
  "anat_bias_correction",
  "brain_extraction",
  "tissue_segmentation_fsl",
  "dwi_denoise_mppca",
  "eddy_correction",
  "dwi_bias_correction",
  "dwi_coregistration_epireg",
  "response_estimation",
  "fod_estimation",
  "tractography",
  "sift_filtering",
];

function fingerprintOf(dag: PipelineDag | undefined, stageId: string): string | undefined {
  return dag?.instances.find((instance) => instance.stageId === stageId)?.fingerprint;
}

describe("resolveStageSelection", () => {
  it("keeps one alternate per variant setting", () => {
    const selection = resolveStageSelection(createDefaultStageRegistry(), makeRunConfig());

    expect(selection.enabled.map((definition) => definition.id)).toEqual(DEFAULT_ENABLED);
    expect(selection.excluded).toEqual([
      { stageId: "tissue_segmentation_hsvs", reason: "five_tissue_type_algorithm is fsl" },
      { stageId: "dwi_denoise_patch2self", reason: "denoise_method is dwidenoise" },
      { stageId: "dwi_coregistration_flirt", reason: "dwi2t1w_method is epireg" },
    ]);
  });

  it("drops every diffusion stage in anatomical-only mode", () => {
    const selection = resolveStageSelection(
      createDefaultStageRegistry(),
      makeRunConfig({ workflow: { anat_only: true } }),
    );

    expect(selection.enabled.map((definition) => definition.id)).toEqual([
      "anat_bias_correction",
      "brain_extraction",
      "tissue_segmentation_fsl",
    ]);
    expect(selection.excluded.filter((entry) => entry.reason === "anatomical-only mode")).toHaveLength(10);
  });

  it("rejects two enabled producers of one kind", () => {
    const registry = new StageRegistry(
      [anatBiasCorrectionStage, { ...anatBiasCorrectionStage, id: "anat_bias_copy" }],
      SOURCE_KINDS,
    );

    expect(() => resolveStageSelection(registry, makeRunConfig())).toThrow(
      "Stages anat_bias_correction and anat_bias_copy both produce bias_corrected_t1w; select one alternate.",
    );
  });

  it("cascades exclusions to consumers of kinds nobody produces", () => {
    const registry = new StageRegistry(
      [
        anatBiasCorrectionStage,
        brainExtractionStage,
        tissueSegmentationFslStage,
        { ...anatBiasCorrectionStage, id: "tissue_report", inputs: ["five_tissue_type"], outputs: ["streamline_set"] },
      ],
      SOURCE_KINDS,
    );
    const config = makeRunConfig({
      workflow: { five_tissue_type_algorithm: "hsvs" },
      fsSubjectsDir: "/study/freesurfer",
    });

    const selection = resolveStageSelection(registry, config);

    expect(selection.enabled.map((definition) => definition.id)).toEqual([
      "anat_bias_correction",
      "brain_extraction",
    ]);
    expect(selection.excluded).toEqual([
      { stageId: "tissue_segmentation_fsl", reason: "five_tissue_type_algorithm is hsvs" },
      { stageId: "tissue_report", reason: "no enabled producer for five_tissue_type" },
    ]);
  });
});

describe("resolveUnits", () => {
  it("creates one unit per session when per_session is set", async () => {
    const index = new InMemoryDatasetIndex(ROOT, {
      "01": {
        sessions: {
          pre: participantFiles(ROOT, "01", "pre"),
          post: participantFiles(ROOT, "01", "post"),
        },
      },
      "02": { files: participantFiles(ROOT, "02") },
    });
    const config = makeRunConfig({ participants: ["01", "02"], perSession: true });

    expect(await resolveUnits(config, index)).toEqual([
      { id: "01_ses-post", participant: "01", session: "post" },
      { id: "01_ses-pre", participant: "01", session: "pre" },
      { id: "02", participant: "02" },
    ]);
  });

  it("ignores sessions unless per_session is set", async () => {
    const index = new InMemoryDatasetIndex(ROOT, {
      "01": { sessions: { pre: participantFiles(ROOT, "01", "pre") } },
    });

    expect(await resolveUnits(makeRunConfig(), index)).toEqual([{ id: "01", participant: "01" }]);
  });
});

describe("buildPipelinePlan", () => {
  it("attaches the default catalog in dependency order", async () => {
    const plan = await buildPipelinePlan({
      config: makeRunConfig({ participants: ["01", "02"], resources: { omp_nthreads: 2 } }),
      index: buildDatasetIndex(ROOT, ["01", "02"]),
      registry: createDefaultStageRegistry(),
    });

    expect(plan.units.map((unit) => unit.id)).toEqual(["01", "02"]);
    const [first] = plan.dags;
    expect(first?.instances.map((instance) => instance.stageId)).toEqual(DEFAULT_ENABLED);
    expect(first?.edges).toHaveLength(19);
    expect(first?.edges).toContainEqual({
      from: "01:tissue_segmentation_fsl",
      to: "01:tractography",
      kind: "five_tissue_type",
    });

    const bias = first?.instances[0];
    expect(bias?.inputs).toEqual([
      { kind: "raw_t1w", source: "dataset", paths: [`${ROOT}/sub-01/anat/sub-01_T1w.nii.gz`] },
    ]);
    expect(bias?.threads).toBe(2);
    expect(first?.instances.find((instance) => instance.stageId === "dwi_coregistration_epireg")?.threads).toBe(1);
  });

  it("plans only anatomical stages in anatomical-only mode", async () => {
    const index = new InMemoryDatasetIndex(ROOT, {
      "01": { files: { t1w: participantFiles(ROOT, "01").t1w } },
    });

    const plan = await buildPipelinePlan({
      config: makeRunConfig({ workflow: { anat_only: true } }),
      index,
      registry: createDefaultStageRegistry(),
    });

    expect(plan.dags[0]?.instances.map((instance) => instance.id)).toEqual([
      "01:anat_bias_correction",
      "01:brain_extraction",
      "01:tissue_segmentation_fsl",
    ]);
  });

  it("names the unit and missing kinds when a participant lacks inputs", async () => {
    const index = new InMemoryDatasetIndex(ROOT, {
      "01": { files: participantFiles(ROOT, "01") },
      "02": { files: { t1w: participantFiles(ROOT, "02").t1w, fmap: participantFiles(ROOT, "02").fmap } },
    });

    const plan = buildPipelinePlan({
      config: makeRunConfig({ participants: ["01", "02"] }),
      index,
      registry: createDefaultStageRegistry(),
    });

    await expect(plan).rejects.toThrow(ConfigError);
    await expect(plan).rejects.toThrow(
      "Participant unit 02 cannot be planned: dwi_denoise_mppca is missing raw_dwi; eddy_correction is missing denoised_dwi, raw_dwi;",
    );
  });

  it("chains producer fingerprints into their consumers", async () => {
    const registry = createDefaultStageRegistry();
    const index = buildDatasetIndex(ROOT, ["01"]);
    const baseline = await buildPipelinePlan({ config: makeRunConfig(), index, registry });
    const changed = await buildPipelinePlan({
      config: makeRunConfig({ workflow: { tracking_algorithm: "SD_Stream" } }),
      index,
      registry,
    });

    const before = baseline.dags[0];
    const after = changed.dags[0];
    expect(fingerprintOf(after, "fod_estimation")).toBe(fingerprintOf(before, "fod_estimation"));
    expect(fingerprintOf(after, "tractography")).not.toBe(fingerprintOf(before, "tractography"));
    expect(fingerprintOf(after, "sift_filtering")).not.toBe(fingerprintOf(before, "sift_filtering"));
  });

  it("does not fold thread counts into fingerprints", async () => {
    const registry = createDefaultStageRegistry();
    const index = buildDatasetIndex(ROOT, ["01"]);
    const narrow = await buildPipelinePlan({
      config: makeRunConfig({ resources: { omp_nthreads: 1 } }),
      index,
      registry,
    });
    const wide = await buildPipelinePlan({
      config: makeRunConfig({ resources: { omp_nthreads: 2 } }),
      index,
      registry,
    });

    expect(narrow.dags[0]?.instances.map((instance) => instance.fingerprint)).toEqual(
      wide.dags[0]?.instances.map((instance) => instance.fingerprint),
    );
  });
});
