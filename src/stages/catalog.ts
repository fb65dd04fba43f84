import { SOURCE_KINDS } from "../core/artifacts.js";
import { StageRegistry, type StageDefinition } from "../core/stage-registry.js";
import { anatBiasCorrectionStage } from "./anat-bias-correction.js";
import { brainExtractionStage } from "./brain-extraction.js";
import { dwiBiasCorrectionStage } from "./dwi-bias-correction.js";
import { dwiCoregistrationEpiregStage, dwiCoregistrationFlirtStage } from "./dwi-coregistration.js";
import { dwiDenoiseMppcaStage, dwiDenoisePatch2SelfStage } from "./dwi-denoise.js";
import { eddyCorrectionStage } from "./eddy-correction.js";
import { fodEstimationStage } from "./fod-estimation.js";
import { responseEstimationStage } from "./response-estimation.js";
import { siftFilteringStage } from "./sift-filtering.js";
import { tissueSegmentationFslStage, tissueSegmentationHsvsStage } from "./tissue-segmentation.js";
import { tractographyStage } from "./tractography.js";

// Catalog order is the dispatch tie-break within a unit.
export const STAGE_CATALOG: readonly StageDefinition[] = [
  anatBiasCorrectionStage,
  brainExtractionStage,
  tissueSegmentationFslStage,
  tissueSegmentationHsvsStage,
  dwiDenoiseMppcaStage,
  dwiDenoisePatch2SelfStage,
  eddyCorrectionStage,
  dwiBiasCorrectionStage,
  dwiCoregistrationEpiregStage,
  dwiCoregistrationFlirtStage,
  responseEstimationStage,
  fodEstimationStage,
  tractographyStage,
  siftFilteringStage,
];

export function createDefaultStageRegistry(): StageRegistry {
  return new StageRegistry(STAGE_CATALOG, SOURCE_KINDS);
}
