import { z } from "zod";

// =============================================================================
// ARTIFACT KINDS
// =============================================================================

export const ArtifactKindSchema = z.enum([
  "raw_t1w",
  "raw_dwi",
  "raw_fmap",
  "bias_corrected_t1w",
  "t1w_brain",
  "brain_mask",
  "five_tissue_type",
  "denoised_dwi",
  "eddy_corrected_dwi",
  "dwi_reference",
  "bias_corrected_dwi",
  "dwi_mask",
  "coregistration_transform",
  "coregistered_five_tissue_type",
  "response_function",
  "fiber_orientation_field",
  "streamline_set",
  "filtered_streamline_set",
]);

export type ArtifactKind = z.infer<typeof ArtifactKindSchema>;

// Ordered file paths per produced kind.
export type ArtifactLocations = Partial<Record<ArtifactKind, string[]>>;

export const ArtifactLocationsSchema = z.record(ArtifactKindSchema, z.array(z.string()));

// =============================================================================
// MODALITIES
// =============================================================================

export const MODALITIES = ["t1w", "dwi", "fmap"] as const;
export type Modality = (typeof MODALITIES)[number];

export const RAW_KIND_BY_MODALITY: Record<Modality, ArtifactKind> = {
  t1w: "raw_t1w",
  dwi: "raw_dwi",
  fmap: "raw_fmap",
};

export const SOURCE_KINDS: readonly ArtifactKind[] = MODALITIES.map(
  (modality) => RAW_KIND_BY_MODALITY[modality],
);
