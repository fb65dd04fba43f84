import crypto from "node:crypto";

import type { ArtifactKind } from "./artifacts.js";
import type { JsonObject } from "./logger.js";

// =============================================================================
// TYPES
// =============================================================================

export type FingerprintInput =
  | { kind: ArtifactKind; source: "dataset"; paths: readonly string[] }
  | { kind: ArtifactKind; source: "stage"; fingerprint: string };

export type FingerprintSubject = {
  stage: string;
  version: number;
  params: JsonObject;
  inputs: readonly FingerprintInput[];
};

// =============================================================================
// FINGERPRINTS
// =============================================================================

/**
 * Stage fingerprints chain through producer fingerprints, so any upstream
 * change reaches every downstream instance. Dataset inputs contribute their
 * ordered paths only; file contents are not read.
 */
export function computeFingerprint(subject: FingerprintSubject): string {
  const inputs: Record<string, unknown> = {};
  for (const input of subject.inputs) {
    inputs[input.kind] =
      input.source === "stage"
        ? { source: "stage", fingerprint: input.fingerprint }
        : { source: "dataset", paths: hashPaths(input.paths) };
  }

  return sha256(
    canonicalJson({
      stage: subject.stage,
      version: subject.version,
      params: subject.params,
      inputs,
    }),
  );
}

export function hashPaths(paths: readonly string[]): string {
  return sha256(JSON.stringify(paths));
}

export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortJsonValue(value));
}

function sortJsonValue(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(sortJsonValue);
  }
  if (typeof value === "object") {
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return Object.fromEntries(entries.map(([key, child]) => [key, sortJsonValue(child)]));
  }

  return value;
}

function sha256(text: string): string {
  return crypto.createHash("sha256").update(text).digest("hex");
}
