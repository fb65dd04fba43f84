import path from "node:path";

import type { z } from "zod";

import type { ArtifactKind } from "../core/artifacts.js";
import type { StageExecutionRequest, ToolCommand } from "../core/stage-executor.js";

// =============================================================================
// INPUTS & PARAMETERS
// =============================================================================

export function inputPaths(request: StageExecutionRequest, kind: ArtifactKind): string[] {
  const paths = request.inputs[kind];
  if (!paths || paths.length === 0) {
    throw new Error(`${request.stageId} requires ${kind} but none was bound`);
  }
  return paths;
}

export function inputPath(request: StageExecutionRequest, kind: ArtifactKind): string {
  const [first] = inputPaths(request, kind);
  if (first === undefined) {
    throw new Error(`${request.stageId} requires ${kind} but none was bound`);
  }
  return first;
}

export function parseParams<T extends z.ZodTypeAny>(
  schema: T,
  request: StageExecutionRequest,
): z.infer<T> {
  const parsed = schema.safeParse(request.params);
  if (!parsed.success) {
    throw new Error(`Invalid parameters for ${request.stageId}: ${parsed.error.message}`);
  }
  return parsed.data;
}

// =============================================================================
// COMMAND HELPERS
// =============================================================================

export function workFile(request: StageExecutionRequest, name: string): string {
  return path.join(request.workDir, name);
}

export function nthreads(request: StageExecutionRequest): string[] {
  return ["-nthreads", String(request.threads)];
}

export function mrtrix(command: string, args: string[], request: StageExecutionRequest): ToolCommand {
  return { command, args: [...args, ...nthreads(request), "-force"] };
}

export function threadEnv(threads: number): Record<string, string> {
  return {
    OMP_NUM_THREADS: String(threads),
    ITK_GLOBAL_DEFAULT_NUMBER_OF_THREADS: String(threads),
  };
}

// =============================================================================
// SIDECARS
// =============================================================================

const NIFTI_EXTENSION = /\.nii(\.gz)?$/;

export function sidecarPath(imagePath: string, extension: ".json" | ".bval" | ".bvec"): string {
  if (!NIFTI_EXTENSION.test(imagePath)) {
    throw new Error(`Expected a NIfTI image, got ${imagePath}`);
  }
  return imagePath.replace(NIFTI_EXTENSION, extension);
}

export function formatNumber(value: number): string {
  return String(Number(value.toFixed(6)));
}
