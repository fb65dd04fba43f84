import type { ArtifactLocations } from "./artifacts.js";
import type { JsonObject } from "./logger.js";

// =============================================================================
// EXECUTION CONTRACT
// =============================================================================

export type StageExecutionRequest = {
  runId: string;
  unitId: string;
  participant: string;
  session?: string;
  stageId: string;
  fingerprint: string;
  inputs: ArtifactLocations;
  params: JsonObject;
  threads: number;
  workDir: string;
};

export type StageExecutionResult =
  | { ok: true; outputs: ArtifactLocations }
  | { ok: false; message: string };

export interface StageExecutor {
  execute(request: StageExecutionRequest): Promise<StageExecutionResult>;
}

// =============================================================================
// TOOL PLANS
// =============================================================================

export type ToolCommand = {
  command: string;
  args: string[];
  env?: Record<string, string>;
};

export type ToolPlan = {
  commands: ToolCommand[];
  outputs: ArtifactLocations;
};

// Read-only access to the inputs a plan may need to inspect before running.
export interface ToolContext {
  readonly templateflowHome: string;
  probe(command: string, args: string[]): Promise<string>;
  exists(filePath: string): Promise<boolean>;
  readSidecar(imagePath: string): Promise<Record<string, unknown>>;
}

export interface ToolStage {
  plan(request: StageExecutionRequest, context: ToolContext): Promise<ToolPlan>;
}
