/**
 * Orchestrator ports define the boundary between the pipeline executor and adapters.
 * Purpose: make dependencies explicit and replaceable for testing.
 * Usage: the run engine wires the filesystem-backed implementations.
 */

import type { InstanceStatus, RunRecord } from "../../core/state.js";

export type { StageExecutor } from "../../core/stage-executor.js";

// =============================================================================
// PORTS
// =============================================================================

export interface RunRecordSink {
  save(record: RunRecord): Promise<void>;
}

export type InstanceTransition = {
  instanceId: string;
  unitId: string;
  stageId: string;
  status: InstanceStatus;
  cached?: boolean;
  detail?: string;
};

export type TransitionListener = (transition: InstanceTransition) => void;
