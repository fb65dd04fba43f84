/**
 * Failure containment helpers.
 * Purpose: decide which not-yet-started instances a failure cancels.
 */

import type { FailurePolicy } from "../../../core/config.js";
import { descendantsOf, type PipelineDag } from "../../../core/graph.js";
import type { RunRecord } from "../../../core/state.js";

export type SkipDecision = {
  instanceId: string;
  reason: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function planFailureContainment(input: {
  policy: FailurePolicy;
  failedInstanceId: string;
  dag: PipelineDag;
  dags: PipelineDag[];
  record: RunRecord;
}): SkipDecision[] {
  if (input.policy === "abort") {
    return notStarted(input.record, allInstanceIds(input.dags)).map((instanceId) => ({
      instanceId,
      reason: `run aborted after failure of ${input.failedInstanceId}`,
    }));
  }

  return notStarted(input.record, descendantsOf(input.dag, input.failedInstanceId)).map(
    (instanceId) => ({ instanceId, reason: `upstream failure: ${input.failedInstanceId}` }),
  );
}

// An inconsistent cache entry makes every later result of the unit suspect.
export function planUnitQuarantine(input: {
  policy: FailurePolicy;
  failedInstanceId: string;
  dag: PipelineDag;
  dags: PipelineDag[];
  record: RunRecord;
}): SkipDecision[] {
  if (input.policy === "abort") {
    return planFailureContainment(input);
  }

  return notStarted(
    input.record,
    input.dag.instances.map((instance) => instance.id),
  ).map((instanceId) => ({
    instanceId,
    reason: `cache inconsistency in ${input.failedInstanceId}`,
  }));
}

// =============================================================================
// INTERNALS
// =============================================================================

function allInstanceIds(dags: PipelineDag[]): string[] {
  return dags.flatMap((dag) => dag.instances.map((instance) => instance.id));
}

function notStarted(record: RunRecord, ids: string[]): string[] {
  return ids.filter((id) => {
    const status = record.instances[id]?.status;
    return status === "pending" || status === "ready";
  });
}
