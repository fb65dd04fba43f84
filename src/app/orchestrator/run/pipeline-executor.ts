/**
 * PipelineExecutor walks every unit's DAG and dispatches ready stage instances.
 * Purpose: apply readiness, budgets, cache reuse and the failure policy in one loop.
 * Assumptions: all RunRecord, budget and cache mutations happen on this loop; the
 * external executors only report outcomes back through the outcome queue.
 * Usage: new PipelineExecutor(options).run(plan.dags, record)
 */

import type { ArtifactLocations } from "../../../core/artifacts.js";
import type { ArtifactCache } from "../../../core/artifact-cache.js";
import { failurePolicyOf, type RunConfig } from "../../../core/config.js";
import { formatErrorMessage } from "../../../core/error-format.js";
import { CacheInconsistencyError, ConfigError, ExecutionError } from "../../../core/errors.js";
import { producersOf, type PipelineDag, type StageInstance } from "../../../core/graph.js";
import { logOrchestratorEvent, type JsonObject, type JsonlLogger } from "../../../core/logger.js";
import { stageWorkDir } from "../../../core/paths.js";
import { ResourceBudget, type ResourceCost } from "../../../core/resource-budget.js";
import { selectDispatchable, sortReady } from "../../../core/scheduler.js";
import type { StageExecutionRequest, StageExecutionResult } from "../../../core/stage-executor.js";
import {
  finalizeRunRecord,
  markInstanceCompleted,
  markInstanceFailed,
  markInstanceReady,
  markInstanceRunning,
  markInstanceSkipped,
  type InstanceStatus,
  type RunRecord,
} from "../../../core/state.js";
import type {
  InstanceTransition,
  RunRecordSink,
  StageExecutor,
  TransitionListener,
} from "../ports.js";

import { planFailureContainment, planUnitQuarantine, type SkipDecision } from "./failure-policy.js";

// =============================================================================
// TYPES
// =============================================================================

export type PipelineExecutorOptions = {
  config: RunConfig;
  executor: StageExecutor;
  cache: ArtifactCache;
  sink: RunRecordSink;
  logger?: JsonlLogger;
  onTransition?: TransitionListener;
};

type Outcome =
  | { instanceId: string; kind: "result"; result: StageExecutionResult }
  | { instanceId: string; kind: "error"; error: unknown };

type Entry = {
  instance: StageInstance;
  dag: PipelineDag;
};

// =============================================================================
// EXECUTOR
// =============================================================================

export class PipelineExecutor {
  private readonly entries = new Map<string, Entry>();
  private readonly order: string[] = [];
  private readonly inFlight = new Map<string, Promise<void>>();
  private readonly outcomes: Outcome[] = [];
  private wake: (() => void) | null = null;
  private aborted = false;
  private dags: PipelineDag[] = [];
  private budget: ResourceBudget;

  constructor(private readonly options: PipelineExecutorOptions) {
    this.budget = new ResourceBudget(
      options.config.resources.nprocs,
      options.config.resources.max_threads,
    );
  }

  get resourceBudget(): ResourceBudget {
    return this.budget;
  }

  async run(dags: PipelineDag[], record: RunRecord): Promise<RunRecord> {
    this.index(dags);
    this.assertCostsFit();

    for (;;) {
      await this.advance(record);

      if (!this.aborted) {
        await this.dispatch(record);
      }

      if (this.inFlight.size === 0) {
        // Instances failed before dispatch leave nothing in flight; other units may still be ready.
        if (this.aborted || this.readyInstances(record).length === 0) break;
        continue;
      }

      await this.nextOutcome();
      // Drain everything that settled so a failure is seen before the next dispatch.
      while (this.outcomes.length > 0) {
        const outcome = this.outcomes.shift();
        if (outcome) await this.settle(record, outcome);
      }
    }

    await this.skipStranded(record);

    finalizeRunRecord(record);
    await this.options.cache.flush();
    await this.options.sink.save(record);
    return record;
  }

  // ===== PLANNING =====

  private index(dags: PipelineDag[]): void {
    this.dags = dags;
    for (const dag of dags) {
      for (const instance of dag.instances) {
        this.entries.set(instance.id, { instance, dag });
        this.order.push(instance.id);
      }
    }
  }

  private assertCostsFit(): void {
    const oversized = [...this.entries.values()]
      .map((entry) => entry.instance)
      .filter((instance) => !this.budget.admits(costOf(instance)));

    if (oversized.length > 0) {
      const details = oversized
        .map((instance) => `${instance.id} (${instance.processSlots} slot(s), ${instance.threads} thread(s))`)
        .join(", ");
      throw new ConfigError(
        `Stage cost exceeds resources (nprocs ${this.budget.maxProcessSlots}, max_threads ${this.budget.maxThreads}): ${details}`,
      );
    }
  }

  // ===== READINESS & CACHE =====

  private async advance(record: RunRecord): Promise<void> {
    let progressed = true;
    while (progressed) {
      const promoted = this.promoteReady(record);
      if (promoted > 0) await this.options.sink.save(record);

      progressed = false;
      if (this.aborted || !this.options.config.execution.reuse_cache) continue;

      const hits = await this.resolveCacheHits(record);
      progressed = hits > 0;
    }
  }

  private promoteReady(record: RunRecord): number {
    let promoted = 0;
    for (const id of this.order) {
      if (this.statusOf(record, id) !== "pending") continue;
      const entry = this.requireEntry(id);
      const producers = producersOf(entry.instance);
      if (producers.every((producer) => this.statusOf(record, producer) === "completed")) {
        markInstanceReady(record, id);
        this.transition(entry.instance, "ready");
        promoted += 1;
      }
    }
    return promoted;
  }

  private async resolveCacheHits(record: RunRecord): Promise<number> {
    let hits = 0;
    for (const instance of this.readyInstances(record)) {
      if (this.aborted) break;
      // A quarantine earlier in this pass may have skipped it.
      if (this.statusOf(record, instance.id) !== "ready") continue;

      const inspection = await this.options.cache.inspect(
        instance.unitId,
        instance.stageId,
        instance.fingerprint,
        instance.definition.outputs,
      );

      if (inspection.status === "stale") {
        this.log("stage.cache_stale", instance, { missing: inspection.missing });
        continue;
      }
      if (inspection.status === "incomplete") {
        await this.quarantine(
          record,
          instance,
          new CacheInconsistencyError(
            { unitId: instance.unitId, stageId: instance.stageId, fingerprint: instance.fingerprint },
            `completion record lacks ${inspection.missingKinds.join(", ")}`,
          ),
        );
        continue;
      }
      if (inspection.status !== "hit") continue;

      markInstanceCompleted(record, instance.id, {
        outputs: inspection.record.outputs,
        cached: true,
      });
      this.transition(instance, "completed", { cached: true });
      await this.options.sink.save(record);
      hits += 1;
    }
    return hits;
  }

  // ===== DISPATCH =====

  private async dispatch(record: RunRecord): Promise<void> {
    const candidates = this.readyInstances(record).filter((instance) => !this.inFlight.has(instance.id));
    const selected = selectDispatchable(candidates, this.budget);

    for (const instance of selected) {
      // An earlier failure in this batch may already have skipped it.
      if (this.statusOf(record, instance.id) !== "ready") {
        this.budget.release(costOf(instance));
        continue;
      }

      let request: StageExecutionRequest;
      try {
        request = this.buildRequest(record, instance);
      } catch (err) {
        this.budget.release(costOf(instance));
        await this.fail(record, instance, formatErrorMessage(err));
        continue;
      }

      markInstanceRunning(record, instance.id);
      this.transition(instance, "running");
      await this.options.sink.save(record);
      this.start(instance.id, request);
    }
  }

  private start(instanceId: string, request: StageExecutionRequest): void {
    const settled = this.options.executor
      .execute(request)
      .then(
        (result): Outcome => ({ instanceId, kind: "result", result }),
        (error: unknown): Outcome => ({ instanceId, kind: "error", error }),
      )
      .then((outcome) => {
        this.outcomes.push(outcome);
        const wake = this.wake;
        this.wake = null;
        wake?.();
      });
    this.inFlight.set(instanceId, settled);
  }

  private nextOutcome(): Promise<void> {
    if (this.outcomes.length > 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.wake = resolve;
    });
  }

  private buildRequest(record: RunRecord, instance: StageInstance): StageExecutionRequest {
    const inputs: ArtifactLocations = {};
    for (const binding of instance.inputs) {
      if (binding.source === "dataset") {
        inputs[binding.kind] = [...binding.paths];
        continue;
      }
      const paths = record.instances[binding.producer]?.outputs?.[binding.kind];
      if (!paths || paths.length === 0) {
        throw new Error(`producer ${binding.producer} recorded no ${binding.kind} output`);
      }
      inputs[binding.kind] = [...paths];
    }

    const { dag } = this.requireEntry(instance.id);
    const execution = this.options.config.execution;
    return {
      runId: record.run_id,
      unitId: instance.unitId,
      participant: dag.unit.participant,
      ...(dag.unit.session !== undefined ? { session: dag.unit.session } : {}),
      stageId: instance.stageId,
      fingerprint: instance.fingerprint,
      inputs,
      params: instance.params,
      threads: instance.threads,
      workDir: stageWorkDir(
        { workDir: execution.work_dir, logDir: execution.log_dir },
        instance.unitId,
        instance.stageId,
        instance.fingerprint,
      ),
    };
  }

  // ===== SETTLEMENT =====

  private async settle(record: RunRecord, outcome: Outcome): Promise<void> {
    const { instance } = this.requireEntry(outcome.instanceId);
    this.inFlight.delete(instance.id);
    this.budget.release(costOf(instance));

    if (outcome.kind === "error") {
      await this.fail(record, instance, formatErrorMessage(outcome.error), outcome.error);
      return;
    }
    if (!outcome.result.ok) {
      await this.fail(record, instance, outcome.result.message);
      return;
    }

    const outputs = outcome.result.outputs;
    const missingKinds = instance.definition.outputs.filter((kind) => (outputs[kind] ?? []).length === 0);
    if (missingKinds.length > 0) {
      await this.fail(record, instance, `executor returned no ${missingKinds.join(", ")}`);
      return;
    }

    try {
      // Cache entry and completed transition land together before either is persisted.
      this.options.cache.record(
        instance.unitId,
        instance.stageId,
        instance.fingerprint,
        outputs,
        record.run_id,
      );
      markInstanceCompleted(record, instance.id, { outputs, cached: false });
    } catch (err) {
      if (err instanceof CacheInconsistencyError) {
        await this.quarantine(record, instance, err);
        return;
      }
      throw err;
    }

    this.transition(instance, "completed", { cached: false });
    await this.options.cache.flush();
    await this.options.sink.save(record);
  }

  private async fail(
    record: RunRecord,
    instance: StageInstance,
    message: string,
    cause?: unknown,
  ): Promise<void> {
    const error = new ExecutionError(
      { unitId: instance.unitId, stageId: instance.stageId },
      message,
      cause,
    );
    markInstanceFailed(record, instance.id, error.message);
    this.transition(instance, "failed", { detail: error.message });

    const { dag } = this.requireEntry(instance.id);
    const policy = failurePolicyOf(this.options.config);
    const decisions = planFailureContainment({
      policy,
      failedInstanceId: instance.id,
      dag,
      dags: this.dags,
      record,
    });

    if (policy === "abort") {
      this.aborted = true;
      this.log("run.abort", instance, { reason: error.message, cancelled: decisions.length });
    }
    this.applySkips(record, decisions);
    await this.options.sink.save(record);
  }

  private async quarantine(
    record: RunRecord,
    instance: StageInstance,
    error: CacheInconsistencyError,
  ): Promise<void> {
    markInstanceFailed(record, instance.id, error.message);
    this.transition(instance, "failed", { detail: error.message });

    const { dag } = this.requireEntry(instance.id);
    const policy = failurePolicyOf(this.options.config);
    const decisions = planUnitQuarantine({
      policy,
      failedInstanceId: instance.id,
      dag,
      dags: this.dags,
      record,
    });

    if (policy === "abort") {
      this.aborted = true;
      this.log("run.abort", instance, { reason: error.message, cancelled: decisions.length });
    }
    this.applySkips(record, decisions);
    await this.options.sink.save(record);
  }

  private applySkips(record: RunRecord, decisions: SkipDecision[]): void {
    for (const decision of decisions) {
      markInstanceSkipped(record, decision.instanceId, decision.reason);
      this.transition(this.requireEntry(decision.instanceId).instance, "skipped", {
        detail: decision.reason,
      });
    }
  }

  // Anything never reached (e.g. behind a stale producer) is closed out explicitly.
  private async skipStranded(record: RunRecord): Promise<void> {
    const decisions: SkipDecision[] = [];
    for (const id of this.order) {
      const status = this.statusOf(record, id);
      if (status === "pending" || status === "ready") {
        decisions.push({ instanceId: id, reason: "upstream did not complete" });
      }
    }
    if (decisions.length === 0) return;
    this.applySkips(record, decisions);
    await this.options.sink.save(record);
  }

  // ===== HELPERS =====

  private readyInstances(record: RunRecord): StageInstance[] {
    const ready: StageInstance[] = [];
    for (const id of this.order) {
      if (this.statusOf(record, id) === "ready") ready.push(this.requireEntry(id).instance);
    }
    return sortReady(ready);
  }

  private statusOf(record: RunRecord, instanceId: string): InstanceStatus | undefined {
    return record.instances[instanceId]?.status;
  }

  private requireEntry(instanceId: string): Entry {
    const entry = this.entries.get(instanceId);
    if (!entry) {
      throw new Error(`Unknown stage instance: ${instanceId}`);
    }
    return entry;
  }

  private transition(
    instance: StageInstance,
    status: InstanceStatus,
    extra: { cached?: boolean; detail?: string } = {},
  ): void {
    const eventType = EVENT_BY_STATUS[status];
    if (eventType) {
      const payload: JsonObject = {};
      if (extra.detail !== undefined) payload.detail = extra.detail;
      if (status === "running") payload.threads = instance.threads;
      const type = status === "completed" && extra.cached ? "stage.cache_hit" : eventType;
      this.log(type, instance, payload);
    }

    const transition: InstanceTransition = {
      instanceId: instance.id,
      unitId: instance.unitId,
      stageId: instance.stageId,
      status,
      ...(extra.cached !== undefined ? { cached: extra.cached } : {}),
      ...(extra.detail !== undefined ? { detail: extra.detail } : {}),
    };
    this.options.onTransition?.(transition);
  }

  private log(type: string, instance: StageInstance, payload: JsonObject = {}): void {
    if (!this.options.logger) return;
    logOrchestratorEvent(this.options.logger, type, {
      unitId: instance.unitId,
      stageId: instance.stageId,
      ...payload,
    });
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

const EVENT_BY_STATUS: Partial<Record<InstanceStatus, string>> = {
  ready: "stage.ready",
  running: "stage.dispatch",
  completed: "stage.complete",
  failed: "stage.failed",
  skipped: "stage.skipped",
};

function costOf(instance: StageInstance): ResourceCost {
  return { processSlots: instance.processSlots, threads: instance.threads };
}
