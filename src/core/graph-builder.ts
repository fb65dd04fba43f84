import { MODALITIES, RAW_KIND_BY_MODALITY, type ArtifactKind } from "./artifacts.js";
import type { RunConfig } from "./config.js";
import type { DatasetIndex } from "./dataset-index.js";
import { ConfigError, DatasetIndexError } from "./errors.js";
import { computeFingerprint, type FingerprintInput } from "./fingerprint.js";
import {
  assertAcyclic,
  instanceIdFor,
  unitIdFor,
  type DagEdge,
  type InputBinding,
  type PipelineDag,
  type ProcessingUnit,
  type StageInstance,
} from "./graph.js";
import type { StageDefinition, StageRegistry } from "./stage-registry.js";

// =============================================================================
// TYPES
// =============================================================================

export type ExcludedStage = {
  stageId: string;
  reason: string;
};

export type StageSelection = {
  enabled: StageDefinition[];
  excluded: ExcludedStage[];
};

export type GraphContext = {
  config: RunConfig;
  index: DatasetIndex;
  registry: StageRegistry;
  selection: StageSelection;
};

export type PipelinePlan = {
  selection: StageSelection;
  units: ProcessingUnit[];
  dags: PipelineDag[];
};

// =============================================================================
// STAGE SELECTION
// =============================================================================

/*
Purpose: decide once per run which catalog entries take part in every unit's graph.
Assumptions: alternates share output kinds and are told apart by their variant setting.
Usage: resolveStageSelection(registry, config) before any buildDag call.
*/
export function resolveStageSelection(registry: StageRegistry, config: RunConfig): StageSelection {
  const excluded: ExcludedStage[] = [];
  let enabled: StageDefinition[] = [];

  for (const definition of registry.list()) {
    if (definition.pipeline === "diffusion" && config.workflow.anat_only) {
      excluded.push({ stageId: definition.id, reason: "anatomical-only mode" });
      continue;
    }
    if (definition.variant) {
      const selected = String(config.workflow[definition.variant.setting]);
      if (selected !== definition.variant.value) {
        excluded.push({
          stageId: definition.id,
          reason: `${definition.variant.setting} is ${selected}`,
        });
        continue;
      }
    }
    enabled.push(definition);
  }

  const producers = new Map<ArtifactKind, string>();
  for (const definition of enabled) {
    for (const kind of definition.outputs) {
      const existing = producers.get(kind);
      if (existing) {
        throw new ConfigError(
          `Stages ${existing} and ${definition.id} both produce ${kind}; select one alternate.`,
        );
      }
      producers.set(kind, definition.id);
    }
  }

  // Drop consumers of kinds nobody produces any more, then their consumers.
  let changed = true;
  while (changed) {
    changed = false;
    const produced = new Set<ArtifactKind>(registry.sourceKinds);
    for (const definition of enabled) {
      for (const kind of definition.outputs) produced.add(kind);
    }

    const kept: StageDefinition[] = [];
    for (const definition of enabled) {
      const missing = definition.inputs.filter((kind) => !produced.has(kind));
      if (missing.length > 0) {
        excluded.push({
          stageId: definition.id,
          reason: `no enabled producer for ${missing.join(", ")}`,
        });
        changed = true;
      } else {
        kept.push(definition);
      }
    }
    enabled = kept;
  }

  return { enabled, excluded };
}

// =============================================================================
// DAG CONSTRUCTION
// =============================================================================

export async function buildDag(unit: ProcessingUnit, ctx: GraphContext): Promise<PipelineDag> {
  const { config, registry, selection } = ctx;

  const available = new Map<ArtifactKind, InputBinding>();
  const fingerprints = new Map<string, string>();

  for (const modality of MODALITIES) {
    const files = await readFiles(ctx.index, unit, modality);
    if (files.length > 0) {
      const kind = RAW_KIND_BY_MODALITY[modality];
      available.set(kind, { kind, source: "dataset", paths: files });
    }
  }

  const instances: StageInstance[] = [];
  const edges: DagEdge[] = [];
  let pending = [...selection.enabled];
  let attached = true;

  while (pending.length > 0 && attached) {
    attached = false;
    const stillPending: StageDefinition[] = [];

    for (const definition of pending) {
      const bindings: InputBinding[] = [];
      for (const kind of definition.inputs) {
        const binding = available.get(kind);
        if (binding) bindings.push(binding);
      }
      if (bindings.length !== definition.inputs.length) {
        stillPending.push(definition);
        continue;
      }

      const id = instanceIdFor(unit.id, definition.id);
      const params = definition.parameters(config.workflow, config.execution);
      const fingerprint = computeFingerprint({
        stage: definition.id,
        version: definition.version,
        params,
        inputs: bindings.map((binding) => toFingerprintInput(binding, fingerprints)),
      });

      instances.push({
        id,
        unitId: unit.id,
        stageId: definition.id,
        definition,
        catalogIndex: registry.catalogIndex(definition.id),
        processSlots: definition.cost.processSlots,
        threads:
          definition.cost.threads === "omp" ? config.resources.omp_nthreads : definition.cost.threads,
        params,
        fingerprint,
        inputs: bindings,
      });
      fingerprints.set(id, fingerprint);

      for (const binding of bindings) {
        if (binding.source === "stage") {
          edges.push({ from: binding.producer, to: id, kind: binding.kind });
        }
      }
      for (const kind of definition.outputs) {
        available.set(kind, { kind, source: "stage", producer: id });
      }
      attached = true;
    }

    pending = stillPending;
  }

  if (pending.length > 0) {
    const details = pending
      .map((definition) => {
        const missing = definition.inputs.filter((kind) => !available.has(kind));
        return `${definition.id} is missing ${missing.join(", ")}`;
      })
      .join("; ");
    throw new ConfigError(`Participant unit ${unit.id} cannot be planned: ${details}`);
  }

  return { unit, instances, edges };
}

function toFingerprintInput(
  binding: InputBinding,
  fingerprints: Map<string, string>,
): FingerprintInput {
  if (binding.source === "dataset") {
    return { kind: binding.kind, source: "dataset", paths: binding.paths };
  }
  const fingerprint = fingerprints.get(binding.producer);
  if (fingerprint === undefined) {
    throw new ConfigError(`Producer ${binding.producer} was bound before it was fingerprinted`);
  }
  return { kind: binding.kind, source: "stage", fingerprint };
}

// =============================================================================
// PLAN
// =============================================================================

export async function resolveUnits(config: RunConfig, index: DatasetIndex): Promise<ProcessingUnit[]> {
  const units: ProcessingUnit[] = [];

  for (const participant of config.execution.participants) {
    const sessions = config.execution.per_session
      ? await guardIndex(() => index.listSessions(participant), `sessions of ${participant}`)
      : [];

    if (sessions.length === 0) {
      units.push({ id: unitIdFor(participant), participant });
      continue;
    }
    for (const session of sessions) {
      units.push({ id: unitIdFor(participant, session), participant, session });
    }
  }

  return units;
}

export async function buildPipelinePlan(args: {
  config: RunConfig;
  index: DatasetIndex;
  registry: StageRegistry;
}): Promise<PipelinePlan> {
  const selection = resolveStageSelection(args.registry, args.config);
  const units = await resolveUnits(args.config, args.index);

  const dags: PipelineDag[] = [];
  for (const unit of units) {
    const dag = await buildDag(unit, { ...args, selection });
    assertAcyclic(dag);
    dags.push(dag);
  }

  return { selection, units, dags };
}

// =============================================================================
// INTERNALS
// =============================================================================

async function readFiles(
  index: DatasetIndex,
  unit: ProcessingUnit,
  modality: (typeof MODALITIES)[number],
): Promise<string[]> {
  return guardIndex(
    () => index.filesFor(unit.participant, modality, unit.session),
    `${modality} files of unit ${unit.id}`,
  );
}

async function guardIndex<T>(read: () => Promise<T>, what: string): Promise<T> {
  try {
    return await read();
  } catch (err) {
    if (err instanceof DatasetIndexError) throw err;
    throw new DatasetIndexError(`Dataset index failed while reading ${what}`, err);
  }
}
