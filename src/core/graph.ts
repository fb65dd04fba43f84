import type { ArtifactKind } from "./artifacts.js";
import { ConfigError } from "./errors.js";
import type { JsonObject } from "./logger.js";
import type { StageDefinition } from "./stage-registry.js";

// =============================================================================
// TYPES
// =============================================================================

export type ProcessingUnit = {
  id: string;
  participant: string;
  session?: string;
};

export type InputBinding =
  | { kind: ArtifactKind; source: "dataset"; paths: string[] }
  | { kind: ArtifactKind; source: "stage"; producer: string };

export type StageInstance = {
  id: string;
  unitId: string;
  stageId: string;
  definition: StageDefinition;
  catalogIndex: number;
  processSlots: number;
  threads: number;
  params: JsonObject;
  fingerprint: string;
  inputs: InputBinding[];
};

export type DagEdge = {
  from: string;
  to: string;
  kind: ArtifactKind;
};

// Instances are stored in a topological order.
export type PipelineDag = {
  unit: ProcessingUnit;
  instances: StageInstance[];
  edges: DagEdge[];
};

// =============================================================================
// IDS
// =============================================================================

export function unitIdFor(participant: string, session?: string): string {
  return session === undefined ? participant : `${participant}_ses-${session}`;
}

export function instanceIdFor(unitId: string, stageId: string): string {
  return `${unitId}:${stageId}`;
}

export function producersOf(instance: StageInstance): string[] {
  const ids: string[] = [];
  for (const binding of instance.inputs) {
    if (binding.source === "stage" && !ids.includes(binding.producer)) {
      ids.push(binding.producer);
    }
  }
  return ids;
}

// =============================================================================
// STRUCTURE CHECKS
// =============================================================================

export function assertAcyclic(dag: PipelineDag): void {
  const ids = new Set(dag.instances.map((instance) => instance.id));
  const inDegree = new Map<string, number>();
  const outgoing = new Map<string, string[]>();

  for (const id of ids) {
    inDegree.set(id, 0);
    outgoing.set(id, []);
  }

  for (const edge of dag.edges) {
    if (!ids.has(edge.from) || !ids.has(edge.to)) {
      throw new ConfigError(
        `Unit ${dag.unit.id}: edge ${edge.from} -> ${edge.to} references an unknown instance`,
      );
    }
    if (edge.from === edge.to) {
      throw new ConfigError(`Unit ${dag.unit.id}: ${edge.from} depends on itself`);
    }
    inDegree.set(edge.to, (inDegree.get(edge.to) ?? 0) + 1);
    outgoing.get(edge.from)?.push(edge.to);
  }

  const queue = [...ids].filter((id) => inDegree.get(id) === 0);
  let visited = 0;

  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined) break;
    visited += 1;
    for (const next of outgoing.get(id) ?? []) {
      const remaining = (inDegree.get(next) ?? 0) - 1;
      inDegree.set(next, remaining);
      if (remaining === 0) queue.push(next);
    }
  }

  if (visited !== ids.size) {
    const cyclic = [...ids].filter((id) => (inDegree.get(id) ?? 0) > 0);
    throw new ConfigError(`Unit ${dag.unit.id}: dependency cycle among ${cyclic.join(", ")}`);
  }
}

export function descendantsOf(dag: PipelineDag, instanceId: string): string[] {
  const reached = new Set<string>();
  const frontier = [instanceId];

  while (frontier.length > 0) {
    const current = frontier.pop();
    if (current === undefined) break;
    for (const edge of dag.edges) {
      if (edge.from === current && !reached.has(edge.to)) {
        reached.add(edge.to);
        frontier.push(edge.to);
      }
    }
  }

  return dag.instances.filter((instance) => reached.has(instance.id)).map((instance) => instance.id);
}
