import type { StageInstance } from "./graph.js";
import type { ResourceBudget } from "./resource-budget.js";
import { compareLabels } from "./utils.js";

// =============================================================================
// ORDERING
// =============================================================================

export function compareInstances(a: StageInstance, b: StageInstance): number {
  const byUnit = compareLabels(a.unitId, b.unitId);
  if (byUnit !== 0) return byUnit;
  return a.catalogIndex - b.catalogIndex;
}

export function sortReady(ready: StageInstance[]): StageInstance[] {
  return [...ready].sort(compareInstances);
}

// =============================================================================
// DISPATCH SELECTION
// =============================================================================

/**
 * Greedy pass over ready instances in deterministic order. An instance that
 * does not fit the remaining budget is passed over for a later one that does.
 * Reserves budget for every selected instance.
 */
export function selectDispatchable(
  ready: StageInstance[],
  budget: ResourceBudget,
): StageInstance[] {
  const selected: StageInstance[] = [];

  for (const instance of sortReady(ready)) {
    const cost = { processSlots: instance.processSlots, threads: instance.threads };
    if (!budget.canFit(cost)) continue;
    budget.reserve(cost);
    selected.push(instance);
  }

  return selected;
}
