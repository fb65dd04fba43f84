import type { ArtifactKind } from "./artifacts.js";
import type { ResolvedExecution, WorkflowSettings } from "./config.js";
import { RegistryError, StageNotFoundError } from "./errors.js";
import type { JsonObject } from "./logger.js";
import type { ToolStage } from "./stage-executor.js";

// =============================================================================
// TYPES
// =============================================================================

export type StagePipeline = "anatomical" | "diffusion";

// "omp" resolves to resources.omp_nthreads at plan time.
export type ThreadCost = number | "omp";

export type StageCost = {
  processSlots: number;
  threads: ThreadCost;
};

export type VariantSetting = "five_tissue_type_algorithm" | "denoise_method" | "dwi2t1w_method";

export type StageVariant = {
  setting: VariantSetting;
  value: string;
};

export type StageParameters = (
  workflow: Readonly<WorkflowSettings>,
  execution: Readonly<ResolvedExecution>,
) => JsonObject;

export type StageDefinition = {
  readonly id: string;
  readonly pipeline: StagePipeline;
  readonly description: string;
  readonly inputs: readonly ArtifactKind[];
  readonly outputs: readonly ArtifactKind[];
  readonly cost: StageCost;
  readonly variant?: StageVariant;
  readonly version: number;
  readonly parameters: StageParameters;
  readonly tool: ToolStage;
};

// =============================================================================
// REGISTRY
// =============================================================================

export class StageRegistry {
  private readonly definitions: readonly StageDefinition[];
  private readonly byId = new Map<string, StageDefinition>();
  private readonly order = new Map<string, number>();

  constructor(
    definitions: readonly StageDefinition[],
    public readonly sourceKinds: readonly ArtifactKind[],
  ) {
    for (const [index, definition] of definitions.entries()) {
      assertDefinitionShape(definition);
      if (this.byId.has(definition.id)) {
        throw new RegistryError(`Duplicate stage id: ${definition.id}`);
      }
      this.byId.set(definition.id, definition);
      this.order.set(definition.id, index);
    }

    this.definitions = Object.freeze([...definitions]);
    assertReachable(this.definitions, sourceKinds);
  }

  resolve(stageId: string): StageDefinition {
    const definition = this.byId.get(stageId);
    if (!definition) {
      throw new StageNotFoundError(stageId);
    }
    return definition;
  }

  has(stageId: string): boolean {
    return this.byId.has(stageId);
  }

  list(): readonly StageDefinition[] {
    return this.definitions;
  }

  producersOf(kind: ArtifactKind): StageDefinition[] {
    return this.definitions.filter((definition) => definition.outputs.includes(kind));
  }

  catalogIndex(stageId: string): number {
    const index = this.order.get(stageId);
    if (index === undefined) {
      throw new StageNotFoundError(stageId);
    }
    return index;
  }
}

// =============================================================================
// VALIDATION
// =============================================================================

function assertDefinitionShape(definition: StageDefinition): void {
  if (definition.id.length === 0) {
    throw new RegistryError("Stage id must not be empty");
  }
  if (definition.outputs.length === 0) {
    throw new RegistryError(`Stage ${definition.id} declares no outputs`);
  }
  if (!Number.isInteger(definition.cost.processSlots) || definition.cost.processSlots <= 0) {
    throw new RegistryError(
      `Stage ${definition.id} must cost at least one process slot (got ${definition.cost.processSlots})`,
    );
  }
  const { threads } = definition.cost;
  if (threads !== "omp" && (!Number.isInteger(threads) || threads <= 0)) {
    throw new RegistryError(`Stage ${definition.id} has an invalid thread cost (got ${threads})`);
  }
  if (!Number.isInteger(definition.version) || definition.version <= 0) {
    throw new RegistryError(`Stage ${definition.id} has an invalid version (got ${definition.version})`);
  }
}

// Every definition must attach when all alternates are enabled at once.
function assertReachable(
  definitions: readonly StageDefinition[],
  sourceKinds: readonly ArtifactKind[],
): void {
  const available = new Set<ArtifactKind>(sourceKinds);
  let pending = [...definitions];
  let progressed = true;

  while (pending.length > 0 && progressed) {
    progressed = false;
    const stillPending: StageDefinition[] = [];
    for (const definition of pending) {
      if (definition.inputs.every((kind) => available.has(kind))) {
        for (const kind of definition.outputs) available.add(kind);
        progressed = true;
      } else {
        stillPending.push(definition);
      }
    }
    pending = stillPending;
  }

  if (pending.length > 0) {
    const details = pending
      .map((definition) => {
        const missing = definition.inputs.filter((kind) => !available.has(kind));
        return `${definition.id} (missing ${missing.join(", ")})`;
      })
      .join("; ");
    throw new RegistryError(`Unreachable stages in catalog: ${details}`);
  }
}
