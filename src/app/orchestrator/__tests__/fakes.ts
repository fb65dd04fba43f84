/**
 * Orchestrator test fakes.
 * Purpose: deterministic stand-ins for the dataset index and the external executor.
 * Assumptions: fakes are in-memory apart from the output files the executor writes,
 * which the artifact cache needs to find on disk.
 * Usage: pass them to runPipeline({ index, executor }) or PipelineExecutor.
 */

import path from "node:path";

import fse from "fs-extra";

import type { ArtifactLocations, Modality } from "../../../core/artifacts.js";
import type { DatasetIndex } from "../../../core/dataset-index.js";
import type {
  StageExecutionRequest,
  StageExecutionResult,
  StageExecutor,
} from "../../../core/stage-executor.js";
import type { StageRegistry } from "../../../core/stage-registry.js";

// =============================================================================
// DATASET INDEX
// =============================================================================

export type FakeParticipantFiles = Partial<Record<Modality, string[]>>;

export type FakeParticipant = {
  files?: FakeParticipantFiles;
  sessions?: Record<string, FakeParticipantFiles>;
};

export class InMemoryDatasetIndex implements DatasetIndex {
  readonly listCalls: string[] = [];

  constructor(
    public readonly root: string,
    private readonly participants: Record<string, FakeParticipant>,
  ) {}

  async listParticipants(): Promise<string[]> {
    this.listCalls.push("participants");
    return Object.keys(this.participants).sort();
  }

  async listSessions(participant: string): Promise<string[]> {
    return Object.keys(this.participants[participant]?.sessions ?? {}).sort();
  }

  async filesFor(participant: string, modality: Modality, session?: string): Promise<string[]> {
    const entry = this.participants[participant];
    if (!entry) return [];
    const files = session === undefined ? entry.files : entry.sessions?.[session];
    return [...(files?.[modality] ?? [])];
  }
}

// Full anatomical and diffusion inputs for each label.
export function buildDatasetIndex(root: string, labels: string[]): InMemoryDatasetIndex {
  const participants: Record<string, FakeParticipant> = {};
  for (const label of labels) {
    participants[label] = { files: participantFiles(root, label) };
  }
  return new InMemoryDatasetIndex(root, participants);
}

export function participantFiles(root: string, label: string, session?: string): FakeParticipantFiles {
  const base = session
    ? path.join(root, `sub-${label}`, `ses-${session}`)
    : path.join(root, `sub-${label}`);
  const prefix = session ? `sub-${label}_ses-${session}` : `sub-${label}`;
  return {
    t1w: [path.join(base, "anat", `${prefix}_T1w.nii.gz`)],
    dwi: [path.join(base, "dwi", `${prefix}_dwi.nii.gz`)],
    fmap: [path.join(base, "fmap", `${prefix}_dir-PA_epi.nii.gz`)],
  };
}

// =============================================================================
// STAGE EXECUTOR
// =============================================================================

type ScriptedOutcome =
  | { kind: "fail"; message: string }
  | { kind: "throw"; error: Error }
  | { kind: "omit-outputs" };

/*
Purpose: complete every request by writing one placeholder file per declared output kind.
Assumptions: each request costs one process slot; outcomes can be scripted per instance id.
*/
export class FakeStageExecutor implements StageExecutor {
  readonly calls: StageExecutionRequest[] = [];
  private readonly scripted = new Map<string, ScriptedOutcome>();
  private activeSlots = 0;
  private activeThreads = 0;
  private peakSlots = 0;
  private peakThreads = 0;

  constructor(private readonly registry: StageRegistry) {}

  failOn(instanceId: string, message: string): this {
    this.scripted.set(instanceId, { kind: "fail", message });
    return this;
  }

  throwOn(instanceId: string, error: Error): this {
    this.scripted.set(instanceId, { kind: "throw", error });
    return this;
  }

  omitOutputsOn(instanceId: string): this {
    this.scripted.set(instanceId, { kind: "omit-outputs" });
    return this;
  }

  get calledIds(): string[] {
    return this.calls.map((request) => `${request.unitId}:${request.stageId}`);
  }

  get peak(): { processSlots: number; threads: number } {
    return { processSlots: this.peakSlots, threads: this.peakThreads };
  }

  async execute(request: StageExecutionRequest): Promise<StageExecutionResult> {
    this.calls.push(request);
    this.activeSlots += 1;
    this.activeThreads += request.threads;
    this.peakSlots = Math.max(this.peakSlots, this.activeSlots);
    this.peakThreads = Math.max(this.peakThreads, this.activeThreads);

    try {
      await new Promise((resolve) => setTimeout(resolve, 1));

      const outcome = this.scripted.get(`${request.unitId}:${request.stageId}`);
      if (outcome?.kind === "throw") throw outcome.error;
      if (outcome?.kind === "fail") return { ok: false, message: outcome.message };
      if (outcome?.kind === "omit-outputs") return { ok: true, outputs: {} };

      const outputs: ArtifactLocations = {};
      for (const kind of this.registry.resolve(request.stageId).outputs) {
        const filePath = path.join(request.workDir, `${kind}.out`);
        await fse.outputFile(filePath, `${request.fingerprint}\n`);
        outputs[kind] = [filePath];
      }
      return { ok: true, outputs };
    } finally {
      this.activeSlots -= 1;
      this.activeThreads -= request.threads;
    }
  }
}
