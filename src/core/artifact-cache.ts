import fs from "node:fs/promises";

import fse from "fs-extra";
import { z } from "zod";

import {
  ArtifactLocationsSchema,
  type ArtifactKind,
  type ArtifactLocations,
} from "./artifacts.js";
import { CacheInconsistencyError, OrchestratorError } from "./errors.js";
import { canonicalJson } from "./fingerprint.js";
import { isMissingFile, isoNow, writeJsonFileAtomic } from "./utils.js";

// =============================================================================
// SCHEMA
// =============================================================================

export const CompletionRecordSchema = z.object({
  unit: z.string(),
  stage: z.string(),
  fingerprint: z.string(),
  outputs: ArtifactLocationsSchema,
  recorded_at: z.string(),
  run_id: z.string().optional(),
});

export type CompletionRecord = z.infer<typeof CompletionRecordSchema>;

const CacheFileSchema = z.object({
  schema_version: z.literal(1),
  entries: z.record(CompletionRecordSchema),
});

type CacheFile = z.infer<typeof CacheFileSchema>;

export type CacheInspection =
  | { status: "hit"; record: CompletionRecord }
  | { status: "miss" }
  | { status: "stale"; record: CompletionRecord; missing: string[] }
  | { status: "incomplete"; record: CompletionRecord; missingKinds: ArtifactKind[] };

// =============================================================================
// CACHE
// =============================================================================

export class ArtifactCache {
  private dirty = false;

  private constructor(
    public readonly filePath: string,
    private readonly entries: Map<string, CompletionRecord>,
  ) {}

  static async load(filePath: string): Promise<ArtifactCache> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf8");
    } catch (err) {
      if (isMissingFile(err)) return new ArtifactCache(filePath, new Map());
      throw new OrchestratorError(`Failed to read artifact cache at ${filePath}`, err);
    }

    let parsed: CacheFile;
    try {
      parsed = CacheFileSchema.parse(JSON.parse(raw));
    } catch (err) {
      throw new OrchestratorError(`Artifact cache at ${filePath} is corrupt`, err);
    }

    return new ArtifactCache(filePath, new Map(Object.entries(parsed.entries)));
  }

  static key(unitId: string, stageId: string, fingerprint: string): string {
    return `${unitId}/${stageId}/${fingerprint}`;
  }

  get size(): number {
    return this.entries.size;
  }

  async lookup(
    unitId: string,
    stageId: string,
    fingerprint: string,
  ): Promise<CompletionRecord | null> {
    const inspection = await this.inspect(unitId, stageId, fingerprint);
    return inspection.status === "hit" ? inspection.record : null;
  }

  /**
   * A record whose output files are gone counts as a miss and is dropped.
   * A record lacking one of `expectedKinds` cannot be reused either; it is
   * dropped and reported as incomplete so the caller can treat it as an
   * inconsistency rather than a plain miss.
   */
  async inspect(
    unitId: string,
    stageId: string,
    fingerprint: string,
    expectedKinds: readonly ArtifactKind[] = [],
  ): Promise<CacheInspection> {
    const key = ArtifactCache.key(unitId, stageId, fingerprint);
    const record = this.entries.get(key);
    if (!record) return { status: "miss" };

    const missingKinds = expectedKinds.filter((kind) => (record.outputs[kind] ?? []).length === 0);
    if (missingKinds.length > 0) {
      this.entries.delete(key);
      this.dirty = true;
      return { status: "incomplete", record, missingKinds };
    }

    const missing: string[] = [];
    for (const paths of Object.values(record.outputs)) {
      for (const filePath of paths ?? []) {
        if (!(await fse.pathExists(filePath))) missing.push(filePath);
      }
    }

    if (missing.length > 0) {
      this.entries.delete(key);
      this.dirty = true;
      return { status: "stale", record, missing };
    }

    return { status: "hit", record };
  }

  /**
   * Synchronous so the caller can pair it with the instance's completed
   * transition before anything is persisted.
   */
  record(
    unitId: string,
    stageId: string,
    fingerprint: string,
    outputs: ArtifactLocations,
    runId?: string,
  ): CompletionRecord {
    const key = ArtifactCache.key(unitId, stageId, fingerprint);
    const existing = this.entries.get(key);

    if (existing) {
      if (canonicalJson(existing.outputs) !== canonicalJson(outputs)) {
        throw new CacheInconsistencyError(
          { unitId, stageId, fingerprint },
          "recorded outputs contradict an existing completion record",
        );
      }
      return existing;
    }

    const record: CompletionRecord = {
      unit: unitId,
      stage: stageId,
      fingerprint,
      outputs,
      recorded_at: isoNow(),
      ...(runId ? { run_id: runId } : {}),
    };
    this.entries.set(key, record);
    this.dirty = true;
    return record;
  }

  async flush(): Promise<void> {
    if (!this.dirty) return;

    const file: CacheFile = {
      schema_version: 1,
      entries: Object.fromEntries(this.entries),
    };
    await writeJsonFileAtomic(this.filePath, file);
    this.dirty = false;
  }
}
