import fs from "node:fs/promises";
import { constants as fsConstants } from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import {
  resolveDefaultDirs,
  resolveThreadBudget,
  type RunConfig,
  type RunSettings,
} from "./config.js";
import type { DatasetIndex } from "./dataset-index.js";
import { ConfigError, DatasetIndexError } from "./errors.js";
import { compareLabels, deepFreeze } from "./utils.js";

// =============================================================================
// PARTICIPANTS
// =============================================================================

export function normalizeParticipantLabel(label: string): string {
  const trimmed = label.trim();
  return trimmed.startsWith("sub-") ? trimmed.slice("sub-".length) : trimmed;
}

export async function resolveParticipants(
  requested: readonly string[] | undefined,
  index: DatasetIndex,
): Promise<string[]> {
  let known: string[];
  try {
    known = await index.listParticipants();
  } catch (err) {
    if (err instanceof DatasetIndexError) throw err;
    throw new DatasetIndexError(`Failed to list participants in ${index.root}`, err);
  }

  if (!requested || requested.length === 0) {
    if (known.length === 0) {
      throw new ConfigError(`No participants found in dataset ${index.root}`);
    }
    return [...known].sort(compareLabels);
  }

  const selected = [...new Set(requested.map(normalizeParticipantLabel))];
  const knownSet = new Set(known);
  const unknown = selected.filter((label) => !knownSet.has(label));
  if (unknown.length > 0) {
    throw new ConfigError(
      `Participant label(s) not found in dataset ${index.root}: ${unknown.join(", ")}`,
    );
  }

  return selected.sort(compareLabels);
}

// =============================================================================
// FILESYSTEM CHECKS
// =============================================================================

async function assertReadableDir(dir: string, label: string): Promise<void> {
  try {
    const stat = await fs.stat(dir);
    if (!stat.isDirectory()) {
      throw new ConfigError(`${label} is not a directory: ${dir}`);
    }
    await fs.access(dir, fsConstants.R_OK);
  } catch (err) {
    if (err instanceof ConfigError) throw err;
    throw new ConfigError(`${label} is missing or unreadable: ${dir}`, err);
  }
}

async function ensureWritableDir(dir: string, label: string): Promise<void> {
  try {
    await fse.ensureDir(dir);
    await fs.access(dir, fsConstants.W_OK);
  } catch (err) {
    throw new ConfigError(`${label} cannot be created or written: ${dir}`, err);
  }
}

// =============================================================================
// PUBLIC API
// =============================================================================

export async function buildRunConfig(
  settings: RunSettings,
  index: DatasetIndex,
): Promise<RunConfig> {
  const { participant_label, ...execution } = settings.execution;
  const dirs = resolveDefaultDirs(settings.execution);

  await assertReadableDir(execution.dataset_dir, "Dataset directory");
  if (execution.fs_subjects_dir) {
    await assertReadableDir(execution.fs_subjects_dir, "FreeSurfer subjects directory");
  }

  const participants = await resolveParticipants(participant_label, index);

  await ensureWritableDir(execution.output_dir, "Output directory");
  await ensureWritableDir(dirs.work_dir, "Work directory");
  await ensureWritableDir(dirs.log_dir, "Log directory");

  const config: RunConfig = {
    execution: {
      ...execution,
      dataset_dir: path.resolve(execution.dataset_dir),
      output_dir: path.resolve(execution.output_dir),
      work_dir: path.resolve(dirs.work_dir),
      log_dir: path.resolve(dirs.log_dir),
      templateflow_home: dirs.templateflow_home,
      participants,
    },
    resources: resolveThreadBudget(settings.resources),
    workflow: { ...settings.workflow },
  };

  return deepFreeze(config);
}
