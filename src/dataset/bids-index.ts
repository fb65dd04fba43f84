import fs from "node:fs/promises";
import path from "node:path";

import fg, { type Options as GlobOptions } from "fast-glob";

import type { Modality } from "../core/artifacts.js";
import type { DatasetIndex } from "../core/dataset-index.js";
import { DatasetIndexError } from "../core/errors.js";
import { compareLabels, isMissingFile } from "../core/utils.js";

const MODALITY_LAYOUT: Record<Modality, { dir: string; suffix: string }> = {
  t1w: { dir: "anat", suffix: "T1w" },
  dwi: { dir: "dwi", suffix: "dwi" },
  fmap: { dir: "fmap", suffix: "epi" },
};

// =============================================================================
// FILESYSTEM INDEX
// =============================================================================

export class BidsDatasetIndex implements DatasetIndex {
  private constructor(public readonly root: string) {}

  static async open(root: string): Promise<BidsDatasetIndex> {
    const absoluteRoot = path.resolve(root);
    const descriptionPath = path.join(absoluteRoot, "dataset_description.json");

    try {
      const raw = await fs.readFile(descriptionPath, "utf8");
      JSON.parse(raw);
    } catch (err) {
      if (isMissingFile(err)) {
        throw new DatasetIndexError(
          `Not a BIDS dataset: ${descriptionPath} is missing.`,
          err,
        );
      }
      throw new DatasetIndexError(`Unreadable dataset description at ${descriptionPath}`, err);
    }

    return new BidsDatasetIndex(absoluteRoot);
  }

  async listParticipants(): Promise<string[]> {
    const dirs = await this.glob(["sub-*"], { onlyDirectories: true });
    return dirs.map((dir) => path.basename(dir).slice("sub-".length)).sort(compareLabels);
  }

  async listSessions(participant: string): Promise<string[]> {
    const pattern = `${escape(`sub-${participant}`)}/ses-*`;
    const dirs = await this.glob([pattern], { onlyDirectories: true });
    return dirs.map((dir) => path.basename(dir).slice("ses-".length)).sort(compareLabels);
  }

  async filesFor(participant: string, modality: Modality, session?: string): Promise<string[]> {
    const { dir, suffix } = MODALITY_LAYOUT[modality];
    const subject = escape(`sub-${participant}`);
    const file = `*_${suffix}.nii?(.gz)`;

    const patterns =
      session === undefined
        ? [`${subject}/${dir}/${file}`, `${subject}/ses-*/${dir}/${file}`]
        : [`${subject}/${escape(`ses-${session}`)}/${dir}/${file}`];

    const files = await this.glob(patterns, { onlyFiles: true });
    return files.sort(compareLabels);
  }

  private async glob(patterns: string[], options: GlobOptions): Promise<string[]> {
    try {
      return await fg(patterns, { ...options, cwd: this.root, absolute: true });
    } catch (err) {
      throw new DatasetIndexError(`Failed to index dataset at ${this.root}`, err);
    }
  }
}

function escape(segment: string): string {
  return fg.escapePath(segment);
}
