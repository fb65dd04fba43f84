import { InvalidArgumentError } from "commander";
import { describe, expect, it, vi } from "vitest";

import {
  DEFAULT_STAGES,
  registerPipelineTestHooks,
  setupWorkspace,
} from "../app/orchestrator/__tests__/pipeline.test-kit.js";

import { graphCommand } from "./graph.js";
import { buildCli, parsePositiveInt } from "./index.js";
import { validateCommand } from "./validate.js";

registerPipelineTestHooks();

describe("buildCli", () => {
  it("registers the pipeline commands", () => {
    expect(buildCli().commands.map((command) => command.name())).toEqual([
      "run",
      "status",
      "graph",
      "validate",
    ]);
  });

  it("accepts only positive integers for resource flags", () => {
    expect(parsePositiveInt("4")).toBe(4);
    expect(() => parsePositiveInt("0")).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt("1.5")).toThrow("Expected a positive integer.");
  });
});

describe("validateCommand", () => {
  it("reports participants, stages and exclusions", async () => {
    const workspace = await setupWorkspace("cli-validate-", ["01", "02"]);
    const lines: string[] = [];
    vi.spyOn(console, "log").mockImplementation((line: unknown) => {
      lines.push(String(line));
    });

    const prepared = await validateCommand(
      workspace.datasetDir,
      workspace.outputDir,
      { participantLabel: ["sub-02"] },
      { index: workspace.index },
    );

    expect(prepared.config.execution.participants).toEqual(["02"]);
    expect(lines[0]).toBe("Participants: 02");
    expect(lines[1]).toBe("Units: 1  Stage instances: 11");
    expect(lines[3]).toBe(`Enabled stages: ${DEFAULT_STAGES.join(", ")}`);
    expect(lines.slice(4)).toEqual([
      "Excluded tissue_segmentation_hsvs: five_tissue_type_algorithm is fsl",
      "Excluded dwi_denoise_patch2self: denoise_method is dwidenoise",
      "Excluded dwi_coregistration_flirt: dwi2t1w_method is epireg",
    ]);
  });
});

describe("graphCommand", () => {
  it("prints one digraph per unit", async () => {
    const workspace = await setupWorkspace("cli-graph-", ["01", "02"]);
    vi.spyOn(process.stdout, "write").mockImplementation(() => true);

    const output = await graphCommand(
      workspace.datasetDir,
      workspace.outputDir,
      { anatOnly: true },
      { index: workspace.index },
    );

    expect(output.startsWith('digraph "01" {\n')).toBe(true);
    expect(output.match(/^digraph /gm)).toEqual(["digraph ", "digraph "]);
    expect(output).toContain('  "02:anat_bias_correction" -> "02:brain_extraction" [label="bias_corrected_t1w"];');
    expect(output).not.toContain("dwi_denoise_mppca");
  });
});
