import fs from "node:fs/promises";

import { execa } from "execa";
import fse from "fs-extra";

import type { ArtifactLocations } from "../core/artifacts.js";
import { formatErrorMessage } from "../core/error-format.js";
import { logOrchestratorEvent, type JsonObject, type JsonlLogger } from "../core/logger.js";
import type {
  StageExecutionRequest,
  StageExecutionResult,
  StageExecutor,
  ToolContext,
  ToolPlan,
} from "../core/stage-executor.js";
import type { StageRegistry } from "../core/stage-registry.js";
import { sidecarPath, threadEnv } from "./common.js";

const STDERR_TAIL_LINES = 20;

export type ToolStageExecutorOptions = {
  templateflowHome: string;
  logger?: JsonlLogger;
};

// =============================================================================
// EXECUTOR
// =============================================================================

/*
Purpose: run a stage's external tool plan as child processes inside the instance work dir.
Assumptions: commands run in order and stop at the first non-zero exit.
Usage: new ToolStageExecutor(registry, { templateflowHome }).execute(request)
*/
export class ToolStageExecutor implements StageExecutor {
  constructor(
    private readonly registry: StageRegistry,
    private readonly options: ToolStageExecutorOptions,
  ) {}

  async execute(request: StageExecutionRequest): Promise<StageExecutionResult> {
    const definition = this.registry.resolve(request.stageId);
    await fse.ensureDir(request.workDir);

    let plan: ToolPlan;
    try {
      plan = await definition.tool.plan(request, this.createContext(request));
    } catch (err) {
      return { ok: false, message: `Failed to plan tool commands: ${formatErrorMessage(err)}` };
    }

    for (const step of plan.commands) {
      this.log(request, "tool.start", { command: step.command, args: step.args });

      const result = await execa(step.command, step.args, {
        cwd: request.workDir,
        env: { ...threadEnv(request.threads), ...step.env },
        stdin: "ignore",
        reject: false,
      });

      this.log(request, "tool.exit", {
        command: step.command,
        exit_code: typeof result.exitCode === "number" ? result.exitCode : null,
      });
      if (result.stdout) {
        this.log(request, "tool.output", { command: step.command, stdout: tail(result.stdout) });
      }

      if (result.failed) {
        const detail = tail(result.stderr) || "no diagnostic output";
        return {
          ok: false,
          message: `${step.command} failed (exit ${String(result.exitCode)}): ${detail}`,
        };
      }
    }

    const missing = await findMissingOutputs(plan.outputs);
    if (missing.length > 0) {
      return { ok: false, message: `Declared outputs were not produced: ${missing.join(", ")}` };
    }

    return { ok: true, outputs: plan.outputs };
  }

  private createContext(request: StageExecutionRequest): ToolContext {
    return {
      templateflowHome: this.options.templateflowHome,
      probe: async (command, args) => {
        const result = await execa(command, args, { cwd: request.workDir, stdin: "ignore" });
        return result.stdout;
      },
      exists: (filePath) => fse.pathExists(filePath),
      readSidecar: async (imagePath) => {
        const jsonPath = sidecarPath(imagePath, ".json");
        const parsed: unknown = JSON.parse(await fs.readFile(jsonPath, "utf8"));
        if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
          throw new Error(`Sidecar ${jsonPath} is not a JSON object`);
        }
        return Object.fromEntries(Object.entries(parsed));
      },
    };
  }

  private log(
    request: StageExecutionRequest,
    type: string,
    payload: JsonObject,
  ): void {
    if (!this.options.logger) return;
    logOrchestratorEvent(this.options.logger, type, {
      unitId: request.unitId,
      stageId: request.stageId,
      ...payload,
    });
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

async function findMissingOutputs(outputs: ArtifactLocations): Promise<string[]> {
  const missing: string[] = [];
  for (const paths of Object.values(outputs)) {
    for (const filePath of paths ?? []) {
      if (!(await fse.pathExists(filePath))) missing.push(filePath);
    }
  }
  return missing;
}

function tail(text: string): string {
  return text.trim().split("\n").slice(-STDERR_TAIL_LINES).join("\n");
}
