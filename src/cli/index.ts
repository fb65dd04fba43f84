import { Command, InvalidArgumentError, Option } from "commander";

import { LogLevelSchema } from "../core/config.js";

import { graphCommand, type GraphCommandFlags } from "./graph.js";
import { runCommand, type RunCommandFlags } from "./run.js";
import { statusCommand, type StatusCommandFlags } from "./status.js";
import { validateCommand, type ValidateCommandFlags } from "./validate.js";

export function buildCli(): Command {
  const program = new Command();

  program
    .name("tractflow")
    .description("Anatomical and diffusion preprocessing pipeline orchestrator for BIDS datasets")
    .version("0.1.0")
    .option("--debug", "Show error codes, causes and stack traces", false);

  program
    .command("run")
    .description("Build every participant's stage graph and run it")
    .argument("<dataset_dir>", "BIDS dataset root")
    .argument("<output_dir>", "Output directory (work and logs default beneath it)")
    .option("--participant-label <labels...>", "Participant labels to process (with or without sub-)")
    .option("--config <path>", "YAML settings file")
    .option("--run-id <id>", "Run id (default: timestamp); reuse an id to resume that run")
    .option("--nprocs <n>", "Maximum concurrently running stages", parsePositiveInt)
    .option("--omp-nthreads <n>", "Threads given to each multi-threaded stage", parsePositiveInt)
    .option("--max-threads <n>", "Maximum threads across running stages", parsePositiveInt)
    .option("--stop-on-first-crash", "Abort the whole run on the first stage failure")
    .option("--no-stop-on-first-crash", "Keep running unaffected stages after a failure")
    .option("--anat-only", "Run the anatomical stages only")
    .option("--per-session", "Process each session as its own unit")
    .option("--no-reuse-cache", "Ignore completion records from earlier runs")
    .option("--write-graph", "Write each unit's graph as DOT under the work directory")
    .option("--dry-run", "Plan the graphs without running any stage", false)
    .addOption(
      new Option("--log-level <level>", "Console verbosity").choices(LogLevelSchema.options),
    )
    .action(async (datasetDir: string, outputDir: string, opts: RunCommandFlags) => {
      await runCommand(datasetDir, outputDir, opts);
    });

  program
    .command("status")
    .description("Summarize a recorded run")
    .argument("<output_dir>", "Output directory of the run")
    .option("--work-dir <path>", "Work directory (default: <output_dir>/work)")
    .option("--log-dir <path>", "Log directory (default: <output_dir>/logs)")
    .option("--run-id <id>", "Run id (default: latest)")
    .action(async (outputDir: string, opts: StatusCommandFlags) => {
      await statusCommand(outputDir, opts);
    });

  program
    .command("graph")
    .description("Print the planned stage graphs as Graphviz DOT")
    .argument("<dataset_dir>", "BIDS dataset root")
    .argument("<output_dir>", "Output directory")
    .option("--participant-label <labels...>", "Participant labels to include")
    .option("--config <path>", "YAML settings file")
    .option("--anat-only", "Plan the anatomical stages only")
    .option("--per-session", "Plan each session as its own unit")
    .action(async (datasetDir: string, outputDir: string, opts: GraphCommandFlags) => {
      await graphCommand(datasetDir, outputDir, opts);
    });

  program
    .command("validate")
    .description("Check settings and dataset, then report the planned work without running it")
    .argument("<dataset_dir>", "BIDS dataset root")
    .argument("<output_dir>", "Output directory")
    .option("--participant-label <labels...>", "Participant labels to include")
    .option("--config <path>", "YAML settings file")
    .action(async (datasetDir: string, outputDir: string, opts: ValidateCommandFlags) => {
      await validateCommand(datasetDir, outputDir, opts);
    });

  return program;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}
