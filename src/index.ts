#!/usr/bin/env node
import fs from "node:fs";
import { pathToFileURL } from "node:url";

import { CommanderError, type Command } from "commander";

import { resolveCommandErrorCode } from "./cli/command-errors.js";
import { renderCliError } from "./cli/error-format.js";
import { buildCli } from "./cli/index.js";
import { USER_FACING_ERROR_CODES, UserFacingError } from "./core/errors.js";

// 0: run completed. 1: a stage failed or the command crashed. 2: rejected before any stage ran.
export const EXIT_CODES = { ok: 0, failed: 1, rejected: 2 } as const;

const QUIET_EXITS = new Set(["commander.helpDisplayed", "commander.help", "commander.version"]);

export type MainIo = {
  stderr?: { write(chunk: string): unknown; isTTY?: boolean };
};

// =============================================================================
// ERROR HANDLING
// =============================================================================

// Settings are copied to subcommands only when they are created, so apply them to each one.
function routeErrorsToMain(program: Command): void {
  for (const command of [program, ...program.commands]) {
    command.exitOverride();
    command.configureOutput({ outputError: () => undefined });
  }
}

function toReportedError(error: unknown): unknown {
  if (!(error instanceof CommanderError)) return error;

  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Invalid command line.",
    message: error.message.replace(/^error: /, ""),
    hint: "Run `tractflow --help` or `tractflow <command> --help` for usage.",
    cause: error,
  });
}

export function resolveExitCode(error: unknown): number {
  const code = resolveCommandErrorCode(error);
  if (code === USER_FACING_ERROR_CODES.config || code === USER_FACING_ERROR_CODES.index) {
    return EXIT_CODES.rejected;
  }
  return EXIT_CODES.failed;
}

function debugRequested(argv: string[], program: Command): boolean {
  const end = argv.indexOf("--");
  const flags = end === -1 ? argv : argv.slice(0, end);
  return flags.includes("--debug") || program.opts<{ debug?: boolean }>().debug === true;
}

// =============================================================================
// ENTRY
// =============================================================================

export async function main(argv: string[], io: MainIo = {}): Promise<number> {
  const stderr = io.stderr ?? process.stderr;
  const program = buildCli();
  routeErrorsToMain(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError && QUIET_EXITS.has(error.code)) {
      process.exitCode = EXIT_CODES.ok;
      return EXIT_CODES.ok;
    }

    const reported = toReportedError(error);
    stderr.write(`${renderCliError(reported, { debug: debugRequested(argv, program), stream: stderr })}\n`);
    const exitCode = resolveExitCode(reported);
    process.exitCode = exitCode;
    return exitCode;
  }

  return typeof process.exitCode === "number" ? process.exitCode : EXIT_CODES.ok;
}

function isDirectExecution(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  // npm links the bin, so compare against the resolved file.
  const resolved = fs.existsSync(script) ? fs.realpathSync(script) : script;
  return import.meta.url === pathToFileURL(resolved).href;
}

if (isDirectExecution()) {
  void main(process.argv);
}
