/*
Purpose: turn arbitrary thrown values into ordered, typed lines for CLI and log output.
Assumptions: UserFacingError carries title/hint/next; everything else is summarized by message.
Stage failures anywhere in the cause chain contribute their unit, stage and fingerprint.
Usage: formatErrorLines(err, { mode: "debug" }).map((line) => line.text)
*/

import { CacheInconsistencyError, ExecutionError, UserFacingError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "unit"
  | "stage"
  | "fingerprint"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "red" | "yellow" | "cyan" | "dim" | "bold";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  red: [31, 39],
  yellow: [33, 39],
  cyan: [36, 39],
  dim: [2, 22],
  bold: [1, 22],
};

// =============================================================================
// MESSAGES
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatErrorLines(
  error: unknown,
  options: { mode: ErrorFormatMode },
): ErrorFormatLine[] {
  const lines: ErrorFormatLine[] = [];

  if (error instanceof UserFacingError) {
    lines.push({ kind: "title", text: error.title });
    lines.push({ kind: "message", text: error.message });
    lines.push(...formatStageLocation(error));
    if (error.hint) lines.push({ kind: "hint", text: error.hint });
    if (error.next) lines.push({ kind: "next", text: error.next });
  } else {
    lines.push({ kind: "title", text: resolveErrorName(error) });
    lines.push({ kind: "message", text: formatErrorMessage(error) });
    lines.push(...formatStageLocation(error));
  }

  if (options.mode !== "debug") {
    return lines;
  }

  if (error instanceof UserFacingError) {
    lines.push({ kind: "code", text: error.code });
  }
  lines.push({ kind: "name", text: resolveErrorName(error) });

  const cause = resolveCause(error);
  if (cause !== undefined) {
    lines.push({ kind: "cause", text: formatErrorMessage(cause) });
  }

  if (error instanceof Error && error.stack) {
    lines.push({ kind: "stack", text: error.stack });
  }

  return lines;
}

export function findStageError(error: unknown): ExecutionError | CacheInconsistencyError | null {
  const seen = new Set<unknown>();
  let current = error;
  while (current !== undefined && !seen.has(current)) {
    if (current instanceof ExecutionError || current instanceof CacheInconsistencyError) {
      return current;
    }
    seen.add(current);
    current = resolveCause(current);
  }
  return null;
}

function formatStageLocation(error: unknown): ErrorFormatLine[] {
  const stageError = findStageError(error);
  if (!stageError) return [];

  const lines: ErrorFormatLine[] = [
    { kind: "unit", text: stageError.unitId },
    { kind: "stage", text: stageError.stageId },
  ];
  if (stageError instanceof CacheInconsistencyError) {
    lines.push({ kind: "fingerprint", text: stageError.fingerprint });
  }
  return lines;
}

// =============================================================================
// COLOR
// =============================================================================

export function resolveColorEnabled(options: {
  stream: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  if (!options.stream.isTTY) return false;
  if (options.useColor !== undefined) return options.useColor;
  return process.env.NO_COLOR === undefined;
}

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  if (!enabled) {
    return (text) => text;
  }

  return (text, styles) =>
    styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\x1b[${open}m${acc}\x1b[${close}m`;
    }, text);
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveErrorName(error: unknown): string {
  if (error instanceof Error) return error.name;
  return "Error";
}

function resolveCause(error: unknown): unknown {
  if (!error || typeof error !== "object" || !("cause" in error)) {
    return undefined;
  }
  return error.cause ?? undefined;
}
