/*
Purpose: print tractflow errors on stderr, one labelled line per detail.
Assumptions: color only on a TTY; stage failures name their unit and stage on separate lines.
Usage: process.stderr.write(`${renderCliError(err, { debug })}\n`)
*/

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type AnsiStyle,
  type ErrorFormatLine,
  type ErrorFormatLineKind,
} from "../core/error-format.js";

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

type LabelledKind = Exclude<ErrorFormatLineKind, "title" | "message" | "stack">;

const LABELS: Record<LabelledKind, { label: string; styles: AnsiStyle[]; dimText?: boolean }> = {
  unit: { label: "Unit:", styles: ["bold"] },
  stage: { label: "Stage:", styles: ["bold"] },
  fingerprint: { label: "Fingerprint:", styles: ["dim"], dimText: true },
  hint: { label: "Hint:", styles: ["yellow"] },
  next: { label: "Next:", styles: ["cyan"] },
  code: { label: "Code:", styles: ["dim"], dimText: true },
  name: { label: "Name:", styles: ["dim"], dimText: true },
  cause: { label: "Cause:", styles: ["dim"], dimText: true },
};

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const lines = formatErrorLines(error, { mode: options.debug ? "debug" : "short" });
  const format = createAnsiFormatter(
    resolveColorEnabled({ stream: options.stream ?? process.stderr, useColor: options.useColor }),
  );

  return lines.map((line) => renderLine(line, format)).join("\n");
}

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  if (line.kind === "title") {
    return `${format("Error:", ["red", "bold"])} ${format(line.text, ["bold"])}`;
  }
  if (line.kind === "message") {
    return line.text;
  }
  if (line.kind === "stack") {
    const indented = line.text
      .split("\n")
      .map((stackLine) => `  ${stackLine}`)
      .join("\n");
    return `${format("Stack:", ["dim"])}\n${format(indented, ["dim"])}`;
  }

  const { label, styles, dimText } = LABELS[line.kind];
  return `${format(label, styles)} ${dimText ? format(line.text, ["dim"]) : line.text}`;
}
