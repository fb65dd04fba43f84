import { describe, expect, it } from "vitest";

import {
  CacheInconsistencyError,
  ExecutionError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
} from "../core/errors.js";

import { normalizeCommandError } from "./command-errors.js";
import { renderCliError } from "./error-format.js";

// =============================================================================
// HELPERS
// =============================================================================

const nonTtyStream = { isTTY: false };

function buildUserFacingError(): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Run settings invalid.",
    message: "workflow.n_tracts: n_tracts (20) must not exceed n_raw_tracts (10)",
    hint: "Fix the settings named above.",
    next: "Settings source: /study/settings.yaml",
  });
}

// =============================================================================
// TESTS
// =============================================================================

describe("renderCliError", () => {
  it("renders user-facing errors in short mode without stack output", () => {
    const output = renderCliError(buildUserFacingError(), { stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Run settings invalid.",
        "workflow.n_tracts: n_tracts (20) must not exceed n_raw_tracts (10)",
        "Hint: Fix the settings named above.",
        "Next: Settings source: /study/settings.yaml",
      ].join("\n"),
    );
  });

  it("includes debug details and stack output when debug is enabled", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.execution,
      title: "Run command failed.",
      message: "01/tractography: tckgen failed (exit 1)",
      cause: new Error("boom"),
    });
    error.stack = "UserFacingError: tckgen failed\nat fake:1:1";

    const output = renderCliError(error, { debug: true, stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Run command failed.",
        "01/tractography: tckgen failed (exit 1)",
        "Code: EXECUTION_ERROR",
        "Name: UserFacingError",
        "Cause: boom",
        "Stack:",
        "  UserFacingError: tckgen failed",
        "  at fake:1:1",
      ].join("\n"),
    );
  });

  it("summarizes plain errors by name and message", () => {
    const output = renderCliError(new TypeError("bad value"), { stream: nonTtyStream });

    expect(output).toBe(["Error: TypeError", "bad value"].join("\n"));
  });

  it("names the unit and stage of a wrapped stage failure", () => {
    const error = normalizeCommandError(
      new ExecutionError({ unitId: "01", stageId: "tractography" }, "tckgen failed (exit 1)"),
      "Run command failed.",
    );

    expect(renderCliError(error, { stream: nonTtyStream })).toBe(
      [
        "Error: Run command failed.",
        "01/tractography: tckgen failed (exit 1)",
        "Unit: 01",
        "Stage: tractography",
      ].join("\n"),
    );
  });

  it("adds the fingerprint of an inconsistent cache entry", () => {
    const error = new CacheInconsistencyError(
      { unitId: "02", stageId: "sift_filtering", fingerprint: "fp-test" },
      "recorded outputs contradict an existing completion record",
    );

    expect(renderCliError(error, { stream: nonTtyStream })).toBe(
      [
        "Error: CacheInconsistencyError",
        "02/sift_filtering: recorded outputs contradict an existing completion record (fingerprint fp-test)",
        "Unit: 02",
        "Stage: sift_filtering",
        "Fingerprint: fp-test",
      ].join("\n"),
    );
  });

  it("colors output only for TTY streams", () => {
    const error = buildUserFacingError();

    const plain = renderCliError(error, { stream: nonTtyStream, useColor: true });
    expect(plain).not.toContain("\x1b[");

    const colored = renderCliError(error, { stream: { isTTY: true }, useColor: true });
    expect(colored.split("\n")[0]).toBe(
      "\x1b[1m\x1b[31mError:\x1b[39m\x1b[22m \x1b[1mRun settings invalid.\x1b[22m",
    );
  });
});
