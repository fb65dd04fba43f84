import { formatErrorMessage } from "../core/error-format.js";
import {
  CacheInconsistencyError,
  ConfigError,
  DatasetIndexError,
  ExecutionError,
  type UserFacingErrorCode,
  UserFacingError,
  USER_FACING_ERROR_CODES,
} from "../core/errors.js";

// =============================================================================
// ERROR NORMALIZATION
// =============================================================================

const CONFIG_HINT = "Check the settings file and command-line flags, then rerun `tractflow validate`.";
const INDEX_HINT =
  "Point <dataset_dir> at a BIDS dataset root containing dataset_description.json and sub-* folders.";

export function normalizeCommandError(error: unknown, title: string): UserFacingError {
  if (error instanceof UserFacingError) {
    return new UserFacingError({
      code: error.code,
      title,
      message: error.message,
      hint: error.hint ?? resolveCommandHint(error),
      next: error.next,
      cause: error.cause ?? error,
    });
  }

  return new UserFacingError({
    code: resolveCommandErrorCode(error),
    title,
    message: formatErrorMessage(error),
    hint: resolveCommandHint(error),
    cause: error,
  });
}

export function resolveCommandErrorCode(error: unknown): UserFacingErrorCode {
  if (error instanceof UserFacingError) {
    return error.code;
  }
  if (error instanceof ConfigError) {
    return USER_FACING_ERROR_CODES.config;
  }
  if (error instanceof DatasetIndexError) {
    return USER_FACING_ERROR_CODES.index;
  }
  if (error instanceof ExecutionError || error instanceof CacheInconsistencyError) {
    return USER_FACING_ERROR_CODES.execution;
  }

  return USER_FACING_ERROR_CODES.unknown;
}

function resolveCommandHint(error: unknown): string | undefined {
  const code = resolveCommandErrorCode(error);
  if (code === USER_FACING_ERROR_CODES.config) return CONFIG_HINT;
  if (code === USER_FACING_ERROR_CODES.index) return INDEX_HINT;
  return undefined;
}
