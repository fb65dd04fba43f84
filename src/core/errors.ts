export class OrchestratorError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "OrchestratorError";
  }
}

export class ConfigError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

// Catalog bugs: the stage registry itself is inconsistent.
export class RegistryError extends ConfigError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "RegistryError";
  }
}

export class StageNotFoundError extends ConfigError {
  constructor(public readonly stageId: string) {
    super(`Unknown stage: ${stageId}`);
    this.name = "StageNotFoundError";
  }
}

export class DatasetIndexError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "DatasetIndexError";
  }
}

export type ExecutionErrorContext = {
  unitId: string;
  stageId: string;
};

export class ExecutionError extends OrchestratorError {
  readonly unitId: string;
  readonly stageId: string;

  constructor(context: ExecutionErrorContext, message: string, cause?: unknown) {
    super(`${context.unitId}/${context.stageId}: ${message}`, cause);
    this.name = "ExecutionError";
    this.unitId = context.unitId;
    this.stageId = context.stageId;
  }
}

export class CacheInconsistencyError extends OrchestratorError {
  readonly unitId: string;
  readonly stageId: string;
  readonly fingerprint: string;

  constructor(context: ExecutionErrorContext & { fingerprint: string }, message: string) {
    super(
      `${context.unitId}/${context.stageId}: ${message} (fingerprint ${context.fingerprint})`,
    );
    this.name = "CacheInconsistencyError";
    this.unitId = context.unitId;
    this.stageId = context.stageId;
    this.fingerprint = context.fingerprint;
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  index: "INDEX_ERROR",
  execution: "EXECUTION_ERROR",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;
  readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}
