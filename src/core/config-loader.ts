import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import { RunSettingsSchema, type RunSettings, type RunSettingsInput } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunSettingsOverrides = {
  execution?: Partial<RunSettingsInput["execution"]>;
  resources?: Partial<NonNullable<RunSettingsInput["resources"]>>;
  workflow?: Partial<NonNullable<RunSettingsInput["workflow"]>>;
};

export type LoadRunSettingsOptions = {
  configPath?: string;
  overrides?: RunSettingsOverrides;
  cwd?: string;
};

type PlainObject = Record<string, unknown>;

const PATH_KEYS = [
  "dataset_dir",
  "output_dir",
  "work_dir",
  "log_dir",
  "fs_subjects_dir",
  "templateflow_home",
] as const;

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = process.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (isPlainObject(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

// =============================================================================
// LAYERING
// =============================================================================

function isPlainObject(value: unknown): value is PlainObject {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

// Later layers win; undefined never clears a lower layer.
export function mergeLayers(base: unknown, overlay: unknown): unknown {
  if (overlay === undefined) return base;
  if (!isPlainObject(base) || !isPlainObject(overlay)) return overlay;

  const merged: PlainObject = { ...base };
  for (const [key, value] of Object.entries(overlay)) {
    if (value === undefined) continue;
    merged[key] = mergeLayers(base[key], value);
  }
  return merged;
}

function resolveExecutionPaths(layer: unknown, baseDir: string): unknown {
  if (!isPlainObject(layer) || !isPlainObject(layer.execution)) return layer;

  const execution: PlainObject = { ...layer.execution };
  for (const key of PATH_KEYS) {
    const value = execution[key];
    if (typeof value === "string" && value.length > 0) {
      execution[key] = path.resolve(baseDir, value);
    }
  }
  return { ...layer, execution };
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

const INVALID_CONFIG_HINT =
  "Fix the settings named above, either in the config file or on the command line.";

type YamlErrorLocation = {
  line: number;
  column: number;
};

function resolveYamlErrorLocation(error: unknown): YamlErrorLocation | null {
  if (!isPlainObject(error)) {
    return null;
  }

  const mark = error.mark;
  if (!isPlainObject(mark)) {
    return null;
  }

  const { line, column } = mark;
  if (typeof line !== "number" || typeof column !== "number") {
    return null;
  }

  return { line: line + 1, column: column + 1 };
}

export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "invalid_enum_value") {
        const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
        return `${location}: Expected one of ${options}, received ${JSON.stringify(issue.received)}`;
      }
      if (issue.code === "unrecognized_keys") {
        return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

function createMissingConfigError(configPath: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Config file missing.",
    message: `Config file not found at ${configPath}.`,
    hint: "Check the --config path.",
  });
}

function createInvalidConfigError(source: string, cause: ConfigError): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Run settings invalid.",
    message: cause.message,
    hint: INVALID_CONFIG_HINT,
    next: `Settings source: ${source}`,
    cause,
  });
}

function throwNormalizedConfigError(error: unknown, source: string): never {
  if (error instanceof UserFacingError) {
    throw error;
  }

  if (error instanceof ConfigError) {
    throw createInvalidConfigError(source, error);
  }

  throw error;
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function readConfigFile(configPath: string): unknown {
  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw createMissingConfigError(absolutePath);
  }

  let raw: string;
  try {
    raw = fs.readFileSync(absolutePath, "utf8");
  } catch (err) {
    throw new ConfigError(`Failed to read config at ${absolutePath}`, err);
  }

  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    const location = resolveYamlErrorLocation(err);
    const locationDetail = location ? ` (line ${location.line}, column ${location.column})` : "";
    throw new ConfigError(`Failed to parse YAML config at ${absolutePath}${locationDetail}: ${detail}`, err);
  }

  if (doc === undefined || doc === null) return {};
  if (!isPlainObject(doc)) {
    throw new ConfigError(`Config at ${absolutePath} must be a mapping of namespaces.`);
  }

  const expanded = expandEnv(doc, { file: absolutePath, trail: [] });
  return resolveExecutionPaths(expanded, path.dirname(absolutePath));
}

export function loadRunSettings(options: LoadRunSettingsOptions = {}): RunSettings {
  const cwd = options.cwd ?? process.cwd();
  const source = options.configPath ? path.resolve(cwd, options.configPath) : "command line";

  try {
    const fileLayer = options.configPath ? readConfigFile(path.resolve(cwd, options.configPath)) : {};
    const overrideLayer = resolveExecutionPaths(options.overrides ?? {}, cwd);
    const merged = mergeLayers(fileLayer, overrideLayer);

    const parsed = RunSettingsSchema.safeParse(merged);
    if (!parsed.success) {
      const details = formatIssues(parsed.error.issues);
      throw new ConfigError(`Invalid run settings:\n${details}`, parsed.error);
    }

    return parsed.data;
  } catch (err) {
    throwNormalizedConfigError(err, source);
  }
}
