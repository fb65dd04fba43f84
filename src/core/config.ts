import os from "node:os";
import path from "node:path";

import { z } from "zod";

// =============================================================================
// EXECUTION
// =============================================================================

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const ExecutionSchema = z
  .object({
    dataset_dir: z.string().min(1),
    output_dir: z.string().min(1),
    work_dir: z.string().min(1).optional(),
    log_dir: z.string().min(1).optional(),
    participant_label: z.array(z.string().min(1)).optional(),
    per_session: z.boolean().default(false),
    log_level: LogLevelSchema.default("info"),
    run_id: z
      .string()
      .regex(/^[A-Za-z0-9._-]+$/, "run_id may only contain letters, digits, '.', '_' and '-'")
      .optional(),
    reuse_cache: z.boolean().default(true),
    write_graph: z.boolean().default(false),
    fs_subjects_dir: z.string().min(1).optional(),
    templateflow_home: z.string().min(1).optional(),
    random_seed: z.number().int().nonnegative().optional(),
  })
  .strict();

// =============================================================================
// RESOURCES
// =============================================================================

const ResourcesSchema = z
  .object({
    nprocs: z.number().int().positive().optional(),
    omp_nthreads: z.number().int().positive().optional(),
    max_threads: z.number().int().positive().optional(),
    stop_on_first_crash: z.boolean().default(true),
  })
  .strict();

// =============================================================================
// WORKFLOW
// =============================================================================

export const FiveTissueTypeAlgorithmSchema = z.enum(["fsl", "hsvs"]);
export const DenoiseMethodSchema = z.enum(["dwidenoise", "patch2self"]);
export const DwiBiasAlgorithmSchema = z.enum(["ants", "fsl"]);
export const CoregistrationMethodSchema = z.enum(["epireg", "flirt"]);
export const ResponseAlgorithmSchema = z.enum(["dhollander", "tournier", "tax", "fa"]);
export const FodAlgorithmSchema = z.enum(["msmt_csd", "csd"]);
export const TrackingAlgorithmSchema = z.enum([
  "iFOD2",
  "iFOD1",
  "SD_Stream",
  "Tensor_Det",
  "Tensor_Prob",
]);

export const DenoiseWindowSchema = z.union([
  z.literal("auto"),
  z
    .number()
    .int()
    .min(3)
    .refine((value) => value % 2 === 1, { message: "Window size must be odd" }),
]);
export type DenoiseWindow = z.infer<typeof DenoiseWindowSchema>;

const WorkflowSchema = z
  .object({
    anat_only: z.boolean().default(false),
    skull_strip_template: z.string().min(1).default("OASIS30ANTs"),
    skull_strip_fixed_seed: z.boolean().default(false),
    five_tissue_type_algorithm: FiveTissueTypeAlgorithmSchema.default("fsl"),
    denoise_method: DenoiseMethodSchema.default("dwidenoise"),
    dwi_denoise_window: DenoiseWindowSchema.default("auto"),
    b0_threshold: z.number().int().positive().default(100),
    eddy_config: z.string().min(1).default("--fwhm=0 --flm='quadratic' --repol"),
    dwi_bias_algorithm: DwiBiasAlgorithmSchema.default("ants"),
    dwi2t1w_method: CoregistrationMethodSchema.default("epireg"),
    dwi2t1w_dof: z.union([z.literal(6), z.literal(12)]).default(6),
    dwi2t1w_init: z.enum(["register", "header"]).default("register"),
    response_algorithm: ResponseAlgorithmSchema.default("dhollander"),
    fod_algorithm: FodAlgorithmSchema.default("msmt_csd"),
    tracking_algorithm: TrackingAlgorithmSchema.default("iFOD2"),
    tracking_max_angle: z.number().positive().max(90).default(45),
    tracking_stepscale: z.number().positive().default(0.5),
    tracking_lenscale_min: z.number().positive().default(30),
    tracking_lenscale_max: z.number().positive().default(500),
    n_raw_tracts: z.number().int().positive().default(10_000_000),
    n_tracts: z.number().int().positive().default(1_000_000),
    fs_scale_gm: z.boolean().default(false),
    debug_sift: z.boolean().default(false),
  })
  .strict();

// =============================================================================
// RUN SETTINGS
// =============================================================================

export const RunSettingsSchema = z
  .object({
    execution: ExecutionSchema,
    resources: ResourcesSchema.default({}),
    workflow: WorkflowSchema.default({}),
  })
  .strict()
  .superRefine((settings, ctx) => {
    const { workflow, resources, execution } = settings;

    if (workflow.n_tracts > workflow.n_raw_tracts) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["workflow", "n_tracts"],
        message: `n_tracts (${workflow.n_tracts}) must not exceed n_raw_tracts (${workflow.n_raw_tracts})`,
      });
    }

    if (workflow.tracking_lenscale_min >= workflow.tracking_lenscale_max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["workflow", "tracking_lenscale_min"],
        message: "tracking_lenscale_min must be smaller than tracking_lenscale_max",
      });
    }

    if (workflow.fod_algorithm === "msmt_csd" && workflow.response_algorithm !== "dhollander") {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["workflow", "fod_algorithm"],
        message: "fod_algorithm msmt_csd requires response_algorithm dhollander",
      });
    }

    const threads = resolveThreadBudget(resources);
    if (threads.omp_nthreads > threads.max_threads) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["resources", "omp_nthreads"],
        message: `omp_nthreads (${threads.omp_nthreads}) must not exceed max_threads (${threads.max_threads})`,
      });
    }

    if (workflow.five_tissue_type_algorithm === "hsvs" && !execution.fs_subjects_dir) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["execution", "fs_subjects_dir"],
        message: "five_tissue_type_algorithm hsvs requires execution.fs_subjects_dir",
      });
    }
  });

export type RunSettings = z.infer<typeof RunSettingsSchema>;
export type RunSettingsInput = z.input<typeof RunSettingsSchema>;
export type ExecutionSettings = RunSettings["execution"];
export type WorkflowSettings = RunSettings["workflow"];

// =============================================================================
// RESOLVED CONFIG
// =============================================================================

export type ResolvedExecution = Omit<
  ExecutionSettings,
  "work_dir" | "log_dir" | "participant_label" | "templateflow_home"
> & {
  work_dir: string;
  log_dir: string;
  templateflow_home: string;
  participants: string[];
};

export type ResolvedResources = {
  nprocs: number;
  omp_nthreads: number;
  max_threads: number;
  stop_on_first_crash: boolean;
};

export type RunConfig = Readonly<{
  execution: Readonly<ResolvedExecution>;
  resources: Readonly<ResolvedResources>;
  workflow: Readonly<WorkflowSettings>;
}>;

export type FailurePolicy = "abort" | "isolate";

export function failurePolicyOf(config: Pick<RunConfig, "resources">): FailurePolicy {
  return config.resources.stop_on_first_crash ? "abort" : "isolate";
}

// =============================================================================
// DEFAULTS
// =============================================================================

const MAX_DEFAULT_OMP_THREADS = 8;

export function resolveThreadBudget(
  resources: RunSettings["resources"],
  cpuCount: number = detectCpuCount(),
): ResolvedResources {
  const nprocs = resources.nprocs ?? cpuCount;
  const omp_nthreads =
    resources.omp_nthreads ??
    Math.min(nprocs > 1 ? nprocs - 1 : cpuCount, MAX_DEFAULT_OMP_THREADS);
  const max_threads = resources.max_threads ?? Math.max(nprocs, omp_nthreads);

  return {
    nprocs,
    omp_nthreads,
    max_threads,
    stop_on_first_crash: resources.stop_on_first_crash,
  };
}

export function resolveDefaultDirs(execution: ExecutionSettings): {
  work_dir: string;
  log_dir: string;
  templateflow_home: string;
} {
  return {
    work_dir: execution.work_dir ?? path.join(execution.output_dir, "work"),
    log_dir: execution.log_dir ?? path.join(execution.output_dir, "logs"),
    templateflow_home:
      execution.templateflow_home ??
      process.env.TEMPLATEFLOW_HOME ??
      path.join(os.homedir(), ".cache", "templateflow"),
  };
}

function detectCpuCount(): number {
  return Math.max(1, os.cpus().length);
}
