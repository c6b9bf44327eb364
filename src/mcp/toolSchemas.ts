import * as z from "zod/v4";
import { zParamScalar, zParamValues } from "../ensemble/parameterSpace.js";

export const zFingerprint = z.string().regex(/^sha256:[a-f0-9]{64}$/);

const zArgValue = z.union([z.string(), z.number(), z.null()]);

export const zRunSettingsInput = z.object({
  exe: z.string().min(1),
  exe_args: z.array(z.string()).default([]),
  run_command: z.enum(["aprun", "mpirun"]).nullable().default(null),
  run_args: z.record(z.string(), zArgValue).default({}),
  env_vars: z.record(z.string(), z.string()).default({})
});

export const zQsubBatchInput = z.object({
  nodes: z.number().int().min(1).optional(),
  ncpus: z.number().int().min(1).optional(),
  time: z.string().regex(/^\d+:\d{2}:\d{2}$/, "walltime must be HH:MM:SS").optional(),
  queue: z.string().min(1).optional(),
  account: z.string().min(1).optional(),
  resources: z.record(z.string(), z.union([z.string(), z.number()])).default({}),
  batch_args: z.record(z.string(), zArgValue).default({})
});

export const zRunSettingsView = z.object({
  exe: z.string(),
  exe_args: z.array(z.string()),
  run_command: z.string().nullable(),
  run_args: z.record(z.string(), zArgValue),
  env_vars: z.record(z.string(), z.string())
});

const zEntityView = z.object({
  name: z.string(),
  type: z.string(),
  path: z.string(),
  run_settings: zRunSettingsView,
  launch_command: z.array(z.string())
});

export const zModelView = zEntityView.extend({
  params: z.record(z.string(), zParamScalar),
  key_prefixing: z.boolean(),
  incoming_entities: z.array(z.string())
});

export const zDbNodeView = zEntityView.extend({
  host: z.string().nullable(),
  ports: z.array(z.number().int())
});

export const zEnsembleComposeInput = z.object({
  name: z.string().min(1).max(128),
  params: z.record(z.string(), zParamValues).default({}),
  run_settings: zRunSettingsInput.optional(),
  batch_settings: zQsubBatchInput.optional(),
  perm_strategy: z.enum(["all_perm", "step", "random"]).default("all_perm"),
  replicas: z.number().int().min(1).optional(),
  count: z.number().int().min(0).max(100_000).optional(),
  path: z.string().min(1).optional()
});

export const zEnsembleComposeOutput = z.object({
  fingerprint: zFingerprint,
  ensemble: z.object({
    name: z.string(),
    type: z.literal("Ensemble"),
    path: z.string(),
    strategy: z.string(),
    batch_settings: z.record(z.string(), z.unknown()).nullable(),
    models: z.array(zModelView)
  })
});

export const zOrchestratorComposeInput = z.object({
  name: z.string().min(1).max(128).default("orchestrator"),
  port: z.number().int().min(1).max(65535).optional(),
  db_nodes: z.number().int().min(1).max(4096).default(1),
  batch: z.boolean().default(true),
  // Left open so unsupported launchers are reported with the supported set.
  run_command: z.string().min(1).default("aprun"),
  hosts: z.array(z.string().min(1)).optional(),
  run_args: z.record(z.string(), zArgValue).default({}),
  account: z.string().min(1).optional(),
  time: z.string().regex(/^\d+:\d{2}:\d{2}$/, "walltime must be HH:MM:SS").optional(),
  queue: z.string().min(1).optional(),
  cpus: z.number().int().min(1).optional(),
  batch_args: z.record(z.string(), zArgValue).default({}),
  threads_per_queue: z.number().int().min(1).optional(),
  inter_op_threads: z.number().int().min(1).optional(),
  intra_op_threads: z.number().int().min(1).optional(),
  path: z.string().min(1).optional()
});

export const zOrchestratorComposeOutput = z.object({
  fingerprint: zFingerprint,
  topology: z.object({
    name: z.string(),
    type: z.literal("Orchestrator"),
    path: z.string(),
    db_nodes: z.number().int(),
    cluster: z.boolean(),
    batch: z.boolean(),
    run_command: z.string(),
    ports: z.array(z.number().int()),
    nodes: z.array(zDbNodeView),
    batch_settings: z.record(z.string(), z.unknown()).nullable()
  }),
  batch_script: z.string().nullable()
});

export type RunSettingsInput = z.output<typeof zRunSettingsInput>;
export type QsubBatchInput = z.output<typeof zQsubBatchInput>;
