// wasmwright configuration and result types
import { z } from 'zod';
import type { WasmwrightError } from './errors.js';

export const DEFAULT_APP_NAME = 'app';
export const DEFAULT_DEBOUNCE_MS = 2000;
export const DEFAULT_GRACE_PERIOD_MS = 2000;
export const DEFAULT_WASM_OPT_VERSION = '117';
export const WASM_TARGET_TRIPLE = 'wasm32-unknown-unknown';

/**
 * An external process invocation: executable, argument list, working directory
 * and extra environment.
 */
export const CommandTemplateSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  cwd: z.string().optional(),
  env: z.record(z.string(), z.string()).optional(),
});

export type CommandTemplate = z.output<typeof CommandTemplateSchema>;
export type CommandTemplateInput = z.input<typeof CommandTemplateSchema>;

export const OptimizeConfigSchema = z.object({
  enabled: z.boolean().default(false),
  version: z.string().min(1).default(DEFAULT_WASM_OPT_VERSION),
  /** Replaces the default `-ol/-s/-g` arguments when given */
  args: z.array(z.string()).optional(),
  optimizationLevel: z.number().int().min(0).max(4).default(2),
  shrinkLevel: z.number().int().min(0).max(2).default(1),
  debugInfo: z.boolean().default(false),
});

export type OptimizeConfig = z.output<typeof OptimizeConfigSchema>;

export const BindgenConfigSchema = z.object({
  enabled: z.boolean().default(true),
  /** Replaces `wasm-bindgen`; the module and output flags are appended */
  command: CommandTemplateSchema.optional(),
});

export type BindgenConfig = z.output<typeof BindgenConfigSchema>;

export const PipelineConfigSchema = z.object({
  outputDir: z.string().min(1, 'outputDir must not be empty'),
  staticDir: z.string().min(1).optional(),
  crateName: z.string().min(1, 'crateName is required (--crate or dist.crateName)'),
  appName: z.string().min(1).default(DEFAULT_APP_NAME),
  runInWorkspace: z.boolean().default(true),
  /** Overrides `cargo metadata` */
  workspaceRoot: z.string().optional(),
  /** Overrides `cargo metadata` */
  targetDir: z.string().optional(),
  styleEntry: z.string().min(1).optional(),
  styleCommand: CommandTemplateSchema.optional(),
  buildCommand: CommandTemplateSchema.optional(),
  release: z.boolean().default(false),
  profile: z.string().min(1).optional(),
  features: z.array(z.string()).default([]),
  allFeatures: z.boolean().default(false),
  noDefaultFeatures: z.boolean().default(false),
  jobs: z.string().optional(),
  quiet: z.boolean().default(false),
  verbose: z.boolean().default(false),
  color: z.enum(['auto', 'always', 'never']).optional(),
  frozen: z.boolean().default(false),
  locked: z.boolean().default(false),
  offline: z.boolean().default(false),
  ignoreRustVersion: z.boolean().default(false),
  example: z.string().min(1).optional(),
  bindgen: BindgenConfigSchema.default({}),
  optimize: OptimizeConfigSchema.default({}),
  /** Where downloaded tools are kept; defaults to `<targetDir>/wasmwright-cache` */
  cacheDir: z.string().optional(),
});

export type PipelineConfig = z.input<typeof PipelineConfigSchema>;
export type ResolvedPipelineConfig = z.output<typeof PipelineConfigSchema>;

export const WatchConfigSchema = z.object({
  roots: z.array(z.string().min(1)).min(1, 'at least one watch root is required'),
  ignore: z.array(z.string().min(1)).default([]),
  debounceMs: z.number().positive().default(DEFAULT_DEBOUNCE_MS),
  ignoreHidden: z.boolean().default(true),
  runOnStart: z.boolean().default(true),
  gracePeriodMs: z.number().positive().default(DEFAULT_GRACE_PERIOD_MS),
  command: CommandTemplateSchema,
});

export type WatchConfig = z.input<typeof WatchConfigSchema>;
export type ResolvedWatchConfig = z.output<typeof WatchConfigSchema>;

export const ServerConfigSchema = z.object({
  ip: z.string().min(1).default('127.0.0.1'),
  port: z.number().int().min(0).max(65535).default(8000),
  /** Static server command; `{dir}`, `{ip}` and `{port}` are substituted */
  command: CommandTemplateSchema.optional(),
});

export type ServerConfig = z.output<typeof ServerConfigSchema>;

/**
 * Shape of `wasmwright.config.json`. Sections are partial; the CLI fills the
 * rest from flags and cargo metadata before validating the full schemas.
 */
export const ProjectConfigSchema = z.object({
  dist: PipelineConfigSchema.partial().default({}),
  watch: WatchConfigSchema.partial().default({}),
  server: ServerConfigSchema.default({}),
  logging: z
    .object({
      file: z.string().optional(),
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    })
    .default({}),
});

export type ProjectConfig = z.output<typeof ProjectConfigSchema>;

/**
 * Pipeline stages, in execution order.
 */
export const PIPELINE_STAGES = [
  'toolchain',
  'locate-artifact',
  'bindgen',
  'style',
  'assemble',
  'optimize',
  'loader',
] as const;

export type PipelineStage = (typeof PIPELINE_STAGES)[number];

export type BuildStatus =
  | { kind: 'success' }
  | { kind: 'failed'; stage: PipelineStage; error: WasmwrightError };

export interface BuildOutput {
  outputDir: string;
  /** Files written to the output directory, in write order */
  files: string[];
  status: BuildStatus;
  durationMs: number;
}

export interface CachedBinary {
  name: string;
  version: string;
  platform: string;
  path: string;
  executable: boolean;
}

export type ChangeKind = 'created' | 'modified' | 'removed';

export interface ChangeEvent {
  timestamp: number;
  path: string;
  kind: ChangeKind;
}

/**
 * One debounced trigger. Carries the coalesced paths for log output only.
 */
export interface ChangeSignal {
  eventCount: number;
  paths: string[];
  firedAt: number;
}

export type ProcessOutcome =
  | { state: 'not-started' }
  | { state: 'running'; pid: number }
  | { state: 'exited'; code: number | null; signal: NodeJS.Signals | null }
  | { state: 'killed' };
