import type { Command } from 'commander';
import { resolve } from 'path';
import type { LoadedConfiguration } from '../config.js';
import { ConfigurationError } from '../errors.js';
import { readWorkspaceLayout, type WorkspaceLayout } from '../pipeline/cargo-metadata.js';
import { defaultOutputDir } from '../pipeline/toolchain.js';
import type { CommandTemplateInput, PipelineConfig, WatchConfig } from '../types.js';
import type { CommandRunner } from '../utils/command-runner.js';

export interface DistCliOptions {
  config?: string;
  logLevel?: string;
  debug?: boolean;
  crate?: string;
  outputDir?: string;
  staticDir?: string;
  appName?: string;
  style?: string;
  release?: boolean;
  profile?: string;
  features?: string[];
  allFeatures?: boolean;
  /** false when `--no-default-features` is given */
  defaultFeatures?: boolean;
  jobs?: string;
  quiet?: boolean;
  verbose?: boolean;
  color?: 'auto' | 'always' | 'never';
  frozen?: boolean;
  locked?: boolean;
  offline?: boolean;
  ignoreRustVersion?: boolean;
  example?: string;
  /** false when `--no-bindgen` is given */
  bindgen?: boolean;
  optimize?: boolean;
  wasmOptVersion?: string;
}

const collect = (value: string, previous: string[] = []): string[] => [...previous, value];

export const applyCommonOptions = (command: Command): Command =>
  command
    .option('-c, --config <path>', 'Path to wasmwright.config.json')
    .option('--log-level <level>', 'Log level (debug, info, warn, error)')
    .option('--debug', 'Shorthand for --log-level debug');

export const applyDistOptions = (command: Command): Command =>
  command
    .option('-p, --crate <name>', 'Crate to build (cargo --package)')
    .option('-o, --output-dir <dir>', 'Output directory (default: <target>/<debug|release>/dist)')
    .option('-s, --static-dir <dir>', 'Directory copied into the output as is')
    .option('--app-name <name>', 'Base name of the generated files')
    .option('--style <entry>', 'Stylesheet entry compiled into <app>.css')
    .option('-r, --release', 'Build in release mode')
    .option('--profile <name>', 'Build with the given cargo profile')
    .option('-F, --features <feature>', 'Feature to activate (repeatable)', collect)
    .option('--all-features', 'Activate all available features')
    .option('--no-default-features', 'Do not activate the default feature')
    .option('-j, --jobs <n>', 'Number of parallel cargo jobs')
    .option('-q, --quiet', 'No cargo output')
    .option('--verbose', 'Verbose cargo output')
    .option('--color <when>', 'Cargo coloring: auto, always, never')
    .option('--frozen', 'Require Cargo.lock and cache are up to date')
    .option('--locked', 'Require Cargo.lock is up to date')
    .option('--offline', 'Run cargo without accessing the network')
    .option('--ignore-rust-version', 'Ignore the rust-version specification in packages')
    .option('--example <name>', 'Build the given example instead of the library')
    .option('--no-bindgen', 'Skip wasm-bindgen and write the plain loader instead')
    .option('--optimize', 'Shrink the module with wasm-opt')
    .option('--wasm-opt-version <version>', 'wasm-opt release to download');

/**
 * Fills in the workspace root and target directory, asking cargo only when
 * the configuration leaves one of them out.
 */
export async function resolveWorkspaceLayout(
  loaded: LoadedConfiguration,
  runner: CommandRunner
): Promise<WorkspaceLayout> {
  const { workspaceRoot, targetDir } = loaded.config.dist;
  if (workspaceRoot && targetDir) {
    return { workspaceRoot, targetDir };
  }
  const layout = await readWorkspaceLayout(runner, loaded.projectRoot);
  return {
    workspaceRoot: workspaceRoot ?? layout.workspaceRoot,
    targetDir: targetDir ?? layout.targetDir,
  };
}

/**
 * Merge the config file's `dist` section with command line flags. Flags win.
 */
export function buildDistConfig(
  options: DistCliOptions,
  loaded: LoadedConfiguration,
  layout: WorkspaceLayout
): PipelineConfig {
  const file = loaded.config.dist;
  const at = (path: string | undefined) => (path ? resolve(path) : undefined);
  const release = options.release ?? file.release ?? false;

  return {
    ...file,
    crateName: options.crate ?? file.crateName ?? '',
    outputDir: at(options.outputDir) ?? file.outputDir ?? defaultOutputDir(layout.targetDir, release),
    staticDir: at(options.staticDir) ?? file.staticDir,
    appName: options.appName ?? file.appName,
    styleEntry: at(options.style) ?? file.styleEntry,
    workspaceRoot: layout.workspaceRoot,
    targetDir: layout.targetDir,
    release,
    profile: options.profile ?? file.profile,
    features: options.features ?? file.features,
    allFeatures: options.allFeatures ?? file.allFeatures,
    noDefaultFeatures: options.defaultFeatures === false ? true : file.noDefaultFeatures,
    jobs: options.jobs ?? file.jobs,
    quiet: options.quiet ?? file.quiet,
    verbose: options.verbose ?? file.verbose,
    color: options.color ?? file.color,
    frozen: options.frozen ?? file.frozen,
    locked: options.locked ?? file.locked,
    offline: options.offline ?? file.offline,
    ignoreRustVersion: options.ignoreRustVersion ?? file.ignoreRustVersion,
    example: options.example ?? file.example,
    bindgen: {
      ...file.bindgen,
      enabled: options.bindgen === false ? false : file.bindgen?.enabled,
    },
    optimize: {
      ...file.optimize,
      enabled: options.optimize ?? file.optimize?.enabled,
      version: options.wasmOptVersion ?? file.optimize?.version,
    },
  };
}

export interface WatchCliOptions {
  watchPath?: string[];
  ignore?: string[];
  debounce?: string;
  gracePeriod?: string;
  /** false when `--no-run-on-start` is given */
  runOnStart?: boolean;
  /** false when `--no-ignore-hidden` is given */
  ignoreHidden?: boolean;
}

export const applyWatchOptions = (command: Command): Command =>
  command
    .option('-w, --watch-path <path>', 'Path to watch (repeatable, default: workspace root)', collect)
    .option('-i, --ignore <pattern>', 'Path prefix or glob to ignore (repeatable)', collect)
    .option('--debounce <ms>', 'Quiet period before re-running, in milliseconds')
    .option('--grace-period <ms>', 'Time between SIGTERM and SIGKILL, in milliseconds')
    .option('--no-ignore-hidden', 'Also react to changes in dot-files and dot-directories');

function parseMilliseconds(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${flag} must be a positive number of milliseconds, got "${value}"`);
  }
  return parsed;
}

/**
 * Merge the config file's `watch` section with flags. The target directory is
 * always ignored so build output never retriggers a build.
 */
export function buildWatchConfig(
  options: WatchCliOptions,
  loaded: LoadedConfiguration,
  layout: WorkspaceLayout,
  command: CommandTemplateInput | undefined
): WatchConfig {
  const file = loaded.config.watch;
  const roots = options.watchPath?.map((path) => resolve(path)) ?? file.roots ?? [layout.workspaceRoot];
  const ignore = [...(file.ignore ?? []), ...(options.ignore ?? []), layout.targetDir];
  const resolvedCommand = command ?? file.command;
  if (!resolvedCommand) {
    throw new ConfigurationError('No command to run: pass one after -- or set watch.command');
  }

  return {
    roots,
    ignore: Array.from(new Set(ignore)),
    debounceMs: parseMilliseconds(options.debounce, '--debounce') ?? file.debounceMs,
    gracePeriodMs: parseMilliseconds(options.gracePeriod, '--grace-period') ?? file.gracePeriodMs,
    ignoreHidden: options.ignoreHidden === false ? false : file.ignoreHidden,
    runOnStart: options.runOnStart === false ? false : file.runOnStart,
    command: resolvedCommand,
  };
}

// Options of `start` that `dist` does not take, and whether each takes a value
const START_ONLY_OPTIONS = new Map<string, boolean>([
  ['--ip', true],
  ['--port', true],
  ['-w', true],
  ['--watch-path', true],
  ['-i', true],
  ['--ignore', true],
  ['--debounce', true],
  ['--grace-period', true],
  ['--no-ignore-hidden', false],
  ['--no-watch', false],
]);

/**
 * The arguments `start` was given, minus its own options, for re-running `dist`.
 */
export function forwardedDistArgs(args: readonly string[]): string[] {
  const forwarded: string[] = [];
  for (let index = 0; index < args.length; index++) {
    const arg = args[index] ?? '';
    const [name] = arg.split('=', 1);
    const takesValue = START_ONLY_OPTIONS.get(name ?? arg);
    if (takesValue === undefined) {
      forwarded.push(arg);
      continue;
    }
    if (takesValue && !arg.includes('=')) {
      index++;
    }
  }
  return forwarded;
}
