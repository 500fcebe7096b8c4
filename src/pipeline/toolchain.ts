//
//  toolchain.ts
//  wasmwright
//

import { join } from 'path';
import { type CommandTemplate, type ResolvedPipelineConfig, WASM_TARGET_TRIPLE } from '../types.js';

export const DEFAULT_BUILD_COMMAND: CommandTemplate = {
  command: 'cargo',
  args: ['build', '--target', WASM_TARGET_TRIPLE],
};

type ToolchainFlags = Pick<
  ResolvedPipelineConfig,
  | 'quiet'
  | 'jobs'
  | 'profile'
  | 'release'
  | 'features'
  | 'allFeatures'
  | 'noDefaultFeatures'
  | 'verbose'
  | 'color'
  | 'frozen'
  | 'locked'
  | 'offline'
  | 'ignoreRustVersion'
  | 'example'
>;

/**
 * Cargo arguments for the configured flags, in the order cargo documents them.
 */
export function toolchainFlags(flags: ToolchainFlags): string[] {
  const args: string[] = [];
  if (flags.quiet) args.push('--quiet');
  if (flags.jobs) args.push('--jobs', flags.jobs);
  if (flags.profile) args.push('--profile', flags.profile);
  if (flags.release) args.push('--release');
  for (const feature of flags.features) {
    args.push('--features', feature);
  }
  if (flags.allFeatures) args.push('--all-features');
  if (flags.noDefaultFeatures) args.push('--no-default-features');
  if (flags.verbose) args.push('--verbose');
  if (flags.color) args.push('--color', flags.color);
  if (flags.frozen) args.push('--frozen');
  if (flags.locked) args.push('--locked');
  if (flags.offline) args.push('--offline');
  if (flags.ignoreRustVersion) args.push('--ignore-rust-version');
  if (flags.example) args.push('--example', flags.example);
  return args;
}

/**
 * The full build invocation: the base command (default `cargo build --target
 * wasm32-unknown-unknown`) followed by flags and `--package <crate>`.
 */
export function buildToolchainCommand(config: ResolvedPipelineConfig): CommandTemplate {
  const base = config.buildCommand ?? DEFAULT_BUILD_COMMAND;
  return {
    ...base,
    args: [...base.args, ...toolchainFlags(config), '--package', config.crateName],
  };
}

/**
 * Directory name cargo uses for a build profile.
 */
export function profileDirectory(config: Pick<ResolvedPipelineConfig, 'profile' | 'release'>): string {
  if (config.profile) {
    if (config.profile === 'dev' || config.profile === 'test') return 'debug';
    if (config.profile === 'bench') return 'release';
    return config.profile;
  }
  return config.release ? 'release' : 'debug';
}

export function artifactPath(
  config: Pick<ResolvedPipelineConfig, 'profile' | 'release' | 'crateName' | 'example'>,
  targetDir: string
): string {
  const profileDir = join(targetDir, WASM_TARGET_TRIPLE, profileDirectory(config));
  if (config.example) {
    return join(profileDir, 'examples', `${config.example.replace(/-/g, '_')}.wasm`);
  }
  return join(profileDir, `${config.crateName.replace(/-/g, '_')}.wasm`);
}

/**
 * `<targetDir>/<debug|release>/dist`
 */
export function defaultOutputDir(targetDir: string, release: boolean): string {
  return join(targetDir, release ? 'release' : 'debug', 'dist');
}
