import chalk from 'chalk';
import type { Command } from 'commander';
import ora from 'ora';
import {
  BindgenError,
  describeError,
  OptimizationError,
  StyleCompileError,
  ToolchainError,
} from '../../errors.js';
import { closeLogFile, createScopedLogger, NULL_LOGGER } from '../../logger.js';
import { BuildPipeline } from '../../pipeline/build-pipeline.js';
import type { BuildOutput, PipelineConfig } from '../../types.js';
import { brandMessage } from '../../utils/brand.js';
import { formatBuildOutput } from '../../utils/build-status.js';
import { ChildProcessRunner } from '../../utils/command-runner.js';
import {
  applyCommonOptions,
  applyDistOptions,
  buildDistConfig,
  type DistCliOptions,
  resolveWorkspaceLayout,
} from '../options.js';
import { createCommandLogger, exitWithError, loadConfigOrExit } from '../shared.js';

function failureOutput(output: BuildOutput): string | undefined {
  if (output.status.kind !== 'failed') return undefined;
  const { error } = output.status;
  if (
    error instanceof ToolchainError ||
    error instanceof BindgenError ||
    error instanceof StyleCompileError ||
    error instanceof OptimizationError
  ) {
    return error.output || undefined;
  }
  return undefined;
}

export const registerDistCommand = (program: Command): void => {
  const command = program
    .command('dist')
    .description('Build the crate and package it into the output directory');
  applyDistOptions(applyCommonOptions(command)).action(async (options: DistCliOptions) => {
    const loaded = loadConfigOrExit(options.config);
    const logger = await createCommandLogger(loaded, options);
    const runner = new ChildProcessRunner();

    let distConfig: PipelineConfig;
    try {
      const layout = await resolveWorkspaceLayout(loaded, runner);
      distConfig = buildDistConfig(options, loaded, layout);
    } catch (error) {
      return exitWithError(describeError(error));
    }

    // A spinner only makes sense when nothing else writes to the terminal
    const interactive = Boolean(process.stdout.isTTY) && !options.debug && options.logLevel !== 'debug';
    const spinner = interactive
      ? ora({ text: 'Building...', color: 'cyan', spinner: 'dots' }).start()
      : null;

    const pipeline = new BuildPipeline({
      runner,
      cwd: loaded.projectRoot,
      echoOutput: !interactive,
      logger: interactive ? NULL_LOGGER : createScopedLogger(logger, 'dist'),
    });

    let output: BuildOutput;
    try {
      output = await pipeline.run(distConfig);
    } catch (error) {
      spinner?.stop();
      return exitWithError(describeError(error));
    }

    const summary = formatBuildOutput(output);
    if (output.status.kind === 'success') {
      if (spinner) {
        spinner.succeed(summary);
      } else {
        console.log(chalk.green(brandMessage('success', summary)));
      }
      return;
    }

    if (spinner) {
      spinner.fail(summary);
    } else {
      console.error(chalk.red(brandMessage('error', summary)));
    }
    const details = failureOutput(output);
    if (details && interactive) {
      console.error(chalk.dim(details));
    }
    await closeLogFile();
    process.exit(1);
  });
};
