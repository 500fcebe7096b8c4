import type { Command } from 'commander';
import { parseWithSchema } from '../../config.js';
import { ChangeWatcher } from '../../core/change-watcher.js';
import { RebuildLoop } from '../../core/rebuild-loop.js';
import { describeError } from '../../errors.js';
import { closeLogFile, createScopedLogger } from '../../logger.js';
import { ProcessSupervisor } from '../../runners/process-supervisor.js';
import { type ResolvedWatchConfig, WatchConfigSchema } from '../../types.js';
import { ChildProcessRunner } from '../../utils/command-runner.js';
import {
  applyCommonOptions,
  applyWatchOptions,
  buildWatchConfig,
  resolveWorkspaceLayout,
  type WatchCliOptions,
} from '../options.js';
import {
  createCommandLogger,
  exitWithError,
  type LoggingCliOptions,
  loadConfigOrExit,
  waitForShutdownSignal,
} from '../shared.js';

type WatchCommandOptions = WatchCliOptions & LoggingCliOptions & { config?: string };

export const registerWatchCommand = (program: Command): void => {
  const command = program
    .command('watch')
    .description('Re-run a command whenever the watched files change')
    .argument('[command...]', 'Command to run (put it after --)')
    .option('--no-run-on-start', 'Wait for the first change before running the command');
  applyWatchOptions(applyCommonOptions(command)).action(
    async (commandParts: string[], options: WatchCommandOptions) => {
      const loaded = loadConfigOrExit(options.config);
      const logger = await createCommandLogger(loaded, options);

      let watchConfig: ResolvedWatchConfig;
      try {
        const layout = await resolveWorkspaceLayout(loaded, new ChildProcessRunner());
        const [executable, ...args] = commandParts;
        const commandTemplate = executable ? { command: executable, args } : undefined;
        watchConfig = parseWithSchema(
          WatchConfigSchema,
          buildWatchConfig(options, loaded, layout, commandTemplate),
          'watch configuration'
        );
      } catch (error) {
        return exitWithError(describeError(error));
      }

      const watchLogger = createScopedLogger(logger, 'watch');
      const loop = new RebuildLoop({
        watcher: new ChangeWatcher({
          roots: watchConfig.roots,
          ignore: watchConfig.ignore,
          debounceMs: watchConfig.debounceMs,
          ignoreHidden: watchConfig.ignoreHidden,
          cwd: loaded.projectRoot,
          logger: watchLogger,
        }),
        supervisor: new ProcessSupervisor({
          gracePeriodMs: watchConfig.gracePeriodMs,
          logger: watchLogger,
        }),
        command: watchConfig.command,
        runOnStart: watchConfig.runOnStart,
        logger: watchLogger,
      });

      const shutdown = waitForShutdownSignal().then(async (signal) => {
        watchLogger.info(`Received ${signal}, stopping`);
        await loop.stop();
      });

      try {
        await loop.run();
      } catch (error) {
        return exitWithError(describeError(error));
      }
      await shutdown;
      await closeLogFile();
    }
  );
};
