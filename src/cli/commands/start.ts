import type { Command } from 'commander';
import { parseWithSchema } from '../../config.js';
import { ChangeWatcher } from '../../core/change-watcher.js';
import { DevSession } from '../../core/dev-session.js';
import { RebuildLoop } from '../../core/rebuild-loop.js';
import { describeError } from '../../errors.js';
import { closeLogFile, createScopedLogger } from '../../logger.js';
import { BuildPipeline } from '../../pipeline/build-pipeline.js';
import { ProcessSupervisor } from '../../runners/process-supervisor.js';
import { CommandStaticServer } from '../../server/command-static-server.js';
import { type PipelineConfig, type ResolvedWatchConfig, ServerConfigSchema, WatchConfigSchema } from '../../types.js';
import { ChildProcessRunner } from '../../utils/command-runner.js';
import {
  applyCommonOptions,
  applyDistOptions,
  applyWatchOptions,
  buildDistConfig,
  buildWatchConfig,
  type DistCliOptions,
  forwardedDistArgs,
  resolveWorkspaceLayout,
  type WatchCliOptions,
} from '../options.js';
import { createCommandLogger, exitWithError, loadConfigOrExit, waitForShutdownSignal } from '../shared.js';

type StartCommandOptions = DistCliOptions &
  WatchCliOptions & {
    ip?: string;
    port?: string;
    /** false when `--no-watch` is given */
    watch?: boolean;
  };

/**
 * `dist` again, in a fresh process, with the flags `start` was given.
 */
function rebuildCommand(argv: readonly string[]) {
  const script = argv[1] ?? '';
  const startIndex = argv.indexOf('start');
  const rest = startIndex >= 0 ? argv.slice(startIndex + 1) : [];
  return {
    command: process.execPath,
    args: [...process.execArgv, script, 'dist', ...forwardedDistArgs(rest)],
  };
}

export const registerStartCommand = (program: Command): void => {
  const command = program
    .command('start')
    .description(
      'Build, serve the output directory and rebuild on change (serves with python3 unless server.command is set)'
    )
    .option('--ip <address>', 'Address the static server binds to')
    .option('--port <number>', 'Port the static server listens on')
    .option('--no-watch', 'Serve a single build without watching for changes');
  applyWatchOptions(applyDistOptions(applyCommonOptions(command))).action(
    async (options: StartCommandOptions) => {
      const loaded = loadConfigOrExit(options.config);
      const logger = await createCommandLogger(loaded, options);
      const runner = new ChildProcessRunner();

      let distConfig: PipelineConfig;
      let watchConfig: ResolvedWatchConfig | undefined;
      let server: CommandStaticServer;
      try {
        const layout = await resolveWorkspaceLayout(loaded, runner);
        distConfig = buildDistConfig(options, loaded, layout);
        if (options.watch !== false) {
          watchConfig = parseWithSchema(
            WatchConfigSchema,
            buildWatchConfig(
              { ...options, runOnStart: false },
              loaded,
              layout,
              rebuildCommand(process.argv)
            ),
            'watch configuration'
          );
        }
        const serverConfig = parseWithSchema(
          ServerConfigSchema,
          {
            ...loaded.config.server,
            ip: options.ip ?? loaded.config.server.ip,
            port: options.port !== undefined ? Number(options.port) : loaded.config.server.port,
          },
          'server configuration'
        );
        server = new CommandStaticServer({
          ip: serverConfig.ip,
          port: serverConfig.port,
          command: serverConfig.command,
          logger: createScopedLogger(logger, 'server'),
        });
      } catch (error) {
        return exitWithError(describeError(error));
      }

      const watchLogger = createScopedLogger(logger, 'watch');
      const loop = watchConfig
        ? new RebuildLoop({
            watcher: new ChangeWatcher({
              roots: watchConfig.roots,
              ignore: [...watchConfig.ignore, distConfig.outputDir],
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
            runOnStart: false,
            logger: watchLogger,
          })
        : undefined;

      const session = new DevSession({
        pipeline: new BuildPipeline({
          runner,
          cwd: loaded.projectRoot,
          echoOutput: true,
          logger: createScopedLogger(logger, 'dist'),
        }),
        server,
        distConfig,
        loop,
        logger,
      });

      try {
        await session.start();
      } catch (error) {
        await session.stop();
        return exitWithError(describeError(error));
      }

      const shutdown = waitForShutdownSignal().then(async (signal) => {
        logger.info(`Received ${signal}, stopping`);
        await session.stop();
      });

      try {
        await session.run();
      } catch (error) {
        await session.stop();
        return exitWithError(describeError(error));
      }
      await shutdown;
      await closeLogFile();
    }
  );
};
