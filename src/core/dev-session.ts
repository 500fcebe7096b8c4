import type { StaticServer } from '../interfaces.js';
import { type Logger, NULL_LOGGER } from '../logger.js';
import type { BuildPipeline } from '../pipeline/build-pipeline.js';
import type { BuildOutput, PipelineConfig } from '../types.js';
import { formatBuildOutput, isSuccess } from '../utils/build-status.js';
import type { RebuildLoop } from './rebuild-loop.js';

interface DevSessionDeps {
  pipeline: BuildPipeline;
  server: StaticServer;
  distConfig: PipelineConfig;
  /** Rebuilds on change while serving; omit to serve a single build */
  loop?: RebuildLoop;
  logger?: Logger;
}

/**
 * `start`: build once, serve the output directory and, when a loop is given,
 * keep rebuilding until stopped.
 */
export class DevSession {
  private readonly pipeline: BuildPipeline;
  private readonly server: StaticServer;
  private readonly distConfig: PipelineConfig;
  private readonly loop?: RebuildLoop;
  private readonly logger: Logger;
  private serving = false;
  private markStopped: () => void = () => undefined;
  private readonly stopped = new Promise<void>((resolve) => {
    this.markStopped = resolve;
  });

  constructor({ pipeline, server, distConfig, loop, logger }: DevSessionDeps) {
    this.pipeline = pipeline;
    this.server = server;
    this.distConfig = distConfig;
    this.loop = loop;
    this.logger = logger ?? NULL_LOGGER;
  }

  /**
   * Returns the first build's output. A failed build is reported but the
   * server still starts, so a later rebuild can fill the directory.
   */
  public async start(): Promise<BuildOutput> {
    const output = await this.pipeline.run(this.distConfig);
    if (isSuccess(output.status)) {
      this.logger.success(formatBuildOutput(output));
    } else {
      this.logger.error(formatBuildOutput(output));
    }

    await this.server.start(output.outputDir);
    this.serving = true;
    this.logger.info(`Listening on ${this.server.url}`);
    return output;
  }

  /**
   * Resolves once `stop()` has been called (or the rebuild loop has ended).
   */
  public async run(): Promise<void> {
    if (this.loop) {
      await this.loop.run();
      return;
    }
    this.logger.debug('No watch loop configured; serving until stopped');
    await this.stopped;
  }

  public async stop(): Promise<void> {
    this.markStopped();
    if (this.loop) {
      await this.loop.stop();
    }
    if (this.serving) {
      this.serving = false;
      await this.server.stop();
    }
  }
}
