// Compile, package and optionally shrink a WebAssembly app into a dist directory
import { mkdtemp, readFile, rename, rm, stat } from 'fs/promises';
import { dirname, join, resolve } from 'path';
import { parseWithSchema } from '../config.js';
import {
  ArtifactNotFoundError,
  BindgenError,
  IoError,
  OptimizationError,
  SpawnError,
  StyleCompileError,
  ToolchainError,
  WasmwrightError,
} from '../errors.js';
import { ArtifactFetcher } from '../fetcher/artifact-fetcher.js';
import { type Logger, NULL_LOGGER } from '../logger.js';
import {
  type BuildOutput,
  type CommandTemplate,
  PIPELINE_STAGES,
  type PipelineConfig,
  PipelineConfigSchema,
  type PipelineStage,
  type ResolvedPipelineConfig,
} from '../types.js';
import { writeFileAtomic } from '../utils/atomic-write.js';
import { formatDuration } from '../utils/build-status.js';
import {
  ChildProcessRunner,
  type CommandRunner,
  formatCommand,
  type RunResult,
  tailLines,
} from '../utils/command-runner.js';
import { FileSystemUtils } from '../utils/filesystem.js';
import { isMacPlatform } from '../utils/platform.js';
import { readWorkspaceLayout } from './cargo-metadata.js';
import { readLoaderTemplate, renderLoader } from './loader.js';
import { artifactPath, buildToolchainCommand } from './toolchain.js';

export const DEFAULT_STYLE_COMMAND: CommandTemplate = {
  command: 'sass',
  args: ['--no-source-map'],
};

export const DEFAULT_BINDGEN_COMMAND: CommandTemplate = {
  command: 'wasm-bindgen',
  args: [],
};

const CACHE_DIR_NAME = 'wasmwright-cache';

export interface BuildPipelineOptions {
  runner?: CommandRunner;
  /** Used for the optimize stage; defaults to a fetcher over `cacheDir` */
  fetcher?: ArtifactFetcher;
  logger?: Logger;
  /** Mirror toolchain output to stderr as it runs */
  echoOutput?: boolean;
  /** Base for relative paths in the config */
  cwd?: string;
}

interface BuildContext {
  config: ResolvedPipelineConfig;
  outputDir: string;
  files: string[];
  workspaceRoot?: string;
  targetDir?: string;
  artifact?: string;
  wasm?: Buffer;
  /** JS glue from wasm-bindgen; the template loader is written when absent */
  glue?: string;
  css?: string;
}

export class BuildPipeline {
  private readonly runner: CommandRunner;
  private readonly fetcher?: ArtifactFetcher;
  private readonly logger: Logger;
  private readonly echoOutput: boolean;
  private readonly cwd: string;

  constructor(options: BuildPipelineOptions = {}) {
    this.runner = options.runner ?? new ChildProcessRunner();
    this.fetcher = options.fetcher;
    this.logger = options.logger ?? NULL_LOGGER;
    this.echoOutput = options.echoOutput ?? false;
    this.cwd = options.cwd ?? process.cwd();
  }

  /**
   * Run every stage in order. Stage failures come back in `status`; only an
   * invalid config throws (ConfigurationError).
   */
  public async run(input: PipelineConfig): Promise<BuildOutput> {
    const config = parseWithSchema(PipelineConfigSchema, input, 'dist configuration');
    const startTime = Date.now();
    const context: BuildContext = {
      config,
      outputDir: resolve(this.cwd, config.outputDir),
      files: [],
      workspaceRoot: config.workspaceRoot ? resolve(this.cwd, config.workspaceRoot) : undefined,
      targetDir: config.targetDir ? resolve(this.cwd, config.targetDir) : undefined,
    };

    for (const stage of PIPELINE_STAGES) {
      try {
        await this.runStage(stage, context);
      } catch (error) {
        const stageError = toStageError(stage, error, context);
        const durationMs = Date.now() - startTime;
        this.logger.error(`Stage ${stage} failed after ${formatDuration(durationMs)}: ${stageError.message}`);
        return {
          outputDir: context.outputDir,
          files: context.files,
          status: { kind: 'failed', stage, error: stageError },
          durationMs,
        };
      }
    }

    const durationMs = Date.now() - startTime;
    this.logger.success(`Built ${context.outputDir} in ${formatDuration(durationMs)}`);
    return {
      outputDir: context.outputDir,
      files: context.files,
      status: { kind: 'success' },
      durationMs,
    };
  }

  private async runStage(stage: PipelineStage, context: BuildContext): Promise<void> {
    switch (stage) {
      case 'toolchain':
        return this.compile(context);
      case 'locate-artifact':
        return this.locateArtifact(context);
      case 'bindgen':
        return this.generateBindings(context);
      case 'style':
        return this.compileStyle(context);
      case 'assemble':
        return this.assemble(context);
      case 'optimize':
        return this.optimize(context);
      case 'loader':
        return this.writeLoader(context);
    }
  }

  private async compile(context: BuildContext): Promise<void> {
    const { config } = context;
    const needsMetadata = !context.targetDir || (config.runInWorkspace && !context.workspaceRoot);
    if (needsMetadata) {
      const layout = await readWorkspaceLayout(this.runner, this.cwd);
      context.workspaceRoot ??= layout.workspaceRoot;
      context.targetDir ??= layout.targetDir;
    }
    const targetDir = requireTargetDir(context);

    const artifact = artifactPath(config, targetDir);
    context.artifact = artifact;
    // A module from an earlier build must never be packaged
    await rm(artifact, { force: true });

    const command = buildToolchainCommand(config);
    const cwd = config.runInWorkspace && !command.cwd ? context.workspaceRoot : undefined;
    this.logger.info(`Running ${formatCommand(command)}`);
    const result = await this.runner.run(command, { cwd, echo: this.echoOutput });
    if (result.exitCode !== 0) {
      throw new ToolchainError(
        formatCommand(command),
        result.exitCode,
        tailLines(`${result.stdout}\n${result.stderr}`)
      );
    }
  }

  private async locateArtifact(context: BuildContext): Promise<void> {
    const artifact = context.artifact ?? artifactPath(context.config, requireTargetDir(context));
    try {
      const info = await stat(artifact);
      if (!info.isFile()) {
        throw new ArtifactNotFoundError(artifact);
      }
    } catch (error) {
      if (error instanceof ArtifactNotFoundError) throw error;
      throw new ArtifactNotFoundError(artifact);
    }
    try {
      context.wasm = await readFile(artifact);
    } catch (error) {
      throw new IoError(`Could not read ${artifact}`, artifact, { cause: error });
    }
    this.logger.debug(`Found module ${artifact} (${context.wasm.length} bytes)`);
  }

  /**
   * Run wasm-bindgen over the raw module into a scratch directory under the
   * target dir. Its glue and processed module replace the raw module; the
   * glue is pointed at `<app>.wasm` instead of `<app>_bg.wasm`.
   */
  private async generateBindings(context: BuildContext): Promise<void> {
    const { config } = context;
    if (!config.bindgen.enabled) return;

    const artifact = context.artifact ?? artifactPath(config, requireTargetDir(context));
    const stagingDir = await mkdtemp(join(requireTargetDir(context), 'wasmwright-bindgen-'));
    const base = config.bindgen.command ?? DEFAULT_BINDGEN_COMMAND;
    const command: CommandTemplate = {
      ...base,
      args: [
        ...base.args,
        artifact,
        '--target',
        'web',
        '--out-name',
        config.appName,
        '--out-dir',
        stagingDir,
        ...(config.release ? [] : ['--debug']),
      ],
    };

    try {
      this.logger.info(`Running ${formatCommand(command)}`);
      const result = await this.runner.run(command, { echo: this.echoOutput });
      if (result.exitCode !== 0) {
        throw new BindgenError(
          formatCommand(command),
          result.exitCode,
          tailLines(`${result.stdout}\n${result.stderr}`)
        );
      }

      const gluePath = join(stagingDir, `${config.appName}.js`);
      const modulePath = join(stagingDir, `${config.appName}_bg.wasm`);
      let glue: string;
      try {
        glue = await readFile(gluePath, 'utf8');
        context.wasm = await readFile(modulePath);
      } catch (error) {
        throw new BindgenError(formatCommand(command), 0, '', {
          cause: error,
          message: `wasm-bindgen did not write ${config.appName}.js and ${config.appName}_bg.wasm`,
        });
      }
      context.glue = glue.split(`${config.appName}_bg.wasm`).join(`${config.appName}.wasm`);
      this.logger.debug(`Generated bindings for ${artifact} (${context.wasm.length} bytes)`);
    } finally {
      await rm(stagingDir, { recursive: true, force: true });
    }
  }

  private async compileStyle(context: BuildContext): Promise<void> {
    const { styleEntry, styleCommand } = context.config;
    if (!styleEntry) return;

    const entry = resolve(this.cwd, styleEntry);
    const base = styleCommand ?? DEFAULT_STYLE_COMMAND;
    const command: CommandTemplate = { ...base, args: [...base.args, entry] };
    this.logger.debug(`Compiling stylesheet ${entry}`);

    let result: RunResult;
    try {
      result = await this.runner.run(command);
    } catch (error) {
      throw new StyleCompileError(entry, '', { cause: error });
    }
    if (result.exitCode !== 0) {
      throw new StyleCompileError(entry, tailLines(result.stderr));
    }
    context.css = result.stdout;
  }

  private async assemble(context: BuildContext): Promise<void> {
    const { config, outputDir } = context;
    const wasm = context.wasm;
    if (!wasm) {
      throw new ArtifactNotFoundError(context.artifact ?? config.crateName);
    }

    try {
      await FileSystemUtils.emptyDir(outputDir);
      if (config.staticDir) {
        const staticDir = resolve(this.cwd, config.staticDir);
        const copied = await FileSystemUtils.copyDirContents(staticDir, outputDir);
        for (const file of copied) recordFile(context, file);
      }
      await writeFileAtomic(join(outputDir, `${config.appName}.wasm`), wasm);
      recordFile(context, `${config.appName}.wasm`);
      if (context.css !== undefined) {
        await writeFileAtomic(join(outputDir, `${config.appName}.css`), context.css);
        recordFile(context, `${config.appName}.css`);
      }
    } catch (error) {
      throw new IoError(`Could not assemble ${outputDir}`, outputDir, { cause: error });
    }
  }

  private async optimize(context: BuildContext): Promise<void> {
    const { config, outputDir } = context;
    const { optimize } = config;
    if (!optimize.enabled) return;

    const fetcher =
      this.fetcher ??
      new ArtifactFetcher({
        cacheDir: config.cacheDir
          ? resolve(this.cwd, config.cacheDir)
          : join(requireTargetDir(context), CACHE_DIR_NAME),
        logger: this.logger,
      });
    const binary = await fetcher.resolve('wasm-opt', optimize.version);

    const modulePath = join(outputDir, `${config.appName}.wasm`);
    const optimizedPath = `${modulePath}.opt`;
    const levelArgs = optimize.args ?? [
      '-ol',
      String(optimize.optimizationLevel),
      '-s',
      String(optimize.shrinkLevel),
      ...(optimize.debugInfo ? ['-g'] : []),
    ];
    const command: CommandTemplate = {
      command: binary.path,
      args: [modulePath, '-o', optimizedPath, '-O', ...levelArgs],
      env: isMacPlatform(binary.platform)
        ? { DYLD_LIBRARY_PATH: join(dirname(dirname(binary.path)), 'lib') }
        : undefined,
    };

    this.logger.info(`Optimizing ${modulePath}`);
    try {
      const result = await this.runner.run(command, { echo: this.echoOutput });
      if (result.exitCode !== 0) {
        throw new OptimizationError(
          `wasm-opt exited with ${result.exitCode === null ? 'a signal' : `code ${result.exitCode}`}`,
          tailLines(result.stderr)
        );
      }
      const info = await stat(optimizedPath).catch(() => undefined);
      if (!info || info.size === 0) {
        throw new OptimizationError(`wasm-opt produced no output at ${optimizedPath}`);
      }
      await rename(optimizedPath, modulePath);
    } catch (error) {
      await rm(optimizedPath, { force: true });
      throw error;
    }

    const optimizedSize = (await stat(modulePath)).size;
    if (optimizedSize === 0) {
      throw new OptimizationError(`${modulePath} is empty after optimization`);
    }
    this.logger.debug(`Optimized module is ${optimizedSize} bytes`);
  }

  private async writeLoader(context: BuildContext): Promise<void> {
    const { config, outputDir } = context;
    const fileName = `${config.appName}.js`;
    try {
      const loader =
        context.glue ??
        renderLoader(await readLoaderTemplate(), {
          appName: config.appName,
          stylesheet: context.css !== undefined ? `${config.appName}.css` : undefined,
        });
      await writeFileAtomic(join(outputDir, fileName), loader);
    } catch (error) {
      throw new IoError(`Could not write ${fileName}`, join(outputDir, fileName), { cause: error });
    }
    recordFile(context, fileName);
  }
}

function requireTargetDir(context: BuildContext): string {
  if (!context.targetDir) {
    throw new IoError('Target directory is unknown', context.config.crateName);
  }
  return context.targetDir;
}

function recordFile(context: BuildContext, file: string): void {
  if (!context.files.includes(file)) {
    context.files.push(file);
  }
}

/**
 * Any error a stage raises, as the typed error for that stage. A command that
 * could not be started is reported by the stage that needed it.
 */
function toStageError(stage: PipelineStage, error: unknown, context: BuildContext): WasmwrightError {
  if (error instanceof WasmwrightError && !(error instanceof SpawnError)) {
    return error;
  }
  switch (stage) {
    case 'toolchain':
      return new ToolchainError(error instanceof SpawnError ? error.command : 'cargo build', null, '', {
        cause: error,
      });
    case 'locate-artifact':
      return new ArtifactNotFoundError(context.artifact ?? context.config.crateName);
    case 'bindgen':
      return new BindgenError(error instanceof SpawnError ? error.command : 'wasm-bindgen', null, '', {
        cause: error,
      });
    case 'style':
      return new StyleCompileError(context.config.styleEntry ?? '', '', { cause: error });
    case 'optimize':
      return new OptimizationError(
        error instanceof SpawnError ? 'Could not run wasm-opt' : 'Could not optimize module',
        '',
        { cause: error }
      );
    case 'assemble':
    case 'loader':
      return new IoError(`Stage ${stage} failed`, context.outputDir, { cause: error });
  }
}
