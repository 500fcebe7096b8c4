// Public API
export { ConfigLoader, CONFIG_FILE_NAME, type LoadedConfiguration, parseWithSchema } from './config.js';
export { ChangeWatcher, type ChangeWatcherOptions } from './core/change-watcher.js';
export { Debouncer } from './core/debouncer.js';
export { DevSession } from './core/dev-session.js';
export { IgnoreSet } from './core/ignore-set.js';
export { RebuildLoop } from './core/rebuild-loop.js';
export * from './errors.js';
export { ArtifactFetcher, type ArtifactFetcherOptions } from './fetcher/artifact-fetcher.js';
export { HttpDownloader } from './fetcher/http-downloader.js';
export { DEFAULT_RELEASES, type ToolRelease, WASM_OPT_RELEASE } from './fetcher/releases.js';
export { TarExtractor } from './fetcher/tar-extractor.js';
export type { ArchiveExtractor, Downloader, FileEventSource, StaticServer } from './interfaces.js';
export {
  closeLogFile,
  createLogger,
  createScopedLogger,
  type Logger,
  type LogLevelName,
  NULL_LOGGER,
  SimpleLogger,
} from './logger.js';
export { BuildPipeline, type BuildPipelineOptions } from './pipeline/build-pipeline.js';
export { readWorkspaceLayout, type WorkspaceLayout } from './pipeline/cargo-metadata.js';
export { artifactPath, buildToolchainCommand, defaultOutputDir } from './pipeline/toolchain.js';
export { ProcessSupervisor, type ProcessSupervisorOptions } from './runners/process-supervisor.js';
export { CommandStaticServer } from './server/command-static-server.js';
export * from './types.js';
export { ChildProcessRunner, type CommandRunner, type RunResult } from './utils/command-runner.js';
export { hostPlatform } from './utils/platform.js';
export { ChokidarEventSource } from './watchers/chokidar-source.js';
