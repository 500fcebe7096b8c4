// Error taxonomy shared by the pipeline, the fetcher and the watch loop

export type ErrorCode =
  | 'TOOLCHAIN_FAILED'
  | 'BINDGEN_FAILED'
  | 'ARTIFACT_NOT_FOUND'
  | 'STYLE_COMPILE_FAILED'
  | 'IO_FAILED'
  | 'OPTIMIZATION_FAILED'
  | 'NETWORK_FAILED'
  | 'UNSUPPORTED_PLATFORM'
  | 'VERIFICATION_FAILED'
  | 'SPAWN_FAILED'
  | 'ALREADY_RUNNING'
  | 'INVALID_CONFIGURATION'
  | 'WATCHER_INIT_FAILED';

export abstract class WasmwrightError extends Error {
  public abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

function exitMessage(command: string, exitCode: number | null, cause: unknown): string {
  if (exitCode === null && cause !== undefined) {
    return `Could not run ${command}`;
  }
  return `${command} exited with ${exitCode === null ? 'a signal' : `code ${exitCode}`}`;
}

/**
 * The compiler exited non-zero. `output` keeps the tail of what it printed.
 * A null `exitCode` with a cause means it never started.
 */
export class ToolchainError extends WasmwrightError {
  public readonly code = 'TOOLCHAIN_FAILED';

  constructor(
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly output: string,
    options?: { cause?: unknown }
  ) {
    super(exitMessage(command, exitCode, options?.cause), options);
  }
}

export class BindgenError extends WasmwrightError {
  public readonly code = 'BINDGEN_FAILED';

  constructor(
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly output: string,
    options?: { cause?: unknown; message?: string }
  ) {
    super(options?.message ?? exitMessage(command, exitCode, options?.cause), options);
  }
}

export class ArtifactNotFoundError extends WasmwrightError {
  public readonly code = 'ARTIFACT_NOT_FOUND';

  constructor(public readonly expectedPath: string) {
    super(`Build artifact not found: ${expectedPath}`);
  }
}

export class StyleCompileError extends WasmwrightError {
  public readonly code = 'STYLE_COMPILE_FAILED';

  constructor(
    public readonly entry: string,
    public readonly output: string,
    options?: { cause?: unknown }
  ) {
    super(`Could not compile stylesheet ${entry}`, options);
  }
}

export class IoError extends WasmwrightError {
  public readonly code = 'IO_FAILED';

  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class OptimizationError extends WasmwrightError {
  public readonly code = 'OPTIMIZATION_FAILED';

  constructor(
    message: string,
    public readonly output = '',
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class NetworkError extends WasmwrightError {
  public readonly code = 'NETWORK_FAILED';

  constructor(
    public readonly url: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(
      status === undefined ? `Could not reach ${url}` : `Download of ${url} failed (HTTP ${status})`,
      options
    );
  }
}

export class UnsupportedPlatformError extends WasmwrightError {
  public readonly code = 'UNSUPPORTED_PLATFORM';

  constructor(
    public readonly tool: string,
    public readonly platform: string
  ) {
    super(`No ${tool} release is available for ${platform}`);
  }
}

export class VerificationError extends WasmwrightError {
  public readonly code = 'VERIFICATION_FAILED';

  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class SpawnError extends WasmwrightError {
  public readonly code = 'SPAWN_FAILED';

  constructor(
    public readonly command: string,
    options?: { cause?: unknown }
  ) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Could not start ${command}${reason}`, options);
  }
}

export class AlreadyRunningError extends WasmwrightError {
  public readonly code = 'ALREADY_RUNNING';

  constructor(public readonly pid: number) {
    super(`A supervised process is already running (PID ${pid})`);
  }
}

export class ConfigurationError extends WasmwrightError {
  public readonly code = 'INVALID_CONFIGURATION';
}

export class WatcherInitError extends WasmwrightError {
  public readonly code = 'WATCHER_INIT_FAILED';

  constructor(
    public readonly roots: readonly string[],
    options?: { cause?: unknown }
  ) {
    super(`Cannot watch ${roots.join(', ')}`, options);
  }
}

/**
 * Render an error with its cause chain, one cause per line.
 */
export function describeError(error: unknown): string {
  const lines: string[] = [];
  let current: unknown = error;
  let depth = 0;
  while (current !== undefined && depth < 5) {
    if (current instanceof Error) {
      lines.push(depth === 0 ? current.message : `caused by: ${current.message}`);
      current = current.cause;
    } else {
      lines.push(depth === 0 ? String(current) : `caused by: ${String(current)}`);
      current = undefined;
    }
    depth++;
  }
  return lines.join('\n');
}
