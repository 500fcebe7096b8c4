import { ConfigurationError, SpawnError } from '../errors.js';
import type { StaticServer } from '../interfaces.js';
import { type Logger, NULL_LOGGER } from '../logger.js';
import { ProcessSupervisor } from '../runners/process-supervisor.js';
import type { CommandTemplate } from '../types.js';

/**
 * Used when no server command is configured. Needs `python3` on PATH.
 */
export const DEFAULT_SERVER_COMMAND: CommandTemplate = {
  command: 'python3',
  args: ['-m', 'http.server', '{port}', '--bind', '{ip}', '--directory', '{dir}'],
};

export interface CommandStaticServerOptions {
  ip: string;
  port: number;
  command?: CommandTemplate;
  gracePeriodMs?: number;
  logger?: Logger;
  supervisor?: ProcessSupervisor;
}

export function substitutePlaceholders(value: string, values: Record<string, string>): string {
  return value.replace(/\{(\w+)\}/g, (match: string, key: string) => values[key] ?? match);
}

/**
 * Serves a directory by supervising an external static file server.
 * `{dir}`, `{ip}` and `{port}` are substituted in the command, its arguments
 * and its working directory.
 */
export class CommandStaticServer implements StaticServer {
  private readonly supervisor: ProcessSupervisor;
  private readonly logger: Logger;

  constructor(private readonly options: CommandStaticServerOptions) {
    this.logger = options.logger ?? NULL_LOGGER;
    this.supervisor =
      options.supervisor ??
      new ProcessSupervisor({ gracePeriodMs: options.gracePeriodMs, logger: this.logger });
  }

  public get url(): string {
    return `http://${this.options.ip}:${this.options.port}`;
  }

  public resolveCommand(rootDir: string): CommandTemplate {
    const template = this.options.command ?? DEFAULT_SERVER_COMMAND;
    const values = { dir: rootDir, ip: this.options.ip, port: String(this.options.port) };
    return {
      ...template,
      command: substitutePlaceholders(template.command, values),
      args: template.args.map((arg) => substitutePlaceholders(arg, values)),
      cwd: template.cwd ? substitutePlaceholders(template.cwd, values) : undefined,
    };
  }

  public async start(rootDir: string): Promise<void> {
    const command = this.resolveCommand(rootDir);
    try {
      await this.supervisor.start(command);
    } catch (error) {
      if (!(error instanceof SpawnError)) throw error;
      const hint = this.options.command
        ? `Could not start the static server ${command.command}; check server.command`
        : 'The default static server needs python3 on PATH; install it or set server.command';
      throw new ConfigurationError(hint, { cause: error });
    }
    this.logger.info(`Serving ${rootDir} at ${this.url}`);
  }

  public stop(): Promise<void> {
    return this.supervisor.stop();
  }
}
