/**
 * Owns at most one child process: start, stop with SIGTERM-then-SIGKILL
 * escalation, and restart as one serialized operation.
 */

import { type ChildProcess, spawn, type StdioOptions } from 'child_process';
import { EventEmitter } from 'events';
import { AlreadyRunningError, SpawnError } from '../errors.js';
import { type Logger, NULL_LOGGER } from '../logger.js';
import { DEFAULT_GRACE_PERIOD_MS, type CommandTemplate, type ProcessOutcome } from '../types.js';
import { formatCommand } from '../utils/command-runner.js';

export interface ProcessSupervisorOptions {
  /** Time between SIGTERM and SIGKILL in `stop()` */
  gracePeriodMs?: number;
  stdio?: StdioOptions;
  logger?: Logger;
}

interface LiveChild {
  process: ChildProcess;
  pid: number;
  exited: Promise<void>;
  stopping: boolean;
}

/**
 * Emits `exit` with the new ProcessOutcome whenever the owned child exits.
 */
export class ProcessSupervisor extends EventEmitter {
  private readonly gracePeriodMs: number;
  private readonly stdio: StdioOptions;
  private readonly logger: Logger;
  private child: LiveChild | null = null;
  private outcome: ProcessOutcome = { state: 'not-started' };
  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: ProcessSupervisorOptions = {}) {
    super();
    this.gracePeriodMs = options.gracePeriodMs ?? DEFAULT_GRACE_PERIOD_MS;
    this.stdio = options.stdio ?? 'inherit';
    this.logger = options.logger ?? NULL_LOGGER;
  }

  public get status(): ProcessOutcome {
    return this.outcome;
  }

  public get isRunning(): boolean {
    return this.outcome.state === 'running';
  }

  public start(command: CommandTemplate): Promise<number> {
    return this.enqueue(() => this.startNow(command));
  }

  public stop(): Promise<void> {
    return this.enqueue(() => this.stopNow());
  }

  /**
   * Stop then start, with no other supervisor operation in between.
   */
  public restart(command: CommandTemplate): Promise<number> {
    return this.enqueue(async () => {
      await this.stopNow();
      return this.startNow(command);
    });
  }

  /**
   * Resolves when the current child (if any) has exited.
   */
  public async waitForExit(): Promise<ProcessOutcome> {
    await this.child?.exited;
    return this.outcome;
  }

  private enqueue<T>(operation: () => Promise<T>): Promise<T> {
    const result = this.queue.then(operation);
    this.queue = result.catch(() => undefined);
    return result;
  }

  private startNow(command: CommandTemplate): Promise<number> {
    if (this.child) {
      return Promise.reject(new AlreadyRunningError(this.child.pid));
    }

    const label = formatCommand(command);
    this.logger.debug(`Spawning ${label}`);

    return new Promise<number>((resolve, reject) => {
      let childProcess: ChildProcess;
      try {
        childProcess = spawn(command.command, command.args, {
          cwd: command.cwd,
          env: command.env ? { ...process.env, ...command.env } : process.env,
          stdio: this.stdio,
        });
      } catch (error) {
        reject(new SpawnError(command.command, { cause: error }));
        return;
      }

      const onError = (error: Error) => {
        childProcess.removeListener('spawn', onSpawn);
        reject(new SpawnError(command.command, { cause: error }));
      };

      const onSpawn = () => {
        childProcess.removeListener('error', onError);
        const pid = childProcess.pid;
        if (pid === undefined) {
          reject(new SpawnError(command.command));
          return;
        }

        let markExited: () => void = () => undefined;
        const live: LiveChild = {
          process: childProcess,
          pid,
          exited: new Promise<void>((done) => {
            markExited = done;
          }),
          stopping: false,
        };

        childProcess.once('exit', (code, signal) => {
          if (this.child === live) {
            this.child = null;
          }
          this.outcome = live.stopping ? { state: 'killed' } : { state: 'exited', code, signal };
          if (!live.stopping) {
            const how = signal ? `signal ${signal}` : `code ${code}`;
            this.logger.info(`Process ${pid} exited (${how})`);
          }
          markExited();
          this.emit('exit', this.outcome);
        });
        childProcess.on('error', (error) => {
          this.logger.error(`Process ${pid} error: ${error.message}`);
        });

        this.child = live;
        this.outcome = { state: 'running', pid };
        this.logger.debug(`Process ${pid} started: ${label}`);
        resolve(pid);
      };

      childProcess.once('error', onError);
      childProcess.once('spawn', onSpawn);
    });
  }

  private async stopNow(): Promise<void> {
    const live = this.child;
    if (!live) {
      return;
    }

    live.stopping = true;
    const { process: childProcess, pid } = live;

    if (childProcess.exitCode === null && childProcess.signalCode === null) {
      this.logger.debug(`Terminating process ${pid}`);
      childProcess.kill('SIGTERM');

      let graceTimer: NodeJS.Timeout | undefined;
      const graceElapsed = new Promise<'timeout'>((resolve) => {
        graceTimer = setTimeout(() => resolve('timeout'), this.gracePeriodMs);
      });
      const result = await Promise.race([live.exited.then(() => 'exited' as const), graceElapsed]);
      clearTimeout(graceTimer);

      if (result === 'timeout') {
        this.logger.warn(`Force killing process ${pid} after ${this.gracePeriodMs}ms`);
        childProcess.kill('SIGKILL');
      }
    }

    await live.exited;
  }
}
