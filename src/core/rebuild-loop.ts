import { describeError } from '../errors.js';
import { type Logger, NULL_LOGGER } from '../logger.js';
import type { ProcessSupervisor } from '../runners/process-supervisor.js';
import type { ChangeSignal, CommandTemplate } from '../types.js';
import { formatCommand } from '../utils/command-runner.js';
import type { ChangeWatcher } from './change-watcher.js';

interface RebuildLoopDeps {
  watcher: ChangeWatcher;
  supervisor: ProcessSupervisor;
  command: CommandTemplate;
  runOnStart?: boolean;
  logger?: Logger;
  /** External cancellation, equivalent to calling `stop()` */
  signal?: AbortSignal;
}

type LoopState = 'idle' | 'running' | 'stopping' | 'stopped';

const CANCELLED = Symbol('cancelled');

/**
 * Re-runs a command whenever the watcher signals a change. One restart at a
 * time; signals that arrive during a restart collapse into one follow-up.
 */
export class RebuildLoop {
  private readonly watcher: ChangeWatcher;
  private readonly supervisor: ProcessSupervisor;
  private readonly command: CommandTemplate;
  private readonly runOnStart: boolean;
  private readonly logger: Logger;
  private readonly abort = new AbortController();
  private state: LoopState = 'idle';
  private runPromise?: Promise<void>;
  private restarts = 0;

  constructor({ watcher, supervisor, command, runOnStart = true, logger, signal }: RebuildLoopDeps) {
    this.watcher = watcher;
    this.supervisor = supervisor;
    this.command = command;
    this.runOnStart = runOnStart;
    this.logger = logger ?? NULL_LOGGER;

    if (signal) {
      if (signal.aborted) {
        this.abort.abort();
      } else {
        signal.addEventListener('abort', () => this.abort.abort(), { once: true });
      }
    }
  }

  public get restartCount(): number {
    return this.restarts;
  }

  /**
   * Resolves only after cancellation, once the child is stopped. Rejects with
   * WatcherInitError when the roots cannot be watched.
   */
  public run(): Promise<void> {
    if (this.runPromise) {
      return this.runPromise;
    }
    this.runPromise = this.loop();
    return this.runPromise;
  }

  /**
   * Cancel the loop and wait for its cleanup.
   */
  public async stop(): Promise<void> {
    this.abort.abort();
    await this.runPromise;
  }

  private async loop(): Promise<void> {
    this.state = 'running';
    const cancelled = new Promise<typeof CANCELLED>((resolve) => {
      if (this.abort.signal.aborted) {
        resolve(CANCELLED);
        return;
      }
      this.abort.signal.addEventListener('abort', () => resolve(CANCELLED), { once: true });
    });

    try {
      await this.watcher.start();
    } catch (error) {
      this.state = 'stopped';
      await this.watcher.close();
      throw error;
    }

    const signals = this.watcher.signals();
    try {
      if (this.runOnStart && !this.abort.signal.aborted) {
        this.logger.info(`Running ${formatCommand(this.command)}`);
        await this.relaunch();
      }

      while (!this.abort.signal.aborted) {
        const next = await Promise.race([signals.next(), cancelled]);
        if (next === CANCELLED || next.done) {
          break;
        }
        this.logSignal(next.value);
        await this.relaunch();
      }
    } finally {
      this.state = 'stopping';
      this.logger.debug('Stopping watch loop');
      await signals.return?.();
      try {
        await this.supervisor.stop();
      } finally {
        this.state = 'stopped';
      }
    }
  }

  private async relaunch(): Promise<void> {
    try {
      const pid = await this.supervisor.restart(this.command);
      this.restarts++;
      this.logger.debug(`Command running as PID ${pid}`);
    } catch (error) {
      this.logger.error(`Could not re-run command: ${describeError(error)}`);
    }
  }

  private logSignal(signal: ChangeSignal): void {
    const [first] = signal.paths;
    const where = first ? ` (${first}${signal.paths.length > 1 ? ` +${signal.paths.length - 1}` : ''})` : '';
    this.logger.info(`Detected ${signal.eventCount} change(s)${where}, re-running command`);
  }

  public get currentState(): LoopState {
    return this.state;
  }
}
