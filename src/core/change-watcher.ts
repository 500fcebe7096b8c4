import { stat } from 'fs/promises';
import { resolve } from 'path';
import { WatcherInitError } from '../errors.js';
import type { FileEventSource } from '../interfaces.js';
import { type Logger, NULL_LOGGER } from '../logger.js';
import type { ChangeEvent, ChangeSignal } from '../types.js';
import { CoalescingChannel } from '../utils/coalescing-channel.js';
import { ChokidarEventSource } from '../watchers/chokidar-source.js';
import { Debouncer } from './debouncer.js';
import { IgnoreSet } from './ignore-set.js';

const MAX_SIGNAL_PATHS = 20;

export interface ChangeWatcherOptions {
  roots: readonly string[];
  ignore?: readonly string[];
  debounceMs: number;
  ignoreHidden?: boolean;
  cwd?: string;
  logger?: Logger;
  /** Defaults to a chokidar source over the roots that exist at start */
  source?: FileEventSource;
}

function mergeSignals(previous: ChangeSignal, next: ChangeSignal): ChangeSignal {
  return {
    eventCount: previous.eventCount + next.eventCount,
    paths: uniquePaths([...previous.paths, ...next.paths]),
    firedAt: next.firedAt,
  };
}

function uniquePaths(paths: string[]): string[] {
  return Array.from(new Set(paths)).slice(-MAX_SIGNAL_PATHS);
}

/**
 * Watches a set of roots, drops ignored paths and turns bursts of events into
 * single debounced change signals.
 */
export class ChangeWatcher {
  private readonly roots: string[];
  private readonly ignoreSet: IgnoreSet;
  private readonly debouncer: Debouncer<ChangeEvent>;
  private readonly channel = new CoalescingChannel<ChangeSignal>(mergeSignals);
  private source?: FileEventSource;
  private readonly logger: Logger;
  private started = false;
  private iterated = false;

  constructor(options: ChangeWatcherOptions) {
    if (options.roots.length === 0) {
      throw new WatcherInitError([], { cause: new Error('no watch roots configured') });
    }
    const cwd = options.cwd ?? process.cwd();
    this.roots = options.roots.map((root) => resolve(cwd, root));
    this.logger = options.logger ?? NULL_LOGGER;
    this.ignoreSet = new IgnoreSet(this.roots, options.ignore ?? [], {
      ignoreHidden: options.ignoreHidden ?? true,
      cwd,
    });
    this.debouncer = new Debouncer<ChangeEvent>({
      delayMs: options.debounceMs,
      onFire: (events) => this.fire(events),
    });
    this.source = options.source;
  }

  public async start(): Promise<void> {
    if (this.started) {
      throw new Error('ChangeWatcher already started');
    }
    this.started = true;

    // A root that cannot be observed is skipped; only all of them failing is fatal
    const watchable: string[] = [];
    let lastError: unknown;
    for (const root of this.roots) {
      try {
        await stat(root);
        watchable.push(root);
      } catch (error) {
        lastError = error;
        this.logger.error(`Cannot watch ${root}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
    if (watchable.length === 0) {
      throw new WatcherInitError(this.roots, { cause: lastError });
    }

    this.source ??= new ChokidarEventSource(watchable, { ignored: (path) => this.ignoreSet.matches(path) });
    try {
      await this.source.start(
        (event) => this.handleEvent(event),
        (error) => this.logger.error(`Watch error: ${error.message}`)
      );
    } catch (error) {
      throw new WatcherInitError(watchable, { cause: error });
    }

    for (const root of watchable) {
      this.logger.debug(`Watching ${root}`);
    }
  }

  /**
   * Feed one raw event through the ignore set and the debounce timer.
   */
  public handleEvent(event: ChangeEvent): void {
    if (this.channel.isClosed) return;
    if (this.ignoreSet.matches(event.path)) {
      this.logger.debug(`Ignoring ${event.kind} ${event.path}`);
      return;
    }
    this.logger.debug(`Detected ${event.kind} ${event.path}`);
    this.debouncer.push(event);
  }

  /**
   * The debounced signal stream. Lazy, infinite until `close()`, and can only
   * be taken once.
   */
  public signals(): AsyncIterableIterator<ChangeSignal> {
    if (this.iterated) {
      throw new Error('ChangeWatcher signals can only be iterated once');
    }
    this.iterated = true;

    const iterator: AsyncIterableIterator<ChangeSignal> = {
      next: () => this.channel.next(),
      return: async () => {
        await this.close();
        return { value: undefined, done: true as const };
      },
      [Symbol.asyncIterator]: () => iterator,
    };
    return iterator;
  }

  public async close(): Promise<void> {
    if (this.channel.isClosed) return;
    this.debouncer.cancel();
    this.channel.close();
    await this.source?.close();
  }

  private fire(events: ChangeEvent[]): void {
    const signal: ChangeSignal = {
      eventCount: events.length,
      paths: uniquePaths(events.map((event) => event.path)),
      firedAt: Date.now(),
    };
    this.logger.debug(`Change signal after ${events.length} event(s)`);
    this.channel.send(signal);
  }
}
