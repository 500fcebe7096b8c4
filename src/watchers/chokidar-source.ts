import { type FSWatcher, watch } from 'chokidar';
import type { FileEventSource } from '../interfaces.js';
import type { ChangeKind } from '../types.js';

type ChokidarEvent = 'add' | 'addDir' | 'change' | 'unlink' | 'unlinkDir';

const KIND_BY_EVENT: Record<ChokidarEvent, ChangeKind> = {
  add: 'created',
  addDir: 'created',
  change: 'modified',
  unlink: 'removed',
  unlinkDir: 'removed',
};

export interface ChokidarSourceOptions {
  /** Paths for which chokidar should not even set up watches */
  ignored?: (path: string) => boolean;
  usePolling?: boolean;
}

/**
 * Recursive filesystem event source over chokidar.
 */
export class ChokidarEventSource implements FileEventSource {
  private watcher?: FSWatcher;

  constructor(
    private readonly roots: readonly string[],
    private readonly options: ChokidarSourceOptions = {}
  ) {}

  public start(
    onEvent: (event: { path: string; kind: ChangeKind; timestamp: number }) => void,
    onError: (error: Error) => void
  ): Promise<void> {
    if (this.watcher) {
      return Promise.reject(new Error('Event source already started'));
    }

    const ignored = this.options.ignored;
    const watcher = watch([...this.roots], {
      persistent: true,
      ignoreInitial: true,
      usePolling: this.options.usePolling ?? false,
      ...(ignored ? { ignored: (path: string) => ignored(path) } : {}),
    });
    this.watcher = watcher;

    return new Promise((resolve, reject) => {
      let ready = false;

      watcher.on('all', (eventName: ChokidarEvent, path: string) => {
        onEvent({ path, kind: KIND_BY_EVENT[eventName], timestamp: Date.now() });
      });

      watcher.on('error', (error: unknown) => {
        const err = error instanceof Error ? error : new Error(String(error));
        if (!ready) {
          reject(err);
          return;
        }
        onError(err);
      });

      watcher.once('ready', () => {
        ready = true;
        resolve();
      });
    });
  }

  public async close(): Promise<void> {
    const watcher = this.watcher;
    this.watcher = undefined;
    await watcher?.close();
  }
}
