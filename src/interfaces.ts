// Seams for collaborators the core talks to; tests swap these for fakes

import type { ChangeEvent } from './types.js';

/**
 * A source of raw filesystem events for a set of roots.
 * Implemented over chokidar; tests push events by hand.
 */
export interface FileEventSource {
  /** Resolves once the roots are being observed */
  start(onEvent: (event: ChangeEvent) => void, onError: (error: Error) => void): Promise<void>;
  close(): Promise<void>;
}

/**
 * Network layer of the artifact fetcher. One call = one HTTP GET.
 */
export interface Downloader {
  /**
   * Resolves with the body of a 2xx response. Rejects with NetworkError for
   * unreachable hosts and non-2xx statuses (status carried on the error).
   */
  download(url: string): Promise<Buffer>;
}

/**
 * Unpacks a downloaded release archive into a directory.
 */
export interface ArchiveExtractor {
  extract(archivePath: string, destinationDir: string): Promise<void>;
}

/**
 * Serves a built output directory. The core never serves HTTP itself.
 */
export interface StaticServer {
  start(rootDir: string): Promise<void>;
  stop(): Promise<void>;
  readonly url: string;
}
