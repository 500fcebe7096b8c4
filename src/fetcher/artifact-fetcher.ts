/**
 * Download-once cache for prebuilt tool binaries, keyed by
 * `(name, version, platform)` under `<cacheDir>/<name>/<version>/<platform>`.
 *
 * Entries are staged in a temp directory beside the cache and renamed into
 * place whole, so a reader never observes a half-written binary.
 */

import { createHash } from 'crypto';
import { constants } from 'fs';
import { access, chmod, mkdir, mkdtemp, rm, stat, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import {
  ConfigurationError,
  NetworkError,
  UnsupportedPlatformError,
  VerificationError,
} from '../errors.js';
import type { ArchiveExtractor, Downloader } from '../interfaces.js';
import { type Logger, NULL_LOGGER } from '../logger.js';
import type { CachedBinary } from '../types.js';
import { installDirectoryAtomic } from '../utils/atomic-write.js';
import { hostPlatform, isWindowsPlatform } from '../utils/platform.js';
import { HttpDownloader } from './http-downloader.js';
import { DEFAULT_RELEASES, releaseKey, type ToolRelease } from './releases.js';
import { TarExtractor } from './tar-extractor.js';

export interface ArtifactFetcherOptions {
  cacheDir: string;
  downloader?: Downloader;
  extractor?: ArchiveExtractor;
  releases?: Readonly<Record<string, ToolRelease>>;
  logger?: Logger;
}

async function isExecutable(path: string, platform: string): Promise<boolean> {
  try {
    const info = await stat(path);
    if (!info.isFile()) return false;
    if (isWindowsPlatform(platform)) return true;
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export class ArtifactFetcher {
  private readonly cacheDir: string;
  private readonly downloader: Downloader;
  private readonly extractor: ArchiveExtractor;
  private readonly releases: Readonly<Record<string, ToolRelease>>;
  private readonly logger: Logger;
  private readonly inFlight = new Map<string, Promise<CachedBinary>>();

  constructor(options: ArtifactFetcherOptions) {
    this.cacheDir = options.cacheDir;
    this.downloader = options.downloader ?? new HttpDownloader();
    this.extractor = options.extractor ?? new TarExtractor();
    this.releases = options.releases ?? DEFAULT_RELEASES;
    this.logger = options.logger ?? NULL_LOGGER;
  }

  /**
   * Path of the cache entry for a key, whether or not it is populated.
   */
  public entryDir(name: string, version: string, platform: string = hostPlatform()): string {
    return join(this.cacheDir, name, version, platform);
  }

  /**
   * Return the cached binary, downloading it first if needed. Concurrent
   * calls for the same key share one download.
   */
  public async resolve(
    name: string,
    version: string,
    platform: string = hostPlatform()
  ): Promise<CachedBinary> {
    const release = this.releases[name];
    if (!release) {
      throw new ConfigurationError(`Unknown tool: ${name}`);
    }
    if (!release.platforms.includes(platform)) {
      throw new UnsupportedPlatformError(name, platform);
    }

    const binaryPath = join(this.entryDir(name, version, platform), release.binaryPath(version, platform));
    if (await isExecutable(binaryPath, platform)) {
      this.logger.debug(`Using cached ${name} ${version} at ${binaryPath}`);
      return { name, version, platform, path: binaryPath, executable: true };
    }

    const key = `${name}/${releaseKey(version, platform)}`;
    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    const download = this.fetchAndInstall(release, version, platform).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, download);
    return download;
  }

  private async fetchAndInstall(
    release: ToolRelease,
    version: string,
    platform: string
  ): Promise<CachedBinary> {
    const { name } = release;
    const url = release.url(version, platform);
    const entryDir = this.entryDir(name, version, platform);
    const relativeBinary = release.binaryPath(version, platform);

    await mkdir(this.cacheDir, { recursive: true });
    const stagingDir = await mkdtemp(join(this.cacheDir, '.tmp-'));

    try {
      this.logger.info(`Downloading ${name} ${version} for ${platform}`);
      const body = await this.download(name, url, platform);
      this.verifyChecksum(release, version, platform, body, url);

      if (release.archive === 'none') {
        const target = join(stagingDir, relativeBinary);
        await mkdir(dirname(target), { recursive: true });
        await writeFile(target, body);
      } else {
        const archivePath = `${stagingDir}.archive`;
        try {
          await writeFile(archivePath, body);
          await this.extractor.extract(archivePath, stagingDir);
        } catch (error) {
          throw new VerificationError(`Could not unpack ${url}`, archivePath, { cause: error });
        } finally {
          await rm(archivePath, { force: true });
        }
      }

      const required = [relativeBinary, ...release.companions(version, platform)];
      for (const relative of required) {
        await this.markExecutable(stagingDir, relative, url);
      }

      // An entry without a usable binary is left over from an older layout
      if (!(await isExecutable(join(entryDir, relativeBinary), platform))) {
        await rm(entryDir, { recursive: true, force: true });
      }
      const installed = await installDirectoryAtomic(stagingDir, entryDir);
      if (!installed) {
        this.logger.debug(`${name} ${version} was installed concurrently; using existing entry`);
      }
    } catch (error) {
      await rm(stagingDir, { recursive: true, force: true });
      throw error;
    }

    const binaryPath = join(entryDir, relativeBinary);
    if (!(await isExecutable(binaryPath, platform))) {
      throw new VerificationError(`Cached ${name} is not executable`, binaryPath);
    }
    this.logger.debug(`Installed ${name} ${version} at ${binaryPath}`);
    return { name, version, platform, path: binaryPath, executable: true };
  }

  private async download(name: string, url: string, platform: string): Promise<Buffer> {
    try {
      return await this.downloader.download(url);
    } catch (error) {
      if (error instanceof NetworkError && error.status === 404) {
        throw new UnsupportedPlatformError(name, platform);
      }
      throw error;
    }
  }

  private verifyChecksum(
    release: ToolRelease,
    version: string,
    platform: string,
    body: Buffer,
    url: string
  ): void {
    const expected = release.sha256?.[releaseKey(version, platform)];
    if (!expected) return;
    const actual = createHash('sha256').update(body).digest('hex');
    if (actual !== expected.toLowerCase()) {
      throw new VerificationError(`Checksum mismatch for ${url}: expected ${expected}, got ${actual}`, url);
    }
  }

  private async markExecutable(stagingDir: string, relative: string, url: string): Promise<void> {
    const path = join(stagingDir, relative);
    try {
      await stat(path);
    } catch (error) {
      throw new VerificationError(`${url} does not contain ${relative}`, path, { cause: error });
    }
    try {
      await chmod(path, 0o755);
    } catch (error) {
      throw new VerificationError(`Could not make ${path} executable`, path, { cause: error });
    }
  }
}
