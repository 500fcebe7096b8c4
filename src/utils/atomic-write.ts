import * as crypto from 'node:crypto';
import { promises as fs } from 'node:fs';
import * as path from 'node:path';

export interface AtomicWriteOptions {
  encoding?: BufferEncoding;
  mode?: number;
}

const RENAME_RETRY_CODES = new Set(['EBUSY', 'EPERM']);
const MAX_RENAME_RETRIES = 10;
const RENAME_RETRY_DELAY_MS = 100;

export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Unique sibling path for staging `target`. Same directory, so the final
 * rename never crosses filesystems.
 */
export function stagingPath(target: string): string {
  const dir = path.dirname(target);
  const basename = path.basename(target);
  return path.join(dir, `.${basename}.${process.pid}.${crypto.randomBytes(8).toString('hex')}.tmp`);
}

async function renameWithRetry(from: string, to: string): Promise<void> {
  for (let attempt = 1; ; attempt++) {
    try {
      await fs.rename(from, to);
      return;
    } catch (error) {
      const code = errorCode(error);
      if (!code || !RENAME_RETRY_CODES.has(code) || attempt >= MAX_RENAME_RETRIES) {
        throw error;
      }
      await new Promise((resolve) => setTimeout(resolve, RENAME_RETRY_DELAY_MS));
    }
  }
}

/**
 * Writes data to a temp file beside `filePath` and renames it into place, so
 * readers see either the old content or the new, never a partial file.
 */
export async function writeFileAtomic(
  filePath: string,
  data: string | Buffer,
  options: AtomicWriteOptions = {}
): Promise<void> {
  const { encoding = 'utf8', mode } = options;
  const normalizedPath = path.resolve(filePath);
  await fs.mkdir(path.dirname(normalizedPath), { recursive: true });

  const tmpfile = stagingPath(normalizedPath);
  try {
    await fs.writeFile(tmpfile, data, { encoding, mode });
    await renameWithRetry(tmpfile, normalizedPath);
  } catch (error) {
    await fs.rm(tmpfile, { force: true });
    throw error;
  }
}

/**
 * Moves a fully populated staging directory to `target`. Returns false when
 * another writer installed `target` first; the staging directory is then
 * discarded and the existing entry wins.
 */
export async function installDirectoryAtomic(stagingDir: string, target: string): Promise<boolean> {
  await fs.mkdir(path.dirname(target), { recursive: true });
  try {
    await renameWithRetry(stagingDir, target);
    return true;
  } catch (error) {
    const code = errorCode(error);
    if (code === 'ENOTEMPTY' || code === 'EEXIST') {
      await fs.rm(stagingDir, { recursive: true, force: true });
      return false;
    }
    throw error;
  }
}
