import { mkdir, readdir, readFile, rm, writeFile } from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  errorCode,
  installDirectoryAtomic,
  stagingPath,
  writeFileAtomic,
} from '../../src/utils/atomic-write.js';
import { createTempDir } from '../helpers.js';

describe('atomic write utilities', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir('atomic');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('writes data and leaves no staging file behind', async () => {
    const filePath = path.join(tempDir, 'nested', 'app.css');

    await writeFileAtomic(filePath, 'body { margin: 0; }');

    expect(await readFile(filePath, 'utf8')).toBe('body { margin: 0; }');
    expect(await readdir(path.join(tempDir, 'nested'))).toEqual(['app.css']);
  });

  it('replaces existing content', async () => {
    const filePath = path.join(tempDir, 'app.wasm');
    await writeFile(filePath, 'old');

    await writeFileAtomic(filePath, Buffer.from([0x00, 0x61, 0x73, 0x6d]));

    expect(await readFile(filePath)).toEqual(Buffer.from([0x00, 0x61, 0x73, 0x6d]));
  });

  it('removes the staging file when the write fails', async () => {
    // A directory in the way makes the final rename fail
    const filePath = path.join(tempDir, 'taken');
    await mkdir(path.join(filePath, 'child'), { recursive: true });

    await expect(writeFileAtomic(filePath, 'data')).rejects.toThrow();
    expect(await readdir(tempDir)).toEqual(['taken']);
  });

  it('stages next to the target', () => {
    const staged = stagingPath('/cache/bin/wasm-opt');
    expect(path.dirname(staged)).toBe('/cache/bin');
    expect(path.basename(staged)).toMatch(/^\.wasm-opt\.\d+\.[0-9a-f]{16}\.tmp$/);
  });

  describe('installDirectoryAtomic', () => {
    it('moves the staging directory into place', async () => {
      const staging = path.join(tempDir, '.tmp-1');
      await mkdir(staging);
      await writeFile(path.join(staging, 'tool'), 'v1');
      const target = path.join(tempDir, 'entries', 'tool');

      await expect(installDirectoryAtomic(staging, target)).resolves.toBe(true);
      expect(await readFile(path.join(target, 'tool'), 'utf8')).toBe('v1');
      expect(await readdir(tempDir)).toEqual(['entries']);
    });

    it('keeps the existing entry when another writer won', async () => {
      const target = path.join(tempDir, 'tool');
      await mkdir(target);
      await writeFile(path.join(target, 'tool'), 'first');
      const staging = path.join(tempDir, '.tmp-2');
      await mkdir(staging);
      await writeFile(path.join(staging, 'tool'), 'second');

      await expect(installDirectoryAtomic(staging, target)).resolves.toBe(false);
      expect(await readFile(path.join(target, 'tool'), 'utf8')).toBe('first');
      expect(await readdir(tempDir)).toEqual(['tool']);
    });
  });

  describe('errorCode', () => {
    it('reads the code of a system error', async () => {
      const error = await readFile(path.join(tempDir, 'missing')).catch((err: unknown) => err);
      expect(errorCode(error)).toBe('ENOENT');
    });

    it('returns undefined for anything else', () => {
      expect(errorCode(new Error('plain'))).toBeUndefined();
      expect(errorCode('ENOENT')).toBeUndefined();
    });
  });
});
