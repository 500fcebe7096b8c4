// Test helpers for wasmwright tests

import { existsSync, readdirSync } from 'fs';
import { mkdtemp, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { vi } from 'vitest';
import type { FileEventSource } from '../src/interfaces.js';
import type { Logger } from '../src/logger.js';
import type { ChangeEvent, ChangeKind } from '../src/types.js';

/**
 * Create a mock logger
 */
export function createMockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    success: vi.fn(),
  };
}

/**
 * Event source driven by hand from a test.
 */
export class FakeEventSource implements FileEventSource {
  public started = false;
  public closed = false;
  public failWith?: Error;
  private onEvent?: (event: ChangeEvent) => void;

  async start(onEvent: (event: ChangeEvent) => void): Promise<void> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.started = true;
    this.onEvent = onEvent;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  emit(filePath: string, kind: ChangeKind = 'modified'): void {
    this.onEvent?.({ path: filePath, kind, timestamp: Date.now() });
  }
}

export async function createTempDir(prefix: string): Promise<string> {
  return mkdtemp(path.join(tmpdir(), `wasmwright-${prefix}-`));
}

export async function waitFor(
  condition: () => boolean,
  timeoutMs = 5000,
  intervalMs = 20
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, intervalMs));
  }
}

/**
 * A child that writes `<pid>.pid` into `pidDir` once it can be signalled and
 * removes it when terminated with SIGTERM. Without SIGTERM handling it only
 * goes away on SIGKILL.
 */
export const PID_FILE_CHILD = `
const fs = require('fs');
const path = require('path');
const file = path.join(process.env.PID_DIR, process.pid + '.pid');
const ignoreTerm = process.env.IGNORE_SIGTERM === '1';
process.on('SIGTERM', () => {
  if (ignoreTerm) return;
  try { fs.unlinkSync(file); } catch {}
  process.exit(0);
});
fs.writeFileSync(file, String(process.pid));
setInterval(() => {}, 1000);
`;

export async function writePidChildScript(dir: string): Promise<string> {
  const script = path.join(dir, 'pid-child.cjs');
  await writeFile(script, PID_FILE_CHILD);
  return script;
}

export function pidFiles(pidDir: string): string[] {
  if (!existsSync(pidDir)) return [];
  return readdirSync(pidDir).filter((name) => name.endsWith('.pid'));
}
