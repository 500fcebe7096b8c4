import { mkdir, rm } from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AlreadyRunningError, SpawnError } from '../../src/errors.js';
import { ProcessSupervisor } from '../../src/runners/process-supervisor.js';
import type { CommandTemplate } from '../../src/types.js';
import { createTempDir, pidFiles, waitFor, writePidChildScript } from '../helpers.js';

function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

describe('ProcessSupervisor', () => {
  let workDir: string;
  let pidDir: string;
  let childCommand: CommandTemplate;
  let supervisor: ProcessSupervisor;

  beforeEach(async () => {
    workDir = await createTempDir('supervisor');
    pidDir = path.join(workDir, 'pids');
    await mkdir(pidDir);
    const script = await writePidChildScript(workDir);
    childCommand = { command: process.execPath, args: [script], env: { PID_DIR: pidDir } };
    supervisor = new ProcessSupervisor({ gracePeriodMs: 500, stdio: 'ignore' });
  });

  afterEach(async () => {
    await supervisor.stop();
    await rm(workDir, { recursive: true, force: true });
  });

  it('starts a child and reports it as running', async () => {
    const pid = await supervisor.start(childCommand);

    expect(supervisor.status).toEqual({ state: 'running', pid });
    expect(supervisor.isRunning).toBe(true);
    await waitFor(() => pidFiles(pidDir).length === 1);
    expect(pidFiles(pidDir)).toEqual([`${pid}.pid`]);
  });

  it('refuses to start a second child', async () => {
    const pid = await supervisor.start(childCommand);

    const error = await supervisor.start(childCommand).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(AlreadyRunningError);
    expect(error instanceof AlreadyRunningError ? error.pid : undefined).toBe(pid);
  });

  it('stops the child with SIGTERM and marks it killed', async () => {
    const pid = await supervisor.start(childCommand);
    await waitFor(() => pidFiles(pidDir).length === 1);

    await supervisor.stop();

    expect(supervisor.status).toEqual({ state: 'killed' });
    expect(pidFiles(pidDir)).toEqual([]);
    expect(isAlive(pid)).toBe(false);
  });

  it('escalates to SIGKILL after the grace period', async () => {
    const stubborn: CommandTemplate = {
      ...childCommand,
      env: { PID_DIR: pidDir, IGNORE_SIGTERM: '1' },
    };
    const pid = await supervisor.start(stubborn);
    await waitFor(() => pidFiles(pidDir).length === 1);

    const startedAt = Date.now();
    await supervisor.stop();

    expect(Date.now() - startedAt).toBeGreaterThanOrEqual(450);
    expect(supervisor.status).toEqual({ state: 'killed' });
    expect(isAlive(pid)).toBe(false);
  });

  it('never has two live children across rapid restarts', async () => {
    let maxPidFiles = 0;
    const sampler = setInterval(() => {
      maxPidFiles = Math.max(maxPidFiles, pidFiles(pidDir).length);
    }, 2);

    try {
      await supervisor.start(childCommand);
      const restarts = Array.from({ length: 5 }, () => supervisor.restart(childCommand));
      const pids = await Promise.all(restarts);
      await waitFor(() => pidFiles(pidDir).length === 1);

      expect(new Set(pids).size).toBe(5);
      expect(pidFiles(pidDir)).toEqual([`${pids[4]}.pid`]);
    } finally {
      clearInterval(sampler);
    }

    expect(maxPidFiles).toBe(1);
    await supervisor.stop();
    expect(pidFiles(pidDir)).toEqual([]);
  });

  it('reports a child that exits on its own', async () => {
    await supervisor.start({ command: process.execPath, args: ['-e', 'process.exit(3)'] });

    const outcome = await supervisor.waitForExit();

    expect(outcome).toEqual({ state: 'exited', code: 3, signal: null });
    expect(supervisor.isRunning).toBe(false);
  });

  it('rejects with SpawnError when the executable is missing', async () => {
    const error = await supervisor
      .start({ command: path.join(workDir, 'no-such-binary'), args: [] })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(SpawnError);
    expect(supervisor.status).toEqual({ state: 'not-started' });

    // The queue keeps working after a failed operation
    const pid = await supervisor.start(childCommand);
    expect(supervisor.status).toEqual({ state: 'running', pid });
  });

  it('treats stop without a child as a no-op', async () => {
    await expect(supervisor.stop()).resolves.toBeUndefined();
    expect(supervisor.status).toEqual({ state: 'not-started' });
  });
});
