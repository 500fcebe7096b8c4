import { mkdir, rm } from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ChangeWatcher } from '../../src/core/change-watcher.js';
import { RebuildLoop } from '../../src/core/rebuild-loop.js';
import { WatcherInitError } from '../../src/errors.js';
import type { Logger } from '../../src/logger.js';
import { ProcessSupervisor } from '../../src/runners/process-supervisor.js';
import type { CommandTemplate } from '../../src/types.js';
import {
  createMockLogger,
  createTempDir,
  FakeEventSource,
  pidFiles,
  waitFor,
  writePidChildScript,
} from '../helpers.js';

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('RebuildLoop', () => {
  let workDir: string;
  let pidDir: string;
  let source: FakeEventSource;
  let command: CommandTemplate;
  let logger: Logger;
  let loop: RebuildLoop | undefined;

  beforeEach(async () => {
    workDir = await createTempDir('loop');
    pidDir = path.join(workDir, 'pids');
    await mkdir(pidDir);
    await mkdir(path.join(workDir, 'src'));
    const script = await writePidChildScript(workDir);
    command = { command: process.execPath, args: [script], env: { PID_DIR: pidDir } };
    source = new FakeEventSource();
    logger = createMockLogger();
  });

  afterEach(async () => {
    await loop?.stop();
    loop = undefined;
    await rm(workDir, { recursive: true, force: true });
  });

  const createLoop = (
    overrides: {
      command?: CommandTemplate;
      runOnStart?: boolean;
      signal?: AbortSignal;
      supervisor?: ProcessSupervisor;
    } = {}
  ) => {
    loop = new RebuildLoop({
      watcher: new ChangeWatcher({ roots: [workDir], debounceMs: 30, source }),
      supervisor: overrides.supervisor ?? new ProcessSupervisor({ gracePeriodMs: 1000, stdio: 'ignore' }),
      command: overrides.command ?? command,
      runOnStart: overrides.runOnStart ?? true,
      signal: overrides.signal,
      logger,
    });
    return loop;
  };

  const sourceFile = () => path.join(workDir, 'src', 'lib.rs');

  it('runs the command on start and leaves no child behind after stop', async () => {
    const rebuild = createLoop();
    const running = rebuild.run();

    await waitFor(() => rebuild.restartCount === 1 && pidFiles(pidDir).length === 1);
    expect(rebuild.currentState).toBe('running');

    await rebuild.stop();
    await running;

    expect(rebuild.currentState).toBe('stopped');
    expect(pidFiles(pidDir)).toEqual([]);
    expect(source.closed).toBe(true);
  });

  it('waits for the first change when runOnStart is off', async () => {
    const rebuild = createLoop({ runOnStart: false });
    const running = rebuild.run();
    await waitFor(() => source.started);
    await sleep(100);

    expect(pidFiles(pidDir)).toEqual([]);

    source.emit(sourceFile());
    await waitFor(() => pidFiles(pidDir).length === 1);
    expect(rebuild.restartCount).toBe(1);

    await rebuild.stop();
    await running;
  });

  it('replaces the child once per burst of changes', async () => {
    const rebuild = createLoop();
    const running = rebuild.run();
    await waitFor(() => pidFiles(pidDir).length === 1);
    const [firstPid] = pidFiles(pidDir);

    for (let i = 0; i < 5; i++) {
      source.emit(sourceFile());
    }
    await waitFor(() => rebuild.restartCount === 2);
    await waitFor(() => pidFiles(pidDir).length === 1 && pidFiles(pidDir)[0] !== firstPid);
    await sleep(150);

    expect(rebuild.restartCount).toBe(2);
    expect(pidFiles(pidDir)).toHaveLength(1);

    await rebuild.stop();
    await running;
    expect(pidFiles(pidDir)).toEqual([]);
  });

  it('collapses changes during a slow restart into one follow-up restart', async () => {
    const supervisor = new ProcessSupervisor({ gracePeriodMs: 400, stdio: 'ignore' });
    const restart = vi.spyOn(supervisor, 'restart');
    const rebuild = createLoop({
      supervisor,
      command: { ...command, env: { PID_DIR: pidDir, IGNORE_SIGTERM: '1' } },
    });
    const running = rebuild.run();
    await waitFor(() => rebuild.restartCount === 1 && pidFiles(pidDir).length === 1);

    // The child ignores SIGTERM, so this restart waits out the grace period
    source.emit(sourceFile());
    await waitFor(() => restart.mock.calls.length === 2);
    for (const name of ['a.rs', 'b.rs', 'c.rs']) {
      source.emit(path.join(workDir, 'src', name));
      await sleep(60);
    }
    expect(rebuild.restartCount).toBe(1);

    await waitFor(() => rebuild.restartCount === 3, 5000);
    await sleep(400);
    expect(rebuild.restartCount).toBe(3);
    expect(restart).toHaveBeenCalledTimes(3);
    const detected = vi
      .mocked(logger.info)
      .mock.calls.map(([message]) => message)
      .filter((message) => message.startsWith('Detected'));
    expect(detected).toEqual([
      `Detected 1 change(s) (${sourceFile()}), re-running command`,
      `Detected 3 change(s) (${path.join(workDir, 'src', 'a.rs')} +2), re-running command`,
    ]);

    const stop = vi.spyOn(supervisor, 'stop');
    await rebuild.stop();
    await running;
    expect(stop).toHaveBeenCalledTimes(1);
    expect(rebuild.currentState).toBe('stopped');
  });

  it('stops the supervisor exactly once on cancel', async () => {
    const supervisor = new ProcessSupervisor({ gracePeriodMs: 1000, stdio: 'ignore' });
    const stop = vi.spyOn(supervisor, 'stop');
    const rebuild = createLoop({ supervisor });
    const running = rebuild.run();
    await waitFor(() => pidFiles(pidDir).length === 1);

    await rebuild.stop();
    await running;
    await rebuild.stop();

    expect(stop).toHaveBeenCalledTimes(1);
    expect(pidFiles(pidDir)).toEqual([]);
  });

  it('keeps watching when the command cannot be spawned', async () => {
    const rebuild = createLoop({
      command: { command: path.join(workDir, 'missing-binary'), args: [] },
    });
    const running = rebuild.run();

    await waitFor(() => vi.mocked(logger.error).mock.calls.length === 1);
    expect(rebuild.restartCount).toBe(0);

    source.emit(sourceFile());
    await waitFor(() => vi.mocked(logger.error).mock.calls.length === 2);
    expect(rebuild.currentState).toBe('running');

    await rebuild.stop();
    await running;
    expect(rebuild.currentState).toBe('stopped');
  });

  it('stops when the external signal aborts', async () => {
    const controller = new AbortController();
    const rebuild = createLoop({ signal: controller.signal });
    const running = rebuild.run();
    await waitFor(() => pidFiles(pidDir).length === 1);

    controller.abort();
    await running;

    expect(rebuild.currentState).toBe('stopped');
    expect(pidFiles(pidDir)).toEqual([]);
  });

  it('rejects when the watcher cannot start', async () => {
    source.failWith = new Error('too many open files');
    const rebuild = createLoop();

    await expect(rebuild.run()).rejects.toBeInstanceOf(WatcherInitError);
    loop = undefined;
    expect(rebuild.currentState).toBe('stopped');
    expect(pidFiles(pidDir)).toEqual([]);
  });

  it('returns the same promise from repeated run calls', async () => {
    const rebuild = createLoop({ runOnStart: false });
    const first = rebuild.run();

    expect(rebuild.run()).toBe(first);

    await rebuild.stop();
    await first;
  });
});
