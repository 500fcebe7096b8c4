import { tmpdir } from 'os';
import path from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConfigurationError, SpawnError } from '../../src/errors.js';
import { ProcessSupervisor } from '../../src/runners/process-supervisor.js';
import {
  CommandStaticServer,
  DEFAULT_SERVER_COMMAND,
  substitutePlaceholders,
} from '../../src/server/command-static-server.js';

describe('substitutePlaceholders', () => {
  it('replaces known keys and keeps unknown ones', () => {
    expect(substitutePlaceholders('{ip}:{port}/{other}', { ip: '127.0.0.1', port: '8000' })).toBe(
      '127.0.0.1:8000/{other}'
    );
  });
});

describe('CommandStaticServer', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('fills the default command with the address and directory', () => {
    const server = new CommandStaticServer({ ip: '127.0.0.1', port: 8000 });

    expect(server.url).toBe('http://127.0.0.1:8000');
    expect(server.resolveCommand('/work/dist')).toEqual({
      command: DEFAULT_SERVER_COMMAND.command,
      args: ['-m', 'http.server', '8000', '--bind', '127.0.0.1', '--directory', '/work/dist'],
      cwd: undefined,
    });
  });

  it('substitutes in a custom command and its working directory', () => {
    const server = new CommandStaticServer({
      ip: '0.0.0.0',
      port: 9090,
      command: { command: 'miniserve', args: ['--port', '{port}', '.'], cwd: '{dir}' },
    });

    expect(server.resolveCommand('/srv/app')).toEqual({
      command: 'miniserve',
      args: ['--port', '9090', '.'],
      cwd: '/srv/app',
    });
  });

  it('supervises the server process', async () => {
    const supervisor = new ProcessSupervisor({ stdio: 'ignore', gracePeriodMs: 500 });
    const server = new CommandStaticServer({
      ip: '127.0.0.1',
      port: 8000,
      command: { command: process.execPath, args: ['-e', 'setInterval(() => {}, 1000)', '{dir}'] },
      supervisor,
    });

    await server.start(process.cwd());
    expect(supervisor.isRunning).toBe(true);

    await server.stop();
    expect(supervisor.status).toEqual({ state: 'killed' });
  });

  it('explains that the default server needs python3 when it is missing', async () => {
    vi.stubEnv('PATH', path.join(tmpdir(), 'wasmwright-no-such-bin'));
    const server = new CommandStaticServer({
      ip: '127.0.0.1',
      port: 8000,
      supervisor: new ProcessSupervisor({ stdio: 'ignore' }),
    });

    const error = await server.start(process.cwd()).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error instanceof Error ? error.message : undefined).toBe(
      'The default static server needs python3 on PATH; install it or set server.command'
    );
    expect(error instanceof Error ? error.cause : undefined).toBeInstanceOf(SpawnError);
  });

  it('points at server.command when a custom server cannot start', async () => {
    const missing = path.join(tmpdir(), 'wasmwright-no-such-server');
    const server = new CommandStaticServer({
      ip: '127.0.0.1',
      port: 8000,
      command: { command: missing, args: ['{port}'] },
      supervisor: new ProcessSupervisor({ stdio: 'ignore' }),
    });

    await expect(server.start(process.cwd())).rejects.toThrow(
      `Could not start the static server ${missing}; check server.command`
    );
  });
});
