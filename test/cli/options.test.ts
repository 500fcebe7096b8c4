import path from 'path';
import { describe, expect, it } from 'vitest';
import {
  buildDistConfig,
  buildWatchConfig,
  forwardedDistArgs,
  resolveWorkspaceLayout,
} from '../../src/cli/options.js';
import type { LoadedConfiguration } from '../../src/config.js';
import { ConfigurationError } from '../../src/errors.js';
import { ProjectConfigSchema } from '../../src/types.js';
import type { CommandRunner } from '../../src/utils/command-runner.js';

const layout = { workspaceRoot: '/work', targetDir: '/work/target' };

const loaded = (config: unknown = {}): LoadedConfiguration => ({
  config: ProjectConfigSchema.parse(config),
  projectRoot: '/work',
});

describe('buildDistConfig', () => {
  it('fills defaults from the workspace layout', () => {
    const config = buildDistConfig({ crate: 'my-app' }, loaded(), layout);

    expect(config).toMatchObject({
      crateName: 'my-app',
      outputDir: path.join('/work/target', 'debug', 'dist'),
      workspaceRoot: '/work',
      targetDir: '/work/target',
      release: false,
    });
  });

  it('puts release builds under the release directory', () => {
    const config = buildDistConfig({ crate: 'my-app', release: true }, loaded(), layout);
    expect(config.outputDir).toBe(path.join('/work/target', 'release', 'dist'));
  });

  it('lets flags override the config file', () => {
    const file = loaded({
      dist: { crateName: 'from-file', features: ['a'], jobs: '2', optimize: { enabled: false, version: '116' } },
    });

    const config = buildDistConfig(
      { crate: 'from-flag', features: ['b', 'c'], optimize: true, defaultFeatures: false },
      file,
      layout
    );

    expect(config.crateName).toBe('from-flag');
    expect(config.features).toEqual(['b', 'c']);
    expect(config.jobs).toBe('2');
    expect(config.noDefaultFeatures).toBe(true);
    expect(config.optimize).toMatchObject({ enabled: true, version: '116' });
  });

  it('turns bindgen off with --no-bindgen and keeps the configured command', () => {
    const file = loaded({ dist: { bindgen: { command: { command: '/opt/wasm-bindgen' } } } });

    expect(buildDistConfig({ crate: 'my-app' }, file, layout).bindgen).toEqual({
      enabled: true,
      command: { command: '/opt/wasm-bindgen', args: [] },
    });
    expect(buildDistConfig({ crate: 'my-app', bindgen: false }, file, layout).bindgen).toEqual({
      enabled: false,
      command: { command: '/opt/wasm-bindgen', args: [] },
    });
  });

  it('resolves flag paths against the current directory', () => {
    const config = buildDistConfig({ crate: 'my-app', outputDir: 'out', staticDir: 'public' }, loaded(), layout);

    expect(config.outputDir).toBe(path.resolve('out'));
    expect(config.staticDir).toBe(path.resolve('public'));
  });
});

describe('buildWatchConfig', () => {
  const command = { command: 'cargo', args: ['test'] };

  it('watches the workspace root and always ignores the target directory', () => {
    const config = buildWatchConfig({ ignore: ['*.log'] }, loaded(), layout, command);

    expect(config.roots).toEqual(['/work']);
    expect(config.ignore).toEqual(['*.log', '/work/target']);
    expect(config.command).toEqual(command);
  });

  it('merges config file ignores, flags and negated options', () => {
    const file = loaded({ watch: { ignore: ['docs', '/work/target'], debounceMs: 500, runOnStart: true } });

    const config = buildWatchConfig(
      { watchPath: ['src'], ignore: ['docs'], runOnStart: false, ignoreHidden: false, gracePeriod: '250' },
      file,
      layout,
      command
    );

    expect(config.roots).toEqual([path.resolve('src')]);
    expect(config.ignore).toEqual(['docs', '/work/target']);
    expect(config.debounceMs).toBe(500);
    expect(config.gracePeriodMs).toBe(250);
    expect(config.runOnStart).toBe(false);
    expect(config.ignoreHidden).toBe(false);
  });

  it('falls back to the configured command', () => {
    const file = loaded({ watch: { command: { command: 'make', args: ['check'] } } });
    expect(buildWatchConfig({}, file, layout, undefined).command).toEqual({ command: 'make', args: ['check'] });
  });

  it('rejects a missing command and bad durations', () => {
    expect(() => buildWatchConfig({}, loaded(), layout, undefined)).toThrow(ConfigurationError);
    expect(() => buildWatchConfig({ debounce: 'soon' }, loaded(), layout, command)).toThrow(
      '--debounce must be a positive number of milliseconds, got "soon"'
    );
  });
});

describe('forwardedDistArgs', () => {
  it('drops options only start understands', () => {
    expect(
      forwardedDistArgs([
        '--release',
        '--port',
        '9000',
        '-F',
        'console',
        '--ip=0.0.0.0',
        '-w',
        'src',
        '--no-watch',
        '--no-ignore-hidden',
        '--crate',
        'my-app',
      ])
    ).toEqual(['--release', '-F', 'console', '--crate', 'my-app']);
  });
});

describe('resolveWorkspaceLayout', () => {
  it('skips cargo when both paths are configured', async () => {
    const runner: CommandRunner = {
      run: async () => {
        throw new Error('cargo should not run');
      },
    };
    const file = loaded({ dist: { workspaceRoot: '/repo', targetDir: '/repo/build' } });

    await expect(resolveWorkspaceLayout(file, runner)).resolves.toEqual({
      workspaceRoot: '/repo',
      targetDir: '/repo/build',
    });
  });

  it('asks cargo for what is missing', async () => {
    const runner: CommandRunner = {
      run: async () => ({
        stdout: JSON.stringify({ workspace_root: '/work', target_directory: '/work/target' }),
        stderr: '',
        exitCode: 0,
        signal: null,
      }),
    };
    const file = loaded({ dist: { targetDir: '/shared/target' } });

    await expect(resolveWorkspaceLayout(file, runner)).resolves.toEqual({
      workspaceRoot: '/work',
      targetDir: '/shared/target',
    });
  });
});
