import path from 'path';
import { describe, expect, it } from 'vitest';
import { IgnoreSet } from '../../src/core/ignore-set.js';

const root = path.resolve('/work/project');
const at = (...segments: string[]) => path.join(root, ...segments);

describe('IgnoreSet', () => {
  it('ignores plain patterns as path prefixes', () => {
    const ignore = new IgnoreSet([root], [at('target')], { cwd: root });

    expect(ignore.matches(at('target'))).toBe(true);
    expect(ignore.matches(at('target', 'debug', 'app.wasm'))).toBe(true);
    expect(ignore.matches(at('target-notes.md'))).toBe(false);
    expect(ignore.matches(at('src', 'lib.rs'))).toBe(false);
  });

  it('resolves relative prefixes against cwd', () => {
    const ignore = new IgnoreSet([root], ['dist'], { cwd: root });

    expect(ignore.matches(at('dist', 'app.js'))).toBe(true);
    expect(ignore.matches(at('src', 'dist.rs'))).toBe(false);
  });

  it('matches globs relative to the watch root', () => {
    const ignore = new IgnoreSet([root], ['**/*.swp', 'assets/*.tmp'], { cwd: root });

    expect(ignore.matches(at('src', '.lib.rs.swp'))).toBe(true);
    expect(ignore.matches(at('src', 'lib.swp'))).toBe(true);
    expect(ignore.matches(at('assets', 'logo.tmp'))).toBe(true);
    expect(ignore.matches(at('assets', 'nested', 'logo.tmp'))).toBe(false);
    expect(ignore.matches(at('assets', 'logo.png'))).toBe(false);
  });

  it('ignores hidden segments below a root by default', () => {
    const ignore = new IgnoreSet([root], [], { cwd: root });

    expect(ignore.matches(at('.git', 'HEAD'))).toBe(true);
    expect(ignore.matches(at('src', '.cache', 'x'))).toBe(true);
    expect(ignore.matches(at('src', 'main.rs'))).toBe(false);
  });

  it('does not treat a hidden directory above the root as hidden', () => {
    const hiddenRoot = path.resolve('/home/dev/.projects/app');
    const ignore = new IgnoreSet([hiddenRoot], []);

    expect(ignore.matches(path.join(hiddenRoot, 'src', 'lib.rs'))).toBe(false);
  });

  it('can keep hidden paths', () => {
    const ignore = new IgnoreSet([root], [], { cwd: root, ignoreHidden: false });

    expect(ignore.matches(at('.env'))).toBe(false);
  });
});
