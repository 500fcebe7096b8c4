import { isAbsolute, relative, resolve, sep } from 'path';
import { createMatcher, isGlobPattern } from '../utils/glob-matcher.js';

export interface IgnoreSetOptions {
  /** Drop paths with a dot-segment below their watch root */
  ignoreHidden?: boolean;
  /** Base for relative prefix patterns */
  cwd?: string;
}

const toPosix = (path: string): string => path.split(sep).join('/');

/**
 * Decides whether a filesystem event path should be dropped. Plain patterns
 * are path prefixes; patterns with glob characters are matched against the
 * path relative to its watch root and against the absolute path.
 */
export class IgnoreSet {
  private readonly roots: string[];
  private readonly prefixes: string[] = [];
  private readonly globs: Array<(path: string) => boolean> = [];
  private readonly ignoreHidden: boolean;

  constructor(
    roots: readonly string[],
    patterns: readonly string[],
    options: IgnoreSetOptions = {}
  ) {
    const cwd = options.cwd ?? process.cwd();
    this.roots = roots.map((root) => resolve(cwd, root));
    this.ignoreHidden = options.ignoreHidden ?? true;

    for (const pattern of patterns) {
      if (isGlobPattern(pattern)) {
        this.globs.push(createMatcher(toPosix(pattern)));
      } else {
        this.prefixes.push(resolve(cwd, pattern));
      }
    }
  }

  public matches(path: string): boolean {
    const absolute = isAbsolute(path) ? path : resolve(path);

    for (const prefix of this.prefixes) {
      if (absolute === prefix || absolute.startsWith(prefix + sep)) {
        return true;
      }
    }

    const relativePaths = this.relativeToRoots(absolute);

    if (this.ignoreHidden) {
      for (const rel of relativePaths) {
        if (rel.split('/').some((segment) => segment.startsWith('.') && segment !== '.')) {
          return true;
        }
      }
    }

    if (this.globs.length === 0) {
      return false;
    }
    const candidates = [toPosix(absolute), ...relativePaths];
    return this.globs.some((matcher) => candidates.some((candidate) => matcher(candidate)));
  }

  private relativeToRoots(absolute: string): string[] {
    const result: string[] = [];
    for (const root of this.roots) {
      const rel = relative(root, absolute);
      if (rel && !rel.startsWith('..') && !isAbsolute(rel)) {
        result.push(toPosix(rel));
      }
    }
    return result;
  }
}
