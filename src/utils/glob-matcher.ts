//
//  glob-matcher.ts
//  wasmwright
//

/**
 * Glob pattern matcher used by the watcher's ignore set.
 * Supports *, **, ?, [abc], [a-z], [!a] and {a,b}.
 */

const GLOB_CHARS = /[*?[\]{}]/;

export function isGlobPattern(pattern: string): boolean {
  return GLOB_CHARS.test(pattern);
}

/**
 * Creates a function that tests if a `/`-separated path matches a glob pattern.
 */
export function createMatcher(pattern: string): (path: string) => boolean {
  const regex = globToRegex(pattern);
  return (path: string) => regex.test(path);
}

/**
 * Converts a glob pattern to an anchored regular expression.
 */
export function globToRegex(glob: string): RegExp {
  let regex = '';
  let inClass = false;
  let braceLevel = 0;

  for (let i = 0; i < glob.length; i++) {
    const char = glob[i] ?? '';
    const nextChar = glob[i + 1];

    if (inClass) {
      if (char === ']') {
        inClass = false;
        regex += char;
      } else if (char === '-' && nextChar !== undefined && nextChar !== ']') {
        regex += char;
      } else {
        regex += escapeRegexChar(char);
      }
      continue;
    }

    if (braceLevel > 0) {
      if (char === '}') {
        braceLevel--;
        regex += braceLevel === 0 ? ')' : '\\}';
        continue;
      }
      if (char === ',' && braceLevel === 1) {
        regex += '|';
        continue;
      }
      if (char === '{') {
        braceLevel++;
        regex += '\\{';
        continue;
      }
    }

    switch (char) {
      case '*': {
        if (nextChar !== '*') {
          regex += '[^/]*';
          break;
        }
        const prevChar = glob[i - 1];
        const afterStars = glob[i + 2];
        if ((prevChar === '/' || prevChar === undefined) && afterStars === '/') {
          // `**/` matches zero or more whole segments
          regex += '(?:.*/)?';
          i += 2;
        } else if ((prevChar === '/' || prevChar === undefined) && afterStars === undefined) {
          regex += '.*';
          i++;
        } else {
          regex += '[^/]*';
          i++;
        }
        break;
      }

      case '?':
        regex += '[^/]';
        break;

      case '[':
        inClass = true;
        regex += '[';
        if (nextChar === '!' || nextChar === '^') {
          regex += '^';
          i++;
        }
        break;

      case '{':
        if (braceLevel === 0) {
          braceLevel = 1;
          regex += '(?:';
        }
        break;

      default:
        regex += escapeRegexChar(char);
    }
  }

  return new RegExp(`^${regex}$`);
}

function escapeRegexChar(char: string): string {
  return '.+*?^$()[]{}|\\/'.includes(char) ? `\\${char}` : char;
}
