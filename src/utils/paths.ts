/**
 * Module path helpers for ESM entry points
 */

import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';

function canonical(path: string): string {
  try {
    return realpathSync(path);
  } catch {
    return path;
  }
}

/**
 * Whether the module at `moduleUrl` (pass `import.meta.url`) is the script
 * Node was started with. Symlinked bin shims resolve to the same file.
 */
export function isMainModule(moduleUrl: string, argv: readonly string[] = process.argv): boolean {
  const mainFile = argv[1];
  if (!mainFile) {
    return false;
  }
  const filename = canonical(fileURLToPath(moduleUrl));
  const main = canonical(mainFile);
  return main === filename || main.replace(/\.(js|ts)$/, '') === filename.replace(/\.(js|ts)$/, '');
}
