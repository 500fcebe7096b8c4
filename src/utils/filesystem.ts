/**
 * File system helpers for the build output directory
 */

import { copyFile, mkdir, readdir, rm } from 'fs/promises';
import { glob } from 'glob';
import { dirname, join } from 'path';

// biome-ignore lint/complexity/noStaticOnlyClass: Intentional design for API organization
export class FileSystemUtils {
  /**
   * Create `dir` if needed and remove everything inside it. The directory
   * itself is kept so a server pointed at it keeps working.
   */
  public static async emptyDir(dir: string): Promise<void> {
    await mkdir(dir, { recursive: true });
    const entries = await readdir(dir);
    await Promise.all(entries.map((entry) => rm(join(dir, entry), { recursive: true, force: true })));
  }

  /**
   * Copy every file under `sourceDir` (dotfiles included) into `targetDir`,
   * keeping relative paths. Returns the relative paths in sorted order.
   */
  public static async copyDirContents(sourceDir: string, targetDir: string): Promise<string[]> {
    const files = (await glob('**/*', { cwd: sourceDir, nodir: true, dot: true, posix: true })).sort();
    for (const relative of files) {
      const destination = join(targetDir, relative);
      await mkdir(dirname(destination), { recursive: true });
      await copyFile(join(sourceDir, relative), destination);
    }
    return files;
  }
}
