import { mkdir } from 'fs/promises';
import type { ArchiveExtractor } from '../interfaces.js';
import { ChildProcessRunner, type CommandRunner, tailLines } from '../utils/command-runner.js';

export class TarExtractionError extends Error {
  constructor(
    public readonly archivePath: string,
    public readonly output: string
  ) {
    super(`tar could not extract ${archivePath}`);
    this.name = 'TarExtractionError';
  }
}

/**
 * Unpacks `.tar.gz` archives with the system `tar`.
 */
export class TarExtractor implements ArchiveExtractor {
  constructor(private readonly runner: CommandRunner = new ChildProcessRunner()) {}

  async extract(archivePath: string, destinationDir: string): Promise<void> {
    await mkdir(destinationDir, { recursive: true });
    const result = await this.runner.run({
      command: 'tar',
      args: ['-xzf', archivePath, '-C', destinationDir],
    });
    if (result.exitCode !== 0) {
      throw new TarExtractionError(archivePath, tailLines(result.stderr));
    }
  }
}
