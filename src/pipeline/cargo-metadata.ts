import { z } from 'zod';
import { ConfigurationError, ToolchainError } from '../errors.js';
import type { CommandRunner } from '../utils/command-runner.js';
import { formatCommand, tailLines } from '../utils/command-runner.js';

const CargoMetadataSchema = z.object({
  workspace_root: z.string().min(1),
  target_directory: z.string().min(1),
});

export interface WorkspaceLayout {
  workspaceRoot: string;
  targetDir: string;
}

export const CARGO_METADATA_COMMAND = {
  command: 'cargo',
  args: ['metadata', '--format-version', '1', '--no-deps'],
};

/**
 * Ask cargo where the workspace root and the shared target directory are.
 */
export async function readWorkspaceLayout(runner: CommandRunner, cwd: string): Promise<WorkspaceLayout> {
  const result = await runner.run(CARGO_METADATA_COMMAND, { cwd });
  if (result.exitCode !== 0) {
    throw new ToolchainError(formatCommand(CARGO_METADATA_COMMAND), result.exitCode, tailLines(result.stderr));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(result.stdout);
  } catch (error) {
    throw new ConfigurationError('cargo metadata printed invalid JSON', { cause: error });
  }

  const metadata = CargoMetadataSchema.safeParse(parsed);
  if (!metadata.success) {
    throw new ConfigurationError('cargo metadata output is missing workspace_root or target_directory');
  }
  return {
    workspaceRoot: metadata.data.workspace_root,
    targetDir: metadata.data.target_directory,
  };
}
