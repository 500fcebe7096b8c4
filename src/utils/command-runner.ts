import { spawn } from 'child_process';
import { SpawnError } from '../errors.js';
import type { CommandTemplate } from '../types.js';

export interface RunOptions {
  /** Overrides the template's working directory */
  cwd?: string;
  /** Merged over process.env and the template's env */
  env?: NodeJS.ProcessEnv;
  allowNonZeroExit?: boolean;
  /** Mirror the child's output to this process's stderr while capturing it */
  echo?: boolean;
}

export interface RunResult {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

export interface CommandRunner {
  run(template: CommandTemplate, options?: RunOptions): Promise<RunResult>;
}

export function formatCommand(template: Pick<CommandTemplate, 'command' | 'args'>): string {
  return [template.command, ...template.args].join(' ');
}

/**
 * Last `maxLines` non-empty lines of a process's combined output.
 */
export function tailLines(output: string, maxLines = 50): string {
  const lines = output.split(/\r?\n/).filter((line) => line.trim().length > 0);
  return lines.slice(-maxLines).join('\n');
}

export class ChildProcessRunner implements CommandRunner {
  async run(template: CommandTemplate, options: RunOptions = {}): Promise<RunResult> {
    const { allowNonZeroExit = true, echo = false } = options;
    return new Promise<RunResult>((resolve, reject) => {
      const child = spawn(template.command, template.args, {
        cwd: options.cwd ?? template.cwd,
        env: { ...process.env, ...template.env, ...options.env },
        shell: false,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';

      child.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
        if (echo) process.stderr.write(data);
      });

      child.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
        if (echo) process.stderr.write(data);
      });

      child.on('close', (code, signal) => {
        if (code !== 0 && !allowNonZeroExit) {
          reject(new Error(`Command failed: ${formatCommand(template)}\n${stderr}`));
          return;
        }
        resolve({ stdout, stderr, exitCode: code, signal });
      });

      child.on('error', (error) => {
        reject(new SpawnError(template.command, { cause: error }));
      });
    });
  }
}
