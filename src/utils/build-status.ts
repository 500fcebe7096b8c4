// Helpers for presenting BuildOutput results
import type { BuildOutput, BuildStatus } from '../types.js';
import { describeError } from '../errors.js';

export function formatDuration(durationMs: number): string {
  const seconds = durationMs / 1000;

  if (seconds < 1) {
    return `${durationMs.toFixed(0)}ms`;
  } else if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  } else {
    const minutes = Math.floor(seconds / 60);
    const remainingSeconds = seconds % 60;
    return `${minutes}m ${remainingSeconds.toFixed(1)}s`;
  }
}

export function isSuccess(status: BuildStatus): status is { kind: 'success' } {
  return status.kind === 'success';
}

/**
 * One-line summary, plus the cause chain for failures.
 */
export function formatBuildOutput(output: BuildOutput): string {
  const duration = formatDuration(output.durationMs);
  if (isSuccess(output.status)) {
    return `Built ${output.files.length} file(s) into ${output.outputDir} in ${duration}`;
  }
  return `Build failed at ${output.status.stage} after ${duration}: ${describeError(output.status.error)}`;
}
