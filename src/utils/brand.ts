/**
 * Brand mark helper for consistent CLI output
 *
 * The mark color indicates the message type:
 * - Cyan: headers
 * - Green: success
 * - Yellow: warnings
 * - Red: errors
 * - Gray: info/debug
 */

import chalk from 'chalk';

export const BRAND_MARK = '⬡';

export const mark = {
  brand: () => chalk.cyan(BRAND_MARK),
  success: () => chalk.green(BRAND_MARK),
  warning: () => chalk.yellow(BRAND_MARK),
  error: () => chalk.red(BRAND_MARK),
  info: () => chalk.gray(BRAND_MARK),
  plain: () => BRAND_MARK,
} as const;

/**
 * Format a CLI message with the colored mark and the [wasmwright] prefix
 */
export function brandMessage(type: keyof typeof mark, message: string): string {
  return `${mark[type]()} [wasmwright] ${message}`;
}
