#!/usr/bin/env node
import chalk from 'chalk';
import { Command } from 'commander';
import { registerCliCommands } from './cli/commands/index.js';
import { exitWithError } from './cli/shared.js';
// Version is fixed at build time, never read from the filesystem
import { PACKAGE_INFO } from './cli/version.js';
import { describeError } from './errors.js';
import { BRAND_MARK } from './utils/brand.js';
import { isMainModule } from './utils/paths.js';

const { version } = PACKAGE_INFO;

const program = new Command();

program
  .name('wasmwright')
  .description(`${BRAND_MARK} ${chalk.cyan('wasmwright - build, package and live-rebuild WebAssembly crates')}`)
  .version(version, '-v, --version', 'output the version number');

registerCliCommands(program);

if (isMainModule(import.meta.url)) {
  if (!process.argv.slice(2).length) {
    program.outputHelp();
  } else {
    program.parseAsync(process.argv).catch((error: unknown) => {
      exitWithError(describeError(error));
    });
  }
}

// Export program for testing
export { program };
