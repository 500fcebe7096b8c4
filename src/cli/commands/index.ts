import type { Command } from 'commander';
import { registerDistCommand } from './dist.js';
import { registerStartCommand } from './start.js';
import { registerVersionCommand } from './version.js';
import { registerWatchCommand } from './watch.js';

export type CommandRegistrar = (program: Command) => void;

export const COMMAND_REGISTRARS: CommandRegistrar[] = [
  registerDistCommand,
  registerWatchCommand,
  registerStartCommand,
  registerVersionCommand,
];

export const registerCliCommands = (program: Command): void => {
  COMMAND_REGISTRARS.forEach((register) => register(program));
};
