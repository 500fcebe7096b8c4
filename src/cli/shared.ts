import chalk from 'chalk';
import { ConfigLoader, type LoadedConfiguration } from '../config.js';
import { describeError } from '../errors.js';
import { createLogger, LOG_LEVELS, type Logger, type LogLevelName } from '../logger.js';

export const exitWithError = (message: string, code = 1): never => {
  console.error(chalk.red(message));
  process.exit(code);
};

export const loadConfigOrExit = (configPath?: string): LoadedConfiguration => {
  try {
    return ConfigLoader.load(configPath);
  } catch (error) {
    return exitWithError(describeError(error));
  }
};

export interface LoggingCliOptions {
  logLevel?: string;
  debug?: boolean;
}

export function parseLogLevel(value: string | undefined): LogLevelName | undefined {
  if (value === undefined) return undefined;
  const level = LOG_LEVELS.find((candidate) => candidate === value.toLowerCase());
  if (!level) {
    return exitWithError(`Invalid log level "${value}". Use one of: ${LOG_LEVELS.join(', ')}`);
  }
  return level;
}

export const createCommandLogger = (
  loaded: LoadedConfiguration,
  options: LoggingCliOptions
): Promise<Logger> => {
  const level = options.debug ? 'debug' : (parseLogLevel(options.logLevel) ?? loaded.config.logging.level);
  return createLogger(loaded.config.logging.file, level);
};

/**
 * Resolves on the first SIGINT or SIGTERM.
 */
export function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}
