// Loader for wasmwright.config.json (JSON with comments)
import { existsSync, readFileSync } from 'fs';
import { dirname, join, parse, resolve } from 'path';
import type { ZodError, ZodType, ZodTypeDef } from 'zod';
import { ConfigurationError } from './errors.js';
import { type ProjectConfig, ProjectConfigSchema } from './types.js';

export const CONFIG_FILE_NAME = 'wasmwright.config.json';

export interface LoadedConfiguration {
  config: ProjectConfig;
  /** Directory holding the config file, or the search start when there is none */
  projectRoot: string;
  configPath?: string;
}

/**
 * Validate `value` against `schema`, turning zod issues into a ConfigurationError
 * listing every offending path.
 */
export function parseWithSchema<Output, Input>(
  schema: ZodType<Output, ZodTypeDef, Input>,
  value: unknown,
  label: string
): Output {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }
  throw new ConfigurationError(`Invalid ${label}:\n${formatIssues(result.error)}`);
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `  - ${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('\n');
}

export class ConfigLoader {
  private readonly configPath: string;
  private readonly projectRoot: string;

  constructor(configPath: string) {
    this.configPath = resolve(configPath);
    this.projectRoot = dirname(this.configPath);
  }

  /**
   * Walk up from `startDir` looking for wasmwright.config.json.
   */
  public static find(startDir: string = process.cwd()): string | undefined {
    let current = resolve(startDir);
    const { root } = parse(current);
    while (true) {
      const candidate = join(current, CONFIG_FILE_NAME);
      if (existsSync(candidate)) {
        return candidate;
      }
      if (current === root) {
        return undefined;
      }
      current = dirname(current);
    }
  }

  /**
   * Load an explicit config file, the nearest one above `cwd`, or the defaults.
   */
  public static load(configPath?: string, cwd: string = process.cwd()): LoadedConfiguration {
    if (configPath) {
      return new ConfigLoader(configPath).loadConfig();
    }
    const found = ConfigLoader.find(cwd);
    if (found) {
      return new ConfigLoader(found).loadConfig();
    }
    return {
      config: parseWithSchema(ProjectConfigSchema, {}, 'default configuration'),
      projectRoot: resolve(cwd),
    };
  }

  public loadConfig(): LoadedConfiguration {
    if (!existsSync(this.configPath)) {
      throw new ConfigurationError(`Configuration file not found: ${this.configPath}`);
    }

    const rawConfig = this.readConfigFile();
    const config = parseWithSchema(ProjectConfigSchema, rawConfig, this.configPath);
    return {
      config: this.resolveConfigPaths(config),
      projectRoot: this.projectRoot,
      configPath: this.configPath,
    };
  }

  private readConfigFile(): unknown {
    const content = readFileSync(this.configPath, 'utf-8');
    try {
      return JSON.parse(stripJSONComments(content));
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new ConfigurationError(`Invalid JSON in ${this.configPath}: ${error.message}`);
      }
      throw error;
    }
  }

  // Relative paths in the file are relative to the file, not the cwd
  private resolveConfigPaths(config: ProjectConfig): ProjectConfig {
    const at = (path: string | undefined) => (path ? resolve(this.projectRoot, path) : undefined);
    return {
      ...config,
      dist: {
        ...config.dist,
        outputDir: at(config.dist.outputDir),
        staticDir: at(config.dist.staticDir),
        styleEntry: at(config.dist.styleEntry),
        workspaceRoot: at(config.dist.workspaceRoot),
        targetDir: at(config.dist.targetDir),
        cacheDir: at(config.dist.cacheDir),
      },
      watch: {
        ...config.watch,
        roots: config.watch.roots?.map((root) => resolve(this.projectRoot, root)),
      },
      logging: {
        ...config.logging,
        file: at(config.logging.file),
      },
    };
  }
}

/**
 * Remove `//` and `/* *\/` comments outside of string literals.
 */
export function stripJSONComments(content: string): string {
  let result = '';
  let inString = false;
  let inSingleLineComment = false;
  let inMultiLineComment = false;
  let escaped = false;

  for (let i = 0; i < content.length; i++) {
    const char = content[i];
    const nextChar = content[i + 1];

    if (inSingleLineComment) {
      if (char === '\n') {
        inSingleLineComment = false;
        result += char;
      }
      continue;
    }

    if (inMultiLineComment) {
      if (char === '*' && nextChar === '/') {
        inMultiLineComment = false;
        i++;
      }
      continue;
    }

    if (inString) {
      result += char;
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
      result += char;
    } else if (char === '/' && nextChar === '/') {
      inSingleLineComment = true;
      i++;
    } else if (char === '/' && nextChar === '*') {
      inMultiLineComment = true;
      i++;
    } else {
      result += char;
    }
  }

  return result;
}
