import { readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import type { Config, LogLevel } from './types.js';
import { ConfigError } from './errors.js';
import { formatIssuePath } from './schema.js';
import { DEFAULT_SOURCES } from './loader.js';
import { DEFAULT_MANDATORY_DOMAINS } from './generator/index.js';

export const DEFAULT_CONFIG_FILE = 'cdp-bindgen.config.json';

const ConfigFileSchema = z
  .object({
    input: z.array(z.string().min(1)).optional(),
    output: z.string().min(1).optional(),
    ref: z.string().min(1).optional(),
    package: z.string().min(1).optional(),
    domains: z.array(z.string().min(1)).optional(),
    mandatoryDomains: z.array(z.string().min(1)).optional(),
    pretty: z.boolean().optional(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  })
  .strict();

/**
 * Configuration with every default applied; only `ref` may still be missing,
 * in which case the latest published version is used.
 */
export interface ResolvedConfig {
  input: string[];
  output: string;
  ref?: string;
  package: string;
  domains: string[];
  mandatoryDomains: string[];
  pretty: boolean;
  logLevel: LogLevel;
}

/**
 * Loads configuration from a JSON file
 *
 * @param configPath - Path to the config file
 * @returns Configuration object or null if the file doesn't exist
 * @throws ConfigError if the file cannot be read or does not match the schema
 */
export function loadConfigFile(configPath: string): Config | null {
  let content: string;
  try {
    content = readFileSync(configPath, 'utf-8');
  } catch (error) {
    // fs errors may come from another realm (e.g. under Jest), so no instanceof
    if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw new ConfigError(`Failed to load config file ${configPath}: ${String(error)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Config file ${configPath} is not valid JSON: ${String(error)}`);
  }

  const result = ConfigFileSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? formatIssuePath(issue.path) : '(root)';
    throw new ConfigError(`Invalid config file ${configPath} at ${where}: ${issue.message}`);
  }
  return result.data;
}

/**
 * Filters out undefined values and empty lists from a configuration object
 */
function filterUndefined(config: Config): Config {
  const filtered: Config = {};
  if (config.input !== undefined && config.input.length > 0) {
    filtered.input = config.input;
  }
  if (config.output !== undefined) {
    filtered.output = config.output;
  }
  if (config.ref !== undefined) {
    filtered.ref = config.ref;
  }
  if (config.package !== undefined) {
    filtered.package = config.package;
  }
  if (config.domains !== undefined && config.domains.length > 0) {
    filtered.domains = config.domains;
  }
  if (config.mandatoryDomains !== undefined) {
    filtered.mandatoryDomains = config.mandatoryDomains;
  }
  if (config.pretty !== undefined) {
    filtered.pretty = config.pretty;
  }
  if (config.logLevel !== undefined) {
    filtered.logLevel = config.logLevel;
  }
  return filtered;
}

/**
 * Merges CLI arguments with config file values (CLI takes precedence)
 * Only non-undefined CLI values override file config values
 *
 * @param cliConfig - Configuration from CLI arguments (may contain undefined values)
 * @param configPath - Optional path to config file
 * @param cwd - Directory searched for the default config file
 * @returns Merged configuration
 * @throws ConfigError if an explicitly given config file does not exist
 */
export function mergeConfig(cliConfig: Config, configPath?: string, cwd: string = process.cwd()): Config {
  let fileConfig: Config | null;

  if (configPath) {
    fileConfig = loadConfigFile(configPath);
    if (!fileConfig) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
  } else {
    fileConfig = loadConfigFile(join(cwd, DEFAULT_CONFIG_FILE));
  }

  return {
    ...(fileConfig ?? {}),
    ...filterUndefined(cliConfig),
  };
}

/**
 * Validates the merged configuration and applies defaults
 *
 * @throws ConfigError if required fields are missing
 */
export function validateConfig(config: Config): ResolvedConfig {
  if (!config.output) {
    throw new ConfigError('Output is required. Provide --output flag or set "output" in config file.');
  }

  return {
    input: config.input && config.input.length > 0 ? config.input : [...DEFAULT_SOURCES],
    output: config.output,
    ref: config.ref,
    package: config.package ?? '.',
    domains: config.domains ?? [],
    mandatoryDomains: config.mandatoryDomains ?? [...DEFAULT_MANDATORY_DOMAINS],
    pretty: config.pretty ?? false,
    logLevel: config.logLevel ?? 'info',
  };
}
