import { Command, InvalidArgumentError } from 'commander';
import { isLogLevel } from './logger.js';
import type { LogLevel } from './types.js';

export interface CliOptions {
  input: string[];
  output?: string;
  config?: string;
  ref?: string;
  package?: string;
  pretty?: boolean;
  logLevel?: LogLevel;
}

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError('Expected one of: debug, info, warn, error.');
  }
  return value;
}

/**
 * Collects the values of a repeatable option; domain names after it stay
 * positional
 */
function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Builds the commander program of cdp-bindgen
 */
export function createProgram(): Command {
  return new Command()
    .name('cdp-bindgen')
    .description('Generate typed TypeScript bindings from the DevTools protocol schema')
    .version('1.0.0')
    .argument('[domains...]', 'Domains to generate, in addition to the mandatory ones')
    .option(
      '-i, --input <url-or-path>',
      'URL or path of a protocol JSON file ({ref} is replaced by the version); repeat for several files',
      collect,
      []
    )
    .option('-o, --output <directory>', 'Output directory for generated TypeScript files')
    .option('-c, --config <path>', 'Path to config file (default: cdp-bindgen.config.json)')
    .option('--ref <ref>', 'Protocol version tag (default: latest published version)')
    .option('-p, --package <qualifier>', 'Import qualifier of the generated modules ("." for relative imports)')
    .option('--pretty', 'Format generated code with Prettier')
    .option('-l, --log-level <level>', 'Minimum level of log messages', parseLogLevel);
}
