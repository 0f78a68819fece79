#!/usr/bin/env node

import { expandSource, loadProtocol, resolveLatestRef } from './loader.js';
import { parseProtocols } from './parser.js';
import { generateBindings } from './generator/index.js';
import { writeArtifacts } from './writer.js';
import { mergeConfig, validateConfig } from './config.js';
import { createLogger } from './logger.js';
import { createProgram, type CliOptions } from './program.js';
import type { Config } from './types.js';

/**
 * Main CLI entry point for cdp-bindgen
 *
 * This tool:
 * 1. Resolves the protocol version (latest published one unless --ref is given)
 * 2. Loads and parses the protocol schema payloads
 * 3. Generates one module per required domain plus the shared units
 * 4. Replaces the files of the output directory with the generated set
 */
async function main(): Promise<void> {
  const program = createProgram().parse(process.argv);
  const options = program.opts<CliOptions>();
  let logger = createLogger(options.logLevel ?? 'info');

  try {
    const cliConfig: Config = {
      input: options.input,
      output: options.output,
      ref: options.ref,
      package: options.package,
      domains: program.args,
      pretty: options.pretty,
      logLevel: options.logLevel,
    };
    const config = validateConfig(mergeConfig(cliConfig, options.config));
    logger = createLogger(config.logLevel);
    logger.debug(`Configuration: ${JSON.stringify(config)}`);
    logger.info(`Output: ${config.output}`);

    let ref = config.ref;
    if (!ref) {
      logger.info('Fetching latest protocol version');
      ref = await resolveLatestRef();
      logger.info(`Latest version: ${ref}`);
    }

    const payloads: unknown[] = [];
    for (const template of config.input) {
      const source = expandSource(template, ref);
      logger.info(`Loading protocol from: ${source}`);
      payloads.push(await loadProtocol(source));
    }

    const model = parseProtocols(payloads);
    logger.debug(`Parsed ${model.domains.length} domains`);

    const artifacts = generateBindings(
      model,
      {
        domains: config.domains,
        mandatoryDomains: config.mandatoryDomains,
        ref,
        package: config.package,
      },
      logger
    );

    await writeArtifacts(config.output, artifacts, { pretty: config.pretty, logger });
    logger.success(`Generated ${artifacts.length} modules in ${config.output}`);
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    if (error instanceof Error && error.stack) {
      logger.debug(error.stack);
    }
    process.exit(1);
  }
}

// Run CLI
main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
