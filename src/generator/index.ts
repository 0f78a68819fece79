/**
 * Main bindings generator module
 *
 * Entry point for generating TypeScript bindings from a parsed protocol. It
 * resolves the set of domains to emit, checks that every reference of that
 * set resolves, and renders one unit per domain plus the shared units.
 */

import type { GenerateOptions, GeneratedArtifact, ProtocolModel } from '../types.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { requiredDomains, verifyReferences } from './dependencies.js';
import { generateDomain } from './domain-generator.js';
import { generateIndex, generateUtil } from './util-generator.js';
import { toModuleName } from './naming.js';
import { MalformedSchemaRecord } from '../errors.js';

/**
 * Domains generated whatever the request: every client needs them to attach
 * to a target.
 */
export const DEFAULT_MANDATORY_DOMAINS: readonly string[] = ['Target', 'Inspector'];

/**
 * Generates the bindings of the requested domains and everything they need
 *
 * Nothing is generated if any domain or reference fails to resolve, so
 * callers never receive a partial set.
 *
 * @param model - Parsed protocol
 * @param options - Requested domains, version label and import qualifier
 * @param logger - Receives one debug line per generated entity
 * @returns Generated units sorted by path
 *
 * @example
 * ```typescript
 * const artifacts = generateBindings(model, { domains: ['Page'], ref: 'v0.0.1' });
 * // page.ts, network.ts, ..., index.ts, util.ts
 * ```
 */
export function generateBindings(
  model: ProtocolModel,
  options: GenerateOptions,
  logger: Logger = silentLogger
): GeneratedArtifact[] {
  const mandatory = options.mandatoryDomains ?? DEFAULT_MANDATORY_DOMAINS;
  const required = requiredDomains(options.domains, mandatory, model);
  verifyReferences(model, required);

  const domains = model.domains.filter((domain) => required.has(domain.name));
  logger.info(`Generating ${domains.length} domains: ${domains.map((domain) => domain.name).join(', ')}`);

  const artifacts: GeneratedArtifact[] = [];
  const paths = new Set<string>();

  for (const domain of domains) {
    const moduleName = toModuleName(domain.name);
    if (paths.has(moduleName)) {
      throw new MalformedSchemaRecord(domain.name, `module name "${moduleName}" is already taken`);
    }
    paths.add(moduleName);

    artifacts.push({
      path: `${moduleName}.ts`,
      code: generateDomain(domain, { ref: options.ref, package: options.package, logger }),
    });
  }

  artifacts.push({ path: 'util.ts', code: generateUtil(options.ref) });
  artifacts.push({
    path: 'index.ts',
    code: generateIndex(
      domains.map((domain) => domain.name),
      options.ref,
      options.package
    ),
  });

  return artifacts.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}

export { requiredDomains, resolveDomainName, verifyReferences, referencedDomains } from './dependencies.js';
export { generateDomain } from './domain-generator.js';
export { generateIndex, generateUtil } from './util-generator.js';
export { generateType } from './type-generator.js';
export { generateCommand } from './command-generator.js';
export { generateEvent } from './event-generator.js';
