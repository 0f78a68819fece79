/**
 * Domain module generation
 *
 * A domain becomes one module: provenance header, namespace imports of the
 * domains it references and of the util unit, then its types, commands and
 * events in schema order, and finally the list of its event codecs.
 */

import type { Domain } from '../types.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { referencedDomains } from './dependencies.js';
import { toModuleName, toTypeIdentifier } from './naming.js';
import { generateType } from './type-generator.js';
import { generateCommand } from './command-generator.js';
import { eventName, generateEvent } from './event-generator.js';
import { docComment, importPath, provenanceHeader } from './text.js';

export interface DomainGenerateOptions {
  /** Version label of the provenance header */
  ref: string;
  /** Import qualifier of the generated units */
  package?: string;
  logger?: Logger;
}

/**
 * Module names of the other domains a domain module imports, sorted
 */
export function domainImports(domain: Domain): string[] {
  return referencedDomains(domain).map(toModuleName).sort();
}

function domainMarker(domain: Domain): string {
  if (domain.deprecated) {
    return ' (deprecated)';
  }
  return domain.experimental ? ' (experimental)' : '';
}

/**
 * Generates the module of a domain
 *
 * @param domain - Domain from the model
 * @param options - Header and import options
 * @returns Source text of `<moduleName>.ts`
 */
export function generateDomain(domain: Domain, options: DomainGenerateOptions): string {
  const logger = options.logger ?? silentLogger;
  const imports = domainImports(domain);

  const importLines = [...imports, 'util'].map((unit) => `import * as ${unit} from '${importPath(unit, options.package)}';`);

  const moduleDoc = domain.description ? `${docComment([domain.description, '@packageDocumentation'])}\n` : '';

  const sections: string[] = [];

  for (const type of domain.types) {
    logger.debug(`Generating type ${domain.name}.${type.id}: ${type.shape.kind}`);
    sections.push(generateType(type));
  }

  for (const command of domain.commands) {
    logger.debug(`Generating command ${domain.name}.${command.name}`);
    sections.push(generateCommand(command, imports));
  }

  const taken = [...imports, ...domain.types.map((type) => toTypeIdentifier(type.id))];
  for (const event of domain.events) {
    logger.debug(`Generating event ${domain.name}.${event.name}`);
    sections.push(generateEvent(event, taken));
  }

  const eventNames = domain.events.map((event) => eventName(event, taken));
  sections.push(
    [
      '/**',
      ' * Codecs of the events of this domain',
      ' */',
      `export const events: readonly util.EventCodec<unknown>[] = [${eventNames.join(', ')}];`,
    ].join('\n')
  );

  const header = provenanceHeader(options.ref, [`Protocol domain: ${domain.name}${domainMarker(domain)}`]);
  return `${header}\n${moduleDoc}${importLines.join('\n')}\n\n${sections.join('\n\n')}\n`;
}
