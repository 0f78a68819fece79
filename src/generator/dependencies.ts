/**
 * Dependency extraction utilities
 *
 * Collects the type references used by a domain and computes which domains
 * must be generated together so that every reference in the generated code
 * resolves.
 *
 * The schema declares a `dependencies` list for each domain, but that list is
 * a subset of the modules the generated code actually imports. It is ignored
 * here; dependencies are always computed from the references themselves.
 */

import type { Domain, Property, ProtocolModel, Reference, TypeDecl, TypeDescriptor } from '../types.js';
import { UnknownDomainSelected, UnresolvedReference } from '../errors.js';
import { toModuleName } from './naming.js';

/**
 * A reference together with the place it is used at
 */
export interface ReferenceSite {
  /** e.g. `Page.navigate.frameId` */
  site: string;
  ref: Reference;
}

function descriptorReference(descriptor: TypeDescriptor): Reference | undefined {
  switch (descriptor.kind) {
    case 'reference':
      return descriptor.ref;
    case 'array':
      return descriptor.items.kind === 'reference' ? descriptor.items.ref : undefined;
    case 'primitive':
      return undefined;
  }
}

function propertySites(owner: string, properties: readonly Property[]): ReferenceSite[] {
  const sites: ReferenceSite[] = [];
  for (const property of properties) {
    const ref = descriptorReference(property.type);
    if (ref) {
      sites.push({ site: `${owner}.${property.name}`, ref });
    }
  }
  return sites;
}

function typeSites(type: TypeDecl): ReferenceSite[] {
  const owner = `${type.domain}.${type.id}`;
  switch (type.shape.kind) {
    case 'enum':
      return [];
    case 'composite':
      return propertySites(owner, type.shape.properties);
    case 'primitive': {
      const ref = descriptorReference(type.shape.base);
      return ref ? [{ site: owner, ref }] : [];
    }
  }
}

/**
 * Lists every reference used by the types, commands and events of a domain
 *
 * @param domain - Domain to scan
 * @returns References in declaration order, with the site that uses each
 */
export function collectReferences(domain: Domain): ReferenceSite[] {
  const sites: ReferenceSite[] = [];

  for (const type of domain.types) {
    sites.push(...typeSites(type));
  }
  for (const command of domain.commands) {
    const owner = `${domain.name}.${command.name}`;
    sites.push(...propertySites(owner, command.parameters));
    sites.push(...propertySites(owner, command.returns));
  }
  for (const event of domain.events) {
    sites.push(...propertySites(`${domain.name}.${event.name}`, event.parameters));
  }

  return sites;
}

/**
 * Names of the other domains a domain references, sorted
 */
export function referencedDomains(domain: Domain): string[] {
  const names = new Set<string>();
  for (const { ref } of collectReferences(domain)) {
    if (ref.domain !== domain.name) {
      names.add(ref.domain);
    }
  }
  return Array.from(names).sort();
}

/**
 * Finds the declared name of a domain given either its declared name or its
 * module name (`DOM` and `dom` both select `DOM`)
 *
 * @throws UnknownDomainSelected if no domain matches
 */
export function resolveDomainName(model: ProtocolModel, name: string): string {
  const exact = model.domains.find((domain) => domain.name === name);
  if (exact) {
    return exact.name;
  }
  const moduleName = toModuleName(name);
  const byModule = model.domains.find((domain) => toModuleName(domain.name) === moduleName);
  if (!byModule) {
    throw new UnknownDomainSelected(name);
  }
  return byModule.name;
}

/**
 * Computes the domains that must be generated for the requested roots
 *
 * Starts from `roots ∪ mandatory` and keeps adding every domain referenced
 * by a domain already in the set until nothing new is found.
 *
 * @param roots - Requested domains
 * @param mandatory - Domains that are always included
 * @param model - Parsed protocol
 * @returns Declared names of all required domains
 * @throws UnknownDomainSelected if a root or mandatory domain does not exist
 * @throws UnresolvedReference if a reference names a domain that does not exist
 */
export function requiredDomains(
  roots: Iterable<string>,
  mandatory: Iterable<string>,
  model: ProtocolModel
): Set<string> {
  const byName = new Map<string, Domain>(model.domains.map((domain) => [domain.name, domain]));
  const required = new Set<string>();
  const pending: string[] = [];

  for (const name of [...roots, ...mandatory]) {
    const resolved = resolveDomainName(model, name);
    if (!required.has(resolved)) {
      required.add(resolved);
      pending.push(resolved);
    }
  }

  for (let current = pending.pop(); current !== undefined; current = pending.pop()) {
    const domain = byName.get(current);
    if (!domain) {
      continue;
    }
    for (const { site, ref } of collectReferences(domain)) {
      if (ref.domain === domain.name || required.has(ref.domain)) {
        continue;
      }
      if (!byName.has(ref.domain)) {
        throw new UnresolvedReference(site, `${ref.domain}.${ref.name}`);
      }
      required.add(ref.domain);
      pending.push(ref.domain);
    }
  }

  return required;
}

/**
 * Checks that every reference of the required domains names a declared type
 * of a required domain
 *
 * @throws UnresolvedReference for the first reference that does not resolve
 */
export function verifyReferences(model: ProtocolModel, required: ReadonlySet<string>): void {
  const declared = new Set<string>();
  for (const domain of model.domains) {
    if (required.has(domain.name)) {
      for (const type of domain.types) {
        declared.add(`${domain.name}.${type.id}`);
      }
    }
  }

  for (const domain of model.domains) {
    if (!required.has(domain.name)) {
      continue;
    }
    for (const { site, ref } of collectReferences(domain)) {
      const qualified = `${ref.domain}.${ref.name}`;
      if (!declared.has(qualified)) {
        throw new UnresolvedReference(site, qualified);
      }
    }
  }
}
