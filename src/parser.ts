import type { ZodError } from 'zod';
import type {
  Command,
  Domain,
  Event,
  Items,
  Property,
  ProtocolModel,
  ProtocolVersion,
  Reference,
  TypeDecl,
  TypeDescriptor,
  TypeShape,
} from './types.js';
import {
  RawDomainSchema,
  RawProtocolSchema,
  formatIssuePath,
  type RawCommand,
  type RawDomain,
  type RawEvent,
  type RawItems,
  type RawProperty,
  type RawType,
} from './schema.js';
import { MalformedSchemaRecord, SchemaVersionMismatch } from './errors.js';
import { toEnumMember } from './generator/naming.js';

/**
 * Protocol version this generator understands
 */
export const SUPPORTED_VERSION: ProtocolVersion = { major: '1', minor: '3' };

/**
 * Parses a raw protocol payload into the immutable protocol model
 *
 * The version is checked first; a mismatch aborts before any domain is
 * looked at. Every domain is then validated and converted as a whole, so a
 * malformed record anywhere means no model at all.
 *
 * @param raw - Decoded JSON payload
 * @param expected - Protocol version to accept
 * @returns Parsed model
 * @throws SchemaVersionMismatch if the declared version differs from `expected`
 * @throws MalformedSchemaRecord if a required field is missing or invalid
 */
export function parseProtocol(raw: unknown, expected: ProtocolVersion = SUPPORTED_VERSION): ProtocolModel {
  const envelope = RawProtocolSchema.safeParse(raw);
  if (!envelope.success) {
    throw fromZodError('protocol', envelope.error);
  }

  const { version } = envelope.data;
  if (version.major !== expected.major || version.minor !== expected.minor) {
    throw new SchemaVersionMismatch(
      `${expected.major}.${expected.minor}`,
      `${version.major}.${version.minor}`
    );
  }

  const domains = envelope.data.domains.map((entry, index) => {
    const location = domainLocation(entry, index);
    const parsed = RawDomainSchema.safeParse(entry);
    if (!parsed.success) {
      throw fromZodError(location, parsed.error);
    }
    return parseDomain(parsed.data);
  });

  return Object.freeze({
    version: Object.freeze({ major: version.major, minor: version.minor }),
    domains: Object.freeze(domains),
  });
}

/**
 * Parses several payloads of the same protocol version and merges their domains
 *
 * @throws MalformedSchemaRecord if two payloads declare the same domain
 */
export function parseProtocols(raws: readonly unknown[], expected: ProtocolVersion = SUPPORTED_VERSION): ProtocolModel {
  const seen = new Set<string>();
  const domains: Domain[] = [];

  for (const raw of raws) {
    for (const domain of parseProtocol(raw, expected).domains) {
      if (seen.has(domain.name)) {
        throw new MalformedSchemaRecord(domain.name, 'domain is declared more than once');
      }
      seen.add(domain.name);
      domains.push(domain);
    }
  }

  return Object.freeze({
    version: Object.freeze({ ...expected }),
    domains: Object.freeze(domains),
  });
}

/**
 * Looks up a domain by name
 */
export function findDomain(model: ProtocolModel, name: string): Domain | undefined {
  return model.domains.find((domain) => domain.name === name);
}

function domainLocation(entry: unknown, index: number): string {
  if (typeof entry === 'object' && entry !== null && 'domain' in entry && typeof entry.domain === 'string') {
    return entry.domain;
  }
  return `domains[${index}]`;
}

function fromZodError(location: string, error: ZodError): MalformedSchemaRecord {
  const issue = error.issues[0];
  if (!issue) {
    return new MalformedSchemaRecord(location, 'invalid record');
  }
  const path = formatIssuePath(issue.path);
  return new MalformedSchemaRecord(location, path ? `${path}: ${issue.message}` : issue.message);
}

function parseDomain(raw: RawDomain): Domain {
  const name = raw.domain;

  return Object.freeze({
    name,
    description: raw.description,
    experimental: raw.experimental ?? false,
    deprecated: raw.deprecated ?? false,
    dependencies: Object.freeze([...(raw.dependencies ?? [])]),
    types: Object.freeze((raw.types ?? []).map((type) => parseType(type, name))),
    commands: Object.freeze((raw.commands ?? []).map((command) => parseCommand(command, name))),
    events: Object.freeze((raw.events ?? []).map((event) => parseEvent(event, name))),
  });
}

/**
 * Decides the shape of a type: enum if it lists values, else composite if it
 * has properties, else a primitive or array wrapper.
 */
function parseType(raw: RawType, domain: string): TypeDecl {
  const location = `${domain}.${raw.id}`;
  let shape: TypeShape;

  if (raw.enum && raw.enum.length > 0) {
    assertUniqueMembers(raw.enum, location);
    shape = { kind: 'enum', values: Object.freeze([...raw.enum]) };
  } else if (raw.properties && raw.properties.length > 0) {
    const properties = raw.properties.map((property) => parseProperty(property, domain, location));
    shape = { kind: 'composite', properties: Object.freeze(properties) };
  } else {
    shape = { kind: 'primitive', base: parseDescriptor(raw, domain, location) };
  }

  return Object.freeze({
    id: raw.id,
    domain,
    description: raw.description,
    experimental: raw.experimental ?? false,
    deprecated: raw.deprecated ?? false,
    shape: Object.freeze(shape),
  });
}

function parseCommand(raw: RawCommand, domain: string): Command {
  const location = `${domain}.${raw.name}`;

  return Object.freeze({
    name: raw.name,
    domain,
    description: raw.description,
    experimental: raw.experimental ?? false,
    deprecated: raw.deprecated ?? false,
    redirect: raw.redirect,
    parameters: Object.freeze((raw.parameters ?? []).map((p) => parseProperty(p, domain, location))),
    returns: Object.freeze((raw.returns ?? []).map((r) => parseProperty(r, domain, location))),
  });
}

function parseEvent(raw: RawEvent, domain: string): Event {
  const location = `${domain}.${raw.name}`;

  return Object.freeze({
    name: raw.name,
    domain,
    description: raw.description,
    experimental: raw.experimental ?? false,
    deprecated: raw.deprecated ?? false,
    parameters: Object.freeze((raw.parameters ?? []).map((p) => parseProperty(p, domain, location))),
  });
}

function parseProperty(raw: RawProperty, domain: string, owner: string): Property {
  const location = `${owner}.${raw.name}`;

  return Object.freeze({
    name: raw.name,
    domain,
    description: raw.description,
    type: parseDescriptor(raw, domain, location),
    optional: raw.optional ?? false,
    experimental: raw.experimental ?? false,
    deprecated: raw.deprecated ?? false,
    enumValues: raw.enum && raw.enum.length > 0 ? Object.freeze([...raw.enum]) : undefined,
  });
}

/**
 * Builds a type descriptor from a record carrying `$ref`, `type` and `items`
 */
function parseDescriptor(
  raw: { type?: RawType['type']; $ref?: string; items?: RawItems },
  domain: string,
  location: string
): TypeDescriptor {
  let descriptor: TypeDescriptor;
  if (raw.$ref !== undefined) {
    descriptor = { kind: 'reference', ref: parseReference(raw.$ref, domain, location) };
  } else if (raw.type === 'array') {
    if (!raw.items) {
      throw new MalformedSchemaRecord(location, 'array type without "items"');
    }
    descriptor = { kind: 'array', items: parseItems(raw.items, domain, `${location}.items`) };
  } else if (raw.type !== undefined) {
    descriptor = { kind: 'primitive', tag: raw.type };
  } else {
    throw new MalformedSchemaRecord(location, 'missing "type" or "$ref"');
  }
  return Object.freeze(descriptor);
}

function parseItems(raw: RawItems, domain: string, location: string): Items {
  let items: Items;
  if (raw.$ref !== undefined) {
    items = { kind: 'reference', ref: parseReference(raw.$ref, domain, location) };
  } else if (raw.type === undefined) {
    throw new MalformedSchemaRecord(location, 'missing "type" or "$ref"');
  } else if (raw.type === 'array') {
    throw new MalformedSchemaRecord(location, 'nested arrays are not supported');
  } else {
    items = { kind: 'primitive', tag: raw.type };
  }
  return Object.freeze(items);
}

/**
 * Parses `Name` (same domain) or `Domain.Name` (cross domain)
 */
export function parseReference(ref: string, domain: string, location = ref): Reference {
  const parts = ref.split('.');
  if (parts.length === 1 && parts[0]) {
    return Object.freeze({ domain, name: parts[0] });
  }
  if (parts.length === 2 && parts[0] && parts[1]) {
    return Object.freeze({ domain: parts[0], name: parts[1] });
  }
  throw new MalformedSchemaRecord(location, `invalid reference "${ref}"`);
}

function assertUniqueMembers(values: readonly string[], location: string): void {
  const members = new Map<string, string>();
  for (const value of values) {
    const member = toEnumMember(value);
    const previous = members.get(member);
    if (previous !== undefined) {
      throw new MalformedSchemaRecord(
        location,
        `enum values "${previous}" and "${value}" both map to member ${member}`
      );
    }
    members.set(member, value);
  }
}
