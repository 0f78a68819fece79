/**
 * Shared unit generation
 *
 * Every generated set contains two units besides the domain modules:
 * - `util.ts`: the wire helpers, codec types and errors used by every domain
 * - `index.ts`: namespace re-exports of all domains and the event registry
 */

import { toModuleName } from './naming.js';
import { importPath, provenanceHeader } from './text.js';

const UTIL_BODY = `/**
 * A decoded JSON object, as found on the wire
 */
export type JsonObject = { [key: string]: unknown };

/**
 * Converts between a typed value and its wire form
 */
export interface Codec<T, W = unknown> {
  toWire(value: T): W;
  fromWire(json: unknown): T;
}

/**
 * Codec of an event payload, tagged with the method the event arrives under
 */
export interface EventCodec<T> extends Codec<T, JsonObject> {
  readonly method: string;
}

/**
 * Request yielded by a command generator
 */
export interface CommandRequest {
  method: string;
  params?: JsonObject;
}

/**
 * A command call. The first \`next()\` yields the request; the reply result
 * passed to the second \`next()\` is decoded into the return value.
 */
export type CommandGenerator<T> = Generator<CommandRequest, T, JsonObject>;

/**
 * Event codecs keyed by method name
 */
export type EventRegistry = ReadonlyMap<string, EventCodec<unknown>>;

/**
 * Base class of the errors raised while decoding wire values
 */
export class WireError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WireError';
  }
}

export class MissingField extends WireError {
  constructor(
    readonly owner: string,
    readonly field: string
  ) {
    super(\`\${owner}: missing required field "\${field}"\`);
    this.name = 'MissingField';
  }
}

export class UnknownEnumValue extends WireError {
  constructor(
    readonly owner: string,
    readonly value: unknown
  ) {
    super(\`\${owner}: unknown enum value \${String(JSON.stringify(value))}\`);
    this.name = 'UnknownEnumValue';
  }
}

export class UnexpectedWireType extends WireError {
  constructor(
    readonly where: string,
    readonly expected: string,
    readonly value: unknown
  ) {
    super(\`\${where}: expected \${expected}, got \${describe(value)}\`);
    this.name = 'UnexpectedWireType';
  }
}

export class UnknownEvent extends WireError {
  constructor(readonly method: string) {
    super(\`Unknown event: \${method}\`);
    this.name = 'UnknownEvent';
  }
}

export class DuplicateEvent extends WireError {
  constructor(readonly method: string) {
    super(\`Event registered twice: \${method}\`);
    this.name = 'DuplicateEvent';
  }
}

function describe(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  return Array.isArray(value) ? 'array' : typeof value;
}

/**
 * Reads a field that must be present
 */
export function requireField(obj: JsonObject, field: string, owner: string): unknown {
  const value = obj[field];
  if (value === undefined) {
    throw new MissingField(owner, field);
  }
  return value;
}

export function asString(value: unknown, where: string): string {
  if (typeof value !== 'string') {
    throw new UnexpectedWireType(where, 'string', value);
  }
  return value;
}

export function asNumber(value: unknown, where: string): number {
  if (typeof value !== 'number') {
    throw new UnexpectedWireType(where, 'number', value);
  }
  return value;
}

export function asInteger(value: unknown, where: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new UnexpectedWireType(where, 'integer', value);
  }
  return value;
}

export function asBoolean(value: unknown, where: string): boolean {
  if (typeof value !== 'boolean') {
    throw new UnexpectedWireType(where, 'boolean', value);
  }
  return value;
}

export function asObject(value: unknown, where: string): JsonObject {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new UnexpectedWireType(where, 'object', value);
  }
  return Object.fromEntries(Object.entries(value));
}

export function asArray(value: unknown, where: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new UnexpectedWireType(where, 'array', value);
  }
  return value;
}

export function isOneOf<T extends string>(value: unknown, values: readonly T[]): value is T {
  return values.some((candidate) => candidate === value);
}

/**
 * Builds the registry of the given event codecs
 *
 * @throws DuplicateEvent if two codecs share a method name
 */
export function createEventRegistry(codecs: Iterable<EventCodec<unknown>>): EventRegistry {
  const registry = new Map<string, EventCodec<unknown>>();
  for (const codec of codecs) {
    if (registry.has(codec.method)) {
      throw new DuplicateEvent(codec.method);
    }
    registry.set(codec.method, codec);
  }
  return registry;
}

/**
 * Decodes an inbound event message (\`{ method, params }\`) with the codec
 * registered for its method
 *
 * @throws UnknownEvent if no codec is registered for the method
 */
export function parseEvent(registry: EventRegistry, message: unknown): unknown {
  const obj = asObject(message, 'event');
  const method = asString(requireField(obj, 'method', 'event'), 'event.method');
  const codec = registry.get(method);
  if (codec === undefined) {
    throw new UnknownEvent(method);
  }
  return codec.fromWire(obj['params'] ?? {});
}
`;

/**
 * Generates the util unit shared by all domain modules
 *
 * @param ref - Version label of the provenance header
 */
export function generateUtil(ref: string): string {
  return `${provenanceHeader(ref)}\n${UTIL_BODY}`;
}

/**
 * Generates the index unit: one namespace import and re-export per
 * generated domain, plus the registry of every generated event
 *
 * @param domains - Declared names of the generated domains
 * @param ref - Version label of the provenance header
 * @param qualifier - Import qualifier ("." for relative imports)
 */
export function generateIndex(domains: Iterable<string>, ref: string, qualifier = '.'): string {
  const modules = Array.from(domains, toModuleName).sort();
  const units = [...modules, 'util'].sort();

  const imports = units.map((unit) => `import * as ${unit} from '${importPath(unit, qualifier)}';`);
  const events = modules.map((module) => `...${module}.events`);

  return [
    provenanceHeader(ref),
    imports.join('\n'),
    '',
    `export { ${units.join(', ')} };`,
    '',
    '/**',
    ' * Codecs of every generated event, keyed by method name',
    ' */',
    `export const eventRegistry: util.EventRegistry = util.createEventRegistry([${events.join(', ')}]);`,
    '',
  ].join('\n');
}
