/**
 * Type resolution utilities
 *
 * Maps protocol type descriptors to TypeScript type expressions as they are
 * written inside the module of a given domain.
 */

import type { Items, PrimitiveTag, Reference, TypeDescriptor } from '../types.js';
import { toModuleName, toTypeIdentifier } from './naming.js';

/**
 * TypeScript type of each primitive tag. `object` values use the
 * string-keyed map alias of the generated util module.
 */
export const PRIMITIVE_TYPES: Readonly<Record<PrimitiveTag, string>> = {
  boolean: 'boolean',
  integer: 'number',
  number: 'number',
  object: 'util.JsonObject',
  string: 'string',
  any: 'unknown',
};

/**
 * Name of the util decoder that checks a wire value of each primitive tag.
 * `any` values are taken as they are.
 */
const PRIMITIVE_DECODERS: Readonly<Record<PrimitiveTag, string | null>> = {
  boolean: 'util.asBoolean',
  integer: 'util.asInteger',
  number: 'util.asNumber',
  object: 'util.asObject',
  string: 'util.asString',
  any: null,
};

/**
 * Resolves a reference to the name of its type (and codec) in `domain`
 *
 * @example
 * resolveReference({ domain: 'Page', name: 'FrameId' }, 'Page')       // 'FrameId'
 * resolveReference({ domain: 'Target', name: 'TargetID' }, 'Page')    // 'target.TargetID'
 */
export function resolveReference(ref: Reference, domain: string): string {
  const name = toTypeIdentifier(ref.name);
  return ref.domain === domain ? name : `${toModuleName(ref.domain)}.${name}`;
}

/**
 * Resolves an array element descriptor
 */
export function resolveItems(items: Items, domain: string): string {
  return items.kind === 'reference' ? resolveReference(items.ref, domain) : PRIMITIVE_TYPES[items.tag];
}

/**
 * Resolves a type descriptor to a TypeScript type expression
 *
 * @param descriptor - Primitive tag, reference or array descriptor
 * @param domain - Domain whose module the expression is written in
 * @param optional - Whether the value may be absent
 * @returns TypeScript type expression, e.g. `number`, `dom.NodeId[]`,
 *          `FrameId | undefined`
 */
export function resolveType(descriptor: TypeDescriptor, domain: string, optional = false): string {
  const type = resolveBaseType(descriptor, domain);
  return optional ? `${type} | undefined` : type;
}

function resolveBaseType(descriptor: TypeDescriptor, domain: string): string {
  switch (descriptor.kind) {
    case 'primitive':
      return PRIMITIVE_TYPES[descriptor.tag];
    case 'reference':
      return resolveReference(descriptor.ref, domain);
    case 'array':
      return `${resolveItems(descriptor.items, domain)}[]`;
  }
}

/**
 * Type of the wire form produced by encoding a value of `descriptor`
 */
export function resolveWireType(descriptor: TypeDescriptor): string {
  switch (descriptor.kind) {
    case 'primitive':
      return PRIMITIVE_TYPES[descriptor.tag];
    case 'reference':
      return 'unknown';
    case 'array':
      return descriptor.items.kind === 'primitive' ? `${PRIMITIVE_TYPES[descriptor.items.tag]}[]` : 'unknown[]';
  }
}

/**
 * Returns the util decoder for a primitive tag, or null when any value is
 * accepted
 */
export function primitiveDecoder(tag: PrimitiveTag): string | null {
  return PRIMITIVE_DECODERS[tag];
}
