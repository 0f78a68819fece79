/**
 * Property rendering utilities
 *
 * A property of the model is rendered differently depending on where it
 * appears: as a record field, as a command parameter, or as one element of a
 * command's return value. The value type is the same in every context; only
 * the rendering strategy changes.
 */

import type { Property, TypeDescriptor } from '../types.js';
import { toIdentifier } from './naming.js';
import { primitiveDecoder, resolveReference, resolveType } from './type-resolver.js';
import { docComment, indent, literal, statusTags } from './text.js';

/**
 * Returns the properties with every required property before every optional
 * one, keeping declaration order within each group
 */
export function sortRequiredFirst<T extends { optional: boolean }>(properties: readonly T[]): T[] {
  return [...properties.filter((p) => !p.optional), ...properties.filter((p) => p.optional)];
}

/**
 * Name of the record field (or parameter) a property becomes
 */
export function fieldName(property: Property): string {
  return toIdentifier(property.name);
}

function descriptionWithValues(property: Property): string | undefined {
  if (!property.enumValues) {
    return property.description;
  }
  const values = `Allowed values: ${property.enumValues.map((value) => `\`${value}\``).join(', ')}`;
  return property.description ? `${property.description}\n\n${values}` : values;
}

/**
 * Renders a record field declaration with its doc comment
 *
 * @example
 * // /** Frame unique identifier. *\/
 * // id: FrameId;
 */
export function renderField(property: Property): string {
  const doc = docComment([descriptionWithValues(property), statusTags(property)]);
  const optional = property.optional ? '?' : '';
  return `${doc}${fieldName(property)}${optional}: ${resolveType(property.type, property.domain)};`;
}

/**
 * Renders a command parameter as written in the function signature
 */
export function renderParameter(property: Property, local: string): string {
  const optional = property.optional ? '?' : '';
  return `${local}${optional}: ${resolveType(property.type, property.domain)}`;
}

/**
 * Renders the `@param` line of a command parameter
 */
export function renderParameterDoc(property: Property, local: string): string {
  const notes: string[] = [];
  if (property.experimental) {
    notes.push('**(EXPERIMENTAL)**');
  }
  if (property.optional) {
    notes.push('*(Optional)*');
  }
  if (property.deprecated) {
    notes.push('*(Deprecated)*');
  }
  const description = descriptionWithValues(property);
  if (description) {
    notes.push(description.replace(/\n+/g, ' '));
  }
  return notes.length > 0 ? `@param ${local} - ${notes.join(' ')}` : `@param ${local}`;
}

/**
 * Renders the description of one command return value
 */
export function renderReturnDoc(property: Property): string {
  const description = property.description ? property.description.replace(/\n+/g, ' ') : '';
  return property.optional ? `*(Optional)* ${description}`.trimEnd() : description;
}

/**
 * Renders the TypeScript type a command resolves to: `void` without returns,
 * the value type of a single return, or a tuple in declaration order
 */
export function renderReturnType(returns: readonly Property[]): string {
  if (returns.length === 0) {
    return 'void';
  }
  const types = returns.map((r) => resolveType(r.type, r.domain, r.optional));
  if (types.length === 1) {
    return types[0];
  }
  return `[${types.join(', ')}]`;
}

/**
 * Expression converting a typed value to its wire form
 */
export function encodeValue(descriptor: TypeDescriptor, domain: string, value: string): string {
  switch (descriptor.kind) {
    case 'primitive':
      return value;
    case 'reference':
      return `${resolveReference(descriptor.ref, domain)}.toWire(${value})`;
    case 'array':
      if (descriptor.items.kind === 'reference') {
        return `${value}.map((i) => ${resolveReference(descriptor.items.ref, domain)}.toWire(i))`;
      }
      return `[...${value}]`;
  }
}

/**
 * Expression converting a wire value (typed `unknown`) to its typed form
 *
 * @param where - Location reported by wire type errors, e.g. `Page.Frame.id`
 */
export function decodeValue(descriptor: TypeDescriptor, domain: string, wire: string, where: string): string {
  switch (descriptor.kind) {
    case 'primitive': {
      const decoder = primitiveDecoder(descriptor.tag);
      return decoder ? `${decoder}(${wire}, ${literal(where)})` : wire;
    }
    case 'reference':
      return `${resolveReference(descriptor.ref, domain)}.fromWire(${wire})`;
    case 'array': {
      const array = `util.asArray(${wire}, ${literal(where)})`;
      const element = decodeValue(descriptor.items, domain, 'i', `${where}[]`);
      return element === 'i' ? array : `${array}.map((i) => ${element})`;
    }
  }
}

/**
 * Statements assigning a property to a wire object. Optional properties are
 * only assigned when present.
 *
 * @param target - Name of the wire object being built
 * @param value - Expression holding the typed value
 */
export function renderEncode(property: Property, target: string, value: string): string {
  const assign = `${target}[${literal(property.name)}] = ${encodeValue(property.type, property.domain, value)};`;
  if (!property.optional) {
    return assign;
  }
  return `if (${value} !== undefined) {\n${indent(assign, 2)}\n}`;
}

/**
 * Expression reading a property from a wire object. Required properties
 * throw `MissingField` when absent; optional ones become `undefined`.
 *
 * @param source - Name of the wire object
 * @param owner - Qualified name of the record or command being decoded
 */
export function renderDecode(property: Property, source: string, owner: string): string {
  const where = `${owner}.${property.name}`;
  if (!property.optional) {
    const wire = `util.requireField(${source}, ${literal(property.name)}, ${literal(owner)})`;
    return decodeValue(property.type, property.domain, wire, where);
  }
  const wire = `${source}[${literal(property.name)}]`;
  return `${wire} !== undefined ? ${decodeValue(property.type, property.domain, wire, where)} : undefined`;
}
