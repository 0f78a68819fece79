/**
 * Type declaration generation utilities
 *
 * Every declared type becomes a TypeScript type plus a codec constant of the
 * same name holding its `toWire`/`fromWire` functions. The kind of
 * declaration depends on the shape the parser assigned to the type:
 * - enum: a union of string literals and a constant per value
 * - composite: an interface with one field per property
 * - primitive: an alias of a primitive or array type
 */

import type { Property, TypeDecl, TypeDescriptor } from '../types.js';
import { toEnumMember, toTypeIdentifier } from './naming.js';
import { resolveType, resolveWireType } from './type-resolver.js';
import { decodeValue, encodeValue, fieldName, renderDecode, renderEncode, renderField, sortRequiredFirst } from './property-generator.js';
import { docComment, indent, literal, statusTags } from './text.js';

/**
 * Generates TypeScript code for a declared type
 *
 * @param type - Type declaration from the model
 * @returns Type and codec declarations
 */
export function generateType(type: TypeDecl): string {
  const doc = docComment([type.description, statusTags(type)]);

  switch (type.shape.kind) {
    case 'enum':
      return doc + generateEnumType(type, type.shape.values);
    case 'composite':
      return doc + generateCompositeType(type, type.shape.properties);
    case 'primitive':
      return doc + generatePrimitiveType(type, type.shape.base);
  }
}

/**
 * Generates an alias for a primitive or array type. Encoding and decoding
 * only check and unwrap the value; nothing about it is transformed.
 */
function generatePrimitiveType(type: TypeDecl, base: TypeDescriptor): string {
  const name = toTypeIdentifier(type.id);
  const owner = `${type.domain}.${type.id}`;
  const wireType = resolveWireType(base);

  return [
    `export type ${name} = ${resolveType(base, type.domain)};`,
    '',
    `export const ${name}: util.Codec<${name}, ${wireType}> = {`,
    `  toWire(value: ${name}): ${wireType} {`,
    `    return ${encodeValue(base, type.domain, 'value')};`,
    '  },',
    `  fromWire(json: unknown): ${name} {`,
    `    return ${decodeValue(base, type.domain, 'json', owner)};`,
    '  },',
    '};',
  ].join('\n');
}

/**
 * Generates an enum type. Member names are upper snake case; member values
 * are the literals of the schema, unchanged.
 *
 * @example
 * // export type ErrorReason = 'Failed' | 'Aborted';
 * // export const ErrorReason = { FAILED: 'Failed', ABORTED: 'Aborted', ... } as const;
 */
function generateEnumType(type: TypeDecl, values: readonly string[]): string {
  const name = toTypeIdentifier(type.id);
  const owner = `${type.domain}.${type.id}`;
  const literals = values.map(literal);

  const members = values.map((value) => `  ${toEnumMember(value)}: ${literal(value)},`);

  return [
    `export type ${name} = ${literals.join(' | ')};`,
    '',
    `export const ${name} = {`,
    ...members,
    `  values: [${literals.join(', ')}],`,
    `  toWire(value: ${name}): string {`,
    '    return value;',
    '  },',
    `  fromWire(json: unknown): ${name} {`,
    `    if (util.isOneOf(json, [${literals.join(', ')}] as const)) {`,
    '      return json;',
    '    }',
    `    throw new util.UnknownEnumValue(${literal(owner)}, json);`,
    '  },',
    '} as const;',
  ].join('\n');
}

function generateCompositeType(type: TypeDecl, properties: readonly Property[]): string {
  const name = toTypeIdentifier(type.id);
  return renderRecord(name, `${type.domain}.${type.id}`, properties, `util.Codec<${name}, util.JsonObject>`);
}

/**
 * Renders an interface and its codec for a list of properties. Shared by
 * composite types and event payloads.
 *
 * @param name - Name of the interface and of the codec constant
 * @param owner - Qualified protocol name used in error messages
 * @param properties - Fields in declaration order
 * @param codecType - Type annotation of the codec constant
 * @param codecMembers - Extra members placed first in the codec
 */
export function renderRecord(
  name: string,
  owner: string,
  properties: readonly Property[],
  codecType: string,
  codecMembers: readonly string[] = []
): string {
  const ordered = sortRequiredFirst(properties);

  const fields = ordered.map((property) => indent(renderField(property), 2));
  const declaration =
    fields.length > 0 ? `export interface ${name} {\n${fields.join('\n')}\n}` : `export interface ${name} {}`;

  const encode = ordered.map((property) => indent(renderEncode(property, 'json', `value.${fieldName(property)}`), 4));
  const decode = ordered.map((property) => `      ${fieldName(property)}: ${renderDecode(property, 'obj', owner)},`);

  const fromWire =
    ordered.length > 0
      ? [
          `    const obj = util.asObject(json, ${literal(owner)});`,
          '    return {',
          ...decode,
          '    };',
        ]
      : [`    util.asObject(json, ${literal(owner)});`, '    return {};'];

  return [
    declaration,
    '',
    `export const ${name}: ${codecType} = {`,
    ...codecMembers.map((member) => `  ${member}`),
    `  toWire(value: ${name}): util.JsonObject {`,
    '    const json: util.JsonObject = {};',
    ...encode,
    '    return json;',
    '  },',
    `  fromWire(json: unknown): ${name} {`,
    ...fromWire,
    '  },',
    '};',
  ].join('\n');
}
