/**
 * Command generation utilities
 *
 * Each command becomes a generator function bound to exactly one round trip:
 * it yields the request object once, and the reply passed back to `next()`
 * is decoded into the command's return value.
 *
 * @example
 * ```typescript
 * const call = page.navigate('https://example.com');
 * const request = call.next().value;      // { method: 'Page.navigate', params: { url: ... } }
 * const frameId = call.next(reply).value; // decoded from the reply
 * ```
 */

import type { Command, Property } from '../types.js';
import { toIdentifier } from './naming.js';
import {
  renderDecode,
  renderEncode,
  renderParameter,
  renderParameterDoc,
  renderReturnDoc,
  renderReturnType,
  sortRequiredFirst,
} from './property-generator.js';
import { docComment, indent, literal, statusTags } from './text.js';

/**
 * Names used by the body of every generated command
 */
const COMMAND_LOCALS = ['params', 'json', 'util'];

/**
 * Chooses local names for the parameters so that none of them shadows a
 * namespace import or a local of the generated body
 *
 * @param parameters - Parameters in signature order
 * @param taken - Names that must stay visible inside the function
 * @returns Local name of each parameter, by position
 */
export function parameterLocals(parameters: readonly Property[], taken: Iterable<string>): string[] {
  const used = new Set<string>([...COMMAND_LOCALS, ...taken]);
  return parameters.map((parameter) => {
    let local = toIdentifier(parameter.name);
    while (used.has(local)) {
      local += '_';
    }
    used.add(local);
    return local;
  });
}

/**
 * Name of the generated function; never the name of a namespace import or
 * of the module's `events` list
 */
export function commandName(command: Command, imports: readonly string[] = []): string {
  let name = toIdentifier(command.name);
  while (name === 'events' || imports.includes(name)) {
    name += '_';
  }
  return name;
}

function renderDoc(command: Command, parameters: readonly Property[], locals: readonly string[]): string {
  const params = parameters.map((parameter, index) => renderParameterDoc(parameter, locals[index]));

  let returns: string | undefined;
  if (command.returns.length === 1) {
    const doc = renderReturnDoc(command.returns[0]);
    returns = doc ? `@returns ${doc}` : undefined;
  } else if (command.returns.length > 1) {
    const items = command.returns.map((r, index) => {
      const doc = renderReturnDoc(r);
      return doc ? `${index}. **${r.name}** - ${doc}` : `${index}. **${r.name}**`;
    });
    returns = ['@returns A tuple with the following items:', '', ...items].join('\n');
  }

  const redirect = command.redirect ? `Moved to the ${command.redirect} domain.` : undefined;

  return docComment([
    command.description,
    redirect,
    statusTags(command),
    [...params, ...(returns ? [returns] : [])].join('\n'),
  ]);
}

function renderReturn(command: Command): string[] {
  const owner = `${command.domain}.${command.name}`;

  if (command.returns.length === 1) {
    return [`return ${renderDecode(command.returns[0], 'json', owner)};`];
  }
  return ['return [', ...command.returns.map((r) => `  ${renderDecode(r, 'json', owner)},`), '];'];
}

/**
 * Generates the generator function of a command
 *
 * Optional parameters follow every required parameter in the signature, as
 * TypeScript requires.
 *
 * @param command - Command from the model
 * @param imports - Module names imported by the domain module
 * @returns Function declaration with its doc comment
 */
export function generateCommand(command: Command, imports: readonly string[] = []): string {
  const name = commandName(command, imports);
  const parameters = sortRequiredFirst(command.parameters);
  const locals = parameterLocals(parameters, imports);
  const returnType = renderReturnType(command.returns);
  const method = literal(`${command.domain}.${command.name}`);

  const signature =
    parameters.length > 0
      ? `export function* ${name}(\n${parameters
          .map((parameter, index) => `  ${renderParameter(parameter, locals[index])},`)
          .join('\n')}\n): util.CommandGenerator<${returnType}> {`
      : `export function* ${name}(): util.CommandGenerator<${returnType}> {`;

  const body: string[] = [];
  if (parameters.length > 0) {
    body.push('const params: util.JsonObject = {};');
    body.push(...parameters.map((parameter, index) => renderEncode(parameter, 'params', locals[index])));
  }

  const request = parameters.length > 0 ? `{ method: ${method}, params }` : `{ method: ${method} }`;
  if (command.returns.length === 0) {
    body.push(`yield ${request};`);
  } else {
    body.push(`const json = yield ${request};`);
    body.push(...renderReturn(command));
  }

  return `${renderDoc(command, parameters, locals)}${signature}\n${indent(body.join('\n'), 2)}\n}`;
}
