/**
 * Text helpers shared by the emitters: doc comments, indentation and string
 * literals.
 */

/**
 * Indents every non-empty line of `text` by `depth` spaces
 */
export function indent(text: string, depth: number): string {
  const pad = ' '.repeat(depth);
  return text
    .split('\n')
    .map((line) => (line === '' ? line : pad + line))
    .join('\n');
}

/**
 * Renders a single-quoted TypeScript string literal
 */
export function literal(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/'/g, "\\'")
    .replace(/\r/g, '\\r')
    .replace(/\n/g, '\\n')
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029');
  return `'${escaped}'`;
}

/**
 * Keeps a description from closing the comment it is placed in
 */
export function escapeComment(text: string): string {
  return text.replace(/\*\//g, '*\\/');
}

/**
 * Renders a TSDoc block. Sections are separated by a blank comment line;
 * empty sections are skipped and no block is produced when nothing is left.
 *
 * @example
 * docComment(['Unique frame identifier.', '@experimental'])
 * // /**
 * //  * Unique frame identifier.
 * //  *
 * //  * @experimental
 * //  *\/
 */
export function docComment(sections: ReadonlyArray<string | undefined>): string {
  const present = sections
    .filter((section): section is string => section !== undefined)
    .map((section) => section.trim())
    .filter((section) => section !== '');
  if (present.length === 0) {
    return '';
  }

  const lines = present
    .join('\n\n')
    .split('\n')
    .map((line) => (line.trim() === '' ? ' *' : ` * ${escapeComment(line.trimEnd())}`));
  return `/**\n${lines.join('\n')}\n */\n`;
}

/**
 * Tags shared by every documented entity
 */
export function statusTags(entity: { experimental: boolean; deprecated: boolean }): string | undefined {
  const tags: string[] = [];
  if (entity.experimental) {
    tags.push('@experimental');
  }
  if (entity.deprecated) {
    tags.push('@deprecated');
  }
  return tags.length > 0 ? tags.join('\n') : undefined;
}

/**
 * Provenance header placed at the top of every generated unit
 *
 * @param ref - Protocol version label
 * @param details - Extra lines, e.g. the domain of the unit
 */
export function provenanceHeader(ref: string, details: readonly string[] = []): string {
  const lines = [
    'DO NOT EDIT THIS FILE!',
    '',
    'This file is generated from the protocol schema. If you need to make',
    'changes, edit the generator and regenerate all modules.',
    '',
    `Protocol version: ${ref}`,
    ...details,
  ];
  return lines.map((line) => (line === '' ? '//' : `// ${line}`)).join('\n') + '\n';
}

/**
 * Module specifier of a generated unit
 *
 * @param unit - Unit name without extension
 * @param qualifier - "." for relative imports, or a package path
 */
export function importPath(unit: string, qualifier = '.'): string {
  const base = qualifier.replace(/\/+$/, '');
  return base === '.' || base === '' ? `./${unit}.js` : `${base}/${unit}.js`;
}
