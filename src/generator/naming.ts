/**
 * Name transformation utilities
 *
 * Converts protocol identifiers (mixed camel case, acronyms, dashes) into
 * TypeScript identifiers. Every function here is pure: the same input always
 * yields the same output, which keeps generated code stable between runs.
 */

/**
 * Words that cannot be used as binding names in strict-mode TypeScript
 * modules, plus the global values that generated code must not shadow.
 */
export const RESERVED_WORDS: ReadonlySet<string> = new Set([
  'arguments',
  'await',
  'break',
  'case',
  'catch',
  'class',
  'const',
  'continue',
  'debugger',
  'default',
  'delete',
  'do',
  'else',
  'enum',
  'eval',
  'export',
  'extends',
  'false',
  'finally',
  'for',
  'function',
  'if',
  'implements',
  'import',
  'in',
  'Infinity',
  'instanceof',
  'interface',
  'let',
  'NaN',
  'new',
  'null',
  'package',
  'private',
  'protected',
  'public',
  'return',
  'static',
  'super',
  'switch',
  'this',
  'throw',
  'true',
  'try',
  'typeof',
  'undefined',
  'var',
  'void',
  'while',
  'with',
  'yield',
]);

/**
 * Module names taken by the shared units of every generated set
 */
export const RESERVED_MODULE_NAMES: ReadonlySet<string> = new Set(['index', 'util']);

/**
 * Replaces characters that cannot appear in an identifier with underscores
 */
function sanitize(name: string): string {
  return name.replace(/[^A-Za-z0-9_]/g, '_');
}

function avoidLeadingDigit(name: string): string {
  return /^[0-9]/.test(name) ? `_${name}` : name;
}

function avoidReserved(name: string): string {
  return RESERVED_WORDS.has(name) ? `${name}_` : name;
}

function words(name: string): string[] {
  return toSnakeCase(sanitize(name)).split('_').filter(Boolean);
}

/**
 * Splits a camel case name into lower case words joined by underscores
 *
 * @example
 * toSnakeCase('DOMStorage')    // 'dom_storage'
 * toSnakeCase('backendNodeId') // 'backend_node_id'
 * toSnakeCase('TargetID')      // 'target_id'
 */
export function toSnakeCase(name: string): string {
  return name
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/([a-z\d])([A-Z])/g, '$1_$2')
    .replace(/-/g, '_')
    .toLowerCase();
}

/**
 * Converts a protocol name to a lower camel case identifier
 *
 * @example
 * toIdentifier('DOMStorage') // 'domStorage'
 * toIdentifier('URL')        // 'url'
 * toIdentifier('delete')     // 'delete_'
 */
export function toIdentifier(name: string): string {
  const parts = words(name);
  if (parts.length === 0) {
    return '_';
  }
  const camel = parts
    .map((word, index) => (index === 0 ? word : word.charAt(0).toUpperCase() + word.slice(1)))
    .join('');
  return avoidReserved(avoidLeadingDigit(camel));
}

/**
 * Converts an enum value to an upper snake case member identifier. The case
 * of the value itself is never changed on the wire.
 *
 * @example
 * toEnumMember('Failed')       // 'FAILED'
 * toEnumMember('back-forward') // 'BACK_FORWARD'
 */
export function toEnumMember(value: string): string {
  const member = toSnakeCase(sanitize(value)).toUpperCase();
  return member === '' ? '_' : avoidLeadingDigit(member);
}

/**
 * Converts a camel case name to an upper camel case type name, keeping the
 * case of every other character (`frameNavigated` -> `FrameNavigated`).
 */
export function toTypeName(name: string): string {
  const pascal = sanitize(name)
    .split('_')
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join('');
  return pascal === '' ? '_' : avoidReserved(avoidLeadingDigit(pascal));
}

/**
 * Name of a declared type in generated code. Declared ids are already
 * upper camel case and are kept as they are.
 */
export function toTypeIdentifier(id: string): string {
  return avoidReserved(avoidLeadingDigit(sanitize(id)));
}

/**
 * Name of the module generated for a domain, also used as its namespace
 * import everywhere it is referenced.
 */
export function toModuleName(domain: string): string {
  const name = toIdentifier(domain);
  return RESERVED_MODULE_NAMES.has(name) ? `${name}_` : name;
}
