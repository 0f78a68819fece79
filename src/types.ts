/**
 * Configuration options for the cdp-bindgen tool
 */
export interface Config {
  /** URLs or paths of protocol JSON files; `{ref}` is replaced by the protocol version */
  input?: string[];
  /** Output directory for generated TypeScript files */
  output?: string;
  /** Protocol version tag, e.g. "v0.0.1359167" */
  ref?: string;
  /** Qualifier used in generated import statements ("." for relative imports) */
  package?: string;
  /** Root domains to generate */
  domains?: string[];
  /** Domains that are always generated */
  mandatoryDomains?: string[];
  /** Whether to format generated code with Prettier */
  pretty?: boolean;
  /** Minimum level of log messages */
  logLevel?: LogLevel;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Protocol version declared by a schema payload
 */
export interface ProtocolVersion {
  major: string;
  minor: string;
}

/**
 * Primitive type tags of the protocol schema
 */
export type PrimitiveTag = 'boolean' | 'integer' | 'number' | 'object' | 'string' | 'any';

/**
 * Pointer to a type declared in some domain. Bare `$ref` values are
 * qualified with the owning domain while parsing.
 */
export interface Reference {
  readonly domain: string;
  readonly name: string;
}

/**
 * Element descriptor of an array
 */
export type Items =
  | { readonly kind: 'primitive'; readonly tag: PrimitiveTag }
  | { readonly kind: 'reference'; readonly ref: Reference };

/**
 * Type of a property, parameter, return or primitive type declaration
 */
export type TypeDescriptor =
  | Items
  | { readonly kind: 'array'; readonly items: Items };

/**
 * A field of a composite type, a command parameter or return, or an event
 * payload field.
 */
export interface Property {
  readonly name: string;
  readonly domain: string;
  readonly description?: string;
  readonly type: TypeDescriptor;
  readonly optional: boolean;
  readonly experimental: boolean;
  readonly deprecated: boolean;
  /** Allowed values of an inline string enum */
  readonly enumValues?: readonly string[];
}

/**
 * Shape of a type declaration, decided once by the parser
 */
export type TypeShape =
  | { readonly kind: 'enum'; readonly values: readonly string[] }
  | { readonly kind: 'composite'; readonly properties: readonly Property[] }
  | { readonly kind: 'primitive'; readonly base: TypeDescriptor };

export interface TypeDecl {
  readonly id: string;
  readonly domain: string;
  readonly description?: string;
  readonly experimental: boolean;
  readonly deprecated: boolean;
  readonly shape: TypeShape;
}

export interface Command {
  readonly name: string;
  readonly domain: string;
  readonly description?: string;
  readonly experimental: boolean;
  readonly deprecated: boolean;
  /** Domain the command was moved to, if any */
  readonly redirect?: string;
  readonly parameters: readonly Property[];
  readonly returns: readonly Property[];
}

export interface Event {
  readonly name: string;
  readonly domain: string;
  readonly description?: string;
  readonly experimental: boolean;
  readonly deprecated: boolean;
  readonly parameters: readonly Property[];
}

export interface Domain {
  readonly name: string;
  readonly description?: string;
  readonly experimental: boolean;
  readonly deprecated: boolean;
  /** Self-declared dependencies; informational only */
  readonly dependencies: readonly string[];
  readonly types: readonly TypeDecl[];
  readonly commands: readonly Command[];
  readonly events: readonly Event[];
}

/**
 * Parsed protocol: every domain of one or more schema payloads
 */
export interface ProtocolModel {
  readonly version: ProtocolVersion;
  readonly domains: readonly Domain[];
}

/**
 * Options for generating bindings from a parsed protocol
 */
export interface GenerateOptions {
  /** Root domains requested by the user */
  domains: readonly string[];
  /** Domains included regardless of the request */
  mandatoryDomains?: readonly string[];
  /** Version label embedded in the provenance header */
  ref: string;
  /** Import qualifier of the generated units ("." for relative imports) */
  package?: string;
}

/**
 * A generated source unit
 */
export interface GeneratedArtifact {
  /** File name relative to the output directory */
  path: string;
  code: string;
}
