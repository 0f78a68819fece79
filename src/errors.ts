/**
 * Errors raised while loading, parsing and generating bindings.
 *
 * All of them abort the run before anything is written.
 */
export class GeneratorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GeneratorError';
    Object.setPrototypeOf(this, GeneratorError.prototype);
  }
}

/**
 * Thrown when a schema declares a protocol version the generator does not understand
 */
export class SchemaVersionMismatch extends GeneratorError {
  constructor(
    readonly expected: string,
    readonly actual: string
  ) {
    super(`Unsupported protocol version ${actual}, expected ${expected}`);
    this.name = 'SchemaVersionMismatch';
    Object.setPrototypeOf(this, SchemaVersionMismatch.prototype);
  }
}

/**
 * Thrown when a schema record lacks a required field or is otherwise unusable
 */
export class MalformedSchemaRecord extends GeneratorError {
  constructor(
    readonly location: string,
    readonly reason: string
  ) {
    super(`Malformed schema record at ${location}: ${reason}`);
    this.name = 'MalformedSchemaRecord';
    Object.setPrototypeOf(this, MalformedSchemaRecord.prototype);
  }
}

/**
 * Thrown when a requested domain does not exist in the parsed protocol
 */
export class UnknownDomainSelected extends GeneratorError {
  constructor(readonly domain: string) {
    super(`Invalid domain: ${domain}`);
    this.name = 'UnknownDomainSelected';
    Object.setPrototypeOf(this, UnknownDomainSelected.prototype);
  }
}

/**
 * Thrown when a type reference does not name a type of the required domains
 */
export class UnresolvedReference extends GeneratorError {
  constructor(
    readonly site: string,
    readonly reference: string
  ) {
    super(`Unresolved reference ${reference} used by ${site}`);
    this.name = 'UnresolvedReference';
    Object.setPrototypeOf(this, UnresolvedReference.prototype);
  }
}

/**
 * Thrown when a protocol payload cannot be fetched, read or decoded
 */
export class ProtocolLoadError extends GeneratorError {
  constructor(
    readonly source: string,
    reason: string
  ) {
    super(`Failed to load protocol from ${source}: ${reason}`);
    this.name = 'ProtocolLoadError';
    Object.setPrototypeOf(this, ProtocolLoadError.prototype);
  }
}

/**
 * Thrown when the configuration file or the merged configuration is invalid
 */
export class ConfigError extends GeneratorError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}
