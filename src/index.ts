/**
 * cdp-bindgen
 *
 * Generates typed TypeScript bindings (types, codecs, command generators and
 * event registry) from the DevTools protocol schema.
 */

export * from './types.js';
export * from './errors.js';
export * from './logger.js';
export * from './loader.js';
export * from './parser.js';
export * from './generator/index.js';
export * from './writer.js';
export * from './config.js';
