import { afterEach, beforeEach, describe, it, expect } from '@jest/globals';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { DEFAULT_CONFIG_FILE, loadConfigFile, mergeConfig, validateConfig } from './config.js';
import { DEFAULT_SOURCES } from './loader.js';
import { ConfigError } from './errors.js';

describe('config', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'cdp-bindgen-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(name: string, config: unknown): string {
    const path = join(dir, name);
    writeFileSync(path, JSON.stringify(config), 'utf-8');
    return path;
  }

  it('should read the default config file from the working directory', () => {
    writeConfig(DEFAULT_CONFIG_FILE, { output: 'devtools', domains: ['Page'], pretty: true });

    expect(mergeConfig({}, undefined, dir)).toEqual({ output: 'devtools', domains: ['Page'], pretty: true });
  });

  it('should let defined CLI values override file values', () => {
    writeConfig(DEFAULT_CONFIG_FILE, { output: 'devtools', domains: ['Page'], ref: 'v1' });

    const merged = mergeConfig({ output: 'generated', ref: undefined, domains: [], logLevel: 'debug' }, undefined, dir);
    expect(merged).toEqual({ output: 'generated', domains: ['Page'], ref: 'v1', logLevel: 'debug' });
  });

  it('should work without a config file', () => {
    expect(mergeConfig({ output: 'generated' }, undefined, dir)).toEqual({ output: 'generated' });
  });

  it('should treat a missing default config file as absent', () => {
    expect(loadConfigFile(join(dir, 'nowhere', DEFAULT_CONFIG_FILE))).toBeNull();
  });

  it('should fail when an explicit config file does not exist', () => {
    const missing = join(dir, 'missing.json');
    expect(() => mergeConfig({}, missing)).toThrow(ConfigError);
    expect(() => mergeConfig({}, missing)).toThrow(`Config file not found: ${missing}`);
  });

  it('should reject unknown keys and wrong types', () => {
    const unknownKey = writeConfig('unknown.json', { output: 'out', verbose: true });
    expect(() => mergeConfig({}, unknownKey)).toThrow(
      `Invalid config file ${unknownKey} at (root): Unrecognized key(s) in object: 'verbose'`
    );

    const wrongType = writeConfig('wrong.json', { pretty: 'yes' });
    expect(() => mergeConfig({}, wrongType)).toThrow(
      `Invalid config file ${wrongType} at pretty: Expected boolean, received string`
    );
  });

  it('should reject a config file that is not JSON', () => {
    const path = join(dir, 'broken.json');
    writeFileSync(path, '{ output: ', 'utf-8');
    expect(() => mergeConfig({}, path)).toThrow(`Config file ${path} is not valid JSON`);
  });

  it('should require an output directory', () => {
    expect(() => validateConfig({})).toThrow(ConfigError);
  });

  it('should apply defaults', () => {
    expect(validateConfig({ output: 'devtools' })).toEqual({
      input: [...DEFAULT_SOURCES],
      output: 'devtools',
      ref: undefined,
      package: '.',
      domains: [],
      mandatoryDomains: ['Target', 'Inspector'],
      pretty: false,
      logLevel: 'info',
    });
  });
});
