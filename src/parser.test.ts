import { describe, it, expect } from '@jest/globals';
import { findDomain, parseProtocol, parseProtocols, parseReference } from './parser.js';
import { MalformedSchemaRecord, SchemaVersionMismatch } from './errors.js';
import { loadFixture } from './testing/generated-modules.js';

const VERSION = { major: '1', minor: '3' };

function protocolWith(domain: unknown): unknown {
  return { version: VERSION, domains: [domain] };
}

describe('parser', () => {
  const model = parseProtocol(loadFixture('browser_protocol.json'));

  it('should keep domains in schema order', () => {
    expect(model.domains.map((domain) => domain.name)).toEqual(['Inspector', 'Network', 'Page', 'Target', 'DOM']);
    expect(model.version).toEqual({ major: '1', minor: '3' });
  });

  it('should decide the shape of every type', () => {
    const network = findDomain(model, 'Network');
    const shapes = network?.types.map((type) => [type.id, type.shape.kind]);
    expect(shapes).toEqual([
      ['LoaderId', 'primitive'],
      ['RequestId', 'primitive'],
      ['MonotonicTime', 'primitive'],
      ['ErrorReason', 'enum'],
      ['Headers', 'primitive'],
      ['Request', 'composite'],
    ]);

    const errorReason = network?.types[3];
    expect(errorReason?.shape).toEqual({ kind: 'enum', values: ['Failed', 'Aborted', 'TimedOut', 'BlockedByClient'] });
  });

  it('should qualify bare references with the owning domain', () => {
    const shape = findDomain(model, 'Page')?.types.find((type) => type.id === 'Frame')?.shape;
    if (shape?.kind !== 'composite') {
      throw new Error('Page.Frame should be a composite');
    }
    const [id, parentId, loaderId] = shape.properties;
    expect(id.type).toEqual({ kind: 'reference', ref: { domain: 'Page', name: 'FrameId' } });
    expect(parentId.optional).toBe(true);
    expect(loaderId.type).toEqual({ kind: 'reference', ref: { domain: 'Network', name: 'LoaderId' } });
  });

  it('should parse array items and inline enums', () => {
    const page = findDomain(model, 'Page');
    const shape = page?.types.find((type) => type.id === 'FrameTree')?.shape;
    if (shape?.kind !== 'composite') {
      throw new Error('Page.FrameTree should be a composite');
    }
    expect(shape.properties[1].type).toEqual({
      kind: 'array',
      items: { kind: 'reference', ref: { domain: 'Page', name: 'FrameTree' } },
    });

    const screenshot = page?.commands.find((command) => command.name === 'captureScreenshot');
    expect(screenshot?.parameters[0].enumValues).toEqual(['jpeg', 'png', 'webp']);
    expect(screenshot?.parameters[0].type).toEqual({ kind: 'primitive', tag: 'string' });
  });

  it('should carry status flags', () => {
    const inspector = findDomain(model, 'Inspector');
    expect(inspector?.experimental).toBe(true);
    expect(inspector?.deprecated).toBe(false);

    const addScript = findDomain(model, 'Page')?.commands.find((command) => command.name === 'addScriptToEvaluateOnLoad');
    expect(addScript?.deprecated).toBe(true);
    expect(addScript?.experimental).toBe(true);
  });

  it('should freeze the model', () => {
    expect(Object.isFrozen(model)).toBe(true);
    expect(Object.isFrozen(model.domains)).toBe(true);
    expect(Object.isFrozen(model.domains[0])).toBe(true);
  });

  it('should accept numeric version parts', () => {
    const parsed = parseProtocol({ version: { major: 1, minor: 3 }, domains: [] });
    expect(parsed.domains).toEqual([]);
  });

  it('should reject a different protocol version before reading domains', () => {
    const raw = { version: { major: '1', minor: '2' }, domains: [{ broken: true }] };
    expect(() => parseProtocol(raw)).toThrow(SchemaVersionMismatch);
    expect(() => parseProtocol(raw)).toThrow('Unsupported protocol version 1.2, expected 1.3');
  });

  it('should report a type record without a type tag', () => {
    const raw = protocolWith({ domain: 'Broken', types: [{ id: 'Thing' }] });
    expect(() => parseProtocol(raw)).toThrow(MalformedSchemaRecord);
    expect(() => parseProtocol(raw)).toThrow('Malformed schema record at Broken: types[0].type: Required');
  });

  it('should report a domain record without a name by position', () => {
    expect(() => parseProtocol(protocolWith({ types: [] }))).toThrow(
      'Malformed schema record at domains[0]: domain: Required'
    );
  });

  it('should report an array without items', () => {
    const raw = protocolWith({ domain: 'Broken', types: [{ id: 'List', type: 'array' }] });
    expect(() => parseProtocol(raw)).toThrow('Malformed schema record at Broken.List: array type without "items"');
  });

  it('should report a property with neither type nor reference', () => {
    const raw = protocolWith({ domain: 'Broken', commands: [{ name: 'run', parameters: [{ name: 'value' }] }] });
    expect(() => parseProtocol(raw)).toThrow('Malformed schema record at Broken.run.value: missing "type" or "$ref"');
  });

  it('should report enum values that map to the same member', () => {
    const raw = protocolWith({ domain: 'Broken', types: [{ id: 'Kind', type: 'string', enum: ['a-b', 'a_b'] }] });
    expect(() => parseProtocol(raw)).toThrow('enum values "a-b" and "a_b" both map to member A_B');
  });

  it('should merge several payloads', () => {
    const merged = parseProtocols([loadFixture('browser_protocol.json'), loadFixture('js_protocol.json')]);
    expect(merged.domains.map((domain) => domain.name)).toEqual([
      'Inspector',
      'Network',
      'Page',
      'Target',
      'DOM',
      'Runtime',
      'Debugger',
    ]);
  });

  it('should reject a domain declared by two payloads', () => {
    const browser = loadFixture('browser_protocol.json');
    expect(() => parseProtocols([browser, browser])).toThrow(
      'Malformed schema record at Inspector: domain is declared more than once'
    );
  });

  it('should parse references', () => {
    expect(parseReference('FrameId', 'Page')).toEqual({ domain: 'Page', name: 'FrameId' });
    expect(parseReference('Network.LoaderId', 'Page')).toEqual({ domain: 'Network', name: 'LoaderId' });
    expect(() => parseReference('A.B.C', 'Page')).toThrow('invalid reference "A.B.C"');
  });
});
