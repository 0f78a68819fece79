import { describe, it, expect } from '@jest/globals';
import { collectReferences, referencedDomains, requiredDomains, resolveDomainName, verifyReferences } from './dependencies.js';
import { findDomain, parseProtocol, parseProtocols } from '../parser.js';
import { UnknownDomainSelected, UnresolvedReference } from '../errors.js';
import type { Domain, ProtocolModel } from '../types.js';
import { loadFixture } from '../testing/generated-modules.js';

const MANDATORY = ['Target', 'Inspector'];

function sorted(names: Iterable<string>): string[] {
  return Array.from(names).sort();
}

function domain(model: ProtocolModel, name: string): Domain {
  const found = findDomain(model, name);
  if (!found) {
    throw new Error(`No domain ${name}`);
  }
  return found;
}

describe('dependencies', () => {
  const model = parseProtocols([loadFixture('browser_protocol.json'), loadFixture('js_protocol.json')]);

  it('should list every reference with the site that uses it', () => {
    expect(collectReferences(domain(model, 'Target')).map(({ site }) => site)).toEqual([
      'Target.TargetInfo.targetId',
      'Target.TargetInfo.openerId',
      'Target.activateTarget.targetId',
      'Target.attachToTarget.targetId',
      'Target.attachToTarget.sessionId',
      'Target.getTargets.targetInfos',
      'Target.targetCreated.targetInfo',
      'Target.detachedFromTarget.sessionId',
      'Target.detachedFromTarget.targetId',
    ]);
  });

  it('should compute referenced domains from references, not declared dependencies', () => {
    expect(referencedDomains(domain(model, 'Page'))).toEqual(['Network']);
    expect(referencedDomains(domain(model, 'Network'))).toEqual(['Page']);
    expect(referencedDomains(domain(model, 'Debugger'))).toEqual(['Runtime']);
    expect(referencedDomains(domain(model, 'Target'))).toEqual([]);
  });

  it('should add mandatory and referenced domains to the request', () => {
    expect(sorted(requiredDomains(['Page'], MANDATORY, model))).toEqual(['Inspector', 'Network', 'Page', 'Target']);
    expect(sorted(requiredDomains(['Debugger'], MANDATORY, model))).toEqual([
      'Debugger',
      'Inspector',
      'Runtime',
      'Target',
    ]);
  });

  it('should generate only mandatory domains when nothing is requested', () => {
    expect(sorted(requiredDomains([], MANDATORY, model))).toEqual(['Inspector', 'Target']);
  });

  it('should be closed under references', () => {
    const required = requiredDomains(['Page', 'Debugger'], MANDATORY, model);
    for (const name of required) {
      for (const referenced of referencedDomains(domain(model, name))) {
        expect(required.has(referenced)).toBe(true);
      }
    }
  });

  it('should be idempotent', () => {
    const required = requiredDomains(['Page'], MANDATORY, model);
    expect(sorted(requiredDomains(required, [], model))).toEqual(sorted(required));
  });

  it('should select domains by module name', () => {
    expect(resolveDomainName(model, 'dom')).toBe('DOM');
    expect(sorted(requiredDomains(['dom'], [], model))).toEqual(['DOM']);
  });

  it('should reject unknown requested or mandatory domains', () => {
    expect(() => requiredDomains(['Nope'], MANDATORY, model)).toThrow(UnknownDomainSelected);
    expect(() => requiredDomains(['Nope'], MANDATORY, model)).toThrow('Invalid domain: Nope');
    expect(() => requiredDomains(['Page'], ['Browser'], model)).toThrow('Invalid domain: Browser');
  });

  it('should reject references to domains that do not exist', () => {
    const broken = parseProtocol({
      version: { major: '1', minor: '3' },
      domains: [{ domain: 'A', types: [{ id: 'T', type: 'object', properties: [{ name: 'x', $ref: 'Missing.Thing' }] }] }],
    });
    expect(() => requiredDomains(['A'], [], broken)).toThrow(UnresolvedReference);
    expect(() => requiredDomains(['A'], [], broken)).toThrow('Unresolved reference Missing.Thing used by A.T.x');
  });

  it('should reject references to types that do not exist', () => {
    const broken = parseProtocol({
      version: { major: '1', minor: '3' },
      domains: [
        { domain: 'A', commands: [{ name: 'run', returns: [{ name: 'value', $ref: 'B.Nope' }] }] },
        { domain: 'B', types: [{ id: 'Thing', type: 'string' }] },
      ],
    });
    const required = requiredDomains(['A'], [], broken);
    expect(sorted(required)).toEqual(['A', 'B']);
    expect(() => verifyReferences(broken, required)).toThrow('Unresolved reference B.Nope used by A.run.value');
  });

  it('should pull in the domain a command parameter references', () => {
    const schema = parseProtocol({
      version: { major: '1', minor: '3' },
      domains: [
        {
          domain: 'Page',
          commands: [{ name: 'navigate', parameters: [{ name: 'targetId', $ref: 'Target.TargetID' }] }],
        },
        { domain: 'Target', types: [{ id: 'TargetID', type: 'string' }] },
      ],
    });
    expect(sorted(requiredDomains(['Page'], ['Target'], schema))).toEqual(['Page', 'Target']);
    expect(sorted(requiredDomains(['Page'], [], schema))).toEqual(['Page', 'Target']);
  });

  it('should accept the references of the fixture', () => {
    expect(() => verifyReferences(model, requiredDomains(['Page', 'Debugger', 'DOM'], MANDATORY, model))).not.toThrow();
  });
});
