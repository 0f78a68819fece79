import { describe, it, expect } from '@jest/globals';
import type { Event } from '../types.js';
import { eventName, generateEvent } from './event-generator.js';

function event(domain: string, name: string, fields: Partial<Event> = {}): Event {
  return { name, domain, experimental: false, deprecated: false, parameters: [], ...fields };
}

describe('event-generator', () => {
  it('should tag event codecs with their method', () => {
    const code = generateEvent(
      event('Inspector', 'detached', {
        parameters: [
          {
            name: 'reason',
            domain: 'Inspector',
            type: { kind: 'primitive', tag: 'string' },
            optional: false,
            experimental: false,
            deprecated: false,
          },
        ],
      })
    );

    expect(code).toBe(
      [
        'export interface Detached {',
        '  reason: string;',
        '}',
        '',
        'export const Detached: util.EventCodec<Detached> = {',
        "  method: 'Inspector.detached',",
        '  toWire(value: Detached): util.JsonObject {',
        '    const json: util.JsonObject = {};',
        "    json['reason'] = value.reason;",
        '    return json;',
        '  },',
        '  fromWire(json: unknown): Detached {',
        "    const obj = util.asObject(json, 'Inspector.detached');",
        '    return {',
        "      reason: util.asString(util.requireField(obj, 'reason', 'Inspector.detached'), 'Inspector.detached.reason'),",
        '    };',
        '  },',
        '};',
      ].join('\n')
    );
  });

  it('should generate an empty payload for events without parameters', () => {
    const code = generateEvent(
      event('Inspector', 'targetCrashed', { description: 'Fired when debugging target has crashed' })
    );

    expect(code).toBe(
      [
        '/**',
        ' * Fired when debugging target has crashed',
        ' */',
        'export interface TargetCrashed {}',
        '',
        'export const TargetCrashed: util.EventCodec<TargetCrashed> = {',
        "  method: 'Inspector.targetCrashed',",
        '  toWire(value: TargetCrashed): util.JsonObject {',
        '    const json: util.JsonObject = {};',
        '    return json;',
        '  },',
        '  fromWire(json: unknown): TargetCrashed {',
        "    util.asObject(json, 'Inspector.targetCrashed');",
        '    return {};',
        '  },',
        '};',
      ].join('\n')
    );
  });

  it('should rename events that collide with declared names', () => {
    expect(eventName(event('Page', 'frameNavigated'))).toBe('FrameNavigated');
    expect(eventName(event('Page', 'frame'), ['Frame'])).toBe('FrameEvent');
    expect(eventName(event('Page', 'frame'), ['Frame', 'FrameEvent'])).toBe('FrameEvent_');
  });
});
