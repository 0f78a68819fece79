import { describe, it, expect } from '@jest/globals';
import type { Command } from 'commander';
import { createProgram, type CliOptions } from './program.js';

function parse(args: string[]): Command {
  return createProgram()
    .exitOverride()
    .configureOutput({ writeErr: () => undefined })
    .parse(args, { from: 'user' });
}

describe('program', () => {
  it('should keep domain names that follow an input as domains', () => {
    const program = parse(['-i', 'a.json', 'Page', 'DOM']);
    expect(program.opts<CliOptions>().input).toEqual(['a.json']);
    expect(program.args).toEqual(['Page', 'DOM']);
  });

  it('should collect repeated inputs in order', () => {
    const program = parse(['--input', 'browser.json', '-i', 'js.json', '-o', 'out', 'Network']);
    const options = program.opts<CliOptions>();
    expect(options.input).toEqual(['browser.json', 'js.json']);
    expect(options.output).toBe('out');
    expect(program.args).toEqual(['Network']);
  });

  it('should default to no inputs', () => {
    expect(parse(['Page']).opts<CliOptions>().input).toEqual([]);
  });

  it('should reject an unknown log level', () => {
    expect(parse(['-l', 'debug']).opts<CliOptions>().logLevel).toBe('debug');
    expect(() => parse(['-l', 'loud'])).toThrow('Expected one of: debug, info, warn, error.');
  });
});
