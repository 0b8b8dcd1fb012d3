import { describe, expect, it } from 'vitest';

import { USAGE, parseArguments } from '../src/cli/arguments.js';

describe('parseArguments', () => {
  it('passes every argument through when no config flag is present', () => {
    expect(parseArguments(['-d', '/dev/cec1', '-M'])).toEqual({
      kind: 'run',
      configPath: undefined,
      commandArgs: ['-d', '/dev/cec1', '-M'],
    });
  });

  it('extracts --config and its value from anywhere in argv', () => {
    expect(parseArguments(['-d', '/dev/cec1', '--config', 'cfg.json', '-M'])).toEqual({
      kind: 'run',
      configPath: 'cfg.json',
      commandArgs: ['-d', '/dev/cec1', '-M'],
    });
  });

  it('accepts -c as a short form and only consumes the first occurrence', () => {
    expect(parseArguments(['-c', 'a.json', '--config', 'b.json'])).toEqual({
      kind: 'run',
      configPath: 'a.json',
      commandArgs: ['--config', 'b.json'],
    });
  });

  it('fails with exit code 2 when --config has no value', () => {
    expect(parseArguments(['-d', '/dev/cec1', '--config'])).toEqual({
      kind: 'usage-error',
      exitCode: 2,
      message: 'error: --config requires a path argument.',
    });
  });

  it('fails with exit code 1 when no cec-ctl arguments remain', () => {
    expect(parseArguments([])).toEqual({ kind: 'usage-error', exitCode: 1, message: USAGE });
    expect(parseArguments(['--config', 'cfg.json'])).toEqual({
      kind: 'usage-error',
      exitCode: 1,
      message: USAGE,
    });
  });
});
