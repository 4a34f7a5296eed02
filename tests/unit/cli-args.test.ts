import { describe, expect, it } from 'vitest';

import { flagBool, flagInt, flagString, parseArgs, parseIntArg, positional, requireFlag } from '../../cli/args/index.js';
import { ERROR_CODES, isKilnError } from '../../src/errors/index.js';

describe('cli/args', () => {
  it('shows help when no command is given', () => {
    const opts = parseArgs([]);
    expect(opts.help).toBe(true);
    expect(opts.command).toBe('help');
  });

  it('separates command, positionals and flags', () => {
    const opts = parseArgs(['convert', 'model.toml', '--input', 'w.json', '--no-bias', '-v', '--scale=65536']);
    expect(opts.command).toBe('convert');
    expect(opts.subcommand).toBeNull();
    expect(opts.positionals).toEqual(['model.toml']);
    expect(flagString(opts, 'input')).toBe('w.json');
    expect(flagBool(opts, 'no-bias')).toBe(true);
    expect(flagInt(opts, 'scale')).toBe(65536);
    expect(opts.verbose).toBe(true);
  });

  it('takes a subcommand for accounts and registry', () => {
    const opts = parseArgs(['accounts', 'clear', '--kind', 'ram', '--slot', '2', '--offset', '0x10']);
    expect(opts.command).toBe('accounts');
    expect(opts.subcommand).toBe('clear');
    expect(opts.positionals).toEqual([]);
    expect(flagInt(opts, 'slot')).toBe(2);
    expect(flagInt(opts, 'offset')).toBe(16);
  });

  it('treats everything after -- as words', () => {
    const opts = parseArgs(['registry', 'remove', '--', '--odd-name']);
    expect(opts.positionals).toEqual(['--odd-name']);
  });

  it('accepts negative numbers as words', () => {
    expect(parseArgs(['show', '-1']).positionals).toEqual(['-1']);
  });

  it('rejects unknown commands and options', () => {
    expect.assertions(3);
    try {
      parseArgs(['deploy']);
    } catch (err) {
      expect(isKilnError(err, ERROR_CODES.CLI_USAGE)).toBe(true);
      expect(err instanceof Error && err.message).toBe('Unknown command: deploy');
    }
    expect(() => parseArgs(['show', '-x'])).toThrow('Unknown option: -x');
  });

  it('requires values for value flags', () => {
    expect(() => parseArgs(['input', 'm.toml', '--output'])).toThrow('--output requires a value');
    const opts = parseArgs(['pack', 'm.toml']);
    expect(() => requireFlag(opts, 'output')).toThrow('--output is required');
    expect(() => positional(opts, 1, 'file')).toThrow('Missing <file>');
  });

  it('parses decimal and hex integers', () => {
    expect(parseIntArg('0x1F', 'n')).toBe(31);
    expect(parseIntArg(' 42 ', 'n')).toBe(42);
    expect(() => parseIntArg('4.5', 'n')).toThrow("--n must be an integer, got '4.5'");
  });
});
