/**
 * Argument Parsing
 *
 * Flags that take a value are listed in VALUE_FLAGS; any other `--flag` is
 * a switch.
 */

import { createKilnError, ERROR_CODES } from '../../src/errors/index.js';
import type { CLIOptions, Command } from '../helpers/types.js';

export const COMMANDS: readonly Command[] = [
  'validate',
  'show',
  'schema-hash',
  'convert',
  'pack',
  'chunk',
  'input',
  'output',
  'guest-config',
  'upload',
  'invoke',
  'accounts',
  'registry',
  'help',
];

const SUBCOMMAND_COMMANDS: ReadonlySet<Command> = new Set(['accounts', 'registry']);

export const VALUE_FLAGS: ReadonlySet<string> = new Set([
  'input',
  'output',
  'out',
  'out-dir',
  'scale',
  'template',
  'keymap',
  'schema-hash',
  'format',
  'accounts',
  'manifest',
  'ram-count',
  'ram-bytes',
  'weights-bytes',
  'seed',
  'account-model',
  'authority',
  'authority-keypair',
  'rpc-url',
  'program-id',
  'payer',
  'kind',
  'slot',
  'offset',
  'len',
  'recipient',
  'chunk-size',
  'write-chunk-size',
  'mapped-out',
  'instructions',
  'entry-pc',
  'program-path',
  'compute-limit',
  'name',
  'cluster',
]);

const SHORT_FLAGS: Record<string, string> = {
  '-h': 'help',
  '-v': 'verbose',
  '-q': 'quiet',
  '-o': 'output',
  '-i': 'input',
};

function usageError(message: string): Error {
  return createKilnError(ERROR_CODES.CLI_USAGE, message);
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

export function parseArgs(argv: string[]): CLIOptions {
  const opts: CLIOptions = {
    command: 'help',
    subcommand: null,
    positionals: [],
    flags: new Map(),
    help: false,
    verbose: false,
    debug: false,
    quiet: false,
  };

  const tokens = [...argv];
  const words: string[] = [];
  while (tokens.length > 0) {
    const arg = tokens.shift() ?? '';
    if (arg === '--') {
      words.push(...tokens.splice(0));
      break;
    }
    const long = arg.startsWith('--') ? arg.slice(2) : SHORT_FLAGS[arg];
    if (long === undefined) {
      if (arg.startsWith('-') && arg.length > 1 && !/^-\d/.test(arg)) {
        throw usageError(`Unknown option: ${arg}`);
      }
      words.push(arg);
      continue;
    }

    const eq = long.indexOf('=');
    const name = eq >= 0 ? long.slice(0, eq) : long;
    switch (name) {
      case 'help':
        opts.help = true;
        continue;
      case 'verbose':
        opts.verbose = true;
        continue;
      case 'debug':
        opts.debug = true;
        continue;
      case 'quiet':
        opts.quiet = true;
        continue;
    }
    if (eq >= 0) {
      opts.flags.set(name, long.slice(eq + 1));
    } else if (VALUE_FLAGS.has(name)) {
      const value = tokens.shift();
      if (value === undefined) {
        throw usageError(`--${name} requires a value`);
      }
      opts.flags.set(name, value);
    } else {
      opts.flags.set(name, true);
    }
  }

  const [first, ...rest] = words;
  if (first === undefined) {
    opts.help = true;
    return opts;
  }
  if (!isCommand(first)) {
    throw usageError(`Unknown command: ${first}`);
  }
  opts.command = first;
  if (SUBCOMMAND_COMMANDS.has(first)) {
    opts.subcommand = rest.shift() ?? null;
  }
  opts.positionals = rest;
  return opts;
}

// ============================================================================
// Accessors
// ============================================================================

export function flagString(opts: CLIOptions, name: string): string | undefined {
  const value = opts.flags.get(name);
  if (value === true) {
    throw usageError(`--${name} requires a value`);
  }
  return value;
}

export function requireFlag(opts: CLIOptions, name: string): string {
  const value = flagString(opts, name);
  if (value === undefined) {
    throw usageError(`--${name} is required`);
  }
  return value;
}

export function flagBool(opts: CLIOptions, name: string): boolean {
  return opts.flags.has(name);
}

/** Decimal or 0x-prefixed hex integer */
export function parseIntArg(raw: string, name: string): number {
  const trimmed = raw.trim();
  const value = /^0x[0-9a-f]+$/i.test(trimmed)
    ? Number.parseInt(trimmed.slice(2), 16)
    : /^-?\d+$/.test(trimmed)
      ? Number.parseInt(trimmed, 10)
      : Number.NaN;
  if (!Number.isSafeInteger(value)) {
    throw usageError(`--${name} must be an integer, got '${raw}'`);
  }
  return value;
}

export function flagInt(opts: CLIOptions, name: string): number | undefined {
  const raw = flagString(opts, name);
  return raw === undefined ? undefined : parseIntArg(raw, name);
}

export function positional(opts: CLIOptions, index: number, label: string): string {
  const value = opts.positionals[index];
  if (value === undefined) {
    throw usageError(`Missing <${label}>`);
  }
  return value;
}
