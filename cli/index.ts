#!/usr/bin/env node
/**
 * kiln CLI - Compile, pack and deploy quantized model weights
 *
 * Usage:
 *   kiln validate model.toml
 *   kiln convert model.toml --input weights.json
 *   kiln pack model.toml
 *   kiln accounts init --manifest model.toml --authority-keypair auth.json
 *   kiln accounts create --accounts accounts.toml
 *   kiln invoke model.toml --input input.json
 */

import { applyDebugConfig, log, setLogLevel } from '../src/debug/index.js';
import { isKilnError } from '../src/errors/index.js';
import { runtimeOverridesFromEnv, setRuntimeConfig } from '../src/config/runtime.js';
import { parseArgs } from './args/index.js';
import type { CLIOptions, Command, CommandHandler } from './helpers/types.js';
import {
  runAccountsClear,
  runAccountsClose,
  runAccountsCreate,
  runAccountsDerive,
  runAccountsInit,
  runAccountsShow,
} from './commands/accounts.js';
import { runInvoke, runUpload } from './commands/deploy.js';
import {
  runChunk,
  runConvert,
  runGuestConfig,
  runPack,
  runSchemaHash,
  runShow,
  runValidate,
} from './commands/manifest.js';
import { runInput, runOutput } from './commands/payload.js';
import {
  runRegistryAdd,
  runRegistryDefaults,
  runRegistryList,
  runRegistryRemove,
} from './commands/registry.js';

// ============================================================================
// Dispatch
// ============================================================================

const ACCOUNTS_COMMANDS: Record<string, CommandHandler> = {
  init: runAccountsInit,
  show: runAccountsShow,
  derive: runAccountsDerive,
  create: runAccountsCreate,
  clear: runAccountsClear,
  close: runAccountsClose,
};

const REGISTRY_COMMANDS: Record<string, CommandHandler> = {
  list: runRegistryList,
  add: runRegistryAdd,
  remove: runRegistryRemove,
  defaults: runRegistryDefaults,
};

function subcommandHandler(table: Record<string, CommandHandler>, group: string): CommandHandler {
  return async (opts) => {
    const name = opts.subcommand ?? '';
    const handler = Object.hasOwn(table, name) ? table[name] : undefined;
    if (!handler) {
      console.error(`Unknown ${group} subcommand: ${name || '(none)'}`);
      console.error(`Expected one of: ${Object.keys(table).join(', ')}`);
      return 1;
    }
    return handler(opts);
  };
}

const COMMAND_HANDLERS: Record<Command, CommandHandler> = {
  validate: runValidate,
  show: runShow,
  'schema-hash': runSchemaHash,
  convert: runConvert,
  pack: runPack,
  chunk: runChunk,
  input: runInput,
  output: runOutput,
  'guest-config': runGuestConfig,
  upload: runUpload,
  invoke: runInvoke,
  accounts: subcommandHandler(ACCOUNTS_COMMANDS, 'accounts'),
  registry: subcommandHandler(REGISTRY_COMMANDS, 'registry'),
  help: async () => {
    printHelp();
    return 0;
  },
};

function printHelp(): void {
  console.log(`
kiln - Manifest-driven weight compiler for on-chain VM models

MANIFEST
  kiln validate <manifest>                 Check a model manifest
  kiln show <manifest>                     Summarize model, ABI, weights, segments
  kiln schema-hash <manifest> [--update]   Print (or write) the schema hash
  kiln convert <manifest> --input <json>   Quantize float weights into a blob
      [--template T] [--scale N] [--keymap a=b,...] [--no-bias] [--output path]
  kiln pack <manifest> [--create-missing]  Fill in blob sizes and sha256 hashes
  kiln chunk <manifest> [--chunk-size N] [--out-dir dir]
  kiln guest-config <manifest> [--template T] [--output path] [--print]

PAYLOADS
  kiln input <manifest> --input <json> --output <bin> [--header|--no-header] [--crc]
  kiln output <manifest> <output.bin> [--format auto|hex|raw|u8|i8|i16|i32|u32|f32] [--vm-account] [--use-max]

ACCOUNTS
  kiln accounts init [--out accounts.toml] [--manifest m] [--seed N] [--authority-keypair k]
  kiln accounts show|derive [--accounts accounts.toml] [--mapped-out file]
  kiln accounts create [--accounts a] [--check-chain] [--dry-run]
  kiln accounts clear --kind K --slot N [--offset O --len L]
  kiln accounts close [--kind K --slot N] [--recipient pubkey]

DEPLOY
  kiln upload <manifest> [--accounts a] [--chunk-size N] [--dry-run]
  kiln invoke <manifest> [--accounts a] [--input json] [--program-path elf] [--dry-run]

REGISTRY
  kiln registry list
  kiln registry add <project-dir> --manifest m [--name n] [--accounts a]
  kiln registry remove <name>
  kiln registry defaults [--cluster c] [--rpc-url u] [--program-id p] [--payer k]

Cluster options:
  --rpc-url <url>        RPC endpoint (default: devnet)
  --program-id <id>      VM program id
  --payer <path>         Payer keypair

Global options:
  --verbose, -v          Verbose logs
  --debug                Debug logs
  --quiet, -q            Suppress logs
  --help, -h             This help

Environment:
  KILN_LOG_LEVEL, KILN_LOG_MODULES, KILN_REGISTRY_PATH, KILN_RPC_URL, KILN_PROGRAM_ID,
  KILN_PAYER, KILN_TOOLS_DIR, KILN_RUNNER, KILN_TOOL_ENV_PREFIX
`);
}

function applyLogFlags(opts: CLIOptions): void {
  if (opts.debug) setLogLevel('debug');
  else if (opts.verbose) setLogLevel('verbose');
  else if (opts.quiet) setLogLevel('silent');
}

async function main(): Promise<void> {
  const config = setRuntimeConfig(runtimeOverridesFromEnv(process.env));
  applyDebugConfig(config.debug);

  const opts = parseArgs(process.argv.slice(2));
  applyLogFlags(opts);

  if (opts.help) {
    printHelp();
    return;
  }

  log.debug('CLI', `command=${opts.command} subcommand=${opts.subcommand ?? '-'}`);
  // exitCode rather than exit() so piped stdout is flushed
  process.exitCode = await COMMAND_HANDLERS[opts.command](opts);
}

main().catch((err: unknown) => {
  if (isKilnError(err)) {
    console.error(`Error [${err.code}]: ${err.message}`);
  } else if (err instanceof Error) {
    console.error(`Error: ${err.message}`);
    log.debug('CLI', err.stack ?? '');
  } else {
    console.error(`Error: ${String(err)}`);
  }
  process.exit(1);
});
