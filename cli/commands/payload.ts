/**
 * Payload commands: pack an input file, decode an output file.
 */

import { readFile } from 'fs/promises';

import { NodeBlobIO } from '../../src/converter/io/node.js';
import { log } from '../../src/debug/index.js';
import { ERROR_CODES, createKilnError } from '../../src/errors/index.js';
import { loadManifest, type Manifest } from '../../src/manifest/index.js';
import {
  decodeOutput,
  hasEnvelope,
  isOutputFormat,
  isSchemaHashMode,
  loadPayloadFromJson,
  packInput,
  parseEnvelope,
  readVmOutput,
  resolveOutputFormat,
  schemaOutputInfo,
  type PackInputOptions,
} from '../../src/payload/index.js';
import { flagBool, flagString, positional, requireFlag } from '../args/index.js';
import type { CLIOptions } from '../helpers/types.js';

export async function readJsonFile(path: string): Promise<unknown> {
  const text = await new NodeBlobIO().readText(path);
  try {
    return JSON.parse(text);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw createKilnError(ERROR_CODES.PAYLOAD_INVALID, `Failed to parse ${path}: ${err.message}`);
    }
    throw err;
  }
}

/** `--header` / `--no-header`, `--crc`, `--schema-hash` */
export function packOptionsFromFlags(opts: CLIOptions): PackInputOptions {
  const mode = flagString(opts, 'schema-hash');
  if (mode !== undefined && !isSchemaHashMode(mode)) {
    throw createKilnError(ERROR_CODES.CLI_USAGE, '--schema-hash must be auto, manifest, or none');
  }
  return {
    header: flagBool(opts, 'header') ? true : flagBool(opts, 'no-header') ? false : undefined,
    crc: flagBool(opts, 'crc'),
    schemaHashMode: mode,
  };
}

export async function packInputFile(manifest: Manifest, inputPath: string, opts: CLIOptions): Promise<Uint8Array> {
  const payload = loadPayloadFromJson(await readJsonFile(inputPath));
  return packInput(manifest, payload, packOptionsFromFlags(opts));
}

export async function runInput(opts: CLIOptions): Promise<number> {
  const { manifest } = await loadManifest(positional(opts, 0, 'manifest'), { validate: false });
  const bytes = await packInputFile(manifest, requireFlag(opts, 'input'), opts);
  const output = requireFlag(opts, 'output');
  await new NodeBlobIO().writeFile(output, bytes);
  console.log(`Wrote ${bytes.length} bytes to ${output}`);
  return 0;
}

export interface OutputOptions {
  format: string;
  vmAccount?: boolean;
  useMax?: boolean;
}

/**
 * Decode output bytes to stdout. Only the decoded payload goes to stdout;
 * envelope and control-block details are logged.
 */
export function writeOutput(manifest: Manifest, input: Uint8Array, options: OutputOptions): void {
  let data = input;
  if (options.vmAccount) {
    const vm = readVmOutput(data, manifest.abi, { useMax: options.useMax });
    log.info('Payload', `status ${vm.control.status}, output_len ${vm.outputLen}`);
    data = vm.bytes;
  } else if (hasEnvelope(data)) {
    const envelope = parseEnvelope(data);
    log.info(
      'Payload',
      `FBH1 schema_id ${envelope.header.schemaId}, ${envelope.payload.length} bytes` +
        (envelope.hasCrc ? ', crc ok' : '')
    );
    data = envelope.payload;
  }

  const { format } = options;
  if (!isOutputFormat(format)) {
    throw createKilnError(ERROR_CODES.CLI_USAGE, `Unknown output format: ${format}`);
  }
  const resolved = resolveOutputFormat(format, manifest.schema);
  if (resolved === 'raw') {
    process.stdout.write(data);
    return;
  }
  const count = format === 'auto' ? schemaOutputInfo(manifest.schema).count : undefined;
  console.log(decodeOutput(data, resolved, count));
}

/**
 * Decode an output file. With `--vm-account` the file is a raw VM account
 * dump and the output region is located through the control block.
 */
export async function runOutput(opts: CLIOptions): Promise<number> {
  const { manifest } = await loadManifest(positional(opts, 0, 'manifest'), { validate: false });
  const data = new Uint8Array(await readFile(positional(opts, 1, 'output.bin')));
  writeOutput(manifest, data, {
    format: flagString(opts, 'format') ?? 'auto',
    vmAccount: flagBool(opts, 'vm-account'),
    useMax: flagBool(opts, 'use-max'),
  });
  return 0;
}
