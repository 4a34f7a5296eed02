/**
 * Manifest commands: validate, show, schema-hash, convert, pack, chunk,
 * guest-config.
 */

import { dirname, resolve } from 'path';

import { chunkManifest } from '../../src/converter/chunk.js';
import { convertManifestWeights, parseKeymap, resolveTemplate } from '../../src/converter/convert.js';
import { packManifest } from '../../src/converter/pack.js';
import { isSingleLayer, isTemplateName } from '../../src/converter/template.js';
import { ERROR_CODES, createKilnError } from '../../src/errors/index.js';
import {
  computeGuestConfig,
  guestConfigPath,
  isGuestTemplate,
  renderGuestConstants,
  writeGuestConfig,
} from '../../src/guest/index.js';
import {
  formatIssues,
  loadManifest,
  loadManifestDocument,
  patchManifest,
  validateManifest,
  writeFileAtomic,
} from '../../src/manifest/index.js';
import { formatHash32, schemaHash32 } from '../../src/schema/hash.js';
import { flagBool, flagInt, flagString, positional, requireFlag } from '../args/index.js';
import type { CLIOptions } from '../helpers/types.js';

export async function runValidate(opts: CLIOptions): Promise<number> {
  const document = await loadManifestDocument(positional(opts, 0, 'manifest'));
  const result = validateManifest(document.data);
  if (result.valid) {
    console.log(`OK: ${document.path}`);
    return 0;
  }
  console.error(`Manifest invalid: ${document.path}`);
  for (const line of formatIssues(result.errors)) {
    console.error(`  - ${line}`);
  }
  return 1;
}

export async function runShow(opts: CLIOptions): Promise<number> {
  const { document, manifest } = await loadManifest(positional(opts, 0, 'manifest'), { validate: false });
  const { model, abi, schema, weights } = manifest;

  console.log(`\n${model.id} ${model.version} (${document.path})`);
  console.log(`  schema:   ${schema.type}, hash ${formatHash32(schemaHash32(document.data))}`);
  console.log(
    `  abi:      entry 0x${abi.entry.toString(16)}, input ${abi.inputMax}B @0x${abi.inputOffset.toString(16)}, ` +
      `output ${abi.outputMax}B @0x${abi.outputOffset.toString(16)}, scratch ${abi.scratchMin}B`
  );
  console.log(`  limits:   ${manifest.limits.maxInstructions} instructions, ${manifest.limits.cuBudget} CU`);
  if (weights) {
    console.log(`  weights:  ${weights.layout} (${weights.quantization}, header ${weights.headerFormat})`);
    for (const blob of weights.blobs) {
      console.log(`    ${blob.name.padEnd(12)} ${blob.file} ${blob.sizeBytes}B ${blob.hash}`);
    }
  }
  console.log('  segments:');
  for (const seg of manifest.segments) {
    const slot = seg.slot !== undefined ? ` slot ${seg.slot}` : '';
    console.log(`    #${seg.index}${slot} ${seg.kind} ${seg.access}${seg.source ? ` ${seg.source}` : ''}`);
  }
  console.log('');
  return 0;
}

export async function runSchemaHash(opts: CLIOptions): Promise<number> {
  const path = positional(opts, 0, 'manifest');
  const { document, manifest } = await loadManifest(path, { validate: false });
  const hash = formatHash32(schemaHash32(document.data));
  console.log(hash);

  if (flagBool(opts, 'update')) {
    if (manifest.schema.type !== 'custom') {
      throw createKilnError(ERROR_CODES.CLI_USAGE, '--update only applies to custom schemas (schema.custom.schema_hash32)');
    }
    const patched = patchManifest(document.text, [{ table: 'schema.custom', set: { schema_hash32: hash } }]);
    if (patched !== document.text) {
      await writeFileAtomic(document.path, patched);
      console.log(`Updated schema.custom.schema_hash32 in ${document.path}`);
    }
  }
  return 0;
}

export async function runConvert(opts: CLIOptions): Promise<number> {
  const manifestPath = positional(opts, 0, 'manifest');
  const templateFlag = flagString(opts, 'template');
  if (templateFlag !== undefined && !isTemplateName(templateFlag)) {
    throw createKilnError(ERROR_CODES.CLI_USAGE, `Unknown template: ${templateFlag}`);
  }
  const scale = flagInt(opts, 'scale');
  let scales: { w_scale_q16: number } | undefined;
  if (scale !== undefined) {
    const { manifest } = await loadManifest(manifestPath, { validate: false });
    if (!isSingleLayer(resolveTemplate(manifest, templateFlag))) {
      throw createKilnError(ERROR_CODES.CLI_USAGE, '--scale applies to single-layer templates only');
    }
    scales = { w_scale_q16: scale };
  }
  const keymapFlag = flagString(opts, 'keymap');

  const result = await convertManifestWeights(manifestPath, requireFlag(opts, 'input'), {
    output: flagString(opts, 'output'),
    template: templateFlag,
    bias: !flagBool(opts, 'no-bias'),
    scales,
    keymap: keymapFlag ? parseKeymap(keymapFlag.split(',')) : undefined,
  });

  console.log(`Wrote ${result.buffer.length} bytes (${result.template}) to ${result.outputPath}`);
  for (const [key, value] of Object.entries(result.scales)) {
    console.log(`  ${key} = ${value}`);
  }
  return 0;
}

export async function runPack(opts: CLIOptions): Promise<number> {
  const updates = await packManifest(positional(opts, 0, 'manifest'), {
    createMissing: flagBool(opts, 'create-missing'),
  });
  for (const update of updates) {
    const note = update.created ? ' (placeholder)' : '';
    console.log(`${update.name}: ${update.hash} ${update.sizeBytes}B${note}`);
  }
  return 0;
}

export async function runChunk(opts: CLIOptions): Promise<number> {
  const results = await chunkManifest(positional(opts, 0, 'manifest'), {
    chunkSize: flagInt(opts, 'chunk-size'),
    outDir: flagString(opts, 'out-dir'),
  });
  for (const result of results) {
    console.log(`${result.source}: ${result.chunks.length} chunk(s)`);
    for (const chunk of result.chunks) {
      console.log(`  ${chunk}`);
    }
  }
  return 0;
}

export async function runGuestConfig(opts: CLIOptions): Promise<number> {
  const manifestPath = positional(opts, 0, 'manifest');
  const template = flagString(opts, 'template');
  if (template !== undefined && !isGuestTemplate(template)) {
    throw createKilnError(ERROR_CODES.CLI_USAGE, `Unknown guest template: ${template}`);
  }
  const options = { template, schemaHashMode: flagString(opts, 'schema-hash') };

  if (flagBool(opts, 'print')) {
    const { manifest } = await loadManifest(manifestPath, { validate: false });
    process.stdout.write(renderGuestConstants(computeGuestConfig(manifest, options)));
    return 0;
  }

  const output = flagString(opts, 'output') ?? guestConfigPath(resolve(dirname(manifestPath), 'guest'));
  const { config, outputPath } = await writeGuestConfig(manifestPath, output, options);
  console.log(`Wrote ${outputPath} (${config.model.template})`);
  return 0;
}
