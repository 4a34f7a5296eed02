/**
 * Weight Conversion Pipeline
 *
 * Manifest + weights JSON -> packed weights file + `[weights.scales]` patch.
 *
 * @module converter/convert
 */

import { dirname, isAbsolute, join, resolve } from 'path';

import type { ScaleKey } from '../config/schema/index.js';
import { ConversionError } from '../errors/index.js';
import { log } from '../debug/index.js';
import { manifestFromText } from '../manifest/loader.js';
import { patchManifest, type TablePatch } from '../manifest/patcher.js';
import type { Manifest } from '../manifest/types.js';
import { isTable } from '../manifest/values.js';
import { resolveTemplateDims, type DimOverrides } from './dims.js';
import { encodeWeights, type EncodeResult, type TemplateDims, type WeightInput } from './layouts.js';
import { inferTemplate, type TemplateName } from './template.js';
import { NodeBlobIO } from './io/node.js';
import type { BlobIO } from './io/types.js';

export interface ConvertOptions {
  /** Force a template instead of inferring it from `weights.layout` */
  template?: TemplateName;
  /** Emit bias blocks for templates where they are optional (default true) */
  bias?: boolean;
  /** Scales to use verbatim instead of deriving them */
  scales?: Partial<Record<ScaleKey, number>>;
  /** dest -> src: copy input key `src` to `dest` before encoding */
  keymap?: Record<string, string>;
  dims?: DimOverrides;
}

export interface ConvertResult extends EncodeResult {
  template: TemplateName;
  dims: TemplateDims;
}

/**
 * Template for a manifest, from the override or `weights.layout`.
 */
export function resolveTemplate(manifest: Manifest, override?: TemplateName): TemplateName {
  const template = override ?? inferTemplate(manifest.weights?.layout);
  if (!template) {
    throw new ConversionError('Unable to infer template; pass --template');
  }
  return template;
}

/**
 * Accept a tensor mapping, unwrapping a `state_dict` envelope.
 */
export function normalizeWeightInput(value: unknown): WeightInput {
  if (isTable(value)) {
    const inner = value.state_dict;
    return isTable(inner) ? { ...inner } : { ...value };
  }
  throw new ConversionError('Unsupported input object; expected dict or tensor');
}

export function applyKeymap(input: WeightInput, keymap: Record<string, string>): WeightInput {
  const out = { ...input };
  for (const [dest, src] of Object.entries(keymap)) {
    if (!(src in input)) {
      throw new ConversionError(`Key '${src}' not found in input for mapping to '${dest}'`);
    }
    out[dest] = input[src];
  }
  return out;
}

/**
 * Parse `dest=src` pairs as given on the command line.
 */
export function parseKeymap(pairs: string[]): Record<string, string> {
  const keymap: Record<string, string> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0 || eq === pair.length - 1) {
      throw new ConversionError(`Invalid key mapping '${pair}'; expected dest=src`);
    }
    keymap[pair.slice(0, eq)] = pair.slice(eq + 1);
  }
  return keymap;
}

/**
 * Encode weights for a manifest. Pure: nothing is read or written.
 */
export function convertWeights(manifest: Manifest, input: unknown, options: ConvertOptions = {}): ConvertResult {
  const template = resolveTemplate(manifest, options.template);
  let data = normalizeWeightInput(input);
  if (options.keymap) {
    data = applyKeymap(data, options.keymap);
  }

  const dims = resolveTemplateDims(manifest, template, data, options.dims);
  log.verbose('Convert', `template=${template} input_dim=${dims.inputDim} output_dim=${dims.outputDim}`);

  const result = encodeWeights(dims, data, { bias: options.bias, scales: options.scales });
  log.verbose('Convert', `Encoded ${result.buffer.length} bytes`);
  return { ...result, template, dims };
}

/**
 * Where converted weights go: the first blob's file, else `weights.bin`,
 * both next to the manifest.
 */
export function weightsOutputPath(manifestPath: string, manifest: Manifest): string {
  const base = dirname(manifestPath);
  const file = manifest.weights?.blobs[0]?.file;
  if (file) {
    return isAbsolute(file) ? file : resolve(base, file);
  }
  return join(base, 'weights.bin');
}

export function scalesPatch(scales: Partial<Record<ScaleKey, number>>): TablePatch {
  const set: Record<string, number> = {};
  for (const [key, value] of Object.entries(scales)) {
    if (value !== undefined) set[key] = value;
  }
  return { table: 'weights.scales', set, createIfMissing: true };
}

export interface ConvertManifestOptions extends ConvertOptions {
  /** Output path; defaults to weightsOutputPath() */
  output?: string;
  /** Write computed scales back into the manifest (default true) */
  updateManifest?: boolean;
}

/**
 * Convert a weights JSON file for a manifest on disk, write the blob and
 * patch the scales into the manifest.
 */
export async function convertManifestWeights(
  manifestPath: string,
  inputPath: string,
  options: ConvertManifestOptions = {},
  io: BlobIO = new NodeBlobIO()
): Promise<ConvertResult & { outputPath: string }> {
  const text = await io.readText(manifestPath);
  const { manifest } = manifestFromText(text, manifestPath, { validate: false });

  let input: unknown;
  try {
    input = JSON.parse(await io.readText(inputPath));
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new ConversionError(`Failed to parse ${inputPath}: ${err.message}`);
    }
    throw err;
  }

  const result = convertWeights(manifest, input, options);
  const outputPath = options.output ?? weightsOutputPath(manifestPath, manifest);
  await io.writeFile(outputPath, result.buffer);
  log.info('Convert', `Wrote ${result.buffer.length} bytes to ${outputPath}`);

  if ((options.updateManifest ?? true) && Object.keys(result.scales).length > 0) {
    await io.writeTextAtomic(manifestPath, patchManifest(text, [scalesPatch(result.scales)]));
    log.verbose('Convert', `Updated [weights.scales] in ${manifestPath}`);
  }
  return { ...result, outputPath };
}
