/**
 * Manifest Loader
 *
 * Reads manifest TOML, validates it and builds the typed view.
 *
 * @module manifest/loader
 */

import { readFile } from 'fs/promises';
import { dirname, isAbsolute, resolve } from 'path';
import { parse as parseToml } from 'smol-toml';

import {
  DEFAULT_SCRATCH_MIN,
  MIN_RESERVED_TAIL,
  SCALE_KEYS,
  isDtype,
  type Dtype,
  type SegmentAccess,
  type SegmentKind,
  SEGMENT_ACCESS,
  SEGMENT_KINDS,
} from '../config/schema/index.js';
import { ERROR_CODES, ManifestError, ValidationError } from '../errors/index.js';
import { log } from '../debug/index.js';
import type {
  AbiSection,
  CustomField,
  Manifest,
  ManifestDocument,
  SchemaSection,
  SegmentSpec,
  WeightBlob,
  WeightScales,
  WeightsSection,
} from './types.js';
import { validateManifest } from './validator.js';
import {
  getInt,
  getString,
  getTable,
  isInt,
  isIntArray,
  isString,
  isTable,
  type TomlTable,
} from './values.js';

/**
 * Parse manifest text. Throws ManifestError on TOML syntax errors.
 */
export function parseManifestText(text: string, source = '<memory>'): TomlTable {
  try {
    return parseToml(text);
  } catch (err) {
    throw new ManifestError(
      ERROR_CODES.MANIFEST_PARSE,
      `Failed to parse manifest ${source}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
}

/**
 * Read and parse a manifest file without validating it.
 */
export async function loadManifestDocument(path: string): Promise<ManifestDocument> {
  const absolute = resolve(path);
  let text: string;
  try {
    text = await readFile(absolute, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new ManifestError(ERROR_CODES.MANIFEST_NOT_FOUND, `Manifest not found: ${absolute}`);
    }
    throw err;
  }
  log.debug('Manifest', `Loaded ${absolute} (${text.length} chars)`);
  return { path: absolute, text, data: parseManifestText(text, absolute) };
}

/**
 * Build a document and typed view from manifest text. With `validate`
 * (the default) every rule is checked first and a ValidationError carries
 * all issues; without it only the fields the typed view needs must be
 * well-formed.
 */
export function manifestFromText(
  text: string,
  path: string,
  options: { validate?: boolean } = {}
): { document: ManifestDocument; manifest: Manifest } {
  const data = parseManifestText(text, path);
  if (options.validate ?? true) {
    const result = validateManifest(data);
    if (!result.valid) {
      throw new ValidationError(result.errors);
    }
  }
  return { document: { path, text, data }, manifest: toManifest(data) };
}

/**
 * Load, validate and build the typed view. Throws ValidationError with every
 * issue when the manifest is invalid.
 */
export async function loadManifest(
  path: string,
  options: { validate?: boolean } = {}
): Promise<{ document: ManifestDocument; manifest: Manifest }> {
  const document = await loadManifestDocument(path);
  return manifestFromText(document.text, document.path, options);
}

/**
 * Resolve a path written in a manifest relative to the manifest's directory.
 */
export function resolveManifestPath(manifestPath: string, relative: string): string {
  return isAbsolute(relative) ? relative : resolve(dirname(manifestPath), relative);
}

// ============================================================================
// Typed view
// ============================================================================

function fail(field: string, message: string): never {
  throw new ManifestError(ERROR_CODES.MANIFEST_INVALID, `${field}: ${message}`);
}

function reqInt(table: TomlTable, key: string, prefix: string): number {
  const value = getInt(table, key);
  if (value === undefined) fail(`${prefix}.${key}`, 'must be an integer');
  return value;
}

function reqString(table: TomlTable, key: string, prefix: string): string {
  const value = getString(table, key);
  if (value === undefined) fail(`${prefix}.${key}`, 'must be a string');
  return value;
}

function reqTable(table: TomlTable, key: string, prefix: string): TomlTable {
  const value = getTable(table, key);
  if (!value) fail(prefix ? `${prefix}.${key}` : key, 'table is required');
  return value;
}

function reqDtype(table: TomlTable, key: string, prefix: string): Dtype {
  const value = table[key];
  if (!isDtype(value)) fail(`${prefix}.${key}`, 'is not a supported dtype');
  return value;
}

function reqShape(table: TomlTable, key: string, prefix: string): number[] {
  const value = table[key];
  if (!isIntArray(value)) fail(`${prefix}.${key}`, 'must be an array of integers');
  return value;
}

function toAbi(abi: TomlTable): AbiSection {
  return {
    entry: reqInt(abi, 'entry', 'abi'),
    controlOffset: reqInt(abi, 'control_offset', 'abi'),
    controlSize: reqInt(abi, 'control_size', 'abi'),
    inputOffset: reqInt(abi, 'input_offset', 'abi'),
    inputMax: reqInt(abi, 'input_max', 'abi'),
    outputOffset: reqInt(abi, 'output_offset', 'abi'),
    outputMax: reqInt(abi, 'output_max', 'abi'),
    scratchMin: getInt(abi, 'scratch_min') ?? DEFAULT_SCRATCH_MIN,
    alignment: reqInt(abi, 'alignment', 'abi'),
    reservedTail: getInt(abi, 'reserved_tail') ?? MIN_RESERVED_TAIL,
  };
}

function toCustomField(value: unknown): CustomField | null {
  if (!isTable(value)) return null;
  const field: CustomField = {};
  if (isString(value.name)) field.name = value.name;
  if (isInt(value.offset)) field.offset = value.offset;
  if (isString(value.dtype)) field.dtype = value.dtype;
  if (isIntArray(value.shape)) field.shape = value.shape;
  return field;
}

export function toSchema(schema: TomlTable): SchemaSection {
  const type = reqString(schema, 'type', 'schema');
  const prefix = `schema.${type}`;
  switch (type) {
    case 'vector': {
      const s = reqTable(schema, 'vector', 'schema');
      return {
        type,
        inputDtype: reqDtype(s, 'input_dtype', prefix),
        inputShape: reqShape(s, 'input_shape', prefix),
        outputDtype: reqDtype(s, 'output_dtype', prefix),
        outputShape: reqShape(s, 'output_shape', prefix),
      };
    }
    case 'time_series': {
      const s = reqTable(schema, 'time_series', 'schema');
      return {
        type,
        inputDtype: reqDtype(s, 'input_dtype', prefix),
        window: reqInt(s, 'window', prefix),
        features: reqInt(s, 'features', prefix),
        stride: getInt(s, 'stride') ?? 1,
        outputDtype: reqDtype(s, 'output_dtype', prefix),
        outputShape: reqShape(s, 'output_shape', prefix),
      };
    }
    case 'graph': {
      const s = reqTable(schema, 'graph', 'schema');
      return {
        type,
        inputDtype: reqDtype(s, 'input_dtype', prefix),
        nodeFeatureDim: reqInt(s, 'node_feature_dim', prefix),
        edgeFeatureDim: reqInt(s, 'edge_feature_dim', prefix),
        maxNodes: reqInt(s, 'max_nodes', prefix),
        maxEdges: reqInt(s, 'max_edges', prefix),
        outputDtype: reqDtype(s, 'output_dtype', prefix),
        outputShape: reqShape(s, 'output_shape', prefix),
      };
    }
    case 'custom': {
      const s = reqTable(schema, 'custom', 'schema');
      const fields = Array.isArray(s.fields) ? s.fields : [];
      return {
        type,
        inputBlobSize: reqInt(s, 'input_blob_size', prefix),
        outputBlobSize: reqInt(s, 'output_blob_size', prefix),
        alignment: getInt(s, 'alignment'),
        layoutDoc: getString(s, 'layout_doc'),
        schemaHash32: getString(s, 'schema_hash32'),
        fields: fields.map(toCustomField).filter((f): f is CustomField => f !== null),
      };
    }
    default:
      return fail('schema.type', `unsupported schema type ${type}`);
  }
}

function toBlob(blob: unknown, position: number): WeightBlob {
  if (!isTable(blob)) fail(`weights.blobs[${position}]`, 'must be a table');
  const prefix = `weights.blobs[${position}]`;
  return {
    name: reqString(blob, 'name', prefix),
    file: reqString(blob, 'file', prefix),
    hash: reqString(blob, 'hash', prefix),
    sizeBytes: reqInt(blob, 'size_bytes', prefix),
    chunkSize: getInt(blob, 'chunk_size'),
    dataOffset: getInt(blob, 'data_offset'),
    segmentIndex: getInt(blob, 'segment_index'),
  };
}

function toWeights(weights: TomlTable): WeightsSection {
  const scalesTable = getTable(weights, 'scales');
  const scales: WeightScales = {};
  if (scalesTable) {
    for (const key of SCALE_KEYS) {
      const value = getInt(scalesTable, key);
      if (value !== undefined) scales[key] = value;
    }
  }
  const blobs = Array.isArray(weights.blobs) ? weights.blobs : [];
  return {
    layout: reqString(weights, 'layout', 'weights'),
    quantization: reqString(weights, 'quantization', 'weights'),
    dtype: getString(weights, 'dtype'),
    headerFormat: getString(weights, 'header_format') ?? 'none',
    blobs: blobs.map(toBlob),
    scales,
    hasScalesTable: scalesTable !== undefined,
  };
}

function isSegmentKind(value: unknown): value is SegmentKind {
  return isString(value) && SEGMENT_KINDS.some((k) => k === value);
}

function isSegmentAccess(value: unknown): value is SegmentAccess {
  return isString(value) && SEGMENT_ACCESS.some((a) => a === value);
}

function toSegment(seg: unknown, position: number): SegmentSpec {
  const prefix = `segments[${position}]`;
  if (!isTable(seg)) fail(prefix, 'must be a table');
  const kind = seg.kind;
  const access = seg.access;
  if (!isSegmentKind(kind)) fail(`${prefix}.kind`, 'is invalid');
  if (!isSegmentAccess(access)) fail(`${prefix}.access`, 'is invalid');
  return {
    index: reqInt(seg, 'index', prefix),
    slot: getInt(seg, 'slot'),
    kind,
    access,
    source: getString(seg, 'source'),
    bytes: getInt(seg, 'bytes'),
  };
}

/**
 * Build the typed view of an already-validated manifest document.
 */
export function toManifest(data: TomlTable): Manifest {
  const model = reqTable(data, 'model', '');
  const limits = reqTable(data, 'limits', '');
  const weights = getTable(data, 'weights');
  const segments = Array.isArray(data.segments) ? data.segments : [];

  return {
    model: {
      id: reqString(model, 'id', 'model'),
      version: reqString(model, 'version', 'model'),
      abiVersion: getInt(model, 'abi_version') ?? 1,
      arch: reqString(model, 'arch', 'model'),
      endianness: reqString(model, 'endianness', 'model'),
      vaddrBits: reqInt(model, 'vaddr_bits', 'model'),
      profile: getString(model, 'profile'),
    },
    abi: toAbi(reqTable(data, 'abi', '')),
    schema: toSchema(reqTable(data, 'schema', '')),
    weights: weights ? toWeights(weights) : undefined,
    segments: segments.map(toSegment),
    limits: {
      maxInstructions: reqInt(limits, 'max_instructions', 'limits'),
      cuBudget: reqInt(limits, 'cu_budget', 'limits'),
    },
    validationMode: getString(getTable(data, 'validation'), 'mode'),
    build: getTable(data, 'build') ?? {},
    metadata: getTable(data, 'metadata'),
    raw: data,
  };
}
