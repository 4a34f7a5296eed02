/**
 * Payload Codec
 *
 * Packs JSON-shaped model inputs into the byte layout the guest reads from
 * its input region, and unpacks them again. Values are written in the
 * schema's declared dtype without quantization.
 *
 * Graph layout:
 *   node_count:u32  edge_count:u32  reserved:u32  reserved:u32
 *   node features  (node_count x node_feature_dim x dtype)
 *   edge pairs     (edge_count x [src:u32, dst:u32])
 *   edge features  (edge_count x edge_feature_dim x dtype, when dim > 0)
 *
 * @module payload/codec
 */

import { Buffer } from 'buffer';

import { SCHEMA_IDS } from '../config/schema/index.js';
import { log } from '../debug/index.js';
import { PayloadError } from '../errors/index.js';
import type {
  CustomSchema,
  GraphSchema,
  Manifest,
  SchemaSection,
  TimeSeriesSchema,
  VectorSchema,
} from '../manifest/types.js';
import { isTable, product, type TomlTable } from '../manifest/values.js';
import { decodeValues, dtypeSize, encodeValues } from './dtype.js';
import { resolveSchemaHash, wrapEnvelope } from './envelope.js';

export const GRAPH_HEADER_BYTES = 16;

// ============================================================================
// Types
// ============================================================================

export interface GraphPayload {
  nodeCount: number;
  edgeCount: number;
  nodes: number[][];
  edges: Array<[number, number]>;
  edgeFeatures: number[][];
}

export type UnpackedPayload =
  | { type: 'vector'; values: number[] }
  | { type: 'time_series'; rows: number[][] }
  | { type: 'graph'; graph: GraphPayload }
  | { type: 'custom'; bytes: Uint8Array };

// ============================================================================
// Helpers
// ============================================================================

function concat(parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, p) => sum + p.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

/**
 * One level of flattening: `[[a, b], [c]]` -> `[a, b, c]`, scalars -> `[x]`.
 */
export function flattenPayload(values: unknown): unknown[] {
  if (!Array.isArray(values)) return [values];
  if (values.length > 0 && Array.isArray(values[0])) {
    const flat: unknown[] = [];
    for (const row of values) {
      if (!Array.isArray(row)) {
        throw new PayloadError('nested list must contain lists');
      }
      flat.push(...row);
    }
    return flat;
  }
  return values;
}

function pick(payload: TomlTable, keys: readonly string[]): unknown {
  for (const key of keys) {
    if (key in payload) return payload[key];
  }
  return undefined;
}

function optionalCount(value: unknown, fallback: number, name: string): number {
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new PayloadError(`${name} must be a non-negative integer`);
  }
  return value;
}

function toIndex(value: unknown): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new PayloadError(`edge index ${String(value)} is not an integer`);
  }
  return value;
}

export function normalizeEdges(edges: unknown): Array<[number, number]> {
  if (!Array.isArray(edges)) {
    throw new PayloadError('edges must be a list');
  }
  if (edges.length > 0 && Array.isArray(edges[0])) {
    return edges.map((pair) => {
      if (!Array.isArray(pair) || pair.length !== 2) {
        throw new PayloadError('edge pairs must be [src, dst]');
      }
      return [toIndex(pair[0]), toIndex(pair[1])];
    });
  }
  if (edges.length % 2 !== 0) {
    throw new PayloadError('edge list length must be even');
  }
  const out: Array<[number, number]> = [];
  for (let i = 0; i < edges.length; i += 2) {
    out.push([toIndex(edges[i]), toIndex(edges[i + 1])]);
  }
  return out;
}

// ============================================================================
// Packing
// ============================================================================

function packVector(schema: VectorSchema, payload: unknown): Uint8Array {
  const expected = product(schema.inputShape);
  const flat = flattenPayload(payload);
  if (flat.length !== expected) {
    throw new PayloadError(`vector payload length mismatch: ${flat.length} != ${expected}`);
  }
  return encodeValues(schema.inputDtype, flat);
}

function packTimeSeries(schema: TimeSeriesSchema, payload: unknown): Uint8Array {
  let flat: unknown[];
  if (Array.isArray(payload) && payload.length > 0 && Array.isArray(payload[0])) {
    if (payload.length !== schema.window) {
      throw new PayloadError('time_series window length mismatch');
    }
    flat = [];
    for (const row of payload) {
      if (!Array.isArray(row) || row.length !== schema.features) {
        throw new PayloadError('time_series row length mismatch');
      }
      flat.push(...row);
    }
  } else {
    flat = flattenPayload(payload);
  }

  const expected = schema.window * schema.features;
  if (flat.length !== expected) {
    throw new PayloadError(`time_series payload length mismatch: ${flat.length} != ${expected}`);
  }
  return encodeValues(schema.inputDtype, flat);
}

function packGraph(schema: GraphSchema, payload: unknown): Uint8Array {
  if (!isTable(payload)) {
    throw new PayloadError('graph payload must be an object');
  }
  const nodes = pick(payload, ['nodes', 'node_features']);
  const edges = pick(payload, ['edges', 'edge_index', 'edge_indices']);
  const edgeFeatures = pick(payload, ['edge_features', 'edge_attrs']);

  if (nodes === undefined || edges === undefined) {
    throw new PayloadError('graph payload requires nodes and edges');
  }
  if (!Array.isArray(nodes)) {
    throw new PayloadError('nodes must be a list');
  }

  const nodeCount = optionalCount(payload.node_count, nodes.length, 'node_count');
  if (nodeCount > schema.maxNodes) {
    throw new PayloadError('node_count exceeds schema.graph.max_nodes');
  }
  if (nodes.length !== nodeCount) {
    throw new PayloadError('node_count does not match nodes length');
  }
  const flatNodes: unknown[] = [];
  for (const row of nodes) {
    if (!Array.isArray(row) || row.length !== schema.nodeFeatureDim) {
      throw new PayloadError('node feature row length mismatch');
    }
    flatNodes.push(...row);
  }

  const pairs = normalizeEdges(edges);
  const edgeCount = optionalCount(payload.edge_count, pairs.length, 'edge_count');
  if (edgeCount > schema.maxEdges) {
    throw new PayloadError('edge_count exceeds schema.graph.max_edges');
  }
  if (pairs.length !== edgeCount) {
    throw new PayloadError('edge_count does not match edges length');
  }

  const flatEdgeFeatures: unknown[] = [];
  if (schema.edgeFeatureDim > 0) {
    if (edgeFeatures === undefined) {
      throw new PayloadError('edge_features required for edge_feature_dim > 0');
    }
    if (!Array.isArray(edgeFeatures) || edgeFeatures.length !== edgeCount) {
      throw new PayloadError('edge_features length mismatch');
    }
    for (const row of edgeFeatures) {
      if (!Array.isArray(row) || row.length !== schema.edgeFeatureDim) {
        throw new PayloadError('edge feature row length mismatch');
      }
      flatEdgeFeatures.push(...row);
    }
  }

  const header = encodeValues('u32', [nodeCount, edgeCount, 0, 0]);
  return concat([
    header,
    encodeValues(schema.inputDtype, flatNodes),
    encodeValues('u32', pairs.flat()),
    encodeValues(schema.inputDtype, flatEdgeFeatures),
  ]);
}

const HEX_RE = /^(?:[0-9a-fA-F]{2})*$/;
const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;

function fromHex(text: string): Uint8Array {
  const hex = text.startsWith('0x') ? text.slice(2) : text;
  if (!HEX_RE.test(hex)) {
    throw new PayloadError('invalid hex payload');
  }
  return new Uint8Array(Buffer.from(hex, 'hex'));
}

function fromBase64(text: string): Uint8Array {
  const compact = text.replace(/\s+/g, '');
  if (compact.length % 4 !== 0 || !BASE64_RE.test(compact)) {
    throw new PayloadError('custom payload string must be hex or base64');
  }
  return new Uint8Array(Buffer.from(compact, 'base64'));
}

/**
 * Raw bytes of a custom payload given as `{payload_hex}`, `{payload_base64}`,
 * `{payload}`, a byte list, a `0x` hex string or a base64 string.
 */
export function customBytesFromJson(payload: unknown): Uint8Array {
  if (payload instanceof Uint8Array) {
    return payload;
  }
  if (isTable(payload)) {
    if ('payload_hex' in payload) return fromHex(String(payload.payload_hex));
    if ('payload_base64' in payload) return fromBase64(String(payload.payload_base64));
    if ('payload' in payload) return customBytesFromJson(payload.payload);
  }
  if (Array.isArray(payload)) {
    return Uint8Array.from(payload, (b, i) => {
      if (typeof b !== 'number' || !Number.isInteger(b)) {
        throw new PayloadError(`custom payload byte at index ${i} is not an integer`);
      }
      return b & 0xff;
    });
  }
  if (typeof payload === 'string') {
    return payload.startsWith('0x') ? fromHex(payload) : fromBase64(payload);
  }
  throw new PayloadError('unsupported custom payload format');
}

function packCustom(schema: CustomSchema, payload: unknown): Uint8Array {
  if (schema.inputBlobSize <= 0) {
    throw new PayloadError('schema.custom.input_blob_size required');
  }
  const data = customBytesFromJson(payload);
  if (data.length < schema.inputBlobSize) {
    throw new PayloadError('custom payload smaller than input_blob_size');
  }
  return data;
}

/**
 * Pack a payload for the given schema, without envelope.
 */
export function packPayload(schema: SchemaSection, payload: unknown): Uint8Array {
  switch (schema.type) {
    case 'vector':
      return packVector(schema, payload);
    case 'time_series':
      return packTimeSeries(schema, payload);
    case 'graph':
      return packGraph(schema, payload);
    case 'custom':
      return packCustom(schema, payload);
  }
}

// ============================================================================
// Unpacking
// ============================================================================

function chunkRows(values: number[], width: number): number[][] {
  const rows: number[][] = [];
  for (let i = 0; i < values.length; i += width) {
    rows.push(values.slice(i, i + width));
  }
  return rows;
}

function unpackGraph(schema: GraphSchema, bytes: Uint8Array): GraphPayload {
  if (bytes.length < GRAPH_HEADER_BYTES) {
    throw new PayloadError('graph payload shorter than its header');
  }
  const [nodeCount, edgeCount] = decodeValues('u32', bytes.subarray(0, GRAPH_HEADER_BYTES));
  if (nodeCount > schema.maxNodes || edgeCount > schema.maxEdges) {
    throw new PayloadError('graph header counts exceed schema limits');
  }

  const size = dtypeSize(schema.inputDtype);
  let offset = GRAPH_HEADER_BYTES;
  const nodeValues = nodeCount * schema.nodeFeatureDim;
  const nodeFlat = decodeValues(schema.inputDtype, bytes.subarray(offset), nodeValues);
  offset += nodeValues * size;

  const edgeFlat = decodeValues('u32', bytes.subarray(offset), edgeCount * 2);
  offset += edgeCount * 8;

  const featureValues = edgeCount * schema.edgeFeatureDim;
  const featureFlat = decodeValues(schema.inputDtype, bytes.subarray(offset), featureValues);

  const edges: Array<[number, number]> = [];
  for (let i = 0; i < edgeFlat.length; i += 2) {
    edges.push([edgeFlat[i], edgeFlat[i + 1]]);
  }
  return {
    nodeCount,
    edgeCount,
    nodes: schema.nodeFeatureDim > 0 ? chunkRows(nodeFlat, schema.nodeFeatureDim) : [],
    edges,
    edgeFeatures: schema.edgeFeatureDim > 0 ? chunkRows(featureFlat, schema.edgeFeatureDim) : [],
  };
}

/**
 * Inverse of packPayload() for a payload without envelope.
 */
export function unpackPayload(schema: SchemaSection, bytes: Uint8Array): UnpackedPayload {
  switch (schema.type) {
    case 'vector':
      return { type: 'vector', values: decodeValues(schema.inputDtype, bytes, product(schema.inputShape)) };
    case 'time_series': {
      const values = decodeValues(schema.inputDtype, bytes, schema.window * schema.features);
      return { type: 'time_series', rows: chunkRows(values, schema.features) };
    }
    case 'graph':
      return { type: 'graph', graph: unpackGraph(schema, bytes) };
    case 'custom':
      return { type: 'custom', bytes: bytes.slice() };
  }
}

// ============================================================================
// Input files
// ============================================================================

const PAYLOAD_KEYS = ['input', 'data', 'payload'] as const;

/**
 * Unwrap `{input|data|payload: ...}` from a parsed JSON document.
 */
export function loadPayloadFromJson(value: unknown): unknown {
  if (isTable(value)) {
    for (const key of PAYLOAD_KEYS) {
      if (key in value) return value[key];
    }
  }
  return value;
}

export interface PackInputOptions {
  /** Prefix an FBH1 header (default: manifest `validation.mode == "guest"`) */
  header?: boolean;
  crc?: boolean;
  /** default 'auto' */
  schemaHashMode?: string;
}

/**
 * Whether an input gets an envelope when the caller does not say.
 */
export function defaultIncludeHeader(manifest: Manifest): boolean {
  return manifest.validationMode === 'guest';
}

/**
 * Pack a payload for a manifest, optionally wrapped in an FBH1 envelope.
 */
export function packInput(manifest: Manifest, payload: unknown, options: PackInputOptions = {}): Uint8Array {
  const bytes = packPayload(manifest.schema, payload);
  const header = options.header ?? defaultIncludeHeader(manifest);
  if (!header) {
    log.verbose('Payload', `Packed ${bytes.length} bytes (${manifest.schema.type}, no header)`);
    return bytes;
  }

  const schemaHash = resolveSchemaHash(manifest, options.schemaHashMode ?? 'auto');
  const out = wrapEnvelope(bytes, {
    schemaId: SCHEMA_IDS[manifest.schema.type],
    crc: options.crc ?? false,
    schemaHash,
  });
  log.verbose('Payload', `Packed ${bytes.length} bytes (${manifest.schema.type}) + FBH1 header`);
  return out;
}
