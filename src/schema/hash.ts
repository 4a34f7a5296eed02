/**
 * Schema Canonicalization and Hashing
 *
 * The schema hash is FNV-1a/32 over compact, key-sorted JSON of the active
 * schema type's meaningful fields. Guests compare it against the value
 * carried in the payload header.
 *
 * @module schema/hash
 */

import { SCHEMA_IDS, type SchemaType } from '../config/schema/index.js';
import { ConversionError } from '../errors/index.js';
import { isTable, type TomlTable } from '../manifest/values.js';

export type CanonicalValue =
  | null
  | boolean
  | number
  | string
  | CanonicalValue[]
  | { [key: string]: CanonicalValue };

// ============================================================================
// FNV-1a
// ============================================================================

export function fnv1a32(data: Uint8Array): number {
  let hash = 0x811c9dc5; // FNV offset basis

  for (let i = 0; i < data.length; i++) {
    hash ^= data[i];
    hash = Math.imul(hash, 0x01000193); // FNV prime
  }

  return hash >>> 0;
}

// ============================================================================
// Canonical JSON
// ============================================================================

function escapeString(value: string): string {
  // Non-printable and non-ASCII code units become \uXXXX
  return JSON.stringify(value).replace(
    /[\u007f-\uffff]/g,
    (ch) => `\\u${ch.charCodeAt(0).toString(16).padStart(4, '0')}`
  );
}

/**
 * Serialize with sorted keys and no whitespace.
 */
export function canonicalJson(value: CanonicalValue): string {
  if (value === null) return 'null';
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new ConversionError(`Cannot serialize non-finite number ${value}`);
    }
    return String(value);
  }
  if (typeof value === 'string') return escapeString(value);
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  const keys = Object.keys(value).sort();
  return `{${keys.map((k) => `${escapeString(k)}:${canonicalJson(value[k])}`).join(',')}}`;
}

function toCanonical(value: unknown): CanonicalValue {
  if (value === undefined || value === null) return null;
  if (typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(toCanonical);
  }
  if (isTable(value)) {
    const out: { [key: string]: CanonicalValue } = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = toCanonical(v);
    }
    return out;
  }
  return String(value);
}

// ============================================================================
// Projection
// ============================================================================

const PROJECTED_KEYS: Record<SchemaType, string[]> = {
  vector: ['input_dtype', 'input_shape', 'output_dtype', 'output_shape'],
  time_series: ['input_dtype', 'window', 'features', 'stride', 'output_dtype', 'output_shape'],
  graph: [
    'input_dtype',
    'node_feature_dim',
    'edge_feature_dim',
    'max_nodes',
    'max_edges',
    'output_dtype',
    'output_shape',
  ],
  custom: ['input_blob_size', 'output_blob_size', 'alignment'],
};

function isSchemaType(value: unknown): value is SchemaType {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(SCHEMA_IDS, value);
}

function sortKeyOffset(field: { [key: string]: CanonicalValue }): number {
  const offset = field.offset;
  return typeof offset === 'number' ? offset : 0;
}

function sortKeyName(field: { [key: string]: CanonicalValue }): string {
  const name = field.name;
  return typeof name === 'string' ? name : '';
}

/**
 * Project the schema table of a parsed manifest onto its hashed fields.
 * Missing fields project to null; time_series stride defaults to 1.
 */
export function canonicalSchema(manifest: TomlTable): { [key: string]: CanonicalValue } {
  const schema = manifest.schema;
  if (!isTable(schema)) {
    throw new ConversionError('schema table missing');
  }
  const schemaType = schema.type;
  if (!isSchemaType(schemaType)) {
    throw new ConversionError('schema.type must be vector, time_series, graph, or custom');
  }

  const section = schema[schemaType];
  const s: TomlTable = isTable(section) ? section : {};
  const out: { [key: string]: CanonicalValue } = { type: schemaType };

  for (const key of PROJECTED_KEYS[schemaType]) {
    out[key] = toCanonical(s[key]);
  }
  if (schemaType === 'time_series' && s.stride === undefined) {
    out.stride = 1;
  }

  if (schemaType === 'custom' && Array.isArray(s.fields)) {
    const fields = s.fields.filter(isTable).map((f) => ({
      name: toCanonical(f.name),
      offset: toCanonical(f.offset),
      dtype: toCanonical(f.dtype),
      shape: toCanonical(f.shape),
    }));
    fields.sort((a, b) => {
      const byOffset = sortKeyOffset(a) - sortKeyOffset(b);
      if (byOffset !== 0) return byOffset;
      const an = sortKeyName(a);
      const bn = sortKeyName(b);
      return an < bn ? -1 : an > bn ? 1 : 0;
    });
    out.fields = fields;
  }

  return out;
}

/**
 * 32-bit schema fingerprint of a parsed manifest.
 */
export function schemaHash32(manifest: TomlTable): number {
  const json = canonicalJson(canonicalSchema(manifest));
  return fnv1a32(new TextEncoder().encode(json));
}

export function formatHash32(value: number): string {
  return `0x${(value >>> 0).toString(16).toUpperCase().padStart(8, '0')}`;
}

export function parseHash32(value: unknown): number {
  if (typeof value !== 'string') {
    throw new ConversionError('schema hash must be a string');
  }
  if (!/^0x[0-9a-fA-F]{8}$/.test(value)) {
    throw new ConversionError('schema hash must be 32-bit hex (0xXXXXXXXX)');
  }
  return Number.parseInt(value.slice(2), 16);
}

export function schemaId(schemaType: SchemaType): number {
  return SCHEMA_IDS[schemaType];
}
