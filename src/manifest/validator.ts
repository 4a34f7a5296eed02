/**
 * Manifest Validator
 *
 * Checks a parsed manifest document against the full rule set and returns
 * every violation found. Content problems never throw; callers decide what
 * to do with the list.
 *
 * @module manifest/validator
 */

import {
  ALLOWED_ARCH,
  ALLOWED_ENDIANNESS,
  DEFAULT_SCRATCH_MIN,
  DTYPE_SIZES,
  HEADER_FORMATS,
  MAX_SEGMENT_BYTES,
  MAX_SEGMENT_INDEX,
  MIN_CONTROL_SIZE,
  MIN_RESERVED_TAIL,
  PROFILES,
  QUANTIZATION_KINDS,
  REQUIRED_VADDR_BITS,
  RVCD_V1_DATA_OFFSET,
  SCALE_KEYS,
  SCHEMA_TYPES,
  SEGMENT_ACCESS,
  SEGMENT_KINDS,
  VALIDATION_MODES,
  ABI_VERSION,
  isDtype,
  type Dtype,
} from '../config/schema/index.js';
import { ValidationError, type ValidationIssue } from '../errors/index.js';
import {
  isInt,
  isPositiveInt,
  isSemver,
  isSlug,
  isString,
  isTable,
  product,
  type TomlTable,
} from './values.js';

export interface ManifestValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
}

const TOP_LEVEL_KEYS = ['model', 'abi', 'schema', 'segments', 'weights', 'limits', 'validation', 'build', 'metadata'];
const REQUIRED_TABLES = ['model', 'abi', 'schema', 'segments', 'limits'];
const MODEL_KEYS = ['id', 'version', 'abi_version', 'arch', 'endianness', 'vaddr_bits', 'profile'];
const ABI_KEYS = [
  'entry',
  'control_offset',
  'control_size',
  'input_offset',
  'input_max',
  'output_offset',
  'output_max',
  'scratch_min',
  'alignment',
  'reserved_tail',
];
const SEGMENT_KEYS = ['index', 'slot', 'kind', 'access', 'source', 'bytes'];
const WEIGHTS_KEYS = ['layout', 'quantization', 'dtype', 'scale', 'header_format', 'blobs', 'scales'];
const BLOB_KEYS = ['name', 'file', 'hash', 'size_bytes', 'chunk_size', 'data_offset', 'segment_index'];

const SCHEMA_SUBTABLE_KEYS: Record<string, string[]> = {
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
  custom: ['input_blob_size', 'output_blob_size', 'alignment', 'layout_doc', 'schema_hash32', 'fields'],
};

const SCHEMA_HASH_RE = /^0x[0-9a-fA-F]{8}$/;

function includes(list: readonly string[], value: unknown): boolean {
  return typeof value === 'string' && list.includes(value);
}

/** Tree and GBDT layouts carry unquantized i32 nodes. */
export function isTreeLayout(layout: unknown): boolean {
  if (!isString(layout)) return false;
  const lower = layout.toLowerCase();
  return lower.includes('tree') || lower.includes('gbdt');
}

class IssueList {
  readonly items: ValidationIssue[] = [];

  add(field: string, message: string, value?: unknown): void {
    this.items.push(value === undefined ? { field, message } : { field, message, value });
  }

  unknownKeys(table: TomlTable, allowed: readonly string[], prefix: string): void {
    for (const key of Object.keys(table)) {
      if (!allowed.includes(key)) {
        this.add(prefix ? `${prefix}.${key}` : key, `Unknown ${prefix || 'top-level'} key: ${key}`);
      }
    }
  }
}

// ============================================================================
// Sections
// ============================================================================

function validateModel(model: unknown, issues: IssueList): void {
  if (model === undefined) return;
  if (!isTable(model)) {
    issues.add('model', 'model must be a table');
    return;
  }
  issues.unknownKeys(model, MODEL_KEYS, 'model');

  if (!isString(model.id) || !isSlug(model.id)) {
    issues.add('model.id', 'model.id must be a slug: [a-z0-9_-]+', model.id);
  }
  if (!isString(model.version) || !isSemver(model.version)) {
    issues.add('model.version', 'model.version must be semver (X.Y.Z)', model.version);
  }
  if (model.abi_version !== undefined && model.abi_version !== ABI_VERSION) {
    issues.add('model.abi_version', `model.abi_version must be ${ABI_VERSION}`, model.abi_version);
  }
  if (!includes(ALLOWED_ARCH, model.arch)) {
    issues.add('model.arch', "model.arch must be 'rv64imac'", model.arch);
  }
  if (!includes(ALLOWED_ENDIANNESS, model.endianness)) {
    issues.add('model.endianness', "model.endianness must be 'little'", model.endianness);
  }
  if (model.vaddr_bits !== REQUIRED_VADDR_BITS) {
    issues.add('model.vaddr_bits', 'model.vaddr_bits must be 32', model.vaddr_bits);
  }
  if (model.profile !== undefined && !includes(PROFILES, model.profile)) {
    issues.add('model.profile', "model.profile must be 'finance-int' when provided", model.profile);
  }
}

function validateAbi(abi: unknown, issues: IssueList): void {
  if (abi === undefined) return;
  if (!isTable(abi)) {
    issues.add('abi', 'abi must be a table');
    return;
  }
  issues.unknownKeys(abi, ABI_KEYS, 'abi');

  const entry = abi.entry;
  if (!isInt(entry)) {
    issues.add('abi.entry', 'abi.entry must be an integer', entry);
  } else if (entry < 0 || entry >= 0x1000_0000) {
    issues.add('abi.entry', 'abi.entry must reside in segment 0 (top 4 bits = 0)', entry);
  }

  const alignment = abi.alignment;
  const alignmentOk = alignment === 4 || alignment === 8;
  if (!alignmentOk) {
    issues.add('abi.alignment', 'abi.alignment must be 4 or 8', alignment);
  }

  for (const key of ['control_offset', 'input_offset', 'output_offset']) {
    const value = abi[key];
    if (!isInt(value)) {
      issues.add(`abi.${key}`, `abi.${key} must be an integer`, value);
    } else if (value < 0) {
      issues.add(`abi.${key}`, `abi.${key} must be >= 0`, value);
    } else if (alignmentOk && value % alignment !== 0) {
      issues.add(`abi.${key}`, `abi.${key} must be aligned to abi.alignment`, value);
    }
  }

  const controlSize = abi.control_size;
  const inputMax = abi.input_max;
  const outputMax = abi.output_max;
  const scratchMin = abi.scratch_min ?? DEFAULT_SCRATCH_MIN;
  const reservedTail = abi.reserved_tail ?? MIN_RESERVED_TAIL;

  if (!isInt(controlSize) || controlSize < MIN_CONTROL_SIZE) {
    issues.add('abi.control_size', `abi.control_size must be >= ${MIN_CONTROL_SIZE}`, controlSize);
  }
  if (!isPositiveInt(inputMax)) {
    issues.add('abi.input_max', 'abi.input_max must be a positive integer', inputMax);
  }
  if (!isPositiveInt(outputMax)) {
    issues.add('abi.output_max', 'abi.output_max must be a positive integer', outputMax);
  }
  if (!isInt(scratchMin) || scratchMin < DEFAULT_SCRATCH_MIN) {
    issues.add('abi.scratch_min', `abi.scratch_min must be >= ${DEFAULT_SCRATCH_MIN}`, scratchMin);
  }
  if (!isInt(reservedTail) || reservedTail < MIN_RESERVED_TAIL) {
    issues.add('abi.reserved_tail', `abi.reserved_tail must be >= ${MIN_RESERVED_TAIL}`, reservedTail);
  }

  if (!isInt(scratchMin) || !isInt(reservedTail)) return;
  const limit = scratchMin - reservedTail;
  const regions: Array<[string, string, unknown, unknown]> = [
    ['control_offset', 'control_size', abi.control_offset, controlSize],
    ['input_offset', 'input_max', abi.input_offset, inputMax],
    ['output_offset', 'output_max', abi.output_offset, outputMax],
  ];
  for (const [offsetKey, sizeKey, offset, size] of regions) {
    if (isInt(offset) && isInt(size) && offset + size > limit) {
      issues.add(`abi.${offsetKey}`, `${offsetKey} + ${sizeKey} exceeds scratch bounds`, offset + size);
    }
  }
}

function validateSegments(segments: unknown, issues: IssueList): void {
  if (segments === undefined) return;
  if (!Array.isArray(segments) || segments.length === 0) {
    issues.add('segments', 'segments must be a non-empty array');
    return;
  }

  const seen = new Set<number>();
  let hasScratch = false;
  let weightsSegments = 0;

  segments.forEach((seg: unknown, position: number) => {
    const field = `segments[${position}]`;
    if (!isTable(seg)) {
      issues.add(field, 'segments entries must be tables');
      return;
    }
    issues.unknownKeys(seg, SEGMENT_KEYS, 'segments');

    const { index, kind, access, source, slot, bytes } = seg;
    if (!isInt(index) || index < 0 || index > MAX_SEGMENT_INDEX) {
      issues.add(`${field}.index`, `segments.index must be 0..${MAX_SEGMENT_INDEX}`, index);
    } else if (seen.has(index)) {
      issues.add(`${field}.index`, 'segments.index values must be unique', index);
    } else {
      seen.add(index);
    }
    if (!includes(SEGMENT_KINDS, kind)) {
      issues.add(`${field}.kind`, 'segments.kind is invalid', kind);
    }
    if (!includes(SEGMENT_ACCESS, access)) {
      issues.add(`${field}.access`, 'segments.access is invalid', access);
    }
    if (slot !== undefined && (!isInt(slot) || slot < 1 || slot > MAX_SEGMENT_INDEX)) {
      issues.add(`${field}.slot`, `segments.slot must be 1..${MAX_SEGMENT_INDEX}`, slot);
    }
    if (bytes !== undefined && !isPositiveInt(bytes)) {
      issues.add(`${field}.bytes`, 'segments.bytes must be a positive integer', bytes);
    }

    if (index === 0) {
      if (kind !== 'scratch' || access !== 'rw') {
        issues.add(field, 'segment 0 must be scratch with rw access');
      }
      hasScratch = true;
    }

    switch (kind) {
      case 'weights':
        weightsSegments++;
        if (!isString(source) || !source.startsWith('weights:')) {
          issues.add(`${field}.source`, 'weights segment source must be weights:<name>', source);
        }
        if (slot !== undefined && slot !== 1) {
          issues.add(`${field}.slot`, 'weights segment must sit at slot 1', slot);
        }
        break;
      case 'input':
        if (source !== 'io:input') {
          issues.add(`${field}.source`, 'input segment source must be io:input', source);
        }
        break;
      case 'output':
        if (source !== 'io:output') {
          issues.add(`${field}.source`, 'output segment source must be io:output', source);
        }
        break;
      case 'custom':
        if (!isString(source) || !source.startsWith('custom:')) {
          issues.add(`${field}.source`, 'custom segment source must be custom:<label>', source);
        }
        break;
      default:
        break;
    }
  });

  if (!hasScratch) {
    issues.add('segments', 'segments must include index=0 scratch segment');
  }
  if (weightsSegments > 1) {
    issues.add('segments', 'at most one weights segment is allowed', weightsSegments);
  }
}

function validateWeights(weights: unknown, segments: unknown, issues: IssueList): void {
  const segmentList = Array.isArray(segments) ? segments.filter(isTable) : [];
  const hasWeightSegment = segmentList.some((seg) => seg.kind === 'weights');
  if (hasWeightSegment && !isTable(weights)) {
    issues.add('weights', 'weights table is required when weights segments exist');
  }
  if (weights === undefined) return;
  if (!isTable(weights)) {
    if (!hasWeightSegment) issues.add('weights', 'weights must be a table');
    return;
  }
  issues.unknownKeys(weights, WEIGHTS_KEYS, 'weights');

  if (!isString(weights.layout) || weights.layout.length === 0) {
    issues.add('weights.layout', 'weights.layout must be a non-empty string', weights.layout);
  }
  if (!includes(QUANTIZATION_KINDS, weights.quantization)) {
    issues.add('weights.quantization', 'weights.quantization is invalid', weights.quantization);
  }
  if (weights.dtype !== undefined && !isDtype(weights.dtype)) {
    issues.add('weights.dtype', 'weights.dtype is invalid', weights.dtype);
  }
  const headerFormat = weights.header_format ?? 'none';
  if (!includes(HEADER_FORMATS, headerFormat)) {
    issues.add('weights.header_format', 'weights.header_format is invalid', headerFormat);
  }

  const blobNames = new Set<string>();
  const blobs = weights.blobs;
  if (!Array.isArray(blobs) || blobs.length === 0) {
    issues.add('weights.blobs', 'weights.blobs must be a non-empty array');
  } else {
    blobs.forEach((blob: unknown, position: number) => {
      const field = `weights.blobs[${position}]`;
      if (!isTable(blob)) {
        issues.add(field, 'weights.blobs entries must be tables');
        return;
      }
      issues.unknownKeys(blob, BLOB_KEYS, 'weights.blobs');

      const name = blob.name;
      if (!isString(name) || name.length === 0) {
        issues.add(`${field}.name`, 'weights.blobs.name must be a string', name);
      } else if (blobNames.has(name)) {
        issues.add(`${field}.name`, 'weights.blobs.name must be unique', name);
      } else {
        blobNames.add(name);
      }
      if (!isString(blob.file)) {
        issues.add(`${field}.file`, 'weights.blobs.file must be a string', blob.file);
      }
      if (!isString(blob.hash) || !blob.hash.startsWith('sha256:')) {
        issues.add(`${field}.hash`, 'weights.blobs.hash must start with sha256:', blob.hash);
      }
      const sizeBytes = blob.size_bytes;
      if (!isPositiveInt(sizeBytes)) {
        issues.add(`${field}.size_bytes`, 'weights.blobs.size_bytes must be > 0', sizeBytes);
      }
      if (blob.chunk_size !== undefined && !isPositiveInt(blob.chunk_size)) {
        issues.add(`${field}.chunk_size`, 'weights.blobs.chunk_size must be > 0 when provided', blob.chunk_size);
      }
      const dataOffset = blob.data_offset;
      if (dataOffset !== undefined && (!isInt(dataOffset) || dataOffset < 0)) {
        issues.add(`${field}.data_offset`, 'weights.blobs.data_offset must be >= 0', dataOffset);
      }
      if (blob.segment_index !== undefined) {
        const segIndex = blob.segment_index;
        if (!isInt(segIndex) || segIndex < 0 || segIndex > MAX_SEGMENT_INDEX) {
          issues.add(`${field}.segment_index`, `weights.blobs.segment_index must be 0..${MAX_SEGMENT_INDEX}`, segIndex);
        }
      }

      const effectiveOffset = isInt(dataOffset)
        ? dataOffset
        : headerFormat === 'rvcd-v1'
          ? RVCD_V1_DATA_OFFSET
          : 0;
      if (isInt(sizeBytes) && effectiveOffset + sizeBytes > MAX_SEGMENT_BYTES) {
        issues.add(field, 'weights blob exceeds segment limit', effectiveOffset + sizeBytes);
      }
    });
  }

  const scales = weights.scales;
  if (scales !== undefined) {
    if (!isTable(scales)) {
      issues.add('weights.scales', 'weights.scales must be a table');
    } else {
      for (const [key, value] of Object.entries(scales)) {
        if (!includes(SCALE_KEYS, key)) {
          issues.add(`weights.scales.${key}`, `weights.scales.${key} is not allowed`);
        }
        if (!isPositiveInt(value)) {
          issues.add(`weights.scales.${key}`, `weights.scales.${key} must be positive integer`, value);
        }
      }
    }
  }

  if (blobNames.size === 0) return;
  for (const seg of segmentList) {
    if (seg.kind !== 'weights' || !isString(seg.source) || !seg.source.startsWith('weights:')) continue;
    const name = seg.source.slice('weights:'.length);
    if (!blobNames.has(name)) {
      issues.add('segments', `weights segment references unknown blob: ${name}`, name);
    }
  }
}

function checkDtype(table: TomlTable, prefix: string, key: string, issues: IssueList): Dtype | undefined {
  const value = table[key];
  if (!isDtype(value)) {
    issues.add(`${prefix}.${key}`, `${prefix}.${key} is invalid`, value);
    return undefined;
  }
  return value;
}

function checkShape(table: TomlTable, prefix: string, key: string, issues: IssueList): number[] | undefined {
  const value = table[key];
  if (!Array.isArray(value) || value.length === 0) {
    issues.add(`${prefix}.${key}`, `${prefix}.${key} must be a non-empty array`, value);
    return undefined;
  }
  if (!value.every(isPositiveInt)) {
    issues.add(`${prefix}.${key}`, `${prefix}.${key} must contain positive integers`, value);
    return undefined;
  }
  return value.filter(isInt);
}

function checkMinInt(table: TomlTable, prefix: string, key: string, min: number, issues: IssueList): number | undefined {
  const value = table[key];
  if (!isInt(value) || value < min) {
    issues.add(`${prefix}.${key}`, `${prefix}.${key} must be >= ${min}`, value);
    return undefined;
  }
  return value;
}

function checkBytes(
  bytes: number,
  limit: unknown,
  field: string,
  message: string,
  issues: IssueList
): void {
  if (isInt(limit) && bytes > limit) {
    issues.add(field, message, bytes);
  }
}

function checkOutput(s: TomlTable, prefix: string, abi: TomlTable | undefined, issues: IssueList): void {
  const outDtype = checkDtype(s, prefix, 'output_dtype', issues);
  const outShape = checkShape(s, prefix, 'output_shape', issues);
  if (outDtype && outShape) {
    const bytes = product(outShape) * DTYPE_SIZES[outDtype];
    checkBytes(bytes, abi?.output_max, prefix, `${prefix} output exceeds abi.output_max`, issues);
  }
}

function validateSchema(schema: unknown, abiValue: unknown, issues: IssueList): void {
  if (schema === undefined) return;
  if (!isTable(schema)) {
    issues.add('schema', 'schema must be a table');
    return;
  }
  issues.unknownKeys(schema, ['type', ...SCHEMA_TYPES], 'schema');

  const schemaType = schema.type;
  if (!includes(SCHEMA_TYPES, schemaType) || !isString(schemaType)) {
    issues.add('schema.type', 'schema.type must be one of: vector, time_series, graph, custom', schemaType);
    return;
  }
  for (const other of SCHEMA_TYPES) {
    if (other !== schemaType && schema[other] !== undefined) {
      issues.add(`schema.${other}`, `schema.${other} must not be present when type=${schemaType}`);
    }
  }
  const s = schema[schemaType];
  if (!isTable(s)) {
    issues.add(`schema.${schemaType}`, `schema.${schemaType} table is required`);
    return;
  }

  const prefix = `schema.${schemaType}`;
  issues.unknownKeys(s, SCHEMA_SUBTABLE_KEYS[schemaType] ?? [], prefix);
  const abi = isTable(abiValue) ? abiValue : undefined;

  switch (schemaType) {
    case 'vector': {
      const inDtype = checkDtype(s, prefix, 'input_dtype', issues);
      const inShape = checkShape(s, prefix, 'input_shape', issues);
      if (inDtype && inShape) {
        const bytes = product(inShape) * DTYPE_SIZES[inDtype];
        checkBytes(bytes, abi?.input_max, prefix, `${prefix} input exceeds abi.input_max`, issues);
      }
      checkOutput(s, prefix, abi, issues);
      break;
    }
    case 'time_series': {
      const window = checkMinInt(s, prefix, 'window', 1, issues);
      const features = checkMinInt(s, prefix, 'features', 1, issues);
      if (s.stride !== undefined) checkMinInt(s, prefix, 'stride', 1, issues);
      const inDtype = checkDtype(s, prefix, 'input_dtype', issues);
      if (inDtype && window !== undefined && features !== undefined) {
        const bytes = window * features * DTYPE_SIZES[inDtype];
        checkBytes(bytes, abi?.input_max, prefix, `${prefix} input exceeds abi.input_max`, issues);
      }
      checkOutput(s, prefix, abi, issues);
      break;
    }
    case 'graph': {
      const maxNodes = checkMinInt(s, prefix, 'max_nodes', 1, issues);
      const maxEdges = checkMinInt(s, prefix, 'max_edges', 0, issues);
      const nodeDim = checkMinInt(s, prefix, 'node_feature_dim', 1, issues);
      const edgeDim = checkMinInt(s, prefix, 'edge_feature_dim', 0, issues);
      const inDtype = checkDtype(s, prefix, 'input_dtype', issues);
      if (
        inDtype &&
        maxNodes !== undefined &&
        maxEdges !== undefined &&
        nodeDim !== undefined &&
        edgeDim !== undefined
      ) {
        const bytes = graphInputBytes(maxNodes, maxEdges, nodeDim, edgeDim, DTYPE_SIZES[inDtype]);
        checkBytes(bytes, abi?.input_max, prefix, `${prefix} input exceeds abi.input_max`, issues);
      }
      checkOutput(s, prefix, abi, issues);
      break;
    }
    case 'custom': {
      const inBlob = checkMinInt(s, prefix, 'input_blob_size', 1, issues);
      const outBlob = checkMinInt(s, prefix, 'output_blob_size', 1, issues);
      if (inBlob !== undefined) {
        checkBytes(inBlob, abi?.input_max, prefix, `${prefix} input_blob_size exceeds abi.input_max`, issues);
      }
      if (outBlob !== undefined) {
        checkBytes(outBlob, abi?.output_max, prefix, `${prefix} output_blob_size exceeds abi.output_max`, issues);
      }
      if (s.alignment !== undefined && s.alignment !== 4 && s.alignment !== 8) {
        issues.add(`${prefix}.alignment`, `${prefix}.alignment must be 4 or 8`, s.alignment);
      }
      const hash = s.schema_hash32;
      if (hash !== undefined) {
        if (!isString(hash)) {
          issues.add(`${prefix}.schema_hash32`, `${prefix}.schema_hash32 must be a hex string`, hash);
        } else if (!SCHEMA_HASH_RE.test(hash)) {
          issues.add(`${prefix}.schema_hash32`, `${prefix}.schema_hash32 must be 32-bit hex (0xXXXXXXXX)`, hash);
        }
      }
      if (s.fields !== undefined && (!Array.isArray(s.fields) || !s.fields.every(isTable))) {
        issues.add(`${prefix}.fields`, `${prefix}.fields must be an array of tables`);
      }
      break;
    }
    default:
      break;
  }
}

/**
 * Byte size of a full-capacity graph payload: 16-byte header, node features,
 * u32 edge index pairs, edge features.
 */
export function graphInputBytes(
  maxNodes: number,
  maxEdges: number,
  nodeDim: number,
  edgeDim: number,
  dtypeSize: number
): number {
  return 16 + maxNodes * nodeDim * dtypeSize + maxEdges * 2 * 4 + maxEdges * edgeDim * dtypeSize;
}

function validateProfile(manifest: TomlTable, issues: IssueList): void {
  const model = manifest.model;
  if (!isTable(model) || model.profile !== 'finance-int') return;

  const schema = manifest.schema;
  if (isTable(schema) && isString(schema.type) && ['vector', 'time_series', 'graph'].includes(schema.type)) {
    const s = schema[schema.type];
    const section = isTable(s) ? s : {};
    if (section.input_dtype !== 'i32') {
      issues.add('model.profile', 'finance-int requires input_dtype=i32', section.input_dtype);
    }
    if (section.output_dtype !== 'i32') {
      issues.add('model.profile', 'finance-int requires output_dtype=i32', section.output_dtype);
    }
  }

  const weights = manifest.weights;
  if (!isTable(weights)) return;
  if (isTreeLayout(weights.layout)) {
    if (weights.quantization !== 'custom') {
      issues.add('weights.quantization', 'finance-int tree requires weights.quantization custom', weights.quantization);
    }
    if (weights.dtype !== 'i32') {
      issues.add('weights.dtype', 'finance-int tree requires weights.dtype i32', weights.dtype);
    }
  } else {
    if (weights.quantization !== 'q8' && weights.quantization !== 'q4') {
      issues.add('weights.quantization', 'finance-int requires weights.quantization q8 or q4', weights.quantization);
    }
    if (weights.dtype !== 'i8') {
      issues.add('weights.dtype', 'finance-int requires weights.dtype i8', weights.dtype);
    }
    if (!isTable(weights.scales)) {
      issues.add('weights.scales', 'finance-int requires weights.scales with Q16 values');
    }
  }
}

function validateValidationTable(validation: unknown, issues: IssueList): void {
  if (validation === undefined) return;
  if (!isTable(validation)) {
    issues.add('validation', 'validation must be a table');
    return;
  }
  issues.unknownKeys(validation, ['mode'], 'validation');
  if (!includes(VALIDATION_MODES, validation.mode)) {
    issues.add('validation.mode', 'validation.mode must be minimal or guest', validation.mode);
  }
}

function validateLimits(limits: unknown, issues: IssueList): void {
  if (limits === undefined) return;
  if (!isTable(limits)) {
    issues.add('limits', 'limits must be a table');
    return;
  }
  issues.unknownKeys(limits, ['max_instructions', 'cu_budget'], 'limits');
  if (!isPositiveInt(limits.max_instructions)) {
    issues.add('limits.max_instructions', 'limits.max_instructions must be a positive integer', limits.max_instructions);
  }
  if (!isPositiveInt(limits.cu_budget)) {
    issues.add('limits.cu_budget', 'limits.cu_budget must be a positive integer', limits.cu_budget);
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Validate a parsed manifest and collect every violation.
 */
export function validateManifest(manifest: unknown): ManifestValidationResult {
  const issues = new IssueList();

  if (!isTable(manifest)) {
    issues.add('root', 'Manifest must be a table');
    return { valid: false, errors: issues.items };
  }

  for (const key of REQUIRED_TABLES) {
    if (manifest[key] === undefined) {
      issues.add(key, `Missing required table: [${key}]`);
    }
  }
  issues.unknownKeys(manifest, TOP_LEVEL_KEYS, '');

  validateModel(manifest.model, issues);
  validateAbi(manifest.abi, issues);
  validateSegments(manifest.segments, issues);
  validateWeights(manifest.weights, manifest.segments, issues);
  validateSchema(manifest.schema, manifest.abi, issues);
  validateProfile(manifest, issues);
  validateValidationTable(manifest.validation, issues);
  validateLimits(manifest.limits, issues);

  if (manifest.build !== undefined && !isTable(manifest.build)) {
    issues.add('build', 'build must be a table');
  }
  if (manifest.metadata !== undefined && !isTable(manifest.metadata)) {
    issues.add('metadata', 'metadata must be a table');
  }

  return { valid: issues.items.length === 0, errors: issues.items };
}

export function formatIssues(issues: readonly ValidationIssue[]): string[] {
  return issues.map((issue) => `${issue.field}: ${issue.message}`);
}

/**
 * Throw a ValidationError carrying every issue if the manifest is invalid.
 */
export function assertValidManifest(manifest: unknown): void {
  const result = validateManifest(manifest);
  if (!result.valid) {
    throw new ValidationError(result.errors);
  }
}
