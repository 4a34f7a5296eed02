/**
 * Payload Module - Public API
 *
 * @module payload
 */

export { float32ToFloat16, float16ToFloat32, dtypeSize, encodeValues, decodeValues } from './dtype.js';

export { crc32 } from './crc32.js';

export {
  FBH1_MAGIC,
  FBH1_VERSION,
  FBH1_HEADER_LEN,
  FBH_FLAG_HAS_CRC32,
  FBH_FLAG_HAS_SCHEMA_HASH,
  SCHEMA_HASH_MODES,
  isSchemaHashMode,
  encodeEnvelopeHeader,
  wrapEnvelope,
  hasEnvelope,
  parseEnvelope,
  resolveSchemaHash,
  type SchemaHashMode,
  type EnvelopeHeader,
  type WrapOptions,
  type ParsedEnvelope,
} from './envelope.js';

export {
  GRAPH_HEADER_BYTES,
  flattenPayload,
  normalizeEdges,
  customBytesFromJson,
  packPayload,
  unpackPayload,
  loadPayloadFromJson,
  defaultIncludeHeader,
  packInput,
  type GraphPayload,
  type UnpackedPayload,
  type PackInputOptions,
} from './codec.js';

export {
  buildControlBlock,
  parseControlBlock,
  planInputStaging,
  type ControlBlock,
  type ControlPointers,
  type StagedWrite,
} from './control.js';

export {
  OUTPUT_FORMATS,
  isOutputFormat,
  schemaOutputInfo,
  decodeOutput,
  resolveOutputFormat,
  readVmOutput,
  type OutputFormat,
  type OutputInfo,
  type VmOutput,
} from './output.js';
