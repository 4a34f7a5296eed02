/**
 * Manifest Types
 *
 * Typed, read-only views over a validated manifest document. Field names are
 * camelCase; the TOML keys they come from are snake_case.
 *
 * @module manifest/types
 */

import type { Dtype, ScaleKey, SegmentAccess, SegmentKind } from '../config/schema/index.js';
import type { TomlTable } from './values.js';

export interface ModelSection {
  id: string;
  version: string;
  abiVersion: number;
  arch: string;
  endianness: string;
  vaddrBits: number;
  profile?: string;
}

export interface AbiSection {
  entry: number;
  controlOffset: number;
  controlSize: number;
  inputOffset: number;
  inputMax: number;
  outputOffset: number;
  outputMax: number;
  scratchMin: number;
  alignment: number;
  reservedTail: number;
}

export interface VectorSchema {
  type: 'vector';
  inputDtype: Dtype;
  inputShape: number[];
  outputDtype: Dtype;
  outputShape: number[];
}

export interface TimeSeriesSchema {
  type: 'time_series';
  inputDtype: Dtype;
  window: number;
  features: number;
  stride: number;
  outputDtype: Dtype;
  outputShape: number[];
}

export interface GraphSchema {
  type: 'graph';
  inputDtype: Dtype;
  nodeFeatureDim: number;
  edgeFeatureDim: number;
  maxNodes: number;
  maxEdges: number;
  outputDtype: Dtype;
  outputShape: number[];
}

export interface CustomField {
  name?: string;
  offset?: number;
  dtype?: string;
  shape?: number[];
}

export interface CustomSchema {
  type: 'custom';
  inputBlobSize: number;
  outputBlobSize: number;
  alignment?: number;
  layoutDoc?: string;
  schemaHash32?: string;
  fields: CustomField[];
}

export type SchemaSection = VectorSchema | TimeSeriesSchema | GraphSchema | CustomSchema;

export interface WeightBlob {
  name: string;
  file: string;
  hash: string;
  sizeBytes: number;
  chunkSize?: number;
  dataOffset?: number;
  segmentIndex?: number;
}

export type WeightScales = Partial<Record<ScaleKey, number>>;

export interface WeightsSection {
  layout: string;
  quantization: string;
  dtype?: string;
  headerFormat: string;
  blobs: WeightBlob[];
  scales: WeightScales;
  hasScalesTable: boolean;
}

export interface SegmentSpec {
  index: number;
  slot?: number;
  kind: SegmentKind;
  access: SegmentAccess;
  source?: string;
  bytes?: number;
}

export interface LimitsSection {
  maxInstructions: number;
  cuBudget: number;
}

export interface Manifest {
  model: ModelSection;
  abi: AbiSection;
  schema: SchemaSection;
  weights?: WeightsSection;
  segments: SegmentSpec[];
  limits: LimitsSection;
  validationMode?: string;
  /** Free-form template hints (hidden_dim, kernel_size, tree_stride, ...) */
  build: TomlTable;
  metadata?: TomlTable;
  /** Parsed document the view was built from */
  raw: TomlTable;
}

/**
 * A manifest as loaded from disk: its path, exact text and parsed tables.
 */
export interface ManifestDocument {
  path: string;
  text: string;
  data: TomlTable;
}
