/**
 * Guest Config Compiler
 *
 * Derives the constants a guest template is compiled against: control and
 * I/O layout, stack placement, weight location, per-template dimensions,
 * activation offsets, scales and the expected schema hash/id.
 *
 * Pure: the manifest is the only input.
 *
 * @module guest/config
 */

import {
  DEFAULT_HIDDEN_OFFSET,
  DEFAULT_STACK_GUARD,
  Q16_ONE,
  RVCD_V1_DATA_OFFSET,
  SCHEMA_IDS,
  type ScaleKey,
} from '../config/schema/index.js';
import { inferTemplate, TEMPLATE_NAMES, type TemplateName } from '../converter/template.js';
import { resolveTreeStride } from '../converter/tree.js';
import { log } from '../debug/index.js';
import { GuestConfigError } from '../errors/index.js';
import type { Manifest } from '../manifest/types.js';
import { getBool, isInt, product, type TomlTable } from '../manifest/values.js';
import { resolveSchemaHash } from '../payload/envelope.js';

export const DEFAULT_CONV_OFFSET = 0x3000;
export const DEFAULT_DOT_SHIFT = 16;

export const GUEST_TEMPLATES = [...TEMPLATE_NAMES, 'custom'] as const;
export type GuestTemplate = TemplateName | 'custom';

export function isGuestTemplate(value: unknown): value is GuestTemplate {
  return typeof value === 'string' && GUEST_TEMPLATES.some((t) => t === value);
}

// ============================================================================
// Types
// ============================================================================

export interface StackLayout {
  scratchMin: number;
  reservedTail: number;
  stackGuard: number;
  /** scratch_min - reserved_tail - stack_guard */
  stackPtr: number;
}

export interface WeightsLocation {
  /** Segment index holding the weights blob */
  seg: number;
  /** Byte offset of the blob inside the segment */
  offset: number;
  /** Header bytes to skip inside the blob */
  dataOffset: number;
}

interface DenseIo {
  inputDim: number;
  outputDim: number;
  weights: WeightsLocation;
}

export interface LinearGuest extends DenseIo {
  template: 'linear';
  wScaleQ16: number;
  hasBias: boolean;
}

export interface SoftmaxGuest extends DenseIo {
  template: 'softmax' | 'naive_bayes';
  wScaleQ16: number;
  hasBias: boolean;
  applySoftmax: boolean;
}

export interface MlpGuest extends DenseIo {
  template: 'mlp';
  hiddenDim: number;
  hiddenOffset: number;
  scalesQ16: number[];
}

export interface DeepMlpGuest extends DenseIo {
  template: 'mlp2' | 'mlp3';
  hiddenDims: number[];
  /** Activation buffer per hidden layer */
  hiddenOffsets: number[];
  scalesQ16: number[];
  hasBias: boolean;
}

interface ConvParams {
  kernelSize: number;
  stride: number;
  outChannels: number;
  convOffset: number;
  scalesQ16: number[];
  hasBias: boolean;
}

export interface Cnn1dGuest extends DenseIo, ConvParams {
  template: 'cnn1d';
  inputLen: number;
  inputChannels: number;
}

export interface TinyCnnGuest extends DenseIo, ConvParams {
  template: 'tiny_cnn';
  inputHeight: number;
  inputWidth: number;
}

export interface TwoTowerGuest {
  template: 'two_tower';
  inputDimA: number;
  inputDimB: number;
  embedDim: number;
  outputDim: number;
  weights: WeightsLocation;
  scalesQ16: number[];
  hasBias: boolean;
  dotShift: number;
  embedAOffset: number;
  embedBOffset: number;
}

export interface TreeGuest extends DenseIo {
  template: 'tree';
  treeCount: number;
  treeNodeCount: number;
  treeStride: number;
}

export interface CustomGuest {
  template: 'custom';
  inputBlobSize: number;
  outputBlobSize: number;
}

export type GuestModel =
  | LinearGuest
  | SoftmaxGuest
  | MlpGuest
  | DeepMlpGuest
  | Cnn1dGuest
  | TinyCnnGuest
  | TwoTowerGuest
  | TreeGuest
  | CustomGuest;

export interface GuestConfig {
  controlOffset: number;
  inputMax: number;
  outputMax: number;
  stack: StackLayout;
  expectedSchemaId: number;
  expectedSchemaHash: number;
  model: GuestModel;
}

export interface GuestConfigOptions {
  /** Overrides template inference from `weights.layout` */
  template?: GuestTemplate;
  /** auto | manifest | none (default auto) */
  schemaHashMode?: string;
}

// ============================================================================
// Build hints
// ============================================================================

function optInt(build: TomlTable, key: string, fallback: number): number {
  const value = build[key];
  if (value === undefined) return fallback;
  if (!isInt(value)) {
    throw new GuestConfigError(`build.${key} must be an integer when provided`);
  }
  return value;
}

function reqInt(build: TomlTable, key: string, message: string, min = Number.NEGATIVE_INFINITY): number {
  const value = build[key];
  if (!isInt(value) || value < min) {
    throw new GuestConfigError(message);
  }
  return value;
}

function scale(manifest: Manifest, key: ScaleKey): number {
  return manifest.weights?.scales[key] ?? Q16_ONE;
}

function scales(manifest: Manifest, keys: readonly ScaleKey[]): number[] {
  return keys.map((k) => scale(manifest, k));
}

const LAYER_SCALES: readonly ScaleKey[] = ['w1_scale_q16', 'w2_scale_q16', 'w3_scale_q16', 'w4_scale_q16'];

// ============================================================================
// Resolution
// ============================================================================

/**
 * Stack pointer below the reserved tail and guard band.
 */
export function resolveStack(manifest: Manifest): StackLayout {
  const { scratchMin, reservedTail } = manifest.abi;
  const stackGuard = optInt(manifest.build, 'stack_guard', DEFAULT_STACK_GUARD);
  if (scratchMin <= 0) {
    throw new GuestConfigError('abi.scratch_min must be a positive integer');
  }
  if (reservedTail < 0) {
    throw new GuestConfigError('abi.reserved_tail must be a non-negative integer');
  }
  if (stackGuard < 0) {
    throw new GuestConfigError('build.stack_guard must be a non-negative integer');
  }
  if (scratchMin <= reservedTail + stackGuard) {
    throw new GuestConfigError('scratch_min too small for stack guard and reserved_tail');
  }
  return { scratchMin, reservedTail, stackGuard, stackPtr: scratchMin - reservedTail - stackGuard };
}

/**
 * Where the guest finds its weights: first blob's segment (or the first
 * weights segment, else 1) and its data offset (12 for rvcd-v1 headers).
 */
export function resolveWeightsLocation(manifest: Manifest): WeightsLocation {
  const offset = optInt(manifest.build, 'weights_offset', 0);
  const weights = manifest.weights;
  const blob = weights?.blobs[0];
  if (!weights || !blob) {
    return { seg: 1, offset, dataOffset: 0 };
  }
  const seg = blob.segmentIndex ?? manifest.segments.find((s) => s.kind === 'weights')?.index ?? 1;
  const dataOffset = blob.dataOffset ?? (weights.headerFormat === 'rvcd-v1' ? RVCD_V1_DATA_OFFSET : 0);
  return { seg, offset, dataOffset };
}

export function resolveGuestTemplate(manifest: Manifest, override?: GuestTemplate): GuestTemplate {
  if (override) return override;
  const inferred = inferTemplate(manifest.weights?.layout);
  if (inferred) return inferred;
  if (manifest.schema.type === 'custom') return 'custom';
  throw new GuestConfigError('Unable to infer template; pass --template');
}

const VECTOR_OR_SERIES: readonly GuestTemplate[] = ['linear', 'mlp', 'mlp2', 'mlp3', 'softmax', 'naive_bayes', 'tree'];

function checkSchemaCompatible(template: GuestTemplate, schemaType: Manifest['schema']['type']): void {
  if (VECTOR_OR_SERIES.includes(template)) {
    if (schemaType !== 'vector' && schemaType !== 'time_series') {
      throw new GuestConfigError('schema type is incompatible with template');
    }
    return;
  }
  const required: Partial<Record<GuestTemplate, Manifest['schema']['type']>> = {
    cnn1d: 'time_series',
    tiny_cnn: 'vector',
    two_tower: 'vector',
    custom: 'custom',
  };
  const want = required[template];
  if (want && schemaType !== want) {
    throw new GuestConfigError(`schema type is incompatible with ${template} template`);
  }
}

function ioDims(manifest: Manifest): { inputDim: number; outputDim: number } {
  const schema = manifest.schema;
  switch (schema.type) {
    case 'vector':
      return { inputDim: product(schema.inputShape), outputDim: product(schema.outputShape) };
    case 'time_series':
      return { inputDim: schema.window * schema.features, outputDim: product(schema.outputShape) };
    case 'graph':
      return { inputDim: schema.nodeFeatureDim, outputDim: product(schema.outputShape) };
    case 'custom':
      throw new GuestConfigError('schema type is incompatible with template');
  }
}

function convParams(manifest: Manifest, template: string): ConvParams {
  const build = manifest.build;
  const stride = build.stride ?? 1;
  if (!isInt(stride) || stride < 1) {
    throw new GuestConfigError(`build.stride must be >= 1 for ${template}`);
  }
  return {
    kernelSize: reqInt(build, 'kernel_size', `build.kernel_size required for ${template}`, 1),
    outChannels: reqInt(build, 'out_channels', `build.out_channels required for ${template}`, 1),
    stride,
    convOffset: optInt(build, 'conv_offset', DEFAULT_CONV_OFFSET),
    scalesQ16: scales(manifest, LAYER_SCALES.slice(0, 2)),
    hasBias: getBool(build, 'has_bias') ?? true,
  };
}

function resolveModel(manifest: Manifest, template: GuestTemplate): GuestModel {
  const build = manifest.build;
  const hasBias = getBool(build, 'has_bias') ?? true;
  const weights = resolveWeightsLocation(manifest);

  switch (template) {
    case 'custom': {
      const schema = manifest.schema;
      if (schema.type !== 'custom') {
        throw new GuestConfigError('schema type is incompatible with custom template');
      }
      return { template, inputBlobSize: schema.inputBlobSize, outputBlobSize: schema.outputBlobSize };
    }

    case 'two_tower': {
      const { inputDim, outputDim } = ioDims(manifest);
      if (outputDim !== 1) {
        throw new GuestConfigError('two_tower template requires output_dim = 1');
      }
      const inputDimA = build.tower_input_a;
      const inputDimB = build.tower_input_b;
      if (!isInt(inputDimA) || !isInt(inputDimB)) {
        throw new GuestConfigError('build.tower_input_a and build.tower_input_b required for two_tower');
      }
      const embedDim = reqInt(build, 'embed_dim', 'build.embed_dim required for two_tower');
      if (inputDimA + inputDimB !== inputDim) {
        throw new GuestConfigError('tower_input_a + tower_input_b must equal schema input_dim');
      }
      const embedAOffset = optInt(build, 'embed_offset', DEFAULT_HIDDEN_OFFSET);
      return {
        template,
        inputDimA,
        inputDimB,
        embedDim,
        outputDim: 1,
        weights,
        scalesQ16: scales(manifest, LAYER_SCALES.slice(0, 2)),
        hasBias,
        dotShift: optInt(build, 'dot_shift', DEFAULT_DOT_SHIFT),
        embedAOffset,
        embedBOffset: embedAOffset + embedDim * 4,
      };
    }
  }

  const io = { ...ioDims(manifest), weights };

  switch (template) {
    case 'linear':
      return { template, ...io, wScaleQ16: scale(manifest, 'w_scale_q16'), hasBias };

    case 'softmax':
    case 'naive_bayes':
      return {
        template,
        ...io,
        wScaleQ16: scale(manifest, 'w_scale_q16'),
        hasBias,
        applySoftmax: getBool(build, 'apply_softmax') ?? true,
      };

    case 'mlp':
      return {
        template,
        ...io,
        hiddenDim: reqInt(build, 'hidden_dim', 'build.hidden_dim is required for MLP templates'),
        hiddenOffset: optInt(build, 'hidden_offset', DEFAULT_HIDDEN_OFFSET),
        scalesQ16: scales(manifest, LAYER_SCALES.slice(0, 2)),
      };

    case 'mlp2':
    case 'mlp3': {
      const depth = template === 'mlp2' ? 2 : 3;
      const keys = Array.from({ length: depth }, (_, i) => `hidden_dim${i + 1}`);
      const missing = template === 'mlp2'
        ? 'build.hidden_dim1 and build.hidden_dim2 required for mlp2'
        : 'build.hidden_dim1/hidden_dim2/hidden_dim3 required for mlp3';
      const hiddenDims = keys.map((k) => reqInt(build, k, missing));

      // Each activation buffer defaults to just past the previous one
      const hiddenOffsets: number[] = [];
      let next = DEFAULT_HIDDEN_OFFSET;
      for (let i = 0; i < depth; i++) {
        const offset = optInt(build, `hidden_offset${i + 1}`, next);
        hiddenOffsets.push(offset);
        next = offset + hiddenDims[i] * 4;
      }
      return {
        template,
        ...io,
        hiddenDims,
        hiddenOffsets,
        scalesQ16: scales(manifest, LAYER_SCALES.slice(0, depth + 1)),
        hasBias,
      };
    }

    case 'cnn1d': {
      const schema = manifest.schema;
      if (schema.type !== 'time_series') {
        throw new GuestConfigError('schema.time_series window/features required for cnn1d');
      }
      return {
        template,
        ...io,
        ...convParams(manifest, 'cnn1d'),
        inputLen: schema.window,
        inputChannels: schema.features,
      };
    }

    case 'tiny_cnn': {
      let height = build.input_height;
      let width = build.input_width;
      const schema = manifest.schema;
      if ((height === undefined || width === undefined) && schema.type === 'vector' && schema.inputShape.length === 2) {
        [height, width] = schema.inputShape;
      }
      if (!isInt(height) || !isInt(width)) {
        throw new GuestConfigError('build.input_height/input_width required for tiny_cnn');
      }
      if (height * width !== io.inputDim) {
        throw new GuestConfigError('tiny_cnn input_height * input_width must equal schema input_dim');
      }
      return { template, ...io, ...convParams(manifest, 'tiny_cnn'), inputHeight: height, inputWidth: width };
    }

    case 'tree': {
      const treeCount = optInt(build, 'tree_count', 1);
      if (treeCount < 1) {
        throw new GuestConfigError('build.tree_count must be >= 1 for tree template');
      }
      const treeNodeCount = reqInt(build, 'tree_node_count', 'build.tree_node_count required for tree template', 1);
      const rawStride = build.tree_stride;
      if (rawStride !== undefined && !isInt(rawStride)) {
        throw new GuestConfigError('build.tree_stride must be a positive integer when provided');
      }
      const treeStride = resolveTreeStride({ treeCount, nodeCount: treeNodeCount, treeStride: rawStride });
      if (io.outputDim !== 1) {
        throw new GuestConfigError('tree template requires output_dim = 1');
      }
      return { template, ...io, treeCount, treeNodeCount, treeStride };
    }
  }
}

/**
 * Compute the guest configuration for a manifest.
 */
export function computeGuestConfig(manifest: Manifest, options: GuestConfigOptions = {}): GuestConfig {
  const template = resolveGuestTemplate(manifest, options.template);
  checkSchemaCompatible(template, manifest.schema.type);

  const stack = resolveStack(manifest);
  const expectedSchemaHash = resolveSchemaHash(manifest, options.schemaHashMode ?? 'auto');
  const model = resolveModel(manifest, template);

  log.verbose('Guest', `template=${template} stack_ptr=${stack.stackPtr} schema_hash=0x${expectedSchemaHash.toString(16)}`);

  return {
    controlOffset: manifest.abi.controlOffset,
    inputMax: manifest.abi.inputMax,
    outputMax: manifest.abi.outputMax,
    stack,
    expectedSchemaId: SCHEMA_IDS[manifest.schema.type],
    expectedSchemaHash,
    model,
  };
}
