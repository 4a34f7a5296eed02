/**
 * Per-Template Weight Layouts
 *
 * Every dense template is described as an ordered list of layers. A layer is
 * an int8 weight tensor followed, when the layer carries a bias, by a Q16 i32
 * bias vector. The same plan drives encoding, decoding and size prediction so
 * the three cannot drift apart.
 *
 * Byte layout per layer: `weights (i8 x count) | bias (i32 LE x biasLength)`.
 * Layers are concatenated with no padding.
 *
 * @module converter/layouts
 */

import type { ScaleKey } from '../config/schema/index.js';
import { ConversionError } from '../errors/index.js';
import { log } from '../debug/index.js';
import type { TemplateName } from './template.js';
import { flattenConv1d, flattenConv2d, flattenMatrix, flattenVector } from './tensors.js';
import { quantizeI8, toQ16Array } from './quantizer.js';
import { decodeTrees, encodeTrees, readTrees, resolveTreeStride, type TreeNode } from './tree.js';

// ============================================================================
// Dimensions
// ============================================================================

interface DenseDims {
  inputDim: number;
  outputDim: number;
}

export interface LinearDims extends DenseDims {
  template: 'linear' | 'softmax' | 'naive_bayes';
}

export interface MlpDims extends DenseDims {
  template: 'mlp' | 'mlp2' | 'mlp3';
  /** One entry per hidden layer: 1 for mlp, 2 for mlp2, 3 for mlp3 */
  hiddenDims: number[];
}

export interface Cnn1dDims extends DenseDims {
  template: 'cnn1d';
  window: number;
  inChannels: number;
  kernelSize: number;
  outChannels: number;
  stride: number;
}

export interface TinyCnnDims extends DenseDims {
  template: 'tiny_cnn';
  inputHeight: number;
  inputWidth: number;
  kernelSize: number;
  outChannels: number;
  stride: number;
}

export interface TwoTowerDims extends DenseDims {
  template: 'two_tower';
  inputA: number;
  inputB: number;
  embedDim: number;
}

export interface TreeTemplateDims extends DenseDims {
  template: 'tree';
  treeCount: number;
  nodeCount: number;
  treeStride: number;
}

export type TemplateDims = LinearDims | MlpDims | Cnn1dDims | TinyCnnDims | TwoTowerDims | TreeTemplateDims;

// ============================================================================
// Layer plan
// ============================================================================

export type TensorShape =
  | { kind: 'matrix'; rows: number; cols: number }
  | { kind: 'conv1d'; outChannels: number; inChannels: number; kernel: number }
  | { kind: 'conv2d'; outChannels: number; kernel: number };

export interface LayerSpec {
  weightKey: string;
  biasKey: string;
  scaleKey: ScaleKey;
  shape: TensorShape;
  /** 0 when the layer has no bias section */
  biasLength: number;
  /** Single-row weight that may be given as a plain vector */
  vectorRow?: boolean;
}

export function tensorSize(shape: TensorShape): number {
  switch (shape.kind) {
    case 'matrix':
      return shape.rows * shape.cols;
    case 'conv1d':
      return shape.outChannels * shape.inChannels * shape.kernel;
    case 'conv2d':
      return shape.outChannels * shape.kernel * shape.kernel;
  }
}

function matrix(rows: number, cols: number): TensorShape {
  return { kind: 'matrix', rows, cols };
}

const LAYER_SCALE_KEYS: readonly ScaleKey[] = ['w1_scale_q16', 'w2_scale_q16', 'w3_scale_q16', 'w4_scale_q16'];

/** Numbered layer `w<index>` / `b<index>`, index from 1 */
function layer(index: number, shape: TensorShape, biasLength: number): LayerSpec {
  return {
    weightKey: `w${index}`,
    biasKey: `b${index}`,
    scaleKey: LAYER_SCALE_KEYS[index - 1],
    shape,
    biasLength,
  };
}

/**
 * Layers for a dense template. The single-hidden-layer mlp always carries
 * biases; the other templates carry them only when `bias` is set.
 */
export function layerPlan(dims: Exclude<TemplateDims, TreeTemplateDims>, bias: boolean): LayerSpec[] {
  const b = (n: number): number => (bias ? n : 0);

  switch (dims.template) {
    case 'linear':
    case 'softmax':
    case 'naive_bayes':
      return [
        {
          weightKey: 'w',
          biasKey: 'b',
          scaleKey: 'w_scale_q16',
          shape: matrix(dims.outputDim, dims.inputDim),
          biasLength: b(dims.outputDim),
          vectorRow: dims.outputDim === 1,
        },
      ];
    case 'mlp':
    case 'mlp2':
    case 'mlp3': {
      const sizes = [dims.inputDim, ...dims.hiddenDims, dims.outputDim];
      const withBias = dims.template === 'mlp' ? true : bias;
      return sizes.slice(1).map((rows, i) => layer(i + 1, matrix(rows, sizes[i]), withBias ? rows : 0));
    }
    case 'cnn1d':
      return [
        layer(
          1,
          { kind: 'conv1d', outChannels: dims.outChannels, inChannels: dims.inChannels, kernel: dims.kernelSize },
          b(dims.outChannels)
        ),
        layer(2, matrix(dims.outputDim, dims.outChannels), b(dims.outputDim)),
      ];
    case 'tiny_cnn':
      return [
        layer(1, { kind: 'conv2d', outChannels: dims.outChannels, kernel: dims.kernelSize }, b(dims.outChannels)),
        layer(2, matrix(dims.outputDim, dims.outChannels), b(dims.outputDim)),
      ];
    case 'two_tower':
      return [
        layer(1, matrix(dims.embedDim, dims.inputA), b(dims.embedDim)),
        layer(2, matrix(dims.embedDim, dims.inputB), b(dims.embedDim)),
      ];
  }
}

/**
 * Exact byte size a converted weights file has for these dimensions.
 */
export function expectedWeightBytes(dims: TemplateDims, bias: boolean): number {
  if (dims.template === 'tree') {
    return resolveTreeStride(dims) * dims.treeCount;
  }
  return layerPlan(dims, bias).reduce((sum, l) => sum + tensorSize(l.shape) + l.biasLength * 4, 0);
}

// ============================================================================
// Encode
// ============================================================================

export type WeightInput = Record<string, unknown>;

export interface EncodedTensor {
  name: string;
  shape: number[];
  dtype: 'i8' | 'i32';
  /** Byte offset inside the weights buffer */
  offset: number;
  sizeBytes: number;
}

export interface EncodeResult {
  buffer: Uint8Array;
  scales: Partial<Record<ScaleKey, number>>;
  tensors: EncodedTensor[];
}

function shapeDims(shape: TensorShape): number[] {
  switch (shape.kind) {
    case 'matrix':
      return [shape.rows, shape.cols];
    case 'conv1d':
      return [shape.outChannels, shape.inChannels, shape.kernel];
    case 'conv2d':
      return [shape.outChannels, shape.kernel, shape.kernel];
  }
}

function flattenWeight(spec: LayerSpec, data: unknown): number[] {
  const { shape, weightKey } = spec;
  switch (shape.kind) {
    case 'matrix':
      if (spec.vectorRow) {
        if (Array.isArray(data) && data.length > 0 && Array.isArray(data[0])) {
          if (data.length !== 1) {
            throw new ConversionError(`${weightKey} row count mismatch: ${data.length} != 1`);
          }
          return flattenVector(data[0], shape.cols, weightKey);
        }
        return flattenVector(data, shape.cols, weightKey);
      }
      return flattenMatrix(data, shape.rows, shape.cols, weightKey);
    case 'conv1d':
      return flattenConv1d(data, shape.outChannels, shape.inChannels, shape.kernel, weightKey);
    case 'conv2d':
      return flattenConv2d(data, shape.outChannels, shape.kernel, weightKey);
  }
}

/**
 * Quantize and pack the layers of `plan` from conversion input. Scales given
 * in `fixedScales` are used verbatim; the rest are derived from the data.
 * Missing biases are written as zeros.
 */
export function encodeLayers(
  plan: LayerSpec[],
  input: WeightInput,
  fixedScales: Partial<Record<ScaleKey, number>> = {}
): EncodeResult {
  for (const spec of plan) {
    if (!(spec.weightKey in input)) {
      throw new ConversionError(`Missing '${spec.weightKey}' in input data`);
    }
  }

  const parts: Uint8Array[] = [];
  const scales: Partial<Record<ScaleKey, number>> = {};
  const tensors: EncodedTensor[] = [];
  let offset = 0;

  for (const spec of plan) {
    const flat = flattenWeight(spec, input[spec.weightKey]);
    const { values, scaleQ16 } = quantizeI8(flat, fixedScales[spec.scaleKey]);
    scales[spec.scaleKey] = scaleQ16;
    parts.push(new Uint8Array(values.buffer, values.byteOffset, values.byteLength));
    tensors.push({ name: spec.weightKey, shape: shapeDims(spec.shape), dtype: 'i8', offset, sizeBytes: values.length });
    offset += values.length;

    if (spec.biasLength > 0) {
      const raw = input[spec.biasKey];
      const real = raw === undefined ? new Array<number>(spec.biasLength).fill(0) : flattenVector(raw, spec.biasLength, spec.biasKey);
      const q = toQ16Array(real, spec.biasKey);
      const bytes = new Uint8Array(q.length * 4);
      const view = new DataView(bytes.buffer);
      q.forEach((v, i) => view.setInt32(i * 4, v, true));
      parts.push(bytes);
      tensors.push({ name: spec.biasKey, shape: [spec.biasLength], dtype: 'i32', offset, sizeBytes: bytes.length });
      offset += bytes.length;
    }
    log.debug('Layouts', `${spec.weightKey}: ${flat.length} weights, scale_q16=${scaleQ16}`);
  }

  const buffer = new Uint8Array(offset);
  let pos = 0;
  for (const part of parts) {
    buffer.set(part, pos);
    pos += part.length;
  }
  return { buffer, scales, tensors };
}

/**
 * Encode conversion input for any template.
 */
export function encodeWeights(
  dims: TemplateDims,
  input: WeightInput,
  options: { bias?: boolean; scales?: Partial<Record<ScaleKey, number>> } = {}
): EncodeResult {
  if (dims.template === 'tree') {
    const buffer = encodeTrees(readTrees(input), dims);
    return {
      buffer,
      scales: {},
      tensors: [{ name: 'trees', shape: [dims.treeCount, dims.nodeCount, 5], dtype: 'i32', offset: 0, sizeBytes: buffer.length }],
    };
  }
  return encodeLayers(layerPlan(dims, options.bias ?? true), input, options.scales);
}

// ============================================================================
// Decode
// ============================================================================

export interface DecodedLayer {
  weightKey: string;
  shape: number[];
  weights: Int8Array;
  scaleKey: ScaleKey;
  biasKey?: string;
  /** Q16 bias values */
  bias?: Int32Array;
}

export type DecodedWeights =
  | { template: Exclude<TemplateName, 'tree'>; layers: DecodedLayer[] }
  | { template: 'tree'; trees: TreeNode[][] };

/**
 * Split a converted weights buffer back into its tensors. The buffer must be
 * exactly the size the dimensions predict.
 */
export function decodeWeights(dims: TemplateDims, buffer: Uint8Array, bias = true): DecodedWeights {
  if (dims.template === 'tree') {
    return { template: 'tree', trees: decodeTrees(buffer, dims) };
  }

  const expected = expectedWeightBytes(dims, bias);
  if (buffer.length !== expected) {
    throw new ConversionError(`weights buffer length mismatch: ${buffer.length} != ${expected}`);
  }

  const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  const layers: DecodedLayer[] = [];
  let pos = 0;
  for (const spec of layerPlan(dims, bias)) {
    const count = tensorSize(spec.shape);
    const weights = new Int8Array(count);
    for (let i = 0; i < count; i++) {
      weights[i] = view.getInt8(pos + i);
    }
    pos += count;

    const decoded: DecodedLayer = { weightKey: spec.weightKey, shape: shapeDims(spec.shape), weights, scaleKey: spec.scaleKey };
    if (spec.biasLength > 0) {
      const values = new Int32Array(spec.biasLength);
      for (let i = 0; i < spec.biasLength; i++) {
        values[i] = view.getInt32(pos + i * 4, true);
      }
      pos += spec.biasLength * 4;
      decoded.biasKey = spec.biasKey;
      decoded.bias = values;
    }
    layers.push(decoded);
  }
  return { template: dims.template, layers };
}
