import { describe, expect, it } from 'vitest';

import {
  decodeWeights,
  encodeWeights,
  expectedWeightBytes,
  layerPlan,
  type TemplateDims,
} from '../../src/converter/layouts.js';
import { flattenConv1d, flattenConv2d, flattenMatrix, matrixShape } from '../../src/converter/tensors.js';
import { inferTemplate } from '../../src/converter/template.js';

function i32At(buffer: Uint8Array, offset: number): number {
  return new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength).getInt32(offset, true);
}

describe('inferTemplate', () => {
  it('maps layout strings to templates', () => {
    expect(inferTemplate('linear_i8')).toBe('linear');
    expect(inferTemplate('mlp_i8')).toBe('mlp');
    expect(inferTemplate('mlp2_relu')).toBe('mlp2');
    expect(inferTemplate('mlp3')).toBe('mlp3');
    expect(inferTemplate('Conv1D_head')).toBe('cnn1d');
    expect(inferTemplate('cnn2d')).toBe('tiny_cnn');
    expect(inferTemplate('logreg')).toBe('softmax');
    expect(inferTemplate('naive-bayes')).toBe('naive_bayes');
    expect(inferTemplate('two-tower')).toBe('two_tower');
    expect(inferTemplate('gbdt')).toBe('tree');
  });

  it('returns null when nothing matches', () => {
    expect(inferTemplate('custom_blob')).toBeNull();
    expect(inferTemplate(undefined)).toBeNull();
    expect(inferTemplate('')).toBeNull();
  });
});

describe('tensor flattening', () => {
  it('accepts nested and flat matrices', () => {
    expect(flattenMatrix([[1, 2], [3, 4]], 2, 2, 'w1')).toEqual([1, 2, 3, 4]);
    expect(flattenMatrix([1, 2, 3, 4], 2, 2, 'w1')).toEqual([1, 2, 3, 4]);
  });

  it('reports row and length mismatches', () => {
    expect(() => flattenMatrix([[1, 2]], 2, 2, 'w1')).toThrow('w1 row count mismatch: 1 != 2');
    expect(() => flattenMatrix([[1, 2], [3]], 2, 2, 'w1')).toThrow('w1 column count mismatch');
    expect(() => flattenMatrix([1, 2, 3], 2, 2, 'w2')).toThrow('w2 length mismatch: 3 != 4');
  });

  it('flattens conv1d kernels channel by channel', () => {
    const nested = [
      [[1, 2], [3, 4]],
      [[5, 6], [7, 8]],
    ];
    expect(flattenConv1d(nested, 2, 2, 2, 'w1')).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
    expect(flattenConv1d([[1, 2, 3, 4], [5, 6, 7, 8]], 2, 2, 2, 'w1')).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
    expect(() => flattenConv1d([[[1, 2]]], 2, 2, 2, 'w1')).toThrow('w1 outer dimension mismatch');
    expect(() => flattenConv1d([[[1, 2]], [[3, 4]]], 2, 2, 2, 'w1')).toThrow('w1 in_channel count mismatch');
  });

  it('unwraps a single input channel in conv2d kernels', () => {
    expect(flattenConv2d([[[[1, 2], [3, 4]]]], 1, 2, 'w1')).toEqual([1, 2, 3, 4]);
    expect(flattenConv2d([[[1, 2], [3, 4]]], 1, 2, 'w1')).toEqual([1, 2, 3, 4]);
    expect(() => flattenConv2d([[[1, 2, 3], [4, 5, 6]]], 1, 2, 'w1')).toThrow('w1 kernel cols mismatch');
  });

  it('reads matrix shapes', () => {
    expect(matrixShape([[1, 2, 3], [4, 5, 6]])).toEqual([2, 3]);
    expect(matrixShape([1, 2])).toBeNull();
    expect(matrixShape([[1], [2, 3]])).toBeNull();
  });
});

describe('linear layout', () => {
  const dims: TemplateDims = { template: 'linear', inputDim: 4, outputDim: 1 };

  it('packs int8 weights followed by a Q16 bias', () => {
    const result = encodeWeights(dims, { w: [127, 0, -127, 63.5], b: [0.5] });
    expect(result.scales).toEqual({ w_scale_q16: 65536 });
    expect(Array.from(result.buffer)).toEqual([127, 0, 129, 64, 0x00, 0x80, 0x00, 0x00]);
    expect(result.tensors.map((t) => [t.name, t.offset, t.sizeBytes])).toEqual([
      ['w', 0, 4],
      ['b', 4, 4],
    ]);
  });

  it('accepts a single nested row when output_dim is 1', () => {
    const result = encodeWeights(dims, { w: [[127, 0, -127, 63.5]] });
    expect(Array.from(result.buffer.subarray(0, 4))).toEqual([127, 0, 129, 64]);
    expect(i32At(result.buffer, 4)).toBe(0);
  });

  it('rejects more than one row when output_dim is 1', () => {
    expect(() => encodeWeights(dims, { w: [[1, 2, 3, 4], [5, 6, 7, 8]] })).toThrow('w row count mismatch: 2 != 1');
  });

  it('omits the bias block when bias is disabled', () => {
    const result = encodeWeights(dims, { w: [1, 2, 3, 4], b: [9] }, { bias: false });
    expect(result.buffer.length).toBe(4);
  });

  it('uses a supplied scale verbatim', () => {
    const result = encodeWeights(dims, { w: [1, 2, 3, 4] }, { scales: { w_scale_q16: 65536 } });
    expect(result.scales.w_scale_q16).toBe(65536);
    expect(Array.from(result.buffer.subarray(0, 4))).toEqual([1, 2, 3, 4]);
  });

  it('reports a missing weight key', () => {
    expect(() => encodeWeights(dims, { b: [1] })).toThrow("Missing 'w' in input data");
  });

  it('decodes back to the stored integers', () => {
    const { buffer } = encodeWeights(dims, { w: [127, 0, -127, 63.5], b: [0.5] });
    const decoded = decodeWeights(dims, buffer);
    if (decoded.template === 'tree') throw new Error('unexpected tree');
    expect(Array.from(decoded.layers[0].weights)).toEqual([127, 0, -127, 64]);
    expect(Array.from(decoded.layers[0].bias ?? [])).toEqual([32768]);
  });

  it('rejects a buffer of the wrong size', () => {
    expect(() => decodeWeights(dims, new Uint8Array(7))).toThrow('weights buffer length mismatch: 7 != 8');
  });
});

describe('mlp layouts', () => {
  it('always writes biases for the single hidden layer mlp', () => {
    const dims: TemplateDims = { template: 'mlp', inputDim: 2, outputDim: 1, hiddenDims: [2] };
    const result = encodeWeights(dims, { w1: [[1, 0], [0, 1]], w2: [[1, 1]] }, { bias: false });
    // w1 (4) + b1 (2 x i32) + w2 (2) + b2 (1 x i32)
    expect(result.buffer.length).toBe(18);
    expect(expectedWeightBytes(dims, false)).toBe(18);
    expect(result.scales).toEqual({ w1_scale_q16: 516, w2_scale_q16: 516 });
    expect(Array.from(result.buffer.subarray(0, 4))).toEqual([127, 0, 0, 127]);
    expect(Array.from(result.buffer.subarray(12, 14))).toEqual([127, 127]);
  });

  it('sizes mlp2 with and without biases', () => {
    const dims: TemplateDims = { template: 'mlp2', inputDim: 2, outputDim: 1, hiddenDims: [3, 2] };
    expect(expectedWeightBytes(dims, false)).toBe(6 + 6 + 2);
    expect(expectedWeightBytes(dims, true)).toBe(6 + 6 + 2 + (3 + 2 + 1) * 4);
    expect(layerPlan(dims, true).map((l) => l.scaleKey)).toEqual(['w1_scale_q16', 'w2_scale_q16', 'w3_scale_q16']);
  });

  it('orders mlp3 layers w1..w4', () => {
    const dims: TemplateDims = { template: 'mlp3', inputDim: 4, outputDim: 2, hiddenDims: [8, 6, 4] };
    expect(layerPlan(dims, false).map((l) => [l.weightKey, l.shape])).toEqual([
      ['w1', { kind: 'matrix', rows: 8, cols: 4 }],
      ['w2', { kind: 'matrix', rows: 6, cols: 8 }],
      ['w3', { kind: 'matrix', rows: 4, cols: 6 }],
      ['w4', { kind: 'matrix', rows: 2, cols: 4 }],
    ]);
  });
});

describe('convolution and tower layouts', () => {
  it('sizes cnn1d as conv kernel, bias, head, bias', () => {
    const dims: TemplateDims = {
      template: 'cnn1d',
      inputDim: 12,
      outputDim: 1,
      window: 4,
      inChannels: 3,
      kernelSize: 2,
      outChannels: 2,
      stride: 1,
    };
    expect(expectedWeightBytes(dims, true)).toBe(12 + 8 + 2 + 4);
  });

  it('encodes tiny_cnn from a [out][1][k][k] kernel', () => {
    const dims: TemplateDims = {
      template: 'tiny_cnn',
      inputDim: 16,
      outputDim: 1,
      inputHeight: 4,
      inputWidth: 4,
      kernelSize: 2,
      outChannels: 1,
      stride: 1,
    };
    const result = encodeWeights(dims, { w1: [[[[127, 0], [0, -127]]]], w2: [[127]] }, { bias: false });
    expect(Array.from(result.buffer)).toEqual([127, 0, 0, 129, 127]);
  });

  it('sizes two_tower as two embedding layers', () => {
    const dims: TemplateDims = { template: 'two_tower', inputDim: 4, outputDim: 1, inputA: 2, inputB: 2, embedDim: 3 };
    expect(expectedWeightBytes(dims, true)).toBe(6 + 12 + 6 + 12);
  });
});
