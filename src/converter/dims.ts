/**
 * Template Dimension Resolution
 *
 * Combines the manifest schema, `[build]` hints, caller overrides and (for
 * the hidden sizes of MLPs) the shape of the conversion input into concrete
 * template dimensions.
 *
 * @module converter/dims
 */

import { ConversionError } from '../errors/index.js';
import type { Manifest } from '../manifest/types.js';
import { getInt, isInt, product } from '../manifest/values.js';
import type { TemplateDims } from './layouts.js';
import type { TemplateName } from './template.js';
import { matrixShape } from './tensors.js';
import { resolveTreeStride } from './tree.js';

export interface DimOverrides {
  inputDim?: number;
  outputDim?: number;
  hiddenDim?: number;
  hiddenDim1?: number;
  hiddenDim2?: number;
  hiddenDim3?: number;
  inputDimA?: number;
  inputDimB?: number;
  embedDim?: number;
  treeCount?: number;
  treeNodeCount?: number;
}

/**
 * Flat input and output sizes implied by the schema. Custom schemas carry no
 * dimensions, so both must be overridden.
 */
export function resolveIoDims(manifest: Manifest, overrides: DimOverrides = {}): { inputDim: number; outputDim: number } {
  const schema = manifest.schema;
  let inputDim: number | undefined;
  let outputDim: number | undefined;

  switch (schema.type) {
    case 'vector':
      inputDim = product(schema.inputShape);
      outputDim = product(schema.outputShape);
      break;
    case 'time_series':
      inputDim = schema.window * schema.features;
      outputDim = product(schema.outputShape);
      break;
    case 'graph':
      inputDim = schema.nodeFeatureDim;
      outputDim = product(schema.outputShape);
      break;
    case 'custom':
      if (overrides.inputDim === undefined || overrides.outputDim === undefined) {
        throw new ConversionError('custom schema requires --input-dim and --output-dim');
      }
      break;
  }

  inputDim = overrides.inputDim ?? inputDim;
  outputDim = overrides.outputDim ?? outputDim;
  if (inputDim === undefined || outputDim === undefined) {
    throw new ConversionError('input/output dimensions could not be resolved');
  }
  return { inputDim, outputDim };
}

function positive(value: unknown, message: string): number {
  if (!isInt(value) || value < 1) {
    throw new ConversionError(message);
  }
  return value;
}

function hiddenFromInput(input: Record<string, unknown> | undefined, key: string): number | undefined {
  const shape = matrixShape(input?.[key]);
  return shape ? shape[0] : undefined;
}

/**
 * Resolve every dimension a template needs. `input` is the conversion
 * input when converting; guest-side callers pass undefined and rely on
 * `[build]`.
 */
export function resolveTemplateDims(
  manifest: Manifest,
  template: TemplateName,
  input?: Record<string, unknown>,
  overrides: DimOverrides = {}
): TemplateDims {
  const { inputDim, outputDim } = resolveIoDims(manifest, overrides);
  const build = manifest.build;
  const schema = manifest.schema;

  switch (template) {
    case 'linear':
    case 'softmax':
    case 'naive_bayes':
      return { template, inputDim, outputDim };

    case 'mlp': {
      const fromInput = input?.hidden_dim;
      const hidden =
        overrides.hiddenDim ??
        (isInt(fromInput) ? fromInput : undefined) ??
        getInt(build, 'hidden_dim') ??
        hiddenFromInput(input, 'w1');
      if (hidden === undefined) {
        throw new ConversionError('hidden_dim not found; include in input or pass 2D w1');
      }
      return { template, inputDim, outputDim, hiddenDims: [hidden] };
    }

    case 'mlp2':
    case 'mlp3': {
      const layers = template === 'mlp2' ? 2 : 3;
      const given = [overrides.hiddenDim1, overrides.hiddenDim2, overrides.hiddenDim3];
      const hiddenDims: number[] = [];
      for (let i = 0; i < layers; i++) {
        const n = i + 1;
        const value = given[i] ?? getInt(build, `hidden_dim${n}`) ?? hiddenFromInput(input, `w${n}`);
        if (value === undefined) {
          throw new ConversionError(
            template === 'mlp2' ? 'hidden_dim1 and hidden_dim2 required for mlp2' : 'hidden_dim1/2/3 required for mlp3'
          );
        }
        hiddenDims.push(value);
      }
      return { template, inputDim, outputDim, hiddenDims };
    }

    case 'cnn1d': {
      if (schema.type !== 'time_series') {
        throw new ConversionError('cnn1d template requires schema.type = time_series');
      }
      return {
        template,
        inputDim,
        outputDim,
        window: schema.window,
        inChannels: schema.features,
        kernelSize: positive(build.kernel_size, 'build.kernel_size required for cnn1d'),
        outChannels: positive(build.out_channels, 'build.out_channels required for cnn1d'),
        stride: positive(build.stride ?? 1, 'build.stride must be >= 1 for cnn1d'),
      };
    }

    case 'tiny_cnn': {
      if (schema.type !== 'vector') {
        throw new ConversionError('tiny_cnn template requires schema.type = vector');
      }
      let height = getInt(build, 'input_height');
      let width = getInt(build, 'input_width');
      if ((height === undefined || width === undefined) && schema.inputShape.length === 2) {
        [height, width] = schema.inputShape;
      }
      if (height === undefined || width === undefined) {
        throw new ConversionError('build.input_height/input_width required for tiny_cnn');
      }
      const kernelSize = positive(build.kernel_size, 'build.kernel_size required for tiny_cnn');
      const outChannels = positive(build.out_channels, 'build.out_channels required for tiny_cnn');
      const stride = positive(build.stride ?? 1, 'build.stride must be >= 1 for tiny_cnn');
      if (height * width !== inputDim) {
        throw new ConversionError('tiny_cnn input_height * input_width must equal schema input_dim');
      }
      return { template, inputDim, outputDim, inputHeight: height, inputWidth: width, kernelSize, outChannels, stride };
    }

    case 'two_tower': {
      const inputA = overrides.inputDimA ?? getInt(build, 'tower_input_a');
      const inputB = overrides.inputDimB ?? getInt(build, 'tower_input_b');
      const embedDim = overrides.embedDim ?? getInt(build, 'embed_dim');
      if (inputA === undefined || inputB === undefined) {
        throw new ConversionError('build.tower_input_a and build.tower_input_b required for two_tower');
      }
      if (embedDim === undefined) {
        throw new ConversionError('build.embed_dim required for two_tower');
      }
      if (inputA + inputB !== inputDim) {
        throw new ConversionError('tower_input_a + tower_input_b must equal schema input_dim');
      }
      return { template, inputDim, outputDim, inputA, inputB, embedDim };
    }

    case 'tree': {
      const treeCount = positive(
        overrides.treeCount ?? build.tree_count ?? 1,
        'build.tree_count must be >= 1 for tree template'
      );
      const nodeCount = positive(
        overrides.treeNodeCount ?? build.tree_node_count,
        'build.tree_node_count required for tree template'
      );
      const rawStride = build.tree_stride;
      let stride: number | undefined;
      if (rawStride !== undefined) {
        if (!isInt(rawStride)) {
          throw new ConversionError('tree_stride must be a positive integer when provided');
        }
        stride = rawStride;
      }
      const treeStride = resolveTreeStride({ treeCount, nodeCount, treeStride: stride });
      return { template, inputDim, outputDim, treeCount, nodeCount, treeStride };
    }
  }
}
