/**
 * Converter Module - Public API
 *
 * Quantizes float weights into the fixed binary layouts the guest templates
 * read, packs blob hashes into the manifest and splits blobs into chunks.
 *
 * @module converter
 */

export {
  roundHalfEven,
  computeScaleQ16,
  quantizeI8,
  dequantizeI8,
  toQ16,
  toQ16Array,
  fromQ16,
  type QuantizeResult,
} from './quantizer.js';

export { flattenVector, flattenMatrix, flattenConv1d, flattenConv2d, matrixShape } from './tensors.js';

export { TEMPLATE_NAMES, isTemplateName, inferTemplate, isSingleLayer, type TemplateName } from './template.js';

export {
  LEAF_SENTINEL,
  resolveTreeStride,
  parseTreeNode,
  readTrees,
  encodeTrees,
  decodeTrees,
  treePlaceholder,
  type TreeNode,
  type TreeDims,
} from './tree.js';

export {
  layerPlan,
  tensorSize,
  expectedWeightBytes,
  encodeLayers,
  encodeWeights,
  decodeWeights,
  type TemplateDims,
  type LinearDims,
  type MlpDims,
  type Cnn1dDims,
  type TinyCnnDims,
  type TwoTowerDims,
  type TreeTemplateDims,
  type TensorShape,
  type LayerSpec,
  type WeightInput,
  type EncodedTensor,
  type EncodeResult,
  type DecodedLayer,
  type DecodedWeights,
} from './layouts.js';

export { resolveIoDims, resolveTemplateDims, type DimOverrides } from './dims.js';

export {
  resolveTemplate,
  normalizeWeightInput,
  applyKeymap,
  parseKeymap,
  convertWeights,
  weightsOutputPath,
  scalesPatch,
  convertManifestWeights,
  type ConvertOptions,
  type ConvertResult,
  type ConvertManifestOptions,
} from './convert.js';

export { placeholderBlob, blobPatch, packManifest, type BlobUpdate, type PackOptions } from './pack.js';

export { chunkPath, splitChunks, chunkFile, chunkManifest, type ChunkResult } from './chunk.js';

export type { BlobIO } from './io/types.js';
export { NodeBlobIO } from './io/node.js';
export { MemoryBlobIO } from './io/memory.js';
