/**
 * Decision Tree Packing
 *
 * Each node is five little-endian i32 values:
 * `feature, threshold_q16, left, right, value_q16`. Trees are laid out back to
 * back, each padded with zero bytes to `tree_stride`. A node with
 * `feature = -1` is a leaf; `left`/`right` of -1 mean no child.
 *
 * @module converter/tree
 */

import { TREE_NODE_BYTES } from '../config/schema/index.js';
import { ConversionError } from '../errors/index.js';
import { isTable } from '../manifest/values.js';
import { toQ16 } from './quantizer.js';

export interface TreeNode {
  feature: number;
  thresholdQ16: number;
  left: number;
  right: number;
  valueQ16: number;
}

export interface TreeDims {
  treeCount: number;
  nodeCount: number;
  /** Bytes per tree; defaults to nodeCount * 20 */
  treeStride?: number;
}

/** Node written by placeholders and missing-blob fills */
export const LEAF_SENTINEL: TreeNode = { feature: -1, thresholdQ16: 0, left: -1, right: -1, valueQ16: 0 };

/**
 * Resolve and check the per-tree stride.
 */
export function resolveTreeStride(dims: TreeDims): number {
  const nodeBytes = dims.nodeCount * TREE_NODE_BYTES;
  const stride = dims.treeStride ?? nodeBytes;
  if (!Number.isInteger(stride) || stride <= 0) {
    throw new ConversionError('tree_stride must be a positive integer when provided');
  }
  if (stride < nodeBytes) {
    throw new ConversionError('tree_stride must be >= node_count * 20');
  }
  if (stride % 4 !== 0) {
    throw new ConversionError('tree_stride must be 4-byte aligned');
  }
  return stride;
}

const I32_MIN = -(2 ** 31);
const I32_MAX = 2 ** 31 - 1;

function intField(node: Record<string, unknown>, key: string, fallback: number): number {
  const value = node[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConversionError(`node ${key} must be a number`);
  }
  const int = Math.trunc(value);
  if (int < I32_MIN || int > I32_MAX) {
    throw new ConversionError(`node ${key} ${int} is outside the i32 range`);
  }
  return int;
}

function realField(node: Record<string, unknown>, key: string): number {
  const value = node[key];
  if (value === undefined) return 0;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConversionError(`node ${key} must be a number`);
  }
  return value;
}

/**
 * Read one node from its JSON form. Thresholds and values are real numbers
 * encoded as Q16.
 */
export function parseTreeNode(value: unknown): TreeNode {
  if (!isTable(value)) {
    throw new ConversionError('node must be an object');
  }
  return {
    feature: intField(value, 'feature', -1),
    thresholdQ16: toQ16(realField(value, 'threshold'), 'threshold'),
    left: intField(value, 'left', -1),
    right: intField(value, 'right', -1),
    valueQ16: toQ16(realField(value, 'value'), 'value'),
  };
}

/**
 * Trees from conversion input: `trees` (list of node lists) or a single
 * tree under `nodes`.
 */
export function readTrees(input: Record<string, unknown>): TreeNode[][] {
  let trees = input.trees;
  if (trees === undefined) {
    const nodes = input.nodes;
    if (nodes === undefined) {
      throw new ConversionError("tree input requires 'nodes' or 'trees'");
    }
    trees = [nodes];
  }
  if (!Array.isArray(trees) || trees.length === 0) {
    throw new ConversionError('trees must be a non-empty list');
  }
  return trees.map((tree) => {
    if (!Array.isArray(tree)) {
      throw new ConversionError('each tree must be a list of nodes');
    }
    return tree.map(parseTreeNode);
  });
}

export function encodeTrees(trees: TreeNode[][], dims: TreeDims): Uint8Array {
  if (dims.treeCount !== trees.length) {
    throw new ConversionError('tree_count does not match number of trees in input');
  }
  const stride = resolveTreeStride(dims);
  const out = new Uint8Array(stride * trees.length);
  const view = new DataView(out.buffer);

  trees.forEach((tree, t) => {
    if (tree.length !== dims.nodeCount) {
      throw new ConversionError('tree node count mismatch');
    }
    let pos = t * stride;
    for (const node of tree) {
      view.setInt32(pos, node.feature, true);
      view.setInt32(pos + 4, node.thresholdQ16, true);
      view.setInt32(pos + 8, node.left, true);
      view.setInt32(pos + 12, node.right, true);
      view.setInt32(pos + 16, node.valueQ16, true);
      pos += TREE_NODE_BYTES;
    }
  });
  return out;
}

export function decodeTrees(buffer: Uint8Array, dims: TreeDims): TreeNode[][] {
  const stride = resolveTreeStride(dims);
  const expected = stride * dims.treeCount;
  if (buffer.length !== expected) {
    throw new ConversionError(`tree buffer length mismatch: ${buffer.length} != ${expected}`);
  }
  const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  const trees: TreeNode[][] = [];
  for (let t = 0; t < dims.treeCount; t++) {
    const nodes: TreeNode[] = [];
    for (let n = 0; n < dims.nodeCount; n++) {
      const pos = t * stride + n * TREE_NODE_BYTES;
      nodes.push({
        feature: view.getInt32(pos, true),
        thresholdQ16: view.getInt32(pos + 4, true),
        left: view.getInt32(pos + 8, true),
        right: view.getInt32(pos + 12, true),
        valueQ16: view.getInt32(pos + 16, true),
      });
    }
    trees.push(nodes);
  }
  return trees;
}

/**
 * `sizeBytes` worth of leaf-sentinel nodes. The size must be a whole number
 * of nodes.
 */
export function treePlaceholder(sizeBytes: number): Uint8Array {
  if (sizeBytes % TREE_NODE_BYTES !== 0) {
    throw new ConversionError(`tree placeholder size ${sizeBytes} is not a multiple of ${TREE_NODE_BYTES}`);
  }
  const nodeCount = sizeBytes / TREE_NODE_BYTES;
  if (nodeCount === 0) return new Uint8Array(0);
  const nodes = Array.from({ length: nodeCount }, () => LEAF_SENTINEL);
  return encodeTrees([nodes], { treeCount: 1, nodeCount });
}
