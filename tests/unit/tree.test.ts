import { describe, expect, it } from 'vitest';

import {
  decodeTrees,
  encodeTrees,
  readTrees,
  resolveTreeStride,
  treePlaceholder,
} from '../../src/converter/tree.js';

function i32At(buffer: Uint8Array, offset: number): number {
  return new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength).getInt32(offset, true);
}

describe('tree encoding', () => {
  const input = {
    nodes: [{ feature: 0, threshold: 0.5, left: 1, right: 1 }, { value: 2 }],
  };

  it('packs nodes as five i32 values and pads to the stride', () => {
    const buffer = encodeTrees(readTrees(input), { treeCount: 1, nodeCount: 2, treeStride: 48 });
    expect(buffer.length).toBe(48);
    expect(i32At(buffer, 0)).toBe(0);
    expect(i32At(buffer, 4)).toBe(32768);
    expect(i32At(buffer, 8)).toBe(1);
    expect(i32At(buffer, 12)).toBe(1);
    expect(i32At(buffer, 16)).toBe(0);
    // second node: defaults plus value 2.0
    expect(i32At(buffer, 20)).toBe(-1);
    expect(i32At(buffer, 32)).toBe(-1);
    expect(i32At(buffer, 36)).toBe(131072);
    expect(Array.from(buffer.subarray(40))).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
  });

  it('decodes what it encodes', () => {
    const dims = { treeCount: 1, nodeCount: 2 };
    const trees = decodeTrees(encodeTrees(readTrees(input), dims), dims);
    expect(trees).toEqual([
      [
        { feature: 0, thresholdQ16: 32768, left: 1, right: 1, valueQ16: 0 },
        { feature: -1, thresholdQ16: 0, left: -1, right: -1, valueQ16: 131072 },
      ],
    ]);
  });

  it('requires nodes or trees', () => {
    expect(() => readTrees({})).toThrow("tree input requires 'nodes' or 'trees'");
  });

  it('rejects node indices outside the i32 range', () => {
    expect(() => readTrees({ nodes: [{ feature: 2 ** 32 - 1 }] })).toThrow(
      'node feature 4294967295 is outside the i32 range'
    );
    expect(() => readTrees({ nodes: [{ left: -(2 ** 31) - 1 }] })).toThrow(
      'node left -2147483649 is outside the i32 range'
    );
    expect(readTrees({ nodes: [{ right: 2 ** 31 - 1 }] })[0][0].right).toBe(2147483647);
  });

  it('checks the tree count and node count', () => {
    const trees = readTrees({ trees: [[{}], [{}]] });
    expect(() => encodeTrees(trees, { treeCount: 1, nodeCount: 1 })).toThrow(
      'tree_count does not match number of trees in input'
    );
    expect(() => encodeTrees(trees, { treeCount: 2, nodeCount: 2 })).toThrow('tree node count mismatch');
  });

  it('validates the stride', () => {
    expect(resolveTreeStride({ treeCount: 1, nodeCount: 3 })).toBe(60);
    expect(() => resolveTreeStride({ treeCount: 1, nodeCount: 3, treeStride: 40 })).toThrow(
      'tree_stride must be >= node_count * 20'
    );
    expect(() => resolveTreeStride({ treeCount: 1, nodeCount: 3, treeStride: 62 })).toThrow(
      'tree_stride must be 4-byte aligned'
    );
  });
});

describe('treePlaceholder', () => {
  it('fills 40 bytes with two leaf-sentinel nodes', () => {
    const buffer = treePlaceholder(40);
    expect(buffer.length).toBe(40);
    for (const base of [0, 20]) {
      expect(i32At(buffer, base)).toBe(-1);
      expect(i32At(buffer, base + 4)).toBe(0);
      expect(i32At(buffer, base + 8)).toBe(-1);
      expect(i32At(buffer, base + 12)).toBe(-1);
      expect(i32At(buffer, base + 16)).toBe(0);
    }
  });

  it('rejects sizes that are not whole nodes', () => {
    expect(() => treePlaceholder(30)).toThrow('tree placeholder size 30 is not a multiple of 20');
  });
});
