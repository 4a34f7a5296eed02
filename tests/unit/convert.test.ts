import { describe, expect, it } from 'vitest';

import { chunkFile, chunkManifest } from '../../src/converter/chunk.js';
import { convertManifestWeights, convertWeights, parseKeymap } from '../../src/converter/convert.js';
import { resolveTemplateDims } from '../../src/converter/dims.js';
import { MemoryBlobIO } from '../../src/converter/io/memory.js';
import { packManifest } from '../../src/converter/pack.js';
import { manifestFromText, parseManifestText } from '../../src/manifest/loader.js';
import { isTable } from '../../src/manifest/values.js';
import { manifestText } from './fixtures.js';

const MANIFEST_PATH = '/proj/manifest.toml';

const TIME_SERIES_SCHEMA = `[schema]
type = "time_series"

[schema.time_series]
input_dtype = "i32"
window = 4
features = 3
output_dtype = "i32"
output_shape = [1]
`;

const TREE_WEIGHTS = `[weights]
layout = "tree_gbdt"
quantization = "custom"
dtype = "i32"

[[weights.blobs]]
name = "w"
file = "weights.bin"
hash = "sha256:0"
size_bytes = 40
`;

const LINEAR_AS_CUSTOM = `[weights]
layout = "opaque"
quantization = "custom"

[[weights.blobs]]
name = "w"
file = "weights.bin"
hash = "sha256:0"
size_bytes = 8
`;

function manifestOf(text: string) {
  return manifestFromText(text, MANIFEST_PATH, { validate: false }).manifest;
}

describe('resolveTemplateDims', () => {
  it('takes the mlp hidden size from a 2-D w1', () => {
    const manifest = manifestOf(manifestText({ weights: '' }));
    const dims = resolveTemplateDims(manifest, 'mlp', { w1: [[1, 2, 3, 4], [5, 6, 7, 8], [0, 0, 0, 0]] });
    expect(dims).toEqual({ template: 'mlp', inputDim: 4, outputDim: 1, hiddenDims: [3] });
  });

  it('prefers [build] hidden sizes for mlp2', () => {
    const manifest = manifestOf(manifestText({ build: '[build]\nhidden_dim1 = 8\nhidden_dim2 = 5\n' }));
    const dims = resolveTemplateDims(manifest, 'mlp2', {});
    expect(dims).toEqual({ template: 'mlp2', inputDim: 4, outputDim: 1, hiddenDims: [8, 5] });
  });

  it('reads conv parameters for cnn1d from a time series schema', () => {
    const manifest = manifestOf(
      manifestText({ schema: TIME_SERIES_SCHEMA, build: '[build]\nkernel_size = 2\nout_channels = 2\n' })
    );
    expect(resolveTemplateDims(manifest, 'cnn1d')).toEqual({
      template: 'cnn1d',
      inputDim: 12,
      outputDim: 1,
      window: 4,
      inChannels: 3,
      kernelSize: 2,
      outChannels: 2,
      stride: 1,
    });
  });

  it('rejects cnn1d on a vector schema', () => {
    const manifest = manifestOf(manifestText({ build: '[build]\nkernel_size = 2\nout_channels = 2\n' }));
    expect(() => resolveTemplateDims(manifest, 'cnn1d')).toThrow('cnn1d template requires schema.type = time_series');
  });

  it('checks that the tower inputs add up to the schema input', () => {
    const manifest = manifestOf(
      manifestText({ build: '[build]\ntower_input_a = 2\ntower_input_b = 1\nembed_dim = 3\n' })
    );
    expect(() => resolveTemplateDims(manifest, 'two_tower')).toThrow(
      'tower_input_a + tower_input_b must equal schema input_dim'
    );
  });

  it('defaults the tree stride to node_count * 20', () => {
    const manifest = manifestOf(manifestText({ weights: TREE_WEIGHTS, build: '[build]\ntree_node_count = 2\n' }));
    expect(resolveTemplateDims(manifest, 'tree')).toEqual({
      template: 'tree',
      inputDim: 4,
      outputDim: 1,
      treeCount: 1,
      nodeCount: 2,
      treeStride: 40,
    });
  });
});

describe('convertWeights', () => {
  const manifest = manifestOf(manifestText());

  it('infers the template from weights.layout', () => {
    const result = convertWeights(manifest, { w: [127, 0, -127, 63.5], b: [0.5] });
    expect(result.template).toBe('linear');
    expect(Array.from(result.buffer)).toEqual([127, 0, 129, 64, 0x00, 0x80, 0x00, 0x00]);
  });

  it('unwraps state_dict and applies a key map', () => {
    const result = convertWeights(
      manifest,
      { state_dict: { weight: [1, 2, 3, 4] } },
      { keymap: parseKeymap(['w=weight']), scales: { w_scale_q16: 65536 }, bias: false }
    );
    expect(Array.from(result.buffer)).toEqual([1, 2, 3, 4]);
  });

  it('reports a key map source that is missing', () => {
    expect(() => convertWeights(manifest, { w: [1, 2, 3, 4] }, { keymap: { w: 'nope' } })).toThrow(
      "Key 'nope' not found in input for mapping to 'w'"
    );
  });

  it('needs a template when the layout says nothing', () => {
    const custom = manifestOf(manifestText({ weights: LINEAR_AS_CUSTOM }));
    expect(() => convertWeights(custom, { w: [1] })).toThrow('Unable to infer template; pass --template');
  });
});

describe('convertManifestWeights', () => {
  it('writes the blob and appends the scales table', async () => {
    const io = new MemoryBlobIO({
      [MANIFEST_PATH]: manifestText(),
      '/proj/w.json': JSON.stringify({ w: [127, 0, -127, 63.5], b: [0.5] }),
    });

    const result = await convertManifestWeights(MANIFEST_PATH, '/proj/w.json', {}, io);

    expect(result.outputPath).toBe('/proj/weights.bin');
    expect(Array.from(io.files.get('/proj/weights.bin') ?? [])).toEqual([127, 0, 129, 64, 0, 128, 0, 0]);
    const text = io.text(MANIFEST_PATH);
    expect(text.endsWith('cu_budget = 1400000\n\n[weights.scales]\nw_scale_q16 = 65536\n')).toBe(true);
    const weights = parseManifestText(text).weights;
    expect(isTable(weights) && isTable(weights.scales) ? weights.scales.w_scale_q16 : undefined).toBe(65536);
  });

  it('leaves the manifest alone when asked to', async () => {
    const original = manifestText();
    const io = new MemoryBlobIO({ [MANIFEST_PATH]: original, '/proj/w.json': '{"w":[1,2,3,4]}' });
    await convertManifestWeights(MANIFEST_PATH, '/proj/w.json', { updateManifest: false, output: '/tmp/out.bin' }, io);
    expect(io.text(MANIFEST_PATH)).toBe(original);
    expect(io.files.get('/tmp/out.bin')?.length).toBe(8);
  });
});

describe('packManifest', () => {
  it('patches hash and size of each blob', async () => {
    const io = new MemoryBlobIO({ [MANIFEST_PATH]: manifestText(), '/proj/weights.bin': new Uint8Array([1, 2, 3]) });

    const updates = await packManifest(MANIFEST_PATH, {}, io);

    const hash = 'sha256:039058c6f2c0cb492c533b0a4d14ef77cc0f78abccced5287d84a1a2011cfb81';
    expect(updates).toEqual([{ name: 'w', file: 'weights.bin', hash, sizeBytes: 3, created: false }]);
    const lines = io.text(MANIFEST_PATH).split('\n');
    expect(lines).toContain(`hash = "${hash}"`);
    expect(lines).toContain('size_bytes = 3');
  });

  it('fails on a missing blob unless asked to create it', async () => {
    const io = new MemoryBlobIO({ [MANIFEST_PATH]: manifestText() });
    await expect(packManifest(MANIFEST_PATH, {}, io)).rejects.toThrow('Weights blob not found: /proj/weights.bin');
  });

  it('creates leaf-sentinel placeholders for tree layouts', async () => {
    const io = new MemoryBlobIO({ [MANIFEST_PATH]: manifestText({ weights: TREE_WEIGHTS }) });

    const [update] = await packManifest(MANIFEST_PATH, { createMissing: true }, io);

    expect(update.created).toBe(true);
    expect(update.sizeBytes).toBe(40);
    expect(update.hash).toBe('sha256:7d8942b82185d21a5104d733fecc6cb996f0745994caed412a967f942e6f345a');
    const blob = io.files.get('/proj/weights.bin') ?? new Uint8Array(0);
    expect(new DataView(blob.buffer, blob.byteOffset).getInt32(20, true)).toBe(-1);
  });

  it('creates zero-filled placeholders for dense layouts', async () => {
    const io = new MemoryBlobIO({ [MANIFEST_PATH]: manifestText() });
    await packManifest(MANIFEST_PATH, { createMissing: true }, io);
    expect(Array.from(io.files.get('/proj/weights.bin') ?? [])).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
  });
});

describe('chunking', () => {
  it('splits a file into numbered chunks', async () => {
    const io = new MemoryBlobIO({ '/proj/weights.bin': new Uint8Array([1, 2, 3, 4, 5]) });

    const result = await chunkFile('/proj/weights.bin', 2, '/proj/out', io);

    expect(result.chunks).toEqual([
      '/proj/out/weights_chunk0.bin',
      '/proj/out/weights_chunk1.bin',
      '/proj/out/weights_chunk2.bin',
    ]);
    expect(Array.from(io.files.get('/proj/out/weights_chunk2.bin') ?? [])).toEqual([5]);
  });

  it('uses one MiB chunks when the blob has no chunk_size', async () => {
    const io = new MemoryBlobIO({
      [MANIFEST_PATH]: manifestText(),
      '/proj/weights.bin': new Uint8Array(8),
    });
    const [result] = await chunkManifest(MANIFEST_PATH, {}, io);
    expect(result.chunks).toEqual(['/proj/weights_chunk0.bin']);
  });

  it('rejects a zero chunk size', async () => {
    const io = new MemoryBlobIO({ '/proj/weights.bin': new Uint8Array(4) });
    await expect(chunkFile('/proj/weights.bin', 0, '/proj', io)).rejects.toThrow('chunk_size must be > 0');
  });
});
