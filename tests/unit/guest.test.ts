import { describe, expect, it } from 'vitest';

import { MemoryBlobIO } from '../../src/converter/io/memory.js';
import { computeGuestConfig, resolveWeightsLocation } from '../../src/guest/config.js';
import { renderGuestConstants, writeGuestConfig } from '../../src/guest/render.js';
import { manifestFromText } from '../../src/manifest/loader.js';
import { manifestText } from './fixtures.js';

function manifestOf(text: string) {
  return manifestFromText(text, '/proj/manifest.toml', { validate: false }).manifest;
}

const TIME_SERIES_SCHEMA = `[schema]
type = "time_series"

[schema.time_series]
input_dtype = "i32"
window = 8
features = 2
output_dtype = "i32"
output_shape = [1]
`;

const CUSTOM_SCHEMA = `[schema]
type = "custom"

[schema.custom]
input_blob_size = 32
output_blob_size = 8
`;

describe('computeGuestConfig', () => {
  it('derives the linear layout from the manifest', () => {
    const config = computeGuestConfig(manifestOf(manifestText()));
    expect(config.stack).toEqual({ scratchMin: 262144, reservedTail: 32, stackGuard: 0x4000, stackPtr: 245728 });
    expect(config.expectedSchemaId).toBe(0);
    expect(config.expectedSchemaHash).toBe(0xca4e3ebf);
    expect(config.model).toEqual({
      template: 'linear',
      inputDim: 4,
      outputDim: 1,
      weights: { seg: 1, offset: 0, dataOffset: 0 },
      wScaleQ16: 65536,
      hasBias: true,
    });
  });

  it('rejects a stack guard that leaves no stack', () => {
    const manifest = manifestOf(manifestText({ build: '[build]\nstack_guard = 262112\n' }));
    expect(() => computeGuestConfig(manifest)).toThrow('scratch_min too small for stack guard and reserved_tail');
  });

  it('chains mlp3 activation offsets after each hidden layer', () => {
    const manifest = manifestOf(
      manifestText({ build: '[build]\nhidden_dim1 = 8\nhidden_dim2 = 6\nhidden_dim3 = 4\n' })
    );
    const config = computeGuestConfig(manifest, { template: 'mlp3' });
    expect(config.model).toMatchObject({
      template: 'mlp3',
      hiddenDims: [8, 6, 4],
      hiddenOffsets: [0x3000, 0x3020, 0x3038],
      scalesQ16: [65536, 65536, 65536, 65536],
    });
  });

  it('requires hidden_dim for mlp', () => {
    expect(() => computeGuestConfig(manifestOf(manifestText()), { template: 'mlp' })).toThrow(
      'build.hidden_dim is required for MLP templates'
    );
  });

  it('splits two_tower embeddings', () => {
    const manifest = manifestOf(
      manifestText({ build: '[build]\ntower_input_a = 2\ntower_input_b = 2\nembed_dim = 3\n' })
    );
    expect(computeGuestConfig(manifest, { template: 'two_tower' }).model).toMatchObject({
      inputDimA: 2,
      inputDimB: 2,
      embedDim: 3,
      dotShift: 16,
      embedAOffset: 0x3000,
      embedBOffset: 0x300c,
    });
  });

  it('passes tree dimensions through', () => {
    const manifest = manifestOf(manifestText({ build: '[build]\ntree_node_count = 2\n' }));
    expect(computeGuestConfig(manifest, { template: 'tree' }).model).toMatchObject({
      treeCount: 1,
      treeNodeCount: 2,
      treeStride: 40,
    });
  });

  it('reads cnn1d geometry from the time series schema', () => {
    const manifest = manifestOf(
      manifestText({ schema: TIME_SERIES_SCHEMA, build: '[build]\nkernel_size = 3\nout_channels = 4\n' })
    );
    expect(computeGuestConfig(manifest, { template: 'cnn1d' }).model).toMatchObject({
      inputDim: 16,
      inputLen: 8,
      inputChannels: 2,
      kernelSize: 3,
      stride: 1,
      outChannels: 4,
      convOffset: 0x3000,
    });
  });

  it('checks the schema type against the template', () => {
    expect(() => computeGuestConfig(manifestOf(manifestText()), { template: 'cnn1d' })).toThrow(
      'schema type is incompatible with cnn1d template'
    );
    expect(() => computeGuestConfig(manifestOf(manifestText({ schema: CUSTOM_SCHEMA })))).toThrow(
      'schema type is incompatible with template'
    );
  });

  it('falls back to the custom template for custom schemas without weights', () => {
    const config = computeGuestConfig(manifestOf(manifestText({ schema: CUSTOM_SCHEMA, weights: '' })), {
      schemaHashMode: 'none',
    });
    expect(config.expectedSchemaId).toBe(3);
    expect(config.model).toEqual({ template: 'custom', inputBlobSize: 32, outputBlobSize: 8 });
  });
});

describe('resolveWeightsLocation', () => {
  it('skips the rvcd-v1 header and honours segment_index', () => {
    const weights = `[weights]
layout = "linear"
quantization = "q8"
header_format = "rvcd-v1"

[[weights.blobs]]
name = "w"
file = "weights.bin"
hash = "sha256:0"
size_bytes = 8
segment_index = 2
`;
    const manifest = manifestOf(manifestText({ weights, build: '[build]\nweights_offset = 64\n' }));
    expect(resolveWeightsLocation(manifest)).toEqual({ seg: 2, offset: 64, dataOffset: 12 });
  });
});

describe('renderGuestConstants', () => {
  it('renders the linear constants', () => {
    const text = renderGuestConstants(computeGuestConfig(manifestOf(manifestText())));
    expect(text).toBe(
      [
        '//! Generated guest configuration constants. Do not edit by hand.',
        '',
        'pub const CONTROL_OFFSET: usize = 0x0000;',
        'pub const INPUT_MAX: usize = 256;',
        'pub const OUTPUT_MAX: usize = 64;',
        '',
        'pub const SCRATCH_MIN: usize = 262144;',
        'pub const RESERVED_TAIL: usize = 32;',
        'pub const STACK_GUARD: usize = 0x4000;',
        'pub const STACK_PTR: usize = 245728;',
        '',
        'pub const INPUT_DIM: usize = 4;',
        'pub const OUTPUT_DIM: usize = 1;',
        '',
        'pub const WEIGHTS_SEG: u32 = 1;',
        'pub const WEIGHTS_OFFSET: usize = 0;',
        'pub const WEIGHTS_DATA_OFFSET: usize = 0;',
        '',
        'pub const W_SCALE_Q16: i32 = 65536;',
        'pub const HAS_BIAS: bool = true;',
        '',
        'pub const EXPECTED_SCHEMA_HASH: u32 = 0xCA4E3EBF;',
        'pub const EXPECTED_SCHEMA_ID: u32 = 0;',
        '',
      ].join('\n')
    );
  });

  it('writes hidden offsets in hex for mlp2', () => {
    const manifest = manifestOf(manifestText({ build: '[build]\nhidden_dim1 = 16\nhidden_dim2 = 8\nhas_bias = false\n' }));
    const lines = renderGuestConstants(computeGuestConfig(manifest, { template: 'mlp2' })).split('\n');
    expect(lines).toContain('pub const HIDDEN1_OFFSET: usize = 0x3000;');
    expect(lines).toContain('pub const HIDDEN2_OFFSET: usize = 0x3040;');
    expect(lines).toContain('pub const W3_SCALE_Q16: i32 = 65536;');
    expect(lines).toContain('pub const HAS_BIAS: bool = false;');
  });

  it('writes a zero hash when hashing is off', () => {
    const text = renderGuestConstants(computeGuestConfig(manifestOf(manifestText()), { schemaHashMode: 'none' }));
    expect(text.split('\n')).toContain('pub const EXPECTED_SCHEMA_HASH: u32 = 0x00000000;');
  });
});

describe('writeGuestConfig', () => {
  it('writes config.rs through the blob store', async () => {
    const io = new MemoryBlobIO({ '/proj/manifest.toml': manifestText() });
    const { outputPath } = await writeGuestConfig('/proj/manifest.toml', '/proj/guest/src/config.rs', {}, io);
    expect(outputPath).toBe('/proj/guest/src/config.rs');
    expect(io.dirs.has('/proj/guest/src')).toBe(true);
    expect(io.text(outputPath).startsWith('//! Generated guest configuration constants.')).toBe(true);
  });
});
