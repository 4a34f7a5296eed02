import { describe, expect, it } from 'vitest';

import { VM_HEADER_SIZE } from '../../src/config/schema/index.js';
import { manifestFromText } from '../../src/manifest/loader.js';
import type { GraphSchema, TimeSeriesSchema, VectorSchema } from '../../src/manifest/types.js';
import {
  customBytesFromJson,
  loadPayloadFromJson,
  packInput,
  packPayload,
  unpackPayload,
} from '../../src/payload/codec.js';
import { buildControlBlock, parseControlBlock, planInputStaging } from '../../src/payload/control.js';
import { crc32 } from '../../src/payload/crc32.js';
import { decodeValues, encodeValues, float16ToFloat32, float32ToFloat16 } from '../../src/payload/dtype.js';
import { parseEnvelope, resolveSchemaHash, wrapEnvelope } from '../../src/payload/envelope.js';
import { decodeOutput, readVmOutput, resolveOutputFormat, schemaOutputInfo } from '../../src/payload/output.js';
import { manifestText } from './fixtures.js';

const CUSTOM_SCHEMA = `[schema]
type = "custom"

[schema.custom]
input_blob_size = 100
output_blob_size = 16
schema_hash32 = "0x0000BEEF"
`;

function manifestOf(text: string) {
  return manifestFromText(text, '/proj/manifest.toml', { validate: false }).manifest;
}

function u32At(bytes: Uint8Array, offset: number): number {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getUint32(offset, true);
}

function u16At(bytes: Uint8Array, offset: number): number {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getUint16(offset, true);
}

describe('crc32', () => {
  it('matches the standard check value', () => {
    expect(crc32(new TextEncoder().encode('123456789'))).toBe(0xcbf43926);
  });
});

describe('dtype codec', () => {
  it('packs little-endian integers', () => {
    expect(Array.from(encodeValues('i32', [1, -1]))).toEqual([1, 0, 0, 0, 0xff, 0xff, 0xff, 0xff]);
    expect(Array.from(encodeValues('i16', [-2]))).toEqual([0xfe, 0xff]);
    expect(Array.from(encodeValues('u8', [255, 0]))).toEqual([255, 0]);
  });

  it('rejects out-of-range and fractional integers', () => {
    expect(() => encodeValues('i8', [128])).toThrow('value 128 at index 0 out of range for i8');
    expect(() => encodeValues('u32', [-1])).toThrow('out of range for u32');
    expect(() => encodeValues('i32', [0, 1.5])).toThrow('value 1.5 at index 1 is not an integer for i32');
    expect(() => encodeValues('f32', ['x'])).toThrow('value at index 0 is not a number');
  });

  it('round-trips f32 values that are exactly representable', () => {
    const values = [0.5, -3.25, 1024];
    expect(decodeValues('f32', encodeValues('f32', values))).toEqual(values);
  });

  it('converts to half precision with round-to-nearest-even', () => {
    expect(float32ToFloat16(1)).toBe(0x3c00);
    expect(float32ToFloat16(-2)).toBe(0xc000);
    expect(float32ToFloat16(0.1)).toBe(0x2e66);
    expect(float32ToFloat16(65504)).toBe(0x7bff);
    expect(float32ToFloat16(65520)).toBe(0x7c00);
    expect(float32ToFloat16(Math.pow(2, -24))).toBe(0x0001);
    expect(float32ToFloat16(1e-8)).toBe(0);
    expect(float32ToFloat16(NaN)).toBe(0x7e00);
  });

  it('decodes half precision', () => {
    expect(float16ToFloat32(0x3c00)).toBe(1);
    expect(float16ToFloat32(0x0001)).toBe(Math.pow(2, -24));
    expect(float16ToFloat32(0xfc00)).toBe(-Infinity);
    expect(decodeValues('f16', encodeValues('f16', [0.5, -1.5]))).toEqual([0.5, -1.5]);
  });
});

describe('packPayload', () => {
  const vector: VectorSchema = {
    type: 'vector',
    inputDtype: 'i32',
    inputShape: [2, 2],
    outputDtype: 'i32',
    outputShape: [1],
  };

  it('packs vectors from flat or nested lists', () => {
    const expected = [1, 0, 0, 0, 0xff, 0xff, 0xff, 0xff, 2, 0, 0, 0, 3, 0, 0, 0];
    expect(Array.from(packPayload(vector, [1, -1, 2, 3]))).toEqual(expected);
    expect(Array.from(packPayload(vector, [[1, -1], [2, 3]]))).toEqual(expected);
  });

  it('reports the vector length', () => {
    expect(() => packPayload(vector, [1, 2, 3])).toThrow('vector payload length mismatch: 3 != 4');
  });

  const series: TimeSeriesSchema = {
    type: 'time_series',
    inputDtype: 'i8',
    window: 2,
    features: 3,
    stride: 1,
    outputDtype: 'i32',
    outputShape: [1],
  };

  it('checks time series rows', () => {
    expect(Array.from(packPayload(series, [[1, 2, 3], [4, 5, 6]]))).toEqual([1, 2, 3, 4, 5, 6]);
    expect(() => packPayload(series, [[1, 2, 3]])).toThrow('time_series window length mismatch');
    expect(() => packPayload(series, [[1, 2], [3, 4]])).toThrow('time_series row length mismatch');
  });

  const graph: GraphSchema = {
    type: 'graph',
    inputDtype: 'i8',
    nodeFeatureDim: 2,
    edgeFeatureDim: 1,
    maxNodes: 4,
    maxEdges: 4,
    outputDtype: 'i32',
    outputShape: [1],
  };

  it('lays out a graph as header, nodes, edge pairs, edge features', () => {
    const bytes = packPayload(graph, { nodes: [[1, 2], [3, 4]], edges: [[0, 1]], edge_features: [[5]] });
    expect(Array.from(bytes)).toEqual([
      2, 0, 0, 0, 1, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0,
      1, 2, 3, 4,
      0, 0, 0, 0, 1, 0, 0, 0,
      5,
    ]);
  });

  it('accepts flat edge lists and alternative keys', () => {
    const bytes = packPayload(graph, { node_features: [[1, 2]], edge_index: [0, 0], edge_attrs: [[9]] });
    expect(bytes.length).toBe(16 + 2 + 8 + 1);
  });

  it('enforces graph limits', () => {
    const nodes = [[0, 0], [0, 0], [0, 0], [0, 0], [0, 0]];
    expect(() => packPayload(graph, { nodes, edges: [] })).toThrow('node_count exceeds schema.graph.max_nodes');
    expect(() => packPayload(graph, { nodes: [[1, 2]], edges: [[0, 0]] })).toThrow(
      'edge_features required for edge_feature_dim > 0'
    );
    expect(() => packPayload(graph, { nodes: [[1, 2]], edges: [0] })).toThrow('edge list length must be even');
    expect(() => packPayload(graph, [1, 2])).toThrow('graph payload must be an object');
  });

  it('unpacks what it packs for every schema type', () => {
    expect(unpackPayload(vector, packPayload(vector, [1, -1, 2, 3]))).toEqual({ type: 'vector', values: [1, -1, 2, 3] });
    expect(unpackPayload(series, packPayload(series, [1, 2, 3, 4, 5, 6]))).toEqual({
      type: 'time_series',
      rows: [[1, 2, 3], [4, 5, 6]],
    });
    const payload = { nodes: [[1, 2], [3, 4]], edges: [[0, 1], [1, 0]], edge_features: [[5], [6]] };
    expect(unpackPayload(graph, packPayload(graph, payload))).toEqual({
      type: 'graph',
      graph: {
        nodeCount: 2,
        edgeCount: 2,
        nodes: [[1, 2], [3, 4]],
        edges: [[0, 1], [1, 0]],
        edgeFeatures: [[5], [6]],
      },
    });
  });
});

describe('custom payloads', () => {
  it('decodes hex, base64 and byte lists', () => {
    expect(Array.from(customBytesFromJson('0x0102ff'))).toEqual([1, 2, 255]);
    expect(Array.from(customBytesFromJson({ payload_hex: 'abcd' }))).toEqual([0xab, 0xcd]);
    expect(Array.from(customBytesFromJson('AQID'))).toEqual([1, 2, 3]);
    expect(Array.from(customBytesFromJson({ payload_base64: 'AQID' }))).toEqual([1, 2, 3]);
    expect(Array.from(customBytesFromJson([1, 257, -1]))).toEqual([1, 1, 255]);
  });

  it('rejects strings that are neither hex nor base64', () => {
    expect(() => customBytesFromJson('not base64!')).toThrow('custom payload string must be hex or base64');
    expect(() => customBytesFromJson('0xabc')).toThrow('invalid hex payload');
  });

  it('requires at least input_blob_size bytes', () => {
    const manifest = manifestOf(manifestText({ schema: CUSTOM_SCHEMA }));
    expect(() => packPayload(manifest.schema, new Array(99).fill(0))).toThrow(
      'custom payload smaller than input_blob_size'
    );
  });
});

describe('FBH1 envelope', () => {
  it('wraps a 100-byte payload with CRC into 132 bytes', () => {
    const manifest = manifestOf(manifestText({ schema: CUSTOM_SCHEMA }));
    const payload = Uint8Array.from({ length: 100 }, (_, i) => i);

    const out = packInput(manifest, payload, { header: true, crc: true, schemaHashMode: 'none' });

    expect(out.length).toBe(132);
    expect(u32At(out, 0)).toBe(0x31484246);
    expect(u16At(out, 4)).toBe(1);
    expect(u16At(out, 6)).toBe(1);
    expect(u32At(out, 8)).toBe(32);
    expect(u32At(out, 12)).toBe(3);
    expect(u32At(out, 16)).toBe(100);
    expect(u32At(out, 20)).toBe(0x58c932f5);
    expect(u32At(out, 24)).toBe(0);
    expect(Array.from(out.subarray(32))).toEqual(Array.from(payload));
  });

  it('embeds the computed schema hash in auto mode', () => {
    const manifest = manifestOf(manifestText());
    const out = packInput(manifest, [1, 2, 3, 4], { header: true });
    expect(u16At(out, 6)).toBe(2);
    expect(u32At(out, 12)).toBe(0);
    expect(u32At(out, 24)).toBe(0xca4e3ebf);
  });

  it('reads the manifest hash and omits it when absent', () => {
    const custom = manifestOf(manifestText({ schema: CUSTOM_SCHEMA }));
    expect(resolveSchemaHash(custom, 'manifest')).toBe(0xbeef);
    expect(resolveSchemaHash(manifestOf(manifestText()), 'manifest')).toBe(0);
    expect(() => resolveSchemaHash(custom, 'always')).toThrow('schema-hash mode must be auto, manifest, or none');
  });

  it('only adds a header for guest validation unless told', () => {
    const plain = manifestOf(manifestText());
    expect(packInput(plain, [1, 2, 3, 4]).length).toBe(16);
    const guest = manifestOf(`${manifestText()}\n[validation]\nmode = "guest"\n`);
    expect(packInput(guest, [1, 2, 3, 4], { schemaHashMode: 'none' }).length).toBe(48);
  });

  it('parses and verifies an envelope', () => {
    const wrapped = wrapEnvelope(new Uint8Array([9, 8, 7]), { schemaId: 1, crc: true, schemaHash: 0x1234 });
    const parsed = parseEnvelope(wrapped);
    expect(parsed.header.schemaId).toBe(1);
    expect(parsed.header.schemaHash).toBe(0x1234);
    expect(parsed.hasCrc).toBe(true);
    expect(parsed.hasSchemaHash).toBe(true);
    expect(Array.from(parsed.payload)).toEqual([9, 8, 7]);

    wrapped[33] ^= 0xff;
    expect(() => parseEnvelope(wrapped)).toThrow('envelope crc32 mismatch');
  });

  it('rejects a foreign magic', () => {
    expect(() => parseEnvelope(new Uint8Array(32))).toThrow('bad envelope magic 0x0');
  });
});

describe('loadPayloadFromJson', () => {
  it('unwraps input, data or payload keys', () => {
    expect(loadPayloadFromJson({ input: [1] })).toEqual([1]);
    expect(loadPayloadFromJson({ data: [2] })).toEqual([2]);
    expect(loadPayloadFromJson({ payload: 'AQ==' })).toBe('AQ==');
    expect(loadPayloadFromJson([3])).toEqual([3]);
  });
});

describe('control block', () => {
  it('writes FBM1 and the I/O pointers', () => {
    const block = buildControlBlock(64, { inputPtr: 0x40, inputLen: 16, outputPtr: 0x140, outputLen: 0 });
    expect(block.length).toBe(64);
    expect(Array.from(block.subarray(0, 4))).toEqual([0x46, 0x42, 0x4d, 0x31]);

    const parsed = parseControlBlock(block, 0);
    expect(parsed).toMatchObject({ magic: 0x314d4246, abiVersion: 1, inputPtr: 0x40, inputLen: 16, outputPtr: 0x140 });
    expect(parsed.reserved0).toBe(0n);
  });

  it('validates sizes and bounds', () => {
    const pointers = { inputPtr: 0, inputLen: 0, outputPtr: 0, outputLen: 0 };
    expect(() => buildControlBlock(32, pointers)).toThrow('abi.control_size must be >= 64');
    expect(() => buildControlBlock(64, { ...pointers, inputPtr: 2 ** 32 })).toThrow('input_ptr must fit in u32');
    expect(() => parseControlBlock(new Uint8Array(70), 8)).toThrow('control block out of bounds');
  });

  it('stages input before the control block, past the VM header', () => {
    const { abi } = manifestOf(manifestText());
    const writes = planInputStaging(abi, new Uint8Array(16));
    expect(writes.map((w) => [w.label, w.offset, w.data.length])).toEqual([
      ['input', VM_HEADER_SIZE + 0x40, 16],
      ['control', VM_HEADER_SIZE, 64],
    ]);
    expect(() => planInputStaging(abi, new Uint8Array(257))).toThrow(
      'input payload is 257 bytes, exceeds abi.input_max 256'
    );
  });
});

describe('output decoding', () => {
  const manifest = manifestOf(manifestText());

  function accountWithOutput(outputLen: number): Uint8Array {
    const data = new Uint8Array(VM_HEADER_SIZE + 0x140 + 64);
    const scratch = data.subarray(VM_HEADER_SIZE);
    scratch.set(buildControlBlock(64, { inputPtr: 0x40, inputLen: 0, outputPtr: 0x140, outputLen }), 0);
    scratch.set(encodeValues('i32', [7, -2]), 0x140);
    return data;
  }

  it('reads output_len bytes from the output region', () => {
    const out = readVmOutput(accountWithOutput(8), manifest.abi);
    expect(out.outputLen).toBe(8);
    expect(decodeOutput(out.bytes, 'i32')).toBe('[7,-2]');
    expect(decodeOutput(out.bytes, 'i32', schemaOutputInfo(manifest.schema).count)).toBe('[7]');
  });

  it('falls back to output_max when asked', () => {
    expect(readVmOutput(accountWithOutput(0), manifest.abi).bytes.length).toBe(0);
    expect(readVmOutput(accountWithOutput(0), manifest.abi, { useMax: true }).bytes.length).toBe(64);
  });

  it('renders hex, bytes and raw', () => {
    const bytes = new Uint8Array([1, 0xab]);
    expect(decodeOutput(bytes, 'hex')).toBe('01ab');
    expect(decodeOutput(bytes, 'u8')).toBe('[1,171]');
    expect(decodeOutput(bytes, 'raw')).toBe('<raw>');
    expect(decodeOutput(bytes, 'i32')).toBe('[]');
  });

  it('resolves auto from the schema output dtype', () => {
    expect(resolveOutputFormat('auto', manifest.schema)).toBe('i32');
    expect(resolveOutputFormat('hex', manifest.schema)).toBe('hex');
    const custom = manifestOf(manifestText({ schema: CUSTOM_SCHEMA }));
    expect(schemaOutputInfo(custom.schema)).toEqual({ dtype: 'u8', count: 16 });
  });
});
