import { describe, expect, it } from 'vitest';

import { ERROR_CODES, ValidationError, isKilnError } from '../../src/errors/index.js';
import { manifestFromText, parseManifestText } from '../../src/manifest/loader.js';
import { patchManifest } from '../../src/manifest/patcher.js';
import { assertValidManifest, formatIssues, validateManifest } from '../../src/manifest/validator.js';
import { canonicalJson, fnv1a32, formatHash32, parseHash32, schemaHash32 } from '../../src/schema/hash.js';
import { ABI_TOML, MODEL_TOML, manifestText } from './fixtures.js';

function validate(text: string) {
  return validateManifest(parseManifestText(text));
}

describe('manifest/validator', () => {
  it('accepts the fixture manifest', () => {
    expect(validate(manifestText())).toEqual({ valid: true, errors: [] });
  });

  it('reports a missing required table', () => {
    const result = validate(manifestText({ limits: '' }));
    expect(result.valid).toBe(false);
    expect(result.errors).toContainEqual({ field: 'limits', message: 'Missing required table: [limits]' });
  });

  it('rejects unknown keys inside a section', () => {
    const result = validate(manifestText({ model: `${MODEL_TOML}color = "red"\n` }));
    expect(result.errors).toEqual([{ field: 'model.color', message: 'Unknown model key: color' }]);
  });

  it('checks abi regions against scratch bounds', () => {
    const abi = ABI_TOML.replace('input_max = 256', 'input_max = 300000');
    const result = validate(manifestText({ abi }));
    expect(result.errors).toContainEqual({
      field: 'abi.input_offset',
      message: 'input_offset + input_max exceeds scratch bounds',
      value: 300064,
    });
  });

  it('flags weights segments that name an unknown blob', () => {
    const segments = `[[segments]]
index = 0
kind = "scratch"
access = "rw"

[[segments]]
index = 1
kind = "weights"
access = "ro"
source = "weights:missing"
`;
    const result = validate(manifestText({ segments }));
    expect(result.errors).toEqual([
      { field: 'segments', message: 'weights segment references unknown blob: missing', value: 'missing' },
    ]);
  });

  it('rejects a non-table root', () => {
    expect(validateManifest(42)).toEqual({
      valid: false,
      errors: [{ field: 'root', message: 'Manifest must be a table' }],
    });
  });

  it('assertValidManifest carries every issue', () => {
    const data = parseManifestText(manifestText({ limits: '' }));
    try {
      assertValidManifest(data);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(formatIssues(err.issues)).toEqual(['limits: Missing required table: [limits]']);
      }
    }
  });
});

describe('manifest/loader', () => {
  it('builds the typed view', () => {
    const { manifest, document } = manifestFromText(manifestText(), '/m/model.toml');
    expect(document.path).toBe('/m/model.toml');
    expect(manifest.model.id).toBe('demo-model');
    expect(manifest.abi.inputOffset).toBe(0x40);
    expect(manifest.abi.outputMax).toBe(64);
    expect(manifest.limits.maxInstructions).toBe(1_000_000);
    expect(manifest.weights?.blobs.map((b) => b.name)).toEqual(['w']);
    expect(manifest.segments.map((s) => s.kind)).toEqual(['scratch', 'weights']);
  });

  it('reports TOML syntax errors with the parse code', () => {
    expect.assertions(2);
    try {
      manifestFromText('[model\n', 'broken.toml');
    } catch (err) {
      expect(isKilnError(err, ERROR_CODES.MANIFEST_PARSE)).toBe(true);
      expect(err instanceof Error && err.message.startsWith('Failed to parse manifest broken.toml:')).toBe(true);
    }
  });

  it('throws ValidationError unless validation is disabled', () => {
    const text = manifestText({ model: `${MODEL_TOML}color = "red"\n` });
    expect(() => manifestFromText(text, 'x.toml')).toThrow(ValidationError);
    expect(manifestFromText(text, 'x.toml', { validate: false }).manifest.model.id).toBe('demo-model');
  });
});

describe('manifest/patcher', () => {
  const BLOBS = `[model]
id = "x"  # keep

[[weights.blobs]]
name = "w"
size_bytes = 1

[[weights.blobs]]
name = "b"
size_bytes = 2
`;

  it('rewrites and appends keys in the matched array element only', () => {
    const out = patchManifest(BLOBS, [
      { table: 'weights.blobs', match: { key: 'name', value: 'b' }, set: { size_bytes: 16, hash: 'sha256:ab' } },
    ]);
    expect(out).toBe(`[model]
id = "x"  # keep

[[weights.blobs]]
name = "w"
size_bytes = 1

[[weights.blobs]]
name = "b"
size_bytes = 16
hash = "sha256:ab"
`);
  });

  it('appends a missing table when asked', () => {
    const out = patchManifest('[model]\nid = "x"\n', [
      { table: 'build', set: { toolchain: 'gcc' }, createIfMissing: true },
    ]);
    expect(out).toBe('[model]\nid = "x"\n\n[build]\ntoolchain = "gcc"\n');
  });

  it('refuses to patch tables that are not there', () => {
    expect(() => patchManifest('[model]\n', [{ table: 'build', set: { a: 1 } }])).toThrow(
      'build table not found in manifest'
    );
    expect(() =>
      patchManifest(BLOBS, [{ table: 'weights.blobs', match: { key: 'name', value: 'zzz' }, set: { a: 1 } }])
    ).toThrow('[[weights.blobs]] with name = "zzz" not found in manifest');
  });

  it('keeps CRLF line endings', () => {
    expect(patchManifest('[t]\r\nb = 2\r\n', [{ table: 't', set: { b: 3 } }])).toBe('[t]\r\nb = 3\r\n');
  });
});

describe('schema/hash', () => {
  it('computes FNV-1a/32', () => {
    expect(fnv1a32(new Uint8Array())).toBe(0x811c9dc5);
    expect(fnv1a32(new TextEncoder().encode('a'))).toBe(0xe40c292c);
  });

  it('serializes with sorted keys and escaped non-ASCII', () => {
    expect(canonicalJson({ b: [1, 2], a: 'é', c: null })).toBe('{"a":"\\u00e9","b":[1,2],"c":null}');
  });

  it('hashes the projected schema of a manifest', () => {
    const data = parseManifestText(manifestText());
    expect(formatHash32(schemaHash32(data))).toBe('0xCA4E3EBF');
  });

  it('ignores keys outside the projection', () => {
    const base = parseManifestText(manifestText());
    const withDoc = parseManifestText(manifestText({ model: `${MODEL_TOML}profile = "finance-int"\n` }));
    expect(schemaHash32(withDoc)).toBe(schemaHash32(base));
  });

  it('does not depend on key order', () => {
    const reordered = `[schema]
type = "vector"

[schema.vector]
output_shape = [1]
output_dtype = "i32"
input_shape = [4]
input_dtype = "i32"
`;
    const base = parseManifestText(manifestText());
    expect(schemaHash32(parseManifestText(manifestText({ schema: reordered })))).toBe(schemaHash32(base));
  });

  describe('changes when any hashed field changes', () => {
    const SECTIONS: Record<string, Record<string, unknown>> = {
      vector: { input_dtype: 'i32', input_shape: [4], output_dtype: 'i32', output_shape: [1] },
      time_series: { input_dtype: 'f32', window: 8, features: 3, stride: 2, output_dtype: 'f32', output_shape: [1] },
      graph: {
        input_dtype: 'f32',
        node_feature_dim: 4,
        edge_feature_dim: 2,
        max_nodes: 16,
        max_edges: 32,
        output_dtype: 'f32',
        output_shape: [2],
      },
      custom: {
        input_blob_size: 16,
        output_blob_size: 8,
        alignment: 4,
        fields: [{ name: 'x', offset: 0, dtype: 'i32', shape: [4] }],
      },
    };

    function flip(value: unknown): unknown {
      if (typeof value === 'number') return value + 1;
      if (typeof value === 'string') return value === 'i32' ? 'f32' : 'i32';
      if (Array.isArray(value)) return [...value, 1];
      return value;
    }

    function hashOf(type: string, section: Record<string, unknown>): number {
      return schemaHash32({ schema: { type, [type]: section } });
    }

    for (const [type, section] of Object.entries(SECTIONS)) {
      for (const key of Object.keys(section).filter((k) => k !== 'fields')) {
        it(`${type}.${key}`, () => {
          expect(hashOf(type, { ...section, [key]: flip(section[key]) })).not.toBe(hashOf(type, section));
        });
      }
    }

    for (const key of ['name', 'offset', 'dtype', 'shape'] as const) {
      it(`custom.fields[].${key}`, () => {
        const field = { name: 'x', offset: 0, dtype: 'i32', shape: [4] };
        const flipped = { ...field, [key]: key === 'name' ? 'y' : flip(field[key]) };
        expect(hashOf('custom', { ...SECTIONS.custom, fields: [flipped] })).not.toBe(hashOf('custom', SECTIONS.custom));
      });
    }

    it('schema type', () => {
      expect(hashOf('graph', SECTIONS.vector)).not.toBe(hashOf('vector', SECTIONS.vector));
    });
  });

  it('parses and formats hash strings', () => {
    expect(formatHash32(0xab)).toBe('0x000000AB');
    expect(parseHash32('0xCA4E3EBF')).toBe(0xca4e3ebf);
    expect(() => parseHash32('CA4E3EBF')).toThrow('schema hash must be 32-bit hex (0xXXXXXXXX)');
  });
});
