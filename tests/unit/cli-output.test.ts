import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { writeOutput } from '../../cli/commands/payload.js';
import { setLogLevel } from '../../src/debug/index.js';
import { manifestFromText } from '../../src/manifest/loader.js';
import { wrapEnvelope } from '../../src/payload/envelope.js';
import { manifestText } from './fixtures.js';

describe('cli/output', () => {
  const { manifest } = manifestFromText(manifestText(), 'model.toml');
  const enveloped = wrapEnvelope(new Uint8Array([1, 2, 3, 4]), { schemaId: 1, crc: true });

  let written: number[][];
  let printed: string[];
  let logged: string[];

  beforeEach(() => {
    setLogLevel('info');
    written = [];
    printed = [];
    logged = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      written.push(typeof chunk === 'string' ? [...new TextEncoder().encode(chunk)] : [...chunk]);
      return true;
    });
    vi.spyOn(console, 'log').mockImplementation((msg: unknown) => {
      printed.push(String(msg));
    });
    vi.spyOn(console, 'error').mockImplementation((msg: unknown) => {
      logged.push(String(msg));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes only the payload bytes to stdout for raw output', () => {
    writeOutput(manifest, enveloped, { format: 'raw' });
    expect(written).toEqual([[1, 2, 3, 4]]);
    expect(printed).toEqual([]);
    expect(logged).toHaveLength(1);
    expect(logged[0]).toMatch(/\[Payload\] FBH1 schema_id 1, 4 bytes, crc ok$/);
  });

  it('decodes with the schema output dtype in auto mode', () => {
    writeOutput(manifest, enveloped, { format: 'auto' });
    expect(written).toEqual([]);
    expect(printed).toEqual([`[${0x04030201}]`]);
  });

  it('rejects unknown formats', () => {
    expect(() => writeOutput(manifest, enveloped, { format: 'f64' })).toThrow('Unknown output format: f64');
  });
});
