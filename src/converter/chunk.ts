/**
 * Blob Chunking
 *
 * Splits weights files into `<stem>_chunk<i>.bin` pieces for upload.
 *
 * @module converter/chunk
 */

import { basename, dirname, extname, join } from 'path';

import { DEFAULT_CHUNK_SIZE } from '../config/schema/index.js';
import { ConversionError } from '../errors/index.js';
import { log } from '../debug/index.js';
import { manifestFromText, resolveManifestPath } from '../manifest/loader.js';
import { NodeBlobIO } from './io/node.js';
import type { BlobIO } from './io/types.js';

export interface ChunkResult {
  source: string;
  chunks: string[];
}

export function chunkPath(source: string, index: number, outDir: string): string {
  const stem = basename(source, extname(source));
  return join(outDir, `${stem}_chunk${index}.bin`);
}

/**
 * Split bytes into pieces of at most `chunkSize`. Empty input gives none.
 */
export function splitChunks(data: Uint8Array, chunkSize: number): Uint8Array[] {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ConversionError('chunk_size must be > 0');
  }
  const chunks: Uint8Array[] = [];
  for (let pos = 0; pos < data.length; pos += chunkSize) {
    chunks.push(data.subarray(pos, Math.min(pos + chunkSize, data.length)));
  }
  return chunks;
}

export async function chunkFile(
  path: string,
  chunkSize: number,
  outDir: string,
  io: BlobIO = new NodeBlobIO()
): Promise<ChunkResult> {
  if (!(await io.exists(path))) {
    throw new ConversionError(`Weights file not found: ${path}`);
  }
  const pieces = splitChunks(await io.readFile(path), chunkSize);
  await io.mkdir(outDir);

  const chunks: string[] = [];
  for (let i = 0; i < pieces.length; i++) {
    const out = chunkPath(path, i, outDir);
    await io.writeFile(out, pieces[i]);
    chunks.push(out);
  }
  log.verbose('Chunk', `${path}: ${chunks.length} chunk(s) of <= ${chunkSize} bytes`);
  return { source: path, chunks };
}

/**
 * Chunk every blob of a manifest. `chunkSize` overrides each blob's
 * `chunk_size`; blobs without one use 1 MiB. Chunks go next to the manifest
 * unless `outDir` is given.
 */
export async function chunkManifest(
  manifestPath: string,
  options: { chunkSize?: number; outDir?: string } = {},
  io: BlobIO = new NodeBlobIO()
): Promise<ChunkResult[]> {
  const { manifest } = manifestFromText(await io.readText(manifestPath), manifestPath, { validate: false });
  if (!manifest.weights) {
    throw new ConversionError('weights table missing in manifest');
  }
  if (manifest.weights.blobs.length === 0) {
    throw new ConversionError('weights.blobs missing in manifest');
  }

  const results: ChunkResult[] = [];
  for (const blob of manifest.weights.blobs) {
    const size = options.chunkSize ?? blob.chunkSize ?? DEFAULT_CHUNK_SIZE;
    const source = resolveManifestPath(manifestPath, blob.file);
    results.push(await chunkFile(source, size, options.outDir ?? dirname(manifestPath), io));
  }
  return results;
}
