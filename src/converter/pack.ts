/**
 * Blob Packing
 *
 * Hashes every `[[weights.blobs]]` file and writes its `hash` and
 * `size_bytes` back into the manifest.
 *
 * @module converter/pack
 */

import { TREE_NODE_BYTES } from '../config/schema/index.js';
import { ConversionError } from '../errors/index.js';
import { log } from '../debug/index.js';
import { manifestFromText, resolveManifestPath } from '../manifest/loader.js';
import { patchManifest, type TablePatch } from '../manifest/patcher.js';
import { isTreeLayout } from '../manifest/validator.js';
import { NodeBlobIO } from './io/node.js';
import type { BlobIO } from './io/types.js';
import { treePlaceholder } from './tree.js';

export interface BlobUpdate {
  name: string;
  file: string;
  /** `sha256:<hex>` */
  hash: string;
  sizeBytes: number;
  /** The file did not exist and a placeholder was written */
  created: boolean;
}

export interface PackOptions {
  /** Write a placeholder of `size_bytes` for blobs whose file is missing */
  createMissing?: boolean;
  /** Also patch `size_bytes` (default true) */
  updateSize?: boolean;
  /** Patch the manifest on disk (default true) */
  write?: boolean;
}

/**
 * Placeholder contents for a missing blob. Tree layouts get leaf-sentinel
 * nodes when the size holds a whole number of them; everything else is zeros.
 */
export function placeholderBlob(layout: string | undefined, sizeBytes: number): Uint8Array {
  if (isTreeLayout(layout) && sizeBytes % TREE_NODE_BYTES === 0) {
    return treePlaceholder(sizeBytes);
  }
  return new Uint8Array(sizeBytes);
}

export function blobPatch(update: BlobUpdate, updateSize: boolean): TablePatch {
  const set: Record<string, string | number> = { hash: update.hash };
  if (updateSize) set.size_bytes = update.sizeBytes;
  return { table: 'weights.blobs', match: { key: 'name', value: update.name }, set };
}

export async function packManifest(
  manifestPath: string,
  options: PackOptions = {},
  io: BlobIO = new NodeBlobIO()
): Promise<BlobUpdate[]> {
  const text = await io.readText(manifestPath);
  const { manifest } = manifestFromText(text, manifestPath, { validate: false });
  const weights = manifest.weights;
  if (!weights || weights.blobs.length === 0) {
    log.warn('Pack', 'No weights blobs in manifest');
    return [];
  }

  const updates: BlobUpdate[] = [];
  for (const blob of weights.blobs) {
    const path = resolveManifestPath(manifestPath, blob.file);
    let created = false;
    if (!(await io.exists(path))) {
      if (!options.createMissing) {
        throw new ConversionError(`Weights blob not found: ${path}`);
      }
      if (blob.sizeBytes <= 0) {
        throw new ConversionError(`Missing or invalid size_bytes for ${path}`);
      }
      await io.writeFile(path, placeholderBlob(weights.layout, blob.sizeBytes));
      created = true;
      log.info('Pack', `Created placeholder ${path} (${blob.sizeBytes} bytes)`);
    }

    const data = await io.readFile(path);
    const update: BlobUpdate = {
      name: blob.name,
      file: blob.file,
      hash: `sha256:${io.computeHash(data)}`,
      sizeBytes: data.length,
      created,
    };
    log.verbose('Pack', `${update.name}: ${update.hash} (${update.sizeBytes} bytes)`);
    updates.push(update);
  }

  const updateSize = options.updateSize ?? true;
  const patched = patchManifest(text, updates.map((u) => blobPatch(u, updateSize)));
  if ((options.write ?? true) && patched !== text) {
    await io.writeTextAtomic(manifestPath, patched);
  }
  return updates;
}
