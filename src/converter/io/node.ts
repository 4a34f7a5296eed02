/**
 * node.ts - Node.js I/O Adapter for blob files
 *
 * Implements BlobIO using Node.js fs APIs.
 *
 * @module converter/io/node
 */

import { access, mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { createHash } from 'crypto';

import { KilnIOError } from '../../errors/index.js';
import { writeFileAtomic } from '../../manifest/patcher.js';
import type { BlobIO } from './types.js';

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Node.js implementation of the BlobIO interface.
 */
export class NodeBlobIO implements BlobIO {
  async readFile(path: string): Promise<Uint8Array> {
    try {
      return new Uint8Array(await readFile(path));
    } catch (err) {
      if (isMissing(err)) {
        throw new KilnIOError(path, `File not found: ${path}`);
      }
      throw err;
    }
  }

  async readText(path: string): Promise<string> {
    return new TextDecoder().decode(await this.readFile(path));
  }

  /**
   * Write data, creating the parent directory when needed.
   */
  async writeFile(path: string, data: Uint8Array): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, data);
  }

  async writeTextAtomic(path: string, text: string): Promise<void> {
    await writeFileAtomic(path, text);
  }

  async exists(path: string): Promise<boolean> {
    try {
      await access(path);
      return true;
    } catch (err) {
      if (isMissing(err)) return false;
      throw err;
    }
  }

  async mkdir(path: string): Promise<void> {
    await mkdir(path, { recursive: true });
  }

  computeHash(data: Uint8Array): string {
    return createHash('sha256').update(data).digest('hex');
  }
}
