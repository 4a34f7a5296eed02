/**
 * In-memory BlobIO, keyed by path. Used by tests and dry runs.
 *
 * @module converter/io/memory
 */

import { createHash } from 'crypto';

import { KilnIOError } from '../../errors/index.js';
import type { BlobIO } from './types.js';

export class MemoryBlobIO implements BlobIO {
  readonly files = new Map<string, Uint8Array>();
  readonly dirs = new Set<string>();

  constructor(initial: Record<string, Uint8Array | string> = {}) {
    for (const [path, data] of Object.entries(initial)) {
      this.files.set(path, typeof data === 'string' ? new TextEncoder().encode(data) : data);
    }
  }

  async readFile(path: string): Promise<Uint8Array> {
    const data = this.files.get(path);
    if (!data) {
      throw new KilnIOError(path, `File not found: ${path}`);
    }
    return data;
  }

  async readText(path: string): Promise<string> {
    return new TextDecoder().decode(await this.readFile(path));
  }

  async writeFile(path: string, data: Uint8Array): Promise<void> {
    this.files.set(path, data.slice());
  }

  async writeTextAtomic(path: string, text: string): Promise<void> {
    this.files.set(path, new TextEncoder().encode(text));
  }

  async exists(path: string): Promise<boolean> {
    return this.files.has(path) || this.dirs.has(path);
  }

  async mkdir(path: string): Promise<void> {
    this.dirs.add(path);
  }

  computeHash(data: Uint8Array): string {
    return createHash('sha256').update(data).digest('hex');
  }

  /** Text of a stored file, for assertions */
  text(path: string): string {
    return new TextDecoder().decode(this.files.get(path) ?? new Uint8Array(0));
  }
}
