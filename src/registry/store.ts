/**
 * Registry storage backends.
 *
 * @module registry/store
 */

import { dirname } from 'path';

import { NodeBlobIO } from '../converter/io/node.js';
import type { BlobIO } from '../converter/io/types.js';

/** Where the registry text lives. `read` returns null when nothing is stored yet. */
export interface RegistryStore {
  read(): Promise<string | null>;
  write(text: string): Promise<void>;
}

export class FileRegistryStore implements RegistryStore {
  readonly path: string;
  private readonly io: BlobIO;

  constructor(path: string, io: BlobIO = new NodeBlobIO()) {
    this.path = path;
    this.io = io;
  }

  async read(): Promise<string | null> {
    if (!(await this.io.exists(this.path))) return null;
    return this.io.readText(this.path);
  }

  async write(text: string): Promise<void> {
    await this.io.mkdir(dirname(this.path));
    await this.io.writeTextAtomic(this.path, text);
  }
}

export class MemoryRegistryStore implements RegistryStore {
  text: string | null;

  constructor(text: string | null = null) {
    this.text = text;
  }

  async read(): Promise<string | null> {
    return this.text;
  }

  async write(text: string): Promise<void> {
    this.text = text;
  }
}
