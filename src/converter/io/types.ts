/**
 * Blob I/O adapter interface.
 *
 * Conversion, packing and chunking touch the filesystem only through this
 * interface so they can run against an in-memory store.
 *
 * @module converter/io/types
 */

export interface BlobIO {
  /** Read a whole file; throws KilnIOError when it does not exist */
  readFile(path: string): Promise<Uint8Array>;
  readText(path: string): Promise<string>;
  writeFile(path: string, data: Uint8Array): Promise<void>;
  /** Replace a text file without exposing a partially written state */
  writeTextAtomic(path: string, text: string): Promise<void>;
  exists(path: string): Promise<boolean>;
  /** Create a directory and its parents */
  mkdir(path: string): Promise<void>;
  /** Hex SHA-256 of the data */
  computeHash(data: Uint8Array): string;
}
