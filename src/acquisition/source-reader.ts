/**
 * Raw Extract Readers
 *
 * Raw extracts live under `raw/` either in a local directory or in a store
 * container. Both readers take paths relative to that root.
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import { TransportError, errorMessage } from '../core/errors.js';
import type { BlobStore } from '../storage/blob-store.js';

export interface SourceReader {
  /** Printable location of a relative path */
  locate(relativePath: string): string;
  /** Read a file as UTF-8 text */
  readText(relativePath: string): Promise<string>;
}

/**
 * Reads extracts from a local directory
 */
export class LocalSourceReader implements SourceReader {
  constructor(private readonly rootDir: string) {}

  locate(relativePath: string): string {
    return join(this.rootDir, relativePath);
  }

  async readText(relativePath: string): Promise<string> {
    const path = this.locate(relativePath);
    try {
      return await readFile(path, 'utf-8');
    } catch (error) {
      throw new TransportError(path, `Cannot read file: ${errorMessage(error)}`, error);
    }
  }
}

/**
 * Reads extracts from a store container
 */
export class BlobSourceReader implements SourceReader {
  constructor(
    private readonly store: BlobStore,
    private readonly container: string
  ) {}

  locate(relativePath: string): string {
    return this.store.locate(this.container, relativePath);
  }

  readText(relativePath: string): Promise<string> {
    return this.store.getText(this.container, relativePath);
  }
}
