// Filesystem and in-memory implementations of TableReader.

import * as fs from 'node:fs/promises';
import type { TableReader } from './types.js';

/**
 * Create a TableReader that reads from the local filesystem.
 */
export function createFilesystemReader(): TableReader {
  return {
    async readFile(filePath: string): Promise<string> {
      return fs.readFile(filePath, 'utf-8');
    },
  };
}

/**
 * Create an in-memory TableReader from a Map of files.
 */
export function createInMemoryReader(files: Map<string, string>): TableReader {
  return {
    async readFile(filePath: string): Promise<string> {
      const content = files.get(filePath);
      if (content === undefined) {
        throw new Error(`File not found: ${filePath}`);
      }
      return content;
    },
  };
}
