// Table source abstraction.
// Allows testing and different storage backends (filesystem, in-memory, etc.)

/**
 * Abstraction for reading table files as text.
 */
export interface TableReader {
  /**
   * Read a file as text.
   */
  readFile(path: string): Promise<string>;
}

/**
 * Locations of the two reference tables.
 */
export type TablePaths = {
  coefficients: string;
  emissivities: string;
};
