// Bundle storage abstraction.
// Allows testing and different storage backends (filesystem, in-memory, ...)

/**
 * Paths are relative to the bundle root and use "/" separators.
 */
export interface BundleStorage {
  /**
   * Write a file, replacing any existing content.
   * Creates parent directories as needed.
   */
  writeFile(path: string, content: string): Promise<void>;

  /**
   * Append to a file, creating it (and parent directories) if needed.
   */
  appendFile(path: string, content: string): Promise<void>;

  /**
   * Read a file as text.
   */
  readFile(path: string): Promise<string>;

  exists(path: string): Promise<boolean>;

  /**
   * List entries in a directory. Empty if the directory does not exist.
   */
  listDirectory(path: string): Promise<string[]>;
}
