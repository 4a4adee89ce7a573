// Filesystem and in-memory implementations of BundleStorage.

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { BundleStorage } from './types.js';

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Create a BundleStorage rooted at a directory on the local filesystem.
 */
export function createFilesystemStorage(root: string): BundleStorage {
  const resolve = (relativePath: string) => path.join(root, ...relativePath.split('/'));

  return {
    async writeFile(filePath: string, content: string): Promise<void> {
      const target = resolve(filePath);
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, content, 'utf-8');
    },

    async appendFile(filePath: string, content: string): Promise<void> {
      const target = resolve(filePath);
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.appendFile(target, content, 'utf-8');
    },

    async readFile(filePath: string): Promise<string> {
      return fs.readFile(resolve(filePath), 'utf-8');
    },

    async exists(filePath: string): Promise<boolean> {
      try {
        await fs.access(resolve(filePath));
        return true;
      } catch (error) {
        if (isMissing(error)) return false;
        throw error;
      }
    },

    async listDirectory(dirPath: string): Promise<string[]> {
      try {
        return await fs.readdir(resolve(dirPath));
      } catch (error) {
        if (isMissing(error)) return [];
        throw error;
      }
    },
  };
}

/**
 * Create an in-memory BundleStorage for testing.
 * Returns the storage and a Map of all written files.
 */
export function createInMemoryStorage(): {
  storage: BundleStorage;
  files: Map<string, string>;
} {
  const files = new Map<string, string>();

  const storage: BundleStorage = {
    async writeFile(filePath: string, content: string): Promise<void> {
      files.set(filePath, content);
    },

    async appendFile(filePath: string, content: string): Promise<void> {
      files.set(filePath, (files.get(filePath) ?? '') + content);
    },

    async readFile(filePath: string): Promise<string> {
      const content = files.get(filePath);
      if (content === undefined) {
        throw new Error(`File not found: ${filePath}`);
      }
      return content;
    },

    async exists(filePath: string): Promise<boolean> {
      const prefix = filePath.endsWith('/') ? filePath : filePath + '/';
      return files.has(filePath) || Array.from(files.keys()).some((key) => key.startsWith(prefix));
    },

    async listDirectory(dirPath: string): Promise<string[]> {
      const entries = new Set<string>();
      const prefix = dirPath.endsWith('/') ? dirPath : dirPath + '/';

      for (const filePath of files.keys()) {
        if (filePath.startsWith(prefix)) {
          const firstPart = filePath.slice(prefix.length).split('/')[0];
          if (firstPart) {
            entries.add(firstPart);
          }
        }
      }

      return Array.from(entries);
    },
  };

  return { storage, files };
}
