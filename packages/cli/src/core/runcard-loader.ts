/**
 * Runcard loader - read a YAML or JSON runcard file and validate it
 */

import { extname } from 'node:path';
import * as yaml from 'js-yaml';
import { loadRuncard, type RuncardLoadResult } from '@runcard/protocol';

export type RuncardFormat = 'yaml' | 'json';

export type ReadFile = (path: string) => Promise<string>;

export type LoadedRuncard = RuncardLoadResult & {
  path: string;
};

/**
 * Detect the runcard format by file extension. Anything but .json is read as
 * YAML, which also accepts JSON.
 */
export function detectRuncardFormat(path: string): RuncardFormat {
  return extname(path).toLowerCase() === '.json' ? 'json' : 'yaml';
}

/**
 * Parse runcard text into a raw document.
 *
 * @throws Error with the parser's message on syntax errors
 */
export function parseRuncardText(text: string, format: RuncardFormat): unknown {
  if (format === 'json') {
    return JSON.parse(text);
  }
  return yaml.load(text);
}

/**
 * Read, parse and validate a runcard file. Syntax errors come back as a
 * single issue on the whole document.
 */
export async function loadRuncardFile(path: string, readFile: ReadFile): Promise<LoadedRuncard> {
  const text = await readFile(path);

  let document: unknown;
  try {
    document = parseRuncardText(text, detectRuncardFormat(path));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      path,
      valid: false,
      runcard: null,
      errors: [{ path: 'runcard', message: `Cannot parse ${path}: ${message}`, code: 'INVALID_VALUE' }],
      warnings: [],
    };
  }

  return { path, ...loadRuncard(document) };
}
