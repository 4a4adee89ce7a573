/**
 * Command context - what handlers need from the outside world
 */

import { readFile } from 'node:fs/promises';
import {
  consoleLogger,
  withMinimumLevel,
  type EngineLogger,
  type InstrumentRegistry,
} from '@runcard/runtime';
import type { ReadFile } from './runcard-loader.js';
import { openStore, type OpenStoreFn } from './stores.js';

export type CommandContext = {
  logger: EngineLogger;

  /**
   * Report lines for the user (stdout)
   */
  out(line: string): void;

  readFile: ReadFile;
  openStore: OpenStoreFn;

  /**
   * Instrument drivers (default: the built-in virtual instruments)
   */
  instruments?: InstrumentRegistry;

  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

export function createCommandContext(options: { quiet?: boolean } = {}): CommandContext {
  return {
    logger: withMinimumLevel(consoleLogger, options.quiet ? 'warn' : 'info'),
    out: (line) => {
      process.stdout.write(`${line}\n`);
    },
    readFile: (path) => readFile(path, 'utf8'),
    openStore,
  };
}
