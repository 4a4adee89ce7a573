// Shared fixtures for handler tests

import { vi } from 'vitest';
import { createInMemoryRepositoryContext } from '@runcard/repositories';
import { silentLogger } from '@runcard/runtime';
import type { CommandContext } from '../core/command-context.js';

export type RuncardTextOptions = {
  name: string;
  followUp?: string;
  instrumentType?: string;
  settings?: string[];
  variables?: string[];
  alarms?: string[];
  plots?: string[];
};

/**
 * A small Henon-map runcard that runs three simulated ticks
 */
export function createRuncardText(options: RuncardTextOptions): string {
  return [
    'Description:',
    `  name: ${options.name}`,
    'Settings:',
    '  step interval: 0.5',
    '  clock: simulated',
    '  max ticks: 3',
    ...(options.followUp ? [`  follow-up: ${options.followUp}`] : []),
    ...(options.settings ?? []),
    'Instruments:',
    '  Mapper:',
    `    type: ${options.instrumentType ?? 'HenonMapper'}`,
    'Variables:',
    '  Parameter a:',
    '    instrument: Mapper',
    '    knob: a',
    '    preset: 1.0',
    '  Coordinate x:',
    '    instrument: Mapper',
    '    meter: x',
    ...(options.variables ?? []),
    ...(options.alarms ? ['Alarms:', ...options.alarms] : []),
    ...(options.plots ? ['Plots:', ...options.plots] : []),
  ].join('\n');
}

export function createTestContext(files: Record<string, string> = {}) {
  const lines: string[] = [];
  const repositories = createInMemoryRepositoryContext();
  const close = vi.fn(async () => undefined);

  const ctx: CommandContext = {
    logger: silentLogger,
    out: (line) => {
      lines.push(line);
    },
    readFile: async (path) => {
      const text = files[path];
      if (text === undefined) {
        throw new Error(`ENOENT: no such file ${path}`);
      }
      return text;
    },
    openStore: async () => ({ kind: 'memory', repositories, location: 'memory', close }),
  };

  return { ctx, lines, repositories, close };
}
