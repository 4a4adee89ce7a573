/**
 * Validate command - check a runcard without running it
 */

import type { Command } from 'commander';
import { validateRuncardSchema } from '../command-defs/runcard.js';
import { createCommandContext } from '../core/command-context.js';
import { validateRuncardHandler } from '../handlers/validate-runcard.js';

export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Check a runcard for errors without touching any instrument')
    .argument('<file>', 'Runcard file (YAML or JSON)')
    .action(async (file: string) => {
      const args = validateRuncardSchema.parse({ file });
      const result = await validateRuncardHandler(args, createCommandContext());
      process.exitCode = result.exitCode;
    });
}
