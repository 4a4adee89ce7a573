#!/usr/bin/env node

/**
 * runcard CLI entry point
 */

import { program } from 'commander';
import { consoleLogger } from '@runcard/runtime';
import { z } from 'zod';
import { registerValidateCommand } from '../commands/validate.js';
import { registerRunCommand } from '../commands/run.js';
import { EXIT_CODES, exitCodeForError } from '../core/exit-codes.js';

program
  .name('runcard')
  .description('Run configuration-driven experiments described by runcards')
  .version('0.1.0');

registerValidateCommand(program);
registerRunCommand(program);

program.configureOutput({
  writeErr: (str) => {
    process.stderr.write(str);
  },
});

async function main() {
  try {
    await program.parseAsync();
  } catch (error) {
    if (error instanceof z.ZodError) {
      for (const issue of error.issues) {
        console.error(`Error: --${issue.path.join('.')}: ${issue.message}`);
      }
      process.exitCode = EXIT_CODES.VALIDATION;
      return;
    }
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Error: ${message}`);
    process.exitCode = exitCodeForError(error);
  }
}

main().catch((error: unknown) => {
  consoleLogger.error('Unhandled error in CLI', { error: String(error) });
  process.exitCode = EXIT_CODES.ERROR;
});
