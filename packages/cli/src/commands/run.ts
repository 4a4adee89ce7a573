/**
 * Run command - run a runcard and its follow-ups
 */

import type { Command } from 'commander';
import { runRuncardSchema } from '../command-defs/runcard.js';
import { createCommandContext } from '../core/command-context.js';
import { runRuncardHandler } from '../handlers/run-runcard.js';

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run a runcard, then its follow-up runcards')
    .argument('<file>', 'Runcard file (YAML or JSON)')
    .option('--max-ticks <n>', 'Stop after this many ticks')
    .option('--clock <mode>', 'Clock mode (wall|simulated)')
    .option('--store <kind>', 'Where runs are recorded (memory|bundle|postgres)', 'bundle')
    .option('--output <dir>', 'Bundle directory', 'results')
    .option('--database-url <url>', 'Postgres connection string (default: DATABASE_URL)')
    .option('--no-follow-up', 'Do not chain into follow-up runcards')
    .option('--quiet', 'Only log warnings and errors', false)
    .action(async (file: string, raw: Record<string, unknown>) => {
      const args = runRuncardSchema.parse({
        ...raw,
        file,
        databaseUrl: raw.databaseUrl ?? process.env.DATABASE_URL,
      });

      const controller = new AbortController();
      const interrupt = () => controller.abort();
      process.once('SIGINT', interrupt);
      try {
        const result = await runRuncardHandler(args, createCommandContext({ quiet: args.quiet }), {
          signal: controller.signal,
        });
        process.exitCode = result.exitCode;
      } finally {
        process.off('SIGINT', interrupt);
      }
    });
}
