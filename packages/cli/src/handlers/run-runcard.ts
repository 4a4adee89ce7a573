/**
 * Handler: Run Runcard
 *
 * Loads and runs a runcard, records the run and its saved snapshots in the
 * selected store, then chains into the runcard's follow-up while each run
 * ends cleanly.
 */

import { basename, dirname, resolve } from 'node:path';
import type { RepositoryContext } from '@runcard/repositories';
import {
  Scheduler,
  buildExperiment,
  createPlotSink,
  createRepositorySink,
  isValidationError,
  type PlotSeries,
  type PlotSink,
  type RunResult,
  type SnapshotSink,
} from '@runcard/runtime';
import type { RunRuncardArgs } from '../command-defs/runcard.js';
import type { CommandContext } from '../core/command-context.js';
import {
  EXIT_CODES,
  exitCodeForError,
  exitCodeForResult,
  type ExitCode,
} from '../core/exit-codes.js';
import { loadRuncardFile } from '../core/runcard-loader.js';
import { formatIssue, formatPlotSummary, formatRunSummary, formatValidationSummary } from './format.js';
import { issuesOf } from './validate-runcard.js';

export type RunOutcome = {
  path: string;
  runId?: string;
  result?: RunResult;

  /**
   * Series collected for the runcard's Plots, one per plot
   */
  plots?: PlotSeries[];

  error?: string;
  exitCode: ExitCode;
};

export type RunRuncardResult = {
  runs: RunOutcome[];

  /**
   * Exit code of the last runcard in the chain
   */
  exitCode: ExitCode;
};

export type RunRuncardOptions = {
  /**
   * Aborting requests a stop at the next tick boundary
   */
  signal?: AbortSignal;
};

type SingleRun = {
  outcome: RunOutcome;
  followUp: string | null;
};

export async function runRuncardHandler(
  args: RunRuncardArgs,
  ctx: CommandContext,
  options: RunRuncardOptions = {}
): Promise<RunRuncardResult> {
  const store = await ctx.openStore({
    store: args.store,
    output: args.output,
    databaseUrl: args.databaseUrl,
  });
  ctx.logger.info('Recording runs', { store: store.kind, location: store.location });

  const runs: RunOutcome[] = [];
  try {
    const visited = new Set<string>();
    let path: string | null = resolve(args.file);

    while (path !== null) {
      if (visited.has(path)) {
        const error = `Follow-up chain returns to ${path}`;
        ctx.logger.error('Follow-up chain revisits a runcard', { path });
        ctx.out(`${path}: ${error}`);
        runs.push({ path, error, exitCode: EXIT_CODES.VALIDATION });
        break;
      }
      visited.add(path);

      const { outcome, followUp } = await runOne(path, args, ctx, store.repositories, options);
      runs.push(outcome);

      const stopped = outcome.result?.reason === 'stop-requested';
      if (outcome.exitCode !== EXIT_CODES.OK || stopped || !args.followUp || followUp === null) {
        break;
      }
      path = resolve(dirname(path), followUp);
      ctx.logger.info('Chaining follow-up runcard', { path });
    }
  } finally {
    await store.close();
  }

  const last = runs[runs.length - 1];
  return { runs, exitCode: last ? last.exitCode : EXIT_CODES.OK };
}

async function runOne(
  path: string,
  args: RunRuncardArgs,
  ctx: CommandContext,
  repositories: RepositoryContext,
  options: RunRuncardOptions
): Promise<SingleRun> {
  const file = basename(path);
  const now = ctx.now ?? Date.now;

  const loaded = await loadRuncardFile(path, ctx.readFile);
  for (const warning of loaded.warnings) {
    // Cross-reference warnings are logged again by buildExperiment
    if (warning.code === 'UNKNOWN_SETTING') {
      ctx.logger.warn('Runcard warning', { path: warning.path, message: warning.message });
    }
  }
  if (!loaded.runcard) {
    for (const issue of loaded.errors) {
      ctx.out(formatIssue('error', issue));
    }
    ctx.out(formatValidationSummary(file, loaded.errors, []));
    return { outcome: { path, exitCode: EXIT_CODES.VALIDATION }, followUp: null };
  }

  const { runcard } = loaded;
  const run = await repositories.runs.create({
    name: runcard.description.name ?? file,
    description: runcard.description,
    runcardPath: path,
    startedAt: new Date(now()).toISOString(),
  });

  const plots: PlotSink | null = runcard.plots.length > 0 ? createPlotSink(runcard.plots) : null;
  const sinks: SnapshotSink[] = [createRepositorySink(repositories.snapshots, run.id)];
  if (plots) {
    sinks.push(plots);
  }

  let result: RunResult;
  try {
    const context = buildExperiment(runcard, {
      logger: ctx.logger,
      instruments: ctx.instruments,
      maxTicks: args.maxTicks,
      clock: args.clock,
      sinks,
      now: ctx.now,
      sleep: ctx.sleep,
    });

    const scheduler = new Scheduler(context);
    const stop = () => {
      if (scheduler.state !== 'terminated') {
        ctx.logger.info('Stop requested');
        scheduler.requestStop();
      }
    };
    if (options.signal?.aborted) {
      stop();
    }
    options.signal?.addEventListener('abort', stop);
    try {
      result = await scheduler.run();
    } finally {
      options.signal?.removeEventListener('abort', stop);
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    await repositories.runs.updateStatus(run.id, {
      status: 'failed',
      reason: message,
      endedAt: new Date(now()).toISOString(),
    });
    if (isValidationError(error)) {
      for (const issue of issuesOf(error)) {
        ctx.out(formatIssue('error', issue));
      }
    }
    ctx.out(`${file}: failed before the first tick: ${message}`);
    return {
      outcome: { path, runId: run.id, error: message, exitCode: exitCodeForError(error) },
      followUp: null,
    };
  }

  await repositories.runs.updateStatus(run.id, {
    status: result.status,
    reason: result.abort?.message ?? result.reason,
    ticks: result.ticks,
    endedAt: new Date(now()).toISOString(),
  });

  for (const line of formatRunSummary(file, run.id, result)) {
    ctx.out(line);
  }
  const series = plots ? plots.all() : [];
  for (const plot of series) {
    ctx.out(formatPlotSummary(plot));
  }

  return {
    outcome: {
      path,
      runId: run.id,
      result,
      ...(plots && { plots: series }),
      exitCode: exitCodeForResult(result),
    },
    followUp: runcard.settings.followUp,
  };
}
