import { describe, it, expect } from 'vitest';
import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { runRuncardSchema, type RunRuncardArgs } from '../command-defs/runcard.js';
import { runRuncardHandler } from './run-runcard.js';
import { createRuncardText, createTestContext } from './test-support.js';

// --- Test Fixtures ---

const FIRST = '/runcards/first.yaml';
const SECOND = '/runcards/second.yaml';
const EXAMPLES = fileURLToPath(new URL('../../examples/', import.meta.url));

function createArgs(overrides: Partial<RunRuncardArgs> = {}): RunRuncardArgs {
  return runRuncardSchema.parse({ file: FIRST, store: 'memory', ...overrides });
}

// --- Tests ---

describe('runRuncardHandler', () => {
  it('runs a runcard and records the run', async () => {
    const { ctx, lines, repositories, close } = createTestContext({
      [FIRST]: createRuncardText({ name: 'First' }),
    });

    const result = await runRuncardHandler(createArgs(), ctx);

    expect(result.exitCode).toBe(0);
    expect(result.runs).toHaveLength(1);
    expect(result.runs[0]?.result?.reason).toBe('max-ticks');
    expect(await repositories.runs.get('run-1')).toMatchObject({
      name: 'First',
      runcardPath: FIRST,
      status: 'completed',
      reason: 'max-ticks',
      ticks: 3,
    });
    expect(await repositories.snapshots.count('run-1')).toBe(3);
    expect(lines).toEqual(['first.yaml: completed (max-ticks) after 3 tick(s), 3 snapshot(s), 0 dropped [run run-1]']);
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('collects and reports the runcard plots', async () => {
    const { ctx, lines } = createTestContext({
      [FIRST]: createRuncardText({ name: 'First', plots: ['  Orbit:', '    x: Time', '    y: Coordinate x'] }),
    });

    const result = await runRuncardHandler(createArgs(), ctx);

    const plots = result.runs[0]?.plots ?? [];
    expect(plots.map((plot) => plot.name)).toEqual(['Orbit']);
    expect(plots[0]?.points.map((point) => point.x)).toEqual([0, 0.5, 1]);
    expect(lines).toEqual([
      'first.yaml: completed (max-ticks) after 3 tick(s), 3 snapshot(s), 0 dropped [run run-1]',
      '  plot Orbit: 3 point(s) of Coordinate x against Time',
    ]);
  });

  it('applies the max ticks override', async () => {
    const { ctx } = createTestContext({ [FIRST]: createRuncardText({ name: 'First' }) });

    const result = await runRuncardHandler(createArgs({ maxTicks: 1 }), ctx);

    expect(result.runs[0]?.result?.ticks).toBe(1);
  });

  it('chains follow-up runcards relative to the runcard directory', async () => {
    const { ctx, repositories } = createTestContext({
      [FIRST]: createRuncardText({ name: 'First', followUp: 'second.yaml' }),
      [SECOND]: createRuncardText({ name: 'Second', followUp: 'None' }),
    });

    const result = await runRuncardHandler(createArgs(), ctx);

    expect(result.exitCode).toBe(0);
    expect(result.runs.map((run) => run.path)).toEqual([FIRST, SECOND]);
    expect((await repositories.runs.get('run-2'))?.name).toBe('Second');
  });

  it('does not chain with follow-up disabled', async () => {
    const { ctx } = createTestContext({
      [FIRST]: createRuncardText({ name: 'First', followUp: 'second.yaml' }),
    });

    const result = await runRuncardHandler(createArgs({ followUp: false }), ctx);

    expect(result.runs).toHaveLength(1);
  });

  it('stops a follow-up chain that returns to a runcard', async () => {
    const { ctx } = createTestContext({
      [FIRST]: createRuncardText({ name: 'First', followUp: 'second.yaml' }),
      [SECOND]: createRuncardText({ name: 'Second', followUp: 'first.yaml' }),
    });

    const result = await runRuncardHandler(createArgs(), ctx);

    expect(result.exitCode).toBe(2);
    expect(result.runs).toHaveLength(3);
    expect(result.runs[2]).toEqual({
      path: FIRST,
      error: 'Follow-up chain returns to /runcards/first.yaml',
      exitCode: 2,
    });
  });

  it('does not record runs for invalid runcards', async () => {
    const { ctx, lines, repositories } = createTestContext({
      [FIRST]: createRuncardText({
        name: 'First',
        alarms: ['  Escape:', '    variable: Nope', '    condition: "> 1"', '    protocol: abort'],
      }),
    });

    const result = await runRuncardHandler(createArgs(), ctx);

    expect(result.exitCode).toBe(2);
    expect(repositories._data.runs.size).toBe(0);
    expect(lines).toEqual([
      'error   Alarms.Escape.variable: Unknown variable "Nope" [UNKNOWN_REFERENCE]',
      'first.yaml: 1 error(s), 0 warning(s)',
    ]);
  });

  it('exits with 3 when an alarm aborts and does not chain', async () => {
    const { ctx, lines, repositories } = createTestContext({
      [FIRST]: createRuncardText({
        name: 'First',
        followUp: 'second.yaml',
        alarms: ['  Escape:', '    variable: Coordinate x', '    condition: "> -10"', '    protocol: abort'],
      }),
    });

    const result = await runRuncardHandler(createArgs(), ctx);

    expect(result.exitCode).toBe(3);
    expect(result.runs).toHaveLength(1);
    const run = await repositories.runs.get('run-1');
    expect(run?.status).toBe('aborted');
    expect(run?.reason?.startsWith('Alarm "Escape" on "Coordinate x" aborted the experiment: condition met')).toBe(
      true
    );
    expect(lines).toHaveLength(2);
    expect(lines[0]).toBe('first.yaml: aborted (alarm) after 1 tick(s), 1 snapshot(s), 0 dropped [run run-1]');
  });

  it('marks the run failed when the experiment cannot be built', async () => {
    const { ctx, lines, repositories } = createTestContext({
      [FIRST]: createRuncardText({ name: 'First', instrumentType: 'Oscilloscope' }),
    });

    const result = await runRuncardHandler(createArgs(), ctx);

    expect(result.exitCode).toBe(2);
    expect(await repositories.runs.get('run-1')).toMatchObject({
      status: 'failed',
      reason: 'No driver registered for instrument type "Oscilloscope". Available: HenonMapper, Echo',
    });
    expect(lines[lines.length - 1]).toBe(
      'first.yaml: failed before the first tick: No driver registered for instrument type "Oscilloscope". Available: HenonMapper, Echo'
    );
  });

  it('stops at the first tick boundary once the signal is aborted', async () => {
    const { ctx, repositories } = createTestContext({
      [FIRST]: createRuncardText({ name: 'First', followUp: 'second.yaml' }),
    });
    const controller = new AbortController();
    controller.abort();

    const result = await runRuncardHandler(createArgs(), ctx, { signal: controller.signal });

    expect(result.exitCode).toBe(0);
    expect(result.runs).toHaveLength(1);
    expect(result.runs[0]?.result).toMatchObject({ status: 'stopped', reason: 'stop-requested', ticks: 0 });
    expect((await repositories.runs.get('run-1'))?.status).toBe('stopped');
  });

  it('closes the store when a runcard cannot be read', async () => {
    const { ctx, close } = createTestContext();

    await expect(runRuncardHandler(createArgs(), ctx)).rejects.toThrow('ENOENT');
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('runs the example chain', async () => {
    const { ctx, repositories } = createTestContext();
    ctx.readFile = (path) => readFile(path, 'utf8');

    const result = await runRuncardHandler(createArgs({ file: `${EXAMPLES}henon.yaml`, maxTicks: 20 }), ctx);

    expect(result.exitCode).toBe(0);
    expect(result.runs.map((run) => run.result?.reason)).toEqual(['max-ticks', 'max-ticks']);
    expect((await repositories.runs.get('run-2'))?.name).toBe('Henon hold');
    // Save interval 5 over 20 ticks, plus the final tick
    expect(await repositories.snapshots.count('run-1')).toBe(5);
    // Plot interval 1: every tick reaches the plots
    expect(result.runs[0]?.plots?.map((plot) => [plot.name, plot.points.length])).toEqual([
      ['Attractor', 20],
      ['Distance', 20],
    ]);
  });
});
