import { describe, it, expect } from 'vitest';
import { InstrumentIOError, ValidationError, type RunResult } from '@runcard/runtime';
import { EXIT_CODES, exitCodeForError, exitCodeForResult } from './exit-codes.js';

function createResult(overrides: Partial<RunResult> = {}): RunResult {
  return {
    status: 'completed',
    reason: 'max-ticks',
    ticks: 10,
    elapsed: 10,
    snapshots: 10,
    dropped: 0,
    lastSnapshotAt: null,
    ...overrides,
  };
}

describe('exitCodeForResult', () => {
  it('maps clean endings to 0', () => {
    expect(exitCodeForResult(createResult())).toBe(0);
    expect(exitCodeForResult(createResult({ reason: 'routines-complete' }))).toBe(0);
    expect(exitCodeForResult(createResult({ reason: 'duration' }))).toBe(0);
    expect(exitCodeForResult(createResult({ status: 'stopped', reason: 'stop-requested' }))).toBe(0);
  });

  it('maps alarm aborts to 3', () => {
    expect(exitCodeForResult(createResult({ status: 'aborted', reason: 'alarm' }))).toBe(3);
    expect(exitCodeForResult(createResult({ status: 'aborted', reason: 'hold-exhausted' }))).toBe(3);
  });

  it('maps instrument failures to 4', () => {
    expect(exitCodeForResult(createResult({ status: 'aborted', reason: 'instrument-io' }))).toBe(4);
  });

  it('maps other failures to 1', () => {
    expect(exitCodeForResult(createResult({ status: 'failed', reason: 'expression' }))).toBe(1);
    expect(exitCodeForResult(createResult({ status: 'failed', reason: 'error' }))).toBe(1);
  });
});

describe('exitCodeForError', () => {
  it('distinguishes validation and instrument errors', () => {
    expect(exitCodeForError(new ValidationError('bad runcard'))).toBe(EXIT_CODES.VALIDATION);
    expect(exitCodeForError(new InstrumentIOError('Rig', 'level', 'connect', 'refused'))).toBe(
      EXIT_CODES.INSTRUMENT_IO
    );
    expect(exitCodeForError(new Error('boom'))).toBe(EXIT_CODES.ERROR);
    expect(exitCodeForError('boom')).toBe(EXIT_CODES.ERROR);
  });
});
