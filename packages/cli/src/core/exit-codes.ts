/**
 * Process exit codes and how run outcomes map onto them
 */

import { InstrumentIOError, isValidationError, type RunResult } from '@runcard/runtime';

export const EXIT_CODES = {
  OK: 0,
  ERROR: 1,
  VALIDATION: 2,
  ALARM_ABORT: 3,
  INSTRUMENT_IO: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeForResult(result: RunResult): ExitCode {
  switch (result.reason) {
    case 'routines-complete':
    case 'max-ticks':
    case 'duration':
    case 'stop-requested':
      return EXIT_CODES.OK;
    case 'alarm':
    case 'hold-exhausted':
      return EXIT_CODES.ALARM_ABORT;
    case 'instrument-io':
      return EXIT_CODES.INSTRUMENT_IO;
    case 'expression':
    case 'error':
      return EXIT_CODES.ERROR;
    default: {
      const _exhaustive: never = result.reason;
      throw new Error(`Unknown termination reason: ${String(_exhaustive)}`);
    }
  }
}

/**
 * Exit code for an error thrown before or outside the tick loop
 */
export function exitCodeForError(error: unknown): ExitCode {
  if (isValidationError(error)) {
    return EXIT_CODES.VALIDATION;
  }
  if (error instanceof InstrumentIOError) {
    return EXIT_CODES.INSTRUMENT_IO;
  }
  return EXIT_CODES.ERROR;
}
