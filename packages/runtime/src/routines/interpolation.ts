// Routine value functions
//
// Everything here is pure: a routine's value depends only on its definition,
// the elapsed experiment time and (for sweeps) how many writes it has made.

import type { RoutineDefinition } from '@runcard/protocol';

/**
 * Piecewise-linear interpolation through (times[i], values[i]), clamped to the
 * first/last value outside the time range. Where times repeat, the later point
 * wins, giving a step.
 */
export function interpolate(times: readonly number[], values: readonly number[], t: number): number {
  const last = times.length - 1;
  if (t <= times[0]) {
    return values[0];
  }
  if (t >= times[last]) {
    return values[last];
  }

  let upper = 1;
  while (times[upper] <= t) {
    upper++;
  }
  const lower = upper - 1;
  const span = times[upper] - times[lower];
  const fraction = (t - times[lower]) / span;
  return values[lower] + fraction * (values[upper] - values[lower]);
}

/**
 * Time window in which a routine writes. An undefined end means the routine
 * never completes on time alone.
 */
export type RoutineWindow = {
  start: number;
  end: number | undefined;
};

export function windowOf(routine: RoutineDefinition): RoutineWindow {
  const { times } = routine;
  switch (routine.type) {
    case 'timecourse':
      // Clamped before the first point, so it drives its knob from the first tick
      return { start: 0, end: times[times.length - 1] };
    case 'ramp':
    case 'hold':
    case 'sweep':
      return { start: times[0], end: times[1] };
    case 'transit':
      return { start: 0, end: times[0] };
    default: {
      const _exhaustive: never = routine.type;
      throw new Error(`Unknown routine type: ${String(_exhaustive)}`);
    }
  }
}

/**
 * Target value of a routine at an elapsed time.
 *
 * @param writes - writes made so far, selects a sweep's or transit's value
 */
export function advance(routine: RoutineDefinition, elapsed: number, writes = 0): number {
  const { times, values } = routine;
  switch (routine.type) {
    case 'timecourse':
      return interpolate(times, values, elapsed);
    case 'ramp':
      return interpolate(times.slice(0, 2), values.slice(0, 2), elapsed);
    case 'hold':
      return values[0];
    case 'sweep':
      return values[writes % values.length];
    case 'transit':
      return values[Math.min(writes, values.length - 1)];
    default: {
      const _exhaustive: never = routine.type;
      throw new Error(`Unknown routine type: ${String(_exhaustive)}`);
    }
  }
}

/**
 * True once the elapsed time exceeds the routine's last control point or
 * window end.
 */
export function isComplete(routine: RoutineDefinition, elapsed: number): boolean {
  const { end } = windowOf(routine);
  return end !== undefined && elapsed > end;
}

/**
 * Value a routine leaves its knob at, if it has one.
 */
export function finalValue(routine: RoutineDefinition): number | undefined {
  switch (routine.type) {
    case 'timecourse':
      return routine.values[routine.values.length - 1];
    case 'ramp':
      return routine.values[1];
    default:
      return undefined;
  }
}
