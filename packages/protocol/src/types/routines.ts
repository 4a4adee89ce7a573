// Routine declarations - time-parameterized setpoint schedules

import type { Name } from './common.js';

/**
 * - timecourse: piecewise-linear through (times[i], values[i]), clamped outside
 * - hold: values[0] between times[0] and times[1] (open-ended without times[1])
 * - ramp: values[0] -> values[1] linearly between times[0] and times[1]
 * - sweep: cycles through values, one per tick, from times[0] until times[1]
 *   (indefinitely without times[1])
 * - transit: one pass through values, one per tick, cut off after times[0]
 */
export type RoutineType = 'timecourse' | 'hold' | 'ramp' | 'sweep' | 'transit';

export const ROUTINE_TYPES: readonly RoutineType[] = ['timecourse', 'hold', 'ramp', 'sweep', 'transit'];

export type RoutineDefinition = {
  name: Name;
  type: RoutineType;

  /**
   * Target variable (must be a knob)
   */
  variable: Name;

  /**
   * Non-decreasing times in seconds of experiment time
   */
  times: number[];

  values: number[];
};

export type RoutineState = 'pending' | 'active' | 'complete';

/**
 * Map a runcard routine type ("Timecourse", "ramp", ...) to a RoutineType.
 */
export function toRoutineType(value: string): RoutineType | null {
  const normalized = value.trim().toLowerCase();
  return ROUTINE_TYPES.find((type) => type === normalized) ?? null;
}
