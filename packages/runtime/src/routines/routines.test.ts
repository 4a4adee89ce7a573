// Tests for routine interpolation and the routine interpreter

import { describe, it, expect } from 'vitest';
import type { RoutineDefinition } from '@runcard/protocol';
import { ConflictingRoutineError, ValidationError } from '../errors.js';
import { advance, interpolate, isComplete, windowOf } from './interpolation.js';
import { RoutineInterpreter } from './interpreter.js';

// --- Test Fixtures ---

function createRoutine(overrides: Partial<RoutineDefinition> = {}): RoutineDefinition {
  return {
    name: 'Ramp a',
    type: 'timecourse',
    variable: 'Parameter a',
    times: [0, 3, 5.001, 60],
    values: [0, 0, 1.4, 1.4],
    ...overrides,
  };
}

// --- Tests ---

describe('interpolate', () => {
  it('interpolates between bracketing points', () => {
    const value = interpolate([0, 3, 5.001, 60], [0, 0, 1.4, 1.4], 4);

    expect(value).toBeGreaterThan(0);
    expect(value).toBeLessThan(1.4);
    expect(value).toBeCloseTo(1.4 / 2.001, 12);
  });

  it('clamps outside the time range', () => {
    const times = [0, 3, 5.001, 60];
    const values = [0, 0, 1.4, 1.4];

    expect(interpolate(times, values, 0)).toBe(0);
    expect(interpolate(times, values, -2)).toBe(0);
    expect(interpolate(times, values, 60)).toBe(1.4);
    expect(interpolate(times, values, 600)).toBe(1.4);
  });

  it('steps at repeated times', () => {
    expect(interpolate([0, 2, 2, 4], [0, 1, 5, 5], 2)).toBe(5);
    expect(interpolate([0, 2, 2, 4], [0, 1, 5, 5], 1)).toBe(0.5);
  });
});

describe('advance', () => {
  it('follows the timecourse', () => {
    const routine = createRoutine();

    expect(advance(routine, 0)).toBe(0);
    expect(advance(routine, 3)).toBe(0);
    expect(advance(routine, 60)).toBe(1.4);
  });

  it('ramps linearly between two points', () => {
    const routine = createRoutine({ type: 'ramp', times: [2, 4], values: [0, 10] });

    expect(advance(routine, 3)).toBe(5);
    expect(advance(routine, 1)).toBe(0);
  });

  it('cycles sweep values by write count', () => {
    const routine = createRoutine({ type: 'sweep', times: [0], values: [1, 2, 3] });

    expect([0, 1, 2, 3, 4].map((writes) => advance(routine, 0, writes))).toEqual([1, 2, 3, 1, 2]);
  });
});

describe('isComplete', () => {
  it('completes once elapsed time exceeds the last control point', () => {
    const routine = createRoutine();

    expect(isComplete(routine, 60)).toBe(false);
    expect(isComplete(routine, 60.01)).toBe(true);
  });

  it('never completes an open-ended hold', () => {
    const routine = createRoutine({ type: 'hold', times: [1], values: [7] });

    expect(windowOf(routine)).toEqual({ start: 1, end: undefined });
    expect(isComplete(routine, 1e9)).toBe(false);
  });
});

describe('RoutineInterpreter', () => {
  it('moves routines from pending to active to complete', () => {
    const interpreter = new RoutineInterpreter([createRoutine()]);

    expect(interpreter.state('Ramp a')).toBe('pending');
    expect(interpreter.step(0)).toEqual([{ routine: 'Ramp a', variable: 'Parameter a', value: 0 }]);
    expect(interpreter.state('Ramp a')).toBe('active');

    expect(interpreter.step(61)).toEqual([{ routine: 'Ramp a', variable: 'Parameter a', value: 1.4 }]);
    expect(interpreter.state('Ramp a')).toBe('complete');
    expect(interpreter.step(62)).toEqual([]);
    expect(interpreter.allComplete()).toBe(true);
  });

  it('waits for a window to start', () => {
    const interpreter = new RoutineInterpreter([
      createRoutine({ name: 'Ramp', type: 'ramp', times: [2, 4], values: [0, 10] }),
    ]);

    expect(interpreter.step(1)).toEqual([]);
    expect(interpreter.state('Ramp')).toBe('pending');
    expect(interpreter.step(3)).toEqual([{ routine: 'Ramp', variable: 'Parameter a', value: 5 }]);
    expect(interpreter.step(4)).toEqual([{ routine: 'Ramp', variable: 'Parameter a', value: 10 }]);
    // Final value already written
    expect(interpreter.step(5)).toEqual([]);
    expect(interpreter.state('Ramp')).toBe('complete');
  });

  it('writes one value per target per tick', () => {
    const interpreter = new RoutineInterpreter([
      createRoutine(),
      createRoutine({ name: 'Hold b', type: 'hold', variable: 'Parameter b', times: [0], values: [0.3] }),
    ]);

    const writes = interpreter.step(4);

    expect(writes.map((write) => write.variable)).toEqual(['Parameter a', 'Parameter b']);
    expect(writes[1]?.value).toBe(0.3);
  });

  it('keeps an open-ended hold active', () => {
    const interpreter = new RoutineInterpreter([
      createRoutine({ name: 'Hold', type: 'hold', times: [1], values: [7] }),
    ]);

    expect(interpreter.step(0)).toEqual([]);
    expect(interpreter.step(1)).toEqual([{ routine: 'Hold', variable: 'Parameter a', value: 7 }]);
    expect(interpreter.step(100)).toEqual([{ routine: 'Hold', variable: 'Parameter a', value: 7 }]);
    expect(interpreter.allComplete()).toBe(false);
  });

  it('cycles a sweep without an end time indefinitely', () => {
    const interpreter = new RoutineInterpreter([
      createRoutine({ name: 'Sweep', type: 'sweep', times: [0], values: [1, 2, 3] }),
    ]);

    const values = [0, 1, 2, 3, 4, 5, 6].flatMap((t) => interpreter.step(t).map((write) => write.value));

    expect(values).toEqual([1, 2, 3, 1, 2, 3, 1]);
    expect(interpreter.states()).toEqual({ Sweep: 'active' });
    expect(interpreter.allComplete()).toBe(false);
  });

  it('makes one pass through a transit', () => {
    const interpreter = new RoutineInterpreter([
      createRoutine({ name: 'Transit', type: 'transit', times: [100], values: [1, 2, 3] }),
    ]);

    const values = [0, 1, 2, 3, 4].flatMap((t) => interpreter.step(t).map((write) => write.value));

    expect(values).toEqual([1, 2, 3]);
    expect(interpreter.states()).toEqual({ Transit: 'complete' });
  });

  it('cuts a transit off at its time', () => {
    const interpreter = new RoutineInterpreter([
      createRoutine({ name: 'Transit', type: 'transit', times: [1], values: [1, 2, 3, 4] }),
    ]);

    const values = [0, 1, 2, 3].flatMap((t) => interpreter.step(t).map((write) => write.value));

    expect(values).toEqual([1, 2]);
    expect(interpreter.allComplete()).toBe(true);
  });

  it('rejects a transit without a single cut-off time', () => {
    expect(
      () => new RoutineInterpreter([createRoutine({ type: 'transit', times: [0, 5], values: [1, 2] })])
    ).toThrow('Routine "Ramp a": transit takes exactly one time, its cut-off');
  });

  it('cycles a sweep until its end time', () => {
    const interpreter = new RoutineInterpreter([
      createRoutine({ name: 'Sweep', type: 'sweep', times: [0, 10], values: [1, 2] }),
    ]);

    const values = [0, 1, 2, 3].flatMap((t) => interpreter.step(t).map((write) => write.value));

    expect(values).toEqual([1, 2, 1, 2]);
    expect(interpreter.state('Sweep')).toBe('active');
  });

  it('is never complete without routines', () => {
    expect(new RoutineInterpreter([]).allComplete()).toBe(false);
  });

  it('rejects two routines on the same variable', () => {
    const build = () =>
      new RoutineInterpreter([
        createRoutine({ name: 'First' }),
        createRoutine({ name: 'Second', type: 'hold', times: [100], values: [1] }),
      ]);

    expect(build).toThrow(ConflictingRoutineError);
    expect(build).toThrow('Variable "Parameter a" is driven by more than one routine: First, Second');
  });

  it('rejects malformed routines', () => {
    const build = () => new RoutineInterpreter([createRoutine({ name: 'Bad', times: [0, 1], values: [1] })]);

    expect(build).toThrow(ValidationError);
    expect(build).toThrow(
      'Routine "Bad": timecourse needs as many values as times (got 2 times, 1 values)'
    );
  });
});
