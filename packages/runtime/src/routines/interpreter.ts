// Routine interpreter - per-routine state and the writes of one tick

import { checkRoutineShape, type Name, type RoutineDefinition, type RoutineState } from '@runcard/protocol';
import { ConflictingRoutineError, ValidationError } from '../errors.js';
import { advance, finalValue, isComplete, windowOf } from './interpolation.js';

/**
 * One knob write requested by a routine
 */
export type RoutineWrite = {
  routine: Name;
  variable: Name;
  value: number;
};

type RoutineRuntime = {
  definition: RoutineDefinition;
  state: RoutineState;
  writes: number;
  lastValue: number | undefined;
};

/**
 * Drives every routine of an experiment.
 *
 * State machine per routine: pending -> active -> complete. A complete routine
 * makes no further writes; if it completes between two ticks, the tick that
 * notices writes its final value once so the knob ends where the routine does.
 */
export class RoutineInterpreter {
  private readonly runtimes: RoutineRuntime[];

  /**
   * @throws ConflictingRoutineError if two routines target the same variable
   * @throws ValidationError if a routine's times/values are malformed
   */
  constructor(routines: readonly RoutineDefinition[]) {
    const targets = new Map<Name, Name[]>();
    for (const routine of routines) {
      const problems = checkRoutineShape(routine);
      if (problems.length > 0) {
        throw new ValidationError(`Routine "${routine.name}": ${problems.join('; ')}`, {
          field: routine.name,
          issues: problems.map((message) => ({
            path: `Routines.${routine.name}`,
            message,
            code: 'INVALID_ROUTINE',
          })),
        });
      }

      const names = targets.get(routine.variable) ?? [];
      names.push(routine.name);
      targets.set(routine.variable, names);
    }

    for (const [variable, names] of targets) {
      if (names.length > 1) {
        throw new ConflictingRoutineError(variable, names);
      }
    }

    this.runtimes = routines.map((definition) => ({
      definition,
      state: 'pending',
      writes: 0,
      lastValue: undefined,
    }));
  }

  get size(): number {
    return this.runtimes.length;
  }

  state(name: Name): RoutineState | undefined {
    return this.runtimes.find((runtime) => runtime.definition.name === name)?.state;
  }

  states(): Record<Name, RoutineState> {
    const states: Record<Name, RoutineState> = {};
    for (const runtime of this.runtimes) {
      states[runtime.definition.name] = runtime.state;
    }
    return states;
  }

  /**
   * Variables driven by a routine
   */
  targets(): Name[] {
    return this.runtimes.map((runtime) => runtime.definition.variable);
  }

  /**
   * True when there is at least one routine and every routine is complete.
   */
  allComplete(): boolean {
    return this.runtimes.length > 0 && this.runtimes.every((runtime) => runtime.state === 'complete');
  }

  /**
   * Advance every routine to the elapsed time and collect this tick's writes,
   * at most one per target variable.
   */
  step(elapsed: number): RoutineWrite[] {
    const writes: RoutineWrite[] = [];

    for (const runtime of this.runtimes) {
      if (runtime.state === 'complete') continue;

      const { definition } = runtime;

      if (this.finished(runtime, elapsed)) {
        runtime.state = 'complete';
        const final = finalValue(definition);
        if (final !== undefined && runtime.lastValue !== final) {
          writes.push({ routine: definition.name, variable: definition.variable, value: final });
          runtime.lastValue = final;
        }
        continue;
      }

      if (elapsed < windowOf(definition).start) continue;

      runtime.state = 'active';
      const value = advance(definition, elapsed, runtime.writes);
      writes.push({ routine: definition.name, variable: definition.variable, value });
      runtime.writes++;
      runtime.lastValue = value;
    }

    return writes;
  }

  private finished(runtime: RoutineRuntime, elapsed: number): boolean {
    const { definition } = runtime;
    if (isComplete(definition, elapsed)) {
      return true;
    }
    // A transit stops once every value has been written
    return definition.type === 'transit' && runtime.writes >= definition.values.length;
  }
}
