// Runcard validation
//
// Cross-reference checks over a parsed Runcard: every name a section refers to
// must be declared, routines must target knobs and be well-formed, and no knob
// may be driven by two routines. Everything here runs before any instrument is
// touched.

import type { Runcard } from '../types/runcard.js';
import type { RoutineDefinition } from '../types/routines.js';
import type { VariableDefinition } from '../types/variables.js';
import { TIME_AXIS } from '../types/common.js';
import {
  parseRuncard,
  type RuncardIssue,
  type RuncardWarning,
} from './schema.js';

/**
 * Result of validating a runcard
 */
export type RuncardValidationResult = {
  valid: boolean;
  errors: RuncardIssue[];
  warnings: RuncardWarning[];
};

/**
 * Result of loading a raw document: parsing plus validation
 */
export type RuncardLoadResult = RuncardValidationResult & {
  runcard: Runcard | null;
};

const SYMBOL_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Validate the cross-references of a parsed runcard.
 */
export function validateRuncard(runcard: Runcard): RuncardValidationResult {
  const errors: RuncardIssue[] = [];
  const warnings: RuncardWarning[] = [];

  checkDuplicates('Instruments', runcard.instruments, errors);
  checkDuplicates('Variables', runcard.variables, errors);
  checkDuplicates('Alarms', runcard.alarms, errors);
  checkDuplicates('Plots', runcard.plots, errors);
  checkDuplicates('Routines', runcard.routines, errors);

  const instrumentNames = new Set(runcard.instruments.map((i) => i.name));
  const variablesByName = new Map<string, VariableDefinition>(
    runcard.variables.map((v) => [v.name, v])
  );
  const usedInstruments = new Set<string>();

  // Variables
  for (const variable of runcard.variables) {
    const path = `Variables.${variable.name}`;

    if (variable.kind === 'expression') {
      for (const [symbol, target] of Object.entries(variable.definitions)) {
        if (!SYMBOL_PATTERN.test(symbol)) {
          errors.push({
            path: `${path}.definitions.${symbol}`,
            message: `"${symbol}" is not a valid expression symbol`,
            code: 'INVALID_SYMBOL',
          });
        }
        if (!variablesByName.has(target)) {
          errors.push({
            path: `${path}.definitions.${symbol}`,
            message: `Unknown variable "${target}"`,
            code: 'UNKNOWN_REFERENCE',
          });
        }
      }
      continue;
    }

    usedInstruments.add(variable.instrument);
    if (!instrumentNames.has(variable.instrument)) {
      errors.push({
        path: `${path}.instrument`,
        message: `Unknown instrument "${variable.instrument}"`,
        code: 'UNKNOWN_REFERENCE',
      });
    }
  }

  // Alarms
  for (const alarm of runcard.alarms) {
    if (!variablesByName.has(alarm.variable)) {
      errors.push({
        path: `Alarms.${alarm.name}.variable`,
        message: `Unknown variable "${alarm.variable}"`,
        code: 'UNKNOWN_REFERENCE',
      });
    }
  }

  // Plots
  for (const plot of runcard.plots) {
    const axes: Array<[string, string]> = [
      ['x', plot.x],
      ...plot.y.map((y): [string, string] => ['y', y]),
    ];
    for (const [axis, name] of axes) {
      if (name !== TIME_AXIS && !variablesByName.has(name)) {
        errors.push({
          path: `Plots.${plot.name}.${axis}`,
          message: `Unknown variable "${name}"`,
          code: 'UNKNOWN_REFERENCE',
        });
      }
    }
  }

  // Routines
  const routineTargets = new Map<string, string>();
  for (const routine of runcard.routines) {
    const path = `Routines.${routine.name}`;
    const target = variablesByName.get(routine.variable);

    if (!target) {
      errors.push({
        path: `${path}.variable`,
        message: `Unknown variable "${routine.variable}"`,
        code: 'UNKNOWN_REFERENCE',
      });
    } else if (target.kind !== 'knob') {
      errors.push({
        path: `${path}.variable`,
        message: `Routine target "${routine.variable}" is a ${target.kind}, not a knob`,
        code: 'INVALID_ROUTINE',
      });
    }

    const previous = routineTargets.get(routine.variable);
    if (previous !== undefined) {
      errors.push({
        path: `${path}.variable`,
        message: `Variable "${routine.variable}" is already driven by routine "${previous}"`,
        code: 'CONFLICTING_ROUTINE',
      });
    } else {
      routineTargets.set(routine.variable, routine.name);
    }

    for (const message of checkRoutineShape(routine)) {
      errors.push({ path, message, code: 'INVALID_ROUTINE' });
    }
  }

  // Warnings
  if (!runcard.description.name) {
    warnings.push({
      path: 'Description.name',
      message: 'Runcard has no name',
      code: 'MISSING_DESCRIPTION',
    });
  }

  if (runcard.variables.length === 0) {
    warnings.push({
      path: 'Variables',
      message: 'Runcard declares no variables',
      code: 'EMPTY_SECTION',
    });
  }

  for (const instrument of runcard.instruments) {
    if (!usedInstruments.has(instrument.name)) {
      warnings.push({
        path: `Instruments.${instrument.name}`,
        message: `Instrument "${instrument.name}" is not used by any variable`,
        code: 'UNUSED_INSTRUMENT',
      });
    }
  }

  return { valid: errors.length === 0, errors, warnings };
}

/**
 * Parse and validate a raw runcard document.
 */
export function loadRuncard(document: unknown): RuncardLoadResult {
  const parsed = parseRuncard(document);
  if (!parsed.success) {
    return { valid: false, runcard: null, errors: parsed.errors, warnings: parsed.warnings };
  }

  const result = validateRuncard(parsed.runcard);
  return {
    valid: result.valid,
    runcard: result.valid ? parsed.runcard : null,
    errors: result.errors,
    warnings: [...parsed.warnings, ...result.warnings],
  };
}

/**
 * Check the times/values shape a routine type requires.
 *
 * @returns A message per problem found
 */
export function checkRoutineShape(routine: RoutineDefinition): string[] {
  const problems: string[] = [];
  const { times, values } = routine;

  if (times.length === 0 || values.length === 0) {
    return ['times and values must not be empty'];
  }

  if ([...times, ...values].some((n) => !Number.isFinite(n))) {
    problems.push('times and values must be finite numbers');
  }

  for (let i = 1; i < times.length; i++) {
    if (times[i] < times[i - 1]) {
      problems.push(`times must be non-decreasing (${times[i - 1]} is followed by ${times[i]})`);
      break;
    }
  }

  switch (routine.type) {
    case 'timecourse':
      if (times.length !== values.length) {
        problems.push(
          `timecourse needs as many values as times (got ${times.length} times, ${values.length} values)`
        );
      }
      break;

    case 'hold':
      if (values.length !== 1) {
        problems.push('hold needs exactly one value');
      }
      if (times.length > 2) {
        problems.push('hold takes a start time and an optional end time');
      }
      break;

    case 'ramp':
      if (values.length !== 2 || times.length !== 2) {
        problems.push('ramp needs two times and two values');
      }
      break;

    case 'sweep':
      if (times.length > 2) {
        problems.push('sweep takes a start time and an optional end time');
      }
      break;

    case 'transit':
      if (times.length !== 1) {
        problems.push('transit takes exactly one time, its cut-off');
      }
      break;

    default: {
      const _exhaustive: never = routine.type;
      problems.push(`unknown routine type ${String(_exhaustive)}`);
    }
  }

  return problems;
}

function checkDuplicates(
  section: string,
  entries: ReadonlyArray<{ name: string }>,
  errors: RuncardIssue[]
): void {
  const seen = new Set<string>();
  for (const entry of entries) {
    if (seen.has(entry.name)) {
      errors.push({
        path: `${section}.${entry.name}`,
        message: `Duplicate name "${entry.name}" in ${section}`,
        code: 'DUPLICATE_DEFINITION',
      });
    }
    seen.add(entry.name);
  }
}
