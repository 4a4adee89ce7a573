// Experiment context - everything one run of a runcard needs, built and
// validated before any instrument is touched

import {
  validateRuncard,
  type ClockMode,
  type Runcard,
  type RuncardSettings,
} from '@runcard/protocol';
import {
  ExpressionError,
  ValidationError,
  isValidationError,
  type ValidationIssue,
} from './errors.js';
import type { EngineLogger } from './logging.js';
import { consoleLogger } from './logging.js';
import { getCompiledExpression } from './expressions/index.js';
import { VariableRegistry } from './variables/index.js';
import {
  InstrumentSet,
  createInstrumentRegistry,
  type InstrumentRegistry,
  type KnobSetting,
} from './instruments/index.js';
import { RoutineInterpreter } from './routines/index.js';
import { AlarmMonitor } from './alarms/index.js';
import { ExperimentClock } from './clock.js';
import { SinkChannel, type SnapshotSink } from './sinks/index.js';

/**
 * Options for building and running an experiment
 */
export type RunOptions = {
  /**
   * Logger for every component (default: console)
   */
  logger?: EngineLogger;

  /**
   * Instrument driver registry (default: built-in virtual instruments)
   */
  instruments?: InstrumentRegistry;

  /**
   * Snapshot consumers; each gets its own bounded queue
   */
  sinks?: SnapshotSink[];

  /**
   * Overrides the runcard's `max ticks`
   */
  maxTicks?: number;

  /**
   * Overrides the runcard's `clock`
   */
  clock?: ClockMode;

  /**
   * Millisecond time source (default: Date.now)
   */
  now?: () => number;

  /**
   * Waits between ticks (default: setTimeout)
   */
  sleep?: (ms: number) => Promise<void>;
};

/**
 * Explicit context passed to the scheduler. There is no ambient
 * "current experiment".
 */
export type ExperimentContext = {
  runcard: Runcard;
  settings: RuncardSettings;
  logger: EngineLogger;
  variables: VariableRegistry;
  instruments: InstrumentSet;
  routines: RoutineInterpreter;
  alarms: AlarmMonitor;
  clock: ExperimentClock;
  sinks: SinkChannel[];

  /**
   * Knob presets, applied after the instruments connect
   */
  presets: KnobSetting[];

  /**
   * Knob postsets, applied before the instruments disconnect
   */
  postsets: KnobSetting[];

  now: () => number;
  sleep: (ms: number) => Promise<void>;
};

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Wrap a component error into a ValidationError carrying a single issue.
 */
function asValidationError(error: unknown, path: string): unknown {
  if (isValidationError(error)) {
    return error;
  }
  if (error instanceof ExpressionError) {
    return new ValidationError(error.message, {
      field: path,
      details: { formula: error.formula, position: error.position },
      issues: [{ path, message: error.message, code: 'INVALID_EXPRESSION' }],
    });
  }
  return error;
}

/**
 * Build an experiment from a parsed runcard.
 *
 * Runs every static check (cross-references, routine conflicts, instrument
 * types, endpoints exposed by the drivers, expression syntax and symbols,
 * dependency cycles) and a dry-run evaluation of every expression with preset
 * or zero inputs. Nothing here performs instrument I/O.
 *
 * @throws ValidationError (or a subclass) describing the first class of problem found
 */
export function buildExperiment(runcard: Runcard, options: RunOptions = {}): ExperimentContext {
  const logger = options.logger ?? consoleLogger;

  // Conflicting and malformed routines get their own error types
  const routines = new RoutineInterpreter(runcard.routines);

  const checked = validateRuncard(runcard);
  for (const warning of checked.warnings) {
    logger.warn('Runcard warning', { path: warning.path, message: warning.message });
  }
  if (!checked.valid) {
    throw new ValidationError(`Runcard has ${checked.errors.length} error(s)`, {
      issues: checked.errors,
    });
  }

  const settings: RuncardSettings = {
    ...runcard.settings,
    ...(options.maxTicks !== undefined ? { maxTicks: options.maxTicks } : {}),
    ...(options.clock !== undefined ? { clock: options.clock } : {}),
  };

  const instruments = InstrumentSet.create(
    runcard.instruments,
    options.instruments ?? createInstrumentRegistry(),
    logger
  );

  const endpointIssues: ValidationIssue[] = [];
  for (const variable of runcard.variables) {
    if (variable.kind === 'knob' && !instruments.hasKnob(variable.instrument, variable.knob)) {
      endpointIssues.push({
        path: `Variables.${variable.name}.knob`,
        message: `Instrument "${variable.instrument}" has no knob "${variable.knob}"`,
        code: 'UNKNOWN_REFERENCE',
      });
    }
    if (variable.kind === 'meter' && !instruments.hasMeter(variable.instrument, variable.meter)) {
      endpointIssues.push({
        path: `Variables.${variable.name}.meter`,
        message: `Instrument "${variable.instrument}" has no meter "${variable.meter}"`,
        code: 'UNKNOWN_REFERENCE',
      });
    }
  }
  if (endpointIssues.length > 0) {
    throw new ValidationError(endpointIssues.map((issue) => issue.message).join('; '), {
      issues: endpointIssues,
    });
  }

  const variables = new VariableRegistry();
  for (const variable of runcard.variables) {
    try {
      variables.register(variable);
    } catch (error) {
      throw asValidationError(error, `Variables.${variable.name}`);
    }
  }
  variables.resolveOrder();

  dryRun(variables, logger);

  const alarms = new AlarmMonitor(runcard.alarms, logger);
  const now = options.now ?? Date.now;
  const clock = new ExperimentClock({ mode: settings.clock, stepInterval: settings.stepInterval, now });
  const sinks = (options.sinks ?? []).map((sink) => new SinkChannel(sink, settings.queueCapacity, logger));

  const presets: KnobSetting[] = [];
  const postsets: KnobSetting[] = [];
  for (const knob of variables.knobs()) {
    if (knob.preset !== undefined) {
      presets.push({ instrument: knob.instrument, knob: knob.knob, value: knob.preset });
    }
    if (knob.postset !== undefined) {
      postsets.push({ instrument: knob.instrument, knob: knob.knob, value: knob.postset });
    }
  }

  return {
    runcard,
    settings,
    logger,
    variables,
    instruments,
    routines,
    alarms,
    clock,
    sinks,
    presets,
    postsets,
    now,
    sleep: options.sleep ?? defaultSleep,
  };
}

/**
 * Evaluate every expression once with knob presets (or zero) and zero meters.
 *
 * A formula that fails on real presets alone would fail on the first tick, so
 * it is rejected. One that fails only where a stand-in zero feeds it (e.g.
 * dividing by a meter) is reported as a warning; real readings may be fine.
 *
 * @throws ValidationError listing every rejected formula
 */
function dryRun(variables: VariableRegistry, logger: EngineLogger): void {
  const values = new Map<string, number>();
  const standIns = new Set<string>();
  for (const knob of variables.knobs()) {
    values.set(knob.name, knob.preset ?? 0);
    if (knob.preset === undefined) standIns.add(knob.name);
  }
  for (const meter of variables.meters()) {
    values.set(meter.name, 0);
    standIns.add(meter.name);
  }

  const issues: ValidationIssue[] = [];
  for (const expression of variables.resolveOrder()) {
    const bindings: Record<string, number> = {};
    let complete = true;
    for (const [symbol, target] of Object.entries(expression.definitions)) {
      const value = values.get(target);
      if (value === undefined) {
        complete = false;
        break;
      }
      bindings[symbol] = value;
    }
    if (!complete) continue;

    const targets = Object.values(expression.definitions);
    if (targets.some((target) => standIns.has(target))) {
      standIns.add(expression.name);
    }

    try {
      values.set(expression.name, getCompiledExpression(expression.expression).evaluate(bindings));
    } catch (error) {
      if (!(error instanceof ExpressionError)) throw error;
      if (standIns.has(expression.name)) {
        logger.warn('Expression cannot be evaluated with preset inputs', {
          variable: expression.name,
          error: error.message,
        });
      } else {
        issues.push({ path: `Variables.${expression.name}`, message: error.message, code: 'INVALID_EXPRESSION' });
      }
    }
  }

  if (issues.length > 0) {
    throw new ValidationError(`Runcard has ${issues.length} error(s)`, { issues });
  }
}
