// Runtime error types

/**
 * Base class for all runtime errors.
 * Provides structured error information for debugging and logging.
 */
export class RuntimeError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'RuntimeError';
    this.code = code;
  }
}

/**
 * A problem found in a runcard before any tick runs.
 */
export type ValidationIssue = {
  path: string;
  message: string;
  code: string;
};

/**
 * Validation error for a malformed or inconsistent runcard.
 * Always raised before any instrument is touched.
 */
export class ValidationError extends RuntimeError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;
  readonly issues: ValidationIssue[];

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown>; issues?: ValidationIssue[] }
  ) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
    this.issues = options?.issues ?? [];
  }
}

/**
 * Error when a name is registered twice.
 */
export class DuplicateNameError extends ValidationError {
  readonly variableName: string;

  constructor(name: string) {
    super(`Variable "${name}" is already registered`, { field: name });
    this.name = 'DuplicateNameError';
    this.variableName = name;
  }
}

/**
 * Error when expression variables depend on each other in a cycle.
 */
export class CyclicDependencyError extends ValidationError {
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super(`Cyclic dependency between expressions: ${cycle.join(' -> ')}`, {
      details: { cycle },
    });
    this.name = 'CyclicDependencyError';
    this.cycle = cycle;
  }
}

/**
 * Error when an expression refers to a variable that was never registered.
 */
export class UnknownReferenceError extends ValidationError {
  readonly variableName: string;
  readonly reference: string;

  constructor(name: string, reference: string) {
    super(`Variable "${name}" refers to unknown variable "${reference}"`, {
      field: name,
      details: { reference },
    });
    this.name = 'UnknownReferenceError';
    this.variableName = name;
    this.reference = reference;
  }
}

/**
 * Error when more than one routine drives the same knob.
 */
export class ConflictingRoutineError extends ValidationError {
  readonly variableName: string;
  readonly routines: string[];

  constructor(variableName: string, routines: string[]) {
    super(`Variable "${variableName}" is driven by more than one routine: ${routines.join(', ')}`, {
      field: variableName,
      details: { routines },
    });
    this.name = 'ConflictingRoutineError';
    this.variableName = variableName;
    this.routines = routines;
  }
}

/**
 * Error when a runcard names an instrument type with no registered driver.
 */
export class UnknownInstrumentTypeError extends ValidationError {
  readonly instrumentType: string;

  constructor(instrumentType: string, available: string[]) {
    super(
      `No driver registered for instrument type "${instrumentType}". Available: ${available.join(', ') || 'none'}`,
      { field: 'type', details: { instrumentType, available } }
    );
    this.name = 'UnknownInstrumentTypeError';
    this.instrumentType = instrumentType;
  }
}

/**
 * Error when a formula cannot be parsed or evaluated.
 */
export class ExpressionError extends RuntimeError {
  readonly formula: string;
  readonly position?: number;

  constructor(formula: string, reason: string, position?: number) {
    super(
      'EXPRESSION_ERROR',
      position === undefined
        ? `Expression "${formula}": ${reason}`
        : `Expression "${formula}" at position ${position}: ${reason}`
    );
    this.name = 'ExpressionError';
    this.formula = formula;
    this.position = position;
  }
}

/**
 * Error when a variable is read before it ever had a value.
 */
export class UndefinedVariableError extends RuntimeError {
  readonly variableName: string;

  constructor(name: string, reason = 'has no value yet') {
    super('UNDEFINED_VARIABLE', `Variable "${name}" ${reason}`);
    this.name = 'UndefinedVariableError';
    this.variableName = name;
  }
}

/**
 * Error when talking to an instrument fails.
 */
export class InstrumentIOError extends RuntimeError {
  readonly instrument: string;
  readonly endpoint: string;
  readonly operation: 'connect' | 'write' | 'read' | 'disconnect';
  readonly cause?: Error;

  constructor(
    instrument: string,
    endpoint: string,
    operation: InstrumentIOError['operation'],
    reason: string,
    cause?: Error
  ) {
    super('INSTRUMENT_IO_ERROR', `Instrument "${instrument}" failed to ${operation} ${endpoint}: ${reason}`);
    this.name = 'InstrumentIOError';
    this.instrument = instrument;
    this.endpoint = endpoint;
    this.operation = operation;
    this.cause = cause;
  }
}

/**
 * Controlled termination raised by an abort alarm or an exhausted retry bound.
 */
export class AlarmAbortError extends RuntimeError {
  readonly alarm: string;
  readonly variable: string;

  constructor(alarm: string, variable: string, reason: string) {
    super('ALARM_ABORT', `Alarm "${alarm}" on "${variable}" aborted the experiment: ${reason}`);
    this.name = 'AlarmAbortError';
    this.alarm = alarm;
    this.variable = variable;
  }
}

/**
 * Error when the scheduler is asked to do something its state does not allow.
 */
export class SchedulerStateError extends RuntimeError {
  readonly state: string;

  constructor(state: string, action: string) {
    super('INVALID_SCHEDULER_STATE', `Cannot ${action} while ${state}`);
    this.name = 'SchedulerStateError';
    this.state = state;
  }
}

export function isRuntimeError(error: unknown): error is RuntimeError {
  return error instanceof RuntimeError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}
