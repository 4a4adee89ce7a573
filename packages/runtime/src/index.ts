// @runcard/runtime
// The experiment engine: tick loop, expressions, variables, routines, alarms and sinks

// Scheduler (the tick loop)
export {
  Scheduler,
  runExperiment,
  type SchedulerState,
  type SchedulerListener,
  type TickEvent,
  type RunResult,
  type AbortReport,
  type TerminationStatus,
  type TerminationReason,
} from './loop.js';

// Experiment context
export { buildExperiment, type ExperimentContext, type RunOptions } from './experiment.js';
export { ExperimentClock, type ClockOptions, type GateReason } from './clock.js';

// Error types
export {
  RuntimeError,
  ValidationError,
  DuplicateNameError,
  CyclicDependencyError,
  UnknownReferenceError,
  ConflictingRoutineError,
  UnknownInstrumentTypeError,
  ExpressionError,
  UndefinedVariableError,
  InstrumentIOError,
  AlarmAbortError,
  SchedulerStateError,
  isRuntimeError,
  isValidationError,
  type ValidationIssue,
} from './errors.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  withMinimumLevel,
  createCapturingLogger,
  type EngineLogger,
  type LogLevel,
  type LogEntry,
} from './logging.js';

// Expressions
export {
  evaluate,
  compileExpression,
  getCompiledExpression,
  clearCompiledExpressionCache,
  type Bindings,
  type CompiledExpression,
} from './expressions/index.js';

// Variables
export { VariableRegistry } from './variables/index.js';

// Instruments
export {
  InstrumentRegistry,
  createInstrumentRegistry,
  InstrumentSet,
  HenonMapper,
  EchoInstrument,
  type InstrumentDriver,
  type InstrumentFactory,
  type KnobSetting,
} from './instruments/index.js';

// Routines
export {
  RoutineInterpreter,
  advance,
  interpolate,
  isComplete,
  type RoutineWrite,
} from './routines/index.js';

// Alarms
export {
  AlarmMonitor,
  check,
  type AlarmDecision,
  type AlarmEvaluation,
  type TriggeredAlarm,
} from './alarms/index.js';

// Sinks
export {
  SnapshotQueue,
  SinkChannel,
  createRepositorySink,
  createPlotSink,
  createLogSink,
  type SnapshotSink,
  type SinkChannelKind,
  type SinkStats,
  type PlotSink,
  type PlotSeries,
  type PlotPoint,
} from './sinks/index.js';
