// Scheduler - the tick loop that sequences instrument I/O, expression
// refresh, alarms and snapshot emission on the experiment clock
//
// Each tick, in fixed order:
//   1. read the elapsed experiment time
//   2. routine writes (none while the clock is gated)
//   3. meter reads
//   4. expression refresh
//   5. alarms, applying the hold/wait/abort protocols
//   6. snapshots to plot and save sinks on their tick-count cadence

import { setImmediate as nextTurn } from 'node:timers/promises';
import type { Name, Snapshot, SnapshotValues, Timestamp } from '@runcard/protocol';
import {
  AlarmAbortError,
  ExpressionError,
  InstrumentIOError,
  SchedulerStateError,
} from './errors.js';
import type { AlarmDecision, AlarmEvaluation, TriggeredAlarm } from './alarms/index.js';
import type { RoutineWrite } from './routines/index.js';
import type { ExperimentContext } from './experiment.js';
import type { SinkChannel } from './sinks/index.js';

export type SchedulerState = 'idle' | 'running' | 'paused' | 'terminated';

export type TerminationStatus = 'completed' | 'stopped' | 'aborted' | 'failed';

export type TerminationReason =
  | 'routines-complete'
  | 'max-ticks'
  | 'duration'
  | 'stop-requested'
  | 'alarm'
  | 'hold-exhausted'
  | 'instrument-io'
  | 'expression'
  | 'error';

/**
 * What caused an abort or failure
 */
export type AbortReport = {
  alarm?: Name;
  variable?: Name;
  message: string;
};

export type RunResult = {
  status: TerminationStatus;
  reason: TerminationReason;

  /**
   * Ticks that ran, including one cut short by an abort
   */
  ticks: number;

  /**
   * Experiment seconds at termination
   */
  elapsed: number;

  /**
   * Snapshots produced, including the final one taken at termination
   */
  snapshots: number;

  /**
   * Snapshots dropped by full sink queues
   */
  dropped: number;

  abort?: AbortReport;

  lastSnapshotAt: Timestamp | null;

  error?: Error;
};

export type TickEvent = {
  tick: number;
  elapsed: number;
  writes: RoutineWrite[];
  decision: AlarmDecision;
  values: SnapshotValues;
};

export type SchedulerListener = {
  onTick?(event: TickEvent): void;
  onStateChange?(state: SchedulerState, previous: SchedulerState): void;
};

type Termination = {
  status: TerminationStatus;
  reason: TerminationReason;
  abort?: AbortReport;
  error?: Error;
};

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Runs one experiment context to termination.
 *
 * States: idle -> running <-> paused -> terminated. Paused means the clock is
 * gated, by a triggered wait alarm or an operator pause; ticks keep running
 * (meters read, alarms checked) but routines neither advance nor write.
 * Stop requests are honoured at the next tick boundary. Every tick boundary
 * gives the event loop a turn, so timers, signals and sink writes progress
 * even when the clock is simulated.
 */
export class Scheduler {
  private readonly context: ExperimentContext;
  private readonly listeners = new Set<SchedulerListener>();
  private currentState: SchedulerState = 'idle';
  private stopRequested = false;

  private ticksRun = 0;
  private lastTick: { tick: number; elapsed: number; values: SnapshotValues } | null = null;
  private snapshotCount = 0;
  private readonly deliveredTick = new Map<SinkChannel, number>();
  private readonly lastSafe = new Map<Name, number>();

  constructor(context: ExperimentContext) {
    this.context = context;
  }

  get state(): SchedulerState {
    return this.currentState;
  }

  /**
   * @returns A function that removes the listener
   */
  addListener(listener: SchedulerListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Ask the loop to stop at the next tick boundary.
   */
  requestStop(): void {
    if (this.currentState === 'terminated') {
      throw new SchedulerStateError(this.currentState, 'request a stop');
    }
    this.stopRequested = true;
  }

  /**
   * Gate the clock until resume() is called.
   */
  pause(): void {
    if (this.currentState !== 'running' && this.currentState !== 'paused') {
      throw new SchedulerStateError(this.currentState, 'pause');
    }
    this.context.clock.pause('operator');
    this.context.logger.info('Experiment paused by operator');
    this.syncState();
  }

  resume(): void {
    if (!this.context.clock.isGatedBy('operator')) {
      throw new SchedulerStateError(this.currentState, 'resume');
    }
    this.context.clock.resume('operator');
    this.context.logger.info('Experiment resumed by operator');
    this.syncState();
  }

  async run(): Promise<RunResult> {
    if (this.currentState !== 'idle') {
      throw new SchedulerStateError(this.currentState, 'run');
    }

    const { logger, runcard } = this.context;
    this.setState('running');
    logger.info('Experiment starting', {
      name: runcard.description.name,
      instruments: runcard.instruments.length,
      variables: runcard.variables.length,
      routines: runcard.routines.length,
      alarms: runcard.alarms.length,
    });

    let termination: Termination;
    try {
      await this.start();
      termination = await this.loop();
    } catch (error) {
      termination = this.classify(error);
    }

    await this.teardown();
    this.setState('terminated');

    const result: RunResult = {
      status: termination.status,
      reason: termination.reason,
      ticks: this.ticksRun,
      elapsed: this.context.clock.elapsed(),
      snapshots: this.snapshotCount,
      dropped: this.context.sinks.reduce((sum, channel) => sum + channel.stats().dropped, 0),
      lastSnapshotAt: this.lastDelivered(),
      ...(termination.abort && { abort: termination.abort }),
      ...(termination.error && { error: termination.error }),
    };

    const level = result.status === 'completed' || result.status === 'stopped' ? 'info' : 'error';
    logger[level]('Experiment terminated', {
      status: result.status,
      reason: result.reason,
      ticks: result.ticks,
      elapsed: result.elapsed,
      snapshots: result.snapshots,
      dropped: result.dropped,
      ...(result.abort && { abort: result.abort.message }),
      lastSnapshotAt: result.lastSnapshotAt,
    });

    return result;
  }

  // --- Lifecycle ---

  private async start(): Promise<void> {
    const { instruments, sinks, presets, variables, clock } = this.context;

    for (const channel of sinks) {
      await channel.open();
    }

    await instruments.connectAll(presets);

    for (const knob of variables.knobs()) {
      const value = knob.preset ?? (await instruments.readKnob(knob.instrument, knob.knob));
      if (value !== undefined) {
        variables.set(knob.name, value);
        this.lastSafe.set(knob.name, value);
      }
    }

    clock.start();
  }

  private async loop(): Promise<Termination> {
    const { clock, settings, now, sleep } = this.context;
    let tickStartedAt: number | null = null;

    while (true) {
      let due = this.terminationDue();
      if (due) return due;

      if (tickStartedAt !== null) {
        const remaining =
          clock.mode === 'wall' ? settings.stepInterval * 1000 - (now() - tickStartedAt) : 0;
        if (remaining > 0) {
          await sleep(remaining);
        } else {
          await nextTurn();
        }
        due = this.terminationDue();
        if (due) return due;
      }

      tickStartedAt = now();
      const ended = await this.tick();
      if (ended) return ended;
      clock.completeTick();
    }
  }

  private terminationDue(): Termination | null {
    const { settings, clock, routines } = this.context;

    if (this.stopRequested) {
      return { status: 'stopped', reason: 'stop-requested' };
    }
    if (settings.maxTicks !== undefined && clock.tick >= settings.maxTicks) {
      return { status: 'completed', reason: 'max-ticks' };
    }
    if (settings.duration !== undefined && clock.elapsed() >= settings.duration) {
      return { status: 'completed', reason: 'duration' };
    }
    if (routines.allComplete()) {
      return { status: 'completed', reason: 'routines-complete' };
    }
    return null;
  }

  private async teardown(): Promise<void> {
    const { sinks, instruments, postsets, logger } = this.context;

    for (const channel of sinks) {
      await channel.flush();
    }

    const last = this.lastTick;
    if (last) {
      const pending = sinks.filter((channel) => this.deliveredTick.get(channel) !== last.tick);
      if (pending.length > 0) {
        const snapshot = this.takeSnapshot(last.tick, last.elapsed, last.values);
        for (const channel of pending) {
          channel.offer(snapshot);
        }
      }
    }

    for (const channel of sinks) {
      await channel.close();
    }

    const failures = await instruments.disconnectAll(postsets);
    if (failures.length > 0) {
      logger.warn('Instruments did not shut down cleanly', { failures: failures.length });
    }
  }

  // --- Tick ---

  private async tick(): Promise<Termination | null> {
    const { clock, routines, variables, alarms, logger } = this.context;
    const tick = clock.tick;
    const elapsed = clock.elapsed();
    this.ticksRun++;

    let writes: RoutineWrite[] = [];
    if (!clock.gated) {
      writes = routines.step(elapsed);
      for (const write of writes) {
        await this.writeKnob(write.variable, write.value);
      }
    }

    await this.readMeters();
    this.refresh(tick, elapsed);

    let evaluation = alarms.evaluate(variables);

    let attempts = 0;
    while (evaluation.decision === 'hold') {
      const hold = this.firstWith(evaluation, 'hold');
      if (attempts >= this.context.settings.retryLimit) {
        const error = new AlarmAbortError(
          hold.alarm.name,
          hold.alarm.variable,
          `still triggered after ${attempts} hold attempt(s) (value ${hold.value})`
        );
        return {
          status: 'aborted',
          reason: 'hold-exhausted',
          abort: { alarm: hold.alarm.name, variable: hold.alarm.variable, message: error.message },
          error,
        };
      }

      attempts++;
      logger.warn('Hold: restoring last safe knob values', {
        alarm: hold.alarm.name,
        attempt: attempts,
        knobs: writes.map((write) => write.variable),
      });
      await this.restoreSafeValues(writes);
      await this.readMeters();
      this.refresh(tick, elapsed);
      evaluation = alarms.evaluate(variables);
    }

    if (evaluation.decision === 'abort') {
      const abort = this.firstWith(evaluation, 'abort');
      const error = new AlarmAbortError(
        abort.alarm.name,
        abort.alarm.variable,
        `condition met (value ${abort.value})`
      );
      return {
        status: 'aborted',
        reason: 'alarm',
        abort: { alarm: abort.alarm.name, variable: abort.alarm.variable, message: error.message },
        error,
      };
    }

    if (evaluation.decision === 'wait') {
      if (!clock.isGatedBy('alarm')) {
        logger.warn('Wait alarm triggered: routines suspended', {
          alarms: evaluation.triggered.map((triggered) => triggered.alarm.name),
        });
        clock.pause('alarm');
      }
    } else {
      if (clock.isGatedBy('alarm')) {
        logger.info('Wait alarms cleared: routines resumed');
        clock.resume('alarm');
      }
      for (const knob of variables.knobs()) {
        const value = variables.peek(knob.name);
        if (value !== undefined) {
          this.lastSafe.set(knob.name, value);
        }
      }
    }
    this.syncState();

    const { values } = this.refreshed(tick);
    this.emitSnapshots(tick, elapsed, values);

    for (const listener of this.listeners) {
      listener.onTick?.({ tick, elapsed, writes, decision: evaluation.decision, values });
    }

    return null;
  }

  /**
   * Recompute expressions and keep the post-refresh values of this tick, so a
   * snapshot taken at termination never shows a half-updated tick.
   */
  private refresh(tick: number, elapsed: number): void {
    this.context.variables.refreshExpressions();
    this.lastTick = { tick, elapsed, values: this.context.variables.values() };
  }

  private refreshed(tick: number): { tick: number; elapsed: number; values: SnapshotValues } {
    if (!this.lastTick || this.lastTick.tick !== tick) {
      throw new Error(`Tick ${tick} has not been refreshed`);
    }
    return this.lastTick;
  }

  private firstWith(evaluation: AlarmEvaluation, protocol: AlarmDecision): TriggeredAlarm {
    const found = evaluation.triggered.find((triggered) => triggered.alarm.protocol === protocol);
    if (!found) {
      throw new Error(`No triggered ${protocol} alarm behind a ${protocol} decision`);
    }
    return found;
  }

  private emitSnapshots(tick: number, elapsed: number, values: SnapshotValues): void {
    const { settings, sinks } = this.context;
    const plotDue = tick % settings.plotInterval === 0;
    const saveDue = tick % settings.saveInterval === 0;
    const due = sinks.filter((channel) => (channel.channel === 'plot' ? plotDue : saveDue));
    if (due.length === 0) return;

    const snapshot = this.takeSnapshot(tick, elapsed, values);
    for (const channel of due) {
      channel.offer(snapshot);
      this.deliveredTick.set(channel, tick);
    }
  }

  private takeSnapshot(tick: number, elapsed: number, values: SnapshotValues): Snapshot {
    const snapshot: Snapshot = Object.freeze({
      tick,
      time: elapsed,
      timestamp: new Date(this.context.now()).toISOString(),
      values,
    });
    this.snapshotCount++;
    return snapshot;
  }

  /**
   * Latest timestamp any sink accepted; snapshots that were dropped or failed
   * to write do not count.
   */
  private lastDelivered(): Timestamp | null {
    let latest: Timestamp | null = null;
    for (const channel of this.context.sinks) {
      const { lastDeliveredAt } = channel.stats();
      if (lastDeliveredAt !== null && (latest === null || lastDeliveredAt > latest)) {
        latest = lastDeliveredAt;
      }
    }
    return latest;
  }

  // --- Instrument I/O ---

  private async restoreSafeValues(writes: readonly RoutineWrite[]): Promise<void> {
    for (const write of writes) {
      const safe = this.lastSafe.get(write.variable);
      if (safe !== undefined) {
        await this.writeKnob(write.variable, safe);
      }
    }
  }

  private async writeKnob(variable: Name, value: number): Promise<void> {
    const definition = this.context.variables.definition(variable);
    if (definition.kind !== 'knob') {
      throw new Error(`Variable "${variable}" is not a knob`);
    }
    await this.withRetry(() => this.context.instruments.write(definition.instrument, definition.knob, value));
    this.context.variables.set(variable, value);
  }

  private async readMeters(): Promise<void> {
    const { variables, instruments } = this.context;
    for (const meter of variables.meters()) {
      const value = await this.withRetry(() => instruments.read(meter.instrument, meter.meter));
      variables.set(meter.name, value);
    }
  }

  /**
   * Retry an instrument operation up to the retry limit on InstrumentIOError.
   */
  private async withRetry<T>(operation: () => Promise<T>): Promise<T> {
    const { settings, logger } = this.context;
    let attempt = 0;
    while (true) {
      try {
        return await operation();
      } catch (error) {
        if (!(error instanceof InstrumentIOError) || attempt >= settings.retryLimit) {
          throw error;
        }
        attempt++;
        logger.warn('Instrument I/O failed, retrying', {
          instrument: error.instrument,
          endpoint: error.endpoint,
          attempt,
          error: error.message,
        });
      }
    }
  }

  // --- State ---

  private classify(error: unknown): Termination {
    if (error instanceof InstrumentIOError) {
      return {
        status: 'aborted',
        reason: 'instrument-io',
        abort: { message: error.message },
        error,
      };
    }
    if (error instanceof ExpressionError) {
      return { status: 'failed', reason: 'expression', abort: { message: error.message }, error };
    }
    const failure = toError(error);
    return { status: 'failed', reason: 'error', abort: { message: failure.message }, error: failure };
  }

  private syncState(): void {
    if (this.currentState === 'idle' || this.currentState === 'terminated') return;
    this.setState(this.context.clock.gated ? 'paused' : 'running');
  }

  private setState(state: SchedulerState): void {
    const previous = this.currentState;
    if (previous === state) return;
    this.currentState = state;
    for (const listener of this.listeners) {
      listener.onStateChange?.(state, previous);
    }
  }
}

/**
 * Run an experiment context to termination.
 */
export async function runExperiment(context: ExperimentContext): Promise<RunResult> {
  return new Scheduler(context).run();
}
