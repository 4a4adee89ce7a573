// Tests for the scheduler tick loop

import { describe, it, expect, beforeEach } from 'vitest';
import {
  DEFAULT_SETTINGS,
  type AlarmDefinition,
  type Runcard,
  type RuncardSettings,
  type RoutineDefinition,
  type Snapshot,
  type VariableDefinition,
} from '@runcard/protocol';
import { SchedulerStateError } from './errors.js';
import { silentLogger } from './logging.js';
import { clearCompiledExpressionCache } from './expressions/index.js';
import { createInstrumentRegistry, type InstrumentDriver } from './instruments/index.js';
import type { SnapshotSink } from './sinks/index.js';
import { buildExperiment, type RunOptions } from './experiment.js';
import { Scheduler, type SchedulerState, type TickEvent } from './loop.js';

beforeEach(() => {
  clearCompiledExpressionCache();
});

// --- Test Fixtures ---

const FIXED_NOW = Date.parse('2026-03-01T10:00:00.000Z');

function createSettings(overrides: Partial<RuncardSettings> = {}): RuncardSettings {
  return { ...DEFAULT_SETTINGS, clock: 'simulated', ...overrides };
}

function createHenonRuncard(overrides: Partial<Runcard> = {}): Runcard {
  return {
    description: { name: 'Henon test' },
    settings: createSettings({ stepInterval: 0.25, maxTicks: 4 }),
    instruments: [{ name: 'Mapper', type: 'HenonMapper', address: '', options: {} }],
    variables: [
      { kind: 'knob', name: 'Parameter a', instrument: 'Mapper', knob: 'a', preset: 1.0 },
      { kind: 'knob', name: 'Parameter b', instrument: 'Mapper', knob: 'b', preset: 0.3 },
      { kind: 'meter', name: 'Coordinate x', instrument: 'Mapper', meter: 'x' },
      { kind: 'meter', name: 'Coordinate y', instrument: 'Mapper', meter: 'y' },
      {
        kind: 'expression',
        name: 'Distance r',
        expression: 'sqrt(x^2 + y^2)',
        definitions: { x: 'Coordinate x', y: 'Coordinate y' },
      },
    ],
    alarms: [],
    plots: [],
    routines: [],
    ...overrides,
  };
}

/**
 * State of a scripted test instrument: knob "level", meter "r"
 */
type Rig = {
  writes: number[];
  readings: number[];
  reads: number;
  failWrites: number;
  connected: boolean;
};

function createRig(readings: number[] = [0]): Rig {
  return { writes: [], readings, reads: 0, failWrites: 0, connected: false };
}

function createScriptedDriver(rig: Rig): InstrumentDriver {
  return {
    type: 'Scripted',
    knobs: ['level'],
    meters: ['r'],
    async connect() {
      rig.connected = true;
    },
    async set(_knob, value) {
      if (rig.failWrites > 0) {
        rig.failWrites--;
        throw new Error('timeout');
      }
      rig.writes.push(value);
    },
    async measure() {
      const value = rig.readings[Math.min(rig.reads, rig.readings.length - 1)];
      rig.reads++;
      return value;
    },
    async disconnect() {
      rig.connected = false;
    },
  };
}

const LEVEL: VariableDefinition = { kind: 'knob', name: 'Level', instrument: 'Rig', knob: 'level' };
const DISTANCE: VariableDefinition = { kind: 'meter', name: 'Distance r', instrument: 'Rig', meter: 'r' };

function createRigRuncard(overrides: Partial<Runcard> = {}): Runcard {
  return {
    description: { name: 'Rig test' },
    settings: createSettings({ stepInterval: 1, maxTicks: 5 }),
    instruments: [{ name: 'Rig', type: 'Scripted', address: '', options: {} }],
    variables: [LEVEL, DISTANCE],
    alarms: [],
    plots: [],
    routines: [createDriveRoutine()],
    ...overrides,
  };
}

// Drives Level to the elapsed time in seconds
function createDriveRoutine(overrides: Partial<RoutineDefinition> = {}): RoutineDefinition {
  return { name: 'Drive', type: 'timecourse', variable: 'Level', times: [0, 10], values: [0, 10], ...overrides };
}

function createAlarm(overrides: Partial<AlarmDefinition> = {}): AlarmDefinition {
  return {
    name: 'Escape',
    variable: 'Distance r',
    condition: { operator: '>', threshold: 1 },
    protocol: 'wait',
    ...overrides,
  };
}

function createRecordingSink(channel: SnapshotSink['channel'] = 'save'): SnapshotSink & { received: Snapshot[] } {
  const received: Snapshot[] = [];
  return {
    name: `${channel}-recorder`,
    channel,
    received,
    async write(snapshot) {
      received.push(snapshot);
    },
  };
}

function createScheduler(runcard: Runcard, rig: Rig, options: RunOptions = {}) {
  const instruments = createInstrumentRegistry();
  instruments.register('Scripted', () => createScriptedDriver(rig));
  const context = buildExperiment(runcard, {
    logger: silentLogger,
    instruments,
    now: () => FIXED_NOW,
    ...options,
  });
  const scheduler = new Scheduler(context);
  const events: TickEvent[] = [];
  const states: SchedulerState[] = [];
  scheduler.addListener({
    onTick: (event) => events.push(event),
    onStateChange: (state) => states.push(state),
  });
  return { scheduler, events, states };
}

// --- Tests ---

describe('Scheduler', () => {
  describe('end to end', () => {
    it('produces one snapshot per tick with every variable', async () => {
      const sink = createRecordingSink();
      const context = buildExperiment(createHenonRuncard(), { logger: silentLogger, sinks: [sink] });

      const result = await new Scheduler(context).run();

      expect(result).toMatchObject({
        status: 'completed',
        reason: 'max-ticks',
        ticks: 4,
        snapshots: 4,
        dropped: 0,
      });
      expect(sink.received.map((snapshot) => snapshot.time)).toEqual([0, 0.25, 0.5, 0.75]);
      for (const snapshot of sink.received) {
        expect(Object.keys(snapshot.values)).toEqual([
          'Parameter a',
          'Parameter b',
          'Coordinate x',
          'Coordinate y',
          'Distance r',
        ]);
        for (const value of Object.values(snapshot.values)) {
          expect(typeof value).toBe('number');
        }
      }
      expect(sink.received[0]?.values['Parameter a']).toBe(1.0);
      expect(sink.received[0]?.values['Parameter b']).toBe(0.3);
    });

    it('keeps expressions equal to their formula over the snapshot values', async () => {
      const sink = createRecordingSink();
      const context = buildExperiment(createHenonRuncard(), { logger: silentLogger, sinks: [sink] });

      await new Scheduler(context).run();

      for (const { values } of sink.received) {
        const x = values['Coordinate x'] ?? Number.NaN;
        const y = values['Coordinate y'] ?? Number.NaN;
        expect(values['Distance r']).toBe(Math.sqrt(Math.pow(x, 2) + Math.pow(y, 2)));
      }
    });

    it('follows the plot and save cadences', async () => {
      const plot = createRecordingSink('plot');
      const save = createRecordingSink('save');
      const runcard = createHenonRuncard({
        settings: createSettings({ plotInterval: 1, saveInterval: 3, maxTicks: 5 }),
      });
      const context = buildExperiment(runcard, { logger: silentLogger, sinks: [plot, save] });

      const result = await new Scheduler(context).run();

      expect(plot.received.map((snapshot) => snapshot.tick)).toEqual([0, 1, 2, 3, 4]);
      // Tick 4 reaches the save sink as the final snapshot
      expect(save.received.map((snapshot) => snapshot.tick)).toEqual([0, 3, 4]);
      expect(result.snapshots).toBe(6);
    });
  });

  describe('wait protocol', () => {
    it('suspends routine writes while the alarm is triggered', async () => {
      const rig = createRig([0.5, 2, 2, 0.5, 0.5]);
      const { scheduler, events, states } = createScheduler(
        createRigRuncard({ alarms: [createAlarm({ protocol: 'wait' })] }),
        rig
      );

      const result = await scheduler.run();

      expect(result.status).toBe('completed');
      expect(events.map((event) => event.decision)).toEqual(['clear', 'wait', 'wait', 'clear', 'clear']);
      expect(events.map((event) => event.writes.length)).toEqual([1, 1, 0, 0, 1]);
      expect(events.map((event) => event.values['Level'])).toEqual([0, 1, 1, 1, 2]);
      // The clock does not move while gated, so the routine does not catch up
      expect(events.map((event) => event.elapsed)).toEqual([0, 1, 1, 1, 2]);
      expect(rig.writes).toEqual([0, 1, 2]);
      expect(states).toEqual(['running', 'paused', 'running', 'terminated']);
    });

    it('keeps reading meters while waiting', async () => {
      const rig = createRig([2, 2, 2]);
      const { scheduler } = createScheduler(
        createRigRuncard({
          settings: createSettings({ maxTicks: 3 }),
          alarms: [createAlarm({ protocol: 'wait' })],
        }),
        rig
      );

      await scheduler.run();

      expect(rig.reads).toBe(3);
      expect(rig.writes).toEqual([0]);
    });
  });

  describe('hold protocol', () => {
    it('rewrites the knob with its last safe value', async () => {
      const rig = createRig();
      const { scheduler, events } = createScheduler(
        createRigRuncard({
          alarms: [
            createAlarm({ name: 'Cap', variable: 'Level', condition: { operator: '>', threshold: 2.5 }, protocol: 'hold' }),
          ],
        }),
        rig
      );

      const result = await scheduler.run();

      expect(result.status).toBe('completed');
      expect(rig.writes).toEqual([0, 1, 2, 3, 2, 4, 2]);
      expect(events.map((event) => event.values['Level'])).toEqual([0, 1, 2, 2, 2]);
    });

    it('escalates to abort once the retry limit is used up', async () => {
      const rig = createRig([2]);
      const sink = createRecordingSink();
      const { scheduler } = createScheduler(
        createRigRuncard({
          settings: createSettings({ retryLimit: 2, maxTicks: 5 }),
          alarms: [createAlarm({ name: 'Hold r', protocol: 'hold' })],
        }),
        rig,
        { sinks: [sink] }
      );

      const result = await scheduler.run();

      expect(result).toMatchObject({
        status: 'aborted',
        reason: 'hold-exhausted',
        ticks: 1,
        snapshots: 1,
        abort: {
          alarm: 'Hold r',
          variable: 'Distance r',
          message: 'Alarm "Hold r" on "Distance r" aborted the experiment: still triggered after 2 hold attempt(s) (value 2)',
        },
      });
      expect(rig.reads).toBe(3);
      expect(sink.received.map((snapshot) => snapshot.values['Distance r'])).toEqual([2]);
    });
  });

  describe('abort protocol', () => {
    it('terminates, flushes a final snapshot and reports the alarm', async () => {
      const rig = createRig([0.5, 0.7, 3]);
      const sink = createRecordingSink();
      const { scheduler } = createScheduler(
        createRigRuncard({
          settings: createSettings({ saveInterval: 2, maxTicks: 10 }),
          variables: [{ kind: 'knob', name: 'Level', instrument: 'Rig', knob: 'level', postset: 0 }, DISTANCE],
          alarms: [createAlarm({ protocol: 'abort' })],
        }),
        rig,
        { sinks: [sink] }
      );

      const result = await scheduler.run();

      expect(result).toMatchObject({
        status: 'aborted',
        reason: 'alarm',
        ticks: 3,
        snapshots: 2,
        lastSnapshotAt: '2026-03-01T10:00:00.000Z',
        abort: { alarm: 'Escape', variable: 'Distance r' },
      });
      expect(sink.received.map((snapshot) => snapshot.tick)).toEqual([0, 2]);
      expect(sink.received[1]?.values['Distance r']).toBe(3);
      // Routine writes, then the postset on the way out
      expect(rig.writes).toEqual([0, 1, 2, 0]);
      expect(rig.connected).toBe(false);
      expect(scheduler.state).toBe('terminated');
    });
  });

  describe('instrument failures', () => {
    it('retries failed writes within the tick', async () => {
      const rig = createRig();
      rig.failWrites = 2;
      const { scheduler } = createScheduler(
        createRigRuncard({ settings: createSettings({ retryLimit: 2, maxTicks: 2 }) }),
        rig
      );

      const result = await scheduler.run();

      expect(result.status).toBe('completed');
      expect(rig.writes).toEqual([0, 1]);
    });

    it('aborts with instrument-io once retries are exhausted', async () => {
      const rig = createRig();
      rig.failWrites = Number.POSITIVE_INFINITY;
      const { scheduler } = createScheduler(
        createRigRuncard({ settings: createSettings({ retryLimit: 2 }) }),
        rig
      );

      const result = await scheduler.run();

      expect(result).toMatchObject({
        status: 'aborted',
        reason: 'instrument-io',
        ticks: 1,
        abort: { message: 'Instrument "Rig" failed to write level: timeout' },
      });
      expect(rig.connected).toBe(false);
    });
  });

  describe('termination', () => {
    it('completes when every routine is complete', async () => {
      const rig = createRig();
      const { scheduler } = createScheduler(
        createRigRuncard({
          settings: createSettings(),
          routines: [createDriveRoutine({ type: 'ramp', times: [0, 2], values: [0, 1] })],
        }),
        rig
      );

      const result = await scheduler.run();

      expect(result).toMatchObject({ status: 'completed', reason: 'routines-complete', ticks: 4 });
      expect(rig.writes).toEqual([0, 0.5, 1]);
    });

    it('completes once the duration is reached', async () => {
      const { scheduler } = createScheduler(
        createRigRuncard({
          settings: createSettings({ stepInterval: 0.5, duration: 1.5 }),
          routines: [],
        }),
        createRig()
      );

      const result = await scheduler.run();

      expect(result).toMatchObject({ status: 'completed', reason: 'duration', ticks: 3, elapsed: 1.5 });
    });

    it('stops at the tick boundary after a stop request', async () => {
      const { scheduler, events } = createScheduler(
        createRigRuncard({ settings: createSettings() }),
        createRig()
      );
      scheduler.addListener({
        onTick: (event) => {
          if (event.tick === 2) scheduler.requestStop();
        },
      });

      const result = await scheduler.run();

      expect(result).toMatchObject({ status: 'stopped', reason: 'stop-requested', ticks: 3 });
      expect(events).toHaveLength(3);
    });

    it('honours a stop requested from a timer while a wait alarm holds the clock', async () => {
      const rig = createRig([5]);
      const { scheduler, events } = createScheduler(
        createRigRuncard({ settings: createSettings(), alarms: [createAlarm()] }),
        rig
      );
      const timer = setTimeout(() => scheduler.requestStop(), 5);

      const result = await scheduler.run();
      clearTimeout(timer);

      expect(result).toMatchObject({ status: 'stopped', reason: 'stop-requested', elapsed: 0 });
      expect(result.ticks).toBeGreaterThan(0);
      expect(events.length).toBe(result.ticks);
      expect(rig.writes).toEqual([0]);
    });

    it('refuses to run twice', async () => {
      const { scheduler } = createScheduler(createRigRuncard(), createRig());
      await scheduler.run();

      await expect(scheduler.run()).rejects.toThrow(SchedulerStateError);
      expect(() => scheduler.requestStop()).toThrow('Cannot request a stop while terminated');
    });
  });

  describe('sink delivery', () => {
    it('lets sinks doing asynchronous I/O keep up with a simulated clock', async () => {
      const written: number[] = [];
      const sink: SnapshotSink = {
        name: 'slow',
        channel: 'save',
        async write(snapshot) {
          await new Promise<void>((resolve) => setImmediate(resolve));
          written.push(snapshot.tick);
        },
      };
      const { scheduler } = createScheduler(
        createRigRuncard({ settings: createSettings({ maxTicks: 1000, queueCapacity: 100 }), routines: [] }),
        createRig(),
        { sinks: [sink] }
      );

      const result = await scheduler.run();

      expect(result).toMatchObject({ reason: 'max-ticks', snapshots: 1000, dropped: 0 });
      expect(written).toHaveLength(1000);
      expect(written.slice(0, 3)).toEqual([0, 1, 2]);
    });

    it('reports no last snapshot time when every write fails', async () => {
      const sink: SnapshotSink = {
        name: 'broken',
        channel: 'save',
        async write() {
          throw new Error('disk full');
        },
      };
      const { scheduler } = createScheduler(
        createRigRuncard({ settings: createSettings({ maxTicks: 2 }), routines: [] }),
        createRig(),
        { sinks: [sink] }
      );

      const result = await scheduler.run();

      expect(result).toMatchObject({ snapshots: 2, lastSnapshotAt: null });
    });
  });

  describe('operator pause', () => {
    it('gates the clock between pause and resume', async () => {
      const rig = createRig();
      const { scheduler, events, states } = createScheduler(createRigRuncard(), rig);
      scheduler.addListener({
        onTick: (event) => {
          if (event.tick === 1) scheduler.pause();
          if (event.tick === 3) scheduler.resume();
        },
      });

      await scheduler.run();

      expect(events.map((event) => event.writes.length)).toEqual([1, 1, 0, 0, 1]);
      expect(events.map((event) => event.elapsed)).toEqual([0, 1, 1, 1, 2]);
      expect(rig.writes).toEqual([0, 1, 2]);
      expect(states).toEqual(['running', 'paused', 'running', 'terminated']);
    });

    it('cannot pause before running', () => {
      const { scheduler } = createScheduler(createRigRuncard(), createRig());

      expect(() => scheduler.pause()).toThrow('Cannot pause while idle');
      expect(() => scheduler.resume()).toThrow('Cannot resume while idle');
    });
  });

  describe('wall clock', () => {
    it('sleeps out the rest of each step interval', async () => {
      let current = FIXED_NOW;
      const sleeps: number[] = [];
      const { scheduler, events } = createScheduler(
        createRigRuncard({ settings: createSettings({ clock: 'wall', stepInterval: 0.25, maxTicks: 3 }) }),
        createRig(),
        {
          now: () => current,
          sleep: async (ms) => {
            sleeps.push(ms);
            current += ms;
          },
        }
      );

      await scheduler.run();

      expect(sleeps).toEqual([250, 250]);
      expect(events.map((event) => event.elapsed)).toEqual([0, 0.25, 0.5]);
    });
  });
});
