// Runcard - declarative description of one experiment

import type { Name } from './common.js';
import type { VariableDefinition } from './variables.js';
import type { AlarmDefinition } from './alarms.js';
import type { RoutineDefinition } from './routines.js';

/**
 * Free-form header of a runcard
 */
export type RuncardDescription = {
  name?: string;
  operator?: string;
  platform?: string;
  comments?: string;
};

/**
 * How the experiment clock advances:
 * - wall: real elapsed time, minus time spent paused
 * - simulated: one step interval per running tick
 */
export type ClockMode = 'wall' | 'simulated';

export type RuncardSettings = {
  /**
   * Minimum spacing between ticks, in seconds
   */
  stepInterval: number;

  /**
   * Ticks between snapshots handed to plot sinks
   */
  plotInterval: number;

  /**
   * Ticks between snapshots handed to save sinks
   */
  saveInterval: number;

  /**
   * Runcard to chain on completion, or null
   */
  followUp: string | null;

  clock: ClockMode;

  /**
   * Stop after this many ticks
   */
  maxTicks?: number;

  /**
   * Stop once experiment time reaches this many seconds
   */
  duration?: number;

  /**
   * Attempts for hold protocols and failing instrument I/O before aborting
   */
  retryLimit: number;

  /**
   * Capacity of each sink's snapshot queue
   */
  queueCapacity: number;
};

export const DEFAULT_SETTINGS: RuncardSettings = {
  stepInterval: 1,
  plotInterval: 1,
  saveInterval: 1,
  followUp: null,
  clock: 'wall',
  retryLimit: 3,
  queueCapacity: 100,
};

export type InstrumentSpec = {
  name: Name;

  /**
   * Selects the driver
   */
  type: string;

  /**
   * Connection descriptor, opaque to the engine
   */
  address: string;

  /**
   * Any other keys of the instrument entry, passed to the driver
   */
  options: Record<string, unknown>;
};

export type PlotDefinition = {
  name: Name;

  /**
   * Variable name or "Time"
   */
  x: Name;

  /**
   * One or more variable names or "Time"
   */
  y: Name[];

  /**
   * Labels, style, marker, ... passed through to plot sinks
   */
  hints: Record<string, unknown>;
};

/**
 * A parsed runcard. Every section keeps declaration order.
 */
export type Runcard = {
  description: RuncardDescription;
  settings: RuncardSettings;
  instruments: InstrumentSpec[];
  variables: VariableDefinition[];
  alarms: AlarmDefinition[];
  plots: PlotDefinition[];
  routines: RoutineDefinition[];
};
