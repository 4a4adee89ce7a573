// Instrument driver types

import type { InstrumentSpec } from '@runcard/protocol';

/**
 * A driver for one instrument: a set of writable knobs and readable meters.
 *
 * Drivers perform the actual transport. They are constructed without touching
 * hardware; all I/O happens in connect/set/get/measure/disconnect. Drivers do
 * not retry; retry policy belongs to the scheduler.
 */
export interface InstrumentDriver {
  /**
   * Driver type name, as written in runcards
   */
  readonly type: string;

  readonly knobs: readonly string[];
  readonly meters: readonly string[];

  /**
   * Knob values to apply when the instrument connects
   */
  readonly presets?: Readonly<Record<string, number>>;

  /**
   * Knob values to apply before the instrument disconnects
   */
  readonly postsets?: Readonly<Record<string, number>>;

  connect?(): Promise<void>;

  set(knob: string, value: number): Promise<void>;

  /**
   * Read back a knob's current setting, if the instrument supports it
   */
  get?(knob: string): Promise<number | undefined>;

  measure(meter: string): Promise<number>;

  disconnect?(): Promise<void>;
}

/**
 * Builds a driver from a runcard instrument entry
 */
export type InstrumentFactory = (spec: InstrumentSpec) => InstrumentDriver;
