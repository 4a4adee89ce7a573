// Experiment clock - the only source of "now" for routines and snapshot cadence

import type { ClockMode } from '@runcard/protocol';

/**
 * Why the clock is gated. The clock stays gated while any reason holds.
 */
export type GateReason = 'alarm' | 'operator';

export type ClockOptions = {
  mode: ClockMode;

  /**
   * Seconds of experiment time per running tick in simulated mode
   */
  stepInterval: number;

  /**
   * Millisecond time source for wall mode
   */
  now?: () => number;
};

/**
 * Tick counter plus elapsed experiment time.
 *
 * In wall mode elapsed time is real time since start minus time spent gated.
 * In simulated mode each completed, ungated tick adds one step interval.
 * Either way a gated clock does not move, so routines never catch up on time
 * spent waiting.
 */
export class ExperimentClock {
  readonly mode: ClockMode;
  private readonly stepInterval: number;
  private readonly now: () => number;

  private ticks = 0;
  private startedAt: number | null = null;
  private gatedAt: number | null = null;
  private gatedTotal = 0;
  private simulated = 0;
  private readonly reasons = new Set<GateReason>();

  constructor(options: ClockOptions) {
    this.mode = options.mode;
    this.stepInterval = options.stepInterval;
    this.now = options.now ?? Date.now;
  }

  start(): void {
    this.startedAt = this.now();
  }

  get started(): boolean {
    return this.startedAt !== null;
  }

  /**
   * Completed ticks
   */
  get tick(): number {
    return this.ticks;
  }

  get gated(): boolean {
    return this.reasons.size > 0;
  }

  isGatedBy(reason: GateReason): boolean {
    return this.reasons.has(reason);
  }

  /**
   * Elapsed experiment time in seconds
   */
  elapsed(): number {
    if (this.mode === 'simulated') {
      return this.simulated;
    }
    if (this.startedAt === null) {
      return 0;
    }
    const until = this.gatedAt ?? this.now();
    return (until - this.startedAt - this.gatedTotal) / 1000;
  }

  /**
   * Mark the end of a tick
   */
  completeTick(): void {
    this.ticks++;
    if (this.mode === 'simulated' && !this.gated) {
      this.simulated += this.stepInterval;
    }
  }

  pause(reason: GateReason): void {
    if (!this.gated && this.mode === 'wall') {
      this.gatedAt = this.now();
    }
    this.reasons.add(reason);
  }

  resume(reason: GateReason): void {
    if (!this.reasons.delete(reason) || this.gated) {
      return;
    }
    if (this.gatedAt !== null) {
      this.gatedTotal += this.now() - this.gatedAt;
      this.gatedAt = null;
    }
  }
}
