// Henon map virtual instrument
//
// Two knobs (a, b) and two meters (x, y). Measuring x advances the map
//   x' = 1 - a x^2 + y
//   y' = b x
// and measuring y reports the y of the latest iteration. Useful for exercising
// runcards without hardware.

import type { InstrumentDriver } from './types.js';

export const HENON_MAPPER_TYPE = 'HenonMapper';

/**
 * Starting point, near the map's unstable fixed point
 */
export const HENON_START = { x: 0.63, y: 0.19 } as const;

export class HenonMapper implements InstrumentDriver {
  readonly type = HENON_MAPPER_TYPE;
  readonly knobs = ['a', 'b'] as const;
  readonly meters = ['x', 'y'] as const;
  readonly presets = { a: 1.4, b: 0.3 };

  private a = 1.4;
  private b = 0.3;
  private x: number = HENON_START.x;
  private y: number = HENON_START.y;

  async set(knob: string, value: number): Promise<void> {
    switch (knob) {
      case 'a':
        this.a = value;
        return;
      case 'b':
        this.b = value;
        return;
      default:
        throw new Error(`${this.type} has no knob "${knob}"`);
    }
  }

  async get(knob: string): Promise<number | undefined> {
    switch (knob) {
      case 'a':
        return this.a;
      case 'b':
        return this.b;
      default:
        return undefined;
    }
  }

  async measure(meter: string): Promise<number> {
    switch (meter) {
      case 'x': {
        const x = 1 - this.a * this.x ** 2 + this.y;
        const y = this.b * this.x;
        this.x = x;
        this.y = y;
        return this.x;
      }
      case 'y':
        return this.y;
      default:
        throw new Error(`${this.type} has no meter "${meter}"`);
    }
  }
}

export function createHenonMapper(): InstrumentDriver {
  return new HenonMapper();
}
