// Echo virtual instrument
//
// Each meter reports the last value written to the knob of the same name
// (0 until written), or a configured constant. Knob and meter names come from
// the runcard entry:
//
//   Bench:
//     type: Echo
//     knobs: [voltage]
//     meters: [voltage, current]
//     constants: { current: 0.02 }

import { z } from 'zod';
import type { InstrumentSpec } from '@runcard/protocol';
import { ValidationError } from '../errors.js';
import type { InstrumentDriver } from './types.js';

export const ECHO_TYPE = 'Echo';

const echoOptionsSchema = z.object({
  knobs: z.array(z.string().min(1)).optional(),
  meters: z.array(z.string().min(1)).optional(),
  constants: z.record(z.number()).optional(),
});

export class EchoInstrument implements InstrumentDriver {
  readonly type = ECHO_TYPE;
  readonly knobs: readonly string[];
  readonly meters: readonly string[];

  private readonly settings = new Map<string, number>();
  private readonly constants: Readonly<Record<string, number>>;

  constructor(
    knobs: readonly string[],
    meters: readonly string[],
    constants: Readonly<Record<string, number>> = {}
  ) {
    this.knobs = knobs;
    this.meters = meters;
    this.constants = constants;
  }

  async set(knob: string, value: number): Promise<void> {
    if (!this.knobs.includes(knob)) {
      throw new Error(`${this.type} has no knob "${knob}"`);
    }
    this.settings.set(knob, value);
  }

  async get(knob: string): Promise<number | undefined> {
    return this.settings.get(knob);
  }

  async measure(meter: string): Promise<number> {
    if (!this.meters.includes(meter)) {
      throw new Error(`${this.type} has no meter "${meter}"`);
    }
    return this.settings.get(meter) ?? this.constants[meter] ?? 0;
  }
}

/**
 * @throws ValidationError if the knobs/meters options are malformed
 */
export function createEchoInstrument(spec: InstrumentSpec): InstrumentDriver {
  const parsed = echoOptionsSchema.safeParse(spec.options);
  if (!parsed.success) {
    throw new ValidationError(`Invalid options for ${ECHO_TYPE} instrument "${spec.name}"`, {
      field: spec.name,
      issues: parsed.error.issues.map((issue) => ({
        path: ['Instruments', spec.name, ...issue.path].join('.'),
        message: issue.message,
        code: 'INVALID_VALUE',
      })),
    });
  }

  const knobs = parsed.data.knobs ?? ['value'];
  const constants = parsed.data.constants ?? {};
  const meters = parsed.data.meters ?? [...knobs, ...Object.keys(constants)];
  return new EchoInstrument(knobs, meters, constants);
}
