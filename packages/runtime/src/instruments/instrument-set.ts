// Knob/meter interface - uniform access to every instrument in a runcard

import type { InstrumentSpec } from '@runcard/protocol';
import { InstrumentIOError } from '../errors.js';
import type { EngineLogger } from '../logging.js';
import { silentLogger } from '../logging.js';
import type { InstrumentRegistry } from './registry.js';
import type { InstrumentDriver } from './types.js';

/**
 * A knob value applied at connect (preset) or disconnect (postset) time.
 */
export type KnobSetting = {
  instrument: string;
  knob: string;
  value: number;
};

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function asError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

/**
 * The instruments of one experiment, addressed by runcard name.
 *
 * Every failure surfaces as an InstrumentIOError naming the instrument and
 * endpoint. The set never retries.
 */
export class InstrumentSet {
  private readonly drivers: ReadonlyMap<string, InstrumentDriver>;
  private readonly connected = new Set<string>();
  private readonly logger: EngineLogger;

  constructor(drivers: ReadonlyMap<string, InstrumentDriver>, logger: EngineLogger = silentLogger) {
    this.drivers = drivers;
    this.logger = logger;
  }

  /**
   * Build drivers for every instrument entry. No I/O happens here.
   *
   * @throws UnknownInstrumentTypeError for a type with no registered driver
   */
  static create(
    specs: readonly InstrumentSpec[],
    registry: InstrumentRegistry,
    logger: EngineLogger = silentLogger
  ): InstrumentSet {
    const drivers = new Map<string, InstrumentDriver>();
    for (const spec of specs) {
      drivers.set(spec.name, registry.create(spec));
    }
    return new InstrumentSet(drivers, logger);
  }

  names(): string[] {
    return Array.from(this.drivers.keys());
  }

  driver(instrument: string): InstrumentDriver | undefined {
    return this.drivers.get(instrument);
  }

  hasKnob(instrument: string, knob: string): boolean {
    return this.drivers.get(instrument)?.knobs.includes(knob) ?? false;
  }

  hasMeter(instrument: string, meter: string): boolean {
    return this.drivers.get(instrument)?.meters.includes(meter) ?? false;
  }

  isConnected(instrument: string): boolean {
    return this.connected.has(instrument);
  }

  /**
   * Connect every instrument, then apply each driver's own presets followed
   * by the given runcard presets.
   */
  async connectAll(presets: readonly KnobSetting[] = []): Promise<void> {
    for (const [name, driver] of this.drivers) {
      try {
        await driver.connect?.();
      } catch (error) {
        throw new InstrumentIOError(name, driver.type, 'connect', describe(error), asError(error));
      }
      this.connected.add(name);
      this.logger.debug('Instrument connected', { instrument: name, type: driver.type });

      for (const [knob, value] of Object.entries(driver.presets ?? {})) {
        await this.write(name, knob, value);
      }
    }

    for (const preset of presets) {
      await this.write(preset.instrument, preset.knob, preset.value);
    }
  }

  /**
   * Apply runcard postsets, then driver postsets, then disconnect.
   *
   * Keeps going past failures so every instrument gets its chance to shut
   * down; the failures are logged and returned.
   */
  async disconnectAll(postsets: readonly KnobSetting[] = []): Promise<InstrumentIOError[]> {
    const failures: InstrumentIOError[] = [];
    const attempt = async (operation: () => Promise<void>) => {
      try {
        await operation();
      } catch (error) {
        const failure =
          error instanceof InstrumentIOError
            ? error
            : new InstrumentIOError('unknown', 'unknown', 'disconnect', describe(error), asError(error));
        failures.push(failure);
        this.logger.error('Instrument shutdown step failed', {
          instrument: failure.instrument,
          endpoint: failure.endpoint,
          error: failure.message,
        });
      }
    };

    for (const postset of postsets) {
      if (this.connected.has(postset.instrument)) {
        await attempt(() => this.write(postset.instrument, postset.knob, postset.value));
      }
    }

    for (const [name, driver] of this.drivers) {
      if (!this.connected.has(name)) continue;

      for (const [knob, value] of Object.entries(driver.postsets ?? {})) {
        await attempt(() => this.write(name, knob, value));
      }

      await attempt(async () => {
        try {
          await driver.disconnect?.();
        } catch (error) {
          throw new InstrumentIOError(name, driver.type, 'disconnect', describe(error), asError(error));
        }
      });
      this.connected.delete(name);
      this.logger.debug('Instrument disconnected', { instrument: name });
    }

    return failures;
  }

  async write(instrument: string, knob: string, value: number): Promise<void> {
    const driver = this.requireEndpoint(instrument, knob, 'write');
    try {
      await driver.set(knob, value);
    } catch (error) {
      throw new InstrumentIOError(instrument, knob, 'write', describe(error), asError(error));
    }
  }

  async read(instrument: string, meter: string): Promise<number> {
    const driver = this.requireEndpoint(instrument, meter, 'read');
    let value: unknown;
    try {
      value = await driver.measure(meter);
    } catch (error) {
      throw new InstrumentIOError(instrument, meter, 'read', describe(error), asError(error));
    }
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new InstrumentIOError(instrument, meter, 'read', `returned a non-numeric value (${String(value)})`);
    }
    return value;
  }

  /**
   * Read back a knob setting. Undefined when the driver cannot report it.
   */
  async readKnob(instrument: string, knob: string): Promise<number | undefined> {
    const driver = this.requireEndpoint(instrument, knob, 'read');
    if (!driver.get) return undefined;
    try {
      return await driver.get(knob);
    } catch (error) {
      throw new InstrumentIOError(instrument, knob, 'read', describe(error), asError(error));
    }
  }

  private requireEndpoint(
    instrument: string,
    endpoint: string,
    operation: 'write' | 'read'
  ): InstrumentDriver {
    const driver = this.drivers.get(instrument);
    if (!driver) {
      throw new InstrumentIOError(instrument, endpoint, operation, 'no such instrument');
    }
    if (!this.connected.has(instrument)) {
      throw new InstrumentIOError(instrument, endpoint, operation, 'instrument is not connected');
    }
    const exposed = operation === 'write' ? driver.knobs : [...driver.knobs, ...driver.meters];
    if (!exposed.includes(endpoint)) {
      throw new InstrumentIOError(
        instrument,
        endpoint,
        operation,
        `${driver.type} does not expose ${operation === 'write' ? 'knob' : 'meter'} "${endpoint}"`
      );
    }
    return driver;
  }
}
