// Tests for instrument drivers and the knob/meter interface

import { describe, it, expect } from 'vitest';
import type { InstrumentSpec } from '@runcard/protocol';
import { InstrumentIOError, UnknownInstrumentTypeError, ValidationError } from '../errors.js';
import { createCapturingLogger } from '../logging.js';
import { createInstrumentRegistry } from './registry.js';
import { InstrumentSet } from './instrument-set.js';
import { HenonMapper } from './henon.js';
import type { InstrumentDriver } from './types.js';

// --- Test Fixtures ---

function createSpec(overrides: Partial<InstrumentSpec> = {}): InstrumentSpec {
  return {
    name: 'Mapper',
    type: 'HenonMapper',
    address: '',
    options: {},
    ...overrides,
  };
}

type FlakyOptions = {
  failConnect?: boolean;
  failWrites?: number;
  failDisconnect?: boolean;
};

function createFlakyDriver(options: FlakyOptions = {}): InstrumentDriver & { calls: string[] } {
  const calls: string[] = [];
  let failWrites = options.failWrites ?? 0;
  return {
    type: 'Flaky',
    knobs: ['level'],
    meters: ['reading'],
    postsets: { level: 0 },
    calls,
    async connect() {
      calls.push('connect');
      if (options.failConnect) throw new Error('port busy');
    },
    async set(knob, value) {
      calls.push(`set ${knob}=${value}`);
      if (failWrites > 0) {
        failWrites--;
        throw new Error('timeout');
      }
    },
    async measure() {
      calls.push('measure');
      return Number.NaN;
    },
    async disconnect() {
      calls.push('disconnect');
      if (options.failDisconnect) throw new Error('cable unplugged');
    },
  };
}

function createSetWith(driver: InstrumentDriver, name = 'Rig'): InstrumentSet {
  return new InstrumentSet(new Map([[name, driver]]));
}

// --- Tests ---

describe('createInstrumentRegistry', () => {
  it('registers the built-in virtual instruments', () => {
    const registry = createInstrumentRegistry();

    expect(registry.getRegisteredTypes()).toEqual(['HenonMapper', 'Echo']);
  });

  it('rejects duplicate registrations unless forced', () => {
    const registry = createInstrumentRegistry();

    expect(() => registry.register('Echo', () => new HenonMapper())).toThrow(
      'Instrument driver already registered for type: Echo'
    );
    registry.forceRegister('Echo', () => new HenonMapper());
    expect(registry.create(createSpec({ type: 'Echo' })).type).toBe('HenonMapper');
  });

  it('throws UnknownInstrumentTypeError for unregistered types', () => {
    const registry = createInstrumentRegistry();

    expect(() => registry.create(createSpec({ type: 'Oscilloscope' }))).toThrow(
      UnknownInstrumentTypeError
    );
  });

  it('unregisters types', () => {
    const registry = createInstrumentRegistry();

    expect(registry.unregister('Echo')).toBe(true);
    expect(registry.unregister('Echo')).toBe(false);
    expect(registry.has('Echo')).toBe(false);
  });
});

describe('HenonMapper', () => {
  it('iterates the map each time x is measured', async () => {
    const mapper = new HenonMapper();
    await mapper.set('a', 1.0);
    await mapper.set('b', 0.3);

    // x' = 1 - 1.0 * 0.63^2 + 0.19, y' = 0.3 * 0.63
    expect(await mapper.measure('x')).toBeCloseTo(0.7931, 10);
    expect(await mapper.measure('y')).toBeCloseTo(0.189, 10);
    expect(await mapper.measure('y')).toBeCloseTo(0.189, 10);
  });

  it('reports knob settings back', async () => {
    const mapper = new HenonMapper();
    await mapper.set('a', 1.2);

    expect(await mapper.get('a')).toBe(1.2);
    expect(await mapper.get('b')).toBe(0.3);
    expect(await mapper.get('c')).toBeUndefined();
  });

  it('rejects unknown endpoints', async () => {
    const mapper = new HenonMapper();

    await expect(mapper.set('c', 1)).rejects.toThrow('HenonMapper has no knob "c"');
    await expect(mapper.measure('z')).rejects.toThrow('HenonMapper has no meter "z"');
  });
});

describe('Echo instrument', () => {
  it('echoes knob values on same-named meters', async () => {
    const registry = createInstrumentRegistry();
    const echo = registry.create(
      createSpec({ name: 'Bench', type: 'Echo', options: { knobs: ['voltage'], meters: ['voltage', 'current'] } })
    );

    expect(await echo.measure('voltage')).toBe(0);
    await echo.set('voltage', 2.5);
    expect(await echo.measure('voltage')).toBe(2.5);
    expect(await echo.measure('current')).toBe(0);
  });

  it('reports configured constants on meters with no knob', async () => {
    const echo = createInstrumentRegistry().create(
      createSpec({ type: 'Echo', options: { knobs: ['voltage'], constants: { current: 0.02 } } })
    );

    expect(echo.meters).toEqual(['voltage', 'current']);
    expect(await echo.measure('current')).toBe(0.02);
  });

  it('defaults to a single "value" knob and meter', () => {
    const echo = createInstrumentRegistry().create(createSpec({ type: 'Echo' }));

    expect(echo.knobs).toEqual(['value']);
    expect(echo.meters).toEqual(['value']);
  });

  it('rejects malformed options', () => {
    const registry = createInstrumentRegistry();

    expect(() => registry.create(createSpec({ type: 'Echo', options: { knobs: 'voltage' } }))).toThrow(
      ValidationError
    );
  });
});

describe('InstrumentSet', () => {
  it('applies driver presets before runcard presets', async () => {
    const set = InstrumentSet.create([createSpec()], createInstrumentRegistry());

    await set.connectAll([{ instrument: 'Mapper', knob: 'a', value: 1.0 }]);

    expect(await set.readKnob('Mapper', 'a')).toBe(1.0);
    expect(await set.readKnob('Mapper', 'b')).toBe(0.3);
  });

  it('refuses I/O before connecting', async () => {
    const set = InstrumentSet.create([createSpec()], createInstrumentRegistry());

    await expect(set.write('Mapper', 'a', 1)).rejects.toThrow(
      'Instrument "Mapper" failed to write a: instrument is not connected'
    );
  });

  it('rejects endpoints the driver does not expose', async () => {
    const set = InstrumentSet.create([createSpec()], createInstrumentRegistry());
    await set.connectAll();

    await expect(set.write('Mapper', 'x', 1)).rejects.toThrow(
      'Instrument "Mapper" failed to write x: HenonMapper does not expose knob "x"'
    );
    await expect(set.read('Mapper', 'q')).rejects.toThrow(
      'Instrument "Mapper" failed to read q: HenonMapper does not expose meter "q"'
    );
    await expect(set.read('Nowhere', 'x')).rejects.toThrow(
      'Instrument "Nowhere" failed to read x: no such instrument'
    );
  });

  it('wraps driver failures in InstrumentIOError', async () => {
    const set = createSetWith(createFlakyDriver({ failWrites: 1 }));
    await set.connectAll();

    const error = await set.write('Rig', 'level', 3).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InstrumentIOError);
    expect(error).toMatchObject({ instrument: 'Rig', endpoint: 'level', operation: 'write' });
    await expect(set.write('Rig', 'level', 3)).resolves.toBeUndefined();
  });

  it('rejects non-numeric meter readings', async () => {
    const set = createSetWith(createFlakyDriver());
    await set.connectAll();

    await expect(set.read('Rig', 'reading')).rejects.toThrow(
      'Instrument "Rig" failed to read reading: returned a non-numeric value (NaN)'
    );
  });

  it('reports connect failures', async () => {
    const set = createSetWith(createFlakyDriver({ failConnect: true }));

    await expect(set.connectAll()).rejects.toThrow('Instrument "Rig" failed to connect Flaky: port busy');
    expect(set.isConnected('Rig')).toBe(false);
  });

  it('applies postsets and disconnects', async () => {
    const driver = createFlakyDriver();
    const set = createSetWith(driver);
    await set.connectAll();

    const failures = await set.disconnectAll([{ instrument: 'Rig', knob: 'level', value: 7 }]);

    expect(failures).toEqual([]);
    expect(driver.calls).toEqual(['connect', 'set level=7', 'set level=0', 'disconnect']);
    expect(set.isConnected('Rig')).toBe(false);
  });

  it('keeps shutting down past failures and returns them', async () => {
    const driver = createFlakyDriver({ failDisconnect: true });
    const logger = createCapturingLogger();
    const set = new InstrumentSet(new Map([['Rig', driver]]), logger);
    await set.connectAll();

    const failures = await set.disconnectAll();

    expect(failures).toHaveLength(1);
    expect(failures[0]?.message).toBe('Instrument "Rig" failed to disconnect Flaky: cable unplugged');
    expect(driver.calls).toEqual(['connect', 'set level=0', 'disconnect']);
    expect(logger.entries.filter((entry) => entry.level === 'error')).toHaveLength(1);
  });
});
