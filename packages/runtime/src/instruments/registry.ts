// Instrument registry - maps runcard instrument types to driver factories
//
// New instrument kinds register a factory here; the scheduler only ever sees
// the InstrumentDriver interface.

import type { InstrumentSpec } from '@runcard/protocol';
import { UnknownInstrumentTypeError } from '../errors.js';
import type { InstrumentDriver, InstrumentFactory } from './types.js';
import { createHenonMapper, HENON_MAPPER_TYPE } from './henon.js';
import { createEchoInstrument, ECHO_TYPE } from './echo.js';

export class InstrumentRegistry {
  private factories = new Map<string, InstrumentFactory>();

  /**
   * Register a factory for an instrument type.
   *
   * @throws Error if a factory is already registered (use forceRegister to override)
   */
  register(type: string, factory: InstrumentFactory): void {
    if (this.factories.has(type)) {
      throw new Error(`Instrument driver already registered for type: ${type}`);
    }
    this.factories.set(type, factory);
  }

  /**
   * Register a factory, overwriting any existing one.
   * Use with caution - primarily for testing.
   */
  forceRegister(type: string, factory: InstrumentFactory): void {
    this.factories.set(type, factory);
  }

  /**
   * @returns true if a factory was removed, false if none existed
   */
  unregister(type: string): boolean {
    return this.factories.delete(type);
  }

  has(type: string): boolean {
    return this.factories.has(type);
  }

  getRegisteredTypes(): string[] {
    return Array.from(this.factories.keys());
  }

  /**
   * Build a driver for a runcard instrument entry.
   *
   * @throws UnknownInstrumentTypeError if no factory is registered for the type
   */
  create(spec: InstrumentSpec): InstrumentDriver {
    const factory = this.factories.get(spec.type);
    if (!factory) {
      throw new UnknownInstrumentTypeError(spec.type, this.getRegisteredTypes());
    }
    return factory(spec);
  }
}

/**
 * Create a registry with the built-in virtual instruments registered.
 */
export function createInstrumentRegistry(): InstrumentRegistry {
  const registry = new InstrumentRegistry();
  registry.register(HENON_MAPPER_TYPE, createHenonMapper);
  registry.register(ECHO_TYPE, createEchoInstrument);
  return registry;
}
