export type { InstrumentDriver, InstrumentFactory } from './types.js';
export { InstrumentRegistry, createInstrumentRegistry } from './registry.js';
export { HenonMapper, HENON_MAPPER_TYPE, HENON_START, createHenonMapper } from './henon.js';
export { EchoInstrument, ECHO_TYPE, createEchoInstrument } from './echo.js';
export { InstrumentSet } from './instrument-set.js';
export type { KnobSetting } from './instrument-set.js';
