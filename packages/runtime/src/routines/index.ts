export { interpolate, windowOf, advance, isComplete, finalValue } from './interpolation.js';
export type { RoutineWindow } from './interpolation.js';
export { RoutineInterpreter } from './interpreter.js';
export type { RoutineWrite } from './interpreter.js';
