// Variable declarations - knobs, meters and derived expressions

import type { Name } from './common.js';

/**
 * Variable kinds determine where a value comes from
 */
export type VariableKind = 'knob' | 'meter' | 'expression';

/**
 * A writable instrument parameter.
 */
export type KnobVariable = {
  kind: 'knob';
  name: Name;
  instrument: Name;
  knob: string;

  /**
   * Written once after the instrument connects
   */
  preset?: number;

  /**
   * Written once before the instrument disconnects
   */
  postset?: number;
};

/**
 * A readable instrument sensor value.
 */
export type MeterVariable = {
  kind: 'meter';
  name: Name;
  instrument: Name;
  meter: string;
};

/**
 * A value derived from other variables through a formula.
 */
export type ExpressionVariable = {
  kind: 'expression';
  name: Name;

  /**
   * Formula, e.g. "sqrt(x^2 + y^2)"
   */
  expression: string;

  /**
   * Symbol used in the formula -> referenced variable name.
   * Insertion order is declaration order.
   */
  definitions: Record<string, Name>;
};

export type VariableDefinition = KnobVariable | MeterVariable | ExpressionVariable;

/**
 * Instrument-backed variables (knobs and meters)
 */
export type MappedVariable = KnobVariable | MeterVariable;

export function isMappedVariable(variable: VariableDefinition): variable is MappedVariable {
  return variable.kind === 'knob' || variable.kind === 'meter';
}
