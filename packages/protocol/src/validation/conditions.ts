// Alarm condition parsing
//
// Runcards write conditions as an operator followed by a threshold, e.g. ">1",
// "<= -0.5" or "!=0". They are parsed once into an AlarmCondition and compared
// as typed values on every tick.

import type { AlarmCondition, ComparisonOperator } from '../types/alarms.js';

const OPERATORS: Record<string, ComparisonOperator> = {
  '>': '>',
  '>=': '>=',
  '<': '<',
  '<=': '<=',
  '==': '==',
  '=': '==',
  '!=': '!=',
};

const CONDITION_PATTERN =
  /^\s*(>=|<=|==|!=|>|<|=)\s*([-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?)\s*$/;

/**
 * Parse a condition string.
 *
 * @returns The parsed condition, or null if the string is not a valid condition
 */
export function parseCondition(source: string): AlarmCondition | null {
  const match = CONDITION_PATTERN.exec(source);
  if (!match) {
    return null;
  }

  const operator = OPERATORS[match[1]];
  const threshold = Number(match[2]);

  if (!operator || !Number.isFinite(threshold)) {
    return null;
  }

  return { operator, threshold };
}

/**
 * Check whether a value satisfies a condition.
 */
export function compareCondition(value: number, condition: AlarmCondition): boolean {
  const { operator, threshold } = condition;

  switch (operator) {
    case '>':
      return value > threshold;
    case '>=':
      return value >= threshold;
    case '<':
      return value < threshold;
    case '<=':
      return value <= threshold;
    case '==':
      return value === threshold;
    case '!=':
      return value !== threshold;
    default: {
      const _exhaustive: never = operator;
      throw new Error(`Unknown comparison operator: ${_exhaustive}`);
    }
  }
}

/**
 * Render a condition back to its runcard form.
 */
export function formatCondition(condition: AlarmCondition): string {
  return `${condition.operator}${condition.threshold}`;
}
