// Alarm declarations

import type { Name } from './common.js';

export type ComparisonOperator = '>' | '>=' | '<' | '<=' | '==' | '!=';

/**
 * A parsed alarm condition, e.g. ">1" becomes { operator: '>', threshold: 1 }.
 * Conditions are parsed once when the runcard is loaded.
 */
export type AlarmCondition = {
  operator: ComparisonOperator;
  threshold: number;
};

/**
 * What the scheduler does while an alarm is triggered:
 * - wait: gate the clock, stop routine writes, keep reading meters
 * - hold: rewrite knobs with their last safe values and re-check, then abort
 * - abort: terminate the experiment
 */
export type AlarmProtocol = 'wait' | 'hold' | 'abort';

export type AlarmDefinition = {
  name: Name;

  /**
   * The watched variable
   */
  variable: Name;

  condition: AlarmCondition;

  protocol: AlarmProtocol;
};

export type AlarmStatus = 'triggered' | 'clear';
