// Alarm monitor - checks alarm conditions after each registry refresh

import {
  compareCondition,
  formatCondition,
  type AlarmDefinition,
  type AlarmProtocol,
  type AlarmStatus,
  type Name,
} from '@runcard/protocol';
import type { VariableRegistry } from '../variables/index.js';
import type { EngineLogger } from '../logging.js';
import { silentLogger } from '../logging.js';

/**
 * What the scheduler must do after an alarm pass
 */
export type AlarmDecision = 'clear' | AlarmProtocol;

export type TriggeredAlarm = {
  alarm: AlarmDefinition;
  value: number;
};

export type AlarmEvaluation = {
  decision: AlarmDecision;

  /**
   * Alarms that decide the outcome, in declaration order. At most one per
   * watched variable.
   */
  triggered: TriggeredAlarm[];
};

const DECISION_RANK: Record<AlarmDecision, number> = {
  clear: 0,
  wait: 1,
  hold: 2,
  abort: 3,
};

/**
 * Check one alarm against the registry. A variable without a value yet
 * cannot trigger anything.
 */
export function check(alarm: AlarmDefinition, registry: VariableRegistry): AlarmStatus {
  const value = registry.peek(alarm.variable);
  if (value === undefined) {
    return 'clear';
  }
  return compareCondition(value, alarm.condition) ? 'triggered' : 'clear';
}

/**
 * Evaluates every alarm of an experiment and tracks triggered/cleared
 * transitions.
 *
 * Alarms run in declaration order. For each watched variable the first
 * triggered alarm wins; once a hold or abort alarm has triggered, later alarms
 * on the same variable are not checked on that pass. The overall decision is
 * the most severe winner: abort > hold > wait > clear.
 */
export class AlarmMonitor {
  private readonly alarms: readonly AlarmDefinition[];
  private readonly statuses = new Map<Name, AlarmStatus>();
  private readonly logger: EngineLogger;

  constructor(alarms: readonly AlarmDefinition[], logger: EngineLogger = silentLogger) {
    this.alarms = alarms;
    this.logger = logger;
    for (const alarm of alarms) {
      this.statuses.set(alarm.name, 'clear');
    }
  }

  status(name: Name): AlarmStatus | undefined {
    return this.statuses.get(name);
  }

  /**
   * Names of alarms whose last check triggered
   */
  active(): Name[] {
    return this.alarms.filter((alarm) => this.statuses.get(alarm.name) === 'triggered').map((alarm) => alarm.name);
  }

  evaluate(registry: VariableRegistry): AlarmEvaluation {
    const winners = new Map<Name, TriggeredAlarm>();
    const shortCircuited = new Set<Name>();

    for (const alarm of this.alarms) {
      if (shortCircuited.has(alarm.variable)) continue;

      const status = check(alarm, registry);
      this.transition(alarm, status, registry);
      if (status === 'clear') continue;

      if (winners.has(alarm.variable)) {
        this.logger.debug('Alarm overridden by an earlier alarm on the same variable', {
          alarm: alarm.name,
          variable: alarm.variable,
        });
        continue;
      }

      winners.set(alarm.variable, { alarm, value: registry.get(alarm.variable) });
      if (alarm.protocol !== 'wait') {
        shortCircuited.add(alarm.variable);
      }
    }

    const triggered = this.alarms.flatMap((alarm) => {
      const winner = winners.get(alarm.variable);
      return winner?.alarm === alarm ? [winner] : [];
    });

    let decision: AlarmDecision = 'clear';
    for (const { alarm } of triggered) {
      if (DECISION_RANK[alarm.protocol] > DECISION_RANK[decision]) {
        decision = alarm.protocol;
      }
    }

    return { decision, triggered };
  }

  private transition(alarm: AlarmDefinition, status: AlarmStatus, registry: VariableRegistry): void {
    const previous = this.statuses.get(alarm.name);
    this.statuses.set(alarm.name, status);
    if (previous === status) return;

    const data = {
      alarm: alarm.name,
      variable: alarm.variable,
      value: registry.peek(alarm.variable),
      condition: formatCondition(alarm.condition),
      protocol: alarm.protocol,
    };
    if (status === 'triggered') {
      this.logger.warn('Alarm triggered', data);
    } else {
      this.logger.info('Alarm cleared', data);
    }
  }
}
