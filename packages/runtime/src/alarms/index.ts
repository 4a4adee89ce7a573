export { AlarmMonitor, check } from './monitor.js';
export type { AlarmDecision, AlarmEvaluation, TriggeredAlarm } from './monitor.js';
