/**
 * Report formatting shared by the handlers
 */

import type { PlotSeries, RunResult, ValidationIssue } from '@runcard/runtime';

export type IssueLevel = 'error' | 'warning';

export function formatIssue(level: IssueLevel, issue: ValidationIssue): string {
  return `${level.padEnd(7)} ${issue.path}: ${issue.message} [${issue.code}]`;
}

export function formatValidationSummary(
  file: string,
  errors: readonly ValidationIssue[],
  warnings: readonly ValidationIssue[]
): string {
  if (errors.length > 0) {
    return `${file}: ${errors.length} error(s), ${warnings.length} warning(s)`;
  }
  return warnings.length > 0 ? `${file}: valid, ${warnings.length} warning(s)` : `${file}: valid`;
}

export function formatRunSummary(file: string, runId: string, result: RunResult): string[] {
  const lines = [
    `${file}: ${result.status} (${result.reason}) after ${result.ticks} tick(s), ` +
      `${result.snapshots} snapshot(s), ${result.dropped} dropped [run ${runId}]`,
  ];
  if (result.abort) {
    lines.push(`  ${result.abort.message}`);
  }
  return lines;
}

export function formatPlotSummary(plot: PlotSeries): string {
  return `  plot ${plot.name}: ${plot.points.length} point(s) of ${plot.y.join(', ')} against ${plot.x}`;
}
