// Plot sink - accumulates (x, y) series for each declared plot
//
// Rendering is left to whoever reads the series; display hints from the
// runcard are passed through untouched.

import { TIME_AXIS, type Name, type PlotDefinition, type Snapshot } from '@runcard/protocol';
import type { SnapshotSink } from './types.js';

export type PlotPoint = {
  x: number | null;

  /**
   * y variable name -> value
   */
  y: Record<Name, number | null>;
};

export type PlotSeries = {
  name: Name;
  x: Name;
  y: Name[];
  hints: Record<string, unknown>;
  points: PlotPoint[];
};

export type PlotSink = SnapshotSink & {
  series(name: Name): PlotSeries | undefined;
  all(): PlotSeries[];
};

function axisValue(snapshot: Snapshot, axis: Name): number | null {
  if (axis === TIME_AXIS) {
    return snapshot.time;
  }
  return snapshot.values[axis] ?? null;
}

export function createPlotSink(plots: readonly PlotDefinition[], name = 'plots'): PlotSink {
  const series = new Map<Name, PlotSeries>(
    plots.map((plot) => [
      plot.name,
      { name: plot.name, x: plot.x, y: [...plot.y], hints: { ...plot.hints }, points: [] },
    ])
  );

  return {
    name,
    channel: 'plot',
    async write(snapshot) {
      for (const plot of series.values()) {
        const y: Record<Name, number | null> = {};
        for (const axis of plot.y) {
          y[axis] = axisValue(snapshot, axis);
        }
        plot.points.push({ x: axisValue(snapshot, plot.x), y });
      }
    },
    series(plotName) {
      return series.get(plotName);
    },
    all() {
      return Array.from(series.values());
    },
  };
}
