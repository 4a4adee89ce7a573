export type { SnapshotSink, SinkChannelKind, SinkStats } from './types.js';
export { SnapshotQueue } from './queue.js';
export { SinkChannel } from './channel.js';
export { createRepositorySink } from './repository.js';
export { createPlotSink } from './plot.js';
export type { PlotSink, PlotSeries, PlotPoint } from './plot.js';
export { createLogSink } from './log.js';
