// Log sink - writes each snapshot through the engine logger

import type { EngineLogger } from '../logging.js';
import type { SinkChannelKind, SnapshotSink } from './types.js';

export function createLogSink(logger: EngineLogger, channel: SinkChannelKind = 'save'): SnapshotSink {
  return {
    name: 'log',
    channel,
    async write(snapshot) {
      logger.info('Snapshot', { tick: snapshot.tick, time: snapshot.time, values: snapshot.values });
    },
  };
}
