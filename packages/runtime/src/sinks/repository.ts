// Save sink that persists snapshots through a SnapshotRepository

import type { Id } from '@runcard/protocol';
import type { SnapshotRepository } from '@runcard/repositories';
import type { SnapshotSink } from './types.js';

export function createRepositorySink(snapshots: SnapshotRepository, runId: Id): SnapshotSink {
  return {
    name: 'repository',
    channel: 'save',
    async write(snapshot) {
      await snapshots.append({ ...snapshot, runId });
    },
  };
}
