/**
 * envshift Runtime Host: Snapshot Store
 *
 * Persists the whole StateSnapshot to `state/snapshot.json` through the
 * injected StateIO. Every save rewrites the full file; there are no partial
 * updates and no locking, so concurrent invocations race and the last
 * writer wins.
 */

import type { SnapshotStore, StateSnapshot } from '@envshift/kernel';
import { EMPTY_SNAPSHOT, decodeSnapshot, persistenceFailure } from '@envshift/kernel';
import type { StateIO } from './state-io.js';

export const SNAPSHOT_FILE = 'snapshot.json';

export class FileSnapshotStore implements SnapshotStore {
  constructor(private readonly stateIO: StateIO) {}

  /**
   * Load the snapshot, or EMPTY_SNAPSHOT when none was saved.
   *
   * @throws {EnvshiftError} PersistenceFailure on unreadable or malformed data
   */
  load(): StateSnapshot {
    let raw: unknown;
    try {
      raw = this.stateIO.readJson(SNAPSHOT_FILE);
    } catch (err: unknown) {
      throw persistenceFailure(SNAPSHOT_FILE, 'load', err);
    }
    if (raw === undefined) {
      return EMPTY_SNAPSHOT;
    }
    return decodeSnapshot(raw);
  }

  /** @throws {EnvshiftError} PersistenceFailure when the write fails */
  save(snapshot: StateSnapshot): void {
    try {
      this.stateIO.writeJson(SNAPSHOT_FILE, snapshot);
    } catch (err: unknown) {
      throw persistenceFailure(SNAPSHOT_FILE, 'save', err);
    }
  }
}
