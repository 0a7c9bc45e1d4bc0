/**
 * envshift Kernel: State Snapshot Types
 *
 * The StateSnapshot is the unit of persistence: the full ledger, the full
 * profile registry and the active-profile pointer, always written whole.
 * There are no partial or delta updates. Concurrent writers race and the
 * last save wins.
 */

import type { InstallationRecord } from './installation.js';
import type { Profile } from './profile.js';

/** Current snapshot schema version. */
export const SNAPSHOT_VERSION = 1;

export interface StateSnapshot {
  readonly version: typeof SNAPSHOT_VERSION;
  /** Ledger keyed by package name. */
  readonly installations: Readonly<Record<string, InstallationRecord>>;
  /** Registry keyed by profile name. */
  readonly profiles: Readonly<Record<string, Profile>>;
  readonly active_profile: string | null;
}

/** The snapshot returned when nothing has been persisted yet. */
export const EMPTY_SNAPSHOT: StateSnapshot = {
  version: SNAPSHOT_VERSION,
  installations: {},
  profiles: {},
  active_profile: null,
};

/**
 * Durable snapshot persistence.
 *
 * load() returns EMPTY_SNAPSHOT when nothing was saved before and throws a
 * PersistenceFailure when stored data cannot be read or decoded.
 * save() replaces the stored snapshot entirely.
 */
export interface SnapshotStore {
  load(): StateSnapshot;
  save(snapshot: StateSnapshot): void;
}
