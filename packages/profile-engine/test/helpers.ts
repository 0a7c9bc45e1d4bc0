/**
 * Shared fakes for profile-engine tests. Everything runs in memory except
 * where a test passes real runtime-host adapters over a temp dir.
 */

import type {
  BinaryLink,
  BinaryLinker,
  EnvironmentScriptWriter,
  EnvironmentState,
  InstallScope,
  Installer,
  ShellMarker,
  SnapshotStore,
  StateSnapshot,
} from '@envshift/kernel';
import { EventLogger, ioFailure } from '@envshift/kernel';
import { FileEventSink, FileSnapshotStore, MemoryStateIO } from '@envshift/runtime-host';
import { InstallStatusLog } from '../src/install-status-log.js';
import { StateManager } from '../src/state-manager.js';

export const T0 = '2026-04-01T08:00:00.000Z';

export const fixedClock = (): Date => new Date(T0);

export class RecordingInstaller implements Installer {
  readonly installs: Array<{ packages: ReadonlyArray<string>; scope: InstallScope }> = [];
  readonly uninstalls: Array<ReadonlyArray<string>> = [];
  failWith: Error | null = null;

  install(packages: ReadonlyArray<string>, scope: InstallScope): void {
    if (this.failWith !== null) throw this.failWith;
    this.installs.push({ packages, scope });
  }

  uninstall(packages: ReadonlyArray<string>): void {
    if (this.failWith !== null) throw this.failWith;
    this.uninstalls.push(packages);
  }
}

/** SnapshotStore over MemoryStateIO whose next save can be made to fail. */
export class FlakySnapshotStore implements SnapshotStore {
  private readonly inner: FileSnapshotStore;
  failNextSave = false;
  saves = 0;

  constructor(readonly stateIO: MemoryStateIO = new MemoryStateIO()) {
    this.inner = new FileSnapshotStore(stateIO);
  }

  load(): StateSnapshot {
    return this.inner.load();
  }

  save(snapshot: StateSnapshot): void {
    if (this.failNextSave) {
      this.failNextSave = false;
      throw ioFailure('snapshot.json', 'save', new Error('disk full'));
    }
    this.saves++;
    this.inner.save(snapshot);
  }
}

export class MemoryLinker implements BinaryLinker {
  readonly links = new Map<string, ReadonlyArray<BinaryLink>>();
  failOnLink: string | null = null;

  binDir(profile: string): string {
    return `/envshift/profiles/${profile}/bin`;
  }

  link(profile: string, links: ReadonlyArray<BinaryLink>): void {
    if (this.failOnLink === profile) {
      throw ioFailure(this.binDir(profile), 'link binaries', new Error('permission denied'));
    }
    this.links.set(profile, links);
  }

  clear(profile: string): void {
    this.links.set(profile, []);
  }

  linked(profile: string): string[] {
    return (this.links.get(profile) ?? []).map((l) => l.name);
  }
}

export class MemoryMarker implements ShellMarker {
  constructor(public value: string | null = null) {}

  read(): string | null {
    return this.value;
  }

  write(profile: string): void {
    this.value = profile;
  }

  clear(): void {
    this.value = null;
  }
}

export class MemoryScriptWriter implements EnvironmentScriptWriter {
  readonly writes: Array<{ state: EnvironmentState; extraPaths: ReadonlyArray<string> }> = [];

  write(state: EnvironmentState, extraPaths: ReadonlyArray<string>): string {
    this.writes.push({ state, extraPaths });
    return '/envshift/env/active.sh';
  }

  last(): { state: EnvironmentState; extraPaths: ReadonlyArray<string> } | undefined {
    return this.writes[this.writes.length - 1];
  }
}

export interface Harness {
  readonly io: MemoryStateIO;
  readonly store: FlakySnapshotStore;
  readonly installer: RecordingInstaller;
  readonly logger: EventLogger;
  readonly statusLog: InstallStatusLog;
  readonly manager: StateManager;
}

export function harness(io: MemoryStateIO = new MemoryStateIO()): Harness {
  const store = new FlakySnapshotStore(io);
  const installer = new RecordingInstaller();
  const logger = new EventLogger(new FileEventSink(io), fixedClock);
  const statusLog = new InstallStatusLog(io);
  const manager = new StateManager({ store, installer, logger, statusLog });
  return { io, store, installer, logger, statusLog, manager };
}

/** Event types appended to the event log, in order. */
export function loggedTypes(io: MemoryStateIO): string[] {
  return io.readLines('events.jsonl').map((line) => {
    const parsed: unknown = JSON.parse(line);
    return typeof parsed === 'object' && parsed !== null && 'event_type' in parsed && typeof parsed.event_type === 'string'
      ? parsed.event_type
      : '';
  });
}

export function expectError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err: unknown) {
    return err;
  }
  throw new Error('expected the call to throw');
}
