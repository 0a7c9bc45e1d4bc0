/**
 * envshift Runtime Host: Snapshot Store Tests
 *
 *   SS1: load() returns the empty snapshot when nothing was saved
 *   SS2: save() then load() reproduces the snapshot
 *   SS3: invalid JSON is a PersistenceFailure naming the file
 *   SS4: a structurally invalid snapshot is a PersistenceFailure naming the path
 *   SS5: a failing write is a PersistenceFailure
 */

import { describe, it, expect } from 'vitest';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  EMPTY_SNAPSHOT,
  EnvshiftError,
  ErrorKind,
  InstallScope,
  InstallationState,
  applySmartInstall,
} from '@envshift/kernel';
import { FileStateIO, MemoryStateIO } from '../src/state/state-io.js';
import { FileSnapshotStore, SNAPSHOT_FILE } from '../src/state/snapshot-store.js';

const T0 = '2026-02-01T09:00:00.000Z';

function catchError(fn: () => unknown): EnvshiftError {
  try {
    fn();
  } catch (err: unknown) {
    if (err instanceof EnvshiftError) return err;
    throw err;
  }
  throw new Error('expected an EnvshiftError');
}

function sampleState(): InstallationState {
  const state = new InstallationState();
  state.createProfile('work', null, T0);
  state.registry.setActive('work');
  applySmartInstall(state, 'ripgrep', InstallScope.Global, T0, {
    installerType: 'brew',
    location: '/usr/local/bin/rg',
  });
  return state;
}

describe('FileSnapshotStore', () => {
  it('SS1: load() returns the empty snapshot when nothing was saved', () => {
    expect(new FileSnapshotStore(new MemoryStateIO()).load()).toEqual(EMPTY_SNAPSHOT);
  });

  it('SS2: save() then load() reproduces the snapshot on disk', () => {
    const io = new FileStateIO(mkdtempSync(join(tmpdir(), 'envshift-ss2-')));
    const snapshot = sampleState().toSnapshot();

    new FileSnapshotStore(io).save(snapshot);

    expect(new FileSnapshotStore(io).load()).toEqual(snapshot);
  });

  it('SS3: invalid JSON is a PersistenceFailure naming the file', () => {
    const io = new MemoryStateIO();
    io.writeRaw(SNAPSHOT_FILE, '{"version": 1,');

    const err = catchError(() => new FileSnapshotStore(io).load());

    expect(err.kind).toBe(ErrorKind.PersistenceFailure);
    expect(err.subject).toBe('snapshot.json');
    expect(err.message.startsWith('Failed to load snapshot.json: ')).toBe(true);
    expect(err.cause).toBeInstanceOf(SyntaxError);
  });

  it('SS4: a structurally invalid snapshot is a PersistenceFailure naming the path', () => {
    const io = new MemoryStateIO();
    io.writeJson(SNAPSHOT_FILE, { version: 2, installations: {}, profiles: {}, active_profile: null });

    const err = catchError(() => new FileSnapshotStore(io).load());

    expect(err.kind).toBe(ErrorKind.PersistenceFailure);
    expect(err.message).toBe('Malformed state snapshot: $.version: expected 1, got 2');
  });

  it('SS5: a failing write is a PersistenceFailure', () => {
    const base = mkdtempSync(join(tmpdir(), 'envshift-ss5-'));
    // A regular file where the state directory should be.
    writeFileSync(join(base, 'state'), 'not a directory', 'utf-8');

    const err = catchError(() => new FileSnapshotStore(new FileStateIO(base)).save(EMPTY_SNAPSHOT));

    expect(err.kind).toBe(ErrorKind.PersistenceFailure);
    expect(err.message.startsWith('Failed to save snapshot.json: ')).toBe(true);
  });
});
