/**
 * envshift Profile Engine: Transition Journal
 *
 * Durable record of the most recent profile transition, kept in
 * `state/transition.json`. The orchestrator writes it before the first step,
 * after every completed step and on failure. A completed transition clears
 * the file; a failed one stays until it is resumed or rolled back.
 *
 * The stored record is untrusted and narrowed field by field. A journal that
 * cannot be decoded is a PersistenceFailure.
 */

import type { StateIO } from '@envshift/runtime-host';
import type { TransitionRecord, TransitionStatus } from '@envshift/kernel';
import { EnvshiftError, ErrorKind, TransitionKind, TransitionStep, persistenceFailure } from '@envshift/kernel';

export const TRANSITION_FILE = 'transition.json';

const KINDS: ReadonlyArray<TransitionKind> = Object.values(TransitionKind);
const STEPS: ReadonlyArray<TransitionStep> = Object.values(TransitionStep);
const STATUSES: ReadonlyArray<TransitionStatus> = ['running', 'failed', 'completed'];

export class TransitionJournal {
  constructor(private readonly stateIO: StateIO) {}

  /** The journaled transition, or null when none is pending. */
  read(): TransitionRecord | null {
    let raw: unknown;
    try {
      raw = this.stateIO.readJson(TRANSITION_FILE);
    } catch (err: unknown) {
      throw persistenceFailure(TRANSITION_FILE, 'load', err);
    }
    return raw === undefined ? null : decodeTransition(raw);
  }

  write(record: TransitionRecord): void {
    try {
      this.stateIO.writeJson(TRANSITION_FILE, record);
    } catch (err: unknown) {
      throw persistenceFailure(TRANSITION_FILE, 'save', err);
    }
  }

  clear(): void {
    try {
      this.stateIO.deleteJson(TRANSITION_FILE);
    } catch (err: unknown) {
      throw persistenceFailure(TRANSITION_FILE, 'clear', err);
    }
  }
}

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

function malformed(detail: string): EnvshiftError {
  return new EnvshiftError(
    ErrorKind.PersistenceFailure,
    TRANSITION_FILE,
    `Malformed transition journal: ${detail}`,
  );
}

function pick<T extends string>(allowed: ReadonlyArray<T>, value: unknown, field: string): T {
  const found = allowed.find((candidate) => candidate === value);
  if (found === undefined) {
    throw malformed(`${field}: unexpected value ${JSON.stringify(value)}`);
  }
  return found;
}

function nullableString(value: unknown, field: string): string | null {
  if (value === null || typeof value === 'string') return value;
  throw malformed(`${field}: expected string or null`);
}

function string(value: unknown, field: string): string {
  if (typeof value === 'string') return value;
  throw malformed(`${field}: expected string`);
}

export function decodeTransition(raw: unknown): TransitionRecord {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw malformed('expected object');
  }
  const obj: Record<string, unknown> = Object.fromEntries(Object.entries(raw));
  const steps = obj['completed_steps'];
  if (!Array.isArray(steps)) {
    throw malformed('completed_steps: expected array');
  }
  const clearMarker = obj['clear_marker'];
  if (typeof clearMarker !== 'boolean') {
    throw malformed('clear_marker: expected boolean');
  }

  return {
    kind: pick(KINDS, obj['kind'], 'kind'),
    from: nullableString(obj['from'], 'from'),
    to: nullableString(obj['to'], 'to'),
    previous_marker: nullableString(obj['previous_marker'], 'previous_marker'),
    clear_marker: clearMarker,
    completed_steps: steps.map((step: unknown, i) => pick(STEPS, step, `completed_steps[${i}]`)),
    status: pick(STATUSES, obj['status'], 'status'),
    error: nullableString(obj['error'], 'error'),
    started_at: string(obj['started_at'], 'started_at'),
    updated_at: string(obj['updated_at'], 'updated_at'),
  };
}
