/**
 * envshift Kernel: Environment Projector
 *
 * Applies and reverses an EnvironmentState against an EnvironmentDelta.
 *
 * apply():   no-op when the state is inactive. Otherwise the new PATH is
 *            [expanded prepends not yet present, in listed order]
 *            + existing PATH
 *            + [expanded appends not yet present, in listed order],
 *            then every variable is set.
 * reverse(): removes each expanded prepend and append by exact match, and
 *            unsets each variable whose current value still equals the one
 *            the state would set. Other values are left alone.
 *
 * Both take extra PATH entries (the profile's bin directory) that are
 * handled the same way as `paths_prepend` but regardless of `active`.
 */

import type { EnvironmentState } from '../types/profile.js';
import { EnvironmentDelta, expandPath } from './environment-delta.js';

export interface ProjectionExtras {
  /** Entries placed in front of the profile's own prepends. */
  readonly prependPaths?: ReadonlyArray<string>;
}

export function applyEnvironment(
  state: EnvironmentState,
  delta: EnvironmentDelta,
  extras: ProjectionExtras = {},
): void {
  const extraPrepends = extras.prependPaths ?? [];
  const prepends = state.active
    ? [...extraPrepends, ...state.paths_prepend.map((p) => expandPath(p, delta))]
    : [...extraPrepends];
  const appends = state.active ? state.paths_append.map((p) => expandPath(p, delta)) : [];

  const existing = delta.getPath();
  const seen = new Set(existing);
  const take = (entries: ReadonlyArray<string>): string[] => {
    const out: string[] = [];
    for (const entry of entries) {
      if (!seen.has(entry)) {
        seen.add(entry);
        out.push(entry);
      }
    }
    return out;
  };
  const head = take(prepends);
  const tail = take(appends);
  delta.setPath([...head, ...existing, ...tail]);

  if (!state.active) return;
  for (const [key, value] of Object.entries(state.variables)) {
    delta.set(key, value);
  }
}

export function reverseEnvironment(
  state: EnvironmentState,
  delta: EnvironmentDelta,
  extras: ProjectionExtras = {},
): void {
  const entries = [
    ...(extras.prependPaths ?? []),
    ...state.paths_prepend.map((p) => expandPath(p, delta)),
    ...state.paths_append.map((p) => expandPath(p, delta)),
  ];
  for (const entry of entries) {
    delta.removePathEntry(entry);
  }

  for (const [key, value] of Object.entries(state.variables)) {
    if (delta.get(key) === value) {
      delta.unset(key);
    }
  }
}

/** Convenience for callers that want a fresh delta from an env record. */
export function projectOnto(
  state: EnvironmentState,
  env: Readonly<Record<string, string | undefined>>,
  separator = ':',
): EnvironmentDelta {
  const delta = new EnvironmentDelta(env, separator);
  applyEnvironment(state, delta);
  return delta;
}
