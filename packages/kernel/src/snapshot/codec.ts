/**
 * envshift Kernel: Snapshot Codec
 *
 * Narrows untrusted JSON into a StateSnapshot. Persisted data is never
 * trusted by type parameter; every field is checked and a malformed
 * snapshot is reported as a PersistenceFailure naming the offending path.
 *
 * Decoding normalizes set-valued fields (sorted, unique) so that
 * decode(encode(s)) is the identity for any snapshot the engine produced.
 */

import type { InstallationRecord, InstallSource } from '../types/installation.js';
import { INSTALL_SCOPES, InstallScope } from '../types/installation.js';
import type { EnvironmentState, OsOverride, Profile } from '../types/profile.js';
import { OS_TYPES, OsType } from '../types/profile.js';
import type { StateSnapshot } from '../types/snapshot.js';
import { SNAPSHOT_VERSION } from '../types/snapshot.js';
import { EnvshiftError, ErrorKind } from '../errors/envshift-error.js';
import { normalizeSet } from '../state/sorted-set.js';

/** Label used as the error subject for snapshot decoding failures. */
const SNAPSHOT_SUBJECT = 'state snapshot';

class DecodeError extends Error {}

/**
 * Decode a parsed JSON value into a StateSnapshot.
 *
 * @throws {EnvshiftError} PersistenceFailure if the value is not a valid snapshot
 */
export function decodeSnapshot(raw: unknown): StateSnapshot {
  try {
    return readSnapshot(raw);
  } catch (err: unknown) {
    if (err instanceof DecodeError) {
      throw new EnvshiftError(
        ErrorKind.PersistenceFailure,
        SNAPSHOT_SUBJECT,
        `Malformed ${SNAPSHOT_SUBJECT}: ${err.message}`,
        { cause: err },
      );
    }
    throw err;
  }
}

/** Serialize a snapshot as stable, pretty-printed JSON. */
export function encodeSnapshot(snapshot: StateSnapshot): string {
  return JSON.stringify(snapshot, null, 2);
}

// ---------------------------------------------------------------------------
// Readers
// ---------------------------------------------------------------------------

function readSnapshot(raw: unknown): StateSnapshot {
  const obj = expectObject(raw, '$');
  if (obj['version'] !== SNAPSHOT_VERSION) {
    throw new DecodeError(`$.version: expected ${SNAPSHOT_VERSION}, got ${JSON.stringify(obj['version'])}`);
  }

  const installations: Record<string, InstallationRecord> = Object.fromEntries(
    Object.entries(expectObject(obj['installations'], '$.installations')).map(([key, value]) => {
      const record = readInstallation(value, `$.installations.${key}`);
      if (record.package !== key) {
        throw new DecodeError(`$.installations.${key}.package: expected '${key}', got '${record.package}'`);
      }
      return [key, record];
    }),
  );

  const profiles: Record<string, Profile> = Object.fromEntries(
    Object.entries(expectObject(obj['profiles'], '$.profiles')).map(([key, value]) => {
      const profile = readProfile(value, `$.profiles.${key}`);
      if (profile.name !== key) {
        throw new DecodeError(`$.profiles.${key}.name: expected '${key}', got '${profile.name}'`);
      }
      return [key, profile];
    }),
  );

  const active = expectNullableString(obj['active_profile'], '$.active_profile');
  if (active !== null && !Object.hasOwn(profiles, active)) {
    throw new DecodeError(`$.active_profile: '${active}' is not a known profile`);
  }

  return { version: SNAPSHOT_VERSION, installations, profiles, active_profile: active };
}

function readInstallation(raw: unknown, path: string): InstallationRecord {
  const obj = expectObject(raw, path);
  return {
    package: expectString(obj['package'], `${path}.package`),
    version: expectNullableString(obj['version'], `${path}.version`),
    installed_at: expectString(obj['installed_at'], `${path}.installed_at`),
    installed_by: readInstallSource(obj['installed_by'], `${path}.installed_by`),
    active_for: normalizeSet(expectStringArray(obj['active_for'], `${path}.active_for`)),
    scope: readScope(obj['scope'], `${path}.scope`),
    location: expectNullableString(obj['location'], `${path}.location`),
    installer_type: expectString(obj['installer_type'], `${path}.installer_type`),
  };
}

function readInstallSource(raw: unknown, path: string): InstallSource {
  const obj = expectObject(raw, path);
  const kind = obj['kind'];
  switch (kind) {
    case 'profile':
      return { kind: 'profile', profile: expectString(obj['profile'], `${path}.profile`) };
    case 'dependency':
      return { kind: 'dependency', parent: expectString(obj['parent'], `${path}.parent`) };
    case 'global':
      return { kind: 'global' };
    case 'system':
      return { kind: 'system' };
    case 'manual':
      return { kind: 'manual' };
    default:
      throw new DecodeError(`${path}.kind: unknown install source ${JSON.stringify(kind)}`);
  }
}

function readScope(raw: unknown, path: string): InstallScope {
  const scope = INSTALL_SCOPES.find((s) => s === raw);
  if (scope === undefined) {
    throw new DecodeError(`${path}: unknown scope ${JSON.stringify(raw)}`);
  }
  return scope;
}

function readProfile(raw: unknown, path: string): Profile {
  const obj = expectObject(raw, path);

  const os_overrides: Partial<Record<OsType, OsOverride>> = {};
  for (const [key, value] of Object.entries(expectObject(obj['os_overrides'], `${path}.os_overrides`))) {
    const os = OS_TYPES.find((o) => o === key);
    if (os === undefined) {
      throw new DecodeError(`${path}.os_overrides: unknown OS '${key}'`);
    }
    os_overrides[os] = readOsOverride(value, `${path}.os_overrides.${key}`);
  }

  return {
    name: expectString(obj['name'], `${path}.name`),
    parent: expectNullableString(obj['parent'], `${path}.parent`),
    packages: normalizeSet(expectStringArray(obj['packages'], `${path}.packages`)),
    environment: readEnvironment(obj['environment'], `${path}.environment`),
    os_overrides,
    created_at: expectString(obj['created_at'], `${path}.created_at`),
  };
}

function readOsOverride(raw: unknown, path: string): OsOverride {
  const obj = expectObject(raw, path);
  const environment = obj['environment'];
  return {
    packages: normalizeSet(expectStringArray(obj['packages'], `${path}.packages`)),
    environment:
      environment === null || environment === undefined
        ? null
        : readEnvironment(environment, `${path}.environment`),
  };
}

function readEnvironment(raw: unknown, path: string): EnvironmentState {
  const obj = expectObject(raw, path);
  const env: EnvironmentState = {
    paths_prepend: expectStringArray(obj['paths_prepend'], `${path}.paths_prepend`),
    paths_append: expectStringArray(obj['paths_append'], `${path}.paths_append`),
    variables: expectStringRecord(obj['variables'], `${path}.variables`),
    aliases: expectStringRecord(obj['aliases'], `${path}.aliases`),
    active: expectOptionalBoolean(obj['active'], `${path}.active`, true),
  };
  const disabled = obj['disabled_aliases'];
  if (disabled === undefined || disabled === null) return env;
  const names = normalizeSet(expectStringArray(disabled, `${path}.disabled_aliases`));
  return names.length > 0 ? { ...env, disabled_aliases: names } : env;
}

// ---------------------------------------------------------------------------
// Primitive narrowing
// ---------------------------------------------------------------------------

function expectObject(raw: unknown, path: string): Record<string, unknown> {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new DecodeError(`${path}: expected object`);
  }
  return Object.fromEntries(Object.entries(raw));
}

function expectString(raw: unknown, path: string): string {
  if (typeof raw !== 'string') {
    throw new DecodeError(`${path}: expected string`);
  }
  return raw;
}

function expectNullableString(raw: unknown, path: string): string | null {
  if (raw === null || raw === undefined) return null;
  return expectString(raw, path);
}

function expectOptionalBoolean(raw: unknown, path: string, fallback: boolean): boolean {
  if (raw === undefined) return fallback;
  if (typeof raw !== 'boolean') {
    throw new DecodeError(`${path}: expected boolean`);
  }
  return raw;
}

function expectStringArray(raw: unknown, path: string): string[] {
  if (!Array.isArray(raw)) {
    throw new DecodeError(`${path}: expected array`);
  }
  return raw.map((item: unknown, i) => expectString(item, `${path}[${i}]`));
}

function expectStringRecord(raw: unknown, path: string): Record<string, string> {
  return Object.fromEntries(
    Object.entries(expectObject(raw, path)).map(([key, value]) => [key, expectString(value, `${path}.${key}`)]),
  );
}
