/**
 * envshift Kernel: Profile and Environment Types
 *
 * A profile is a named, user-selectable bundle of packages and environment
 * settings. At most one profile is active at a time; the pointer lives in
 * the ProfileRegistry, not here.
 *
 * `parent` is a back-reference only. Nothing in the kernel walks it, and it
 * is never required to name an existing profile.
 *
 * `os_overrides` is stored and editable but never applied by any operation.
 */

// ---------------------------------------------------------------------------
// Environment State
// ---------------------------------------------------------------------------

/**
 * Environment settings owned by a profile.
 *
 * When `active` is false, projection has no effect: apply() and reverse()
 * leave the delta untouched and render() still emits the script text.
 */
export interface EnvironmentState {
  /** Paths placed before the existing PATH, in listed order. */
  readonly paths_prepend: ReadonlyArray<string>;
  /** Paths placed after the existing PATH, in listed order. */
  readonly paths_append: ReadonlyArray<string>;
  /** Variable assignments, emitted in insertion order. */
  readonly variables: Readonly<Record<string, string>>;
  /** Alias name to command. */
  readonly aliases: Readonly<Record<string, string>>;
  /** Aliases kept in `aliases` but left out of rendered scripts. Absent means none. */
  readonly disabled_aliases?: ReadonlyArray<string>;
  readonly active: boolean;
}

/** The environment of a freshly created profile. */
export const EMPTY_ENVIRONMENT: EnvironmentState = {
  paths_prepend: [],
  paths_append: [],
  variables: {},
  aliases: {},
  active: true,
};

// ---------------------------------------------------------------------------
// OS Overrides
// ---------------------------------------------------------------------------

export enum OsType {
  MacOS = 'macos',
  Linux = 'linux',
  Windows = 'windows',
}

export const OS_TYPES: ReadonlyArray<OsType> = [OsType.MacOS, OsType.Linux, OsType.Windows];

/** Per-OS package and environment override. Stored, never applied. */
export interface OsOverride {
  readonly packages: ReadonlyArray<string>;
  readonly environment: EnvironmentState | null;
}

// ---------------------------------------------------------------------------
// Profile
// ---------------------------------------------------------------------------

export interface Profile {
  readonly name: string;
  readonly parent: string | null;
  /** Package names owned by this profile. Sorted, unique. */
  readonly packages: ReadonlyArray<string>;
  readonly environment: EnvironmentState;
  readonly os_overrides: Readonly<Partial<Record<OsType, OsOverride>>>;
  /** ISO 8601 creation timestamp. */
  readonly created_at: string;
}
