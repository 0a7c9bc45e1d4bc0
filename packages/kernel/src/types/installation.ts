/**
 * envshift Kernel: Installation Types
 *
 * Pure data shapes for the package ledger. One InstallationRecord exists per
 * installed package, keyed by package name. The record tracks which profiles
 * currently depend on the package through `active_for`.
 *
 * Records are created on the first successful install, mutated only by
 * activation and deactivation, and removed entirely only by a full uninstall.
 */

// ---------------------------------------------------------------------------
// Install Scope
// ---------------------------------------------------------------------------

/**
 * Classification of why and where a package was installed.
 *
 * The scope is recorded for display and for the Installer contract; the core
 * never branches on it.
 */
export enum InstallScope {
  /** Provided by the operating system package manager. */
  System = 'system',
  /** Installed once for the whole user account. */
  Global = 'global',
  /** Installed on behalf of a single profile. */
  Profile = 'profile',
  /** Installed into a project-local directory. */
  Local = 'local',
  /** Pinned to this machine and never synchronized. */
  Device = 'device',
}

/** All scopes in declaration order. Used by argument parsers. */
export const INSTALL_SCOPES: ReadonlyArray<InstallScope> = [
  InstallScope.System,
  InstallScope.Global,
  InstallScope.Profile,
  InstallScope.Local,
  InstallScope.Device,
];

// ---------------------------------------------------------------------------
// Install Source
// ---------------------------------------------------------------------------

/**
 * What caused a package to be installed.
 *
 * Discriminated on `kind`. `profile` names the profile that was current at
 * install time; `dependency` names the package that pulled this one in.
 */
export type InstallSource =
  | { readonly kind: 'profile'; readonly profile: string }
  | { readonly kind: 'global' }
  | { readonly kind: 'system' }
  | { readonly kind: 'manual' }
  | { readonly kind: 'dependency'; readonly parent: string };

/** Human-readable label for an install source, e.g. `profile(work)`. */
export function describeInstallSource(source: InstallSource): string {
  switch (source.kind) {
    case 'profile':
      return `profile(${source.profile})`;
    case 'dependency':
      return `dependency(${source.parent})`;
    default:
      return source.kind;
  }
}

// ---------------------------------------------------------------------------
// Installation Record
// ---------------------------------------------------------------------------

/**
 * One row of the package ledger.
 *
 * `active_for` has set semantics. It is always stored sorted and free of
 * duplicates so that persisted snapshots are stable across runs.
 */
export interface InstallationRecord {
  readonly package: string;
  readonly version: string | null;
  /** ISO 8601 timestamp of the first successful install. */
  readonly installed_at: string;
  readonly installed_by: InstallSource;
  /** Profile names currently depending on this package. */
  readonly active_for: ReadonlyArray<string>;
  readonly scope: InstallScope;
  /** Filesystem path of the installed binary, when known. */
  readonly location: string | null;
  /** Free-form installer tag: 'auto', 'brew', 'npm', 'pnpm', ... */
  readonly installer_type: string;
}

/**
 * Name used in `active_for` when a package is installed or activated while
 * no profile is active.
 */
export const DEFAULT_PROFILE_IDENTITY = 'default';
