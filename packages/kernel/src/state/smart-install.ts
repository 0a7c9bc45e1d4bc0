/**
 * envshift Kernel: Smart Install
 *
 * Decides whether a requested install is a real install or only an
 * activation of a package already in the ledger, and applies the result to
 * the InstallationState. The Installer is invoked by the caller between
 * planInstall() and applySmartInstall(); the kernel never runs it.
 */

import type { InstallationRecord, InstallScope } from '../types/installation.js';
import type { InstallationState } from './installation-state.js';
import { requirePackageName } from './names.js';

export type InstallAction = 'installed' | 'activated';

/**
 * Descriptive fields for the ledger record. A new record takes them as
 * given; an activation overwrites only the fields that are set.
 */
export interface SmartInstallOptions {
  readonly version?: string | null;
  readonly location?: string | null;
  /** Defaults to 'auto' for new records. */
  readonly installerType?: string | undefined;
}

export interface SmartInstallResult {
  readonly package: string;
  readonly action: InstallAction;
  /** Profile (or default identity) the package is now active for. */
  readonly profile: string;
  readonly record: InstallationRecord;
}

/**
 * 'activated' when the ledger already has the package, else 'installed'.
 *
 * @throws {EnvshiftError} InvalidOperation for a new package whose name is not linkable
 */
export function planInstall(state: InstallationState, pkg: string): InstallAction {
  if (state.ledger.has(pkg)) return 'activated';
  requirePackageName(pkg);
  return 'installed';
}

/**
 * Apply a smart install for the current profile.
 *
 * Existing package: adds the current identity to `active_for` and to the
 * profile's set, and records any version, location or installer type given
 * in `options`. New package: inserts a record with `active_for` holding the
 * current identity and source `profile(current)`.
 *
 * @param now - ISO 8601 timestamp recorded as `installed_at` for new records
 */
export function applySmartInstall(
  state: InstallationState,
  pkg: string,
  scope: InstallScope,
  now: string,
  options: SmartInstallOptions = {},
): SmartInstallResult {
  const profile = state.currentIdentity();

  if (state.ledger.has(pkg)) {
    state.activatePackage(pkg, profile);
    const patch = givenFields(options);
    if (Object.keys(patch).length > 0) state.ledger.update(pkg, patch);
    return { package: pkg, action: 'activated', profile, record: state.ledger.require(pkg) };
  }

  const record: InstallationRecord = {
    package: pkg,
    version: options.version ?? null,
    installed_at: now,
    installed_by: { kind: 'profile', profile },
    active_for: [profile],
    scope,
    location: options.location ?? null,
    installer_type: options.installerType ?? 'auto',
  };
  state.installPackage(record);
  return { package: pkg, action: 'installed', profile, record: state.ledger.require(pkg) };
}

function givenFields(
  options: SmartInstallOptions,
): Partial<Pick<InstallationRecord, 'version' | 'location' | 'installer_type'>> {
  return {
    ...(options.version !== undefined && options.version !== null ? { version: options.version } : {}),
    ...(options.location !== undefined && options.location !== null ? { location: options.location } : {}),
    ...(options.installerType !== undefined ? { installer_type: options.installerType } : {}),
  };
}
