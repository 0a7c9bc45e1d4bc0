/**
 * envshift Kernel: Profile Registry
 *
 * Holds every profile by name plus the single active-profile pointer. The
 * pointer is a field of this aggregate rather than ambient global state;
 * components that need the current profile receive the registry (or the
 * InstallationState wrapping it) explicitly.
 *
 * Invariants:
 * - Profile names are unique (map key)
 * - `active` is null or names an existing profile
 * - The active profile cannot be deleted
 */

import type { EnvironmentState, OsOverride, OsType, Profile } from '../types/profile.js';
import { EMPTY_ENVIRONMENT } from '../types/profile.js';
import { invalidOperation, notFound } from '../errors/envshift-error.js';
import { requireProfileName } from './names.js';
import { compareNames, normalizeSet, withItem, withoutItem } from './sorted-set.js';

export class ProfileRegistry {
  private readonly profiles: Map<string, Profile> = new Map();
  private active: string | null = null;

  constructor(profiles: Iterable<Profile> = [], active: string | null = null) {
    for (const profile of profiles) {
      this.profiles.set(profile.name, { ...profile, packages: normalizeSet(profile.packages) });
    }
    if (active !== null) {
      this.setActive(active);
    }
  }

  // -------------------------------------------------------------------------
  // Read
  // -------------------------------------------------------------------------

  has(name: string): boolean {
    return this.profiles.has(name);
  }

  get(name: string): Profile | undefined {
    return this.profiles.get(name);
  }

  require(name: string): Profile {
    const profile = this.profiles.get(name);
    if (profile === undefined) {
      throw notFound('profile', name);
    }
    return profile;
  }

  list(): ReadonlyArray<Profile> {
    return [...this.profiles.values()].sort((a, b) => compareNames(a.name, b.name));
  }

  getActive(): string | null {
    return this.active;
  }

  // -------------------------------------------------------------------------
  // Active pointer
  // -------------------------------------------------------------------------

  /**
   * Point the registry at a profile, or clear the pointer with null.
   *
   * @throws {EnvshiftError} NotFound if the name is not a known profile
   */
  setActive(name: string | null): void {
    if (name !== null && !this.profiles.has(name)) {
      throw notFound('profile', name);
    }
    this.active = name;
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Create a profile.
   *
   * `parent` is stored as given and never checked. `packages` seeds the
   * package set, which lets the caller restore symmetry with ledger entries
   * that already reference this name.
   *
   * @throws {EnvshiftError} InvalidOperation if the name is taken or is not a
   *   single path segment
   */
  create(
    name: string,
    parent: string | null,
    createdAt: string,
    packages: ReadonlyArray<string> = [],
  ): Profile {
    requireProfileName(name);
    if (this.profiles.has(name)) {
      throw invalidOperation(name, `Profile already exists: ${name}`);
    }
    const profile: Profile = {
      name,
      parent,
      packages: normalizeSet(packages),
      environment: EMPTY_ENVIRONMENT,
      os_overrides: {},
      created_at: createdAt,
    };
    this.profiles.set(name, profile);
    return profile;
  }

  /**
   * Delete a profile and return it.
   *
   * @throws {EnvshiftError} NotFound if unknown; InvalidOperation if active
   */
  delete(name: string): Profile {
    const profile = this.require(name);
    if (this.active === name) {
      throw invalidOperation(name, `Cannot delete the active profile: ${name}. Deactivate or switch first.`);
    }
    this.profiles.delete(name);
    return profile;
  }

  // -------------------------------------------------------------------------
  // Package set
  // -------------------------------------------------------------------------

  addPackage(name: string, pkg: string): void {
    const profile = this.require(name);
    this.profiles.set(name, { ...profile, packages: withItem(profile.packages, pkg) });
  }

  removePackage(name: string, pkg: string): void {
    const profile = this.require(name);
    this.profiles.set(name, { ...profile, packages: withoutItem(profile.packages, pkg) });
  }

  // -------------------------------------------------------------------------
  // Environment and overrides
  // -------------------------------------------------------------------------

  setEnvironment(name: string, environment: EnvironmentState): Profile {
    const updated: Profile = { ...this.require(name), environment };
    this.profiles.set(name, updated);
    return updated;
  }

  setOsOverride(name: string, os: OsType, override: OsOverride | null): Profile {
    const profile = this.require(name);
    const os_overrides: Partial<Record<OsType, OsOverride>> = { ...profile.os_overrides };
    if (override === null) {
      delete os_overrides[os];
    } else {
      os_overrides[os] = { ...override, packages: normalizeSet(override.packages) };
    }
    const updated: Profile = { ...profile, os_overrides };
    this.profiles.set(name, updated);
    return updated;
  }

  /** Snapshot form, keyed by profile name in sorted order. */
  toRecord(): Record<string, Profile> {
    return Object.fromEntries(this.list().map((profile) => [profile.name, profile]));
  }
}
