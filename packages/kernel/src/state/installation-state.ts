/**
 * envshift Kernel: Installation State Aggregate
 *
 * Wraps the PackageLedger and ProfileRegistry and is the only place that
 * changes package membership. Every operation updates both sides of the
 * symmetry invariant together:
 *
 *   for every existing profile f and package p:
 *     f ∈ ledger[p].active_for  ⟺  p ∈ profiles[f].packages
 *
 * Names in `active_for` that are not existing profiles are allowed. They
 * arise from installs made while no profile was active (the 'default'
 * identity) and are folded into a profile's set if one with that name is
 * created later.
 *
 * This class has no I/O. Load and save go through a SnapshotStore.
 */

import type { BinaryLink } from '../adapters/index.js';
import type { InstallationRecord } from '../types/installation.js';
import { DEFAULT_PROFILE_IDENTITY } from '../types/installation.js';
import type { Profile } from '../types/profile.js';
import type { StateSnapshot } from '../types/snapshot.js';
import { SNAPSHOT_VERSION } from '../types/snapshot.js';
import { linkNameOf } from './names.js';
import { PackageLedger } from './package-ledger.js';
import { ProfileRegistry } from './profile-registry.js';

export class InstallationState {
  constructor(
    readonly ledger: PackageLedger = new PackageLedger(),
    readonly registry: ProfileRegistry = new ProfileRegistry(),
  ) {}

  static fromSnapshot(snapshot: StateSnapshot): InstallationState {
    return new InstallationState(
      new PackageLedger(Object.values(snapshot.installations)),
      new ProfileRegistry(Object.values(snapshot.profiles), snapshot.active_profile),
    );
  }

  toSnapshot(): StateSnapshot {
    return {
      version: SNAPSHOT_VERSION,
      installations: this.ledger.toRecord(),
      profiles: this.registry.toRecord(),
      active_profile: this.registry.getActive(),
    };
  }

  /** Deep copy, used to restore state when a persist fails. */
  clone(): InstallationState {
    return InstallationState.fromSnapshot(this.toSnapshot());
  }

  get activeProfile(): string | null {
    return this.registry.getActive();
  }

  /** The active profile name, or the default identity when none is active. */
  currentIdentity(): string {
    return this.registry.getActive() ?? DEFAULT_PROFILE_IDENTITY;
  }

  // -------------------------------------------------------------------------
  // Membership
  // -------------------------------------------------------------------------

  /** Add the (profile, package) pair on both sides. */
  activatePackage(pkg: string, profile: string): void {
    this.ledger.addActive(pkg, profile);
    if (this.registry.has(profile)) {
      this.registry.addPackage(profile, pkg);
    }
  }

  /** Remove the (profile, package) pair on both sides. */
  deactivatePackage(pkg: string, profile: string): void {
    this.ledger.removeActive(pkg, profile);
    if (this.registry.has(profile)) {
      this.registry.removePackage(profile, pkg);
    }
  }

  /** Insert a new ledger record and add it to every existing profile it names. */
  installPackage(record: InstallationRecord): void {
    this.ledger.insert(record);
    for (const profile of record.active_for) {
      if (this.registry.has(profile)) {
        this.registry.addPackage(profile, record.package);
      }
    }
  }

  /**
   * Delete the ledger record and strip the package from every profile set.
   *
   * @returns Names of the profiles whose sets contained the package
   */
  uninstallPackage(pkg: string): string[] {
    this.ledger.require(pkg);
    const affected = this.profilesContaining(pkg);
    for (const name of affected) {
      this.registry.removePackage(name, pkg);
    }
    this.ledger.delete(pkg);
    return affected;
  }

  profilesContaining(pkg: string): string[] {
    return this.registry
      .list()
      .filter((p) => p.packages.includes(pkg))
      .map((p) => p.name);
  }

  /**
   * The links a profile's bin directory should hold: one per package in its
   * set whose record carries a known location, named by the package's last
   * segment. When two packages share a link name the first in sorted order
   * keeps it.
   */
  binaryLinksFor(profile: string): BinaryLink[] {
    const links: BinaryLink[] = [];
    const taken = new Set<string>();
    for (const pkg of this.registry.require(profile).packages) {
      const location = this.ledger.get(pkg)?.location ?? null;
      const name = linkNameOf(pkg);
      if (location !== null && !taken.has(name)) {
        taken.add(name);
        links.push({ name, target: location });
      }
    }
    return links;
  }

  // -------------------------------------------------------------------------
  // Profiles
  // -------------------------------------------------------------------------

  /** Create a profile, seeding its set from ledger entries already naming it. */
  createProfile(name: string, parent: string | null, createdAt: string): Profile {
    return this.registry.create(name, parent, createdAt, this.ledger.packagesActiveFor(name));
  }

  /** Delete a non-active profile and drop its name from every `active_for`. */
  deleteProfile(name: string): Profile {
    const removed = this.registry.delete(name);
    for (const pkg of this.ledger.packagesActiveFor(name)) {
      this.ledger.removeActive(pkg, name);
    }
    return removed;
  }

  // -------------------------------------------------------------------------
  // Invariants
  // -------------------------------------------------------------------------

  /**
   * Check the registry invariants and return one message per violation.
   * An empty array means the state is consistent.
   */
  verifyInvariants(): string[] {
    const violations: string[] = [];

    const active = this.registry.getActive();
    if (active !== null && !this.registry.has(active)) {
      violations.push(`active profile '${active}' does not exist`);
    }

    for (const record of this.ledger.list()) {
      for (const name of record.active_for) {
        const profile = this.registry.get(name);
        if (profile !== undefined && !profile.packages.includes(record.package)) {
          violations.push(`'${record.package}' lists '${name}' in active_for but the profile does not own it`);
        }
      }
    }

    for (const profile of this.registry.list()) {
      for (const pkg of profile.packages) {
        const record = this.ledger.get(pkg);
        if (record === undefined) {
          violations.push(`profile '${profile.name}' owns '${pkg}' which is not in the ledger`);
        } else if (!record.active_for.includes(profile.name)) {
          violations.push(`profile '${profile.name}' owns '${pkg}' but is missing from its active_for`);
        }
      }
    }

    return violations;
  }
}
