/**
 * envshift Kernel: Package Ledger
 *
 * The package-name-keyed table of InstallationRecords. Records are replaced,
 * never mutated in place; every accessor returns the current immutable
 * record.
 *
 * The ledger alone cannot keep the symmetry invariant with profile package
 * sets. Callers go through InstallationState, which updates both sides in
 * the same operation.
 */

import type { InstallationRecord } from '../types/installation.js';
import { invalidOperation, notFound } from '../errors/envshift-error.js';
import { requirePackageName } from './names.js';
import { compareNames, normalizeSet, withItem, withoutItem } from './sorted-set.js';

export class PackageLedger {
  private readonly records: Map<string, InstallationRecord> = new Map();

  constructor(records: Iterable<InstallationRecord> = []) {
    for (const record of records) {
      this.records.set(record.package, {
        ...record,
        active_for: normalizeSet(record.active_for),
      });
    }
  }

  has(pkg: string): boolean {
    return this.records.has(pkg);
  }

  get(pkg: string): InstallationRecord | undefined {
    return this.records.get(pkg);
  }

  /** Return the record or throw NotFound. */
  require(pkg: string): InstallationRecord {
    const record = this.records.get(pkg);
    if (record === undefined) {
      throw notFound('package', pkg);
    }
    return record;
  }

  /** All records sorted by package name. */
  list(): ReadonlyArray<InstallationRecord> {
    return [...this.records.values()].sort((a, b) => compareNames(a.package, b.package));
  }

  /** Packages whose `active_for` contains the given profile name. */
  packagesActiveFor(profile: string): string[] {
    return this.list()
      .filter((r) => r.active_for.includes(profile))
      .map((r) => r.package);
  }

  /**
   * Insert a new record.
   *
   * @throws {EnvshiftError} InvalidOperation if the package is already present
   *   or its name is not linkable
   */
  insert(record: InstallationRecord): void {
    requirePackageName(record.package);
    if (this.records.has(record.package)) {
      throw invalidOperation(record.package, `Package already in ledger: ${record.package}`);
    }
    this.records.set(record.package, { ...record, active_for: normalizeSet(record.active_for) });
  }

  /** Delete a record. Returns false when it was not present. */
  delete(pkg: string): boolean {
    return this.records.delete(pkg);
  }

  addActive(pkg: string, profile: string): void {
    const record = this.require(pkg);
    this.records.set(pkg, { ...record, active_for: withItem(record.active_for, profile) });
  }

  removeActive(pkg: string, profile: string): void {
    const record = this.require(pkg);
    this.records.set(pkg, { ...record, active_for: withoutItem(record.active_for, profile) });
  }

  /** Replace mutable descriptive fields of a record. */
  update(
    pkg: string,
    patch: Partial<Pick<InstallationRecord, 'version' | 'location' | 'installer_type' | 'scope'>>,
  ): InstallationRecord {
    const updated: InstallationRecord = { ...this.require(pkg), ...patch };
    this.records.set(pkg, updated);
    return updated;
  }

  /** Snapshot form, keyed by package name in sorted order. */
  toRecord(): Record<string, InstallationRecord> {
    return Object.fromEntries(this.list().map((record) => [record.package, record]));
  }
}
