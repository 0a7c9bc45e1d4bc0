/**
 * envshift Profile Engine: State Manager
 *
 * The persisted face of the installation state engine. Loads the snapshot
 * once at construction, runs every mutation against a copy of the
 * InstallationState, saves the full snapshot and only then adopts the copy.
 * A failed save therefore leaves the in-memory state exactly as it was
 * before the call, and the error propagates unchanged.
 *
 * Every successful mutation appends one event through the EventLogger.
 *
 * Side effects that happen outside the snapshot (the Installer) run before
 * the mutation: an installer failure aborts with no state change. With an
 * InstallStatusLog, every installer run leaves its outcome there, failures
 * included.
 */

import type {
  EnvironmentState,
  EventDetailValue,
  InstallAttemptAction,
  InstallStatus,
  InstallationRecord,
  Installer,
  LedgerEventType,
  OsOverride,
  OsType,
  Profile,
  RemovalOutcome,
  RemovalPlan,
  RemovalStrategy,
  SmartInstallOptions,
  SmartInstallResult,
  SnapshotStore,
  StateSnapshot,
} from '@envshift/kernel';
import {
  EventLogger,
  InstallScope,
  InstallationState,
  RemovalPolicyResolver,
  applySmartInstall,
  describeCause,
  planInstall,
} from '@envshift/kernel';
import type { EnvironmentEdit } from './environment-edits.js';
import type { InstallStatusLog } from './install-status-log.js';

export interface StateManagerOptions {
  readonly store: SnapshotStore;
  readonly logger?: EventLogger | undefined;
  /** Omitted or null: installs are recorded without running anything. */
  readonly installer?: Installer | null | undefined;
  readonly resolver?: RemovalPolicyResolver | undefined;
  /** Omitted: installer outcomes are not kept. */
  readonly statusLog?: InstallStatusLog | undefined;
}

export interface InstallRequest extends SmartInstallOptions {
  readonly scope?: InstallScope | undefined;
}

export class StateManager {
  private state: InstallationState;
  private readonly store: SnapshotStore;
  private readonly logger: EventLogger;
  private readonly installer: Installer | null;
  private readonly resolver: RemovalPolicyResolver;
  private readonly statusLog: InstallStatusLog | null;

  constructor(opts: StateManagerOptions) {
    this.store = opts.store;
    this.logger = opts.logger ?? new EventLogger();
    this.installer = opts.installer ?? null;
    this.resolver = opts.resolver ?? new RemovalPolicyResolver();
    this.statusLog = opts.statusLog ?? null;
    this.state = InstallationState.fromSnapshot(this.store.load());
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  /** Read-only view of the current state. Callers must not mutate it. */
  get current(): InstallationState {
    return this.state;
  }

  snapshot(): StateSnapshot {
    return this.state.toSnapshot();
  }

  get activeProfile(): string | null {
    return this.state.activeProfile;
  }

  currentIdentity(): string {
    return this.state.currentIdentity();
  }

  isInstalled(pkg: string): boolean {
    return this.state.ledger.has(pkg);
  }

  /** True when the package is active for the current profile (or default identity). */
  isActive(pkg: string): boolean {
    return this.state.ledger.get(pkg)?.active_for.includes(this.state.currentIdentity()) ?? false;
  }

  /** @throws {EnvshiftError} NotFound */
  getPackage(pkg: string): InstallationRecord {
    return this.state.ledger.require(pkg);
  }

  listPackages(): ReadonlyArray<InstallationRecord> {
    return this.state.ledger.list();
  }

  /** @throws {EnvshiftError} NotFound */
  getProfile(name: string): Profile {
    return this.state.registry.require(name);
  }

  listProfiles(): ReadonlyArray<Profile> {
    return this.state.registry.list();
  }

  verifyInvariants(): string[] {
    return this.state.verifyInvariants();
  }

  /** Outcome of the last installer run for a package, if one was kept. */
  installStatus(pkg: string): InstallStatus | null {
    return this.statusLog?.get(pkg) ?? null;
  }

  listInstallStatuses(): ReadonlyArray<InstallStatus> {
    return this.statusLog?.list() ?? [];
  }

  // -------------------------------------------------------------------------
  // Packages
  // -------------------------------------------------------------------------

  /**
   * Install a package for the current profile, or only activate it when the
   * ledger already has it. The Installer runs only for real installs.
   */
  smartInstall(pkg: string, request: InstallRequest = {}): SmartInstallResult {
    const scope = request.scope ?? InstallScope.Global;
    if (planInstall(this.state, pkg) === 'installed') {
      this.runInstaller(pkg, 'install', (installer) => installer.install([pkg], scope));
    }

    const result = this.mutate((state) =>
      applySmartInstall(state, pkg, scope, this.logger.now(), request),
    );
    this.log(result.action === 'installed' ? 'package.installed' : 'package.activated', pkg, {
      scope: result.record.scope,
      for: result.profile,
      installer_type: result.record.installer_type,
    });
    return result;
  }

  /** Decide what removing `pkg` with `strategy` would do. No state changes. */
  planRemoval(pkg: string, strategy: RemovalStrategy): RemovalPlan {
    return this.resolver.plan(this.state, pkg, strategy);
  }

  /**
   * Remove a package under a removal strategy. A full uninstall runs the
   * Installer's uninstall first.
   *
   * @throws {EnvshiftError} NotFound if the package is not in the ledger
   */
  handleRemoval(pkg: string, strategy: RemovalStrategy): RemovalOutcome {
    const plan = this.planRemoval(pkg, strategy);
    if (plan.action === 'uninstall') {
      this.runInstaller(pkg, 'uninstall', (installer) => installer.uninstall([pkg]));
    }

    const outcome = this.mutate((state) => this.resolver.apply(state, plan));
    this.log('package.removed', pkg, {
      strategy,
      action: outcome.action,
      orphaned: outcome.orphaned,
      marked_unused: outcome.marked_unused,
      remaining: outcome.remaining_references.length,
    });
    return outcome;
  }

  setPackageLocation(pkg: string, location: string | null): InstallationRecord {
    const record = this.mutate((state) => state.ledger.update(pkg, { location }));
    this.log('package.located', pkg, { location });
    return record;
  }

  setPackageVersion(pkg: string, version: string | null): InstallationRecord {
    const record = this.mutate((state) => state.ledger.update(pkg, { version }));
    this.log('package.updated', pkg, { version });
    return record;
  }

  // -------------------------------------------------------------------------
  // Profiles
  // -------------------------------------------------------------------------

  /** @throws {EnvshiftError} InvalidOperation when the name is taken */
  createProfile(name: string, parent: string | null = null): Profile {
    const profile = this.mutate((state) => state.createProfile(name, parent, this.logger.now()));
    this.log('profile.created', name, { parent, packages: profile.packages.length });
    return profile;
  }

  /** @throws {EnvshiftError} InvalidOperation for the active profile */
  deleteProfile(name: string): Profile {
    const removed = this.mutate((state) => state.deleteProfile(name));
    this.log('profile.deleted', name);
    return removed;
  }

  /** Apply an edit to a profile's environment. */
  updateEnvironment(name: string, edit: EnvironmentEdit): EnvironmentState {
    const profile = this.mutate((state) =>
      state.registry.setEnvironment(name, edit(state.registry.require(name).environment)),
    );
    this.log('profile.updated', name, { field: 'environment' });
    return profile.environment;
  }

  /** Store (or with null, remove) an OS override. Overrides are never applied. */
  setOsOverride(name: string, os: OsType, override: OsOverride | null): Profile {
    const profile = this.mutate((state) => state.registry.setOsOverride(name, os, override));
    this.log('profile.updated', name, { field: 'os_overrides', os, removed: override === null });
    return profile;
  }

  /**
   * Set the active pointer and persist. Used by the transition orchestrator;
   * it logs the transition steps itself.
   *
   * @throws {EnvshiftError} NotFound for an unknown profile
   */
  setActiveProfile(name: string | null): void {
    this.mutate((state) => state.registry.setActive(name));
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  /** Run the installer, if any, and keep its outcome. The installer's error propagates. */
  private runInstaller(pkg: string, action: InstallAttemptAction, run: (installer: Installer) => void): void {
    if (this.installer === null) return;
    try {
      run(this.installer);
    } catch (err: unknown) {
      this.keepStatus(pkg, action, describeCause(err));
      throw err;
    }
    this.keepStatus(pkg, action, null);
  }

  private keepStatus(pkg: string, action: InstallAttemptAction, error: string | null): void {
    this.statusLog?.record({ package: pkg, action, success: error === null, timestamp: this.logger.now(), error });
  }

  private mutate<T>(fn: (state: InstallationState) => T): T {
    const next = this.state.clone();
    const result = fn(next);
    this.store.save(next.toSnapshot());
    this.state = next;
    return result;
  }

  private log(
    type: LedgerEventType,
    subject: string,
    detail: Readonly<Record<string, EventDetailValue>> = {},
  ): void {
    this.logger.record(type, subject, this.state.activeProfile, detail);
  }
}
