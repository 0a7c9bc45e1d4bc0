/**
 * envshift Profile Engine: State Manager Tests
 *
 * Coverage:
 *   M1: first install with no active profile is attributed to the default identity
 *   M2: installing an already-installed package only activates it
 *   M3: smart-remove deactivates while shared, uninstalls at the last reference
 *   M4: deactivate keeps the ledger entry with no references
 *   M5: deleting the active profile is InvalidOperation and changes nothing
 *   M6: an installer failure aborts before any state change
 *   M7: a failed save leaves state unchanged and propagates
 *   M8: state survives a reload from the same store
 *   M9: environment edits persist and log profile.updated
 *   M10: parent is a stored back-reference only
 *   M11: package location feeds the profile's binary links
 *   M12: OS overrides are stored and removable
 *   M13: each installer run records the package's last status, failed or not
 *   M14: toggling an alias keeps its command; unsetting it clears the toggle
 *
 * The symmetry invariant is asserted after every mutation.
 */

import { describe, it, expect } from 'vitest';
import {
  EnvshiftError,
  ErrorKind,
  InstallScope,
  OsType,
  RemovalStrategy,
} from '@envshift/kernel';
import { StateManager } from '../src/state-manager.js';
import {
  addPath,
  setActive,
  setAlias,
  setVariable,
  toggleAlias,
  unsetAlias,
  unsetVariable,
} from '../src/environment-edits.js';
import { T0, expectError, harness, loggedTypes } from './helpers.js';

function kindOf(err: unknown): ErrorKind | null {
  return err instanceof EnvshiftError ? err.kind : null;
}

describe('StateManager: packages', () => {
  it('M1: first install with no active profile uses the default identity', () => {
    const { manager, installer, io } = harness();

    const result = manager.smartInstall('jq', { installerType: 'brew' });

    expect(result.action).toBe('installed');
    expect(result.profile).toBe('default');
    expect(installer.installs).toEqual([{ packages: ['jq'], scope: InstallScope.Global }]);
    expect(manager.getPackage('jq')).toEqual({
      package: 'jq',
      version: null,
      installed_at: T0,
      installed_by: { kind: 'profile', profile: 'default' },
      active_for: ['default'],
      scope: InstallScope.Global,
      location: null,
      installer_type: 'brew',
    });
    expect(manager.isInstalled('jq')).toBe(true);
    expect(manager.isActive('jq')).toBe(true);
    expect(loggedTypes(io)).toEqual(['package.installed']);
    expect(manager.verifyInvariants()).toEqual([]);
  });

  it('M2: installing a package already in the ledger only activates it', () => {
    const { manager, installer } = harness();
    manager.createProfile('work');
    manager.createProfile('personal');
    manager.setActiveProfile('work');
    manager.smartInstall('nodejs');
    manager.setActiveProfile('personal');

    const result = manager.smartInstall('nodejs');

    expect(result).toMatchObject({ action: 'activated', profile: 'personal' });
    expect(installer.installs).toHaveLength(1);
    expect(manager.getPackage('nodejs').active_for).toEqual(['personal', 'work']);
    expect(manager.getProfile('personal').packages).toEqual(['nodejs']);
    expect(manager.getProfile('work').packages).toEqual(['nodejs']);
    expect(manager.verifyInvariants()).toEqual([]);
  });

  it('M3: smart-remove deactivates while shared and uninstalls at the last reference', () => {
    const { manager, installer } = harness();
    manager.createProfile('work');
    manager.createProfile('personal');
    manager.setActiveProfile('work');
    manager.smartInstall('nodejs');
    manager.setActiveProfile('personal');
    manager.smartInstall('nodejs');

    const first = manager.handleRemoval('nodejs', RemovalStrategy.SmartRemove);
    expect(first).toMatchObject({ action: 'deactivate', profile: 'personal', remaining_references: ['work'] });
    expect(installer.uninstalls).toEqual([]);
    expect(manager.verifyInvariants()).toEqual([]);

    manager.setActiveProfile('work');
    const second = manager.handleRemoval('nodejs', RemovalStrategy.SmartRemove);
    expect(second.action).toBe('uninstall');
    expect(installer.uninstalls).toEqual([['nodejs']]);
    expect(manager.isInstalled('nodejs')).toBe(false);
    expect(manager.getProfile('work').packages).toEqual([]);
    expect(manager.verifyInvariants()).toEqual([]);
  });

  it('M4: deactivate keeps the ledger entry with no references', () => {
    const { manager } = harness();
    manager.createProfile('work');
    manager.setActiveProfile('work');
    manager.smartInstall('jq');

    const outcome = manager.handleRemoval('jq', RemovalStrategy.Deactivate);

    expect(outcome.orphaned).toBe(true);
    expect(manager.getPackage('jq').active_for).toEqual([]);
    expect(manager.getProfile('work').packages).toEqual([]);
    expect(manager.verifyInvariants()).toEqual([]);
  });

  it('removing an unknown package is NotFound', () => {
    const { manager } = harness();
    expect(kindOf(expectError(() => manager.handleRemoval('ghost', RemovalStrategy.ForceRemove)))).toBe(
      ErrorKind.NotFound,
    );
  });

  it('M6: an installer failure aborts before any state change', () => {
    const { manager, installer, store, io } = harness();
    installer.failWith = new Error('network down');

    const err = expectError(() => manager.smartInstall('jq'));

    expect(err).toBe(installer.failWith);
    expect(manager.isInstalled('jq')).toBe(false);
    expect(store.saves).toBe(0);
    expect(loggedTypes(io)).toEqual([]);
  });

  it('M6: an uninstall failure leaves the ledger entry in place', () => {
    const { manager, installer } = harness();
    manager.smartInstall('jq');
    installer.failWith = new Error('locked');

    expect(expectError(() => manager.handleRemoval('jq', RemovalStrategy.ForceRemove))).toBe(installer.failWith);
    expect(manager.isInstalled('jq')).toBe(true);
  });

  it('M7: a failed save leaves state unchanged and propagates', () => {
    const { manager, store } = harness();
    manager.createProfile('work');
    const before = manager.snapshot();
    store.failNextSave = true;

    const err = expectError(() => manager.smartInstall('jq'));

    expect(kindOf(err)).toBe(ErrorKind.IOFailure);
    expect(manager.snapshot()).toEqual(before);
    expect(manager.isInstalled('jq')).toBe(false);
  });

  it('M8: state survives a reload from the same store', () => {
    const { manager, io } = harness();
    manager.createProfile('work');
    manager.setActiveProfile('work');
    manager.smartInstall('ripgrep', { version: '14.1.0', location: '/usr/local/bin/rg' });

    const reloaded = harness(io).manager;

    expect(reloaded.snapshot()).toEqual(manager.snapshot());
    expect(reloaded.activeProfile).toBe('work');
  });

  it('M11: a package location feeds the profile binary links', () => {
    const { manager, io } = harness();
    manager.createProfile('work');
    manager.setActiveProfile('work');
    manager.smartInstall('jq');
    expect(manager.current.binaryLinksFor('work')).toEqual([]);

    manager.setPackageLocation('jq', '/opt/homebrew/bin/jq');
    manager.setPackageVersion('jq', '1.7.1');

    expect(manager.current.binaryLinksFor('work')).toEqual([{ name: 'jq', target: '/opt/homebrew/bin/jq' }]);
    expect(manager.getPackage('jq').version).toBe('1.7.1');
    expect(loggedTypes(io).slice(-2)).toEqual(['package.located', 'package.updated']);
  });
});

describe('StateManager: profiles', () => {
  it('M5: deleting the active profile is InvalidOperation and changes nothing', () => {
    const { manager, store } = harness();
    manager.createProfile('work');
    manager.setActiveProfile('work');
    manager.smartInstall('jq');
    const before = manager.snapshot();
    const savesBefore = store.saves;

    const err = expectError(() => manager.deleteProfile('work'));

    expect(kindOf(err)).toBe(ErrorKind.InvalidOperation);
    expect(manager.snapshot()).toEqual(before);
    expect(store.saves).toBe(savesBefore);
  });

  it('deleting an inactive profile drops it from every active_for', () => {
    const { manager } = harness();
    manager.createProfile('work');
    manager.createProfile('personal');
    manager.setActiveProfile('work');
    manager.smartInstall('jq');
    manager.setActiveProfile('personal');
    manager.smartInstall('jq');

    manager.deleteProfile('work');

    expect(manager.getPackage('jq').active_for).toEqual(['personal']);
    expect(manager.verifyInvariants()).toEqual([]);
  });

  it('creating a duplicate profile is InvalidOperation', () => {
    const { manager } = harness();
    manager.createProfile('work');
    expect(kindOf(expectError(() => manager.createProfile('work')))).toBe(ErrorKind.InvalidOperation);
  });

  it('a profile named like the default identity adopts earlier installs', () => {
    const { manager } = harness();
    manager.smartInstall('jq');

    const profile = manager.createProfile('default');

    expect(profile.packages).toEqual(['jq']);
    expect(manager.verifyInvariants()).toEqual([]);
  });

  it('M10: parent is a stored back-reference only', () => {
    const { manager } = harness();
    manager.createProfile('base');
    manager.setActiveProfile('base');
    manager.smartInstall('git');

    const child = manager.createProfile('child', 'base');
    const orphan = manager.createProfile('orphan', 'missing');

    expect(child.parent).toBe('base');
    expect(child.packages).toEqual([]);
    expect(orphan.parent).toBe('missing');
  });

  it('M9: environment edits persist and log profile.updated', () => {
    const { manager, io } = harness();
    manager.createProfile('work');

    manager.updateEnvironment('work', addPath('~/work/bin'));
    manager.updateEnvironment('work', addPath('/opt/extra', 'append'));
    manager.updateEnvironment('work', addPath('~/work/bin'));
    manager.updateEnvironment('work', setVariable('EDITOR', 'vim'));
    manager.updateEnvironment('work', setVariable('PAGER', 'less'));
    manager.updateEnvironment('work', unsetVariable('PAGER'));
    manager.updateEnvironment('work', setAlias('k', 'kubectl'));
    const env = manager.updateEnvironment('work', setActive(false));

    expect(env).toEqual({
      paths_prepend: ['~/work/bin'],
      paths_append: ['/opt/extra'],
      variables: { EDITOR: 'vim' },
      aliases: { k: 'kubectl' },
      active: false,
    });
    expect(harness(io).manager.getProfile('work').environment).toEqual(env);
    expect(loggedTypes(io).filter((t) => t === 'profile.updated')).toHaveLength(8);
  });

  it('editing an unknown profile is NotFound', () => {
    const { manager } = harness();
    expect(kindOf(expectError(() => manager.updateEnvironment('ghost', setActive(true))))).toBe(ErrorKind.NotFound);
  });

  it('M12: OS overrides are stored and removable', () => {
    const { manager } = harness();
    manager.createProfile('work');

    manager.setOsOverride('work', OsType.MacOS, { packages: ['coreutils'], environment: null });
    expect(manager.getProfile('work').os_overrides).toEqual({
      macos: { packages: ['coreutils'], environment: null },
    });

    manager.setOsOverride('work', OsType.MacOS, null);
    expect(manager.getProfile('work').os_overrides).toEqual({});
  });

  it('setActiveProfile rejects an unknown profile', () => {
    const { manager } = harness();
    expect(kindOf(expectError(() => manager.setActiveProfile('ghost')))).toBe(ErrorKind.NotFound);
  });

  it('works without an installer', () => {
    const { store } = harness();
    const manager = new StateManager({ store });
    expect(manager.smartInstall('jq', { scope: InstallScope.Local }).record.scope).toBe(InstallScope.Local);
  });
});

describe('StateManager: install status', () => {
  it('M13: each installer run records the package status, failed or not', () => {
    const { manager, installer, io } = harness();
    installer.failWith = new Error('network down');
    expectError(() => manager.smartInstall('jq'));

    expect(manager.installStatus('jq')).toEqual({
      package: 'jq',
      action: 'install',
      success: false,
      timestamp: T0,
      error: 'network down',
    });
    expect(manager.isInstalled('jq')).toBe(false);

    installer.failWith = null;
    manager.smartInstall('jq');
    manager.smartInstall('fd');
    manager.handleRemoval('fd', RemovalStrategy.ForceRemove);

    expect(harness(io).manager.listInstallStatuses()).toEqual([
      { package: 'fd', action: 'uninstall', success: true, timestamp: T0, error: null },
      { package: 'jq', action: 'install', success: true, timestamp: T0, error: null },
    ]);
  });

  it('M13: an activation or a deactivation runs no installer and records nothing', () => {
    const { manager } = harness();
    manager.createProfile('work');
    manager.setActiveProfile('work');
    manager.smartInstall('jq');
    manager.createProfile('personal');
    manager.setActiveProfile('personal');

    manager.smartInstall('jq');
    manager.handleRemoval('jq', RemovalStrategy.Deactivate);

    expect(manager.listInstallStatuses()).toEqual([
      { package: 'jq', action: 'install', success: true, timestamp: T0, error: null },
    ]);
  });

  it('reports no status for a package never run through the installer', () => {
    const { store } = harness();
    const manager = new StateManager({ store });
    manager.smartInstall('jq');

    expect(manager.installStatus('jq')).toBeNull();
    expect(manager.listInstallStatuses()).toEqual([]);
  });

  it('a malformed status file is PersistenceFailure', () => {
    const { manager, io } = harness();
    io.writeJson('install-status.json', {
      jq: { package: 'jq', action: 'upgrade', success: true, timestamp: T0, error: null },
    });

    const err = expectError(() => manager.installStatus('jq'));

    expect(kindOf(err)).toBe(ErrorKind.PersistenceFailure);
    expect(err).toHaveProperty('message', 'Malformed install status: jq.action: unexpected value "upgrade"');
  });
});

describe('StateManager: alias toggling', () => {
  it('M14: toggling an alias keeps its command and unsetting it clears the toggle', () => {
    const { manager, io } = harness();
    manager.createProfile('work');
    manager.updateEnvironment('work', setAlias('k', 'kubectl'));
    manager.updateEnvironment('work', setAlias('gs', 'git status'));

    const off = manager.updateEnvironment('work', toggleAlias('k'));
    expect(off.aliases).toEqual({ k: 'kubectl', gs: 'git status' });
    expect(off.disabled_aliases).toEqual(['k']);
    expect(harness(io).manager.getProfile('work').environment.disabled_aliases).toEqual(['k']);

    const on = manager.updateEnvironment('work', toggleAlias('k'));
    expect(on).not.toHaveProperty('disabled_aliases');

    manager.updateEnvironment('work', toggleAlias('gs'));
    const removed = manager.updateEnvironment('work', unsetAlias('gs'));
    expect(removed.aliases).toEqual({ k: 'kubectl' });
    expect(removed).not.toHaveProperty('disabled_aliases');
  });

  it('M14: toggling an undefined alias is InvalidOperation and changes nothing', () => {
    const { manager } = harness();
    manager.createProfile('work');
    const before = manager.getProfile('work').environment;

    const err = expectError(() => manager.updateEnvironment('work', toggleAlias('k')));

    expect(kindOf(err)).toBe(ErrorKind.InvalidOperation);
    expect(err).toHaveProperty('message', "Alias 'k' is not defined");
    expect(manager.getProfile('work').environment).toEqual(before);
  });
});
