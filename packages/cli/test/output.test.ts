/**
 * envshift CLI: Output Formatting Tests
 *
 * Colors are disabled so the assertions read as plain text.
 *
 * Coverage:
 *   OUT1: status shows the active profile and the resolved locations
 *   OUT2: a pending transition is called out with the recovery commands
 *   OUT3: package list marks orphaned entries
 *   OUT4: install and removal confirmations
 *   OUT5: profile list marks the active profile, disabled envs and parents
 *   OUT6: transition and rollback summaries list their steps
 *   OUT7: event log notes skipped lines
 *   OUT8: command errors carry the command name and error kind
 *   OUT9: package info ends with the last installer run when there is one
 *   OUT10: dashboard event colors come from the shared palette
 */

import { beforeAll, describe, it, expect } from 'vitest';
import chalk from 'chalk';
import {
  EMPTY_ENVIRONMENT,
  InstallScope,
  RemovalStrategy,
  ShellKind,
  TransitionKind,
  TransitionStep,
  notFound,
} from '@envshift/kernel';
import type { InstallationRecord, Profile } from '@envshift/kernel';
import { renderStatus } from '../src/tui/output/status.js';
import {
  renderInstallResult,
  renderPackageInfo,
  renderPackageList,
  renderRemovalOutcome,
  renderRemovalPlan,
} from '../src/tui/output/packages.js';
import { renderProfileList, renderRollback, renderTransition } from '../src/tui/output/profiles.js';
import { renderEventLog } from '../src/tui/output/events.js';
import { eventHex, palette } from '../src/tui/theme.js';
import { formatCommandError, parseChoice } from '../src/commands/support.js';

const T0 = '2026-04-01T08:00:00.000Z';

function record(overrides: Partial<InstallationRecord> & { package: string }): InstallationRecord {
  return {
    version: null,
    installed_at: T0,
    installed_by: { kind: 'profile', profile: 'work' },
    active_for: [],
    scope: InstallScope.Global,
    location: null,
    installer_type: 'manual',
    ...overrides,
  };
}

function profile(overrides: Partial<Profile> & { name: string }): Profile {
  return {
    parent: null,
    packages: [],
    environment: EMPTY_ENVIRONMENT,
    os_overrides: {},
    created_at: T0,
    ...overrides,
  };
}

beforeAll(() => {
  chalk.level = 0;
});

// ---------------------------------------------------------------------------
// status
// ---------------------------------------------------------------------------

describe('renderStatus', () => {
  it('OUT1: shows the active profile and resolved locations', () => {
    const out = renderStatus({
      home: '/data/envshift',
      shellKind: ShellKind.Posix,
      shellConfigPath: '/home/dev/.bashrc',
      activeProfile: 'work',
      profileCount: 2,
      packageCount: 3,
      pending: null,
      violations: [],
    });

    expect(out).toBe(
      '\n' +
        '  ◈ work\n' +
        '\n' +
        '  home      /data/envshift\n' +
        '  shell     posix  /home/dev/.bashrc\n' +
        '  profiles  2\n' +
        '  packages  3\n',
    );
  });

  it('OUT2: calls out a pending transition and how to recover', () => {
    const out = renderStatus({
      home: '/data/envshift',
      shellKind: ShellKind.Fish,
      shellConfigPath: '/home/dev/.config/fish/config.fish',
      activeProfile: 'personal',
      profileCount: 2,
      packageCount: 0,
      pending: {
        kind: TransitionKind.Switch,
        from: 'work',
        to: 'personal',
        previous_marker: 'work',
        clear_marker: false,
        completed_steps: [TransitionStep.DeactivatePrevious, TransitionStep.UpdatePointer],
        status: 'failed',
        error: 'permission denied',
        started_at: T0,
        updated_at: T0,
      },
      violations: ['profile personal lists jq but the ledger has no such package'],
    });

    const lines = out.split('\n');
    expect(lines).toContain('  ⚠ switch work → personal failed');
    expect(lines).toContain('    permission denied');
    expect(lines).toContain('    envshift profile resume | envshift profile rollback');
    expect(lines).toContain('  ✗ profile personal lists jq but the ledger has no such package');
  });
});

// ---------------------------------------------------------------------------
// packages
// ---------------------------------------------------------------------------

describe('package output', () => {
  it('OUT3: package list marks orphaned entries', () => {
    const out = renderPackageList([
      record({ package: 'jq', version: '1.7.1', active_for: ['personal', 'work'] }),
      record({ package: 'fd', scope: InstallScope.Profile }),
    ]);

    expect(out).toBe(
      '\n' +
        '  ● ' + 'jq'.padEnd(20) + '1.7.1'.padEnd(10) + 'global'.padEnd(9) + 'personal, work\n' +
        '  ○ ' + 'fd'.padEnd(20) + '-'.padEnd(10) + 'profile'.padEnd(9) + 'orphaned\n',
    );
  });

  it('OUT9: package info ends with the last installer run when there is one', () => {
    const jq = record({ package: 'jq', version: '1.7.1', active_for: ['work'] });
    const rows =
      '\n  jq\n\n' +
      '  version       1.7.1\n' +
      '  scope         global\n' +
      '  installer     manual\n' +
      '  installed by  profile(work)\n' +
      '  installed at  ' + T0 + '\n' +
      '  location      unknown\n' +
      '  active for    work\n';

    expect(renderPackageInfo(jq)).toBe(rows);
    expect(
      renderPackageInfo(jq, { package: 'jq', action: 'uninstall', success: false, timestamp: T0, error: 'locked' }),
    ).toBe(rows + '  last run      uninstall failed  ' + T0 + '\n    locked\n');
  });

  it('package list says so when the ledger is empty', () => {
    expect(renderPackageList([])).toBe('\n  no packages recorded\n');
  });

  it('OUT4: install confirmations distinguish a fresh install from an activation', () => {
    const jq = record({ package: 'jq', active_for: ['work'] });

    expect(renderInstallResult({ package: 'jq', action: 'installed', profile: 'work', record: jq })).toBe(
      '  ✓ installed jq for work',
    );
    expect(renderInstallResult({ package: 'jq', action: 'activated', profile: 'work', record: jq })).toBe(
      '  ✓ activated jq for work\n    already installed; no installer run',
    );
  });

  it('OUT4: removal confirmations report remaining references or orphaning', () => {
    const base = {
      package: 'jq',
      strategy: RemovalStrategy.Deactivate,
      action: 'deactivate' as const,
      profile: 'work',
      marked_unused: false,
    };

    expect(renderRemovalOutcome({ ...base, remaining_references: [], orphaned: true })).toBe(
      '  ✓ deactivated jq for work\n    no profile references it; the ledger entry is kept',
    );
    expect(renderRemovalOutcome({ ...base, remaining_references: ['personal'], orphaned: false })).toBe(
      '  ✓ deactivated jq for work\n    still active for personal',
    );
    expect(
      renderRemovalOutcome({
        ...base,
        strategy: RemovalStrategy.ForceRemove,
        action: 'uninstall',
        profile: null,
        remaining_references: [],
        orphaned: false,
      }),
    ).toBe('  ✓ uninstalled jq');
  });

  it('a dry-run plan names the affected profiles', () => {
    expect(
      renderRemovalPlan({
        action: 'uninstall',
        package: 'jq',
        strategy: RemovalStrategy.ForceRemove,
        affected_profiles: ['personal', 'work'],
      }),
    ).toBe('  uninstall jq  from personal, work');
  });
});

// ---------------------------------------------------------------------------
// profiles and transitions
// ---------------------------------------------------------------------------

describe('profile output', () => {
  it('OUT5: marks the active profile, disabled environments and parents', () => {
    const out = renderProfileList(
      [
        profile({ name: 'personal', packages: ['jq'], environment: { ...EMPTY_ENVIRONMENT, active: false } }),
        profile({ name: 'work', parent: 'base' }),
      ],
      'work',
    );

    expect(out).toBe(
      '\n' +
        '  ○ ' + 'personal'.padEnd(20) + '1 package  env off\n' +
        '  ◈ ' + 'work'.padEnd(20) + '0 packages  ← base\n',
    );
  });

  it('OUT6: transition and rollback summaries list their steps', () => {
    expect(
      renderTransition({
        kind: TransitionKind.Switch,
        from: null,
        to: 'work',
        steps: [TransitionStep.UpdatePointer, TransitionStep.ActivateEnvironment],
      }),
    ).toBe('  ✓ switched none → work\n    update-pointer · activate-environment');

    expect(
      renderRollback({
        kind: TransitionKind.Switch,
        from: 'work',
        to: 'personal',
        steps: [TransitionStep.RelinkBinaries, TransitionStep.ActivateEnvironment],
      }),
    ).toBe('  ↺ rolled back switch (2 steps undone)\n    relink-binaries · activate-environment');
  });
});

// ---------------------------------------------------------------------------
// event log
// ---------------------------------------------------------------------------

describe('renderEventLog', () => {
  it('OUT7: lists events and notes skipped lines', () => {
    const out = renderEventLog(
      [
        {
          event_id: '01JQ0000000000000000000000',
          timestamp: T0,
          event_type: 'profile.created',
          subject: 'work',
          profile: null,
          detail: {},
        },
      ],
      { totalLines: 2, parseErrors: 1, duplicates: 0, partialTrailingLine: true },
    );

    expect(out).toBe(
      '\n' +
        `  ${T0}  ` + 'profile.created'.padEnd(24) + 'work\n' +
        '\n  ⚠ 2 unreadable lines skipped\n',
    );
  });
});

// ---------------------------------------------------------------------------
// errors
// ---------------------------------------------------------------------------

describe('theme', () => {
  it('OUT10: dashboard event colors come from the shared palette', () => {
    expect(eventHex('package.installed')).toBe(palette.green);
    expect(eventHex('transition.failed')).toBe(palette.red);
    expect(eventHex('transition.rolled-back')).toBe(palette.amber);
    expect(eventHex('profile.created')).toBe(palette.text);
  });
});

describe('command errors', () => {
  it('OUT8: carry the command name and error kind', () => {
    expect(formatCommandError('profile show', notFound('profile', 'ghost'))).toBe(
      '[envshift profile show] NotFound: Unknown profile: ghost',
    );
    expect(formatCommandError('log', new Error('boom'))).toBe('[envshift log] boom');
  });

  it('unknown choices are InvalidOperation listing the accepted values', () => {
    let caught: unknown;
    try {
      parseChoice('shell', 'tcsh', [ShellKind.Posix, ShellKind.Fish]);
    } catch (err: unknown) {
      caught = err;
    }
    expect(formatCommandError('env show', caught)).toBe(
      '[envshift env show] InvalidOperation: Unknown shell "tcsh". Expected one of: posix, fish',
    );
  });
});
