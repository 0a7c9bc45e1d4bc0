/**
 * envshift Runtime Host: Command Installer
 *
 * Implements the Installer interface from @envshift/kernel by running the
 * host package manager synchronously. The engine only observes success or
 * failure: a non-zero exit, a signal or a spawn error is an IOFailure whose
 * message carries the manager's stderr.
 *
 *   brew   brew install -- <pkgs>          brew uninstall -- <pkgs>
 *   npm    npm install [-g] -- <pkgs>      npm uninstall -g -- <pkgs>
 *   pnpm   pnpm add [-g] -- <pkgs>         pnpm remove -g -- <pkgs>
 *
 * `-g` is passed for every scope except `local`. `--` ends option parsing so
 * a package name is never read as a flag.
 */

import { spawnSync } from 'node:child_process';
import type { Installer } from '@envshift/kernel';
import { InstallScope, ioFailure } from '@envshift/kernel';

export type InstallerType = 'brew' | 'npm' | 'pnpm';

export const INSTALLER_TYPES: ReadonlyArray<InstallerType> = ['brew', 'npm', 'pnpm'];

export function isInstallerType(value: string): value is InstallerType {
  return INSTALLER_TYPES.some((type) => type === value);
}

export interface CommandResult {
  /** Exit code, or null when the process was killed by a signal. */
  readonly status: number | null;
  readonly stderr: string;
  /** Set when the process could not be spawned. */
  readonly error?: Error | undefined;
}

/** Runs one command to completion. Injected by tests. */
export type CommandRunner = (command: string, args: ReadonlyArray<string>) => CommandResult;

export const spawnRunner: CommandRunner = (command, args) => {
  const result = spawnSync(command, [...args], {
    encoding: 'utf-8',
    stdio: ['ignore', 'inherit', 'pipe'],
  });
  return { status: result.status, stderr: result.stderr, error: result.error };
};

export class CommandInstaller implements Installer {
  constructor(
    readonly type: InstallerType,
    private readonly run: CommandRunner = spawnRunner,
  ) {}

  /** The command line install() would run. */
  installCommand(packages: ReadonlyArray<string>, scope: InstallScope): [string, string[]] {
    const global = scope === InstallScope.Local ? [] : ['-g'];
    switch (this.type) {
      case 'brew':
        return ['brew', ['install', '--', ...packages]];
      case 'npm':
        return ['npm', ['install', ...global, '--', ...packages]];
      case 'pnpm':
        return ['pnpm', ['add', ...global, '--', ...packages]];
    }
  }

  /** The command line uninstall() would run. */
  uninstallCommand(packages: ReadonlyArray<string>): [string, string[]] {
    switch (this.type) {
      case 'brew':
        return ['brew', ['uninstall', '--', ...packages]];
      case 'npm':
        return ['npm', ['uninstall', '-g', '--', ...packages]];
      case 'pnpm':
        return ['pnpm', ['remove', '-g', '--', ...packages]];
    }
  }

  install(packages: ReadonlyArray<string>, scope: InstallScope): void {
    const [command, args] = this.installCommand(packages, scope);
    this.exec(command, args, packages, 'install');
  }

  uninstall(packages: ReadonlyArray<string>): void {
    const [command, args] = this.uninstallCommand(packages);
    this.exec(command, args, packages, 'uninstall');
  }

  private exec(command: string, args: ReadonlyArray<string>, packages: ReadonlyArray<string>, action: string): void {
    const subject = packages.join(', ');
    const result = this.run(command, args);
    if (result.error !== undefined) {
      throw ioFailure(subject, `${action} via ${command}`, result.error);
    }
    if (result.status !== 0) {
      const reason = result.status === null ? 'terminated by signal' : `exit code ${result.status}`;
      const stderr = result.stderr.trim();
      throw ioFailure(
        subject,
        `${action} via ${command}`,
        new Error(stderr === '' ? reason : `${reason}: ${stderr}`),
      );
    }
  }
}
