/**
 * Shared plumbing for the envshift subcommands: global options, choice
 * parsing and the error boundary every action runs inside.
 */

import type { Command } from 'commander';
import { describeCause, invalidOperation, isEnvshiftError } from '@envshift/kernel';
import { INSTALLER_TYPES } from '@envshift/runtime-host';
import type { InstallerType } from '@envshift/runtime-host';

/** The global --home option, as seen from any subcommand. */
export function homeOption(command: Command): string | undefined {
  const home: unknown = command.optsWithGlobals()['home'];
  return typeof home === 'string' ? home : undefined;
}

export function parseChoice<T extends string>(what: string, value: string, choices: ReadonlyArray<T>): T {
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw invalidOperation(value, `Unknown ${what} "${value}". Expected one of: ${choices.join(', ')}`);
  }
  return match;
}

/** 'none' records the install without running a package manager. */
export function parseInstaller(value: string): InstallerType | null {
  return value === 'none' ? null : parseChoice('installer', value, INSTALLER_TYPES);
}

export function formatCommandError(command: string, err: unknown): string {
  return isEnvshiftError(err)
    ? `[envshift ${command}] ${err.kind}: ${err.message}`
    : `[envshift ${command}] ${describeCause(err)}`;
}

/**
 * Run a command body; any error is printed as `[envshift <command>] ...`
 * on stderr and the process exits 1.
 */
export function withErrors(command: string, body: () => void): void {
  try {
    body();
  } catch (err: unknown) {
    // eslint-disable-next-line no-console
    console.error(formatCommandError(command, err));
    process.exit(1);
  }
}

export function print(text: string): void {
  // eslint-disable-next-line no-console
  console.log(text);
}
