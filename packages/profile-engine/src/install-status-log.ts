/**
 * envshift Profile Engine: Install Status Log
 *
 * Keeps the last package manager outcome per package in
 * `state/install-status.json`, keyed by package name. Entries outlive the
 * ledger record: an uninstalled or never-installed package keeps its last
 * status.
 */

import type { StateIO } from '@envshift/runtime-host';
import type { InstallAttemptAction, InstallStatus } from '@envshift/kernel';
import { EnvshiftError, ErrorKind, persistenceFailure } from '@envshift/kernel';

export const INSTALL_STATUS_FILE = 'install-status.json';

const ACTIONS: ReadonlyArray<InstallAttemptAction> = ['install', 'uninstall'];

export class InstallStatusLog {
  constructor(private readonly stateIO: StateIO) {}

  /** Every recorded status, sorted by package name. */
  list(): InstallStatus[] {
    return Object.values(this.readAll()).sort((a, b) => (a.package < b.package ? -1 : 1));
  }

  get(pkg: string): InstallStatus | null {
    const all = this.readAll();
    return Object.hasOwn(all, pkg) ? all[pkg] ?? null : null;
  }

  /** Replace the status of `status.package`. */
  record(status: InstallStatus): void {
    const next = { ...this.readAll(), [status.package]: status };
    try {
      this.stateIO.writeJson(INSTALL_STATUS_FILE, next);
    } catch (err: unknown) {
      throw persistenceFailure(INSTALL_STATUS_FILE, 'save', err);
    }
  }

  private readAll(): Record<string, InstallStatus> {
    let raw: unknown;
    try {
      raw = this.stateIO.readJson(INSTALL_STATUS_FILE);
    } catch (err: unknown) {
      throw persistenceFailure(INSTALL_STATUS_FILE, 'load', err);
    }
    if (raw === undefined) return {};
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      throw malformed('expected object');
    }
    return Object.fromEntries(Object.entries(raw).map(([key, value]) => [key, decodeStatus(value, key)]));
  }
}

function malformed(detail: string): EnvshiftError {
  return new EnvshiftError(ErrorKind.PersistenceFailure, INSTALL_STATUS_FILE, `Malformed install status: ${detail}`);
}

function nullableString(value: unknown, field: string): string | null {
  if (value === null || typeof value === 'string') return value;
  throw malformed(`${field}: expected string or null`);
}

function string(value: unknown, field: string): string {
  if (typeof value === 'string') return value;
  throw malformed(`${field}: expected string`);
}

function boolean(value: unknown, field: string): boolean {
  if (typeof value === 'boolean') return value;
  throw malformed(`${field}: expected boolean`);
}

export function decodeStatus(raw: unknown, key: string): InstallStatus {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw malformed(`${key}: expected object`);
  }
  const obj: Record<string, unknown> = Object.fromEntries(Object.entries(raw));
  if (obj['package'] !== key) {
    throw malformed(`${key}.package: expected '${key}'`);
  }
  const action = ACTIONS.find((candidate) => candidate === obj['action']);
  if (action === undefined) {
    throw malformed(`${key}.action: unexpected value ${JSON.stringify(obj['action'])}`);
  }
  return {
    package: key,
    action,
    success: boolean(obj['success'], `${key}.success`),
    timestamp: string(obj['timestamp'], `${key}.timestamp`),
    error: nullableString(obj['error'], `${key}.error`),
  };
}
