/**
 * envshift Kernel: Install Status
 *
 * The outcome of the last package manager run for a package. Kept apart
 * from the snapshot: a failed install leaves no ledger record, but its
 * status is still worth showing.
 */

export type InstallAttemptAction = 'install' | 'uninstall';

export interface InstallStatus {
  readonly package: string;
  readonly action: InstallAttemptAction;
  readonly success: boolean;
  /** ISO 8601. */
  readonly timestamp: string;
  /** Failure message; null on success. */
  readonly error: string | null;
}
