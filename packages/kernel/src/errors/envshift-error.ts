/**
 * envshift Kernel: Error Model
 *
 * One error class for every failure the engine reports. The `kind` tells the
 * caller which class of failure occurred; `subject` names the package,
 * profile or path involved; `cause` carries the underlying error when there
 * is one.
 *
 * Errors from any step of a multi-step operation propagate unchanged. Nothing
 * is retried.
 */

export enum ErrorKind {
  /** A referenced profile or package does not exist. */
  NotFound = 'NotFound',
  /** The request conflicts with current state, e.g. deleting the active profile. */
  InvalidOperation = 'InvalidOperation',
  /** Filesystem, symlink or subprocess failure. */
  IOFailure = 'IOFailure',
  /** Snapshot load or save failure. */
  PersistenceFailure = 'PersistenceFailure',
}

export class EnvshiftError extends Error {
  override readonly name = 'EnvshiftError';

  constructor(
    readonly kind: ErrorKind,
    readonly subject: string,
    message: string,
    options?: { readonly cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Type guard for EnvshiftError, optionally of a specific kind. */
export function isEnvshiftError(err: unknown, kind?: ErrorKind): err is EnvshiftError {
  return err instanceof EnvshiftError && (kind === undefined || err.kind === kind);
}

/** Render an unknown thrown value as a one-line message. */
export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export function notFound(what: 'profile' | 'package', subject: string): EnvshiftError {
  return new EnvshiftError(ErrorKind.NotFound, subject, `Unknown ${what}: ${subject}`);
}

export function invalidOperation(subject: string, message: string): EnvshiftError {
  return new EnvshiftError(ErrorKind.InvalidOperation, subject, message);
}

export function ioFailure(subject: string, action: string, cause: unknown): EnvshiftError {
  return new EnvshiftError(
    ErrorKind.IOFailure,
    subject,
    `Failed to ${action} for ${subject}: ${describeCause(cause)}`,
    { cause },
  );
}

export function persistenceFailure(subject: string, action: string, cause: unknown): EnvshiftError {
  return new EnvshiftError(
    ErrorKind.PersistenceFailure,
    subject,
    `Failed to ${action} ${subject}: ${describeCause(cause)}`,
    { cause },
  );
}
