/**
 * envshift Kernel: Name Rules
 *
 * Profile names become a directory under `<home>/profiles` and the text of
 * the one-line shell marker. Package names become symlink names in a bin
 * directory. Both are checked before they enter the registry or ledger.
 *
 * A profile name is one path segment. A package name may carry a scope or
 * tap prefix (`@scope/tool`, `user/tap/tool`); its link name is the last
 * segment.
 */

import { invalidOperation } from '../errors/envshift-error.js';

// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;

/** Why `segment` cannot be a path segment, or null when it can. */
function segmentProblem(segment: string): string | null {
  if (segment.trim() === '') return 'must not be empty';
  if (segment === '.' || segment === '..') return `must not be '${segment}'`;
  if (segment.includes('/') || segment.includes('\\')) return 'must not contain a path separator';
  return null;
}

function reject(what: 'profile' | 'package', name: string, problem: string): never {
  throw invalidOperation(name, `Invalid ${what} name ${JSON.stringify(name)}: ${problem}`);
}

/**
 * @throws {EnvshiftError} InvalidOperation for a name that cannot be a single
 *   path segment or contains control characters
 */
export function requireProfileName(name: string): void {
  if (CONTROL_CHARS.test(name)) reject('profile', name, 'must not contain control characters');
  const problem = segmentProblem(name);
  if (problem !== null) reject('profile', name, problem);
}

/**
 * @throws {EnvshiftError} InvalidOperation when a '/'-separated segment is
 *   empty, '.', '..' or holds a backslash, or the name starts with '-' or
 *   has control characters
 */
export function requirePackageName(name: string): void {
  if (CONTROL_CHARS.test(name)) reject('package', name, 'must not contain control characters');
  if (name.startsWith('-')) reject('package', name, "must not start with '-'");
  for (const segment of name.split('/')) {
    const problem = segmentProblem(segment);
    if (problem !== null) reject('package', name, problem);
  }
}

/** Symlink name for a package: `@scope/tool` links as `tool`. */
export function linkNameOf(pkg: string): string {
  const slash = pkg.lastIndexOf('/');
  return slash === -1 ? pkg : pkg.slice(slash + 1);
}

/** True when `name` is usable as a single path segment. */
export function isSafeSegment(name: string): boolean {
  return !CONTROL_CHARS.test(name) && segmentProblem(name) === null;
}
