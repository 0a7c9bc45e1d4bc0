/**
 * envshift Runtime Host: Binary Linker
 *
 * Implements the BinaryLinker interface from @envshift/kernel with
 * synchronous node:fs calls. Each profile owns `<home>/profiles/<name>/bin`;
 * the orchestrator puts that directory on PATH while the profile is active.
 *
 * Profile names and link names must be single path segments; anything else
 * is an InvalidOperation before the filesystem is touched.
 *
 * Only files and symlinks are ever removed. A directory inside the bin
 * directory is never deleted: it is reported as an IOFailure and the
 * operation stops.
 */

import { existsSync, lstatSync, mkdirSync, readdirSync, symlinkSync, unlinkSync } from 'node:fs';
import { join } from 'node:path';
import type { BinaryLink, BinaryLinker } from '@envshift/kernel';
import { EnvshiftError, invalidOperation, ioFailure, isSafeSegment } from '@envshift/kernel';

export class FsBinaryLinker implements BinaryLinker {
  constructor(private readonly envshiftHome: string) {}

  binDir(profile: string): string {
    if (!isSafeSegment(profile)) {
      throw invalidOperation(profile, `Profile name cannot name a bin directory: ${JSON.stringify(profile)}`);
    }
    return join(this.envshiftHome, 'profiles', profile, 'bin');
  }

  /**
   * Replace the bin directory contents with one symlink per entry.
   *
   * @throws {EnvshiftError} IOFailure when a directory is in the way or a write fails
   */
  link(profile: string, links: ReadonlyArray<BinaryLink>): void {
    const dir = this.binDir(profile);
    const unsafe = links.find((l) => !isSafeSegment(l.name));
    if (unsafe !== undefined) {
      throw invalidOperation(unsafe.name, `Link name is not a single path segment: ${JSON.stringify(unsafe.name)}`);
    }
    try {
      mkdirSync(dir, { recursive: true });
      this.removeEntries(dir);
      for (const { name, target } of links) {
        symlinkSync(target, join(dir, name));
      }
    } catch (err: unknown) {
      throw this.wrap(dir, 'link binaries', err);
    }
  }

  /** Empty the bin directory. A missing directory is left missing. */
  clear(profile: string): void {
    const dir = this.binDir(profile);
    if (!existsSync(dir)) return;
    try {
      this.removeEntries(dir);
    } catch (err: unknown) {
      throw this.wrap(dir, 'clear binaries', err);
    }
  }

  private removeEntries(dir: string): void {
    for (const entry of readdirSync(dir)) {
      const path = join(dir, entry);
      if (lstatSync(path).isDirectory()) {
        throw ioFailure(path, 'remove entry', new Error('a directory is in the way'));
      }
      unlinkSync(path);
    }
  }

  private wrap(dir: string, action: string, err: unknown): EnvshiftError {
    return err instanceof EnvshiftError ? err : ioFailure(dir, action, err);
  }
}
