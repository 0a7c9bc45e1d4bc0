/**
 * envshift Runtime Host: Shell Config Marker
 *
 * Keeps exactly one `# ZSHRCMAN_PROFILE: <name>` line in the user's shell
 * startup file so interactive shells and prompt themes can tell which
 * profile is active. The prefix is kept as-is for compatibility with
 * existing startup files.
 *
 * Rewriting removes the first line that starts with the prefix (through its
 * newline, or through end of file) and appends the new line at the end.
 * Every other byte of the file is preserved.
 */

import { readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { ShellMarker } from '@envshift/kernel';
import { invalidOperation, ioFailure, isSafeSegment } from '@envshift/kernel';
import { isNodeError } from '../fs-errors.js';

export const MARKER_PREFIX = '# ZSHRCMAN_PROFILE: ';

/** Remove the first marker line from `content`. */
export function stripMarker(content: string): string {
  const start = findMarker(content);
  if (start === -1) return content;
  const newline = content.indexOf('\n', start);
  const end = newline === -1 ? content.length : newline + 1;
  return content.slice(0, start) + content.slice(end);
}

/** Name carried by the first marker line, or null. */
export function parseMarker(content: string): string | null {
  const start = findMarker(content);
  if (start === -1) return null;
  const newline = content.indexOf('\n', start);
  const line = content.slice(start + MARKER_PREFIX.length, newline === -1 ? undefined : newline);
  const name = line.trim();
  return name === '' ? null : name;
}

function findMarker(content: string): number {
  if (content.startsWith(MARKER_PREFIX)) return 0;
  const idx = content.indexOf('\n' + MARKER_PREFIX);
  return idx === -1 ? -1 : idx + 1;
}

export class FileShellMarker implements ShellMarker {
  constructor(private readonly startupFile: string) {}

  read(): string | null {
    return parseMarker(this.readContent());
  }

  /** @throws {EnvshiftError} InvalidOperation for a name that would not stay on one line */
  write(profile: string): void {
    if (!isSafeSegment(profile)) {
      throw invalidOperation(profile, `Profile name cannot be written to the shell marker: ${JSON.stringify(profile)}`);
    }
    const base = stripMarker(this.readContent());
    const separator = base === '' || base.endsWith('\n') ? '' : '\n';
    this.writeContent(`${base}${separator}${MARKER_PREFIX}${profile}\n`, 'write profile marker');
  }

  clear(): void {
    const content = this.readContent();
    const stripped = stripMarker(content);
    if (stripped !== content) {
      this.writeContent(stripped, 'clear profile marker');
    }
  }

  private readContent(): string {
    try {
      return readFileSync(this.startupFile, 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) return '';
      throw ioFailure(this.startupFile, 'read shell startup file', err);
    }
  }

  private writeContent(content: string, action: string): void {
    try {
      mkdirSync(dirname(this.startupFile), { recursive: true });
      writeFileSync(this.startupFile, content, 'utf-8');
    } catch (err: unknown) {
      throw ioFailure(this.startupFile, action, err);
    }
  }
}
