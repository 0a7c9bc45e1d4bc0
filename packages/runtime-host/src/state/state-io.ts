/**
 * envshift Runtime Host: StateIO Interface
 *
 * An injectable I/O abstraction for reading and writing JSON state files and
 * appending to JSONL log files under the envshift home directory.
 *
 * Two implementations are provided:
 *   - FileStateIO: durable file I/O under a base directory
 *   - MemoryStateIO: in-memory I/O for tests and embedded, non-persistent use
 *
 * Every store takes a StateIO at construction instead of touching the
 * filesystem directly, so tests run the same code against memory.
 */

import { appendFileSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { isNodeError } from '../fs-errors.js';

// ---------------------------------------------------------------------------
// StateIO Interface
// ---------------------------------------------------------------------------

/**
 * Filenames are relative; the implementation resolves them.
 *
 * Invariants:
 * - readJson, writeJson and deleteJson address the `state/` subdirectory
 * - appendLine and readLogRaw address the `logs/` subdirectory
 * - Files from one StateIO instance cannot be reached from another
 */
export interface StateIO {
  /**
   * Read and parse a JSON state file.
   *
   * Returns undefined when the file does not exist. The parsed value is
   * untrusted; callers narrow it. Invalid JSON throws a SyntaxError and any
   * other I/O error is rethrown.
   */
  readJson(filename: string): unknown;

  /** Serialize `value` as pretty-printed JSON, replacing the file. */
  writeJson(filename: string, value: unknown): void;

  /** Remove a state file. Missing files are ignored. */
  deleteJson(filename: string): void;

  /** Append `line` plus a newline to a log file. */
  appendLine(logfilename: string, line: string): void;

  /** Raw log file content, or '' when the file does not exist. */
  readLogRaw(logfilename: string): string;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

/**
 * Durable StateIO rooted at a base directory (normally the envshift home).
 *
 *   state:  <baseDir>/state/<filename>
 *   logs:   <baseDir>/logs/<logfilename>
 *
 * Directories are created on demand. I/O is synchronous, matching the
 * single-process CLI.
 */
export class FileStateIO implements StateIO {
  constructor(private readonly baseDir: string) {}

  /** Absolute path of a state file. */
  statePath(filename: string): string {
    return join(this.baseDir, 'state', filename);
  }

  /** Absolute path of a log file. */
  logPath(logfilename: string): string {
    return join(this.baseDir, 'logs', logfilename);
  }

  readJson(filename: string): unknown {
    let raw: string;
    try {
      raw = readFileSync(this.statePath(filename), 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return undefined;
      }
      throw err;
    }
    return JSON.parse(raw);
  }

  writeJson(filename: string, value: unknown): void {
    mkdirSync(join(this.baseDir, 'state'), { recursive: true });
    writeFileSync(this.statePath(filename), JSON.stringify(value, null, 2) + '\n', 'utf-8');
  }

  deleteJson(filename: string): void {
    rmSync(this.statePath(filename), { force: true });
  }

  appendLine(logfilename: string, line: string): void {
    mkdirSync(join(this.baseDir, 'logs'), { recursive: true });
    appendFileSync(this.logPath(logfilename), line + '\n', 'utf-8');
  }

  readLogRaw(logfilename: string): string {
    try {
      return readFileSync(this.logPath(logfilename), 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return '';
      }
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// MemoryStateIO
// ---------------------------------------------------------------------------

/**
 * In-memory StateIO. State is held as serialized JSON text so reads go
 * through JSON.parse exactly like FileStateIO (undefined becomes null,
 * Dates become strings).
 */
export class MemoryStateIO implements StateIO {
  private readonly state: Map<string, string> = new Map();
  private readonly logs: Map<string, string[]> = new Map();

  readJson(filename: string): unknown {
    const raw = this.state.get(filename);
    return raw === undefined ? undefined : JSON.parse(raw);
  }

  writeJson(filename: string, value: unknown): void {
    this.state.set(filename, JSON.stringify(value, null, 2));
  }

  deleteJson(filename: string): void {
    this.state.delete(filename);
  }

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  readLogRaw(logfilename: string): string {
    const lines = this.logs.get(logfilename) ?? [];
    if (lines.length === 0) return '';
    return lines.join('\n') + '\n';
  }

  /**
   * Lines appended to a log file. Specific to MemoryStateIO; tests use it
   * to inspect log output without touching the filesystem.
   */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }

  /** Store raw text as a state file, bypassing serialization. Test helper. */
  writeRaw(filename: string, text: string): void {
    this.state.set(filename, text);
  }

  hasState(filename: string): boolean {
    return this.state.has(filename);
  }
}
