/**
 * envshift Kernel: Adapter Interfaces
 *
 * Contracts for every side effect the engine triggers. The kernel defines
 * them; @envshift/runtime-host implements them. Tests substitute in-memory
 * fakes.
 *
 * All adapters are synchronous. A failing adapter throws; the orchestrator
 * and state manager propagate the error unchanged.
 */

import type { InstallScope } from '../types/installation.js';
import type { EnvironmentState } from '../types/profile.js';

// ---------------------------------------------------------------------------
// Installer
// ---------------------------------------------------------------------------

/**
 * Installs and removes packages on the host. The engine depends only on
 * success or failure, never on how installation happens.
 */
export interface Installer {
  install(packages: ReadonlyArray<string>, scope: InstallScope): void;
  uninstall(packages: ReadonlyArray<string>): void;
}

// ---------------------------------------------------------------------------
// Binary linking
// ---------------------------------------------------------------------------

/** One symlink in a profile bin directory: `<binDir>/<name>` -> `target`. */
export interface BinaryLink {
  readonly name: string;
  readonly target: string;
}

/**
 * Maintains the per-profile bin directory.
 *
 * link() clears existing file and symlink entries, then creates one symlink
 * per entry. clear() only removes entries. Both throw an IOFailure when the
 * directory cannot be written or a directory occupies a link name.
 */
export interface BinaryLinker {
  binDir(profile: string): string;
  link(profile: string, links: ReadonlyArray<BinaryLink>): void;
  clear(profile: string): void;
}

// ---------------------------------------------------------------------------
// Shell side channel
// ---------------------------------------------------------------------------

/** The single `# ZSHRCMAN_PROFILE: <name>` line in the shell startup file. */
export interface ShellMarker {
  /** Profile named by the current marker line, or null when absent. */
  read(): string | null;
  write(profile: string): void;
  clear(): void;
}

/**
 * Writes the durable environment script and makes sure the shell startup
 * file sources it.
 */
export interface EnvironmentScriptWriter {
  /**
   * Render and write the script for `state`.
   *
   * @param extraPaths - Entries prepended before the state's own paths
   * @returns Absolute path of the written script
   */
  write(state: EnvironmentState, extraPaths: ReadonlyArray<string>): string;
}
