/**
 * envshift Runtime Host: Home Directory Resolution
 *
 * Resolves the envshift home directory with the following precedence:
 *
 *   1. Explicit `home` option (the CLI --home flag)
 *   2. ENVSHIFT_HOME environment variable
 *   3. OS application config file (remembers a prior --home --persist)
 *   4. Default: ~/.local/share/envshift
 *
 * Layout under the resolved home:
 *
 *   <home>/
 *     state/snapshot.json       ledger, profiles, active pointer
 *     state/transition.json     journal of the last profile transition
 *     logs/events.jsonl         append-only event log
 *     profiles/<name>/bin/      per-profile binary symlinks
 *     env/active.<ext>          generated environment script
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { homedir, platform } from 'node:os';
import { isNodeError } from './fs-errors.js';

export const HOME_ENV_VAR = 'ENVSHIFT_HOME';

// ---------------------------------------------------------------------------
// OS Config File Location
// ---------------------------------------------------------------------------

/**
 * Platform-specific path of the envshift application config file.
 *
 *   macOS:   ~/Library/Preferences/envshift/config.json
 *   Windows: %APPDATA%\envshift\config.json
 *   Linux:   ~/.config/envshift/config.json
 */
export function getOsConfigPath(): string {
  const home = homedir();
  switch (platform()) {
    case 'darwin':
      return join(home, 'Library', 'Preferences', 'envshift', 'config.json');
    case 'win32': {
      const appData = process.env['APPDATA'] ?? join(home, 'AppData', 'Roaming');
      return join(appData, 'envshift', 'config.json');
    }
    default:
      return join(home, '.config', 'envshift', 'config.json');
  }
}

// ---------------------------------------------------------------------------
// OS Config Read / Write
// ---------------------------------------------------------------------------

/**
 * Read the persisted home path from the OS config file.
 *
 * Returns null when the file is absent or has no usable `home` entry.
 * A config file that exists but is not valid JSON is an error.
 */
export function readHomeFromConfig(configPath: string = getOsConfigPath()): string | null {
  let raw: string;
  try {
    raw = readFileSync(configPath, 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) return null;
    throw err;
  }
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null || !('home' in parsed)) {
    return null;
  }
  return typeof parsed.home === 'string' && parsed.home !== '' ? parsed.home : null;
}

/** Persist a home path to the OS config file, creating its directory. */
export function writeHomeToConfig(home: string, configPath: string = getOsConfigPath()): void {
  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, JSON.stringify({ home }, null, 2), 'utf-8');
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

export interface ResolveHomeOptions {
  /** Explicit override, highest precedence. */
  readonly home?: string | undefined;
  /** Remember an explicit `home` in the OS config file. Default false. */
  readonly persist?: boolean | undefined;
  /** Environment to read ENVSHIFT_HOME from. Defaults to process.env. */
  readonly env?: Readonly<Record<string, string | undefined>> | undefined;
  /** Config file location. Defaults to getOsConfigPath(). */
  readonly configPath?: string | undefined;
}

/**
 * Resolve the envshift home directory and create it if missing.
 *
 * @returns Absolute path of the resolved home directory
 */
export function resolveEnvshiftHome(opts: ResolveHomeOptions = {}): string {
  const env = opts.env ?? process.env;
  const configPath = opts.configPath ?? getOsConfigPath();
  const fromEnv = env[HOME_ENV_VAR];

  let home: string;
  if (opts.home !== undefined && opts.home !== '') {
    home = opts.home;
  } else if (fromEnv !== undefined && fromEnv !== '') {
    home = fromEnv;
  } else {
    home = readHomeFromConfig(configPath) ?? join(homedir(), '.local', 'share', 'envshift');
  }

  if (!existsSync(home)) {
    mkdirSync(home, { recursive: true });
  }

  if (opts.persist === true && opts.home !== undefined && opts.home !== '') {
    writeHomeToConfig(home, configPath);
  }

  return home;
}
