/**
 * envshift Runtime Host: Runtime Configuration
 *
 * Everything the engine needs to know about the host that is not stored in
 * the snapshot: where the envshift home is, whose home directory the shell
 * startup file lives in, which shell dialect to render, and the PATH
 * separator. Resolved once per CLI invocation.
 *
 * Shell detection:
 *   1. ENVSHIFT_SHELL (posix | fish | powershell | cmd), when set
 *   2. Windows: PSModulePath present → powershell, otherwise cmd
 *   3. Elsewhere: SHELL containing "fish" → fish, anything else → posix
 */

import { join } from 'node:path';
import { homedir, platform } from 'node:os';
import { SHELL_KINDS, ShellKind, invalidOperation } from '@envshift/kernel';
import { resolveEnvshiftHome } from './home.js';

export const SHELL_ENV_VAR = 'ENVSHIFT_SHELL';

type Env = Readonly<Record<string, string | undefined>>;

export interface RuntimeConfig {
  /** Resolved envshift home directory. */
  readonly envshiftHome: string;
  /** The user's home directory (HOME / USERPROFILE). */
  readonly userHome: string;
  readonly shellKind: ShellKind;
  /** Shell startup file holding the marker and the source line. */
  readonly shellConfigPath: string;
  readonly pathSeparator: string;
}

export interface ResolveRuntimeConfigOptions {
  readonly home?: string | undefined;
  readonly persist?: boolean | undefined;
  readonly env?: Env | undefined;
  /** Overrides node:os platform(); tests pin it. */
  readonly platform?: NodeJS.Platform | undefined;
  readonly configPath?: string | undefined;
}

function isShellKind(value: string): value is ShellKind {
  return SHELL_KINDS.some((kind) => kind === value);
}

/**
 * Detect the shell dialect of the invoking environment.
 *
 * @throws {EnvshiftError} InvalidOperation when ENVSHIFT_SHELL names an unknown shell
 */
export function detectShell(env: Env, os: NodeJS.Platform): ShellKind {
  const override = env[SHELL_ENV_VAR];
  if (override !== undefined && override !== '') {
    if (!isShellKind(override)) {
      throw invalidOperation(
        SHELL_ENV_VAR,
        `Unknown shell "${override}". Expected one of: ${SHELL_KINDS.join(', ')}`,
      );
    }
    return override;
  }

  if (os === 'win32') {
    return env['PSModulePath'] !== undefined ? ShellKind.PowerShell : ShellKind.Cmd;
  }

  const shell = env['SHELL'] ?? '';
  return shell.includes('fish') ? ShellKind.Fish : ShellKind.Posix;
}

/**
 * Startup file for the detected shell, relative to the user's home.
 *
 * The posix dialect covers several shells, so SHELL decides between
 * `.zshrc`, `.bashrc` and the generic `.profile`.
 */
export function shellConfigPath(kind: ShellKind, userHome: string, env: Env): string {
  switch (kind) {
    case ShellKind.Fish:
      return join(userHome, '.config', 'fish', 'config.fish');
    case ShellKind.PowerShell:
      return join(userHome, 'Documents', 'PowerShell', 'Microsoft.PowerShell_profile.ps1');
    case ShellKind.Cmd:
      return join(userHome, '.profile');
    case ShellKind.Posix: {
      const shell = env['SHELL'] ?? '';
      if (shell.includes('zsh')) return join(userHome, '.zshrc');
      if (shell.includes('bash')) return join(userHome, '.bashrc');
      return join(userHome, '.profile');
    }
  }
}

export function resolveUserHome(env: Env): string {
  const fromEnv = env['HOME'] ?? env['USERPROFILE'];
  return fromEnv !== undefined && fromEnv !== '' ? fromEnv : homedir();
}

export function resolveRuntimeConfig(opts: ResolveRuntimeConfigOptions = {}): RuntimeConfig {
  const env = opts.env ?? process.env;
  const os = opts.platform ?? platform();
  const userHome = resolveUserHome(env);
  const shellKind = detectShell(env, os);

  return {
    envshiftHome: resolveEnvshiftHome({
      home: opts.home,
      persist: opts.persist,
      env,
      configPath: opts.configPath,
    }),
    userHome,
    shellKind,
    shellConfigPath: shellConfigPath(shellKind, userHome, env),
    pathSeparator: os === 'win32' ? ';' : ':',
  };
}
