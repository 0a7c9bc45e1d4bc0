/**
 * envshift Kernel: Shell Script Rendering
 *
 * Pure text generation for the four supported shell families. The rendered
 * script is the only projection that survives the invoking process.
 *
 * Layout, identical across families:
 *   header
 *   PATH prepend line(s), then PATH append line(s), then a blank line
 *     (only when any path line was emitted)
 *   one variable assignment per entry in mapping order, then a blank line
 *     (only when any variable was emitted)
 *   one alias (or function) line per entry
 *
 * posix and fish prepend one entry per line, so those lines run in reverse
 * listed order and the evaluated PATH starts with the first listed entry.
 *
 * cmd cannot express aliases and emits REM comment lines for them instead.
 * Aliases named in `disabled_aliases` are left out of every family.
 */

import type { EnvironmentState } from '../types/profile.js';

export enum ShellKind {
  /** sh, bash, zsh and other POSIX-compatible shells. */
  Posix = 'posix',
  Fish = 'fish',
  PowerShell = 'powershell',
  /** Legacy Windows batch (cmd.exe). */
  Cmd = 'cmd',
}

export const SHELL_KINDS: ReadonlyArray<ShellKind> = [
  ShellKind.Posix,
  ShellKind.Fish,
  ShellKind.PowerShell,
  ShellKind.Cmd,
];

const HEADER = 'envshift profile environment';

/** Render an EnvironmentState as source text for the given shell. */
export function renderEnvironment(state: EnvironmentState, kind: ShellKind): string {
  switch (kind) {
    case ShellKind.Posix:
      return renderPosix(state);
    case ShellKind.Fish:
      return renderFish(state);
    case ShellKind.PowerShell:
      return renderPowerShell(state);
    case ShellKind.Cmd:
      return renderCmd(state);
  }
}

/** File extension of the generated script for a shell. */
export function scriptExtension(kind: ShellKind): string {
  switch (kind) {
    case ShellKind.Posix:
      return 'sh';
    case ShellKind.Fish:
      return 'fish';
    case ShellKind.PowerShell:
      return 'ps1';
    case ShellKind.Cmd:
      return 'bat';
  }
}

/**
 * The line that loads the generated script from a shell startup file.
 * Returns null for cmd, which has no startup file to edit.
 */
export function sourceLine(kind: ShellKind, scriptPath: string): string | null {
  switch (kind) {
    case ShellKind.Posix:
      return `[ -f ${scriptPath} ] && source ${scriptPath}`;
    case ShellKind.Fish:
      return `test -f ${scriptPath}; and source ${scriptPath}`;
    case ShellKind.PowerShell:
      return `. "${scriptPath}"`;
    case ShellKind.Cmd:
      return null;
  }
}

// ---------------------------------------------------------------------------
// Families
// ---------------------------------------------------------------------------

function enabledAliases(state: EnvironmentState): Array<[string, string]> {
  const disabled = state.disabled_aliases ?? [];
  return Object.entries(state.aliases).filter(([name]) => !disabled.includes(name));
}

function hasPaths(state: EnvironmentState): boolean {
  return state.paths_prepend.length > 0 || state.paths_append.length > 0;
}

function renderPosix(state: EnvironmentState): string {
  let script = `# ${HEADER}\n\n`;

  for (const path of [...state.paths_prepend].reverse()) {
    script += `export PATH="${posixPath(path)}:$PATH"\n`;
  }
  for (const path of state.paths_append) {
    script += `export PATH="$PATH:${posixPath(path)}"\n`;
  }
  if (hasPaths(state)) script += '\n';

  const variables = Object.entries(state.variables);
  for (const [key, value] of variables) {
    script += `export ${key}="${escapeDoubleQuoted(value)}"\n`;
  }
  if (variables.length > 0) script += '\n';

  for (const [alias, command] of enabledAliases(state)) {
    script += `alias ${alias}='${command.replaceAll("'", "'\\''")}'\n`;
  }
  return script;
}

function renderFish(state: EnvironmentState): string {
  let script = `# ${HEADER}\n\n`;

  for (const path of [...state.paths_prepend].reverse()) {
    script += `set -gx PATH ${path} $PATH\n`;
  }
  for (const path of state.paths_append) {
    script += `set -gx PATH $PATH ${path}\n`;
  }
  if (hasPaths(state)) script += '\n';

  const variables = Object.entries(state.variables);
  for (const [key, value] of variables) {
    script += `set -gx ${key} "${value.replaceAll('\\', '\\\\').replaceAll('"', '\\"')}"\n`;
  }
  if (variables.length > 0) script += '\n';

  for (const [alias, command] of enabledAliases(state)) {
    script += `alias ${alias} '${command.replaceAll('\\', '\\\\').replaceAll("'", "\\'")}'\n`;
  }
  return script;
}

function renderPowerShell(state: EnvironmentState): string {
  let script = `# ${HEADER}\n\n`;

  if (hasPaths(state)) {
    script += '$env:Path = @(';
    for (const path of state.paths_prepend) {
      script += `\n    "${escapePowerShell(path)}",`;
    }
    script += '\n    $env:Path';
    for (const path of state.paths_append) {
      script += `,\n    "${escapePowerShell(path)}"`;
    }
    script += "\n) -join ';'\n\n";
  }

  const variables = Object.entries(state.variables);
  for (const [key, value] of variables) {
    script += `$env:${key} = "${escapePowerShell(value)}"\n`;
  }
  if (variables.length > 0) script += '\n';

  for (const [alias, command] of enabledAliases(state)) {
    script += `function ${alias} { ${command} }\n`;
  }
  return script;
}

function renderCmd(state: EnvironmentState): string {
  let script = `@echo off\nREM ${HEADER}\n\n`;

  if (hasPaths(state)) {
    script += 'set PATH=';
    for (const path of state.paths_prepend) {
      script += `${path};`;
    }
    script += '%PATH%';
    for (const path of state.paths_append) {
      script += `;${path}`;
    }
    script += '\n\n';
  }

  const variables = Object.entries(state.variables);
  for (const [key, value] of variables) {
    script += `set ${key}=${value}\n`;
  }
  if (variables.length > 0) script += '\n';

  const aliases = enabledAliases(state);
  if (aliases.length > 0) {
    script += 'REM Aliases not supported in CMD batch files\n';
    for (const [alias, command] of aliases) {
      script += `REM ${alias} = ${command}\n`;
    }
  }
  return script;
}

// ---------------------------------------------------------------------------
// Quoting
// ---------------------------------------------------------------------------

/** A leading '~' does not expand inside double quotes; use $HOME instead. */
function posixPath(path: string): string {
  const expanded = path === '~' || path.startsWith('~/') ? '$HOME' + path.slice(1) : path;
  return expanded.replaceAll('"', '\\"');
}

/** Escape for a POSIX double-quoted string. `$` stays unescaped so references expand. */
function escapeDoubleQuoted(value: string): string {
  return value.replaceAll('\\', '\\\\').replaceAll('"', '\\"').replaceAll('`', '\\`');
}

function escapePowerShell(value: string): string {
  return value.replaceAll('`', '``').replaceAll('"', '`"');
}
