/**
 * envshift Profile Engine: Environment Edits
 *
 * Pure edits on a profile's EnvironmentState, applied through
 * StateManager.updateEnvironment(). Every edit is idempotent: adding what is
 * already there or removing what is absent returns an equal state.
 * toggleAlias is the exception: it flips on every call.
 */

import type { EnvironmentState } from '@envshift/kernel';
import { invalidOperation } from '@envshift/kernel';

export type EnvironmentEdit = (env: EnvironmentState) => EnvironmentState;

export type PathPosition = 'prepend' | 'append';

export function addPath(path: string, position: PathPosition = 'prepend'): EnvironmentEdit {
  return (env) => {
    if (env.paths_prepend.includes(path) || env.paths_append.includes(path)) return env;
    return position === 'prepend'
      ? { ...env, paths_prepend: [...env.paths_prepend, path] }
      : { ...env, paths_append: [...env.paths_append, path] };
  };
}

/** Remove a path from both lists. */
export function removePath(path: string): EnvironmentEdit {
  return (env) => ({
    ...env,
    paths_prepend: env.paths_prepend.filter((p) => p !== path),
    paths_append: env.paths_append.filter((p) => p !== path),
  });
}

export function setVariable(key: string, value: string): EnvironmentEdit {
  return (env) => ({ ...env, variables: { ...env.variables, [key]: value } });
}

export function unsetVariable(key: string): EnvironmentEdit {
  return (env) => ({ ...env, variables: omit(env.variables, key) });
}

export function setAlias(name: string, command: string): EnvironmentEdit {
  return (env) => ({ ...env, aliases: { ...env.aliases, [name]: command } });
}

export function unsetAlias(name: string): EnvironmentEdit {
  return (env) => withDisabled({ ...env, aliases: omit(env.aliases, name) }, without(env, name));
}

/**
 * Enable a disabled alias, or disable an enabled one. A disabled alias keeps
 * its command but is not rendered.
 *
 * @throws {EnvshiftError} InvalidOperation when the alias is not defined
 */
export function toggleAlias(name: string): EnvironmentEdit {
  return (env) => {
    if (!Object.hasOwn(env.aliases, name)) {
      throw invalidOperation(name, `Alias '${name}' is not defined`);
    }
    const disabled = env.disabled_aliases ?? [];
    return disabled.includes(name)
      ? withDisabled(env, without(env, name))
      : withDisabled(env, [...disabled, name].sort());
  };
}

function without(env: EnvironmentState, name: string): string[] {
  return (env.disabled_aliases ?? []).filter((n) => n !== name);
}

/** An empty list drops the field so untouched profiles serialize as before. */
function withDisabled(env: EnvironmentState, disabled: ReadonlyArray<string>): EnvironmentState {
  const { disabled_aliases: _dropped, ...rest } = env;
  return disabled.length > 0 ? { ...rest, disabled_aliases: disabled } : rest;
}

export function setActive(active: boolean): EnvironmentEdit {
  return (env) => ({ ...env, active });
}

function omit(record: Readonly<Record<string, string>>, key: string): Record<string, string> {
  return Object.fromEntries(Object.entries(record).filter(([k]) => k !== key));
}
