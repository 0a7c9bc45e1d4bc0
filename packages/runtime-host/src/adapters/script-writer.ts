/**
 * envshift Runtime Host: Environment Script Writer
 *
 * Writes the rendered profile environment to `<home>/env/active.<ext>` and
 * makes sure the shell startup file sources it. This script is what makes a
 * profile switch outlive the envshift process: new shells pick it up, the
 * invoking shell does not.
 */

import { mkdirSync, readFileSync, writeFileSync, appendFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { EnvironmentScriptWriter, EnvironmentState, ShellKind } from '@envshift/kernel';
import {
  EMPTY_ENVIRONMENT,
  ioFailure,
  renderEnvironment,
  scriptExtension,
  sourceLine,
} from '@envshift/kernel';
import { isNodeError } from '../fs-errors.js';

export const SOURCE_COMMENT = '# envshift environment';

export class FileEnvironmentScriptWriter implements EnvironmentScriptWriter {
  constructor(
    private readonly envshiftHome: string,
    private readonly shellKind: ShellKind,
    private readonly startupFile: string,
  ) {}

  scriptPath(): string {
    return join(this.envshiftHome, 'env', `active.${scriptExtension(this.shellKind)}`);
  }

  /**
   * Render and write the script, then add the source line if missing.
   *
   * An inactive environment contributes nothing but `extraPaths`.
   */
  write(state: EnvironmentState, extraPaths: ReadonlyArray<string>): string {
    const effective: EnvironmentState = state.active
      ? { ...state, paths_prepend: [...extraPaths, ...state.paths_prepend] }
      : { ...EMPTY_ENVIRONMENT, paths_prepend: [...extraPaths] };

    const path = this.scriptPath();
    try {
      mkdirSync(dirname(path), { recursive: true });
      writeFileSync(path, renderEnvironment(effective, this.shellKind), 'utf-8');
    } catch (err: unknown) {
      throw ioFailure(path, 'write environment script', err);
    }

    this.ensureSourced(path);
    return path;
  }

  /** Append the source line to the startup file unless it is already there. */
  ensureSourced(path: string): void {
    const line = sourceLine(this.shellKind, path);
    if (line === null) return;

    let content = '';
    try {
      content = readFileSync(this.startupFile, 'utf-8');
    } catch (err: unknown) {
      if (!isNodeError(err, 'ENOENT')) {
        throw ioFailure(this.startupFile, 'read shell startup file', err);
      }
    }
    if (content.split('\n').includes(line)) return;

    try {
      mkdirSync(dirname(this.startupFile), { recursive: true });
      appendFileSync(this.startupFile, `\n${SOURCE_COMMENT}\n${line}\n`, 'utf-8');
    } catch (err: unknown) {
      throw ioFailure(this.startupFile, 'update shell startup file', err);
    }
  }
}
