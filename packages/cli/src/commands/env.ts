/**
 * envshift env: edit and render a profile's environment
 *
 * Edits change the stored profile only. The generated environment script is
 * rewritten the next time the profile is activated or switched to.
 */

import { Command } from 'commander';
import { SHELL_KINDS, projectOnto, renderEnvironment } from '@envshift/kernel';
import {
  addPath,
  removePath,
  setActive,
  setAlias,
  setVariable,
  toggleAlias,
  unsetAlias,
  unsetVariable,
} from '@envshift/profile-engine';
import type { EnvironmentEdit } from '@envshift/profile-engine';
import { buildRuntime } from '../runtime.js';
import { renderProjection } from '../tui/output/environment.js';
import { done, hint } from '../tui/output/layout.js';
import { homeOption, parseChoice, print, withErrors } from './support.js';

/** Apply one edit to a stored profile and confirm it. */
function applyEdit(command: Command, label: string, profile: string, edit: EnvironmentEdit): void {
  withErrors(`env ${label}`, () => {
    const { manager } = buildRuntime({ home: homeOption(command) });
    manager.updateEnvironment(profile, edit);

    print(done(`${profile}: ${label}`));
    if (manager.activeProfile === profile) {
      print(hint(`run envshift profile activate ${profile} to apply`));
    }
  });
}

const showCommand = new Command('show')
  .description('Render a profile environment as a shell script')
  .argument('<profile>', 'Profile name')
  .option('--shell <kind>', `Shell dialect (${SHELL_KINDS.join('|')}); defaults to the detected shell`)
  .option('--project', 'Print the variables the environment would produce in this process instead')
  .action((profile: string, options: { shell?: string; project?: boolean }, command: Command) => {
    withErrors('env show', () => {
      const { config, manager } = buildRuntime({ home: homeOption(command) });
      const state = manager.getProfile(profile).environment;

      if (options.project === true) {
        print(renderProjection(state, projectOnto(state, process.env, config.pathSeparator)));
        return;
      }

      const kind = options.shell !== undefined ? parseChoice('shell', options.shell, SHELL_KINDS) : config.shellKind;
      print(renderEnvironment(state, kind));
    });
  });

const addPathCommand = new Command('add-path')
  .description('Add a PATH entry (prepended unless --append)')
  .argument('<profile>', 'Profile name')
  .argument('<path>', 'Directory; a leading ~ expands to the home directory')
  .option('--append', 'Place the entry after the existing PATH')
  .action((profile: string, path: string, options: { append?: boolean }, command: Command) => {
    const position = options.append === true ? 'append' : 'prepend';
    applyEdit(command, `add-path ${path}`, profile, addPath(path, position));
  });

const removePathCommand = new Command('remove-path')
  .description('Remove a PATH entry from both lists')
  .argument('<profile>', 'Profile name')
  .argument('<path>', 'Entry as it was added')
  .action((profile: string, path: string, _options: unknown, command: Command) => {
    applyEdit(command, `remove-path ${path}`, profile, removePath(path));
  });

const setVarCommand = new Command('set-var')
  .description('Set an environment variable')
  .argument('<profile>', 'Profile name')
  .argument('<key>', 'Variable name')
  .argument('<value>', 'Value')
  .action((profile: string, key: string, value: string, _options: unknown, command: Command) => {
    applyEdit(command, `set-var ${key}`, profile, setVariable(key, value));
  });

const unsetVarCommand = new Command('unset-var')
  .description('Remove an environment variable')
  .argument('<profile>', 'Profile name')
  .argument('<key>', 'Variable name')
  .action((profile: string, key: string, _options: unknown, command: Command) => {
    applyEdit(command, `unset-var ${key}`, profile, unsetVariable(key));
  });

const setAliasCommand = new Command('set-alias')
  .description('Define a shell alias')
  .argument('<profile>', 'Profile name')
  .argument('<name>', 'Alias name')
  .argument('<command>', 'Command the alias runs')
  .action((profile: string, name: string, target: string, _options: unknown, command: Command) => {
    applyEdit(command, `set-alias ${name}`, profile, setAlias(name, target));
  });

const unsetAliasCommand = new Command('unset-alias')
  .description('Remove a shell alias')
  .argument('<profile>', 'Profile name')
  .argument('<name>', 'Alias name')
  .action((profile: string, name: string, _options: unknown, command: Command) => {
    applyEdit(command, `unset-alias ${name}`, profile, unsetAlias(name));
  });

const toggleAliasCommand = new Command('toggle-alias')
  .description('Disable an alias without removing it, or enable it again')
  .argument('<profile>', 'Profile name')
  .argument('<name>', 'Alias name')
  .action((profile: string, name: string, _options: unknown, command: Command) => {
    applyEdit(command, `toggle-alias ${name}`, profile, toggleAlias(name));
  });

const enableCommand = new Command('enable')
  .description('Turn the environment on')
  .argument('<profile>', 'Profile name')
  .action((profile: string, _options: unknown, command: Command) => {
    applyEdit(command, 'enable', profile, setActive(true));
  });

const disableCommand = new Command('disable')
  .description('Turn the environment off; only the profile bin dir stays on PATH')
  .argument('<profile>', 'Profile name')
  .action((profile: string, _options: unknown, command: Command) => {
    applyEdit(command, 'disable', profile, setActive(false));
  });

export const envCommand = new Command('env')
  .description('Edit and render profile environments')
  .addCommand(showCommand)
  .addCommand(addPathCommand)
  .addCommand(removePathCommand)
  .addCommand(setVarCommand)
  .addCommand(unsetVarCommand)
  .addCommand(setAliasCommand)
  .addCommand(unsetAliasCommand)
  .addCommand(toggleAliasCommand)
  .addCommand(enableCommand)
  .addCommand(disableCommand);
