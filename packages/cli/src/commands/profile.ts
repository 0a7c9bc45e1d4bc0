/**
 * envshift profile: manage profiles and move between them
 *
 * switch, activate and deactivate run as journaled transitions: a step that
 * fails leaves the journal behind, and `resume` or `rollback` finishes or
 * undoes it.
 */

import { Command } from 'commander';
import { buildRuntime } from '../runtime.js';
import {
  renderProfileDetail,
  renderProfileList,
  renderRollback,
  renderTransition,
} from '../tui/output/profiles.js';
import { done } from '../tui/output/layout.js';
import { t } from '../tui/theme.js';
import { homeOption, print, withErrors } from './support.js';

const listCommand = new Command('list')
  .description('List profiles; ◈ marks the active one')
  .option('--json', 'Output as JSON')
  .action((options: { json?: boolean }, command: Command) => {
    withErrors('profile list', () => {
      const { manager } = buildRuntime({ home: homeOption(command) });
      const profiles = manager.listProfiles();
      print(options.json === true
        ? JSON.stringify(profiles, null, 2)
        : renderProfileList(profiles, manager.activeProfile));
    });
  });

const currentCommand = new Command('current')
  .description('Print the active profile name')
  .action((_options: unknown, command: Command) => {
    withErrors('profile current', () => {
      const active = buildRuntime({ home: homeOption(command) }).manager.activeProfile;
      print(active ?? t.dim('none'));
    });
  });

const showCommand = new Command('show')
  .description('Show a profile: packages, binaries and environment')
  .argument('<name>', 'Profile name')
  .option('--json', 'Output as JSON')
  .action((name: string, options: { json?: boolean }, command: Command) => {
    withErrors('profile show', () => {
      const { manager } = buildRuntime({ home: homeOption(command) });
      const profile = manager.getProfile(name);
      print(options.json === true
        ? JSON.stringify(profile, null, 2)
        : renderProfileDetail(profile, manager.activeProfile === name, manager.current.binaryLinksFor(name)));
    });
  });

const createCommand = new Command('create')
  .description('Create an empty profile')
  .argument('<name>', 'Profile name')
  .option('--parent <name>', 'Record a parent profile (reference only; nothing is inherited)')
  .action((name: string, options: { parent?: string }, command: Command) => {
    withErrors('profile create', () => {
      buildRuntime({ home: homeOption(command) }).manager.createProfile(name, options.parent ?? null);
      print(done(`created ${name}`));
    });
  });

const deleteCommand = new Command('delete')
  .description('Delete an inactive profile')
  .argument('<name>', 'Profile name')
  .action((name: string, _options: unknown, command: Command) => {
    withErrors('profile delete', () => {
      buildRuntime({ home: homeOption(command) }).manager.deleteProfile(name);
      print(done(`deleted ${name}`));
    });
  });

const switchCommand = new Command('switch')
  .description('Deactivate the current profile and activate another')
  .argument('<name>', 'Profile name')
  .option('--force', 'Discard an unfinished transition first')
  .action((name: string, options: { force?: boolean }, command: Command) => {
    withErrors('profile switch', () => {
      const { orchestrator } = buildRuntime({ home: homeOption(command) });
      print(renderTransition(orchestrator.switchProfile(name, { force: options.force === true })));
    });
  });

const activateCommand = new Command('activate')
  .description('Apply a profile without tearing down the current one')
  .argument('<name>', 'Profile name')
  .option('--force', 'Discard an unfinished transition first')
  .action((name: string, options: { force?: boolean }, command: Command) => {
    withErrors('profile activate', () => {
      const { orchestrator } = buildRuntime({ home: homeOption(command) });
      print(renderTransition(orchestrator.activateProfile(name, { force: options.force === true })));
    });
  });

const deactivateCommand = new Command('deactivate')
  .description('Tear down the active profile and leave none active')
  .option('--clear-marker', 'Also remove the profile marker from the shell startup file')
  .option('--force', 'Discard an unfinished transition first')
  .action((options: { clearMarker?: boolean; force?: boolean }, command: Command) => {
    withErrors('profile deactivate', () => {
      const { orchestrator } = buildRuntime({ home: homeOption(command) });
      print(renderTransition(orchestrator.deactivateCurrent({
        clearMarker: options.clearMarker === true,
        force: options.force === true,
      })));
    });
  });

const resumeCommand = new Command('resume')
  .description('Finish an interrupted transition from its last completed step')
  .action((_options: unknown, command: Command) => {
    withErrors('profile resume', () => {
      print(renderTransition(buildRuntime({ home: homeOption(command) }).orchestrator.resume()));
    });
  });

const rollbackCommand = new Command('rollback')
  .description('Undo the completed steps of an interrupted transition')
  .action((_options: unknown, command: Command) => {
    withErrors('profile rollback', () => {
      print(renderRollback(buildRuntime({ home: homeOption(command) }).orchestrator.rollback()));
    });
  });

export const profileCommand = new Command('profile')
  .description('Create, inspect and switch profiles')
  .addCommand(listCommand)
  .addCommand(currentCommand)
  .addCommand(showCommand)
  .addCommand(createCommand)
  .addCommand(deleteCommand)
  .addCommand(switchCommand)
  .addCommand(activateCommand)
  .addCommand(deactivateCommand)
  .addCommand(resumeCommand)
  .addCommand(rollbackCommand);
