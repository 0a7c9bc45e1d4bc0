/**
 * envshift override: per-OS package lists on a profile
 *
 * Overrides are stored with the profile and shown by `profile show`.
 * No operation applies them.
 */

import { Command } from 'commander';
import { OS_TYPES } from '@envshift/kernel';
import { buildRuntime } from '../runtime.js';
import { done } from '../tui/output/layout.js';
import { homeOption, parseChoice, print, withErrors } from './support.js';

const setCommand = new Command('set')
  .description('Store an OS override for a profile')
  .argument('<profile>', 'Profile name')
  .argument('<os>', `Operating system (${OS_TYPES.join('|')})`)
  .option('--package <names...>', 'Packages for this OS')
  .action((profile: string, os: string, options: { package?: string[] }, command: Command) => {
    withErrors('override set', () => {
      const osType = parseChoice('os', os, OS_TYPES);
      const packages = options.package ?? [];
      buildRuntime({ home: homeOption(command) }).manager.setOsOverride(profile, osType, {
        packages,
        environment: null,
      });
      print(done(`${profile}: ${osType} override with ${packages.length} ${packages.length === 1 ? 'package' : 'packages'}`));
    });
  });

const removeCommand = new Command('remove')
  .description('Drop the OS override of a profile')
  .argument('<profile>', 'Profile name')
  .argument('<os>', `Operating system (${OS_TYPES.join('|')})`)
  .action((profile: string, os: string, _options: unknown, command: Command) => {
    withErrors('override remove', () => {
      const osType = parseChoice('os', os, OS_TYPES);
      buildRuntime({ home: homeOption(command) }).manager.setOsOverride(profile, osType, null);
      print(done(`${profile}: ${osType} override removed`));
    });
  });

export const overrideCommand = new Command('override')
  .description('Store per-OS package lists on a profile')
  .addCommand(setCommand)
  .addCommand(removeCommand);
