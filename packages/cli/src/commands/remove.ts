/**
 * envshift remove: remove a package under a removal strategy
 *
 * The strategy decides between deactivating the package for the active
 * profile and uninstalling it everywhere. The package manager recorded at
 * install time runs the uninstall unless --installer says otherwise.
 */

import { Command } from 'commander';
import { REMOVAL_STRATEGIES, RemovalStrategy } from '@envshift/kernel';
import { isInstallerType } from '@envshift/runtime-host';
import { buildRuntime } from '../runtime.js';
import { renderRemovalOutcome, renderRemovalPlan } from '../tui/output/packages.js';
import { homeOption, parseChoice, parseInstaller, print, withErrors } from './support.js';

interface RemoveOptions {
  strategy: string;
  installer?: string;
  dryRun?: boolean;
}

export const removeCommand = new Command('remove')
  .description('Remove a package from the active profile or uninstall it')
  .argument('<package>', 'Package name')
  .option('--strategy <strategy>', `Removal strategy (${REMOVAL_STRATEGIES.join('|')})`, RemovalStrategy.SmartRemove)
  .option('--installer <type>', 'Package manager for the uninstall (brew|npm|pnpm|none)')
  .option('--dry-run', 'Show what would happen without changing anything')
  .action((pkg: string, options: RemoveOptions, command: Command) => {
    withErrors('remove', () => {
      const strategy = parseChoice('strategy', options.strategy, REMOVAL_STRATEGIES);
      const home = homeOption(command);
      const current = buildRuntime({ home });

      if (options.dryRun === true) {
        print(renderRemovalPlan(current.manager.planRemoval(pkg, strategy)));
        return;
      }

      const recorded = current.manager.getPackage(pkg).installer_type;
      const installer =
        options.installer !== undefined
          ? parseInstaller(options.installer)
          : isInstallerType(recorded) ? recorded : null;

      const { manager, orchestrator } = buildRuntime({ home, installer });
      print(renderRemovalOutcome(manager.handleRemoval(pkg, strategy)));
      orchestrator.relinkActive();
    });
  });
