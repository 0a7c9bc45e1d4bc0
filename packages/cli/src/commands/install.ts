/**
 * envshift install: smart install into the active profile
 *
 * A package already in the ledger is only activated for the current
 * profile; the package manager runs for new packages alone, but a given
 * --location, --pkg-version or --installer is still recorded. With no active
 * profile, installs are attributed to the default identity.
 */

import { Command } from 'commander';
import { INSTALL_SCOPES, InstallScope, invalidOperation } from '@envshift/kernel';
import { buildRuntime } from '../runtime.js';
import { renderInstallResult } from '../tui/output/packages.js';
import { homeOption, parseChoice, parseInstaller, print, withErrors } from './support.js';

interface InstallOptions {
  scope: string;
  installer: string;
  location?: string;
  pkgVersion?: string;
}

export const installCommand = new Command('install')
  .description('Install packages for the active profile, or activate them if already installed')
  .argument('<packages...>', 'Package names')
  .option('--scope <scope>', `Install scope (${INSTALL_SCOPES.join('|')})`, InstallScope.Global)
  .option('--installer <type>', 'Package manager to run (brew|npm|pnpm|none)', 'none')
  .option('--location <path>', 'Path of the installed binary, linked into the profile bin dir')
  .option('--pkg-version <version>', 'Installed version to record')
  .action((packages: string[], options: InstallOptions, command: Command) => {
    withErrors('install', () => {
      const scope = parseChoice('scope', options.scope, INSTALL_SCOPES);
      const installer = parseInstaller(options.installer);
      if (options.location !== undefined && packages.length > 1) {
        throw invalidOperation(
          options.location,
          `--location applies to a single package, got ${packages.length}`,
        );
      }
      const { manager, orchestrator } = buildRuntime({ home: homeOption(command), installer });

      for (const pkg of packages) {
        const result = manager.smartInstall(pkg, {
          scope,
          installerType: installer ?? (manager.isInstalled(pkg) ? undefined : 'manual'),
          version: options.pkgVersion ?? null,
          location: options.location ?? null,
        });
        orchestrator.relinkActive();
        print(renderInstallResult(result));
      }
    });
  });
