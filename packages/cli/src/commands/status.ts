/**
 * envshift status: active profile and state health
 *
 * Shows the active profile, where state and the shell startup file live,
 * ledger and registry sizes, any unfinished transition from the journal,
 * and symmetry violations between the ledger and the profiles.
 */

import { Command } from 'commander';
import { buildRuntime } from '../runtime.js';
import { renderStatus } from '../tui/output/status.js';
import type { StatusView } from '../tui/output/status.js';
import { homeOption, print, withErrors } from './support.js';

export const statusCommand = new Command('status')
  .description('Show the active profile and state health')
  .option('--json', 'Output as JSON')
  .action((options: { json?: boolean }, command: Command) => {
    withErrors('status', () => {
      const { config, manager, orchestrator } = buildRuntime({ home: homeOption(command) });

      const view: StatusView = {
        home: config.envshiftHome,
        shellKind: config.shellKind,
        shellConfigPath: config.shellConfigPath,
        activeProfile: manager.activeProfile,
        profileCount: manager.listProfiles().length,
        packageCount: manager.listPackages().length,
        pending: orchestrator.pending(),
        violations: manager.verifyInvariants(),
      };

      print(options.json === true ? JSON.stringify(view, null, 2) : renderStatus(view));
    });
  });
