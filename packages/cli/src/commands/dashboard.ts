/**
 * envshift dashboard: interactive view of profiles, packages and events
 *
 * Also what `envshift` runs with no arguments in an interactive terminal.
 */

import { Command } from 'commander';
import { formatCommandError, homeOption } from './support.js';

export const dashboardCommand = new Command('dashboard')
  .description('Open the interactive dashboard')
  .action(async (_options: unknown, command: Command) => {
    const { launchDashboard } = await import('../tui/launch.js');
    try {
      await launchDashboard(homeOption(command));
    } catch (err: unknown) {
      // eslint-disable-next-line no-console
      console.error(formatCommandError('dashboard', err));
      process.exit(1);
    }
  });
