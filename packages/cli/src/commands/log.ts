/**
 * envshift log: read the event log
 *
 * Reads `<home>/logs/events.jsonl`, skipping damaged lines, and prints the
 * most recent events in timestamp order.
 */

import { Command } from 'commander';
import { invalidOperation } from '@envshift/kernel';
import { EVENT_LOG_FILE, readEventLog } from '@envshift/runtime-host';
import { buildRuntime } from '../runtime.js';
import { renderEventLog } from '../tui/output/events.js';
import { homeOption, print, withErrors } from './support.js';

export const logCommand = new Command('log')
  .description('Show recent events from the event log')
  .option('--limit <n>', 'Maximum number of events to show', '50')
  .option('--json', 'Output as JSON')
  .action((options: { limit: string; json?: boolean }, command: Command) => {
    withErrors('log', () => {
      const limit = Number.parseInt(options.limit, 10);
      if (!Number.isInteger(limit) || limit < 1) {
        throw invalidOperation(options.limit, `--limit must be a positive integer, got "${options.limit}"`);
      }

      const { stateIO } = buildRuntime({ home: homeOption(command) });
      const { events, stats } = readEventLog(stateIO.readLogRaw(EVENT_LOG_FILE));
      const recent = events.slice(-limit);

      print(options.json === true ? JSON.stringify(recent, null, 2) : renderEventLog(recent, stats));
    });
  });
