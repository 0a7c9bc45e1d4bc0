/**
 * envshift package: inspect and annotate ledger entries
 *
 * Subcommands:
 *   envshift package list [--json]
 *   envshift package info <name>
 *   envshift package status [--json]         last installer outcome per package
 *   envshift package locate <name> <path>    record where the binary lives
 *   envshift package version <name> <ver>    record the installed version
 */

import { Command } from 'commander';
import { buildRuntime } from '../runtime.js';
import { renderInstallStatuses, renderPackageInfo, renderPackageList } from '../tui/output/packages.js';
import { done } from '../tui/output/layout.js';
import { homeOption, print, withErrors } from './support.js';

const listCommand = new Command('list')
  .description('List every package in the ledger')
  .option('--json', 'Output as JSON')
  .action((options: { json?: boolean }, command: Command) => {
    withErrors('package list', () => {
      const packages = buildRuntime({ home: homeOption(command) }).manager.listPackages();
      print(options.json === true ? JSON.stringify(packages, null, 2) : renderPackageList(packages));
    });
  });

const infoCommand = new Command('info')
  .description('Show one ledger entry')
  .argument('<name>', 'Package name')
  .option('--json', 'Output as JSON')
  .action((name: string, options: { json?: boolean }, command: Command) => {
    withErrors('package info', () => {
      const { manager } = buildRuntime({ home: homeOption(command) });
      const record = manager.getPackage(name);
      const status = manager.installStatus(name);
      print(
        options.json === true
          ? JSON.stringify({ ...record, last_run: status }, null, 2)
          : renderPackageInfo(record, status),
      );
    });
  });

const statusCommand = new Command('status')
  .description('Show the last installer outcome for each package')
  .option('--json', 'Output as JSON')
  .action((options: { json?: boolean }, command: Command) => {
    withErrors('package status', () => {
      const statuses = buildRuntime({ home: homeOption(command) }).manager.listInstallStatuses();
      print(options.json === true ? JSON.stringify(statuses, null, 2) : renderInstallStatuses(statuses));
    });
  });

const locateCommand = new Command('locate')
  .description('Record the binary path of a package; active profiles link it into their bin dir')
  .argument('<name>', 'Package name')
  .argument('<path>', 'Absolute path of the binary')
  .action((name: string, path: string, _options: unknown, command: Command) => {
    withErrors('package locate', () => {
      const { manager, orchestrator } = buildRuntime({ home: homeOption(command) });
      manager.setPackageLocation(name, path);
      orchestrator.relinkActive();
      print(done(`${name} → ${path}`));
    });
  });

const versionCommand = new Command('version')
  .description('Record the installed version of a package')
  .argument('<name>', 'Package name')
  .argument('<version>', 'Version string')
  .action((name: string, version: string, _options: unknown, command: Command) => {
    withErrors('package version', () => {
      buildRuntime({ home: homeOption(command) }).manager.setPackageVersion(name, version);
      print(done(`${name} @ ${version}`));
    });
  });

export const packageCommand = new Command('package')
  .description('Inspect and annotate the package ledger')
  .addCommand(listCommand)
  .addCommand(infoCommand)
  .addCommand(statusCommand)
  .addCommand(locateCommand)
  .addCommand(versionCommand);
