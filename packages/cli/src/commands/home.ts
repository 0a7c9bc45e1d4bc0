/**
 * envshift home: show or save the envshift home directory
 *
 *   envshift home          print the resolved home
 *   envshift home <dir>    save <dir> to the OS config file for later runs
 *
 * Precedence at resolution time: --home, ENVSHIFT_HOME, the config file,
 * then ~/.local/share/envshift.
 */

import { Command } from 'commander';
import { getOsConfigPath, resolveEnvshiftHome } from '@envshift/runtime-host';
import { done } from '../tui/output/layout.js';
import { homeOption, print, withErrors } from './support.js';

export const homeCommand = new Command('home')
  .description('Show the envshift home directory, or save a new one to the config file')
  .argument('[dir]', 'Directory to save as the default home')
  .action((dir: string | undefined, _options: unknown, command: Command) => {
    withErrors('home', () => {
      if (dir === undefined) {
        print(resolveEnvshiftHome({ home: homeOption(command) }));
        return;
      }
      const home = resolveEnvshiftHome({ home: dir, persist: true });
      print(done(`home set to ${home} in ${getOsConfigPath()}`));
    });
  });
