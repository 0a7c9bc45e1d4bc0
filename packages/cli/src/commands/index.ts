/**
 * commands/index.ts: Commander program, configured and exported without .parse().
 *
 * Imported by:
 *   src/bin/envshift.ts   (non-interactive / ENVSHIFT_NO_TUI path)
 *   src/index.ts
 */

import { program } from 'commander'
import { HOME_ENV_VAR } from '@envshift/runtime-host'
import { statusCommand } from './status.js'
import { installCommand } from './install.js'
import { removeCommand } from './remove.js'
import { packageCommand } from './package.js'
import { profileCommand } from './profile.js'
import { envCommand } from './env.js'
import { overrideCommand } from './override.js'
import { logCommand } from './log.js'
import { dashboardCommand } from './dashboard.js'
import { homeCommand } from './home.js'

program
  .name('envshift')
  .description(
    'Profile-scoped package installation state.\n' +
    'Packages are shared across profiles and uninstalled only when the last profile lets go.',
  )
  .version('0.1.0')
  .option('--home <dir>', `envshift home directory (overrides ${HOME_ENV_VAR} and the config file)`)

program.addCommand(statusCommand)
program.addCommand(installCommand)
program.addCommand(removeCommand)
program.addCommand(packageCommand)
program.addCommand(profileCommand)
program.addCommand(envCommand)
program.addCommand(overrideCommand)
program.addCommand(logCommand)
program.addCommand(dashboardCommand)
program.addCommand(homeCommand)

export { program }
