import { EVENT_LOG_FILE, readEventLog } from '@envshift/runtime-host'
import type { LoggedEvent } from '@envshift/runtime-host'
import type { InstallationRecord, Profile, ShellKind, TransitionRecord } from '@envshift/kernel'
import type { CliRuntime } from '../../runtime.js'

export interface DashboardData {
  readonly home: string
  readonly shellKind: ShellKind
  readonly activeProfile: string | null
  readonly profiles: ReadonlyArray<Profile>
  readonly packages: ReadonlyArray<InstallationRecord>
  /** Most recent last. */
  readonly events: ReadonlyArray<LoggedEvent>
  readonly pending: TransitionRecord | null
}

/** One read of everything the dashboard shows. */
export function loadDashboard(runtime: CliRuntime, eventLimit = 8): DashboardData {
  const { config, manager, orchestrator, stateIO } = runtime
  const { events } = readEventLog(stateIO.readLogRaw(EVENT_LOG_FILE))

  return {
    home: config.envshiftHome,
    shellKind: config.shellKind,
    activeProfile: manager.activeProfile,
    profiles: manager.listProfiles(),
    packages: manager.listPackages(),
    events: events.slice(-eventLimit),
    pending: orchestrator.pending(),
  }
}
