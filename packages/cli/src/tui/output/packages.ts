import { describeInstallSource } from '@envshift/kernel'
import type {
  InstallationRecord,
  InstallStatus,
  RemovalOutcome,
  RemovalPlan,
  SmartInstallResult,
} from '@envshift/kernel'
import { scopeColor, t } from '../theme.js'
import { done, field, hint, pad } from './layout.js'

const NAME_W = 20
const VERSION_W = 10
const SCOPE_W = 9
const LABEL_W = 14

export function renderPackageList(records: ReadonlyArray<InstallationRecord>): string {
  if (records.length === 0) {
    return '\n  ' + t.dim('no packages recorded') + '\n'
  }

  let out = '\n'
  for (const r of records) {
    const active = r.active_for.length > 0
    const dot = active ? t.green('●') : t.dim('○')
    const name = active ? t.white(pad(r.package, NAME_W)) : t.muted(pad(r.package, NAME_W))
    const refs = active ? t.text(r.active_for.join(', ')) : t.dim('orphaned')
    out += (
      '  ' + dot + ' ' +
      name +
      t.dim(pad(r.version ?? '-', VERSION_W)) +
      scopeColor(r.scope)(pad(r.scope, SCOPE_W)) +
      refs + '\n'
    )
  }
  return out
}

function describeStatus(status: InstallStatus): string {
  return status.success
    ? t.green(status.action + ' ok') + t.dim('  ' + status.timestamp)
    : t.red(status.action + ' failed') + t.dim('  ' + status.timestamp) + '\n' + hint(status.error ?? 'unknown error')
}

export function renderPackageInfo(record: InstallationRecord, status: InstallStatus | null = null): string {
  const row = (name: string, value: string) => '  ' + field(name, LABEL_W) + value + '\n'

  let out = '\n  ' + t.white.bold(record.package) + '\n\n'
  out += row('version', t.text(record.version ?? '-'))
  out += row('scope', scopeColor(record.scope)(record.scope))
  out += row('installer', t.text(record.installer_type))
  out += row('installed by', t.text(describeInstallSource(record.installed_by)))
  out += row('installed at', t.dim(record.installed_at))
  out += row('location', record.location !== null ? t.text(record.location) : t.dim('unknown'))
  out += row('active for', record.active_for.length > 0 ? t.text(record.active_for.join(', ')) : t.dim('none'))
  if (status !== null) out += row('last run', describeStatus(status))
  return out
}

export function renderInstallStatuses(statuses: ReadonlyArray<InstallStatus>): string {
  if (statuses.length === 0) {
    return '\n  ' + t.dim('no installer runs recorded') + '\n'
  }

  let out = '\n'
  for (const s of statuses) {
    const dot = s.success ? t.green('●') : t.red('●')
    out += '  ' + dot + ' ' + t.white(pad(s.package, NAME_W)) + describeStatus(s) + '\n'
  }
  return out
}

export function renderInstallResult(result: SmartInstallResult): string {
  return result.action === 'installed'
    ? done(`installed ${result.package} for ${result.profile}`)
    : done(`activated ${result.package} for ${result.profile}`) + '\n' + hint('already installed; no installer run')
}

export function renderRemovalPlan(plan: RemovalPlan): string {
  switch (plan.action) {
    case 'uninstall':
      return '  ' + t.red('uninstall ') + t.white(plan.package) +
        (plan.affected_profiles.length > 0 ? t.dim('  from ' + plan.affected_profiles.join(', ')) : '')
    case 'deactivate':
      return '  ' + t.amber('deactivate ') + t.white(plan.package) + t.dim('  for ' + plan.profile) +
        (plan.mark_unused ? t.dim('  (marked unused)') : '')
    case 'noop':
      return '  ' + t.dim('nothing to do for ') + t.white(plan.package) + t.dim(': ' + plan.reason)
  }
}

export function renderRemovalOutcome(outcome: RemovalOutcome): string {
  switch (outcome.action) {
    case 'uninstall':
      return done(`uninstalled ${outcome.package}`)
    case 'deactivate': {
      let out = done(`deactivated ${outcome.package} for ${outcome.profile ?? 'none'}`)
      if (outcome.orphaned) {
        out += '\n' + hint('no profile references it; the ledger entry is kept')
      } else if (outcome.remaining_references.length > 0) {
        out += '\n' + hint('still active for ' + outcome.remaining_references.join(', '))
      }
      return out
    }
    case 'noop':
      return '  ' + t.dim(`${outcome.package} unchanged`)
  }
}
