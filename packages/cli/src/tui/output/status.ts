import { TransitionKind } from '@envshift/kernel'
import type { ShellKind, TransitionRecord } from '@envshift/kernel'
import { t } from '../theme.js'
import { field } from './layout.js'

export interface StatusView {
  readonly home: string
  readonly shellKind: ShellKind
  readonly shellConfigPath: string
  readonly activeProfile: string | null
  readonly profileCount: number
  readonly packageCount: number
  readonly pending: TransitionRecord | null
  readonly violations: ReadonlyArray<string>
}

const LABEL_W = 10

/**
 * renderStatus: active profile, where state lives, and anything that needs
 * the operator's attention (an unfinished transition, broken references).
 */
export function renderStatus(view: StatusView): string {
  let out = '\n'

  out += view.activeProfile !== null
    ? '  ' + t.blue('◈ ' + view.activeProfile) + '\n'
    : '  ' + t.dim('○ no active profile') + '\n'

  out += '\n'
  out += '  ' + field('home', LABEL_W) + t.text(view.home) + '\n'
  out += '  ' + field('shell', LABEL_W) + t.text(view.shellKind) + '  ' + t.dim(view.shellConfigPath) + '\n'
  out += '  ' + field('profiles', LABEL_W) + t.white(String(view.profileCount)) + '\n'
  out += '  ' + field('packages', LABEL_W) + t.white(String(view.packageCount)) + '\n'

  if (view.pending !== null) {
    out += '\n  ' + t.amber(`⚠ ${describeTransition(view.pending)} ${view.pending.status}`) + '\n'
    if (view.pending.error !== null) {
      out += '    ' + t.dim(view.pending.error) + '\n'
    }
    out += '    ' + t.dim('envshift profile resume | envshift profile rollback') + '\n'
  }

  if (view.violations.length > 0) {
    out += '\n'
    for (const v of view.violations) {
      out += '  ' + t.red('✗ ' + v) + '\n'
    }
  }

  return out
}

export function describeTransition(record: TransitionRecord): string {
  switch (record.kind) {
    case TransitionKind.Switch:
      return `switch ${record.from ?? 'none'} → ${record.to ?? 'none'}`
    case TransitionKind.Activate:
      return `activate ${record.to ?? 'none'}`
    case TransitionKind.Deactivate:
      return `deactivate ${record.from ?? 'none'}`
  }
}
