import { TransitionKind } from '@envshift/kernel'
import type { BinaryLink, Profile } from '@envshift/kernel'
import type { TransitionResult } from '@envshift/profile-engine'
import { t } from '../theme.js'
import { done, field, hint, pad } from './layout.js'

const NAME_W = 20
const LABEL_W = 12

export function renderProfileList(profiles: ReadonlyArray<Profile>, active: string | null): string {
  if (profiles.length === 0) {
    return '\n  ' + t.dim('no profiles; create one with envshift profile create <name>') + '\n'
  }

  let out = '\n'
  for (const p of profiles) {
    const isActive = p.name === active
    const mark = isActive ? t.blue('◈') : t.dim('○')
    const name = isActive ? t.blue.bold(pad(p.name, NAME_W)) : t.white(pad(p.name, NAME_W))
    const count = p.packages.length === 1 ? '1 package' : `${p.packages.length} packages`
    out += '  ' + mark + ' ' + name + t.dim(count)
    if (!p.environment.active) out += t.amber('  env off')
    if (p.parent !== null) out += t.dim('  ← ' + p.parent)
    out += '\n'
  }
  return out
}

export function renderProfileDetail(
  profile: Profile,
  isActive: boolean,
  links: ReadonlyArray<BinaryLink>,
): string {
  const env = profile.environment
  const row = (name: string, value: string) => '  ' + field(name, LABEL_W) + value + '\n'
  const list = (items: ReadonlyArray<string>) => items.length > 0 ? t.text(items.join(', ')) : t.dim('none')

  let out = '\n  ' + (isActive ? t.blue.bold('◈ ' + profile.name) : t.white.bold(profile.name)) + '\n\n'
  out += row('parent', profile.parent !== null ? t.text(profile.parent) : t.dim('none'))
  out += row('packages', list(profile.packages))
  out += row('binaries', list(links.map(l => l.name)))
  out += row('environment', env.active ? t.green('on') : t.amber('off'))
  out += row('prepend', list(env.paths_prepend))
  out += row('append', list(env.paths_append))

  const vars = Object.entries(env.variables)
  out += row('variables', vars.length > 0 ? '' : t.dim('none'))
  for (const [key, value] of vars) {
    out += '    ' + t.text(key) + t.dim('=') + t.white(value) + '\n'
  }

  const aliases = Object.entries(env.aliases)
  out += row('aliases', aliases.length > 0 ? '' : t.dim('none'))
  const disabled = env.disabled_aliases ?? []
  for (const [name, command] of aliases) {
    out += disabled.includes(name)
      ? '    ' + t.dim(name + ' → ' + command + '  (disabled)') + '\n'
      : '    ' + t.text(name) + t.dim(' → ') + t.white(command) + '\n'
  }

  const overrides = Object.keys(profile.os_overrides)
  if (overrides.length > 0) {
    out += row('overrides', t.text(overrides.join(', ')) + t.dim('  (stored only)'))
  }
  return out
}

function transitionLine(result: TransitionResult): string {
  switch (result.kind) {
    case TransitionKind.Switch:
      return `switched ${result.from ?? 'none'} → ${result.to ?? 'none'}`
    case TransitionKind.Activate:
      return `activated ${result.to ?? 'none'}`
    case TransitionKind.Deactivate:
      return `deactivated ${result.from ?? 'none'}`
  }
}

export function renderTransition(result: TransitionResult): string {
  return done(transitionLine(result)) + (result.steps.length > 0 ? '\n' + hint(result.steps.join(' · ')) : '')
}

export function renderRollback(result: TransitionResult): string {
  const n = result.steps.length
  return '  ' + t.amber('↺') + ' ' + t.text(`rolled back ${result.kind} (${n} ${n === 1 ? 'step' : 'steps'} undone)`) +
    (n > 0 ? '\n' + hint(result.steps.join(' · ')) : '')
}
