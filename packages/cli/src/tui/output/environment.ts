import type { EnvironmentDelta, EnvironmentState } from '@envshift/kernel'
import { t } from '../theme.js'

/**
 * renderProjection: the variables a profile's environment would leave in
 * the current process environment: PATH first, then the profile's own
 * variables in definition order.
 */
export function renderProjection(state: EnvironmentState, delta: EnvironmentDelta): string {
  let out = t.text('PATH') + t.dim('=') + t.white(delta.getPathString()) + '\n'
  for (const key of Object.keys(state.variables)) {
    out += t.text(key) + t.dim('=') + t.white(delta.get(key) ?? '') + '\n'
  }
  return out
}
