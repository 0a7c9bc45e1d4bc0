import type { EventLogStats, LoggedEvent } from '@envshift/runtime-host'
import { eventColor, t } from '../theme.js'
import { pad } from './layout.js'

const TYPE_W = 24

export function renderEventLog(events: ReadonlyArray<LoggedEvent>, stats: EventLogStats): string {
  let out = '\n'
  if (events.length === 0) {
    out += '  ' + t.dim('no events logged') + '\n'
  }

  for (const e of events) {
    out += (
      '  ' + t.dim(e.timestamp) + '  ' +
      eventColor(e.event_type)(pad(e.event_type, TYPE_W)) +
      t.white(e.subject) +
      (e.profile !== null ? t.dim(' @' + e.profile) : '') +
      '\n'
    )
  }

  // Damaged lines are skipped, not fatal; say so once.
  const skipped = stats.parseErrors + (stats.partialTrailingLine ? 1 : 0)
  if (skipped > 0) {
    out += '\n  ' + t.amber(`⚠ ${skipped} unreadable ${skipped === 1 ? 'line' : 'lines'} skipped`) + '\n'
  }
  return out
}
