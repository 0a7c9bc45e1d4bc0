import React from 'react'
import { Box, Text } from 'ink'
import type { LoggedEvent } from '@envshift/runtime-host'
import { eventHex, palette } from '../theme.js'
import { Panel } from './Panel.js'

interface EventPanelProps {
  events: ReadonlyArray<LoggedEvent>
  focused: boolean
}

/**
 * EventPanel: the most recent event log entries, newest at the bottom.
 */
export function EventPanel({ events, focused }: EventPanelProps): React.ReactElement {
  return (
    <Panel
      title="Events"
      summary={`last ${events.length}`}
      focused={focused}
      placeholder={events.length === 0 ? 'no events logged' : undefined}
    >
      {events.map(event => (
        <Box key={event.event_id} gap={2}>
          <Text color={palette.dim}>{event.timestamp.slice(11, 19)}</Text>
          <Text color={eventHex(event.event_type)}>{event.event_type}</Text>
          <Text color={palette.white}>{event.subject}</Text>
        </Box>
      ))}
    </Panel>
  )
}
