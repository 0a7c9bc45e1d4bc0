import React from 'react'
import { Box, Text } from 'ink'
import type { Profile } from '@envshift/kernel'
import { palette } from '../theme.js'
import { Panel } from './Panel.js'

interface ProfilePanelProps {
  profiles: ReadonlyArray<Profile>
  activeProfile: string | null
  focused: boolean
}

/**
 * ProfilePanel: every profile, ◈ on the active one, package counts right.
 */
export function ProfilePanel({ profiles, activeProfile, focused }: ProfilePanelProps): React.ReactElement {
  return (
    <Panel
      title="Profiles"
      summary={`${profiles.length} total`}
      focused={focused}
      placeholder={profiles.length === 0 ? 'none' : undefined}
    >
      {profiles.map(profile => {
        const active = profile.name === activeProfile
        return (
          <Box key={profile.name} justifyContent="space-between">
            <Box gap={1}>
              <Text color={active ? palette.blue : palette.dim}>{active ? '◈' : '○'}</Text>
              <Text color={active ? palette.white : palette.text}>{profile.name}</Text>
              {!profile.environment.active && <Text color={palette.amber}>env off</Text>}
            </Box>
            <Text color={palette.muted}>{profile.packages.length}</Text>
          </Box>
        )
      })}
    </Panel>
  )
}
