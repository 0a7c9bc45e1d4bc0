import React from 'react'
import { Box, Text } from 'ink'
import { palette } from '../theme.js'
import type { DashboardData } from './data.js'

interface DashboardHeaderProps {
  data: DashboardData
}

/**
 * DashboardHeader: full-width header row.
 *
 * ◈ ENVSHIFT — work · posix · ~/.local/share/envshift    q quit · tab navigate · r refresh
 */
export function DashboardHeader({ data }: DashboardHeaderProps): React.ReactElement {
  return (
    <Box justifyContent="space-between" paddingX={1} borderStyle="single" borderColor={palette.border}>
      <Box gap={1}>
        <Text color={palette.blue} bold>◈ ENVSHIFT</Text>
        <Text color={palette.rule}>—</Text>
        <Text color={data.activeProfile !== null ? palette.white : palette.dim}>
          {data.activeProfile ?? 'no active profile'}
        </Text>
        <Text color={palette.rule}>·</Text>
        <Text color={palette.muted}>{data.shellKind}</Text>
        <Text color={palette.rule}>·</Text>
        <Text color={palette.blueDim}>{data.home}</Text>
      </Box>

      <Text color={palette.dim}>q quit · tab navigate · r refresh</Text>
    </Box>
  )
}
