import React from 'react'
import { Box, Text } from 'ink'
import type { InstallationRecord } from '@envshift/kernel'
import { palette } from '../theme.js'
import { Panel } from './Panel.js'

interface PackagePanelProps {
  packages: ReadonlyArray<InstallationRecord>
  focused: boolean
  grow?: number
}

/**
 * PackagePanel: ledger entries with ● / ○ dots; orphaned entries dimmed.
 */
export function PackagePanel({ packages, focused, grow }: PackagePanelProps): React.ReactElement {
  const orphaned = packages.filter(p => p.active_for.length === 0).length

  return (
    <Panel
      title="Packages"
      summary={orphaned > 0 ? `${packages.length} · ${orphaned} orphaned` : `${packages.length}`}
      focused={focused}
      grow={grow}
      placeholder={packages.length === 0 ? 'none' : undefined}
    >
      {packages.map(pkg => {
        const active = pkg.active_for.length > 0
        return (
          <Box key={pkg.package} justifyContent="space-between">
            <Box gap={1}>
              <Text color={active ? palette.green : palette.dim}>{active ? '●' : '○'}</Text>
              <Text color={active ? palette.white : palette.dim}>{pkg.package}</Text>
              {pkg.version !== null && <Text color={palette.muted}>{pkg.version}</Text>}
            </Box>
            <Text color={palette.muted}>{active ? pkg.active_for.join(', ') : 'orphaned'}</Text>
          </Box>
        )
      })}
    </Panel>
  )
}
