import React, { useReducer, useState, useEffect } from 'react'
import { Box, Text, useInput, useApp, useStdout } from 'ink'
import chalk from 'chalk'
import { describeCause } from '@envshift/kernel'
import type { DashboardData } from './data.js'
import { DashboardHeader } from './DashboardHeader.js'
import { ProfilePanel } from './ProfilePanel.js'
import { PackagePanel } from './PackagePanel.js'
import { EventPanel } from './EventPanel.js'
import { describeTransition } from '../output/status.js'
import { palette } from '../theme.js'

// ─── State ───────────────────────────────────────────────────────────────────

type DashboardState =
  | { phase: 'loading' }
  | { phase: 'ready'; data: DashboardData }
  | { phase: 'error'; message: string }

type DashboardAction =
  | { type: 'LOADED'; data: DashboardData }
  | { type: 'ERROR'; message: string }
  | { type: 'RELOAD' }

function reducer(_prev: DashboardState, action: DashboardAction): DashboardState {
  switch (action.type) {
    case 'LOADED': return { phase: 'ready', data: action.data }
    case 'ERROR':  return { phase: 'error', message: action.message }
    case 'RELOAD': return { phase: 'loading' }
  }
}

const PANEL_COUNT = 3

// ─── Component ───────────────────────────────────────────────────────────────

export interface DashboardViewProps {
  /** Reads state from disk; called on mount and on every 'r'. */
  load: () => DashboardData
}

/**
 * DashboardView: full-screen Ink view of profiles, packages and events.
 *
 * Keyboard:
 *   q / Escape  → exit
 *   Tab         → next panel
 *   Shift+Tab   → previous panel
 *   r           → reload from disk
 */
export function DashboardView({ load }: DashboardViewProps): React.ReactElement {
  const { exit } = useApp()
  const [state, dispatch] = useReducer(reducer, { phase: 'loading' })
  const [activePanel, setActivePanel] = useState(0)
  const [refreshKey, setRefreshKey] = useState(0)
  const { stdout } = useStdout()

  useEffect(() => {
    dispatch({ type: 'RELOAD' })
    try {
      dispatch({ type: 'LOADED', data: load() })
    } catch (err: unknown) {
      dispatch({ type: 'ERROR', message: describeCause(err) })
    }
  }, [refreshKey, load])

  useInput((input, key) => {
    if (input === 'q' || key.escape) {
      exit()
      return
    }
    if (key.tab && !key.shift) {
      setActivePanel(p => (p + 1) % PANEL_COUNT)
      return
    }
    if (key.tab && key.shift) {
      setActivePanel(p => (p - 1 + PANEL_COUNT) % PANEL_COUNT)
      return
    }
    if (input === 'r') {
      setRefreshKey(k => k + 1)
    }
  })

  if (state.phase === 'loading') {
    return (
      <Box flexDirection="column" padding={1}>
        <Text color={palette.blue}>◈ ENVSHIFT</Text>
        <Text color={palette.dim}>loading…</Text>
      </Box>
    )
  }

  if (state.phase === 'error') {
    return (
      <Box flexDirection="column" padding={1}>
        <Text color={palette.red}>error loading dashboard: {state.message}</Text>
        <Text color={palette.dim}>press q to exit</Text>
      </Box>
    )
  }

  const { data } = state
  const cols = stdout.columns ?? 80

  const slLeft  = data.pending !== null
    ? ` ⚠ ${describeTransition(data.pending)} ${data.pending.status} · envshift profile resume`
    : ` ◈ ${data.activeProfile ?? 'none'} · ${data.profiles.length} profiles · ${data.packages.length} packages`
  const slRight = `q quit · r refresh · tab navigate panels `
  const slFill  = ' '.repeat(Math.max(0, cols - slLeft.length - slRight.length))
  const slLine  = data.pending !== null
    ? chalk.bgHex(palette.amber).black(slLeft + slFill + slRight)
    : chalk.bgHex(palette.blueDim).white(slLeft + slFill + slRight)

  return (
    <Box flexDirection="column">
      <DashboardHeader data={data} />

      {/* Row 1: Profiles (1/3) | Packages (2/3) */}
      <Box flexDirection="row">
        <ProfilePanel profiles={data.profiles} activeProfile={data.activeProfile} focused={activePanel === 0} />
        <PackagePanel packages={data.packages} focused={activePanel === 1} grow={2} />
      </Box>

      {/* Row 2: Event log: full width */}
      <EventPanel events={data.events} focused={activePanel === 2} />

      <Box>
        <Text>{slLine}</Text>
      </Box>
    </Box>
  )
}
