import React from 'react'
import { render } from 'ink'
import { buildRuntime } from '../runtime.js'
import { loadDashboard } from './dashboard/data.js'

/**
 * Mount the dashboard and resolve once the user quits. The TSX module is
 * imported lazily so plain commands never load Ink's renderer.
 */
export async function launchDashboard(home?: string): Promise<void> {
  const { DashboardView } = await import('./dashboard/DashboardView.js')
  const load = () => loadDashboard(buildRuntime({ home }))

  const { waitUntilExit } = render(React.createElement(DashboardView, { load }))
  await waitUntilExit()
}
