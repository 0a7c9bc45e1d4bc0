#!/usr/bin/env node
/**
 * bin/envshift.ts: TTY-aware entry point for the `envshift` CLI command.
 *
 * With no arguments, in a TTY with ENVSHIFT_NO_TUI unset: opens the dashboard.
 * Otherwise: delegates to Commander (non-interactive / scripting mode).
 *
 * ENVSHIFT_NO_TUI=1 envshift   → Commander help, unchanged
 * envshift (in TTY)            → dashboard
 */

const isTTY         = process.stdout.isTTY === true && process.stdin.isTTY === true
const isInteractive = isTTY && process.env['ENVSHIFT_NO_TUI'] === undefined && process.argv.length <= 2

if (isInteractive) {
  const { launchDashboard } = await import('../tui/launch.js')
  await launchDashboard()
} else {
  const { program } = await import('../commands/index.js')
  await program.parseAsync()
}
