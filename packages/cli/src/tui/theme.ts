import chalk, { type ChalkInstance } from 'chalk'

/** Hex colors shared by the chalk output and the ink dashboard. */
export const palette = {
  blue:       '#4FC3F7',
  blueBright: '#81D4FA',
  blueDim:    '#0277BD',
  text:       '#C8C8C0',
  white:      '#F2F2EC',
  dim:        '#444444',
  muted:      '#666666',
  rule:       '#2A2A2A',
  border:     '#242424',
  amber:      '#D4880A',
  green:      '#81C784',
  red:        '#CF6679',
} as const

export const t = {
  blue:       chalk.hex(palette.blue),
  blueBright: chalk.hex(palette.blueBright),
  blueDim:    chalk.hex(palette.blueDim),
  text:       chalk.hex(palette.text),
  white:      chalk.hex(palette.white),
  dim:        chalk.hex(palette.dim),
  muted:      chalk.hex(palette.muted),
  amber:      chalk.hex(palette.amber),
  green:      chalk.hex(palette.green),
  red:        chalk.hex(palette.red),
} as const

const _scopeColors: Record<string, ChalkInstance> = {
  system:  t.muted,
  global:  t.text,
  profile: t.blue,
  local:   t.amber,
  device:  t.amber,
}

export const scopeColor = (scope: string): ChalkInstance =>
  _scopeColors[scope] ?? t.muted

const _eventHex: Record<string, string> = {
  'package.installed':      palette.green,
  'package.removed':        palette.red,
  'transition.completed':   palette.green,
  'transition.failed':      palette.red,
  'transition.rolled-back': palette.amber,
}

/** Hex color of an event type, for ink `color` props. */
export const eventHex = (eventType: string): string =>
  _eventHex[eventType] ?? palette.text

export const eventColor = (eventType: string): ChalkInstance =>
  chalk.hex(eventHex(eventType))
