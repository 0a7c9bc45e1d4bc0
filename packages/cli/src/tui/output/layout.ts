import { t } from '../theme.js'

/** Left-justify `s` in a column of `width`, always leaving one space. */
export const pad = (s: string, width: number): string =>
  s + ' '.repeat(Math.max(1, width - s.length))

export const field = (name: string, width: number): string =>
  t.muted(pad(name, width))

export const done = (message: string): string =>
  '  ' + t.green('✓') + ' ' + t.text(message)

export const hint = (message: string): string =>
  '    ' + t.dim(message)
