/**
 * @envshift/cli
 *
 * The `envshift` command. The executable lives in bin/envshift.ts; this
 * entry exposes the configured Commander program and the runtime wiring for
 * embedding and tests.
 *
 * Usage:
 *   envshift status
 *   envshift profile create work
 *   envshift install ripgrep --installer brew
 *   envshift profile switch work
 *   envshift remove ripgrep --strategy smart-remove
 *   envshift env set-var work EDITOR vim
 *   envshift log --limit 20
 */

export { program } from './commands/index.js';
export type { CliRuntime, RuntimeOptions } from './runtime.js';
export { buildRuntime } from './runtime.js';
export { formatCommandError } from './commands/support.js';
