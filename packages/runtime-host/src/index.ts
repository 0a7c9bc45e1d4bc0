/**
 * @envshift/runtime-host
 *
 * envshift runtime host: side-effectful adapter implementations and state
 * persistence. Depends on @envshift/kernel (interfaces); implements the
 * concrete filesystem, shell and subprocess behavior with Node.js built-ins.
 *
 * The kernel package defines interfaces; this package provides implementations.
 * No kernel code imports from this package.
 */

// Adapter implementations
export { FsBinaryLinker } from './adapters/binary-linker.js';
export { FileShellMarker, MARKER_PREFIX, parseMarker, stripMarker } from './adapters/shell-marker.js';
export { FileEnvironmentScriptWriter, SOURCE_COMMENT } from './adapters/script-writer.js';
export type { CommandResult, CommandRunner, InstallerType } from './adapters/command-installer.js';
export {
  CommandInstaller,
  INSTALLER_TYPES,
  isInstallerType,
  spawnRunner,
} from './adapters/command-installer.js';

// StateIO: I/O abstraction under the envshift home
export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO } from './state/state-io.js';

// Snapshot persistence
export { FileSnapshotStore, SNAPSHOT_FILE } from './state/snapshot-store.js';

// Home and runtime configuration
export type { ResolveHomeOptions } from './home.js';
export {
  HOME_ENV_VAR,
  getOsConfigPath,
  readHomeFromConfig,
  resolveEnvshiftHome,
  writeHomeToConfig,
} from './home.js';
export type { ResolveRuntimeConfigOptions, RuntimeConfig } from './config.js';
export {
  SHELL_ENV_VAR,
  detectShell,
  resolveRuntimeConfig,
  resolveUserHome,
  shellConfigPath,
} from './config.js';

// Event log
export { EVENT_LOG_FILE, FileEventSink } from './logging/file-event-sink.js';
export type { UlidFactory } from './logging/ulid.js';
export { createUlidFactory, ulid } from './logging/ulid.js';
export type { EventLogReadResult, EventLogStats, LoggedEvent } from './logging/event-log-reader.js';
export { readEventLog } from './logging/event-log-reader.js';

export { isNodeError } from './fs-errors.js';
