/**
 * @envshift/profile-engine
 *
 * Persisted operations over the kernel's installation state: the
 * StateManager (ledger, profiles, removal, environment edits) and the
 * journaled ProfileTransitionOrchestrator.
 */

export type { InstallRequest, StateManagerOptions } from './state-manager.js';
export { StateManager } from './state-manager.js';

export { TRANSITION_FILE, TransitionJournal, decodeTransition } from './transition-journal.js';

export { INSTALL_STATUS_FILE, InstallStatusLog, decodeStatus } from './install-status-log.js';

export type {
  DeactivateOptions,
  OrchestratorDeps,
  TransitionOptions,
  TransitionResult,
} from './transition-orchestrator.js';
export { ProfileTransitionOrchestrator } from './transition-orchestrator.js';

export type { EnvironmentEdit, PathPosition } from './environment-edits.js';
export {
  addPath,
  removePath,
  setActive,
  setAlias,
  setVariable,
  toggleAlias,
  unsetAlias,
  unsetVariable,
} from './environment-edits.js';
