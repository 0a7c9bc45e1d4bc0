/**
 * @envshift/kernel
 *
 * The profile-scoped installation state engine: package ledger, profile
 * registry, removal policy resolver, environment projection and the
 * snapshot codec, plus the adapter and sink interfaces the runtime host
 * implements.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:child_process, node:os or any other I/O API, and never reads the
 * process environment. Concrete adapters and persistence live in
 * @envshift/runtime-host.
 */

// Types
export type { InstallationRecord, InstallSource } from './types/installation.js';
export {
  DEFAULT_PROFILE_IDENTITY,
  INSTALL_SCOPES,
  InstallScope,
  describeInstallSource,
} from './types/installation.js';

export type { EnvironmentState, OsOverride, Profile } from './types/profile.js';
export { EMPTY_ENVIRONMENT, OS_TYPES, OsType } from './types/profile.js';

export type { SnapshotStore, StateSnapshot } from './types/snapshot.js';
export { EMPTY_SNAPSHOT, SNAPSHOT_VERSION } from './types/snapshot.js';

export type { RemovalOutcome, RemovalPlan } from './types/removal.js';
export { REMOVAL_STRATEGIES, RemovalStrategy } from './types/removal.js';

export type { TransitionRecord, TransitionStatus } from './types/transition.js';
export {
  TRANSITION_PLANS,
  TransitionKind,
  TransitionStep,
  lastCompletedStep,
} from './types/transition.js';

export type { EventDetailValue, LedgerEvent, LedgerEventType } from './types/event.js';

export type { InstallAttemptAction, InstallStatus } from './types/install-status.js';

// Errors
export {
  EnvshiftError,
  ErrorKind,
  describeCause,
  invalidOperation,
  ioFailure,
  isEnvshiftError,
  notFound,
  persistenceFailure,
} from './errors/envshift-error.js';

// Adapter interfaces (implementations live in runtime-host)
export type {
  BinaryLink,
  BinaryLinker,
  EnvironmentScriptWriter,
  Installer,
  ShellMarker,
} from './adapters/index.js';

// Event logging (sink implementation lives in runtime-host)
export type { EventSink } from './logging/event-sink.js';
export type { Clock } from './logging/event-logger.js';
export { EventLogger, systemClock } from './logging/event-logger.js';

// State engine
export { PackageLedger } from './state/package-ledger.js';
export { ProfileRegistry } from './state/profile-registry.js';
export { InstallationState } from './state/installation-state.js';
export { isSafeSegment, linkNameOf, requirePackageName, requireProfileName } from './state/names.js';
export type { InstallAction, SmartInstallOptions, SmartInstallResult } from './state/smart-install.js';
export { applySmartInstall, planInstall } from './state/smart-install.js';
export { RemovalPolicyResolver } from './removal/removal-policy.js';

// Environment projection
export type { EnvRecord } from './environment/environment-delta.js';
export { EnvironmentDelta, expandPath } from './environment/environment-delta.js';
export type { ProjectionExtras } from './environment/projector.js';
export { applyEnvironment, projectOnto, reverseEnvironment } from './environment/projector.js';
export {
  SHELL_KINDS,
  ShellKind,
  renderEnvironment,
  scriptExtension,
  sourceLine,
} from './environment/render.js';

// Snapshot codec
export { decodeSnapshot, encodeSnapshot } from './snapshot/codec.js';
