/**
 * runtime.ts: wires the engine for one CLI invocation.
 *
 * Every command resolves the runtime configuration (home, shell, startup
 * file), then builds the file-backed StateManager and the transition
 * orchestrator over the real adapters. Nothing is cached between commands.
 */

import { EnvironmentDelta, EventLogger, systemClock } from '@envshift/kernel';
import type { Clock } from '@envshift/kernel';
import {
  CommandInstaller,
  FileEnvironmentScriptWriter,
  FileEventSink,
  FileShellMarker,
  FileSnapshotStore,
  FileStateIO,
  FsBinaryLinker,
  resolveRuntimeConfig,
} from '@envshift/runtime-host';
import type { CommandRunner, InstallerType, RuntimeConfig } from '@envshift/runtime-host';
import {
  InstallStatusLog,
  ProfileTransitionOrchestrator,
  StateManager,
  TransitionJournal,
} from '@envshift/profile-engine';

export interface RuntimeOptions {
  /** --home; takes precedence over ENVSHIFT_HOME and the config file. */
  readonly home?: string | undefined;
  /** Package manager to drive; null or omitted records installs only. */
  readonly installer?: InstallerType | null | undefined;
  readonly env?: NodeJS.ProcessEnv | undefined;
  readonly platform?: NodeJS.Platform | undefined;
  readonly clock?: Clock | undefined;
  readonly runner?: CommandRunner | undefined;
}

export interface CliRuntime {
  readonly config: RuntimeConfig;
  readonly stateIO: FileStateIO;
  readonly manager: StateManager;
  readonly orchestrator: ProfileTransitionOrchestrator;
}

export function buildRuntime(opts: RuntimeOptions = {}): CliRuntime {
  const env = opts.env ?? process.env;
  const config = resolveRuntimeConfig({ home: opts.home, env, platform: opts.platform });

  const stateIO = new FileStateIO(config.envshiftHome);
  const logger = new EventLogger(new FileEventSink(stateIO), opts.clock ?? systemClock);
  const installer =
    opts.installer !== undefined && opts.installer !== null
      ? new CommandInstaller(opts.installer, opts.runner)
      : null;

  const manager = new StateManager({
    store: new FileSnapshotStore(stateIO),
    logger,
    installer,
    statusLog: new InstallStatusLog(stateIO),
  });

  const orchestrator = new ProfileTransitionOrchestrator({
    manager,
    journal: new TransitionJournal(stateIO),
    linker: new FsBinaryLinker(config.envshiftHome),
    marker: new FileShellMarker(config.shellConfigPath),
    scriptWriter: new FileEnvironmentScriptWriter(
      config.envshiftHome,
      config.shellKind,
      config.shellConfigPath,
    ),
    delta: new EnvironmentDelta(env, config.pathSeparator),
    logger,
  });

  return { config, stateIO, manager, orchestrator };
}
