/**
 * envshift Profile Engine: Profile Transition Orchestrator
 *
 * Moves the system between `NoActiveProfile` and `ActiveProfile(name)` as an
 * ordered list of idempotent steps. Each step has a compensating action.
 *
 *   switch      deactivate-previous → update-pointer → activate-environment
 *               → relink-binaries → write-marker
 *   activate    activate-environment → relink-binaries → write-marker
 *   deactivate  deactivate-previous → clear-pointer
 *
 * Progress is journaled after every step. When a step throws, the remaining
 * steps are skipped, the journal is marked failed and the original error is
 * rethrown. Nothing is undone automatically: the caller decides between
 * resume() and rollback(). While a failed transition is journaled, new
 * transitions are refused unless `force` discards it.
 *
 * The EnvironmentDelta is the in-process view of PATH and variables. The
 * generated environment script is what survives the process.
 */

import type {
  BinaryLinker,
  EnvironmentScriptWriter,
  EnvironmentState,
  ShellMarker,
  TransitionRecord,
} from '@envshift/kernel';
import {
  EMPTY_ENVIRONMENT,
  EnvironmentDelta,
  EventLogger,
  TRANSITION_PLANS,
  TransitionKind,
  TransitionStep,
  applyEnvironment,
  describeCause,
  invalidOperation,
  lastCompletedStep,
  reverseEnvironment,
} from '@envshift/kernel';
import type { StateManager } from './state-manager.js';
import type { TransitionJournal } from './transition-journal.js';

export interface OrchestratorDeps {
  readonly manager: StateManager;
  readonly journal: TransitionJournal;
  readonly linker: BinaryLinker;
  readonly marker: ShellMarker;
  readonly scriptWriter: EnvironmentScriptWriter;
  readonly delta?: EnvironmentDelta | undefined;
  readonly logger?: EventLogger | undefined;
}

export interface TransitionOptions {
  /** Discard a pending failed transition instead of refusing to start. */
  readonly force?: boolean | undefined;
}

export interface DeactivateOptions extends TransitionOptions {
  /** Also remove the shell marker line. */
  readonly clearMarker?: boolean | undefined;
}

export interface TransitionResult {
  readonly kind: TransitionKind;
  readonly from: string | null;
  readonly to: string | null;
  /** Steps run by this call, in order. */
  readonly steps: ReadonlyArray<TransitionStep>;
}

const JOURNAL_SUBJECT = 'transition';

export class ProfileTransitionOrchestrator {
  readonly delta: EnvironmentDelta;
  private readonly manager: StateManager;
  private readonly journal: TransitionJournal;
  private readonly linker: BinaryLinker;
  private readonly marker: ShellMarker;
  private readonly scriptWriter: EnvironmentScriptWriter;
  private readonly logger: EventLogger;

  constructor(deps: OrchestratorDeps) {
    this.manager = deps.manager;
    this.journal = deps.journal;
    this.linker = deps.linker;
    this.marker = deps.marker;
    this.scriptWriter = deps.scriptWriter;
    this.delta = deps.delta ?? new EnvironmentDelta();
    this.logger = deps.logger ?? new EventLogger();
  }

  // -------------------------------------------------------------------------
  // Transitions
  // -------------------------------------------------------------------------

  /**
   * Make `name` the active profile.
   *
   * @throws {EnvshiftError} NotFound for an unknown profile, before anything changes
   * @throws {EnvshiftError} InvalidOperation while a failed transition is pending
   */
  switchProfile(name: string, opts: TransitionOptions = {}): TransitionResult {
    this.manager.getProfile(name);
    return this.start(TransitionKind.Switch, name, false, opts);
  }

  /** Apply a profile's environment, binaries and marker without moving the pointer. */
  activateProfile(name: string, opts: TransitionOptions = {}): TransitionResult {
    this.manager.getProfile(name);
    return this.start(TransitionKind.Activate, name, false, opts);
  }

  /** Tear down the active profile and clear the pointer. */
  deactivateCurrent(opts: DeactivateOptions = {}): TransitionResult {
    return this.start(TransitionKind.Deactivate, null, opts.clearMarker ?? false, opts);
  }

  /**
   * Bring the active profile's bin directory back in line with its package
   * set after a ledger change. No-op without an active profile.
   *
   * @returns The profile that was relinked, or null
   */
  relinkActive(): string | null {
    const active = this.manager.activeProfile;
    if (active === null) return null;
    this.relink(active);
    return active;
  }

  /** The journaled transition that failed or was interrupted, if any. */
  pending(): TransitionRecord | null {
    const record = this.journal.read();
    return record !== null && record.status !== 'completed' ? record : null;
  }

  /**
   * Continue a failed transition from the step after the last completed one.
   *
   * @throws {EnvshiftError} InvalidOperation when nothing is pending
   */
  resume(): TransitionResult {
    return this.execute(this.requirePending('resume'));
  }

  /**
   * Undo the completed steps of a failed transition in reverse order and
   * clear the journal. A compensation that throws leaves the journal holding
   * the steps not yet undone.
   *
   * @throws {EnvshiftError} InvalidOperation when nothing is pending
   */
  rollback(): TransitionResult {
    let record = this.requirePending('roll back');
    const undone: TransitionStep[] = [];

    for (let step = lastCompletedStep(record); step !== null; step = lastCompletedStep(record)) {
      this.compensate(step, record);
      undone.push(step);
      record = {
        ...record,
        completed_steps: record.completed_steps.slice(0, -1),
        updated_at: this.logger.now(),
      };
      this.journal.write(record);
    }

    this.journal.clear();
    this.logger.record('transition.rolled-back', this.subjectOf(record), this.manager.activeProfile, {
      kind: record.kind,
      undone: undone.join(','),
    });
    return { kind: record.kind, from: record.from, to: record.to, steps: undone };
  }

  // -------------------------------------------------------------------------
  // Execution
  // -------------------------------------------------------------------------

  private start(
    kind: TransitionKind,
    to: string | null,
    clearMarker: boolean,
    opts: TransitionOptions,
  ): TransitionResult {
    const pending = this.pending();
    if (pending !== null) {
      if (opts.force !== true) {
        throw invalidOperation(
          JOURNAL_SUBJECT,
          `A ${pending.kind} transition to ${pending.to ?? 'no profile'} failed after ` +
            `${lastCompletedStep(pending) ?? 'no steps'}. Resume or roll it back, or pass --force.`,
        );
      }
      this.journal.clear();
    }

    const now = this.logger.now();
    return this.execute({
      kind,
      from: this.manager.activeProfile,
      to,
      previous_marker: this.marker.read(),
      clear_marker: clearMarker,
      completed_steps: [],
      status: 'running',
      error: null,
      started_at: now,
      updated_at: now,
    });
  }

  private execute(initial: TransitionRecord): TransitionResult {
    const remaining = TRANSITION_PLANS[initial.kind].slice(initial.completed_steps.length);
    let record: TransitionRecord = { ...initial, status: 'running', error: null, updated_at: this.logger.now() };
    this.journal.write(record);

    const ran: TransitionStep[] = [];
    for (const step of remaining) {
      try {
        this.run(step, record);
      } catch (err: unknown) {
        this.journal.write({ ...record, status: 'failed', error: describeCause(err), updated_at: this.logger.now() });
        this.logger.record('transition.failed', this.subjectOf(record), this.manager.activeProfile, {
          kind: record.kind,
          step,
          last_completed: lastCompletedStep(record),
          error: describeCause(err),
        });
        throw err;
      }
      ran.push(step);
      record = { ...record, completed_steps: [...record.completed_steps, step], updated_at: this.logger.now() };
      this.journal.write(record);
      this.logger.record('transition.step', this.subjectOf(record), this.manager.activeProfile, {
        kind: record.kind,
        step,
      });
    }

    this.journal.clear();
    this.logger.record('transition.completed', this.subjectOf(record), this.manager.activeProfile, {
      kind: record.kind,
      from: record.from,
    });
    return { kind: record.kind, from: record.from, to: record.to, steps: ran };
  }

  private run(step: TransitionStep, record: TransitionRecord): void {
    switch (step) {
      case TransitionStep.DeactivatePrevious:
        if (record.from !== null) this.tearDown(record.from);
        return;
      case TransitionStep.UpdatePointer:
        this.manager.setActiveProfile(this.target(record));
        return;
      case TransitionStep.ClearPointer:
        this.manager.setActiveProfile(null);
        this.scriptWriter.write(EMPTY_ENVIRONMENT, []);
        if (record.clear_marker) this.marker.clear();
        return;
      case TransitionStep.ActivateEnvironment: {
        const target = this.target(record);
        const bin = this.linker.binDir(target);
        const env = this.environmentOf(target);
        applyEnvironment(env, this.delta, { prependPaths: [bin] });
        this.scriptWriter.write(env, [bin]);
        return;
      }
      case TransitionStep.RelinkBinaries:
        this.relink(this.target(record));
        return;
      case TransitionStep.WriteMarker:
        this.marker.write(this.target(record));
        return;
    }
  }

  private compensate(step: TransitionStep, record: TransitionRecord): void {
    // An activation of the already active profile changed nothing to undo.
    const reactivation = record.kind === TransitionKind.Activate && record.from === record.to;

    switch (step) {
      case TransitionStep.DeactivatePrevious:
        if (record.from !== null) this.bringUp(record.from);
        return;
      case TransitionStep.UpdatePointer:
      case TransitionStep.ClearPointer:
        this.manager.setActiveProfile(record.from);
        this.writeScriptFor(record.from);
        if (step === TransitionStep.ClearPointer && record.clear_marker) this.restoreMarker(record);
        return;
      case TransitionStep.ActivateEnvironment: {
        const target = this.target(record);
        if (!reactivation) {
          reverseEnvironment(this.environmentOf(target), this.delta, {
            prependPaths: [this.linker.binDir(target)],
          });
        }
        this.writeScriptFor(record.from);
        return;
      }
      case TransitionStep.RelinkBinaries: {
        const target = this.target(record);
        if (reactivation) {
          this.relink(target);
        } else {
          this.linker.clear(target);
        }
        return;
      }
      case TransitionStep.WriteMarker:
        this.restoreMarker(record);
        return;
    }
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private tearDown(profile: string): void {
    reverseEnvironment(this.environmentOf(profile), this.delta, {
      prependPaths: [this.linker.binDir(profile)],
    });
    this.linker.clear(profile);
  }

  private bringUp(profile: string): void {
    const bin = this.linker.binDir(profile);
    const env = this.environmentOf(profile);
    applyEnvironment(env, this.delta, { prependPaths: [bin] });
    this.relink(profile);
    this.scriptWriter.write(env, [bin]);
  }

  private relink(profile: string): void {
    this.linker.link(profile, this.manager.current.binaryLinksFor(profile));
  }

  private writeScriptFor(profile: string | null): void {
    if (profile === null) {
      this.scriptWriter.write(EMPTY_ENVIRONMENT, []);
    } else {
      this.scriptWriter.write(this.environmentOf(profile), [this.linker.binDir(profile)]);
    }
  }

  private restoreMarker(record: TransitionRecord): void {
    if (record.previous_marker === null) {
      this.marker.clear();
    } else {
      this.marker.write(record.previous_marker);
    }
  }

  private environmentOf(profile: string): EnvironmentState {
    return this.manager.getProfile(profile).environment;
  }

  private target(record: TransitionRecord): string {
    if (record.to === null) {
      throw invalidOperation(JOURNAL_SUBJECT, `A ${record.kind} transition has no target profile`);
    }
    return record.to;
  }

  private requirePending(action: string): TransitionRecord {
    const record = this.pending();
    if (record === null) {
      throw invalidOperation(JOURNAL_SUBJECT, `No failed transition to ${action}`);
    }
    return record;
  }

  private subjectOf(record: TransitionRecord): string {
    return record.to ?? record.from ?? 'none';
  }
}
