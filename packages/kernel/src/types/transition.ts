/**
 * envshift Kernel: Profile Transition Types
 *
 * A transition is an ordered list of named steps. The journal records how
 * far a transition got so an interrupted one can be resumed from the next
 * step or rolled back through per-step compensations.
 */

export enum TransitionKind {
  Switch = 'switch',
  Activate = 'activate',
  Deactivate = 'deactivate',
}

export enum TransitionStep {
  DeactivatePrevious = 'deactivate-previous',
  UpdatePointer = 'update-pointer',
  ClearPointer = 'clear-pointer',
  ActivateEnvironment = 'activate-environment',
  RelinkBinaries = 'relink-binaries',
  WriteMarker = 'write-marker',
}

/** Step order for each transition kind. */
export const TRANSITION_PLANS: Readonly<Record<TransitionKind, ReadonlyArray<TransitionStep>>> = {
  [TransitionKind.Switch]: [
    TransitionStep.DeactivatePrevious,
    TransitionStep.UpdatePointer,
    TransitionStep.ActivateEnvironment,
    TransitionStep.RelinkBinaries,
    TransitionStep.WriteMarker,
  ],
  [TransitionKind.Activate]: [
    TransitionStep.ActivateEnvironment,
    TransitionStep.RelinkBinaries,
    TransitionStep.WriteMarker,
  ],
  [TransitionKind.Deactivate]: [
    TransitionStep.DeactivatePrevious,
    TransitionStep.ClearPointer,
  ],
};

export type TransitionStatus = 'running' | 'failed' | 'completed';

/**
 * Persisted record of the most recent transition.
 *
 * `from` is the active profile before the transition started, `to` the
 * profile being activated (null for a deactivation).
 */
export interface TransitionRecord {
  readonly kind: TransitionKind;
  readonly from: string | null;
  readonly to: string | null;
  /** Marker name present in the shell startup file before the transition. */
  readonly previous_marker: string | null;
  readonly clear_marker: boolean;
  readonly completed_steps: ReadonlyArray<TransitionStep>;
  readonly status: TransitionStatus;
  readonly error: string | null;
  readonly started_at: string;
  readonly updated_at: string;
}

/** Last step a record completed, or null if none did. */
export function lastCompletedStep(record: TransitionRecord): TransitionStep | null {
  return record.completed_steps[record.completed_steps.length - 1] ?? null;
}
