/**
 * envshift Kernel: Removal Policy Types
 *
 * Five named strategies govern what happens when a package removal is
 * requested. The "current profile" for every strategy is the single active
 * profile pointer. With no active profile, strategies that need one become
 * no-ops instead of failing.
 */

export enum RemovalStrategy {
  /** Drop the current profile's reference only. The ledger entry survives. */
  Deactivate = 'deactivate',
  /** Drop the package from the current profile's set and report orphaning. */
  RemoveFromProfile = 'remove-from-profile',
  /** Uninstall when at most one profile references it, else deactivate. */
  SmartRemove = 'smart-remove',
  /** Uninstall and remove from every profile, regardless of references. */
  ForceRemove = 'force-remove',
  /** Mark for a future garbage collection pass and deactivate. */
  MarkUnused = 'mark-unused',
}

export const REMOVAL_STRATEGIES: ReadonlyArray<RemovalStrategy> = [
  RemovalStrategy.Deactivate,
  RemovalStrategy.RemoveFromProfile,
  RemovalStrategy.SmartRemove,
  RemovalStrategy.ForceRemove,
  RemovalStrategy.MarkUnused,
];

/**
 * The decision the resolver reached before any state is touched.
 *
 *   uninstall: delete the ledger entry and strip the package from every
 *   profile; the Installer's uninstall runs first.
 *   deactivate: drop the (profile, package) pair for `profile`.
 *   noop: nothing to change (no active profile).
 */
export type RemovalPlan =
  | {
      readonly action: 'uninstall';
      readonly package: string;
      readonly strategy: RemovalStrategy;
      /** Profiles whose package sets lose the package. */
      readonly affected_profiles: ReadonlyArray<string>;
    }
  | {
      readonly action: 'deactivate';
      readonly package: string;
      readonly strategy: RemovalStrategy;
      readonly profile: string;
      readonly mark_unused: boolean;
    }
  | {
      readonly action: 'noop';
      readonly package: string;
      readonly strategy: RemovalStrategy;
      readonly reason: string;
    };

/** What a removal actually did, returned to the caller for reporting. */
export interface RemovalOutcome {
  readonly package: string;
  readonly strategy: RemovalStrategy;
  readonly action: RemovalPlan['action'];
  /** Profile the package was deactivated for, when action is 'deactivate'. */
  readonly profile: string | null;
  /** Profiles still referencing the package after the removal. */
  readonly remaining_references: ReadonlyArray<string>;
  /** True when the ledger entry survives with no references at all. */
  readonly orphaned: boolean;
  readonly marked_unused: boolean;
}
