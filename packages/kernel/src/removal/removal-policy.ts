/**
 * envshift Kernel: Removal Policy Resolver
 *
 * Turns a removal request into a RemovalPlan, then applies the plan to the
 * InstallationState. The two phases are separate so the caller can run the
 * Installer's uninstall between them and abort before any state changes if
 * it fails.
 *
 * Strategy table:
 *
 *   deactivate           drop the current profile's pair; ledger entry kept
 *   remove-from-profile  same mutation; the outcome reports whether any other
 *                        profile still references the package
 *   smart-remove         uninstall when |active_for| <= 1, else deactivate
 *   force-remove         uninstall and strip from every profile set
 *   mark-unused          GC mark (recorded only) plus deactivate
 *
 * A full uninstall always strips the package from every profile set so the
 * symmetry invariant survives. Without an active profile, strategies that
 * need one plan a noop.
 */

import type { RemovalOutcome, RemovalPlan } from '../types/removal.js';
import { RemovalStrategy } from '../types/removal.js';
import type { InstallationState } from '../state/installation-state.js';

const NO_ACTIVE_PROFILE = 'no active profile';

export class RemovalPolicyResolver {
  /**
   * Decide what a removal will do. Pure: the state is not modified.
   *
   * @throws {EnvshiftError} NotFound if the package is not in the ledger
   */
  plan(state: InstallationState, pkg: string, strategy: RemovalStrategy): RemovalPlan {
    const record = state.ledger.require(pkg);
    const current = state.activeProfile;

    const uninstall = (): RemovalPlan => ({
      action: 'uninstall',
      package: pkg,
      strategy,
      affected_profiles: state.profilesContaining(pkg),
    });

    const deactivate = (markUnused: boolean): RemovalPlan =>
      current === null
        ? { action: 'noop', package: pkg, strategy, reason: NO_ACTIVE_PROFILE }
        : { action: 'deactivate', package: pkg, strategy, profile: current, mark_unused: markUnused };

    switch (strategy) {
      case RemovalStrategy.ForceRemove:
        return uninstall();
      case RemovalStrategy.SmartRemove:
        return record.active_for.length <= 1 ? uninstall() : deactivate(false);
      case RemovalStrategy.MarkUnused:
        return deactivate(true);
      case RemovalStrategy.Deactivate:
      case RemovalStrategy.RemoveFromProfile:
        return deactivate(false);
    }
  }

  /** Apply a plan produced by plan() against the same state. */
  apply(state: InstallationState, plan: RemovalPlan): RemovalOutcome {
    switch (plan.action) {
      case 'uninstall':
        state.uninstallPackage(plan.package);
        return {
          package: plan.package,
          strategy: plan.strategy,
          action: 'uninstall',
          profile: null,
          remaining_references: [],
          orphaned: false,
          marked_unused: false,
        };
      case 'deactivate': {
        state.deactivatePackage(plan.package, plan.profile);
        const remaining = state.ledger.require(plan.package).active_for;
        return {
          package: plan.package,
          strategy: plan.strategy,
          action: 'deactivate',
          profile: plan.profile,
          remaining_references: remaining,
          orphaned: remaining.length === 0,
          marked_unused: plan.mark_unused,
        };
      }
      case 'noop': {
        const remaining = state.ledger.require(plan.package).active_for;
        return {
          package: plan.package,
          strategy: plan.strategy,
          action: 'noop',
          profile: null,
          remaining_references: remaining,
          orphaned: remaining.length === 0,
          marked_unused: false,
        };
      }
    }
  }
}
