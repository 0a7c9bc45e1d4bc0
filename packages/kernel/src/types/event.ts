/**
 * envshift Kernel: Ledger Event Types
 *
 * Every mutating operation emits one LedgerEvent. Events are informational:
 * they are never replayed to rebuild state, which always comes from the
 * snapshot.
 */

export type LedgerEventType =
  | 'package.installed'
  | 'package.activated'
  | 'package.removed'
  | 'package.located'
  | 'package.updated'
  | 'profile.created'
  | 'profile.deleted'
  | 'profile.updated'
  | 'transition.step'
  | 'transition.completed'
  | 'transition.failed'
  | 'transition.rolled-back';

/** Scalar values allowed in event detail. Keeps the JSONL flat. */
export type EventDetailValue = string | number | boolean | null;

export interface LedgerEvent {
  readonly event_type: LedgerEventType;
  /** ISO 8601. */
  readonly timestamp: string;
  /** Package or profile name the event is about. */
  readonly subject: string;
  /** Active profile at the time of the event. */
  readonly profile: string | null;
  readonly detail: Readonly<Record<string, EventDetailValue>>;
}
