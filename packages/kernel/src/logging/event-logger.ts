/**
 * envshift Kernel: Event Logger
 *
 * Builds LedgerEvents and forwards them to an optional EventSink. Without a
 * sink (tests, embedded use) record() is a no-op.
 *
 * The clock is injectable so tests can pin timestamps.
 */

import type { EventDetailValue, LedgerEvent, LedgerEventType } from '../types/event.js';
import type { EventSink } from './event-sink.js';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export class EventLogger {
  constructor(
    private readonly sink?: EventSink,
    private readonly clock: Clock = systemClock,
  ) {}

  /** Current time from the injected clock as ISO 8601. */
  now(): string {
    return this.clock().toISOString();
  }

  record(
    eventType: LedgerEventType,
    subject: string,
    profile: string | null,
    detail: Readonly<Record<string, EventDetailValue>> = {},
  ): LedgerEvent {
    const event: LedgerEvent = {
      event_type: eventType,
      timestamp: this.now(),
      subject,
      profile,
      detail,
    };
    this.sink?.append(event);
    return event;
  }
}
