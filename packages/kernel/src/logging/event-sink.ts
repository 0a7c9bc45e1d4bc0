/**
 * envshift Kernel: Event Sink Interface
 *
 * The kernel owns the contract; concrete sinks live in runtime-host and are
 * injected at construction time. The kernel never writes to disk.
 */

import type { LedgerEvent } from '../types/event.js';

/**
 * A sink that receives and persists ledger events.
 *
 * append() is synchronous: the event is durable when the call returns.
 * Implementations must not silently discard events.
 */
export interface EventSink {
  append(event: LedgerEvent): void;
}
