/**
 * envshift Runtime Host: File-backed Event Sink
 *
 * Implements the EventSink interface from @envshift/kernel by appending one
 * JSON object per line to `logs/events.jsonl` through the injected StateIO.
 * The write completes before append() returns.
 */

import type { EventSink, LedgerEvent } from '@envshift/kernel';
import type { StateIO } from '../state/state-io.js';
import type { UlidFactory } from './ulid.js';
import { ulid } from './ulid.js';

export const EVENT_LOG_FILE = 'events.jsonl';

export class FileEventSink implements EventSink {
  constructor(
    private readonly stateIO: StateIO,
    private readonly nextId: UlidFactory = ulid,
  ) {}

  append(event: LedgerEvent): void {
    const line = JSON.stringify({
      event_id: this.nextId(),
      timestamp: event.timestamp,
      event_type: event.event_type,
      subject: event.subject,
      profile: event.profile,
      detail: event.detail,
    });
    this.stateIO.appendLine(EVENT_LOG_FILE, line);
  }
}
