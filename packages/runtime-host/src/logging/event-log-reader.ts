/**
 * envshift Runtime Host: Event Log Reader
 *
 * Pure function over the raw text of `events.jsonl`:
 *   - parses every complete line; malformed lines are dropped and counted
 *   - a final line without a terminating newline is treated as a torn write,
 *     dropped and flagged
 *   - events are deduplicated by event_id (first seen wins)
 *   - output is sorted by (timestamp, event_id)
 *
 * Callers obtain the text with StateIO.readLogRaw().
 */

import type { EventDetailValue } from '@envshift/kernel';

/** One event as read back from the log. */
export interface LoggedEvent {
  readonly event_id: string;
  readonly timestamp: string;
  readonly event_type: string;
  readonly subject: string;
  readonly profile: string | null;
  readonly detail: Readonly<Record<string, EventDetailValue>>;
}

export interface EventLogStats {
  /** Non-empty lines considered, excluding a torn trailing line. */
  readonly totalLines: number;
  readonly parseErrors: number;
  readonly duplicates: number;
  readonly partialTrailingLine: boolean;
}

export interface EventLogReadResult {
  readonly events: ReadonlyArray<LoggedEvent>;
  readonly stats: EventLogStats;
}

export function readEventLog(rawContent: string): EventLogReadResult {
  if (rawContent.length === 0) {
    return {
      events: [],
      stats: { totalLines: 0, parseErrors: 0, duplicates: 0, partialTrailingLine: false },
    };
  }

  const partialTrailingLine = !rawContent.endsWith('\n');
  const rawLines = rawContent.split('\n');
  const lines = (partialTrailingLine ? rawLines.slice(0, -1) : rawLines).filter((l) => l.length > 0);

  let parseErrors = 0;
  let duplicates = 0;
  const seen = new Set<string>();
  const events: LoggedEvent[] = [];

  for (const line of lines) {
    const event = parseEvent(line);
    if (event === null) {
      parseErrors++;
      continue;
    }
    if (seen.has(event.event_id)) {
      duplicates++;
      continue;
    }
    seen.add(event.event_id);
    events.push(event);
  }

  events.sort((a, b) => {
    if (a.timestamp !== b.timestamp) return a.timestamp < b.timestamp ? -1 : 1;
    if (a.event_id !== b.event_id) return a.event_id < b.event_id ? -1 : 1;
    return 0;
  });

  return {
    events,
    stats: { totalLines: lines.length, parseErrors, duplicates, partialTrailingLine },
  };
}

function parseEvent(line: string): LoggedEvent | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return null;
  }
  const obj: Record<string, unknown> = Object.fromEntries(Object.entries(parsed));
  const { event_id, timestamp, event_type, subject } = obj;
  const rawProfile = obj['profile'];
  const profile = typeof rawProfile === 'string' ? rawProfile : null;
  if (
    typeof event_id !== 'string' ||
    typeof timestamp !== 'string' ||
    typeof event_type !== 'string' ||
    typeof subject !== 'string' ||
    (rawProfile !== null && profile === null)
  ) {
    return null;
  }
  return { event_id, timestamp, event_type, subject, profile, detail: readDetail(obj['detail']) };
}

function readDetail(raw: unknown): Record<string, EventDetailValue> {
  if (typeof raw !== 'object' || raw === null) return {};
  return Object.fromEntries(Object.entries(raw).filter((entry): entry is [string, EventDetailValue] => isDetailValue(entry[1])));
}

function isDetailValue(value: unknown): value is EventDetailValue {
  return value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}
