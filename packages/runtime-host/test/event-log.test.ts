/**
 * envshift Runtime Host: Event Log Tests
 *
 *   EL1: FileEventSink writes one JSON line per event with an event_id
 *   EL2: readEventLog returns events sorted by (timestamp, event_id)
 *   EL3: duplicated lines are dropped on read and counted
 *   EL4: malformed lines are skipped and counted
 *   EL5: a torn trailing line is dropped and flagged
 *   EL6: ULIDs are 26 Crockford characters and increase within a millisecond
 */

import { describe, it, expect } from 'vitest';
import { EventLogger } from '@envshift/kernel';
import { MemoryStateIO } from '../src/state/state-io.js';
import { EVENT_LOG_FILE, FileEventSink } from '../src/logging/file-event-sink.js';
import { readEventLog } from '../src/logging/event-log-reader.js';
import { createUlidFactory } from '../src/logging/ulid.js';

const fixedClock = (): Date => new Date('2026-03-01T12:00:00.000Z');

function sequentialIds(): () => string {
  let n = 0;
  return () => `ID${String(++n).padStart(3, '0')}`;
}

// ---------------------------------------------------------------------------
// EL1: sink
// ---------------------------------------------------------------------------

describe('FileEventSink: EL1', () => {
  it('appends the event with its id, profile and detail', () => {
    const io = new MemoryStateIO();
    const logger = new EventLogger(new FileEventSink(io, sequentialIds()), fixedClock);

    logger.record('package.installed', 'jq', 'work', { action: 'installed', scope: 'global' });

    expect(io.readLines(EVENT_LOG_FILE)).toEqual([
      '{"event_id":"ID001","timestamp":"2026-03-01T12:00:00.000Z","event_type":"package.installed",' +
        '"subject":"jq","profile":"work","detail":{"action":"installed","scope":"global"}}',
    ]);
  });

  it('round-trips through readEventLog', () => {
    const io = new MemoryStateIO();
    const logger = new EventLogger(new FileEventSink(io, sequentialIds()), fixedClock);
    logger.record('profile.created', 'work', null);
    logger.record('transition.completed', 'work', 'work', { kind: 'switch' });

    const { events, stats } = readEventLog(io.readLogRaw(EVENT_LOG_FILE));

    expect(stats).toEqual({ totalLines: 2, parseErrors: 0, duplicates: 0, partialTrailingLine: false });
    expect(events.map((e) => [e.event_id, e.event_type, e.profile])).toEqual([
      ['ID001', 'profile.created', null],
      ['ID002', 'transition.completed', 'work'],
    ]);
    expect(events[1]?.detail).toEqual({ kind: 'switch' });
  });
});

// ---------------------------------------------------------------------------
// EL2 – EL5: reader
// ---------------------------------------------------------------------------

function line(id: string, timestamp: string): string {
  return JSON.stringify({
    event_id: id,
    timestamp,
    event_type: 'package.activated',
    subject: 'jq',
    profile: 'work',
    detail: {},
  });
}

describe('readEventLog', () => {
  it('EL2: sorts by timestamp, then by event_id', () => {
    const raw = [
      line('B', '2026-03-01T00:00:02.000Z'),
      line('C', '2026-03-01T00:00:01.000Z'),
      line('A', '2026-03-01T00:00:02.000Z'),
    ].join('\n') + '\n';

    expect(readEventLog(raw).events.map((e) => e.event_id)).toEqual(['C', 'A', 'B']);
  });

  it('EL3: drops duplicated event ids', () => {
    const raw = [line('A', '2026-03-01T00:00:01.000Z'), line('A', '2026-03-01T00:00:01.000Z')].join('\n') + '\n';
    const { events, stats } = readEventLog(raw);
    expect(events).toHaveLength(1);
    expect(stats.duplicates).toBe(1);
  });

  it('EL4: skips lines that are not events', () => {
    const raw = ['not json', '[1,2]', '{"event_id":"X"}', line('A', '2026-03-01T00:00:01.000Z')].join('\n') + '\n';
    const { events, stats } = readEventLog(raw);
    expect(events.map((e) => e.event_id)).toEqual(['A']);
    expect(stats.parseErrors).toBe(3);
    expect(stats.totalLines).toBe(4);
  });

  it('EL5: drops a final line with no newline', () => {
    const raw = line('A', '2026-03-01T00:00:01.000Z') + '\n' + '{"event_id":"B","timest';
    const { events, stats } = readEventLog(raw);
    expect(events.map((e) => e.event_id)).toEqual(['A']);
    expect(stats.partialTrailingLine).toBe(true);
    expect(stats.parseErrors).toBe(0);
  });

  it('returns an empty result for an empty log', () => {
    expect(readEventLog('')).toEqual({
      events: [],
      stats: { totalLines: 0, parseErrors: 0, duplicates: 0, partialTrailingLine: false },
    });
  });
});

// ---------------------------------------------------------------------------
// EL6: ULID
// ---------------------------------------------------------------------------

describe('createUlidFactory: EL6', () => {
  const zeros = (size: number): Uint8Array => new Uint8Array(size);

  it('encodes time then randomness in 26 characters', () => {
    const next = createUlidFactory(() => 1, zeros);
    expect(next()).toBe('0000000001' + '0'.repeat(16));
  });

  it('increments the random part within the same millisecond', () => {
    const next = createUlidFactory(() => 0, zeros);
    const first = next();
    const second = next();
    expect(first).toBe('0'.repeat(26));
    expect(second).toBe('0'.repeat(25) + '1');
    expect(first < second).toBe(true);
  });

  it('draws fresh randomness when the clock advances', () => {
    let time = 5;
    let draws = 0;
    const next = createUlidFactory(
      () => time,
      (size) => {
        draws++;
        return new Uint8Array(size);
      },
    );
    next();
    next();
    time = 6;
    next();
    expect(draws).toBe(2);
  });

  it('the default generator yields Crockford base32', () => {
    expect(createUlidFactory()()).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
  });
});
