/**
 * envshift Runtime Host: ULID Generator
 *
 * 26-character Crockford Base32 identifiers: 10 characters of millisecond
 * timestamp followed by 16 characters of randomness. Used as `event_id` in
 * the JSONL event log so duplicated lines can be dropped on read.
 *
 * Within one millisecond the generator increments the previous random part
 * instead of drawing a new one, so ids from one process sort in creation
 * order.
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

const CROCKFORD = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';
const TIME_CHARS = 10;
const RANDOM_CHARS = 16;
const RANDOM_BYTES = 10;
const RANDOM_MAX = (1n << 80n) - 1n;

function encode(value: bigint, length: number): string {
  let out = '';
  let v = value;
  for (let i = 0; i < length; i++) {
    out = CROCKFORD.charAt(Number(v & 31n)) + out;
    v >>= 5n;
  }
  return out;
}

function bytesToBigInt(bytes: Uint8Array): bigint {
  let value = 0n;
  for (const byte of bytes) {
    value = (value << 8n) | BigInt(byte);
  }
  return value;
}

export type UlidFactory = () => string;

/**
 * Create a monotonic ULID generator.
 *
 * @param now - Millisecond clock, injectable for tests
 * @param random - Source of 10 random bytes, injectable for tests
 */
export function createUlidFactory(
  now: () => number = Date.now,
  random: (size: number) => Uint8Array = randomBytes,
): UlidFactory {
  let lastTime = -1;
  let lastRandom = 0n;

  return () => {
    const time = now();
    if (time === lastTime && lastRandom < RANDOM_MAX) {
      lastRandom += 1n;
    } else {
      lastTime = time;
      lastRandom = bytesToBigInt(random(RANDOM_BYTES));
    }
    return encode(BigInt(time), TIME_CHARS) + encode(lastRandom, RANDOM_CHARS);
  };
}

/** Process-wide generator. */
export const ulid: UlidFactory = createUlidFactory();
