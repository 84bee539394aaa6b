/**
 * sdfkit Host: ULID Generator
 *
 * 26-character Crockford Base32 identifiers: a 48-bit millisecond
 * timestamp followed by 80 random bits. Within one millisecond the random
 * part is incremented, so ids from one factory sort in creation order.
 * Used as `event_id` on generation log lines.
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

const CROCKFORD_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';
const TIME_CHARS = 10;
const RANDOM_CHARS = 16;
const RANDOM_MAX = (BigInt(1) << BigInt(80)) - BigInt(1);

function encodeCrockford(value: bigint, length: number): string {
  let out = '';
  let v = value;
  for (let i = 0; i < length; i++) {
    out = CROCKFORD_ALPHABET.charAt(Number(v & BigInt(0x1f))) + out;
    v >>= BigInt(5);
  }
  return out;
}

function randomPart(source: (bytes: number) => Uint8Array): bigint {
  let value = BigInt(0);
  for (const byte of source(10)) {
    value = (value << BigInt(8)) | BigInt(byte);
  }
  return value;
}

export interface UlidSources {
  readonly now?: () => number;
  readonly random?: (bytes: number) => Uint8Array;
}

/** A monotonic generator. Each factory keeps its own last timestamp. */
export function createUlidFactory(sources: UlidSources = {}): () => string {
  const now = sources.now ?? Date.now;
  const random = sources.random ?? randomBytes;
  let lastTime = -1;
  let lastRandom = BigInt(0);

  return () => {
    let time = now();
    if (time <= lastTime) {
      // Clock stood still or went backwards: stay on the last timestamp.
      time = lastTime;
      lastRandom = lastRandom === RANDOM_MAX ? BigInt(0) : lastRandom + BigInt(1);
      if (lastRandom === BigInt(0)) time += 1;
    } else {
      lastRandom = randomPart(random);
    }
    lastTime = time;
    return encodeCrockford(BigInt(time), TIME_CHARS) + encodeCrockford(lastRandom, RANDOM_CHARS);
  };
}

/** Process-wide monotonic ULID. */
export const ulid = createUlidFactory();
