/**
 * sdfkit Core: MAC Addresses
 */

import { createHash } from 'node:crypto';
import { ErrorKind, fail, ok, type Result } from '../types/result.js';

export type MacInput = string | ReadonlyArray<number>;

const MAC_PATTERN = /^[0-9a-f]{2}(:[0-9a-f]{2}){5}$/i;

export function formatMac(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, '0')).join(':');
}

/** Parse `aa:bb:cc:dd:ee:ff` or six octets; all-zero and broadcast are rejected. */
export function parseMac(input: MacInput): Result<Uint8Array> {
  let bytes: Uint8Array;
  if (typeof input === 'string') {
    if (!MAC_PATTERN.test(input)) {
      return fail(ErrorKind.InvalidAddress, `"${input}" is not a MAC address`);
    }
    bytes = Uint8Array.from(input.split(':'), (part) => parseInt(part, 16));
  } else {
    if (input.length !== 6 || !input.every((b) => Number.isInteger(b) && b >= 0 && b <= 0xff)) {
      return fail(ErrorKind.InvalidAddress, 'a MAC address is exactly six octets in 0..255');
    }
    bytes = Uint8Array.from(input);
  }
  if (bytes.every((b) => b === 0)) {
    return fail(ErrorKind.InvalidAddress, 'the all-zero MAC address cannot be assigned');
  }
  if (bytes.every((b) => b === 0xff)) {
    return fail(ErrorKind.InvalidAddress, 'the broadcast MAC address cannot be assigned');
  }
  return ok(bytes);
}

/**
 * Locally administered unicast address derived from `seed`. Re-derives
 * with a counter until the address is not in `taken` (formatted form).
 */
export function generateMac(seed: string, taken: ReadonlySet<string>): Uint8Array {
  for (let attempt = 0; ; attempt++) {
    const digest = createHash('sha256').update(`${seed}#${attempt}`).digest();
    const bytes = Uint8Array.from(digest.subarray(0, 6));
    bytes[0] = ((bytes[0] ?? 0) | 0x02) & 0xfe;
    if (!taken.has(formatMac(bytes))) return bytes;
  }
}
