/**
 * Tapir Runtime Host — ULID Generator
 *
 * Universally Unique Lexicographically Sortable Identifier.
 *
 * ULID format: 26 characters, Crockford Base32 encoded.
 *   - 10 chars: 48-bit millisecond timestamp (lexicographically sortable)
 *   - 16 chars: 80-bit cryptographic random
 *
 * Used as event_id in JSONL run logs so that logs collected from several
 * hosts can be merged, deduplicated and ordered.
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

// ---------------------------------------------------------------------------
// Crockford Base32 Encoding
// ---------------------------------------------------------------------------

/** Crockford's Base32 alphabet: no I, L, O or U. */
const CROCKFORD_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

/** Number of bits encoded per character (log2(32) = 5). */
const BITS_PER_CHAR = 5;

/** Number of characters for the 48-bit time component. ceil(48/5) = 10. */
const TIME_CHARS = 10;

/** Number of characters for the 80-bit random component. ceil(80/5) = 16. */
const RANDOM_CHARS = 16;

const ULID_PATTERN = /^[0-9A-HJKMNP-TV-Z]{26}$/i;

/**
 * Encode a fixed-precision unsigned integer as Crockford Base32.
 *
 * Encodes exactly `length` characters, zero-padding on the left.
 * Works on BigInt to handle values wider than 32 bits without precision loss.
 *
 * @param value - Non-negative BigInt value to encode
 * @param length - Exact number of output characters
 */
function encodeCrockford(value: bigint, length: number): string {
  let out = '';
  let v = value;
  for (let i = 0; i < length; i++) {
    out = CROCKFORD_ALPHABET.charAt(Number(v & BigInt(0x1f))) + out; // last 5 bits
    v >>= BigInt(BITS_PER_CHAR);
  }
  return out;
}

// ---------------------------------------------------------------------------
// ULID Generator
// ---------------------------------------------------------------------------

/**
 * Generate a new ULID string.
 *
 * Time component: 48-bit millisecond timestamp from `now`.
 * Random component: 80 bits from crypto.randomBytes(10).
 *
 * The random component is not monotonically incremented within the same
 * millisecond; ordering inside one millisecond is arbitrary.
 *
 * @returns A 26-character ULID string (uppercase Crockford Base32).
 *
 * @example
 * const id = ulid();
 * // e.g. '01JDKPF8X7M4VQN3BGHST6RWYZ'
 */
export function ulid(now: number = Date.now()): string {
  // 48-bit timestamp: milliseconds since epoch
  const timePart = encodeCrockford(BigInt(now), TIME_CHARS);

  // 80-bit random: 10 bytes = 80 bits
  const randBuf = randomBytes(10);
  let randValue = BigInt(0);
  for (const byte of randBuf) {
    randValue = (randValue << BigInt(8)) | BigInt(byte);
  }
  const randomPart = encodeCrockford(randValue, RANDOM_CHARS);

  return timePart + randomPart;
}

/**
 * Decode the millisecond timestamp of a ULID.
 *
 * @returns Milliseconds since epoch, or null if `id` is not a 26-character
 *   Crockford Base32 string
 */
export function ulidTime(id: string): number | null {
  if (!ULID_PATTERN.test(id)) return null;
  let value = 0;
  for (const ch of id.slice(0, TIME_CHARS).toUpperCase()) {
    value = value * 32 + CROCKFORD_ALPHABET.indexOf(ch);
  }
  return value;
}
