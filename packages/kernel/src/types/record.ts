/**
 * Tapir Kernel — File Record Types
 *
 * Defines the records a manifest is made of.
 *
 * The durable manifest format carries exactly two fields per line: the
 * digest and the path. `ManifestEntry` models that. `FileRecord` adds the
 * byte count observed while hashing; it exists only in memory, between the
 * hasher and the codec.
 */

// ---------------------------------------------------------------------------
// Branded Types
// ---------------------------------------------------------------------------

/**
 * Opaque brand symbol for Digest.
 * Prevents plain strings from being used as digests.
 */
declare const __digestBrand: unique symbol;

/**
 * A branded string holding a SHA-256 digest as 64 lowercase hex characters.
 *
 * Construct one with toDigest() (validating) or through the hasher.
 */
export type Digest = string & {
  readonly [__digestBrand]: 'Digest';
};

/** Number of hex characters in a rendered SHA-256 digest. */
const DIGEST_HEX_LENGTH = 64;

const DIGEST_PATTERN = new RegExp(`^[0-9a-f]{${DIGEST_HEX_LENGTH}}$`);

/**
 * Validate and brand a hex string as a Digest.
 *
 * Uppercase hex is accepted and normalized to lowercase.
 *
 * @returns The branded digest, or null if `value` is not 64 hex characters
 */
export function toDigest(value: string): Digest | null {
  const lower = value.toLowerCase();
  return DIGEST_PATTERN.test(lower) ? (lower as Digest) : null;
}

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

/**
 * One line of a manifest: a path and the digest of its content.
 *
 * `path` is the identity key and is compared as an exact string.
 */
export interface ManifestEntry {
  readonly path: string;
  readonly digest: Digest;
}

/** A manifest entry produced by hashing, with the number of bytes read. */
export interface FileRecord extends ManifestEntry {
  readonly size: number;
}

/** An ordered sequence of entries with unique paths. */
export type Manifest = ReadonlyArray<ManifestEntry>;
