/**
 * Tapir Kernel — Diff Report Types
 */

import type { Digest } from './record.js';
import type { PathFailure, TapirError } from './errors.js';

/**
 * Four-way disjoint partition of (manifest paths ∪ scanned disk paths).
 *
 * Paths whose check failed operationally appear in none of the lists; they
 * are reported separately as PathFailure values.
 */
export interface DiffReport {
  /** Present on disk with the recorded digest. Manifest order. */
  readonly unchanged: ReadonlyArray<string>;
  /** Present on disk with a different digest. Manifest order. */
  readonly modified: ReadonlyArray<string>;
  /** Recorded in the manifest, absent on disk. Manifest order. */
  readonly missing: ReadonlyArray<string>;
  /**
   * Found under the scan root but absent from the manifest. Enumeration
   * order. Always empty when no scan root was configured.
   */
  readonly added: ReadonlyArray<string>;
}

/** Outcome of re-hashing one manifest entry. */
export type EntryCheck =
  | { readonly kind: 'present'; readonly digest: Digest; readonly size: number }
  | { readonly kind: 'missing' }
  | { readonly kind: 'error'; readonly error: TapirError };

/** Recorded and current digest of a modified path. */
export interface DigestMismatch {
  readonly path: string;
  readonly expected: Digest;
  readonly actual: Digest;
}

/** What verify returns when the manifest itself could be read. */
export interface VerifyResult {
  readonly report: DiffReport;
  /** One per `report.modified` path, in the same order. */
  readonly mismatches: ReadonlyArray<DigestMismatch>;
  /** Operational failures (not drift), one per affected path. */
  readonly errors: ReadonlyArray<PathFailure>;
  /** Number of manifest entries checked. */
  readonly checked: number;
  /** True when there is no drift and no operational failure. */
  readonly clean: boolean;
}
