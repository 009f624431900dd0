/**
 * Tapir Kernel — Diff Classification
 *
 * Pure function that turns per-entry check outcomes into a DiffReport.
 * The runtime host does the hashing; this module only decides which list
 * each path belongs to.
 *
 * Classification rules:
 *   present + equal digest     → unchanged
 *   present + different digest → modified
 *   missing                    → missing
 *   error                      → errors (none of the four lists)
 *   scanned, not in manifest   → added
 *
 * Paths are compared as exact strings. `data/a.txt` and `./data/a.txt` are
 * different identities; a relative/absolute mismatch between compute and
 * verify shows up as a missing + added pair.
 */

import type { Manifest } from '../types/record.js';
import type { DiffReport, DigestMismatch, EntryCheck, VerifyResult } from '../types/report.js';
import type { PathFailure } from '../types/errors.js';

/**
 * Classify manifest entries against their check outcomes.
 *
 * @param entries - Decoded manifest entries
 * @param checks - One outcome per entry, index-aligned with `entries`
 * @param scanned - Paths enumerated under the scan root, or null when no
 *   root was configured (then `added` is empty)
 * @param scanFailures - Failures from enumerating the scan root
 * @throws {Error} If `checks` is not index-aligned with `entries`
 */
export function classifyEntries(
  entries: Manifest,
  checks: ReadonlyArray<EntryCheck>,
  scanned: ReadonlyArray<string> | null,
  scanFailures: ReadonlyArray<PathFailure> = [],
): VerifyResult {
  if (checks.length !== entries.length) {
    throw new Error(`classifyEntries: ${checks.length} checks for ${entries.length} entries`);
  }

  const unchanged: string[] = [];
  const modified: string[] = [];
  const missing: string[] = [];
  const mismatches: DigestMismatch[] = [];
  const errors: PathFailure[] = [];

  entries.forEach((entry, i) => {
    const check = checks[i];
    if (check === undefined) return;
    switch (check.kind) {
      case 'present':
        if (check.digest === entry.digest) {
          unchanged.push(entry.path);
        } else {
          modified.push(entry.path);
          mismatches.push({ path: entry.path, expected: entry.digest, actual: check.digest });
        }
        break;
      case 'missing':
        missing.push(entry.path);
        break;
      case 'error':
        errors.push({ path: entry.path, error: check.error });
        break;
    }
  });

  const added: string[] = [];
  if (scanned !== null) {
    const recorded = new Set(entries.map((e) => e.path));
    for (const path of scanned) {
      if (!recorded.has(path)) added.push(path);
    }
  }
  errors.push(...scanFailures);

  const report: DiffReport = { unchanged, modified, missing, added };
  return {
    report,
    mismatches,
    errors,
    checked: entries.length,
    clean: modified.length === 0 && missing.length === 0 && added.length === 0 && errors.length === 0,
  };
}

/** Total number of paths with drift (modified + missing + added). */
export function driftCount(report: DiffReport): number {
  return report.modified.length + report.missing.length + report.added.length;
}
