/**
 * Process exit codes for the `tapir` CLI.
 *
 *   0   — success; for verify, no drift and no per-file errors
 *   1   — the run completed with drift or per-file issues
 *   2   — the operation failed entirely (bad input, corrupt manifest, bad config)
 *   130 — interrupted (SIGINT)
 */

import { CancelledError, ComputeFailedError } from '@tapir/kernel';
import type { TapirError } from '@tapir/kernel';

export const EXIT = {
  OK: 0,
  ISSUES: 1,
  FAILED: 2,
  INTERRUPTED: 130,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

/** Exit code for a TapirError that ended a run. */
export function exitCodeFor(err: TapirError): ExitCode {
  if (err instanceof CancelledError) return EXIT.INTERRUPTED;
  if (err instanceof ComputeFailedError) return EXIT.ISSUES;
  return EXIT.FAILED;
}
