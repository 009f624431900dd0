/**
 * Tapir Runtime Host — Verify Pipeline
 *
 * manifest → decode → re-hash each entry (bounded pool) → classify
 *          ↘ optional re-scan of a root → added
 *
 * Structural failures (manifest missing, unreadable or corrupt; scan root
 * missing) are thrown and no partial report is produced. Everything else is
 * data: drift lands in the DiffReport, per-path read failures in `errors`,
 * and verify still resolves.
 *
 * `added` is computed only when `root` is given. Without it the manifest's
 * own path list is the whole universe and `added` is always empty. The
 * manifest file itself is never reported as added.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import {
  HashIOError,
  NotFoundError,
  RunLogger,
  TapirError,
  VanishedError,
  classifyEntries,
  decodeManifest,
  driftCount,
} from '@tapir/kernel';
import type { EntryCheck, LogSink, PathPredicate, VerifyResult } from '@tapir/kernel';
import { enumerate } from '../enumeration/enumerator.js';
import { hashFile } from '../hashing/hasher.js';
import { runPool } from '../concurrency/pool.js';
import { DEFAULT_CONCURRENCY } from '../config/config.js';
import { isGone } from '../fs-errors.js';

export interface VerifyOptions {
  /** Manifest file to check against. */
  readonly manifestPath: string;
  /**
   * Directory to re-scan for files the manifest does not list. Scanned
   * paths are compared to manifest paths as exact strings, so pass the
   * root spelled the way compute's inputs were.
   */
  readonly root?: string | undefined;
  /** Directory relative paths are resolved against. Default: process.cwd(). */
  readonly cwd?: string | undefined;
  readonly concurrency?: number | undefined;
  readonly chunkSize?: number | undefined;
  /** Predicate applied to the root re-scan. */
  readonly filter?: PathPredicate | null | undefined;
  readonly signal?: AbortSignal | undefined;
  readonly logSink?: LogSink | undefined;
}

/**
 * Read the manifest source.
 *
 * @throws {NotFoundError} If it does not exist
 * @throws {TapirError} With code IOError for any other read failure
 */
async function readManifestText(path: string, cwd: string): Promise<string> {
  try {
    return await readFile(resolve(cwd, path), 'utf-8');
  } catch (err: unknown) {
    if (isGone(err)) throw new NotFoundError(path, 'manifest');
    throw new TapirError('IOError', `cannot read manifest ${path}: ${String(err)}`, { path, cause: err });
  }
}

/**
 * Check the filesystem against a manifest.
 *
 * @throws {NotFoundError} If the manifest or the scan root does not exist
 * @throws {ManifestCorruptError} If the manifest cannot be decoded
 * @throws {CancelledError} If `signal` aborts
 */
export async function verifyManifest(opts: VerifyOptions): Promise<VerifyResult> {
  const log = new RunLogger('verify', opts.logSink);
  const cwd = opts.cwd ?? process.cwd();
  log.started(opts.root !== undefined ? [opts.manifestPath, opts.root] : [opts.manifestPath]);

  try {
    const entries = decodeManifest(await readManifestText(opts.manifestPath, cwd));

    const outcomes = await runPool(
      entries,
      { concurrency: opts.concurrency ?? DEFAULT_CONCURRENCY, signal: opts.signal },
      (entry) => hashFile(resolve(cwd, entry.path), { chunkSize: opts.chunkSize }, entry.path),
    );

    const checks: EntryCheck[] = outcomes.map((outcome, i): EntryCheck => {
      if (outcome.ok) {
        return { kind: 'present', digest: outcome.value.digest, size: outcome.value.size };
      }
      if (outcome.error instanceof VanishedError) return { kind: 'missing' };
      const path = entries[i]?.path ?? '';
      const error = outcome.error instanceof TapirError ? outcome.error : new HashIOError(path, outcome.error);
      return { kind: 'error', error };
    });

    let scanned: ReadonlyArray<string> | null = null;
    let scanFailures: VerifyResult['errors'] = [];
    if (opts.root !== undefined) {
      const listing = await enumerate([opts.root], {
        cwd,
        filter: opts.filter,
        exclude: [opts.manifestPath],
        signal: opts.signal,
      });
      if (listing.notFound.length > 0) throw new NotFoundError(opts.root, 'scan root');
      scanned = listing.files;
      scanFailures = listing.failures;
    }

    const result = classifyEntries(entries, checks, scanned, scanFailures);

    entries.forEach((entry, i) => {
      const check = checks[i];
      if (check?.kind === 'present') log.hashed(entry.path, check.digest, check.size);
    });
    for (const failure of result.errors) {
      log.failed(failure.path, failure.error.code, failure.error.message);
    }
    log.completed({
      checked: result.checked,
      unchanged: result.report.unchanged.length,
      modified: result.report.modified.length,
      missing: result.report.missing.length,
      added: result.report.added.length,
      errors: result.errors.length,
      drift: driftCount(result.report),
    });

    return result;
  } catch (err: unknown) {
    log.aborted(err instanceof TapirError ? err.code : 'Unknown', err instanceof Error ? err.message : String(err));
    throw err;
  }
}
