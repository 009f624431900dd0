/**
 * Tapir Runtime Host — Compute Pipeline
 *
 * inputs → enumerate → hash (bounded pool) → encode → sink | caller
 *
 * Failure policy:
 *   - A missing top-level input aborts before anything is hashed
 *     (InputNotFoundError).
 *   - Per-file failures, from enumeration or hashing, never stop sibling
 *     files. Once every file has been attempted, ComputeFailedError reports
 *     all of them and no manifest is written.
 *
 * Record order is the enumeration order regardless of which hash finishes
 * first.
 */

import { resolve } from 'node:path';
import {
  ComputeFailedError,
  HashIOError,
  InputNotFoundError,
  RunLogger,
  TapirError,
  encodeManifest,
} from '@tapir/kernel';
import type { FileRecord, LogSink, PathFailure, PathPredicate } from '@tapir/kernel';
import { enumerate } from '../enumeration/enumerator.js';
import { hashFile } from '../hashing/hasher.js';
import { runPool } from '../concurrency/pool.js';
import type { ManifestSink } from '../sinks/manifest-sink.js';
import { DEFAULT_CONCURRENCY } from '../config/config.js';

export interface ComputeOptions {
  /** Files and/or directories, in the order they should appear. */
  readonly inputs: ReadonlyArray<string>;
  /** Where to write the manifest. When absent the text is only returned. */
  readonly sink?: ManifestSink | undefined;
  /** Directory relative inputs are resolved against. Default: process.cwd(). */
  readonly cwd?: string | undefined;
  readonly concurrency?: number | undefined;
  readonly chunkSize?: number | undefined;
  /** Enumeration predicate; files it rejects are not hashed. */
  readonly filter?: PathPredicate | null | undefined;
  readonly signal?: AbortSignal | undefined;
  readonly logSink?: LogSink | undefined;
}

export interface ComputeResult {
  /** One record per hashed file, in enumeration order. */
  readonly records: ReadonlyArray<FileRecord>;
  /** The encoded manifest. */
  readonly text: string;
  /** The sink's destination, or null if the text was only returned. */
  readonly destination: string | null;
  /** Sum of all record sizes. */
  readonly totalBytes: number;
}

function asTapirError(path: string, err: unknown): TapirError {
  return err instanceof TapirError ? err : new HashIOError(path, err);
}

/**
 * Hash the given inputs and produce a manifest.
 *
 * @throws {InputNotFoundError} If a top-level input does not exist
 * @throws {ComputeFailedError} If any file could not be enumerated or hashed
 * @throws {CancelledError} If `signal` aborts
 * @throws {TapirError} With code IOError if the sink cannot be written
 */
export async function computeManifest(opts: ComputeOptions): Promise<ComputeResult> {
  const log = new RunLogger('compute', opts.logSink);
  const cwd = opts.cwd ?? process.cwd();
  log.started(opts.inputs);

  try {
    const excludePath = opts.sink?.excludePath ?? null;
    const exclude = excludePath !== null ? [excludePath] : [];
    const listing = await enumerate(opts.inputs, { cwd, filter: opts.filter, exclude, signal: opts.signal });
    if (listing.notFound.length > 0) {
      throw new InputNotFoundError(listing.notFound);
    }

    const outcomes = await runPool(
      listing.files,
      { concurrency: opts.concurrency ?? DEFAULT_CONCURRENCY, signal: opts.signal },
      (path) => hashFile(resolve(cwd, path), { chunkSize: opts.chunkSize }, path),
    );

    const records: FileRecord[] = [];
    const failures: PathFailure[] = [...listing.failures];
    outcomes.forEach((outcome, i) => {
      const path = listing.files[i] ?? '';
      if (outcome.ok) {
        records.push({ path, digest: outcome.value.digest, size: outcome.value.size });
        log.hashed(path, outcome.value.digest, outcome.value.size);
      } else {
        failures.push({ path, error: asTapirError(path, outcome.error) });
      }
    });

    for (const failure of failures) {
      log.failed(failure.path, failure.error.code, failure.error.message);
    }
    if (failures.length > 0) {
      throw new ComputeFailedError(failures, listing.files.length + listing.failures.length);
    }

    const text = encodeManifest(records);
    if (opts.sink !== undefined) {
      await opts.sink.write(text);
    }

    const totalBytes = records.reduce((sum, r) => sum + r.size, 0);
    log.completed({ files: records.length, bytes: totalBytes });
    return { records, text, destination: opts.sink?.destination ?? null, totalBytes };
  } catch (err: unknown) {
    log.aborted(err instanceof TapirError ? err.code : 'Unknown', err instanceof Error ? err.message : String(err));
    throw err;
  }
}
