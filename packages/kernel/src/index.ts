/**
 * @tapir/kernel
 *
 * Tapir checksum kernel: record and report types, error classes, the
 * manifest codec, diff classification, path predicates and the run logger.
 *
 * This package is side-effect free. It contains no imports of node:fs or
 * any other I/O API. Hashing, enumeration and the pipelines live in
 * @tapir/runtime-host.
 */

// Types
export type { Digest, FileRecord, Manifest, ManifestEntry } from './types/record.js';
export { toDigest } from './types/record.js';

export type { DiffReport, DigestMismatch, EntryCheck, VerifyResult } from './types/report.js';

export type { PathFailure, TapirErrorCode } from './types/errors.js';
export {
  CancelledError,
  ComputeFailedError,
  ConfigError,
  DuplicatePathError,
  HashIOError,
  InputNotFoundError,
  ManifestCorruptError,
  NotFoundError,
  TapirError,
  VanishedError,
} from './types/errors.js';

// Manifest codec
export { decodeManifest, encodeEntry, encodeManifest } from './manifest/codec.js';

// Diff classification
export { classifyEntries, driftCount } from './report/diff.js';

// Path predicates
export type { FileFilterOptions, FileMeta, PathPredicate } from './filters/predicates.js';
export {
  allOf,
  baseName,
  buildFileFilter,
  byGlob,
  byName,
  byRegex,
  changedWithinDays,
  maxSize,
  minSize,
} from './filters/predicates.js';
export { matchesGlob } from './filters/glob.js';

// Logging (sink implementations live in runtime-host)
export type { LogSink } from './logging/log-sink.js';
export type { RunEvent, RunKind } from './logging/run-log.js';
export { RunLogger } from './logging/run-log.js';
