/**
 * @tapir/runtime-host
 *
 * Tapir runtime host: the side-effectful half of the checksum tool. Hashes
 * files, walks directories, runs the compute and verify pipelines, and
 * persists manifests and run logs using Node.js built-ins.
 *
 * Depends on @tapir/kernel for types, the manifest codec and diff
 * classification. No kernel code imports from this package.
 */

// Hashing
export type { HashFileOptions, HashResult } from './hashing/hasher.js';
export { DEFAULT_CHUNK_SIZE, hashBytes, hashFile, hashStream } from './hashing/hasher.js';

// Enumeration
export type { EnumerateOptions, Enumeration } from './enumeration/enumerator.js';
export { enumerate } from './enumeration/enumerator.js';

// Worker pool
export type { Outcome, PoolOptions } from './concurrency/pool.js';
export { runPool } from './concurrency/pool.js';

// Pipelines
export type { ComputeOptions, ComputeResult } from './pipelines/compute.js';
export { computeManifest } from './pipelines/compute.js';
export type { VerifyOptions } from './pipelines/verify.js';
export { verifyManifest } from './pipelines/verify.js';

// Manifest sinks
export type { ManifestSink } from './sinks/manifest-sink.js';
export { FileManifestSink, MemoryManifestSink } from './sinks/manifest-sink.js';

// Run log sinks
export { FileLogSink, MemoryLogSink } from './logging/file-log-sink.js';
export { ulid, ulidTime } from './logging/ulid.js';

// Configuration
export type { ResolveConfigOptions, TapirConfig } from './config/config.js';
export {
  DEFAULT_CONCURRENCY,
  getOsConfigPath,
  parseIntSetting,
  readOsConfig,
  resolveTapirConfig,
} from './config/config.js';
