/**
 * Tapir Runtime Host — Hasher
 *
 * SHA-256 over a file's byte stream. Files are read in fixed-size chunks so
 * memory use is bounded by the chunk size, not the file size.
 *
 * A read failure never yields a digest: the stream error propagates and is
 * tagged with the file's path. ENOENT/ENOTDIR become VanishedError (the file
 * was there when it was enumerated or recorded); everything else becomes
 * HashIOError.
 */

import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { HashIOError, VanishedError, toDigest } from '@tapir/kernel';
import type { Digest } from '@tapir/kernel';
import { isGone } from '../fs-errors.js';

/** Default read size: 1 MiB. */
export const DEFAULT_CHUNK_SIZE = 1024 * 1024;

export interface HashResult {
  readonly digest: Digest;
  /** Number of bytes fed to the hash. */
  readonly size: number;
}

export interface HashFileOptions {
  /** Read size in bytes. Default: DEFAULT_CHUNK_SIZE. */
  readonly chunkSize?: number | undefined;
}

function finish(hex: string): Digest {
  const digest = toDigest(hex);
  if (digest === null) {
    throw new Error(`sha256 produced a malformed digest: ${hex}`);
  }
  return digest;
}

/** SHA-256 of an in-memory buffer or UTF-8 string. */
export function hashBytes(data: Uint8Array | string): Digest {
  return finish(createHash('sha256').update(data).digest('hex'));
}

/**
 * SHA-256 of any byte stream. Errors raised by the source propagate
 * unchanged.
 */
export async function hashStream(source: AsyncIterable<Uint8Array>): Promise<HashResult> {
  const hash = createHash('sha256');
  let size = 0;
  for await (const chunk of source) {
    hash.update(chunk);
    size += chunk.byteLength;
  }
  return { digest: finish(hash.digest('hex')), size };
}

/**
 * SHA-256 of a file's content.
 *
 * @param filePath - Path used for the read
 * @param reportPath - Path named in errors (defaults to `filePath`); lets
 *   callers report the manifest's spelling when they read through a
 *   resolved path
 * @throws {VanishedError} If the file does not exist
 * @throws {HashIOError} On any other open or read failure
 */
export async function hashFile(
  filePath: string,
  opts: HashFileOptions = {},
  reportPath: string = filePath,
): Promise<HashResult> {
  const stream = createReadStream(filePath, { highWaterMark: opts.chunkSize ?? DEFAULT_CHUNK_SIZE });
  try {
    return await hashStream(stream);
  } catch (err: unknown) {
    if (isGone(err)) throw new VanishedError(reportPath, err);
    throw new HashIOError(reportPath, err);
  } finally {
    stream.destroy();
  }
}
