/**
 * Tapir Runtime Host — Configuration Resolution
 *
 * Resolves run settings using the following precedence, per setting:
 *
 *   1. Explicit option (e.g. from a --concurrency CLI flag)
 *   2. Environment variable (TAPIR_CONCURRENCY, TAPIR_CHUNK_SIZE, TAPIR_LOG_FILE)
 *   3. OS application config file
 *   4. Built-in default
 *
 * Invalid values from flags or the environment are operator errors and
 * raise ConfigError. The config file is best effort: if it is missing,
 * unreadable or malformed, or a field has the wrong type, that source is
 * skipped.
 *
 * The resolved config is a plain value passed into each pipeline call;
 * nothing here is cached between calls.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { availableParallelism, homedir, platform } from 'node:os';
import { ConfigError } from '@tapir/kernel';
import { DEFAULT_CHUNK_SIZE } from '../hashing/hasher.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TapirConfig {
  /** Files hashed in parallel. */
  readonly concurrency: number;
  /** Read size in bytes per hash chunk. */
  readonly chunkSize: number;
  /** JSONL run log destination, or null for no run log. */
  readonly logFile: string | null;
}

export interface ResolveConfigOptions {
  readonly concurrency?: string | number | undefined;
  readonly chunkSize?: string | number | undefined;
  readonly logFile?: string | undefined;
  /** Environment to read. Default: process.env. */
  readonly env?: Readonly<Record<string, string | undefined>> | undefined;
  /** Config file to read. Default: getOsConfigPath(). */
  readonly configPath?: string | undefined;
}

interface TapirOsConfig {
  readonly concurrency?: number;
  readonly chunkSize?: number;
  readonly logFile?: string;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/**
 * Default parallelism. Hashing is I/O bound on spinning disks and network
 * mounts, where a small pool already saturates the device.
 */
export const DEFAULT_CONCURRENCY = Math.min(4, availableParallelism());

/** Upper bound on a configured chunk size: 64 MiB. */
const MAX_CHUNK_SIZE = 64 * 1024 * 1024;

// ---------------------------------------------------------------------------
// OS Config File
// ---------------------------------------------------------------------------

/**
 * Returns the platform-specific path to the Tapir config file.
 *
 * Locations:
 *   macOS:   ~/Library/Preferences/tapir/config.json
 *   Windows: %APPDATA%\tapir\config.json (fallback: ~/AppData/Roaming/tapir/config.json)
 *   Linux:   ~/.config/tapir/config.json (or $XDG_CONFIG_HOME/tapir/config.json)
 */
export function getOsConfigPath(env: Readonly<Record<string, string | undefined>> = process.env): string {
  const home = homedir();
  switch (platform()) {
    case 'darwin':
      return join(home, 'Library', 'Preferences', 'tapir', 'config.json');
    case 'win32': {
      const appData = env['APPDATA'] ?? join(home, 'AppData', 'Roaming');
      return join(appData, 'tapir', 'config.json');
    }
    default: {
      const xdg = env['XDG_CONFIG_HOME'];
      return join(xdg !== undefined && xdg !== '' ? xdg : join(home, '.config'), 'tapir', 'config.json');
    }
  }
}

/**
 * Read the config file. Fields with the wrong type are dropped.
 *
 * @returns The valid fields, or an empty object if the file is absent or
 *   cannot be parsed
 */
export function readOsConfig(configPath: string): TapirOsConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch {
    return {};
  }
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) return {};

  const out: { concurrency?: number; chunkSize?: number; logFile?: string } = {};
  if ('concurrency' in parsed && isPositiveInt(parsed.concurrency)) out.concurrency = parsed.concurrency;
  if ('chunkSize' in parsed && isPositiveInt(parsed.chunkSize) && parsed.chunkSize <= MAX_CHUNK_SIZE) {
    out.chunkSize = parsed.chunkSize;
  }
  if ('logFile' in parsed && typeof parsed.logFile === 'string' && parsed.logFile !== '') out.logFile = parsed.logFile;
  return out;
}

// ---------------------------------------------------------------------------
// Value parsing
// ---------------------------------------------------------------------------

function isPositiveInt(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/**
 * Parse an integer setting within [min, max].
 *
 * @param source - Where the value came from, named in the error
 * @throws {ConfigError} If the value is not an integer in range
 */
export function parseIntSetting(
  value: string | number,
  source: string,
  range: { readonly min: number; readonly max?: number | undefined },
): number {
  const n = typeof value === 'number' ? value : /^\s*\d+\s*$/.test(value) ? Number(value) : Number.NaN;
  if (!Number.isSafeInteger(n) || n < range.min) {
    const kind = range.min > 0 ? 'a positive integer' : 'a non-negative integer';
    throw new ConfigError(`${source} must be ${kind}, got ${JSON.stringify(String(value))}`);
  }
  if (range.max !== undefined && n > range.max) {
    throw new ConfigError(`${source} must be at most ${range.max}, got ${n}`);
  }
  return n;
}

/** parseIntSetting() with a minimum of 1. */
function parsePositiveInt(value: string | number, source: string, max?: number): number {
  return parseIntSetting(value, source, { min: 1, max });
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value !== '' ? value : undefined;
}

// ---------------------------------------------------------------------------
// Primary Resolution Function
// ---------------------------------------------------------------------------

/**
 * Resolve the settings for one run.
 *
 * @throws {ConfigError} If an explicit option or environment variable is invalid
 */
export function resolveTapirConfig(opts: ResolveConfigOptions = {}): TapirConfig {
  const env = opts.env ?? process.env;
  const file = readOsConfig(opts.configPath ?? getOsConfigPath(env));

  let concurrency: number;
  const envConcurrency = nonEmpty(env['TAPIR_CONCURRENCY']);
  if (opts.concurrency !== undefined) {
    concurrency = parsePositiveInt(opts.concurrency, '--concurrency');
  } else if (envConcurrency !== undefined) {
    concurrency = parsePositiveInt(envConcurrency, 'TAPIR_CONCURRENCY');
  } else {
    concurrency = file.concurrency ?? DEFAULT_CONCURRENCY;
  }

  let chunkSize: number;
  const envChunkSize = nonEmpty(env['TAPIR_CHUNK_SIZE']);
  if (opts.chunkSize !== undefined) {
    chunkSize = parsePositiveInt(opts.chunkSize, '--chunk-size', MAX_CHUNK_SIZE);
  } else if (envChunkSize !== undefined) {
    chunkSize = parsePositiveInt(envChunkSize, 'TAPIR_CHUNK_SIZE', MAX_CHUNK_SIZE);
  } else {
    chunkSize = file.chunkSize ?? DEFAULT_CHUNK_SIZE;
  }

  const logFile = nonEmpty(opts.logFile) ?? nonEmpty(env['TAPIR_LOG_FILE']) ?? file.logFile ?? null;

  return { concurrency, chunkSize, logFile };
}
