/**
 * Tapir Kernel — Path Predicates
 *
 * A PathPredicate decides whether an enumerated regular file takes part in
 * a run. Predicates see the path as it will be recorded and a small slice of
 * stat metadata; they never touch the filesystem themselves.
 *
 * Predicates compose by logical AND via allOf(). buildFileFilter() turns the
 * finder-style options (exact name, glob, regex, size bounds, recency) into a
 * single predicate.
 */

import { matchesGlob } from './glob.js';

/** Stat metadata a predicate may inspect. */
export interface FileMeta {
  /** Size in bytes. */
  readonly size: number;
  /** Last modification time, milliseconds since epoch. */
  readonly mtimeMs: number;
}

export type PathPredicate = (path: string, meta: FileMeta) => boolean;

const MS_PER_DAY = 86_400_000;

/** Final path segment, treating both `/` and `\` as separators. */
export function baseName(path: string): string {
  const idx = Math.max(path.lastIndexOf('/'), path.lastIndexOf('\\'));
  return idx >= 0 ? path.slice(idx + 1) : path;
}

/** AND-compose predicates. An empty list accepts everything. */
export function allOf(...predicates: ReadonlyArray<PathPredicate>): PathPredicate {
  return (path, meta) => predicates.every((p) => p(path, meta));
}

/** Exact file name match. */
export function byName(name: string): PathPredicate {
  return (path) => baseName(path) === name;
}

/**
 * Glob match. A pattern without `/` is matched against the file name
 * (`*.mkv`); a pattern with `/` against the whole path (`media/**`).
 */
export function byGlob(pattern: string): PathPredicate {
  const onName = !pattern.includes('/');
  return (path) => matchesGlob(pattern, onName ? baseName(path) : path);
}

/** Unanchored regex search against the file name. */
export function byRegex(pattern: RegExp): PathPredicate {
  return (path) => {
    pattern.lastIndex = 0;
    return pattern.test(baseName(path));
  };
}

export function minSize(bytes: number): PathPredicate {
  return (_path, meta) => meta.size >= bytes;
}

export function maxSize(bytes: number): PathPredicate {
  return (_path, meta) => meta.size <= bytes;
}

/**
 * Modified within the last `days` days relative to `now`.
 *
 * @param now - Clock in milliseconds; injectable for deterministic tests
 */
export function changedWithinDays(days: number, now: number = Date.now()): PathPredicate {
  const since = now - days * MS_PER_DAY;
  return (_path, meta) => meta.mtimeMs >= since;
}

/** Finder-style filter options. Every field is optional. */
export interface FileFilterOptions {
  readonly name?: string | undefined;
  readonly glob?: string | undefined;
  readonly regex?: string | undefined;
  readonly minSize?: number | undefined;
  readonly maxSize?: number | undefined;
  readonly changedWithinDays?: number | undefined;
}

/**
 * Build one predicate from finder-style options.
 *
 * @returns The composed predicate, or null when no option is set
 * @throws {SyntaxError} If `regex` is not a valid regular expression
 */
export function buildFileFilter(opts: FileFilterOptions, now: number = Date.now()): PathPredicate | null {
  const parts: PathPredicate[] = [];
  if (opts.name !== undefined) parts.push(byName(opts.name));
  if (opts.glob !== undefined) parts.push(byGlob(opts.glob));
  if (opts.regex !== undefined) parts.push(byRegex(new RegExp(opts.regex)));
  if (opts.minSize !== undefined) parts.push(minSize(opts.minSize));
  if (opts.maxSize !== undefined) parts.push(maxSize(opts.maxSize));
  if (opts.changedWithinDays !== undefined) parts.push(changedWithinDays(opts.changedWithinDays, now));
  return parts.length === 0 ? null : allOf(...parts);
}
