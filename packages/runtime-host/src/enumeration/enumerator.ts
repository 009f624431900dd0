/**
 * Tapir Runtime Host — Enumerator
 *
 * Expands input paths (regular files and/or directories) into the ordered,
 * deduplicated list of regular files a run will hash.
 *
 * Ordering: inputs are processed in the order given. The files found under
 * one directory input are sorted by their full path string in UTF-16
 * code-unit order, which does not depend on locale or platform.
 *
 * Reported paths keep the caller's spelling: a directory input `./data`
 * yields `./data/a.txt`, never a normalized or absolute form. Filesystem
 * access goes through the path resolved against `cwd`.
 *
 * Symlinks:
 *   - Links to files are followed.
 *   - Links to directories are followed unless the target directory is
 *     already an ancestor on the current walk (a cycle), which is skipped.
 *   - Files are deduplicated by real path; the first occurrence in output
 *     order wins.
 *   - Dangling and self-referential links are not regular files and are
 *     skipped.
 *
 * Sockets, devices and FIFOs are skipped.
 *
 * Failures:
 *   - A missing top-level input is collected in `notFound`; the remaining
 *     inputs are still enumerated.
 *   - An entry that disappears mid-walk is a VanishedError failure.
 *   - An unreadable directory or entry is a HashIOError failure.
 */

import { lstat, readdir, realpath, stat } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { join, resolve, sep } from 'node:path';
import { CancelledError, HashIOError, VanishedError } from '@tapir/kernel';
import type { PathFailure, PathPredicate } from '@tapir/kernel';
import { isGone, isNodeError } from '../fs-errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface EnumerateOptions {
  /** Directory relative inputs are resolved against. Default: process.cwd(). */
  readonly cwd?: string | undefined;
  /** Predicate every regular file must satisfy. */
  readonly filter?: PathPredicate | null | undefined;
  /** Paths never to include, compared after resolving against `cwd`. */
  readonly exclude?: ReadonlyArray<string> | undefined;
  /** Checked before each input and each directory. */
  readonly signal?: AbortSignal | undefined;
}

export interface Enumeration {
  /** Regular files, in output order, as reported paths. */
  readonly files: ReadonlyArray<string>;
  /** Per-path failures met while walking. */
  readonly failures: ReadonlyArray<PathFailure>;
  /** Top-level inputs that do not exist. */
  readonly notFound: ReadonlyArray<string>;
}

interface Candidate {
  readonly path: string;
  readonly abs: string;
  readonly stats: Stats;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function byPath(a: Candidate, b: Candidate): number {
  if (a.path < b.path) return -1;
  if (a.path > b.path) return 1;
  return 0;
}

/** Append a child name to a reported directory path without normalizing it. */
function childPath(dirPath: string, name: string): string {
  return dirPath.endsWith(sep) || dirPath.endsWith('/') ? dirPath + name : dirPath + sep + name;
}

function toFailure(path: string, err: unknown): PathFailure {
  return { path, error: isGone(err) ? new VanishedError(path, err) : new HashIOError(path, err) };
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted === true) throw new CancelledError(signal.reason);
}

// ---------------------------------------------------------------------------
// Enumerator
// ---------------------------------------------------------------------------

/**
 * Walks one set of inputs. Holds the per-call dedupe state; never reused
 * across calls.
 */
class Walk {
  private readonly files: string[] = [];
  private readonly failures: PathFailure[] = [];
  private readonly notFound: string[] = [];
  private readonly seenFiles = new Set<string>();
  private readonly excluded: ReadonlySet<string>;
  private readonly cwd: string;

  constructor(private readonly opts: EnumerateOptions) {
    this.cwd = opts.cwd ?? process.cwd();
    this.excluded = new Set((opts.exclude ?? []).map((p) => resolve(this.cwd, p)));
  }

  async run(inputs: ReadonlyArray<string>): Promise<Enumeration> {
    for (const input of inputs) {
      throwIfAborted(this.opts.signal);
      const abs = resolve(this.cwd, input);

      let stats: Stats;
      try {
        stats = await stat(abs);
      } catch (err: unknown) {
        if (isGone(err)) this.notFound.push(input);
        else this.failures.push(toFailure(input, err));
        continue;
      }

      if (stats.isFile()) {
        await this.accept({ path: input, abs, stats });
      } else if (stats.isDirectory()) {
        const found: Candidate[] = [];
        await this.walkDir(input, abs, new Set<string>(), found);
        found.sort(byPath);
        for (const candidate of found) await this.accept(candidate);
      }
    }

    return { files: this.files, failures: this.failures, notFound: this.notFound };
  }

  private async walkDir(dirPath: string, dirAbs: string, ancestors: ReadonlySet<string>, out: Candidate[]): Promise<void> {
    throwIfAborted(this.opts.signal);

    let real: string;
    let names: string[];
    try {
      real = await realpath(dirAbs);
      if (ancestors.has(real)) return;
      names = (await readdir(dirAbs)).sort();
    } catch (err: unknown) {
      this.failures.push(toFailure(dirPath, err));
      return;
    }

    const lineage = new Set(ancestors).add(real);
    for (const name of names) {
      const path = childPath(dirPath, name);
      const abs = join(dirAbs, name);

      let stats: Stats;
      try {
        stats = await stat(abs);
      } catch (err: unknown) {
        if (await this.isBrokenLink(abs, err)) continue;
        this.failures.push(toFailure(path, err));
        continue;
      }

      if (stats.isDirectory()) {
        await this.walkDir(path, abs, lineage, out);
      } else if (stats.isFile()) {
        out.push({ path, abs, stats });
      }
    }
  }

  /**
   * stat() follows links, so it fails both for a vanished entry and for a
   * link whose target is missing or loops. Only the former is a failure.
   */
  private async isBrokenLink(abs: string, err: unknown): Promise<boolean> {
    if (!isGone(err) && !isNodeError(err, 'ELOOP')) return false;
    try {
      return (await lstat(abs)).isSymbolicLink();
    } catch {
      // The entry itself is gone: vanished, not a broken link.
      return false;
    }
  }

  private async accept(candidate: Candidate): Promise<void> {
    const { path, abs, stats } = candidate;
    if (this.excluded.has(abs)) return;
    if (this.opts.filter && !this.opts.filter(path, { size: stats.size, mtimeMs: stats.mtimeMs })) return;

    let real: string;
    try {
      real = await realpath(abs);
    } catch (err: unknown) {
      this.failures.push(toFailure(path, err));
      return;
    }
    if (this.excluded.has(real) || this.seenFiles.has(real)) return;
    this.seenFiles.add(real);
    this.files.push(path);
  }
}

/**
 * Expand inputs into the regular files to hash.
 *
 * @throws {CancelledError} If `signal` aborts before enumeration finishes
 */
export async function enumerate(inputs: ReadonlyArray<string>, opts: EnumerateOptions = {}): Promise<Enumeration> {
  return new Walk(opts).run(inputs);
}
