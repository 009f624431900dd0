/**
 * Tapir Kernel — Glob and Path Predicate Tests
 */

import { describe, it, expect } from 'vitest';
import {
  allOf,
  baseName,
  buildFileFilter,
  byGlob,
  byName,
  byRegex,
  changedWithinDays,
  matchesGlob,
  maxSize,
  minSize,
} from '../src/index.js';
import type { FileMeta } from '../src/index.js';

const DAY = 86_400_000;
const NOW = Date.UTC(2024, 0, 31);

const meta = (size: number, ageDays = 0): FileMeta => ({ size, mtimeMs: NOW - ageDays * DAY });

// ---------------------------------------------------------------------------
// Glob
// ---------------------------------------------------------------------------

describe('matchesGlob', () => {
  it('* stays within one path segment', () => {
    expect(matchesGlob('src/*.ts', 'src/index.ts')).toBe(true);
    expect(matchesGlob('src/*.ts', 'src/sub/index.ts')).toBe(false);
  });

  it('** crosses segments', () => {
    expect(matchesGlob('media/**', 'media/2024/clip.mkv')).toBe(true);
    expect(matchesGlob('media/**', 'other/clip.mkv')).toBe(false);
  });

  it('? matches exactly one non-separator character', () => {
    expect(matchesGlob('file?.txt', 'file1.txt')).toBe(true);
    expect(matchesGlob('file?.txt', 'file12.txt')).toBe(false);
  });

  it('treats regex metacharacters literally', () => {
    expect(matchesGlob('a+b.(1).txt', 'a+b.(1).txt')).toBe(true);
    expect(matchesGlob('a+b.txt', 'aab.txt')).toBe(false);
  });

  it('ignores a leading ./ on pattern and path', () => {
    expect(matchesGlob('./docs/**', 'docs/a.md')).toBe(true);
    expect(matchesGlob('docs/**', './docs/a.md')).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// Predicates
// ---------------------------------------------------------------------------

describe('path predicates', () => {
  it('baseName handles both separators', () => {
    expect(baseName('a/b/c.txt')).toBe('c.txt');
    expect(baseName('a\\b\\c.txt')).toBe('c.txt');
    expect(baseName('c.txt')).toBe('c.txt');
  });

  it('byName matches the file name exactly', () => {
    expect(byName('notes.txt')('docs/notes.txt', meta(1))).toBe(true);
    expect(byName('notes.txt')('docs/notes.txt.bak', meta(1))).toBe(false);
  });

  it('byGlob matches the file name when the pattern has no slash', () => {
    expect(byGlob('*.mkv')('media/2024/clip.mkv', meta(1))).toBe(true);
    expect(byGlob('*.mkv')('media/2024/clip.mp4', meta(1))).toBe(false);
  });

  it('byGlob matches the whole path when the pattern has a slash', () => {
    expect(byGlob('media/*/clip.mkv')('media/2024/clip.mkv', meta(1))).toBe(true);
    expect(byGlob('media/*.mkv')('media/2024/clip.mkv', meta(1))).toBe(false);
  });

  it('byRegex searches the file name and is safe to reuse with the g flag', () => {
    const p = byRegex(/\.jpe?g$/g);
    expect(p('photos/a.jpg', meta(1))).toBe(true);
    expect(p('photos/b.jpeg', meta(1))).toBe(true);
    expect(p('jpg/readme', meta(1))).toBe(false);
  });

  it('size bounds are inclusive', () => {
    expect(minSize(10)('f', meta(10))).toBe(true);
    expect(minSize(10)('f', meta(9))).toBe(false);
    expect(maxSize(10)('f', meta(10))).toBe(true);
    expect(maxSize(10)('f', meta(11))).toBe(false);
  });

  it('changedWithinDays compares mtime against the injected clock', () => {
    const recent = changedWithinDays(7, NOW);
    expect(recent('f', meta(1, 3))).toBe(true);
    expect(recent('f', meta(1, 7))).toBe(true);
    expect(recent('f', meta(1, 8))).toBe(false);
  });

  it('allOf requires every predicate and accepts everything when empty', () => {
    const p = allOf(minSize(5), byGlob('*.txt'));
    expect(p('a.txt', meta(5))).toBe(true);
    expect(p('a.txt', meta(4))).toBe(false);
    expect(p('a.md', meta(5))).toBe(false);
    expect(allOf()('anything', meta(0))).toBe(true);
  });
});

describe('buildFileFilter', () => {
  it('returns null when no option is set', () => {
    expect(buildFileFilter({})).toBeNull();
  });

  it('composes every option that is set', () => {
    const filter = buildFileFilter({ glob: '*.log', minSize: 100, changedWithinDays: 1 }, NOW);
    expect(filter).not.toBeNull();
    expect(filter?.('logs/app.log', meta(200, 0))).toBe(true);
    expect(filter?.('logs/app.log', meta(50, 0))).toBe(false);
    expect(filter?.('logs/app.log', meta(200, 2))).toBe(false);
    expect(filter?.('logs/app.txt', meta(200, 0))).toBe(false);
  });

  it('compiles the regex option', () => {
    const filter = buildFileFilter({ regex: '^IMG_\\d+' });
    expect(filter?.('dcim/IMG_0042.jpg', meta(1))).toBe(true);
    expect(filter?.('dcim/VID_0042.mp4', meta(1))).toBe(false);
  });

  it('throws SyntaxError for an invalid regex', () => {
    expect(() => buildFileFilter({ regex: '(' })).toThrow(SyntaxError);
  });
});
