/**
 * Tapir Kernel — Manifest Codec
 *
 * Encodes and decodes the durable manifest format. The layout is the one
 * written by `sha256sum`, so either tool can check the other's output:
 *
 *   <64-hex-digest><two spaces><path>\n
 *
 * No header line, no trailing metadata. An empty manifest is the empty
 * string.
 *
 * Paths containing a backslash, newline or carriage return use the
 * coreutils escaped form: the line starts with `\` and the path spells those
 * characters as `\\`, `\n` and `\r`. A path that starts with a space also
 * uses the escaped form, with that first space written as `\ `; otherwise
 * the decoder would take it as part of the separator.
 *
 * Paths are never normalized. Whatever string the caller hashed under is the
 * string verify will look up.
 */

import { toDigest } from '../types/record.js';
import type { Manifest, ManifestEntry } from '../types/record.js';
import { DuplicatePathError, ManifestCorruptError } from '../types/errors.js';

// ---------------------------------------------------------------------------
// Escaping
// ---------------------------------------------------------------------------

const NEEDS_ESCAPE = /[\\\n\r]|^ /;

function escapePath(path: string): string {
  const escaped = path.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/\r/g, '\\r');
  return escaped.startsWith(' ') ? '\\' + escaped : escaped;
}

/**
 * Reverse escapePath().
 *
 * @returns The unescaped path, or null if an unknown escape sequence or a
 *   dangling backslash is present
 */
function unescapePath(escaped: string): string | null {
  let out = '';
  for (let i = 0; i < escaped.length; i++) {
    const ch = escaped[i];
    if (ch !== '\\') {
      out += ch;
      continue;
    }
    const next = escaped[i + 1];
    if (next === '\\') out += '\\';
    else if (next === 'n') out += '\n';
    else if (next === 'r') out += '\r';
    else if (next === ' ' && i === 0) out += ' ';
    else return null;
    i++;
  }
  return out;
}

// ---------------------------------------------------------------------------
// Encode
// ---------------------------------------------------------------------------

/** Render one entry as a manifest line, including the trailing newline. */
export function encodeEntry(entry: ManifestEntry): string {
  if (NEEDS_ESCAPE.test(entry.path)) {
    return `\\${entry.digest}  ${escapePath(entry.path)}\n`;
  }
  return `${entry.digest}  ${entry.path}\n`;
}

/**
 * Serialize entries in the order given.
 *
 * @throws {DuplicatePathError} If two entries share a path. Such a manifest
 *   could never be decoded again.
 */
export function encodeManifest(entries: Manifest): string {
  const seen = new Set<string>();
  let out = '';
  entries.forEach((entry, i) => {
    if (seen.has(entry.path)) throw new DuplicatePathError(i + 1, entry.path);
    seen.add(entry.path);
    out += encodeEntry(entry);
  });
  return out;
}

// ---------------------------------------------------------------------------
// Decode
// ---------------------------------------------------------------------------

/**
 * Split at the first run of two or more spaces. The `s` flag lets paths
 * carry any character other than the newline that ended the line.
 */
const LINE_SHAPE = /^(.*?) {2,}(.*)$/s;

/**
 * Parse manifest text.
 *
 * Blank (whitespace-only) lines are skipped but still counted, so line
 * numbers in errors match what an editor shows. A single trailing `\r` is
 * dropped from each line so CRLF manifests parse.
 *
 * @throws {ManifestCorruptError} Naming the 1-based line that does not match
 *   `<digest>  <path>`
 * @throws {DuplicatePathError} Naming the line where a path repeats
 */
export function decodeManifest(text: string): ManifestEntry[] {
  const entries: ManifestEntry[] = [];
  const seen = new Set<string>();
  const lines = text.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const lineNo = i + 1;
    let raw = lines[i] ?? '';
    if (raw.endsWith('\r')) raw = raw.slice(0, -1);
    if (raw.trim() === '') continue;

    const escaped = raw.startsWith('\\');
    const body = escaped ? raw.slice(1) : raw;

    const match = LINE_SHAPE.exec(body);
    if (match === null) {
      throw new ManifestCorruptError(lineNo, "expected '<digest>  <path>' separated by two spaces");
    }
    const [, digestText = '', pathText = ''] = match;

    const digest = toDigest(digestText);
    if (digest === null) {
      throw new ManifestCorruptError(lineNo, `invalid digest ${JSON.stringify(digestText)}`);
    }
    if (pathText === '') {
      throw new ManifestCorruptError(lineNo, 'missing path');
    }

    const path = escaped ? unescapePath(pathText) : pathText;
    if (path === null) {
      throw new ManifestCorruptError(lineNo, `invalid escape sequence in ${JSON.stringify(pathText)}`);
    }
    if (seen.has(path)) {
      throw new DuplicatePathError(lineNo, path);
    }
    seen.add(path);
    entries.push({ path, digest });
  }

  return entries;
}
