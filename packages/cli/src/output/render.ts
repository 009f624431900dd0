import type { ComputeResult } from '@tapir/runtime-host'
import { ComputeFailedError } from '@tapir/kernel'
import type { PathFailure, TapirError, VerifyResult } from '@tapir/kernel'
import { t, kindColor } from './theme.js'
import type { DiffKind } from './theme.js'
import { humanSize, plural } from './format.js'

/**
 * Renderers return strings; the commands decide which stream they go to.
 * Human output is colored with the chalk palette, JSON output is not.
 */

// Column width for the kind label in verify listings ("unchanged" + 1).
const KIND_W = 10

const kindLabel = (kind: DiffKind): string =>
  kindColor(kind)(kind + ' '.repeat(Math.max(1, KIND_W - kind.length)))

// ---------------------------------------------------------------------------
// compute
// ---------------------------------------------------------------------------

/**
 * renderComputeSummary — one status line after a successful compute.
 *
 *   ✓ hashed 2 files (10 B) → sums.sha256
 */
export function renderComputeSummary(result: ComputeResult): string {
  const dest = result.destination ?? 'stdout'
  return (
    '  ' + t.green('✓') + ' ' +
    t.text(`hashed ${plural(result.records.length, 'file')} (${humanSize(result.totalBytes)})`) +
    t.dim(' → ') + t.white(dest) + '\n'
  )
}

const failureLine = (f: PathFailure): string =>
  '    ' + t.white(f.path) + '  ' + t.muted(f.error.message) + '\n'

/**
 * renderComputeFailure — compute ran but some files could not be hashed.
 * No manifest was written.
 */
export function renderComputeFailure(err: ComputeFailedError): string {
  let out = (
    '  ' + t.red('✗') + ' ' +
    t.text(`${err.failures.length} of ${plural(err.total, 'file')} could not be hashed; no manifest written`) +
    '\n'
  )
  for (const f of err.failures) out += failureLine(f)
  return out
}

// ---------------------------------------------------------------------------
// verify
// ---------------------------------------------------------------------------

/**
 * renderVerifyReport — drift listing followed by a one-line verdict.
 *
 * Unchanged paths are counted, not listed.
 */
export function renderVerifyReport(result: VerifyResult): string {
  const { report } = result
  let out = ''

  // modified entries show both digests:
  //   modified  d/a.txt
  //               expected 2cf24dba…
  //               actual   fdd7585e…
  const indent = ' '.repeat(2 + KIND_W + 2)
  for (const m of result.mismatches) {
    out += '  ' + kindLabel('modified') + t.white(m.path) + '\n'
    out += indent + t.muted('expected ') + t.text(m.expected) + '\n'
    out += indent + t.muted('actual   ') + t.amber(m.actual) + '\n'
  }

  const listed: ReadonlyArray<readonly [DiffKind, ReadonlyArray<string>]> = [
    ['missing', report.missing],
    ['added', report.added],
  ]
  for (const [kind, paths] of listed) {
    for (const path of paths) out += '  ' + kindLabel(kind) + t.white(path) + '\n'
  }
  for (const f of result.errors) {
    out += '  ' + kindLabel('error') + t.white(f.path) + '  ' + t.muted(f.error.message) + '\n'
  }

  if (result.clean) {
    out += '  ' + t.green('✓') + ' ' + t.text(`clean: ${plural(result.checked, 'file')} verified`) + '\n'
    return out
  }

  const counts = [
    `${report.modified.length} modified`,
    `${report.missing.length} missing`,
    `${report.added.length} added`,
    plural(result.errors.length, 'error'),
  ].join(', ')
  out += (
    '  ' + t.red('✗') + ' ' + t.text(counts) +
    t.dim(` (${report.unchanged.length} unchanged)`) + '\n'
  )
  return out
}

// ---------------------------------------------------------------------------
// fatal
// ---------------------------------------------------------------------------

/** renderFatal — the operation failed entirely. */
export function renderFatal(err: TapirError): string {
  return '  ' + t.red('✗') + ' ' + t.red(err.code) + '  ' + t.text(err.message) + '\n'
}

// ---------------------------------------------------------------------------
// JSON
// ---------------------------------------------------------------------------

const failureJson = (f: PathFailure) => ({ path: f.path, code: f.error.code, message: f.error.message })

export function computeJson(result: ComputeResult): string {
  return JSON.stringify({
    destination: result.destination,
    total_bytes: result.totalBytes,
    files: result.records.map((r) => ({ path: r.path, digest: r.digest, size: r.size })),
  }, null, 2) + '\n'
}

export function verifyJson(result: VerifyResult): string {
  return JSON.stringify({
    clean: result.clean,
    checked: result.checked,
    unchanged: result.report.unchanged,
    modified: result.report.modified,
    missing: result.report.missing,
    added: result.report.added,
    mismatches: result.mismatches.map((m) => ({ path: m.path, expected: m.expected, actual: m.actual })),
    errors: result.errors.map(failureJson),
  }, null, 2) + '\n'
}

export function errorJson(err: TapirError): string {
  return JSON.stringify({
    error: {
      code: err.code,
      message: err.message,
      ...(err instanceof ComputeFailedError ? { failures: err.failures.map(failureJson) } : {}),
    },
  }, null, 2) + '\n'
}
