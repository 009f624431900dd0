import { describe, it, expect } from 'vitest'
import { stripVTControlCharacters } from 'node:util'
import { ComputeFailedError, HashIOError, NotFoundError, VanishedError, toDigest } from '@tapir/kernel'
import type { Digest, VerifyResult } from '@tapir/kernel'
import type { ComputeResult } from '@tapir/runtime-host'
import {
  computeJson,
  errorJson,
  renderComputeFailure,
  renderComputeSummary,
  renderFatal,
  renderVerifyReport,
  verifyJson,
} from '../src/output/render.js'

const plain = (s: string): string => stripVTControlCharacters(s)

const HELLO_HEX = '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
const HELLP_HEX = 'fdd7585e08c4e2afd71dcabdb4636c89d557a3f42db9e2040c8bbd1708aa4ce7'

function digest(hex: string): Digest {
  const d = toDigest(hex)
  if (d === null) throw new Error(`bad fixture digest ${hex}`)
  return d
}

const computed: ComputeResult = {
  records: [
    { path: 'd/a.txt', digest: digest(HELLO_HEX), size: 5 },
    { path: 'd/b.txt', digest: digest(HELLO_HEX), size: 1531 },
  ],
  text: '',
  destination: 'sums.sha256',
  totalBytes: 1536,
}

const ioError = new HashIOError('d/x', new Error('EIO'))

const drifted: VerifyResult = {
  report: { unchanged: ['d/u.txt'], modified: ['d/a.txt'], missing: ['d/b.txt'], added: ['d/c.txt'] },
  mismatches: [{ path: 'd/a.txt', expected: digest(HELLO_HEX), actual: digest(HELLP_HEX) }],
  errors: [{ path: 'd/x', error: ioError }],
  checked: 4,
  clean: false,
}

describe('compute rendering', () => {
  it('summarizes a successful run', () => {
    expect(plain(renderComputeSummary(computed))).toBe('  ✓ hashed 2 files (1.50 KB) → sums.sha256\n')
  })

  it('names stdout when there is no destination', () => {
    expect(plain(renderComputeSummary({ ...computed, destination: null }))).toBe(
      '  ✓ hashed 2 files (1.50 KB) → stdout\n',
    )
  })

  it('lists every failure', () => {
    const err = new ComputeFailedError([{ path: 'd/b.txt', error: new VanishedError('d/b.txt') }], 2)
    expect(plain(renderComputeFailure(err))).toBe(
      '  ✗ 1 of 2 files could not be hashed; no manifest written\n' +
      '    d/b.txt  file vanished: d/b.txt\n',
    )
  })

  it('emits records as JSON', () => {
    expect(JSON.parse(computeJson(computed))).toEqual({
      destination: 'sums.sha256',
      total_bytes: 1536,
      files: [
        { path: 'd/a.txt', digest: HELLO_HEX, size: 5 },
        { path: 'd/b.txt', digest: HELLO_HEX, size: 1531 },
      ],
    })
  })
})

describe('verify rendering', () => {
  it('lists drift by kind, then errors, then the verdict', () => {
    expect(plain(renderVerifyReport(drifted))).toBe(
      '  modified  d/a.txt\n' +
      `              expected ${HELLO_HEX}\n` +
      `              actual   ${HELLP_HEX}\n` +
      '  missing   d/b.txt\n' +
      '  added     d/c.txt\n' +
      '  error     d/x  cannot read d/x: EIO\n' +
      '  ✗ 1 modified, 1 missing, 1 added, 1 error (1 unchanged)\n',
    )
  })

  it('prints a single line for a clean result', () => {
    const clean: VerifyResult = {
      report: { unchanged: ['a', 'b'], modified: [], missing: [], added: [] },
      mismatches: [],
      errors: [],
      checked: 2,
      clean: true,
    }
    expect(plain(renderVerifyReport(clean))).toBe('  ✓ clean: 2 files verified\n')
  })

  it('emits the report as JSON', () => {
    expect(JSON.parse(verifyJson(drifted))).toEqual({
      clean: false,
      checked: 4,
      unchanged: ['d/u.txt'],
      modified: ['d/a.txt'],
      missing: ['d/b.txt'],
      added: ['d/c.txt'],
      mismatches: [{ path: 'd/a.txt', expected: HELLO_HEX, actual: HELLP_HEX }],
      errors: [{ path: 'd/x', code: 'IOError', message: 'cannot read d/x: EIO' }],
    })
  })

  it('shows the recorded and current digest of each modified file', () => {
    const onlyModified: VerifyResult = {
      report: { unchanged: [], modified: ['d/a.txt'], missing: [], added: [] },
      mismatches: [{ path: 'd/a.txt', expected: digest(HELLO_HEX), actual: digest(HELLP_HEX) }],
      errors: [],
      checked: 1,
      clean: false,
    }
    const lines = plain(renderVerifyReport(onlyModified)).split('\n')
    expect(lines.slice(0, 3)).toEqual([
      '  modified  d/a.txt',
      `              expected ${HELLO_HEX}`,
      `              actual   ${HELLP_HEX}`,
    ])
  })
})

describe('fatal rendering', () => {
  it('prints the code and message', () => {
    expect(plain(renderFatal(new NotFoundError('sums.sha256', 'manifest')))).toBe(
      '  ✗ NotFound  manifest not found: sums.sha256\n',
    )
  })

  it('includes per-file failures in JSON for a failed compute', () => {
    const err = new ComputeFailedError([{ path: 'd/x', error: ioError }], 3)
    expect(JSON.parse(errorJson(err))).toEqual({
      error: {
        code: 'ComputeFailed',
        message: '1 of 3 file(s) could not be hashed:\n  d/x: cannot read d/x: EIO',
        failures: [{ path: 'd/x', code: 'IOError', message: 'cannot read d/x: EIO' }],
      },
    })
  })
})
