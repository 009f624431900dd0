/**
 * Tapir Runtime Host — Verify Pipeline Tests
 *
 * The main scenario: compute a manifest for d/{a,b}.txt, then change the
 * tree one way at a time and check which list each path lands in.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm, unlink, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { CancelledError, ManifestCorruptError, NotFoundError } from '@tapir/kernel';
import { computeManifest } from '../src/pipelines/compute.js';
import { verifyManifest } from '../src/pipelines/verify.js';
import { FileManifestSink } from '../src/sinks/manifest-sink.js';
import { MemoryLogSink } from '../src/logging/file-log-sink.js';

const HELLO = '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824';
const HELLP = 'fdd7585e08c4e2afd71dcabdb4636c89d557a3f42db9e2040c8bbd1708aa4ce7';

let dir: string;

async function write(rel: string, content: string): Promise<void> {
  const abs = join(dir, rel);
  await mkdir(dirname(abs), { recursive: true });
  await writeFile(abs, content);
}

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'tapir-verify-'));
  await write('d/a.txt', 'hello');
  await write('d/b.txt', 'world');
  await computeManifest({ inputs: ['d'], cwd: dir, sink: new FileManifestSink('sums.sha256', dir) });
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('verifyManifest', () => {
  it('reports an untouched tree as clean', async () => {
    const result = await verifyManifest({ manifestPath: 'sums.sha256', cwd: dir });
    expect(result.report).toEqual({ unchanged: ['d/a.txt', 'd/b.txt'], modified: [], missing: [], added: [] });
    expect(result.errors).toEqual([]);
    expect(result.checked).toBe(2);
    expect(result.clean).toBe(true);
  });

  it('detects a one-byte change as modified', async () => {
    await write('d/a.txt', 'hellp');
    const result = await verifyManifest({ manifestPath: 'sums.sha256', cwd: dir });
    expect(result.report.modified).toEqual(['d/a.txt']);
    expect(result.report.unchanged).toEqual(['d/b.txt']);
    expect(result.mismatches).toEqual([{ path: 'd/a.txt', expected: HELLO, actual: HELLP }]);
    expect(result.clean).toBe(false);
  });

  it('reports a deleted file as missing', async () => {
    await unlink(join(dir, 'd', 'b.txt'));
    const result = await verifyManifest({ manifestPath: 'sums.sha256', cwd: dir });
    expect(result.report.missing).toEqual(['d/b.txt']);
    expect(result.errors).toEqual([]);
  });

  it('reports new files under the scan root as added', async () => {
    await write('d/c.txt', 'new');
    await write('d/sub/e.txt', 'new');
    const result = await verifyManifest({ manifestPath: 'sums.sha256', cwd: dir, root: 'd' });
    expect(result.report.added).toEqual(['d/c.txt', 'd/sub/e.txt']);
    expect(result.report.unchanged).toEqual(['d/a.txt', 'd/b.txt']);
  });

  it('does not report a manifest stored under the scan root as added', async () => {
    await computeManifest({ inputs: ['d'], cwd: dir, sink: new FileManifestSink('d/sums.sha256', dir) });
    const result = await verifyManifest({ manifestPath: 'd/sums.sha256', cwd: dir, root: 'd' });
    expect(result.report).toEqual({ unchanged: ['d/a.txt', 'd/b.txt'], modified: [], missing: [], added: [] });
    expect(result.clean).toBe(true);
  });

  it('still reports other new files beside an inner manifest', async () => {
    await computeManifest({ inputs: ['d'], cwd: dir, sink: new FileManifestSink('d/sums.sha256', dir) });
    await write('d/c.txt', 'new');
    const result = await verifyManifest({ manifestPath: 'd/sums.sha256', cwd: dir, root: 'd' });
    expect(result.report.added).toEqual(['d/c.txt']);
  });

  it('never reports added without a scan root', async () => {
    await write('d/c.txt', 'new');
    const result = await verifyManifest({ manifestPath: 'sums.sha256', cwd: dir });
    expect(result.report.added).toEqual([]);
    expect(result.clean).toBe(true);
  });

  it('treats a differently spelled root as different paths', async () => {
    const result = await verifyManifest({ manifestPath: 'sums.sha256', cwd: dir, root: './d' });
    expect(result.report.unchanged).toEqual(['d/a.txt', 'd/b.txt']);
    expect(result.report.added).toEqual(['./d/a.txt', './d/b.txt']);
  });

  it('reports an unreadable entry as an error, not drift', async () => {
    await writeFile(join(dir, 'dir.sha256'), `${HELLO}  d/a.txt\n${HELLO}  d\n`);
    const result = await verifyManifest({ manifestPath: 'dir.sha256', cwd: dir });

    expect(result.report).toEqual({ unchanged: ['d/a.txt'], modified: [], missing: [], added: [] });
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]?.path).toBe('d');
    expect(result.errors[0]?.error.code).toBe('IOError');
    expect(result.clean).toBe(false);
  });

  it('verifies an empty manifest as clean', async () => {
    await writeFile(join(dir, 'empty.sha256'), '');
    const result = await verifyManifest({ manifestPath: 'empty.sha256', cwd: dir });
    expect(result.checked).toBe(0);
    expect(result.clean).toBe(true);
  });

  it('fails with NotFoundError when the manifest does not exist', async () => {
    const err = await verifyManifest({ manifestPath: 'nope.sha256', cwd: dir }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(NotFoundError);
    expect(err).toHaveProperty('message', 'manifest not found: nope.sha256');
  });

  it('fails with NotFoundError when the scan root does not exist', async () => {
    const err = await verifyManifest({ manifestPath: 'sums.sha256', cwd: dir, root: 'gone' }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(NotFoundError);
    expect(err).toHaveProperty('message', 'scan root not found: gone');
  });

  it('fails with the line number of a corrupt manifest line', async () => {
    await writeFile(join(dir, 'bad.sha256'), `${HELLO}  d/a.txt\nthis is not a manifest line\n`);
    const logSink = new MemoryLogSink();
    const err = await verifyManifest({ manifestPath: 'bad.sha256', cwd: dir, logSink }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ManifestCorruptError);
    expect(err).toMatchObject({ code: 'ManifestCorrupt', line: 2 });
    expect(logSink.readEvents().at(-1)).toMatchObject({ type: 'run.failed', code: 'ManifestCorrupt' });
  });

  it('throws CancelledError when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const err = await verifyManifest({ manifestPath: 'sums.sha256', cwd: dir, signal: controller.signal })
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CancelledError);
  });

  it('logs a summary of the run', async () => {
    await write('d/a.txt', 'hellp');
    const logSink = new MemoryLogSink();
    await verifyManifest({ manifestPath: 'sums.sha256', cwd: dir, logSink });

    const last = logSink.readEvents().at(-1);
    expect(last).toMatchObject({
      type: 'run.completed',
      run: 'verify',
      summary: { checked: 2, unchanged: 1, modified: 1, missing: 0, added: 0, errors: 0, drift: 1 },
    });
  });
});
