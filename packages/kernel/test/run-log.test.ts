/**
 * Tapir Kernel — RunLogger Tests
 *
 * The logger builds events; the sink decides where they go. These tests
 * use an in-test array sink and a fixed clock.
 */

import { describe, it, expect } from 'vitest';
import { RunLogger } from '../src/index.js';
import type { LogSink, RunEvent } from '../src/index.js';

class ArraySink implements LogSink {
  readonly events: RunEvent[] = [];

  append(event: RunEvent): void {
    this.events.push(event);
  }
}

const CLOCK = (): string => '2024-01-31T00:00:00.000Z';

describe('RunLogger', () => {
  it('records one event per call, tagged with run kind and timestamp', () => {
    const sink = new ArraySink();
    const log = new RunLogger('compute', sink, CLOCK);

    log.started(['photos']);
    log.hashed('photos/a.jpg', 'abc', 5);
    log.failed('photos/b.jpg', 'IOError', 'cannot read photos/b.jpg: EACCES');
    log.completed({ files: 1, bytes: 5 });

    expect(sink.events).toEqual([
      { type: 'run.started', run: 'compute', timestamp: '2024-01-31T00:00:00.000Z', inputs: ['photos'] },
      {
        type: 'file.hashed',
        run: 'compute',
        timestamp: '2024-01-31T00:00:00.000Z',
        path: 'photos/a.jpg',
        digest: 'abc',
        size: 5,
      },
      {
        type: 'file.failed',
        run: 'compute',
        timestamp: '2024-01-31T00:00:00.000Z',
        path: 'photos/b.jpg',
        code: 'IOError',
        message: 'cannot read photos/b.jpg: EACCES',
      },
      { type: 'run.completed', run: 'compute', timestamp: '2024-01-31T00:00:00.000Z', summary: { files: 1, bytes: 5 } },
    ]);
  });

  it('records an aborted run as run.failed', () => {
    const sink = new ArraySink();
    new RunLogger('verify', sink, CLOCK).aborted('NotFound', 'manifest not found: sums.sha256');
    expect(sink.events).toEqual([
      {
        type: 'run.failed',
        run: 'verify',
        timestamp: '2024-01-31T00:00:00.000Z',
        code: 'NotFound',
        message: 'manifest not found: sums.sha256',
      },
    ]);
  });

  it('is a no-op without a sink', () => {
    const log = new RunLogger('compute');
    expect(() => {
      log.started(['x']);
      log.completed({ files: 0 });
    }).not.toThrow();
  });
});
