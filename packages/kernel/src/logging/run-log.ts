/**
 * Tapir Kernel — Run Logger
 *
 * Records what a compute or verify run did: when it started, each file it
 * hashed or failed on, and how it ended. Events are structured so they can
 * be appended to a JSONL audit log.
 *
 * The logger accepts an injected LogSink for persistence. If no sink is
 * injected (tests, library use) every call is a no-op.
 */

import type { LogSink } from './log-sink.js';
import type { TapirErrorCode } from '../types/errors.js';

export type RunKind = 'compute' | 'verify';

export type RunEvent =
  | {
      readonly type: 'run.started';
      readonly run: RunKind;
      readonly timestamp: string;
      readonly inputs: ReadonlyArray<string>;
    }
  | {
      readonly type: 'file.hashed';
      readonly run: RunKind;
      readonly timestamp: string;
      readonly path: string;
      readonly digest: string;
      readonly size: number;
    }
  | {
      readonly type: 'file.failed';
      readonly run: RunKind;
      readonly timestamp: string;
      readonly path: string;
      readonly code: TapirErrorCode;
      readonly message: string;
    }
  | {
      readonly type: 'run.completed';
      readonly run: RunKind;
      readonly timestamp: string;
      readonly summary: Readonly<Record<string, number>>;
    }
  | {
      readonly type: 'run.failed';
      readonly run: RunKind;
      readonly timestamp: string;
      readonly code: TapirErrorCode | 'Unknown';
      readonly message: string;
    };

/**
 * Scoped to one pipeline invocation. The clock is injectable so tests can
 * assert exact timestamps.
 */
export class RunLogger {
  constructor(
    private readonly run: RunKind,
    private readonly sink?: LogSink,
    private readonly clock: () => string = () => new Date().toISOString(),
  ) {}

  started(inputs: ReadonlyArray<string>): void {
    this.sink?.append({ type: 'run.started', run: this.run, timestamp: this.clock(), inputs });
  }

  hashed(path: string, digest: string, size: number): void {
    this.sink?.append({ type: 'file.hashed', run: this.run, timestamp: this.clock(), path, digest, size });
  }

  failed(path: string, code: TapirErrorCode, message: string): void {
    this.sink?.append({ type: 'file.failed', run: this.run, timestamp: this.clock(), path, code, message });
  }

  completed(summary: Readonly<Record<string, number>>): void {
    this.sink?.append({ type: 'run.completed', run: this.run, timestamp: this.clock(), summary });
  }

  aborted(code: TapirErrorCode | 'Unknown', message: string): void {
    this.sink?.append({ type: 'run.failed', run: this.run, timestamp: this.clock(), code, message });
  }
}
