/**
 * Tapir Runtime Host — Run Log Sinks
 *
 * Implementations of the kernel's LogSink interface.
 *
 *   FileLogSink   — appends each run event as one JSONL line to a log file
 *   MemoryLogSink — keeps events in memory for tests
 *
 * FileLogSink is synchronous: the line is on disk before append() returns,
 * so a crash mid-run still leaves every event recorded up to that point.
 * Each line carries a ULID `event_id` so logs merged from several machines
 * can be deduplicated and sorted.
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { LogSink, RunEvent } from '@tapir/kernel';
import { ulid } from './ulid.js';

export class FileLogSink implements LogSink {
  constructor(private readonly logPath: string) {}

  append(event: RunEvent): void {
    const line = JSON.stringify({ event_id: ulid(), ...event });
    mkdirSync(dirname(this.logPath), { recursive: true });
    appendFileSync(this.logPath, line + '\n', 'utf-8');
  }
}

export class MemoryLogSink implements LogSink {
  private readonly events: RunEvent[] = [];

  append(event: RunEvent): void {
    this.events.push(event);
  }

  /** Every event appended so far, oldest first. */
  readEvents(): ReadonlyArray<RunEvent> {
    return this.events;
  }
}
