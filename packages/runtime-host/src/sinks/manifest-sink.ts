/**
 * Tapir Runtime Host — Manifest Sinks
 *
 * Where compute delivers the encoded manifest text.
 *
 * Two implementations are provided:
 *   - FileManifestSink   — writes the text to a file (UTF-8, overwriting)
 *   - MemoryManifestSink — keeps the text in memory for tests and embedding
 *
 * When compute is given no sink it simply returns the text to its caller.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { TapirError } from '@tapir/kernel';

export interface ManifestSink {
  /**
   * Human-readable destination name for status output (a file path, or
   * `<memory>`).
   */
  readonly destination: string;

  /**
   * Path compute must leave out of enumeration, so a manifest written into
   * the tree it describes does not hash its own previous version.
   * Null when the sink is not a file.
   */
  readonly excludePath: string | null;

  write(text: string): Promise<void>;
}

/**
 * Writes the manifest to `<path>`, creating parent directories as needed.
 *
 * @throws {TapirError} With code IOError if the file cannot be written
 */
export class FileManifestSink implements ManifestSink {
  readonly destination: string;
  readonly excludePath: string;

  constructor(path: string, cwd: string = process.cwd()) {
    this.destination = path;
    this.excludePath = resolve(cwd, path);
  }

  async write(text: string): Promise<void> {
    try {
      await mkdir(dirname(this.excludePath), { recursive: true });
      await writeFile(this.excludePath, text, 'utf-8');
    } catch (err: unknown) {
      throw new TapirError('IOError', `cannot write manifest ${this.destination}: ${String(err)}`, {
        path: this.destination,
        cause: err,
      });
    }
  }
}

export class MemoryManifestSink implements ManifestSink {
  readonly destination = '<memory>';
  readonly excludePath = null;
  private written: string | null = null;

  async write(text: string): Promise<void> {
    this.written = text;
  }

  /** The last text written, or null if write() was never called. */
  read(): string | null {
    return this.written;
  }
}
