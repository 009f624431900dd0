/**
 * Tapir Kernel — Error Types
 *
 * Every failure Tapir reports is a TapirError carrying a stable `code`.
 *
 * Two families:
 *   Structural — NotFound, InputNotFound, ManifestCorrupt, DuplicatePath,
 *     Cancelled, InvalidConfig. These abort the whole operation.
 *   Per-path — Vanished, IOError. These are collected as PathFailure values
 *     and reported alongside whatever succeeded. ComputeFailed aggregates
 *     them when compute cannot produce a manifest.
 */

export type TapirErrorCode =
  | 'NotFound'
  | 'InputNotFound'
  | 'Vanished'
  | 'IOError'
  | 'ManifestCorrupt'
  | 'DuplicatePath'
  | 'ComputeFailed'
  | 'Cancelled'
  | 'InvalidConfig';

export class TapirError extends Error {
  readonly code: TapirErrorCode;
  readonly path: string | undefined;

  constructor(code: TapirErrorCode, message: string, opts?: { path?: string; cause?: unknown }) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = 'TapirError';
    this.code = code;
    this.path = opts?.path;
  }
}

/** A manifest source or scan root does not exist. */
export class NotFoundError extends TapirError {
  constructor(path: string, what: string = 'path') {
    super('NotFound', `${what} not found: ${path}`, { path });
    this.name = 'NotFoundError';
  }
}

/** One or more top-level compute inputs do not exist. */
export class InputNotFoundError extends TapirError {
  readonly paths: ReadonlyArray<string>;

  constructor(paths: ReadonlyArray<string>) {
    super('InputNotFound', `input not found: ${paths.join(', ')}`, { path: paths[0] });
    this.name = 'InputNotFoundError';
    this.paths = paths;
  }
}

/** A file disappeared between enumeration and hashing. */
export class VanishedError extends TapirError {
  constructor(path: string, cause?: unknown) {
    super('Vanished', `file vanished: ${path}`, { path, cause });
    this.name = 'VanishedError';
  }
}

/** A file or directory could not be read (permissions, I/O failure, ...). */
export class HashIOError extends TapirError {
  constructor(path: string, cause?: unknown) {
    super('IOError', `cannot read ${path}: ${describeCause(cause)}`, { path, cause });
    this.name = 'HashIOError';
  }
}

/** A manifest line does not have the `<digest>  <path>` shape. */
export class ManifestCorruptError extends TapirError {
  readonly line: number;

  constructor(line: number, detail: string, code: 'ManifestCorrupt' | 'DuplicatePath' = 'ManifestCorrupt') {
    super(code, `manifest corrupt at line ${line}: ${detail}`);
    this.name = 'ManifestCorruptError';
    this.line = line;
  }
}

/** The same path appears on two manifest lines. */
export class DuplicatePathError extends ManifestCorruptError {
  constructor(line: number, path: string) {
    super(line, `duplicate path ${JSON.stringify(path)}`, 'DuplicatePath');
    this.name = 'DuplicatePathError';
  }
}

/** A per-path failure collected during a batch. */
export interface PathFailure {
  readonly path: string;
  readonly error: TapirError;
}

/** Compute could not hash every file; carries all per-path failures. */
export class ComputeFailedError extends TapirError {
  readonly failures: ReadonlyArray<PathFailure>;
  /** Files attempted, failed ones included. */
  readonly total: number;

  constructor(failures: ReadonlyArray<PathFailure>, total: number) {
    super(
      'ComputeFailed',
      `${failures.length} of ${total} file(s) could not be hashed:\n` +
        failures.map((f) => `  ${f.path}: ${f.error.message}`).join('\n'),
    );
    this.name = 'ComputeFailedError';
    this.failures = failures;
    this.total = total;
  }
}

/** The caller aborted the operation between files. */
export class CancelledError extends TapirError {
  constructor(reason?: unknown) {
    super('Cancelled', 'operation cancelled', { cause: reason });
    this.name = 'CancelledError';
  }
}

/** A configuration value (flag, env var) is invalid. */
export class ConfigError extends TapirError {
  constructor(message: string) {
    super('InvalidConfig', message);
    this.name = 'ConfigError';
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return cause === undefined ? 'unknown error' : String(cause);
}
