/**
 * Tapir Runtime Host — Node errno helpers
 */

/** The errno code of a Node.js system error, or undefined for anything else. */
export function errnoCode(err: unknown): string | undefined {
  if (err !== null && typeof err === 'object' && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/** Narrow an unknown error to a Node.js errno exception with a specific code. */
export function isNodeError(err: unknown, code: string): boolean {
  return errnoCode(err) === code;
}

/**
 * ENOENT, or ENOTDIR when a path component that used to be a directory was
 * replaced by a file. Both mean "the thing is no longer there".
 */
export function isGone(err: unknown): boolean {
  const code = errnoCode(err);
  return code === 'ENOENT' || code === 'ENOTDIR';
}
