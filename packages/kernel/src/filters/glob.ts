/**
 * Tapir Kernel — Glob Matching
 *
 * Pure, deterministic glob-to-regex conversion for path filters.
 *
 * Supported glob syntax:
 * - `*`  — matches any character sequence within a single path segment
 * - `?`  — matches exactly one character other than `/`
 * - `**` — matches any character sequence including path separators
 * - All other characters are treated as literals
 *
 * Normalization: leading `./` is stripped from both pattern and path before
 * matching so that `./docs/**` and `docs/**` behave identically.
 */

/**
 * Compile a glob pattern into an anchored RegExp.
 *
 * @param pattern - Glob pattern, e.g. `'src/*.ts'`
 */
function globToRegExp(pattern: string): RegExp {
  const normPattern = pattern.startsWith('./') ? pattern.slice(2) : pattern;

  // Segments between '**' delimiters are escaped and single-'*' expanded.
  // '**' delimiters become '.*' in the regex (match anything including '/').
  const segments = normPattern.split('**');
  let regexStr = '';
  for (let i = 0; i < segments.length; i++) {
    if (i > 0) regexStr += '.*';
    const seg = segments[i] ?? '';
    const escaped = seg
      .replace(/[.+^${}()|[\]\\]/g, '\\$&')
      .replace(/\*/g, '[^/]*')
      .replace(/\?/g, '[^/]');
    regexStr += escaped;
  }

  return new RegExp(`^${regexStr}$`, 's');
}

/**
 * Test whether a path satisfies a glob pattern.
 *
 * @example
 * matchesGlob('./docs/**',  './docs/specs/capabilities.md') // true
 * matchesGlob('./docs/**',  './package.json')               // false
 * matchesGlob('src/*.ts',   'src/index.ts')                 // true
 * matchesGlob('src/*.ts',   'src/sub/index.ts')             // false
 */
export function matchesGlob(pattern: string, path: string): boolean {
  const normPath = path.startsWith('./') ? path.slice(2) : path;
  return globToRegExp(pattern).test(normPath);
}
