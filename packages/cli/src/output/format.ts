/**
 * Plain-text formatting helpers shared by the command renderers.
 */

const UNITS = ['B', 'KB', 'MB', 'GB', 'TB'] as const

/**
 * Render a byte count with a binary unit: whole bytes below 1 KB, two
 * decimals above, topping out at TB.
 *
 * @example
 * humanSize(512)        // '512 B'
 * humanSize(1536)       // '1.50 KB'
 * humanSize(1048576)    // '1.00 MB'
 */
export function humanSize(bytes: number): string {
  let value = bytes
  for (const unit of UNITS) {
    if (value < 1024 || unit === 'TB') {
      return unit === 'B' ? `${value} ${unit}` : `${value.toFixed(2)} ${unit}`
    }
    value /= 1024
  }
  return `${value.toFixed(2)} TB`
}

/** `1 file`, `2 files`. */
export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`
}
