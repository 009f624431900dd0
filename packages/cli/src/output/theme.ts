import chalk, { type ChalkInstance } from 'chalk'

export const t = {
  text:  chalk.hex('#C8C8C0'),
  white: chalk.hex('#F2F2EC'),
  dim:   chalk.hex('#444444'),
  muted: chalk.hex('#666666'),
  blue:  chalk.hex('#4FC3F7'),
  amber: chalk.hex('#D4880A'),
  green: chalk.hex('#81C784'),
  red:   chalk.hex('#CF6679'),
} as const

export type DiffKind = 'unchanged' | 'modified' | 'missing' | 'added' | 'error'

const _kindColors: Record<DiffKind, ChalkInstance> = {
  unchanged: t.green,
  modified:  t.amber,
  missing:   t.red,
  added:     t.blue,
  error:     t.red,
}

export const kindColor = (kind: DiffKind): ChalkInstance => _kindColors[kind]
