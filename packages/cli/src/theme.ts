import chalk, { type ChalkInstance } from 'chalk'
import type { ChangeAction } from '@wharf/kernel'

export const t = {
  blue:       chalk.hex('#4FC3F7'),
  blueBright: chalk.hex('#81D4FA'),
  text:       chalk.hex('#C8C8C0'),
  white:      chalk.hex('#F2F2EC'),
  muted:      chalk.hex('#666666'),
  amber:      chalk.hex('#D4880A'),
  green:      chalk.hex('#81C784'),
  red:        chalk.hex('#CF6679'),
} as const

const _actionColors: Record<ChangeAction, ChalkInstance> = {
  create:  t.green,
  update:  t.amber,
  replace: t.amber,
  delete:  t.red,
}

const _actionSymbols: Record<ChangeAction, string> = {
  create:  '+',
  update:  '~',
  replace: '-/+',
  delete:  '-',
}

export const actionColor = (action: ChangeAction): ChalkInstance =>
  _actionColors[action]

export const actionSymbol = (action: ChangeAction): string =>
  _actionSymbols[action]
