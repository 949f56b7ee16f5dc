import chalk, { type ChalkInstance } from 'chalk'

export const t = {
  blue:   chalk.hex('#4FC3F7'),
  white:  chalk.hex('#F2F2EC'),
  dim:    chalk.hex('#444444'),
  muted:  chalk.hex('#666666'),
  amber:  chalk.hex('#D4880A'),
  red:    chalk.hex('#CF6679'),
} as const

const _operationColors: Record<string, ChalkInstance> = {
  anyOf: t.blue,
  allOf: t.amber,
}

export const operationColor = (operation: string): ChalkInstance =>
  _operationColors[operation] ?? t.muted

/** Singletons stand out from ordinary rules in printed results. */
export const resultColor = (formatted: string): ChalkInstance => {
  if (formatted === 'nothing') return t.muted
  if (formatted === 'everything') return t.red
  return t.white
}
