import type { BarColor } from '@sortphony/core'

export interface AsciiBarsOptions {
  /** Rows in the frame. Default: 8 */
  height?: number
  /** Value drawn at full height. Default: the number of bars */
  maxValue?: number
  /** Character above a bar */
  emptyChar?: string
  /** Character per bar color */
  glyphs?: Partial<Record<BarColor, string>>
}

const DEFAULT_GLYPHS: Record<BarColor, string> = {
  white: '|',
  red: 'R',
  green: 'G',
  cyan: 'C'
}

/**
 * Render bars as a text frame, one column per bar, top row first.
 */
export function renderAsciiBars(
  values: readonly number[],
  colors: readonly BarColor[],
  options: AsciiBarsOptions = {}
): string {
  const {
    height = 8,
    maxValue = values.length,
    emptyChar = ' '
  } = options
  const glyphs = { ...DEFAULT_GLYPHS, ...options.glyphs }

  const levels = values.map(value => Math.ceil(value / maxValue * height))
  const columns = values.map((_, i) => glyphs[colors[i] ?? 'white'])

  const lines: string[] = []
  for (let row = height; row >= 1; row--) {
    let line = ''
    for (let i = 0; i < values.length; i++) {
      line += levels[i] >= row ? columns[i] : emptyChar
    }
    lines.push(line)
  }
  return lines.join('\n')
}
