/**
 * Text Layout Grouping
 *
 * Rebuilds layout text blocks from positioned text fragments: fragments on a
 * shared baseline become lines, and vertically adjacent, horizontally
 * overlapping lines become blocks. Side-by-side columns end up in separate
 * blocks because large horizontal gaps split lines.
 */

import type { TextFragment } from './types'

/** Max horizontal gap inside a line, in average character widths */
const CHAR_MARGIN = 2.0
/** Gap, in average character widths, that reads as a space between fragments */
const WORD_MARGIN = 0.1
/** Max gap between lines of a block, as a share of line height */
const LINE_MARGIN = 0.5
/** Baseline difference within which fragments share a line, as a share of height */
const BASELINE_TOLERANCE = 0.5

// ============================================================================
// Types
// ============================================================================

export interface TextLine {
  text: string
  x0: number
  x1: number
  /** Baseline */
  y: number
  height: number
}

export interface TextBlock {
  lines: TextLine[]
  x0: number
  x1: number
}

// ============================================================================
// Grouping
// ============================================================================

/**
 * Group a page's fragments into text blocks and return each block's text:
 * every line followed by a newline.
 */
export function groupTextBlocks(fragments: readonly TextFragment[]): string[] {
  return groupLinesIntoBlocks(groupIntoLines(fragments)).map(blockText)
}

export function blockText(block: TextBlock): string {
  return block.lines.map(line => `${line.text}\n`).join('')
}

/**
 * Fragments sharing a baseline, split wherever the horizontal gap exceeds
 * the character margin. Whitespace-only fragments are dropped.
 */
export function groupIntoLines(fragments: readonly TextFragment[]): TextLine[] {
  const visible = fragments
    .filter(f => f.text.trim().length > 0)
    .sort((a, b) => b.y - a.y || a.x - b.x)

  const rows: TextFragment[][] = []
  for (const fragment of visible) {
    const row = rows[rows.length - 1]
    const tolerance = Math.max(fragment.height, 1) * BASELINE_TOLERANCE
    if (row && Math.abs(row[0].y - fragment.y) <= tolerance) {
      row.push(fragment)
    } else {
      rows.push([fragment])
    }
  }

  return rows.flatMap(row => splitRow(row.sort((a, b) => a.x - b.x)))
}

function splitRow(row: readonly TextFragment[]): TextLine[] {
  const lines: TextLine[] = []
  let current: TextLine | null = null
  let previous: TextFragment | null = null

  for (const fragment of row) {
    if (current && previous) {
      const gap = fragment.x - current.x1
      const charWidth = Math.max(averageCharWidth(previous), averageCharWidth(fragment))

      if (gap <= CHAR_MARGIN * charWidth) {
        const separator = gap > WORD_MARGIN * charWidth
            && !current.text.endsWith(' ')
            && !fragment.text.startsWith(' ')
          ? ' '
          : ''
        current.text += separator + fragment.text
        current.x1 = Math.max(current.x1, fragment.x + fragment.width)
        current.height = Math.max(current.height, fragment.height)
        previous = fragment
        continue
      }
    }

    current = {
      text: fragment.text,
      x0: fragment.x,
      x1: fragment.x + fragment.width,
      y: fragment.y,
      height: fragment.height,
    }
    lines.push(current)
    previous = fragment
  }

  return lines
}

/**
 * Lines, top to bottom, joined into the block directly above them when the
 * vertical gap is within the line margin and they overlap horizontally.
 */
export function groupLinesIntoBlocks(lines: readonly TextLine[]): TextBlock[] {
  const sorted = [...lines].sort((a, b) => b.y - a.y || a.x0 - b.x0)
  const blocks: TextBlock[] = []

  for (const line of sorted) {
    const block = blocks.find(candidate => continuesBlock(candidate, line))
    if (block) {
      block.lines.push(line)
      block.x0 = Math.min(block.x0, line.x0)
      block.x1 = Math.max(block.x1, line.x1)
    } else {
      blocks.push({ lines: [line], x0: line.x0, x1: line.x1 })
    }
  }

  return blocks
}

function continuesBlock(block: TextBlock, line: TextLine): boolean {
  const last = block.lines[block.lines.length - 1]
  const height = Math.max(last.height, line.height)
  const gap = last.y - line.y - height

  const overlaps = line.x0 < last.x1 && line.x1 > last.x0
  return overlaps && gap >= -height && gap <= LINE_MARGIN * height
}

function averageCharWidth(fragment: TextFragment): number {
  const length = fragment.text.length
  return length > 0 ? fragment.width / length : 0
}
