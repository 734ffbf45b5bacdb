/**
 * Table Complexity Classifier
 *
 * Scores one extracted table from five independent signals and maps the
 * score onto a three-level label. Pure and deterministic.
 */

import {
  EMPTY_CELL_RATIO_THRESHOLD,
  EMPTY_CELL_WEIGHT,
  HEADER_ROW_THRESHOLD,
  HEADER_SCAN_ROWS,
  HIGH_DENSITY_WEIGHT,
  LEXICAL_DENSITY_PERCENTILE,
  MODERATE_TABLE_MAX_SCORE,
  NESTED_CONTENT_WEIGHT,
  REPEATED_HEADER_WEIGHT,
  ROW_LENGTH_STDDEV_THRESHOLD,
  ROW_VARIATION_WEIGHT,
  SIMPLE_TABLE_MAX_SCORE,
  VERBOSE_CELL_TOKEN_LIMIT,
} from './constants'
import { mean, percentile, populationStdDev } from './statistics'
import type {
  Table,
  TableCell,
  TableComplexityLabel,
  TableComplexityResult,
  TableComplexitySignals,
} from './types'

// ============================================================================
// Classifier
// ============================================================================

/**
 * Classify a table's complexity.
 *
 * An empty table scores 0 (Simple); every ratio with a zero denominator
 * falls back to 0.
 */
export function classifyTable(table: Table): TableComplexityResult {
  const signals: TableComplexitySignals = {
    sparseCells: emptyCellRatio(table) > EMPTY_CELL_RATIO_THRESHOLD,
    irregularRows: populationStdDev(table.map(row => row.length)) > ROW_LENGTH_STDDEV_THRESHOLD,
    nestedContent: hasNestedContent(table),
    repeatedHeaders: countHeaderLikeRows(table) > HEADER_ROW_THRESHOLD,
    highLexicalDensity: hasHighLexicalDensity(table),
  }

  const score = scoreSignals(signals)

  return {
    score,
    label: labelForScore(score),
    signals,
  }
}

/**
 * Sum the weights of the triggered signals.
 * Rounded to one decimal so sums like 0.4 + 0.2 compare exactly against the
 * label thresholds.
 */
export function scoreSignals(signals: TableComplexitySignals): number {
  const raw = (signals.sparseCells ? EMPTY_CELL_WEIGHT : 0)
    + (signals.irregularRows ? ROW_VARIATION_WEIGHT : 0)
    + (signals.nestedContent ? NESTED_CONTENT_WEIGHT : 0)
    + (signals.repeatedHeaders ? REPEATED_HEADER_WEIGHT : 0)
    + (signals.highLexicalDensity ? HIGH_DENSITY_WEIGHT : 0)

  return Math.round(raw * 10) / 10
}

export function labelForScore(score: number): TableComplexityLabel {
  if (score <= SIMPLE_TABLE_MAX_SCORE) return 'Simple'
  if (score <= MODERATE_TABLE_MAX_SCORE) return 'Moderate'
  return 'Complex'
}

export function isComplexTable(table: Table): boolean {
  return classifyTable(table).label === 'Complex'
}

// ============================================================================
// Signals
// ============================================================================

/**
 * Blank cells over rows × longest row.
 */
export function emptyCellRatio(table: Table): number {
  const columnCount = table.reduce((max, row) => Math.max(max, row.length), 0)
  const totalCells = table.length * columnCount
  if (totalCells === 0) return 0

  let emptyCells = 0
  for (const row of table) {
    for (const cell of row) {
      if (isBlankCell(cell)) emptyCells++
    }
  }

  return emptyCells / totalCells
}

function hasNestedContent(table: Table): boolean {
  return table.some(row =>
    row.some(cell =>
      isNestedCell(cell) || tokenize(cellText(cell)).length > VERBOSE_CELL_TOKEN_LIMIT
    )
  )
}

/**
 * Count leading rows whose string cells are all non-empty and alphabetic.
 * Cells that are not strings do not disqualify a row.
 */
export function countHeaderLikeRows(table: Table): number {
  return table
    .slice(0, HEADER_SCAN_ROWS)
    .filter(row => row.every(cell => typeof cell !== 'string' || isAlphabetic(cell)))
    .length
}

/**
 * Compare the mean per-cell word count against the 75th percentile of the
 * same sample. For right-skewed counts the mean sits below that percentile,
 * so this rarely fires.
 */
function hasHighLexicalDensity(table: Table): boolean {
  const wordCounts = table.flatMap(row =>
    row.filter(isFilledCell).map(cell => tokenize(cellText(cell)).length)
  )
  if (wordCounts.length === 0) return false

  return mean(wordCounts) > percentile(wordCounts, LEXICAL_DENSITY_PERCENTILE)
}

// ============================================================================
// Cell helpers
// ============================================================================

function isNestedCell(cell: TableCell): cell is readonly TableCell[] {
  return Array.isArray(cell)
}

/** A cell with any content at all, whitespace included */
function isFilledCell(cell: TableCell): boolean {
  if (cell === null) return false
  return cell.length > 0
}

function isBlankCell(cell: TableCell): boolean {
  if (cell === null) return true
  if (isNestedCell(cell)) return cell.length === 0
  return cell.trim() === ''
}

/** Flattened text of a cell; nested values are joined with spaces */
export function cellText(cell: TableCell): string {
  if (cell === null) return ''
  if (isNestedCell(cell)) return cell.map(cellText).join(' ')
  return cell
}

function tokenize(text: string): string[] {
  return text.split(/\s+/).filter(token => token.length > 0)
}

function isAlphabetic(text: string): boolean {
  return /^\p{L}+$/u.test(text)
}
