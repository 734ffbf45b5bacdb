import { describe, expect, it } from 'vitest'
import {
  cellText,
  classifyTable,
  countHeaderLikeRows,
  emptyCellRatio,
  isComplexTable,
  labelForScore,
  scoreSignals,
} from '../../../src/lib/complexity/table-classifier'
import type { Table, TableComplexitySignals } from '../../../src/lib/complexity/types'

// =============================================================================
// Test Helpers
// =============================================================================

const NO_SIGNALS: TableComplexitySignals = {
  sparseCells: false,
  irregularRows: false,
  nestedContent: false,
  repeatedHeaders: false,
  highLexicalDensity: false,
}

function words(count: number): string {
  return Array.from({ length: count }, (_, i) => `w${i}`).join(' ')
}

/** rows × columns grid of numeric cells with the given positions blanked */
function numericGrid(rows: number, columns: number, blanks: ReadonlyArray<[number, number]>): Table {
  return Array.from({ length: rows }, (_, r) =>
    Array.from({ length: columns }, (_, c) =>
      blanks.some(([br, bc]) => br === r && bc === c) ? '' : String(r * columns + c)
    ))
}

// =============================================================================
// Tests
// =============================================================================

describe('classifyTable', () => {
  it('scores an empty table as Simple', () => {
    expect(classifyTable([])).toEqual({ score: 0, label: 'Simple', signals: NO_SIGNALS })
  })

  it('scores a regular numeric table as Simple', () => {
    const result = classifyTable(numericGrid(4, 3, []))
    expect(result.score).toBe(0)
    expect(result.label).toBe('Simple')
  })

  // ---------------------------------------------------------------------------
  // Empty cells
  // ---------------------------------------------------------------------------
  describe('empty cells', () => {
    it('does not fire at a ratio of exactly 0.2', () => {
      const table = numericGrid(5, 2, [[1, 1], [3, 1]])
      expect(emptyCellRatio(table)).toBe(0.2)
      expect(classifyTable(table).signals.sparseCells).toBe(false)
    })

    it('fires above 0.2', () => {
      const table = numericGrid(5, 2, [[1, 1], [3, 1], [4, 1]])
      const result = classifyTable(table)
      expect(result.signals.sparseCells).toBe(true)
      expect(result.score).toBe(0.4)
      expect(result.label).toBe('Moderate')
    })

    it('ignores a small share of blanks in a large table', () => {
      const table = numericGrid(10, 5, [[0, 0], [4, 2], [9, 4]])
      expect(emptyCellRatio(table)).toBe(0.06)
      expect(classifyTable(table).score).toBe(0)
    })

    it('counts null, empty arrays and whitespace as blank', () => {
      expect(emptyCellRatio([[null, [], '  ', 'x']])).toBe(0.75)
    })

    it('measures against the longest row', () => {
      expect(emptyCellRatio([['1', ''], ['2', '3', '4', '5']])).toBe(0.125)
    })
  })

  // ---------------------------------------------------------------------------
  // Row variation
  // ---------------------------------------------------------------------------
  it('flags irregular row lengths', () => {
    const result = classifyTable([['1'], ['1', '2', '3', '4']])
    expect(result.signals).toEqual({ ...NO_SIGNALS, irregularRows: true })
    expect(result.score).toBe(0.3)
    expect(result.label).toBe('Simple')
  })

  // ---------------------------------------------------------------------------
  // Nested and verbose cells
  // ---------------------------------------------------------------------------
  describe('nested content', () => {
    it('fires for array cells', () => {
      expect(classifyTable([['1', ['2', '3']]]).signals.nestedContent).toBe(true)
    })

    it('fires for cells over 15 tokens but not at 15', () => {
      expect(classifyTable([['1', words(16)]]).signals.nestedContent).toBe(true)
      expect(classifyTable([['1', words(15)]]).signals.nestedContent).toBe(false)
    })

    it('labels nested sparse tables Complex', () => {
      const table: Table = [['a', ['x', 'y']], ['', null]]
      const result = classifyTable(table)
      expect(result.signals).toEqual({ ...NO_SIGNALS, sparseCells: true, nestedContent: true })
      expect(result.score).toBe(0.8)
      expect(result.label).toBe('Complex')
      expect(isComplexTable(table)).toBe(true)
    })
  })

  // ---------------------------------------------------------------------------
  // Header-like rows
  // ---------------------------------------------------------------------------
  describe('repeated headers', () => {
    it('fires when more than one leading row is alphabetic', () => {
      const table: Table = [['Name', 'Role'], ['Alice', 'Admin'], ['1', '2']]
      expect(countHeaderLikeRows(table)).toBe(2)
      expect(classifyTable(table).signals.repeatedHeaders).toBe(true)
    })

    it('does not fire for a single header row', () => {
      const table: Table = [['Name', 'Role'], ['Alice', 'admin user'], ['1', '2']]
      expect(countHeaderLikeRows(table)).toBe(1)
      expect(classifyTable(table).signals.repeatedHeaders).toBe(false)
    })

    it('only scans the first three rows', () => {
      const table: Table = [[null], [null], [null], [null]]
      expect(countHeaderLikeRows(table)).toBe(3)
    })

    it('accepts non-Latin letters and rejects empty strings', () => {
      expect(countHeaderLikeRows([['Größe', 'Время']])).toBe(1)
      expect(countHeaderLikeRows([['Name', '']])).toBe(0)
    })
  })

  // ---------------------------------------------------------------------------
  // Lexical density
  // ---------------------------------------------------------------------------
  it('adds sparse and lexical density weights to exactly 0.6', () => {
    const table: Table = [['1', ''], ['2', ''], ['3', ''], ['4', words(15)]]
    const result = classifyTable(table)
    expect(result.signals).toEqual({ ...NO_SIGNALS, sparseCells: true, highLexicalDensity: true })
    expect(result.score).toBe(0.6)
    expect(result.label).toBe('Moderate')
  })

  it('does not flag evenly worded cells as dense', () => {
    const table: Table = [['one two', 'three four'], ['five six', 'seven eight']]
    expect(classifyTable(table).signals.highLexicalDensity).toBe(false)
  })
})

describe('scoreSignals', () => {
  it('sums every weight to 1.6', () => {
    expect(scoreSignals({
      sparseCells: true,
      irregularRows: true,
      nestedContent: true,
      repeatedHeaders: true,
      highLexicalDensity: true,
    })).toBe(1.6)
  })

  it('is 0 without signals', () => {
    expect(scoreSignals(NO_SIGNALS)).toBe(0)
  })
})

describe('labelForScore', () => {
  it.each([
    [0, 'Simple'],
    [0.3, 'Simple'],
    [0.4, 'Moderate'],
    [0.6, 'Moderate'],
    [0.7, 'Complex'],
    [1.6, 'Complex'],
  ])('labels %s as %s', (score, label) => {
    expect(labelForScore(score)).toBe(label)
  })
})

describe('cellText', () => {
  it('flattens nested cells with spaces', () => {
    expect(cellText(['a', ['b', 'c'], 'd'])).toBe('a b c d')
    expect(cellText(null)).toBe('')
  })
})
