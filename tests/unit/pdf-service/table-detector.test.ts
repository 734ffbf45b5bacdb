import { describe, expect, it } from 'vitest'
import {
  detectTables,
  findCells,
  groupCellsIntoTables,
  normalizeEdges,
} from '../../../src/lib/pdf-service/table-detector'
import type { RulingEdge, TextFragment } from '../../../src/lib/pdf-service/types'

// =============================================================================
// Test Helpers
// =============================================================================

function horizontal(y: number, x0: number, x1: number): RulingEdge {
  return { orientation: 'horizontal', position: y, start: x0, end: x1 }
}

function vertical(x: number, y0: number, y1: number): RulingEdge {
  return { orientation: 'vertical', position: x, start: y0, end: y1 }
}

function fragment(text: string, x: number, y: number): TextFragment {
  return { text, x, y, width: 5 * text.length, height: 10 }
}

/** 2 × 2 grid spanning x 0..100 and y 60..100 */
const GRID: RulingEdge[] = [
  horizontal(100, 0, 100),
  horizontal(80, 0, 100),
  horizontal(60, 0, 100),
  vertical(0, 60, 100),
  vertical(50, 60, 100),
  vertical(100, 60, 100),
]

// =============================================================================
// Tests
// =============================================================================

describe('normalizeEdges', () => {
  it('snaps nearby edges, joins overlaps and drops short edges', () => {
    const edges = normalizeEdges([
      horizontal(100, 0, 50),
      horizontal(101.5, 48, 100),
      vertical(20, 0, 2),
    ])
    expect(edges).toEqual([horizontal(100.75, 0, 100)])
  })
})

describe('findCells', () => {
  it('finds the four cells of a 2 × 2 grid', () => {
    expect(findCells(normalizeEdges(GRID))).toEqual([
      { x0: 0, x1: 50, top: -100, bottom: -80 },
      { x0: 0, x1: 50, top: -80, bottom: -60 },
      { x0: 50, x1: 100, top: -100, bottom: -80 },
      { x0: 50, x1: 100, top: -80, bottom: -60 },
    ])
  })
})

describe('groupCellsIntoTables', () => {
  it('drops isolated single cells', () => {
    expect(groupCellsIntoTables([{ x0: 0, x1: 10, top: 0, bottom: 10 }])).toEqual([])
  })

  it('keeps separate grids apart', () => {
    const left = [
      { x0: 0, x1: 10, top: 0, bottom: 10 },
      { x0: 10, x1: 20, top: 0, bottom: 10 },
    ]
    const right = [
      { x0: 100, x1: 110, top: 0, bottom: 10 },
      { x0: 110, x1: 120, top: 0, bottom: 10 },
    ]
    expect(groupCellsIntoTables([...left, ...right])).toEqual([left, right])
  })
})

describe('detectTables', () => {
  it('fills the grid with the text inside each cell', () => {
    const tables = detectTables(GRID, [
      fragment('A1', 5, 85),
      fragment('B1', 55, 85),
      fragment('A2', 5, 65),
    ])
    expect(tables).toEqual([[['A1', 'B1'], ['A2', '']]])
  })

  it('joins lines of a cell with newlines and keeps word gaps', () => {
    const tables = detectTables(GRID, [
      fragment('Top', 5, 90),
      fragment('Bot', 5, 81),
      fragment('x', 60, 85),
      fragment('y', 80, 85),
    ])
    expect(tables[0][0]).toEqual(['Top\nBot', 'x y'])
  })

  it('leaves grid positions covered by a merged cell empty', () => {
    const merged = [
      horizontal(100, 0, 100),
      horizontal(80, 0, 100),
      horizontal(60, 0, 100),
      vertical(0, 60, 100),
      vertical(50, 60, 80),
      vertical(100, 60, 100),
    ]
    expect(detectTables(merged, [])).toEqual([[['', null], ['', '']]])
  })

  it('finds no table without intersecting rulings', () => {
    expect(detectTables([horizontal(100, 0, 100), horizontal(50, 0, 100)], [])).toEqual([])
  })
})
