/**
 * Ruled Table Detector
 *
 * Finds tables drawn with ruling lines:
 *
 * 1. Snap nearly collinear edges together and join overlapping ones.
 * 2. Intersect horizontal and vertical edges.
 * 3. Build cells as the smallest rectangles whose corners are intersections
 *    connected by edges.
 * 4. Group cells that share a corner into tables.
 * 5. Lay each table out as a grid and fill cells with the text inside them.
 *
 * Grid positions not covered by a cell (merged regions) are `null`.
 */

import type { Table, TableCell } from '../complexity/types'
import type { EdgeOrientation, RulingEdge, TextFragment } from './types'

// ============================================================================
// Tolerances (points)
// ============================================================================

const SNAP_TOLERANCE = 3
const JOIN_TOLERANCE = 3
const EDGE_MIN_LENGTH = 3
const INTERSECTION_TOLERANCE = 3
/** Baseline distance within which glyphs share a line */
const LINE_TOLERANCE = 3
/** Horizontal gap between glyphs that reads as a word break */
const WORD_GAP_TOLERANCE = 3
/** Glyph vertical centre as a share of font height above the baseline */
const GLYPH_CENTER_RISE = 0.3

// ============================================================================
// Types
// ============================================================================

/** Intersection in top-down coordinates: `top` grows down the page */
interface Intersection {
  x: number
  top: number
  horizontal: Set<number>
  vertical: Set<number>
}

export interface CellBox {
  x0: number
  x1: number
  top: number
  bottom: number
}

interface Glyph {
  char: string
  x0: number
  x1: number
  /** Baseline */
  y: number
  centerX: number
  centerY: number
}

// ============================================================================
// Detection
// ============================================================================

/**
 * Detect ruled tables on a page.
 */
export function detectTables(
  edges: readonly RulingEdge[],
  fragments: readonly TextFragment[],
): Table[] {
  const cellGroups = groupCellsIntoTables(findCells(normalizeEdges(edges)))
  if (cellGroups.length === 0) return []

  const glyphs = toGlyphs(fragments)
  return cellGroups.map(cells => toGrid(cells, glyphs))
}

/**
 * Snap edges of each orientation onto shared positions, join overlapping
 * segments and drop the short ones.
 */
export function normalizeEdges(edges: readonly RulingEdge[]): RulingEdge[] {
  const orientations: EdgeOrientation[] = ['horizontal', 'vertical']

  return orientations.flatMap(orientation =>
    joinEdges(snapEdges(edges.filter(e => e.orientation === orientation)))
      .filter(e => e.end - e.start >= EDGE_MIN_LENGTH)
  )
}

function snapEdges(edges: readonly RulingEdge[]): RulingEdge[] {
  const sorted = [...edges].sort((a, b) => a.position - b.position)
  const snapped: RulingEdge[] = []

  let cluster: RulingEdge[] = []
  const flush = () => {
    const position = cluster.reduce((sum, e) => sum + e.position, 0) / cluster.length
    snapped.push(...cluster.map(e => ({ ...e, position })))
    cluster = []
  }

  for (const edge of sorted) {
    const last = cluster[cluster.length - 1]
    if (last && edge.position - last.position > SNAP_TOLERANCE) flush()
    cluster.push(edge)
  }
  if (cluster.length > 0) flush()

  return snapped
}

function joinEdges(edges: readonly RulingEdge[]): RulingEdge[] {
  const sorted = [...edges].sort((a, b) => a.position - b.position || a.start - b.start)
  const joined: RulingEdge[] = []

  for (const edge of sorted) {
    const last = joined[joined.length - 1]
    if (last && last.position === edge.position && edge.start <= last.end + JOIN_TOLERANCE) {
      joined[joined.length - 1] = { ...last, end: Math.max(last.end, edge.end) }
    } else {
      joined.push({ ...edge })
    }
  }

  return joined
}

// ============================================================================
// Cells
// ============================================================================

/**
 * Cells formed by the intersections of normalized edges.
 */
export function findCells(edges: readonly RulingEdge[]): CellBox[] {
  const intersections = findIntersections(edges)
  const points = [...intersections.values()].sort((a, b) => a.x - b.x || a.top - b.top)
  const cells: CellBox[] = []

  const connected = (a: Intersection, b: Intersection) => {
    const shared = a.x === b.x ? a.vertical : a.horizontal
    const other = a.x === b.x ? b.vertical : b.horizontal
    for (const id of shared) {
      if (other.has(id)) return true
    }
    return false
  }

  for (let i = 0; i < points.length; i++) {
    const point = points[i]
    const rest = points.slice(i + 1)
    const below = rest.filter(p => p.x === point.x)
    const right = rest.filter(p => p.top === point.top)

    const cell = findSmallestCell(point, below, right, intersections, connected)
    if (cell) cells.push(cell)
  }

  return cells
}

function findSmallestCell(
  point: Intersection,
  below: readonly Intersection[],
  right: readonly Intersection[],
  intersections: ReadonlyMap<string, Intersection>,
  connected: (a: Intersection, b: Intersection) => boolean,
): CellBox | null {
  for (const belowPoint of below) {
    if (!connected(point, belowPoint)) continue

    for (const rightPoint of right) {
      if (!connected(point, rightPoint)) continue

      const corner = intersections.get(pointKey(rightPoint.x, belowPoint.top))
      if (corner && connected(corner, rightPoint) && connected(corner, belowPoint)) {
        return { x0: point.x, x1: rightPoint.x, top: point.top, bottom: belowPoint.top }
      }
    }
  }
  return null
}

function findIntersections(edges: readonly RulingEdge[]): Map<string, Intersection> {
  const intersections = new Map<string, Intersection>()
  const tol = INTERSECTION_TOLERANCE

  edges.forEach((v, vi) => {
    if (v.orientation !== 'vertical') return

    edges.forEach((h, hi) => {
      if (h.orientation !== 'horizontal') return
      if (v.position < h.start - tol || v.position > h.end + tol) return
      if (h.position < v.start - tol || h.position > v.end + tol) return

      const top = -h.position
      const key = pointKey(v.position, top)
      const existing = intersections.get(key)
        ?? { x: v.position, top, horizontal: new Set<number>(), vertical: new Set<number>() }
      existing.horizontal.add(hi)
      existing.vertical.add(vi)
      intersections.set(key, existing)
    })
  })

  return intersections
}

function pointKey(x: number, top: number): string {
  return `${x}:${top}`
}

/**
 * Group cells into tables: a cell joins a table when it shares a corner
 * with any cell already in it. Single-cell groups are not tables.
 */
export function groupCellsIntoTables(cells: readonly CellBox[]): CellBox[][] {
  const remaining = [...cells]
  const tables: CellBox[][] = []

  while (remaining.length > 0) {
    const corners = new Set<string>()
    const table: CellBox[] = []
    let grew = true

    while (grew) {
      grew = false
      for (let i = 0; i < remaining.length; i++) {
        const cellCorners = cornerKeys(remaining[i])
        if (table.length === 0 || cellCorners.some(c => corners.has(c))) {
          cellCorners.forEach(c => corners.add(c))
          table.push(remaining[i])
          remaining.splice(i, 1)
          i--
          grew = true
        }
      }
    }

    tables.push(table)
  }

  return tables.filter(table => table.length > 1)
}

function cornerKeys(cell: CellBox): string[] {
  return [
    pointKey(cell.x0, cell.top),
    pointKey(cell.x1, cell.top),
    pointKey(cell.x0, cell.bottom),
    pointKey(cell.x1, cell.bottom),
  ]
}

// ============================================================================
// Grid & text
// ============================================================================

/**
 * Rows are cells sharing a top edge; columns are the distinct left edges
 * across the whole table.
 */
function toGrid(cells: readonly CellBox[], glyphs: readonly Glyph[]): Table {
  const columns = [...new Set(cells.map(c => c.x0))].sort((a, b) => a - b)
  const tops = [...new Set(cells.map(c => c.top))].sort((a, b) => a - b)

  return tops.map(top => {
    const rowCells = cells.filter(c => c.top === top)
    return columns.map((x0): TableCell => {
      const cell = rowCells.find(c => c.x0 === x0)
      return cell ? cellText(cell, glyphs) : null
    })
  })
}

function toGlyphs(fragments: readonly TextFragment[]): Glyph[] {
  return fragments.flatMap(fragment => {
    const chars = [...fragment.text]
    if (chars.length === 0) return []

    const advance = fragment.width / chars.length
    const centerY = fragment.y + fragment.height * GLYPH_CENTER_RISE

    return chars.map((char, i) => {
      const x0 = fragment.x + i * advance
      return {
        char,
        x0,
        x1: x0 + advance,
        y: fragment.y,
        centerX: x0 + advance / 2,
        centerY,
      }
    })
  })
}

/**
 * Text of the glyphs whose centre lies in the cell, one line per baseline.
 */
function cellText(cell: CellBox, glyphs: readonly Glyph[]): string {
  // Cell boxes are top-down; glyphs are in PDF space
  const yTop = -cell.top
  const yBottom = -cell.bottom

  const inside = glyphs.filter(g =>
    g.centerX >= cell.x0 && g.centerX < cell.x1
    && g.centerY >= yBottom && g.centerY < yTop
  )

  return groupIntoLines(inside)
    .map(lineText)
    .filter(line => line.length > 0)
    .join('\n')
}

function groupIntoLines(glyphs: readonly Glyph[]): Glyph[][] {
  const sorted = [...glyphs].sort((a, b) => b.y - a.y)
  const lines: Glyph[][] = []

  for (const glyph of sorted) {
    const line = lines[lines.length - 1]
    if (line && Math.abs(line[0].y - glyph.y) <= LINE_TOLERANCE) {
      line.push(glyph)
    } else {
      lines.push([glyph])
    }
  }

  return lines.map(line => line.sort((a, b) => a.x0 - b.x0))
}

function lineText(line: readonly Glyph[]): string {
  let text = ''
  line.forEach((glyph, i) => {
    const previous = line[i - 1]
    if (
      previous
      && glyph.x0 - previous.x1 > WORD_GAP_TOLERANCE
      && previous.char.trim() !== ''
      && glyph.char.trim() !== ''
    ) {
      text += ' '
    }
    text += glyph.char
  })
  return text.trim()
}
