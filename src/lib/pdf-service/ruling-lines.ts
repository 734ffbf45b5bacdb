/**
 * Ruling Line Collector
 *
 * Walks a PDF.js operator list and collects the axis-aligned segments of
 * painted paths (lines and rectangle sides). Coordinates are mapped through
 * the current transformation matrix into page space.
 */

import { OPS } from 'pdfjs-dist/legacy/build/pdf.mjs'
import type { RulingEdge } from './types'

// ============================================================================
// Types
// ============================================================================

/** Affine matrix [a, b, c, d, e, f] */
export type Matrix = readonly [number, number, number, number, number, number]

const IDENTITY: Matrix = [1, 0, 0, 1, 0, 0]

/** Slope (in points) below which a segment counts as axis-aligned */
const AXIS_TOLERANCE = 1

const PAINT_OPS: ReadonlySet<number> = new Set([
  OPS.stroke,
  OPS.closeStroke,
  OPS.fill,
  OPS.eoFill,
  OPS.fillStroke,
  OPS.eoFillStroke,
  OPS.closeFillStroke,
  OPS.closeEOFillStroke,
])

interface Point {
  x: number
  y: number
}

// ============================================================================
// Operator List Analysis
// ============================================================================

/**
 * Collect ruling edges from an operator list.
 *
 * Paths are only kept once painted; paths ended with `n` (clipping) are
 * dropped.
 */
export function collectRulingEdges(
  fnArray: readonly number[],
  argsArray: readonly unknown[],
): RulingEdge[] {
  const edges: RulingEdge[] = []
  const stack: Matrix[] = []
  let ctm: Matrix = IDENTITY
  let pending: RulingEdge[] = []

  for (let i = 0; i < fnArray.length; i++) {
    const op = fnArray[i]
    const args = argsArray[i]

    switch (op) {
      case OPS.save:
        stack.push(ctm)
        break

      case OPS.restore:
        ctm = stack.pop() ?? IDENTITY
        break

      case OPS.transform: {
        const matrix = toMatrix(args)
        if (matrix) ctm = multiply(matrix, ctm)
        break
      }

      case OPS.paintFormXObjectBegin: {
        stack.push(ctm)
        const matrix = Array.isArray(args) ? toMatrix(args[0]) : null
        if (matrix) ctm = multiply(matrix, ctm)
        break
      }

      case OPS.paintFormXObjectEnd:
        ctm = stack.pop() ?? IDENTITY
        break

      case OPS.constructPath: {
        const subOps = Array.isArray(args) ? toNumbers(args[0]) : null
        const coords = Array.isArray(args) ? toNumbers(args[1]) : null
        if (subOps && coords) pending.push(...pathEdges(subOps, coords, ctm))
        break
      }

      case OPS.rectangle: {
        const coords = toNumbers(args)
        if (coords) pending.push(...pathEdges([OPS.rectangle], coords, ctm))
        break
      }

      case OPS.endPath:
        pending = []
        break

      default:
        if (PAINT_OPS.has(op)) {
          edges.push(...pending)
          pending = []
        }
    }
  }

  return edges
}

// ============================================================================
// Path Geometry
// ============================================================================

/**
 * Axis-aligned segments of one path construction.
 */
export function pathEdges(
  subOps: readonly number[],
  coords: readonly number[],
  ctm: Matrix = IDENTITY,
): RulingEdge[] {
  const edges: RulingEdge[] = []
  let coordIndex = 0
  let current: Point | null = null
  let subpathStart: Point | null = null

  const lineTo = (to: Point) => {
    if (current) {
      const edge = toEdge(current, to)
      if (edge) edges.push(edge)
    }
    current = to
  }

  for (const op of subOps) {
    switch (op) {
      case OPS.moveTo:
        current = apply(ctm, coords[coordIndex], coords[coordIndex + 1])
        subpathStart = current
        coordIndex += 2
        break

      case OPS.lineTo:
        lineTo(apply(ctm, coords[coordIndex], coords[coordIndex + 1]))
        coordIndex += 2
        break

      case OPS.curveTo:
        // Curves are not rulings; only the end point moves the pen
        current = apply(ctm, coords[coordIndex + 4], coords[coordIndex + 5])
        coordIndex += 6
        break

      case OPS.curveTo2:
      case OPS.curveTo3:
        current = apply(ctm, coords[coordIndex + 2], coords[coordIndex + 3])
        coordIndex += 4
        break

      case OPS.closePath:
        if (subpathStart) lineTo(subpathStart)
        break

      case OPS.rectangle: {
        const x = coords[coordIndex]
        const y = coords[coordIndex + 1]
        const w = coords[coordIndex + 2]
        const h = coords[coordIndex + 3]
        const corners = [
          apply(ctm, x, y),
          apply(ctm, x + w, y),
          apply(ctm, x + w, y + h),
          apply(ctm, x, y + h),
        ]
        for (let k = 0; k < corners.length; k++) {
          const edge = toEdge(corners[k], corners[(k + 1) % corners.length])
          if (edge) edges.push(edge)
        }
        current = corners[0]
        subpathStart = corners[0]
        coordIndex += 4
        break
      }
    }
  }

  return edges
}

function toEdge(from: Point, to: Point): RulingEdge | null {
  const dx = Math.abs(to.x - from.x)
  const dy = Math.abs(to.y - from.y)

  if (dy <= AXIS_TOLERANCE && dx > dy) {
    return {
      orientation: 'horizontal',
      position: (from.y + to.y) / 2,
      start: Math.min(from.x, to.x),
      end: Math.max(from.x, to.x),
    }
  }

  if (dx <= AXIS_TOLERANCE && dy > dx) {
    return {
      orientation: 'vertical',
      position: (from.x + to.x) / 2,
      start: Math.min(from.y, to.y),
      end: Math.max(from.y, to.y),
    }
  }

  return null
}

// ============================================================================
// Matrix helpers
// ============================================================================

/** `m` applied first, then `n` */
export function multiply(m: Matrix, n: Matrix): Matrix {
  return [
    m[0] * n[0] + m[1] * n[2],
    m[0] * n[1] + m[1] * n[3],
    m[2] * n[0] + m[3] * n[2],
    m[2] * n[1] + m[3] * n[3],
    m[4] * n[0] + m[5] * n[2] + n[4],
    m[4] * n[1] + m[5] * n[3] + n[5],
  ]
}

function apply(m: Matrix, x: number, y: number): Point {
  return {
    x: m[0] * x + m[2] * y + m[4],
    y: m[1] * x + m[3] * y + m[5],
  }
}

/** Plain or typed numeric array as a number[]; null for anything else */
function toNumbers(value: unknown): number[] | null {
  if (value instanceof Float32Array || value instanceof Float64Array) {
    return Array.from(value)
  }
  if (!Array.isArray(value)) return null

  const numbers = value.filter((v): v is number => typeof v === 'number')
  return numbers.length === value.length ? numbers : null
}

function toMatrix(value: unknown): Matrix | null {
  const n = toNumbers(value)
  if (!n || n.length !== 6) return null
  return [n[0], n[1], n[2], n[3], n[4], n[5]]
}
