/**
 * PDF Service Types
 *
 * Interface of the PDF adapter and the plain data it hands to the
 * complexity extractors. Geometry is in PDF user space: points, origin at
 * the bottom-left corner, y growing upwards.
 */

import type { Table } from '../complexity/types'

// ============================================================================
// Page geometry
// ============================================================================

/** A run of text as laid out by the content stream */
export interface TextFragment {
  text: string
  /** Baseline origin */
  x: number
  y: number
  /** Advance width of the whole run */
  width: number
  /** Font height */
  height: number
}

export type EdgeOrientation = 'horizontal' | 'vertical'

/**
 * An axis-aligned ruling segment. `position` is the y of a horizontal edge
 * or the x of a vertical one; `start`/`end` span the other axis.
 */
export interface RulingEdge {
  orientation: EdgeOrientation
  position: number
  start: number
  end: number
}

// ============================================================================
// Extracted content
// ============================================================================

export interface PdfPageContent {
  /** Tables found on the page, as grids of cell text */
  tables: Table[]
  /** Distinct raster images painted on the page */
  imageCount: number
  /** Text of each layout text block */
  textBlocks: string[]
}

export interface PdfDocumentContent {
  pages: PdfPageContent[]
}

// ============================================================================
// Service
// ============================================================================

/**
 * PDF Service Interface
 *
 * Page numbers are 1-indexed.
 */
export interface PdfService {
  // Lifecycle

  /** Load a PDF document from binary data */
  load(data: Uint8Array): Promise<void>

  /** Release resources. Always call when done with the PDF. */
  destroy(): Promise<void>

  // Metadata

  /** Get the number of pages in the document */
  getPageCount(): number

  // Content

  /** Tables detected from the page's ruling lines */
  getPageTables(pageNum: number): Promise<Table[]>

  /** Number of distinct image XObjects painted on the page */
  getPageImageCount(pageNum: number): Promise<number>

  /** Text of each layout block on the page */
  getPageTextBlocks(pageNum: number): Promise<string[]>
}
