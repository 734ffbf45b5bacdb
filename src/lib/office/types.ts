/**
 * Data-transfer shapes produced by the OOXML readers.
 */

import type { Table } from '../complexity/types'

// ============================================================================
// Word-processor documents
// ============================================================================

export interface WordSection {
  /** Number of explicit column definitions (`w:col`) in the section */
  declaredColumnCount: number
}

export interface WordDocumentContent {
  /** Body-level tables as grids of cell text */
  tables: Table[]
  /** Inline drawings anywhere in the main document part */
  inlineImageCount: number
  /** Text of each body-level paragraph */
  paragraphs: string[]
  sections: WordSection[]
}

// ============================================================================
// Slide decks
// ============================================================================

export type SlideShape =
  | { kind: 'table'; table: Table }
  | { kind: 'picture' }
  | { kind: 'text'; text: string }
  | { kind: 'other' }

export interface Slide {
  /** Top-level shapes of the slide's shape tree */
  shapes: SlideShape[]
}

export interface SlideDeckContent {
  slides: Slide[]
}
