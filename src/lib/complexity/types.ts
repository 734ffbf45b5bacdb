/**
 * Complexity Model Types
 *
 * Plain data shapes shared by the table classifier, the format extractors
 * and the document scorer. None of them reference a parser library.
 */

// ============================================================================
// Tables
// ============================================================================

/**
 * A single grid position.
 *
 * `null` marks a position with no cell (e.g. covered by a merged cell in a
 * ruled PDF table). An array is a structured value nested inside the cell.
 */
export type TableCell = string | null | readonly TableCell[]

/** Ordered rows of cells. Rows may differ in length. */
export type TableRow = readonly TableCell[]

export type Table = readonly TableRow[]

export type TableComplexityLabel = 'Simple' | 'Moderate' | 'Complex'

/** Which classifier signals fired for a table */
export interface TableComplexitySignals {
  sparseCells: boolean
  irregularRows: boolean
  nestedContent: boolean
  repeatedHeaders: boolean
  highLexicalDensity: boolean
}

export interface TableComplexityResult {
  /** Sum of the weights of the triggered signals, in [0, 1.6] */
  score: number
  label: TableComplexityLabel
  signals: TableComplexitySignals
}

// ============================================================================
// Documents
// ============================================================================

export type DocumentFormat = 'pdf' | 'docx' | 'pptx'

export const DOCUMENT_FORMATS: readonly DocumentFormat[] = ['pdf', 'docx', 'pptx']

/** Raw measurements taken from one document */
export interface DocumentFeatures {
  complexTableCount: number
  imageCount: number
  columnCount: number
  denseParagraphCount: number
}

export type ComplexityLevel = 'Low' | 'Medium' | 'High'

export interface ComplexityReport extends DocumentFeatures {
  finalScore: number
  complexityLevel: ComplexityLevel
}
