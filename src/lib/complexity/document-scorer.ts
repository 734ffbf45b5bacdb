/**
 * Document Complexity Scorer
 *
 * Combines the four raw document measurements into a weighted score and a
 * Low / Medium / High level.
 */

import {
  COLUMN_POINTS,
  COMPLEX_TABLE_POINTS,
  DENSE_PARAGRAPH_POINTS,
  HIGH_COMPLEXITY_THRESHOLD,
  IMAGE_POINTS,
  MEDIUM_COMPLEXITY_THRESHOLD,
  SINGLE_COLUMN,
} from './constants'
import type { ComplexityLevel, ComplexityReport, DocumentFeatures } from './types'

export interface ScoreBreakdown {
  tableScore: number
  layoutScore: number
  imageScore: number
}

export function scoreDocument(features: DocumentFeatures): ComplexityReport {
  const { tableScore, layoutScore, imageScore } = scoreBreakdown(features)
  const finalScore = tableScore + layoutScore + imageScore

  return {
    complexTableCount: features.complexTableCount,
    columnCount: features.columnCount,
    denseParagraphCount: features.denseParagraphCount,
    imageCount: features.imageCount,
    finalScore,
    complexityLevel: levelForScore(finalScore),
  }
}

/**
 * Per-component points. Layout only scores for multi-column documents or
 * documents with dense paragraphs.
 */
export function scoreBreakdown(features: DocumentFeatures): ScoreBreakdown {
  const hasLayoutSignal = features.columnCount > SINGLE_COLUMN
    || features.denseParagraphCount > 0

  return {
    tableScore: features.complexTableCount * COMPLEX_TABLE_POINTS,
    layoutScore: hasLayoutSignal
      ? features.columnCount * COLUMN_POINTS
        + features.denseParagraphCount * DENSE_PARAGRAPH_POINTS
      : 0,
    imageScore: features.imageCount * IMAGE_POINTS,
  }
}

export function levelForScore(finalScore: number): ComplexityLevel {
  if (finalScore > HIGH_COMPLEXITY_THRESHOLD) return 'High'
  if (finalScore > MEDIUM_COMPLEXITY_THRESHOLD) return 'Medium'
  return 'Low'
}
