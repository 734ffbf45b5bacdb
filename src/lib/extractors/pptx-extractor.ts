/**
 * PPTX Extractor
 */

import { Effect } from 'effect'
import {
  DENSE_TEXT_MIN_CHARS,
  MULTI_COLUMN,
  SINGLE_COLUMN,
  SLIDE_DENSE_SHAPES_FOR_COLUMNS,
} from '../complexity/constants'
import { isComplexTable } from '../complexity/table-classifier'
import { characterCount } from '../complexity/text'
import type { DocumentFeatures } from '../complexity/types'
import { readSlideDeck } from '../office/pptx-reader'
import type { SlideDeckContent } from '../office/types'
import type { FormatExtractor } from './types'

/**
 * Features of a slide deck.
 *
 * Dense text shapes only decide the column count; the reported dense
 * paragraph count for slides is always 0.
 */
export function slideDeckFeatures(content: SlideDeckContent): DocumentFeatures {
  let complexTableCount = 0
  let imageCount = 0
  let denseShapeCount = 0

  for (const slide of content.slides) {
    for (const shape of slide.shapes) {
      switch (shape.kind) {
        case 'table':
          if (isComplexTable(shape.table)) complexTableCount++
          break
        case 'picture':
          imageCount++
          break
        case 'text':
          if (characterCount(shape.text) > DENSE_TEXT_MIN_CHARS) denseShapeCount++
          break
      }
    }
  }

  return {
    complexTableCount,
    imageCount,
    columnCount: denseShapeCount < SLIDE_DENSE_SHAPES_FOR_COLUMNS ? SINGLE_COLUMN : MULTI_COLUMN,
    denseParagraphCount: 0,
  }
}

export const pptxExtractor: FormatExtractor = {
  format: 'pptx',
  extract: data =>
    readSlideDeck(data).pipe(
      Effect.tap(content =>
        Effect.logDebug('PPTX deck read').pipe(
          Effect.annotateLogs({ slides: content.slides.length })
        )
      ),
      Effect.map(slideDeckFeatures),
    ),
}
