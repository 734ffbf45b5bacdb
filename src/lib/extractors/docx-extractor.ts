/**
 * DOCX Extractor
 */

import { Effect } from 'effect'
import { DENSE_TEXT_MIN_CHARS, SINGLE_COLUMN } from '../complexity/constants'
import { isComplexTable } from '../complexity/table-classifier'
import { characterCount } from '../complexity/text'
import type { DocumentFeatures } from '../complexity/types'
import { readWordDocument } from '../office/docx-reader'
import type { WordDocumentContent } from '../office/types'
import type { FormatExtractor } from './types'

/**
 * Features of a word-processor document. The column count is the largest
 * number of explicit column definitions in any section, at least one.
 */
export function wordDocumentFeatures(content: WordDocumentContent): DocumentFeatures {
  const columnCount = content.sections.reduce(
    (max, section) => Math.max(max, section.declaredColumnCount),
    SINGLE_COLUMN,
  )

  return {
    complexTableCount: content.tables.filter(isComplexTable).length,
    imageCount: content.inlineImageCount,
    columnCount,
    denseParagraphCount: content.paragraphs.filter(text =>
      characterCount(text) > DENSE_TEXT_MIN_CHARS
    ).length,
  }
}

export const docxExtractor: FormatExtractor = {
  format: 'docx',
  extract: data =>
    readWordDocument(data).pipe(
      Effect.tap(content =>
        Effect.logDebug('DOCX document read').pipe(
          Effect.annotateLogs({
            tables: content.tables.length,
            paragraphs: content.paragraphs.length,
            sections: content.sections.length,
          }),
        )
      ),
      Effect.map(wordDocumentFeatures),
    ),
}
