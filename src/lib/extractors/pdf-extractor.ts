/**
 * PDF Extractor
 *
 * Reads every page through a scoped PdfService, then derives features from
 * the collected page content.
 */

import { Effect } from 'effect'
import {
  DENSE_TEXT_MIN_CHARS,
  MULTI_COLUMN,
  PDF_DENSE_BLOCKS_PER_PAGE_LIMIT,
  SINGLE_COLUMN,
} from '../complexity/constants'
import { isComplexTable } from '../complexity/table-classifier'
import { characterCount } from '../complexity/text'
import type { DocumentFeatures } from '../complexity/types'
import { describeCause, DocumentParseError } from '../errors'
import { makePdfServiceScoped } from '../pdf-service'
import type { PdfDocumentContent, PdfPageContent, PdfService } from '../pdf-service/types'
import type { FormatExtractor } from './types'

// ============================================================================
// Features
// ============================================================================

/**
 * Features of a PDF's page content.
 *
 * Tables and images are counted page by page. Dense text blocks are counted
 * in a second pass; a page with more than five of them marks the document
 * as multi-column.
 */
export function pdfFeatures(content: PdfDocumentContent): DocumentFeatures {
  let complexTableCount = 0
  let imageCount = 0

  for (const page of content.pages) {
    complexTableCount += page.tables.filter(isComplexTable).length
    imageCount += page.imageCount
  }

  const densePerPage = content.pages.map(page =>
    page.textBlocks.filter(text => characterCount(text) > DENSE_TEXT_MIN_CHARS).length
  )
  const multiColumn = densePerPage.some(count => count > PDF_DENSE_BLOCKS_PER_PAGE_LIMIT)

  return {
    complexTableCount,
    imageCount,
    columnCount: multiColumn ? MULTI_COLUMN : SINGLE_COLUMN,
    denseParagraphCount: densePerPage.reduce((sum, count) => sum + count, 0),
  }
}

// ============================================================================
// Reading
// ============================================================================

/**
 * Collect tables, image counts and text blocks for every page.
 */
export function readPdfContent(
  service: PdfService,
): Effect.Effect<PdfDocumentContent, DocumentParseError> {
  return Effect.gen(function*() {
    const pageCount = service.getPageCount()
    const pages: PdfPageContent[] = []

    for (let pageNum = 1; pageNum <= pageCount; pageNum++) {
      const page = yield* Effect.tryPromise({
        try: async (): Promise<PdfPageContent> => ({
          tables: await service.getPageTables(pageNum),
          imageCount: await service.getPageImageCount(pageNum),
          textBlocks: await service.getPageTextBlocks(pageNum),
        }),
        catch: error =>
          new DocumentParseError({
            message: `Cannot read page ${pageNum}: ${describeCause(error)}`,
            format: 'pdf',
            part: `page ${pageNum}`,
            cause: error,
          }),
      })

      yield* Effect.logDebug('PDF page read').pipe(
        Effect.annotateLogs({
          page: pageNum,
          tables: page.tables.length,
          images: page.imageCount,
          textBlocks: page.textBlocks.length,
        }),
      )
      pages.push(page)
    }

    return { pages }
  })
}

export const pdfExtractor: FormatExtractor = {
  format: 'pdf',
  extract: data =>
    Effect.scoped(
      Effect.gen(function*() {
        const service = yield* makePdfServiceScoped(data)
        const content = yield* readPdfContent(service)
        return pdfFeatures(content)
      }),
    ),
}
