/**
 * Extractor registry
 */

import type { DocumentFormat } from '../complexity/types'
import { docxExtractor } from './docx-extractor'
import { pdfExtractor } from './pdf-extractor'
import { pptxExtractor } from './pptx-extractor'
import type { FormatExtractor } from './types'

const EXTRACTORS: Record<DocumentFormat, FormatExtractor> = {
  pdf: pdfExtractor,
  docx: docxExtractor,
  pptx: pptxExtractor,
}

export function getExtractor(format: DocumentFormat): FormatExtractor {
  return EXTRACTORS[format]
}

export { docxExtractor, wordDocumentFeatures } from './docx-extractor'
export { pdfExtractor, pdfFeatures, readPdfContent } from './pdf-extractor'
export { pptxExtractor, slideDeckFeatures } from './pptx-extractor'
export type { FormatExtractor } from './types'
