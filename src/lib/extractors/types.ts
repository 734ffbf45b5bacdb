/**
 * Format Extractor Interface
 *
 * Each supported document format turns raw bytes into the four feature
 * counts the document scorer consumes.
 */

import type { Effect } from 'effect'
import type { DocumentFeatures, DocumentFormat } from '../complexity/types'
import type { DocumentParseError } from '../errors'

export interface FormatExtractor {
  readonly format: DocumentFormat
  /** Fails with DocumentParseError when the document cannot be read */
  extract(data: Uint8Array): Effect.Effect<DocumentFeatures, DocumentParseError>
}
