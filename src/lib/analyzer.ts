/**
 * Document Analyzer
 *
 * Entry point of the analysis: validates the declared document type, runs
 * the matching extractor and scores the resulting features.
 */

import { Effect } from 'effect'
import path from 'path'
import { scoreDocument } from './complexity/document-scorer'
import { type ComplexityReport, type DocumentFormat, DOCUMENT_FORMATS } from './complexity/types'
import { type AnalysisError, InputError } from './errors'
import { getExtractor } from './extractors'

export { getExtractor }

// ============================================================================
// Input validation
// ============================================================================

function isDocumentFormat(value: string): value is DocumentFormat {
  return DOCUMENT_FORMATS.some(format => format === value)
}

/**
 * Parse a declared document type such as `pdf`, `.DOCX` or `pptx`.
 */
export function parseDocumentFormat(
  declared: string | undefined,
): Effect.Effect<DocumentFormat, InputError> {
  const normalized = declared?.trim().toLowerCase().replace(/^\./, '') ?? ''

  if (normalized === '') {
    return Effect.fail(new InputError({ message: 'No document type was given' }))
  }
  if (!isDocumentFormat(normalized)) {
    return Effect.fail(
      new InputError({
        message: `Unsupported document type "${declared}". Expected one of: ${
          DOCUMENT_FORMATS.join(', ')
        }`,
        declaredType: declared,
      }),
    )
  }
  return Effect.succeed(normalized)
}

/**
 * Ensure a file name carries the extension of the declared format.
 */
export function checkFileExtension(
  fileName: string,
  format: DocumentFormat,
): Effect.Effect<void, InputError> {
  const extension = path.extname(fileName).slice(1).toLowerCase()
  if (extension === format) return Effect.void

  return Effect.fail(
    new InputError({
      message: `File "${path.basename(fileName)}" is not a .${format} file`,
      declaredType: format,
    }),
  )
}

// ============================================================================
// Analysis
// ============================================================================

/**
 * Analyze a document's bytes as the declared type.
 *
 * @example
 * ```typescript
 * const report = await Effect.runPromise(analyzeDocument(bytes, 'docx'))
 * console.log(report.complexityLevel)
 * ```
 */
export function analyzeDocument(
  data: Uint8Array,
  declaredType: string | undefined,
): Effect.Effect<ComplexityReport, AnalysisError> {
  return Effect.gen(function*() {
    const format = yield* parseDocumentFormat(declaredType)
    yield* Effect.logInfo('Analyzing document').pipe(
      Effect.annotateLogs({ format, bytes: data.byteLength }),
    )

    const features = yield* getExtractor(format).extract(data)
    yield* Effect.logDebug('Features extracted').pipe(Effect.annotateLogs({ ...features }))

    const report = scoreDocument(features)
    yield* Effect.logInfo('Document scored').pipe(
      Effect.annotateLogs({
        finalScore: report.finalScore,
        complexityLevel: report.complexityLevel,
      }),
    )

    return report
  })
}

/**
 * Promise wrapper around analyzeDocument. Rejects with the InputError or
 * DocumentParseError itself.
 */
export async function analyzeDocumentAsync(
  data: Uint8Array,
  declaredType: string | undefined,
): Promise<ComplexityReport> {
  return Effect.runPromise(Effect.either(analyzeDocument(data, declaredType))).then(result => {
    if (result._tag === 'Left') throw result.left
    return result.right
  })
}
