/**
 * Error types for document analysis.
 *
 * Uses Effect's Schema.TaggedError pattern so callers can match on `_tag`.
 * Degenerate inputs (empty tables, documents without tables) are not errors.
 */

import { Schema } from 'effect'

// =============================================================================
// Input Errors
// =============================================================================

/**
 * The declared document type is missing or unsupported, or the file does not
 * match it. Raised before any extraction starts.
 */
export class InputError extends Schema.TaggedError<InputError>()('InputError', {
  message: Schema.String,
  declaredType: Schema.optional(Schema.String),
}) {}

// =============================================================================
// Parse Errors
// =============================================================================

/**
 * The document cannot be opened or a required structural part is malformed.
 * Aborts the analysis; no partial report is produced.
 */
export class DocumentParseError
  extends Schema.TaggedError<DocumentParseError>()('DocumentParseError', {
    message: Schema.String,
    format: Schema.Literal('pdf', 'docx', 'pptx'),
    part: Schema.optional(Schema.String),
    cause: Schema.optional(Schema.Unknown),
  })
{}

// =============================================================================
// Union Type
// =============================================================================

/**
 * @example
 * ```typescript
 * pipe(
 *   analyzeDocument(data, 'pdf'),
 *   Effect.catchTags({
 *     InputError: (e) => reportBadInput(e),
 *     DocumentParseError: (e) => reportUnreadable(e),
 *   })
 * )
 * ```
 */
export type AnalysisError = InputError | DocumentParseError

/** Human-readable description of an unknown failure cause */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message
  return String(cause)
}
