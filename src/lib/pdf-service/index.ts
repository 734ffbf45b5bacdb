/**
 * PDF Service Factory
 *
 * Creates PDF services and exposes them as scoped Effect resources that are
 * destroyed when their scope closes.
 */

import { Effect, type Scope } from 'effect'
import { describeCause, DocumentParseError } from '../errors'
import { NodePdfService } from './node'
import type { PdfService } from './types'

/**
 * Create and load a PDF service.
 *
 * @example
 * ```typescript
 * const service = await createPdfService(pdfBuffer)
 * try {
 *   const blocks = await service.getPageTextBlocks(1)
 * } finally {
 *   await service.destroy()
 * }
 * ```
 */
export async function createPdfService(data: Uint8Array): Promise<PdfService> {
  const service = new NodePdfService()
  await service.load(data)
  return service
}

// -----------------------------------------------------------------------------
// Effect-based Scoped Lifecycle Management
// -----------------------------------------------------------------------------

/**
 * Create a scoped PdfService that is destroyed when the scope closes.
 * A document PDF.js cannot open fails with DocumentParseError.
 *
 * @example
 * ```typescript
 * const program = Effect.scoped(
 *   Effect.gen(function*() {
 *     const pdfService = yield* makePdfServiceScoped(pdfData)
 *     return pdfService.getPageCount()
 *   })
 * )
 * ```
 */
export const makePdfServiceScoped = (
  data: Uint8Array,
  create: (data: Uint8Array) => Promise<PdfService> = createPdfService,
): Effect.Effect<PdfService, DocumentParseError, Scope.Scope> =>
  Effect.acquireRelease(
    Effect.tryPromise({
      try: () => create(data),
      catch: error =>
        new DocumentParseError({
          message: `Cannot open PDF: ${describeCause(error)}`,
          format: 'pdf',
          cause: error,
        }),
    }),
    service =>
      Effect.promise(() => service.destroy()).pipe(
        Effect.catchAllDefect(defect =>
          Effect.logWarning(`Failed to release PDF document: ${describeCause(defect)}`)
        ),
      ),
  )

// Re-export types
export * from './types'
