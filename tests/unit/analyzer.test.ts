import { describe, it } from '@effect/vitest'
import { Effect } from 'effect'
import { expect } from 'vitest'
import {
  analyzeDocument,
  analyzeDocumentAsync,
  checkFileExtension,
  getExtractor,
  parseDocumentFormat,
} from '../../src/lib/analyzer'
import { DocumentParseError, InputError } from '../../src/lib/errors'
import {
  buildDocx,
  buildPptx,
  PICTURE_SHAPE,
  slideXml,
  tableShape,
  wordDocumentXml,
} from '../utils/office-fixtures'

describe('parseDocumentFormat', () => {
  it.effect('accepts supported types in any case, with or without a dot', () =>
    Effect.gen(function*() {
      expect(yield* parseDocumentFormat('PDF')).toBe('pdf')
      expect(yield* parseDocumentFormat('.docx')).toBe('docx')
      expect(yield* parseDocumentFormat(' pptx ')).toBe('pptx')
    }))

  it.effect('rejects a missing type', () =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(parseDocumentFormat(undefined))
      expect(error).toBeInstanceOf(InputError)
      expect(error.message).toBe('No document type was given')
    }))

  it.effect('rejects unsupported types', () =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(parseDocumentFormat('txt'))
      expect(error.declaredType).toBe('txt')
      expect(error.message).toBe('Unsupported document type "txt". Expected one of: pdf, docx, pptx')
    }))
})

describe('checkFileExtension', () => {
  it.effect('accepts a matching extension in any case', () =>
    Effect.gen(function*() {
      yield* checkFileExtension('reports/Annual.PDF', 'pdf')
    }))

  it.effect('rejects a mismatched extension', () =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(checkFileExtension('reports/deck.pptx', 'docx'))
      expect(error.message).toBe('File "deck.pptx" is not a .docx file')
    }))
})

describe('getExtractor', () => {
  it('returns the extractor for each format', () => {
    expect(getExtractor('pdf').format).toBe('pdf')
    expect(getExtractor('docx').format).toBe('docx')
    expect(getExtractor('pptx').format).toBe('pptx')
  })
})

describe('analyzeDocument', () => {
  it.effect('rejects an unsupported type before reading the bytes', () =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(analyzeDocument(new Uint8Array([0]), 'xlsx'))
      expect(error._tag).toBe('InputError')
    }))

  it.effect('propagates parse failures', () =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(analyzeDocument(new Uint8Array([0, 1, 2]), 'docx'))
      expect(error).toBeInstanceOf(DocumentParseError)
    }))

  it.effect('scores an empty document 0 / Low', () =>
    Effect.gen(function*() {
      const data = yield* Effect.promise(() => buildDocx(wordDocumentXml('<w:p/>')))
      const report = yield* analyzeDocument(data, 'docx')

      expect(report).toEqual({
        complexTableCount: 0,
        imageCount: 0,
        columnCount: 1,
        denseParagraphCount: 0,
        finalScore: 0,
        complexityLevel: 'Low',
      })
    }))

  it.effect('scores a slide deck with a complex table and pictures', () =>
    Effect.gen(function*() {
      // Sparse and verbose: 0.8, Complex
      const verbose = Array.from({ length: 16 }, (_, i) => `word${i}`).join(' ')
      const data = yield* Effect.promise(() =>
        buildPptx([
          slideXml(tableShape([['', verbose], ['', '']]) + PICTURE_SHAPE),
          slideXml(PICTURE_SHAPE + PICTURE_SHAPE),
        ])
      )

      const report = yield* analyzeDocument(data, 'pptx')

      expect(report).toMatchObject({
        complexTableCount: 1,
        imageCount: 3,
        finalScore: 50,
        complexityLevel: 'Low',
      })
    }))

  it.effect('produces identical reports for identical bytes', () =>
    Effect.gen(function*() {
      const data = yield* Effect.promise(() =>
        buildPptx([slideXml(PICTURE_SHAPE)])
      )

      const first = yield* analyzeDocument(data, 'pptx')
      const second = yield* analyzeDocument(data, 'pptx')
      expect(second).toEqual(first)
    }))
})

describe('analyzeDocumentAsync', () => {
  it('rejects with the tagged error', async () => {
    await expect(analyzeDocumentAsync(new Uint8Array(), 'txt')).rejects.toBeInstanceOf(InputError)
  })

  it('resolves with the report', async () => {
    const data = await buildDocx(wordDocumentXml(''))
    const report = await analyzeDocumentAsync(data, 'DOCX')
    expect(report.complexityLevel).toBe('Low')
  })
})
