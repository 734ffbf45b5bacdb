/**
 * DOCX Reader
 *
 * Walks the main document part of a word-processor package and returns its
 * tables, inline images, paragraphs and section column declarations.
 */

import { Effect } from 'effect'
import type { Table, TableCell } from '../complexity/types'
import { DocumentParseError } from '../errors'
import { openPackage } from './package'
import type { WordDocumentContent, WordSection } from './types'
import { childAt, childElements, findDescendants, firstChild, ownText, type XmlElement } from './xml'

const DEFAULT_DOCUMENT_PART = 'word/document.xml'

/** Content whose runs do not belong to the enclosing paragraph's text */
const OUT_OF_FLOW = new Set(['w:drawing', 'w:pict', 'w:object', 'w:del', 'mc:AlternateContent'])

export function readWordDocument(
  data: Uint8Array,
): Effect.Effect<WordDocumentContent, DocumentParseError> {
  return Effect.gen(function*() {
    const pkg = yield* openPackage(data, 'docx')
    const partName = yield* pkg.mainPartName(DEFAULT_DOCUMENT_PART)
    const root = yield* pkg.readXml(partName)

    const body = root.name === 'w:document' ? firstChild(root, 'w:body') : undefined
    if (!body) {
      return yield* Effect.fail(
        new DocumentParseError({
          message: 'Document part has no w:document/w:body',
          format: 'docx',
          part: partName,
        }),
      )
    }

    return {
      tables: childElements(body, 'w:tbl').map(toTable),
      inlineImageCount: countInlineImages(root),
      paragraphs: childElements(body, 'w:p').map(paragraphText),
      sections: sectionProperties(body).map(toSection),
    }
  })
}

// ============================================================================
// Tables
// ============================================================================

/**
 * Convert a `w:tbl` into a grid of cell text.
 *
 * A cell spanning several grid columns appears once per column; a vertically
 * merged continuation cell repeats the text of the cell above it.
 */
export function toTable(tbl: XmlElement): Table {
  const rows: TableCell[][] = []

  for (const tr of childElements(tbl, 'w:tr')) {
    const above = rows[rows.length - 1] ?? []
    const row: TableCell[] = []

    for (const tc of childElements(tr, 'w:tc')) {
      const properties = firstChild(tc, 'w:tcPr')
      const span = gridSpan(properties)
      const gridIndex = row.length
      const text = continuesVerticalMerge(properties)
        ? (above[gridIndex] ?? '')
        : cellText(tc)

      for (let i = 0; i < span; i++) {
        row.push(text)
      }
    }

    rows.push(row)
  }

  return rows
}

function gridSpan(properties: XmlElement | undefined): number {
  const value = properties ? firstChild(properties, 'w:gridSpan')?.attributes['w:val'] : undefined
  const span = value === undefined ? 1 : Number.parseInt(value, 10)
  return Number.isFinite(span) && span > 0 ? span : 1
}

function continuesVerticalMerge(properties: XmlElement | undefined): boolean {
  const vMerge = properties ? firstChild(properties, 'w:vMerge') : undefined
  return vMerge !== undefined && vMerge.attributes['w:val'] !== 'restart'
}

/** Paragraphs of a cell joined by newlines; nested tables are not included */
function cellText(tc: XmlElement): string {
  return childElements(tc, 'w:p').map(paragraphText).join('\n')
}

// ============================================================================
// Paragraphs
// ============================================================================

export function paragraphText(paragraph: XmlElement): string {
  return findDescendants(paragraph, 'w:r', OUT_OF_FLOW).map(runText).join('')
}

function runText(run: XmlElement): string {
  let text = ''
  for (const child of childElements(run)) {
    switch (child.name) {
      case 'w:t':
        text += ownText(child)
        break
      case 'w:tab':
        text += '\t'
        break
      case 'w:br':
      case 'w:cr':
        text += '\n'
        break
      case 'w:noBreakHyphen':
        text += '-'
        break
    }
  }
  return text
}

// ============================================================================
// Images & sections
// ============================================================================

/**
 * `wp:inline` drawings placed directly in a paragraph run
 * (`w:p/w:r/w:drawing/wp:inline`) anywhere in the document part.
 */
function countInlineImages(element: XmlElement): number {
  let count = 0
  for (const child of childElements(element)) {
    if (element.name === 'w:p' && child.name === 'w:r') {
      for (const drawing of childElements(child, 'w:drawing')) {
        count += childElements(drawing, 'wp:inline').length
      }
    }
    count += countInlineImages(child)
  }
  return count
}

/** Section properties in paragraph marks plus the final body section */
function sectionProperties(body: XmlElement): XmlElement[] {
  const fromParagraphs = childElements(body, 'w:p')
    .map(p => childAt(p, ['w:pPr', 'w:sectPr']))
    .filter((sectPr): sectPr is XmlElement => sectPr !== undefined)

  return [...fromParagraphs, ...childElements(body, 'w:sectPr')]
}

function toSection(sectPr: XmlElement): WordSection {
  const cols = firstChild(sectPr, 'w:cols')
  return {
    declaredColumnCount: cols ? childElements(cols, 'w:col').length : 0,
  }
}
