/**
 * PPTX Reader
 *
 * Resolves the slides of a presentation package in presentation order and
 * describes the top-level shapes of each slide. Group shapes are not
 * descended into.
 */

import { Effect } from 'effect'
import type { Table } from '../complexity/types'
import { DocumentParseError } from '../errors'
import { openPackage } from './package'
import type { Slide, SlideDeckContent, SlideShape } from './types'
import { childAt, childElements, findDescendants, firstChild, ownText, type XmlElement } from './xml'

const DEFAULT_PRESENTATION_PART = 'ppt/presentation.xml'

/** Media reference that turns a `p:pic` into a movie shape */
const VIDEO_FILE_ELEMENT = 'a:videoFile'

export function readSlideDeck(
  data: Uint8Array,
): Effect.Effect<SlideDeckContent, DocumentParseError> {
  return Effect.gen(function*() {
    const pkg = yield* openPackage(data, 'pptx')
    const presentationPart = yield* pkg.mainPartName(DEFAULT_PRESENTATION_PART)
    const presentation = yield* pkg.readXml(presentationPart)
    const relationships = yield* pkg.readRelationships(presentationPart)

    const slideIds = childAt(presentation, ['p:sldIdLst'])
    const slides: Slide[] = []

    for (const sldId of slideIds ? childElements(slideIds, 'p:sldId') : []) {
      const relId = sldId.attributes['r:id']
      const rel = relId === undefined ? undefined : relationships.get(relId)
      if (!rel) {
        return yield* Effect.fail(
          new DocumentParseError({
            message: `Slide reference ${relId ?? '(none)'} has no relationship`,
            format: 'pptx',
            part: presentationPart,
          }),
        )
      }

      const slide = yield* pkg.readXml(rel.target)
      const shapeTree = childAt(slide, ['p:cSld', 'p:spTree'])
      if (!shapeTree) {
        return yield* Effect.fail(
          new DocumentParseError({
            message: 'Slide has no p:cSld/p:spTree',
            format: 'pptx',
            part: rel.target,
          }),
        )
      }

      slides.push({ shapes: childElements(shapeTree).flatMap(toShape) })
    }

    return { slides }
  })
}

// ============================================================================
// Shapes
// ============================================================================

/**
 * Describe one shape-tree child. Non-shape children (`p:nvGrpSpPr`,
 * `p:grpSpPr`, extension lists) produce nothing.
 */
export function toShape(element: XmlElement): SlideShape[] {
  switch (element.name) {
    case 'p:sp': {
      const txBody = firstChild(element, 'p:txBody')
      return [txBody ? { kind: 'text', text: textBodyText(txBody) } : { kind: 'other' }]
    }
    case 'p:graphicFrame': {
      const tbl = findDescendants(element, 'a:tbl')[0]
      return [tbl ? { kind: 'table', table: toTable(tbl) } : { kind: 'other' }]
    }
    case 'p:pic':
      return [isMovie(element) ? { kind: 'other' } : { kind: 'picture' }]
    case 'p:grpSp':
    case 'p:cxnSp':
    case 'p:contentPart':
      return [{ kind: 'other' }]
    default:
      return []
  }
}

/** Audio clips keep their picture shape; only video becomes a movie */
function isMovie(pic: XmlElement): boolean {
  const nvPr = childAt(pic, ['p:nvPicPr', 'p:nvPr'])
  return nvPr !== undefined && firstChild(nvPr, VIDEO_FILE_ELEMENT) !== undefined
}

function toTable(tbl: XmlElement): Table {
  return childElements(tbl, 'a:tr').map(tr =>
    childElements(tr, 'a:tc').map(tc => {
      const txBody = firstChild(tc, 'a:txBody')
      return txBody ? textBodyText(txBody) : ''
    })
  )
}

// ============================================================================
// Text
// ============================================================================

/** Paragraphs joined by newlines; line breaks inside a paragraph become `\v` */
export function textBodyText(txBody: XmlElement): string {
  return childElements(txBody, 'a:p').map(paragraphText).join('\n')
}

function paragraphText(paragraph: XmlElement): string {
  let text = ''
  for (const child of childElements(paragraph)) {
    switch (child.name) {
      case 'a:r':
      case 'a:fld': {
        const t = firstChild(child, 'a:t')
        if (t) text += ownText(t)
        break
      }
      case 'a:br':
        text += '\v'
        break
    }
  }
  return text
}
