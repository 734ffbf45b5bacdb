/**
 * OOXML package access.
 *
 * Opens the zip container with JSZip and reads XML parts and their
 * relationships. Every failure surfaces as a DocumentParseError.
 */

import { Effect } from 'effect'
import JSZip from 'jszip'
import path from 'path'
import { describeCause, DocumentParseError } from '../errors'
import { childElements, parseXml, type XmlElement } from './xml'

export type OoxmlFormat = 'docx' | 'pptx'

const OFFICE_DOCUMENT_REL_TYPE =
  'http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument'

export class OoxmlPackage {
  constructor(
    private readonly zip: JSZip,
    readonly format: OoxmlFormat,
  ) {}

  has(partName: string): boolean {
    return this.zip.file(partName) !== null
  }

  /**
   * Read and parse an XML part, returning its root element.
   */
  readXml(partName: string): Effect.Effect<XmlElement, DocumentParseError> {
    const file = this.zip.file(partName)
    if (!file) {
      return Effect.fail(
        new DocumentParseError({
          message: `Missing package part ${partName}`,
          format: this.format,
          part: partName,
        }),
      )
    }

    return Effect.tryPromise({
      try: async () => parseXml(await file.async('string')),
      catch: error =>
        new DocumentParseError({
          message: `Malformed package part ${partName}: ${describeCause(error)}`,
          format: this.format,
          part: partName,
          cause: error,
        }),
    })
  }

  /**
   * Internal relationships of a part, keyed by relationship id, with targets
   * resolved to package part names. A part without a relationships part has
   * none.
   */
  readRelationships(
    partName: string,
  ): Effect.Effect<Map<string, Relationship>, DocumentParseError> {
    const relsName = relationshipsPartName(partName)
    if (!this.has(relsName)) {
      return Effect.succeed(new Map())
    }

    return Effect.map(this.readXml(relsName), root => {
      const relationships = new Map<string, Relationship>()
      for (const rel of childElements(root, 'Relationship')) {
        const { Id: id, Type: type, Target: target, TargetMode: mode } = rel.attributes
        if (!id || !target || mode === 'External') continue
        relationships.set(id, { type: type ?? '', target: resolveTarget(partName, target) })
      }
      return relationships
    })
  }

  /**
   * Name of the main document part (`word/document.xml`,
   * `ppt/presentation.xml`), found through the package relationships.
   */
  mainPartName(fallback: string): Effect.Effect<string, DocumentParseError> {
    return Effect.map(this.readRelationships(''), relationships => {
      for (const rel of relationships.values()) {
        if (rel.type === OFFICE_DOCUMENT_REL_TYPE) return rel.target
      }
      return fallback
    })
  }
}

export interface Relationship {
  type: string
  /** Part name the relationship points at, without a leading slash */
  target: string
}

/**
 * Open an OOXML zip container.
 */
export function openPackage(
  data: Uint8Array,
  format: OoxmlFormat,
): Effect.Effect<OoxmlPackage, DocumentParseError> {
  return Effect.tryPromise({
    try: () => JSZip.loadAsync(data),
    catch: error =>
      new DocumentParseError({
        message: `Not a readable ${format} package: ${describeCause(error)}`,
        format,
        cause: error,
      }),
  }).pipe(Effect.map(zip => new OoxmlPackage(zip, format)))
}

// ============================================================================
// Part names
// ============================================================================

/** `ppt/slides/slide1.xml` → `ppt/slides/_rels/slide1.xml.rels`; `''` → `_rels/.rels` */
export function relationshipsPartName(partName: string): string {
  const dir = path.posix.dirname(partName)
  const base = path.posix.basename(partName)
  return path.posix.join(dir === '.' ? '' : dir, '_rels', `${base}.rels`)
}

export function resolveTarget(sourcePartName: string, target: string): string {
  if (target.startsWith('/')) return target.slice(1)

  const dir = path.posix.dirname(sourcePartName)
  return path.posix.normalize(path.posix.join(dir === '.' ? '' : dir, target))
}
