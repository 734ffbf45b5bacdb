/**
 * Node.js PDF Service Implementation
 *
 * Uses the PDF.js legacy build, which runs in Node.js without a DOM. Tables
 * come from the page's ruling lines, images from the operator list and text
 * blocks from the text content layout.
 */

import { createRequire } from 'module'
import path from 'path'
import type { PDFDocumentProxy } from 'pdfjs-dist'
import { getDocument, GlobalWorkerOptions, OPS } from 'pdfjs-dist/legacy/build/pdf.mjs'
import { pathToFileURL } from 'url'
import type { Table } from '../complexity/types'
import { collectRulingEdges } from './ruling-lines'
import { detectTables } from './table-detector'
import { groupTextBlocks } from './text-layout'
import type { PdfService, TextFragment } from './types'

type PDFPageProxy = Awaited<ReturnType<PDFDocumentProxy['getPage']>>

// Configure PDF.js worker and font data paths for Node.js
const require = createRequire(import.meta.url)
const PDFJS_ROOT = path.dirname(require.resolve('pdfjs-dist/package.json'))

GlobalWorkerOptions.workerSrc = pathToFileURL(
  path.join(PDFJS_ROOT, 'legacy/build/pdf.worker.mjs'),
).href

const STANDARD_FONT_DATA_PATH = path.join(PDFJS_ROOT, 'standard_fonts') + path.sep
const CMAP_PATH = path.join(PDFJS_ROOT, 'cmaps') + path.sep

/** Operators that paint a named image XObject */
const IMAGE_XOBJECT_OPS: ReadonlySet<number> = new Set([
  OPS.paintImageXObject,
  OPS.paintImageXObjectRepeat,
])

/**
 * Node.js implementation of PdfService using PDF.js
 */
export class NodePdfService implements PdfService {
  private pdfDoc: PDFDocumentProxy | null = null

  async load(data: Uint8Array): Promise<void> {
    // PDF.js takes ownership of the buffer it is given
    const loadingTask = getDocument({
      data: new Uint8Array(data),
      useSystemFonts: false,
      isEvalSupported: false,
      standardFontDataUrl: STANDARD_FONT_DATA_PATH,
      cMapUrl: CMAP_PATH,
      cMapPacked: true,
      verbosity: 0,
    })

    this.pdfDoc = await loadingTask.promise
  }

  async destroy(): Promise<void> {
    if (this.pdfDoc) {
      const pdf = this.pdfDoc
      this.pdfDoc = null
      await pdf.destroy()
    }
  }

  private ensureLoaded(): PDFDocumentProxy {
    if (!this.pdfDoc) {
      throw new Error('PDF not loaded. Call load() first.')
    }
    return this.pdfDoc
  }

  getPageCount(): number {
    return this.ensureLoaded().numPages
  }

  async getPageTables(pageNum: number): Promise<Table[]> {
    const page = await this.ensureLoaded().getPage(pageNum)
    const operatorList = await page.getOperatorList()
    const edges = collectRulingEdges(operatorList.fnArray, operatorList.argsArray)
    if (edges.length === 0) return []

    return detectTables(edges, await getTextFragments(page))
  }

  async getPageImageCount(pageNum: number): Promise<number> {
    const page = await this.ensureLoaded().getPage(pageNum)
    const operatorList = await page.getOperatorList()

    const names = new Set<string>()
    operatorList.fnArray.forEach((op, i) => {
      if (!IMAGE_XOBJECT_OPS.has(op)) return
      const args: unknown = operatorList.argsArray[i]
      const name = Array.isArray(args) ? args[0] : undefined
      if (typeof name === 'string') names.add(name)
    })

    return names.size
  }

  async getPageTextBlocks(pageNum: number): Promise<string[]> {
    const page = await this.ensureLoaded().getPage(pageNum)
    return groupTextBlocks(await getTextFragments(page))
  }
}

/**
 * Positioned text runs of a page, in PDF user space.
 */
async function getTextFragments(page: PDFPageProxy): Promise<TextFragment[]> {
  const textContent = await page.getTextContent()
  const fragments: TextFragment[] = []

  for (const item of textContent.items) {
    if (!('str' in item) || item.str.length === 0) continue

    const [, , c, d, e, f] = item.transform
    fragments.push({
      text: item.str,
      x: e,
      y: f,
      width: item.width,
      height: item.height > 0 ? item.height : Math.hypot(c, d),
    })
  }

  return fragments
}
