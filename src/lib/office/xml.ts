/**
 * Minimal XML element tree for OOXML parts.
 *
 * fast-xml-parser runs in order-preserving mode; its loosely typed output is
 * narrowed here into `XmlElement` nodes so the readers walk typed data.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser'

// ============================================================================
// Types
// ============================================================================

export interface XmlElement {
  /** Qualified tag name, e.g. `w:tbl` */
  name: string
  attributes: Readonly<Record<string, string>>
  children: readonly XmlNode[]
}

/** An element or a run of character data */
export type XmlNode = XmlElement | string

const ATTRIBUTES_KEY = ':@'
const TEXT_KEY = '#text'

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  ignoreDeclaration: true,
  // Numeric character references (&#233;, &#x2019;) are decoded with the named ones
  htmlEntities: true,
  trimValues: false,
  parseTagValue: false,
  parseAttributeValue: false,
})

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse an XML document and return its root element.
 * Throws when the text is not well-formed or has no root element.
 */
export function parseXml(xml: string): XmlElement {
  const validation = XMLValidator.validate(xml)
  if (validation !== true) {
    const { msg, line } = validation.err
    throw new Error(`Malformed XML at line ${line}: ${msg}`)
  }

  const root = toNodes(parser.parse(xml)).find(isElement)
  if (!root) {
    throw new Error('XML document has no root element')
  }
  return root
}

function toNodes(value: unknown): XmlNode[] {
  if (!Array.isArray(value)) return []

  const nodes: XmlNode[] = []
  for (const entry of value) {
    if (!isRecord(entry)) continue

    for (const [key, content] of Object.entries(entry)) {
      if (key === ATTRIBUTES_KEY || key.startsWith('?')) continue

      if (key === TEXT_KEY) {
        nodes.push(String(content))
        continue
      }

      nodes.push({
        name: key,
        attributes: toAttributes(entry[ATTRIBUTES_KEY]),
        children: toNodes(content),
      })
    }
  }
  return nodes
}

function toAttributes(value: unknown): Record<string, string> {
  if (!isRecord(value)) return {}

  const attributes: Record<string, string> = {}
  for (const [key, attr] of Object.entries(value)) {
    attributes[key] = String(attr)
  }
  return attributes
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

// ============================================================================
// Navigation
// ============================================================================

export function isElement(node: XmlNode): node is XmlElement {
  return typeof node !== 'string'
}

/** Direct child elements, optionally filtered by tag name */
export function childElements(element: XmlElement, name?: string): XmlElement[] {
  return element.children.filter(
    (node): node is XmlElement => isElement(node) && (name === undefined || node.name === name),
  )
}

export function firstChild(element: XmlElement, name: string): XmlElement | undefined {
  return childElements(element, name)[0]
}

/** Follow a path of direct children, e.g. `['p:cSld', 'p:spTree']` */
export function childAt(element: XmlElement, path: readonly string[]): XmlElement | undefined {
  let current: XmlElement | undefined = element
  for (const name of path) {
    if (!current) return undefined
    current = firstChild(current, name)
  }
  return current
}

/**
 * All descendant elements with the given name, in document order.
 * Does not descend into matches or into elements named in `skip`.
 */
export function findDescendants(
  element: XmlElement,
  name: string,
  skip: ReadonlySet<string> = new Set(),
): XmlElement[] {
  const found: XmlElement[] = []

  const walk = (node: XmlElement) => {
    for (const child of childElements(node)) {
      if (child.name === name) {
        found.push(child)
      } else if (!skip.has(child.name)) {
        walk(child)
      }
    }
  }

  walk(element)
  return found
}

/** Concatenated character data directly inside an element */
export function ownText(element: XmlElement): string {
  return element.children.filter((node): node is string => !isElement(node)).join('')
}
