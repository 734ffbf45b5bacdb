import { describe, expect, it } from 'vitest'
import {
  childAt,
  childElements,
  findDescendants,
  ownText,
  parseXml,
} from '../../../src/lib/office/xml'

const SAMPLE = `<?xml version="1.0" encoding="UTF-8"?>
<a:root xmlns:a="urn:test">
  <a:item key="first"><a:t>one &amp; two</a:t></a:item>
  <a:group><a:item key="nested"/></a:group>
  <a:empty/>
</a:root>`

describe('parseXml', () => {
  it('returns the root element with its attributes', () => {
    const root = parseXml(SAMPLE)
    expect(root.name).toBe('a:root')
    expect(root.attributes['xmlns:a']).toBe('urn:test')
  })

  it('keeps child order and skips whitespace between elements', () => {
    const root = parseXml(SAMPLE)
    expect(childElements(root).map(el => el.name)).toEqual(['a:item', 'a:group', 'a:empty'])
  })

  it('decodes character data', () => {
    const t = childAt(parseXml(SAMPLE), ['a:item', 'a:t'])
    expect(t && ownText(t)).toBe('one & two')
  })

  it('rejects malformed XML', () => {
    expect(() => parseXml('<a><b></a>')).toThrow(/Malformed XML/)
  })
})

describe('findDescendants', () => {
  it('finds matches at any depth in document order', () => {
    const items = findDescendants(parseXml(SAMPLE), 'a:item')
    expect(items.map(el => el.attributes.key)).toEqual(['first', 'nested'])
  })

  it('does not descend into skipped elements', () => {
    const items = findDescendants(parseXml(SAMPLE), 'a:item', new Set(['a:group']))
    expect(items.map(el => el.attributes.key)).toEqual(['first'])
  })
})
