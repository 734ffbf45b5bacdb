/**
 * Text measurement shared by the format extractors.
 */

/** Number of Unicode code points; astral characters count once */
export function characterCount(text: string): number {
  return [...text].length
}
