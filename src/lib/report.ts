/**
 * Report rendering
 */

import type { ComplexityReport } from './complexity/types'
import type { ReportFormat } from './config'

/** Display label of each reported field, in display order */
export const REPORT_LABELS = [
  ['complexTableCount', 'Complex Tables Found'],
  ['columnCount', 'Columns Detected'],
  ['denseParagraphCount', 'Dense Paragraphs'],
  ['imageCount', 'Images Found'],
  ['finalScore', 'Final Complexity Score'],
  ['complexityLevel', 'Complexity Level'],
] as const satisfies ReadonlyArray<readonly [keyof ComplexityReport, string]>

/**
 * Render a report as `Label: value` lines, or as indented JSON.
 */
export function formatReport(report: ComplexityReport, format: ReportFormat = 'text'): string {
  if (format === 'json') {
    return JSON.stringify(report, null, 2)
  }
  return REPORT_LABELS.map(([key, label]) => `${label}: ${report[key]}`).join('\n')
}
