/**
 * Small descriptive statistics over number samples.
 * Every function returns 0 for an empty sample.
 */

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0
  return values.reduce((sum, v) => sum + v, 0) / values.length
}

/** Standard deviation with the population (N) denominator */
export function populationStdDev(values: readonly number[]): number {
  if (values.length === 0) return 0
  const avg = mean(values)
  const variance = values.reduce((sum, v) => sum + (v - avg) ** 2, 0) / values.length
  return Math.sqrt(variance)
}

/**
 * Percentile with linear interpolation between the two closest ranks.
 *
 * @param p - percentile in [0, 100]
 */
export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) return 0

  const sorted = [...values].sort((a, b) => a - b)
  const rank = (Math.min(Math.max(p, 0), 100) / 100) * (sorted.length - 1)
  const lower = Math.floor(rank)
  const upper = Math.ceil(rank)

  if (lower === upper) return sorted[lower]
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (rank - lower)
}
