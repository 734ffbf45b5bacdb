/**
 * Runtime configuration.
 *
 * Values come from the environment, with a `.env` file in the working
 * directory loaded first when present.
 */

import { config as loadDotenv } from 'dotenv'
import { Config, Effect, LogLevel } from 'effect'

export type ReportFormat = 'text' | 'json'

export interface AnalyzerConfig {
  /** Minimum level for Effect log output (LOG_LEVEL) */
  logLevel: LogLevel.LogLevel
  /** How the CLI renders the report (REPORT_FORMAT) */
  reportFormat: ReportFormat
}

export const DEFAULT_CONFIG: AnalyzerConfig = {
  logLevel: LogLevel.Info,
  reportFormat: 'text',
}

const AnalyzerConfigSchema = Config.all({
  logLevel: Config.withDefault(Config.logLevel('LOG_LEVEL'), LogLevel.Info),
  reportFormat: Config.withDefault(
    Config.literal('text', 'json')('REPORT_FORMAT'),
    'text' as const,
  ),
})

/**
 * Load configuration from the environment.
 */
export const loadConfig: Effect.Effect<AnalyzerConfig, never> = Effect.gen(function*() {
  yield* Effect.sync(() => loadDotenv())

  return yield* Effect.orElse(AnalyzerConfigSchema, () =>
    Effect.gen(function*() {
      yield* Effect.logWarning('Invalid LOG_LEVEL or REPORT_FORMAT, using defaults')
      return DEFAULT_CONFIG
    }))
})
