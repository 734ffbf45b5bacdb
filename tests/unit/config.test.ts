import { describe, it } from '@effect/vitest'
import { ConfigProvider, Effect, LogLevel } from 'effect'
import { expect } from 'vitest'
import { DEFAULT_CONFIG, loadConfig } from '../../src/lib/config'

function withEnv(entries: ReadonlyArray<[string, string]>) {
  return Effect.withConfigProvider(ConfigProvider.fromMap(new Map(entries)))
}

describe('loadConfig', () => {
  it.effect('uses defaults when nothing is set', () =>
    Effect.gen(function*() {
      const config = yield* loadConfig.pipe(withEnv([]))
      expect(config).toEqual(DEFAULT_CONFIG)
    }))

  it.effect('reads LOG_LEVEL and REPORT_FORMAT', () =>
    Effect.gen(function*() {
      const config = yield* loadConfig.pipe(
        withEnv([['LOG_LEVEL', 'Debug'], ['REPORT_FORMAT', 'json']]),
      )
      expect(config.logLevel).toBe(LogLevel.Debug)
      expect(config.reportFormat).toBe('json')
    }))

  it.effect('falls back to defaults for invalid values', () =>
    Effect.gen(function*() {
      const config = yield* loadConfig.pipe(withEnv([['REPORT_FORMAT', 'xml']]))
      expect(config).toEqual(DEFAULT_CONFIG)
    }))
})
