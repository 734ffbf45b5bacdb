/**
 * Document complexity CLI
 *
 * Usage: analyze <file> [--type pdf|docx|pptx] [--json]
 *
 * The type defaults to the file's extension. Logs go to stderr so the
 * report on stdout stays machine-readable.
 */

import { Effect, Logger } from 'effect'
import { readFile } from 'fs/promises'
import path from 'path'
import { parseArgs } from 'util'
import { analyzeDocument, checkFileExtension, parseDocumentFormat } from './lib/analyzer'
import { loadConfig } from './lib/config'
import { describeCause, InputError } from './lib/errors'
import { formatReport } from './lib/report'

const USAGE = 'Usage: analyze <file> [--type pdf|docx|pptx] [--json]'

const StderrLogger = Logger.replace(
  Logger.defaultLogger,
  Logger.withConsoleError(Logger.logfmtLogger),
)

const program = Effect.gen(function*() {
  const { values, positionals } = yield* Effect.try({
    try: () =>
      parseArgs({
        args: process.argv.slice(2),
        options: {
          type: { type: 'string', short: 't' },
          json: { type: 'boolean', default: false },
        },
        allowPositionals: true,
      }),
    catch: error => new InputError({ message: `${describeCause(error)}\n${USAGE}` }),
  })

  const files = positionals[0] === 'analyze' ? positionals.slice(1) : positionals
  const file = files[0]
  if (file === undefined || files.length > 1) {
    return yield* Effect.fail(new InputError({ message: USAGE }))
  }

  const format = yield* parseDocumentFormat(values.type ?? path.extname(file))
  yield* checkFileExtension(file, format)

  const data = yield* Effect.tryPromise({
    try: () => readFile(file),
    catch: error => new InputError({ message: `Cannot read ${file}: ${describeCause(error)}` }),
  })

  const config = yield* loadConfig
  const report = yield* analyzeDocument(new Uint8Array(data), format).pipe(
    Logger.withMinimumLogLevel(config.logLevel),
  )

  console.log(formatReport(report, values.json ? 'json' : config.reportFormat))
})

Effect.runPromise(
  program.pipe(
    Effect.catchAll(error =>
      Effect.sync(() => {
        console.error(`${error._tag}: ${error.message}`)
        process.exitCode = 1
      })
    ),
    Effect.provide(StderrLogger),
  ),
).catch((defect: unknown) => {
  console.error(describeCause(defect))
  process.exitCode = 1
})
