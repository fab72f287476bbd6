/**
 * Print what each ingredient line of a text file parses to.
 *
 * Usage: npm run parse -- [file] [--from=N] [--to=N] [--per-line]
 * The file defaults to INGREDIENTS_FILE.
 */

import fs from 'fs'
import path from 'path'
import { parseCliArgs } from '@application/cli/parseCliArgs.ts'
import { buildReport, selectLines } from '@application/parser/formatIngredient.ts'
import { ENV } from '@infrastructure/config/env.ts'
import { cliLogger as log } from '@infrastructure/logging/logger.ts'

function run(): void {
  const opts = parseCliArgs(process.argv.slice(2))
  const filePath = path.resolve(process.cwd(), opts.file ?? ENV.INGREDIENTS_FILE)

  if (!fs.existsSync(filePath)) {
    log.error({ filePath }, 'Ingredient file not found')
    process.exitCode = 1
    return
  }

  const lines = selectLines(fs.readFileSync(filePath, 'utf-8'), { from: opts.from, to: opts.to })
  log.debug({ filePath, lines: lines.length, perLine: opts.perLine }, 'Parsing ingredient file')

  for (const line of buildReport(lines, { perLine: opts.perLine })) {
    console.log(line)
  }
}

try {
  run()
} catch (err) {
  log.error({ err }, 'parse-ingredients failed')
  process.exitCode = 1
}
