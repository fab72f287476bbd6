import type { Ingredient } from '@domain/models/Ingredient.ts'
import { IngredientParser, ingredientParser } from './IngredientParser.ts'

export interface LineRange {
  /** First line to keep, zero-based. */
  from?: number
  /** Line index to stop before. */
  to?: number
}

export interface ReportOptions {
  /** Parse each line on its own instead of one joined batch. */
  perLine?: boolean
  parser?: IngredientParser
}

/** Non-blank, trimmed lines of `text` within `range`. */
export function selectLines(text: string, range: LineRange = {}): string[] {
  return text
    .split(/\r?\n/)
    .slice(range.from ?? 0, range.to)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
}

export function formatIngredient(ingredient: Ingredient): string {
  return JSON.stringify({ quantity: ingredient.quantity, unit: ingredient.unit, name: ingredient.name })
}

export function formatReportLine(line: string, ingredients: readonly Ingredient[]): string {
  const rendered = ingredients.length > 0 ? ingredients.map(formatIngredient).join(' ') : '(no ingredient)'
  return `${line} => ${rendered}`
}

/**
 * Pair each line with what it parsed to.
 * In batch mode the lines are joined and the i-th ingredient is reported
 * against the i-th line; extra lines or ingredients are dropped.
 */
export function buildReport(lines: readonly string[], options: ReportOptions = {}): string[] {
  const parser = options.parser ?? ingredientParser

  if (options.perLine) {
    return parser.parseLines(lines).map(({ line, ingredients }) => formatReportLine(line, ingredients))
  }

  const ingredients = [...parser.parse(lines.join(' '))]
  const count = Math.min(lines.length, ingredients.length)
  const report: string[] = []
  for (let index = 0; index < count; index++) {
    report.push(formatReportLine(lines[index], [ingredients[index]]))
  }
  return report
}
