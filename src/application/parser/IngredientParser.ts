import type { Ingredient, QuantityValue } from '@domain/models/Ingredient.ts'
import { parserLogger } from '@infrastructure/logging/logger.ts'
import { QuantityClassifier, defaultClassifier } from './classifyQuantity.ts'
import { MalformedIngredientError } from './errors.ts'
import { coalesceQuantities, type MergedToken } from './mergeQuantities.ts'
import { foldAsides } from './parseParenthetical.ts'
import { assembleIngredient, segmentTokens, tokenize } from './segmentIngredients.ts'

const log = parserLogger.child({ component: 'IngredientParser' })

export type IngredientResult =
  | { ok: true; ingredient: Ingredient }
  | { ok: false; error: MalformedIngredientError }

export interface ParseOptions {
  /** Called for each group that cannot be assembled; the batch continues. */
  onMalformed?: (error: MalformedIngredientError) => void
}

export interface LineParseResult {
  line: string
  ingredients: Ingredient[]
}

function assembleResult(group: readonly string[], groupIndex: number): IngredientResult {
  try {
    return { ok: true, ingredient: assembleIngredient(group, groupIndex) }
  } catch (error) {
    if (error instanceof MalformedIngredientError) return { ok: false, error }
    throw error
  }
}

function* assembleGroups(groups: readonly string[][]): Generator<IngredientResult> {
  for (const [groupIndex, group] of groups.entries()) {
    yield assembleResult(group, groupIndex)
  }
}

function* skipMalformed(
  results: Iterable<IngredientResult>,
  options: ParseOptions,
): Generator<Ingredient> {
  for (const result of results) {
    if (result.ok) {
      yield result.ingredient
      continue
    }
    log.warn({ group: result.error.group, groupIndex: result.error.groupIndex }, result.error.message)
    options.onMalformed?.(result.error)
  }
}

/**
 * Segments free-text ingredient lines into (quantity, unit, name) records.
 *
 * Pipeline:
 * 1. Split on whitespace
 * 2. Fold parenthesized asides into one token; asides are never amounts
 * 3. Coalesce adjacent quantities into mixed numbers
 * 4. Open a new group at every quantity token
 * 5. Assemble each group, lazily, into an Ingredient
 */
export class IngredientParser {
  private readonly classifier: QuantityClassifier

  constructor(classifier: QuantityClassifier = defaultClassifier) {
    this.classifier = classifier
  }

  classify(token: string): QuantityValue | null {
    return this.classifier.classify(token)
  }

  /** Both merge passes; folded asides never count as amounts. */
  private mergeTagged(raw: string): MergedToken[] {
    const { tokens, asides } = foldAsides(tokenize(raw))
    return coalesceQuantities(
      tokens,
      (token, index) => !asides.has(index) && this.classifier.isQuantity(token),
    )
  }

  /** Tokens after both merge passes. */
  mergeTokens(raw: string): string[] {
    return this.mergeTagged(raw).map((token) => token.text)
  }

  /** Token groups, one per detected ingredient. */
  segment(raw: string): string[][] {
    const merged = this.mergeTagged(raw)
    const groups = segmentTokens(
      merged.map((token) => token.text),
      (_token, index) => merged[index].quantity,
    )
    log.debug({ tokens: merged.length, groups: groups.length }, 'Segmented ingredient text')
    return groups
  }

  /**
   * One result per group, malformed groups included.
   * Merging runs now; assembly runs as the sequence is consumed.
   */
  parseResults(raw: string): Generator<IngredientResult> {
    return assembleGroups(this.segment(raw))
  }

  /** Ingredients in input order; malformed groups are logged and skipped. */
  parse(raw: string, options: ParseOptions = {}): Generator<Ingredient> {
    return skipMalformed(this.parseResults(raw), options)
  }

  /** Parse each line on its own so results stay attached to their line. */
  parseLines(lines: readonly string[], options: ParseOptions = {}): LineParseResult[] {
    return lines.map((line) => ({ line, ingredients: [...this.parse(line, options)] }))
  }
}

export const ingredientParser = new IngredientParser()

export function parseIngredients(raw: string, options?: ParseOptions): Generator<Ingredient> {
  return ingredientParser.parse(raw, options)
}

export function parseIngredientResults(raw: string): Generator<IngredientResult> {
  return ingredientParser.parseResults(raw)
}

export function parseIngredientLines(
  lines: readonly string[],
  options?: ParseOptions,
): LineParseResult[] {
  return ingredientParser.parseLines(lines, options)
}
