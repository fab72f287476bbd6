import type { QuantityValue } from '@domain/models/Ingredient.ts'
import { decodeNumeralGlyph } from './decodeNumeralGlyph.ts'
import { MalformedExpressionError } from './errors.ts'
import { evaluateQuantityExpression } from './quantityExpression.ts'

/** A single way of reading a token as an amount; null means "cannot parse". */
export type QuantityStrategy = (token: string) => QuantityValue | null

const LITERAL_NUMBER = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/

/** Integer and decimal literals: "1", "1.5", "-2", ".5". */
export function parseLiteralNumber(token: string): number | null {
  if (!LITERAL_NUMBER.test(token)) return null
  const value = Number(token)
  return Number.isFinite(value) ? value : null
}

/** Fractions, ranges and mixed-number tuples: "1/3", "10-20", "(1, 1/2)". */
export function parseQuantityExpression(token: string): QuantityValue | null {
  try {
    return evaluateQuantityExpression(token)
  } catch (error) {
    if (error instanceof MalformedExpressionError) return null
    throw error
  }
}

export const QUANTITY_STRATEGIES: readonly QuantityStrategy[] = [
  parseLiteralNumber,
  decodeNumeralGlyph,
  parseQuantityExpression,
]

/**
 * Decides whether a token denotes an amount. Results, including negative
 * ones, are cached by token text for the lifetime of the instance.
 */
export class QuantityClassifier {
  private readonly cache = new Map<string, QuantityValue | null>()
  private readonly strategies: readonly QuantityStrategy[]

  constructor(strategies: readonly QuantityStrategy[] = QUANTITY_STRATEGIES) {
    this.strategies = strategies
  }

  classify(token: string): QuantityValue | null {
    if (this.cache.has(token)) {
      return this.cache.get(token) ?? null
    }

    let value: QuantityValue | null = null
    for (const strategy of this.strategies) {
      value = strategy(token)
      if (value !== null) break
    }

    this.cache.set(token, value)
    return value
  }

  isQuantity(token: string): boolean {
    return this.classify(token) !== null
  }

  get cacheSize(): number {
    return this.cache.size
  }
}

/** Process-wide classifier shared by the module-level parse functions. */
export const defaultClassifier = new QuantityClassifier()

export function classifyQuantity(token: string): QuantityValue | null {
  return defaultClassifier.classify(token)
}
