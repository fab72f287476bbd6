import { createIngredient, type Ingredient } from '@domain/models/Ingredient.ts'
import { MalformedIngredientError } from './errors.ts'
import type { QuantityTest } from './mergeQuantities.ts'

const WHITESPACE = /\s+/

export function tokenize(raw: string): string[] {
  return raw.split(WHITESPACE).filter((token) => token.length > 0)
}

/**
 * Split a merged token list into one group per ingredient.
 * A quantity token opens a new group unless the current group is still empty;
 * the final group is always kept.
 */
export function segmentTokens(
  tokens: readonly string[],
  isQuantity: QuantityTest,
): string[][] {
  const groups: string[][] = []
  let current: string[] = []

  for (const [index, token] of tokens.entries()) {
    if (current.length > 0 && isQuantity(token, index)) {
      groups.push(current)
      current = []
    }
    current.push(token)
  }
  if (current.length > 0) {
    groups.push(current)
  }

  return groups
}

/** Token 0 is the quantity, token 1 the unit, the rest the name. */
export function assembleIngredient(group: readonly string[], groupIndex = 0): Ingredient {
  if (group.length < 2) {
    throw new MalformedIngredientError(group, groupIndex)
  }

  const [quantity, unit, ...name] = group
  return createIngredient({ quantity, unit, name: name.join(' ') })
}
