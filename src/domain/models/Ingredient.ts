/** A whitespace-delimited run of characters from an ingredient line. */
export type Token = string

/**
 * Value of a token that reads as an amount. Plain numbers come from literals,
 * numeral glyphs and divisions; ranges and tuples are rendered as text
 * (`"10-20"`, `"(1, 0.5)"`).
 */
export type QuantityValue = number | string

export interface Ingredient {
  readonly quantity: string
  readonly unit: string
  readonly name: string
}

/** Inclusive token indices of a folded `(...)` run. */
export interface ParenSpan {
  start: number
  end: number
}

export function createIngredient(fields: Ingredient): Ingredient {
  return Object.freeze({ quantity: fields.quantity, unit: fields.unit, name: fields.name })
}
