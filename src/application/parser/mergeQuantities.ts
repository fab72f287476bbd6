export interface MergedToken {
  text: string
  quantity: boolean
}

/** Tells whether the token at `index` of the list being scanned is an amount. */
export type QuantityTest = (token: string, index: number) => boolean

/** Text of a composite amount built from two adjacent quantity tokens. */
export function formatMixedNumber(first: string, second: string): string {
  return `(${first}, ${second})`
}

/**
 * Coalesce adjacent quantity tokens into one composite token, keeping
 * whether each output token is an amount. Composites always are.
 * Scanning resumes after a merged pair, so a composite is never merged again.
 */
export function coalesceQuantities(tokens: readonly string[], isQuantity: QuantityTest): MergedToken[] {
  const merged: MergedToken[] = []
  let index = 0

  while (index < tokens.length) {
    const current = tokens[index]
    const currentIsQuantity = isQuantity(current, index)
    const hasNext = index + 1 < tokens.length

    if (currentIsQuantity && hasNext && isQuantity(tokens[index + 1], index + 1)) {
      merged.push({ text: formatMixedNumber(current, tokens[index + 1]), quantity: true })
      index += 2
    } else {
      merged.push({ text: current, quantity: currentIsQuantity })
      index += 1
    }
  }

  return merged
}

/** ["1", "1/2", "cup"] -> ["(1, 1/2)", "cup"]. */
export function mergeQuantities(tokens: readonly string[], isQuantity: QuantityTest): string[] {
  return coalesceQuantities(tokens, isQuantity).map((token) => token.text)
}
