import type { ParenSpan } from '@domain/models/Ingredient.ts'

/**
 * Locate `(...)` runs in a token list.
 * A run opens at a token starting with "(" and closes at the first token
 * ending with ")", possibly the same token. Runs do not nest: a "(" inside an
 * open run is plain content. A run that never closes is not reported.
 */
export function findParenSpans(tokens: readonly string[]): ParenSpan[] {
  const spans: ParenSpan[] = []
  let openAt: number | null = null

  for (let index = 0; index < tokens.length; index++) {
    const token = tokens[index]
    if (openAt === null && token.startsWith('(')) {
      openAt = index
    }
    if (openAt !== null && token.endsWith(')')) {
      spans.push({ start: openAt, end: index })
      openAt = null
    }
  }

  return spans
}

export interface FoldedTokens {
  tokens: string[]
  /** Indices in `tokens` of the folded asides, which never count as amounts. */
  asides: ReadonlySet<number>
}

/**
 * Replace each parenthesized run with one token, space-joined, and record
 * where the folded tokens landed:
 * ["1", "(16", "oz)", "box"] -> tokens ["1", "(16 oz)", "box"], asides {1}.
 */
export function foldAsides(tokens: readonly string[]): FoldedTokens {
  const folded: string[] = []
  const asides = new Set<number>()
  let cursor = 0

  for (const { start, end } of findParenSpans(tokens)) {
    folded.push(...tokens.slice(cursor, start))
    asides.add(folded.length)
    folded.push(tokens.slice(start, end + 1).join(' '))
    cursor = end + 1
  }
  folded.push(...tokens.slice(cursor))

  return { tokens: folded, asides }
}

export function foldParentheticals(tokens: readonly string[]): string[] {
  return foldAsides(tokens).tokens
}
