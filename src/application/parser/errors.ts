/** Raised when a token cannot be read as a quantity expression. */
export class MalformedExpressionError extends Error {
  readonly source: string

  constructor(source: string, reason: string) {
    super(`Malformed quantity expression "${source}": ${reason}`)
    this.name = 'MalformedExpressionError'
    this.source = source
  }
}

/** Raised when a token group is too short to hold a quantity and a unit. */
export class MalformedIngredientError extends Error {
  readonly group: readonly string[]
  readonly groupIndex: number

  constructor(group: readonly string[], groupIndex: number) {
    const text = group.join(' ')
    super(`Malformed ingredient line at group ${groupIndex}: "${text}" needs a quantity and a unit`)
    this.name = 'MalformedIngredientError'
    this.group = group
    this.groupIndex = groupIndex
  }
}
