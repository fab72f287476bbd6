import type { QuantityValue } from '@domain/models/Ingredient.ts'
import { decodeNumeralGlyph } from './decodeNumeralGlyph.ts'
import { MalformedExpressionError } from './errors.ts'

/**
 * Closed grammar for amounts written as small arithmetic:
 *
 *   expression := tuple | element
 *   tuple      := '(' element (',' element)+ ')'
 *   element    := operand (('/' | '-' | '+') operand)?
 *   operand    := ('-' | '+')? NUMBER
 *
 * NUMBER is a decimal literal or a single numeral glyph (½, ⅓).
 * Nothing outside this grammar is ever evaluated.
 */

type Operator = '/' | '-' | '+'

type ExpressionToken =
  | { kind: 'number'; value: number }
  | { kind: 'operator'; operator: Operator }
  | { kind: 'open' }
  | { kind: 'close' }
  | { kind: 'comma' }

type ElementNode =
  | { type: 'number'; value: number }
  | { type: 'binary'; operator: Operator; left: number; right: number }

type ExpressionNode = ElementNode | { type: 'tuple'; elements: ElementNode[] }

const NUMBER_PATTERN = /^(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/
const WHITESPACE = /\s/

function isOperator(char: string): char is Operator {
  return char === '/' || char === '-' || char === '+'
}

function tokenizeExpression(source: string): ExpressionToken[] {
  const tokens: ExpressionToken[] = []
  let index = 0

  while (index < source.length) {
    const rest = source.slice(index)
    const char = rest[0]

    if (WHITESPACE.test(char)) {
      index++
      continue
    }

    const numberMatch = rest.match(NUMBER_PATTERN)
    if (numberMatch) {
      tokens.push({ kind: 'number', value: Number(numberMatch[0]) })
      index += numberMatch[0].length
      continue
    }

    if (isOperator(char)) {
      tokens.push({ kind: 'operator', operator: char })
    } else if (char === '(') {
      tokens.push({ kind: 'open' })
    } else if (char === ')') {
      tokens.push({ kind: 'close' })
    } else if (char === ',') {
      tokens.push({ kind: 'comma' })
    } else {
      // Glyphs outside the BMP take two UTF-16 units
      const glyph = String.fromCodePoint(rest.codePointAt(0) ?? 0)
      const value = decodeNumeralGlyph(glyph)
      if (value === null) {
        throw new MalformedExpressionError(source, `unexpected character "${glyph}"`)
      }
      tokens.push({ kind: 'number', value })
      index += glyph.length
      continue
    }
    index++
  }

  return tokens
}

class ExpressionParser {
  private position = 0

  constructor(
    private readonly source: string,
    private readonly tokens: ExpressionToken[],
  ) {}

  parse(): ExpressionNode {
    const node = this.peek()?.kind === 'open' ? this.parseTuple() : this.parseElement()
    const trailing = this.peek()
    if (trailing) {
      throw this.fail(`unexpected ${trailing.kind} after expression`)
    }
    return node
  }

  private parseTuple(): ExpressionNode {
    this.position++ // '('
    const elements = [this.parseElement()]
    while (this.peek()?.kind === 'comma') {
      this.position++
      elements.push(this.parseElement())
    }
    if (this.peek()?.kind !== 'close') {
      throw this.fail('unclosed tuple')
    }
    this.position++
    if (elements.length < 2) {
      throw this.fail('a parenthesized amount needs at least two elements')
    }
    return { type: 'tuple', elements }
  }

  private parseElement(): ElementNode {
    const left = this.parseOperand()
    const next = this.peek()
    if (next?.kind !== 'operator') {
      return { type: 'number', value: left }
    }
    this.position++
    const right = this.parseOperand()
    return { type: 'binary', operator: next.operator, left, right }
  }

  private parseOperand(): number {
    let sign = 1
    const first = this.peek()
    if (first?.kind === 'operator' && first.operator !== '/') {
      sign = first.operator === '-' ? -1 : 1
      this.position++
    }
    const token = this.peek()
    if (token?.kind !== 'number') {
      throw this.fail('expected a number')
    }
    this.position++
    return sign * token.value
  }

  private peek(): ExpressionToken | undefined {
    return this.tokens[this.position]
  }

  private fail(reason: string): MalformedExpressionError {
    return new MalformedExpressionError(this.source, reason)
  }
}

function renderElement(source: string, node: ElementNode): QuantityValue {
  if (node.type === 'number') return node.value

  switch (node.operator) {
    case '/': {
      const quotient = node.left / node.right
      if (!Number.isFinite(quotient)) {
        throw new MalformedExpressionError(source, 'division does not produce a finite amount')
      }
      return quotient
    }
    case '-':
      // Ranges stay textual: "10-20" is never the difference
      return `${node.left}-${node.right}`
    case '+':
      throw new MalformedExpressionError(source, 'addition is not a supported amount')
  }
}

/**
 * Evaluate a token as a quantity expression.
 * Throws MalformedExpressionError when the token is outside the grammar or
 * renders to something other than a fraction, range or tuple.
 */
export function evaluateQuantityExpression(source: string): QuantityValue {
  const node = new ExpressionParser(source, tokenizeExpression(source)).parse()

  if (node.type === 'tuple') {
    const rendered = node.elements.map((element) => String(renderElement(source, element)))
    return `(${rendered.join(', ')})`
  }
  if (node.type === 'number') {
    throw new MalformedExpressionError(source, 'a bare number is not an expression')
  }
  return renderElement(source, node)
}
