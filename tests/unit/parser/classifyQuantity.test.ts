import { describe, it, expect, vi } from 'vitest'
import {
  QuantityClassifier,
  classifyQuantity,
  parseLiteralNumber,
  parseQuantityExpression,
} from '@application/parser/classifyQuantity.ts'
import { decodeNumeralGlyph } from '@application/parser/decodeNumeralGlyph.ts'

describe('parseLiteralNumber', () => {
  it('parses integers and decimals', () => {
    expect(parseLiteralNumber('1')).toBe(1)
    expect(parseLiteralNumber('1.5')).toBe(1.5)
    expect(parseLiteralNumber('.5')).toBe(0.5)
    expect(parseLiteralNumber('-2')).toBe(-2)
    expect(parseLiteralNumber('1e3')).toBe(1000)
  })

  it('rejects fractions, words and malformed numbers', () => {
    expect(parseLiteralNumber('1/3')).toBeNull()
    expect(parseLiteralNumber('cup')).toBeNull()
    expect(parseLiteralNumber('1.2.3')).toBeNull()
    expect(parseLiteralNumber('')).toBeNull()
  })
})

describe('decodeNumeralGlyph', () => {
  it('decodes vulgar fractions', () => {
    expect(decodeNumeralGlyph('½')).toBe(0.5)
    expect(decodeNumeralGlyph('¾')).toBe(0.75)
    expect(decodeNumeralGlyph('⅓')).toBeCloseTo(1 / 3, 6)
  })

  it('decodes digits from other scripts', () => {
    expect(decodeNumeralGlyph('٣')).toBe(3)
    expect(decodeNumeralGlyph('５')).toBe(5)
  })

  it('decodes compatibility numerals', () => {
    expect(decodeNumeralGlyph('⑩')).toBe(10)
  })

  it('decodes CJK, Roman and Tamil numerals', () => {
    expect(decodeNumeralGlyph('五')).toBe(5)
    expect(decodeNumeralGlyph('〇')).toBe(0)
    expect(decodeNumeralGlyph('万')).toBe(10000)
    expect(decodeNumeralGlyph('Ⅷ')).toBe(8)
    expect(decodeNumeralGlyph('ⅻ')).toBe(12)
    expect(decodeNumeralGlyph('௰')).toBe(10)
  })

  it('decodes the fraction numerator and zero-thirds glyphs', () => {
    expect(decodeNumeralGlyph('⅟')).toBe(1)
    expect(decodeNumeralGlyph('↉')).toBe(0)
  })

  it('only accepts a single non-ASCII glyph', () => {
    expect(decodeNumeralGlyph('1')).toBeNull()
    expect(decodeNumeralGlyph('½½')).toBeNull()
    expect(decodeNumeralGlyph('é')).toBeNull()
    expect(decodeNumeralGlyph('')).toBeNull()
  })
})

describe('parseQuantityExpression', () => {
  it('returns null instead of throwing for malformed expressions', () => {
    expect(parseQuantityExpression('1+2')).toBeNull()
    expect(parseQuantityExpression('(14.5 oz)')).toBeNull()
  })
})

describe('classifyQuantity', () => {
  it('classifies fractions as their quotient', () => {
    expect(classifyQuantity('1/3')).toBeCloseTo(1 / 3, 6)
    expect(classifyQuantity('1/2')).toBe(0.5)
  })

  it('keeps ranges as text', () => {
    expect(classifyQuantity('10-20')).toBe('10-20')
  })

  it('classifies unicode glyphs', () => {
    expect(classifyQuantity('½')).toBe(0.5)
    expect(classifyQuantity('↉')).toBe(0)
    expect(classifyQuantity('Ⅻ')).toBe(12)
  })

  it('classifies merged mixed numbers', () => {
    expect(classifyQuantity('(1, 1/2)')).toBe('(1, 0.5)')
    expect(classifyQuantity('(2, ½)')).toBe('(2, 0.5)')
  })

  it('counts zero as a quantity', () => {
    expect(classifyQuantity('0')).toBe(0)
  })

  it('returns null for words, asides and unsupported expressions', () => {
    expect(classifyQuantity('teaspoon')).toBeNull()
    expect(classifyQuantity('(14.5 oz)')).toBeNull()
    expect(classifyQuantity('(16)')).toBeNull()
    expect(classifyQuantity('1/2+1/4')).toBeNull()
    expect(classifyQuantity('1/0')).toBeNull()
  })

  it('returns equal results on repeated calls', () => {
    for (const token of ['1', '1.5', '1/3', '10-20', 'cup']) {
      expect(classifyQuantity(token)).toEqual(classifyQuantity(token))
    }
  })
})

describe('QuantityClassifier', () => {
  it('caches negative results', () => {
    const strategy = vi.fn(parseLiteralNumber)
    const classifier = new QuantityClassifier([strategy])

    expect(classifier.classify('cup')).toBeNull()
    expect(classifier.classify('cup')).toBeNull()
    expect(strategy).toHaveBeenCalledTimes(1)
    expect(classifier.cacheSize).toBe(1)
  })

  it('stops at the first strategy that succeeds', () => {
    const first = vi.fn(() => null)
    const second = vi.fn(() => 'second')
    const third = vi.fn(() => 3)
    const classifier = new QuantityClassifier([first, second, third])

    expect(classifier.classify('x')).toBe('second')
    expect(first).toHaveBeenCalledWith('x')
    expect(third).not.toHaveBeenCalled()
  })

  it('reports quantity membership', () => {
    const classifier = new QuantityClassifier()

    expect(classifier.isQuantity('1')).toBe(true)
    expect(classifier.isQuantity('water')).toBe(false)
  })
})
