import { numericQuantity } from 'numeric-quantity'
import numeralGlyphs from '@domain/constants/numeralGlyphs.json'

/** Numerals read from a table: CJK, Roman and Tamil numerals, and the fractions ⅟ ↉ ⅐ ⅑ ⅒. */
const NUMERAL_GLYPHS: Readonly<Record<string, number>> = numeralGlyphs

const DECIMAL_DIGIT = /^\p{Nd}$/u
const ASCII_DIGITS = /^\d+$/

/**
 * Value of a Unicode decimal digit from any script.
 * Digit blocks are runs of ten code points starting at zero, so the value is
 * the offset from the start of the run modulo ten.
 */
function decimalDigitValue(glyph: string): number | null {
  const codePoint = glyph.codePointAt(0)
  if (codePoint === undefined || !DECIMAL_DIGIT.test(glyph)) return null

  let runStart = codePoint
  while (runStart > 0 && DECIMAL_DIGIT.test(String.fromCodePoint(runStart - 1))) {
    runStart--
  }
  return (codePoint - runStart) % 10
}

/**
 * Decode a token made of exactly one non-ASCII numeral glyph:
 * vulgar fractions (½, ⅓, ⅞), decimal digits of other scripts (٣, ５),
 * compatibility numerals such as ² or ⑩, and the table above (五, Ⅷ, ௰).
 * Returns null for anything else.
 */
export function decodeNumeralGlyph(token: string): number | null {
  const glyphs = Array.from(token)
  if (glyphs.length !== 1) return null

  const glyph = glyphs[0]
  const codePoint = glyph.codePointAt(0)
  if (codePoint === undefined || codePoint < 0x80) return null

  if (Object.hasOwn(NUMERAL_GLYPHS, glyph)) return NUMERAL_GLYPHS[glyph]

  const fraction = numericQuantity(glyph, { round: false })
  if (!isNaN(fraction)) return fraction

  const digit = decimalDigitValue(glyph)
  if (digit !== null) return digit

  const compatible = glyph.normalize('NFKC')
  if (ASCII_DIGITS.test(compatible)) return Number(compatible)

  return null
}
