import { describe, it, expect } from 'vitest'
import {
  buildReport,
  formatIngredient,
  formatReportLine,
  selectLines,
} from '@application/parser/formatIngredient.ts'

describe('selectLines', () => {
  it('drops blank lines and trims', () => {
    expect(selectLines('a\n\n  b \r\nc\n')).toEqual(['a', 'b', 'c'])
  })

  it('keeps the requested range', () => {
    expect(selectLines('a\nb\nc\nd', { from: 1, to: 3 })).toEqual(['b', 'c'])
  })
})

describe('formatIngredient', () => {
  it('renders the three fields as JSON', () => {
    expect(formatIngredient({ quantity: '1', unit: 'cup', name: 'water' })).toBe(
      '{"quantity":"1","unit":"cup","name":"water"}',
    )
  })

  it('marks lines without an ingredient', () => {
    expect(formatReportLine('salt', [])).toBe('salt => (no ingredient)')
  })
})

describe('buildReport', () => {
  it('pairs lines with the batch result', () => {
    expect(buildReport(['1 teaspoon water', '1 (16 oz) box pasta'])).toEqual([
      '1 teaspoon water => {"quantity":"1","unit":"teaspoon","name":"water"}',
      '1 (16 oz) box pasta => {"quantity":"1","unit":"(16 oz)","name":"box pasta"}',
    ])
  })

  it('parses lines on their own in per-line mode', () => {
    expect(buildReport(['salt', '2 cup flour'], { perLine: true })).toEqual([
      'salt => (no ingredient)',
      '2 cup flour => {"quantity":"2","unit":"cup","name":"flour"}',
    ])
  })
})
