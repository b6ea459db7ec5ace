/**
 * Numeric value parsing unit tests
 */

import { describe, test, expect } from '@jest/globals'
import { extractLineValue, extractRowValue, parseCellValue } from '@/lib/parsers/numeric-value'

describe('parseCellValue', () => {
  test('passes numbers through', () => {
    expect(parseCellValue(1250.5)).toBe(1250.5)
    expect(parseCellValue(-40000)).toBe(-40000)
    expect(parseCellValue(0)).toBe(0)
  })

  test('skips non-finite numbers', () => {
    expect(parseCellValue(Number.NaN)).toBeUndefined()
    expect(parseCellValue(Number.POSITIVE_INFINITY)).toBeUndefined()
  })

  test('strips separators and currency symbols', () => {
    expect(parseCellValue('1,234,567')).toBe(1234567)
    expect(parseCellValue('$12,500')).toBe(12500)
    expect(parseCellValue('AUD 3,000.25')).toBe(3000.25)
  })

  test('parenthesised values are negative', () => {
    expect(parseCellValue('(500,000)')).toBe(-500000)
    expect(parseCellValue('($1,200)')).toBe(-1200)
  })

  test('placeholder tokens are absent, not zero', () => {
    for (const token of ['-', 'nil', 'NIL', 'n/a', '', '  ', 'nan']) {
      expect(parseCellValue(token)).toBeUndefined()
    }
  })

  test('text, booleans and empty cells are absent', () => {
    expect(parseCellValue('Revenue')).toBeUndefined()
    expect(parseCellValue('12 months')).toBeUndefined()
    expect(parseCellValue(true)).toBeUndefined()
    expect(parseCellValue(null)).toBeUndefined()
    expect(parseCellValue(undefined)).toBeUndefined()
  })
})

describe('extractRowValue', () => {
  test('takes the rightmost numeric cell', () => {
    expect(extractRowValue(['Revenue', 1100000, 1200000])).toBe(1200000)
  })

  test('continues leftward past placeholders and text', () => {
    expect(extractRowValue(['Borrowings', 200000, '-'])).toBe(200000)
    expect(extractRowValue(['Borrowings', '150,000', 'see note 5', null])).toBe(150000)
  })

  test('never reads the label cell', () => {
    expect(extractRowValue([2024])).toBeUndefined()
    expect(extractRowValue(['Current assets'])).toBeUndefined()
  })

  test('a row with no numeric cell is absent', () => {
    expect(extractRowValue(['Reserves', 'nil', '-'])).toBeUndefined()
  })
})

describe('extractLineValue', () => {
  test('takes the last currency token on the line', () => {
    expect(extractLineValue('Revenue 3 $1,100,000')).toBe(1100000)
    expect(extractLineValue('Borrowings 200,000 180,000')).toBe(180000)
  })

  test('parenthesised and minus-prefixed tokens are negative', () => {
    expect(extractLineValue('Cost of sales (500,000)')).toBe(-500000)
    expect(extractLineValue('Net loss for the year -12,345')).toBe(-12345)
    expect(extractLineValue('Other expenses -$2,000')).toBe(-2000)
  })

  test('a separated dash is not a sign', () => {
    expect(extractLineValue('Provisions - non-current 10,000')).toBe(10000)
  })

  test('keeps decimals', () => {
    expect(extractLineValue('Interest 1,234.56')).toBe(1234.56)
  })

  test('a line without digits is absent', () => {
    expect(extractLineValue('Current liabilities')).toBeUndefined()
  })
})
