/**
 * Section segmentation and text line extraction unit tests
 */

import { describe, test, expect } from '@jest/globals'
import { matchSectionHeading, segmentDocument, sectionLines } from '@/lib/parsers/document-sections'
import { extractFromPages } from '@/lib/parsers/text-extractor'
import { RequiredStatementMissingError } from '@/lib/utils/errors'
import { BALANCE_PAGE, INCOME_PAGE, PRIOR_YEAR_PAGES } from './helpers/fixtures'

describe('matchSectionHeading', () => {
  test('recognises declared headings', () => {
    expect(matchSectionHeading('Statement of Financial Position')).toBe('balance_sheet')
    expect(matchSectionHeading('BALANCE SHEET')).toBe('balance_sheet')
    expect(matchSectionHeading('Statement of Profit or Loss and Other Comprehensive Income')).toBe('income_statement')
    expect(matchSectionHeading('Directors’ Declaration')).toBe('directors_declaration')
    expect(matchSectionHeading('Notes to the Financial Statements')).toBe('notes')
  })

  test('accepts a period or continuation suffix', () => {
    expect(matchSectionHeading('Statement of Financial Position as at 30 June 2024')).toBe('balance_sheet')
    expect(matchSectionHeading('Income Statement for the year ended 30 June 2024')).toBe('income_statement')
    expect(matchSectionHeading('Notes to the Financial Statements (continued)')).toBe('notes')
  })

  test('accepts an entity qualifier before the title', () => {
    expect(matchSectionHeading('Consolidated Statement of Financial Position')).toBe('balance_sheet')
    expect(matchSectionHeading('CONSOLIDATED INCOME STATEMENT')).toBe('income_statement')
    expect(matchSectionHeading('Consolidated Statement of Cash Flows for the year ended 30 June 2024')).toBe('cash_flows')
  })

  test('accepts reporting dates in other printed forms', () => {
    expect(matchSectionHeading('Statement of Financial Position as at 30 June, 2024')).toBe('balance_sheet')
    expect(matchSectionHeading('Statement of Financial Position as at 30.06.2024')).toBe('balance_sheet')
    expect(matchSectionHeading('Statement of Financial Position as at 30/06/2024')).toBe('balance_sheet')
    expect(matchSectionHeading('Statement of Financial Position as of June 30, 2024')).toBe('balance_sheet')
    expect(matchSectionHeading('Balance Sheet 30 June 2024')).toBe('balance_sheet')
    expect(matchSectionHeading('Income Statement for the period ended 30.06.24')).toBe('income_statement')
  })

  test('contents entries and figure lines are not headings', () => {
    expect(matchSectionHeading('2. Statement of Financial Position 4')).toBeUndefined()
    expect(matchSectionHeading('Statement of Financial Position 4')).toBeUndefined()
    expect(matchSectionHeading('Profit and loss for the year 12,000')).toBeUndefined()
    expect(matchSectionHeading('Consolidated Statement of Financial Position 4')).toBeUndefined()
    expect(matchSectionHeading('Statement of Financial Position as at 30.06.2024 1,200')).toBeUndefined()
    expect(matchSectionHeading('Balance Sheet note 12 2024')).toBeUndefined()
  })
})

describe('segmentDocument', () => {
  test('a section runs until the next declared heading', () => {
    const document = segmentDocument(PRIOR_YEAR_PAGES)

    expect(document.preamble.map(line => line.text)).toEqual([
      'Financial Statements',
      'Example Holdings Pty Ltd',
      'For the Year Ended 30 June 2024',
    ])
    expect(document.sections.map(section => section.kind)).toEqual([
      'contents',
      'income_statement',
      'balance_sheet',
      'notes',
      'directors_declaration',
      'compilation_report',
    ])
    expect(sectionLines(document, 'compilation_report').map(line => line.page)).toEqual([7, 7, 7, 7, 7])
  })

  test('a heading repeated on a later page continues the same kind', () => {
    const document = segmentDocument([
      'Statement of Financial Position\nCash at bank 10',
      'Statement of Financial Position (continued)\nBorrowings 20',
    ])
    expect(sectionLines(document, 'balance_sheet').map(line => line.text)).toEqual([
      'Cash at bank 10',
      'Borrowings 20',
    ])
  })
})

describe('extractFromPages', () => {
  test('extracts the prior year income statement', () => {
    const result = extractFromPages(PRIOR_YEAR_PAGES, 'income_statement')
    expect(result.source).toBe('Statement of Profit or Loss and Other Comprehensive Income')
    expect(result.items).toEqual({
      revenue: 1100000,
      cost_of_sales: 500000,
      gross_profit: 600000,
      other_income: 10000,
      distribution_costs: 40000,
      administrative_expenses: 300000,
      other_expenses: 20000,
      profit_before_tax: 250000,
      income_tax_expense: 75000,
      net_profit_loss: 175000,
    })
  })

  test('extracts the prior year balance sheet with page provenance', () => {
    const result = extractFromPages(PRIOR_YEAR_PAGES, 'balance_sheet')
    expect(result.items).toEqual({
      cash: 80000,
      receivables: 120000,
      inventories: 60000,
      ppe: 400000,
      intangibles: 50000,
      payables: 90000,
      provisions_current: 30000,
      borrowings: 200000,
      provisions_non_current: 10000,
      share_capital: 100000,
      retained_earnings: 280000,
    })
    expect(result.matches.find(m => m.category === 'retained_earnings')).toEqual({
      category: 'retained_earnings',
      position: 18,
      label: 'Retained earnings 280,000',
      rawValue: 280000,
      value: 280000,
      page: 4,
    })
  })

  test('a consolidated heading with a numeric date opens the section', () => {
    const pages = ['Consolidated Statement of Financial Position as at 30.06.2025\nCash and cash equivalents 95,000']
    expect(extractFromPages(pages, 'balance_sheet').items).toEqual({ cash: 95000 })
  })

  test('lines outside the statement section are ignored', () => {
    const pages = ['Revenue 999', INCOME_PAGE, 'Notes to the Financial Statements\nRevenue 123']
    expect(extractFromPages(pages, 'income_statement').items.revenue).toBe(1100000)
  })

  test('missing section raises a structural failure naming the statement', () => {
    expect(() => extractFromPages([BALANCE_PAGE], 'income_statement')).toThrow(RequiredStatementMissingError)
    expect(() => extractFromPages([BALANCE_PAGE], 'income_statement')).toThrow(
      'Required statement missing: Income Statement. Expected one of: Statement of Profit or Loss and Other Comprehensive Income, Statement of Profit or Loss, Income Statement, Profit and Loss Statement, Profit and Loss'
    )
  })
})
