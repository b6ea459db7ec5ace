/**
 * Derived values and dataset construction unit tests
 */

import { describe, test, expect } from '@jest/globals'
import {
  applyRetainedEarningsRollforward,
  buildDataset,
  computeTotals,
  deriveMissingValues,
} from '@/lib/statements/derived-values'
import { extractFromTable } from '@/lib/parsers/row-extractor'
import { CURRENT_BS, CURRENT_PL } from './helpers/fixtures'

function currentItems() {
  return {
    ...extractFromTable(CURRENT_PL.rows, 'income_statement').items,
    ...extractFromTable(CURRENT_BS.rows, 'balance_sheet').items,
  }
}

describe('deriveMissingValues', () => {
  test('derives gross profit, profit before tax, net profit and EBITDA in order', () => {
    const result = deriveMissingValues({
      revenue: 1000,
      cost_of_sales: 400,
      other_income: 50,
      distribution_costs: 20,
      administrative_expenses: 100,
      other_expenses: 30,
      income_tax_expense: 150,
    })

    expect(result.items.gross_profit).toBe(600)
    expect(result.items.profit_before_tax).toBe(500)
    expect(result.items.net_profit_loss).toBe(350)
    expect(result.items.ebitda).toBe(500)
    expect(result.derived).toEqual(['gross_profit', 'profit_before_tax', 'net_profit_loss', 'ebitda'])
    expect(result.ebitdaApproximated).toBe(true)
  })

  test('present values are never overwritten', () => {
    const source = { revenue: 1000, cost_of_sales: 400, gross_profit: 650, profit_before_tax: 90, ebitda: 120 }
    const result = deriveMissingValues(source)

    expect(result.items.gross_profit).toBe(650)
    expect(result.items.profit_before_tax).toBe(90)
    expect(result.items.ebitda).toBe(120)
    expect(result.derived).toEqual(['net_profit_loss'])
    expect(result.ebitdaApproximated).toBe(false)
    expect(source).toEqual({ revenue: 1000, cost_of_sales: 400, gross_profit: 650, profit_before_tax: 90, ebitda: 120 })
  })

  test('gross profit needs both revenue and cost of sales', () => {
    const result = deriveMissingValues({ revenue: 1000 })
    expect(result.items.gross_profit).toBeUndefined()
    expect(result.items.profit_before_tax).toBe(0)
  })
})

describe('computeTotals', () => {
  test('sums each group', () => {
    const dataset = buildDataset(currentItems(), 'current')
    expect(computeTotals(dataset.values)).toEqual({
      total_current_assets: 295000,
      total_non_current_assets: 599500,
      total_assets: 894500,
      total_current_liabilities: 130000,
      total_non_current_liabilities: 192000,
      total_liabilities: 322000,
      total_equity: 572500,
      total_liabilities_and_equity: 894500,
    })
  })
})

describe('buildDataset', () => {
  const dataset = buildDataset(currentItems(), 'current')

  test('records extracted, derived and defaulted categories', () => {
    expect(dataset.period).toBe('current')
    expect(dataset.extracted).toHaveLength(21)
    expect(dataset.derived).toEqual(['ebitda'])
    expect(dataset.defaulted).toEqual([
      'other_current_asset',
      'other_non_current_asset',
      'related_party_loan_current',
      'other_current_liability',
      'related_party_loan_non_current',
      'other_non_current_liability',
      'reserves',
    ])
    expect(dataset.ebitdaApproximated).toBe(true)
  })

  test('absent categories are zero and EBITDA equals profit before tax', () => {
    expect(dataset.values.reserves).toBe(0)
    expect(dataset.values.ebitda).toBe(275000)
    expect(dataset.values.retained_earnings).toBe(472500)
  })

  test('the dataset is frozen', () => {
    expect(Object.isFrozen(dataset)).toBe(true)
    expect(Object.isFrozen(dataset.values)).toBe(true)
    expect(Object.isFrozen(dataset.totals)).toBe(true)
  })
})

describe('applyRetainedEarningsRollforward', () => {
  test('closing retained earnings become opening plus net profit', () => {
    const dataset = buildDataset({ share_capital: 100, cash: 500, net_profit_loss: 50, profit_before_tax: 70 }, 'current')
    const rolled = applyRetainedEarningsRollforward(dataset, 300)

    expect(rolled.values.retained_earnings).toBe(350)
    expect(rolled.totals.total_equity).toBe(450)
    expect(rolled.derived).toEqual(['ebitda', 'retained_earnings'])
    expect(rolled.defaulted).not.toContain('retained_earnings')
    expect(dataset.values.retained_earnings).toBe(0)
    expect(dataset.totals.total_equity).toBe(100)
  })
})
