/**
 * Derived values and dataset construction
 * Fills gaps from accounting identities, then defaults and totals
 */

import type {
  Category,
  FinancialDataset,
  LineItemMap,
  ReportingPeriod,
  StatementGroup,
  StatementTotals,
} from '../../types/financial';
import { ALL_CATEGORIES, BALANCE_SHEET_CATEGORIES, BALANCE_SHEET_GROUPS } from '../../types/financial';
import { dlog } from '../utils/debug';

export interface DerivationResult {
  items: LineItemMap;

  /** Categories filled by an identity, in derivation order */
  derived: Category[];

  ebitdaApproximated: boolean;
}

/**
 * Fill absent income statement values, in order:
 * gross profit, profit before tax, net profit, EBITDA.
 * Present values are never overwritten.
 */
export function deriveMissingValues(source: LineItemMap): DerivationResult {
  const items: LineItemMap = { ...source };
  const derived: Category[] = [];
  let ebitdaApproximated = false;

  if (items.gross_profit === undefined && items.revenue !== undefined && items.cost_of_sales !== undefined) {
    items.gross_profit = items.revenue - items.cost_of_sales;
    derived.push('gross_profit');
  }

  if (items.profit_before_tax === undefined) {
    items.profit_before_tax =
      (items.gross_profit ?? 0) +
      (items.other_income ?? 0) -
      (items.distribution_costs ?? 0) -
      (items.administrative_expenses ?? 0) -
      (items.other_expenses ?? 0);
    derived.push('profit_before_tax');
  }

  if (items.net_profit_loss === undefined) {
    items.net_profit_loss = items.profit_before_tax - (items.income_tax_expense ?? 0);
    derived.push('net_profit_loss');
  }

  // approximation: no depreciation or interest add-back
  if (items.ebitda === undefined) {
    items.ebitda = items.profit_before_tax;
    derived.push('ebitda');
    ebitdaApproximated = true;
  }

  return { items, derived, ebitdaApproximated };
}

function sumGroup(values: Readonly<Record<Category, number>>, group: StatementGroup): number {
  return BALANCE_SHEET_CATEGORIES.filter(category => BALANCE_SHEET_GROUPS[category] === group).reduce(
    (sum, category) => sum + values[category],
    0
  );
}

/**
 * Group totals by summation. Depends only on the category values.
 */
export function computeTotals(values: Readonly<Record<Category, number>>): StatementTotals {
  const total_current_assets = sumGroup(values, 'current_assets');
  const total_non_current_assets = sumGroup(values, 'non_current_assets');
  const total_current_liabilities = sumGroup(values, 'current_liabilities');
  const total_non_current_liabilities = sumGroup(values, 'non_current_liabilities');
  const total_liabilities = total_current_liabilities + total_non_current_liabilities;
  const total_equity = sumGroup(values, 'equity');

  return {
    total_current_assets,
    total_non_current_assets,
    total_assets: total_current_assets + total_non_current_assets,
    total_current_liabilities,
    total_non_current_liabilities,
    total_liabilities,
    total_equity,
    total_liabilities_and_equity: total_liabilities + total_equity,
  };
}

function freezeDataset(dataset: FinancialDataset): FinancialDataset {
  Object.freeze(dataset.values);
  Object.freeze(dataset.totals);
  Object.freeze(dataset.extracted);
  Object.freeze(dataset.derived);
  Object.freeze(dataset.defaulted);
  return Object.freeze(dataset);
}

function zeroValues(): Record<Category, number> {
  return {
    revenue: 0,
    cost_of_sales: 0,
    gross_profit: 0,
    other_income: 0,
    distribution_costs: 0,
    administrative_expenses: 0,
    other_expenses: 0,
    profit_before_tax: 0,
    income_tax_expense: 0,
    net_profit_loss: 0,
    ebitda: 0,
    cash: 0,
    receivables: 0,
    inventories: 0,
    other_current_asset: 0,
    ppe: 0,
    intangibles: 0,
    other_non_current_asset: 0,
    payables: 0,
    provisions_current: 0,
    related_party_loan_current: 0,
    other_current_liability: 0,
    provisions_non_current: 0,
    related_party_loan_non_current: 0,
    borrowings: 0,
    other_non_current_liability: 0,
    share_capital: 0,
    reserves: 0,
    retained_earnings: 0,
  };
}

/**
 * Derive, default absent categories to zero, total and freeze
 */
export function buildDataset(source: LineItemMap, period: ReportingPeriod): FinancialDataset {
  const extracted = ALL_CATEGORIES.filter(category => source[category] !== undefined);
  const { items, derived, ebitdaApproximated } = deriveMissingValues(source);

  const defaulted: Category[] = [];
  const values = zeroValues();
  for (const category of ALL_CATEGORIES) {
    const value = items[category];
    if (value === undefined) {
      defaulted.push(category);
    } else {
      values[category] = value;
    }
  }

  if (defaulted.length > 0) {
    dlog(`[Dataset] ${period}: defaulted to zero: ${defaulted.join(', ')}`);
  }

  return freezeDataset({
    period,
    values,
    totals: computeTotals(values),
    extracted,
    derived,
    defaulted,
    ebitdaApproximated,
  });
}

/**
 * Copy of the dataset with closing retained earnings rolled forward from
 * the opening balance and totals recomputed
 */
export function applyRetainedEarningsRollforward(
  dataset: FinancialDataset,
  priorRetainedEarnings: number
): FinancialDataset {
  const values: Record<Category, number> = {
    ...dataset.values,
    retained_earnings: priorRetainedEarnings + dataset.values.net_profit_loss,
  };

  return freezeDataset({
    ...dataset,
    values,
    totals: computeTotals(values),
    extracted: [...dataset.extracted],
    derived: dataset.derived.includes('retained_earnings')
      ? [...dataset.derived]
      : [...dataset.derived, 'retained_earnings'],
    defaulted: dataset.defaulted.filter(category => category !== 'retained_earnings'),
  });
}
