/**
 * Financial statement data types
 * Categories, per-period datasets and extraction provenance
 */

/**
 * Income statement categories (ungrouped)
 */
export const INCOME_STATEMENT_CATEGORIES = [
  'revenue',
  'cost_of_sales',
  'gross_profit',
  'other_income',
  'distribution_costs',
  'administrative_expenses',
  'other_expenses',
  'profit_before_tax',
  'income_tax_expense',
  'net_profit_loss',
  'ebitda',
] as const;

export type IncomeStatementCategory = (typeof INCOME_STATEMENT_CATEGORIES)[number];

/**
 * Balance sheet groupings
 */
export type StatementGroup =
  | 'current_assets'
  | 'non_current_assets'
  | 'current_liabilities'
  | 'non_current_liabilities'
  | 'equity';

/**
 * Balance sheet categories in presentation order
 */
export const BALANCE_SHEET_CATEGORIES = [
  'cash',
  'receivables',
  'inventories',
  'other_current_asset',
  'ppe',
  'intangibles',
  'other_non_current_asset',
  'payables',
  'provisions_current',
  'related_party_loan_current',
  'other_current_liability',
  'provisions_non_current',
  'related_party_loan_non_current',
  'borrowings',
  'other_non_current_liability',
  'share_capital',
  'reserves',
  'retained_earnings',
] as const;

export type BalanceSheetCategory = (typeof BALANCE_SHEET_CATEGORIES)[number];

/**
 * Each balance sheet category belongs to exactly one group
 */
export const BALANCE_SHEET_GROUPS: Readonly<Record<BalanceSheetCategory, StatementGroup>> = {
  cash: 'current_assets',
  receivables: 'current_assets',
  inventories: 'current_assets',
  other_current_asset: 'current_assets',
  ppe: 'non_current_assets',
  intangibles: 'non_current_assets',
  other_non_current_asset: 'non_current_assets',
  payables: 'current_liabilities',
  provisions_current: 'current_liabilities',
  related_party_loan_current: 'current_liabilities',
  other_current_liability: 'current_liabilities',
  provisions_non_current: 'non_current_liabilities',
  related_party_loan_non_current: 'non_current_liabilities',
  borrowings: 'non_current_liabilities',
  other_non_current_liability: 'non_current_liabilities',
  share_capital: 'equity',
  reserves: 'equity',
  retained_earnings: 'equity',
};

export type Category = IncomeStatementCategory | BalanceSheetCategory;

export const ALL_CATEGORIES: readonly Category[] = [
  ...INCOME_STATEMENT_CATEGORIES,
  ...BALANCE_SHEET_CATEGORIES,
];

/**
 * Statement kinds the extractors recognise
 */
export type StatementKind = 'income_statement' | 'balance_sheet';

export const STATEMENT_LABELS: Record<StatementKind, string> = {
  income_statement: 'Income Statement',
  balance_sheet: 'Balance Sheet',
};

/**
 * Signed amount, or undefined when the source did not provide one.
 * Absence is not zero until the dataset is built.
 */
export type LineItemValue = number | undefined;

/**
 * Partially populated line items (missing key = absent)
 */
export type LineItemMap = Partial<Record<Category, number>>;

/**
 * Reporting period of a dataset
 */
export type ReportingPeriod = 'current' | 'prior';

/**
 * Group totals, always recomputed from the category values
 */
export interface StatementTotals {
  total_current_assets: number;
  total_non_current_assets: number;
  total_assets: number;
  total_current_liabilities: number;
  total_non_current_liabilities: number;
  total_liabilities: number;
  total_equity: number;
  total_liabilities_and_equity: number;
}

/**
 * Normalised dataset for one reporting period (frozen once built)
 */
export interface FinancialDataset {
  readonly period: ReportingPeriod;

  /** Every category, absent ones defaulted to zero */
  readonly values: Readonly<Record<Category, number>>;

  readonly totals: Readonly<StatementTotals>;

  /** Categories found in the source */
  readonly extracted: readonly Category[];

  /** Categories filled from accounting identities */
  readonly derived: readonly Category[];

  /** Categories that were still absent and set to zero */
  readonly defaulted: readonly Category[];

  /** EBITDA was approximated as profit before tax */
  readonly ebitdaApproximated: boolean;
}

/**
 * Where an extracted value came from
 */
export interface LineItemMatch {
  category: Category;

  /** Row index in the table, or line index within the section */
  position: number;

  /** Label cell or full text line */
  label: string;

  /** Value as parsed, before sign policy */
  rawValue: number;

  /** Stored value, after sign policy */
  value: number;

  /** Page number (1-based) for text sources */
  page?: number;
}

/**
 * Output of a row or text extractor for one statement
 */
export interface ExtractionResult {
  statement: StatementKind;

  /** Table name or section heading the values came from */
  source: string;

  items: LineItemMap;

  matches: LineItemMatch[];
}
