/**
 * Category rule tables
 * Ordered top to bottom; the first rule whose predicate holds claims the row
 */

import type { Category, StatementKind } from '../../types/financial';
import type {
  ExtractionOptions,
  ProvisionClass,
  ProvisionClassifier,
  RuleContext,
} from './interfaces';

/**
 * as_is keeps the extracted sign; magnitude stores deductions as non-negative
 * (the renderer parenthesises them at display time)
 */
export type SignPolicy = 'as_is' | 'magnitude';

/**
 * Case-insensitive substring predicate over the row/line text
 */
export interface KeywordPredicate {
  /** Every term must appear */
  all?: readonly string[];

  /** At least one group must have all of its terms present */
  anyOf?: readonly (readonly string[])[];

  /** No term may appear */
  none?: readonly string[];
}

export interface ResolvedExtractionOptions {
  provisionsRowThreshold: number;
  classifyUnqualifiedProvision: ProvisionClassifier;
}

export interface MatchRule {
  category: Category;
  keywords: KeywordPredicate;

  /** Extra condition (qualifiers, position heuristics) */
  when?: (context: RuleContext, options: ResolvedExtractionOptions) => boolean;

  sign: SignPolicy;
}

/**
 * Data rows before this index with an unqualified "provisions" label are
 * current; in a sheet with a header row that is rows 2 to 16.
 * Tied to the usual workbook layout where current liabilities come first.
 */
export const DEFAULT_PROVISIONS_ROW_THRESHOLD = 15;

/**
 * Default provisions heuristic. Rows at or after the threshold stay
 * unclassified so a later rule (or nothing) may claim them.
 */
export function classifyUnqualifiedProvision(
  position: number,
  threshold: number = DEFAULT_PROVISIONS_ROW_THRESHOLD
): ProvisionClass | undefined {
  return position < threshold ? 'current' : undefined;
}

export function resolveExtractionOptions(options: ExtractionOptions = {}): ResolvedExtractionOptions {
  const provisionsRowThreshold = options.provisionsRowThreshold ?? DEFAULT_PROVISIONS_ROW_THRESHOLD;
  return {
    provisionsRowThreshold,
    classifyUnqualifiedProvision:
      options.classifyUnqualifiedProvision ??
      ((position: number) => classifyUnqualifiedProvision(position, provisionsRowThreshold)),
  };
}

const NON_CURRENT = /non[\s-]?current/;

export function mentionsNonCurrent(text: string): boolean {
  return NON_CURRENT.test(text);
}

/**
 * "current" that is not part of "non-current"
 */
export function mentionsCurrentOnly(text: string): boolean {
  return text.replace(new RegExp(NON_CURRENT.source, 'g'), '').includes('current');
}

function isUnqualified(text: string): boolean {
  return !mentionsNonCurrent(text) && !mentionsCurrentOnly(text);
}

const currentOnly = ({ text }: RuleContext): boolean => mentionsCurrentOnly(text);
const nonCurrentOnly = ({ text }: RuleContext): boolean => mentionsNonCurrent(text);

export function matchesKeywords(text: string, predicate: KeywordPredicate): boolean {
  if (predicate.all && !predicate.all.every(term => text.includes(term))) {
    return false;
  }
  if (predicate.anyOf && !predicate.anyOf.some(group => group.every(term => text.includes(term)))) {
    return false;
  }
  if (predicate.none && predicate.none.some(term => text.includes(term))) {
    return false;
  }
  return true;
}

export const INCOME_STATEMENT_RULES: readonly MatchRule[] = [
  { category: 'ebitda', keywords: { all: ['ebitda'] }, sign: 'as_is' },
  { category: 'revenue', keywords: { all: ['revenue'] }, sign: 'as_is' },
  {
    category: 'cost_of_sales',
    keywords: { anyOf: [['cost of sales'], ['cost of goods sold']] },
    sign: 'magnitude',
  },
  { category: 'gross_profit', keywords: { all: ['gross profit'] }, sign: 'as_is' },
  { category: 'other_income', keywords: { all: ['other income'] }, sign: 'as_is' },
  // both words, so "administrative ... cost" rows are not taken here
  { category: 'distribution_costs', keywords: { all: ['distribution', 'cost'] }, sign: 'magnitude' },
  { category: 'administrative_expenses', keywords: { all: ['administrative', 'expense'] }, sign: 'magnitude' },
  {
    category: 'other_expenses',
    keywords: { all: ['other', 'expense'], none: ['income'] },
    sign: 'magnitude',
  },
  {
    category: 'profit_before_tax',
    keywords: { anyOf: [['before tax'], ['before income tax']] },
    sign: 'as_is',
  },
  { category: 'income_tax_expense', keywords: { all: ['income tax'] }, sign: 'magnitude' },
  {
    category: 'net_profit_loss',
    keywords: {
      anyOf: [
        ['net', 'profit'],
        ['net', 'loss'],
        ['profit', 'for the year'],
        ['loss', 'for the year'],
      ],
    },
    sign: 'as_is',
  },
];

export const BALANCE_SHEET_RULES: readonly MatchRule[] = [
  {
    category: 'cash',
    keywords: { anyOf: [['cash', 'equivalent'], ['cash at bank']] },
    sign: 'as_is',
  },
  { category: 'receivables', keywords: { all: ['receivable'] }, sign: 'as_is' },
  { category: 'inventories', keywords: { all: ['inventor'] }, sign: 'as_is' },
  {
    category: 'other_current_asset',
    keywords: { all: ['other', 'current', 'asset'] },
    when: currentOnly,
    sign: 'as_is',
  },
  {
    category: 'ppe',
    keywords: { anyOf: [['property', 'plant'], ['plant and equipment']] },
    sign: 'as_is',
  },
  { category: 'intangibles', keywords: { all: ['intangible'] }, sign: 'as_is' },
  {
    category: 'other_non_current_asset',
    keywords: { all: ['other', 'asset'] },
    when: nonCurrentOnly,
    sign: 'as_is',
  },
  { category: 'payables', keywords: { all: ['payable'] }, sign: 'as_is' },
  {
    category: 'provisions_current',
    keywords: { all: ['provision'] },
    when: ({ text, position }, options) =>
      mentionsCurrentOnly(text) ||
      (isUnqualified(text) && options.classifyUnqualifiedProvision(position) === 'current'),
    sign: 'as_is',
  },
  {
    category: 'provisions_non_current',
    keywords: { all: ['provision'] },
    when: ({ text, position }, options) =>
      mentionsNonCurrent(text) ||
      (isUnqualified(text) && options.classifyUnqualifiedProvision(position) === 'non_current'),
    sign: 'as_is',
  },
  {
    category: 'related_party_loan_current',
    keywords: { all: ['related', 'part'] },
    when: currentOnly,
    sign: 'as_is',
  },
  {
    category: 'related_party_loan_non_current',
    keywords: { all: ['related', 'part'] },
    when: nonCurrentOnly,
    sign: 'as_is',
  },
  {
    category: 'other_current_liability',
    keywords: { all: ['other', 'current', 'liabilit'] },
    when: currentOnly,
    sign: 'as_is',
  },
  { category: 'borrowings', keywords: { all: ['borrowing'] }, sign: 'as_is' },
  {
    category: 'other_non_current_liability',
    keywords: { all: ['other', 'liabilit'] },
    when: nonCurrentOnly,
    sign: 'as_is',
  },
  {
    category: 'share_capital',
    keywords: { anyOf: [['share', 'capital'], ['issued capital'], ['contributed equity']] },
    sign: 'as_is',
  },
  { category: 'reserves', keywords: { all: ['reserve'] }, sign: 'as_is' },
  {
    category: 'retained_earnings',
    keywords: { anyOf: [['retained', 'earning'], ['accumulated losses'], ['accumulated profits']] },
    sign: 'as_is',
  },
];

export const STATEMENT_RULES: Record<StatementKind, readonly MatchRule[]> = {
  income_statement: INCOME_STATEMENT_RULES,
  balance_sheet: BALANCE_SHEET_RULES,
};

/**
 * Worksheet names, tried in order
 */
export const TABLE_ALIASES: Record<StatementKind, readonly string[]> = {
  income_statement: ['Consol PL', 'ConsolPL', 'PL', 'Profit Loss', 'Income Statement'],
  balance_sheet: ['Consol BS', 'ConsolBS', 'BS', 'Balance Sheet', 'Statement of Financial Position'],
};

/**
 * Section headings in the printed report
 */
export const SECTION_ALIASES: Record<StatementKind, readonly string[]> = {
  income_statement: [
    'Statement of Profit or Loss and Other Comprehensive Income',
    'Statement of Profit or Loss',
    'Income Statement',
    'Profit and Loss Statement',
    'Profit and Loss',
  ],
  balance_sheet: ['Statement of Financial Position', 'Balance Sheet'],
};

/**
 * First rule that matches the context, or undefined.
 * `isTaken` reports categories already populated; their rules do not match.
 */
export function findMatchingRule(
  rules: readonly MatchRule[],
  context: RuleContext,
  options: ResolvedExtractionOptions,
  isTaken: (category: Category) => boolean
): MatchRule | undefined {
  return rules.find(
    rule =>
      !isTaken(rule.category) &&
      matchesKeywords(context.text, rule.keywords) &&
      (rule.when === undefined || rule.when(context, options))
  );
}

export function applySignPolicy(value: number, sign: SignPolicy): number {
  return sign === 'magnitude' ? Math.abs(value) : value;
}
