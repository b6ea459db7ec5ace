/**
 * Reconciliation validator
 * Ordered, independent checks over the built datasets and signatories.
 * Findings are returned as values; nothing here throws or keeps state.
 */

import type {
  IssueCode,
  IssueSeverity,
  ValidationInput,
  ValidationIssue,
  ValidationPolicy,
  ValidationReport,
} from '../../types/validation';
import { amountsAgree, formatCurrency, formatSignedCurrency } from '../utils/currency';

/** Characters of prior contingent liability wording quoted in the query */
export const CONTINGENT_CONTEXT_LENGTH = 200;

type Check = (input: ValidationInput, policy: ValidationPolicy) => ValidationIssue | undefined;

function issue(severity: IssueSeverity, code: IssueCode, lines: string[], delta?: number): ValidationIssue {
  return {
    severity,
    code,
    message: lines.join('\n'),
    ...(delta !== undefined ? { delta } : {}),
  };
}

function listOrNone(names: readonly string[]): string {
  return names.length > 0 ? names.join(', ') : 'None';
}

const checkBalanceSheet: Check = ({ current }) => {
  const { total_assets, total_liabilities, total_equity } = current.totals;
  const liabilitiesAndEquity = total_liabilities + total_equity;
  if (amountsAgree(total_assets, liabilitiesAndEquity)) {
    return undefined;
  }

  const delta = total_assets - liabilitiesAndEquity;
  return issue(
    'fatal',
    'BALANCE_SHEET_IMBALANCE',
    [
      'Balance sheet does not balance',
      `Total Assets: ${formatCurrency(total_assets)}`,
      `Total Liabilities + Equity: ${formatCurrency(liabilitiesAndEquity)}`,
      `Difference: ${formatSignedCurrency(delta)}`,
    ],
    delta
  );
};

const checkRetainedEarningsRollforward: Check = ({ current, priorRetainedEarnings }) => {
  const netProfit = current.values.net_profit_loss;
  const actual = current.values.retained_earnings;
  const expected = priorRetainedEarnings + netProfit;
  if (amountsAgree(actual, expected)) {
    return undefined;
  }

  const delta = actual - expected;
  return issue(
    'fatal',
    'RETAINED_EARNINGS_ROLLFORWARD',
    [
      'Retained earnings do not roll forward',
      `Prior Year RE: ${formatCurrency(priorRetainedEarnings)}`,
      `Net Profit/(Loss): ${formatCurrency(netProfit)}`,
      `Expected RE: ${formatCurrency(expected)}`,
      `Actual RE: ${formatCurrency(actual)}`,
      `Difference: ${formatSignedCurrency(delta)}`,
    ],
    delta
  );
};

const checkTaxConsolidation: Check = ({ taxConsolidationEntity }) =>
  taxConsolidationEntity
    ? issue('query', 'TAX_CONSOLIDATION_DISCLOSURE', [
        'Tax consolidation disclosure',
        `Head Entity: ${taxConsolidationEntity}`,
        'Confirm the head entity matches the prior year disclosure.',
      ])
    : undefined;

const checkContingentLiability: Check = ({ contingentLiabilityText }) => {
  if (!contingentLiabilityText) {
    return undefined;
  }
  const excerpt =
    contingentLiabilityText.length > CONTINGENT_CONTEXT_LENGTH
      ? `${contingentLiabilityText.slice(0, CONTINGENT_CONTEXT_LENGTH)}...`
      : contingentLiabilityText;

  return issue('query', 'CONTINGENT_LIABILITY_CONTINUITY', [
    'Contingent liability continuity',
    'The prior year report discloses a contingent liability.',
    'Confirm the current year retains identical wording:',
    excerpt,
  ]);
};

const checkDirectorRoster: Check = ({ directors }, { expectedDirectors }) => {
  const found = directors.map(director => director.name);
  const missing = expectedDirectors.filter(name => !found.includes(name));
  const extra = found.filter(name => !expectedDirectors.includes(name));
  if (missing.length === 0 && extra.length === 0) {
    return undefined;
  }

  return issue('query', 'DIRECTOR_ROSTER', [
    'Director names verification',
    `Expected: ${listOrNone(expectedDirectors)}`,
    `Found: ${listOrNone(found)}`,
    `Missing: ${listOrNone(missing)}`,
    `Extra: ${listOrNone(extra)}`,
    'Confirm before updating the sign date.',
  ]);
};

const checkCompiler: Check = ({ compiler }, { expectedCompiler }) => {
  if (!expectedCompiler || (compiler && compiler.name.includes(expectedCompiler))) {
    return undefined;
  }

  return issue('query', 'COMPILER_CREDENTIALS', [
    'Compilation signatory verification',
    `Expected: ${expectedCompiler}`,
    `Found: ${compiler?.name || 'None'}`,
    `Title: ${compiler?.title || 'None'}`,
    'Verify credentials if the signatory changed.',
  ]);
};

const checkOpeningRetainedEarnings: Check = ({ prior, priorRetainedEarnings }) => {
  const closing = prior.values.retained_earnings;
  if (amountsAgree(closing, priorRetainedEarnings)) {
    return undefined;
  }

  const delta = priorRetainedEarnings - closing;
  return issue(
    'query',
    'OPENING_RETAINED_EARNINGS_CONTINUITY',
    [
      'Opening retained earnings differ from the prior year closing balance',
      `Prior Year Closing RE: ${formatCurrency(closing)}`,
      `Opening RE Used: ${formatCurrency(priorRetainedEarnings)}`,
      `Difference: ${formatSignedCurrency(delta)}`,
    ],
    delta
  );
};

const checkZeroCash: Check = ({ current }) =>
  current.values.cash === 0
    ? issue('warning', 'ZERO_CASH', [
        'Cash accounts',
        'Cash balance is $0. Confirm closure of legacy accounts.',
      ])
    : undefined;

const checkZeroIncomeTax: Check = ({ current, notes }) => {
  if (current.values.income_tax_expense !== 0) {
    return undefined;
  }

  const taxNote = notes?.find(note => /income tax/i.test(note.heading));
  const noteReference = taxNote ? `Note ${taxNote.number} (${taxNote.heading})` : 'the income tax note';
  return issue('warning', 'ZERO_INCOME_TAX', [
    'Deferred tax',
    'No income tax expense is recognised for the current year.',
    `Ensure ${noteReference} explains why.`,
  ]);
};

const checkEbitdaApproximation: Check = ({ current }) =>
  current.ebitdaApproximated
    ? issue('warning', 'EBITDA_APPROXIMATED', [
        'EBITDA approximated',
        `EBITDA was not in the source and is shown as profit before tax (${formatCurrency(current.values.ebitda)}).`,
      ])
    : undefined;

/**
 * Every check runs, in this order, regardless of earlier findings
 */
const CHECKS: readonly Check[] = [
  checkBalanceSheet,
  checkRetainedEarningsRollforward,
  checkTaxConsolidation,
  checkContingentLiability,
  checkDirectorRoster,
  checkCompiler,
  checkOpeningRetainedEarnings,
  checkZeroCash,
  checkZeroIncomeTax,
  checkEbitdaApproximation,
];

export function buildReport(issues: readonly ValidationIssue[]): ValidationReport {
  const fatals = issues.filter(i => i.severity === 'fatal');
  return Object.freeze({
    ok: fatals.length === 0,
    fatals: Object.freeze(fatals),
    queries: Object.freeze(issues.filter(i => i.severity === 'query')),
    warnings: Object.freeze(issues.filter(i => i.severity === 'warning')),
  });
}

export function validateStatements(input: ValidationInput, policy: ValidationPolicy): ValidationReport {
  const issues: ValidationIssue[] = [];
  for (const check of CHECKS) {
    const found = check(input, policy);
    if (found) {
      issues.push(found);
    }
  }
  return buildReport(issues);
}

/**
 * Report with extra issues appended (augmentation findings)
 */
export function withAdditionalIssues(
  report: ValidationReport,
  extra: readonly ValidationIssue[]
): ValidationReport {
  return buildReport([...report.fatals, ...report.queries, ...report.warnings, ...extra]);
}

const RULE = '='.repeat(80);

function formatSection(title: string, issues: readonly ValidationIssue[]): string[] {
  if (issues.length === 0) {
    return [];
  }
  return [RULE, title, RULE, ...issues.map(i => `\n[${i.code}] ${i.message}`), RULE];
}

/**
 * Console summary of a report
 */
export function formatValidationReport(report: ValidationReport): string {
  if (report.fatals.length === 0 && report.queries.length === 0 && report.warnings.length === 0) {
    return 'All validations passed. Proceeding with generation.';
  }

  return [
    ...formatSection('CRITICAL ERRORS - GENERATION HALTED', report.fatals),
    ...formatSection('QUERIES REQUIRING CONFIRMATION', report.queries),
    ...formatSection('WARNINGS (Proceeding with generation)', report.warnings),
  ].join('\n');
}
