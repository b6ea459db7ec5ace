/**
 * Validation result types
 */

import type { FinancialDataset } from './financial';
import type { Compiler, Director, ReportNote } from './report';

/**
 * Fatal halts generation, query needs human sign-off, warning is informational
 */
export type IssueSeverity = 'fatal' | 'query' | 'warning';

export type IssueCode =
  | 'BALANCE_SHEET_IMBALANCE'
  | 'RETAINED_EARNINGS_ROLLFORWARD'
  | 'TAX_CONSOLIDATION_DISCLOSURE'
  | 'CONTINGENT_LIABILITY_CONTINUITY'
  | 'DIRECTOR_ROSTER'
  | 'COMPILER_CREDENTIALS'
  | 'OPENING_RETAINED_EARNINGS_CONTINUITY'
  | 'ZERO_CASH'
  | 'ZERO_INCOME_TAX'
  | 'EBITDA_APPROXIMATED'
  | 'AUGMENTATION_SUGGESTION'
  | 'AUGMENTATION_DISAGREEMENT';

export interface ValidationIssue {
  readonly severity: IssueSeverity;
  readonly code: IssueCode;

  /** Human-readable, shown to the preparer as-is */
  readonly message: string;

  /** Signed difference for numeric checks */
  readonly delta?: number;
}

/**
 * Result of one validation pass. `ok` is true iff there are no fatal issues.
 */
export interface ValidationReport {
  readonly ok: boolean;
  readonly fatals: readonly ValidationIssue[];
  readonly queries: readonly ValidationIssue[];
  readonly warnings: readonly ValidationIssue[];
}

/**
 * Everything the reconciliation checks look at
 */
export interface ValidationInput {
  current: FinancialDataset;
  prior: FinancialDataset;

  /** Opening retained earnings for the current period */
  priorRetainedEarnings: number;

  directors: readonly Director[];
  compiler?: Compiler;

  /** Tax consolidation head entity named in the income tax note */
  taxConsolidationEntity?: string;

  /** Prior-year contingent liability wording */
  contingentLiabilityText?: string;

  notes?: readonly ReportNote[];
}

/**
 * Engagement-specific expectations the checks compare against
 */
export interface ValidationPolicy {
  expectedDirectors: readonly string[];

  /** Skipped when not configured */
  expectedCompiler?: string;
}
