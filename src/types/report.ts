/**
 * Prior-year report structure types
 */

import type { ExtractionResult } from './financial';

export interface Director {
  name: string;
  title: string;
}

export interface Compiler {
  name: string;
  title: string;
}

/**
 * Table of contents entry ("3. Statement of Financial Position   4")
 */
export interface ContentsEntry {
  number: number;
  title: string;
  page?: number;
}

/**
 * Numbered note from "Notes to the Financial Statements"
 */
export interface ReportNote {
  number: number;
  heading: string;
  content: string[];
}

/**
 * Everything read from the prior year's printed report
 */
export interface PriorYearReport {
  entityName?: string;

  /** Financial year the report covers (e.g. 2024 for the year ended 30 June 2024) */
  reportYear?: number;

  contents: ContentsEntry[];
  notes: ReportNote[];
  directors: Director[];
  compiler?: Compiler;
  taxConsolidationEntity?: string;
  contingentLiabilityText?: string;

  incomeStatement: ExtractionResult;
  balanceSheet: ExtractionResult;
}
