/**
 * Source shapes consumed by the extractors
 * Decoding (xlsx, PDF) happens before these; the core only sees cells and lines
 */

/**
 * Single spreadsheet cell as delivered by the reader
 */
export type CellValue = string | number | boolean | null | undefined;

/**
 * First cell is the label, the rest are period columns (rightmost = most recent)
 */
export type SourceRow = readonly CellValue[];

/**
 * Named table (worksheet) of rows
 */
export interface SourceTable {
  name: string;
  rows: readonly SourceRow[];
}

/**
 * Position-aware predicate input for a rule
 */
export interface RuleContext {
  /** Lower-cased text of the row or line */
  text: string;

  /**
   * Data row index in the table (0 is the row after the header row), or
   * line index inside the statement section
   */
  position: number;
}

export type ProvisionClass = 'current' | 'non_current';

/**
 * Classifies a "provisions" row whose text says neither current nor non-current
 */
export type ProvisionClassifier = (position: number) => ProvisionClass | undefined;

/**
 * Options shared by the row and text extractors
 */
export interface ExtractionOptions {
  /**
   * Data rows (or section lines) before this index treat an unqualified
   * "provisions" label as current. Defaults to DEFAULT_PROVISIONS_ROW_THRESHOLD.
   */
  provisionsRowThreshold?: number;

  /** Replaces the row-threshold heuristic entirely */
  classifyUnqualifiedProvision?: ProvisionClassifier;
}
