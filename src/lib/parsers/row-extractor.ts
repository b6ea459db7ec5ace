/**
 * Row field extractor
 * Classifies labelled spreadsheet rows into statement categories
 */

import type { Category, ExtractionResult, LineItemMap, StatementKind } from '../../types/financial';
import { STATEMENT_LABELS } from '../../types/financial';
import { RequiredStatementMissingError } from '../utils/errors';
import { dlog } from '../utils/debug';
import type { ExtractionOptions, SourceRow, SourceTable } from './interfaces';
import { extractRowValue } from './numeric-value';
import {
  STATEMENT_RULES,
  TABLE_ALIASES,
  applySignPolicy,
  findMatchingRule,
  resolveExtractionOptions,
} from './category-rules';

/** Sheet rows above the first data row */
const TABLE_HEADER_ROWS = 1;

function normaliseName(name: string): string {
  return name.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Text a row is matched on: every string cell, lower-cased.
 * Keywords may be split across cells ("Provisions" | "Current").
 */
export function rowText(row: SourceRow): string {
  return row
    .filter((cell): cell is string => typeof cell === 'string')
    .map(cell => cell.trim())
    .filter(cell => cell.length > 0)
    .join(' ')
    .toLowerCase();
}

function rowLabel(row: SourceRow): string {
  const first = row[0];
  return first === null || first === undefined ? '' : String(first).trim();
}

/**
 * Find the table for a statement by alias, in alias order
 *
 * @throws RequiredStatementMissingError when no alias matches
 */
export function findStatementTable(
  tables: readonly SourceTable[],
  statement: StatementKind
): SourceTable {
  const aliases = TABLE_ALIASES[statement];

  for (const alias of aliases) {
    const wanted = normaliseName(alias);
    const table = tables.find(t => normaliseName(t.name) === wanted);
    if (table) {
      return table;
    }
  }

  throw new RequiredStatementMissingError(STATEMENT_LABELS[statement], aliases, 'table');
}

/**
 * Apply the statement's rule table to every row.
 * One row populates at most one category; the first populated value of a
 * category is kept. Rules see positions counted from the first row after
 * the header, so sheet rows 2 to 16 fall before the default provisions
 * threshold.
 */
export function extractFromTable(
  rows: readonly SourceRow[],
  statement: StatementKind,
  options: ExtractionOptions = {},
  source: string = STATEMENT_LABELS[statement]
): ExtractionResult {
  const resolved = resolveExtractionOptions(options);
  const rules = STATEMENT_RULES[statement];
  const items: LineItemMap = {};
  const result: ExtractionResult = { statement, source, items, matches: [] };
  const isTaken = (category: Category): boolean => items[category] !== undefined;

  rows.forEach((row, position) => {
    const text = rowText(row);
    if (!text) {
      return;
    }

    const context = { text, position: position - TABLE_HEADER_ROWS };
    const rule = findMatchingRule(rules, context, resolved, isTaken);
    if (!rule) {
      return;
    }

    // the row is claimed even when it has no value (e.g. a sub-heading)
    const rawValue = extractRowValue(row);
    if (rawValue === undefined) {
      dlog(`[RowExtractor] ${source} row ${position} "${rowLabel(row)}" matched ${rule.category} without a value`);
      return;
    }

    const value = applySignPolicy(rawValue, rule.sign);
    items[rule.category] = value;
    result.matches.push({
      category: rule.category,
      position,
      label: rowLabel(row),
      rawValue,
      value,
    });
  });

  dlog(`[RowExtractor] ${source}: ${result.matches.length} categories from ${rows.length} rows`);
  return result;
}

/**
 * Locate the statement's table and extract it
 */
export function extractStatementFromTables(
  tables: readonly SourceTable[],
  statement: StatementKind,
  options: ExtractionOptions = {}
): ExtractionResult {
  const table = findStatementTable(tables, statement);
  return extractFromTable(table.rows, statement, options, table.name);
}
