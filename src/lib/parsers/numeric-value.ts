/**
 * Numeric value parsing for spreadsheet cells and report text lines
 * Returns undefined for "no value" so callers never confuse absence with zero
 */

import type { CellValue, SourceRow } from './interfaces';

/**
 * Cell contents that are present but carry no value ("-", "nil", ...).
 * The right-to-left scan skips them and keeps looking.
 */
const PLACEHOLDER_TOKENS = new Set(['-', 'nil', 'n/a', '', 'nan']);

const CURRENCY_SYMBOLS = /(?:A\$|AU\$|AUD|US\$|USD|[$€£¥])/gi;

const DECIMAL_PATTERN = /^[-+]?(?:\d+\.?\d*|\.\d+)$/;

/**
 * Currency-shaped token in running text: optional "(" or "-", optional "$",
 * digit groups with optional thousands separators and decimals, optional ")"
 */
const CURRENCY_TOKEN = /(\()?(-)?\$?((?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d+)?)(\))?/g;

/**
 * Parse a single cell. Numbers pass through; strings are cleaned of
 * separators and currency symbols and "(123)" becomes -123.
 */
export function parseCellValue(cell: CellValue): number | undefined {
  if (typeof cell === 'number') {
    return Number.isFinite(cell) ? cell : undefined;
  }

  if (typeof cell !== 'string') {
    return undefined;
  }

  const trimmed = cell.trim();
  if (PLACEHOLDER_TOKENS.has(trimmed.toLowerCase())) {
    return undefined;
  }

  const cleaned = trimmed
    .replace(/,/g, '')
    .replace(CURRENCY_SYMBOLS, '')
    .replace(/\(/g, '-')
    .replace(/\)/g, '')
    .replace(/\s+/g, '')
    .replace(/^--/, '-');

  if (PLACEHOLDER_TOKENS.has(cleaned.toLowerCase()) || !DECIMAL_PATTERN.test(cleaned)) {
    return undefined;
  }

  return parseFloat(cleaned);
}

/**
 * Rightmost numeric cell of a row, skipping the label cell.
 * Source workbooks put the current period in the rightmost column.
 */
export function extractRowValue(row: SourceRow): number | undefined {
  for (let i = row.length - 1; i >= 1; i--) {
    const value = parseCellValue(row[i]);
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}

/**
 * Last currency-shaped token on a text line, negated when parenthesised or minus-prefixed
 */
export function extractLineValue(line: string): number | undefined {
  let last: RegExpMatchArray | undefined;

  for (const match of line.matchAll(CURRENCY_TOKEN)) {
    last = match;
  }

  if (!last) {
    return undefined;
  }

  const [, openParen, minus, digits, closeParen] = last;
  const magnitude = parseFloat(digits.replace(/,/g, ''));
  if (Number.isNaN(magnitude)) {
    return undefined;
  }

  const negative = (openParen !== undefined && closeParen !== undefined) || minus !== undefined;
  return negative ? -magnitude : magnitude;
}
