/**
 * Text line field extractor
 * Same rule tables as the row extractor, applied to the lines of a statement section
 */

import type { Category, ExtractionResult, LineItemMap, StatementKind } from '../../types/financial';
import { STATEMENT_LABELS } from '../../types/financial';
import { RequiredStatementMissingError } from '../utils/errors';
import { dlog } from '../utils/debug';
import type { ExtractionOptions } from './interfaces';
import { extractLineValue } from './numeric-value';
import {
  SECTION_ALIASES,
  STATEMENT_RULES,
  applySignPolicy,
  findMatchingRule,
  resolveExtractionOptions,
} from './category-rules';
import type { SegmentedDocument } from './document-sections';
import { hasSection, sectionLines, segmentDocument } from './document-sections';

/**
 * Extract a statement from an already segmented document
 *
 * @throws RequiredStatementMissingError when no section heading matches
 */
export function extractFromDocument(
  document: SegmentedDocument,
  statement: StatementKind,
  options: ExtractionOptions = {}
): ExtractionResult {
  if (!hasSection(document, statement)) {
    throw new RequiredStatementMissingError(STATEMENT_LABELS[statement], SECTION_ALIASES[statement], 'text');
  }

  const resolved = resolveExtractionOptions(options);
  const rules = STATEMENT_RULES[statement];
  const lines = sectionLines(document, statement);
  const heading = document.sections.find(section => section.kind === statement)?.heading ?? STATEMENT_LABELS[statement];

  const items: LineItemMap = {};
  const result: ExtractionResult = { statement, source: heading, items, matches: [] };
  const isTaken = (category: Category): boolean => items[category] !== undefined;

  lines.forEach((line, position) => {
    const text = line.text.toLowerCase();
    const rule = findMatchingRule(rules, { text, position }, resolved, isTaken);
    if (!rule) {
      return;
    }

    const rawValue = extractLineValue(line.text);
    if (rawValue === undefined) {
      dlog(`[TextExtractor] page ${line.page} "${line.text}" matched ${rule.category} without a value`);
      return;
    }

    const value = applySignPolicy(rawValue, rule.sign);
    items[rule.category] = value;
    result.matches.push({
      category: rule.category,
      position,
      label: line.text,
      rawValue,
      value,
      page: line.page,
    });
  });

  dlog(`[TextExtractor] ${heading}: ${result.matches.length} categories from ${lines.length} lines`);
  return result;
}

/**
 * Extract a statement from page texts (one string per page)
 */
export function extractFromPages(
  pages: readonly string[],
  statement: StatementKind,
  options: ExtractionOptions = {}
): ExtractionResult {
  return extractFromDocument(segmentDocument(pages), statement, options);
}
