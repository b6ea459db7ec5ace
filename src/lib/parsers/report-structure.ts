/**
 * Prior-year report structure
 * Entity, contents, notes and signatories read from the printed report
 */

import type { Compiler, ContentsEntry, Director, PriorYearReport, ReportNote } from '../../types/report';
import { dlog } from '../utils/debug';
import type { ExtractionOptions } from './interfaces';
import type { DocumentLine, SegmentedDocument } from './document-sections';
import { sectionLines, segmentDocument } from './document-sections';
import { extractFromDocument } from './text-extractor';

const REPORT_YEAR = /for the year ended\s+\d{1,2}\s+[a-z]+\s+(\d{4})/i;

const CONTENTS_ENTRY = /^(\d+)\.\s+(.+?)(?:[\s.]+(\d+))?$/;

const NOTE_HEADING = /^(?:note\s+)?(\d+)[.:]\s+(.+)$/i;

const HEAD_ENTITY =
  /head entity(?:\s+is)?[,:\s]+([A-Za-z][A-Za-z&'\s-]*?(?:Pty\.?\s+Ltd|Ltd|Limited))/i;

const SIGNATURE_LINE = /_{5,}|\bdate:/i;

/** Lines kept around a contingent liability mention */
const CONTINGENT_CONTEXT_BEFORE = 2;
const CONTINGENT_CONTEXT_AFTER = 5;

function firstPage(document: SegmentedDocument): DocumentLine[] {
  return document.lines.filter(line => line.page === 1);
}

/**
 * Entity name from the title page: the line after "Financial Statements",
 * or the line before it when the next line is the period
 */
export function extractEntityName(document: SegmentedDocument): string | undefined {
  const lines = firstPage(document);
  const index = lines.findIndex(line => /financial statements/i.test(line.text));
  if (index === -1) {
    return undefined;
  }

  const next = lines[index + 1];
  if (next && !REPORT_YEAR.test(next.text) && !/^for the year/i.test(next.text)) {
    return next.text;
  }

  const previous = lines[index - 1];
  return previous?.text;
}

/**
 * Year of "For the Year Ended 30 June YYYY"
 */
export function extractReportYear(document: SegmentedDocument): number | undefined {
  for (const line of document.lines) {
    const match = REPORT_YEAR.exec(line.text);
    if (match) {
      return parseInt(match[1], 10);
    }
  }
  return undefined;
}

export function extractContents(document: SegmentedDocument): ContentsEntry[] {
  const entries: ContentsEntry[] = [];

  for (const line of sectionLines(document, 'contents')) {
    const match = CONTENTS_ENTRY.exec(line.text);
    if (!match) {
      continue;
    }
    const [, number, title, page] = match;
    entries.push({
      number: parseInt(number, 10),
      title: title.trim(),
      ...(page !== undefined ? { page: parseInt(page, 10) } : {}),
    });
  }

  return entries;
}

/**
 * Numbered notes; a new numbered heading closes the previous note
 */
export function extractNotes(document: SegmentedDocument): ReportNote[] {
  const notes: ReportNote[] = [];
  let current: ReportNote | undefined;

  for (const line of sectionLines(document, 'notes')) {
    const match = NOTE_HEADING.exec(line.text);
    if (match) {
      current = { number: parseInt(match[1], 10), heading: match[2].trim(), content: [] };
      notes.push(current);
    } else if (current) {
      current.content.push(line.text);
    }
  }

  return notes;
}

function cleanSignatoryName(line: string): string {
  return line
    .replace(/[_\d\s]+date.*$/i, '')
    .replace(/_+/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Name line followed by a title line naming a director
 */
export function extractDirectors(document: SegmentedDocument): Director[] {
  const lines = sectionLines(document, 'directors_declaration');
  const directors: Director[] = [];

  for (let i = 0; i + 1 < lines.length; i++) {
    const title = lines[i + 1].text;
    if (!/\bdirector\b/i.test(title)) {
      continue;
    }

    const name = cleanSignatoryName(lines[i].text);
    const looksLikeName =
      name.length > 3 && !/director/i.test(name) && !name.endsWith('.') && !/^date\b/i.test(name);

    if (looksLikeName && !directors.some(d => d.name === name)) {
      directors.push({ name, title });
    }
  }

  dlog(`[ReportStructure] directors: ${directors.map(d => d.name).join(', ') || 'none'}`);
  return directors;
}

/**
 * Name and title on the two lines after the signature line
 */
export function extractCompiler(document: SegmentedDocument): Compiler | undefined {
  const lines = sectionLines(document, 'compilation_report');

  for (let i = 0; i + 2 < lines.length; i++) {
    if (!SIGNATURE_LINE.test(lines[i].text)) {
      continue;
    }
    const name = cleanSignatoryName(lines[i + 1].text);
    const title = lines[i + 2].text;
    if (name && !SIGNATURE_LINE.test(lines[i + 1].text) && !SIGNATURE_LINE.test(title)) {
      return { name, title };
    }
  }

  return undefined;
}

/**
 * Head entity of the tax consolidated group, from the notes (or anywhere
 * in the report when it has no notes section)
 */
export function extractTaxConsolidationEntity(document: SegmentedDocument): string | undefined {
  const notes = sectionLines(document, 'notes');
  const source = (notes.length > 0 ? notes : document.lines).map(line => line.text).join(' ');
  const match = HEAD_ENTITY.exec(source);
  return match ? match[1].replace(/\s+/g, ' ').trim() : undefined;
}

/**
 * Contingent liability wording: the whole contingent liabilities note when
 * there is one, otherwise the lines around the first mention
 */
export function extractContingentLiabilityText(
  document: SegmentedDocument,
  notes: readonly ReportNote[] = extractNotes(document)
): string | undefined {
  const note = notes.find(n => /contingent/i.test(n.heading));
  if (note && note.content.length > 0) {
    return note.content.join('\n');
  }

  const noteLines = sectionLines(document, 'notes');
  const lines = noteLines.length > 0 ? noteLines : document.lines;
  const index = lines.findIndex(line => /contingent/i.test(line.text));
  if (index === -1) {
    return undefined;
  }

  return lines
    .slice(Math.max(0, index - CONTINGENT_CONTEXT_BEFORE), index + CONTINGENT_CONTEXT_AFTER)
    .map(line => line.text)
    .join('\n');
}

/**
 * Read everything the reconciliation needs from the prior-year report
 *
 * @throws RequiredStatementMissingError when either statement section is absent
 */
export function parsePriorYearReport(
  pages: readonly string[],
  options: ExtractionOptions = {}
): PriorYearReport {
  const document = segmentDocument(pages);
  const notes = extractNotes(document);

  const report: PriorYearReport = {
    entityName: extractEntityName(document),
    reportYear: extractReportYear(document),
    contents: extractContents(document),
    notes,
    directors: extractDirectors(document),
    compiler: extractCompiler(document),
    taxConsolidationEntity: extractTaxConsolidationEntity(document),
    contingentLiabilityText: extractContingentLiabilityText(document, notes),
    incomeStatement: extractFromDocument(document, 'income_statement', options),
    balanceSheet: extractFromDocument(document, 'balance_sheet', options),
  };

  dlog(
    `[ReportStructure] ${report.entityName ?? 'unknown entity'} ${report.reportYear ?? ''}: ` +
      `${report.contents.length} contents entries, ${notes.length} notes`
  );
  return report;
}
