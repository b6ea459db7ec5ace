/**
 * Report section segmentation
 * A declared heading opens a section that runs until the next declared heading
 */

import { SECTION_ALIASES } from './category-rules';

/**
 * Section kinds recognised in a printed annual report
 */
export type SectionKind =
  | 'contents'
  | 'income_statement'
  | 'balance_sheet'
  | 'changes_in_equity'
  | 'cash_flows'
  | 'notes'
  | 'directors_declaration'
  | 'compilation_report';

export const SECTION_HEADINGS: Record<SectionKind, readonly string[]> = {
  contents: ['Contents', 'Table of Contents'],
  income_statement: SECTION_ALIASES.income_statement,
  balance_sheet: SECTION_ALIASES.balance_sheet,
  changes_in_equity: ['Statement of Changes in Equity'],
  cash_flows: ['Statement of Cash Flows', 'Cash Flow Statement'],
  notes: [
    'Notes to and Forming Part of the Financial Statements',
    'Notes to the Financial Statements',
  ],
  directors_declaration: ["Directors' Declaration", 'Directors Declaration'],
  compilation_report: [
    "Accountant's Compilation Report",
    'Independent Compilation Report',
    'Compilation Report',
  ],
};

/**
 * Non-empty, trimmed line with its 1-based page number
 */
export interface DocumentLine {
  text: string;
  page: number;
}

export interface DocumentSection {
  kind: SectionKind;

  /** Heading line as printed */
  heading: string;

  /** Lines after the heading, up to the next heading */
  lines: DocumentLine[];
}

export interface SegmentedDocument {
  /** Lines before the first heading (title page) */
  preamble: DocumentLine[];

  sections: DocumentSection[];

  /** Every line in reading order */
  lines: DocumentLine[];
}

export const SECTION_KINDS: readonly SectionKind[] = [
  'contents',
  'income_statement',
  'balance_sheet',
  'changes_in_equity',
  'cash_flows',
  'notes',
  'directors_declaration',
  'compilation_report',
];

export function normaliseLine(line: string): string {
  return line.replace(/[\u2018\u2019]/g, "'").replace(/\s+/g, ' ').trim().toLowerCase();
}

interface HeadingAlias {
  kind: SectionKind;
  alias: string;
}

// longest first, so "Statement of Profit or Loss and Other..." wins over its prefix
const HEADING_ALIASES: readonly HeadingAlias[] = SECTION_KINDS.flatMap(kind =>
  SECTION_HEADINGS[kind].map(alias => ({ kind, alias: normaliseLine(alias) }))
).sort((a, b) => b.alias.length - a.alias.length);

/** Entity qualifiers printed before a statement title */
const HEADING_QUALIFIER = /^(?:consolidated|combined|parent entity)\s+/;

const MONTH = String.raw`(?:jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)[a-z]*\.?`;

// 30 june 2024, 30th june, 2024, june 30, 2024, 30.06.2024, 30/06/24
const REPORT_DATE = String.raw`(?:\d{1,2}(?:st|nd|rd|th)?\s+${MONTH},?\s+\d{4}|${MONTH}\s+\d{1,2},?\s+\d{4}|\d{1,2}[./-]\d{1,2}[./-](?:\d{4}|\d{2}))`;
const REPORT_PERIOD = String.raw`(?:as (?:at|of)|(?:for the )?(?:financial )?(?:year|period) ended)`;

/**
 * What may follow a heading on the same line: a colon, "(continued)", or
 * a reporting date. Anything else (an amount, a page number) is refused.
 */
const HEADING_SUFFIX = new RegExp(
  String.raw`^(?::|\(continued\)|[,:-]?\s*(?:${REPORT_PERIOD}\s+)?${REPORT_DATE}\s*(?:\(continued\))?)$`
);

/**
 * Section kind if the line is a declared heading.
 * Numbered contents entries and lines carrying figures are not headings.
 */
export function matchSectionHeading(line: string): SectionKind | undefined {
  const normalised = normaliseLine(line).replace(HEADING_QUALIFIER, '');

  for (const { kind, alias } of HEADING_ALIASES) {
    if (!normalised.startsWith(alias)) {
      continue;
    }
    const rest = normalised.slice(alias.length).trim();
    if (rest === '' || HEADING_SUFFIX.test(rest)) {
      return kind;
    }
  }

  return undefined;
}

export function splitLines(pages: readonly string[]): DocumentLine[] {
  return pages.flatMap((pageText, index) =>
    pageText
      .split(/\r?\n/)
      .map(text => text.trim())
      .filter(text => text.length > 0)
      .map(text => ({ text, page: index + 1 }))
  );
}

export function segmentDocument(pages: readonly string[]): SegmentedDocument {
  const lines = splitLines(pages);
  const preamble: DocumentLine[] = [];
  const sections: DocumentSection[] = [];
  let current: DocumentSection | undefined;

  for (const line of lines) {
    const kind = matchSectionHeading(line.text);
    if (kind) {
      current = { kind, heading: line.text, lines: [] };
      sections.push(current);
    } else if (current) {
      current.lines.push(line);
    } else {
      preamble.push(line);
    }
  }

  return { preamble, sections, lines };
}

/**
 * Lines of every section of a kind, in order (a statement continued over
 * several pages repeats its heading)
 */
export function sectionLines(document: SegmentedDocument, kind: SectionKind): DocumentLine[] {
  return document.sections.filter(section => section.kind === kind).flatMap(section => section.lines);
}

export function hasSection(document: SegmentedDocument, kind: SectionKind): boolean {
  return document.sections.some(section => section.kind === kind);
}
