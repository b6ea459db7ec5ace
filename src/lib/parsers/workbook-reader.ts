/**
 * Workbook reader
 * Decodes an .xlsx container in memory into named tables of cell values.
 * Formulas are read from their cached values only.
 */

import JSZip from 'jszip';
import { DOMParser } from '@xmldom/xmldom';
import { WorkbookFormatError } from '../utils/errors';
import { dlog } from '../utils/debug';
import type { CellValue, SourceTable } from './interfaces';

export type WorkbookInput = Uint8Array | ArrayBuffer;

interface SheetEntry {
  name: string;
  path: string;
}

const RELATIONSHIPS_NS = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships';

/**
 * Root element of one XML part
 *
 * @throws WorkbookFormatError when the part is not well-formed
 */
export function parseXmlPart(xml: string, part: string): Element {
  const errors: string[] = [];
  const parser = new DOMParser({
    errorHandler: {
      warning: (message: unknown) => dlog(`[WorkbookReader] ${part}: ${String(message)}`),
      error: (message: unknown) => {
        errors.push(String(message));
      },
      fatalError: (message: unknown) => {
        errors.push(String(message));
      },
    },
  });

  let document: Document;
  try {
    document = parser.parseFromString(xml, 'text/xml');
  } catch (error) {
    throw new WorkbookFormatError(
      `${part} is not well-formed XML`,
      error instanceof Error ? error : undefined
    );
  }

  if (errors.length > 0 || !document.documentElement) {
    throw new WorkbookFormatError(`${part} is not well-formed XML${errors.length > 0 ? `: ${errors[0]}` : ''}`);
  }
  return document.documentElement;
}

function isElement(node: Node): node is Element {
  return node.nodeType === 1;
}

function elementsByName(parent: Element, localName: string): Element[] {
  return Array.from(parent.getElementsByTagNameNS('*', localName));
}

function childElements(parent: Element, localName: string): Element[] {
  return Array.from(parent.childNodes)
    .filter(isElement)
    .filter(child => child.localName === localName);
}

/**
 * Text of a string item (<si>, <is>): the plain <t>, or the <t> of each
 * rich-text run. Phonetic runs (<rPh>) are not part of the value.
 */
function stringItemText(item: Element): string {
  const plain = childElements(item, 't');
  const runs = childElements(item, 'r').flatMap(run => childElements(run, 't'));
  return [...plain, ...runs].map(t => t.textContent ?? '').join('');
}

/**
 * "A" -> 0, "Z" -> 25, "AA" -> 26
 */
export function columnIndex(reference: string): number {
  const letters = reference.replace(/[^A-Z]/gi, '').toUpperCase();
  let index = 0;
  for (const letter of letters) {
    index = index * 26 + (letter.charCodeAt(0) - 64);
  }
  return index - 1;
}

function resolveTarget(target: string): string {
  if (target.startsWith('/')) {
    return target.slice(1);
  }
  return target.startsWith('xl/') ? target : `xl/${target}`;
}

async function readEntry(zip: JSZip, path: string): Promise<string | undefined> {
  const entry = zip.file(path);
  return entry ? entry.async('string') : undefined;
}

async function readSheetEntries(zip: JSZip): Promise<SheetEntry[]> {
  const workbookXml = await readEntry(zip, 'xl/workbook.xml');
  if (workbookXml === undefined) {
    throw new WorkbookFormatError('Workbook has no xl/workbook.xml part');
  }

  const targets = new Map<string, string>();
  const relsXml = await readEntry(zip, 'xl/_rels/workbook.xml.rels');
  if (relsXml !== undefined) {
    for (const relationship of elementsByName(parseXmlPart(relsXml, 'xl/_rels/workbook.xml.rels'), 'Relationship')) {
      const id = relationship.getAttribute('Id');
      const target = relationship.getAttribute('Target');
      if (id && target) {
        targets.set(id, resolveTarget(target));
      }
    }
  }

  const workbook = parseXmlPart(workbookXml, 'xl/workbook.xml');
  return elementsByName(workbook, 'sheet').map((sheet, index) => {
    const position = index + 1;
    const relationId = sheet.getAttributeNS(RELATIONSHIPS_NS, 'id') || sheet.getAttribute('r:id');
    const path = (relationId && targets.get(relationId)) || `xl/worksheets/sheet${position}.xml`;
    return { name: sheet.getAttribute('name') || `Sheet${position}`, path };
  });
}

async function readSharedStrings(zip: JSZip): Promise<string[]> {
  const xml = await readEntry(zip, 'xl/sharedStrings.xml');
  if (xml === undefined) {
    return [];
  }
  return elementsByName(parseXmlPart(xml, 'xl/sharedStrings.xml'), 'si').map(stringItemText);
}

function decodeCell(cell: Element, sharedStrings: readonly string[]): CellValue {
  const type = cell.getAttribute('t') || 'n';

  if (type === 'inlineStr') {
    const [inline] = childElements(cell, 'is');
    return inline ? stringItemText(inline) : null;
  }

  const [valueElement] = childElements(cell, 'v');
  if (!valueElement) {
    return null;
  }
  const raw = valueElement.textContent ?? '';

  switch (type) {
    case 's':
      return sharedStrings[parseInt(raw, 10)] ?? null;
    case 'str':
      return raw;
    case 'b':
      return raw === '1';
    case 'e':
      return null;
    default: {
      const value = Number(raw);
      return raw.trim() !== '' && Number.isFinite(value) ? value : raw;
    }
  }
}

/**
 * Rows indexed by sheet row number - 1; missing rows are empty and
 * column gaps are null
 */
export function parseWorksheet(xml: string, sharedStrings: readonly string[], part = 'worksheet'): CellValue[][] {
  const rows: CellValue[][] = [];

  for (const row of elementsByName(parseXmlPart(xml, part), 'row')) {
    const rowNumber = row.getAttribute('r');
    const rowIndex = rowNumber ? parseInt(rowNumber, 10) - 1 : rows.length;
    const cells: CellValue[] = [];

    for (const cell of childElements(row, 'c')) {
      const reference = cell.getAttribute('r');
      const column = reference ? columnIndex(reference) : cells.length;
      while (cells.length < column) {
        cells.push(null);
      }
      cells[column] = decodeCell(cell, sharedStrings);
    }

    while (rows.length < rowIndex) {
      rows.push([]);
    }
    rows[rowIndex] = cells;
  }

  return rows;
}

/**
 * Read every worksheet of an .xlsx workbook
 *
 * @throws WorkbookFormatError when the container or a worksheet part cannot be read
 */
export async function readWorkbook(data: WorkbookInput): Promise<SourceTable[]> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(data);
  } catch (error) {
    throw new WorkbookFormatError(
      'Workbook could not be opened as an .xlsx container',
      error instanceof Error ? error : undefined
    );
  }

  const sheets = await readSheetEntries(zip);
  const sharedStrings = await readSharedStrings(zip);
  const tables: SourceTable[] = [];

  for (const sheet of sheets) {
    const xml = await readEntry(zip, sheet.path);
    if (xml === undefined) {
      throw new WorkbookFormatError(`Worksheet "${sheet.name}" is missing its part ${sheet.path}`);
    }
    const rows = parseWorksheet(xml, sharedStrings, sheet.path);
    dlog(`[WorkbookReader] ${sheet.name}: ${rows.length} rows`);
    tables.push({ name: sheet.name, rows });
  }

  return tables;
}
