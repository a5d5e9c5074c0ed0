import path from 'path';
import * as XLSX from 'xlsx-js-style';
import type { CellAddress, CellMapValue, HeaderIndex } from './excel-types';

export const MAX_SHEET_NAME_LENGTH = 31;
export const INVALID_SHEET_NAME_CHARS = ['\\', '/', '*', '[', ']', ':', '?'];

const MAX_EXCEL_ROWS = 1048576;
const MAX_EXCEL_COLUMNS = 16384;
const CELL_REFERENCE_REGEX = /^\$?([A-Za-z]{1,3})\$?(\d+)$/;


/**
 * Whether a value counts as blank: absent, or a string with nothing but whitespace.
 */
export function isBlankValue(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

/**
 * Returns the cell at a 0-indexed position, or undefined when the sheet has nothing there.
 */
export function getCell(worksheet: XLSX.WorkSheet, r: number, c: number): XLSX.CellObject | undefined {
  const cell: XLSX.CellObject | undefined = worksheet[XLSX.utils.encode_cell({ r, c })];
  return cell;
}

/**
 * The display text of a cell, trimmed. Empty cells and stubs give ''.
 */
export function cellText(cell: XLSX.CellObject | undefined): string {
  if (!cell || cell.t === 'z' || cell.v === undefined || cell.v === null) return '';
  if (cell.v instanceof Date) return cell.v.toISOString();
  return String(cell.v).trim();
}

/**
 * The raw value of a cell as the cell map stores it (strings trimmed, empty cells as '').
 */
export function cellMapValue(cell: XLSX.CellObject | undefined): CellMapValue {
  if (!cell || cell.t === 'z' || cell.v === undefined || cell.v === null) return '';
  if (typeof cell.v === 'string') return cell.v.trim();
  if (cell.v instanceof Date) return cell.v.toISOString();
  return cell.v;
}

export function getSheetRange(worksheet: XLSX.WorkSheet): XLSX.Range | null {
  const ref = worksheet['!ref'];
  if (!ref) return null;
  return XLSX.utils.decode_range(ref);
}

/**
 * Number of physical rows in a sheet, counted from row 1 to the last row of its used range.
 */
export function countPhysicalRows(worksheet: XLSX.WorkSheet): number {
  const range = getSheetRange(worksheet);
  return range ? range.e.r + 1 : 0;
}

/**
 * Grows the sheet's used range so it includes the given 0-indexed cell.
 */
export function extendSheetRange(worksheet: XLSX.WorkSheet, address: CellAddress): void {
  const range = getSheetRange(worksheet) ?? { s: { ...address }, e: { ...address } };
  range.s.r = Math.min(range.s.r, address.r);
  range.s.c = Math.min(range.s.c, address.c);
  range.e.r = Math.max(range.e.r, address.r);
  range.e.c = Math.max(range.e.c, address.c);
  worksheet['!ref'] = XLSX.utils.encode_range(range);
}

/**
 * Reads the texts of a 1-indexed row, from column A to the last used column, trimmed.
 * @returns One entry per column; blank cells give ''.
 */
export function readRowTexts(worksheet: XLSX.WorkSheet, rowNumber: number): string[] {
  const range = getSheetRange(worksheet);
  if (!range) return [];
  const texts: string[] = [];
  for (let C = 0; C <= range.e.c; ++C) {
    texts.push(cellText(getCell(worksheet, rowNumber - 1, C)));
  }
  return texts;
}

/**
 * Builds the header index: trimmed header text to its 1-indexed column.
 * Blank headers are left out; a repeated header resolves to its right-most column.
 */
export function buildHeaderIndex(headerTexts: string[]): HeaderIndex {
  const index: HeaderIndex = new Map();
  headerTexts.forEach((text, i) => {
    if (text) index.set(text, i + 1);
  });
  return index;
}

/**
 * Parses an A1-style cell reference ("B7", "$C$12", "aa3") into a 0-indexed address.
 * @returns The address, or null when the reference is malformed or outside the sheet grid.
 */
export function parseCellReference(reference: string): CellAddress | null {
  const match = CELL_REFERENCE_REGEX.exec(reference.trim());
  if (!match) return null;

  const c = XLSX.utils.decode_col(match[1].toUpperCase());
  const row = parseInt(match[2], 10);
  if (c < 0 || c >= MAX_EXCEL_COLUMNS || row < 1 || row > MAX_EXCEL_ROWS) return null;

  return { r: row - 1, c };
}

/**
 * Doubles single quotes so text can sit inside a quoted external reference.
 */
export function escapeQuotedReferencePart(text: string): string {
  return text.replace(/'/g, "''");
}

/**
 * Builds the cross-file formula linking to a cell of another workbook:
 * `='<directory>\[<file name>]<sheet>'!<cell>`.
 * @param estimateFilePath Absolute path of the linked workbook.
 */
export function buildExternalReferenceFormula(estimateFilePath: string, sourceSheet: string, sourceCell: string): string {
  const directory = escapeQuotedReferencePart(path.dirname(estimateFilePath));
  const fileName = escapeQuotedReferencePart(path.basename(estimateFilePath));
  return `='${directory}\\[${fileName}]${escapeQuotedReferencePart(sourceSheet)}'!${sourceCell}`;
}

/**
 * Formula text as SheetJS stores it on a cell (without the leading '=').
 */
export function toCellFormula(formula: string): string {
  return formula.startsWith('=') ? formula.slice(1) : formula;
}

/**
 * Generates a file name that does not exist yet, appending `_1`, `_2`, ... to the base name.
 * @param exists Predicate telling whether a candidate name is taken.
 */
export function getUniqueFileName(baseName: string, extension: string, exists: (fileName: string) => boolean): string {
  let finalName = `${baseName}${extension}`;
  let counter = 1;
  while (exists(finalName)) {
    finalName = `${baseName}_${counter}${extension}`;
    counter++;
  }
  return finalName;
}
