import * as XLSX from 'xlsx-js-style';
import type { CellMapTable } from './excel-cell-map-table';
import { InsufficientRowsError, MissingDestinationColumnsError, SheetNotFoundError } from './excel-errors';
import { buildHeaderIndex, countPhysicalRows, readRowTexts } from './excel-helpers';
import type { HeaderIndex } from './excel-types';

/**
 * Looks up the consolidation sheet and checks it has a header row at `headerRow`.
 * @returns The worksheet and its header index.
 */
export function resolveConsolidationSheet(
  workbook: XLSX.WorkBook,
  sheetName: string,
  headerRow: number
): { worksheet: XLSX.WorkSheet; headerIndex: HeaderIndex; headerTexts: string[] } {
  const worksheet = workbook.SheetNames.includes(sheetName) ? workbook.Sheets[sheetName] : undefined;
  if (!worksheet) {
    throw new SheetNotFoundError(sheetName, workbook.SheetNames);
  }

  const rowCount = countPhysicalRows(worksheet);
  if (rowCount < headerRow) {
    throw new InsufficientRowsError(headerRow, rowCount);
  }

  const headerTexts = readRowTexts(worksheet, headerRow);
  return { worksheet, headerIndex: buildHeaderIndex(headerTexts), headerTexts };
}

/**
 * Confirms every destination column of the cell map appears among the header row's texts.
 * Header order and position do not matter.
 * @returns The header index of the consolidation sheet.
 */
export function validateConsolidationWorkbook(
  workbook: XLSX.WorkBook,
  sheetName: string,
  headerRow: number,
  cellMap: CellMapTable
): HeaderIndex {
  const { headerIndex } = resolveConsolidationSheet(workbook, sheetName, headerRow);

  const missingColumns = cellMap
    .destinationColumns()
    .filter(col => !headerIndex.has(col))
    .sort();
  if (missingColumns.length > 0) {
    throw new MissingDestinationColumnsError(missingColumns, headerRow);
  }

  return headerIndex;
}
