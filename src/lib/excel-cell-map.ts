import * as XLSX from 'xlsx-js-style';
import { CellMapTable, REQUIRED_CELL_MAP_COLUMNS } from './excel-cell-map-table';
import {
  CellMapReadError,
  ConsolidatorError,
  DuplicateMappingError,
  EmptyMappingCellsError,
  MissingColumnsError,
} from './excel-errors';
import { cellMapValue, getCell, getSheetRange, isBlankValue } from './excel-helpers';
import { withWorkbook } from './excel-workbook-io';
import type { CellMapValue } from './excel-types';

/**
 * Builds a cell map table from a worksheet.
 * The first non-blank row holds the headers; every later non-blank row is a mapping row.
 * Blank header cells become "Column_<index>", and rows are cut or padded to the header width.
 */
export function cellMapTableFromSheet(worksheet: XLSX.WorkSheet): CellMapTable {
  const range = getSheetRange(worksheet);
  if (!range) {
    throw new Error('Excel sheet appears to be empty');
  }

  let columns: string[] | null = null;
  const data: CellMapValue[][] = [];

  for (let R = 0; R <= range.e.r; ++R) {
    const values: CellMapValue[] = [];
    for (let C = 0; C <= range.e.c; ++C) {
      values.push(cellMapValue(getCell(worksheet, R, C)));
    }
    if (values.every(isBlankValue)) continue;

    if (columns === null) {
      let width = values.length;
      while (width > 0 && isBlankValue(values[width - 1])) width--;
      columns = values.slice(0, width).map((value, i) => (isBlankValue(value) ? `Column_${i}` : String(value).trim()));
      continue;
    }

    const row = values.slice(0, columns.length);
    while (row.length < columns.length) row.push('');
    data.push(row);
  }

  if (columns === null) {
    throw new Error('No valid header row found in Excel file');
  }

  return new CellMapTable(columns, data);
}

/**
 * Reads the first worksheet of the cell map file into a table.
 */
export async function loadCellMapTable(filePath: string): Promise<CellMapTable> {
  try {
    return await withWorkbook(filePath, 'values', ({ workbook }) => {
      const firstSheetName = workbook.SheetNames[0];
      if (firstSheetName === undefined) {
        throw new Error('No worksheet found in workbook');
      }
      return cellMapTableFromSheet(workbook.Sheets[firstSheetName]);
    });
  } catch (error) {
    if (error instanceof ConsolidatorError) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    throw new CellMapReadError(filePath, reason, { cause: error });
  }
}

/**
 * Checks the cell map's schema and content: required columns present, no blank cells,
 * no repeated (Source Sheet, Source Cell, Destination Column) triple.
 * @returns The same table, for chaining.
 */
export function validateCellMapTable(table: CellMapTable): CellMapTable {
  const missingColumns = REQUIRED_CELL_MAP_COLUMNS.filter(col => !table.hasColumn(col));
  if (missingColumns.length > 0) {
    throw new MissingColumnsError(missingColumns);
  }

  if (table.hasNulls()) {
    const columns = table.columns;
    const emptyCells: { row: number; column: string }[] = [];
    table.nullMask().forEach((row, r) => {
      row.forEach((isNull, c) => {
        if (isNull) emptyCells.push({ row: r + 1, column: columns[c] });
      });
    });
    throw new EmptyMappingCellsError(emptyCells);
  }

  const duplicateRows = table
    .duplicateMask(REQUIRED_CELL_MAP_COLUMNS)
    .map((isDuplicate, r) => (isDuplicate ? r + 1 : 0))
    .filter(row => row > 0);
  if (duplicateRows.length > 0) {
    throw new DuplicateMappingError(duplicateRows);
  }

  return table;
}
