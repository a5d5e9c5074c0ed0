import path from 'path';
import * as XLSX from 'xlsx-js-style';
import type { ConsolidatorLogger } from './consolidator-logger';
import { buildExternalReferenceFormula, cellText, extendSheetRange, getCell, getSheetRange, toCellFormula } from './excel-helpers';
import type { ClearResult, HeaderIndex, MappingEntry, WriteResult } from './excel-types';

/** Consecutive unoccupied rows after which clearing stops scanning. */
export const MAX_EMPTY_ROWS_BEFORE_STOP = 20;
export const FILE_NAME_COLUMN = 1;
export const ITEM_NUMBER_COLUMN = 2;

function clearCell(worksheet: XLSX.WorkSheet, r: number, c: number): void {
  const addr = XLSX.utils.encode_cell({ r, c });
  const cell = getCell(worksheet, r, c);
  if (!cell) return;
  if (cell.s) {
    worksheet[addr] = { t: 'z', s: cell.s };
  } else {
    delete worksheet[addr];
  }
}

function setCell(worksheet: XLSX.WorkSheet, r: number, c: number, cell: XLSX.CellObject): void {
  const existing = getCell(worksheet, r, c);
  if (existing?.s) cell.s = existing.s;
  worksheet[XLSX.utils.encode_cell({ r, c })] = cell;
  extendSheetRange(worksheet, { r, c });
}

/**
 * Clears previously consolidated rows, starting at `dataStartRow`.
 * A row is occupied when its first column has text; occupied rows lose their file name,
 * item number and mapped destination columns. Other columns are left alone.
 * Scanning stops after more than MAX_EMPTY_ROWS_BEFORE_STOP consecutive unoccupied rows,
 * so rows past such a gap are not cleared.
 */
export function clearExistingRows(
  worksheet: XLSX.WorkSheet,
  headerIndex: HeaderIndex,
  destinationColumns: string[],
  dataStartRow: number
): ClearResult {
  const columnsToClear = new Set<number>([FILE_NAME_COLUMN, ITEM_NUMBER_COLUMN]);
  for (const name of destinationColumns) {
    const col = headerIndex.get(name);
    if (col !== undefined) columnsToClear.add(col);
  }

  const range = getSheetRange(worksheet);
  const lastRow = range ? range.e.r + 1 : 0;
  const result: ClearResult = { rowsScanned: 0, rowsCleared: 0, stoppedEarly: false };
  let consecutiveEmpty = 0;

  for (let row = dataStartRow; row <= lastRow; row++) {
    result.rowsScanned++;
    if (cellText(getCell(worksheet, row - 1, FILE_NAME_COLUMN - 1)) !== '') {
      columnsToClear.forEach(col => clearCell(worksheet, row - 1, col - 1));
      result.rowsCleared++;
      consecutiveEmpty = 0;
    } else {
      consecutiveEmpty++;
    }

    if (consecutiveEmpty > MAX_EMPTY_ROWS_BEFORE_STOP) {
      result.stoppedEarly = row < lastRow;
      break;
    }
  }

  return result;
}

/**
 * Writes one row for an estimate file: its base name, its item number, and a cross-file
 * formula for every mapping entry whose destination column is in the header.
 * Entries whose column is missing are skipped with a warning.
 * @returns The destination column names that were skipped.
 */
export function writeEstimateRow(
  worksheet: XLSX.WorkSheet,
  headerIndex: HeaderIndex,
  entries: MappingEntry[],
  estimateFilePath: string,
  rowNumber: number,
  itemNumber: number,
  logger: ConsolidatorLogger
): { formulasWritten: number; skippedColumns: string[] } {
  const r = rowNumber - 1;
  const displayName = path.parse(estimateFilePath).name;
  setCell(worksheet, r, FILE_NAME_COLUMN - 1, { t: 's', v: displayName });
  setCell(worksheet, r, ITEM_NUMBER_COLUMN - 1, { t: 'n', v: itemNumber });

  let formulasWritten = 0;
  const skippedColumns: string[] = [];
  for (const entry of entries) {
    const col = headerIndex.get(entry.destinationColumn);
    if (col === undefined) {
      logger.warn(`Destination column '${entry.destinationColumn}' not found in consolidation header. Skipping.`);
      skippedColumns.push(entry.destinationColumn);
      continue;
    }

    const formula = buildExternalReferenceFormula(estimateFilePath, entry.sourceSheet, entry.sourceCell);
    setCell(worksheet, r, col - 1, { t: 'n', f: toCellFormula(formula) });
    formulasWritten++;
  }

  return { formulasWritten, skippedColumns };
}

/**
 * Writes one row per estimate file, in the given order, starting at `dataStartRow`.
 * Item numbers run 1, 2, 3, ... and always advance, even when a row skipped columns.
 * @param onRowWritten Called after each row with its 0-based file index.
 */
export function writeEstimateRows(
  worksheet: XLSX.WorkSheet,
  headerIndex: HeaderIndex,
  entries: MappingEntry[],
  estimateFilePaths: string[],
  dataStartRow: number,
  logger: ConsolidatorLogger,
  onRowWritten?: (index: number, itemNumber: number, filePath: string) => void
): WriteResult {
  const result: WriteResult = { rowsWritten: 0, formulasWritten: 0, skippedColumns: [] };

  let currentRow = dataStartRow;
  let itemNumber = 1;
  estimateFilePaths.forEach((filePath, i) => {
    const absolutePath = path.resolve(filePath);
    const rowResult = writeEstimateRow(worksheet, headerIndex, entries, absolutePath, currentRow, itemNumber, logger);
    result.rowsWritten++;
    result.formulasWritten += rowResult.formulasWritten;
    rowResult.skippedColumns.forEach(col => {
      if (!result.skippedColumns.includes(col)) result.skippedColumns.push(col);
    });

    onRowWritten?.(i, itemNumber, absolutePath);
    currentRow++;
    itemNumber++;
  });

  return result;
}
