import * as XLSX from 'xlsx-js-style';
import { CellNotAddressableError, SheetNotFoundError } from './excel-errors';
import { parseCellReference } from './excel-helpers';
import type { MappingEntry } from './excel-types';

/**
 * Checks that an estimate workbook has every sheet and cell the cell map points at.
 * Entries are checked in cell map order and the first problem is reported.
 * @param fileName Name of the estimate file, for error messages.
 */
export function validateEstimateWorkbook(workbook: XLSX.WorkBook, fileName: string, entries: MappingEntry[]): void {
  for (const { sourceSheet, sourceCell } of entries) {
    if (!workbook.SheetNames.includes(sourceSheet)) {
      throw new SheetNotFoundError(sourceSheet, workbook.SheetNames, fileName);
    }

    if (parseCellReference(sourceCell) === null) {
      throw new CellNotAddressableError(sourceCell, sourceSheet, fileName);
    }
  }
}
