import { UnknownColumnError } from './excel-errors';
import { isBlankValue } from './excel-helpers';
import type { CellMapValue, MappingEntry } from './excel-types';

export const SOURCE_SHEET_COLUMN = 'Source Sheet';
export const SOURCE_CELL_COLUMN = 'Source Cell';
export const DESTINATION_COLUMN = 'Destination Column (Consolidation)';
export const REQUIRED_CELL_MAP_COLUMNS = [SOURCE_SHEET_COLUMN, SOURCE_CELL_COLUMN, DESTINATION_COLUMN] as const;

export type CellMapRecord = Readonly<Record<string, CellMapValue>>;

/**
 * In-memory table of cell map rows with a fixed, ordered list of columns.
 * Column lookups trim the requested name and then match exactly (case-sensitive).
 */
export class CellMapTable {
  private readonly columnNames: readonly string[];
  private readonly data: readonly (readonly CellMapValue[])[];
  private readonly columnIndices: ReadonlyMap<string, number>;

  constructor(columns: string[], rows: CellMapValue[][]) {
    if (columns.length === 0) {
      throw new Error('Columns cannot be empty');
    }
    rows.forEach((row, i) => {
      if (row.length !== columns.length) {
        throw new Error(`Row ${i + 1} has ${row.length} values but the table has ${columns.length} columns`);
      }
    });

    this.columnNames = columns.map(col => col.trim());
    this.data = rows.map(row => [...row]);
    const indices = new Map<string, number>();
    this.columnNames.forEach((name, idx) => {
      if (!indices.has(name)) indices.set(name, idx);
    });
    this.columnIndices = indices;
  }

  get columns(): string[] {
    return [...this.columnNames];
  }

  get rowCount(): number {
    return this.data.length;
  }

  hasColumn(name: string): boolean {
    return this.columnIndices.has(name.trim());
  }

  columnValues(name: string): CellMapValue[] {
    const idx = this.indexOf(name);
    return this.data.map(row => row[idx]);
  }

  /**
   * Per cell, whether the value is absent or a whitespace-only string.
   */
  nullMask(): boolean[][] {
    return this.data.map(row => row.map(value => isBlankValue(value)));
  }

  hasNulls(): boolean {
    return this.nullMask().some(row => row.some(Boolean));
  }

  /**
   * Per row, whether the values at `subsetColumns` already appeared in an earlier row.
   * The first occurrence of a tuple is never flagged.
   */
  duplicateMask(subsetColumns: readonly string[] = this.columnNames): boolean[] {
    const subsetIndices = subsetColumns.map(col => this.indexOf(col));
    const seen = new Set<string>();
    return this.data.map(row => {
      const key = JSON.stringify(subsetIndices.map(idx => row[idx]));
      const isDuplicate = seen.has(key);
      seen.add(key);
      return isDuplicate;
    });
  }

  rows(): CellMapRecord[] {
    return this.data.map(row => {
      const record: Record<string, CellMapValue> = {};
      this.columnNames.forEach((name, idx) => {
        if (!(name in record)) record[name] = row[idx];
      });
      return record;
    });
  }

  /**
   * The rows as typed mapping entries, values converted to trimmed strings.
   */
  entries(): MappingEntry[] {
    const sheetIdx = this.indexOf(SOURCE_SHEET_COLUMN);
    const cellIdx = this.indexOf(SOURCE_CELL_COLUMN);
    const destIdx = this.indexOf(DESTINATION_COLUMN);
    return this.data.map(row => ({
      sourceSheet: String(row[sheetIdx] ?? '').trim(),
      sourceCell: String(row[cellIdx] ?? '').trim(),
      destinationColumn: String(row[destIdx] ?? '').trim(),
    }));
  }

  /**
   * The distinct destination column names, in first-seen order.
   */
  destinationColumns(): string[] {
    return Array.from(new Set(this.entries().map(entry => entry.destinationColumn)));
  }

  private indexOf(name: string): number {
    const idx = this.columnIndices.get(name.trim());
    if (idx === undefined) throw new UnknownColumnError(name);
    return idx;
  }
}
