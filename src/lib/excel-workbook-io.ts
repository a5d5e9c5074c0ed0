import path from 'path';
import fs from 'fs/promises';
import * as XLSX from 'xlsx-js-style';
import { WorkbookClosedError } from './excel-errors';
import { getUniqueFileName } from './excel-helpers';

export type WorkbookOpenMode = 'values' | 'editable';

export interface WorkbookHandle {
  readonly filePath: string;
  readonly fileName: string;
  readonly closed: boolean;
  /** Throws once the handle has been closed. */
  readonly workbook: XLSX.WorkBook;
  close(): void;
}

/**
 * Parses a workbook from disk.
 * 'values' is the headless read used by validation; 'editable' keeps formulas and styles so the
 * workbook can be written back out.
 */
export async function readWorkbook(filePath: string, mode: WorkbookOpenMode): Promise<XLSX.WorkBook> {
  const buffer = await fs.readFile(filePath);
  const editable = mode === 'editable';
  return XLSX.read(buffer, {
    type: 'buffer',
    cellFormula: editable,
    cellStyles: editable,
    cellDates: false,
  });
}

export async function openWorkbook(filePath: string, mode: WorkbookOpenMode): Promise<WorkbookHandle> {
  let workbook: XLSX.WorkBook | null = await readWorkbook(filePath, mode);
  return {
    filePath,
    fileName: path.basename(filePath),
    get closed() {
      return workbook === null;
    },
    get workbook() {
      if (workbook === null) throw new WorkbookClosedError(filePath);
      return workbook;
    },
    close() {
      workbook = null;
    },
  };
}

/**
 * Opens a workbook for the duration of `fn` and closes it on every exit path.
 */
export async function withWorkbook<T>(
  filePath: string,
  mode: WorkbookOpenMode,
  fn: (handle: WorkbookHandle) => T | Promise<T>
): Promise<T> {
  const handle = await openWorkbook(filePath, mode);
  try {
    return await fn(handle);
  } finally {
    handle.close();
  }
}

/**
 * Writes the workbook as .xlsx next to `directory`, never replacing an existing file.
 * @returns The absolute path written.
 */
export async function saveWorkbookUnique(workbook: XLSX.WorkBook, directory: string, baseName: string): Promise<string> {
  const existing = new Set(await fs.readdir(directory));
  const fileName = getUniqueFileName(baseName, '.xlsx', name => existing.has(name));
  const outputPath = path.join(directory, fileName);

  const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx', cellStyles: true });
  await fs.writeFile(outputPath, buffer, { flag: 'wx' });
  return outputPath;
}
