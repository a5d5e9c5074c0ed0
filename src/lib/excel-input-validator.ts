import path from 'path';
import fs from 'fs/promises';
import type { Stats } from 'fs';
import {
  ConfigurationError,
  FileNotFoundError,
  InvalidPathError,
  InvalidSheetNameError,
  NotAFileError,
  UnsupportedFileTypeError,
} from './excel-errors';
import { INVALID_SHEET_NAME_CHARS, MAX_SHEET_NAME_LENGTH } from './excel-helpers';
import type { ConsolidatorLogger } from './consolidator-logger';
import type { WorkbookFileType } from './excel-types';

export const ACCEPTED_EXTENSIONS = ['.xlsx', '.xlsm', '.xls'];
export const MIN_ROW_NUMBER = 1;
export const MAX_ROW_NUMBER = 1000;

/**
 * Sanitizes and resolves a user-supplied workbook path.
 * Literal ".." segments are stripped before resolving, so a path cannot climb out of where it points.
 * @param rawPath The path as typed or selected by the user.
 * @param fileType Used in error messages ("Cell Map not found: ...").
 * @returns The absolute path of an existing spreadsheet file.
 */
export async function resolvePath(rawPath: string, fileType: WorkbookFileType): Promise<string> {
  if (!rawPath || !rawPath.trim()) {
    throw new InvalidPathError(`${fileType} path cannot be empty`);
  }

  const sanitized = rawPath.trim().replace(/\.\./g, '').replace(/\\\\/g, '\\');
  const resolved = path.resolve(sanitized);

  let stats: Stats;
  try {
    stats = await fs.stat(resolved);
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new FileNotFoundError(fileType, resolved);
    }
    throw new InvalidPathError(`Invalid ${fileType} path '${rawPath}': ${error instanceof Error ? error.message : String(error)}`);
  }

  if (!stats.isFile()) {
    throw new NotAFileError(resolved);
  }

  const extension = path.extname(resolved).toLowerCase();
  if (!ACCEPTED_EXTENSIONS.includes(extension)) {
    throw new UnsupportedFileTypeError(path.extname(resolved));
  }

  return resolved;
}

/**
 * Checks a file against the size ceiling. Oversized files are only reported, never rejected,
 * and a file that cannot be inspected counts as acceptable.
 * @returns false when the file is larger than `maxSizeMb`.
 */
export async function checkFileSize(filePath: string, maxSizeMb: number, logger: ConsolidatorLogger): Promise<boolean> {
  let sizeInBytes: number;
  try {
    sizeInBytes = (await fs.stat(filePath)).size;
  } catch {
    return true;
  }

  const sizeInMb = sizeInBytes / (1024 * 1024);
  if (sizeInMb > maxSizeMb) {
    logger.warn(`Large file detected: ${path.basename(filePath)} (${sizeInMb.toFixed(1)}MB)`);
    return false;
  }
  return true;
}

/**
 * Validates an Excel sheet name.
 * @returns The trimmed name.
 */
export function validateSheetName(name: string): string {
  if (!name || !name.trim()) {
    throw new InvalidSheetNameError('Sheet name cannot be empty');
  }

  for (const char of INVALID_SHEET_NAME_CHARS) {
    if (name.includes(char)) {
      throw new InvalidSheetNameError(`Sheet name contains invalid character '${char}'`);
    }
  }

  const trimmed = name.trim();
  if (trimmed.length > MAX_SHEET_NAME_LENGTH) {
    throw new InvalidSheetNameError(`Sheet name cannot exceed ${MAX_SHEET_NAME_LENGTH} characters`);
  }

  return trimmed;
}

export function validateRowNumber(value: number, fieldName: string): number {
  if (!Number.isInteger(value) || value < MIN_ROW_NUMBER || value > MAX_ROW_NUMBER) {
    throw new ConfigurationError(`${fieldName} must be between ${MIN_ROW_NUMBER} and ${MAX_ROW_NUMBER}`);
  }
  return value;
}

export function validateRowLayout(headerRow: number, dataStartRow: number): { headerRow: number; dataStartRow: number } {
  validateRowNumber(headerRow, 'Header row');
  validateRowNumber(dataStartRow, 'Data start row');
  if (dataStartRow <= headerRow) {
    throw new ConfigurationError('Data start row must be after the header row');
  }
  return { headerRow, dataStartRow };
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}
