export type ConsolidatorErrorKind = 'input' | 'schema' | 'configuration' | 'runtime';

export type ConsolidatorErrorCode =
  | 'INVALID_PATH'
  | 'FILE_NOT_FOUND'
  | 'NOT_A_FILE'
  | 'UNSUPPORTED_FILE_TYPE'
  | 'INVALID_SHEET_NAME'
  | 'UNKNOWN_COLUMN'
  | 'CELL_MAP_READ'
  | 'MISSING_COLUMNS'
  | 'EMPTY_MAPPING_CELLS'
  | 'DUPLICATE_MAPPING'
  | 'SHEET_NOT_FOUND'
  | 'INSUFFICIENT_ROWS'
  | 'MISSING_DESTINATION_COLUMNS'
  | 'CELL_NOT_ADDRESSABLE'
  | 'CONFIGURATION'
  | 'PRECONDITION'
  | 'WORKBOOK_CLOSED'
  | 'CONSOLIDATION_FAILED';

/**
 * Base class for every failure the consolidator reports to its caller.
 * The message is meant to be shown to the end user as-is.
 */
export class ConsolidatorError extends Error {
  readonly kind: ConsolidatorErrorKind;
  readonly code: ConsolidatorErrorCode;

  constructor(kind: ConsolidatorErrorKind, code: ConsolidatorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
    this.code = code;
  }
}

// --- Input errors ---

export class InvalidPathError extends ConsolidatorError {
  constructor(message: string) {
    super('input', 'INVALID_PATH', message);
  }
}

export class FileNotFoundError extends ConsolidatorError {
  constructor(readonly fileType: string, readonly filePath: string) {
    super('input', 'FILE_NOT_FOUND', `${fileType} not found: ${filePath}`);
  }
}

export class NotAFileError extends ConsolidatorError {
  constructor(readonly filePath: string) {
    super('input', 'NOT_A_FILE', `Path is not a file: ${filePath}`);
  }
}

export class UnsupportedFileTypeError extends ConsolidatorError {
  constructor(readonly extension: string) {
    super('input', 'UNSUPPORTED_FILE_TYPE', `Invalid file type. Expected Excel file, got: ${extension || '(no extension)'}`);
  }
}

export class InvalidSheetNameError extends ConsolidatorError {
  constructor(message: string) {
    super('input', 'INVALID_SHEET_NAME', message);
  }
}

// --- Schema errors ---

export class UnknownColumnError extends ConsolidatorError {
  constructor(readonly column: string) {
    super('schema', 'UNKNOWN_COLUMN', `Column '${column}' not found`);
  }
}

export class CellMapReadError extends ConsolidatorError {
  constructor(filePath: string, reason: string, options?: { cause?: unknown }) {
    super('schema', 'CELL_MAP_READ', `Failed to read Cell Map file '${filePath}': ${reason}`, options);
  }
}

export class MissingColumnsError extends ConsolidatorError {
  constructor(readonly missingColumns: string[]) {
    super('schema', 'MISSING_COLUMNS', `Cell Map is missing required columns: ${missingColumns.join(', ')}`);
  }
}

export class EmptyMappingCellsError extends ConsolidatorError {
  constructor(readonly emptyCells: { row: number; column: string }[]) {
    const first = emptyCells[0];
    const where = first ? ` First empty cell: column '${first.column}', data row ${first.row}.` : '';
    super('schema', 'EMPTY_MAPPING_CELLS', `Cell Map contains empty cells. Please fill all values.${where}`);
  }
}

export class DuplicateMappingError extends ConsolidatorError {
  constructor(readonly duplicateRows: number[]) {
    super('schema', 'DUPLICATE_MAPPING', `Cell Map contains duplicate mappings (data rows ${duplicateRows.join(', ')}). Please remove them.`);
  }
}

export class SheetNotFoundError extends ConsolidatorError {
  constructor(readonly sheetName: string, readonly availableSheets: string[], fileName?: string) {
    const prefix = fileName ? `In file '${fileName}', required sheet` : 'Sheet';
    super('schema', 'SHEET_NOT_FOUND', `${prefix} '${sheetName}' not found. Available sheets: [${availableSheets.join(', ')}]`);
  }
}

export class InsufficientRowsError extends ConsolidatorError {
  constructor(readonly headerRow: number, readonly rowCount: number) {
    super('schema', 'INSUFFICIENT_ROWS', `Consolidation sheet has less than ${headerRow} rows (found ${rowCount}). Cannot find header row.`);
  }
}

export class MissingDestinationColumnsError extends ConsolidatorError {
  constructor(readonly missingColumns: string[], readonly headerRow: number) {
    super('schema', 'MISSING_DESTINATION_COLUMNS', `Missing destination columns in consolidation sheet (row ${headerRow}): ${missingColumns.join(', ')}`);
  }
}

export class CellNotAddressableError extends ConsolidatorError {
  constructor(readonly cellRef: string, readonly sheetName: string, fileName: string) {
    super('schema', 'CELL_NOT_ADDRESSABLE', `In file '${fileName}', cell '${cellRef}' could not be accessed in sheet '${sheetName}'.`);
  }
}

// --- Configuration errors ---

export class ConfigurationError extends ConsolidatorError {
  constructor(message: string) {
    super('configuration', 'CONFIGURATION', message);
  }
}

// --- Runtime errors ---

export class PreconditionError extends ConsolidatorError {
  constructor(message: string) {
    super('runtime', 'PRECONDITION', message);
  }
}

export class WorkbookClosedError extends ConsolidatorError {
  constructor(filePath: string) {
    super('runtime', 'WORKBOOK_CLOSED', `Workbook '${filePath}' has already been closed.`);
  }
}

export class ConsolidationFailedError extends ConsolidatorError {
  constructor(cause: unknown) {
    const detail = cause instanceof Error ? `${cause.name} - ${cause.message}` : String(cause);
    super('runtime', 'CONSOLIDATION_FAILED', `A critical error occurred: ${detail}`, { cause });
  }
}

export function isConsolidatorError(error: unknown): error is ConsolidatorError {
  return error instanceof ConsolidatorError;
}
