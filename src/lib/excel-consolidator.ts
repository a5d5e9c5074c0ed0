import path from 'path';
import { createConsoleLogger, timed } from './consolidator-logger';
import type { ConsolidatorLogger } from './consolidator-logger';
import { parseConsolidatorConfig } from './consolidator-settings';
import type { ConsolidatorConfigInput } from './consolidator-settings';
import { loadCellMapTable, validateCellMapTable } from './excel-cell-map';
import type { CellMapTable } from './excel-cell-map-table';
import { resolveConsolidationSheet, validateConsolidationWorkbook } from './excel-consolidation-schema';
import { clearExistingRows, writeEstimateRows } from './excel-consolidation-writer';
import { ConsolidationFailedError, ConsolidatorError, PreconditionError } from './excel-errors';
import { validateEstimateWorkbook } from './excel-estimate-schema';
import { checkFileSize, resolvePath, validateRowLayout, validateSheetName } from './excel-input-validator';
import { readWorkbook, saveWorkbookUnique, withWorkbook } from './excel-workbook-io';
import type { ConsolidatorConfig, ConsolidatorState, ProgressEvent, ProgressSink, WorkbookFileType } from './excel-types';

export const OUTPUT_FILE_PREFIX = 'Consolidation_AutoLinked_';

export interface ConsolidatorOptions {
  logger?: ConsolidatorLogger;
  /** Clock used for the output file's timestamp. */
  now?: () => Date;
}

function pad(value: number, length = 2): string {
  return String(value).padStart(length, '0');
}

/**
 * Local wall-clock time as YYYYMMDD_HHMMSS.
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Links estimate workbooks into a consolidation sheet through cross-file formulas.
 *
 * Usage: `create()` the consolidator, then call `validateCellMap()` and `validateConsolidationFile()`
 * once each, `validateEstimateFile()` for every estimate file, and finally `runConsolidation()`.
 * `consolidate()` does all of that in one call.
 *
 * An instance handles one run at a time.
 */
export class ExcelConsolidator {
  readonly config: ConsolidatorConfig;
  readonly cellMapPath: string;
  readonly consolidationPath: string;
  readonly consolidationSheet: string;

  private readonly logger: ConsolidatorLogger;
  private readonly now: () => Date;
  private cellMap: CellMapTable | null = null;
  private currentState: ConsolidatorState = 'idle';
  private running = false;

  private constructor(
    config: ConsolidatorConfig,
    paths: { cellMapPath: string; consolidationPath: string },
    options: ConsolidatorOptions
  ) {
    this.config = config;
    this.cellMapPath = paths.cellMapPath;
    this.consolidationPath = paths.consolidationPath;
    this.consolidationSheet = validateSheetName(config.consolidationSheetName);
    this.logger = options.logger ?? createConsoleLogger();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Validates the configuration and resolves the cell map and consolidation paths.
   */
  static async create(input: ConsolidatorConfigInput, options: ConsolidatorOptions = {}): Promise<ExcelConsolidator> {
    const config = parseConsolidatorConfig(input);
    const logger = options.logger ?? createConsoleLogger();

    const resolveFile = async (rawPath: string, fileType: WorkbookFileType) => {
      const resolved = await resolvePath(rawPath, fileType);
      await checkFileSize(resolved, config.maxFileSizeMb, logger);
      return resolved;
    };

    const cellMapPath = await resolveFile(config.cellMapPath, 'Cell Map');
    const consolidationPath = await resolveFile(config.consolidationPath, 'Consolidation');
    return new ExcelConsolidator(config, { cellMapPath, consolidationPath }, { ...options, logger });
  }

  get state(): ConsolidatorState {
    return this.currentState;
  }

  /** The validated cell map, or null before `validateCellMap()` has succeeded. */
  get cellMapTable(): CellMapTable | null {
    return this.cellMap;
  }

  async validateCellMap(): Promise<CellMapTable> {
    const table = validateCellMapTable(await loadCellMapTable(this.cellMapPath));
    this.cellMap = table;
    this.logger.info(`Cell Map validated successfully: ${table.rowCount} mappings loaded`);
    return table;
  }

  async validateConsolidationFile(): Promise<void> {
    const cellMap = this.requireCellMap('validating consolidation file');
    const { headerRow } = validateRowLayout(this.config.headerRow, this.config.dataStartRow);

    await withWorkbook(this.consolidationPath, 'values', ({ workbook }) =>
      validateConsolidationWorkbook(workbook, this.consolidationSheet, headerRow, cellMap)
    );
    this.logger.info('Consolidation file validated successfully');
  }

  /**
   * Checks one estimate file against the cell map.
   * @returns The resolved absolute path of the file.
   */
  async validateEstimateFile(filePath: string): Promise<string> {
    const cellMap = this.requireCellMap('validating estimate files');
    const resolved = await resolvePath(filePath, 'Estimate');
    await checkFileSize(resolved, this.config.maxFileSizeMb, this.logger);

    const entries = cellMap.entries();
    await withWorkbook(resolved, 'values', ({ workbook, fileName }) => validateEstimateWorkbook(workbook, fileName, entries));
    this.logger.info(`Estimate file validated: ${path.basename(resolved)}`);
    return resolved;
  }

  /**
   * Runs every validation stage in order, then the consolidation.
   * @returns The path of the written output workbook.
   */
  async consolidate(estimateFiles: string[], onProgress?: ProgressSink): Promise<string> {
    if (estimateFiles.length === 0) {
      throw new PreconditionError('No estimate files selected.');
    }

    const resolvedFiles: string[] = [];
    try {
      await timed(this.logger, 'validateCellMap', () => this.validateCellMap());
      await timed(this.logger, 'validateConsolidationFile', () => this.validateConsolidationFile());

      const total = estimateFiles.length;
      onProgress?.({ phase: 'validation', current: 0, total, message: `Validating ${total} estimate file(s)...` });
      for (let i = 0; i < total; i++) {
        const resolved = await this.validateEstimateFile(estimateFiles[i]);
        resolvedFiles.push(resolved);
        onProgress?.({ phase: 'validation', current: i + 1, total, message: `Validated ${path.basename(resolved)}` });
      }
    } catch (error) {
      this.currentState = 'failed';
      if (error instanceof ConsolidatorError) throw error;
      this.logger.error('Error during validation', error);
      throw new ConsolidationFailedError(error);
    }

    return timed(this.logger, 'runConsolidation', () => this.runConsolidation(resolvedFiles, onProgress));
  }

  /**
   * Clears stale rows (if configured), writes one linked row per estimate file and saves the
   * result as a new workbook beside the consolidation file. The consolidation file itself is
   * never written. Estimate paths are sanitized with `resolvePath`, as in
   * `validateEstimateFile`.
   * @returns The path of the written output workbook.
   */
  async runConsolidation(estimateFiles: string[], onProgress?: ProgressSink): Promise<string> {
    const cellMap = this.requireCellMap('running consolidation');
    if (this.running) {
      throw new PreconditionError('A consolidation run is already in progress');
    }

    this.running = true;
    const emit = (event: ProgressEvent) => onProgress?.(event);
    try {
      const { headerRow, dataStartRow } = validateRowLayout(this.config.headerRow, this.config.dataStartRow);
      const workbook = await readWorkbook(this.consolidationPath, 'editable');
      const { worksheet, headerIndex } = resolveConsolidationSheet(workbook, this.consolidationSheet, headerRow);
      const entries = cellMap.entries();
      const total = estimateFiles.length;
      const resolvedFiles: string[] = [];
      for (const filePath of estimateFiles) {
        resolvedFiles.push(await resolvePath(filePath, 'Estimate'));
      }

      if (this.config.clearExistingData) {
        this.currentState = 'clearing';
        emit({ phase: 'clearing', current: 0, total, message: 'Clearing existing data...' });
        const cleared = clearExistingRows(worksheet, headerIndex, cellMap.destinationColumns(), dataStartRow);
        this.logger.info(`Cleared ${cleared.rowsCleared} existing row(s) after scanning ${cleared.rowsScanned}`);
        emit({ phase: 'clearing', current: total, total, message: 'Clearing complete.' });
      }

      this.currentState = 'writing';
      const written = writeEstimateRows(worksheet, headerIndex, entries, resolvedFiles, dataStartRow, this.logger, (i, itemNumber, filePath) => {
        emit({ phase: 'processing', current: i + 1, total, message: `Processed ${path.basename(filePath)} (Item #${itemNumber})` });
      });
      this.logger.info(`Wrote ${written.rowsWritten} row(s) with ${written.formulasWritten} formula(s)`);

      this.currentState = 'saving';
      emit({ phase: 'saving', current: 0, total: 1, message: 'Saving consolidated file...' });
      const baseName = `${OUTPUT_FILE_PREFIX}${formatTimestamp(this.now())}`;
      const outputPath = await saveWorkbookUnique(workbook, path.dirname(this.consolidationPath), baseName);
      emit({ phase: 'saving', current: 1, total: 1, message: `Saved ${path.basename(outputPath)}` });

      this.currentState = 'done';
      this.logger.info(`Consolidation completed: ${outputPath}`);
      return outputPath;
    } catch (error) {
      this.currentState = 'failed';
      if (error instanceof ConsolidatorError) {
        this.logger.error(`Consolidation failed: ${error.message}`);
        throw error;
      }
      this.logger.error('Error during consolidation', error);
      throw new ConsolidationFailedError(error);
    } finally {
      this.running = false;
    }
  }

  private requireCellMap(action: string): CellMapTable {
    if (this.cellMap === null) {
      throw new PreconditionError(`Cell Map must be validated first before ${action}`);
    }
    return this.cellMap;
  }
}
