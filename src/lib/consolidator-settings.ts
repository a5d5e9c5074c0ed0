import path from 'path';
import fs from 'fs/promises';
import { z } from 'zod';
import { ConfigurationError } from './excel-errors';
import { MAX_ROW_NUMBER, MIN_ROW_NUMBER } from './excel-input-validator';
import type { ConsolidatorConfig } from './excel-types';

export const DEFAULT_SHEET_NAME = 'General Consolidation';
export const DEFAULT_HEADER_ROW = 4;
export const DEFAULT_DATA_START_ROW = 5;
export const DEFAULT_MAX_FILE_SIZE_MB = 50;
export const CELL_MAP_FILENAME = 'Cell Map.xlsx';

const rowNumber = (label: string) =>
  z
    .number({ invalid_type_error: `${label} must be a number` })
    .int(`${label} must be a whole number`)
    .min(MIN_ROW_NUMBER, `${label} must be between ${MIN_ROW_NUMBER} and ${MAX_ROW_NUMBER}`)
    .max(MAX_ROW_NUMBER, `${label} must be between ${MIN_ROW_NUMBER} and ${MAX_ROW_NUMBER}`);

export const consolidatorConfigSchema = z
  .object({
    cellMapPath: z.string().describe('Path of the cell map workbook.'),
    consolidationPath: z.string().describe('Path of the destination (consolidation) workbook.'),
    consolidationSheetName: z.string().default(DEFAULT_SHEET_NAME),
    headerRow: rowNumber('Header row').default(DEFAULT_HEADER_ROW),
    dataStartRow: rowNumber('Data start row').default(DEFAULT_DATA_START_ROW),
    clearExistingData: z.boolean().default(true),
    maxFileSizeMb: z.number().int().positive().default(DEFAULT_MAX_FILE_SIZE_MB),
  })
  .refine(config => config.dataStartRow > config.headerRow, {
    message: 'Data start row must be after the header row',
    path: ['dataStartRow'],
  });

export type ConsolidatorConfigInput = z.input<typeof consolidatorConfigSchema>;

/**
 * Settings remembered between runs. Paths may be blank until the user has picked them.
 */
export const consolidatorSettingsSchema = z.object({
  cellMapPath: z.string().optional(),
  consolidationPath: z.string().optional(),
  consolidationSheetName: z.string().optional(),
  headerRow: rowNumber('Header row').optional(),
  dataStartRow: rowNumber('Data start row').optional(),
  clearExistingData: z.boolean().optional(),
  maxFileSizeMb: z.number().int().positive().optional(),
  estimateFiles: z.array(z.string()).optional(),
});

export type ConsolidatorSettings = z.infer<typeof consolidatorSettingsSchema>;

/**
 * Applies defaults and checks row bounds.
 * @throws ConfigurationError naming the first problem found.
 */
export function parseConsolidatorConfig(input: unknown): ConsolidatorConfig {
  const parsed = consolidatorConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues[0]?.message ?? 'Invalid consolidation configuration');
  }
  return Object.freeze({ ...parsed.data });
}

/**
 * Root under which settings are stored: CONSOLIDATOR_APP_ROOT when set, else the working directory.
 */
export function getProjectRoot(): string {
  const configuredRoot = process.env.CONSOLIDATOR_APP_ROOT;
  if (configuredRoot && configuredRoot.trim()) {
    return path.resolve(configuredRoot.trim());
  }
  return process.cwd();
}

export function getSettingsFilePath(rootDir: string = getProjectRoot()): string {
  return path.join(rootDir, 'src', 'data', 'consolidator-settings.json');
}

/**
 * Reads the stored settings.
 * @returns The settings, or null when nothing has been saved yet.
 */
export async function readConsolidatorSettings(settingsFilePath: string): Promise<ConsolidatorSettings | null> {
  let raw: string;
  try {
    raw = await fs.readFile(settingsFilePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
  const json: unknown = JSON.parse(raw);
  return consolidatorSettingsSchema.parse(json);
}

export async function writeConsolidatorSettings(settingsFilePath: string, settings: ConsolidatorSettings): Promise<void> {
  await fs.mkdir(path.dirname(settingsFilePath), { recursive: true });
  await fs.writeFile(settingsFilePath, JSON.stringify(settings, null, 2));
}

/**
 * Looks for "Cell Map.xlsx" in the given directories, in order.
 * @returns The first match, or null.
 */
export async function findDefaultCellMap(directories: string[]): Promise<string | null> {
  for (const dir of directories) {
    const candidate = path.join(dir, CELL_MAP_FILENAME);
    try {
      const stats = await fs.stat(candidate);
      if (stats.isFile()) return candidate;
    } catch {
      continue;
    }
  }
  return null;
}
