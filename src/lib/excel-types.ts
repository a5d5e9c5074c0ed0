
export type CellMapValue = string | number | boolean | null;
export type ConsolidationPhase = 'validation' | 'clearing' | 'processing' | 'saving';
export type ConsolidatorState = 'idle' | 'clearing' | 'writing' | 'saving' | 'done' | 'failed';
export type WorkbookFileType = 'Cell Map' | 'Consolidation' | 'Estimate';


export interface MappingEntry {
  sourceSheet: string;
  sourceCell: string; // e.g., "B7"
  destinationColumn: string;
}

export interface ConsolidatorConfig {
  cellMapPath: string;
  consolidationPath: string;
  consolidationSheetName: string;
  headerRow: number; // 1-indexed
  dataStartRow: number; // 1-indexed, strictly after headerRow
  clearExistingData: boolean;
  maxFileSizeMb: number;
}

export interface ProgressEvent {
  phase: ConsolidationPhase;
  current: number;
  total: number;
  message: string;
}

export type ProgressSink = (event: ProgressEvent) => void;

/**
 * Trimmed header text to 1-indexed column position.
 */
export type HeaderIndex = Map<string, number>;

export interface ClearResult {
  rowsScanned: number;
  rowsCleared: number;
  stoppedEarly: boolean;
}

export interface WriteResult {
  rowsWritten: number;
  formulasWritten: number;
  skippedColumns: string[];
}

export interface CellAddress {
  r: number; // 0-indexed
  c: number; // 0-indexed
}
